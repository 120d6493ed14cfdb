import { describe, it, expect, vi } from "vitest";
import { OBJLoader } from "./OBJLoader";
import { MeshError, validateMesh } from "../utils/Geometry";

const QUAD = `
# unit quad facing +Z
v 0 0 0
v 1 0 0
v 1 1 0
v 0 1 0
vn 0 0 1
f 1//1 2//1 3//1 4//1
`;

describe("OBJLoader", () => {
	it("fan-triangulates polygons and shares vertices", () => {
		const mesh = new OBJLoader().parse(QUAD);
		validateMesh(mesh);
		expect(mesh.vertices).toHaveLength(4);
		expect(mesh.indices).toEqual([0, 1, 2, 0, 2, 3]);
		expect(mesh.vertices[2].position).toEqual({ x: 1, y: 1, z: 0 });
		expect(mesh.vertices[0].normal).toEqual({ x: 0, y: 0, z: 1 });
	});

	it("resolves negative indices and v/vt/vn corners", () => {
		const text = [
			"v 0 0 0",
			"v 1 0 0",
			"v 0 1 0",
			"vt 0 0",
			"vt 1 0",
			"vt 0 1",
			"vn 0 0 1",
			"f -3/-3/-1 -2/-2/-1 -1/-1/-1",
		].join("\r\n");
		const mesh = new OBJLoader().parse(text);
		expect(mesh.indices).toEqual([0, 1, 2]);
		expect(mesh.vertices[1].position).toEqual({ x: 1, y: 0, z: 0 });
	});

	it("computes smooth normals when the file has none", () => {
		const mesh = new OBJLoader().parse("v 0 0 0\nv 1 0 0\nv 0 1 0\nf 1 2 3\n");
		for (const v of mesh.vertices) {
			expect(v.normal).toEqual({ x: 0, y: 0, z: 1 });
		}
	});

	it("reads trailing vertex colours", () => {
		const mesh = new OBJLoader().parse("v 0 0 0 1 0 0\nv 1 0 0 0 1 0\nv 0 1 0\nf 1 2 3\n");
		expect(mesh.vertices[0].color).toEqual({ x: 1, y: 0, z: 0 });
		expect(mesh.vertices[1].color).toEqual({ x: 0, y: 1, z: 0 });
		expect(mesh.vertices[2].color).toBeUndefined();
	});

	it("ignores statements it does not use", () => {
		const mesh = new OBJLoader().parse(`mtllib ship.mtl\no hull\ns 1\nusemtl grey\n${QUAD}`);
		expect(mesh.indices).toHaveLength(6);
	});

	it("rejects out-of-range indices with the line number", () => {
		const loader = new OBJLoader();
		expect(() => loader.parse("v 0 0 0\nv 1 0 0\nf 1 2 5\n")).toThrow(MeshError);
		expect(() => loader.parse("v 0 0 0\nv 1 0 0\nf 1 2 5\n")).toThrow(
			"[Mesh] Line 3: vertex index 5 is out of range (2 defined)"
		);
	});

	it("rejects faces with fewer than three corners", () => {
		expect(() => new OBJLoader().parse("v 0 0 0\nv 1 0 0\nf 1 2\n")).toThrow(
			"[Mesh] Line 3: face needs at least 3 vertices"
		);
	});

	it("rejects malformed vertices", () => {
		expect(() => new OBJLoader().parse("v 0 zero 0\n")).toThrow(MeshError);
	});

	it("emits parse events", () => {
		const loader = new OBJLoader();
		const start = vi.fn();
		const end = vi.fn();
		loader.on("parsestart", start).on("parseend", end);
		const mesh = loader.parse(QUAD);
		expect(start).toHaveBeenCalledTimes(1);
		expect(end).toHaveBeenCalledWith(mesh);
	});

	it("reports missing files through the error event", async () => {
		const loader = new OBJLoader();
		const onError = vi.fn();
		loader.on("error", onError);
		await expect(loader.load("/nonexistent/dir/missing.obj")).rejects.toThrow("Failed to load");
		expect(onError).toHaveBeenCalledTimes(1);
	});
});
