import { describe, it, expect } from "vitest";
import { PrimitiveAssembler, edgeFunction } from "./PrimitiveAssembler";
import { ShaderKind } from "../shaders/types";
import type { TransformedVertex } from "./types";

const viewport = { width: 800, height: 600 };

function tv(x: number, y: number, z = 0, w = 1): TransformedVertex {
	return {
		clip: { x, y, z, w },
		world: { x, y, z },
		local: { x, y, z },
		normal: { x: 0, y: 0, z: 1 },
		shader: ShaderKind.Spaceship,
	};
}

describe("edgeFunction", () => {
	it("is positive for counter-clockwise NDC winding mapped to screen", () => {
		// NDC (−0.5,−0.5), (0.5,−0.5), (0,0.5) on 800x600
		expect(edgeFunction({ x: 200, y: 450 }, { x: 600, y: 450 }, { x: 400, y: 150 })).toBe(
			120000
		);
	});
});

describe("PrimitiveAssembler", () => {
	it("maps NDC corners to the viewport", () => {
		const s = PrimitiveAssembler.toScreen(tv(2, 2, 1, 2), viewport);
		expect(s.x).toBe(800);
		expect(s.y).toBe(0);
		expect(s.z).toBe(0.5);
		expect(s.invW).toBe(0.5);
	});

	it("accepts a front-facing triangle unchanged", () => {
		const result = PrimitiveAssembler.assemble(
			tv(-0.5, -0.5),
			tv(0.5, -0.5),
			tv(0, 0.5),
			viewport
		);
		expect(result.kind).toBe("accepted");
		if (result.kind !== "accepted") return;
		expect(result.triangle.area).toBe(120000);
		expect(result.triangle.vertices.map((v) => [v.x, v.y])).toEqual([
			[200, 450],
			[600, 450],
			[400, 150],
		]);
		expect(result.triangle.shader).toBe(ShaderKind.Spaceship);
	});

	it("rejects back faces", () => {
		const result = PrimitiveAssembler.assemble(
			tv(-0.5, -0.5),
			tv(0, 0.5),
			tv(0.5, -0.5),
			viewport
		);
		expect(result.kind).toBe("backface");
	});

	it("reorders back faces when culling is off", () => {
		const result = PrimitiveAssembler.assemble(
			tv(-0.5, -0.5),
			tv(0, 0.5),
			tv(0.5, -0.5),
			viewport,
			{ cullBackFaces: false }
		);
		expect(result.kind).toBe("accepted");
		if (result.kind !== "accepted") return;
		expect(result.triangle.area).toBe(120000);
		expect(edgeFunction(...result.triangle.vertices)).toBeGreaterThan(0);
	});

	it("rejects triangles entirely beyond one side of the overscan box", () => {
		const result = PrimitiveAssembler.assemble(tv(1.6, 0), tv(2, 1), tv(3, -1), viewport);
		expect(result.kind).toBe("clipped");
	});

	it("keeps triangles inside the overscan margin", () => {
		const result = PrimitiveAssembler.assemble(tv(1.2, -0.2), tv(1.4, -0.2), tv(1.3, 0.2), viewport);
		expect(result.kind).toBe("accepted");
	});

	it("keeps large triangles spanning the screen", () => {
		const result = PrimitiveAssembler.assemble(tv(-3, -3), tv(3, -3), tv(0, 3), viewport);
		expect(result.kind).toBe("accepted");
	});

	it("rejects triangles beyond the near or far plane", () => {
		expect(
			PrimitiveAssembler.assemble(tv(0, 0, -2), tv(1, 0, -3), tv(0, 1, -2), viewport).kind
		).toBe("clipped");
		expect(
			PrimitiveAssembler.assemble(tv(0, 0, 2), tv(1, 0, 3), tv(0, 1, 2), viewport).kind
		).toBe("clipped");
	});

	it("rejects vertices at or behind the eye plane", () => {
		const result = PrimitiveAssembler.assemble(tv(0, 0, 0, 0), tv(0.5, 0), tv(0, 0.5), viewport);
		expect(result.kind).toBe("clipped");
	});

	it("rejects degenerate triangles", () => {
		const result = PrimitiveAssembler.assemble(tv(0, 0), tv(0.25, 0.25), tv(0.5, 0.5), viewport);
		expect(result.kind).toBe("degenerate");
	});

	it("computes outcodes against the margin", () => {
		expect(PrimitiveAssembler.outcode({ x: 0, y: 0, z: 0, w: 1 }, 1.5)).toBe(0);
		expect(PrimitiveAssembler.outcode({ x: 1.6, y: 0, z: 0, w: 1 }, 1.5)).not.toBe(0);
		expect(PrimitiveAssembler.outcode({ x: 1.4, y: -1.4, z: 0, w: 1 }, 1.5)).toBe(0);
	});
});
