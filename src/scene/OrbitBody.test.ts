import { describe, it, expect } from "vitest";
import { OrbitBody, type OrbitDescriptor } from "./OrbitBody";
import { Matrix4 } from "../maths/Matrix4";
import { ShaderKind } from "../shaders/types";

function descriptor(overrides: Partial<OrbitDescriptor> = {}): OrbitDescriptor {
	return {
		name: "probe",
		shader: ShaderKind.Rocky,
		radius: 4,
		speed: 0.5,
		phase: 0,
		height: 1,
		rotationSpeed: 0,
		scale: 2,
		retrograde: false,
		...overrides,
	};
}

describe("OrbitBody", () => {
	it("starts at its phase on the +X axis", () => {
		expect(new OrbitBody(descriptor()).positionAt(0)).toEqual({ x: 4, y: 1, z: 0 });
	});

	it("advances a quarter turn", () => {
		const p = new OrbitBody(descriptor()).positionAt(Math.PI);
		expect(p.x).toBeCloseTo(0, 12);
		expect(p.z).toBeCloseTo(4, 12);
	});

	it("mirrors X for retrograde orbits", () => {
		const body = new OrbitBody(descriptor({ retrograde: true, phase: 0.3 }));
		const prograde = new OrbitBody(descriptor({ phase: 0.3 }));
		const a = body.positionAt(2);
		const b = prograde.positionAt(2);
		expect(a.x).toBeCloseTo(-b.x, 12);
		expect(a.z).toBeCloseTo(b.z, 12);
	});

	it("places and scales the mesh through its model matrix", () => {
		const body = new OrbitBody(descriptor({ rotationSpeed: 1 }));
		const m = body.modelMatrix(0);
		const centre = Matrix4.transformPoint(m, { x: 0, y: 0, z: 0 });
		const top = Matrix4.transformPoint(m, { x: 0, y: 1, z: 0 });
		expect([centre.x, centre.y, centre.z]).toEqual([4, 1, 0]);
		expect(top.y - centre.y).toBeCloseTo(2, 12);
	});

	it("rejects non-positive scales", () => {
		expect(() => new OrbitBody(descriptor({ scale: 0 }))).toThrow(RangeError);
	});
});
