import { describe, it, expect } from "vitest";
import { Camera } from "./Camera";
import { Matrix4 } from "../maths/Matrix4";

describe("Camera", () => {
	it("looks down -Z by default", () => {
		const front = new Camera().front();
		expect(front.x).toBeCloseTo(0, 12);
		expect(front.y).toBeCloseTo(0, 12);
		expect(front.z).toBeCloseTo(-1, 12);
	});

	it("clamps pitch to [-89, 89]", () => {
		const camera = new Camera({ pitch: 120 });
		expect(camera.pitch).toBe(89);
		camera.rotate(0, 1000);
		expect(camera.pitch).toBe(-89);
	});

	it("turns right and looks down for positive pointer deltas", () => {
		const camera = new Camera();
		camera.rotate(10, 10);
		expect(camera.yaw).toBeCloseTo(-87, 12);
		expect(camera.pitch).toBeCloseTo(-3, 12);
	});

	it("moves along its view axes", () => {
		const camera = new Camera({ speed: 1 });
		camera.move({ x: 1, y: 2, z: 3 });
		expect(camera.position.x).toBeCloseTo(1, 12);
		expect(camera.position.y).toBeCloseTo(2, 12);
		expect(camera.position.z).toBeCloseTo(-3, 12);
	});

	it("ignores idle input", () => {
		const camera = new Camera({ position: { x: 1, y: 2, z: 3 } });
		camera.applyInput({ x: 0, y: 0, z: 0 }, { x: 0, y: 0 });
		expect([camera.position.x, camera.position.y, camera.position.z]).toEqual([1, 2, 3]);
		expect(camera.yaw).toBe(-90);
	});

	it("snapshots an immutable copy", () => {
		const camera = new Camera({ position: { x: 0, y: 0, z: 5 } });
		const snap = camera.snapshot();
		camera.move({ x: 0, y: 0, z: 10 });

		expect(Object.isFrozen(snap)).toBe(true);
		expect(snap.position).toEqual({ x: 0, y: 0, z: 5 });
		const origin = Matrix4.transformPoint(snap.view, { x: 0, y: 0, z: 0 });
		expect(origin.z).toBeCloseTo(-5, 12);
	});
});
