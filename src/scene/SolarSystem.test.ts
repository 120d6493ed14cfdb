import { describe, it, expect } from "vitest";
import { SolarSystem } from "./SolarSystem";
import { parseConfig } from "../config/RenderConfig";
import { ShaderKind } from "../shaders/types";
import { MeshError } from "../utils/Geometry";
import type { Mesh } from "../core/types";

const CONFIG = parseConfig({
	sphere: { segments: 8, rings: 4 },
	bodies: [
		{ name: "sun", shader: "star", radius: 0, scale: 3 },
		{ name: "moon", shader: "ice", radius: 6, speed: 1, scale: 1 },
	],
});

describe("SolarSystem", () => {
	it("draws every body plus the ship", () => {
		const system = SolarSystem.fromConfig(CONFIG);
		const calls = system.drawCalls(0);
		expect(calls.map((c) => c.shader)).toEqual([
			ShaderKind.Star,
			ShaderKind.Ice,
			ShaderKind.Spaceship,
		]);
		expect(calls[0].mesh).toBe(calls[1].mesh);
	});

	it("omits the ship when disabled", () => {
		const system = SolarSystem.fromConfig({ ...CONFIG, spaceship: { ...CONFIG.spaceship, enabled: false } });
		expect(system.spaceship).toBeNull();
		expect(system.drawCalls(0)).toHaveLength(2);
	});

	it("finds bodies by name", () => {
		const system = SolarSystem.fromConfig(CONFIG);
		expect(system.find("moon")?.positionAt(0)).toEqual({ x: 6, y: 0, z: 0 });
		expect(system.find("comet")).toBeUndefined();
	});

	it("rejects supplied meshes with dangling indices", () => {
		const broken: Mesh = {
			vertices: [{ position: { x: 0, y: 0, z: 0 }, normal: { x: 0, y: 1, z: 0 } }],
			indices: [0, 1, 2],
		};
		expect(() => SolarSystem.fromConfig(CONFIG, { ship: broken })).toThrow(MeshError);
		expect(() => SolarSystem.fromConfig(CONFIG, { body: broken })).toThrow(
			"[Mesh] Index 1 at position 1 is out of range (0..0)"
		);
	});
});
