import { describe, it, expect } from "vitest";
import { getShader, shade, shadeFragment } from "./FragmentShader";
import { SHADER_KINDS, ShaderKind } from "./types";
import { GradientNoise } from "../noise/GradientNoise";
import type { Fragment } from "../core/types";

const noise = new GradientNoise();

function input(x: number, y: number, z: number, time = 0) {
	return {
		position: { x, y, z },
		world: { x, y, z },
		normal: { x: 0, y: 0, z: 1 },
		time,
	};
}

function spherePoints(count: number): { x: number; y: number; z: number }[] {
	const points: { x: number; y: number; z: number }[] = [];
	for (let i = 0; i < count; i++) {
		const phi = Math.acos(1 - (2 * (i + 0.5)) / count);
		const theta = Math.PI * (1 + Math.sqrt(5)) * i;
		points.push({
			x: Math.sin(phi) * Math.cos(theta),
			y: Math.cos(phi),
			z: Math.sin(phi) * Math.sin(theta),
		});
	}
	return points;
}

describe("procedural shaders", () => {
	it("stay within the unit range for every kind", () => {
		// Shells inside, on and outside the unit sphere, over two star pulsation periods
		const points = [{ x: 0, y: 0, z: 0 }];
		for (const radius of [0.25, 0.5, 1, 1.5, 3]) {
			for (const p of spherePoints(400)) {
				points.push({ x: p.x * radius, y: p.y * radius, z: p.z * radius });
			}
		}
		const period = (2 * Math.PI) / 1.5;

		for (const kind of SHADER_KINDS) {
			const fn = getShader(kind);
			let min = Infinity;
			let max = -Infinity;
			for (let t = 0; t <= 2 * period; t += period / 8) {
				for (const p of points) {
					const c = fn(input(p.x, p.y, p.z, t), noise);
					min = Math.min(min, c.x, c.y, c.z);
					max = Math.max(max, c.x, c.y, c.z);
				}
			}
			expect(min).toBeGreaterThanOrEqual(0);
			expect(max).toBeLessThanOrEqual(1);
		}
	});

	it("are deterministic", () => {
		for (const kind of SHADER_KINDS) {
			const a = shade(kind, input(0.3, -0.4, 0.866, 1.7), noise);
			const b = shade(kind, input(0.3, -0.4, 0.866, 1.7), new GradientNoise());
			expect(a.equals(b)).toBe(true);
		}
	});

	it("handle the origin without NaN", () => {
		for (const kind of SHADER_KINDS) {
			const c = getShader(kind)(input(0, 0, 0, 0), noise);
			expect(Number.isNaN(c.x + c.y + c.z)).toBe(false);
		}
	});

	it("shade the ship a constant mid grey", () => {
		expect(shade(ShaderKind.Spaceship, input(4, -2, 9, 3)).toString()).toBe("rgb(127, 127, 127)");
	});

	it("shade the ship with its vertex colour when it has one", () => {
		const tinted = { ...input(4, -2, 9, 3), color: { x: 1, y: 0.5, z: 1.4 } };
		expect(shade(ShaderKind.Spaceship, tinted).toString()).toBe("rgb(255, 127, 255)");
	});

	it("shade the star centre brightest", () => {
		const centre = shade(ShaderKind.Star, input(0, 0, 0, 0), noise);
		const edge = shade(ShaderKind.Star, input(0, 1, 0, 0), noise);
		expect(centre.toString()).toBe("rgb(255, 255, 140)");
		expect(edge.toString()).toBe("rgb(169, 92, 14)");
		expect(centre.magnitude()).toBeGreaterThan(edge.magnitude());
	});
});

describe("shadeFragment", () => {
	it("samples the object-space position", () => {
		const base: Fragment = {
			x: 0,
			y: 0,
			depth: 0.5,
			world: { x: 12, y: 0, z: -4 },
			local: { x: 0.2, y: 0.5, z: 0.84 },
			normal: { x: 0, y: 0, z: 1 },
			shader: ShaderKind.Rocky,
			time: 0.4,
		};
		const moved: Fragment = { ...base, world: { x: -30, y: 2, z: 7 } };
		expect(shadeFragment(base, noise).equals(shadeFragment(moved, noise))).toBe(true);
	});
});
