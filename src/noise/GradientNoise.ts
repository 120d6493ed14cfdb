import { fade, lerp } from "../maths/Common";
import { NoiseConstants } from "../core/Constants";
import type { IVector3 } from "../maths/types";

/**
 * Small seeded PRNG (mulberry32). Only used to shuffle the permutation table.
 */
function mulberry32(seed: number): () => number {
	let a = seed >>> 0;
	return () => {
		a = (a + 0x6d2b79f5) >>> 0;
		let t = a;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function grad(hash: number, x: number, y: number, z: number): number {
	const h = hash & 15;
	const u = h < 8 ? x : y;
	const v =
		h < 4 ? y
		: h === 12 || h === 14 ? x
		: z;
	return ((h & 1) === 0 ? u : -u) + ((h & 2) === 0 ? v : -v);
}

/**
 * Improved Perlin gradient noise over a seeded permutation table.
 *
 * - `sample` returns values in [-1, 1] and is exactly 0 on integer lattice points.
 * - `fbm` divides by the summed amplitudes, so its range matches `sample`
 *   regardless of the octave count.
 */
export class GradientNoise {
	public readonly seed: number;
	private readonly _perm: Uint8Array;

	constructor(seed: number = NoiseConstants.DEFAULT_SEED) {
		this.seed = seed;
		this._perm = GradientNoise.buildPermutation(seed);
	}

	public static buildPermutation(seed: number): Uint8Array {
		const random = mulberry32(seed);
		const base = new Uint8Array(256);
		for (let i = 0; i < 256; i++) base[i] = i;

		for (let i = 255; i > 0; i--) {
			const j = Math.floor(random() * (i + 1));
			const tmp = base[i];
			base[i] = base[j];
			base[j] = tmp;
		}

		const perm = new Uint8Array(512);
		for (let i = 0; i < 512; i++) perm[i] = base[i & 255];
		return perm;
	}

	public sample(point: IVector3): number {
		const p = this._perm;

		const fx = Math.floor(point.x);
		const fy = Math.floor(point.y);
		const fz = Math.floor(point.z);
		const X = fx & 255;
		const Y = fy & 255;
		const Z = fz & 255;

		const x = point.x - fx;
		const y = point.y - fy;
		const z = point.z - fz;

		const u = fade(x);
		const v = fade(y);
		const w = fade(z);

		const A = p[X] + Y;
		const AA = p[A] + Z;
		const AB = p[A + 1] + Z;
		const B = p[X + 1] + Y;
		const BA = p[B] + Z;
		const BB = p[B + 1] + Z;

		const value = lerp(
			lerp(
				lerp(grad(p[AA], x, y, z), grad(p[BA], x - 1, y, z), u),
				lerp(grad(p[AB], x, y - 1, z), grad(p[BB], x - 1, y - 1, z), u),
				v
			),
			lerp(
				lerp(grad(p[AA + 1], x, y, z - 1), grad(p[BA + 1], x - 1, y, z - 1), u),
				lerp(
					grad(p[AB + 1], x, y - 1, z - 1),
					grad(p[BB + 1], x - 1, y - 1, z - 1),
					u
				),
				v
			),
			w
		);

		return Math.max(-1, Math.min(1, value));
	}

	public fbm(
		point: IVector3,
		octaves: number,
		persistence: number,
		lacunarity: number
	): number {
		const count = Math.floor(octaves);
		if (count < 1) return 0;

		let total = 0;
		let frequency = 1;
		let amplitude = 1;
		let maxValue = 0;

		for (let i = 0; i < count; i++) {
			total +=
				this.sample({
					x: point.x * frequency,
					y: point.y * frequency,
					z: point.z * frequency,
				}) * amplitude;
			maxValue += Math.abs(amplitude);
			amplitude *= persistence;
			frequency *= lacunarity;
		}

		return maxValue > 0 ? total / maxValue : 0;
	}
}

export const defaultNoise = new GradientNoise();

/** Gradient noise from the shared default-seeded generator. */
export function noise(point: IVector3): number {
	return defaultNoise.sample(point);
}

/** Fractal sum of `noise` from the shared default-seeded generator. */
export function fbm(
	point: IVector3,
	octaves: number,
	persistence: number,
	lacunarity: number
): number {
	return defaultNoise.fbm(point, octaves, persistence, lacunarity);
}
