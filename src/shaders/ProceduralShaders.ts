import { Vector3 } from "../maths/Vector3";
import { clamp } from "../maths/Common";
import type { IVector3 } from "../maths/types";
import type { GradientNoise } from "../noise/GradientNoise";
import type { ShadingInput } from "./types";

/**
 * Procedural surface shaders for the bundled bodies.
 *
 * Each shader samples the object-space position, so a pattern stays attached
 * to its body while it orbits and spins. Noise is remapped from [-1, 1] to
 * [0, 1] before it drives palette blends. Results are clamped to [0, 1].
 */

const unit = (n: number): number => n * 0.5 + 0.5;

function offset(p: IVector3, scale: number, x = 0, y = 0, z = 0): IVector3 {
	return { x: p.x * scale + x, y: p.y * scale + y, z: p.z * scale + z };
}

const STAR_CORE = new Vector3(1.0, 0.95, 0.55);
const STAR_RIM = new Vector3(1.0, 0.55, 0.1);
const STAR_FLAME = new Vector3(1.0, 0.5, 0.0);

/**
 * Radial yellow-to-orange gradient with fbm turbulence and a slow pulse.
 * `position` is expected on or inside the unit sphere; the glow falls off
 * with the squared radius so the centre is always the brightest point.
 */
export function shadeStar(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const radius = Math.min(Vector3.length(position), 1);
	const dir = Vector3.normalize(position);

	const color = Vector3.lerp(STAR_RIM, STAR_CORE, 1 - radius);

	const turbulence = unit(noise.fbm(offset(dir, 3, 0, 0, time * 0.5), 2, 0.5, 2));
	color.lerp(STAR_FLAME, turbulence * 0.3);

	// 0.95 .. 1.10, period 2π / 1.5
	const pulse = (Math.sin(time * 1.5) * 0.5 + 0.5) * 0.15 + 0.95;
	const glow = 1.15 - 0.5 * radius * radius;

	return color.scale(pulse * glow).clampScalar(0, 1);
}

const OCEAN_DEEP = new Vector3(0.0, 0.1, 0.3);
const OCEAN_SHALLOW = new Vector3(0.1, 0.3, 0.7);
const LAND_LOW = new Vector3(0.1, 0.4, 0.1);
const LAND_HIGH = new Vector3(0.6, 0.5, 0.3);
const LAND_HAZE = new Vector3(0.9, 0.9, 0.9);

export function shadeRocky(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const uv = Vector3.normalize(position);
	const n = unit(noise.fbm(offset(uv, 2), 3, 0.5, 2));
	const threshold = 0.5;

	if (n <= threshold) {
		return Vector3.lerp(OCEAN_DEEP, OCEAN_SHALLOW, n / threshold).clampScalar(0, 1);
	}

	const landFactor = (n - threshold) / (1 - threshold);
	const color = Vector3.lerp(LAND_LOW, LAND_HIGH, Math.pow(landFactor, 0.7));
	const detail = unit(noise.sample(offset(uv, 5, 0, 0, time * 0.1)));
	return color.lerp(LAND_HAZE, detail * 0.15).clampScalar(0, 1);
}

const BAND_LIGHT = new Vector3(0.8, 0.7, 0.5);
const BAND_DARK = new Vector3(0.6, 0.4, 0.2);
const STORM_COLOR = new Vector3(0.95, 0.3, 0.15);
const STORM_CENTER = Vector3.normalize({ x: 0.6, y: -0.35, z: 0.72 });
const STORM_RADIUS_XZ = 0.3;
const STORM_RADIUS_Y = 0.15;

export function shadeGasGiant(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const uv = Vector3.normalize(position);
	const bandSpeed = 0.2;

	const warp = unit(noise.sample(offset(uv, 15, time * bandSpeed)));
	const bands = Math.sin((uv.y + time * bandSpeed * 0.1) * 8 + warp * 2);
	const color = Vector3.lerp(BAND_LIGHT, BAND_DARK, bands * 0.5 + 0.5);

	const cloud = unit(noise.sample(offset(uv, 20, time * 0.3)));
	color.lerp({ x: 1, y: 1, z: 1 }, cloud * 0.08);

	const dx = (uv.x - STORM_CENTER.x) / STORM_RADIUS_XZ;
	const dy = (uv.y - STORM_CENTER.y) / STORM_RADIUS_Y;
	const dz = (uv.z - STORM_CENTER.z) / STORM_RADIUS_XZ;
	const e = Math.sqrt(dx * dx + dy * dy + dz * dz);
	if (e < 1) {
		color.lerp(STORM_COLOR, Math.pow(1 - e, 1.5) * 0.8);
	}

	return color.clampScalar(0, 1);
}

const HULL_GREY: IVector3 = { x: 0.5, y: 0.5, z: 0.5 };

/** Flat hull colour: the mesh's vertex colour when it has one, grey otherwise. */
export function shadeSpaceship(input: ShadingInput): IVector3 {
	const c = input.color ?? HULL_GREY;
	return { x: clamp(c.x), y: clamp(c.y), z: clamp(c.z) };
}

const ICE_BASE = new Vector3(0.8, 0.9, 1.0);
const ICE_CRACK = new Vector3(0.3, 0.4, 0.6);
const GLINT_THRESHOLD = 0.82;

export function shadeIce(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const uv = Vector3.normalize(position);

	const drift = noise.fbm(offset(uv, 6, 0, time * 0.05, 0), 3, 0.5, 2);
	// Thin lines where the fbm crosses zero.
	const crack = 1 - clamp(Math.abs(drift) * 4, 0, 1);
	const color = Vector3.lerp(ICE_BASE, ICE_CRACK, crack * crack * 0.6);

	const frost = unit(noise.fbm(offset(uv, 3), 2, 0.5, 2));
	color.lerp({ x: 1, y: 1, z: 1 }, frost * 0.2);

	const glint = unit(noise.sample(offset(uv, 24, time * 0.2)));
	if (glint > GLINT_THRESHOLD) {
		color.lerp({ x: 1, y: 1, z: 1 }, (glint - GLINT_THRESHOLD) / (1 - GLINT_THRESHOLD));
	}

	return color.clampScalar(0, 1);
}

const SAND_LIGHT = new Vector3(0.9, 0.7, 0.3);
const SAND_DARK = new Vector3(0.6, 0.4, 0.1);
const DUNE_CREST = new Vector3(0.95, 0.8, 0.4);

export function shadeDesert(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const uv = Vector3.normalize(position);

	const grain = unit(noise.fbm(offset(uv, 4, time * 0.02), 2, 0.6, 2));
	const color = Vector3.lerp(SAND_DARK, SAND_LIGHT, Math.pow(grain, 0.8));

	const dunes = Math.sin(uv.y * 10 + unit(noise.sample(offset(uv, 6))) * 2) * 0.5 + 0.5;
	return color.lerp(DUNE_CREST, dunes * 0.3).clampScalar(0, 1);
}

const BASALT = new Vector3(0.12, 0.09, 0.07);
const BASALT_DUST = new Vector3(0.3, 0.25, 0.2);
const LAVA = new Vector3(1.0, 0.3, 0.0);
const LAVA_GLOW = new Vector3(1.0, 0.5, 0.0);
const LAVA_THRESHOLD = 0.55;

export function shadeVolcanic(input: ShadingInput, noise: GradientNoise): IVector3 {
	const { position, time } = input;
	const uv = Vector3.normalize(position);
	const n = unit(noise.fbm(offset(uv, 3), 3, 0.5, 2));

	if (n > LAVA_THRESHOLD) {
		const lavaFactor = (n - LAVA_THRESHOLD) / (1 - LAVA_THRESHOLD);
		const color = Vector3.lerp(BASALT, LAVA, Math.pow(lavaFactor, 2));
		const pulse = Math.sin(time * 2 + uv.x * 5) * 0.5 + 0.5;
		return color.lerp(LAVA_GLOW, pulse * lavaFactor * 0.4).clampScalar(0, 1);
	}

	const detail = unit(noise.sample(offset(uv, 10)));
	return BASALT.clone().lerp(BASALT_DUST, detail * 0.3).clampScalar(0, 1);
}
