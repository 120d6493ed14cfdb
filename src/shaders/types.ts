import type { IVector3 } from "../maths/types";
import type { GradientNoise } from "../noise/GradientNoise";

/**
 * Closed set of procedural shaders. The numeric codes are the stable
 * selectors used by draw calls and scene files.
 */
export enum ShaderKind {
	Star = 0,
	Rocky = 1,
	GasGiant = 2,
	Spaceship = 3,
	Ice = 4,
	Desert = 5,
	Volcanic = 6,
}

export const SHADER_KINDS: readonly ShaderKind[] = [
	ShaderKind.Star,
	ShaderKind.Rocky,
	ShaderKind.GasGiant,
	ShaderKind.Spaceship,
	ShaderKind.Ice,
	ShaderKind.Desert,
	ShaderKind.Volcanic,
];

export interface ShadingInput {
	/** Object-space position of the fragment. */
	position: IVector3;
	world: IVector3;
	normal: IVector3;
	/** Interpolated vertex colour, when the mesh has one. */
	color?: IVector3;
	time: number;
}

/**
 * A procedural shader: pure and total, returns an unclamped unit-range colour
 * (x = r, y = g, z = b).
 */
export type ProceduralShader = (input: ShadingInput, noise: GradientNoise) => IVector3;

/** Names used for shaders in scene files. */
export const SHADER_NAMES = {
	star: ShaderKind.Star,
	rocky: ShaderKind.Rocky,
	"gas-giant": ShaderKind.GasGiant,
	spaceship: ShaderKind.Spaceship,
	ice: ShaderKind.Ice,
	desert: ShaderKind.Desert,
	volcanic: ShaderKind.Volcanic,
} as const satisfies Record<string, ShaderKind>;

export type ShaderName = keyof typeof SHADER_NAMES;
