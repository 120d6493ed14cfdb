import { Color } from "../utils/Color";
import { defaultNoise, type GradientNoise } from "../noise/GradientNoise";
import {
	shadeDesert,
	shadeGasGiant,
	shadeIce,
	shadeRocky,
	shadeSpaceship,
	shadeStar,
	shadeVolcanic,
} from "./ProceduralShaders";
import { ShaderKind, type ProceduralShader, type ShadingInput } from "./types";
import type { Fragment } from "../core/types";

const SHADERS: Record<ShaderKind, ProceduralShader> = {
	[ShaderKind.Star]: shadeStar,
	[ShaderKind.Rocky]: shadeRocky,
	[ShaderKind.GasGiant]: shadeGasGiant,
	[ShaderKind.Spaceship]: shadeSpaceship,
	[ShaderKind.Ice]: shadeIce,
	[ShaderKind.Desert]: shadeDesert,
	[ShaderKind.Volcanic]: shadeVolcanic,
};

export function getShader(kind: ShaderKind): ProceduralShader {
	return SHADERS[kind];
}

/**
 * Evaluates one procedural shader to an 8-bit colour. Pure; writing the
 * result is the caller's job, after the depth test has accepted the fragment.
 */
export function shade(
	kind: ShaderKind,
	input: ShadingInput,
	noise: GradientNoise = defaultNoise
): Color {
	return Color.fromUnit(SHADERS[kind](input, noise));
}

export function shadeFragment(
	fragment: Fragment,
	noise: GradientNoise = defaultNoise
): Color {
	return shade(
		fragment.shader,
		{
			position: fragment.local,
			world: fragment.world,
			normal: fragment.normal,
			color: fragment.color,
			time: fragment.time,
		},
		noise
	);
}
