import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CameraConstants, NoiseConstants, RenderConstants, StarfieldConstants } from "../core/Constants";
import { SpaceshipConstants } from "../scene/Spaceship";
import { SHADER_NAMES, ShaderKind, type ShaderName } from "../shaders/types";

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, "../../config/solar-system.json");

export class ConfigError extends Error {
	public readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length ? `${message}\n  ${issues.join("\n  ")}` : message);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

const SHADER_NAME_LIST = [
	"star",
	"rocky",
	"gas-giant",
	"spaceship",
	"ice",
	"desert",
	"volcanic",
] as const satisfies readonly ShaderName[];

/** Shader by scene-file name or numeric code. */
export const ShaderSchema = z
	.union([z.enum(SHADER_NAME_LIST), z.nativeEnum(ShaderKind)])
	.transform((value): ShaderKind => (typeof value === "string" ? SHADER_NAMES[value] : value));

const Vec3Schema = z.object({
	x: z.number().finite(),
	y: z.number().finite(),
	z: z.number().finite(),
});

const ChannelSchema = z.number().int().min(0).max(255);

export const ColorSchema = z.object({
	r: ChannelSchema,
	g: ChannelSchema,
	b: ChannelSchema,
});

export const BodySchema = z.object({
	name: z.string().min(1),
	shader: ShaderSchema,
	radius: z.number().nonnegative(),
	speed: z.number().finite().default(0),
	phase: z.number().finite().default(0),
	height: z.number().finite().default(0),
	rotationSpeed: z.number().finite().default(0),
	scale: z.number().positive(),
	retrograde: z.boolean().default(false),
});

export const RenderConfigSchema = z
	.object({
		width: z.number().int().positive().default(RenderConstants.DEFAULT_WIDTH),
		height: z.number().int().positive().default(RenderConstants.DEFAULT_HEIGHT),
		fov: z.number().gt(0).lt(180).default(RenderConstants.DEFAULT_FOV),
		near: z.number().positive().default(RenderConstants.DEFAULT_NEAR),
		far: z.number().positive().default(RenderConstants.DEFAULT_FAR),
		background: ColorSchema.default({ r: 0, g: 0, b: 0 }),
		timeStep: z.number().positive().default(RenderConstants.DEFAULT_TIME_STEP),
		clipMargin: z.number().min(1).default(RenderConstants.CLIP_MARGIN),
		cullBackFaces: z.boolean().default(true),
		seed: z.number().int().default(NoiseConstants.DEFAULT_SEED),
		camera: z
			.object({
				position: Vec3Schema.default({ x: 0, y: 0, z: 0 }),
				yaw: z.number().finite().default(-90),
				pitch: z.number().finite().default(0),
				speed: z.number().positive().default(CameraConstants.DEFAULT_SPEED),
				sensitivity: z.number().positive().default(CameraConstants.DEFAULT_SENSITIVITY),
			})
			.default({}),
		starfield: z
			.object({
				enabled: z.boolean().default(true),
				stars: z.number().int().nonnegative().default(StarfieldConstants.DEFAULT_STARS),
				galaxies: z.number().int().nonnegative().default(StarfieldConstants.DEFAULT_GALAXIES),
			})
			.default({}),
		spaceship: z
			.object({
				enabled: z.boolean().default(true),
				distance: z
					.number()
					.min(SpaceshipConstants.MIN_DISTANCE)
					.max(SpaceshipConstants.MAX_DISTANCE)
					.default(3),
				drop: z.number().finite().default(0.6),
				scale: z.number().positive().default(0.3),
			})
			.default({}),
		sphere: z
			.object({
				segments: z.number().int().min(3).default(24),
				rings: z.number().int().min(2).default(16),
			})
			.default({}),
		bodies: z.array(BodySchema).default([]),
	})
	.refine((c) => c.far > c.near, {
		message: "far must be greater than near",
		path: ["far"],
	});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type BodyConfig = z.infer<typeof BodySchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const where = issue.path.length ? issue.path.join(".") : "(root)";
		return `${where}: ${issue.message}`;
	});
}

export function parseConfig(raw: unknown, source = "config"): RenderConfig {
	const result = RenderConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(`Invalid ${source}`, formatIssues(result.error));
	}
	return result.data;
}

/**
 * Reads and validates a JSON scene file. Falls back to the bundled solar
 * system when no path is given.
 */
export async function loadConfig(file: string = DEFAULT_CONFIG_PATH): Promise<RenderConfig> {
	let text: string;
	try {
		text = await fs.readFile(file, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Cannot read ${file}: ${reason}`);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Cannot parse ${file}: ${reason}`);
	}

	return parseConfig(raw, path.basename(file));
}
