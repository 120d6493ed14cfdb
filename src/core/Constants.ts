/**
 * Shared constants for the core rendering pipeline.
 */

/**
 * Core mathematical and basic rendering constants.
 */
export class CoreConstants {
	static readonly MAX_CHANNEL_VALUE = 255;
	static readonly FAR_DEPTH = Infinity;
}

/**
 * Rendering pipeline and buffer related constants.
 */
export class RenderConstants {
	static readonly DEFAULT_WIDTH = 800;
	static readonly DEFAULT_HEIGHT = 600;
	static readonly DEFAULT_FOV = 45;
	static readonly DEFAULT_NEAR = 0.1;
	static readonly DEFAULT_FAR = 100.0;
	/** Overscan tolerance for whole-triangle clip rejection. */
	static readonly CLIP_MARGIN = 1.5;
	static readonly MIN_CLIP_W = 1e-6;
	static readonly MIN_TRIANGLE_AREA = 1e-6;
	static readonly DEFAULT_TIME_STEP = 0.01;
}

/**
 * Camera limits and input scaling.
 */
export class CameraConstants {
	static readonly MAX_PITCH = 89;
	static readonly DEFAULT_SPEED = 0.15;
	static readonly DEFAULT_SENSITIVITY = 0.3;
}

/**
 * Procedural noise constants.
 */
export class NoiseConstants {
	static readonly DEFAULT_SEED = 1337;
}

/**
 * Background starfield constants.
 */
export class StarfieldConstants {
	static readonly DEFAULT_STARS = 800;
	static readonly DEFAULT_GALAXIES = 5;
	static readonly GALAXY_ARM_POINTS = 100;
	static readonly HASH_SCALE = 43758.5453;
}
