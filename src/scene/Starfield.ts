import { StarfieldConstants } from "../core/Constants";
import { Color } from "../utils/Color";
import type { BackgroundPass } from "../core/Renderer";
import type { Framebuffer } from "../core/Framebuffer";
import type { FrameSnapshot } from "../core/types";

export interface StarfieldOptions {
	stars?: number;
	galaxies?: number;
	/** Galaxy spin in radians per unit of elapsed time. */
	galaxySpin?: number;
}

interface Star {
	x: number;
	y: number;
	color: Color;
}

/** Maps a trig value in [-1, 1] to a pseudo-random number in [0, 1). */
function hash01(wave: number): number {
	const v = wave * StarfieldConstants.HASH_SCALE;
	return v - Math.floor(v);
}

/**
 * Screen-space background: fixed hashed stars plus small spiral galaxies that
 * turn slowly with time. Paints colour only; depth stays at +Infinity so all
 * geometry draws over it.
 */
export class Starfield implements BackgroundPass {
	public readonly stars: number;
	public readonly galaxies: number;
	public readonly galaxySpin: number;

	private _cache: { width: number; height: number; stars: Star[] } | null = null;

	constructor(options: StarfieldOptions = {}) {
		this.stars = options.stars ?? StarfieldConstants.DEFAULT_STARS;
		this.galaxies = options.galaxies ?? StarfieldConstants.DEFAULT_GALAXIES;
		this.galaxySpin = options.galaxySpin ?? 0.1;
	}

	public starsFor(width: number, height: number): Star[] {
		if (this._cache && this._cache.width === width && this._cache.height === height) {
			return this._cache.stars;
		}

		const stars: Star[] = [];
		for (let i = 0; i < this.stars; i++) {
			const seed = i * 12.9898;
			const x = Math.floor(hash01(Math.sin(seed)) * width);
			const y = Math.floor(hash01(Math.cos(seed * 1.234)) * height);
			const b = Math.trunc((Math.sin(seed * 2.345) * 0.5 + 0.5) * 255);
			stars.push({ x, y, color: new Color(b, b, b) });
		}

		this._cache = { width, height, stars };
		return stars;
	}

	public paint(target: Framebuffer, frame: FrameSnapshot): void {
		const { width, height } = target;

		for (const star of this.starsFor(width, height)) {
			target.setPixel(star.x, star.y, star.color);
		}

		const points = StarfieldConstants.GALAXY_ARM_POINTS;
		for (let i = 0; i < this.galaxies; i++) {
			const seed = i * 7.321;
			const cx = Math.floor(hash01(Math.sin(seed)) * width);
			const cy = Math.floor(hash01(Math.cos(seed * 3.456)) * height);
			const rotation = frame.time * this.galaxySpin + seed;

			for (let j = 0; j < points; j++) {
				const angle = j * 0.3 + rotation;
				const radius = Math.sqrt(j * 0.5) * 3;
				const x = cx + Math.trunc(Math.cos(angle) * radius);
				const y = cy + Math.trunc(Math.sin(angle) * radius);

				const intensity = (1 - j / points) * 150;
				target.setPixel(
					x,
					y,
					new Color(
						Math.trunc(intensity * 0.8),
						Math.trunc(intensity * 0.6),
						Math.trunc(intensity)
					)
				);
			}
		}
	}
}
