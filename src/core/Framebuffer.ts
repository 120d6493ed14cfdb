import { CoreConstants } from "./Constants";
import { Color, type RGB } from "../utils/Color";
import type { Viewport } from "./types";

/**
 * Colour and depth grids for one render target.
 * - Colour: RGB, 3 bytes per pixel, row-major from the top-left.
 * - Depth: NDC depth per pixel, smaller is nearer, cleared to +Infinity.
 */
export class Framebuffer {
	public readonly width: number;
	public readonly height: number;
	public readonly color: Uint8ClampedArray;
	public readonly depth: Float64Array;

	constructor(viewport: Viewport) {
		if (
			!Number.isInteger(viewport.width) ||
			!Number.isInteger(viewport.height) ||
			viewport.width <= 0 ||
			viewport.height <= 0
		) {
			throw new RangeError(
				`[Framebuffer] Invalid size ${viewport.width}x${viewport.height}`
			);
		}
		this.width = viewport.width;
		this.height = viewport.height;
		this.color = new Uint8ClampedArray(this.width * this.height * 3);
		this.depth = new Float64Array(this.width * this.height).fill(
			CoreConstants.FAR_DEPTH
		);
	}

	public clear(background: RGB = Color.black()): void {
		this.depth.fill(CoreConstants.FAR_DEPTH);
		const { r, g, b } = background;
		const c = this.color;
		for (let i = 0; i < c.length; i += 3) {
			c[i] = r;
			c[i + 1] = g;
			c[i + 2] = b;
		}
	}

	public inBounds(x: number, y: number): boolean {
		return x >= 0 && y >= 0 && x < this.width && y < this.height;
	}

	/** True when `depth` is strictly nearer than what is stored. */
	public testDepth(x: number, y: number, depth: number): boolean {
		if (!this.inBounds(x, y)) return false;
		return depth < this.depth[y * this.width + x];
	}

	/** Stores depth and colour unconditionally. Call after {@link testDepth}. */
	public write(x: number, y: number, depth: number, color: RGB): void {
		if (!this.inBounds(x, y)) return;
		const idx = y * this.width + x;
		this.depth[idx] = depth;
		this.setPixel(x, y, color);
	}

	public testAndWrite(x: number, y: number, depth: number, color: RGB): boolean {
		if (!this.testDepth(x, y, depth)) return false;
		this.write(x, y, depth, color);
		return true;
	}

	/**
	 * Paints colour without touching depth, used by background passes.
	 */
	public setPixel(x: number, y: number, color: RGB): void {
		if (!this.inBounds(x, y)) return;
		const i = (y * this.width + x) * 3;
		this.color[i] = color.r;
		this.color[i + 1] = color.g;
		this.color[i + 2] = color.b;
	}

	public getPixel(x: number, y: number): Color {
		if (!this.inBounds(x, y)) return Color.black();
		const i = (y * this.width + x) * 3;
		return new Color(this.color[i], this.color[i + 1], this.color[i + 2]);
	}

	public getDepth(x: number, y: number): number {
		if (!this.inBounds(x, y)) return CoreConstants.FAR_DEPTH;
		return this.depth[y * this.width + x];
	}
}
