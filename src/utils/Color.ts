/**
 * Color utility functions
 */

import { CoreConstants } from "../core/Constants";
import type { IVector3 } from "../maths/types";

export interface RGB {
	r: number;
	g: number;
	b: number;
}

function toChannel(value: number): number {
	if (!(value > 0)) return 0;
	if (value >= CoreConstants.MAX_CHANNEL_VALUE) return CoreConstants.MAX_CHANNEL_VALUE;
	return Math.round(value);
}

/**
 * Immutable 8-bit-per-channel colour. Every constructor and operation clamps
 * to [0, 255] and rounds, so a `Color` always holds valid channel values.
 * NaN collapses to 0.
 */
export class Color implements RGB {
	public readonly r: number;
	public readonly g: number;
	public readonly b: number;

	constructor(r: number, g: number, b: number) {
		this.r = toChannel(r);
		this.g = toChannel(g);
		this.b = toChannel(b);
	}

	public static black(): Color {
		return new Color(0, 0, 0);
	}

	public static from(rgb: RGB): Color {
		return new Color(rgb.r, rgb.g, rgb.b);
	}

	/**
	 * Converts a unit-range colour vector (x = r, y = g, z = b) to 8 bits.
	 * Channels are clamped to [0, 1] and truncated, so 0.5 becomes 127.
	 */
	public static fromUnit(v: IVector3): Color {
		const max = CoreConstants.MAX_CHANNEL_VALUE;
		const r = Math.trunc(Math.max(0, Math.min(1, v.x || 0)) * max);
		const g = Math.trunc(Math.max(0, Math.min(1, v.y || 0)) * max);
		const b = Math.trunc(Math.max(0, Math.min(1, v.z || 0)) * max);
		return new Color(r, g, b);
	}

	/** Unpacks `0xRRGGBB`. */
	public static fromHex(hex: number): Color {
		return new Color((hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff);
	}

	public scale(s: number): Color {
		return new Color(this.r * s, this.g * s, this.b * s);
	}

	/** Saturating per-channel add. */
	public add(other: RGB): Color {
		return new Color(this.r + other.r, this.g + other.g, this.b + other.b);
	}

	public lerp(other: RGB, t: number): Color {
		return new Color(
			this.r + (other.r - this.r) * t,
			this.g + (other.g - this.g) * t,
			this.b + (other.b - this.b) * t
		);
	}

	public equals(other: RGB): boolean {
		return this.r === other.r && this.g === other.g && this.b === other.b;
	}

	/** Sum of channels, used as a cheap brightness measure. */
	public magnitude(): number {
		return this.r + this.g + this.b;
	}

	public toHex(): number {
		return (this.r << 16) | (this.g << 8) | this.b;
	}

	public toString(): string {
		return `rgb(${this.r}, ${this.g}, ${this.b})`;
	}
}
