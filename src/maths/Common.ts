/**
 * Common math utilities
 */

export function d2r(d: number): number {
	return (d * Math.PI) / 180;
}

export function clamp(val: number, min = 0, max = 1): number {
	return Math.max(min, Math.min(max, val));
}

export function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t;
}

/** Quintic fade curve 6t^5 - 15t^4 + 10t^3. */
export function fade(t: number): number {
	return t * t * t * (t * (t * 6 - 15) + 10);
}
