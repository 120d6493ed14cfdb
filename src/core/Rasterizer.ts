import { RenderConstants } from "./Constants";
import { edgeFunction } from "./PrimitiveAssembler";
import { Vector3 } from "../maths/Vector3";
import type { IVector2, IVector3 } from "../maths/types";
import type { Fragment, ScreenTriangle, ScreenVertex, Viewport } from "./types";

export interface RasterizerLike {
	readonly width: number;
	readonly height: number;
	rasterize(triangle: ScreenTriangle, time: number): Generator<Fragment>;
}

/** A covered pixel with its screen-space barycentric weights. */
export interface CoverageSample {
	x: number;
	y: number;
	w0: number;
	w1: number;
	w2: number;
}

/**
 * Top-left fill rule for the positive-area orientation: an edge owns the
 * pixel centres lying exactly on it when it runs downwards (left edge) or is
 * horizontal and runs towards -x (top edge).
 */
function isTopLeft(a: IVector2, b: IVector2): boolean {
	const dx = b.x - a.x;
	const dy = b.y - a.y;
	return dy > 0 || (dy === 0 && dx < 0);
}

function blend3(
	a: IVector3,
	b: IVector3,
	c: IVector3,
	p0: number,
	p1: number,
	p2: number
): IVector3 {
	return {
		x: a.x * p0 + b.x * p1 + c.x * p2,
		y: a.y * p0 + b.y * p1 + c.y * p2,
		z: a.z * p0 + b.z * p1 + c.z * p2,
	};
}

/**
 * Rasterizer turns screen-space triangles into fragments.
 *
 * CORE CONVENTIONS:
 * - Coverage: bounding box clamped to the target, edge functions evaluated at
 *   pixel centres (+0.5), top-left rule on ties.
 * - Depth: NDC z interpolated linearly in screen space.
 * - Perspective Correction: world/local/normal weights are multiplied by 1/w
 *   and renormalized per pixel.
 */
export class Rasterizer implements RasterizerLike {
	public readonly width: number;
	public readonly height: number;

	constructor(viewport: Viewport) {
		this.width = viewport.width;
		this.height = viewport.height;
	}

	/**
	 * Yields every pixel the triangle owns. The triangle must have positive
	 * area (as produced by the assembler); degenerate input yields nothing.
	 */
	public *coverage(triangle: ScreenTriangle): Generator<CoverageSample> {
		const [a, b, c] = triangle.vertices;
		const area = edgeFunction(a, b, c);
		if (!(area >= RenderConstants.MIN_TRIANGLE_AREA)) return;

		const minX = Math.max(0, Math.floor(Math.min(a.x, b.x, c.x)));
		const minY = Math.max(0, Math.floor(Math.min(a.y, b.y, c.y)));
		const maxX = Math.min(this.width - 1, Math.ceil(Math.max(a.x, b.x, c.x)));
		const maxY = Math.min(this.height - 1, Math.ceil(Math.max(a.y, b.y, c.y)));
		if (minX > maxX || minY > maxY) return;

		const ownBC = isTopLeft(b, c);
		const ownCA = isTopLeft(c, a);
		const ownAB = isTopLeft(a, b);
		const invArea = 1 / area;
		const p = { x: 0, y: 0 };

		for (let y = minY; y <= maxY; y++) {
			p.y = y + 0.5;
			for (let x = minX; x <= maxX; x++) {
				p.x = x + 0.5;

				const e0 = edgeFunction(b, c, p);
				if (e0 < 0 || (e0 === 0 && !ownBC)) continue;
				const e1 = edgeFunction(c, a, p);
				if (e1 < 0 || (e1 === 0 && !ownCA)) continue;
				const e2 = edgeFunction(a, b, p);
				if (e2 < 0 || (e2 === 0 && !ownAB)) continue;

				yield { x, y, w0: e0 * invArea, w1: e1 * invArea, w2: e2 * invArea };
			}
		}
	}

	public *rasterize(triangle: ScreenTriangle, time: number): Generator<Fragment> {
		const [a, b, c] = triangle.vertices;

		for (const s of this.coverage(triangle)) {
			yield Rasterizer.interpolate(a, b, c, s, triangle, time);
		}
	}

	public static interpolate(
		a: ScreenVertex,
		b: ScreenVertex,
		c: ScreenVertex,
		s: CoverageSample,
		triangle: ScreenTriangle,
		time: number
	): Fragment {
		const depth = a.z * s.w0 + b.z * s.w1 + c.z * s.w2;

		let p0 = s.w0 * a.invW;
		let p1 = s.w1 * b.invW;
		let p2 = s.w2 * c.invW;
		const sum = p0 + p1 + p2;
		if (sum > 0) {
			p0 /= sum;
			p1 /= sum;
			p2 /= sum;
		} else {
			p0 = s.w0;
			p1 = s.w1;
			p2 = s.w2;
		}

		const normal = blend3(a.normal, b.normal, c.normal, p0, p1, p2);
		Vector3.normalizeInPlace(normal);

		const color =
			a.color && b.color && c.color ? blend3(a.color, b.color, c.color, p0, p1, p2) : undefined;

		return {
			x: s.x,
			y: s.y,
			depth,
			world: blend3(a.world, b.world, c.world, p0, p1, p2),
			local: blend3(a.local, b.local, c.local, p0, p1, p2),
			normal,
			color,
			shader: triangle.shader,
			time,
		};
	}
}
