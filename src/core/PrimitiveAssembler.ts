import { RenderConstants } from "./Constants";
import type { IVector2, IVector4 } from "../maths/types";
import type {
	ScreenTriangle,
	ScreenVertex,
	TransformedVertex,
	Viewport,
} from "./types";

export type AssemblyResult =
	| { kind: "accepted"; triangle: ScreenTriangle }
	| { kind: "clipped" }
	| { kind: "degenerate" }
	| { kind: "backface" };

export interface AssemblyOptions {
	clipMargin?: number;
	cullBackFaces?: boolean;
}

// Outcode bits
const OUT_LEFT = 1;
const OUT_RIGHT = 2;
const OUT_BOTTOM = 4;
const OUT_TOP = 8;
const OUT_NEAR = 16;
const OUT_FAR = 32;

/**
 * Edge function `E(a, b, p)`. For a triangle `a, b, c` in screen space
 * (y down), `E(a, b, c) > 0` means counter-clockwise in NDC, i.e. front
 * facing for meshes wound counter-clockwise seen from outside.
 */
export function edgeFunction(a: IVector2, b: IVector2, p: IVector2): number {
	return (p.x - a.x) * (b.y - a.y) - (p.y - a.y) * (b.x - a.x);
}

/**
 * Groups transformed vertices into screen-space triangles and rejects the
 * ones that cannot contribute pixels.
 *
 * Order of tests:
 * 1. Whole-triangle clip rejection (all vertices beyond one clip boundary,
 *    x/y boundaries widened by the overscan margin).
 * 2. Eye-plane guard: any vertex with w <= MIN_CLIP_W.
 * 3. Perspective divide and viewport mapping.
 * 4. Degenerate (near-zero area) rejection.
 * 5. Back-face rejection (non-positive signed area).
 *
 * There is no partial clipping: a triangle either passes unchanged or is
 * dropped, and the rasterizer's bounding-box clamp keeps partially visible
 * triangles inside the buffer.
 */
export class PrimitiveAssembler {
	public static outcode(clip: IVector4, margin: number): number {
		const { x, y, z, w } = clip;
		const limit = w * margin;
		let code = 0;
		if (x < -limit) code |= OUT_LEFT;
		if (x > limit) code |= OUT_RIGHT;
		if (y < -limit) code |= OUT_BOTTOM;
		if (y > limit) code |= OUT_TOP;
		if (z < -w) code |= OUT_NEAR;
		if (z > w) code |= OUT_FAR;
		return code;
	}

	public static isOutsideClipVolume(
		a: TransformedVertex,
		b: TransformedVertex,
		c: TransformedVertex,
		margin: number = RenderConstants.CLIP_MARGIN
	): boolean {
		const code =
			PrimitiveAssembler.outcode(a.clip, margin) &
			PrimitiveAssembler.outcode(b.clip, margin) &
			PrimitiveAssembler.outcode(c.clip, margin);
		return code !== 0;
	}

	public static toScreen(v: TransformedVertex, viewport: Viewport): ScreenVertex {
		const invW = 1 / v.clip.w;
		const ndcX = v.clip.x * invW;
		const ndcY = v.clip.y * invW;
		const ndcZ = v.clip.z * invW;

		return {
			x: (ndcX * 0.5 + 0.5) * viewport.width,
			y: (0.5 - ndcY * 0.5) * viewport.height,
			z: ndcZ,
			invW,
			world: v.world,
			local: v.local,
			normal: v.normal,
			color: v.color,
		};
	}

	public static assemble(
		a: TransformedVertex,
		b: TransformedVertex,
		c: TransformedVertex,
		viewport: Viewport,
		options: AssemblyOptions = {}
	): AssemblyResult {
		const margin = options.clipMargin ?? RenderConstants.CLIP_MARGIN;

		if (PrimitiveAssembler.isOutsideClipVolume(a, b, c, margin)) {
			return { kind: "clipped" };
		}

		const minW = RenderConstants.MIN_CLIP_W;
		if (a.clip.w <= minW || b.clip.w <= minW || c.clip.w <= minW) {
			return { kind: "clipped" };
		}

		const sa = PrimitiveAssembler.toScreen(a, viewport);
		const sb = PrimitiveAssembler.toScreen(b, viewport);
		const sc = PrimitiveAssembler.toScreen(c, viewport);

		const area = edgeFunction(sa, sb, sc);
		if (Math.abs(area) < RenderConstants.MIN_TRIANGLE_AREA) {
			return { kind: "degenerate" };
		}

		if (area < 0 && options.cullBackFaces !== false) {
			return { kind: "backface" };
		}

		return {
			kind: "accepted",
			triangle: {
				vertices: area > 0 ? [sa, sb, sc] : [sa, sc, sb],
				area: Math.abs(area),
				shader: a.shader,
			},
		};
	}
}
