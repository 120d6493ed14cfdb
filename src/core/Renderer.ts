import { EventEmitter } from "./EventEmitter";
import { Framebuffer } from "./Framebuffer";
import { PrimitiveAssembler, type AssemblyOptions } from "./PrimitiveAssembler";
import { Rasterizer, type RasterizerLike } from "./Rasterizer";
import { VertexStage } from "./VertexStage";
import { RenderConstants } from "./Constants";
import { Color, type RGB } from "../utils/Color";
import { defaultNoise, type GradientNoise } from "../noise/GradientNoise";
import { shadeFragment } from "../shaders/FragmentShader";
import type { DrawCall, FrameSnapshot, ScreenTriangle } from "./types";

/**
 * CORE RENDERING CONVENTIONS:
 * - Coordinate System: Right-Handed (X: Right, Y: Up, Z: Towards Viewer)
 * - View Space: Eye at origin, -Z is forward
 * - Depth Buffer: NDC z in [-1, 1], smaller is nearer, cleared to +Infinity
 * - Screen Space: (0,0) at top-left, (W,H) at bottom-right, pixel centers at +0.5
 * - Winding: counter-clockwise seen from outside is front facing
 */

/** Paints the colour buffer after it is cleared. Must leave depth untouched. */
export interface BackgroundPass {
	paint(target: Framebuffer, frame: FrameSnapshot): void;
}

export interface RendererOptions {
	width?: number;
	height?: number;
	background?: RGB;
	clipMargin?: number;
	cullBackFaces?: boolean;
	noise?: GradientNoise;
	backgroundPass?: BackgroundPass | null;
}

export interface FrameStats {
	frame: number;
	time: number;
	drawCalls: number;
	triangles: number;
	accepted: number;
	clipped: number;
	backface: number;
	degenerate: number;
	fragments: number;
	/** Fragments that passed the depth test and were shaded. */
	shaded: number;
	durationMs: number;
}

export interface TriangleStats {
	/** Covered pixels. */
	fragments: number;
	/** Pixels that passed the depth test and were shaded. */
	shaded: number;
}

export interface RendererEvents {
	framestart: [{ frame: number; time: number }];
	frameend: [FrameStats];
}

function emptyStats(frame: number, time: number): FrameStats {
	return {
		frame,
		time,
		drawCalls: 0,
		triangles: 0,
		accepted: 0,
		clipped: 0,
		backface: 0,
		degenerate: 0,
		fragments: 0,
		shaded: 0,
		durationMs: 0,
	};
}

/**
 * Software renderer: vertex stage, primitive assembly, rasterization, depth
 * test and procedural shading into a reusable {@link Framebuffer}.
 *
 * A frame is rendered against an immutable {@link FrameSnapshot}; nothing in
 * here mutates camera or scene state.
 */
export class Renderer extends EventEmitter<RendererEvents> {
	public readonly framebuffer: Framebuffer;
	public rasterizer: RasterizerLike;
	public background: Color;
	public backgroundPass: BackgroundPass | null;
	public noise: GradientNoise;

	public params: Required<AssemblyOptions>;

	private _frame: number;

	constructor(options: RendererOptions = {}) {
		super();
		const viewport = {
			width: options.width ?? RenderConstants.DEFAULT_WIDTH,
			height: options.height ?? RenderConstants.DEFAULT_HEIGHT,
		};

		this.framebuffer = new Framebuffer(viewport);
		this.rasterizer = new Rasterizer(viewport);
		this.background = Color.from(options.background ?? Color.black());
		this.backgroundPass = options.backgroundPass ?? null;
		this.noise = options.noise ?? defaultNoise;

		this.params = {
			clipMargin: options.clipMargin ?? RenderConstants.CLIP_MARGIN,
			cullBackFaces: options.cullBackFaces ?? true,
		};

		this._frame = 0;
	}

	public get width(): number {
		return this.framebuffer.width;
	}

	public get height(): number {
		return this.framebuffer.height;
	}

	public get aspect(): number {
		return this.framebuffer.width / this.framebuffer.height;
	}

	/**
	 * Renders one frame. The returned framebuffer is owned by the renderer and
	 * is overwritten by the next call.
	 */
	public renderFrame(frame: FrameSnapshot): Framebuffer {
		const start = performance.now();
		const stats = emptyStats(this._frame, frame.time);

		this.emit("framestart", { frame: this._frame, time: frame.time });

		this.framebuffer.clear(this.background);
		if (this.backgroundPass) {
			this.backgroundPass.paint(this.framebuffer, frame);
		}

		for (const drawCall of frame.drawCalls) {
			this._drawMesh(drawCall, frame, stats);
		}

		stats.durationMs = performance.now() - start;
		this._frame++;
		this.emit("frameend", stats);

		return this.framebuffer;
	}

	/**
	 * Rasterizes an already assembled triangle into the framebuffer: depth test
	 * first, then shade and write the fragments that pass.
	 */
	public drawScreenTriangle(triangle: ScreenTriangle, time: number): TriangleStats {
		const fb = this.framebuffer;
		const out: TriangleStats = { fragments: 0, shaded: 0 };
		for (const fragment of this.rasterizer.rasterize(triangle, time)) {
			out.fragments++;
			const { x, y, depth } = fragment;
			if (!fb.testDepth(x, y, depth)) continue;

			fb.write(x, y, depth, shadeFragment(fragment, this.noise));
			out.shaded++;
		}
		return out;
	}

	private _drawMesh(
		drawCall: DrawCall,
		frame: FrameSnapshot,
		stats: FrameStats
	): void {
		const { mesh } = drawCall;
		const uniforms = VertexStage.createUniforms(
			drawCall.model,
			frame.camera.view,
			frame.camera.projection,
			drawCall.shader
		);
		const transformed = VertexStage.transformAll(mesh.vertices, uniforms);
		stats.drawCalls++;

		const indices = mesh.indices;
		for (let i = 0; i + 2 < indices.length; i += 3) {
			stats.triangles++;
			const result = PrimitiveAssembler.assemble(
				transformed[indices[i]],
				transformed[indices[i + 1]],
				transformed[indices[i + 2]],
				this.framebuffer,
				this.params
			);

			switch (result.kind) {
				case "clipped":
					stats.clipped++;
					break;
				case "degenerate":
					stats.degenerate++;
					break;
				case "backface":
					stats.backface++;
					break;
				case "accepted": {
					stats.accepted++;
					const drawn = this.drawScreenTriangle(result.triangle, frame.time);
					stats.fragments += drawn.fragments;
					stats.shaded += drawn.shaded;
					break;
				}
			}
		}
	}
}
