import { EventEmitter } from "./EventEmitter";
import { RenderConstants } from "./Constants";
import type { Camera } from "../cameras/Camera";
import type { InputSource, InputState } from "../input/InputSource";
import type { Framebuffer } from "./Framebuffer";
import type { Renderer } from "./Renderer";
import type { DrawCall, FrameSnapshot } from "./types";

/** Receives the finished colour buffer once per frame. */
export interface Presenter {
	present(target: Framebuffer, frame: number): void | Promise<void>;
}

/**
 * Owns per-body state (orbits, ship) and turns it into draw calls. Called
 * between frames only.
 */
export interface SceneComposer {
	update(time: number, input: InputState, camera: Camera): void;
	drawCalls(time: number): DrawCall[];
}

export interface RenderLoopOptions {
	renderer: Renderer;
	camera: Camera;
	scene: SceneComposer;
	input: InputSource;
	presenter: Presenter;
	timeStep?: number;
	startTime?: number;
}

export interface RenderLoopEvents {
	present: [{ frame: number; time: number }];
	stop: [{ frames: number; time: number }];
}

/**
 * Frame loop: poll input → update camera and scene → snapshot → render →
 * present. Stops only when the input source signals exit.
 */
export class RenderLoop extends EventEmitter<RenderLoopEvents> {
	public readonly renderer: Renderer;
	public readonly camera: Camera;
	public readonly scene: SceneComposer;
	public readonly input: InputSource;
	public readonly presenter: Presenter;
	public readonly timeStep: number;

	public time: number;
	private _running = false;

	constructor(options: RenderLoopOptions) {
		super();
		this.renderer = options.renderer;
		this.camera = options.camera;
		this.scene = options.scene;
		this.input = options.input;
		this.presenter = options.presenter;
		this.timeStep = options.timeStep ?? RenderConstants.DEFAULT_TIME_STEP;
		this.time = options.startTime ?? 0;

		this.camera.aspect = this.renderer.aspect;
	}

	public get running(): boolean {
		return this._running;
	}

	/** Builds the immutable bundle one frame renders against. */
	public snapshot(): FrameSnapshot {
		return Object.freeze({
			camera: this.camera.snapshot(),
			time: this.time,
			drawCalls: Object.freeze(this.scene.drawCalls(this.time)),
		});
	}

	/**
	 * Runs until the input source asks to exit.
	 * @returns the number of frames presented
	 */
	public async run(): Promise<number> {
		if (this._running) {
			throw new Error("[RenderLoop] Loop is already running");
		}
		this._running = true;

		let frame = 0;
		try {
			for (;;) {
				const input = await this.input.poll(frame);
				if (input.exit) break;

				this.camera.applyInput(input.move, input.look);
				this.scene.update(this.time, input, this.camera);

				const target = this.renderer.renderFrame(this.snapshot());
				await this.presenter.present(target, frame);
				this.emit("present", { frame, time: this.time });

				this.time += this.timeStep;
				frame++;
			}
		} finally {
			this._running = false;
		}

		this.emit("stop", { frames: frame, time: this.time });
		return frame;
	}
}
