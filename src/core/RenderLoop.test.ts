import { describe, it, expect, vi } from "vitest";
import { RenderLoop, type Presenter, type SceneComposer } from "./RenderLoop";
import { Renderer } from "./Renderer";
import { Camera } from "../cameras/Camera";
import { ScriptedInput } from "../input/InputSource";
import type { Framebuffer } from "./Framebuffer";
import type { DrawCall } from "./types";

class RecordingPresenter implements Presenter {
	public frames: number[] = [];
	public sizes: string[] = [];

	public async present(target: Framebuffer, frame: number): Promise<void> {
		this.frames.push(frame);
		this.sizes.push(`${target.width}x${target.height}`);
	}
}

class EmptyScene implements SceneComposer {
	public updates: number[] = [];

	public update(time: number): void {
		this.updates.push(time);
	}

	public drawCalls(): DrawCall[] {
		return [];
	}
}

function setup(frames: number, steps = new ScriptedInput(frames)) {
	const renderer = new Renderer({ width: 16, height: 8 });
	const camera = new Camera();
	const scene = new EmptyScene();
	const presenter = new RecordingPresenter();
	const loop = new RenderLoop({
		renderer,
		camera,
		scene,
		input: steps,
		presenter,
		timeStep: 0.5,
	});
	return { renderer, camera, scene, presenter, loop };
}

describe("RenderLoop", () => {
	it("renders and presents until the input asks to exit", async () => {
		const { loop, presenter, scene } = setup(3);
		const frames = await loop.run();

		expect(frames).toBe(3);
		expect(presenter.frames).toEqual([0, 1, 2]);
		expect(presenter.sizes).toEqual(["16x8", "16x8", "16x8"]);
		expect(scene.updates).toEqual([0, 0.5, 1]);
		expect(loop.time).toBe(1.5);
	});

	it("presents nothing when exit is signalled immediately", async () => {
		const { loop, presenter } = setup(0);
		expect(await loop.run()).toBe(0);
		expect(presenter.frames).toEqual([]);
	});

	it("applies input to the camera before the frame renders", async () => {
		const input = new ScriptedInput(2, [{ move: { x: 0, y: 0, z: 1 } }, { look: { x: 10, y: 0 } }]);
		const { loop, camera } = setup(2, input);
		await loop.run();

		// One step forward along -Z, then a 3 degree turn
		expect(camera.position.z).toBeCloseTo(-0.15, 12);
		expect(camera.yaw).toBeCloseTo(-87, 12);
	});

	it("sets the camera aspect from the renderer", () => {
		const { camera } = setup(0);
		expect(camera.aspect).toBe(2);
	});

	it("emits present and stop events", async () => {
		const { loop } = setup(2);
		const present = vi.fn();
		const stop = vi.fn();
		loop.on("present", present).on("stop", stop);
		await loop.run();

		expect(present).toHaveBeenCalledTimes(2);
		expect(present).toHaveBeenLastCalledWith({ frame: 1, time: 0.5 });
		expect(stop).toHaveBeenCalledWith({ frames: 2, time: 1 });
	});

	it("takes frozen snapshots", () => {
		const { loop } = setup(0);
		const snapshot = loop.snapshot();
		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(Object.isFrozen(snapshot.camera)).toBe(true);
		expect(Object.isFrozen(snapshot.drawCalls)).toBe(true);
	});

	it("refuses to run twice at once", async () => {
		const { loop } = setup(1);
		const first = loop.run();
		await expect(loop.run()).rejects.toThrow("already running");
		await first;
	});
});
