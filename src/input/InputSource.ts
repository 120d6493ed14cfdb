import type { IVector2, IVector3 } from "../maths/types";

/**
 * One frame of input, sampled once before the frame renders.
 * - move: x strafe right, y up, z forward (steps of camera speed)
 * - look: pointer delta in pixels
 * - zoom: scroll delta, positive pulls the ship closer
 */
export interface InputState {
	exit: boolean;
	move: IVector3;
	look: IVector2;
	zoom: number;
}

export interface InputSource {
	poll(frame: number): InputState | Promise<InputState>;
}

export type InputStep = Partial<Omit<InputState, "exit">>;

export function idleInput(): InputState {
	return { exit: false, move: { x: 0, y: 0, z: 0 }, look: { x: 0, y: 0 }, zoom: 0 };
}

/**
 * Replays a fixed list of steps, one per frame, then keeps going idle until
 * `frames` frames have been produced, after which it signals exit.
 */
export class ScriptedInput implements InputSource {
	public readonly frames: number;
	private readonly _steps: InputStep[];

	constructor(frames: number, steps: InputStep[] = []) {
		if (!Number.isInteger(frames) || frames < 0) {
			throw new RangeError(`[Input] Invalid frame count: ${frames}`);
		}
		this.frames = frames;
		this._steps = steps;
	}

	public poll(frame: number): InputState {
		const state = idleInput();
		if (frame >= this.frames) {
			state.exit = true;
			return state;
		}

		const step = this._steps[frame];
		if (step?.move) state.move = { ...step.move };
		if (step?.look) state.look = { ...step.look };
		if (step?.zoom !== undefined) state.zoom = step.zoom;
		return state;
	}
}
