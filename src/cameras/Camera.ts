import { Vector3 } from "../maths/Vector3";
import { Matrix4 } from "../maths/Matrix4";
import { clamp, d2r } from "../maths/Common";
import { CameraConstants, RenderConstants } from "../core/Constants";
import type { IVector2, IVector3 } from "../maths/types";
import type { CameraSnapshot } from "../core/types";

export interface CameraOptions {
	position?: IVector3;
	/** Degrees. -90 looks down -Z. */
	yaw?: number;
	pitch?: number;
	speed?: number;
	sensitivity?: number;
	fov?: number;
	aspect?: number;
	near?: number;
	far?: number;
}

const WORLD_UP: Readonly<IVector3> = Object.freeze({ x: 0, y: 1, z: 0 });

/**
 * Free-flying yaw/pitch camera. Mutated between frames only; the renderer
 * reads an immutable {@link CameraSnapshot}.
 */
export class Camera {
	public position: Vector3;
	public yaw: number;
	public pitch: number;
	public speed: number;
	public sensitivity: number;
	public fov: number;
	public aspect: number;
	public near: number;
	public far: number;

	constructor(options: CameraOptions = {}) {
		const p = options.position ?? { x: 0, y: 0, z: 0 };
		this.position = new Vector3(p.x, p.y, p.z);
		this.yaw = options.yaw ?? -90;
		this.pitch = 0;
		this.speed = options.speed ?? CameraConstants.DEFAULT_SPEED;
		this.sensitivity = options.sensitivity ?? CameraConstants.DEFAULT_SENSITIVITY;
		this.fov = options.fov ?? RenderConstants.DEFAULT_FOV;
		this.aspect =
			options.aspect ??
			RenderConstants.DEFAULT_WIDTH / RenderConstants.DEFAULT_HEIGHT;
		this.near = options.near ?? RenderConstants.DEFAULT_NEAR;
		this.far = options.far ?? RenderConstants.DEFAULT_FAR;

		this.setPitch(options.pitch ?? 0);
	}

	public setPitch(pitch: number): void {
		const max = CameraConstants.MAX_PITCH;
		this.pitch = clamp(pitch, -max, max);
	}

	public front(): Vector3 {
		const yaw = d2r(this.yaw);
		const pitch = d2r(this.pitch);
		return new Vector3(
			Math.cos(yaw) * Math.cos(pitch),
			Math.sin(pitch),
			Math.sin(yaw) * Math.cos(pitch)
		).normalize();
	}

	public right(): Vector3 {
		return Vector3.cross(this.front(), WORLD_UP).normalize();
	}

	/** Mouse-style look: +dx turns right, +dy looks down. */
	public rotate(dx: number, dy: number): void {
		this.yaw += dx * this.sensitivity;
		this.setPitch(this.pitch - dy * this.sensitivity);
	}

	/**
	 * Moves along the view axes: x strafes right, y rises along world up,
	 * z flies forward. Each unit is one step of `speed`.
	 */
	public move(direction: IVector3): void {
		const front = this.front();
		const right = this.right();
		this.position
			.add(front.scale(direction.z * this.speed))
			.add(right.scale(direction.x * this.speed))
			.add(Vector3.scale(WORLD_UP, direction.y * this.speed));
	}

	public applyInput(move: IVector3, look: IVector2): void {
		if (look.x !== 0 || look.y !== 0) this.rotate(look.x, look.y);
		if (move.x !== 0 || move.y !== 0 || move.z !== 0) this.move(move);
	}

	public viewMatrix(): Matrix4 {
		const target = Vector3.add(this.position, this.front());
		return Matrix4.lookAt(this.position, target, WORLD_UP);
	}

	public projectionMatrix(): Matrix4 {
		return Matrix4.perspective(this.fov, this.aspect, this.near, this.far);
	}

	public snapshot(): CameraSnapshot {
		const front = this.front();
		return Object.freeze({
			position: Object.freeze({
				x: this.position.x,
				y: this.position.y,
				z: this.position.z,
			}),
			front: Object.freeze({ x: front.x, y: front.y, z: front.z }),
			yaw: this.yaw,
			pitch: this.pitch,
			view: this.viewMatrix(),
			projection: this.projectionMatrix(),
		});
	}
}
