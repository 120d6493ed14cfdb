import { Matrix4 } from "../maths/Matrix4";
import { Vector3 } from "../maths/Vector3";
import { clamp, d2r } from "../maths/Common";
import { ShaderKind } from "../shaders/types";
import type { Camera } from "../cameras/Camera";
import type { InputState } from "../input/InputSource";
import type { DrawCall, Mesh } from "../core/types";

export interface SpaceshipOptions {
	/** Distance ahead of the camera along its front vector. */
	distance?: number;
	/** Drop below the view axis so the ship does not cover the centre. */
	drop?: number;
	scale?: number;
}

export class SpaceshipConstants {
	static readonly TILT_LERP = 0.1;
	static readonly TILT_DECAY = 0.9;
	static readonly ROLL = 0.2;
	static readonly PITCH_FORWARD = -0.15;
	static readonly PITCH_BACKWARD = 0.1;
	/** Heading offset (degrees) the ship turns into while strafing. */
	static readonly STRAFE_YAW = 15;
	static readonly ZOOM_STEP = 0.5;
	static readonly MIN_DISTANCE = 1.5;
	static readonly MAX_DISTANCE = 8;
}

/**
 * Ship flown ahead of the camera. Strafing rolls it and turns its heading
 * toward the strafe, flying forward or back pitches it; all three ease toward
 * their targets and the targets decay to neutral once input stops. Scrolling
 * moves it nearer or farther within [MIN_DISTANCE, MAX_DISTANCE].
 */
export class Spaceship {
	public readonly mesh: Mesh;
	public distance: number;
	public drop: number;
	public scale: number;

	public position: Vector3;
	public yaw: number;
	public pitch: number;

	/** Roll around the ship's Z axis (radians). */
	public tiltX = 0;
	/** Pitch around the ship's X axis (radians). */
	public tiltZ = 0;
	public targetTiltX = 0;
	public targetTiltZ = 0;
	/** Heading offset from the camera yaw (degrees). */
	public yawOffset = 0;
	public targetYawOffset = 0;

	constructor(mesh: Mesh, options: SpaceshipOptions = {}) {
		this.mesh = mesh;
		this.distance = clamp(
			options.distance ?? 3,
			SpaceshipConstants.MIN_DISTANCE,
			SpaceshipConstants.MAX_DISTANCE
		);
		this.drop = options.drop ?? 0.6;
		this.scale = options.scale ?? 0.3;
		this.position = new Vector3();
		this.yaw = -90;
		this.pitch = 0;
	}

	public update(input: InputState, camera: Camera): void {
		if (input.move.x > 0) {
			this.targetTiltX = SpaceshipConstants.ROLL;
			this.targetYawOffset = SpaceshipConstants.STRAFE_YAW;
		} else if (input.move.x < 0) {
			this.targetTiltX = -SpaceshipConstants.ROLL;
			this.targetYawOffset = -SpaceshipConstants.STRAFE_YAW;
		}

		if (input.move.z > 0) this.targetTiltZ = SpaceshipConstants.PITCH_FORWARD;
		else if (input.move.z < 0) this.targetTiltZ = SpaceshipConstants.PITCH_BACKWARD;

		const lerp = SpaceshipConstants.TILT_LERP;
		this.tiltX += (this.targetTiltX - this.tiltX) * lerp;
		this.tiltZ += (this.targetTiltZ - this.tiltZ) * lerp;
		this.yawOffset += (this.targetYawOffset - this.yawOffset) * lerp;
		this.targetTiltX *= SpaceshipConstants.TILT_DECAY;
		this.targetTiltZ *= SpaceshipConstants.TILT_DECAY;
		this.targetYawOffset *= SpaceshipConstants.TILT_DECAY;

		if (input.zoom !== 0) this.zoom(input.zoom);
		this.follow(camera);
	}

	public zoom(delta: number): void {
		this.distance = clamp(
			this.distance - delta * SpaceshipConstants.ZOOM_STEP,
			SpaceshipConstants.MIN_DISTANCE,
			SpaceshipConstants.MAX_DISTANCE
		);
	}

	/** Places the ship ahead of the camera and faces it along the view. */
	public follow(camera: Camera): void {
		const front = camera.front();
		this.position
			.copy(camera.position)
			.add(front.scale(this.distance))
			.add({ x: 0, y: -this.drop, z: 0 });
		this.yaw = camera.yaw;
		this.pitch = camera.pitch;
	}

	public modelMatrix(): Matrix4 {
		return Matrix4.compose(
			this.position,
			{
				x: d2r(this.pitch) + this.tiltZ,
				// Model forward is -Z, which a yaw of -90 already faces
				y: -d2r(this.yaw + this.yawOffset + 90),
				z: this.tiltX,
			},
			{ x: this.scale, y: this.scale, z: this.scale }
		);
	}

	public drawCall(): DrawCall {
		return { mesh: this.mesh, model: this.modelMatrix(), shader: ShaderKind.Spaceship };
	}
}
