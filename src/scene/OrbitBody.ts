import { Matrix4 } from "../maths/Matrix4";
import { ShaderKind } from "../shaders/types";
import type { IVector3 } from "../maths/types";
import type { DrawCall, Mesh } from "../core/types";

/**
 * Orbit parameters for one body. Angles are radians, speeds radians per unit
 * of elapsed time.
 */
export interface OrbitDescriptor {
	name: string;
	shader: ShaderKind;
	/** Distance from the system centre in the XZ plane. */
	radius: number;
	speed: number;
	phase: number;
	/** Constant Y offset of the orbit plane. */
	height: number;
	/** Spin about the body's own Y axis. */
	rotationSpeed: number;
	scale: number;
	/** Mirrors the orbit across the YZ plane so the body travels the other way. */
	retrograde: boolean;
}

/**
 * A body on a circular orbit. Holds no per-frame state; everything is a
 * function of time.
 */
export class OrbitBody {
	public readonly descriptor: Readonly<OrbitDescriptor>;

	constructor(descriptor: OrbitDescriptor) {
		if (!(descriptor.scale > 0)) {
			throw new RangeError(
				`[Scene] Body "${descriptor.name}" needs a positive scale, got ${descriptor.scale}`
			);
		}
		this.descriptor = Object.freeze({ ...descriptor });
	}

	public get name(): string {
		return this.descriptor.name;
	}

	public positionAt(time: number): IVector3 {
		const { radius, speed, phase, height, retrograde } = this.descriptor;
		const angle = time * speed + phase;
		const x = Math.cos(angle) * radius;
		return {
			x: retrograde ? -x : x,
			y: height,
			z: Math.sin(angle) * radius,
		};
	}

	public modelMatrix(time: number): Matrix4 {
		const { rotationSpeed, scale } = this.descriptor;
		return Matrix4.compose(
			this.positionAt(time),
			{ x: 0, y: time * rotationSpeed, z: 0 },
			{ x: scale, y: scale, z: scale }
		);
	}

	public drawCall(mesh: Mesh, time: number): DrawCall {
		return { mesh, model: this.modelMatrix(time), shader: this.descriptor.shader };
	}
}
