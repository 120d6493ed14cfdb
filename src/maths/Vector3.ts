/**
 * Vector3 class and utility functions
 */

import { clamp } from "./Common";
import type { IVector3 } from "./types";

export class Vector3 implements IVector3 {
	constructor(
		public x: number = 0,
		public y: number = 0,
		public z: number = 0
	) {}

	public set(x: number, y: number, z: number): this {
		this.x = x;
		this.y = y;
		this.z = z;
		return this;
	}

	public copy(v: IVector3): this {
		this.x = v.x;
		this.y = v.y;
		this.z = v.z;
		return this;
	}

	public clone(): Vector3 {
		return new Vector3(this.x, this.y, this.z);
	}

	public add(v: IVector3): this {
		this.x += v.x;
		this.y += v.y;
		this.z += v.z;
		return this;
	}

	public sub(v: IVector3): this {
		this.x -= v.x;
		this.y -= v.y;
		this.z -= v.z;
		return this;
	}

	public scale(s: number): this {
		this.x *= s;
		this.y *= s;
		this.z *= s;
		return this;
	}

	public lerp(v: IVector3, t: number): this {
		this.x += (v.x - this.x) * t;
		this.y += (v.y - this.y) * t;
		this.z += (v.z - this.z) * t;
		return this;
	}

	public clampScalar(min: number, max: number): this {
		this.x = clamp(this.x, min, max);
		this.y = clamp(this.y, min, max);
		this.z = clamp(this.z, min, max);
		return this;
	}

	public dot(v: IVector3): number {
		return this.x * v.x + this.y * v.y + this.z * v.z;
	}

	public length(): number {
		return Math.hypot(this.x, this.y, this.z);
	}

	public normalize(): this {
		const len = this.length() || 1;
		return this.scale(1 / len);
	}

	// Static methods for functional style
	public static normalize(v: IVector3): Vector3 {
		return new Vector3(v.x, v.y, v.z).normalize();
	}

	public static dot(a: IVector3, b: IVector3): number {
		return a.x * b.x + a.y * b.y + a.z * b.z;
	}

	public static cross(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(
			a.y * b.z - a.z * b.y,
			a.z * b.x - a.x * b.z,
			a.x * b.y - a.y * b.x
		);
	}

	public static add(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(a.x + b.x, a.y + b.y, a.z + b.z);
	}

	public static sub(a: IVector3, b: IVector3): Vector3 {
		return new Vector3(a.x - b.x, a.y - b.y, a.z - b.z);
	}

	public static scale(v: IVector3, s: number): Vector3 {
		return new Vector3(v.x * s, v.y * s, v.z * s);
	}

	public static lerp(a: IVector3, b: IVector3, t: number): Vector3 {
		return new Vector3(
			a.x + (b.x - a.x) * t,
			a.y + (b.y - a.y) * t,
			a.z + (b.z - a.z) * t
		);
	}

	public static length(v: IVector3): number {
		return Math.hypot(v.x, v.y, v.z);
	}

	public static normalizeInPlace(v: IVector3): void {
		const len = Math.hypot(v.x, v.y, v.z) || 1;
		const invLen = 1 / len;
		v.x *= invLen;
		v.y *= invLen;
		v.z *= invLen;
	}
}
