/**
 * Matrix4 class and utility functions (4x4 Matrix)
 */

import { Vector3 } from "./Vector3";
import type { IVector3, IVector4, Matrix3Arr } from "./types";

/**
 * MATRIX CONVENTIONS:
 * - Storage: row-major `elements[row][col]`, column vectors (M * v)
 * - Handedness: Right-Handed, the camera looks down -Z
 * - Projection: OpenGL clip range, NDC z in [-1, 1] with near mapped to -1
 */

export class Matrix4 {
	public elements: number[][];

	constructor(elements?: number[][]) {
		this.elements = elements || [
			[1, 0, 0, 0],
			[0, 1, 0, 0],
			[0, 0, 1, 0],
			[0, 0, 0, 1],
		];
	}

	public static identity(): Matrix4 {
		return new Matrix4();
	}

	public static multiply(a: Matrix4, b: Matrix4): Matrix4 {
		const ae = a.elements;
		const be = b.elements;
		const res: number[][] = [];

		for (let i = 0; i < 4; i++) {
			const ai0 = ae[i][0],
				ai1 = ae[i][1],
				ai2 = ae[i][2],
				ai3 = ae[i][3];
			res.push([
				ai0 * be[0][0] + ai1 * be[1][0] + ai2 * be[2][0] + ai3 * be[3][0],
				ai0 * be[0][1] + ai1 * be[1][1] + ai2 * be[2][1] + ai3 * be[3][1],
				ai0 * be[0][2] + ai1 * be[1][2] + ai2 * be[2][2] + ai3 * be[3][2],
				ai0 * be[0][3] + ai1 * be[1][3] + ai2 * be[2][3] + ai3 * be[3][3],
			]);
		}

		return new Matrix4(res);
	}

	/**
	 * Multiplies the matrices left to right, so `chain(P, V, M)` is `P * V * M`.
	 */
	public static chain(...matrices: Matrix4[]): Matrix4 {
		return matrices.reduce((acc, m) => Matrix4.multiply(acc, m), Matrix4.identity());
	}

	/**
	 * Transforms a point with w = 1 and keeps the homogeneous w of the result.
	 */
	public static transformPoint(m: Matrix4, point: IVector3): IVector4 {
		const me = m.elements;
		const { x, y, z } = point;

		return {
			x: me[0][0] * x + me[0][1] * y + me[0][2] * z + me[0][3],
			y: me[1][0] * x + me[1][1] * y + me[1][2] * z + me[1][3],
			z: me[2][0] * x + me[2][1] * y + me[2][2] * z + me[2][3],
			w: me[3][0] * x + me[3][1] * y + me[3][2] * z + me[3][3],
		};
	}

	public static rotationX(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[1, 0, 0, 0],
			[0, c, -s, 0],
			[0, s, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotationY(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[c, 0, s, 0],
			[0, 1, 0, 0],
			[-s, 0, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotationZ(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[c, -s, 0, 0],
			[s, c, 0, 0],
			[0, 0, 1, 0],
			[0, 0, 0, 1],
		]);
	}

	public static fromTranslation(t: IVector3): Matrix4 {
		const m = Matrix4.identity();
		m.elements[0][3] = t.x;
		m.elements[1][3] = t.y;
		m.elements[2][3] = t.z;
		return m;
	}

	public static fromScale(s: IVector3): Matrix4 {
		const m = Matrix4.identity();
		m.elements[0][0] = s.x;
		m.elements[1][1] = s.y;
		m.elements[2][2] = s.z;
		return m;
	}

	/**
	 * Builds `T * Rz * Ry * Rx * S`. Rotation angles are in radians.
	 */
	public static compose(
		translation: IVector3,
		rotation: IVector3,
		scale: IVector3
	): Matrix4 {
		return Matrix4.chain(
			Matrix4.fromTranslation(translation),
			Matrix4.rotationZ(rotation.z),
			Matrix4.rotationY(rotation.y),
			Matrix4.rotationX(rotation.x),
			Matrix4.fromScale(scale)
		);
	}

	public static lookAt(eye: IVector3, target: IVector3, up: IVector3): Matrix4 {
		const z = Vector3.sub(eye, target).normalize();
		const x = Vector3.cross(up, z).normalize();
		const y = Vector3.cross(z, x);

		return new Matrix4([
			[x.x, x.y, x.z, -Vector3.dot(x, eye)],
			[y.x, y.y, y.z, -Vector3.dot(y, eye)],
			[z.x, z.y, z.z, -Vector3.dot(z, eye)],
			[0, 0, 0, 1],
		]);
	}

	/**
	 * @param fov - Vertical field of view in degrees.
	 */
	public static perspective(
		fov: number,
		aspect: number,
		near: number,
		far: number
	): Matrix4 {
		const f = 1.0 / Math.tan((fov * Math.PI) / 360);
		const rangeInv = 1.0 / (near - far);

		return new Matrix4([
			[f / aspect, 0, 0, 0],
			[0, f, 0, 0],
			[0, 0, (far + near) * rangeInv, 2 * far * near * rangeInv],
			[0, 0, -1, 0],
		]);
	}

	public static inverse3x3(m: Matrix4): Matrix3Arr | null {
		const me = m.elements;
		const m00 = me[0][0],
			m01 = me[0][1],
			m02 = me[0][2];
		const m10 = me[1][0],
			m11 = me[1][1],
			m12 = me[1][2];
		const m20 = me[2][0],
			m21 = me[2][1],
			m22 = me[2][2];

		const det =
			m00 * (m11 * m22 - m12 * m21) -
			m01 * (m10 * m22 - m12 * m20) +
			m02 * (m10 * m21 - m11 * m20);

		if (Math.abs(det) < 1e-10) {
			return null;
		}

		const invDet = 1.0 / det;

		return [
			[
				(m11 * m22 - m12 * m21) * invDet,
				(m02 * m21 - m01 * m22) * invDet,
				(m01 * m12 - m02 * m11) * invDet,
			],
			[
				(m12 * m20 - m10 * m22) * invDet,
				(m00 * m22 - m02 * m20) * invDet,
				(m02 * m10 - m00 * m12) * invDet,
			],
			[
				(m10 * m21 - m11 * m20) * invDet,
				(m01 * m20 - m00 * m21) * invDet,
				(m00 * m11 - m01 * m10) * invDet,
			],
		];
	}

	public static transpose3x3(m: Matrix3Arr): Matrix3Arr {
		return [
			[m[0][0], m[1][0], m[2][0]],
			[m[0][1], m[1][1], m[2][1]],
			[m[0][2], m[1][2], m[2][2]],
		];
	}

	/**
	 * Inverse-transpose of the upper 3x3. A singular model matrix falls back
	 * to identity.
	 */
	public static normalMatrix(modelMatrix: Matrix4): Matrix3Arr {
		const inv = Matrix4.inverse3x3(modelMatrix);
		if (!inv) {
			return [
				[1, 0, 0],
				[0, 1, 0],
				[0, 0, 1],
			];
		}
		return Matrix4.transpose3x3(inv);
	}

	public static transformNormal(normalMat: Matrix3Arr, direction: IVector3): Vector3 {
		const { x, y, z } = direction;
		return new Vector3(
			normalMat[0][0] * x + normalMat[0][1] * y + normalMat[0][2] * z,
			normalMat[1][0] * x + normalMat[1][1] * y + normalMat[1][2] * z,
			normalMat[2][0] * x + normalMat[2][1] * y + normalMat[2][2] * z
		);
	}

	/**
	 * Creates a deep copy of this matrix.
	 */
	public clone(): Matrix4 {
		return new Matrix4(this.elements.map((row) => [...row]));
	}
}
