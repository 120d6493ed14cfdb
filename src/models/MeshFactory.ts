import type { IVector3 } from "../maths/types";
import type { Mesh, Vertex } from "../core/types";

const BOX_FACES: { normal: IVector3; u: IVector3; v: IVector3 }[] = [
	{ normal: { x: 1, y: 0, z: 0 }, u: { x: 0, y: 1, z: 0 }, v: { x: 0, y: 0, z: 1 } }, // Right
	{ normal: { x: -1, y: 0, z: 0 }, u: { x: 0, y: 0, z: 1 }, v: { x: 0, y: 1, z: 0 } }, // Left
	{ normal: { x: 0, y: 1, z: 0 }, u: { x: 0, y: 0, z: 1 }, v: { x: 1, y: 0, z: 0 } }, // Top
	{ normal: { x: 0, y: -1, z: 0 }, u: { x: 1, y: 0, z: 0 }, v: { x: 0, y: 0, z: 1 } }, // Bottom
	{ normal: { x: 0, y: 0, z: 1 }, u: { x: 1, y: 0, z: 0 }, v: { x: 0, y: 1, z: 0 } }, // Front
	{ normal: { x: 0, y: 0, z: -1 }, u: { x: 0, y: 1, z: 0 }, v: { x: 1, y: 0, z: 0 } }, // Back
];

/**
 * Procedural indexed meshes, wound counter-clockwise seen from outside.
 */
export class MeshFactory {
	/**
	 * Creates a UV sphere centred on the origin.
	 * @param segments - divisions around the Y axis
	 * @param rings - divisions from pole to pole
	 */
	public static createSphere(
		radius: number = 1,
		segments: number = 24,
		rings: number = 16
	): Mesh {
		if (segments < 3 || rings < 2) {
			throw new RangeError(
				`[MeshFactory] Sphere needs segments >= 3 and rings >= 2, got ${segments}x${rings}`
			);
		}

		const vertices: Vertex[] = [];
		for (let r = 0; r <= rings; r++) {
			const phi = (r / rings) * Math.PI;
			const sinPhi = Math.sin(phi);
			const cosPhi = Math.cos(phi);
			for (let s = 0; s <= segments; s++) {
				const theta = (s / segments) * Math.PI * 2;
				const normal = {
					x: sinPhi * Math.cos(theta),
					y: cosPhi,
					z: sinPhi * Math.sin(theta),
				};
				vertices.push({
					position: {
						x: normal.x * radius,
						y: normal.y * radius,
						z: normal.z * radius,
					},
					normal,
				});
			}
		}

		const row = segments + 1;
		const indices: number[] = [];
		for (let r = 0; r < rings; r++) {
			for (let s = 0; s < segments; s++) {
				const a = r * row + s;
				const b = (r + 1) * row + s;
				const c = (r + 1) * row + s + 1;
				const d = r * row + s + 1;

				// Pole rows collapse one triangle of each quad
				if (r !== rings - 1) indices.push(a, c, b);
				if (r !== 0) indices.push(a, d, c);
			}
		}

		return { vertices, indices };
	}

	/**
	 * Creates an axis-aligned cube centred on the origin with flat per-face
	 * normals (24 vertices, 12 triangles).
	 */
	public static createBox(size: number = 1): Mesh {
		const h = size / 2;
		const vertices: Vertex[] = [];
		const indices: number[] = [];

		for (const { normal, u, v } of BOX_FACES) {
			const base = vertices.length;
			const corners: [number, number][] = [
				[-1, -1],
				[1, -1],
				[1, 1],
				[-1, 1],
			];
			for (const [su, sv] of corners) {
				vertices.push({
					position: {
						x: (normal.x + u.x * su + v.x * sv) * h,
						y: (normal.y + u.y * su + v.y * sv) * h,
						z: (normal.z + u.z * su + v.z * sv) * h,
					},
					normal: { ...normal },
				});
			}
			indices.push(base, base + 1, base + 2, base, base + 2, base + 3);
		}

		return { vertices, indices };
	}
}
