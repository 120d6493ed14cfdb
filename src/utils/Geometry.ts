/**
 * Mesh utility functions
 */

import { Vector3 } from "../maths/Vector3";
import type { IVector3 } from "../maths/types";
import type { Mesh } from "../core/types";

export class MeshError extends Error {
	constructor(message: string) {
		super(`[Mesh] ${message}`);
		this.name = "MeshError";
	}
}

/**
 * Throws when the index list is not a whole number of triangles or points
 * outside the vertex list.
 */
export function validateMesh(mesh: Mesh): void {
	if (mesh.indices.length % 3 !== 0) {
		throw new MeshError(
			`Index count ${mesh.indices.length} is not a multiple of 3`
		);
	}
	const count = mesh.vertices.length;
	for (let i = 0; i < mesh.indices.length; i++) {
		const idx = mesh.indices[i];
		if (!Number.isInteger(idx) || idx < 0 || idx >= count) {
			throw new MeshError(
				`Index ${idx} at position ${i} is out of range (0..${count - 1})`
			);
		}
	}
}

/**
 * Area-weighted smooth normals: each face's unnormalized normal is added to
 * its three vertices, then every sum is normalized.
 */
export function computeSmoothNormals(
	positions: readonly IVector3[],
	indices: readonly number[]
): Vector3[] {
	const normals = positions.map(() => new Vector3());

	for (let i = 0; i + 2 < indices.length; i += 3) {
		const ia = indices[i];
		const ib = indices[i + 1];
		const ic = indices[i + 2];
		const a = positions[ia];
		const faceNormal = Vector3.cross(
			Vector3.sub(positions[ib], a),
			Vector3.sub(positions[ic], a)
		);
		normals[ia].add(faceNormal);
		normals[ib].add(faceNormal);
		normals[ic].add(faceNormal);
	}

	for (const n of normals) {
		n.normalize();
	}
	return normals;
}

export interface Bounds {
	min: IVector3;
	max: IVector3;
}

export function computeBounds(positions: readonly IVector3[]): Bounds {
	const min = { x: Infinity, y: Infinity, z: Infinity };
	const max = { x: -Infinity, y: -Infinity, z: -Infinity };
	for (const p of positions) {
		min.x = Math.min(min.x, p.x);
		min.y = Math.min(min.y, p.y);
		min.z = Math.min(min.z, p.z);
		max.x = Math.max(max.x, p.x);
		max.y = Math.max(max.y, p.y);
		max.z = Math.max(max.z, p.z);
	}
	return { min, max };
}

/**
 * Recentres positions on the bounding-box centre and scales them so the
 * largest extent becomes `size`. Returns new vertices.
 */
export function normalizeMeshSize(mesh: Mesh, size: number = 1): Mesh {
	if (mesh.vertices.length === 0) return { vertices: [], indices: [] };

	const { min, max } = computeBounds(mesh.vertices.map((v) => v.position));
	const extent = Math.max(max.x - min.x, max.y - min.y, max.z - min.z);
	const scale = extent > 0 ? size / extent : 1;
	const cx = (min.x + max.x) / 2;
	const cy = (min.y + max.y) / 2;
	const cz = (min.z + max.z) / 2;

	return {
		vertices: mesh.vertices.map((v) => ({
			...v,
			position: {
				x: (v.position.x - cx) * scale,
				y: (v.position.y - cy) * scale,
				z: (v.position.z - cz) * scale,
			},
			normal: { ...v.normal },
		})),
		indices: [...mesh.indices],
	};
}
