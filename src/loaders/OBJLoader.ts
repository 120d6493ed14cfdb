import { Loader, toError } from "./Loader";
import { MeshError, computeSmoothNormals, validateMesh } from "../utils/Geometry";
import type { IVector3 } from "../maths/types";
import type { Mesh, Vertex } from "../core/types";

function parseVector(parts: string[], line: number, offset = 1): IVector3 {
	const x = parseFloat(parts[offset]);
	const y = parseFloat(parts[offset + 1]);
	const z = parseFloat(parts[offset + 2]);
	if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
		throw new MeshError(`Line ${line}: expected three numbers in "${parts.join(" ")}"`);
	}
	return { x, y, z };
}

/**
 * Resolves a 1-based (or negative, relative) OBJ index to a 0-based one.
 */
function resolveIndex(token: string, count: number, line: number, kind: string): number {
	const raw = parseInt(token, 10);
	if (!Number.isInteger(raw) || raw === 0) {
		throw new MeshError(`Line ${line}: invalid ${kind} index "${token}"`);
	}
	const idx = raw > 0 ? raw - 1 : count + raw;
	if (idx < 0 || idx >= count) {
		throw new MeshError(
			`Line ${line}: ${kind} index ${raw} is out of range (${count} defined)`
		);
	}
	return idx;
}

/**
 * OBJLoader parses .obj files into indexed meshes.
 *
 * Supports `v` (with optional trailing `r g b` vertex colour), `vt`, `vn` and
 * `f` with `v`, `v/vt`, `v//vn` and `v/vt/vn` corners. Polygons are fan
 * triangulated; other statements are ignored. Missing normals are filled with
 * area-weighted smooth normals.
 */
export class OBJLoader extends Loader<Mesh> {
	/**
	 * Loads an OBJ file from disk.
	 */
	public async load(path: string): Promise<Mesh> {
		try {
			const buffer = await this._readWithProgress(path);
			const mesh = this.parse(buffer.toString("utf8"));
			this.emit("load", mesh);
			return mesh;
		} catch (error) {
			const err = toError(error);
			this.emit("error", err);
			throw err;
		}
	}

	/**
	 * Parses OBJ text.
	 */
	public parse(text: string): Mesh {
		this.emit("parsestart");
		const positions: IVector3[] = [];
		const colors: (IVector3 | undefined)[] = [];
		let uvCount = 0;
		const normals: IVector3[] = [];

		const vertices: Vertex[] = [];
		const hasNormal: boolean[] = [];
		const indices: number[] = [];
		// "v/vn" corner key -> vertex index
		const cache = new Map<string, number>();

		const lines = text.split(/\r?\n/);
		const lineCount = lines.length;

		for (let i = 0; i < lineCount; i++) {
			const line = lines[i].trim();
			const lineNo = i + 1;
			if (i % 1000 === 0) {
				this.emit("parseprogress", {
					current: i,
					total: lineCount,
					message: `Parsing line ${i}/${lineCount}`,
				});
			}
			if (!line || line.startsWith("#")) continue;

			const parts = line.split(/\s+/);
			const type = parts[0];

			if (type === "v") {
				positions.push(parseVector(parts, lineNo));
				colors.push(parts.length >= 7 ? parseVector(parts, lineNo, 4) : undefined);
			} else if (type === "vt") {
				uvCount++;
			} else if (type === "vn") {
				normals.push(parseVector(parts, lineNo));
			} else if (type === "f") {
				if (parts.length < 4) {
					throw new MeshError(`Line ${lineNo}: face needs at least 3 vertices`);
				}

				const corners: number[] = [];
				for (let j = 1; j < parts.length; j++) {
					const [vTok, vtTok, vnTok] = parts[j].split("/");
					const vIdx = resolveIndex(vTok, positions.length, lineNo, "vertex");
					if (vtTok) resolveIndex(vtTok, uvCount, lineNo, "texture");
					const vnIdx = vnTok
						? resolveIndex(vnTok, normals.length, lineNo, "normal")
						: -1;

					const key = `${vIdx}/${vnIdx}`;
					let index = cache.get(key);
					if (index === undefined) {
						index = vertices.length;
						cache.set(key, index);
						const color = colors[vIdx];
						vertices.push({
							position: { ...positions[vIdx] },
							normal: vnIdx >= 0 ? { ...normals[vnIdx] } : { x: 0, y: 0, z: 0 },
							...(color ? { color: { ...color } } : {}),
						});
						hasNormal.push(vnIdx >= 0);
					}
					corners.push(index);
				}

				// Fan triangulation
				for (let j = 1; j + 1 < corners.length; j++) {
					indices.push(corners[0], corners[j], corners[j + 1]);
				}
			}
		}

		if (hasNormal.includes(false)) {
			const smooth = computeSmoothNormals(
				vertices.map((v) => v.position),
				indices
			);
			vertices.forEach((v, idx) => {
				if (!hasNormal[idx]) {
					v.normal = { x: smooth[idx].x, y: smooth[idx].y, z: smooth[idx].z };
				}
			});
		}

		const mesh: Mesh = { vertices, indices };
		validateMesh(mesh);
		this.emit("parseend", mesh);
		return mesh;
	}
}
