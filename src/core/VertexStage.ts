import { Matrix4 } from "../maths/Matrix4";
import { ShaderKind } from "../shaders/types";
import type { Matrix3Arr } from "../maths/types";
import type { TransformedVertex, Vertex } from "./types";

/**
 * Per-draw-call matrices. `mvp` and `normalMatrix` are derived once per draw
 * call by {@link VertexStage.createUniforms}.
 */
export interface VertexUniforms {
	model: Matrix4;
	view: Matrix4;
	projection: Matrix4;
	mvp: Matrix4;
	normalMatrix: Matrix3Arr;
	shader: ShaderKind;
}

export class VertexStage {
	public static createUniforms(
		model: Matrix4,
		view: Matrix4,
		projection: Matrix4,
		shader: ShaderKind = ShaderKind.Spaceship
	): VertexUniforms {
		return {
			model,
			view,
			projection,
			mvp: Matrix4.chain(projection, view, model),
			// Inverse-transpose keeps normals perpendicular under non-uniform scale
			normalMatrix: Matrix4.normalMatrix(model),
			shader,
		};
	}

	/**
	 * Transforms one vertex into clip space. Pure: the source vertex is never
	 * modified and nothing is clipped or discarded here.
	 */
	public static transform(
		vertex: Vertex,
		uniforms: VertexUniforms
	): TransformedVertex {
		const clip = Matrix4.transformPoint(uniforms.mvp, vertex.position);
		const world = Matrix4.transformPoint(uniforms.model, vertex.position);
		const normal = Matrix4.transformNormal(
			uniforms.normalMatrix,
			vertex.normal
		).normalize();

		return {
			clip,
			world: { x: world.x, y: world.y, z: world.z },
			local: { ...vertex.position },
			normal: { x: normal.x, y: normal.y, z: normal.z },
			color: vertex.color ? { ...vertex.color } : undefined,
			shader: vertex.shader ?? uniforms.shader,
		};
	}

	public static transformAll(
		vertices: readonly Vertex[],
		uniforms: VertexUniforms
	): TransformedVertex[] {
		const out: TransformedVertex[] = new Array(vertices.length);
		for (let i = 0; i < vertices.length; i++) {
			out[i] = VertexStage.transform(vertices[i], uniforms);
		}
		return out;
	}
}
