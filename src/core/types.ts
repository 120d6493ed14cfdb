import type { IVector3, IVector4 } from "../maths/types";
import type { Matrix4 } from "../maths/Matrix4";
import type { ShaderKind } from "../shaders/types";

export interface Vertex {
	position: IVector3;
	normal: IVector3;
	color?: IVector3;
	shader?: ShaderKind;
}

/**
 * Indexed triangle mesh. `indices.length` is a multiple of 3 and every index
 * is a valid position in `vertices`.
 */
export interface Mesh {
	vertices: Vertex[];
	indices: number[];
}

export interface TransformedVertex {
	/** Homogeneous clip-space position, w kept for perspective correction. */
	clip: IVector4;
	world: IVector3;
	/** Object-space position, used as the procedural shading coordinate. */
	local: IVector3;
	normal: IVector3;
	color?: IVector3;
	shader: ShaderKind;
}

export interface ScreenVertex {
	/** Pixel coordinates, (0,0) top-left, pixel centres at +0.5. */
	x: number;
	y: number;
	/** NDC depth in [-1, 1], smaller is nearer. */
	z: number;
	/** 1 / clip w. */
	invW: number;
	world: IVector3;
	local: IVector3;
	normal: IVector3;
	color?: IVector3;
}

export interface ScreenTriangle {
	vertices: [ScreenVertex, ScreenVertex, ScreenVertex];
	/** Signed edge-function area, positive for front faces. */
	area: number;
	shader: ShaderKind;
}

export interface Fragment {
	x: number;
	y: number;
	depth: number;
	world: IVector3;
	local: IVector3;
	normal: IVector3;
	/** Perspective-correct base colour, present when all three vertices carry one. */
	color?: IVector3;
	shader: ShaderKind;
	time: number;
}

export interface DrawCall {
	mesh: Mesh;
	model: Matrix4;
	shader: ShaderKind;
}

export interface CameraSnapshot {
	readonly position: Readonly<IVector3>;
	readonly front: Readonly<IVector3>;
	readonly yaw: number;
	readonly pitch: number;
	readonly view: Matrix4;
	readonly projection: Matrix4;
}

/**
 * Everything one frame renders against. Built once between frames and never
 * mutated while the frame rasterizes.
 */
export interface FrameSnapshot {
	readonly camera: CameraSnapshot;
	readonly time: number;
	readonly drawCalls: readonly DrawCall[];
}

export interface Viewport {
	width: number;
	height: number;
}
