export interface IVector2 {
	x: number;
	y: number;
}

export interface IVector3 {
	x: number;
	y: number;
	z: number;
}

export interface IVector4 {
	x: number;
	y: number;
	z: number;
	w: number;
}

export type Matrix3Arr = number[][];
