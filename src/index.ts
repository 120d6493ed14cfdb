export { Vector3 } from "./maths/Vector3";
export { Matrix4 } from "./maths/Matrix4";
export * from "./maths/Common";
export * from "./maths/types";
export * from "./utils/Color";
export * from "./utils/Geometry";
export { GradientNoise, defaultNoise, noise, fbm } from "./noise/GradientNoise";
export { MeshFactory } from "./models/MeshFactory";
export type {
	Vertex,
	Mesh,
	TransformedVertex,
	ScreenVertex,
	ScreenTriangle,
	Fragment,
	DrawCall,
	CameraSnapshot,
	FrameSnapshot,
	Viewport,
} from "./core/types";
export * from "./core/Constants";
export { EventEmitter, type Listener, type EventMap } from "./core/EventEmitter";
export { VertexStage, type VertexUniforms } from "./core/VertexStage";
export {
	PrimitiveAssembler,
	edgeFunction,
	type AssemblyResult,
	type AssemblyOptions,
} from "./core/PrimitiveAssembler";
export { Rasterizer, type RasterizerLike, type CoverageSample } from "./core/Rasterizer";
export { Framebuffer } from "./core/Framebuffer";
export {
	Renderer,
	type RendererOptions,
	type RendererEvents,
	type FrameStats,
	type TriangleStats,
	type BackgroundPass,
} from "./core/Renderer";
export {
	RenderLoop,
	type Presenter,
	type SceneComposer,
	type RenderLoopOptions,
} from "./core/RenderLoop";
export { Camera, type CameraOptions } from "./cameras/Camera";
export * from "./shaders";
export {
	ScriptedInput,
	idleInput,
	type InputSource,
	type InputState,
	type InputStep,
} from "./input/InputSource";
export { OBJLoader } from "./loaders/OBJLoader";
export { Loader, type LoaderEvents } from "./loaders/Loader";
export { OrbitBody, type OrbitDescriptor } from "./scene/OrbitBody";
export { Spaceship, type SpaceshipOptions } from "./scene/Spaceship";
export { Starfield, type StarfieldOptions } from "./scene/Starfield";
export { SolarSystem, type SolarSystemMeshes } from "./scene/SolarSystem";
export {
	RenderConfigSchema,
	ConfigError,
	loadConfig,
	parseConfig,
	DEFAULT_CONFIG_PATH,
	type RenderConfig,
	type BodyConfig,
} from "./config/RenderConfig";
export { PNGPresenter, frameFileName } from "./output/PNGPresenter";
