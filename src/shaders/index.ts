export { ShaderKind, SHADER_KINDS, SHADER_NAMES } from "./types";
export type { ShadingInput, ProceduralShader, ShaderName } from "./types";
export { getShader, shade, shadeFragment } from "./FragmentShader";
export * from "./ProceduralShaders";
