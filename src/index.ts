// Shading programs
export * from "./core/graphics/shading/ShaderTypes";
export * from "./core/graphics/shading/ShaderExpr";
export * from "./core/graphics/shading/BindingLayout";
export * from "./core/graphics/shading/BindingSlots";
export * from "./core/graphics/shading/VertexLayout";
export * from "./core/graphics/shading/ShadingProgram";
export * from "./core/graphics/shading/ShaderTarget";
export * from "./core/graphics/shading/lowerExpr";
export * from "./core/graphics/shading/ExprPrinter";
export * from "./core/graphics/shading/ShaderSources";

// Backends
export * from "./core/graphics/GLSLGenerator";
export * from "./core/graphics/ShaderProgram";
export * from "./core/graphics/webgpu/WGSLGenerator";
export * from "./core/graphics/webgpu/ShaderBindings";
export * from "./core/graphics/webgpu/QuadPipelineDescriptors";

// Math and uniforms
export { Matrix4 } from "./core/graphics/Matrix4";
export * from "./core/graphics/ClipSpace";
export * from "./core/graphics/UniformStruct";
export * from "./core/util/ColorUtils";

// CPU reference
export * from "./core/graphics/reference/ShaderInterpreter";
export * from "./core/graphics/reference/SoftwareTexture";
export * from "./core/graphics/reference/SoftwareRasterizer";

// Quad program and targets
export * from "./config/shaderTargets";
export * from "./ui/QuadShading";
export * from "./ui/QuadUniforms";
