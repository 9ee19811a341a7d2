/**
 * Value types of the shading expression language.
 *
 * Only the types the quad pipeline needs. Each backend generator maps these
 * to its own spelling.
 */

export type ShaderType = "f32" | "u32" | "vec2f" | "vec4f" | "mat4x4f";

export const SHADER_TYPES: readonly ShaderType[] = [
  "f32",
  "u32",
  "vec2f",
  "vec4f",
  "mat4x4f",
];

/** Number of scalar components (a mat4x4 counts 16) */
export function componentCount(type: ShaderType): number {
  switch (type) {
    case "f32":
    case "u32":
      return 1;
    case "vec2f":
      return 2;
    case "vec4f":
      return 4;
    case "mat4x4f":
      return 16;
  }
}

export function isFloatVector(type: ShaderType): type is "vec2f" | "vec4f" {
  return type === "vec2f" || type === "vec4f";
}

/** Float vector type with the given component count */
export function floatVectorType(components: number): ShaderType {
  switch (components) {
    case 1:
      return "f32";
    case 2:
      return "vec2f";
    case 4:
      return "vec4f";
    default:
      throw new Error(`No float vector type with ${components} components`);
  }
}

/**
 * A value as seen by the CPU reference: scalars are numbers, vectors and
 * matrices are component arrays (matrices column-major).
 */
export type ShaderValue = number | readonly number[];
