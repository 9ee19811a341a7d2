/**
 * Uniform buffer definition for the UI quad shaders.
 */

import { defineUniformStruct } from "../core/graphics/UniformStruct";

/**
 * Per-batch transform: UI space to clip space, column-major, 64 bytes.
 * Written by the caller at most once per draw batch.
 */
export const TransformUniforms = defineUniformStruct("TransformUniforms", {
  matrix: "mat4x4f",
});
