/**
 * The UI quad shading program: textured, tinted quads under a batch
 * transform.
 *
 * Vertex stage:   clip = transform.matrix * vec4(position, 0, 1)
 *                 color = packed RGBA decoded to four normalized channels
 *                 texCoord passes through
 * Fragment stage: output = color * sample(colorTexture, texCoord)
 *
 * Both backends are generated from this one definition.
 */

import { ShaderStage } from "../core/graphics/shading/BindingLayout";
import {
  attribute,
  float,
  mul,
  sampleTexture,
  uniform,
  unpackColor,
  varying,
  vec4,
} from "../core/graphics/shading/ShaderExpr";
import { defineShadingProgram } from "../core/graphics/shading/ShadingProgram";
import { defineVertexLayout } from "../core/graphics/shading/VertexLayout";
import { TransformUniforms } from "./QuadUniforms";

/** position (float32x2), texCoord (float32x2), color (uint32): 20 bytes */
export const QUAD_VERTEX_LAYOUT = defineVertexLayout([
  { name: "position", format: "float32x2" },
  { name: "texCoord", format: "float32x2" },
  { name: "color", format: "uint32" },
]);

/** Group 0: per-batch transform. Group 1: per-draw texture and sampler. */
export const QUAD_BIND_GROUPS = [
  {
    transform: {
      type: "uniform",
      struct: TransformUniforms,
      visibility: ShaderStage.VERTEX,
    },
  },
  {
    colorTexture: {
      type: "texture",
      sampler: "colorSampler",
      visibility: ShaderStage.FRAGMENT,
    },
    colorSampler: {
      type: "sampler",
      visibility: ShaderStage.FRAGMENT,
    },
  },
] as const;

export const QuadShading = defineShadingProgram({
  name: "quad",
  vertexLayout: QUAD_VERTEX_LAYOUT,
  bindGroups: QUAD_BIND_GROUPS,
  varyings: {
    texCoord: "vec2f",
    color: "vec4f",
  },
  vertex: {
    position: mul(
      uniform("transform", "matrix"),
      vec4(attribute("position"), float(0), float(1)),
    ),
    outputs: {
      texCoord: attribute("texCoord"),
      color: unpackColor(attribute("color")),
    },
  },
  fragment: {
    color: mul(varying("color"), sampleTexture("colorTexture", varying("texCoord"))),
  },
});
