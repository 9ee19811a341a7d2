/**
 * Run with: npx tsx --test src/core/graphics/GLSLGenerator.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateGLSL } from "./GLSLGenerator";
import { GLSL_ES_300_TARGET, WGSL_TARGET } from "../../config/shaderTargets";
import { generateShaderSources } from "./shading/ShaderSources";
import { withCapabilities } from "./shading/ShaderTarget";
import { QuadShading } from "../../ui/QuadShading";

const EXPECTED_VERTEX = `#version 300 es
precision highp float;
precision highp sampler2D;

layout(std140) uniform TransformUniforms {
  mat4 matrix;
} u_transform;

layout(location = 0) in vec2 a_position;
layout(location = 1) in vec2 a_texCoord;
layout(location = 2) in uint a_color;

out vec2 v_texCoord;
out vec4 v_color;

void main() {
  gl_Position = u_transform.matrix * vec4(a_position, 0.0, 1.0);
  v_texCoord = a_texCoord;
  v_color = vec4(float((a_color >> 24u) & 0xffu) / 255.0, float((a_color >> 16u) & 0xffu) / 255.0, float((a_color >> 8u) & 0xffu) / 255.0, float(a_color & 0xffu) / 255.0);
}
`;

const EXPECTED_FRAGMENT = `#version 300 es
precision highp float;
precision highp sampler2D;

uniform sampler2D u_colorTexture;

in vec2 v_texCoord;
in vec4 v_color;

layout(location = 0) out vec4 fragColor;

void main() {
  fragColor = v_color * texture(u_colorTexture, v_texCoord);
}
`;

describe("generateGLSL", () => {
  it("generates the quad vertex shader", () => {
    assert.equal(generateGLSL(QuadShading, GLSL_ES_300_TARGET).vertex, EXPECTED_VERTEX);
  });

  it("generates the quad fragment shader", () => {
    assert.equal(generateGLSL(QuadShading, GLSL_ES_300_TARGET).fragment, EXPECTED_FRAGMENT);
  });


  it("refuses targets it cannot express", () => {
    assert.throws(
      () => generateGLSL(QuadShading, WGSL_TARGET),
      /generateGLSL cannot emit for wgsl/,
    );
    assert.throws(
      () =>
        generateGLSL(
          QuadShading,
          withCapabilities(GLSL_ES_300_TARGET, { separateSamplers: true }),
        ),
      /GLSL ES 3.00 needs the unified binding model with combined samplers/,
    );
  });

  it("refuses the native unpack builtin GLSL ES 3.00 lacks", () => {
    const target = withCapabilities(GLSL_ES_300_TARGET, { unpackUnorm4x8: true });
    assert.throws(
      () => generateGLSL(QuadShading, target),
      /GLSL ES 3.00 has no unpackUnorm4x8 builtin/,
    );
    assert.throws(
      () => generateShaderSources(QuadShading, target),
      /GLSL ES 3.00 has no unpackUnorm4x8 builtin/,
    );
  });
});
