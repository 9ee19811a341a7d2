/**
 * Run with: npx tsx --test src/core/graphics/webgpu/WGSLGenerator.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateWGSL } from "./WGSLGenerator";
import { GLSL_ES_300_TARGET, WGSL_TARGET } from "../../../config/shaderTargets";
import { withCapabilities } from "../shading/ShaderTarget";
import { QuadShading } from "../../../ui/QuadShading";

const EXPECTED_QUAD_WGSL = `struct TransformUniforms {
  matrix: mat4x4<f32>,
}

@group(0) @binding(0) var<uniform> transform: TransformUniforms;

@group(1) @binding(0) var colorTexture: texture_2d<f32>;
@group(1) @binding(1) var colorSampler: sampler;

struct VertexInput {
  @location(0) position: vec2<f32>,
  @location(1) texCoord: vec2<f32>,
  @location(2) color: u32,
}

struct VertexOutput {
  @builtin(position) clipPosition: vec4<f32>,
  @location(0) texCoord: vec2<f32>,
  @location(1) color: vec4<f32>,
}

@vertex
fn vs_main(input: VertexInput) -> VertexOutput {
  var output: VertexOutput;
  output.clipPosition = transform.matrix * vec4<f32>(input.position, 0.0, 1.0);
  output.texCoord = input.texCoord;
  output.color = unpack4x8unorm(input.color).wzyx;
  return output;
}

@fragment
fn fs_main(input: VertexOutput) -> @location(0) vec4<f32> {
  return input.color * textureSample(colorTexture, colorSampler, input.texCoord);
}
`;

describe("generateWGSL", () => {
  it("generates the quad module", () => {
    assert.equal(generateWGSL(QuadShading, WGSL_TARGET), EXPECTED_QUAD_WGSL);
  });

  it("spells out the color decode without the native unpack", () => {
    const target = withCapabilities(WGSL_TARGET, { unpackUnorm4x8: false });
    const colorLine = generateWGSL(QuadShading, target)
      .split("\n")
      .find((line) => line.startsWith("  output.color"));
    assert.equal(
      colorLine,
      "  output.color = vec4<f32>(" +
        "f32((input.color >> 24u) & 0xffu) / 255.0, " +
        "f32((input.color >> 16u) & 0xffu) / 255.0, " +
        "f32((input.color >> 8u) & 0xffu) / 255.0, " +
        "f32(input.color & 0xffu) / 255.0);",
    );
  });

  it("writes masks in decimal without hex literals", () => {
    const target = withCapabilities(WGSL_TARGET, {
      unpackUnorm4x8: false,
      hexIntLiterals: false,
    });
    const source = generateWGSL(QuadShading, target);
    assert.ok(source.includes("f32((input.color >> 24u) & 255u) / 255.0"));
    assert.equal(source.includes("0xff"), false);
  });

  it("refuses other languages", () => {
    assert.throws(
      () => generateWGSL(QuadShading, GLSL_ES_300_TARGET),
      /generateWGSL cannot emit for glsl-es-300/,
    );
  });
});
