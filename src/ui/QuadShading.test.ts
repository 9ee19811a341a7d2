/**
 * Behaviour of the quad shading program on every shader target.
 *
 * Run with: npx tsx --test src/ui/QuadShading.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { QuadShading } from "./QuadShading";
import { GLSL_ES_300_TARGET, SHADER_TARGETS, WGSL_TARGET } from "../config/shaderTargets";
import { packRgba, unpackRgba } from "../core/util/ColorUtils";
import { Matrix4 } from "../core/graphics/Matrix4";
import { evaluateExpr } from "../core/graphics/reference/ShaderInterpreter";
import { lowerProgram } from "../core/graphics/shading/lowerExpr";
import { generateShaderSources } from "../core/graphics/shading/ShaderSources";
import type { ShaderTarget } from "../core/graphics/shading/ShaderTarget";
import { withCapabilities } from "../core/graphics/shading/ShaderTarget";
import type { ShaderValue } from "../core/graphics/shading/ShaderTypes";

function decode(packed: number, target: ShaderTarget): ShaderValue {
  const lowered = lowerProgram(QuadShading, target.capabilities);
  return evaluateExpr(lowered.vertex.outputs.color, {
    attributes: new Map([["color", packed]]),
  });
}

function shadeFragment(color: ShaderValue, texel: readonly number[], target: ShaderTarget) {
  const lowered = lowerProgram(QuadShading, target.capabilities);
  return evaluateExpr(lowered.fragment.color, {
    varyings: new Map([
      ["color", color],
      ["texCoord", [0.5, 0.5]],
    ]),
    sample: () => [texel[0], texel[1], texel[2], texel[3]],
  });
}

function assertClose(actual: ShaderValue, expected: readonly number[], epsilon: number): void {
  assert.ok(typeof actual !== "number", "expected a vector");
  assert.equal(actual.length, expected.length);
  actual.forEach((value, i) => {
    assert.ok(
      Math.abs(value - expected[i]) <= epsilon,
      `component ${i}: expected ${expected[i]}, got ${value}`,
    );
  });
}

for (const target of SHADER_TARGETS) {
  describe(`quad color decode (${target.name})`, () => {
    it("decodes every channel value to v / 255 in RGBA order", () => {
      for (let v = 0; v <= 255; v++) {
        const packed = packRgba(v, 255 - v, (v * 7) % 256, (v * 13) % 256);
        assertClose(decode(packed, target), unpackRgba(packed), 1e-6);
      }
    });

    it("decodes full white and zero exactly", () => {
      assert.deepEqual(decode(0xffffffff, target), [1, 1, 1, 1]);
      assert.deepEqual(decode(0x00000000, target), [0, 0, 0, 0]);
    });

    it("keeps red in the most significant byte", () => {
      assert.deepEqual(decode(0xff000000, target), [1, 0, 0, 0]);
      assert.deepEqual(decode(0x000000ff, target), [0, 0, 0, 1]);
    });
  });

  describe(`quad fragment stage (${target.name})`, () => {
    it("returns the vertex color over a white texture", () => {
      const color = decode(packRgba(200, 100, 50, 255), target);
      assert.deepEqual(shadeFragment(color, [1, 1, 1, 1], target), color);
    });

    it("outputs zero alpha for a zero alpha byte whatever the color bytes", () => {
      for (const [r, g, b] of [
        [0, 0, 0],
        [255, 255, 255],
        [1, 128, 254],
        [200, 7, 99],
        [255, 0, 0],
      ]) {
        const output = shadeFragment(decode(packRgba(r, g, b, 0), target), [1, 1, 1, 1], target);
        assert.ok(typeof output !== "number");
        assert.equal(output[3], 0, `rgb (${r}, ${g}, ${b})`);
      }
    });

    it("modulates the texture channel by channel", () => {
      const output = shadeFragment([1, 0.5, 0.25, 1], [0.5, 0.5, 1, 0.75], target);
      assert.deepEqual(output, [0.5, 0.25, 0.25, 0.75]);
    });
  });
}

describe("quad vertex stage", () => {
  it("passes positions through an identity transform", () => {
    const lowered = lowerProgram(QuadShading, WGSL_TARGET.capabilities);
    const position = evaluateExpr(lowered.vertex.position, {
      attributes: new Map([["position", [0.25, -0.5]]]),
      uniforms: new Map([["transform", new Map([["matrix", Array.from(Matrix4.identity().toArray())]])]]),
    });
    assert.deepEqual(position, [0.25, -0.5, 0, 1]);
  });

  it("passes texture coordinates through unchanged", () => {
    const lowered = lowerProgram(QuadShading, GLSL_ES_300_TARGET.capabilities);
    assert.deepEqual(
      evaluateExpr(lowered.vertex.outputs.texCoord, {
        attributes: new Map([["texCoord", [0.125, 0.875]]]),
      }),
      [0.125, 0.875],
    );
  });
});

describe("generated quad sources", () => {
  it("emits one WGSL module with grouped bindings", () => {
    const { files, slots } = generateShaderSources(QuadShading, WGSL_TARGET);
    assert.deepEqual(
      files.map((f) => f.fileName),
      ["quad.wgsl"],
    );
    const source = files[0].source;
    assert.ok(source.includes("@group(0) @binding(0) var<uniform> transform: TransformUniforms;"));
    assert.ok(source.includes("@group(1) @binding(0) var colorTexture: texture_2d<f32>;"));
    assert.ok(source.includes("@group(1) @binding(1) var colorSampler: sampler;"));
    assert.ok(source.includes("  @location(2) color: u32,"));
    assert.deepEqual(
      slots.map((s) => [s.name, s.group, s.binding]),
      [
        ["transform", 0, 0],
        ["colorTexture", 1, 0],
        ["colorSampler", 1, 1],
      ],
    );
  });

  it("emits a vertex and a fragment shader for the legacy target", () => {
    const { files, slots } = generateShaderSources(QuadShading, GLSL_ES_300_TARGET);
    assert.deepEqual(
      files.map((f) => f.fileName),
      ["quad.vert", "quad.frag"],
    );
    assert.ok(files[0].source.includes("layout(location = 0) in vec2 a_position;"));
    assert.ok(files[1].source.includes("layout(location = 0) out vec4 fragColor;"));
    assert.deepEqual(
      slots.map((s) => [s.name, s.binding, s.combinedSampler]),
      [
        ["transform", 0, undefined],
        ["colorTexture", 0, "colorSampler"],
      ],
    );
  });

  it("honours the hex literal flag", () => {
    const decimal = withCapabilities(GLSL_ES_300_TARGET, { hexIntLiterals: false });
    const [hexVertex] = generateShaderSources(QuadShading, GLSL_ES_300_TARGET).files;
    const [decimalVertex] = generateShaderSources(QuadShading, decimal).files;
    assert.ok(hexVertex.source.includes("float(a_color & 0xffu) / 255.0"));
    assert.ok(decimalVertex.source.includes("float(a_color & 255u) / 255.0"));
  });
});
