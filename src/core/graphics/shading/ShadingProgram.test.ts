/**
 * Run with: npx tsx --test src/core/graphics/shading/ShadingProgram.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { type ShadingProgramDef, defineShadingProgram, stageScope } from "./ShadingProgram";
import { attribute, float, sampleTexture, uniform, varying, vec4 } from "./ShaderExpr";
import { ShaderStage } from "./BindingLayout";
import { defineVertexLayout } from "./VertexLayout";
import { QuadShading } from "../../../ui/QuadShading";
import { TransformUniforms } from "../../../ui/QuadUniforms";

const layout = defineVertexLayout([
  { name: "position", format: "float32x2" },
  { name: "texCoord", format: "float32x2" },
]);

const valid: ShadingProgramDef = {
  name: "flat",
  vertexLayout: layout,
  bindGroups: [
    {
      transform: { type: "uniform", struct: TransformUniforms, visibility: ShaderStage.VERTEX },
      tex: { type: "texture", sampler: "smp", visibility: ShaderStage.FRAGMENT },
      smp: { type: "sampler", visibility: ShaderStage.FRAGMENT },
    },
  ],
  varyings: { uv: "vec2f" },
  vertex: {
    position: vec4(attribute("position"), float(0), float(1)),
    outputs: { uv: attribute("texCoord") },
  },
  fragment: { color: sampleTexture("tex", varying("uv")) },
};

describe("stageScope", () => {
  it("limits bindings to the stages that see them", () => {
    const vertex = stageScope(QuadShading, "vertex");
    const fragment = stageScope(QuadShading, "fragment");
    assert.deepEqual([...vertex.uniforms.keys()], ["transform"]);
    assert.deepEqual([...vertex.textures], []);
    assert.deepEqual([...fragment.uniforms.keys()], []);
    assert.deepEqual([...fragment.textures], ["colorTexture"]);
  });

  it("gives attributes to the vertex stage and varyings to the fragment stage", () => {
    assert.equal(stageScope(QuadShading, "vertex").attributes.get("color"), "u32");
    assert.equal(stageScope(QuadShading, "vertex").varyings.size, 0);
    assert.equal(stageScope(QuadShading, "fragment").attributes.size, 0);
    assert.equal(stageScope(QuadShading, "fragment").varyings.get("color"), "vec4f");
  });
});

describe("defineShadingProgram", () => {
  it("accepts a well-formed program", () => {
    const program = defineShadingProgram(valid);
    assert.equal(program.name, "flat");
    assert.ok(Object.isFrozen(program));
  });

  it("requires a vec4f position", () => {
    assert.throws(
      () =>
        defineShadingProgram({
          ...valid,
          vertex: { ...valid.vertex, position: attribute("position") },
        }),
      /Program "flat" vertex position must be vec4f, got vec2f/,
    );
  });

  it("requires every varying to be written with its type", () => {
    assert.throws(
      () => defineShadingProgram({ ...valid, vertex: { ...valid.vertex, outputs: {} } }),
      /Program "flat": varying "uv" is not written by the vertex stage/,
    );
    assert.throws(
      () =>
        defineShadingProgram({
          ...valid,
          vertex: { ...valid.vertex, outputs: { uv: float(1) } },
        }),
      /Program "flat" varying "uv" must be vec2f, got f32/,
    );
  });

  it("rejects outputs that are not declared varyings", () => {
    assert.throws(
      () =>
        defineShadingProgram({
          ...valid,
          vertex: { ...valid.vertex, outputs: { uv: attribute("texCoord"), extra: float(1) } },
        }),
      /Program "flat": vertex output "extra" is not a declared varying/,
    );
  });

  it("rejects bindings read from a stage that cannot see them", () => {
    assert.throws(
      () =>
        defineShadingProgram({
          ...valid,
          fragment: { color: uniform("transform", "matrix") },
        }),
      /Program "flat" fragment color: Unknown uniform binding "transform"/,
    );
  });

  it("rejects attributes in the fragment stage", () => {
    assert.throws(
      () =>
        defineShadingProgram({
          ...valid,
          fragment: { color: vec4(attribute("position"), float(0), float(1)) },
        }),
      /Program "flat" fragment color: Unknown attribute "position"/,
    );
  });
});
