/**
 * Target selection as the shader generator CLI uses it.
 *
 * Run with: npx tsx --test src/config/shaderTargets.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  GLSL_ES_300_TARGET,
  WGSL_TARGET,
  getShaderTarget,
  selectShaderTargets,
} from "./shaderTargets";

describe("getShaderTarget", () => {
  it("finds targets by name", () => {
    assert.equal(getShaderTarget("wgsl"), WGSL_TARGET);
    assert.equal(getShaderTarget("glsl"), GLSL_ES_300_TARGET);
  });

  it("lists the known names for an unknown one", () => {
    assert.throws(
      () => getShaderTarget("hlsl"),
      /Unknown shader target "hlsl" \(expected one of: wgsl, glsl\)/,
    );
  });
});

describe("selectShaderTargets", () => {
  it("selects every target for all, capabilities untouched", () => {
    const targets = selectShaderTargets("all");
    assert.deepEqual(
      targets.map((t) => t.name),
      ["wgsl", "glsl"],
    );
    assert.deepEqual(targets[0], WGSL_TARGET);
    assert.deepEqual(targets[1], GLSL_ES_300_TARGET);
  });

  it("selects a single target by name", () => {
    const [target] = selectShaderTargets("glsl");
    assert.equal(target.language, "glsl-es-300");
    assert.equal(target.bindingModel, "unified");
  });

  it("keeps a flag that is not overridden", () => {
    const [target] = selectShaderTargets("wgsl", {
      hexIntLiterals: undefined,
      unpackUnorm4x8: undefined,
    });
    assert.deepEqual(target.capabilities, WGSL_TARGET.capabilities);
  });

  it("turns hex literals off on every target", () => {
    const targets = selectShaderTargets("all", { hexIntLiterals: false });
    assert.deepEqual(
      targets.map((t) => t.capabilities.hexIntLiterals),
      [false, false],
    );
  });

  it("turns hex literals on", () => {
    const [target] = selectShaderTargets("glsl", { hexIntLiterals: true });
    assert.deepEqual(target.capabilities, {
      hexIntLiterals: true,
      unpackUnorm4x8: false,
      separateSamplers: false,
    });
  });

  it("switches the native unpack builtin off for WGSL", () => {
    const [target] = selectShaderTargets("wgsl", { unpackUnorm4x8: false });
    assert.deepEqual(target.capabilities, {
      hexIntLiterals: true,
      unpackUnorm4x8: false,
      separateSamplers: true,
    });
  });

  it("does not change the shared target constants", () => {
    selectShaderTargets("all", { hexIntLiterals: false, unpackUnorm4x8: false });
    assert.equal(WGSL_TARGET.capabilities.hexIntLiterals, true);
    assert.equal(WGSL_TARGET.capabilities.unpackUnorm4x8, true);
  });

  it("rejects an unknown target", () => {
    assert.throws(() => selectShaderTargets("metal"), /Unknown shader target "metal"/);
  });
});
