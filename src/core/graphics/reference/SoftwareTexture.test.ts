/**
 * Run with: npx tsx --test src/core/graphics/reference/SoftwareTexture.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  NEAREST_SAMPLER,
  type SamplerState,
  SoftwareTexture,
  UI_SAMPLER,
} from "./SoftwareTexture";

const RED = [255, 0, 0, 255] as const;
const GREEN = [0, 255, 0, 255] as const;
const BLUE = [0, 0, 255, 255] as const;
const WHITE = [255, 255, 255, 255] as const;

/** 2x2: red green / blue white */
function checker(): SoftwareTexture {
  const texture = new SoftwareTexture(2, 2);
  texture.setTexel(0, 0, RED);
  texture.setTexel(1, 0, GREEN);
  texture.setTexel(0, 1, BLUE);
  texture.setTexel(1, 1, WHITE);
  return texture;
}

const nearest = (mode: SamplerState["addressModeU"]): SamplerState => ({
  ...NEAREST_SAMPLER,
  addressModeU: mode,
  addressModeV: mode,
});

describe("SoftwareTexture", () => {
  it("samples the nearest texel", () => {
    const texture = checker();
    assert.deepEqual(texture.sample(0.25, 0.25, NEAREST_SAMPLER), [1, 0, 0, 1]);
    assert.deepEqual(texture.sample(0.75, 0.25, NEAREST_SAMPLER), [0, 1, 0, 1]);
    assert.deepEqual(texture.sample(0.25, 0.75, NEAREST_SAMPLER), [0, 0, 1, 1]);
  });

  it("blends the four neighbours with linear filtering", () => {
    assert.deepEqual(checker().sample(0.5, 0.5, UI_SAMPLER), [0.5, 0.5, 0.5, 1]);
  });

  it("returns texel centers unfiltered", () => {
    assert.deepEqual(checker().sample(0.25, 0.25, UI_SAMPLER), [1, 0, 0, 1]);
  });

  it("clamps coordinates to the edge", () => {
    const texture = checker();
    assert.deepEqual(texture.sample(-1, 0.25, nearest("clamp-to-edge")), [1, 0, 0, 1]);
    assert.deepEqual(texture.sample(2, 0.25, nearest("clamp-to-edge")), [0, 1, 0, 1]);
  });

  it("wraps with repeat", () => {
    assert.deepEqual(checker().sample(1.25, 0.25, nearest("repeat")), [1, 0, 0, 1]);
    assert.deepEqual(checker().sample(-0.25, 0.25, nearest("repeat")), [0, 1, 0, 1]);
  });

  it("reflects with mirror-repeat", () => {
    assert.deepEqual(checker().sample(1.25, 0.25, nearest("mirror-repeat")), [0, 1, 0, 1]);
    assert.deepEqual(checker().sample(1.75, 0.25, nearest("mirror-repeat")), [1, 0, 0, 1]);
  });

  it("fills a solid texture", () => {
    const texture = SoftwareTexture.solid(3, 2, [0, 51, 255, 255]);
    assert.deepEqual(texture.texel(2, 1), [0, 0.2, 1, 1]);
  });

  it("rejects data of the wrong length", () => {
    assert.throws(
      () => new SoftwareTexture(2, 2, new Uint8Array(8)),
      /Texture data must be 16 bytes, got 8/,
    );
    assert.throws(() => new SoftwareTexture(0, 2), /Invalid texture size 0x2/);
  });
});
