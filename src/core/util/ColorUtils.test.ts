/**
 * Unit tests for packed color helpers.
 *
 * Run with: npx tsx --test src/core/util/ColorUtils.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  hexToPacked,
  packRgba,
  packRgbaFloat,
  unpackRgba,
  unpackRgbaBytes,
} from "./ColorUtils";

describe("packRgba", () => {
  it("puts red in the most significant byte", () => {
    assert.equal(packRgba(0x12, 0x34, 0x56, 0x78), 0x12345678);
  });

  it("returns an unsigned value when red has its high bit set", () => {
    assert.equal(packRgba(255, 255, 255, 255), 0xffffffff);
    assert.ok(packRgba(200, 0, 0, 0) > 0);
  });

  it("clamps and rounds channel values", () => {
    assert.equal(packRgba(300, -4, 127.6, 0.2), 0xff008000);
  });
});

describe("unpackRgba", () => {
  it("decodes the extremes", () => {
    assert.deepEqual(unpackRgba(0xffffffff), [1, 1, 1, 1]);
    assert.deepEqual(unpackRgba(0x00000000), [0, 0, 0, 0]);
  });

  it("round-trips every channel value in RGBA order", () => {
    for (let v = 0; v < 256; v++) {
      const bytes = unpackRgbaBytes(packRgba(v, 255 - v, v ^ 0x5a, 255 - (v ^ 0x5a)));
      assert.deepEqual(bytes, [v, 255 - v, v ^ 0x5a, 255 - (v ^ 0x5a)]);
    }
  });
});

describe("conversions", () => {
  it("packs normalized channels", () => {
    assert.equal(packRgbaFloat([1, 0, 0.5, 1]), 0xff0080ff);
  });

  it("turns a hex tint into a packed color", () => {
    assert.equal(hexToPacked(0x336699), 0x336699ff);
    assert.equal(hexToPacked(0x336699, 0), 0x33669900);
  });
});
