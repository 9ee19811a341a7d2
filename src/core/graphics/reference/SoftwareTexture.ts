/**
 * RGBA8 texture and sampler for the CPU reference.
 * Sampler vocabulary follows WebGPU's GPUSamplerDescriptor.
 */

import type { Texel } from "./ShaderInterpreter";

export type AddressMode = "clamp-to-edge" | "repeat" | "mirror-repeat";
export type FilterMode = "nearest" | "linear";

export interface SamplerState {
  readonly addressModeU: AddressMode;
  readonly addressModeV: AddressMode;
  readonly magFilter: FilterMode;
  readonly minFilter: FilterMode;
}

/** Clamp-to-edge, linear filtering */
export const UI_SAMPLER: SamplerState = {
  addressModeU: "clamp-to-edge",
  addressModeV: "clamp-to-edge",
  magFilter: "linear",
  minFilter: "linear",
};

export const NEAREST_SAMPLER: SamplerState = {
  ...UI_SAMPLER,
  magFilter: "nearest",
  minFilter: "nearest",
};

function wrap(index: number, size: number, mode: AddressMode): number {
  switch (mode) {
    case "clamp-to-edge":
      return Math.min(Math.max(index, 0), size - 1);
    case "repeat":
      return ((index % size) + size) % size;
    case "mirror-repeat": {
      const period = size * 2;
      const i = ((index % period) + period) % period;
      return i < size ? i : period - 1 - i;
    }
  }
}

export class SoftwareTexture {
  readonly width: number;
  readonly height: number;
  /** RGBA bytes, rows top to bottom (first uploaded row is v = 0) */
  readonly data: Uint8Array;

  constructor(width: number, height: number, data?: Uint8Array) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new Error(`Invalid texture size ${width}x${height}`);
    }
    const byteLength = width * height * 4;
    if (data && data.length !== byteLength) {
      throw new Error(`Texture data must be ${byteLength} bytes, got ${data.length}`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8Array(byteLength);
  }

  /** A texture filled with one color (0-255 channels) */
  static solid(width: number, height: number, rgba: Texel): SoftwareTexture {
    const texture = new SoftwareTexture(width, height);
    for (let i = 0; i < width * height; i++) {
      texture.data.set(rgba, i * 4);
    }
    return texture;
  }

  /** Texel at integer coordinates, normalized to 0-1 */
  texel(x: number, y: number): Texel {
    const i = (y * this.width + x) * 4;
    const d = this.data;
    return [d[i] / 255, d[i + 1] / 255, d[i + 2] / 255, d[i + 3] / 255];
  }

  setTexel(x: number, y: number, rgba: Texel): void {
    this.data.set(rgba, (y * this.width + x) * 4);
  }

  /**
   * Sample at normalized coordinates. There are no mip levels, so the
   * magnification filter is used.
   */
  sample(u: number, v: number, sampler: SamplerState): Texel {
    const { width, height } = this;
    const fetch = (x: number, y: number) =>
      this.texel(
        wrap(x, width, sampler.addressModeU),
        wrap(y, height, sampler.addressModeV),
      );

    if (sampler.magFilter === "nearest") {
      return fetch(Math.floor(u * width), Math.floor(v * height));
    }

    const x = u * width - 0.5;
    const y = v * height - 0.5;
    const x0 = Math.floor(x);
    const y0 = Math.floor(y);
    const fx = x - x0;
    const fy = y - y0;
    const t00 = fetch(x0, y0);
    const t10 = fetch(x0 + 1, y0);
    const t01 = fetch(x0, y0 + 1);
    const t11 = fetch(x0 + 1, y0 + 1);

    const mix = (c: number) =>
      (t00[c] * (1 - fx) + t10[c] * fx) * (1 - fy) +
      (t01[c] * (1 - fx) + t11[c] * fx) * fy;
    return [mix(0), mix(1), mix(2), mix(3)];
  }
}
