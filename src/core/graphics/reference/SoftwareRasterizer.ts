/**
 * Software rasterizer for shading programs.
 *
 * Runs the lowered vertex stage per vertex, rasterizes triangle lists at
 * pixel centers and runs the lowered fragment stage per covered pixel. The
 * target's clip convention decides depth clipping and which way window rows
 * run, so two targets can be compared pixel for pixel.
 *
 * Not modelled: blending (fragments overwrite), depth testing, culling and
 * clipping against x/y planes. Triangles with a vertex at w <= 0 are dropped.
 */

import {
  type DepthRange,
  type FramebufferOrigin,
  isDepthInRange,
  ndcDepthToWindow,
  ndcToWindow,
} from "../ClipSpace";
import type { UniformStructLayout } from "../UniformStruct";
import { locateBindings } from "../shading/BindingLayout";
import { lowerProgram } from "../shading/lowerExpr";
import type { ShadingProgram } from "../shading/ShadingProgram";
import type { ShaderTarget } from "../shading/ShaderTarget";
import type { ShaderValue } from "../shading/ShaderTypes";
import { readVertexAttributes } from "../shading/VertexLayout";
import { type EvalEnv, type Texel, evaluateExpr } from "./ShaderInterpreter";
import type { SamplerState, SoftwareTexture } from "./SoftwareTexture";

/** Color and depth attachments stored in the backend's native row order */
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly origin: FramebufferOrigin;
  /** RGBA floats per pixel, native row order */
  readonly color: Float32Array;
  /** Window depth per pixel, native row order */
  readonly depth: Float32Array;

  constructor(width: number, height: number, origin: FramebufferOrigin) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new Error(`Invalid framebuffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.origin = origin;
    this.color = new Float32Array(width * height * 4);
    this.depth = new Float32Array(width * height).fill(1);
  }

  clear(rgba: Texel = [0, 0, 0, 0]): void {
    for (let i = 0; i < this.width * this.height; i++) {
      this.color.set(rgba, i * 4);
    }
    this.depth.fill(1);
  }

  /** Storage index of a pixel addressed with row 0 at the top */
  private index(x: number, row: number): number {
    if (x < 0 || x >= this.width || row < 0 || row >= this.height) {
      throw new Error(`Pixel (${x}, ${row}) is outside the ${this.width}x${this.height} framebuffer`);
    }
    const nativeRow = this.origin === "top-left" ? row : this.height - 1 - row;
    return nativeRow * this.width + x;
  }

  /** Color at (x, row), row 0 being the top of the image on every backend */
  pixel(x: number, row: number): Texel {
    const i = this.index(x, row) * 4;
    const c = this.color;
    return [c[i], c[i + 1], c[i + 2], c[i + 3]];
  }

  /** Window depth at (x, row), row 0 at the top */
  depthAt(x: number, row: number): number {
    return this.depth[this.index(x, row)];
  }

  /** Write a fragment at native window coordinates */
  writeNative(x: number, nativeRow: number, rgba: readonly number[], depth: number): void {
    const i = nativeRow * this.width + x;
    this.color.set(rgba, i * 4);
    this.depth[i] = depth;
  }
}

export interface DrawCall {
  readonly program: ShadingProgram;
  readonly target: ShaderTarget;
  readonly vertices: ArrayBuffer;
  /** Triangle list indices; defaults to every vertex in order */
  readonly indices?: readonly number[];
  /** Field values per uniform binding (see readUniformValues) */
  readonly uniforms?: ReadonlyMap<string, ReadonlyMap<string, ShaderValue>>;
  readonly textures?: ReadonlyMap<string, SoftwareTexture>;
  readonly samplers?: ReadonlyMap<string, SamplerState>;
}

/** Field values of an uploaded uniform buffer, as the shader reads them */
export function readUniformValues(
  struct: UniformStructLayout,
  buffer: ArrayBuffer,
): Map<string, ShaderValue> {
  if (buffer.byteLength < struct.byteSize) {
    throw new Error(`${struct.name} needs ${struct.byteSize} bytes, got ${buffer.byteLength}`);
  }
  const floats = new Float32Array(buffer);
  const words = new Uint32Array(buffer);
  const values = new Map<string, ShaderValue>();
  for (const field of struct.layout) {
    const count = field.byteSize / 4;
    const start = field.byteOffset / 4;
    const source = field.type === "u32" ? words : floats;
    const components = Array.from(source.subarray(start, start + count));
    values.set(field.name, count === 1 ? components[0] : components);
  }
  return values;
}

interface ShadedVertex {
  /** Window x/y in native row order */
  readonly x: number;
  readonly y: number;
  readonly zNdc: number;
  readonly w: number;
  readonly varyings: ReadonlyMap<string, ShaderValue>;
}

function asVec4(value: ShaderValue): readonly number[] {
  if (typeof value === "number" || value.length !== 4) {
    throw new Error("Stage output must be a vec4");
  }
  return value;
}

function edge(ax: number, ay: number, bx: number, by: number, px: number, py: number): number {
  return (bx - ax) * (py - ay) - (by - ay) * (px - ax);
}

/** Weighted sum of per-vertex values, component-wise */
function interpolate(values: readonly ShaderValue[], weights: readonly number[]): ShaderValue {
  const first = values[0];
  if (typeof first === "number") {
    return values.reduce<number>(
      (sum, v, i) => Math.fround(sum + (typeof v === "number" ? v : v[0]) * weights[i]),
      0,
    );
  }
  return first.map((_, c) =>
    values.reduce<number>(
      (sum, v, i) => Math.fround(sum + (typeof v === "number" ? v : v[c]) * weights[i]),
      0,
    ),
  );
}

/**
 * Draw a triangle list into the framebuffer.
 *
 * Coverage: a pixel is covered when its center lies inside the triangle or
 * on any of its edges; both windings are accepted.
 */
export function drawTriangles(framebuffer: Framebuffer, draw: DrawCall): void {
  const { program, target } = draw;
  if (framebuffer.origin !== target.clip.framebufferOrigin) {
    throw new Error(
      `Framebuffer origin ${framebuffer.origin} does not match target "${target.name}"`,
    );
  }

  const lowered = lowerProgram(program, target.capabilities);
  const samplerOf = new Map<string, string>();
  for (const { name, definition } of locateBindings(program.bindGroups)) {
    if (definition.type === "texture") samplerOf.set(name, definition.sampler);
  }

  const sample = (textureName: string, u: number, v: number): Texel => {
    const texture = draw.textures?.get(textureName);
    const samplerName = samplerOf.get(textureName);
    const sampler = samplerName === undefined ? undefined : draw.samplers?.get(samplerName);
    if (!texture || !sampler) {
      throw new Error(`No texture or sampler bound for "${textureName}"`);
    }
    return texture.sample(u, v, sampler);
  };

  const { stride } = program.vertexLayout;
  if (draw.vertices.byteLength % stride !== 0) {
    throw new Error(
      `Vertex buffer of ${draw.vertices.byteLength} bytes is not a whole number of ${stride}-byte vertices`,
    );
  }
  const vertexCount = draw.vertices.byteLength / stride;
  const indices = draw.indices ?? Array.from({ length: vertexCount }, (_, i) => i);
  if (indices.length % 3 !== 0) {
    throw new Error(`Triangle list needs a multiple of 3 indices, got ${indices.length}`);
  }

  const cache = new Map<number, ShadedVertex>();
  const shade = (index: number): ShadedVertex => {
    const cached = cache.get(index);
    if (cached) return cached;

    const env: EvalEnv = {
      attributes: readVertexAttributes(program.vertexLayout, draw.vertices, index),
      uniforms: draw.uniforms,
    };
    const [cx, cy, cz, cw] = asVec4(evaluateExpr(lowered.vertex.position, env));
    const varyings = new Map<string, ShaderValue>();
    for (const name of Object.keys(program.varyings)) {
      varyings.set(name, evaluateExpr(lowered.vertex.outputs[name], env));
    }
    const [x, y] = ndcToWindow(
      cx / cw,
      cy / cw,
      framebuffer.width,
      framebuffer.height,
      target.clip.framebufferOrigin,
    );
    const shaded = { x, y, zNdc: cz / cw, w: cw, varyings };
    cache.set(index, shaded);
    return shaded;
  };

  for (let t = 0; t < indices.length; t += 3) {
    const tri = [shade(indices[t]), shade(indices[t + 1]), shade(indices[t + 2])];
    if (tri.some((v) => v.w <= 0)) continue;
    rasterizeTriangle(framebuffer, tri, target.clip.depthRange, (varyings) =>
      asVec4(
        evaluateExpr(lowered.fragment.color, { uniforms: draw.uniforms, varyings, sample }),
      ),
    );
  }
}

function rasterizeTriangle(
  framebuffer: Framebuffer,
  [v0, v1, v2]: readonly ShadedVertex[],
  depthRange: DepthRange,
  shadeFragment: (varyings: ReadonlyMap<string, ShaderValue>) => readonly number[],
): void {
  const area = edge(v0.x, v0.y, v1.x, v1.y, v2.x, v2.y);
  if (area === 0) return;

  const minX = Math.max(0, Math.floor(Math.min(v0.x, v1.x, v2.x)));
  const maxX = Math.min(framebuffer.width - 1, Math.ceil(Math.max(v0.x, v1.x, v2.x)));
  const minY = Math.max(0, Math.floor(Math.min(v0.y, v1.y, v2.y)));
  const maxY = Math.min(framebuffer.height - 1, Math.ceil(Math.max(v0.y, v1.y, v2.y)));
  const names = [...v0.varyings.keys()];

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5;
      const py = y + 0.5;
      const e0 = edge(v1.x, v1.y, v2.x, v2.y, px, py);
      const e1 = edge(v2.x, v2.y, v0.x, v0.y, px, py);
      const e2 = edge(v0.x, v0.y, v1.x, v1.y, px, py);
      const inside =
        area > 0 ? e0 >= 0 && e1 >= 0 && e2 >= 0 : e0 <= 0 && e1 <= 0 && e2 <= 0;
      if (!inside) continue;

      const b = [e0 / area, e1 / area, e2 / area];
      const zNdc = b[0] * v0.zNdc + b[1] * v1.zNdc + b[2] * v2.zNdc;
      if (!isDepthInRange(zNdc, depthRange)) continue;

      // Perspective-correct weights
      const pw = [b[0] / v0.w, b[1] / v1.w, b[2] / v2.w];
      const sum = pw[0] + pw[1] + pw[2];
      const weights = pw.map((w) => w / sum);

      const varyings = new Map<string, ShaderValue>();
      for (const name of names) {
        const values = [v0, v1, v2].map((v) => {
          const value = v.varyings.get(name);
          if (value === undefined) throw new Error(`Varying "${name}" was not written`);
          return value;
        });
        varyings.set(name, interpolate(values, weights));
      }

      framebuffer.writeNative(x, y, shadeFragment(varyings), ndcDepthToWindow(zNdc, depthRange));
    }
  }
}
