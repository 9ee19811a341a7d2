/**
 * WebGPU pipeline state for a shading program, as plain descriptors.
 *
 * Nothing here touches a device; the renderer passes these to
 * createBindGroupLayout / createSampler / createRenderPipeline along with the
 * shader module compiled from generateWGSL.
 */

import type { ShadingProgram } from "../shading/ShadingProgram";
import type { VertexLayout } from "../shading/VertexLayout";
import { createBindGroupLayoutEntries } from "./ShaderBindings";
import { WGSL_FRAGMENT_ENTRY, WGSL_VERTEX_ENTRY } from "./WGSLGenerator";

/** Straight alpha: src * a + dst * (1 - a), for color and alpha alike */
export const ALPHA_BLEND: GPUBlendState = {
  color: {
    srcFactor: "src-alpha",
    dstFactor: "one-minus-src-alpha",
    operation: "add",
  },
  alpha: {
    srcFactor: "src-alpha",
    dstFactor: "one-minus-src-alpha",
    operation: "add",
  },
};

export const UI_SAMPLER_DESCRIPTOR: GPUSamplerDescriptor = {
  magFilter: "linear",
  minFilter: "linear",
  mipmapFilter: "linear",
  addressModeU: "clamp-to-edge",
  addressModeV: "clamp-to-edge",
  addressModeW: "clamp-to-edge",
  label: "UI Sampler",
};

/** Quads may arrive in either winding once the y axis is flipped */
export const QUAD_PRIMITIVE: GPUPrimitiveState = {
  topology: "triangle-list",
  frontFace: "ccw",
  cullMode: "none",
};

export function createVertexBufferLayout(layout: VertexLayout): GPUVertexBufferLayout {
  return {
    arrayStride: layout.stride,
    stepMode: "vertex",
    attributes: layout.attributes.map((attr) => ({
      shaderLocation: attr.location,
      offset: attr.offset,
      format: attr.format,
    })),
  };
}

/** One bind group layout descriptor per group, in group order */
export function createBindGroupLayoutDescriptors(
  program: ShadingProgram,
): GPUBindGroupLayoutDescriptor[] {
  return program.bindGroups.map((_, group) => ({
    entries: createBindGroupLayoutEntries(program.bindGroups, group),
    label: `${program.name} Bind Group Layout ${group}`,
  }));
}

/** Render pipeline state minus the objects only a device can create */
export interface PipelineState {
  readonly vertex: Omit<GPUVertexState, "module">;
  readonly fragment: Omit<GPUFragmentState, "module">;
  readonly primitive: GPUPrimitiveState;
  readonly label: string;
}

export function createPipelineState(
  program: ShadingProgram,
  format: GPUTextureFormat,
): PipelineState {
  return {
    vertex: {
      entryPoint: WGSL_VERTEX_ENTRY,
      buffers: [createVertexBufferLayout(program.vertexLayout)],
    },
    fragment: {
      entryPoint: WGSL_FRAGMENT_ENTRY,
      targets: [{ format, blend: ALPHA_BLEND }],
    },
    primitive: QUAD_PRIMITIVE,
    label: `${program.name} Pipeline`,
  };
}
