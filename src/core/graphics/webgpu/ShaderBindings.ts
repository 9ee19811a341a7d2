/**
 * WebGPU side of the binding layout.
 *
 * Bind group layout entries and WGSL declarations are both written from the
 * located bindings, so the group and binding indices always agree.
 */

import {
  type BindingDefinition,
  type BindingsDefinition,
  type LocatedBinding,
  type TextureBinding,
  bindingVisibility,
  locateBindings,
} from "../shading/BindingLayout";

type TextureSampleType = NonNullable<TextureBinding["sampleType"]>;

const WGSL_TEXEL_TYPES: Record<TextureSampleType, string> = {
  float: "f32",
  "unfilterable-float": "f32",
  sint: "i32",
  uint: "u32",
};

function resourceLayout(
  definition: BindingDefinition,
): Omit<GPUBindGroupLayoutEntry, "binding" | "visibility"> {
  switch (definition.type) {
    case "uniform":
      return {
        buffer: { type: "uniform", minBindingSize: definition.struct.byteSize },
      };
    case "texture":
      return {
        texture: {
          sampleType: definition.sampleType ?? "float",
          viewDimension: "2d",
          multisampled: false,
        },
      };
    case "sampler":
      return { sampler: { type: definition.samplerType ?? "filtering" } };
  }
}

export function createBindGroupLayoutEntry({
  binding,
  definition,
}: LocatedBinding): GPUBindGroupLayoutEntry {
  return {
    binding,
    visibility: bindingVisibility(definition),
    ...resourceLayout(definition),
  };
}

/** Layout entries for one group of a program's bind groups */
export function createBindGroupLayoutEntries(
  bindGroups: readonly BindingsDefinition[],
  group: number,
): GPUBindGroupLayoutEntry[] {
  return locateBindings(bindGroups)
    .filter((located) => located.group === group)
    .map(createBindGroupLayoutEntry);
}

export function wgslBindingDeclaration({
  name,
  group,
  binding,
  definition,
}: LocatedBinding): string {
  let variable: string;
  switch (definition.type) {
    case "uniform":
      variable = `var<uniform> ${name}: ${definition.struct.name}`;
      break;
    case "texture":
      variable = `var ${name}: texture_2d<${WGSL_TEXEL_TYPES[definition.sampleType ?? "float"]}>`;
      break;
    case "sampler":
      variable = `var ${name}: sampler`;
      break;
  }
  return `@group(${group}) @binding(${binding}) ${variable};`;
}

/**
 * WGSL declarations for every binding, one block per non-empty group.
 *
 * @example
 * generateWGSLBindings(QUAD_BIND_GROUPS);
 * // @group(0) @binding(0) var<uniform> transform: TransformUniforms;
 * //
 * // @group(1) @binding(0) var colorTexture: texture_2d<f32>;
 * // @group(1) @binding(1) var colorSampler: sampler;
 */
export function generateWGSLBindings(bindGroups: readonly BindingsDefinition[]): string {
  const located = locateBindings(bindGroups);
  return bindGroups
    .map((_, group) =>
      located
        .filter((l) => l.group === group)
        .map(wgslBindingDeclaration)
        .join("\n"),
    )
    .filter(Boolean)
    .join("\n\n");
}
