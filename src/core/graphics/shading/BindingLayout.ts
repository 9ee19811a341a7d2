/**
 * Declarative binding layout.
 *
 * A program lists its resources as bind groups of named bindings. The
 * group's position in the list is its group index and a binding's position
 * within its group is its binding index. Every backend generator reads the
 * same description; BindingSlots maps it onto a backend's binding model.
 */

import type { UniformStructLayout } from "../UniformStruct";

/** Stage visibility bits, same values as WebGPU's GPUShaderStage */
export const ShaderStage = {
  VERTEX: 0x1,
  FRAGMENT: 0x2,
} as const;

export type ShaderStageFlags = number;

export type StageName = "vertex" | "fragment";

export function stageFlag(stage: StageName): ShaderStageFlags {
  return stage === "vertex" ? ShaderStage.VERTEX : ShaderStage.FRAGMENT;
}

/**
 * Binding type for uniform buffers.
 */
export type UniformBinding = {
  type: "uniform";
  /** Struct read through this binding */
  struct: UniformStructLayout;
  visibility?: ShaderStageFlags;
};

/**
 * Binding type for sampled 2D textures.
 */
export type TextureBinding = {
  type: "texture";
  /** Name of the sampler binding this texture is read through */
  sampler: string;
  sampleType?: "float" | "unfilterable-float" | "sint" | "uint";
  visibility?: ShaderStageFlags;
};

/**
 * Binding type for samplers.
 */
export type SamplerBinding = {
  type: "sampler";
  samplerType?: "filtering" | "non-filtering";
  visibility?: ShaderStageFlags;
};

/**
 * Union of all binding types.
 */
export type BindingDefinition = UniformBinding | TextureBinding | SamplerBinding;

/**
 * A record of named binding definitions. Key order is binding order.
 */
export type BindingsDefinition = Readonly<Record<string, BindingDefinition>>;

/** Visibility of a binding, defaulting to both stages */
export function bindingVisibility(definition: BindingDefinition): ShaderStageFlags {
  return definition.visibility ?? ShaderStage.VERTEX | ShaderStage.FRAGMENT;
}

/** A binding with its logical position */
export interface LocatedBinding {
  readonly name: string;
  readonly group: number;
  readonly binding: number;
  readonly definition: BindingDefinition;
}

/**
 * Flatten bind groups into located bindings.
 * Throws if a binding name appears twice.
 */
export function locateBindings(
  bindGroups: readonly BindingsDefinition[],
): LocatedBinding[] {
  const seen = new Set<string>();
  const result: LocatedBinding[] = [];
  bindGroups.forEach((bindings, group) => {
    Object.keys(bindings).forEach((name, binding) => {
      if (seen.has(name)) {
        throw new Error(`Binding "${name}" is declared more than once`);
      }
      seen.add(name);
      result.push({ name, group, binding, definition: bindings[name] });
    });
  });
  return result;
}
