/**
 * Maps the logical binding layout onto a backend's binding model.
 */

import {
  type BindingDefinition,
  type BindingsDefinition,
  type ShaderStageFlags,
  bindingVisibility,
  locateBindings,
} from "./BindingLayout";
import type { ShaderTarget } from "./ShaderTarget";

export interface BindingSlot {
  readonly name: string;
  readonly type: BindingDefinition["type"];
  readonly group: number;
  readonly binding: number;
  readonly visibility: ShaderStageFlags;
  /** Sampler folded into this texture slot, when samplers are not separate */
  readonly combinedSampler?: string;
}

/**
 * Resolve every binding to the slot it occupies on the target.
 *
 * Grouped targets keep logical indices. Unified targets put everything in
 * group 0 and number uniforms, textures and samplers each from 0; without
 * separate samplers a texture's sampler shares the texture's slot.
 */
export function resolveBindingSlots(
  bindGroups: readonly BindingsDefinition[],
  target: Pick<ShaderTarget, "bindingModel" | "capabilities">,
): BindingSlot[] {
  const located = locateBindings(bindGroups);
  const byName = new Map(
    located.map((b): [string, BindingDefinition] => [b.name, b.definition]),
  );
  const { separateSamplers } = target.capabilities;

  for (const { name, definition } of located) {
    if (definition.type === "texture") {
      const sampler = byName.get(definition.sampler);
      if (!sampler || sampler.type !== "sampler") {
        throw new Error(
          `Texture "${name}" refers to missing sampler "${definition.sampler}"`,
        );
      }
    }
  }

  if (target.bindingModel === "grouped") {
    if (!separateSamplers) {
      throw new Error("Grouped binding model requires separate samplers");
    }
    return located.map(({ name, group, binding, definition }) => ({
      name,
      type: definition.type,
      group,
      binding,
      visibility: bindingVisibility(definition),
    }));
  }

  const paired = new Set(
    located.flatMap(({ definition }) =>
      definition.type === "texture" ? [definition.sampler] : [],
    ),
  );
  const counters = { uniform: 0, texture: 0, sampler: 0 };
  const slots: BindingSlot[] = [];

  for (const { name, definition } of located) {
    if (definition.type === "sampler" && !separateSamplers) {
      if (!paired.has(name)) {
        throw new Error(`Sampler "${name}" is not used by any texture`);
      }
      continue;
    }

    let visibility = bindingVisibility(definition);
    let combinedSampler: string | undefined;
    if (definition.type === "texture" && !separateSamplers) {
      combinedSampler = definition.sampler;
      const sampler = byName.get(definition.sampler);
      if (sampler) visibility |= bindingVisibility(sampler);
    }

    slots.push({
      name,
      type: definition.type,
      group: 0,
      binding: counters[definition.type]++,
      visibility,
      ...(combinedSampler ? { combinedSampler } : {}),
    });
  }

  return slots;
}
