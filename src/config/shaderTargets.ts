import {
  type BackendCapabilities,
  type ShaderTarget,
  withCapabilities,
} from "../core/graphics/shading/ShaderTarget";

/** WebGPU: grouped bindings, separate samplers, depth in [0, 1] */
export const WGSL_TARGET: ShaderTarget = {
  name: "wgsl",
  language: "wgsl",
  capabilities: {
    hexIntLiterals: true,
    unpackUnorm4x8: true,
    separateSamplers: true,
  },
  bindingModel: "grouped",
  clip: {
    depthRange: "zero-to-one",
    framebufferOrigin: "top-left",
  },
};

/**
 * WebGL2 (legacy path): one binding space, texture and sampler combined in a
 * sampler2D, depth in [-1, 1], bottom-left framebuffer origin.
 * GLSL ES 3.00 has no unpackUnorm4x8 (that arrived in 3.10).
 */
export const GLSL_ES_300_TARGET: ShaderTarget = {
  name: "glsl",
  language: "glsl-es-300",
  capabilities: {
    hexIntLiterals: true,
    unpackUnorm4x8: false,
    separateSamplers: false,
  },
  bindingModel: "unified",
  clip: {
    depthRange: "negative-one-to-one",
    framebufferOrigin: "bottom-left",
  },
};

export const SHADER_TARGETS: readonly ShaderTarget[] = [
  WGSL_TARGET,
  GLSL_ES_300_TARGET,
];

export function getShaderTarget(name: string): ShaderTarget {
  const target = SHADER_TARGETS.find((t) => t.name === name);
  if (!target) {
    throw new Error(
      `Unknown shader target "${name}" (expected one of: ${SHADER_TARGETS.map((t) => t.name).join(", ")})`,
    );
  }
  return target;
}

/** Capability flags a caller may force on or off; unset flags keep the target's value */
export interface CapabilityOverrides {
  readonly hexIntLiterals?: boolean;
  readonly unpackUnorm4x8?: boolean;
}

/**
 * Targets by name ("all" for every target), with capability overrides
 * applied to each.
 */
export function selectShaderTargets(
  name: string,
  overrides: CapabilityOverrides = {},
): ShaderTarget[] {
  const targets = name === "all" ? [...SHADER_TARGETS] : [getShaderTarget(name)];
  const flags: Partial<BackendCapabilities> = {
    ...(overrides.hexIntLiterals !== undefined && { hexIntLiterals: overrides.hexIntLiterals }),
    ...(overrides.unpackUnorm4x8 !== undefined && { unpackUnorm4x8: overrides.unpackUnorm4x8 }),
  };
  return targets.map((target) => withCapabilities(target, flags));
}
