import type { ClipConvention } from "../ClipSpace";

export type ShaderLanguage = "wgsl" | "glsl-es-300";

/**
 * How a backend addresses resources.
 * - grouped: bind groups keep their logical group and binding indices
 * - unified: one binding space; each resource class is numbered from 0
 */
export type BindingModel = "grouped" | "unified";

/**
 * What a backend's shading language can express. Generators branch on these
 * flags only, never on the language name.
 */
export interface BackendCapabilities {
  /** Integer literals may be written in hexadecimal (0xffu) */
  readonly hexIntLiterals: boolean;
  /** Has a builtin unpacking four unorm bytes from a u32, least significant byte first */
  readonly unpackUnorm4x8: boolean;
  /** Textures and samplers are separate resources in shader code */
  readonly separateSamplers: boolean;
}

export interface ShaderTarget {
  readonly name: string;
  readonly language: ShaderLanguage;
  readonly capabilities: BackendCapabilities;
  readonly bindingModel: BindingModel;
  readonly clip: ClipConvention;
}

/** Derive a target with some capability flags overridden. */
export function withCapabilities(
  target: ShaderTarget,
  overrides: Partial<BackendCapabilities>,
): ShaderTarget {
  return {
    ...target,
    capabilities: { ...target.capabilities, ...overrides },
  };
}
