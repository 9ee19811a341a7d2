import { generateGLSL } from "../GLSLGenerator";
import { generateWGSL } from "../webgpu/WGSLGenerator";
import { type BindingSlot, resolveBindingSlots } from "./BindingSlots";
import type { ShadingProgram } from "./ShadingProgram";
import type { ShaderTarget } from "./ShaderTarget";

export interface GeneratedFile {
  /** File name, e.g. "quad.wgsl" or "quad.vert" */
  readonly fileName: string;
  readonly source: string;
}

export interface GeneratedShaderSources {
  readonly target: ShaderTarget;
  readonly files: readonly GeneratedFile[];
  /** Where each binding lives on this target */
  readonly slots: readonly BindingSlot[];
}

/** Generate every source file a target needs for a program. */
export function generateShaderSources(
  program: ShadingProgram,
  target: ShaderTarget,
): GeneratedShaderSources {
  const slots = resolveBindingSlots(program.bindGroups, target);

  switch (target.language) {
    case "wgsl":
      return {
        target,
        slots,
        files: [{ fileName: `${program.name}.wgsl`, source: generateWGSL(program, target) }],
      };
    case "glsl-es-300": {
      const { vertex, fragment } = generateGLSL(program, target);
      return {
        target,
        slots,
        files: [
          { fileName: `${program.name}.vert`, source: vertex },
          { fileName: `${program.name}.frag`, source: fragment },
        ],
      };
    }
  }
}
