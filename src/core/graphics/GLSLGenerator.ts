/**
 * Generates GLSL ES 3.00 (WebGL2) vertex and fragment sources from a
 * shading program.
 *
 * GLSL ES 3.00 has no binding qualifiers: uniform blocks and samplers are
 * matched to slots from the API side (see ShaderProgram.bindSlots).
 */

import { type StageName, stageFlag } from "./shading/BindingLayout";
import { type BindingSlot, resolveBindingSlots } from "./shading/BindingSlots";
import { type ExprDialect, printExpr } from "./shading/ExprPrinter";
import { lowerProgram } from "./shading/lowerExpr";
import type { ShaderExpr } from "./shading/ShaderExpr";
import type { ShadingProgram } from "./shading/ShadingProgram";
import type { ShaderTarget } from "./shading/ShaderTarget";
import type { ShaderType } from "./shading/ShaderTypes";
import type { UniformStructLayout } from "./UniformStruct";

export interface GLSLSources {
  readonly vertex: string;
  readonly fragment: string;
}

export const GLSL_FRAGMENT_OUTPUT = "fragColor";

const GLSL_TYPES: Record<ShaderType, string> = {
  f32: "float",
  u32: "uint",
  vec2f: "vec2",
  vec4f: "vec4",
  mat4x4f: "mat4",
};

/** GLSL identifier of a vertex attribute */
export const glslAttributeName = (name: string) => `a_${name}`;
/** GLSL identifier of a varying */
export const glslVaryingName = (name: string) => `v_${name}`;
/** GLSL identifier of a uniform block instance or sampler uniform */
export const glslUniformName = (name: string) => `u_${name}`;

const glslDialect: ExprDialect = {
  typeName: (type) => GLSL_TYPES[type],
  reference: (expr) => {
    switch (expr.kind) {
      case "attribute":
        return glslAttributeName(expr.name);
      case "varying":
        return glslVaryingName(expr.name);
      case "uniform":
        return `${glslUniformName(expr.binding)}.${expr.field}`;
    }
  },
  toFloat: (value) => `float(${value})`,
  sample: (texture, coord) => `texture(${glslUniformName(texture)}, ${coord})`,
  unpackUnorm4x8: (value) => `unpackUnorm4x8(${value})`,
};

const SAMPLER_PREFIX = {
  float: "",
  "unfilterable-float": "",
  sint: "i",
  uint: "u",
} as const;

function uniformBlock(struct: UniformStructLayout, instanceName: string): string {
  const fields = struct.layout.map((field) => `  ${GLSL_TYPES[field.type]} ${field.name};`);
  return [`layout(std140) uniform ${struct.name} {`, ...fields, `} ${instanceName};`].join("\n");
}

function header(): string[] {
  // sampler2D defaults to lowp in fragment shaders
  return ["#version 300 es", "precision highp float;", "precision highp sampler2D;"];
}

function resourceDeclarations(
  program: ShadingProgram,
  slots: readonly BindingSlot[],
  stage: StageName,
): string[] {
  const flag = stageFlag(stage);
  const declarations: string[] = [];

  program.bindGroups.forEach((bindings) => {
    for (const [name, definition] of Object.entries(bindings)) {
      const slot = slots.find((s) => s.name === name);
      if (!slot || (slot.visibility & flag) === 0) continue;
      if (definition.type === "uniform") {
        declarations.push(uniformBlock(definition.struct, glslUniformName(name)));
      } else if (definition.type === "texture") {
        declarations.push(
          `uniform ${SAMPLER_PREFIX[definition.sampleType ?? "float"]}sampler2D ${glslUniformName(name)};`,
        );
      }
    }
  });

  return declarations;
}

/**
 * Generate GLSL ES 3.00 sources for a program.
 *
 * The target must use the unified binding model without separate samplers,
 * and cannot claim unpackUnorm4x8 (GLSL ES 3.10 and later).
 */
export function generateGLSL(program: ShadingProgram, target: ShaderTarget): GLSLSources {
  if (target.language !== "glsl-es-300") {
    throw new Error(`generateGLSL cannot emit for ${target.language}`);
  }
  if (target.bindingModel !== "unified" || target.capabilities.separateSamplers) {
    throw new Error(
      "GLSL ES 3.00 needs the unified binding model with combined samplers",
    );
  }
  if (target.capabilities.unpackUnorm4x8) {
    throw new Error("GLSL ES 3.00 has no unpackUnorm4x8 builtin");
  }

  const slots = resolveBindingSlots(program.bindGroups, target);
  const lowered = lowerProgram(program, target.capabilities);
  const print = (e: ShaderExpr) => printExpr(e, glslDialect, target.capabilities);
  const varyingNames = Object.keys(program.varyings);
  const section = (lines: string[]) => lines.join("\n");

  const vertex = [
    section(header()),
    section(resourceDeclarations(program, slots, "vertex")),
    section(
      program.vertexLayout.attributes.map(
        (attr) =>
          `layout(location = ${attr.location}) in ${GLSL_TYPES[attr.shaderType]} ${glslAttributeName(attr.name)};`,
      ),
    ),
    section(
      varyingNames.map(
        (name) => `out ${GLSL_TYPES[program.varyings[name]]} ${glslVaryingName(name)};`,
      ),
    ),
    section([
      "void main() {",
      `  gl_Position = ${print(lowered.vertex.position)};`,
      ...varyingNames.map(
        (name) => `  ${glslVaryingName(name)} = ${print(lowered.vertex.outputs[name])};`,
      ),
      "}",
    ]),
  ];

  const fragment = [
    section(header()),
    section(resourceDeclarations(program, slots, "fragment")),
    section(
      varyingNames.map(
        (name) => `in ${GLSL_TYPES[program.varyings[name]]} ${glslVaryingName(name)};`,
      ),
    ),
    `layout(location = 0) out vec4 ${GLSL_FRAGMENT_OUTPUT};`,
    section([
      "void main() {",
      `  ${GLSL_FRAGMENT_OUTPUT} = ${print(lowered.fragment.color)};`,
      "}",
    ]),
  ];

  const join = (parts: string[]) => parts.filter(Boolean).join("\n\n") + "\n";
  return { vertex: join(vertex), fragment: join(fragment) };
}
