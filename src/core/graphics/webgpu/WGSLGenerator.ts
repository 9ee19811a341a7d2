/**
 * Generates a WGSL module (vertex + fragment entry points) from a shading
 * program.
 */

import type { UniformStructLayout } from "../UniformStruct";
import { locateBindings } from "../shading/BindingLayout";
import { resolveBindingSlots } from "../shading/BindingSlots";
import { type ExprDialect, printExpr } from "../shading/ExprPrinter";
import { lowerProgram } from "../shading/lowerExpr";
import type { ShaderExpr } from "../shading/ShaderExpr";
import type { ShadingProgram } from "../shading/ShadingProgram";
import type { ShaderTarget } from "../shading/ShaderTarget";
import type { ShaderType } from "../shading/ShaderTypes";
import { generateWGSLBindings } from "./ShaderBindings";

export const WGSL_VERTEX_ENTRY = "vs_main";
export const WGSL_FRAGMENT_ENTRY = "fs_main";

const WGSL_TYPES: Record<ShaderType, string> = {
  f32: "f32",
  u32: "u32",
  vec2f: "vec2<f32>",
  vec4f: "vec4<f32>",
  mat4x4f: "mat4x4<f32>",
};

function wgslStruct(struct: UniformStructLayout): string {
  const fields = struct.layout.map((field) => `  ${field.name}: ${WGSL_TYPES[field.type]},`);
  return [`struct ${struct.name} {`, ...fields, "}"].join("\n");
}

function createWGSLDialect(samplerOf: ReadonlyMap<string, string>): ExprDialect {
  return {
    typeName: (type) => WGSL_TYPES[type],
    reference: (expr) => {
      switch (expr.kind) {
        case "attribute":
        case "varying":
          return `input.${expr.name}`;
        case "uniform":
          return `${expr.binding}.${expr.field}`;
      }
    },
    toFloat: (value) => `f32(${value})`,
    sample: (texture, coord) => {
      const sampler = samplerOf.get(texture);
      if (!sampler) throw new Error(`Texture "${texture}" has no sampler`);
      return `textureSample(${texture}, ${sampler}, ${coord})`;
    },
    unpackUnorm4x8: (value) => `unpack4x8unorm(${value})`,
  };
}

/**
 * Generate the WGSL module for a program.
 *
 * The target must use the grouped binding model with separate samplers;
 * expressions are lowered with the target's capabilities first.
 */
export function generateWGSL(program: ShadingProgram, target: ShaderTarget): string {
  if (target.language !== "wgsl") {
    throw new Error(`generateWGSL cannot emit for ${target.language}`);
  }
  // Validates that the layout fits the target's binding model
  resolveBindingSlots(program.bindGroups, target);

  const lowered = lowerProgram(program, target.capabilities);
  const located = locateBindings(program.bindGroups);
  const samplerOf = new Map<string, string>();
  for (const { name, definition } of located) {
    if (definition.type === "texture") samplerOf.set(name, definition.sampler);
  }

  const dialect = createWGSLDialect(samplerOf);
  const print = (e: ShaderExpr) => printExpr(e, dialect, target.capabilities);

  const sections: string[] = [];

  // Uniform structs, each once
  const structs = new Map<string, string>();
  for (const { definition } of located) {
    if (definition.type === "uniform") {
      structs.set(definition.struct.name, wgslStruct(definition.struct));
    }
  }
  sections.push(...structs.values());

  sections.push(generateWGSLBindings(program.bindGroups));

  const inputFields = program.vertexLayout.attributes.map(
    (attr) => `  @location(${attr.location}) ${attr.name}: ${WGSL_TYPES[attr.shaderType]},`,
  );
  sections.push(["struct VertexInput {", ...inputFields, "}"].join("\n"));

  const varyingNames = Object.keys(program.varyings);
  const outputFields = [
    "  @builtin(position) clipPosition: vec4<f32>,",
    ...varyingNames.map(
      (name, location) =>
        `  @location(${location}) ${name}: ${WGSL_TYPES[program.varyings[name]]},`,
    ),
  ];
  sections.push(["struct VertexOutput {", ...outputFields, "}"].join("\n"));

  const vertexBody = [
    "  var output: VertexOutput;",
    `  output.clipPosition = ${print(lowered.vertex.position)};`,
    ...varyingNames.map((name) => `  output.${name} = ${print(lowered.vertex.outputs[name])};`),
    "  return output;",
  ];
  sections.push(
    [
      "@vertex",
      `fn ${WGSL_VERTEX_ENTRY}(input: VertexInput) -> VertexOutput {`,
      ...vertexBody,
      "}",
    ].join("\n"),
  );

  sections.push(
    [
      "@fragment",
      `fn ${WGSL_FRAGMENT_ENTRY}(input: VertexOutput) -> @location(0) vec4<f32> {`,
      `  return ${print(lowered.fragment.color)};`,
      "}",
    ].join("\n"),
  );

  return sections.filter(Boolean).join("\n\n") + "\n";
}
