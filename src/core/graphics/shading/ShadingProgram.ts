/**
 * A shading program: vertex layout, bindings, varyings and the two stages,
 * each stage written once as expression trees.
 */

import {
  type BindingsDefinition,
  type StageName,
  bindingVisibility,
  locateBindings,
  stageFlag,
} from "./BindingLayout";
import { type ExprScope, type ShaderExpr, typeOfExpr } from "./ShaderExpr";
import type { ShaderType } from "./ShaderTypes";
import type { VertexLayout } from "./VertexLayout";

/** Types a varying may have (interpolated floats only) */
export type VaryingType = "f32" | "vec2f" | "vec4f";

export interface ShadingProgramDef {
  /** Base name for generated files */
  readonly name: string;
  readonly vertexLayout: VertexLayout;
  readonly bindGroups: readonly BindingsDefinition[];
  /** Interpolated values; location i is the i-th entry */
  readonly varyings: Readonly<Record<string, VaryingType>>;
  readonly vertex: {
    /** Clip-space position */
    readonly position: ShaderExpr;
    /** One expression per declared varying */
    readonly outputs: Readonly<Record<string, ShaderExpr>>;
  };
  readonly fragment: {
    /** Color written to attachment 0 */
    readonly color: ShaderExpr;
  };
}

export type ShadingProgram = ShadingProgramDef;

/**
 * Names visible to one stage of a program. Bindings not visible to the
 * stage are left out; attributes are vertex-only and varyings fragment-only.
 */
export function stageScope(program: ShadingProgramDef, stage: StageName): ExprScope {
  const flag = stageFlag(stage);
  const uniforms = new Map<string, ReadonlyMap<string, ShaderType>>();
  const textures = new Set<string>();

  for (const { name, definition } of locateBindings(program.bindGroups)) {
    if ((bindingVisibility(definition) & flag) === 0) continue;
    if (definition.type === "uniform") {
      uniforms.set(
        name,
        new Map(
          definition.struct.layout.map((f): [string, ShaderType] => [f.name, f.type]),
        ),
      );
    } else if (definition.type === "texture") {
      textures.add(name);
    }
  }

  return {
    attributes:
      stage === "vertex"
        ? new Map(
            program.vertexLayout.attributes.map((a): [string, ShaderType] => [
              a.name,
              a.shaderType,
            ]),
          )
        : new Map<string, ShaderType>(),
    uniforms,
    varyings:
      stage === "fragment"
        ? new Map<string, ShaderType>(Object.entries(program.varyings))
        : new Map<string, ShaderType>(),
    textures,
  };
}

function expectType(
  what: string,
  expr: ShaderExpr,
  scope: ExprScope,
  expected: ShaderType,
): void {
  let actual: ShaderType;
  try {
    actual = typeOfExpr(expr, scope);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${what}: ${message}`);
  }
  if (actual !== expected) {
    throw new Error(`${what} must be ${expected}, got ${actual}`);
  }
}

/**
 * Validate a program definition.
 * Throws an Error naming the first problem found.
 */
export function defineShadingProgram(def: ShadingProgramDef): ShadingProgram {
  const prefix = `Program "${def.name}"`;
  locateBindings(def.bindGroups);

  const vertexScope = stageScope(def, "vertex");
  const fragmentScope = stageScope(def, "fragment");

  expectType(`${prefix} vertex position`, def.vertex.position, vertexScope, "vec4f");

  for (const [name, type] of Object.entries(def.varyings)) {
    const output = def.vertex.outputs[name];
    if (!output) {
      throw new Error(`${prefix}: varying "${name}" is not written by the vertex stage`);
    }
    expectType(`${prefix} varying "${name}"`, output, vertexScope, type);
  }
  for (const name of Object.keys(def.vertex.outputs)) {
    if (!(name in def.varyings)) {
      throw new Error(`${prefix}: vertex output "${name}" is not a declared varying`);
    }
  }

  expectType(`${prefix} fragment color`, def.fragment.color, fragmentScope, "vec4f");

  return Object.freeze({ ...def });
}
