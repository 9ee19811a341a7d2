/**
 * Expression trees for shader stages.
 *
 * Stage logic is written once as a ShaderExpr tree. Backend generators print
 * it as WGSL or GLSL, and the CPU reference evaluates it, so every
 * representation reads the same formula.
 */

import {
  type ShaderType,
  componentCount,
  floatVectorType,
  isFloatVector,
} from "./ShaderTypes";

export type BinaryOp = "+" | "-" | "*" | "/" | ">>" | "&";

/** Per-vertex input attribute */
export interface AttributeExpr {
  readonly kind: "attribute";
  readonly name: string;
}

/** Field of a uniform struct binding */
export interface UniformExpr {
  readonly kind: "uniform";
  readonly binding: string;
  readonly field: string;
}

/** Interpolated value read by the fragment stage */
export interface VaryingExpr {
  readonly kind: "varying";
  readonly name: string;
}

export interface LiteralExpr {
  readonly kind: "literal";
  readonly type: "f32" | "u32";
  readonly value: number;
}

export interface BinaryExpr {
  readonly kind: "binary";
  readonly op: BinaryOp;
  readonly left: ShaderExpr;
  readonly right: ShaderExpr;
}

/** u32 to f32 conversion */
export interface ToFloatExpr {
  readonly kind: "toFloat";
  readonly value: ShaderExpr;
}

/** Float vector built from scalars and smaller vectors */
export interface ConstructExpr {
  readonly kind: "construct";
  readonly type: "vec2f" | "vec4f";
  readonly args: readonly ShaderExpr[];
}

export interface SwizzleExpr {
  readonly kind: "swizzle";
  readonly value: ShaderExpr;
  readonly components: string;
}

/** Sample a texture binding through its paired sampler */
export interface SampleExpr {
  readonly kind: "sample";
  readonly texture: string;
  readonly coord: ShaderExpr;
}

/**
 * Decode a packed RGBA color (R in the most significant byte).
 * High-level; lowerExpr replaces it before printing or evaluation.
 */
export interface UnpackColorExpr {
  readonly kind: "unpackColor";
  readonly value: ShaderExpr;
}

/**
 * Native unorm unpack: component i is byte i counted from the least
 * significant end, divided by 255. Only emitted for backends that have it.
 */
export interface UnpackUnorm4x8Expr {
  readonly kind: "unpackUnorm4x8";
  readonly value: ShaderExpr;
}

export type ShaderExpr =
  | AttributeExpr
  | UniformExpr
  | VaryingExpr
  | LiteralExpr
  | BinaryExpr
  | ToFloatExpr
  | ConstructExpr
  | SwizzleExpr
  | SampleExpr
  | UnpackColorExpr
  | UnpackUnorm4x8Expr;

// ============ Builders ============

export function attribute(name: string): AttributeExpr {
  return { kind: "attribute", name };
}

export function uniform(binding: string, field: string): UniformExpr {
  return { kind: "uniform", binding, field };
}

export function varying(name: string): VaryingExpr {
  return { kind: "varying", name };
}

export function float(value: number): LiteralExpr {
  if (!Number.isFinite(value)) {
    throw new Error(`f32 literal must be finite, got ${value}`);
  }
  return { kind: "literal", type: "f32", value };
}

export function uint(value: number): LiteralExpr {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`u32 literal out of range: ${value}`);
  }
  return { kind: "literal", type: "u32", value };
}

function binary(op: BinaryOp, left: ShaderExpr, right: ShaderExpr): BinaryExpr {
  return { kind: "binary", op, left, right };
}

export const add = (l: ShaderExpr, r: ShaderExpr) => binary("+", l, r);
export const sub = (l: ShaderExpr, r: ShaderExpr) => binary("-", l, r);
export const mul = (l: ShaderExpr, r: ShaderExpr) => binary("*", l, r);
export const div = (l: ShaderExpr, r: ShaderExpr) => binary("/", l, r);
export const shiftRight = (l: ShaderExpr, r: ShaderExpr) => binary(">>", l, r);
export const bitAnd = (l: ShaderExpr, r: ShaderExpr) => binary("&", l, r);

export function toFloat(value: ShaderExpr): ToFloatExpr {
  return { kind: "toFloat", value };
}

export function vec2(...args: ShaderExpr[]): ConstructExpr {
  return { kind: "construct", type: "vec2f", args };
}

export function vec4(...args: ShaderExpr[]): ConstructExpr {
  return { kind: "construct", type: "vec4f", args };
}

export function swizzle(value: ShaderExpr, components: string): SwizzleExpr {
  return { kind: "swizzle", value, components };
}

export function sampleTexture(texture: string, coord: ShaderExpr): SampleExpr {
  return { kind: "sample", texture, coord };
}

export function unpackColor(value: ShaderExpr): UnpackColorExpr {
  return { kind: "unpackColor", value };
}

export function unpackUnorm4x8(value: ShaderExpr): UnpackUnorm4x8Expr {
  return { kind: "unpackUnorm4x8", value };
}

// ============ Traversal ============

/**
 * Rebuild an expression bottom-up. `visit` sees each node after its
 * children have been transformed and returns the replacement.
 */
export function transformExpr(
  expr: ShaderExpr,
  visit: (node: ShaderExpr) => ShaderExpr,
): ShaderExpr {
  const recur = (e: ShaderExpr) => transformExpr(e, visit);
  switch (expr.kind) {
    case "attribute":
    case "uniform":
    case "varying":
    case "literal":
      return visit(expr);
    case "binary":
      return visit({ ...expr, left: recur(expr.left), right: recur(expr.right) });
    case "toFloat":
    case "swizzle":
    case "unpackColor":
    case "unpackUnorm4x8":
      return visit({ ...expr, value: recur(expr.value) });
    case "construct":
      return visit({ ...expr, args: expr.args.map(recur) });
    case "sample":
      return visit({ ...expr, coord: recur(expr.coord) });
  }
}

// ============ Type checking ============

/** Names an expression may refer to, with their types */
export interface ExprScope {
  readonly attributes: ReadonlyMap<string, ShaderType>;
  readonly uniforms: ReadonlyMap<string, ReadonlyMap<string, ShaderType>>;
  readonly varyings: ReadonlyMap<string, ShaderType>;
  readonly textures: ReadonlySet<string>;
}

export const EMPTY_SCOPE: ExprScope = {
  attributes: new Map<string, ShaderType>(),
  uniforms: new Map<string, ReadonlyMap<string, ShaderType>>(),
  varyings: new Map<string, ShaderType>(),
  textures: new Set<string>(),
};

const SWIZZLE_LETTERS = "xyzw";

/**
 * Type of an expression in the given scope.
 * Throws an Error naming the node when the expression is ill-typed.
 */
export function typeOfExpr(expr: ShaderExpr, scope: ExprScope): ShaderType {
  switch (expr.kind) {
    case "attribute": {
      const type = scope.attributes.get(expr.name);
      if (!type) throw new Error(`Unknown attribute "${expr.name}"`);
      return type;
    }
    case "uniform": {
      const fields = scope.uniforms.get(expr.binding);
      if (!fields) throw new Error(`Unknown uniform binding "${expr.binding}"`);
      const type = fields.get(expr.field);
      if (!type) {
        throw new Error(
          `Uniform binding "${expr.binding}" has no field "${expr.field}"`,
        );
      }
      return type;
    }
    case "varying": {
      const type = scope.varyings.get(expr.name);
      if (!type) throw new Error(`Unknown varying "${expr.name}"`);
      return type;
    }
    case "literal":
      return expr.type;
    case "binary":
      return typeOfBinary(
        expr.op,
        typeOfExpr(expr.left, scope),
        typeOfExpr(expr.right, scope),
      );
    case "toFloat": {
      const type = typeOfExpr(expr.value, scope);
      if (type !== "u32") throw new Error(`toFloat expects u32, got ${type}`);
      return "f32";
    }
    case "construct": {
      let count = 0;
      for (const arg of expr.args) {
        const type = typeOfExpr(arg, scope);
        if (type !== "f32" && !isFloatVector(type)) {
          throw new Error(`${expr.type} constructor cannot take ${type}`);
        }
        count += componentCount(type);
      }
      if (count !== componentCount(expr.type)) {
        throw new Error(
          `${expr.type} constructor needs ${componentCount(expr.type)} components, got ${count}`,
        );
      }
      return expr.type;
    }
    case "swizzle": {
      const type = typeOfExpr(expr.value, scope);
      if (!isFloatVector(type)) {
        throw new Error(`Cannot swizzle ${type}`);
      }
      const available = SWIZZLE_LETTERS.slice(0, componentCount(type));
      for (const c of expr.components) {
        if (!available.includes(c)) {
          throw new Error(`Swizzle .${expr.components} out of range for ${type}`);
        }
      }
      return floatVectorType(expr.components.length);
    }
    case "sample": {
      if (!scope.textures.has(expr.texture)) {
        throw new Error(`Unknown texture "${expr.texture}"`);
      }
      const coord = typeOfExpr(expr.coord, scope);
      if (coord !== "vec2f") {
        throw new Error(`Texture coordinate must be vec2f, got ${coord}`);
      }
      return "vec4f";
    }
    case "unpackColor":
    case "unpackUnorm4x8": {
      const type = typeOfExpr(expr.value, scope);
      if (type !== "u32") {
        throw new Error(`${expr.kind} expects u32, got ${type}`);
      }
      return "vec4f";
    }
  }
}

function typeOfBinary(op: BinaryOp, left: ShaderType, right: ShaderType): ShaderType {
  if (op === ">>" || op === "&") {
    if (left !== "u32" || right !== "u32") {
      throw new Error(`Operator ${op} needs u32 operands, got ${left} and ${right}`);
    }
    return "u32";
  }

  if (op === "*" && left === "mat4x4f") {
    if (right !== "vec4f") {
      throw new Error(`mat4x4f can only multiply vec4f, got ${right}`);
    }
    return "vec4f";
  }

  const isFloat = (t: ShaderType) => t === "f32" || isFloatVector(t);
  if (!isFloat(left) || !isFloat(right)) {
    throw new Error(`Operator ${op} needs float operands, got ${left} and ${right}`);
  }
  if (left === right) return left;
  // Scalar broadcast: vector op scalar, or scalar * vector
  if (right === "f32") return left;
  if (left === "f32" && (op === "*" || op === "+")) return right;
  throw new Error(`Operator ${op} cannot combine ${left} and ${right}`);
}
