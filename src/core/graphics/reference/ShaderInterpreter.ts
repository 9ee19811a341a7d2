/**
 * CPU evaluation of lowered shader expressions.
 *
 * Float results are rounded to 32 bits after every operation (Math.fround)
 * and integer results are kept as unsigned 32-bit values, so the reference
 * sees the same numbers a GPU computing in f32/u32 would.
 */

import type { BinaryOp, ShaderExpr } from "../shading/ShaderExpr";
import type { ShaderValue } from "../shading/ShaderTypes";

export type Texel = readonly [number, number, number, number];

export interface EvalEnv {
  readonly attributes?: ReadonlyMap<string, ShaderValue>;
  readonly uniforms?: ReadonlyMap<string, ReadonlyMap<string, ShaderValue>>;
  readonly varyings?: ReadonlyMap<string, ShaderValue>;
  /** Sample a texture binding at (u, v) through its sampler */
  sample?(texture: string, u: number, v: number): Texel;
}

const fround = Math.fround;
const SWIZZLE_INDEX: Record<string, number> = { x: 0, y: 1, z: 2, w: 3 };

function scalar(value: ShaderValue, what: string): number {
  if (typeof value !== "number") {
    throw new Error(`${what} must be a scalar`);
  }
  return value;
}

function vector(value: ShaderValue): readonly number[] {
  return typeof value === "number" ? [value] : value;
}

function lookup(
  map: ReadonlyMap<string, ShaderValue> | undefined,
  name: string,
  what: string,
): ShaderValue {
  const value = map?.get(name);
  if (value === undefined) {
    throw new Error(`No value for ${what} "${name}"`);
  }
  return value;
}

function floatOp(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case "+":
      return fround(a + b);
    case "-":
      return fround(a - b);
    case "*":
      return fround(a * b);
    case "/":
      return fround(a / b);
    default:
      throw new Error(`Operator ${op} is not a float operator`);
  }
}

/** Column-major mat4x4 times vec4, rounding each product and partial sum */
function matMulVec(m: readonly number[], v: readonly number[]): number[] {
  if (m.length !== 16 || v.length !== 4) {
    throw new Error("Matrix multiply needs a mat4x4 and a vec4");
  }
  const out: number[] = [];
  for (let r = 0; r < 4; r++) {
    let sum = 0;
    for (let c = 0; c < 4; c++) {
      sum = fround(sum + fround(m[c * 4 + r] * v[c]));
    }
    out.push(sum);
  }
  return out;
}

function evaluateBinary(op: BinaryOp, left: ShaderValue, right: ShaderValue): ShaderValue {
  if (op === ">>") {
    return (scalar(left, ">> operand") >>> (scalar(right, ">> operand") & 31)) >>> 0;
  }
  if (op === "&") {
    return (scalar(left, "& operand") & scalar(right, "& operand")) >>> 0;
  }
  if (typeof left === "number" && typeof right === "number") {
    return floatOp(op, left, right);
  }
  if (op === "*" && typeof left !== "number" && left.length === 16) {
    return matMulVec(left, vector(right));
  }

  const a = vector(left);
  const b = vector(right);
  const length = Math.max(a.length, b.length);
  if (a.length !== b.length && a.length !== 1 && b.length !== 1) {
    throw new Error(`Cannot apply ${op} to vectors of ${a.length} and ${b.length}`);
  }
  const out: number[] = [];
  for (let i = 0; i < length; i++) {
    out.push(floatOp(op, a.length === 1 ? a[0] : a[i], b.length === 1 ? b[0] : b[i]));
  }
  return out;
}

/**
 * Evaluate an expression. The expression must already be lowered for the
 * backend being modelled (no unpackColor nodes).
 */
export function evaluateExpr(expr: ShaderExpr, env: EvalEnv): ShaderValue {
  const evaluate = (e: ShaderExpr) => evaluateExpr(e, env);

  switch (expr.kind) {
    case "attribute":
      return lookup(env.attributes, expr.name, "attribute");
    case "varying":
      return lookup(env.varyings, expr.name, "varying");
    case "uniform":
      return lookup(env.uniforms?.get(expr.binding), expr.field, `uniform ${expr.binding}`);
    case "literal":
      return expr.type === "f32" ? fround(expr.value) : expr.value >>> 0;
    case "binary":
      return evaluateBinary(expr.op, evaluate(expr.left), evaluate(expr.right));
    case "toFloat":
      return fround(scalar(evaluate(expr.value), "toFloat operand"));
    case "construct":
      return expr.args.flatMap((arg) => vector(evaluate(arg)));
    case "swizzle": {
      const value = vector(evaluate(expr.value));
      const out = Array.from(expr.components, (c) => value[SWIZZLE_INDEX[c]]);
      return out.length === 1 ? out[0] : out;
    }
    case "sample": {
      if (!env.sample) {
        throw new Error(`No texture sampling available for "${expr.texture}"`);
      }
      const [u, v] = vector(evaluate(expr.coord));
      return env.sample(expr.texture, u, v).map(fround);
    }
    case "unpackUnorm4x8": {
      const packed = scalar(evaluate(expr.value), "unpackUnorm4x8 operand");
      return [0, 8, 16, 24].map((shift) => fround(((packed >>> shift) & 0xff) / 255));
    }
    case "unpackColor":
      throw new Error("unpackColor must be lowered before evaluation");
  }
}
