/**
 * Prints expression trees as shader source.
 *
 * WGSL and GLSL share C-like expression syntax; a dialect supplies the
 * spellings that differ. Parentheses follow the stricter of the two
 * grammars: WGSL does not allow an unparenthesized binary expression as an
 * operand of a shift or bitwise operator.
 */

import type {
  AttributeExpr,
  BinaryOp,
  ShaderExpr,
  UniformExpr,
  VaryingExpr,
} from "./ShaderExpr";
import type { BackendCapabilities } from "./ShaderTarget";
import type { ShaderType } from "./ShaderTypes";

export interface ExprDialect {
  typeName(type: ShaderType): string;
  reference(expr: AttributeExpr | UniformExpr | VaryingExpr): string;
  toFloat(value: string): string;
  sample(texture: string, coord: string): string;
  unpackUnorm4x8(value: string): string;
}

const PRECEDENCE: Record<BinaryOp, number> = {
  "*": 4,
  "/": 4,
  "+": 3,
  "-": 3,
  ">>": 2,
  "&": 1,
};

/** f32 literals always carry a decimal point or exponent */
export function formatFloat(value: number): string {
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** Byte-or-wider bit masks (0xff, 0xffff, ...) print in hex where allowed */
export function formatUint(value: number, capabilities: BackendCapabilities): string {
  const isMask = value >= 0xff && Number.isInteger(Math.log2(value + 1));
  return capabilities.hexIntLiterals && isMask ? `0x${value.toString(16)}u` : `${value}u`;
}

function needsParens(parent: BinaryOp, child: ShaderExpr, isRight: boolean): boolean {
  if (child.kind !== "binary") return false;
  if (parent === ">>" || parent === "&") return true;
  const parentPrec = PRECEDENCE[parent];
  const childPrec = PRECEDENCE[child.op];
  return childPrec < parentPrec || (isRight && childPrec === parentPrec);
}

export function printExpr(
  expr: ShaderExpr,
  dialect: ExprDialect,
  capabilities: BackendCapabilities,
): string {
  const print = (e: ShaderExpr) => printExpr(e, dialect, capabilities);

  switch (expr.kind) {
    case "attribute":
    case "uniform":
    case "varying":
      return dialect.reference(expr);
    case "literal":
      return expr.type === "f32"
        ? formatFloat(expr.value)
        : formatUint(expr.value, capabilities);
    case "binary": {
      const wrap = (child: ShaderExpr, isRight: boolean) =>
        needsParens(expr.op, child, isRight) ? `(${print(child)})` : print(child);
      return `${wrap(expr.left, false)} ${expr.op} ${wrap(expr.right, true)}`;
    }
    case "toFloat":
      return dialect.toFloat(print(expr.value));
    case "construct":
      return `${dialect.typeName(expr.type)}(${expr.args.map(print).join(", ")})`;
    case "swizzle": {
      const inner = print(expr.value);
      return expr.value.kind === "binary"
        ? `(${inner}).${expr.components}`
        : `${inner}.${expr.components}`;
    }
    case "sample":
      return dialect.sample(expr.texture, print(expr.coord));
    case "unpackUnorm4x8":
      return dialect.unpackUnorm4x8(print(expr.value));
    case "unpackColor":
      throw new Error("unpackColor must be lowered before printing");
  }
}
