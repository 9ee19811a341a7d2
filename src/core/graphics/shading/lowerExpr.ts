/**
 * Capability lowering.
 *
 * High-level nodes are rewritten into what a backend can express before any
 * printing or CPU evaluation, so the generated source and the reference
 * evaluate the same tree.
 */

import {
  type ShaderExpr,
  bitAnd,
  div,
  float,
  shiftRight,
  swizzle,
  toFloat,
  transformExpr,
  uint,
  unpackUnorm4x8,
  vec4,
} from "./ShaderExpr";
import type { ShadingProgram } from "./ShadingProgram";
import type { BackendCapabilities } from "./ShaderTarget";

/**
 * The packed color decode: channel = ((c >> shift) & 0xFF) / 255 for
 * shifts 24, 16, 8 and 0 (no shift), giving RGBA with R in the most
 * significant byte.
 */
export function unpackPackedColor(packed: ShaderExpr): ShaderExpr {
  const channel = (shift: number) => {
    const shifted = shift === 0 ? packed : shiftRight(packed, uint(shift));
    return div(toFloat(bitAnd(shifted, uint(0xff))), float(255));
  };
  return vec4(channel(24), channel(16), channel(8), channel(0));
}

/**
 * Lower one expression for a backend.
 *
 * unpackColor becomes the native unorm unpack reversed to RGBA (the builtin
 * puts the least significant byte first) when the backend has it, else the
 * shift-and-mask decode.
 */
export function lowerExpr(
  expr: ShaderExpr,
  capabilities: BackendCapabilities,
): ShaderExpr {
  return transformExpr(expr, (node) => {
    switch (node.kind) {
      case "unpackColor":
        return capabilities.unpackUnorm4x8
          ? swizzle(unpackUnorm4x8(node.value), "wzyx")
          : unpackPackedColor(node.value);
      case "unpackUnorm4x8":
        if (!capabilities.unpackUnorm4x8) {
          throw new Error("Backend has no unpackUnorm4x8 builtin");
        }
        return node;
      default:
        return node;
    }
  });
}

/** Lower every stage expression of a program. */
export function lowerProgram(
  program: ShadingProgram,
  capabilities: BackendCapabilities,
): ShadingProgram {
  const lower = (e: ShaderExpr) => lowerExpr(e, capabilities);
  return {
    ...program,
    vertex: {
      position: lower(program.vertex.position),
      outputs: Object.fromEntries(
        Object.entries(program.vertex.outputs).map(([name, e]) => [name, lower(e)]),
      ),
    },
    fragment: {
      color: lower(program.fragment.color),
    },
  };
}
