/**
 * Clip-space conventions per backend.
 *
 * Transforms are authored against the canonical convention (WebGPU's: depth
 * in [0, 1]). A backend with a different native depth range gets one
 * corrective matrix, applied to the batch transform before upload.
 *
 * Framebuffer origin is a viewport-mapping concern only: NDC +y is up on
 * every backend, so on-screen orientation already agrees. Readbacks differ
 * in row order and are normalized when read (see Framebuffer).
 */

import { Matrix4 } from "./Matrix4";

export type DepthRange = "zero-to-one" | "negative-one-to-one";
export type FramebufferOrigin = "top-left" | "bottom-left";

export interface ClipConvention {
  readonly depthRange: DepthRange;
  readonly framebufferOrigin: FramebufferOrigin;
}

export const CANONICAL_CLIP: ClipConvention = {
  depthRange: "zero-to-one",
  framebufferOrigin: "top-left",
};

/** Matrix taking canonical clip coordinates to the given convention's. */
export function clipCorrection(convention: ClipConvention): Matrix4 {
  const m = Matrix4.identity();
  if (convention.depthRange === "negative-one-to-one") {
    // z' = 2z - w
    const values = m.toArray();
    values[10] = 2;
    values[14] = -1;
    return Matrix4.fromColumnMajor(values);
  }
  return m;
}

/** Apply the convention's correction to a canonical transform. */
export function correctTransform(
  transform: Matrix4,
  convention: ClipConvention,
): Matrix4 {
  if (convention.depthRange === CANONICAL_CLIP.depthRange) {
    return transform.clone();
  }
  return clipCorrection(convention).multiply(transform);
}

/** Whether an NDC depth survives clipping under the given range. */
export function isDepthInRange(zNdc: number, range: DepthRange): boolean {
  const min = range === "zero-to-one" ? 0 : -1;
  return zNdc >= min && zNdc <= 1;
}

/** Window depth in [0, 1] for an NDC depth. */
export function ndcDepthToWindow(zNdc: number, range: DepthRange): number {
  return range === "zero-to-one" ? zNdc : (zNdc + 1) * 0.5;
}

/**
 * Map NDC x/y to window coordinates in the framebuffer's native row order.
 * Row 0 is the top row for "top-left" and the bottom row for "bottom-left".
 */
export function ndcToWindow(
  x: number,
  y: number,
  width: number,
  height: number,
  origin: FramebufferOrigin,
): [number, number] {
  const wx = (x + 1) * 0.5 * width;
  const wy =
    origin === "top-left" ? (1 - y) * 0.5 * height : (y + 1) * 0.5 * height;
  return [wx, wy];
}
