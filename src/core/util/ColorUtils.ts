/**
 * Packed vertex colors.
 *
 * A packed color is one u32 holding four 8-bit channels, most significant
 * byte first: bits 31-24 = R, 23-16 = G, 15-8 = B, 7-0 = A.
 */

export type Rgba = readonly [number, number, number, number];

/** Pack four 0-255 channel values into a u32. Values are clamped and rounded. */
export function packRgba(r: number, g: number, b: number, a: number): number {
  return (
    ((toByte(r) << 24) | (toByte(g) << 16) | (toByte(b) << 8) | toByte(a)) >>>
    0
  );
}

/** Pack four 0-1 channel values into a u32. */
export function packRgbaFloat(rgba: Rgba): number {
  return packRgba(rgba[0] * 255, rgba[1] * 255, rgba[2] * 255, rgba[3] * 255);
}

/** Split a packed color into its four 0-255 bytes, RGBA order. */
export function unpackRgbaBytes(packed: number): Rgba {
  return [
    (packed >>> 24) & 0xff,
    (packed >>> 16) & 0xff,
    (packed >>> 8) & 0xff,
    packed & 0xff,
  ];
}

/** Decode a packed color to normalized channels, RGBA order. */
export function unpackRgba(packed: number): Rgba {
  const [r, g, b, a] = unpackRgbaBytes(packed);
  return [r / 255, g / 255, b / 255, a / 255];
}

/** Convert a 0xRRGGBB tint plus alpha (0-1) to a packed color. */
export function hexToPacked(hex: number, alpha: number = 1): number {
  return packRgba((hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff, alpha * 255);
}

function toByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}
