/**
 * Vertex buffer layouts.
 *
 * Attributes are packed in declaration order with no padding; location i is
 * the i-th attribute. Format names follow WebGPU's GPUVertexFormat.
 */

import type { ShaderType, ShaderValue } from "./ShaderTypes";

export type VertexFormat = "float32" | "float32x2" | "float32x4" | "uint32";

interface VertexFormatInfo {
  readonly shaderType: ShaderType;
  readonly components: number;
  readonly byteSize: number;
  /** Read as integers (vertexAttribIPointer on WebGL) */
  readonly integer: boolean;
}

export const VERTEX_FORMATS: Readonly<Record<VertexFormat, VertexFormatInfo>> = {
  float32: { shaderType: "f32", components: 1, byteSize: 4, integer: false },
  float32x2: { shaderType: "vec2f", components: 2, byteSize: 8, integer: false },
  float32x4: { shaderType: "vec4f", components: 4, byteSize: 16, integer: false },
  uint32: { shaderType: "u32", components: 1, byteSize: 4, integer: true },
};

export interface VertexAttributeDef {
  readonly name: string;
  readonly format: VertexFormat;
}

export interface VertexAttribute extends VertexAttributeDef {
  readonly location: number;
  readonly offset: number;
  readonly shaderType: ShaderType;
}

export interface VertexLayout {
  readonly attributes: readonly VertexAttribute[];
  /** Bytes per vertex */
  readonly stride: number;
}

/** Values for one vertex, keyed by attribute name */
export type VertexRecord = Readonly<Record<string, ShaderValue>>;

export function defineVertexLayout(
  attributes: readonly VertexAttributeDef[],
): VertexLayout {
  const seen = new Set<string>();
  let offset = 0;
  const result = attributes.map((attr, location): VertexAttribute => {
    if (seen.has(attr.name)) {
      throw new Error(`Vertex attribute "${attr.name}" is declared more than once`);
    }
    seen.add(attr.name);
    const info = VERTEX_FORMATS[attr.format];
    const located = {
      name: attr.name,
      format: attr.format,
      location,
      offset,
      shaderType: info.shaderType,
    };
    offset += info.byteSize;
    return located;
  });
  return { attributes: result, stride: offset };
}

/**
 * Write vertex records into a little-endian vertex buffer.
 */
export function encodeVertices(
  layout: VertexLayout,
  records: readonly VertexRecord[],
): ArrayBuffer {
  const buffer = new ArrayBuffer(layout.stride * records.length);
  const view = new DataView(buffer);

  records.forEach((record, index) => {
    const base = index * layout.stride;
    for (const attr of layout.attributes) {
      const value = record[attr.name];
      if (value === undefined) {
        throw new Error(`Vertex ${index} is missing attribute "${attr.name}"`);
      }
      const info = VERTEX_FORMATS[attr.format];
      const components = typeof value === "number" ? [value] : value;
      if (components.length !== info.components) {
        throw new Error(
          `Vertex ${index} attribute "${attr.name}" needs ${info.components} components, got ${components.length}`,
        );
      }
      components.forEach((component, i) => {
        const at = base + attr.offset + i * 4;
        if (info.integer) {
          view.setUint32(at, component >>> 0, true);
        } else {
          view.setFloat32(at, component, true);
        }
      });
    }
  });

  return buffer;
}

/**
 * Read one vertex back from a vertex buffer, the way the input assembler
 * would hand it to the vertex stage.
 */
export function readVertexAttributes(
  layout: VertexLayout,
  buffer: ArrayBuffer,
  index: number,
): Map<string, ShaderValue> {
  const base = index * layout.stride;
  if (index < 0 || base + layout.stride > buffer.byteLength) {
    throw new Error(`Vertex index ${index} is outside the vertex buffer`);
  }
  const view = new DataView(buffer);
  const values = new Map<string, ShaderValue>();

  for (const attr of layout.attributes) {
    const info = VERTEX_FORMATS[attr.format];
    const components: number[] = [];
    for (let i = 0; i < info.components; i++) {
      const at = base + attr.offset + i * 4;
      components.push(
        info.integer ? view.getUint32(at, true) : view.getFloat32(at, true),
      );
    }
    values.set(attr.name, components.length === 1 ? components[0] : components);
  }

  return values;
}
