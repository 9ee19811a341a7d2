/**
 * Typed uniform buffers.
 *
 * Fields are declared with the expression-language types, so the same
 * struct describes the buffer on the CPU side and the fields shaders can
 * read. For these types the WGSL uniform address space and std140 agree on
 * size and alignment, so one layout uploads to either backend. The backend
 * generators write the struct and block declarations from `layout`.
 *
 * @example
 * const TransformUniforms = defineUniformStruct("TransformUniforms", {
 *   matrix: "mat4x4f",
 * });
 *
 * const uniforms = TransformUniforms.create();
 * uniforms.set.matrix(Matrix4.viewportProjection(width, height));
 * queue.writeBuffer(gpuBuffer, 0, uniforms.buffer);
 */

import { Matrix4 } from "./Matrix4";
import type { ShaderType } from "./shading/ShaderTypes";

/** What the setter of each field type accepts */
export interface UniformValueTypes {
  f32: number;
  u32: number;
  vec2f: readonly [number, number];
  vec4f: readonly [number, number, number, number];
  mat4x4f: Matrix4 | Float32Array;
}

export type UniformFields = Readonly<Record<string, ShaderType>>;

/** Byte size and alignment; a mat4x4 is four 16-byte aligned columns */
const FIELD_SIZES: Record<ShaderType, { size: number; align: number }> = {
  f32: { size: 4, align: 4 },
  u32: { size: 4, align: 4 },
  vec2f: { size: 8, align: 8 },
  vec4f: { size: 16, align: 16 },
  mat4x4f: { size: 64, align: 16 },
};

export interface UniformField {
  readonly name: string;
  readonly type: ShaderType;
  readonly byteOffset: number;
  readonly byteSize: number;
}

/** The parts of a struct that generators and the CPU reference read */
export interface UniformStructLayout {
  /** WGSL struct name and GLSL block name */
  readonly name: string;
  /** Fields in declaration order */
  readonly layout: readonly UniformField[];
  readonly byteSize: number;
}

type UniformSetters<T extends UniformFields> = {
  readonly [K in keyof T]: (value: UniformValueTypes[T[K]]) => void;
};

export interface UniformInstance<T extends UniformFields> {
  readonly data: Float32Array;
  /** Upload this */
  readonly buffer: ArrayBuffer;
  readonly byteSize: number;
  readonly set: UniformSetters<T>;
}

export interface UniformStructDef<T extends UniformFields = UniformFields>
  extends UniformStructLayout {
  readonly fields: T;
  /** A zero-filled instance */
  create(): UniformInstance<T>;
}

function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

/**
 * Place each field at its alignment and round the struct up to its largest
 * alignment, never less than 16 bytes.
 */
export function layoutUniformFields(fields: UniformFields): {
  layout: UniformField[];
  byteSize: number;
} {
  const layout: UniformField[] = [];
  let end = 0;
  let structAlign = 16;

  for (const [name, type] of Object.entries(fields)) {
    const { size, align } = FIELD_SIZES[type];
    const byteOffset = alignUp(end, align);
    layout.push({ name, type, byteOffset, byteSize: size });
    end = byteOffset + size;
    structAlign = Math.max(structAlign, align);
  }

  return { layout, byteSize: layout.length === 0 ? 0 : alignUp(end, structAlign) };
}

function writeField(
  field: UniformField,
  value: UniformValueTypes[ShaderType],
  floats: Float32Array,
  words: Uint32Array,
): void {
  const index = field.byteOffset / 4;
  if (typeof value === "number") {
    if (field.type === "u32") {
      words[index] = value;
    } else {
      floats[index] = value;
    }
    return;
  }

  const values = value instanceof Matrix4 ? value.toArray() : value;
  const expected = field.byteSize / 4;
  if (values.length !== expected) {
    throw new Error(
      `${field.name}: ${field.type} needs ${expected} values, got ${values.length}`,
    );
  }
  floats.set(values, index);
}

export function defineUniformStruct<T extends UniformFields>(
  name: string,
  fields: T,
): UniformStructDef<T> {
  const { layout, byteSize } = layoutUniformFields(fields);

  return {
    name,
    fields,
    layout,
    byteSize,
    create(): UniformInstance<T> {
      const buffer = new ArrayBuffer(byteSize);
      const data = new Float32Array(buffer);
      const words = new Uint32Array(buffer);

      // Built dynamically; the public API is type-safe via UniformSetters<T>
      const setters: Record<string, unknown> = {};
      for (const field of layout) {
        setters[field.name] = (value: UniformValueTypes[ShaderType]) =>
          writeField(field, value, data, words);
      }

      return { data, buffer, byteSize, set: setters as UniformSetters<T> };
    },
  };
}
