/**
 * A 4x4 matrix for clip-space transforms.
 * Stored in column-major order, matching WGSL mat4x4<f32> and GLSL mat4:
 * element (row r, column c) lives at index c * 4 + r.
 */
export class Matrix4 {
  /** Internal storage in column-major order */
  private data: Float32Array;

  constructor(values?: ArrayLike<number>) {
    this.data = new Float32Array(16);
    if (values) {
      if (values.length !== 16) {
        throw new Error(`Matrix4 needs 16 values, got ${values.length}`);
      }
      this.data.set(values);
    } else {
      this.identity();
    }
  }

  /** Create an identity matrix */
  static identity(): Matrix4 {
    return new Matrix4();
  }

  /** Create from column-major values */
  static fromColumnMajor(values: ArrayLike<number>): Matrix4 {
    return new Matrix4(values);
  }

  /**
   * Orthographic projection into canonical clip space.
   * x and y map to [-1, 1]; depth maps [-1, 1] to [0, 1] (z' = 0.5z + 0.5).
   */
  static orthographic(
    left: number,
    right: number,
    bottom: number,
    top: number,
  ): Matrix4 {
    const m = new Matrix4();
    m.data[0] = 2 / (right - left);
    m.data[5] = 2 / (top - bottom);
    m.data[10] = 0.5;
    m.data[12] = (right + left) / (left - right);
    m.data[13] = (top + bottom) / (bottom - top);
    m.data[14] = 0.5;
    return m;
  }

  /**
   * Projection for UI space: origin at the top-left, y growing downward,
   * units in logical pixels (physical pixels divided by scale).
   */
  static viewportProjection(
    physicalWidth: number,
    physicalHeight: number,
    scale: number = 1,
  ): Matrix4 {
    return Matrix4.orthographic(
      0,
      physicalWidth / scale,
      physicalHeight / scale,
      0,
    );
  }

  /** Create a scaling matrix */
  static scaling(sx: number, sy: number = sx, sz: number = 1): Matrix4 {
    const m = new Matrix4();
    m.data[0] = sx;
    m.data[5] = sy;
    m.data[10] = sz;
    return m;
  }

  /** Create a translation matrix */
  static translation(x: number, y: number, z: number = 0): Matrix4 {
    const m = new Matrix4();
    m.data[12] = x;
    m.data[13] = y;
    m.data[14] = z;
    return m;
  }

  /** Reset to identity */
  identity(): this {
    this.data.fill(0);
    this.data[0] = 1;
    this.data[5] = 1;
    this.data[10] = 1;
    this.data[15] = 1;
    return this;
  }

  /** Clone this matrix */
  clone(): Matrix4 {
    return new Matrix4(this.data);
  }

  /** Get element at row r, column c */
  get(row: number, column: number): number {
    return this.data[column * 4 + row];
  }

  /** Returns this * other as a new matrix */
  multiply(other: Matrix4): Matrix4 {
    const a = this.data;
    const b = other.data;
    const out = new Float32Array(16);
    for (let c = 0; c < 4; c++) {
      for (let r = 0; r < 4; r++) {
        let sum = 0;
        for (let k = 0; k < 4; k++) {
          sum += a[k * 4 + r] * b[c * 4 + k];
        }
        out[c * 4 + r] = sum;
      }
    }
    return new Matrix4(out);
  }

  /** Transform a homogeneous vector */
  transformVec4(
    x: number,
    y: number,
    z: number,
    w: number,
  ): [number, number, number, number] {
    const m = this.data;
    return [
      m[0] * x + m[4] * y + m[8] * z + m[12] * w,
      m[1] * x + m[5] * y + m[9] * z + m[13] * w,
      m[2] * x + m[6] * y + m[10] * z + m[14] * w,
      m[3] * x + m[7] * y + m[11] * z + m[15] * w,
    ];
  }

  /** Copy of the column-major values */
  toArray(): Float32Array {
    return new Float32Array(this.data);
  }
}
