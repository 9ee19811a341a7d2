/**
 * A WebGL2 program built from a shading program's generated GLSL, with its
 * attribute locations, uniform block bindings and sampler units wired to the
 * resolved binding slots.
 */

import { generateGLSL, glslAttributeName, glslUniformName } from "./GLSLGenerator";
import { locateBindings } from "./shading/BindingLayout";
import { type BindingSlot, resolveBindingSlots } from "./shading/BindingSlots";
import type { ShadingProgram } from "./shading/ShadingProgram";
import type { ShaderTarget } from "./shading/ShaderTarget";
import { VERTEX_FORMATS, type VertexLayout } from "./shading/VertexLayout";

/** The parts of WebGL2RenderingContext a ShaderProgram calls */
export type ProgramContext = Pick<
  WebGL2RenderingContext,
  | "VERTEX_SHADER"
  | "FRAGMENT_SHADER"
  | "COMPILE_STATUS"
  | "LINK_STATUS"
  | "FLOAT"
  | "UNSIGNED_INT"
  | "INVALID_INDEX"
  | "createShader"
  | "shaderSource"
  | "compileShader"
  | "getShaderParameter"
  | "getShaderInfoLog"
  | "deleteShader"
  | "createProgram"
  | "attachShader"
  | "bindAttribLocation"
  | "linkProgram"
  | "getProgramParameter"
  | "getProgramInfoLog"
  | "deleteProgram"
  | "useProgram"
  | "getUniformBlockIndex"
  | "uniformBlockBinding"
  | "getUniformLocation"
  | "uniform1i"
  | "enableVertexAttribArray"
  | "vertexAttribPointer"
  | "vertexAttribIPointer"
>;

export class ShaderProgram {
  /** The WebGL program object */
  readonly program: WebGLProgram;

  /** Cached uniform locations */
  private uniforms: Map<string, WebGLUniformLocation> = new Map();

  /**
   * Compile and link. Attribute locations are bound before linking so they
   * match the vertex layout's locations.
   */
  constructor(
    private gl: ProgramContext,
    vertexSource: string,
    fragmentSource: string,
    readonly vertexLayout: VertexLayout,
  ) {
    const vertexShader = this.compileShader(gl.VERTEX_SHADER, vertexSource);
    let fragmentShader: WebGLShader;
    try {
      fragmentShader = this.compileShader(gl.FRAGMENT_SHADER, fragmentSource);
    } catch (error) {
      gl.deleteShader(vertexShader);
      throw error;
    }

    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vertexShader);
      gl.deleteShader(fragmentShader);
      throw new Error("Failed to create WebGL program");
    }

    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    for (const attr of vertexLayout.attributes) {
      gl.bindAttribLocation(program, attr.location, glslAttributeName(attr.name));
    }
    gl.linkProgram(program);

    // Shaders are no longer needed once linked (or failed to link)
    gl.deleteShader(vertexShader);
    gl.deleteShader(fragmentShader);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const info = gl.getProgramInfoLog(program);
      gl.deleteProgram(program);
      throw new Error(`Failed to link shader program: ${info}`);
    }

    this.program = program;
  }

  /**
   * Build the program for a shading program on a GLSL target and bind its
   * uniform blocks and samplers to their slots.
   */
  static create(
    gl: ProgramContext,
    shading: ShadingProgram,
    target: ShaderTarget,
  ): ShaderProgram {
    const sources = generateGLSL(shading, target);
    const program = new ShaderProgram(
      gl,
      sources.vertex,
      sources.fragment,
      shading.vertexLayout,
    );
    program.bindSlots(shading, resolveBindingSlots(shading.bindGroups, target));
    return program;
  }

  /** Compile a single shader */
  private compileShader(type: number, source: string): WebGLShader {
    const gl = this.gl;
    const shader = gl.createShader(type);
    if (!shader) {
      throw new Error("Failed to create shader");
    }

    gl.shaderSource(shader, source);
    gl.compileShader(shader);

    if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
      const info = gl.getShaderInfoLog(shader);
      const typeStr = type === gl.VERTEX_SHADER ? "vertex" : "fragment";
      gl.deleteShader(shader);
      throw new Error(`Failed to compile ${typeStr} shader: ${info}`);
    }

    return shader;
  }

  /**
   * Point uniform blocks at their binding points and samplers at their
   * texture units. Resources the linker dropped as unused are skipped.
   */
  bindSlots(shading: ShadingProgram, slots: readonly BindingSlot[]): void {
    const gl = this.gl;
    const definitions = new Map(
      locateBindings(shading.bindGroups).map((b) => [b.name, b.definition] as const),
    );

    this.use();
    for (const slot of slots) {
      const definition = definitions.get(slot.name);
      if (definition?.type === "uniform") {
        const index = gl.getUniformBlockIndex(this.program, definition.struct.name);
        if (index !== gl.INVALID_INDEX) {
          gl.uniformBlockBinding(this.program, index, slot.binding);
        }
      } else if (definition?.type === "texture") {
        const location = this.getUniformLocation(glslUniformName(slot.name));
        if (location) {
          gl.uniform1i(location, slot.binding);
        }
      }
    }
  }

  /**
   * Describe the vertex layout to the bound vertex array. The vertex buffer
   * must already be bound to ARRAY_BUFFER.
   */
  applyVertexLayout(): void {
    const gl = this.gl;
    const { stride } = this.vertexLayout;
    for (const attr of this.vertexLayout.attributes) {
      const info = VERTEX_FORMATS[attr.format];
      gl.enableVertexAttribArray(attr.location);
      if (info.integer) {
        gl.vertexAttribIPointer(attr.location, info.components, gl.UNSIGNED_INT, stride, attr.offset);
      } else {
        gl.vertexAttribPointer(attr.location, info.components, gl.FLOAT, false, stride, attr.offset);
      }
    }
  }

  /** Use this program */
  use(): void {
    this.gl.useProgram(this.program);
  }

  /** Get a uniform location (cached) */
  getUniformLocation(name: string): WebGLUniformLocation | null {
    let location = this.uniforms.get(name);
    if (location === undefined) {
      location = this.gl.getUniformLocation(this.program, name) ?? undefined;
      if (location !== undefined) {
        this.uniforms.set(name, location);
      }
    }
    return location ?? null;
  }

  /** Clean up resources */
  destroy(): void {
    this.gl.deleteProgram(this.program);
    this.uniforms.clear();
  }
}
