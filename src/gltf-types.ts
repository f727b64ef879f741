export type AccessorComponentType = 5120 | 5121 | 5122 | 5123 | 5125 | 5126;
export type AccessorType =
  | "SCALAR"
  | "VEC2"
  | "VEC3"
  | "VEC4"
  | "MAT2"
  | "MAT3"
  | "MAT4";

/**
 * Every glTF object keeps the properties this tool does not know about, so
 * that writing a scene back out passes them through untouched.
 */
interface Extensible {
  [key: string]: unknown;
}

export interface Accessor extends Extensible {
  bufferView?: number;
  byteOffset?: number;
  componentType: AccessorComponentType;
  count: number;
  type: AccessorType;
  normalized?: boolean;
  min?: number[];
  max?: number[];
}

export interface BufferView extends Extensible {
  buffer: number;
  byteOffset?: number;
  byteLength: number;
  byteStride?: number;
}

export interface GltfBuffer extends Extensible {
  byteLength: number;
  uri?: string;
}

export interface AnimationSampler extends Extensible {
  input: number;
  output: number;
  interpolation?: string;
}

export interface AnimationChannel extends Extensible {
  sampler: number;
  target: { node?: number; path: string } & Extensible;
}

export interface Animation extends Extensible {
  name?: string;
  samplers: AnimationSampler[];
  channels: AnimationChannel[];
}

export interface MeshPrimitive extends Extensible {
  attributes: Record<string, number>;
}

export interface Mesh extends Extensible {
  primitives: MeshPrimitive[];
}

export interface GltfDocument extends Extensible {
  accessors: Accessor[];
  bufferViews: BufferView[];
  buffers: GltfBuffer[];
  animations?: Animation[];
  meshes?: Mesh[];
}
