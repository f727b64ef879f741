import { AccessorComponentType, AccessorType } from "./gltf-types";

export const FLOAT: AccessorComponentType = 5126;

export const byteSizeForComponentType: Record<AccessorComponentType, number> = {
  5120: 1,
  5121: 1,
  5122: 2,
  5123: 2,
  5125: 4,
  5126: 4,
};

export const componentTypeNames: Record<AccessorComponentType, string> = {
  5120: "BYTE",
  5121: "UNSIGNED_BYTE",
  5122: "SHORT",
  5123: "UNSIGNED_SHORT",
  5125: "UNSIGNED_INT",
  5126: "FLOAT",
};

export const numComponentsForAccessorType: Record<AccessorType, number> = {
  SCALAR: 1,
  VEC2: 2,
  VEC3: 3,
  VEC4: 4,
  MAT2: 4,
  MAT3: 9,
  MAT4: 16,
};

// glTF buffers are always little-endian
export const LITTLE_ENDIAN = true;
