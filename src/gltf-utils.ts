import {
  byteSizeForComponentType,
  numComponentsForAccessorType,
  LITTLE_ENDIAN,
} from "./gltf-constants";
import { Accessor, BufferView } from "./gltf-types";
import { BufferBoundsError } from "./errors";

/** Where the elements of an accessor live inside the loaded buffer. */
export interface AccessorLayout {
  byteOffset: number;
  byteStride: number;
  elementByteSize: number;
  componentByteSize: number;
  numComponents: number;
  count: number;
}

export function accessorLayout(
  accessor: Accessor,
  bufferView: BufferView
): AccessorLayout {
  const componentByteSize = byteSizeForComponentType[accessor.componentType];
  const numComponents = numComponentsForAccessorType[accessor.type];
  const elementByteSize = componentByteSize * numComponents;
  return {
    byteOffset: (bufferView.byteOffset || 0) + (accessor.byteOffset || 0),
    // a view without byteStride is tightly packed
    byteStride: bufferView.byteStride || elementByteSize,
    elementByteSize,
    componentByteSize,
    numComponents,
    count: accessor.count,
  };
}

export function elementOffset(layout: AccessorLayout, index: number): number {
  return layout.byteOffset + index * layout.byteStride;
}

/**
 * Throws BufferBoundsError unless every element of the accessor lies inside
 * both its buffer view and the loaded buffer.
 */
export function assertLayoutInBounds(
  layout: AccessorLayout,
  bufferView: BufferView,
  bufferLength: number,
  accessorIndex: number
): void {
  if (layout.count < 1) {
    throw new BufferBoundsError(
      `accessor ${accessorIndex} declares count ${layout.count}, no elements to address`,
      accessorIndex
    );
  }

  if (layout.byteStride < layout.elementByteSize) {
    throw new BufferBoundsError(
      `accessor ${accessorIndex} has a byteStride of ${layout.byteStride}, smaller than its ${layout.elementByteSize}-byte elements`,
      accessorIndex
    );
  }

  const start = layout.byteOffset;
  const end = elementOffset(layout, layout.count - 1) + layout.elementByteSize;
  const viewStart = bufferView.byteOffset || 0;
  const viewEnd = viewStart + bufferView.byteLength;

  if (start < viewStart || end > viewEnd) {
    throw new BufferBoundsError(
      `accessor ${accessorIndex} spans bytes [${start}, ${end}) outside its buffer view [${viewStart}, ${viewEnd})`,
      accessorIndex
    );
  }
  if (end > bufferLength) {
    throw new BufferBoundsError(
      `accessor ${accessorIndex} spans bytes [${start}, ${end}) past the end of the ${bufferLength}-byte buffer`,
      accessorIndex
    );
  }
}

function dataViewOf(binary: Uint8Array): DataView {
  return new DataView(binary.buffer, binary.byteOffset, binary.byteLength);
}

/** Decode a float accessor into one array of components per element. */
export function readFloatElements(
  binary: Uint8Array,
  layout: AccessorLayout
): number[][] {
  const view = dataViewOf(binary);
  const elements: number[][] = [];
  for (let i = 0; i < layout.count; i++) {
    const base = elementOffset(layout, i);
    const element: number[] = [];
    for (let c = 0; c < layout.numComponents; c++) {
      element.push(
        view.getFloat32(base + c * layout.componentByteSize, LITTLE_ENDIAN)
      );
    }
    elements.push(element);
  }
  return elements;
}

/**
 * Write one float32 per element of a SCALAR accessor. Only the four bytes of
 * each element are touched; stride padding is left as it was.
 * Returns the number of bytes written.
 */
export function writeFloatScalars(
  binary: Uint8Array,
  layout: AccessorLayout,
  values: number[]
): number {
  const view = dataViewOf(binary);
  values.forEach((value, i) => {
    view.setFloat32(elementOffset(layout, i), value, LITTLE_ENDIAN);
  });
  return values.length * 4;
}
