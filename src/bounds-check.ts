import { vec3 } from "gl-matrix";
import { FLOAT } from "./gltf-constants";
import { accessorLayout, assertLayoutInBounds, readFloatElements } from "./gltf-utils";
import { describeError } from "./errors";
import { RepairOptions } from "./config";
import { Scene } from "./scene-loader";
import * as logger from "./logger";

export type AnomalyKind =
  | "extreme-bounds"
  | "extreme-data"
  | "unreadable-data"
  | "dangling-reference"
  | "missing-bounds"
  | "missing-section"
  | "buffer-length-mismatch";

export interface Anomaly {
  kind: AnomalyKind;
  accessorIndex?: number;
  message: string;
}

type SpatialRole = "POSITION" | "translation";

function isExtreme(value: number, threshold: number): boolean {
  return !Number.isFinite(value) || Math.abs(value) > threshold;
}

/** Accessors holding spatial data, mapped to where they were found. */
function spatialAccessors(scene: Scene): Map<number, SpatialRole> {
  const found = new Map<number, SpatialRole>();
  for (const mesh of scene.document.meshes || []) {
    for (const primitive of mesh.primitives) {
      const position = primitive.attributes.POSITION;
      if (position !== undefined) found.set(position, "POSITION");
    }
  }
  for (const animation of scene.document.animations || []) {
    for (const channel of animation.channels) {
      const sampler = animation.samplers[channel.sampler];
      if (sampler && channel.target.path === "translation") {
        found.set(sampler.output, "translation");
      }
    }
  }
  return found;
}

/** Component-wise [min, max] of decoded VEC3 elements. */
export function vec3Bounds(elements: number[][]): [vec3, vec3] {
  const min = vec3.fromValues(Infinity, Infinity, Infinity);
  const max = vec3.fromValues(-Infinity, -Infinity, -Infinity);
  for (const [x, y, z] of elements) {
    const v = vec3.fromValues(x, y, z);
    if (![x, y, z].every(Number.isFinite)) {
      // Math.min/max would hide NaN behind the other operand
      return [v, v];
    }
    vec3.min(min, min, v);
    vec3.max(max, max, v);
  }
  return [min, max];
}

function checkSpatialAccessor(
  scene: Scene,
  accessorIndex: number,
  role: SpatialRole,
  threshold: number
): Anomaly[] {
  const accessor = scene.document.accessors[accessorIndex];
  if (!accessor) return [];
  const anomalies: Anomaly[] = [];
  const label = `accessor ${accessorIndex} (${role})`;

  const declared = [...(accessor.min || []), ...(accessor.max || [])];
  if (declared.some((v) => isExtreme(v, threshold))) {
    anomalies.push({
      kind: "extreme-bounds",
      accessorIndex,
      message: `${label} declares extreme bounds min=${JSON.stringify(accessor.min)} max=${JSON.stringify(accessor.max)}`,
    });
  }

  if (
    accessor.componentType !== FLOAT ||
    accessor.type !== "VEC3" ||
    accessor.count === 0
  ) {
    return anomalies;
  }
  const bufferView =
    accessor.bufferView === undefined
      ? undefined
      : scene.document.bufferViews[accessor.bufferView];
  if (!bufferView) return anomalies;

  try {
    const layout = accessorLayout(accessor, bufferView);
    assertLayoutInBounds(layout, bufferView, scene.binary.byteLength, accessorIndex);
    const [min, max] = vec3Bounds(readFloatElements(scene.binary, layout));
    const actual = [...min, ...max];
    if (actual.some((v) => isExtreme(v, threshold))) {
      anomalies.push({
        kind: "extreme-data",
        accessorIndex,
        message: `${label} holds extreme values, decoded bounds min=[${[...min].join(", ")}] max=[${[...max].join(", ")}]`,
      });
    }
  } catch (err) {
    anomalies.push({
      kind: "unreadable-data",
      accessorIndex,
      message: `${label} could not be decoded: ${describeError(err)}`,
    });
  }
  return anomalies;
}

function checkReferences(scene: Scene): Anomaly[] {
  const { accessors, bufferViews, buffers } = scene.document;
  const anomalies: Anomaly[] = [];
  accessors.forEach((accessor, idx) => {
    if (accessor.bufferView !== undefined && accessor.bufferView >= bufferViews.length) {
      anomalies.push({
        kind: "dangling-reference",
        accessorIndex: idx,
        message: `accessor ${idx} references invalid bufferView ${accessor.bufferView}`,
      });
    }
  });
  bufferViews.forEach((bufferView, idx) => {
    if (bufferView.buffer >= buffers.length) {
      anomalies.push({
        kind: "dangling-reference",
        message: `bufferView ${idx} references invalid buffer ${bufferView.buffer}`,
      });
    }
  });
  return anomalies;
}

/**
 * Advisory diagnostics. Nothing here changes the scene: spatial data has
 * no synthetic replacement, so extreme values are only reported.
 */
export function checkBounds(
  scene: Scene,
  options: Pick<RepairOptions, "corruptionThreshold">
): Anomaly[] {
  const anomalies: Anomaly[] = [];

  for (const section of ["scenes", "nodes"]) {
    if (!(section in scene.document)) {
      anomalies.push({
        kind: "missing-section",
        message: `document has no "${section}" section`,
      });
    }
  }

  const declaredLength = scene.document.buffers[0]?.byteLength;
  if (declaredLength !== undefined && declaredLength !== scene.binary.byteLength) {
    anomalies.push({
      kind: "buffer-length-mismatch",
      message: `buffers[0] declares ${declaredLength} bytes but ${scene.binaryPath} holds ${scene.binary.byteLength}`,
    });
  }

  anomalies.push(...checkReferences(scene));

  const seen = new Set<number>();
  for (const entry of scene.samplers) {
    const { input } = entry;
    if (!input.ok || seen.has(input.accessorIndex)) continue;
    seen.add(input.accessorIndex);
    if (input.accessor.min === undefined || input.accessor.max === undefined) {
      anomalies.push({
        kind: "missing-bounds",
        accessorIndex: input.accessorIndex,
        message: `timestamp accessor ${input.accessorIndex} (${entry.animationName} sampler ${entry.samplerIndex}) declares no min/max`,
      });
    }
  }

  for (const [accessorIndex, role] of spatialAccessors(scene)) {
    anomalies.push(
      ...checkSpatialAccessor(scene, accessorIndex, role, options.corruptionThreshold)
    );
  }

  for (const anomaly of anomalies) {
    logger.warn(anomaly.message);
  }
  return anomalies;
}
