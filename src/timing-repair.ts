import { FLOAT, componentTypeNames } from "./gltf-constants";
import { accessorLayout, assertLayoutInBounds, writeFloatScalars } from "./gltf-utils";
import { BufferBoundsError, UnsupportedComponentTypeError, describeError } from "./errors";
import { RepairOptions, framePeriod } from "./config";
import { SamplerEntry, Scene } from "./scene-loader";
import * as logger from "./logger";

export interface RepairedSampler {
  animationIndex: number;
  animationName: string;
  samplerIndex: number;
  accessorIndex: number;
  count: number;
  min: number;
  max: number;
}

export type FailureKind = "BufferBoundsError" | "UnsupportedComponentTypeError";

export interface SamplerFailure {
  animationIndex: number;
  animationName: string;
  samplerIndex: number;
  accessorIndex?: number;
  kind: FailureKind;
  reason: string;
}

export interface TimingRepairResult {
  samplersScanned: number;
  repaired: RepairedSampler[];
  failures: SamplerFailure[];
  bytesWritten: number;
}

/**
 * True when a timestamp accessor's declared bounds cannot describe real
 * keyframe times: a sentinel magnitude, a non-finite value, or an inverted
 * range.
 */
export function isCorrupted(min: number, max: number, threshold = 1e100): boolean {
  return (
    Math.abs(min) > threshold ||
    Math.abs(max) > threshold ||
    Number.isNaN(min) ||
    Number.isNaN(max) ||
    !Number.isFinite(min) ||
    !Number.isFinite(max) ||
    min > max
  );
}

/** Uniformly spaced keyframe times starting at zero. */
export function synthesizeTimestamps(count: number, frameRate: number): number[] {
  const period = framePeriod({ frameRate });
  const times: number[] = [];
  for (let i = 0; i < count; i++) {
    times.push(i * period);
  }
  return times;
}

function repairSampler(
  scene: Scene,
  entry: SamplerEntry,
  options: RepairOptions
): { repaired?: RepairedSampler; bytesWritten: number } {
  const { input } = entry;
  if (!input.ok) throw input.error;

  const { accessor, accessorIndex, bufferView } = input;
  // a missing bound is reported by the bounds check, not treated as corruption
  if (accessor.min === undefined || accessor.max === undefined) {
    return { bytesWritten: 0 };
  }
  if (!isCorrupted(accessor.min[0], accessor.max[0], options.corruptionThreshold)) {
    return { bytesWritten: 0 };
  }

  if (accessor.componentType !== FLOAT || accessor.type !== "SCALAR") {
    throw new UnsupportedComponentTypeError(
      `accessor ${accessorIndex} is ${componentTypeNames[accessor.componentType]} ${accessor.type}; ` +
        `only FLOAT SCALAR timestamps can be regenerated`,
      accessorIndex,
      accessor.componentType
    );
  }

  const layout = accessorLayout(accessor, bufferView);
  assertLayoutInBounds(layout, bufferView, scene.binary.byteLength, accessorIndex);

  const times = synthesizeTimestamps(accessor.count, options.frameRate);
  const bytesWritten = writeFloatScalars(scene.binary, layout, times);

  // bounds must equal the float32 values now stored in the buffer
  const min = Math.fround(times[0]);
  const max = Math.fround(times[times.length - 1]);
  const previous = `[${accessor.min[0]}, ${accessor.max[0]}]`;
  accessor.min = [min];
  accessor.max = [max];

  logger.log(
    `${entry.animationName} sampler ${entry.samplerIndex}: regenerated ${accessor.count} ` +
      `timestamps in accessor ${accessorIndex} at ${options.frameRate} fps, ` +
      `bounds ${previous} -> [${min}, ${max}]`
  );

  return {
    repaired: {
      animationIndex: entry.animationIndex,
      animationName: entry.animationName,
      samplerIndex: entry.samplerIndex,
      accessorIndex,
      count: accessor.count,
      min,
      max,
    },
    bytesWritten,
  };
}

function failureKind(err: unknown): FailureKind | undefined {
  if (err instanceof BufferBoundsError) return "BufferBoundsError";
  if (err instanceof UnsupportedComponentTypeError) return "UnsupportedComponentTypeError";
  return undefined;
}

/**
 * Validate every sampler's timestamp accessor and regenerate the corrupted
 * ones in place. Samplers are visited in document order. A sampler that
 * cannot be repaired is recorded as a failure and the rest still run.
 */
export function repairTimestamps(
  scene: Scene,
  options: RepairOptions
): TimingRepairResult {
  const result: TimingRepairResult = {
    samplersScanned: 0,
    repaired: [],
    failures: [],
    bytesWritten: 0,
  };

  for (const entry of scene.samplers) {
    result.samplersScanned++;
    try {
      const { repaired, bytesWritten } = repairSampler(scene, entry, options);
      if (repaired) result.repaired.push(repaired);
      result.bytesWritten += bytesWritten;
    } catch (err) {
      const kind = failureKind(err);
      if (!kind) throw err;
      const failure: SamplerFailure = {
        animationIndex: entry.animationIndex,
        animationName: entry.animationName,
        samplerIndex: entry.samplerIndex,
        accessorIndex: entry.input.accessorIndex,
        kind,
        reason: describeError(err),
      };
      result.failures.push(failure);
      logger.warn(
        `${failure.animationName} sampler ${failure.samplerIndex}: ${kind}: ${failure.reason}`
      );
    }
  }

  logger.log(
    `scanned ${result.samplersScanned} samplers: ${result.repaired.length} repaired, ` +
      `${result.failures.length} failed`
  );
  return result;
}
