/**
 * Repair options.
 *
 * The frame rate is an assumption, not a recovered fact: the converter
 * leaves nothing in the file from which the original spacing of keyframes
 * could be derived, so timestamps are regenerated at a uniform rate.
 */

import { ConfigError } from "./errors";

export interface OutputPaths {
  metadataPath: string;
  binaryPath: string;
}

export interface RepairOptions {
  frameRate: number;
  corruptionThreshold: number;
  outputPaths?: OutputPaths;
  outputSuffix: string;
}

export const defaultOptions: RepairOptions = {
  frameRate: 30,
  corruptionThreshold: 1e100,
  outputSuffix: "_fixed",
};

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive finite number, got ${value}`);
  }
  return value;
}

export function resolveOptions(partial: Partial<RepairOptions> = {}): RepairOptions {
  const options: RepairOptions = {
    frameRate: positive("frameRate", partial.frameRate ?? defaultOptions.frameRate),
    corruptionThreshold: positive(
      "corruptionThreshold",
      partial.corruptionThreshold ?? defaultOptions.corruptionThreshold
    ),
    outputSuffix: partial.outputSuffix ?? defaultOptions.outputSuffix,
  };

  if (options.outputSuffix.length === 0) {
    throw new ConfigError("outputSuffix must not be empty");
  }

  if (partial.outputPaths) {
    const { metadataPath, binaryPath } = partial.outputPaths;
    if (!metadataPath || !binaryPath) {
      throw new ConfigError("outputPaths needs both metadataPath and binaryPath");
    }
    options.outputPaths = { metadataPath, binaryPath };
  }

  return options;
}

/** Seconds between two synthesized keyframes. */
export function framePeriod(options: Pick<RepairOptions, "frameRate">): number {
  return 1 / options.frameRate;
}
