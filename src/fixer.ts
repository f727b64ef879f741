import { RepairOptions, resolveOptions } from "./config";
import { loadScene, writeScene, defaultOutputPaths } from "./scene-loader";
import { repairTimestamps, RepairedSampler, SamplerFailure } from "./timing-repair";
import { checkBounds, Anomaly } from "./bounds-check";
import * as logger from "./logger";

export interface RepairReport {
  inputPath: string;
  outputMetadataPath: string;
  outputBinaryPath: string;
  samplersScanned: number;
  repaired: RepairedSampler[];
  failures: SamplerFailure[];
  anomalies: Anomaly[];
  bytesWritten: number;
}

/**
 * Load a scene, regenerate its corrupted animation timestamps and write the
 * corrected document and buffer. File-level problems throw; per-sampler
 * problems end up in the returned report.
 */
export function fixScene(
  inputPath: string,
  partialOptions: Partial<RepairOptions> = {}
): RepairReport {
  const options = resolveOptions(partialOptions);
  const { metadataPath, binaryPath } =
    options.outputPaths || defaultOutputPaths(inputPath, options.outputSuffix);

  const scene = loadScene(inputPath);
  const timing = repairTimestamps(scene, options);
  const anomalies = checkBounds(scene, options);
  writeScene(scene, metadataPath, binaryPath);

  logger.log(
    `done: ${timing.repaired.length}/${timing.samplersScanned} samplers repaired, ` +
      `${timing.failures.length} failed, ${anomalies.length} advisories`
  );

  return {
    inputPath,
    outputMetadataPath: metadataPath,
    outputBinaryPath: binaryPath,
    ...timing,
    anomalies,
  };
}
