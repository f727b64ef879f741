export * from "./gltf-types";
export * from "./errors";
export { RepairOptions, OutputPaths, defaultOptions, resolveOptions, framePeriod } from "./config";
export { loadScene, writeScene, defaultOutputPaths, Scene, SamplerEntry } from "./scene-loader";
export {
  isCorrupted,
  synthesizeTimestamps,
  repairTimestamps,
  RepairedSampler,
  SamplerFailure,
  TimingRepairResult,
} from "./timing-repair";
export { checkBounds, Anomaly, AnomalyKind } from "./bounds-check";
export { fixScene, RepairReport } from "./fixer";
export { formatReport } from "./report";
export { setLogLevel, initLogger, LogLevel } from "./logger";
