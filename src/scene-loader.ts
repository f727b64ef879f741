import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { basename, dirname, extname, join, relative, resolve, sep } from "path";
import {
  Accessor,
  AccessorComponentType,
  AccessorType,
  Animation,
  AnimationChannel,
  AnimationSampler,
  BufferView,
  GltfBuffer,
  GltfDocument,
  Mesh,
} from "./gltf-types";
import {
  byteSizeForComponentType,
  numComponentsForAccessorType,
} from "./gltf-constants";
import { BufferBoundsError, FormatError, SceneIoError } from "./errors";
import { OutputPaths } from "./config";
import * as logger from "./logger";

export type TimestampResolution =
  | {
      ok: true;
      accessorIndex: number;
      accessor: Accessor;
      bufferViewIndex: number;
      bufferView: BufferView;
    }
  | { ok: false; accessorIndex: number; error: BufferBoundsError };

export interface SamplerEntry {
  animationIndex: number;
  animationName: string;
  samplerIndex: number;
  sampler: AnimationSampler;
  input: TimestampResolution;
}

export interface Scene {
  document: GltfDocument;
  binary: Uint8Array;
  metadataPath: string;
  binaryPath: string;
  samplers: SamplerEntry[];
}

// ---------------------------------------------------------------------------
// Shape checks
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

const componentTypes = Object.keys(byteSizeForComponentType).map(Number);
const accessorTypes = Object.keys(numComponentsForAccessorType);

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isOptionalIndex(value: unknown): boolean {
  return value === undefined || isIndex(value);
}

function isOptionalNumbers(value: unknown): boolean {
  return (
    value === undefined ||
    (Array.isArray(value) && value.every((v) => typeof v === "number"))
  );
}

function isComponentType(value: unknown): value is AccessorComponentType {
  return typeof value === "number" && componentTypes.includes(value);
}

function isAccessorType(value: unknown): value is AccessorType {
  return typeof value === "string" && accessorTypes.includes(value);
}

function isAccessor(value: unknown): value is Accessor {
  return (
    isRecord(value) &&
    isOptionalIndex(value.bufferView) &&
    isOptionalIndex(value.byteOffset) &&
    isComponentType(value.componentType) &&
    isIndex(value.count) &&
    isAccessorType(value.type) &&
    isOptionalNumbers(value.min) &&
    isOptionalNumbers(value.max)
  );
}

function isBufferView(value: unknown): value is BufferView {
  return (
    isRecord(value) &&
    isIndex(value.buffer) &&
    isOptionalIndex(value.byteOffset) &&
    isIndex(value.byteLength) &&
    isOptionalIndex(value.byteStride)
  );
}

function isBuffer(value: unknown): value is GltfBuffer {
  return (
    isRecord(value) &&
    isIndex(value.byteLength) &&
    (value.uri === undefined || typeof value.uri === "string")
  );
}

function isSampler(value: unknown): value is AnimationSampler {
  return (
    isRecord(value) &&
    isIndex(value.input) &&
    isIndex(value.output) &&
    (value.interpolation === undefined ||
      typeof value.interpolation === "string")
  );
}

function isChannel(value: unknown): value is AnimationChannel {
  return (
    isRecord(value) &&
    isIndex(value.sampler) &&
    isRecord(value.target) &&
    isOptionalIndex(value.target.node) &&
    typeof value.target.path === "string"
  );
}

function isAnimation(value: unknown): value is Animation {
  return (
    isRecord(value) &&
    (value.name === undefined || typeof value.name === "string") &&
    Array.isArray(value.samplers) &&
    value.samplers.every(isSampler) &&
    Array.isArray(value.channels) &&
    value.channels.every(isChannel)
  );
}

function isMesh(value: unknown): value is Mesh {
  return (
    isRecord(value) &&
    Array.isArray(value.primitives) &&
    value.primitives.every(
      (primitive) =>
        isRecord(primitive) &&
        isRecord(primitive.attributes) &&
        Object.values(primitive.attributes).every(isIndex)
    )
  );
}

function checkArray<T>(
  raw: JsonObject,
  key: string,
  guard: (value: unknown) => value is T,
  path: string
): T[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new FormatError(`"${key}" must be an array`, path);
  }
  const checked: T[] = [];
  value.forEach((item, idx) => {
    if (!guard(item)) {
      throw new FormatError(`${key}[${idx}] is malformed`, path);
    }
    checked.push(item);
  });
  return checked;
}

function requireArray<T>(
  raw: JsonObject,
  key: string,
  guard: (value: unknown) => value is T,
  path: string
): T[] {
  const checked = checkArray(raw, key, guard, path);
  if (checked === undefined) {
    throw new FormatError(`missing required section "${key}"`, path);
  }
  return checked;
}

export function parseDocument(text: string, path: string): GltfDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
  } catch (err) {
    throw new FormatError(
      `not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      path
    );
  }
  if (!isRecord(raw)) {
    throw new FormatError("top level is not a JSON object", path);
  }

  const accessors = requireArray(raw, "accessors", isAccessor, path);
  const bufferViews = requireArray(raw, "bufferViews", isBufferView, path);
  const buffers = requireArray(raw, "buffers", isBuffer, path);
  const animations = checkArray(raw, "animations", isAnimation, path);
  const meshes = checkArray(raw, "meshes", isMesh, path);

  // overriding keys that already exist keeps the document's key order
  return {
    ...raw,
    accessors,
    bufferViews,
    buffers,
    ...(animations ? { animations } : {}),
    ...(meshes ? { meshes } : {}),
  };
}

// ---------------------------------------------------------------------------
// Cross-reference resolution
// ---------------------------------------------------------------------------

export function resolveTimestampAccessor(
  document: GltfDocument,
  accessorIndex: number
): TimestampResolution {
  const fail = (message: string): TimestampResolution => ({
    ok: false,
    accessorIndex,
    error: new BufferBoundsError(message, accessorIndex),
  });

  const accessor = document.accessors[accessorIndex];
  if (!accessor) {
    return fail(
      `accessor ${accessorIndex} is out of range (${document.accessors.length} accessors)`
    );
  }
  const bufferViewIndex = accessor.bufferView;
  if (bufferViewIndex === undefined) {
    return fail(`accessor ${accessorIndex} has no bufferView`);
  }
  const bufferView = document.bufferViews[bufferViewIndex];
  if (!bufferView) {
    return fail(
      `accessor ${accessorIndex} references bufferView ${bufferViewIndex}, out of range (${document.bufferViews.length} bufferViews)`
    );
  }
  if (bufferView.buffer >= document.buffers.length) {
    return fail(
      `bufferView ${bufferViewIndex} references buffer ${bufferView.buffer}, out of range (${document.buffers.length} buffers)`
    );
  }
  if (bufferView.buffer !== 0) {
    return fail(
      `bufferView ${bufferViewIndex} references buffer ${bufferView.buffer}; only buffer 0 is loaded`
    );
  }
  return { ok: true, accessorIndex, accessor, bufferViewIndex, bufferView };
}

function collectSamplers(document: GltfDocument): SamplerEntry[] {
  const entries: SamplerEntry[] = [];
  (document.animations || []).forEach((animation, animationIndex) => {
    const animationName = animation.name || `animation_${animationIndex}`;
    animation.samplers.forEach((sampler, samplerIndex) => {
      entries.push({
        animationIndex,
        animationName,
        samplerIndex,
        sampler,
        input: resolveTimestampAccessor(document, sampler.input),
      });
    });
  });
  return entries;
}

/** Build a Scene from an already parsed document and its buffer bytes. */
export function assembleScene(
  document: GltfDocument,
  binary: Uint8Array,
  metadataPath: string,
  binaryPath: string
): Scene {
  return {
    document,
    binary,
    metadataPath,
    binaryPath,
    samplers: collectSamplers(document),
  };
}

// ---------------------------------------------------------------------------
// Load / write
// ---------------------------------------------------------------------------

function binaryPathFor(document: GltfDocument, metadataPath: string): string {
  const uri = document.buffers[0]?.uri;
  if (uri === undefined) {
    throw new FormatError(
      "buffers[0] has no uri; only scenes with an external .bin are supported",
      metadataPath
    );
  }
  if (uri.startsWith("data:")) {
    throw new FormatError(
      "buffers[0] embeds its data in a data: URI; only scenes with an external .bin are supported",
      metadataPath
    );
  }
  let decoded: string;
  try {
    decoded = decodeURIComponent(uri);
  } catch {
    throw new FormatError("buffers[0].uri is not a valid URI", metadataPath);
  }
  return resolve(dirname(metadataPath), decoded);
}

export function loadScene(metadataPath: string): Scene {
  let text: string;
  try {
    text = readFileSync(metadataPath, "utf-8");
  } catch (err) {
    throw new SceneIoError("cannot read scene document", metadataPath, err);
  }

  const document = parseDocument(text, metadataPath);
  const binaryPath = binaryPathFor(document, metadataPath);
  if (!existsSync(binaryPath)) {
    throw new FormatError(`references missing binary file ${binaryPath}`, metadataPath);
  }

  let binary: Uint8Array;
  try {
    binary = readFileSync(binaryPath);
  } catch (err) {
    throw new SceneIoError("cannot read binary buffer", binaryPath, err);
  }

  const scene = assembleScene(document, binary, metadataPath, binaryPath);
  logger.log(
    `loaded ${basename(metadataPath)}: ${document.accessors.length} accessors, ` +
      `${scene.samplers.length} animation samplers, ${binary.byteLength} bytes of buffer data`
  );
  return scene;
}

export function defaultOutputPaths(
  inputPath: string,
  suffix = "_fixed"
): OutputPaths {
  const dir = dirname(inputPath);
  const stem = basename(inputPath, extname(inputPath));
  return {
    metadataPath: join(dir, `${stem}${suffix}.gltf`),
    binaryPath: join(dir, `${stem}${suffix}.bin`),
  };
}

function writeFile(path: string, data: string | Uint8Array): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, data);
  } catch (err) {
    throw new SceneIoError("cannot write output file", path, err);
  }
}

// JSON has no Infinity; an overflowed literal goes back out as the largest double
function keepNonFinite(_key: string, value: unknown): unknown {
  if (typeof value !== "number" || Number.isFinite(value) || Number.isNaN(value)) {
    return value;
  }
  return value > 0 ? Number.MAX_VALUE : -Number.MAX_VALUE;
}

export function writeScene(
  scene: Scene,
  outputMetadataPath: string,
  outputBinaryPath: string
): void {
  const inputs = [resolve(scene.metadataPath), resolve(scene.binaryPath)];
  for (const path of [outputMetadataPath, outputBinaryPath]) {
    if (inputs.includes(resolve(path))) {
      throw new SceneIoError("refusing to overwrite an input file", path);
    }
  }
  if (resolve(outputMetadataPath) === resolve(outputBinaryPath)) {
    throw new SceneIoError(
      "scene document and binary buffer need different output paths",
      outputMetadataPath
    );
  }

  const uri = relative(dirname(resolve(outputMetadataPath)), resolve(outputBinaryPath))
    .split(sep)
    .join("/");
  scene.document.buffers[0].uri = encodeURI(uri);

  writeFile(outputMetadataPath, JSON.stringify(scene.document, keepNonFinite, 2));
  writeFile(outputBinaryPath, scene.binary);
  logger.log(`wrote ${outputMetadataPath} and ${outputBinaryPath}`);
}
