import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { parseDocument, assembleScene, Scene } from "../../src/scene-loader";
import { GltfDocument } from "../../src/gltf-types";

// what the converter leaves behind in every timestamp accessor
export const SENTINEL_MIN = 1.797693e308;
export const SENTINEL_MAX = -1.797693e308;
export const FLOAT32_MAX = 3.4028234663852886e38;

export interface TrackSpec {
  count: number;
  // defaults to the sentinel pair; null leaves the bound out
  min?: number | null;
  max?: number | null;
  // defaults to FLOAT32_MAX in every slot
  times?: number[];
}

export interface BuiltScene {
  json: {
    accessors: Record<string, unknown>[];
    bufferViews: Record<string, unknown>[];
    buffers: Record<string, unknown>[];
    animations: Record<string, unknown>[];
    [key: string]: unknown;
  };
  binary: Uint8Array;
}

/**
 * One animation with a sampler per track. Track k owns accessors 2k
 * (timestamps) and 2k+1 (VEC3 translations), each in a bufferView of the
 * same index. A three-vertex POSITION accessor follows the tracks.
 */
export function buildScene(tracks: TrackSpec[], binName = "scene.bin"): BuiltScene {
  const floats: number[] = [];
  const accessors: Record<string, unknown>[] = [];
  const bufferViews: Record<string, unknown>[] = [];

  const addView = (values: number[]): number => {
    bufferViews.push({
      buffer: 0,
      byteOffset: floats.length * 4,
      byteLength: values.length * 4,
    });
    floats.push(...values);
    return bufferViews.length - 1;
  };

  const samplers = tracks.map((track, k) => {
    const times = track.times || new Array<number>(track.count).fill(FLOAT32_MAX);
    const timeAccessor: Record<string, unknown> = {
      bufferView: addView(times),
      componentType: 5126,
      count: track.count,
      type: "SCALAR",
    };
    const min = track.min === undefined ? SENTINEL_MIN : track.min;
    const max = track.max === undefined ? SENTINEL_MAX : track.max;
    if (min !== null) timeAccessor.min = [min];
    if (max !== null) timeAccessor.max = [max];
    accessors.push(timeAccessor);

    const translations: number[] = [];
    for (let i = 0; i < track.count; i++) translations.push(i, 0.5, -i);
    accessors.push({
      bufferView: addView(translations),
      componentType: 5126,
      count: track.count,
      type: "VEC3",
    });
    return { input: 2 * k, output: 2 * k + 1, interpolation: "LINEAR" };
  });

  const positionAccessor = accessors.length;
  accessors.push({
    bufferView: addView([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    componentType: 5126,
    count: 3,
    type: "VEC3",
    min: [0, 0, 0],
    max: [1, 1, 0],
  });

  const binary = new Uint8Array(new Float32Array(floats).buffer);

  return {
    json: {
      asset: { version: "2.0", generator: "converter under test" },
      scene: 0,
      scenes: [{ nodes: [0] }],
      nodes: [{ name: "root", mesh: 0 }],
      meshes: [{ primitives: [{ attributes: { POSITION: positionAccessor } }] }],
      animations: [
        {
          name: "Take 001",
          samplers,
          channels: samplers.map((_, k) => ({
            sampler: k,
            target: { node: 0, path: "translation" },
          })),
        },
      ],
      accessors,
      bufferViews,
      buffers: [{ byteLength: binary.byteLength, uri: binName }],
    },
    binary,
  };
}

export function toScene(
  built: BuiltScene,
  edit: (document: GltfDocument) => void = () => {}
): Scene {
  const document = parseDocument(JSON.stringify(built.json), "memory.gltf");
  edit(document);
  return assembleScene(document, built.binary.slice(), "memory.gltf", "memory.bin");
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "timing-repair-"));
}

/** Write the scene as <dir>/<stem>.gltf plus its .bin and return the .gltf path. */
export function writeFixture(dir: string, built: BuiltScene, stem = "scene"): string {
  const gltfPath = join(dir, `${stem}.gltf`);
  writeFileSync(gltfPath, JSON.stringify(built.json, null, 2));
  writeFileSync(join(dir, String(built.json.buffers[0].uri)), built.binary);
  return gltfPath;
}

export function readFloats(binary: Uint8Array, byteOffset: number, count: number, stride = 4): number[] {
  const view = new DataView(binary.buffer, binary.byteOffset, binary.byteLength);
  const values: number[] = [];
  for (let i = 0; i < count; i++) values.push(view.getFloat32(byteOffset + i * stride, true));
  return values;
}
