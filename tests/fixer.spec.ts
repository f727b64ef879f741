import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { fixScene, ConfigError } from "../src";
import { buildScene, makeTempDir, readFloats, writeFixture } from "./helpers/scene-builder";

describe("fixScene", () => {
  let dir: string;
  beforeEach(() => {
    dir = makeTempDir();
  });
  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("repairs corrupted samplers and writes the fixed pair", () => {
    const built = buildScene([
      { count: 20 },
      { count: 4, min: 0, max: 1.5, times: [0, 0.5, 1, 1.5] },
      { count: 3 },
    ]);
    const input = writeFixture(dir, built);
    const inputText = readFileSync(input, "utf-8");

    const report = fixScene(input);

    expect(report.outputMetadataPath).toBe(join(dir, "scene_fixed.gltf"));
    expect(report.outputBinaryPath).toBe(join(dir, "scene_fixed.bin"));
    expect(report.samplersScanned).toBe(3);
    expect(report.repaired.map((r) => r.samplerIndex)).toEqual([0, 2]);
    expect(report.failures).toEqual([]);
    expect(report.anomalies).toEqual([]);
    expect(report.bytesWritten).toBe(92);

    const output = JSON.parse(readFileSync(report.outputMetadataPath, "utf-8"));
    expect(output.buffers[0].uri).toBe("scene_fixed.bin");
    expect(output.accessors[0].min).toEqual([0]);
    expect(output.accessors[0].max).toEqual([Math.fround(19 * (1 / 30))]);
    expect(output.accessors[2].max).toEqual([1.5]);
    expect(output.accessors[4].max).toEqual([Math.fround(2 * (1 / 30))]);

    const binary = readFileSync(report.outputBinaryPath);
    const times = readFloats(binary, output.bufferViews[0].byteOffset, 20);
    expect(times[0]).toBe(0);
    expect(times[19]).toBeCloseTo(0.6333, 4);
    expect(readFloats(binary, output.bufferViews[2].byteOffset, 4)).toEqual([0, 0.5, 1, 1.5]);

    expect(readFileSync(input, "utf-8")).toBe(inputText);
  });

  test("finds nothing to do in its own output", () => {
    const first = fixScene(writeFixture(dir, buildScene([{ count: 8 }, { count: 5 }])));
    const second = fixScene(first.outputMetadataPath, { outputSuffix: "_again" });

    expect(second.outputMetadataPath).toBe(join(dir, "scene_fixed_again.gltf"));
    expect(second.samplersScanned).toBe(2);
    expect(second.repaired).toEqual([]);
    expect(second.bytesWritten).toBe(0);
    expect(readFileSync(second.outputBinaryPath)).toEqual(readFileSync(first.outputBinaryPath));
  });

  test("writes overflowed bounds back out as JSON it can read again", () => {
    const built = buildScene([{ count: 2 }]);
    built.json.accessors[2].min = [-1.5e300, 0, 0];
    const input = writeFixture(dir, built);
    // 1e400 overflows to -Infinity on parse, which JSON cannot represent
    writeFileSync(input, readFileSync(input, "utf-8").replace("-1.5e+300", "-1e400"));

    const first = fixScene(input);
    expect(first.anomalies.map((a) => [a.kind, a.accessorIndex])).toEqual([["extreme-bounds", 2]]);
    const output = JSON.parse(readFileSync(first.outputMetadataPath, "utf-8"));
    expect(output.accessors[2].min).toEqual([-Number.MAX_VALUE, 0, 0]);

    const second = fixScene(first.outputMetadataPath, { outputSuffix: "_again" });
    expect(second.repaired).toEqual([]);
    expect(second.anomalies.map((a) => [a.kind, a.accessorIndex])).toEqual([["extreme-bounds", 2]]);
  });

  test("writes output for the samplers it could fix", () => {
    const built = buildScene(Array.from({ length: 10 }, () => ({ count: 5 })));
    built.json.accessors[6].bufferView = 99;
    const report = fixScene(writeFixture(dir, built));

    expect(report.repaired).toHaveLength(9);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ samplerIndex: 3, animationName: "Take 001" });
    expect(report.anomalies.map((a) => a.kind)).toEqual(["dangling-reference"]);
    expect(existsSync(report.outputBinaryPath)).toBe(true);

    const output = JSON.parse(readFileSync(report.outputMetadataPath, "utf-8"));
    expect(output.accessors[8].min).toEqual([0]);
    expect(output.accessors[6].min).toEqual([1.797693e308]);
  });

  test("honours explicit output paths", () => {
    const input = writeFixture(dir, buildScene([{ count: 2 }]));
    const report = fixScene(input, {
      outputPaths: {
        metadataPath: join(dir, "out", "hero.gltf"),
        binaryPath: join(dir, "out", "hero.bin"),
      },
    });
    expect(JSON.parse(readFileSync(report.outputMetadataPath, "utf-8")).buffers[0].uri).toBe("hero.bin");
  });

  test("rejects invalid options before touching any file", () => {
    const input = writeFixture(dir, buildScene([{ count: 2 }]));
    expect(() => fixScene(input, { frameRate: 0 })).toThrow(ConfigError);
    expect(existsSync(join(dir, "scene_fixed.gltf"))).toBe(false);
  });
});
