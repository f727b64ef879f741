import { resolveOptions, framePeriod, defaultOptions } from "../src/config";
import { ConfigError } from "../src/errors";

describe("resolveOptions", () => {
  test("fills in defaults", () => {
    expect(resolveOptions()).toEqual({
      frameRate: 30,
      corruptionThreshold: 1e100,
      outputSuffix: "_fixed",
    });
    expect(resolveOptions()).toEqual(defaultOptions);
  });

  test("keeps explicit values", () => {
    const options = resolveOptions({
      frameRate: 24,
      outputPaths: { metadataPath: "out.gltf", binaryPath: "out.bin" },
    });
    expect(options.frameRate).toBe(24);
    expect(options.outputPaths).toEqual({ metadataPath: "out.gltf", binaryPath: "out.bin" });
  });

  test.each([0, -30, NaN, Infinity])("rejects frameRate %p", (frameRate) => {
    expect(() => resolveOptions({ frameRate })).toThrow(ConfigError);
  });

  test("rejects a non-positive threshold", () => {
    expect(() => resolveOptions({ corruptionThreshold: 0 })).toThrow(
      "corruptionThreshold must be a positive finite number, got 0"
    );
  });

  test("rejects an empty suffix", () => {
    expect(() => resolveOptions({ outputSuffix: "" })).toThrow(ConfigError);
  });

  test("rejects incomplete output paths", () => {
    expect(() =>
      resolveOptions({ outputPaths: { metadataPath: "out.gltf", binaryPath: "" } })
    ).toThrow("outputPaths needs both metadataPath and binaryPath");
  });
});

describe("framePeriod", () => {
  test("is the reciprocal of the frame rate", () => {
    expect(framePeriod({ frameRate: 30 })).toBeCloseTo(0.0333333, 6);
    expect(framePeriod({ frameRate: 25 })).toBe(0.04);
  });
});
