import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { buildAugmenter, buildForwardModel, buildInverseModel, buildStabilityAnalyzer, toFuzzySet } from "../src/config/build";
import { loadModelConfig, parseModelConfig } from "../src/config/schema";
import { ModelConfigurationError } from "../src/errors";

const examplePath = fileURLToPath(new URL("../examples/longitudinal.json", import.meta.url));

function minimal(): Record<string, unknown> {
  return {
    name: "minimal",
    sampleTime: 0.1,
    stateDim: 1,
    controlDim: 1,
    operatingVariable: { source: "state", index: 0 },
    fuzzySet: {
      name: "speed",
      domain: [0, 10],
      functions: [
        { kind: "triangular", a: -4, b: 2, c: 8 },
        { kind: "triangular", a: 2, b: 8, c: 14 },
      ],
    },
    localModels: [{ kind: "fir", id: "drive", signal: { source: "control", index: 0 }, window: 1 }],
    gates: [{ model: "drive", sign: 1, channel: 0, activation: { kind: "membership", index: 0 } }],
  };
}

describe("Model configuration", () => {
  it("fills defaults for omitted sections", () => {
    const cfg = parseModelConfig(minimal());
    expect(cfg.integrator).toBe("euler");
    expect(cfg.training).toEqual({ learningRate: 0.02, verbose: false });
    expect(cfg.inverse).toEqual({ order: 2, bounds: [], learningRate: 0.01 });
    expect(cfg.augmentation.splitRange).toEqual([0.25, 0.75]);
    expect(cfg.stability.margin).toBe(0);
    expect(cfg.frictionEllipse).toBeUndefined();
  });

  it("reports every invalid field by path", () => {
    const bad = { ...minimal(), sampleTime: -1, gates: [{ model: "ghost", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } }] };
    expect(() => parseModelConfig(bad)).toThrow(ModelConfigurationError);
    expect(() => parseModelConfig(bad)).toThrow(/sampleTime/);
  });

  it("rejects gates that reference unknown models", () => {
    const bad = { ...minimal(), gates: [{ model: "ghost", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } }] };
    expect(() => parseModelConfig(bad)).toThrow(/gates\.0\.model/);
  });

  it("rejects a planar-body integrator without three state channels", () => {
    expect(() => parseModelConfig({ ...minimal(), integrator: "planar-body" })).toThrow(/integrator/);
  });

  it("fills friction ellipse defaults", () => {
    const cfg = parseModelConfig({
      ...minimal(),
      stateDim: 2,
      frictionEllipse: { speed: { source: "state", index: 0 }, brake: { source: "control", index: 0 } },
    });
    expect(cfg.frictionEllipse).toEqual({
      axChannel: 0,
      ayChannel: 1,
      speed: { source: "state", index: 0 },
      brake: { source: "control", index: 0 },
      muMin: 0.6,
      muMax: 2,
      g: 9.81,
      eps: 1e-6,
    });
  });
});

describe("Building components from the example configuration", () => {
  it("loads and assembles the longitudinal example", async () => {
    const cfg = await loadModelConfig(examplePath);
    expect(cfg.name).toBe("longitudinal");

    const fuzzy = toFuzzySet(cfg.fuzzySet);
    expect(fuzzy.functions).toHaveLength(3);
    expect(fuzzy.normalized).toBe(true);

    const forward = buildForwardModel(cfg);
    expect(forward.bank.size).toBe(3);
    expect(forward.gates.map((g) => g.label)).toEqual([
      "drive@membership[0]",
      "drive@membership[1]",
      "brake@control[1]>0.05",
      "drag@learned",
    ]);

    const inverse = buildInverseModel(forward, cfg);
    expect(inverse.cfg.bounds).toEqual([
      [0, 1],
      [0, 1],
    ]);
    expect(buildAugmenter(cfg).cfg.splitRange).toEqual([0.3, 0.7]);
    expect(buildStabilityAnalyzer(cfg).cfg.margin).toBe(0.02);

    inverse.dispose();
    forward.dispose();
  });

  it("rejects files that are not JSON", async () => {
    const notJson = fileURLToPath(new URL("./config.test.ts", import.meta.url));
    await expect(loadModelConfig(notJson)).rejects.toBeInstanceOf(ModelConfigurationError);
  });
});
