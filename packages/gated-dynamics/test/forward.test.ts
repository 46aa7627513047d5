import { describe, expect, it } from "vitest";

import { FrozenParameterViolation, ModelConfigurationError } from "../src/errors";
import { uniformTriangularSet } from "../src/fuzzy/membership";
import type { ForwardModelConfigInput } from "../src/model/forward";
import { ForwardModel } from "../src/model/forward";
import { fixedEpochs, lossPlateau } from "../src/training";
import type { Episode } from "../src/types";
import { episodeFromArrays } from "../src/types";

const TS = 0.1;

function baseConfig(overrides: Partial<ForwardModelConfigInput> = {}): ForwardModelConfigInput {
  return {
    sampleTime: TS,
    stateDim: 1,
    controlDim: 1,
    operatingVariable: { source: "state", index: 0 },
    fuzzySet: uniformTriangularSet("speed", [0, 10], 2, { normalized: true }),
    localModels: [{ kind: "fir", id: "drive", signal: { source: "control", index: 0 }, window: 1 }],
    gates: [{ model: "drive", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } }],
    ...overrides,
  };
}

/** v_{k+1} = v_k + Ts · (gain · u_k + bias) */
function longitudinalEpisode(id: string, gain: number, bias: number, steps = 30): Episode {
  const controls = Array.from({ length: steps }, (_, k) => [1 + 0.5 * Math.sin(k)]);
  const states = [[1]];
  for (let k = 1; k < steps; k++) {
    const v = states[k - 1]![0]!;
    states.push([v + TS * (gain * controls[k - 1]![0]! + bias)]);
  }
  return episodeFromArrays(id, states, controls, TS);
}

describe("ForwardModel: prediction", () => {
  it("returns one state per control plus the initial state", () => {
    const model = new ForwardModel(baseConfig());
    model.bank.byId("drive").params.assignValues("taps", [2]);

    const states = model.predict([[1], [1], [0.5]], [1]);
    expect(states).toHaveLength(4);
    expect(states[0]).toEqual([1]);
    expect(states[1]![0]).toBeCloseTo(1.2, 5);
    expect(states[2]![0]).toBeCloseTo(1.4, 5);
    expect(states[3]![0]).toBeCloseTo(1.5, 5);
    model.dispose();
  });

  it("is deterministic for fixed parameters", () => {
    const model = new ForwardModel(baseConfig());
    model.bank.byId("drive").params.assignValues("taps", [1.5]);
    const controls = [[1], [0.2], [-0.4], [0.9]];
    expect(model.predict(controls, [2])).toEqual(model.predict(controls, [2]));
    model.dispose();
  });

  it("reports per-step diagnostics", () => {
    const model = new ForwardModel(baseConfig());
    model.bank.byId("drive").params.assignValues("taps", [2]);
    const [first] = model.diagnostics([[1]], [5]);
    expect(first?.operatingValue).toBe(5);
    expect(first?.activations).toEqual([0.5, 0.5]);
    expect(first?.terms[0]?.label).toBe("drive@constant(1)");
    expect(first?.acceleration[0]).toBeCloseTo(2, 5);
    expect(first?.mu).toBeNull();
    model.dispose();
  });
});

describe("ForwardModel: training stages", () => {
  it("fits local models by teacher-forced next-state error", async () => {
    const model = new ForwardModel(baseConfig({ learningRate: 0.05 }));
    const episode = longitudinalEpisode("ep", 2, 0);

    const before = model.evaluate([episode]);
    const report = await model.train([episode], fixedEpochs(300));
    expect(report.epochs).toBe(300);
    expect(report.finalLoss).toBeLessThan(report.losses[0]!);
    expect(model.evaluate([episode])).toBeLessThan(before);
    expect(model.bank.byId("drive").params.read("taps")[0]).toBeCloseTo(2, 0);
    model.dispose();
  });

  it("fits a per-model bias by least squares", async () => {
    const model = new ForwardModel(
      baseConfig({
        localModels: [
          { kind: "fir", id: "drive", signal: { source: "control", index: 0 }, window: 1, nonlinearity: "bias" },
        ],
      })
    );
    model.bank.byId("drive").params.assignValues("taps", [2]);
    const episode = longitudinalEpisode("ep", 2, 0.5);

    const report = await model.fitNonlinearity([episode], { phase1: fixedEpochs(1), phase2: fixedEpochs(1) });
    expect(report.coefficients["drive"]).toBeCloseTo(0.5, 4);
    expect(report.saturatedSamples).toBe(0);

    const states = episode.steps.map((s) => [...s.state]);
    const controls = episode.steps.slice(0, -1).map((s) => [...s.control]);
    const predicted = model.predict(controls, states[0]!);
    predicted.forEach((p, k) => expect(p[0]).toBeCloseTo(states[k]![0]!, 3));
    model.dispose();
  });

  it("moves learned gate parameters during stage-1 training", async () => {
    const model = new ForwardModel(
      baseConfig({
        gates: [{ model: "drive", sign: 1, channel: 0, activation: { kind: "learned", initialBias: 0 } }],
      })
    );
    model.bank.byId("drive").params.assignValues("taps", [2]);
    const gate = model.gates[0]?.params;
    if (!gate) throw new Error("expected a learned gate");
    expect(gate.read("w")).toEqual([0, 0]);
    expect(gate.read("c")).toEqual([0]);

    await model.train([longitudinalEpisode("ep", 2, 0.5)], fixedEpochs(20));

    expect(gate.read("w").some((v) => v !== 0)).toBe(true);
    expect(gate.read("c")[0]).not.toBe(0);
    model.dispose();
  });

  it("fits quadratic and cubic corrections inside the model", async () => {
    for (const [family, order] of [
      ["quadratic", 2],
      ["cubic", 3],
    ] as const) {
      const model = new ForwardModel(
        baseConfig({
          localModels: [
            { kind: "fir", id: "drive", signal: { source: "control", index: 0 }, window: 1, nonlinearity: family },
          ],
        })
      );
      model.bank.byId("drive").params.assignValues("taps", [2]);

      // a = y + 0.3·y^k with y = 2·u
      const controls = Array.from({ length: 20 }, (_, k) => [1 + 0.5 * Math.sin(k)]);
      const states = [[1]];
      for (let k = 1; k < controls.length; k++) {
        const y = 2 * controls[k - 1]![0]!;
        states.push([states[k - 1]![0]! + TS * (y + 0.3 * y ** order)]);
      }
      const episode = episodeFromArrays(family, states, controls, TS);

      const report = await model.fitNonlinearity([episode], { phase1: fixedEpochs(1), phase2: fixedEpochs(1) });
      expect(report.coefficients["drive"]).toBeCloseTo(0.3, 3);
      model.dispose();
    }
  });

  it("runs both tanh-state phases on the residual", async () => {
    const model = new ForwardModel(
      baseConfig({
        localModels: [
          {
            kind: "fir",
            id: "drive",
            signal: { source: "control", index: 0 },
            window: 1,
            nonlinearity: "tanh-state",
          },
        ],
      })
    );
    model.bank.byId("drive").params.assignValues("taps", [2]);
    const episode = longitudinalEpisode("ep", 2.2, 0.1);

    const report = await model.fitNonlinearity([episode], {
      phase1: fixedEpochs(20),
      phase2: fixedEpochs(20),
    });
    expect(report.tanhState["drive"]?.phase1.epochs).toBe(20);
    expect(report.tanhState["drive"]?.phase2?.epochs).toBe(20);
    expect(model.tanhLearner("drive")?.state).toBe("PHASE2_REFINED");
    model.dispose();
  });

  it("freezing makes every forward parameter read-only", async () => {
    const model = new ForwardModel(baseConfig());
    const episode = longitudinalEpisode("ep", 2, 0);
    model.freeze();

    expect(model.isFrozen()).toBe(true);
    expect(model.parameterGroups().every((g) => g.isFrozen())).toBe(true);
    await expect(model.train([episode], fixedEpochs(5))).rejects.toBeInstanceOf(FrozenParameterViolation);
    await expect(
      model.fitNonlinearity([episode], { phase1: fixedEpochs(1), phase2: fixedEpochs(1) })
    ).rejects.toBeInstanceOf(FrozenParameterViolation);
    expect(() => model.bank.byId("drive").params.assignValues("taps", [3])).toThrow(FrozenParameterViolation);
    model.dispose();
  });

  it("counts as converged only after a converged stage 1 or an import", async () => {
    const episode = longitudinalEpisode("ep", 2, 0);

    const trained = new ForwardModel(baseConfig());
    const report = await trained.train([episode], fixedEpochs(3));
    expect(report.converged).toBe(true);
    expect(trained.isConverged()).toBe(false);
    trained.freeze();
    expect(trained.isConverged()).toBe(true);
    trained.dispose();

    const stopped = new ForwardModel(baseConfig());
    const cut = await stopped.train([episode], lossPlateau({ patience: 50, minDelta: 1e-3, maxEpochs: 2 }));
    expect(cut.converged).toBe(false);
    stopped.freeze();
    expect(stopped.isConverged()).toBe(false);
    stopped.dispose();

    const restored = new ForwardModel(baseConfig());
    restored.importParameters({ "local/drive": { taps: [2] } });
    expect(restored.exportParameters()["local/drive"]).toEqual({ taps: [2] });
    expect(() => restored.importParameters({ "local/ghost": { taps: [1] } })).toThrow(ModelConfigurationError);
    restored.freeze();
    expect(restored.isConverged()).toBe(true);
    restored.dispose();
  });

  it("exports parameter snapshots by group name", () => {
    const model = new ForwardModel(baseConfig());
    model.bank.byId("drive").params.assignValues("taps", [2]);
    const params = model.exportParameters();
    expect(params["local/drive"]).toEqual({ taps: [2] });
    expect(params["forward/corrections"]).toEqual({ coef: [0] });
    model.dispose();
  });
});

describe("ForwardModel: configuration", () => {
  it("rejects a planar-body integrator on a one-channel state", () => {
    expect(() => new ForwardModel(baseConfig({ integrator: "planar-body" }))).toThrow(ModelConfigurationError);
  });

  it("rejects two tanh-state corrections on one channel", () => {
    expect(
      () =>
        new ForwardModel(
          baseConfig({
            localModels: [
              { kind: "fir", id: "a", signal: { source: "control", index: 0 }, window: 1, nonlinearity: "tanh-state" },
              { kind: "fir", id: "b", signal: { source: "state", index: 0 }, window: 1, nonlinearity: "tanh-state" },
            ],
            gates: [
              { model: "a", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } },
              { model: "b", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } },
            ],
          })
        )
    ).toThrow(ModelConfigurationError);
  });

  it("rejects episodes with the wrong dimensions", async () => {
    const model = new ForwardModel(baseConfig());
    const episode = episodeFromArrays("wide", [[1, 0], [1, 0]], [[0], [0]], TS);
    await expect(model.train([episode], fixedEpochs(1))).rejects.toBeInstanceOf(ModelConfigurationError);
    model.dispose();
  });
});

describe("ForwardModel: friction ellipse", () => {
  function ellipseConfig(): ForwardModelConfigInput {
    return baseConfig({
      stateDim: 2,
      controlDim: 2,
      gates: [{ model: "drive", sign: 1, channel: 0, activation: { kind: "constant", value: 1 } }],
      frictionEllipse: {
        axChannel: 0,
        ayChannel: 1,
        speed: { source: "state", index: 0 },
        brake: { source: "control", index: 1 },
        muMin: 0.6,
        muMax: 2.0,
        g: 9.81,
        eps: 1e-6,
      },
    });
  }

  it("scales a predicted acceleration back onto the ellipse", () => {
    const model = new ForwardModel(ellipseConfig());
    model.bank.byId("drive").params.assignValues("taps", [100]);

    // at rest with no brake μ = 1.3, so ax is capped near 1.3 · 9.81
    const [, next] = model.predict([[1, 0]], [0, 0]);
    expect(next![0]).toBeCloseTo(1.2753, 3);
    expect(next![1]).toBe(0);

    const [step] = model.diagnostics([[1, 0]], [0, 0]);
    expect(step?.mu).toBeCloseTo(1.3, 12);
    expect(step?.acceleration[0]).toBeCloseTo(12.753, 2);
    model.dispose();
  });

  it("leaves saturated samples out of the correction fit", async () => {
    const model = new ForwardModel(ellipseConfig());
    model.bank.byId("drive").params.assignValues("taps", [100]);
    const episode = episodeFromArrays(
      "hard-launch",
      [
        [0, 0],
        [1, 0],
        [2, 0],
        [2.1, 0],
      ],
      [
        [1, 0],
        [1, 0],
        [0.01, 0],
        [0, 0],
      ],
      TS
    );

    const report = await model.fitNonlinearity([episode], { phase1: fixedEpochs(1), phase2: fixedEpochs(1) });
    // ax = 100 at the first two steps exceeds μ·g ≤ 19.62; ax = 1 at the third does not
    expect(report.saturatedSamples).toBe(2);
    model.dispose();
  });
});
