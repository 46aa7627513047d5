import * as tf from "@tensorflow/tfjs";
import { describe, expect, it } from "vitest";

import {
  defaultFrictionEllipseConfig,
  effectiveFriction,
  integrate,
  integrateTensor,
  saturateFrictionEllipse,
  saturateFrictionEllipseTensor,
} from "../src/model/vehicle";
import type { FrictionEllipseConfig } from "../src/model/vehicle";

const cfg: FrictionEllipseConfig = {
  ...defaultFrictionEllipseConfig,
  speed: { source: "state", index: 0 },
  brake: { source: "control", index: 1 },
};

describe("Friction ellipse", () => {
  it("effective friction is halfway between the limits at rest with no brake", () => {
    expect(effectiveFriction(0, 0, cfg)).toBeCloseTo(1.3, 12);
  });

  it("effective friction rises with speed and brake", () => {
    expect(effectiveFriction(10, 0, cfg)).toBeGreaterThan(effectiveFriction(0, 0, cfg));
    expect(effectiveFriction(0, 1, cfg)).toBeGreaterThan(effectiveFriction(0, 0, cfg));
    expect(effectiveFriction(100, 10, cfg)).toBeLessThanOrEqual(cfg.muMax);
  });

  it("leaves accelerations inside the ellipse unchanged", () => {
    const r = saturateFrictionEllipse(1, 1, 1, cfg);
    expect(r.eta).toBeLessThan(1);
    expect(r.ax).toBe(1);
    expect(r.ay).toBe(1);
  });

  it("scales accelerations outside the ellipse back onto it", () => {
    const r = saturateFrictionEllipse(2 * 9.81, 0, 1, cfg);
    expect(r.eta).toBeCloseTo(2, 5);
    expect(r.ax).toBeCloseTo(9.81, 4);
    expect(r.ay).toBe(0);
  });

  it("tensor twin agrees with the numeric version", () => {
    const out = tf.tidy(() =>
      Array.from(saturateFrictionEllipseTensor(tf.tensor1d([2 * 9.81, 0, 0.3]), 1, cfg).dataSync())
    );
    expect(out[0]).toBeCloseTo(9.81, 3);
    expect(out[1]).toBeCloseTo(0, 6);
    // channels outside the ellipse pair pass through
    expect(out[2]).toBeCloseTo(0.3, 6);
  });
});

describe("Integrators", () => {
  it("euler integrates each channel", () => {
    expect(integrate("euler", [1, 2], [10, -10], 0.1)).toEqual([2, 1]);
  });

  it("planar-body couples yaw rate into the lateral channel", () => {
    const next = integrate("planar-body", [10, 1, 0.5], [1, 2, 0.1], 0.1);
    expect(next[0]).toBeCloseTo(10.1, 12);
    expect(next[1]).toBeCloseTo(0.7, 12);
    expect(next[2]).toBeCloseTo(0.51, 12);
  });

  it("tensor integrators match the numeric ones", () => {
    const out = tf.tidy(() =>
      Array.from(
        integrateTensor("planar-body", tf.tensor1d([10, 1, 0.5]), tf.tensor1d([1, 2, 0.1]), 0.1).dataSync()
      )
    );
    expect(out[0]).toBeCloseTo(10.1, 4);
    expect(out[1]).toBeCloseTo(0.7, 4);
    expect(out[2]).toBeCloseTo(0.51, 4);
  });
});
