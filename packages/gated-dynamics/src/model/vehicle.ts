/**
 * Vehicle coupling blocks placed after the superposition:
 *
 * - Effective friction μ_eff as a function of how aggressively the car is
 *   driven (speed and brake), between μ_min and μ_max
 * - Friction-ellipse saturation: if (ax, ay) leaves the ellipse of radius
 *   μ_eff·g, both are scaled down by 1/η
 * - Integrators from accelerations to the next state
 */

import * as tf from "@tensorflow/tfjs";
import type { SignalRef } from "../types";
import type { Vec } from "../vec";
import { sigmoid } from "../vec";

export interface FrictionEllipseConfig {
  /** Output channel holding longitudinal acceleration */
  axChannel: number;
  /** Output channel holding lateral acceleration */
  ayChannel: number;
  speed: SignalRef;
  brake: SignalRef;
  muMin: number;
  muMax: number;
  g: number;
  eps: number;
}

export const defaultFrictionEllipseConfig: Omit<FrictionEllipseConfig, "speed" | "brake"> = {
  axChannel: 0,
  ayChannel: 1,
  muMin: 0.6,
  muMax: 2.0,
  g: 9.81,
  eps: 1e-6,
};

/** μ_eff = μ_min + (μ_max − μ_min)·σ(0.5·vx + 2·brake) */
export function effectiveFriction(
  vx: number,
  brake: number,
  cfg: Pick<FrictionEllipseConfig, "muMin" | "muMax">
): number {
  return cfg.muMin + (cfg.muMax - cfg.muMin) * sigmoid(0.5 * vx + 2 * brake);
}

/**
 * η = sqrt((ax/(μg))² + (ay/(μg))² + ε); scale by 1/η when η > 1.
 */
export function saturateFrictionEllipse(
  ax: number,
  ay: number,
  mu: number,
  cfg: Pick<FrictionEllipseConfig, "g" | "eps">
): { ax: number; ay: number; eta: number } {
  const denom = mu * cfg.g + cfg.eps;
  const nx = ax / denom;
  const ny = ay / denom;
  const eta = Math.sqrt(nx * nx + ny * ny + cfg.eps);
  const s = eta > 1 ? 1 / eta : 1;
  return { ax: ax * s, ay: ay * s, eta };
}

/** Tensor twin of `saturateFrictionEllipse` applied to an output vector. */
export function saturateFrictionEllipseTensor(
  accel: tf.Tensor1D,
  mu: number,
  cfg: FrictionEllipseConfig
): tf.Tensor1D {
  const parts = tf.unstack(accel);
  const ax = parts[cfg.axChannel];
  const ay = parts[cfg.ayChannel];
  if (!ax || !ay) {
    throw new RangeError(
      `Friction ellipse channels ${cfg.axChannel}/${cfg.ayChannel} out of range (${parts.length})`
    );
  }
  const denom = mu * cfg.g + cfg.eps;
  const eta = tf.sqrt(tf.add(tf.add(tf.square(tf.div(ax, denom)), tf.square(tf.div(ay, denom))), cfg.eps));
  const s = tf.where(tf.greater(eta, 1), tf.div(1, eta), tf.onesLike(eta));
  parts[cfg.axChannel] = tf.mul(ax, s);
  parts[cfg.ayChannel] = tf.mul(ay, s);
  return tf.stack(parts) as tf.Tensor1D;
}

export type IntegratorKind = "euler" | "planar-body";

/**
 * Next state from current state and accelerations.
 *
 * - euler: x_{k+1} = x_k + Ts·a_k, channel by channel
 * - planar-body: state (vx, vy, r) and accelerations (ax, ay, ṙ) in the body
 *   frame, with the r·vx coupling on the lateral channel
 */
export function integrate(kind: IntegratorKind, state: readonly number[], accel: readonly number[], ts: number): Vec {
  if (kind === "euler") {
    return state.map((x, i) => x + ts * (accel[i] ?? 0));
  }
  const [vx = 0, vy = 0, r = 0] = state;
  const [ax = 0, ay = 0, rdot = 0] = accel;
  return [vx + ts * ax, vy + ts * (ay - r * vx), r + ts * rdot];
}

export function integrateTensor(
  kind: IntegratorKind,
  state: tf.Tensor1D,
  accel: tf.Tensor1D,
  ts: number
): tf.Tensor1D {
  if (kind === "euler") {
    return tf.add(state, tf.mul(accel, ts));
  }
  const [vx, vy, r] = tf.unstack(state);
  const [ax, ay, rdot] = tf.unstack(accel);
  if (!vx || !vy || !r || !ax || !ay || !rdot) {
    throw new RangeError("planar-body integrator needs 3 state and 3 acceleration channels");
  }
  return tf.stack([
    tf.add(vx, tf.mul(ax, ts)),
    tf.add(vy, tf.mul(tf.sub(ay, tf.mul(r, vx)), ts)),
    tf.add(r, tf.mul(rdot, ts)),
  ]) as tf.Tensor1D;
}
