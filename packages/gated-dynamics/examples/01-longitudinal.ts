/**
 * Experiment 01: Longitudinal speed model
 *
 * Demonstrates:
 * - Loading a model configuration
 * - Augmenting a small recorded corpus
 * - Staged training: local models → nonlinearity → freeze → inverse
 * - Stability certification and trajectory metrics
 *
 * Expected outcome:
 * - Forward RMSE well below the speed range
 * - Inverse model poles inside the unit circle
 */

import { fileURLToPath } from "node:url";
import {
  buildAugmenter,
  buildForwardModel,
  buildInverseModel,
  buildStabilityAnalyzer,
  episodeFromArrays,
  evaluateForward,
  evaluateInverse,
  fixedEpochs,
  loadModelConfig,
  lossPlateau,
  StatsLogger,
  type Episode,
} from "../src";

/** Synthetic vehicle: throttle drive, brake, quadratic drag. */
function recordEpisode(id: string, ts: number, steps: number, phase: number): Episode {
  const states: number[][] = [[5 + phase]];
  const controls: number[][] = [];
  for (let k = 0; k < steps; k++) {
    const throttle = 0.5 + 0.4 * Math.sin(0.07 * k + phase);
    const brake = Math.max(0, Math.sin(0.05 * k - phase) - 0.6);
    controls.push([throttle, brake]);
    const v = states[k]![0]!;
    const accel = 3 * throttle + 0.4 * throttle ** 3 - 6 * brake - 0.002 * v * v;
    if (k + 1 < steps) states.push([Math.max(0, v + ts * accel)]);
  }
  return episodeFromArrays(id, states, controls, ts);
}

async function main() {
  const cfg = await loadModelConfig(fileURLToPath(new URL("./longitudinal.json", import.meta.url)));
  const logger = await StatsLogger.create({ experiment: "Longitudinal", config: cfg }, { baseDir: "runs" });

  const recorded = [0, 0.8, 1.6].map((phase, i) => recordEpisode(`rec-${i}`, cfg.sampleTime, 120, phase));
  const augmenter = buildAugmenter(cfg);
  const { episodes: derived, skipped } = augmenter.augmentCorpus(recorded, {
    seed: 42,
    crossovers: 4,
    mutations: [{ perturbation: { kind: "gaussian", sigma: 0.05, target: "control" }, count: 2 }],
  });
  const corpus = [...recorded, ...derived];
  console.log(`Corpus: ${recorded.length} recorded + ${derived.length} derived (${skipped} skipped)`);

  const forward = buildForwardModel(cfg);
  const stage1 = await forward.train(corpus, lossPlateau({ patience: 20, minDelta: 1e-5, maxEpochs: 300 }));
  await logger.logLosses("forward", stage1.losses);
  console.log(`Forward: ${stage1.epochs} epochs, loss ${stage1.finalLoss.toFixed(5)}`);
  if (!stage1.converged) {
    console.log("Forward model did not reach a loss plateau; stopping before inverse training");
    await logger.close();
    forward.dispose();
    return;
  }

  const stage2 = await forward.fitNonlinearity(corpus, {
    phase1: fixedEpochs(100),
    phase2: fixedEpochs(100),
  });
  console.log(`Corrections: ${JSON.stringify(stage2.coefficients)}`);
  forward.freeze();

  const inverse = buildInverseModel(forward, cfg);
  const stage3 = await inverse.train(recorded, fixedEpochs(150));
  await logger.logLosses("inverse", stage3.losses);

  const stability = buildStabilityAnalyzer(cfg).check(inverse);
  console.log(
    `Stability: ${stability.verdict}, max |p| = ${stability.maxMagnitude.toFixed(4)} (${stability.poles.length} poles)`
  );

  const holdout = recordEpisode("holdout", cfg.sampleTime, 120, 2.4);
  const fwd = evaluateForward(forward, holdout);
  const inv = evaluateInverse(inverse, forward, holdout);
  await logger.logCheckpoint({
    stage: "forward",
    epoch: stage1.epochs,
    loss: stage1.finalLoss,
    rmse: fwd.rmse,
    maxAbsError: fwd.maxAbsError,
    computeMs: fwd.computeMs,
  });
  await logger.logCheckpoint({
    stage: "inverse",
    epoch: stage3.epochs,
    loss: stage3.finalLoss,
    rmse: inv.rmse,
    maxAbsError: inv.maxAbsError,
    computeMs: inv.computeMs,
  });
  await logger.close();

  console.log(`Holdout forward RMSE ${fwd.rmse.toFixed(4)} m/s (${fwd.computeMs.toFixed(1)} ms)`);
  console.log(`Holdout inverse tracking RMSE ${inv.rmse.toFixed(4)} m/s`);

  inverse.dispose();
  forward.dispose();
  console.log(`\n✓ Run written to ${logger.getRunDir()}`);
}

main().catch(console.error);
