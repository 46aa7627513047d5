/**
 * Model configuration document.
 *
 * A JSON file describes sample time, signals, the fuzzy set of the operating
 * variable, local models and their gates, vehicle blocks and the
 * augmentation policy. Everything is validated here before any tensor is
 * allocated.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ModelConfigurationError } from "../errors";

export const signalRefSchema = z.object({
  source: z.enum(["state", "control"]),
  index: z.number().int().min(0),
});

export const membershipFunctionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("triangular"), a: z.number(), b: z.number(), c: z.number() }),
  z.object({ kind: z.literal("gaussian"), mean: z.number(), sigma: z.number().positive() }),
  z.object({ kind: z.literal("sigmoid"), center: z.number(), slope: z.number() }),
]);

const domainSchema = z.tuple([z.number(), z.number()]);

export const fuzzySetSchema = z.union([
  z.object({
    name: z.string().min(1),
    domain: domainSchema,
    functions: z.array(membershipFunctionSchema).min(1),
    normalized: z.boolean().default(false),
    tolerance: z.number().positive().default(1e-9),
  }),
  z.object({
    name: z.string().min(1),
    domain: domainSchema,
    /** Evenly spaced triangles with shoulders at both ends */
    uniformTriangles: z.number().int().min(2),
    normalized: z.boolean().default(true),
    tolerance: z.number().positive().default(1e-9),
  }),
]);

const nonlinearitySchema = z.enum(["none", "bias", "quadratic", "cubic", "tanh-state"]);

export const localModelSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("fir"),
    id: z.string().min(1),
    signal: signalRefSchema,
    window: z.number().int().min(1),
    nonlinearity: nonlinearitySchema.optional(),
  }),
  z.object({
    kind: z.literal("mlp"),
    id: z.string().min(1),
    inputs: z.array(signalRefSchema).min(1),
    hiddenUnits: z.number().int().min(1),
    activation: z.enum(["tanh", "relu"]).optional(),
    seed: z.number().int().optional(),
    nonlinearity: nonlinearitySchema.optional(),
  }),
]);

export const activationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("membership"), index: z.number().int().min(0) }),
  z.object({ kind: z.literal("constant"), value: z.number().min(0).max(1) }),
  z.object({ kind: z.literal("control-rule"), signal: signalRefSchema, threshold: z.number() }),
  z.object({ kind: z.literal("learned"), initialBias: z.number().optional() }),
]);

export const gateSchema = z.object({
  model: z.string().min(1),
  sign: z.union([z.literal(1), z.literal(-1)]),
  channel: z.number().int().min(0),
  activation: activationSchema,
});

export const frictionEllipseSchema = z.object({
  axChannel: z.number().int().min(0).default(0),
  ayChannel: z.number().int().min(0).default(1),
  speed: signalRefSchema,
  brake: signalRefSchema,
  muMin: z.number().positive().default(0.6),
  muMax: z.number().positive().default(2.0),
  g: z.number().positive().default(9.81),
  eps: z.number().positive().default(1e-6),
});

const boundsSchema = z.array(z.tuple([z.number(), z.number()]).nullable());

export const modelConfigSchema = z
  .object({
    name: z.string().min(1),
    sampleTime: z.number().positive(),
    stateDim: z.number().int().min(1),
    controlDim: z.number().int().min(0),
    operatingVariable: signalRefSchema,
    fuzzySet: fuzzySetSchema,
    localModels: z.array(localModelSchema).min(1),
    gates: z.array(gateSchema).min(1),
    integrator: z.enum(["euler", "planar-body"]).default("euler"),
    frictionEllipse: frictionEllipseSchema.optional(),
    training: z
      .object({
        learningRate: z.number().positive().default(0.02),
        verbose: z.boolean().default(false),
      })
      .default({}),
    inverse: z
      .object({
        order: z.number().int().min(0).default(2),
        bounds: boundsSchema.default([]),
        learningRate: z.number().positive().default(0.01),
      })
      .default({}),
    augmentation: z
      .object({
        timeTolerance: z.number().positive().default(1e-9),
        bounds: z
          .object({ state: boundsSchema.default([]), control: boundsSchema.default([]) })
          .default({}),
        splitRange: z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)]).default([0.25, 0.75]),
      })
      .default({}),
    stability: z
      .object({
        margin: z.number().min(0).max(1).default(0),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    const ids = new Set(cfg.localModels.map((m) => m.id));
    cfg.gates.forEach((g, i) => {
      if (!ids.has(g.model)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["gates", i, "model"],
          message: `unknown local model "${g.model}"`,
        });
      }
      if (g.channel >= cfg.stateDim) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["gates", i, "channel"],
          message: `channel ${g.channel} out of range for stateDim ${cfg.stateDim}`,
        });
      }
    });
    if (cfg.integrator === "planar-body" && cfg.stateDim !== 3) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["integrator"],
        message: "planar-body integrator needs stateDim 3",
      });
    }
  });

export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type ModelConfigInput = z.input<typeof modelConfigSchema>;

/** Validate a configuration document; throws ModelConfigurationError listing every issue. */
export function parseModelConfig(input: unknown): ModelConfig {
  const result = modelConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ModelConfigurationError(`Invalid model configuration:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

export async function loadModelConfig(path: string): Promise<ModelConfig> {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ModelConfigurationError(
      `Model configuration ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseModelConfig(json);
}
