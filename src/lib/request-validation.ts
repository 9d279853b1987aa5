/**
 * Request validation. Everything downstream assumes a ValidatedRequest:
 * occupancies in [0, 1], known mechanisms, one key per receptor, a complete
 * frozen AssumptionSet and a resolved pvt_weight. Parameter overrides are
 * checked here too, so no stage sees an unusable constant.
 */

import { z } from "zod";
import { MECHANISMS } from "@/types/simulation";
import type { Dosing, ReceptorSpec } from "@/types/simulation";
import { buildAssumptionSet } from "./assumptions";
import type { AssumptionSet } from "./assumptions";
import { canonicalReceptorName } from "./receptor-registry";
import { SimulationValidationError } from "./sim-errors";
import { ParameterOverridesSchema, parameterConflicts, resolveParameters } from "./sim-config";
import type { SimulationParameters } from "./sim-config";

export const DEFAULT_PVT_WEIGHT = 0.5;

const unitInterval = z.number().finite().min(0).max(1);

const ReceptorSpecSchema = z.object({
  occupancy: unitInterval,
  mechanism: z.enum(MECHANISMS),
});

const toggle = z.boolean().optional();

const AssumptionsSchema = z
  .object({
    acute_1a_clamp: toggle,
    adhd_cohort: toggle,
    gut_bias: toggle,
    trkB_facilitation: toggle,
    alpha2a_hcn_closure: toggle,
    mu_opioid_bonding: toggle,
    a2a_d2_heteromer: toggle,
    alpha2c_gate: toggle,
    bla_cholinergic_salience: toggle,
    oxytocin_prosocial: toggle,
    vasopressin_gating: toggle,
  })
  .strict();

export const SimulationRequestSchema = z.object({
  receptors: z
    .record(z.string().trim().min(1, "receptor id must not be blank"), ReceptorSpecSchema)
    .superRefine((receptors, ctx) => {
      const ids = Object.keys(receptors);
      if (ids.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one receptor is required" });
      }
      const seen = new Map<string, string>();
      for (const id of ids) {
        const canonical = canonicalReceptorName(id);
        const previous = seen.get(canonical);
        if (previous === undefined) {
          seen.set(canonical, id);
        } else {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [id],
            message: `names the same receptor as '${previous}' (${canonical})`,
          });
        }
      }
    }),
  dosing: z.enum(["acute", "chronic"]),
  assumptions: AssumptionsSchema.default({}),
  pvt_weight: unitInterval.default(DEFAULT_PVT_WEIGHT),
});

export interface ValidatedRequest {
  readonly receptors: Readonly<Record<string, Readonly<ReceptorSpec>>>;
  readonly dosing: Dosing;
  readonly assumptions: AssumptionSet;
  readonly pvtWeight: number;
}

function formatIssue(issue: z.ZodIssue, root: string[] = []): string {
  const path = [...root, ...issue.path].join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/** Throws SimulationValidationError listing every problem found. */
export function validateSimulationRequest(input: unknown): ValidatedRequest {
  const parsed = SimulationRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new SimulationValidationError(parsed.error.issues.map((issue) => formatIssue(issue)));
  }

  const receptors: Record<string, Readonly<ReceptorSpec>> = {};
  for (const [id, spec] of Object.entries(parsed.data.receptors)) {
    receptors[id] = Object.freeze({ occupancy: spec.occupancy, mechanism: spec.mechanism });
  }

  return Object.freeze({
    receptors: Object.freeze(receptors),
    dosing: parsed.data.dosing,
    assumptions: buildAssumptionSet(parsed.data.assumptions),
    pvtWeight: parsed.data.pvt_weight,
  });
}

/** Merge per-run overrides onto the defaults. Throws SimulationValidationError on any unusable value. */
export function validateSimulationParameters(overrides: unknown = {}): SimulationParameters {
  const parsed = ParameterOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new SimulationValidationError(parsed.error.issues.map((issue) => formatIssue(issue, ["parameters"])));
  }
  const parameters = resolveParameters(parsed.data);
  const conflicts = parameterConflicts(parameters);
  if (conflicts.length > 0) {
    throw new SimulationValidationError(conflicts.map((conflict) => `parameters.${conflict}`));
  }
  return parameters;
}
