/**
 * Simulation configuration.
 *
 * Two surfaces:
 *   1. Backend selection from the environment (MOLECULAR_SIM_BACKEND,
 *      PKPD_SIM_BACKEND, CIRCUIT_SIM_BACKEND), read once when the capability
 *      snapshot is built.
 *   2. Empirical tuning constants (mechanism multipliers, kinetic rates,
 *      edge-toggle factors, score calibration). These are not biological
 *      ground truth; every value can be overridden per run.
 */

import { z } from "zod";
import { MECHANISMS, METRIC_IDS, STAGE_NAMES } from "@/types/simulation";
import type { AssumptionKey, BackendLevel, Mechanism, MetricId, StageName } from "@/types/simulation";
import { TIME_RESOLUTION_HOURS } from "./numeric";

// ─── Environment ─────────────────────────────────────────────

const BACKEND_ENV_KEYS: Record<StageName, string> = {
  molecular: "MOLECULAR_SIM_BACKEND",
  pkpd: "PKPD_SIM_BACKEND",
  circuit: "CIRCUIT_SIM_BACKEND",
};

const backendSetting = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z
    .string()
    .trim()
    .toLowerCase()
    // "scipy" is the historical name of the reference integrator setting
    .transform((value) => (value === "scipy" ? "reference" : value))
    .pipe(z.enum(["analytic", "reference", "high_fidelity"]))
    .default("analytic"),
);

const BackendEnvSchema = z.object({
  molecular: backendSetting,
  pkpd: backendSetting,
  circuit: backendSetting,
});

export type BackendConfig = Record<StageName, BackendLevel>;

export class BackendConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = "BackendConfigError";
    this.keys = keys;
  }
}

function envKeyFor(segment: string | number | undefined): string {
  const stage = STAGE_NAMES.find((s) => s === segment);
  return stage ? BACKEND_ENV_KEYS[stage] : String(segment);
}

/** Parse the requested backend level per stage. Unset or empty means analytic. */
export function readBackendConfig(env: Record<string, string | undefined> = process.env): BackendConfig {
  const parsed = BackendEnvSchema.safeParse({
    molecular: env[BACKEND_ENV_KEYS.molecular],
    pkpd: env[BACKEND_ENV_KEYS.pkpd],
    circuit: env[BACKEND_ENV_KEYS.circuit],
  });
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => envKeyFor(issue.path[0]));
    throw new BackendConfigError(
      `Unsupported simulation backend setting (${keys.join(", ")}); expected analytic, reference, scipy or high_fidelity`,
      keys,
    );
  }
  return parsed.data;
}

// ─── Tuning parameters ───────────────────────────────────────

/** Toggles implemented as a single multiplicative edge-weight modifier. */
export type EdgeToggleKey = Exclude<AssumptionKey, "acute_1a_clamp" | "adhd_cohort" | "gut_bias">;

export interface EvidenceParameters {
  /** Uncertainty reported when a receptor/metric pair has no graph evidence */
  noEvidenceUncertainty: number;
  /** Pseudo-count pulling the evidence multiplier toward 1.0 when sources are few */
  sourcePrior: number;
}

export interface AssumptionParameters {
  /** Multiplier on 5-HT1A-derived weights at t = 0 */
  acute1aClamp: number;
  /** Multiplier on weights from dopamine-tagged receptors */
  adhdDopamineScale: number;
  /** Input gain on gut-brain-axis modules */
  gutBiasGain: number;
}

export interface MolecularParameters {
  transientHours: number;
  stepHours: number;
  /** Receptor occupancy relaxation rate (1/h) at the reference affinity */
  bindingRate: number;
  /** Messenger relaxation rate toward summed receptor signal (1/h) */
  couplingRate: number;
  /** Ki at which a receptor binds at exactly bindingRate */
  affinityReferenceNm: number;
  /** Lowest expression scale; expression 1 maps to 1 */
  expressionFloor: number;
  /** Number of evenly spaced samples kept from the transient */
  transientSamples: number;
}

export interface TimeAxisParameters {
  horizonHours: number;
  stepHours: number;
}

export interface PkpdParameters {
  /** First-order absorption rate (1/h) */
  absorptionRate: number;
  eliminationHalfLifeHours: number;
  /** Chronic dosing lengthens the apparent half-life */
  chronicHalfLifeFactor: number;
  bioavailability: number;
  centralVolumeL: number;
  peripheralVolumeL: number;
  /** Inter-compartmental clearance (L/h) */
  distributionClearanceLPerH: number;
  substepHours: number;
}

export interface CircuitParameters {
  /** Soft bound B in B·tanh(x/B) */
  saturationBound: number;
  /** β in the pvt blend term pvt_weight·β·x_pvt */
  pvtBlendGain: number;
  /** Leak rate of the continuous-time reference model (1/h) */
  leakRate: number;
  substepHours: number;
  toggleFactors: Record<EdgeToggleKey, number>;
}

export interface AggregationParameters {
  scoreGain: number;
  /** Added to metric uncertainty for every stage that fell back */
  fallbackPenalty: number;
  cohortOffsets: {
    adhd: Partial<Record<MetricId, number>>;
    gutBias: Partial<Record<MetricId, number>>;
    chronic: Partial<Record<MetricId, number>>;
  };
}

export interface SimulationParameters {
  mechanism: Record<Mechanism, number>;
  /** Inverse-agonist efficacy for registry entries that declare none */
  defaultIntrinsicEfficacy: number;
  evidence: EvidenceParameters;
  assumptions: AssumptionParameters;
  molecular: MolecularParameters;
  time: TimeAxisParameters;
  pkpd: PkpdParameters;
  circuit: CircuitParameters;
  aggregation: AggregationParameters;
}

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

export const DEFAULT_PARAMETERS: DeepReadonly<SimulationParameters> = deepFreeze<SimulationParameters>({
  mechanism: { agonist: 1.0, antagonist: -1.0, partial: 0.5, inverse: -1.0 },
  defaultIntrinsicEfficacy: 1.3,
  evidence: { noEvidenceUncertainty: 0.5, sourcePrior: 1 },
  assumptions: { acute1aClamp: 0.6, adhdDopamineScale: 0.8, gutBiasGain: 1.15 },
  molecular: {
    transientHours: 1,
    stepHours: 0.02,
    bindingRate: 3.0,
    couplingRate: 2.5,
    affinityReferenceNm: 5,
    expressionFloor: 0.5,
    transientSamples: 6,
  },
  time: { horizonHours: 48, stepHours: 2 },
  pkpd: {
    absorptionRate: 1.2,
    eliminationHalfLifeHours: 6,
    chronicHalfLifeFactor: 1.5,
    bioavailability: 0.6,
    centralVolumeL: 40,
    peripheralVolumeL: 80,
    distributionClearanceLPerH: 8,
    substepHours: 0.05,
  },
  circuit: {
    saturationBound: 4,
    pvtBlendGain: 0.25,
    leakRate: 1.0,
    substepHours: 0.1,
    toggleFactors: {
      trkB_facilitation: 1.3,
      alpha2a_hcn_closure: 1.25,
      mu_opioid_bonding: 1.35,
      a2a_d2_heteromer: 1.2,
      alpha2c_gate: 0.7,
      bla_cholinergic_salience: 1.4,
      oxytocin_prosocial: 1.3,
      vasopressin_gating: 1.3,
    },
  },
  aggregation: {
    scoreGain: 1.5,
    fallbackPenalty: 0.1,
    cohortOffsets: {
      adhd: { drive: -0.1, motivation: -0.08 },
      gutBias: { apathy: 0.06 },
      chronic: { sleep_quality: 0.04 },
    },
  },
});

// ─── Overrides ───────────────────────────────────────────────

const finite = z.number().finite();
const positive = finite.positive();
const unit = finite.min(0).max(1);
const step = finite.gte(TIME_RESOLUTION_HOURS, { message: `step must be at least ${TIME_RESOLUTION_HOURS} h` });

const metricOffsets = z.record(z.enum(METRIC_IDS), finite);

/** Shape of SimulationOptions.parameters; every value is checked before a run. */
export const ParameterOverridesSchema = z
  .object({
    mechanism: z.record(z.enum(MECHANISMS), finite),
    defaultIntrinsicEfficacy: positive,
    evidence: z
      .object({ noEvidenceUncertainty: unit, sourcePrior: finite.nonnegative() })
      .partial()
      .strict(),
    assumptions: z
      .object({ acute1aClamp: finite.nonnegative(), adhdDopamineScale: finite.nonnegative(), gutBiasGain: positive })
      .partial()
      .strict(),
    molecular: z
      .object({
        transientHours: positive,
        stepHours: step,
        bindingRate: positive,
        couplingRate: positive,
        affinityReferenceNm: positive,
        expressionFloor: unit,
        transientSamples: z.number().int().min(1).max(1000),
      })
      .partial()
      .strict(),
    time: z.object({ horizonHours: positive, stepHours: step }).partial().strict(),
    pkpd: z
      .object({
        absorptionRate: positive,
        eliminationHalfLifeHours: positive,
        chronicHalfLifeFactor: positive,
        bioavailability: finite.positive().max(1),
        centralVolumeL: positive,
        peripheralVolumeL: positive,
        distributionClearanceLPerH: finite.nonnegative(),
        substepHours: step,
      })
      .partial()
      .strict(),
    circuit: z
      .object({
        saturationBound: positive,
        pvtBlendGain: finite.nonnegative(),
        leakRate: positive,
        substepHours: step,
        toggleFactors: z
          .object({
            trkB_facilitation: positive,
            alpha2a_hcn_closure: positive,
            mu_opioid_bonding: positive,
            a2a_d2_heteromer: positive,
            alpha2c_gate: positive,
            bla_cholinergic_salience: positive,
            oxytocin_prosocial: positive,
            vasopressin_gating: positive,
          })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
    aggregation: z
      .object({
        scoreGain: positive,
        fallbackPenalty: unit,
        cohortOffsets: z
          .object({ adhd: metricOffsets, gutBias: metricOffsets, chronic: metricOffsets })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ParameterOverrides = z.infer<typeof ParameterOverridesSchema>;

const MAX_TIMEPOINTS = 10_000;
const MAX_INTEGRATION_STEPS = 1_000_000;

/** Constraints that span several values; empty when the merged set is usable. */
export function parameterConflicts(params: SimulationParameters): string[] {
  const issues: string[] = [];
  const { horizonHours, stepHours } = params.time;
  if (stepHours > horizonHours) {
    issues.push(`time.stepHours: step ${stepHours} h exceeds the ${horizonHours} h horizon`);
  } else if (horizonHours / stepHours + 1 > MAX_TIMEPOINTS) {
    issues.push(`time: more than ${MAX_TIMEPOINTS} timepoints`);
  }
  if (params.molecular.transientHours / params.molecular.transientSamples < TIME_RESOLUTION_HOURS) {
    issues.push(`molecular.transientSamples: transient sampling is finer than ${TIME_RESOLUTION_HOURS} h`);
  }
  const integrations: [string, number, number][] = [
    ["molecular.stepHours", params.molecular.transientHours, params.molecular.stepHours],
    ["pkpd.substepHours", horizonHours, params.pkpd.substepHours],
    ["circuit.substepHours", horizonHours, params.circuit.substepHours],
  ];
  for (const [path, span, substep] of integrations) {
    if (span / substep > MAX_INTEGRATION_STEPS) {
      issues.push(`${path}: more than ${MAX_INTEGRATION_STEPS} integration steps`);
    }
  }
  return issues;
}

/** Copy of `base` with every defined value of `patch` laid over it. */
function overlay<T extends object>(base: Readonly<T>, patch: Partial<T> | undefined): T {
  const out: T = { ...base };
  if (patch === undefined) return out;
  for (const key in base) {
    const value = patch[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Overlay overrides on the defaults. Always returns a fresh, unfrozen object. */
export function resolveParameters(overrides: ParameterOverrides = {}): SimulationParameters {
  const d = DEFAULT_PARAMETERS;
  const { toggleFactors, ...circuit } = overrides.circuit ?? {};
  const { cohortOffsets, ...aggregation } = overrides.aggregation ?? {};
  return {
    mechanism: overlay<Record<Mechanism, number>>(d.mechanism, overrides.mechanism),
    defaultIntrinsicEfficacy: overrides.defaultIntrinsicEfficacy ?? d.defaultIntrinsicEfficacy,
    evidence: overlay<EvidenceParameters>(d.evidence, overrides.evidence),
    assumptions: overlay<AssumptionParameters>(d.assumptions, overrides.assumptions),
    molecular: overlay<MolecularParameters>(d.molecular, overrides.molecular),
    time: overlay<TimeAxisParameters>(d.time, overrides.time),
    pkpd: overlay<PkpdParameters>(d.pkpd, overrides.pkpd),
    circuit: {
      ...overlay<CircuitParameters>(d.circuit, circuit),
      toggleFactors: overlay<Record<EdgeToggleKey, number>>(d.circuit.toggleFactors, toggleFactors),
    },
    aggregation: {
      ...overlay<AggregationParameters>(d.aggregation, aggregation),
      cohortOffsets: {
        adhd: { ...d.aggregation.cohortOffsets.adhd, ...cohortOffsets?.adhd },
        gutBias: { ...d.aggregation.cohortOffsets.gutBias, ...cohortOffsets?.gutBias },
        chronic: { ...d.aggregation.cohortOffsets.chronic, ...cohortOffsets?.chronic },
      },
    },
  };
}
