/**
 * Aggregation & Scoring: folds stage outputs into a SimulationResult.
 *
 * Score scale is (0, 100) with baseline 50:
 *
 *   raw(t)   = Σ readout weight × module activity(t) + cohort offsets
 *   score(t) = 50 + 50·tanh(scoreGain × raw(t))
 *
 * The headline score is the final timepoint. Uncertainty combines the
 * effective-weight uncertainties behind each metric and is widened by a
 * fixed penalty for every stage that ran on a fallback backend; the parts
 * are reported separately in details.uncertainty_breakdown.
 */

import { METRIC_IDS, STAGE_NAMES } from "@/types/simulation";
import type {
  Dosing,
  EngineReport,
  MetricId,
  ModuleTimeline,
  ReceptorContext,
  SimulationResult,
  StageName,
  UncertaintyBreakdown,
} from "@/types/simulation";
import type { AssumptionSet } from "./assumptions";
import { CIRCUIT_MODULES, CIRCUIT_MODULE_IDS, readoutEntries } from "./circuit-topology";
import type { ModuleTimelines } from "./circuit";
import type { EffectiveWeight, ResolvedReceptor } from "./evidence-resolver";
import type { ActivationSignal } from "./molecular-cascade";
import { clamp01, mean, shrinkUncertainty } from "./numeric";
import { metricRecord } from "./receptor-registry";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface AggregationInput {
  receptors: readonly ResolvedReceptor[];
  dosing: Dosing;
  assumptions: AssumptionSet;
  timepoints: readonly number[];
  activation: ActivationSignal;
  circuit: ModuleTimelines;
  engine: EngineReport;
  parameters: SimulationParameters;
}

// ─── Scoring ─────────────────────────────────────────────────

export function toScore(raw: number, scoreGain: number): number {
  return 50 + 50 * Math.tanh(scoreGain * raw);
}

/** Baseline shifts for the cohort toggles and chronic dosing. */
export function cohortOffset(
  metricId: MetricId,
  assumptions: AssumptionSet,
  dosing: Dosing,
  params: SimulationParameters["aggregation"],
): number {
  const { adhd, gutBias, chronic } = params.cohortOffsets;
  let offset = 0;
  if (assumptions.adhd_cohort) offset += adhd[metricId] ?? 0;
  if (assumptions.gut_bias) offset += gutBias[metricId] ?? 0;
  if (dosing === "chronic") offset += chronic[metricId] ?? 0;
  return offset;
}

/** Raw (pre-score) metric value at every timepoint. */
export function metricSeries(metricId: MetricId, circuit: ModuleTimelines, offset: number): number[] {
  const entries = readoutEntries(metricId);
  const length = circuit.timelines.pfc.length;
  const series: number[] = [];
  for (let k = 0; k < length; k++) {
    let value = offset;
    for (const [moduleId, weight] of entries) value += weight * circuit.timelines[moduleId][k];
    series.push(value);
  }
  return series;
}

// ─── Uncertainty ─────────────────────────────────────────────

function contributingWeights(receptors: readonly ResolvedReceptor[], metricId: MetricId): EffectiveWeight[] {
  return receptors.filter((r) => r.lookup.known).map((r) => r.weights[metricId]).filter((w) => w.weight !== 0);
}

export function evidenceUncertainty(contributing: readonly EffectiveWeight[], parameters: SimulationParameters): number {
  if (contributing.length === 0) return parameters.evidence.noEvidenceUncertainty;
  return shrinkUncertainty(contributing.map((w) => w.uncertainty));
}

export function metricUncertainty(
  contributing: readonly EffectiveWeight[],
  fallbackCount: number,
  parameters: SimulationParameters,
): number {
  return clamp01(evidenceUncertainty(contributing, parameters) + parameters.aggregation.fallbackPenalty * fallbackCount);
}

/**
 * Where the reported uncertainty comes from: evidence per metric, the
 * penalty of each stage that fell back, and the resulting level on every
 * circuit module.
 */
export function uncertaintyBreakdown(
  contributing: Readonly<Record<MetricId, readonly EffectiveWeight[]>>,
  fallbacks: EngineReport["fallbacks"],
  parameters: SimulationParameters,
): UncertaintyBreakdown {
  const penalty = parameters.aggregation.fallbackPenalty;
  const fallbackCount = Object.keys(fallbacks).length;
  const evidence = metricRecord((m) => evidenceUncertainty(contributing[m], parameters));

  const stages: Record<StageName, number> = { molecular: 0, pkpd: 0, circuit: 0 };
  for (const stage of STAGE_NAMES) {
    if (fallbacks[stage] !== undefined) stages[stage] = penalty;
  }

  const modules: Record<string, number> = {};
  for (const id of CIRCUIT_MODULE_IDS) {
    modules[id] = clamp01(evidence[CIRCUIT_MODULES[id].input] + penalty * fallbackCount);
  }

  return {
    evidence,
    stages,
    modules,
    combined: metricRecord((m) => metricUncertainty(contributing[m], fallbackCount, parameters)),
  };
}

export function metricConfidence(contributing: readonly EffectiveWeight[], parameters: SimulationParameters): number {
  if (contributing.length === 0) return clamp01(1 - parameters.evidence.noEvidenceUncertainty);
  return clamp01(1 - mean(contributing.map((w) => w.uncertainty)));
}

function sortedUnion(lists: readonly (readonly string[])[]): string[] {
  return [...new Set(lists.flat())].sort();
}

export function receptorContext(receptor: ResolvedReceptor): ReceptorContext {
  const weights = METRIC_IDS.map((m) => receptor.weights[m]);
  return {
    uncertainty: receptor.lookup.known ? clamp01(mean(weights.map((w) => w.uncertainty))) : 1,
    canonical: receptor.lookup.canonical,
    known: receptor.lookup.known,
    sources: sortedUnion(weights.map((w) => w.sources)),
  };
}

// ─── Result ──────────────────────────────────────────────────

export function aggregateResult(input: AggregationInput): SimulationResult {
  const { receptors, parameters } = input;

  const trajectories = metricRecord((m) => {
    const offset = cohortOffset(m, input.assumptions, input.dosing, parameters.aggregation);
    return metricSeries(m, input.circuit, offset).map((raw) => toScore(raw, parameters.aggregation.scoreGain));
  });
  const contributing = metricRecord((m) => contributingWeights(receptors, m));
  const breakdown = uncertaintyBreakdown(contributing, input.engine.fallbacks, parameters);

  const modules: Record<string, ModuleTimeline> = {};
  for (const id of CIRCUIT_MODULE_IDS) {
    modules[id] = { description: CIRCUIT_MODULES[id].description, timeline: [...input.circuit.timelines[id]] };
  }

  const receptorContexts: Record<string, ReceptorContext> = {};
  for (const receptor of receptors) receptorContexts[receptor.lookup.requested] = receptorContext(receptor);

  return {
    scores: metricRecord((m) => trajectories[m][trajectories[m].length - 1] ?? 50),
    uncertainty: { ...breakdown.combined },
    confidence: metricRecord((m) => metricConfidence(contributing[m], parameters)),
    citations: metricRecord((m) => sortedUnion(contributing[m].map((w) => w.sources))),
    details: {
      timepoints: [...input.timepoints],
      trajectories,
      modules,
      receptor_context: receptorContexts,
      activation: { ...input.activation.activation },
      uncertainty_breakdown: breakdown,
    },
    engine: {
      backends: { ...input.engine.backends },
      fallbacks: { ...input.engine.fallbacks },
      diagnostics: [...input.engine.diagnostics],
    },
  };
}
