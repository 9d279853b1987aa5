/**
 * Fixed nine-module circuit used by the circuit stage.
 *
 * Each module is driven directly by one metric trajectory and exchanges
 * activity along signed, weighted edges. Toggles only rescale edge weights
 * or input gains; the set of modules and edges never changes.
 */

import type { MetricId } from "@/types/simulation";
import type { EdgeToggleKey } from "./sim-config";

// ─── Modules ─────────────────────────────────────────────────

export const CIRCUIT_MODULE_IDS = [
  "pfc",
  "striatum",
  "vta",
  "acc",
  "amygdala",
  "hippocampus",
  "thalamus",
  "hypothalamus",
  "pvt",
] as const;

export type CircuitModuleId = (typeof CIRCUIT_MODULE_IDS)[number];

export interface CircuitModule {
  id: CircuitModuleId;
  description: string;
  /** Metric whose trajectory drives the module */
  input: MetricId;
  /** Subject to the gut_bias input gain */
  gutBrainAxis: boolean;
}

/** Salience hub whose activity is blended into every other module. */
export const SALIENCE_MODULE: CircuitModuleId = "pvt";

export const CIRCUIT_MODULES: Record<CircuitModuleId, CircuitModule> = {
  pfc: {
    id: "pfc",
    description: "Prefrontal cortex: executive control and set shifting",
    input: "cognitive_flexibility",
    gutBrainAxis: false,
  },
  striatum: {
    id: "striatum",
    description: "Striatum: incentive motivation and action selection",
    input: "motivation",
    gutBrainAxis: false,
  },
  vta: {
    id: "vta",
    description: "Ventral tegmental area: dopaminergic drive",
    input: "drive",
    gutBrainAxis: false,
  },
  acc: {
    id: "acc",
    description: "Anterior cingulate: effort cost and apathy",
    input: "apathy",
    gutBrainAxis: false,
  },
  amygdala: {
    id: "amygdala",
    description: "Basolateral amygdala: threat appraisal",
    input: "anxiety",
    gutBrainAxis: false,
  },
  hippocampus: {
    id: "hippocampus",
    description: "Hippocampus: novelty and exploration",
    input: "exploration",
    gutBrainAxis: true,
  },
  thalamus: {
    id: "thalamus",
    description: "Thalamus: arousal gating and sleep regulation",
    input: "sleep_quality",
    gutBrainAxis: true,
  },
  hypothalamus: {
    id: "hypothalamus",
    description: "Hypothalamus: neuropeptide social signalling",
    input: "social_affiliation",
    gutBrainAxis: false,
  },
  pvt: {
    id: "pvt",
    description: "Paraventricular thalamus: salience integration",
    input: "salience",
    gutBrainAxis: false,
  },
};

// ─── Edges ───────────────────────────────────────────────────

export interface CircuitEdge {
  from: CircuitModuleId;
  to: CircuitModuleId;
  weight: number;
  /** Toggle that rescales this edge, if any */
  toggle: EdgeToggleKey | null;
}

export const CIRCUIT_EDGES: readonly CircuitEdge[] = [
  { from: "vta", to: "striatum", weight: 0.3, toggle: "a2a_d2_heteromer" },
  { from: "vta", to: "pfc", weight: 0.15, toggle: null },
  { from: "pfc", to: "striatum", weight: 0.2, toggle: null },
  { from: "pfc", to: "amygdala", weight: -0.25, toggle: "alpha2a_hcn_closure" },
  { from: "pfc", to: "acc", weight: -0.15, toggle: null },
  { from: "striatum", to: "vta", weight: 0.1, toggle: null },
  { from: "acc", to: "striatum", weight: -0.2, toggle: "alpha2c_gate" },
  { from: "amygdala", to: "pvt", weight: 0.2, toggle: "bla_cholinergic_salience" },
  { from: "amygdala", to: "acc", weight: 0.1, toggle: null },
  { from: "hippocampus", to: "pfc", weight: 0.15, toggle: "trkB_facilitation" },
  { from: "thalamus", to: "pfc", weight: 0.05, toggle: null },
  { from: "hypothalamus", to: "striatum", weight: 0.15, toggle: "mu_opioid_bonding" },
  { from: "hypothalamus", to: "amygdala", weight: -0.15, toggle: "oxytocin_prosocial" },
  { from: "hypothalamus", to: "pvt", weight: 0.1, toggle: "vasopressin_gating" },
];

// ─── Readout ─────────────────────────────────────────────────

/**
 * Module blend read out for each metric score. Weights per metric sum to 1;
 * every metric leans on the module it drives.
 */
export const METRIC_READOUT: Record<MetricId, Partial<Record<CircuitModuleId, number>>> = {
  drive: { vta: 0.8, striatum: 0.2 },
  apathy: { acc: 1 },
  motivation: { striatum: 0.8, vta: 0.2 },
  cognitive_flexibility: { pfc: 1 },
  anxiety: { amygdala: 0.85, pvt: 0.15 },
  sleep_quality: { thalamus: 1 },
  social_affiliation: { hypothalamus: 0.8, striatum: 0.2 },
  exploration: { hippocampus: 0.8, pfc: 0.2 },
  salience: { pvt: 1 },
};

export function readoutEntries(metricId: MetricId): [CircuitModuleId, number][] {
  const readout = METRIC_READOUT[metricId];
  return CIRCUIT_MODULE_IDS.flatMap((id): [CircuitModuleId, number][] => {
    const weight = readout[id];
    return weight === undefined ? [] : [[id, weight]];
  });
}
