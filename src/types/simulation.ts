/** Wire shapes exchanged with the REST layer (snake_case, JSON-safe). */

export const METRIC_IDS = [
  "drive",
  "apathy",
  "motivation",
  "cognitive_flexibility",
  "anxiety",
  "sleep_quality",
  "social_affiliation",
  "exploration",
  "salience",
] as const;

export type MetricId = (typeof METRIC_IDS)[number];

export const MECHANISMS = ["agonist", "antagonist", "partial", "inverse"] as const;

export type Mechanism = (typeof MECHANISMS)[number];

export type Dosing = "acute" | "chronic";

export const ASSUMPTION_KEYS = [
  "acute_1a_clamp",
  "adhd_cohort",
  "gut_bias",
  "trkB_facilitation",
  "alpha2a_hcn_closure",
  "mu_opioid_bonding",
  "a2a_d2_heteromer",
  "alpha2c_gate",
  "bla_cholinergic_salience",
  "oxytocin_prosocial",
  "vasopressin_gating",
] as const;

export type AssumptionKey = (typeof ASSUMPTION_KEYS)[number];

export type AssumptionToggles = Record<AssumptionKey, boolean>;

export interface ReceptorSpec {
  /** Fraction of the receptor population bound, 0–1 */
  occupancy: number;
  mechanism: Mechanism;
}

export interface SimulationRequest {
  receptors: Record<string, ReceptorSpec>;
  dosing: Dosing;
  assumptions?: Partial<AssumptionToggles>;
  /** Salience-network blending factor, 0–1 (default 0.5) */
  pvt_weight?: number;
}

// ─── Engine diagnostics ──────────────────────────────────────

export const STAGE_NAMES = ["molecular", "pkpd", "circuit"] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/**
 * Fidelity ladder. `reference` is the in-process numeric integrator
 * (configured as "reference" or its legacy alias "scipy").
 */
export type BackendLevel = "analytic" | "reference" | "high_fidelity";

export interface EngineReport {
  backends: Record<StageName, BackendLevel>;
  /** Present only for stages whose requested backend failed */
  fallbacks: Partial<Record<StageName, string>>;
  diagnostics: string[];
}

// ─── Result ──────────────────────────────────────────────────

export interface ModuleTimeline {
  description: string;
  timeline: number[];
}

export interface ReceptorContext {
  /** Mean effective-weight uncertainty across metrics (1 for unknown receptors) */
  uncertainty: number;
  canonical: string;
  known: boolean;
  sources: string[];
}

export interface UncertaintyBreakdown {
  /** Evidence-only uncertainty per metric, before fallback penalties */
  evidence: Record<MetricId, number>;
  /** Penalty each stage adds to every metric; 0 unless it fell back */
  stages: Record<StageName, number>;
  /** Per circuit module, from the metric that drives its input */
  modules: Record<string, number>;
  /** Evidence plus every stage penalty, clamped; what `uncertainty` reports */
  combined: Record<MetricId, number>;
}

export interface SimulationDetails {
  /** Hours; starts at 0, strictly increasing */
  timepoints: number[];
  /** Score-scale series, one per metric, aligned with timepoints */
  trajectories: Record<MetricId, number[]>;
  modules: Record<string, ModuleTimeline>;
  receptor_context: Record<string, ReceptorContext>;
  /** Molecular initial condition (t = 0) per metric, in [-1, 1] */
  activation: Record<MetricId, number>;
  uncertainty_breakdown: UncertaintyBreakdown;
}

export interface SimulationResult {
  /** Behavioural scores on the (0, 100) scale, baseline 50 */
  scores: Record<MetricId, number>;
  uncertainty: Record<MetricId, number>;
  confidence: Record<MetricId, number>;
  citations: Record<MetricId, string[]>;
  details: SimulationDetails;
  engine: EngineReport;
}
