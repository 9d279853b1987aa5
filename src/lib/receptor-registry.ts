/**
 * Receptor Registry: baseline outcome weights per receptor.
 *
 * Weights are dimensionless per-unit-activation effects on each behavioural
 * metric (positive raises the metric). The table lives in
 * data/receptor-registry.json and is validated once at module load.
 *
 * Lookups never fail: unknown identifiers resolve to a zero-weight entry
 * flagged `known: false` so one bad receptor id cannot abort a run.
 */

import { z } from "zod";
import registryJson from "@/data/receptor-registry.json";
import type { Mechanism, MetricId } from "@/types/simulation";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface RegistryEntry {
  id: string;
  description: string;
  /** Neurotransmitter systems, e.g. "serotonin", "dopamine" */
  systems: string[];
  weights: Record<MetricId, number>;
  /** Scales the inverse-agonist multiplier (constitutive activity) */
  intrinsicEfficacy: number | null;
  /** Binding affinity (nM), used by the reference molecular backend */
  kiNm: number | null;
  /** Relative expression 0–1, used by the reference molecular backend */
  expression: number | null;
}

export interface RegistryLookup {
  /** Identifier as supplied by the caller */
  requested: string;
  canonical: string;
  known: boolean;
  entry: RegistryEntry;
  /** Diagnostic note for unknown receptors, null otherwise */
  note: string | null;
}

// ─── Table ───────────────────────────────────────────────────

const metricWeight = z.number().finite().min(-1).max(1);

const WeightsSchema = z.object({
  drive: metricWeight,
  apathy: metricWeight,
  motivation: metricWeight,
  cognitive_flexibility: metricWeight,
  anxiety: metricWeight,
  sleep_quality: metricWeight,
  social_affiliation: metricWeight,
  exploration: metricWeight,
  salience: metricWeight,
});

const RegistryEntrySchema = z.object({
  description: z.string(),
  systems: z.array(z.string()).default([]),
  intrinsicEfficacy: z.number().positive().optional(),
  kiNm: z.number().positive().optional(),
  expression: z.number().min(0).max(1).optional(),
  weights: WeightsSchema,
});

const RegistrySchema = z.object({
  version: z.string(),
  receptors: z.record(z.string(), RegistryEntrySchema),
});

function buildTable(): Map<string, RegistryEntry> {
  const parsed = RegistrySchema.parse(registryJson);
  const table = new Map<string, RegistryEntry>();
  for (const [id, raw] of Object.entries(parsed.receptors)) {
    table.set(id, {
      id,
      description: raw.description,
      systems: raw.systems,
      weights: raw.weights,
      intrinsicEfficacy: raw.intrinsicEfficacy ?? null,
      kiNm: raw.kiNm ?? null,
      expression: raw.expression ?? null,
    });
  }
  return table;
}

const REGISTRY: ReadonlyMap<string, RegistryEntry> = buildTable();

export function registryReceptorIds(): string[] {
  return [...REGISTRY.keys()];
}

// ─── Canonical names ─────────────────────────────────────────

const ALIASES: Record<string, string> = {
  NTRK2: "TRKB",
  BDNFR: "TRKB",
  ALPHA2A: "ADRA2A",
  ADRENALPHA2A: "ADRA2A",
  ALPHA2C: "ADRA2C",
  ALPHA2CGATE: "ADRA2C",
  MUOPIOID: "MOR",
  OPRM1: "MOR",
  MUOPIOIDBONDING: "MOR-BONDING",
  MORBONDED: "MOR-BONDING",
  A2AD2HETEROMER: "A2A-D2-HETEROMER",
  ADORA2A: "A2A",
  DRD1: "D1",
  DRD2: "D2",
  MTNR1B: "MT2",
  OXYTOCINR: "OXTR",
  V1A: "AVPR1A",
  BLACHOLINERGIC: "ACH-BLA",
};

function compactKey(id: string): string {
  return id.replace(/[^A-Z0-9]/g, "");
}

const COMPACT_INDEX: ReadonlyMap<string, string> = new Map(
  [...REGISTRY.keys()].map((id) => [compactKey(id), id]),
);

/**
 * Map caller spellings onto registry ids: "5ht1a", "5-HT1A", "HTR1A",
 * "5_HT_1A" → "5-HT1A"; gene symbols and common aliases via ALIASES.
 * Unknown ids come back upper-cased and trimmed.
 */
export function canonicalReceptorName(name: string): string {
  const raw = name.trim().toUpperCase();
  if (REGISTRY.has(raw)) return raw;

  let compact = compactKey(raw);
  if (compact.startsWith("HTR")) compact = `5HT${compact.slice(3)}`;

  const direct = COMPACT_INDEX.get(compact);
  if (direct) return direct;

  const alias = ALIASES[compact];
  if (alias && REGISTRY.has(alias)) return alias;

  return raw;
}

/** Gene-symbol form for serotonin receptors ("5-HT1A" → "HTR1A"), null otherwise. */
export function geneSymbolFor(canonical: string): string | null {
  const compact = compactKey(canonical);
  return compact.startsWith("5HT") ? `HTR${compact.slice(3)}` : null;
}

// ─── Lookup ──────────────────────────────────────────────────

export function metricRecord<T>(fill: (metric: MetricId) => T): Record<MetricId, T> {
  return {
    drive: fill("drive"),
    apathy: fill("apathy"),
    motivation: fill("motivation"),
    cognitive_flexibility: fill("cognitive_flexibility"),
    anxiety: fill("anxiety"),
    sleep_quality: fill("sleep_quality"),
    social_affiliation: fill("social_affiliation"),
    exploration: fill("exploration"),
    salience: fill("salience"),
  };
}

export function lookupReceptor(receptorId: string): RegistryLookup {
  const canonical = canonicalReceptorName(receptorId);
  const entry = REGISTRY.get(canonical);
  if (entry) {
    return { requested: receptorId, canonical, known: true, entry, note: null };
  }
  return {
    requested: receptorId,
    canonical,
    known: false,
    entry: {
      id: canonical,
      description: "Unknown receptor",
      systems: [],
      weights: metricRecord(() => 0),
      intrinsicEfficacy: null,
      kiNm: null,
      expression: null,
    },
    note: `unknown receptor '${receptorId}' treated as zero weight`,
  };
}

/**
 * Signed mechanism factor. Inverse agonism is the antagonist sign scaled by
 * the receptor's intrinsic efficacy, since it suppresses constitutive
 * signalling below baseline.
 */
export function mechanismMultiplier(
  mechanism: Mechanism,
  entry: RegistryEntry,
  params: Pick<SimulationParameters, "mechanism" | "defaultIntrinsicEfficacy">,
): number {
  const base = params.mechanism[mechanism];
  if (mechanism !== "inverse") return base;
  return base * (entry.intrinsicEfficacy ?? params.defaultIntrinsicEfficacy);
}
