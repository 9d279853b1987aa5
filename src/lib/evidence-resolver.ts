/**
 * Evidence Resolver: merges knowledge-graph confidence with registry weights.
 *
 *   weight      = w0 × mechanism × evidenceMultiplier × occupancy
 *   multiplier  = (prior + D·c̄) / (prior + D)
 *   uncertainty = max(min uᵢ, (ū + spread) / √D)
 *
 * c̄ and ū are source-count-weighted means over the relevant records, spread
 * is the weighted SD of their confidences and D the number of distinct
 * sources. With no records the registry is trusted as-is (multiplier 1) but
 * reported at the no-evidence uncertainty ceiling.
 *
 * Pure: the only input beyond arguments is read-only EvidenceSource lookups.
 */

import type { EvidenceRecord, EvidenceSource } from "@/types/evidence";
import { METRIC_IDS } from "@/types/simulation";
import type { MetricId, ReceptorSpec } from "@/types/simulation";
import { clamp01 } from "./numeric";
import { geneSymbolFor, lookupReceptor, mechanismMultiplier, metricRecord } from "./receptor-registry";
import type { RegistryLookup } from "./receptor-registry";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface EffectiveWeight {
  /** Canonical receptor id */
  receptorId: string;
  metricId: MetricId;
  weight: number;
  uncertainty: number;
  evidenceMultiplier: number;
  sourceCount: number;
  sources: string[];
}

export interface EvidenceSummary {
  multiplier: number;
  uncertainty: number;
  sources: string[];
}

export interface ResolvedReceptor {
  lookup: RegistryLookup;
  spec: ReceptorSpec;
  weights: Record<MetricId, EffectiveWeight>;
}

export interface WeightResolution {
  receptors: ResolvedReceptor[];
  diagnostics: string[];
}

// ─── Evidence lookup ─────────────────────────────────────────

/** Identifiers the graph may file a receptor under: canonical, undashed, HGNC symbol. */
export function candidateIdentifiers(canonical: string): string[] {
  const ids = [canonical, canonical.replace(/-/g, "")];
  const gene = geneSymbolFor(canonical);
  if (gene) ids.push(gene, `HGNC:${gene}`);
  return [...new Set(ids.filter((id) => id.length > 0))];
}

/** All records about a receptor, de-duplicated by (subject, predicate, object). */
export function collectEvidence(source: EvidenceSource, canonical: string): EvidenceRecord[] {
  const seen = new Map<string, EvidenceRecord>();
  for (const id of candidateIdentifiers(canonical)) {
    for (const record of source.findEvidence(id)) {
      const key = `${record.subject.toUpperCase()}|${record.predicate}|${record.object}`;
      if (!seen.has(key)) seen.set(key, record);
    }
  }
  return [...seen.values()];
}

function normalizeObject(object: string): string {
  return object.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function isMetricId(value: string): value is MetricId {
  return METRIC_IDS.some((m) => m === value);
}

/**
 * Records naming a metric as their object apply to that metric only;
 * anything else (e.g. a ligand interaction) is receptor-level and applies
 * to every metric.
 */
export function relevantEvidence(records: readonly EvidenceRecord[], metricId: MetricId): EvidenceRecord[] {
  return records.filter((r) => {
    const object = normalizeObject(r.object);
    return !isMetricId(object) || object === metricId;
  });
}

// ─── Scoring ─────────────────────────────────────────────────

export function summarizeEvidence(
  records: readonly EvidenceRecord[],
  params: SimulationParameters["evidence"],
): EvidenceSummary {
  if (records.length === 0) {
    return { multiplier: 1, uncertainty: params.noEvidenceUncertainty, sources: [] };
  }

  const distinct = new Set<string>();
  let totalWeight = 0;
  let confidenceSum = 0;
  let uncertaintySum = 0;
  let minUncertainty = Infinity;
  for (const r of records) {
    const own = new Set(r.sources);
    for (const s of own) distinct.add(s);
    const w = Math.max(1, own.size);
    totalWeight += w;
    confidenceSum += w * r.confidence;
    uncertaintySum += w * r.uncertainty;
    minUncertainty = Math.min(minUncertainty, r.uncertainty);
  }

  const cBar = confidenceSum / totalWeight;
  const uBar = uncertaintySum / totalWeight;
  let variance = 0;
  for (const r of records) {
    const w = Math.max(1, new Set(r.sources).size);
    variance += w * (r.confidence - cBar) ** 2;
  }
  const spread = Math.sqrt(variance / totalWeight);

  const d = Math.max(1, distinct.size);
  const multiplier = (params.sourcePrior + d * cBar) / (params.sourcePrior + d);
  const uncertainty = clamp01(Math.max(minUncertainty, (uBar + spread) / Math.sqrt(d)));

  return { multiplier, uncertainty, sources: [...distinct].sort() };
}

export function resolveEffectiveWeight(
  spec: ReceptorSpec,
  lookup: RegistryLookup,
  metricId: MetricId,
  records: readonly EvidenceRecord[],
  params: SimulationParameters,
): EffectiveWeight {
  if (!lookup.known) {
    return {
      receptorId: lookup.canonical,
      metricId,
      weight: 0,
      uncertainty: 1,
      evidenceMultiplier: 1,
      sourceCount: 0,
      sources: [],
    };
  }

  const summary = summarizeEvidence(relevantEvidence(records, metricId), params.evidence);
  const w0 = lookup.entry.weights[metricId];
  const weight = w0 * mechanismMultiplier(spec.mechanism, lookup.entry, params) * summary.multiplier * spec.occupancy;

  return {
    receptorId: lookup.canonical,
    metricId,
    // avoid -0 leaking into results
    weight: weight === 0 ? 0 : weight,
    uncertainty: summary.uncertainty,
    evidenceMultiplier: summary.multiplier,
    sourceCount: summary.sources.length,
    sources: summary.sources,
  };
}

/** Resolve every requested receptor against every metric. Keys are expected to name distinct receptors. */
export function resolveReceptorWeights(
  receptors: Readonly<Record<string, ReceptorSpec>>,
  evidence: EvidenceSource,
  params: SimulationParameters,
): WeightResolution {
  const resolved: ResolvedReceptor[] = [];
  const diagnostics: string[] = [];

  for (const [requested, spec] of Object.entries(receptors)) {
    const lookup = lookupReceptor(requested);
    if (lookup.note) diagnostics.push(lookup.note);

    const records = lookup.known ? collectEvidence(evidence, lookup.canonical) : [];
    resolved.push({
      lookup,
      spec,
      weights: metricRecord((metric) => resolveEffectiveWeight(spec, lookup, metric, records, params)),
    });
  }

  return { receptors: resolved, diagnostics };
}
