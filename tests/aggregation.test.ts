/**
 * Aggregation & scoring: score mapping, cohort offsets, uncertainty and
 * confidence combination, receptor context.
 */
import { describe, it, expect } from "vitest";
import {
  cohortOffset,
  metricConfidence,
  metricSeries,
  metricUncertainty,
  receptorContext,
  toScore,
  uncertaintyBreakdown,
} from "@/lib/aggregation";
import { buildAssumptionSet } from "@/lib/assumptions";
import { moduleRecord } from "@/lib/circuit";
import type { EffectiveWeight } from "@/lib/evidence-resolver";
import { resolveReceptorWeights } from "@/lib/evidence-resolver";
import { EMPTY_EVIDENCE, InMemoryEvidenceStore } from "@/lib/evidence-store";
import { metricRecord } from "@/lib/receptor-registry";
import { DEFAULT_PARAMETERS } from "@/lib/sim-config";

function weight(uncertainty: number, sources: string[] = []): EffectiveWeight {
  return {
    receptorId: "5-HT1A",
    metricId: "anxiety",
    weight: -0.2,
    uncertainty,
    evidenceMultiplier: 1,
    sourceCount: sources.length,
    sources,
  };
}

// ── Scores ──

describe("toScore", () => {
  it("maps 0 to the baseline and saturates inside (0, 100)", () => {
    expect(toScore(0, 1.5)).toBe(50);
    expect(toScore(0.2, 1.5)).toBeCloseTo(50 + 50 * Math.tanh(0.3), 12);
    // module activity is bounded by 4, offsets are small
    expect(toScore(4.2, 1.5)).toBeLessThan(100);
    expect(toScore(-4.2, 1.5)).toBeGreaterThan(0);
  });
});

describe("cohortOffset", () => {
  const params = DEFAULT_PARAMETERS.aggregation;

  it("applies only the active cohorts", () => {
    const none = buildAssumptionSet();
    expect(cohortOffset("drive", none, "acute", params)).toBe(0);
    expect(cohortOffset("drive", buildAssumptionSet({ adhd_cohort: true }), "acute", params)).toBe(-0.1);
    expect(cohortOffset("apathy", buildAssumptionSet({ gut_bias: true }), "acute", params)).toBe(0.06);
    expect(cohortOffset("sleep_quality", none, "chronic", params)).toBe(0.04);
  });

  it("adds offsets from several cohorts", () => {
    const both = buildAssumptionSet({ adhd_cohort: true, gut_bias: true });
    expect(cohortOffset("motivation", both, "chronic", params)).toBe(-0.08);
    expect(cohortOffset("apathy", both, "chronic", params)).toBe(0.06);
  });
});

describe("metricSeries", () => {
  it("blends module timelines by the readout weights", () => {
    const timelines = moduleRecord((id) => (id === "vta" ? [1, 2] : id === "striatum" ? [0.5, -1] : [0, 0]));
    const series = metricSeries("drive", { timelines, diagnostics: [] }, 0.1);
    expect(series[0]).toBeCloseTo(0.1 + 0.8 * 1 + 0.2 * 0.5, 12);
    expect(series[1]).toBeCloseTo(0.1 + 0.8 * 2 - 0.2, 12);
  });
});

// ── Uncertainty ──

describe("metricUncertainty", () => {
  it("uses the no-evidence ceiling when nothing contributes", () => {
    expect(metricUncertainty([], 0, DEFAULT_PARAMETERS)).toBe(0.5);
  });

  it("shrinks over contributing weights and widens per fallback", () => {
    expect(metricUncertainty([weight(0.5), weight(0.5)], 0, DEFAULT_PARAMETERS)).toBe(0.5);
    expect(metricUncertainty([weight(0.8), weight(0.4), weight(0.6), weight(0.6)], 0, DEFAULT_PARAMETERS)).toBeCloseTo(0.4, 12);
    expect(metricUncertainty([weight(0.5)], 2, DEFAULT_PARAMETERS)).toBeCloseTo(0.7, 12);
  });

  it("clamps to 1", () => {
    expect(metricUncertainty([weight(0.9)], 3, DEFAULT_PARAMETERS)).toBe(1);
  });
});

describe("uncertaintyBreakdown", () => {
  const contributing = metricRecord((m) => (m === "anxiety" ? [weight(0.2)] : []));

  it("reports evidence alone when every stage ran as requested", () => {
    const breakdown = uncertaintyBreakdown(contributing, {}, DEFAULT_PARAMETERS);
    expect(breakdown.evidence.anxiety).toBe(0.2);
    expect(breakdown.evidence.drive).toBe(0.5);
    expect(breakdown.stages).toEqual({ molecular: 0, pkpd: 0, circuit: 0 });
    expect(breakdown.combined).toEqual(breakdown.evidence);
    expect(Object.keys(breakdown.modules)).toHaveLength(9);
    expect(breakdown.modules.amygdala).toBe(0.2);
  });

  it("attributes the fallback penalty to the stage that fell back", () => {
    const breakdown = uncertaintyBreakdown(
      contributing,
      { molecular: "high_fidelity: BackendUnavailableError: no high-fidelity molecular solver is installed" },
      DEFAULT_PARAMETERS,
    );
    expect(breakdown.stages).toEqual({ molecular: 0.1, pkpd: 0, circuit: 0 });
    expect(breakdown.evidence.anxiety).toBe(0.2);
    expect(breakdown.combined.anxiety).toBeCloseTo(0.3, 12);
    expect(breakdown.combined.drive).toBeCloseTo(0.6, 12);
    expect(breakdown.modules.amygdala).toBeCloseTo(0.3, 12);
    expect(breakdown.modules.thalamus).toBeCloseTo(0.6, 12);
  });
});

describe("metricConfidence", () => {
  it("is one minus the mean contributing uncertainty", () => {
    expect(metricConfidence([], DEFAULT_PARAMETERS)).toBe(0.5);
    expect(metricConfidence([weight(0.2), weight(0.4)], DEFAULT_PARAMETERS)).toBeCloseTo(0.7, 12);
  });
});

describe("receptorContext", () => {
  it("summarises known receptors with their evidence sources", () => {
    const store = new InMemoryEvidenceStore([
      { subject: "HTR1A", predicate: "binds", object: "test-ligand", confidence: 0.9, uncertainty: 0.1, sources: ["PMID:9"] },
    ]);
    const [receptor] = resolveReceptorWeights({ "5ht1a": { occupancy: 0.7, mechanism: "agonist" } }, store, DEFAULT_PARAMETERS).receptors;
    const context = receptorContext(receptor);
    expect(context.canonical).toBe("5-HT1A");
    expect(context.known).toBe(true);
    expect(context.sources).toEqual(["PMID:9"]);
    expect(context.uncertainty).toBeCloseTo(0.1, 12);
  });

  it("marks unknown receptors at full uncertainty", () => {
    const [receptor] = resolveReceptorWeights({ mystery: { occupancy: 1, mechanism: "agonist" } }, EMPTY_EVIDENCE, DEFAULT_PARAMETERS).receptors;
    expect(receptorContext(receptor)).toEqual({ uncertainty: 1, canonical: "MYSTERY", known: false, sources: [] });
  });
});
