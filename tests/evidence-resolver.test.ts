/**
 * Evidence resolver: candidate ids, relevance, evidence scoring and
 * effective weights.
 *
 * Expected values are computed by hand from the formulas in
 * evidence-resolver.ts (source-weighted means, prior pseudo-count 1).
 */
import { describe, it, expect } from "vitest";
import {
  candidateIdentifiers,
  collectEvidence,
  relevantEvidence,
  resolveEffectiveWeight,
  resolveReceptorWeights,
  summarizeEvidence,
} from "@/lib/evidence-resolver";
import { EMPTY_EVIDENCE, InMemoryEvidenceStore } from "@/lib/evidence-store";
import { lookupReceptor } from "@/lib/receptor-registry";
import { DEFAULT_PARAMETERS } from "@/lib/sim-config";
import type { EvidenceRecord } from "@/types/evidence";

const ANXIETY_GENE: EvidenceRecord = {
  subject: "HTR1A",
  predicate: "modulates",
  object: "anxiety",
  confidence: 0.8,
  uncertainty: 0.2,
  sources: ["PMID:1", "PMID:2"],
};
const ANXIETY_CANONICAL: EvidenceRecord = {
  subject: "5-HT1A",
  predicate: "modulates",
  object: "anxiety",
  confidence: 0.6,
  uncertainty: 0.3,
  sources: ["PMID:3"],
};
const LIGAND: EvidenceRecord = {
  subject: "5-HT1A",
  predicate: "binds",
  object: "test-ligand",
  confidence: 0.9,
  uncertainty: 0.1,
  sources: ["PMID:4"],
};

const store = new InMemoryEvidenceStore([ANXIETY_GENE, ANXIETY_CANONICAL, LIGAND]);

// ── Lookup ──

describe("candidateIdentifiers", () => {
  it("includes compact and HGNC forms for serotonin receptors", () => {
    expect(candidateIdentifiers("5-HT1A")).toEqual(["5-HT1A", "5HT1A", "HTR1A", "HGNC:HTR1A"]);
  });

  it("deduplicates when the compact form is identical", () => {
    expect(candidateIdentifiers("D2")).toEqual(["D2"]);
  });
});

describe("collectEvidence", () => {
  it("gathers records filed under any candidate identifier", () => {
    const records = collectEvidence(store, "5-HT1A");
    expect(records).toHaveLength(3);
  });

  it("drops duplicate subject/predicate/object triples", () => {
    const dup = new InMemoryEvidenceStore([LIGAND, { ...LIGAND, subject: "5-ht1a", confidence: 0.1 }]);
    const records = collectEvidence(dup, "5-HT1A");
    expect(records).toHaveLength(1);
    expect(records[0].confidence).toBe(0.9);
  });
});

describe("relevantEvidence", () => {
  it("applies metric-specific records to their metric only", () => {
    const records = collectEvidence(store, "5-HT1A");
    expect(relevantEvidence(records, "anxiety")).toHaveLength(3);
    expect(relevantEvidence(records, "drive")).toEqual([LIGAND]);
  });

  it("normalises metric spellings in the object field", () => {
    const record = { ...ANXIETY_CANONICAL, object: "Sleep Quality" };
    expect(relevantEvidence([record], "sleep_quality")).toHaveLength(1);
    expect(relevantEvidence([record], "anxiety")).toHaveLength(0);
  });
});

// ── Scoring ──

describe("summarizeEvidence", () => {
  it("returns the neutral multiplier and the ceiling without evidence", () => {
    expect(summarizeEvidence([], DEFAULT_PARAMETERS.evidence)).toEqual({
      multiplier: 1,
      uncertainty: 0.5,
      sources: [],
    });
  });

  it("pulls a single source halfway toward its confidence", () => {
    const summary = summarizeEvidence([LIGAND], DEFAULT_PARAMETERS.evidence);
    expect(summary.multiplier).toBeCloseTo(0.95, 12);
    expect(summary.uncertainty).toBeCloseTo(0.1, 12);
    expect(summary.sources).toEqual(["PMID:4"]);
  });

  it("weights records by distinct sources and shrinks uncertainty", () => {
    const summary = summarizeEvidence([ANXIETY_GENE, ANXIETY_CANONICAL, LIGAND], DEFAULT_PARAMETERS.evidence);
    // c̄ = 3.1 / 4, D = 4
    expect(summary.multiplier).toBeCloseTo(0.82, 12);
    // ū = 0.2, spread = √(0.0475 / 4)
    expect(summary.uncertainty).toBeCloseTo((0.2 + Math.sqrt(0.011875)) / 2, 12);
    expect(summary.sources).toEqual(["PMID:1", "PMID:2", "PMID:3", "PMID:4"]);
  });
});

describe("resolveEffectiveWeight", () => {
  const lookup = lookupReceptor("5HT1A");
  const records = collectEvidence(store, "5-HT1A");

  it("combines baseline, mechanism, evidence and occupancy", () => {
    const spec = { occupancy: 0.5, mechanism: "agonist" as const };
    const anxiety = resolveEffectiveWeight(spec, lookup, "anxiety", records, DEFAULT_PARAMETERS);
    expect(anxiety.weight).toBeCloseTo(-0.4 * 0.82 * 0.5, 12);
    expect(anxiety.sourceCount).toBe(4);
    const drive = resolveEffectiveWeight(spec, lookup, "drive", records, DEFAULT_PARAMETERS);
    expect(drive.weight).toBeCloseTo(0.2 * 0.95 * 0.5, 12);
    expect(drive.sources).toEqual(["PMID:4"]);
  });

  it("trusts the registry when no evidence exists", () => {
    const w = resolveEffectiveWeight({ occupancy: 0.7, mechanism: "agonist" }, lookup, "drive", [], DEFAULT_PARAMETERS);
    expect(w.weight).toBeCloseTo(0.14, 12);
    expect(w.uncertainty).toBe(0.5);
    expect(w.evidenceMultiplier).toBe(1);
  });

  it("gives agonist and antagonist opposite signs", () => {
    const agonist = resolveEffectiveWeight({ occupancy: 0.6, mechanism: "agonist" }, lookup, "anxiety", records, DEFAULT_PARAMETERS);
    const antagonist = resolveEffectiveWeight({ occupancy: 0.6, mechanism: "antagonist" }, lookup, "anxiety", records, DEFAULT_PARAMETERS);
    expect(antagonist.weight).toBeCloseTo(-agonist.weight, 12);
    expect(Math.sign(agonist.weight)).toBe(-1);
  });

  it("never reports negative zero", () => {
    const w = resolveEffectiveWeight(
      { occupancy: 1, mechanism: "antagonist" },
      lookupReceptor("5-HT1B"),
      "cognitive_flexibility",
      [],
      DEFAULT_PARAMETERS,
    );
    expect(Object.is(w.weight, 0)).toBe(true);
  });

  it("zeroes unknown receptors at maximum uncertainty", () => {
    const w = resolveEffectiveWeight({ occupancy: 1, mechanism: "agonist" }, lookupReceptor("NOPE"), "drive", [], DEFAULT_PARAMETERS);
    expect(w.weight).toBe(0);
    expect(w.uncertainty).toBe(1);
  });
});

describe("resolveReceptorWeights", () => {
  it("notes unknown ids and keeps them at zero weight", () => {
    const resolution = resolveReceptorWeights(
      {
        "5HT1A": { occupancy: 0.5, mechanism: "agonist" },
        FOO: { occupancy: 0.5, mechanism: "agonist" },
      },
      EMPTY_EVIDENCE,
      DEFAULT_PARAMETERS,
    );
    expect(resolution.receptors.map((r) => r.lookup.canonical)).toEqual(["5-HT1A", "FOO"]);
    expect(resolution.diagnostics).toEqual(["unknown receptor 'FOO' treated as zero weight"]);
    expect(resolution.receptors[1].weights.anxiety.weight).toBe(0);
  });

  it("is idempotent", () => {
    const receptors = { "5-HT2A": { occupancy: 0.4, mechanism: "partial" as const } };
    const a = resolveReceptorWeights(receptors, store, DEFAULT_PARAMETERS);
    const b = resolveReceptorWeights(receptors, store, DEFAULT_PARAMETERS);
    expect(a).toEqual(b);
  });
});

// ── InMemoryEvidenceStore ──

describe("InMemoryEvidenceStore", () => {
  it("matches subjects case-insensitively and predicates exactly", () => {
    expect(store.findEvidence("5-ht1a")).toHaveLength(2);
    expect(store.findEvidence("5-HT1A", "binds")).toEqual([LIGAND]);
    expect(store.findEvidence("5-HT1A", "Binds")).toHaveLength(0);
  });

  it("validates JSON input", () => {
    expect(InMemoryEvidenceStore.fromJson([{ ...LIGAND }]).findEvidence("5-HT1A")).toEqual([LIGAND]);
    expect(() => InMemoryEvidenceStore.fromJson([{ ...LIGAND, confidence: 1.5 }])).toThrow();
  });

  it("defaults missing sources to an empty list", () => {
    const loaded = InMemoryEvidenceStore.fromJson([
      { subject: "D2", predicate: "binds", object: "test-ligand", confidence: 0.5, uncertainty: 0.4 },
    ]);
    expect(loaded.findEvidence("D2")[0].sources).toEqual([]);
  });
});
