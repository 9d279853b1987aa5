/**
 * Molecular cascade: analytic and reference activation, stage-local
 * assumptions, and the high-fidelity adapter contract.
 */
import { describe, it, expect, vi } from "vitest";
import { buildAssumptionSet } from "@/lib/assumptions";
import { createBackendCapabilities } from "@/lib/backend-capabilities";
import { resolveReceptorWeights } from "@/lib/evidence-resolver";
import { EMPTY_EVIDENCE } from "@/lib/evidence-store";
import type { StageContext } from "@/lib/fallback";
import {
  bindingRate,
  expressionScale,
  molecularContributions,
  referenceActivation,
  runMolecularStage,
  summedDrive,
} from "@/lib/molecular-cascade";
import { metricRecord } from "@/lib/receptor-registry";
import { DEFAULT_PARAMETERS, resolveParameters } from "@/lib/sim-config";
import type { HighFidelityFactories } from "@/types/backends";
import type { Mechanism, ReceptorSpec } from "@/types/simulation";

function contextFor(env: Record<string, string> = {}, highFidelity: HighFidelityFactories = {}): StageContext {
  return { capabilities: createBackendCapabilities({ env, highFidelity }), parameters: resolveParameters() };
}

function resolved(receptors: Record<string, ReceptorSpec>) {
  return resolveReceptorWeights(receptors, EMPTY_EVIDENCE, DEFAULT_PARAMETERS).receptors;
}

function single(id: string, occupancy: number, mechanism: Mechanism = "agonist") {
  return resolved({ [id]: { occupancy, mechanism } });
}

const NO_ASSUMPTIONS = buildAssumptionSet();

// ── Analytic ──

describe("runMolecularStage (analytic)", () => {
  it("applies tanh to the summed effective weights", () => {
    const outcome = runMolecularStage(single("5HT1A", 0.5), NO_ASSUMPTIONS, contextFor());
    expect(outcome.backend).toBe("analytic");
    expect(outcome.fallback).toBeNull();
    expect(outcome.value.transient).toBeNull();
    expect(outcome.value.activation.drive).toBeCloseTo(Math.tanh(0.1), 12);
    expect(outcome.value.activation.anxiety).toBeCloseTo(Math.tanh(-0.2), 12);
  });

  it("sums contributions from several receptors", () => {
    const receptors = resolved({
      "5-HT1A": { occupancy: 1, mechanism: "agonist" },
      D2: { occupancy: 0.5, mechanism: "agonist" },
    });
    const outcome = runMolecularStage(receptors, NO_ASSUMPTIONS, contextFor());
    expect(outcome.value.activation.motivation).toBeCloseTo(Math.tanh(0.1 + 0.2), 12);
  });

  it("gives agonist and antagonist opposite signs", () => {
    const agonist = runMolecularStage(single("5-HT2A", 0.8, "agonist"), NO_ASSUMPTIONS, contextFor());
    const antagonist = runMolecularStage(single("5-HT2A", 0.8, "antagonist"), NO_ASSUMPTIONS, contextFor());
    expect(agonist.value.activation.cognitive_flexibility).toBeGreaterThan(0);
    expect(antagonist.value.activation.cognitive_flexibility).toBeCloseTo(
      -agonist.value.activation.cognitive_flexibility,
      12,
    );
  });

  it("ignores unknown receptors", () => {
    const receptors = resolved({
      "5HT1A": { occupancy: 0.5, mechanism: "agonist" },
      UNKNOWN1: { occupancy: 1, mechanism: "agonist" },
    });
    const outcome = runMolecularStage(receptors, NO_ASSUMPTIONS, contextFor());
    expect(outcome.value.activation.drive).toBeCloseTo(Math.tanh(0.1), 12);
  });
});

describe("monotonic in occupancy", () => {
  const occupancies = [0, 0.25, 0.5, 0.75, 1];

  it.each(["analytic", "reference"])("%s backend keeps sign and grows in magnitude", (backend) => {
    const context = contextFor({ MOLECULAR_SIM_BACKEND: backend });
    const anxiety = occupancies.map(
      (o) => runMolecularStage(single("5-HT1A", o), NO_ASSUMPTIONS, context).value.activation.anxiety,
    );
    expect(anxiety[0]).toBe(0);
    for (let i = 1; i < anxiety.length; i++) {
      expect(anxiety[i]).toBeLessThan(anxiety[i - 1]);
    }
  });
});

// ── Assumptions ──

describe("molecular assumptions", () => {
  it("acute_1a_clamp damps 5-HT1A weights only", () => {
    const clamp = buildAssumptionSet({ acute_1a_clamp: true });
    const receptors = resolved({
      "5-HT1A": { occupancy: 1, mechanism: "agonist" },
      "5-HT7": { occupancy: 1, mechanism: "agonist" },
    });
    const contributions = molecularContributions(receptors, clamp, DEFAULT_PARAMETERS);
    const drive = contributions.filter((c) => c.metricId === "drive");
    expect(drive.map((c) => [c.receptorId, c.weight])).toEqual([
      ["5-HT1A", 0.2 * 0.6],
      ["5-HT7", 0.2],
    ]);
  });

  it("adhd_cohort rescales dopaminergic receptors", () => {
    const adhd = buildAssumptionSet({ adhd_cohort: true });
    const outcome = runMolecularStage(single("D2", 1), adhd, contextFor());
    expect(outcome.value.activation.motivation).toBeCloseTo(Math.tanh(0.4 * 0.8), 12);
    const serotonin = runMolecularStage(single("5-HT1A", 1), adhd, contextFor());
    expect(serotonin.value.activation.motivation).toBeCloseTo(Math.tanh(0.1), 12);
  });
});

// ── Reference ──

describe("reference backend", () => {
  const params = DEFAULT_PARAMETERS.molecular;

  it("binds faster for tighter binders", () => {
    expect(bindingRate(null, params)).toBe(3);
    expect(bindingRate(5, params)).toBe(3);
    expect(bindingRate(1.4, params)).toBeGreaterThan(3);
    expect(bindingRate(12, params)).toBeLessThan(3);
  });

  it("scales signalling by expression above the floor", () => {
    expect(expressionScale(null, params)).toBe(1);
    expect(expressionScale(0, params)).toBe(0.5);
    expect(expressionScale(0.9, params)).toBeCloseTo(0.95, 12);
  });

  it("emits a transient that ends at the reported activation", () => {
    const contributions = molecularContributions(single("5-HT1A", 0.7), NO_ASSUMPTIONS, DEFAULT_PARAMETERS);
    const signal = referenceActivation(contributions, params);
    expect(signal.transient).not.toBeNull();
    if (!signal.transient) return;
    expect(signal.transient.timepoints).toHaveLength(7);
    expect(signal.transient.timepoints[0]).toBe(0);
    expect(signal.transient.timepoints[6]).toBe(1);
    expect(signal.transient.values.drive[0]).toBe(0);
    expect(signal.transient.values.drive[6]).toBe(signal.activation.drive);
  });

  it("stays below the analytic steady state within the transient window", () => {
    const contributions = molecularContributions(single("5-HT1A", 0.7), NO_ASSUMPTIONS, DEFAULT_PARAMETERS);
    const analytic = summedDrive(contributions);
    const signal = referenceActivation(contributions, params);
    expect(signal.activation.anxiety).toBeLessThan(0);
    expect(signal.activation.anxiety).toBeGreaterThan(Math.tanh(analytic.anxiety));
    expect(signal.activation.cognitive_flexibility).toBeGreaterThan(0);
  });

  it("reports the reference backend when requested", () => {
    const outcome = runMolecularStage(single("5-HT1A", 0.7), NO_ASSUMPTIONS, contextFor({ MOLECULAR_SIM_BACKEND: "scipy" }));
    expect(outcome.backend).toBe("reference");
    expect(outcome.fallback).toBeNull();
  });
});

// ── High fidelity ──

describe("high-fidelity adapter", () => {
  it("falls back when no solver is installed", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const outcome = runMolecularStage(
      single("5-HT1A", 0.7),
      NO_ASSUMPTIONS,
      contextFor({ MOLECULAR_SIM_BACKEND: "high_fidelity" }),
    );
    expect(outcome.backend).toBe("reference");
    expect(outcome.fallback).toBe(
      "high_fidelity: BackendUnavailableError: no high-fidelity molecular solver is installed",
    );
    debug.mockRestore();
  });

  it("uses an installed solver and passes it the drive", () => {
    const simulate = vi.fn((input: { drive: Record<string, number> }) => ({
      activation: metricRecord((m) => Math.tanh(2 * (input.drive[m] ?? 0))),
    }));
    const context = contextFor({ MOLECULAR_SIM_BACKEND: "high_fidelity" }, { molecular: () => ({ simulate }) });
    const outcome = runMolecularStage(single("5-HT1A", 0.5), NO_ASSUMPTIONS, context);
    expect(outcome.backend).toBe("high_fidelity");
    expect(outcome.value.activation.drive).toBeCloseTo(Math.tanh(0.2), 12);
    expect(simulate).toHaveBeenCalledTimes(1);
    expect(simulate.mock.calls[0][0].drive.drive).toBeCloseTo(0.1, 12);
  });

  it("treats non-finite solver output as a numerical failure", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const context = contextFor(
      { MOLECULAR_SIM_BACKEND: "high_fidelity" },
      { molecular: () => ({ simulate: () => ({ activation: metricRecord(() => Number.NaN) }) }) },
    );
    const outcome = runMolecularStage(single("5-HT1A", 0.5), NO_ASSUMPTIONS, context);
    expect(outcome.backend).toBe("reference");
    expect(outcome.fallback).toBe(
      "high_fidelity: NumericalInstabilityError: high_fidelity molecular solver produced unusable output: activation for drive is NaN",
    );
    debug.mockRestore();
  });
});
