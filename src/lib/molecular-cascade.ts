/**
 * Molecular Cascade Stage: effective weights → per-metric activation at t=0.
 *
 * Backends:
 *   analytic        activation = tanh(Σ weights)
 *   reference       receptor → messenger relaxation network, RK4 over a
 *                   short transient; receptors bind at a Ki-dependent rate
 *                   and signal in proportion to their expression
 *   high_fidelity   registered reaction-network adapter
 *
 * Every backend is linear in the summed drive before the final tanh, so
 * activation stays monotonic in occupancy with the sign of the weight.
 */

import type { MolecularContribution, MolecularSolverOutput } from "@/types/backends";
import { METRIC_IDS } from "@/types/simulation";
import type { BackendLevel, MetricId } from "@/types/simulation";
import { acquireHighFidelitySolver } from "./backend-capabilities";
import type { AssumptionSet } from "./assumptions";
import type { ResolvedReceptor } from "./evidence-resolver";
import { runStage } from "./fallback";
import type { StageContext, StageOutcome } from "./fallback";
import { buildTimeAxis, integrateRk4, isFiniteSeries } from "./numeric";
import { metricRecord } from "./receptor-registry";
import type { RegistryLookup } from "./receptor-registry";
import { NumericalInstabilityError } from "./sim-errors";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface ActivationTransient {
  /** Hours from dosing, starting at 0 */
  timepoints: number[];
  values: Record<MetricId, number[]>;
}

export interface ActivationSignal {
  /** Initial condition per metric, in [-1, 1] */
  activation: Record<MetricId, number>;
  /** Early time course; analytic backend produces none */
  transient: ActivationTransient | null;
}

// ─── Drive ───────────────────────────────────────────────────

/** Stage-local rescaling from the molecular assumptions (acute_1a_clamp, adhd_cohort). */
export function assumptionScale(
  lookup: RegistryLookup,
  assumptions: AssumptionSet,
  params: SimulationParameters["assumptions"],
): number {
  let scale = 1;
  if (assumptions.acute_1a_clamp && lookup.canonical === "5-HT1A") scale *= params.acute1aClamp;
  if (assumptions.adhd_cohort && lookup.entry.systems.includes("dopamine")) scale *= params.adhdDopamineScale;
  return scale;
}

export function molecularContributions(
  receptors: readonly ResolvedReceptor[],
  assumptions: AssumptionSet,
  params: SimulationParameters,
): MolecularContribution[] {
  const out: MolecularContribution[] = [];
  for (const receptor of receptors) {
    if (!receptor.lookup.known) continue;
    const scale = assumptionScale(receptor.lookup, assumptions, params.assumptions);
    for (const metricId of METRIC_IDS) {
      const weight = receptor.weights[metricId].weight * scale;
      if (weight === 0) continue;
      out.push({
        receptorId: receptor.lookup.canonical,
        metricId,
        weight,
        kiNm: receptor.lookup.entry.kiNm,
        expression: receptor.lookup.entry.expression,
      });
    }
  }
  return out;
}

export function summedDrive(contributions: readonly MolecularContribution[]): Record<MetricId, number> {
  const drive = metricRecord(() => 0);
  for (const c of contributions) drive[c.metricId] += c.weight;
  return drive;
}

// ─── Backends ────────────────────────────────────────────────

function assertActivation(
  backend: BackendLevel,
  activation: Record<MetricId, number>,
): void {
  for (const metricId of METRIC_IDS) {
    const value = activation[metricId];
    if (!Number.isFinite(value) || Math.abs(value) > 1) {
      throw new NumericalInstabilityError("molecular", backend, `activation for ${metricId} is ${value}`);
    }
  }
}

export function analyticActivation(contributions: readonly MolecularContribution[]): ActivationSignal {
  const drive = summedDrive(contributions);
  const activation = metricRecord((m) => Math.tanh(drive[m]));
  assertActivation("analytic", activation);
  return { activation, transient: null };
}

/** Binding relaxation rate; faster for tighter binders (lower Ki). */
export function bindingRate(kiNm: number | null, params: SimulationParameters["molecular"]): number {
  const ref = params.affinityReferenceNm;
  if (kiNm === null) return params.bindingRate;
  return (params.bindingRate * 2 * ref) / (ref + kiNm);
}

export function expressionScale(expression: number | null, params: SimulationParameters["molecular"]): number {
  if (expression === null) return 1;
  return params.expressionFloor + (1 - params.expressionFloor) * expression;
}

export function referenceActivation(
  contributions: readonly MolecularContribution[],
  params: SimulationParameters["molecular"],
): ActivationSignal {
  const n = contributions.length;
  const targets = contributions.map((c) => c.weight * expressionScale(c.expression, params));
  const rates = contributions.map((c) => bindingRate(c.kiNm, params));

  // state = [receptor signal per contribution..., messenger per metric...]
  const derivative = (_t: number, y: readonly number[]): number[] => {
    const dy = new Array<number>(y.length).fill(0);
    const inflow = new Array<number>(METRIC_IDS.length).fill(0);
    for (let r = 0; r < n; r++) {
      dy[r] = rates[r] * (targets[r] - y[r]);
      inflow[METRIC_IDS.indexOf(contributions[r].metricId)] += y[r];
    }
    for (let m = 0; m < METRIC_IDS.length; m++) {
      dy[n + m] = params.couplingRate * (inflow[m] - y[n + m]);
    }
    return dy;
  };

  const timepoints = buildTimeAxis(params.transientHours, params.transientHours / params.transientSamples);
  const states = integrateRk4(derivative, new Array<number>(n + METRIC_IDS.length).fill(0), timepoints, params.stepHours);

  const values = metricRecord((m) => {
    const index = n + METRIC_IDS.indexOf(m);
    return states.map((state) => Math.tanh(state[index]));
  });
  for (const metricId of METRIC_IDS) {
    if (!isFiniteSeries(values[metricId])) {
      throw new NumericalInstabilityError("molecular", "reference", `transient for ${metricId} is not finite`);
    }
  }
  const activation = metricRecord((m) => values[m][values[m].length - 1]);
  assertActivation("reference", activation);
  return { activation, transient: { timepoints, values } };
}

export function highFidelityActivation(
  contributions: readonly MolecularContribution[],
  context: StageContext,
): ActivationSignal {
  const solver = acquireHighFidelitySolver("molecular", context.capabilities.highFidelity.molecular);
  const output: MolecularSolverOutput = solver.simulate({
    drive: summedDrive(contributions),
    contributions: [...contributions],
    transientHours: context.parameters.molecular.transientHours,
  });
  assertActivation("high_fidelity", output.activation);

  const transient = output.transient;
  if (!transient) return { activation: { ...output.activation }, transient: null };
  for (const metricId of METRIC_IDS) {
    const series = transient.values[metricId];
    if (series.length !== transient.timepoints.length || !isFiniteSeries(series)) {
      throw new NumericalInstabilityError("molecular", "high_fidelity", `transient for ${metricId} is malformed`);
    }
  }
  return { activation: { ...output.activation }, transient };
}

// ─── Stage ───────────────────────────────────────────────────

export function runMolecularStage(
  receptors: readonly ResolvedReceptor[],
  assumptions: AssumptionSet,
  context: StageContext,
): StageOutcome<ActivationSignal> {
  const contributions = molecularContributions(receptors, assumptions, context.parameters);
  return runStage("molecular", context.capabilities.requested.molecular, {
    high_fidelity: () => highFidelityActivation(contributions, context),
    reference: () => referenceActivation(contributions, context.parameters.molecular),
    analytic: () => analyticActivation(contributions),
  });
}
