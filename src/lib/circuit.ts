/**
 * Circuit Stage: propagates metric trajectories through the module graph.
 *
 * Analytic recurrence, per timepoint k and module j:
 *
 *   x_j(k) = g_j·u_j(k) + Σ_i W_ij·x_i(k−1) + pvt_weight·β·x_pvt(k−1)
 *
 * with the blend term skipped for the salience hub itself. The reference
 * backend integrates the continuous form dx/dt = −λx + Wᵀx + G·u(t) + blend.
 * All outputs pass through B·tanh(x/B); raw excursions beyond B are
 * reported as diagnostics.
 */

import type { CircuitSolverInput } from "@/types/backends";
import type { BackendLevel, MetricId } from "@/types/simulation";
import type { AssumptionSet } from "./assumptions";
import { acquireHighFidelitySolver } from "./backend-capabilities";
import { CIRCUIT_EDGES, CIRCUIT_MODULES, CIRCUIT_MODULE_IDS, SALIENCE_MODULE } from "./circuit-topology";
import type { CircuitModuleId } from "./circuit-topology";
import { runStage } from "./fallback";
import type { StageContext, StageOutcome } from "./fallback";
import { integrateRk4, interpolate, isFiniteSeries, saturate } from "./numeric";
import { NumericalInstabilityError } from "./sim-errors";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface ModuleTimelines {
  /** Saturated activity per module, aligned with timepoints */
  timelines: Record<CircuitModuleId, number[]>;
  diagnostics: string[];
}

export interface WeightedEdge {
  from: CircuitModuleId;
  to: CircuitModuleId;
  weight: number;
}

export interface EffectiveCircuit {
  gains: Record<CircuitModuleId, number>;
  edges: WeightedEdge[];
}

export interface CircuitRun {
  inputs: Record<CircuitModuleId, number[]>;
  timepoints: readonly number[];
  circuit: EffectiveCircuit;
  pvtWeight: number;
  params: SimulationParameters["circuit"];
}

export function moduleRecord<T>(fill: (id: CircuitModuleId) => T): Record<CircuitModuleId, T> {
  return {
    pfc: fill("pfc"),
    striatum: fill("striatum"),
    vta: fill("vta"),
    acc: fill("acc"),
    amygdala: fill("amygdala"),
    hippocampus: fill("hippocampus"),
    thalamus: fill("thalamus"),
    hypothalamus: fill("hypothalamus"),
    pvt: fill("pvt"),
  };
}

// ─── Assumptions ─────────────────────────────────────────────

export function effectiveCircuit(assumptions: AssumptionSet, params: SimulationParameters): EffectiveCircuit {
  const edges = CIRCUIT_EDGES.map((edge) => {
    const factor = edge.toggle !== null && assumptions[edge.toggle] ? params.circuit.toggleFactors[edge.toggle] : 1;
    return { from: edge.from, to: edge.to, weight: edge.weight * factor };
  });
  const gains = moduleRecord((id) =>
    assumptions.gut_bias && CIRCUIT_MODULES[id].gutBrainAxis ? params.assumptions.gutBiasGain : 1,
  );
  return { gains, edges };
}

// ─── Backends ────────────────────────────────────────────────

function blendTerm(target: CircuitModuleId, salience: number, run: CircuitRun): number {
  return target === SALIENCE_MODULE ? 0 : run.pvtWeight * run.params.pvtBlendGain * salience;
}

/** Unsaturated recurrence; saturation is applied once by the stage. */
export function analyticCircuit(run: CircuitRun): Record<CircuitModuleId, number[]> {
  const raw = moduleRecord((): number[] => []);
  const state = moduleRecord(() => 0);

  for (let k = 0; k < run.timepoints.length; k++) {
    const next = moduleRecord((id) => run.circuit.gains[id] * run.inputs[id][k]);
    if (k > 0) {
      for (const edge of run.circuit.edges) next[edge.to] += edge.weight * state[edge.from];
      for (const id of CIRCUIT_MODULE_IDS) next[id] += blendTerm(id, state[SALIENCE_MODULE], run);
    }
    for (const id of CIRCUIT_MODULE_IDS) {
      raw[id].push(next[id]);
      // recurrence feeds on the bounded activity
      state[id] = saturate(next[id], run.params.saturationBound);
    }
  }
  return raw;
}

export function referenceCircuit(run: CircuitRun): Record<CircuitModuleId, number[]> {
  const position = (id: CircuitModuleId): number => CIRCUIT_MODULE_IDS.indexOf(id);
  const pvt = position(SALIENCE_MODULE);

  const derivative = (t: number, x: readonly number[]): number[] => {
    const dx = CIRCUIT_MODULE_IDS.map((id, i) => {
      const drive = run.circuit.gains[id] * interpolate(run.timepoints, run.inputs[id], t);
      return -run.params.leakRate * x[i] + drive + blendTerm(id, x[pvt], run);
    });
    for (const edge of run.circuit.edges) dx[position(edge.to)] += edge.weight * x[position(edge.from)];
    return dx;
  };

  const y0 = CIRCUIT_MODULE_IDS.map((id) => run.circuit.gains[id] * run.inputs[id][0]);
  const states = integrateRk4(derivative, y0, run.timepoints, run.params.substepHours);
  return moduleRecord((id) => states.map((s) => s[position(id)]));
}

export function highFidelityCircuit(run: CircuitRun, context: StageContext): Record<CircuitModuleId, number[]> {
  const solver = acquireHighFidelitySolver("circuit", context.capabilities.highFidelity.circuit);
  const input: CircuitSolverInput = {
    modules: CIRCUIT_MODULE_IDS.map((id) => ({ id, inputGain: run.circuit.gains[id] })),
    edges: run.circuit.edges.map((edge) => ({ ...edge })),
    inputs: moduleRecord((id) => [...run.inputs[id]]),
    timepoints: [...run.timepoints],
    salienceModule: SALIENCE_MODULE,
    pvtWeight: run.pvtWeight,
    pvtBlendGain: run.params.pvtBlendGain,
  };
  const { timelines } = solver.simulate(input);
  return moduleRecord((id) => {
    const series = timelines[id];
    if (series === undefined) {
      throw new NumericalInstabilityError("circuit", "high_fidelity", `no timeline for module ${id}`);
    }
    return [...series];
  });
}

// ─── Stage ───────────────────────────────────────────────────

function checkedTimelines(
  backend: BackendLevel,
  raw: Record<CircuitModuleId, number[]>,
  expectedLength: number,
): Record<CircuitModuleId, number[]> {
  for (const id of CIRCUIT_MODULE_IDS) {
    if (raw[id].length !== expectedLength || !isFiniteSeries(raw[id])) {
      throw new NumericalInstabilityError("circuit", backend, `timeline for ${id} is malformed or not finite`);
    }
  }
  return raw;
}

export function saturationDiagnostics(raw: Record<CircuitModuleId, number[]>, bound: number): string[] {
  const notes: string[] = [];
  for (const id of CIRCUIT_MODULE_IDS) {
    const peak = Math.max(0, ...raw[id].map(Math.abs));
    if (peak > bound) {
      notes.push(`circuit module ${id} saturated (raw peak ${peak.toFixed(3)} exceeds bound ${bound})`);
    }
  }
  return notes;
}

export function runCircuitStage(
  trajectories: Readonly<Record<MetricId, readonly number[]>>,
  assumptions: AssumptionSet,
  pvtWeight: number,
  timepoints: readonly number[],
  context: StageContext,
): StageOutcome<ModuleTimelines> {
  const params = context.parameters.circuit;
  const run: CircuitRun = {
    inputs: moduleRecord((id) => [...trajectories[CIRCUIT_MODULES[id].input]]),
    timepoints,
    circuit: effectiveCircuit(assumptions, context.parameters),
    pvtWeight,
    params,
  };
  const n = timepoints.length;

  const outcome = runStage("circuit", context.capabilities.requested.circuit, {
    high_fidelity: () => checkedTimelines("high_fidelity", highFidelityCircuit(run, context), n),
    reference: () => checkedTimelines("reference", referenceCircuit(run), n),
    analytic: () => checkedTimelines("analytic", analyticCircuit(run), n),
  });

  const raw = outcome.value;
  return {
    ...outcome,
    value: {
      timelines: moduleRecord((id) => raw[id].map((x) => saturate(x, params.saturationBound))),
      diagnostics: saturationDiagnostics(raw, params.saturationBound),
    },
  };
}
