/**
 * Contracts for optional high-fidelity solver adapters. A host process
 * registers factories at startup; the core constructs one solver per call
 * and discards it, so adapters need not be re-entrant.
 */

import type { Dosing, MetricId } from "./simulation";

// ─── Molecular: reaction-network solver ───────────────────────────────

export interface MolecularContribution {
  receptorId: string;
  metricId: MetricId;
  weight: number;
  kiNm: number | null;
  expression: number | null;
}

export interface MolecularSolverInput {
  /** Summed effective weight per metric */
  drive: Record<MetricId, number>;
  contributions: MolecularContribution[];
  transientHours: number;
}

export interface MolecularSolverOutput {
  /** Initial condition per metric, expected in [-1, 1] */
  activation: Record<MetricId, number>;
  transient?: {
    timepoints: number[];
    values: Record<MetricId, number[]>;
  };
}

export interface HighFidelityMolecularSolver {
  simulate(input: MolecularSolverInput): MolecularSolverOutput;
}

// ─── PK/PD: compartmental solver ───────────────────────────────

export interface CompartmentConfig {
  absorptionRate: number;
  bioavailability: number;
  centralVolumeL: number;
  peripheralVolumeL: number;
  clearanceLPerH: number;
  distributionClearanceLPerH: number;
}

export interface PkpdSolverInput {
  dosing: Dosing;
  timepoints: number[];
  compartments: CompartmentConfig;
}

export interface PkpdSolverOutput {
  /** Normalized effect-site curve, one value per timepoint */
  effect: number[];
}

export interface HighFidelityPkpdSolver {
  simulate(input: PkpdSolverInput): PkpdSolverOutput;
}

// ─── Circuit: connectome solver ───────────────────────────────

export interface CircuitSolverInput {
  modules: { id: string; inputGain: number }[];
  edges: { from: string; to: string; weight: number }[];
  /** Direct input per module, aligned with timepoints */
  inputs: Record<string, number[]>;
  timepoints: number[];
  salienceModule: string;
  pvtWeight: number;
  pvtBlendGain: number;
}

export interface CircuitSolverOutput {
  timelines: Record<string, number[]>;
}

export interface HighFidelityCircuitSolver {
  simulate(input: CircuitSolverInput): CircuitSolverOutput;
}

export interface HighFidelitySolvers {
  molecular: HighFidelityMolecularSolver;
  pkpd: HighFidelityPkpdSolver;
  circuit: HighFidelityCircuitSolver;
}

export type HighFidelityFactories = {
  [S in keyof HighFidelitySolvers]?: () => HighFidelitySolvers[S];
};
