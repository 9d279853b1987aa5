/**
 * PK/PD Stage: shapes each metric's activation over the time axis.
 *
 * The exposure curve is metric-invariant: every metric trajectory is its
 * t=0 activation times a normalized exposure in [0, 1].
 *
 *   acute    single oral dose; Bateman curve, peak scaled to 1
 *   chronic  repeated dosing approximated as constant input; rises
 *            monotonically toward a steady-state plateau of 1
 *
 * Chronic dosing lengthens the apparent elimination half-life
 * (chronicHalfLifeFactor), so the plateau is approached more slowly.
 */

import type { CompartmentConfig } from "@/types/backends";
import type { BackendLevel, Dosing, MetricId } from "@/types/simulation";
import { acquireHighFidelitySolver } from "./backend-capabilities";
import { runStage } from "./fallback";
import type { StageContext, StageOutcome } from "./fallback";
import { integrateRk4, isFiniteSeries } from "./numeric";
import { metricRecord } from "./receptor-registry";
import { NumericalInstabilityError } from "./sim-errors";
import type { SimulationParameters } from "./sim-config";

// ─── Types ───────────────────────────────────────────────────

export interface PkpdTrajectories {
  /** Normalized exposure, one value per timepoint */
  exposure: number[];
  /** activation[m] × exposure */
  trajectories: Record<MetricId, number[]>;
}

type PkpdParameters = SimulationParameters["pkpd"];

// ─── Kinetic constants ───────────────────────────────────────

export function eliminationRate(dosing: Dosing, params: PkpdParameters): number {
  const halfLife = params.eliminationHalfLifeHours * (dosing === "chronic" ? params.chronicHalfLifeFactor : 1);
  return Math.LN2 / halfLife;
}

export function compartmentConfig(dosing: Dosing, params: PkpdParameters): CompartmentConfig {
  return {
    absorptionRate: params.absorptionRate,
    bioavailability: params.bioavailability,
    centralVolumeL: params.centralVolumeL,
    peripheralVolumeL: params.peripheralVolumeL,
    clearanceLPerH: eliminationRate(dosing, params) * params.centralVolumeL,
    distributionClearanceLPerH: params.distributionClearanceLPerH,
  };
}

function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= 1e-9 * Math.max(Math.abs(a), Math.abs(b));
}

// ─── Analytic curves ─────────────────────────────────────────

/** Single-dose concentration shape, scaled so the peak is exactly 1. */
export function batemanCurve(t: number, ka: number, ke: number): number {
  if (t <= 0) return 0;
  if (nearlyEqual(ka, ke)) {
    // limit ka → ke: k·t·e^{1−k·t}, peak at t = 1/k
    return ke * t * Math.exp(1 - ke * t);
  }
  const tMax = Math.log(ka / ke) / (ka - ke);
  const peak = Math.exp(-ke * tMax) - Math.exp(-ka * tMax);
  return (Math.exp(-ke * t) - Math.exp(-ka * t)) / peak;
}

/** Constant-input (continuous dosing) form; 0 at t=0, rises to 1. */
export function cumulativeCurve(t: number, ka: number, ke: number): number {
  if (t <= 0) return 0;
  if (nearlyEqual(ka, ke)) {
    return 1 - (1 + ke * t) * Math.exp(-ke * t);
  }
  return 1 - (ka * Math.exp(-ke * t) - ke * Math.exp(-ka * t)) / (ka - ke);
}

export function analyticExposure(dosing: Dosing, timepoints: readonly number[], params: PkpdParameters): number[] {
  const ka = params.absorptionRate;
  const ke = eliminationRate(dosing, params);
  const shape = dosing === "acute" ? batemanCurve : cumulativeCurve;
  return timepoints.map((t) => shape(t, ka, ke));
}

// ─── Compartmental model ─────────────────────────────────────

/**
 * gut → central ↔ peripheral, first-order absorption and elimination.
 * Acute starts with one unit in the gut; chronic feeds one unit per hour.
 */
export function referenceExposure(dosing: Dosing, timepoints: readonly number[], params: PkpdParameters): number[] {
  const c = compartmentConfig(dosing, params);
  const kel = c.clearanceLPerH / c.centralVolumeL;
  const k12 = c.distributionClearanceLPerH / c.centralVolumeL;
  const k21 = c.distributionClearanceLPerH / c.peripheralVolumeL;
  const infusion = dosing === "chronic" ? 1 : 0;

  const derivative = (_t: number, [gut, central, peripheral]: readonly number[]): number[] => [
    infusion * c.bioavailability - c.absorptionRate * gut,
    c.absorptionRate * gut - (kel + k12) * central + k21 * peripheral,
    k12 * central - k21 * peripheral,
  ];
  const y0 = [dosing === "acute" ? c.bioavailability : 0, 0, 0];
  const concentration = integrateRk4(derivative, y0, timepoints, params.substepHours).map(
    (state) => state[1] / c.centralVolumeL,
  );

  // Chronic: scale by the steady state infusion·F/CL; acute: by the observed peak
  const scale = dosing === "chronic" ? c.bioavailability / c.clearanceLPerH : Math.max(...concentration);
  if (!(scale > 0)) {
    throw new NumericalInstabilityError("pkpd", "reference", `normalisation scale is ${scale}`);
  }
  return concentration.map((v) => v / scale);
}

export function highFidelityExposure(dosing: Dosing, timepoints: readonly number[], context: StageContext): number[] {
  const solver = acquireHighFidelitySolver("pkpd", context.capabilities.highFidelity.pkpd);
  const { effect } = solver.simulate({
    dosing,
    timepoints: [...timepoints],
    compartments: compartmentConfig(dosing, context.parameters.pkpd),
  });
  return [...effect];
}

// ─── Stage ───────────────────────────────────────────────────

function checkedExposure(backend: BackendLevel, exposure: number[], expectedLength: number): number[] {
  if (exposure.length !== expectedLength) {
    throw new NumericalInstabilityError("pkpd", backend, `expected ${expectedLength} samples, got ${exposure.length}`);
  }
  if (!isFiniteSeries(exposure)) {
    throw new NumericalInstabilityError("pkpd", backend, "exposure curve contains non-finite values");
  }
  return exposure;
}

export function runPkpdStage(
  activation: Readonly<Record<MetricId, number>>,
  dosing: Dosing,
  timepoints: readonly number[],
  context: StageContext,
): StageOutcome<PkpdTrajectories> {
  const params = context.parameters.pkpd;
  const n = timepoints.length;
  const outcome = runStage<number[]>("pkpd", context.capabilities.requested.pkpd, {
    high_fidelity: () => checkedExposure("high_fidelity", highFidelityExposure(dosing, timepoints, context), n),
    reference: () => checkedExposure("reference", referenceExposure(dosing, timepoints, params), n),
    analytic: () => checkedExposure("analytic", analyticExposure(dosing, timepoints, params), n),
  });

  const exposure = outcome.value;
  const trajectories = metricRecord((m) => exposure.map((e) => activation[m] * e));
  return { ...outcome, value: { exposure, trajectories } };
}
