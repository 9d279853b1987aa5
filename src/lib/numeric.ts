/** Numeric utilities shared by the solver stages. */

// ─── Scalars ─────────────────────────────────────────────────

export function clamp01(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

/**
 * Smooth saturation into (-bound, bound). Near-identity for |x| ≪ bound,
 * so it can be applied unconditionally without distorting small signals.
 */
export function saturate(x: number, bound = 1): number {
  return bound * Math.tanh(x / bound);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function isFiniteSeries(values: readonly number[]): boolean {
  return values.every((v) => Number.isFinite(v));
}

/**
 * Combine per-source uncertainties as a shrinking interval:
 * max(min_i u_i, (mean(u) + spread) / sqrt(n)).
 * More agreeing sources → narrower, but never below the best single source.
 */
export function shrinkUncertainty(uncertainties: readonly number[], spread = 0, count = uncertainties.length): number {
  if (uncertainties.length === 0) return 0;
  const floor = Math.min(...uncertainties);
  const n = Math.max(1, count);
  return clamp01(Math.max(floor, (mean(uncertainties) + spread) / Math.sqrt(n)));
}

// ─── Time axis ───────────────────────────────────────────────

/** Timepoints are rounded to this many hours; no step may be finer. */
export const TIME_RESOLUTION_HOURS = 1e-9;

/** [0, step, 2·step, …, horizon]; always starts at 0 and is strictly increasing. */
export function buildTimeAxis(horizonHours: number, stepHours: number): number[] {
  if (!(stepHours >= TIME_RESOLUTION_HOURS) || !(horizonHours > 0) || !Number.isFinite(horizonHours)) {
    throw new RangeError(`Invalid time axis: horizon=${horizonHours}h step=${stepHours}h`);
  }
  const n = Math.floor(horizonHours / stepHours + 1e-9);
  const axis: number[] = [];
  for (let i = 0; i <= n; i++) axis.push(Number((i * stepHours).toFixed(9)));
  return axis;
}

/** Piecewise-linear interpolation of `values` sampled at `timepoints`; clamps at the ends. */
export function interpolate(timepoints: readonly number[], values: readonly number[], t: number): number {
  const n = timepoints.length;
  if (n === 0) return 0;
  if (t <= timepoints[0]) return values[0];
  if (t >= timepoints[n - 1]) return values[n - 1];
  let hi = 1;
  while (timepoints[hi] < t) hi++;
  const lo = hi - 1;
  const span = timepoints[hi] - timepoints[lo];
  const f = span > 0 ? (t - timepoints[lo]) / span : 0;
  return values[lo] + f * (values[hi] - values[lo]);
}

// ─── ODE integration ─────────────────────────────────────────

export type Derivative = (t: number, state: readonly number[]) => number[];

function axpy(a: number, x: readonly number[], y: readonly number[]): number[] {
  const out = new Array<number>(y.length);
  for (let i = 0; i < y.length; i++) out[i] = y[i] + a * x[i];
  return out;
}

/** One classical Runge–Kutta step. */
export function rk4Step(f: Derivative, t: number, y: readonly number[], h: number): number[] {
  const k1 = f(t, y);
  const k2 = f(t + h / 2, axpy(h / 2, k1, y));
  const k3 = f(t + h / 2, axpy(h / 2, k2, y));
  const k4 = f(t + h, axpy(h, k3, y));
  const next = new Array<number>(y.length);
  for (let i = 0; i < y.length; i++) {
    next[i] = y[i] + (h / 6) * (k1[i] + 2 * k2[i] + 2 * k3[i] + k4[i]);
  }
  return next;
}

/**
 * Integrate from timepoints[0] and report the state at every timepoint.
 * Each interval is split into equal substeps no longer than `maxStep`.
 */
export function integrateRk4(
  f: Derivative,
  y0: readonly number[],
  timepoints: readonly number[],
  maxStep: number,
): number[][] {
  if (timepoints.length === 0) return [];
  const states: number[][] = [[...y0]];
  let y: number[] = [...y0];
  for (let i = 1; i < timepoints.length; i++) {
    const t0 = timepoints[i - 1];
    const span = timepoints[i] - t0;
    const steps = Math.max(1, Math.ceil(span / maxStep - 1e-9));
    const h = span / steps;
    for (let s = 0; s < steps; s++) {
      y = rk4Step(f, t0 + s * h, y, h);
    }
    states.push(y);
  }
  return states;
}
