/**
 * Error taxonomy for the simulation core.
 *
 * Only SimulationValidationError and SimulationInternalError reach callers.
 * The backend errors are raised inside stage primaries and recovered by
 * tryWithFallback; their messages become `engine.fallbacks` reasons.
 */

import type { BackendLevel, StageName } from "@/types/simulation";

/** Malformed request. Raised before any stage runs. */
export class SimulationValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation request: ${issues.join("; ")}`);
    this.name = "SimulationValidationError";
    this.issues = issues;
  }
}

/** A requested high-fidelity backend is not installed or failed to construct. */
export class BackendUnavailableError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, detail: string) {
    super(detail);
    this.name = "BackendUnavailableError";
    this.stage = stage;
  }
}

/** A backend produced non-finite or mis-shaped output. */
export class NumericalInstabilityError extends Error {
  readonly stage: StageName;
  readonly backend: BackendLevel;

  constructor(stage: StageName, backend: BackendLevel, detail: string) {
    super(`${backend} ${stage} solver produced unusable output: ${detail}`);
    this.name = "NumericalInstabilityError";
    this.stage = stage;
    this.backend = backend;
  }
}

/** The analytic floor itself failed. Indicates a bug, not a runtime condition. */
export class SimulationInternalError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Analytic ${stage} stage failed: ${detail}`);
    this.name = "SimulationInternalError";
    this.stage = stage;
    this.cause = cause;
  }
}

/** Readable reason string for any thrown value. */
export function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    return err.message ? `${err.name}: ${err.message}` : err.name;
  }
  return String(err);
}
