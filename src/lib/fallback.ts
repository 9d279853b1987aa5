/**
 * Graceful degradation shared by the three solver stages.
 *
 * Every stage supplies one implementation per backend level; runStage walks
 * the chain from the requested level down, one level per failure. Only the
 * analytic floor is allowed to fail the request, and then only as an
 * internal error.
 */

import type { BackendLevel, StageName } from "@/types/simulation";
import { fallbackChain } from "./backend-capabilities";
import type { BackendCapabilities } from "./backend-capabilities";
import { SimulationInternalError, describeFailure } from "./sim-errors";
import type { SimulationParameters } from "./sim-config";

/** Per-run inputs every solver stage needs besides its data. */
export interface StageContext {
  capabilities: BackendCapabilities;
  parameters: SimulationParameters;
}

export interface StageOutcome<T> {
  value: T;
  backend: BackendLevel;
  /** Why higher levels were abandoned; null when the requested level ran */
  fallback: string | null;
}

export type StageImplementations<T> = Record<BackendLevel, () => T>;

export function tryWithFallback<T>(
  primary: () => T,
  secondary: () => T,
  onFallback: (reason: string) => void,
): T {
  let value: T;
  try {
    value = primary();
  } catch (err) {
    onFallback(describeFailure(err));
    return secondary();
  }
  return value;
}

export function runStage<T>(
  stage: StageName,
  requested: BackendLevel,
  implementations: StageImplementations<T>,
): StageOutcome<T> {
  const chain = fallbackChain(requested);
  const reasons: string[] = [];

  const attempt = (index: number): { value: T; backend: BackendLevel } => {
    const level = chain[index];
    const run = () => ({ value: implementations[level](), backend: level });

    if (index === chain.length - 1) {
      try {
        return run();
      } catch (err) {
        throw new SimulationInternalError(stage, err);
      }
    }

    return tryWithFallback(run, () => attempt(index + 1), (reason) => {
      reasons.push(`${level}: ${reason}`);
      console.debug(`[${stage}] ${level} backend failed, falling back to ${chain[index + 1]}: ${reason}`);
    });
  };

  const { value, backend } = attempt(0);
  return { value, backend, fallback: reasons.length > 0 ? reasons.join("; ") : null };
}
