/**
 * Backend Capability Detector: process-wide, read-only snapshot of which
 * backend each stage asks for and which high-fidelity adapters exist.
 *
 * Built once (eagerly via initBackendCapabilities at startup, or lazily on
 * first getBackendCapabilities call) and frozen; request handling only reads.
 */

import type { HighFidelityFactories } from "@/types/backends";
import type { BackendLevel, StageName } from "@/types/simulation";
import { BackendUnavailableError, describeFailure } from "./sim-errors";
import { readBackendConfig } from "./sim-config";
import type { BackendConfig } from "./sim-config";

export interface BackendCapabilities {
  readonly requested: Readonly<BackendConfig>;
  readonly highFidelity: Readonly<HighFidelityFactories>;
}

export interface CapabilityOptions {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  highFidelity?: HighFidelityFactories;
}

export function createBackendCapabilities(options: CapabilityOptions = {}): BackendCapabilities {
  const requested = Object.freeze(readBackendConfig(options.env ?? process.env));
  const highFidelity = Object.freeze({ ...options.highFidelity });
  return Object.freeze({ requested, highFidelity });
}

let processCapabilities: BackendCapabilities | null = null;

/** Eager startup initialisation. May run once per process. */
export function initBackendCapabilities(options: CapabilityOptions = {}): BackendCapabilities {
  if (processCapabilities) {
    throw new Error("Backend capabilities are already initialised for this process");
  }
  processCapabilities = createBackendCapabilities(options);
  return processCapabilities;
}

export function getBackendCapabilities(): BackendCapabilities {
  if (!processCapabilities) processCapabilities = createBackendCapabilities();
  return processCapabilities;
}

/** Levels to try for a stage, highest first, always ending at analytic. */
export function fallbackChain(requested: BackendLevel): BackendLevel[] {
  switch (requested) {
    case "high_fidelity":
      return ["high_fidelity", "reference", "analytic"];
    case "reference":
      return ["reference", "analytic"];
    case "analytic":
      return ["analytic"];
  }
}

/**
 * Construct a fresh high-fidelity solver for one call. Missing or failing
 * factories surface as BackendUnavailableError for the fallback chain.
 */
export function acquireHighFidelitySolver<T>(stage: StageName, factory: (() => T) | undefined): T {
  if (!factory) {
    throw new BackendUnavailableError(stage, `no high-fidelity ${stage} solver is installed`);
  }
  try {
    return factory();
  } catch (err) {
    throw new BackendUnavailableError(stage, `high-fidelity ${stage} solver failed to initialise (${describeFailure(err)})`);
  }
}
