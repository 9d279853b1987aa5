/**
 * Simulation entry point.
 *
 *   validate request and parameters → resolve weights → molecular → pk/pd
 *   → circuit → aggregate
 *
 * Synchronous and request-scoped. The only shared state read is the
 * evidence source and the frozen backend capability snapshot, so
 * concurrent calls need no coordination.
 */

import type { EvidenceSource } from "@/types/evidence";
import type { BackendLevel, EngineReport, SimulationResult, StageName } from "@/types/simulation";
import { aggregateResult } from "./aggregation";
import { getBackendCapabilities } from "./backend-capabilities";
import type { BackendCapabilities } from "./backend-capabilities";
import { runCircuitStage } from "./circuit";
import { resolveReceptorWeights } from "./evidence-resolver";
import { EMPTY_EVIDENCE } from "./evidence-store";
import type { StageContext, StageOutcome } from "./fallback";
import { runMolecularStage } from "./molecular-cascade";
import { buildTimeAxis } from "./numeric";
import { runPkpdStage } from "./pkpd";
import { validateSimulationParameters, validateSimulationRequest } from "./request-validation";
import type { ParameterOverrides } from "./sim-config";

export interface SimulationOptions {
  /** Defaults to an empty store (registry weights only) */
  evidence?: EvidenceSource;
  /** Defaults to the process-wide snapshot */
  capabilities?: BackendCapabilities;
  parameters?: ParameterOverrides;
}

export function runSimulation(request: unknown, options: SimulationOptions = {}): SimulationResult {
  const validated = validateSimulationRequest(request);
  const parameters = validateSimulationParameters(options.parameters);
  const context: StageContext = {
    capabilities: options.capabilities ?? getBackendCapabilities(),
    parameters,
  };

  const resolution = resolveReceptorWeights(validated.receptors, options.evidence ?? EMPTY_EVIDENCE, parameters);
  for (const note of resolution.diagnostics) console.warn(`[evidence] ${note}`);

  const timepoints = buildTimeAxis(parameters.time.horizonHours, parameters.time.stepHours);
  const molecular = runMolecularStage(resolution.receptors, validated.assumptions, context);
  const pkpd = runPkpdStage(molecular.value.activation, validated.dosing, timepoints, context);
  const circuit = runCircuitStage(
    pkpd.value.trajectories,
    validated.assumptions,
    validated.pvtWeight,
    timepoints,
    context,
  );

  const stages: [StageName, StageOutcome<unknown>][] = [
    ["molecular", molecular],
    ["pkpd", pkpd],
    ["circuit", circuit],
  ];
  const backends: Record<StageName, BackendLevel> = {
    molecular: molecular.backend,
    pkpd: pkpd.backend,
    circuit: circuit.backend,
  };
  const fallbacks: EngineReport["fallbacks"] = {};
  for (const [stage, outcome] of stages) {
    if (outcome.fallback !== null) fallbacks[stage] = outcome.fallback;
  }

  return aggregateResult({
    receptors: resolution.receptors,
    dosing: validated.dosing,
    assumptions: validated.assumptions,
    timepoints,
    activation: molecular.value,
    circuit: circuit.value,
    engine: {
      backends,
      fallbacks,
      diagnostics: [...resolution.diagnostics, ...circuit.value.diagnostics],
    },
    parameters,
  });
}
