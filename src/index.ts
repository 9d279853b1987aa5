export type {
  AssumptionKey,
  AssumptionToggles,
  BackendLevel,
  Dosing,
  EngineReport,
  Mechanism,
  MetricId,
  ModuleTimeline,
  ReceptorContext,
  ReceptorSpec,
  SimulationDetails,
  SimulationRequest,
  SimulationResult,
  StageName,
  UncertaintyBreakdown,
} from "./types/simulation";
export { ASSUMPTION_KEYS, MECHANISMS, METRIC_IDS, STAGE_NAMES } from "./types/simulation";
export type { EvidenceRecord, EvidenceSource } from "./types/evidence";
export type {
  CircuitSolverInput,
  CircuitSolverOutput,
  HighFidelityCircuitSolver,
  HighFidelityFactories,
  HighFidelityMolecularSolver,
  HighFidelityPkpdSolver,
  MolecularSolverInput,
  MolecularSolverOutput,
  PkpdSolverInput,
  PkpdSolverOutput,
} from "./types/backends";

export { runSimulation } from "./lib/simulation-engine";
export type { SimulationOptions } from "./lib/simulation-engine";
export { validateSimulationParameters, validateSimulationRequest } from "./lib/request-validation";
export type { ValidatedRequest } from "./lib/request-validation";
export {
  createBackendCapabilities,
  getBackendCapabilities,
  initBackendCapabilities,
} from "./lib/backend-capabilities";
export type { BackendCapabilities, CapabilityOptions } from "./lib/backend-capabilities";
export { InMemoryEvidenceStore } from "./lib/evidence-store";
export { canonicalReceptorName, lookupReceptor, registryReceptorIds } from "./lib/receptor-registry";
export { BackendConfigError, DEFAULT_PARAMETERS, readBackendConfig } from "./lib/sim-config";
export type { ParameterOverrides, SimulationParameters } from "./lib/sim-config";
export {
  BackendUnavailableError,
  NumericalInstabilityError,
  SimulationInternalError,
  SimulationValidationError,
} from "./lib/sim-errors";
