export { Registry, type RegistryEntry } from './registry/index.js';
export {
  TypeKey, Seed, typeKey, classKey, keyOfValue, isTypeKey,
  isNumber, isString, isBoolean, instanceOf, isArrayOf, isRecordOf,
  type Guard, type Constructor, type SeedValue
} from './registry/typeKey.js';
export { defineTask, describeTask } from './engine/task.js';
export { Step } from './engine/step.js';
export { Workflow, InitializedWorkflow } from './engine/workflow.js';
export { loadConfig, type EngineConfig } from './config.js';
export {
  EngineError, ConfigurationError, DuplicateOutputError, ScheduleError, MissingDataError,
  type StalledTask, type MissingDependency
} from './errors.js';
export type * from './types/contracts.js';

export { Optimizer, OptimizerRun } from './framework/optimizer.js';
export { ProblemSettings, SolveSettings, SolutionObjValue } from './framework/defaultTasks.js';
export { ValidationError, InfeasibleError, PhaseFailedError, PhaseOrderError, ensure } from './framework/errors.js';
export { PHASES, type Phase, type Sense, type SolveStatus, type Solver, type MipBackend, type OptimizationModule, type ProblemSpec } from './types/framework.js';
