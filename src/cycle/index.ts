/**
 * Reconciliation cycle exports
 */

export type {
  CycleState,
  CycleFailure,
  CycleResult,
  FailureStage,
  SyncGateway,
} from './types.js';

export { runCycle, type RunCycleOptions } from './run-cycle.js';
export { reportCycle, formatCycleSummary, describeApplied } from './report.js';
export {
  SyncController,
  nextFailureCount,
  nextStep,
  controllerOptionsFromConfig,
  type ControllerOptions,
  type ExitCode,
  type NextStep,
  type SleepFn,
} from './controller.js';
export {
  createGateway,
  createVaultWardenClient,
  directoryReadOptions,
  type GatewayDeps,
} from './gateway.js';
