/**
 * Command exports
 */

export { runCommand, type RunOptions, type RunDeps, type RunSummary } from './run.js';
export { planCommand, type PlanDeps } from './plan.js';
export { checkCommand, type CheckDeps } from './check.js';
