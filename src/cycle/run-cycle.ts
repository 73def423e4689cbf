/**
 * One reconciliation cycle: read both sides, plan, execute.
 *
 * runCycle never throws. Every failure ends up in CycleResult.failure with
 * the stage it happened in; a read failure means no action is attempted.
 */

import { toSyncError } from '../errors.js';
import {
  emptyCounts,
  planMembership,
  type ApplyResult,
  type MembershipSnapshot,
  type ReconcileOptions,
  type ReconcilePlan,
} from '../reconcilers/members/index.js';
import type { DirectoryUser } from '../directory/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { CycleFailure, CycleResult, CycleState, FailureStage, SyncGateway } from './types.js';

export interface RunCycleOptions {
  cycleId: number;
  reconcile: ReconcileOptions;
  logger?: Logger;
  /** Called on every state transition */
  onState?: (state: CycleState) => void;
  now?: () => number;
}

function failureFrom(stage: FailureStage, err: unknown): CycleFailure {
  const error = toSyncError(err);
  return { stage, code: error.code, message: error.message };
}

/**
 * Run one cycle against the gateway
 */
export async function runCycle(gateway: SyncGateway, options: RunCycleOptions): Promise<CycleResult> {
  const log = options.logger ?? defaultLogger;
  const now = options.now ?? Date.now;
  const setState = options.onState ?? (() => undefined);
  const startedAt = new Date(now());

  const finish = (partial: Pick<CycleResult, 'counts' | 'results' | 'protected'>, failure?: CycleFailure): CycleResult => ({
    cycleId: options.cycleId,
    startedAt,
    durationMs: now() - startedAt.getTime(),
    ...partial,
    failure,
    success: failure === undefined,
  });
  const nothingDone = { counts: emptyCounts(), results: [], protected: [] };

  log.debug(`Cycle ${options.cycleId} started`);

  // Reading
  setState('reading');
  let users: DirectoryUser[];
  let snapshot: MembershipSnapshot;
  try {
    users = await gateway.fetchDirectoryUsers();
    snapshot = await gateway.readMembership();
  } catch (err) {
    return finish(nothingDone, failureFrom('reading', err));
  }

  // Reconciling
  setState('reconciling');
  let plan: ReconcilePlan;
  try {
    plan = planMembership(users, snapshot.members, options.reconcile);
  } catch (err) {
    return finish(nothingDone, failureFrom('reconciling', err));
  }
  log.debug(`Planned ${plan.summary.total} actions`, { ...plan.summary });

  // Executing
  setState('executing');
  let applied: ApplyResult;
  try {
    applied = await gateway.applyActions(plan.actions, snapshot.members);
  } catch (err) {
    return finish({ ...nothingDone, protected: plan.protected }, failureFrom('executing', err));
  }

  const outcome = { counts: applied.counts, results: applied.results, protected: plan.protected };
  if (applied.success) {
    return finish(outcome);
  }

  const failed = applied.results.filter((result) => !result.success).length;
  return finish(outcome, {
    stage: 'executing',
    code: 'ACTION_FAILED',
    message: `${failed} of ${applied.results.length} actions failed`,
  });
}
