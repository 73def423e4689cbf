/**
 * Cycle reporting through the logger
 */

import { ACTION_ORDER, type ReconciliationAction } from '../reconcilers/members/index.js';
import type { Logger } from '../utils/logger.js';
import type { CycleResult } from './types.js';

const DONE: Record<ReconciliationAction['type'], string> = {
  invite: 'Invited',
  restore: 'Restored',
  revoke: 'Revoked',
};

/**
 * Log line for an applied action
 */
export function describeApplied(action: ReconciliationAction): string {
  const line = `${DONE[action.type]} ${action.email}`;
  return action.type === 'revoke' ? `${line} (${action.reason})` : line;
}

/**
 * One-line cycle summary
 *
 * @example
 * // 'Cycle 2 succeeded in 41ms: invite 1/1, restore 0/0, revoke 2/2'
 */
export function formatCycleSummary(result: CycleResult): string {
  const counts = ACTION_ORDER.map(
    (type) => `${type} ${result.counts[type].succeeded}/${result.counts[type].attempted}`
  ).join(', ');
  const protectedNote = result.protected.length > 0 ? `, ${result.protected.length} protected` : '';
  const status = result.success ? 'succeeded' : 'failed';
  return `Cycle ${result.cycleId} ${status} in ${result.durationMs}ms: ${counts}${protectedNote}`;
}

/**
 * Log every action result, the protected members and the summary
 */
export function reportCycle(result: CycleResult, log: Logger): void {
  for (const entry of result.results) {
    if (entry.success) {
      log.info(describeApplied(entry.action));
    } else {
      log.error(entry.error.message, entry.error);
    }
  }

  for (const member of result.protected) {
    log.warn(`Not revoking ${member.email} (${member.reason}): it is the sync account`, {
      hint: 'set PREVENT_SELF_LOCK=false to allow',
    });
  }

  if (result.failure) {
    log.error(`Cycle ${result.cycleId} failed while ${result.failure.stage}: ${result.failure.message}`, undefined, {
      code: result.failure.code,
    });
  }

  const summary = formatCycleSummary(result);
  if (result.success) {
    log.info(summary);
  } else {
    log.warn(summary);
  }
}
