/**
 * Membership action executor
 *
 * Applies a plan's actions one at a time, in plan order. A failed action is
 * recorded in its own result slot and the remaining actions still run.
 */

import type { MembersClient } from '../../api/client.js';
import { ActionFailedError } from '../../errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { emptyCounts, formatAction, indexMembers } from './diff.js';
import type { ActionResult, ApplyResult, OrgMember, ReconciliationAction } from './types.js';

export interface ApplyOptions {
  logger?: Logger;
}

/**
 * Member id an action operates on
 */
function memberIdFor(action: ReconciliationAction, memberByEmail: Map<string, OrgMember>): string {
  const member = memberByEmail.get(action.email);
  if (!member) {
    throw new Error(`no organisation member with email ${action.email}`);
  }
  return member.id;
}

async function applyOne(
  client: MembersClient,
  action: ReconciliationAction,
  memberByEmail: Map<string, OrgMember>
): Promise<void> {
  switch (action.type) {
    case 'invite':
      await client.invite(action.email);
      return;
    case 'restore':
      await client.restore(memberIdFor(action, memberByEmail));
      return;
    case 'revoke':
      await client.revoke(memberIdFor(action, memberByEmail));
      return;
  }
}

/**
 * Apply actions against the organisation
 *
 * @param members - Members the plan was computed from; revoke and restore look up ids here
 */
export async function applyMemberActions(
  client: MembersClient,
  actions: readonly ReconciliationAction[],
  members: readonly OrgMember[],
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const log = options.logger ?? defaultLogger;
  const memberByEmail = indexMembers(members);
  const results: ActionResult[] = [];
  const counts = emptyCounts();

  for (const action of actions) {
    const count = counts[action.type];
    count.attempted++;

    try {
      await applyOne(client, action, memberByEmail);
      count.succeeded++;
      results.push({ action, success: true });
      log.debug(`Applied: ${formatAction(action)}`);
    } catch (err) {
      count.failed++;
      results.push({ action, success: false, error: new ActionFailedError(action, err) });
    }
  }

  return {
    results,
    counts,
    success: results.every((result) => result.success),
  };
}
