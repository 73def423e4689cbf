/**
 * Membership diff algorithm
 *
 * Compares the eligible directory users (desired state) with the
 * organisation members (actual state) and produces the actions that bring
 * the organisation in line. Pure: same inputs, same actions, same order.
 *
 * Rules:
 * 1. Eligible user with no member: invite
 * 2. Eligible user whose member is revoked: restore
 * 3. Disabled user whose member is not revoked: revoke (disabled)
 * 4. With usersOnly, a non-revoked member missing from the directory:
 *    revoke (not-in-directory)
 * 5. While preventSelfLock is on, rules 3 and 4 never target the member
 *    the sync credential belongs to
 */

import type { DirectoryUser } from '../../directory/types.js';
import { normalizeEmail } from '../../utils/email.js';
import type {
  ActionCounts,
  OrgMember,
  ProtectedMember,
  ReconcileOptions,
  ReconcilePlan,
  ReconciliationAction,
  RevokeReason,
} from './types.js';

// =============================================================================
// Indexing
// =============================================================================

/**
 * Index directory users by normalized email; a later entry replaces an earlier one
 */
export function indexDirectoryUsers(users: readonly DirectoryUser[]): Map<string, DirectoryUser> {
  const byEmail = new Map<string, DirectoryUser>();
  for (const user of users) {
    byEmail.set(normalizeEmail(user.email), user);
  }
  return byEmail;
}

/**
 * Index members by normalized email; a later entry replaces an earlier one
 */
export function indexMembers(members: readonly OrgMember[]): Map<string, OrgMember> {
  const byEmail = new Map<string, OrgMember>();
  for (const member of members) {
    byEmail.set(normalizeEmail(member.email), member);
  }
  return byEmail;
}

function byEmail<T extends { email: string }>(a: T, b: T): number {
  if (a.email < b.email) return -1;
  if (a.email > b.email) return 1;
  return 0;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Compute the reconciliation plan
 */
export function planMembership(
  directoryUsers: readonly DirectoryUser[],
  members: readonly OrgMember[],
  options: ReconcileOptions
): ReconcilePlan {
  const directoryByEmail = indexDirectoryUsers(directoryUsers);
  const memberByEmail = indexMembers(members);

  const invites: ReconciliationAction[] = [];
  const restores: ReconciliationAction[] = [];
  const revokes: ReconciliationAction[] = [];
  const protectedMembers: ProtectedMember[] = [];
  const touched = new Set<string>();

  const revokeUnlessSelf = (email: string, member: OrgMember, reason: RevokeReason): void => {
    touched.add(email);
    if (member.isSelf && options.preventSelfLock) {
      protectedMembers.push({ email, reason });
      return;
    }
    revokes.push({ type: 'revoke', email, reason });
  };

  for (const [email, user] of directoryByEmail) {
    const member = memberByEmail.get(email);

    if (!user.disabled) {
      if (!member) {
        invites.push({ type: 'invite', email });
        touched.add(email);
      } else if (member.status === 'Revoked') {
        restores.push({ type: 'restore', email });
        touched.add(email);
      }
    } else if (member && member.status !== 'Revoked') {
      revokeUnlessSelf(email, member, 'disabled');
    }
  }

  if (options.usersOnly) {
    for (const [email, member] of memberByEmail) {
      if (!directoryByEmail.has(email) && member.status !== 'Revoked') {
        revokeUnlessSelf(email, member, 'not-in-directory');
      }
    }
  }

  invites.sort(byEmail);
  restores.sort(byEmail);
  revokes.sort(byEmail);
  protectedMembers.sort(byEmail);

  const actions = [...invites, ...restores, ...revokes];
  const unchanged = [...directoryByEmail.keys()].filter((email) => !touched.has(email)).length;

  return {
    actions,
    protected: protectedMembers,
    summary: {
      toInvite: invites.length,
      toRestore: restores.length,
      toRevoke: revokes.length,
      protected: protectedMembers.length,
      unchanged,
      total: actions.length,
    },
  };
}

/**
 * Compute the actions only
 */
export function reconcile(
  directoryUsers: readonly DirectoryUser[],
  members: readonly OrgMember[],
  options: ReconcileOptions
): ReconciliationAction[] {
  return planMembership(directoryUsers, members, options).actions;
}

/**
 * Zeroed per-type counters
 */
export function emptyCounts(): ActionCounts {
  return {
    invite: { attempted: 0, succeeded: 0, failed: 0 },
    restore: { attempted: 0, succeeded: 0, failed: 0 },
    revoke: { attempted: 0, succeeded: 0, failed: 0 },
  };
}

// =============================================================================
// Formatting
// =============================================================================

const ACTION_SYMBOLS: Record<ReconciliationAction['type'], string> = {
  invite: '+',
  restore: '~',
  revoke: '-',
};

/**
 * One-line description of an action
 *
 * @example
 * formatAction({ type: 'revoke', email: 'a@x.test', reason: 'disabled' })
 * // '- revoke a@x.test (disabled)'
 */
export function formatAction(action: ReconciliationAction): string {
  const line = `${ACTION_SYMBOLS[action.type]} ${action.type} ${action.email}`;
  return action.type === 'revoke' ? `${line} (${action.reason})` : line;
}

/**
 * Human-readable plan summary
 */
export function formatPlanSummary(plan: ReconcilePlan): string {
  const lines: string[] = [];
  const { summary } = plan;

  lines.push('Membership Plan');
  lines.push('===============');
  lines.push('');

  lines.push('Actions:');
  if (summary.toInvite > 0) lines.push(`  + Invite: ${summary.toInvite}`);
  if (summary.toRestore > 0) lines.push(`  ~ Restore: ${summary.toRestore}`);
  if (summary.toRevoke > 0) lines.push(`  - Revoke: ${summary.toRevoke}`);
  if (summary.unchanged > 0) lines.push(`  = Unchanged: ${summary.unchanged}`);
  lines.push(`  Total: ${summary.total}`);
  lines.push('');

  if (plan.actions.length > 0) {
    lines.push('Details:');
    for (const action of plan.actions) {
      lines.push(`  ${formatAction(action)}`);
    }
    lines.push('');
  }

  if (plan.protected.length > 0) {
    lines.push('Protected (self-lock prevention):');
    for (const member of plan.protected) {
      lines.push(`  ! ${member.email} (${member.reason})`);
    }
    lines.push('');
  }

  lines.push(summary.total > 0 ? 'Status: CHANGES NEEDED' : 'Status: IN SYNC');

  return lines.join('\n');
}
