/**
 * Membership reconciler exports
 *
 * Reads the organisation, decides invites/restores/revokes against the
 * directory and applies them.
 */

// Types from types.ts
export type {
  MemberStatus,
  OrgMember,
  RevokeReason,
  ReconciliationAction,
  ActionType,
  ReconcileOptions,
  ProtectedMember,
  ReconcilePlan,
  ActionResult,
  ActionCount,
  ActionCounts,
  ApplyResult,
} from './types.js';

export { ACTION_ORDER } from './types.js';

// Diff functions
export {
  planMembership,
  reconcile,
  indexDirectoryUsers,
  indexMembers,
  emptyCounts,
  formatAction,
  formatPlanSummary,
} from './diff.js';

// Lookup functions
export {
  readMembership,
  toOrgMembers,
  memberStatus,
  accountIdFromClientId,
  type MembershipSnapshot,
  type ReadMembershipOptions,
} from './lookup.js';

// Apply functions
export { applyMemberActions, type ApplyOptions } from './apply.js';
