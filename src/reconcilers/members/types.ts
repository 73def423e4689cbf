/**
 * Types for organisation membership reconciliation
 *
 * Desired state comes from the LDAP directory (DirectoryUser), actual state
 * from the VaultWarden organisation (OrgMember). Both sides are keyed by the
 * lower-cased email address.
 */

import type { ActionFailedError } from '../../errors.js';

/**
 * Membership status of an organisation member
 */
export type MemberStatus = 'Invited' | 'Accepted' | 'Confirmed' | 'Revoked';

/**
 * A VaultWarden organisation member
 */
export interface OrgMember {
  /** Organisation-user id, the target of revoke/restore */
  id: string;
  /** Account id; missing while an invite is pending */
  userId?: string;
  /** Lower-cased email */
  email: string;
  status: MemberStatus;
  /** The member the sync credential belongs to */
  isSelf: boolean;
}

/**
 * Why a member is revoked
 */
export type RevokeReason = 'disabled' | 'not-in-directory';

/**
 * A single change to the organisation
 */
export type ReconciliationAction =
  | { type: 'invite'; email: string }
  | { type: 'restore'; email: string }
  | { type: 'revoke'; email: string; reason: RevokeReason };

export type ActionType = ReconciliationAction['type'];

/**
 * Order actions are executed in
 */
export const ACTION_ORDER: readonly ActionType[] = ['invite', 'restore', 'revoke'];

/**
 * Reconciler switches
 */
export interface ReconcileOptions {
  /** Revoke members that are absent from the directory result */
  usersOnly: boolean;
  /** Never revoke the member the sync credential belongs to */
  preventSelfLock: boolean;
}

/**
 * A revoke that self-lock prevention suppressed
 */
export interface ProtectedMember {
  email: string;
  reason: RevokeReason;
}

/**
 * Reconciliation plan
 */
export interface ReconcilePlan {
  /** Actions in execution order */
  actions: ReconciliationAction[];
  /** Revokes suppressed because they would target the sync credential */
  protected: ProtectedMember[];
  /** Summary statistics */
  summary: {
    toInvite: number;
    toRestore: number;
    toRevoke: number;
    protected: number;
    /** Directory users that need no change */
    unchanged: number;
    total: number;
  };
}

/**
 * Result of applying a single action
 */
export type ActionResult =
  | { action: ReconciliationAction; success: true }
  | { action: ReconciliationAction; success: false; error: ActionFailedError };

/**
 * Attempted/succeeded/failed counts for one action type
 */
export interface ActionCount {
  attempted: number;
  succeeded: number;
  failed: number;
}

export type ActionCounts = Record<ActionType, ActionCount>;

/**
 * Result of applying a plan
 */
export interface ApplyResult {
  /** One entry per action, in execution order */
  results: ActionResult[];
  counts: ActionCounts;
  /** True when every action succeeded */
  success: boolean;
}
