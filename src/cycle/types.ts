/**
 * Types for the reconciliation cycle
 */

import type { DirectoryUser } from '../directory/types.js';
import type { SyncErrorCode } from '../errors.js';
import type {
  ActionCounts,
  ActionResult,
  ApplyResult,
  MembershipSnapshot,
  OrgMember,
  ProtectedMember,
  ReconciliationAction,
} from '../reconcilers/members/index.js';

/**
 * Controller lifecycle states
 */
export type CycleState =
  | 'idle'
  | 'reading'
  | 'reconciling'
  | 'executing'
  | 'reporting'
  | 'sleeping'
  | 'terminated';

/**
 * Stage a cycle failed in
 */
export type FailureStage = 'reading' | 'reconciling' | 'executing';

export interface CycleFailure {
  stage: FailureStage;
  code: SyncErrorCode;
  message: string;
}

/**
 * Outcome of one reconciliation cycle
 */
export interface CycleResult {
  /** 1-based sequence number within this process */
  cycleId: number;
  startedAt: Date;
  durationMs: number;
  counts: ActionCounts;
  /** One entry per attempted action, in execution order */
  results: ActionResult[];
  /** Revokes suppressed by self-lock prevention */
  protected: ProtectedMember[];
  failure?: CycleFailure;
  /** Both reads succeeded and every action succeeded */
  success: boolean;
}

/**
 * The outside world as seen by one cycle
 */
export interface SyncGateway {
  fetchDirectoryUsers(): Promise<DirectoryUser[]>;
  readMembership(): Promise<MembershipSnapshot>;
  applyActions(actions: readonly ReconciliationAction[], members: readonly OrgMember[]): Promise<ApplyResult>;
}
