/**
 * Shared fixtures for unit tests
 */

import { vi } from 'vitest';
import { Logger, type LogLevel, type LogSink } from '../../src/utils/logger.js';
import type { DirectoryUser } from '../../src/directory/types.js';
import type { OrganizationUser, Profile } from '../../src/api/types.js';
import { applyMemberActions } from '../../src/reconcilers/members/apply.js';
import type { MembershipSnapshot } from '../../src/reconcilers/members/lookup.js';
import type {
  ApplyResult,
  OrgMember,
  ReconciliationAction,
} from '../../src/reconcilers/members/types.js';

/**
 * Logger that keeps formatted lines in memory (no timestamps)
 */
export function createMemoryLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const sink: LogSink = {
    log: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
  return { logger: new Logger({ level, timestamps: false }, sink), lines };
}

export function createDirectoryUser(email: string, overrides: Partial<DirectoryUser> = {}): DirectoryUser {
  return {
    dn: `uid=${email.split('@')[0]},ou=people,dc=example,dc=org`,
    email,
    disabled: false,
    groups: [],
    ...overrides,
  };
}

export function createMember(email: string, overrides: Partial<OrgMember> = {}): OrgMember {
  return {
    id: `ou-${email.split('@')[0]}`,
    userId: `u-${email.split('@')[0]}`,
    email,
    status: 'Confirmed',
    isSelf: false,
    ...overrides,
  };
}

// =============================================================================
// Fake gateway
// =============================================================================

export interface FakeGatewayState {
  directory: DirectoryUser[];
  members: OrgMember[];
}

/**
 * In-memory gateway: applying actions updates the member list, so a second
 * cycle sees the result of the first
 */
export function createFakeGateway(initial: FakeGatewayState) {
  const state: FakeGatewayState = {
    directory: [...initial.directory],
    members: initial.members.map((m) => ({ ...m })),
  };
  const profile: Profile = { id: 'u-sync', email: 'sync@example.org' };

  const client = {
    list: vi.fn(async (): Promise<OrganizationUser[]> => []),
    invite: vi.fn(async (email: string): Promise<void> => {
      state.members.push(createMember(email, { status: 'Invited', userId: undefined }));
    }),
    revoke: vi.fn(async (memberId: string): Promise<void> => {
      setStatus(memberId, 'Revoked');
    }),
    restore: vi.fn(async (memberId: string): Promise<void> => {
      setStatus(memberId, 'Accepted');
    }),
  };

  function setStatus(memberId: string, status: OrgMember['status']): void {
    const member = state.members.find((m) => m.id === memberId);
    if (member) {
      member.status = status;
    }
  }

  const gateway = {
    fetchDirectoryUsers: vi.fn(async (): Promise<DirectoryUser[]> => state.directory),
    readMembership: vi.fn(
      async (): Promise<MembershipSnapshot> => ({
        members: state.members.map((m) => ({ ...m })),
        profile,
        self: state.members.find((m) => m.isSelf),
      })
    ),
    applyActions: vi.fn(
      async (actions: readonly ReconciliationAction[], members: readonly OrgMember[]): Promise<ApplyResult> =>
        applyMemberActions(client, actions, members, { logger: createMemoryLogger().logger })
    ),
  };

  return { gateway, client, state };
}
