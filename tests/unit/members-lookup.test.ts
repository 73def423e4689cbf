/**
 * Unit Tests: Membership lookup
 *
 * Tests conversion of organisation users, identification of the sync
 * account and the mapping of API failures to sync errors.
 *
 * @see src/reconcilers/members/lookup.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  accountIdFromClientId,
  readMembership,
  toOrgMembers,
} from '../../src/reconcilers/members/lookup.js';
import { ApiRequestError } from '../../src/api/retry.js';
import { OrganizationUserStatusCode, type OrganizationUser, type Profile } from '../../src/api/types.js';
import { VaultWardenAuthError, VaultWardenUnavailableError } from '../../src/errors.js';
import { createMemoryLogger } from './helpers.js';

// =============================================================================
// Mock Client Factory
// =============================================================================

function createMockClient(users: OrganizationUser[], profile: Profile) {
  return {
    members: {
      list: vi.fn(async (): Promise<OrganizationUser[]> => users),
      invite: vi.fn(async (_email: string): Promise<void> => undefined),
      revoke: vi.fn(async (_memberId: string): Promise<void> => undefined),
      restore: vi.fn(async (_memberId: string): Promise<void> => undefined),
    },
    accounts: {
      profile: vi.fn(async (): Promise<Profile> => profile),
    },
  };
}

function createOrgUser(email: string, overrides: Partial<OrganizationUser> = {}): OrganizationUser {
  const name = email.split('@')[0];
  return {
    id: `ou-${name}`,
    userId: `u-${name}`,
    email,
    status: OrganizationUserStatusCode.Confirmed,
    ...overrides,
  };
}

const SYNC_PROFILE: Profile = { id: 'u-sync', email: 'sync@example.org' };

// =============================================================================
// Conversion
// =============================================================================

describe('accountIdFromClientId', () => {
  it('reads the uuid of a personal API key', () => {
    expect(accountIdFromClientId('user.0000-AAAA')).toBe('0000-aaaa');
    expect(accountIdFromClientId('organization.0000')).toBeUndefined();
    expect(accountIdFromClientId(undefined)).toBeUndefined();
  });
});

describe('toOrgMembers', () => {
  it('maps status codes and lower-cases emails', () => {
    const members = toOrgMembers(
      [
        createOrgUser('Alice@Example.org', { status: OrganizationUserStatusCode.Revoked }),
        createOrgUser('bob@example.org', { status: OrganizationUserStatusCode.Invited, userId: undefined }),
        createOrgUser('carol@example.org', { status: OrganizationUserStatusCode.Accepted }),
      ],
      SYNC_PROFILE
    );

    expect(members).toEqual([
      { id: 'ou-Alice', userId: 'u-Alice', email: 'alice@example.org', status: 'Revoked', isSelf: false },
      { id: 'ou-bob', userId: undefined, email: 'bob@example.org', status: 'Invited', isSelf: false },
      { id: 'ou-carol', userId: 'u-carol', email: 'carol@example.org', status: 'Accepted', isSelf: false },
    ]);
  });

  it('marks the member whose account id matches the profile', () => {
    const members = toOrgMembers([createOrgUser('alice@example.org'), createOrgUser('sync@example.org')], SYNC_PROFILE);
    expect(members.filter((m) => m.isSelf).map((m) => m.email)).toEqual(['sync@example.org']);
  });

  it('matches the account id of the client id', () => {
    const members = toOrgMembers(
      [createOrgUser('svc@example.org', { userId: 'U-SVC' })],
      { id: 'u-other', email: 'other@example.org' },
      'user.u-svc'
    );
    expect(members[0].isSelf).toBe(true);
  });

  it('prefers an account id match over an email match', () => {
    const members = toOrgMembers(
      [
        createOrgUser('sync@example.org', { userId: 'u-old' }),
        createOrgUser('renamed@example.org', { userId: 'u-sync' }),
      ],
      SYNC_PROFILE
    );
    expect(members.map((m) => m.isSelf)).toEqual([false, true]);
  });

  it('falls back to the profile email', () => {
    const members = toOrgMembers(
      [createOrgUser('SYNC@example.org', { userId: undefined, status: OrganizationUserStatusCode.Invited })],
      SYNC_PROFILE
    );
    expect(members[0].isSelf).toBe(true);
  });
});

// =============================================================================
// Reading
// =============================================================================

describe('readMembership', () => {
  it('returns members, profile and the sync member', async () => {
    const client = createMockClient([createOrgUser('alice@example.org'), createOrgUser('sync@example.org')], SYNC_PROFILE);
    const { logger } = createMemoryLogger();

    const snapshot = await readMembership(client, { logger });

    expect(snapshot.members).toHaveLength(2);
    expect(snapshot.profile).toEqual(SYNC_PROFILE);
    expect(snapshot.self?.email).toBe('sync@example.org');
  });

  it('does not fail when the sync account is not a member', async () => {
    const client = createMockClient([createOrgUser('alice@example.org')], SYNC_PROFILE);
    const { logger } = createMemoryLogger();

    const snapshot = await readMembership(client, { logger });

    expect(snapshot.self).toBeUndefined();
    expect(snapshot.members.every((m) => !m.isSelf)).toBe(true);
  });

  it('maps 401 and 403 to VaultWardenAuthError', async () => {
    for (const status of [401, 403]) {
      const client = createMockClient([], SYNC_PROFILE);
      client.members.list.mockRejectedValueOnce(new ApiRequestError('denied', status));
      const { logger } = createMemoryLogger();

      await expect(readMembership(client, { logger })).rejects.toBeInstanceOf(VaultWardenAuthError);
    }
  });

  it('maps other failures to VaultWardenUnavailableError', async () => {
    const client = createMockClient([], SYNC_PROFILE);
    client.accounts.profile.mockRejectedValueOnce(new ApiRequestError('VaultWarden API error (502)', 502));
    const { logger } = createMemoryLogger();

    await expect(readMembership(client, { logger })).rejects.toMatchObject({
      name: 'VaultWardenUnavailableError',
      code: 'VAULTWARDEN_UNAVAILABLE',
      message: 'Cannot read organisation members: VaultWarden API error (502)',
    });
  });

  it('maps network errors to VaultWardenUnavailableError', async () => {
    const client = createMockClient([], SYNC_PROFILE);
    client.members.list.mockRejectedValueOnce(new TypeError('fetch failed'));
    const { logger } = createMemoryLogger();

    await expect(readMembership(client, { logger })).rejects.toBeInstanceOf(VaultWardenUnavailableError);
  });

  it('passes sync errors through unchanged', async () => {
    const rejected = new VaultWardenAuthError('VaultWarden rejected the API key: invalid_client');
    const client = createMockClient([], SYNC_PROFILE);
    client.accounts.profile.mockRejectedValueOnce(rejected);
    const { logger } = createMemoryLogger();

    await expect(readMembership(client, { logger })).rejects.toBe(rejected);
  });
});
