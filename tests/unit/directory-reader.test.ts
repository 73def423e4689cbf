/**
 * Unit Tests: Directory reader
 *
 * Tests entry shaping (mail, disabled flag, duplicates) and the search
 * round trip against a fake ldapts client, including error mapping.
 *
 * @see src/directory/reader.ts
 */

import { describe, it, expect, vi } from 'vitest';
import type { ClientOptions } from 'ldapts';
import {
  attributeValues,
  fetchDirectoryUsers,
  isEntryDisabled,
  requestedAttributes,
  shapeEntries,
} from '../../src/directory/reader.js';
import type {
  DirectoryEntry,
  DirectoryReadOptions,
  EntryShapeOptions,
  LdapSearchClient,
} from '../../src/directory/types.js';
import { DirectoryUnavailableError } from '../../src/errors.js';
import { createMemoryLogger } from './helpers.js';

// =============================================================================
// Fixtures
// =============================================================================

type SearchResult = Awaited<ReturnType<LdapSearchClient['search']>>;

const SHAPE: EntryShapeOptions = {
  mailAttribute: 'mail',
  groupAttribute: 'memberOf',
  disabledAttribute: 'nsAccountLock',
  disabledValues: ['TRUE', 'true', '1', 'yes', 'YES'],
  missingIsDisabled: false,
};

const READ: DirectoryReadOptions = {
  ...SHAPE,
  url: 'ldap://ldap.test:389',
  bindDn: 'cn=sync,dc=example,dc=org',
  bindPassword: 'test-password',
  baseDn: 'dc=example,dc=org',
  filter: { objectType: 'inetOrgPerson' },
  ignoreCert: false,
  timeoutMs: 5000,
};

function entry(uid: string, attributes: Omit<DirectoryEntry, 'dn'> = {}): DirectoryEntry {
  return { dn: `uid=${uid},ou=people,dc=example,dc=org`, ...attributes };
}

function createFakeLdap(entries: DirectoryEntry[]) {
  const client = {
    bind: vi.fn(async (..._args: unknown[]): Promise<void> => undefined),
    search: vi.fn(
      async (..._args: unknown[]): Promise<SearchResult> => ({ searchEntries: entries, searchReferences: [] })
    ),
    unbind: vi.fn(async (): Promise<void> => undefined),
  };
  const createClient = vi.fn((_options: ClientOptions): LdapSearchClient => client);
  return { client, createClient };
}

// =============================================================================
// Entry shaping
// =============================================================================

describe('attributeValues', () => {
  it('matches attribute names case-insensitively', () => {
    expect(attributeValues(entry('alice', { MAIL: 'alice@example.org' }), 'mail')).toEqual(['alice@example.org']);
  });

  it('decodes buffers and drops empty values', () => {
    const e = entry('alice', { memberOf: [Buffer.from('cn=vault,dc=example,dc=org'), Buffer.from('')] });
    expect(attributeValues(e, 'memberof')).toEqual(['cn=vault,dc=example,dc=org']);
  });

  it('returns nothing for a missing attribute', () => {
    expect(attributeValues(entry('alice'), 'mail')).toEqual([]);
  });
});

describe('isEntryDisabled', () => {
  it('is true for a configured value', () => {
    expect(isEntryDisabled(entry('a', { nsAccountLock: 'TRUE' }), SHAPE)).toBe(true);
    expect(isEntryDisabled(entry('a', { nsaccountlock: 'yes' }), SHAPE)).toBe(true);
  });

  it('compares values case-sensitively', () => {
    expect(isEntryDisabled(entry('a', { nsAccountLock: 'True' }), SHAPE)).toBe(false);
    expect(isEntryDisabled(entry('a', { nsAccountLock: 'false' }), SHAPE)).toBe(false);
  });

  it('falls back to missingIsDisabled when the attribute is absent', () => {
    expect(isEntryDisabled(entry('a'), SHAPE)).toBe(false);
    expect(isEntryDisabled(entry('a'), { ...SHAPE, missingIsDisabled: true })).toBe(true);
  });

  it('falls back to missingIsDisabled when no attribute is configured', () => {
    const noAttribute = { ...SHAPE, disabledAttribute: undefined, missingIsDisabled: true };
    expect(isEntryDisabled(entry('a', { nsAccountLock: 'false' }), noAttribute)).toBe(true);
  });
});

describe('shapeEntries', () => {
  it('normalizes email and collects groups', () => {
    const result = shapeEntries(
      [entry('alice', { mail: ' Alice@Example.ORG ', memberOf: ['cn=vault,dc=example,dc=org'] })],
      SHAPE
    );
    expect(result.users).toEqual([
      {
        dn: 'uid=alice,ou=people,dc=example,dc=org',
        email: 'alice@example.org',
        disabled: false,
        groups: ['cn=vault,dc=example,dc=org'],
      },
    ]);
  });

  it('skips entries without mail', () => {
    const result = shapeEntries([entry('svc'), entry('bob', { mail: 'bob@example.org' })], SHAPE);
    expect(result.users.map((u) => u.email)).toEqual(['bob@example.org']);
    expect(result.skipped).toEqual([
      { dn: 'uid=svc,ou=people,dc=example,dc=org', reason: 'missing mail attribute' },
    ]);
  });

  it('keeps the last entry for a duplicate email', () => {
    const result = shapeEntries(
      [
        entry('alice', { mail: 'alice@example.org' }),
        entry('bob', { mail: 'bob@example.org' }),
        entry('alice2', { mail: 'ALICE@example.org', nsAccountLock: 'TRUE' }),
      ],
      SHAPE
    );
    expect(result.users.map((u) => [u.email, u.dn, u.disabled])).toEqual([
      ['bob@example.org', 'uid=bob,ou=people,dc=example,dc=org', false],
      ['alice@example.org', 'uid=alice2,ou=people,dc=example,dc=org', true],
    ]);
    expect(result.duplicates).toEqual(['alice@example.org']);
  });
});

describe('requestedAttributes', () => {
  it('asks for mail, group and disabled attributes', () => {
    expect(requestedAttributes(SHAPE)).toEqual(['mail', 'memberOf', 'nsAccountLock']);
    expect(requestedAttributes({ ...SHAPE, disabledAttribute: undefined })).toEqual(['mail', 'memberOf']);
  });
});

// =============================================================================
// Search
// =============================================================================

describe('fetchDirectoryUsers', () => {
  it('binds, searches the subtree and unbinds', async () => {
    const { client, createClient } = createFakeLdap([
      entry('alice', { mail: 'alice@example.org' }),
      entry('bob', { mail: 'bob@example.org', nsAccountLock: 'true' }),
    ]);
    const { logger } = createMemoryLogger();

    const users = await fetchDirectoryUsers(READ, { createClient, logger });

    expect(users.map((u) => [u.email, u.disabled])).toEqual([
      ['alice@example.org', false],
      ['bob@example.org', true],
    ]);
    expect(createClient).toHaveBeenCalledWith({
      url: 'ldap://ldap.test:389',
      timeout: 5000,
      connectTimeout: 5000,
    });
    expect(client.bind).toHaveBeenCalledWith('cn=sync,dc=example,dc=org', 'test-password');
    expect(client.search).toHaveBeenCalledWith('dc=example,dc=org', {
      scope: 'sub',
      filter: '(objectClass=inetOrgPerson)',
      attributes: ['mail', 'memberOf', 'nsAccountLock'],
    });
    expect(client.unbind).toHaveBeenCalledTimes(1);
  });

  it('searches anonymously without a bind DN', async () => {
    const { client, createClient } = createFakeLdap([]);
    const { logger } = createMemoryLogger();

    await fetchDirectoryUsers({ ...READ, bindDn: '', bindPassword: '' }, { createClient, logger });

    expect(client.bind).not.toHaveBeenCalled();
    expect(client.search).toHaveBeenCalledTimes(1);
  });

  it('warns about skipped and duplicate entries', async () => {
    const { createClient } = createFakeLdap([
      entry('svc'),
      entry('alice', { mail: 'alice@example.org' }),
      entry('alice2', { mail: 'alice@example.org' }),
    ]);
    const { logger, lines } = createMemoryLogger('warn');

    await fetchDirectoryUsers(READ, { createClient, logger });

    expect(lines).toEqual([
      '[WARN] Skipping LDAP entry uid=svc,ou=people,dc=example,dc=org: missing mail attribute',
      '[WARN] Duplicate LDAP entries for alice@example.org; using the last one returned',
    ]);
  });

  it('maps a bind failure to DirectoryUnavailableError and still unbinds', async () => {
    const { client, createClient } = createFakeLdap([]);
    client.bind.mockRejectedValueOnce(new Error('Invalid credentials'));
    const { logger } = createMemoryLogger();

    const promise = fetchDirectoryUsers(READ, { createClient, logger });

    await expect(promise).rejects.toBeInstanceOf(DirectoryUnavailableError);
    await expect(promise).rejects.toThrow('LDAP search against ldap://ldap.test:389 failed: Invalid credentials');
    expect(client.search).not.toHaveBeenCalled();
    expect(client.unbind).toHaveBeenCalledTimes(1);
  });

  it('maps a search failure to DirectoryUnavailableError', async () => {
    const { client, createClient } = createFakeLdap([]);
    client.search.mockRejectedValueOnce(new Error('Timeout'));
    const { logger } = createMemoryLogger();

    await expect(fetchDirectoryUsers(READ, { createClient, logger })).rejects.toMatchObject({
      code: 'DIRECTORY_UNAVAILABLE',
      message: 'LDAP search against ldap://ldap.test:389 failed: Timeout',
    });
  });

  it('ignores an unbind failure', async () => {
    const { client, createClient } = createFakeLdap([entry('alice', { mail: 'alice@example.org' })]);
    client.unbind.mockRejectedValueOnce(new Error('socket closed'));
    const { logger } = createMemoryLogger();

    const users = await fetchDirectoryUsers(READ, { createClient, logger });
    expect(users).toHaveLength(1);
  });

  it('passes TLS options for ldaps://', async () => {
    const { createClient } = createFakeLdap([]);
    const readFile = vi.fn((_path: string) => Buffer.from('test-ca'));
    const { logger } = createMemoryLogger();

    await fetchDirectoryUsers(
      { ...READ, url: 'ldaps://ldap.test:636', caFile: '/etc/ssl/ca.pem' },
      { createClient, readFile, logger }
    );

    expect(readFile).toHaveBeenCalledWith('/etc/ssl/ca.pem');
    expect(createClient).toHaveBeenCalledWith({
      url: 'ldaps://ldap.test:636',
      timeout: 5000,
      connectTimeout: 5000,
      tlsOptions: { rejectUnauthorized: true, ca: [Buffer.from('test-ca')] },
    });
  });

  it('skips certificate checks when asked', async () => {
    const { createClient } = createFakeLdap([]);
    const readFile = vi.fn((_path: string) => Buffer.from('test-ca'));
    const { logger } = createMemoryLogger();

    await fetchDirectoryUsers(
      { ...READ, url: 'ldaps://ldap.test:636', caFile: '/etc/ssl/ca.pem', ignoreCert: true },
      { createClient, readFile, logger }
    );

    expect(readFile).not.toHaveBeenCalled();
    expect(createClient.mock.calls[0][0].tlsOptions).toEqual({ rejectUnauthorized: false, ca: undefined });
  });
});
