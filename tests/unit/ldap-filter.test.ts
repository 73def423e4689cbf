/**
 * Unit Tests: LDAP filter construction
 *
 * @see src/directory/filter.ts
 */

import { describe, it, expect } from 'vitest';
import { buildLdapFilter, escapeFilterValue, splitGroupDns } from '../../src/directory/filter.js';

const VAULT = 'cn=vault,ou=groups,dc=example,dc=org';
const OPS = 'cn=ops,ou=groups,dc=example,dc=org';

describe('splitGroupDns', () => {
  it('keeps commas inside a DN', () => {
    expect(splitGroupDns(VAULT)).toEqual([VAULT]);
  });

  it('splits on semicolons, pipes and comma-space', () => {
    expect(splitGroupDns(`${VAULT};${OPS}`)).toEqual([VAULT, OPS]);
    expect(splitGroupDns(`${VAULT} | ${OPS}`)).toEqual([VAULT, OPS]);
    expect(splitGroupDns(`${VAULT}, ${OPS}`)).toEqual([VAULT, OPS]);
  });

  it('returns nothing for an empty value', () => {
    expect(splitGroupDns(undefined)).toEqual([]);
    expect(splitGroupDns(' ; ')).toEqual([]);
  });
});

describe('escapeFilterValue', () => {
  it('escapes the RFC 4515 special characters', () => {
    expect(escapeFilterValue('cn=R&D (east)*,dc=x')).toBe('cn=R&D \\28east\\29\\2a,dc=x');
    expect(escapeFilterValue('a\\b')).toBe('a\\5cb');
    expect(escapeFilterValue('a\0b')).toBe('a\\00b');
  });
});

describe('buildLdapFilter', () => {
  it('matches everything without criteria', () => {
    expect(buildLdapFilter()).toBe('(objectClass=*)');
    expect(buildLdapFilter({ objectType: '*' })).toBe('(objectClass=*)');
  });

  it('returns a single part as is', () => {
    expect(buildLdapFilter({ objectType: 'inetOrgPerson' })).toBe('(objectClass=inetOrgPerson)');
    expect(buildLdapFilter({ groups: [VAULT] })).toBe(`(memberOf=${VAULT})`);
  });

  it('ORs several groups', () => {
    expect(buildLdapFilter({ groups: [VAULT, OPS] })).toBe(`(|(memberOf=${VAULT})(memberOf=${OPS}))`);
  });

  it('uses the configured group attribute', () => {
    expect(buildLdapFilter({ groups: [VAULT], groupAttribute: 'isMemberOf' })).toBe(`(isMemberOf=${VAULT})`);
  });

  it('wraps a bare additional filter in parentheses', () => {
    expect(buildLdapFilter({ additionalFilter: 'employeeType=staff' })).toBe('(employeeType=staff)');
    expect(buildLdapFilter({ additionalFilter: '(!(uid=svc-*))' })).toBe('(!(uid=svc-*))');
  });

  it('ANDs all parts', () => {
    expect(
      buildLdapFilter({
        objectType: 'person',
        groups: [VAULT, OPS],
        additionalFilter: '(employeeType=staff)',
      })
    ).toBe(`(&(objectClass=person)(|(memberOf=${VAULT})(memberOf=${OPS}))(employeeType=staff))`);
  });

  it('escapes group DNs', () => {
    expect(buildLdapFilter({ groups: ['cn=a(b),dc=x'] })).toBe('(memberOf=cn=a\\28b\\29,dc=x)');
  });
});
