/**
 * LDAP search filter construction (RFC 4515)
 *
 * Parts are AND-ed; a single part is returned as is and no part at all
 * matches every entry with `(objectClass=*)`.
 */

import type { DirectoryFilterOptions } from './types.js';

/**
 * Separators between group DNs: `;`, `|`, or a comma followed by whitespace.
 * A comma inside a DN is never followed by whitespace.
 */
const GROUP_SEPARATOR = /;|\||,\s+/;

const MATCH_ALL = '(objectClass=*)';

/**
 * Split LDAP_USER_GROUPS into group DNs
 *
 * @example
 * splitGroupDns('cn=a,dc=x, cn=b,dc=x') // ['cn=a,dc=x', 'cn=b,dc=x']
 */
export function splitGroupDns(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(GROUP_SEPARATOR)
    .map((dn) => dn.trim())
    .filter((dn) => dn.length > 0);
}

/**
 * Escape an assertion value for use inside a filter
 */
export function escapeFilterValue(value: string): string {
  return value.replace(/[\\*()\0]/g, (ch) => `\\${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

/**
 * Build the candidate-user filter
 */
export function buildLdapFilter(options: DirectoryFilterOptions = {}): string {
  const groupAttribute = options.groupAttribute ?? 'memberOf';
  const parts: string[] = [];

  const objectType = options.objectType?.trim();
  if (objectType && objectType !== '*') {
    parts.push(`(objectClass=${objectType})`);
  }

  const groups = (options.groups ?? []).map((g) => g.trim()).filter((g) => g.length > 0);
  if (groups.length === 1) {
    parts.push(`(${groupAttribute}=${escapeFilterValue(groups[0])})`);
  } else if (groups.length > 1) {
    const clauses = groups.map((g) => `(${groupAttribute}=${escapeFilterValue(g)})`).join('');
    parts.push(`(|${clauses})`);
  }

  const additional = options.additionalFilter?.trim();
  if (additional) {
    parts.push(additional.startsWith('(') ? additional : `(${additional})`);
  }

  if (parts.length === 0) {
    return MATCH_ALL;
  }
  if (parts.length === 1) {
    return parts[0];
  }
  return `(&${parts.join('')})`;
}
