/**
 * Types for the LDAP directory reader
 */

import type { Client, Entry } from 'ldapts';

/**
 * One candidate user derived from a directory entry
 */
export interface DirectoryUser {
  /** Distinguished name of the source entry */
  dn: string;
  /** Lower-cased mail address; identity key */
  email: string;
  /** Whether the account is disabled in the directory */
  disabled: boolean;
  /** Values of the group membership attribute */
  groups: string[];
}

/**
 * Raw entry as returned by an LDAP search
 */
export type DirectoryEntry = Entry;

/**
 * Filter criteria for candidate users
 */
export interface DirectoryFilterOptions {
  /** objectClass value; `*` or empty disables the clause */
  objectType?: string;
  /** Group DNs, any of which qualifies an entry */
  groups?: readonly string[];
  /** Raw filter fragment AND-ed with the rest */
  additionalFilter?: string;
  /** Attribute holding group membership (default memberOf) */
  groupAttribute?: string;
}

/**
 * How entries are turned into DirectoryUser values
 */
export interface EntryShapeOptions {
  mailAttribute: string;
  groupAttribute: string;
  /** Undefined turns the attribute check off */
  disabledAttribute?: string;
  disabledValues: readonly string[];
  /** Result when the disabled attribute is absent or empty */
  missingIsDisabled: boolean;
}

/**
 * Everything needed to read candidate users from the directory
 */
export interface DirectoryReadOptions extends EntryShapeOptions {
  /** ldap:// or ldaps:// URL */
  url: string;
  bindDn: string;
  bindPassword: string;
  baseDn: string;
  filter: DirectoryFilterOptions;
  /** Skip certificate verification for ldaps:// */
  ignoreCert: boolean;
  /** PEM CA bundle for ldaps:// */
  caFile?: string;
  /** Connect and operation timeout (ms) */
  timeoutMs: number;
}

/**
 * The subset of the ldapts client the reader uses
 */
export type LdapSearchClient = Pick<Client, 'bind' | 'search' | 'unbind'>;

/**
 * Entries skipped while shaping, reported as warnings
 */
export interface SkippedEntry {
  dn: string;
  reason: string;
}

/**
 * Result of shaping a batch of entries
 */
export interface ShapeResult {
  users: DirectoryUser[];
  skipped: SkippedEntry[];
  /** Emails that occurred more than once (last entry kept) */
  duplicates: string[];
}
