/**
 * Defaults for every recognised environment variable
 */

/** Values accepted as boolean true (compared lower-cased) */
export const TRUE_VALUES: readonly string[] = ['1', 'true', 'yes', 'on'];

export const DEFAULT_SYNC_INTERVAL_SECONDS = 60;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;

export const DEFAULT_VW_URL = 'http://localhost:8080';
export const DEFAULT_LDAP_HOST = 'ldap://localhost:389';
export const DEFAULT_LDAP_GROUP_ATTRIBUTE = 'memberOf';
export const DEFAULT_LDAP_MAIL_FIELD = 'mail';
export const DEFAULT_LDAP_DISABLED_ATTRIBUTE = 'nsAccountLock';
export const DEFAULT_LDAP_DISABLED_VALUES: readonly string[] = ['TRUE', 'true', '1', 'yes', 'YES'];

/** VaultWarden shows org ids copied from the admin UI with this prefix */
export const ORG_ID_PREFIX = 'organization.';

/** Per-operation LDAP timeout (ms) */
export const LDAP_TIMEOUT_MS = 5000;

/** Per-request HTTP timeout (ms) */
export const HTTP_TIMEOUT_MS = 30000;
