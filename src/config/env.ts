/**
 * Environment configuration for vaultwarden-ldap-sync
 *
 * The environment variable names below are the compatibility contract with
 * existing deployments. `loadConfig` is called once at startup; the frozen
 * result is passed to every component.
 *
 * ## Environment Variables
 *
 * - DEBUG, SYNC_INTERVAL, RUN_ONCE, MAX_CONSECUTIVE_FAILURES, PREVENT_SELF_LOCK
 * - VW_URL, VW_USER_CLIENT_ID, VW_USER_CLIENT_SECRET, VW_ORG_ID, IGNORE_VW_CERT
 * - LDAP_HOST, LDAP_BIND_DN, LDAP_BIND_PASSWORD, LDAP_BASE_DN, LDAP_OBJECT_TYPE,
 *   LDAP_USER_GROUPS, LDAP_GROUP_ATTRIBUTE, LDAP_FILTER, LDAP_MAIL_FIELD,
 *   LDAP_DISABLED_ATTRIBUTE, LDAP_DISABLED_VALUES, LDAP_MISSING_IS_DISABLED,
 *   LDAP_USERS_ONLY, IGNORE_LDAPS_CERT, LDAP_CA_FILE
 */

import { ConfigurationError, type ConfigIssue } from '../errors.js';
import { splitGroupDns } from '../directory/filter.js';
import {
  TRUE_VALUES,
  DEFAULT_SYNC_INTERVAL_SECONDS,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  DEFAULT_VW_URL,
  DEFAULT_LDAP_HOST,
  DEFAULT_LDAP_GROUP_ATTRIBUTE,
  DEFAULT_LDAP_MAIL_FIELD,
  DEFAULT_LDAP_DISABLED_ATTRIBUTE,
  DEFAULT_LDAP_DISABLED_VALUES,
  ORG_ID_PREFIX,
} from './constants.js';

// =============================================================================
// Types
// =============================================================================

export type Env = Record<string, string | undefined>;

/**
 * VaultWarden connection settings
 */
export interface VaultWardenSettings {
  /** Base URL without trailing slash */
  readonly url: string;
  /** Personal API key client id, `user.<uuid>` */
  readonly clientId: string;
  readonly clientSecret: string;
  /** Organisation id with any `organization.` prefix removed */
  readonly orgId: string;
  readonly ignoreCert: boolean;
}

/**
 * LDAP connection and filtering settings
 */
export interface LdapSettings {
  /** ldap:// or ldaps:// URL */
  readonly host: string;
  readonly bindDn: string;
  readonly bindPassword: string;
  readonly baseDn: string;
  readonly objectType?: string;
  /** Parsed LDAP_USER_GROUPS */
  readonly userGroups: readonly string[];
  readonly groupAttribute: string;
  readonly filter?: string;
  readonly mailField: string;
  /** Undefined when LDAP_DISABLED_ATTRIBUTE is set to an empty value */
  readonly disabledAttribute?: string;
  readonly disabledValues: readonly string[];
  readonly missingIsDisabled: boolean;
  readonly usersOnly: boolean;
  readonly ignoreCert: boolean;
  readonly caFile?: string;
}

/**
 * Complete runtime configuration
 */
export interface SyncConfig {
  readonly debug: boolean;
  readonly syncIntervalSeconds: number;
  readonly runOnce: boolean;
  readonly maxConsecutiveFailures: number;
  readonly preventSelfLock: boolean;
  readonly vaultwarden: VaultWardenSettings;
  readonly ldap: LdapSettings;
}

// =============================================================================
// Parsers
// =============================================================================

/**
 * Parse a boolean flag: `1`, `true`, `yes`, `on` (any case) are true,
 * any other value is false, unset falls back to the default
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }
  return TRUE_VALUES.includes(value.trim().toLowerCase());
}

/**
 * Parse a comma-separated list, dropping empty items
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(
  env: Env,
  variable: string,
  defaultValue: number,
  min: number,
  issues: ConfigIssue[]
): number {
  const raw = env[variable]?.trim();
  if (!raw) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(raw)) {
    issues.push({ variable, message: `must be an integer, got "${raw}"` });
    return defaultValue;
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    issues.push({ variable, message: `must be at least ${min}, got ${value}` });
    return defaultValue;
  }
  return value;
}

function requireString(env: Env, variable: string, issues: ConfigIssue[]): string {
  const value = optionalString(env[variable]);
  if (!value) {
    issues.push({ variable, message: 'is required' });
    return '';
  }
  return value;
}

function parseVaultWardenUrl(raw: string, issues: ConfigIssue[]): string {
  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      issues.push({ variable: 'VW_URL', message: `must be an http(s) URL, got "${raw}"` });
    }
  } catch {
    issues.push({ variable: 'VW_URL', message: `is not a valid URL: "${raw}"` });
  }
  return raw.replace(/\/+$/, '');
}

function parseLdapHost(raw: string, issues: ConfigIssue[]): string {
  // A bare host name means plain LDAP
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `ldap://${raw}`;
  try {
    const url = new URL(withScheme);
    if (url.protocol !== 'ldap:' && url.protocol !== 'ldaps:') {
      issues.push({ variable: 'LDAP_HOST', message: `must be an ldap:// or ldaps:// URL, got "${raw}"` });
    }
  } catch {
    issues.push({ variable: 'LDAP_HOST', message: `is not a valid URL: "${raw}"` });
  }
  return withScheme;
}

/**
 * Strip the `organization.` prefix the admin UI shows in front of org ids
 */
export function normalizeOrgId(orgId: string): string {
  return orgId.startsWith(ORG_ID_PREFIX) ? orgId.slice(ORG_ID_PREFIX.length) : orgId;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const item of Object.values(value)) {
    if (item !== null && typeof item === 'object' && !Object.isFrozen(item)) {
      deepFreeze(item);
    }
  }
  return Object.freeze(value);
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Build the runtime configuration from the environment
 *
 * @throws ConfigurationError listing every problem found
 */
export function loadConfig(env: Env = process.env): SyncConfig {
  const issues: ConfigIssue[] = [];

  const vaultwarden: VaultWardenSettings = {
    url: parseVaultWardenUrl(optionalString(env.VW_URL) ?? DEFAULT_VW_URL, issues),
    clientId: requireString(env, 'VW_USER_CLIENT_ID', issues),
    clientSecret: requireString(env, 'VW_USER_CLIENT_SECRET', issues),
    orgId: normalizeOrgId(requireString(env, 'VW_ORG_ID', issues)),
    ignoreCert: parseBoolean(env.IGNORE_VW_CERT, false),
  };

  const bindDn = optionalString(env.LDAP_BIND_DN) ?? '';
  const bindPassword = env.LDAP_BIND_PASSWORD ?? '';
  if (bindDn && !bindPassword) {
    issues.push({ variable: 'LDAP_BIND_PASSWORD', message: 'is required when LDAP_BIND_DN is set' });
  }

  const disabledValues = parseList(env.LDAP_DISABLED_VALUES);

  const ldap: LdapSettings = {
    host: parseLdapHost(optionalString(env.LDAP_HOST) ?? DEFAULT_LDAP_HOST, issues),
    bindDn,
    bindPassword,
    baseDn: requireString(env, 'LDAP_BASE_DN', issues),
    objectType: optionalString(env.LDAP_OBJECT_TYPE),
    userGroups: splitGroupDns(env.LDAP_USER_GROUPS),
    groupAttribute: optionalString(env.LDAP_GROUP_ATTRIBUTE) ?? DEFAULT_LDAP_GROUP_ATTRIBUTE,
    filter: optionalString(env.LDAP_FILTER),
    mailField: optionalString(env.LDAP_MAIL_FIELD) ?? DEFAULT_LDAP_MAIL_FIELD,
    // Set but empty turns the attribute check off; unset keeps the default
    disabledAttribute:
      env.LDAP_DISABLED_ATTRIBUTE === undefined
        ? DEFAULT_LDAP_DISABLED_ATTRIBUTE
        : optionalString(env.LDAP_DISABLED_ATTRIBUTE),
    disabledValues: disabledValues.length > 0 ? disabledValues : [...DEFAULT_LDAP_DISABLED_VALUES],
    missingIsDisabled: parseBoolean(env.LDAP_MISSING_IS_DISABLED, false),
    usersOnly: parseBoolean(env.LDAP_USERS_ONLY, false),
    ignoreCert: parseBoolean(env.IGNORE_LDAPS_CERT, false),
    caFile: optionalString(env.LDAP_CA_FILE),
  };

  const config: SyncConfig = {
    debug: parseBoolean(env.DEBUG, false),
    syncIntervalSeconds: parseInteger(env, 'SYNC_INTERVAL', DEFAULT_SYNC_INTERVAL_SECONDS, 0, issues),
    runOnce: parseBoolean(env.RUN_ONCE, false),
    maxConsecutiveFailures: parseInteger(
      env,
      'MAX_CONSECUTIVE_FAILURES',
      DEFAULT_MAX_CONSECUTIVE_FAILURES,
      1,
      issues
    ),
    preventSelfLock: parseBoolean(env.PREVENT_SELF_LOCK, true),
    vaultwarden,
    ldap,
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return deepFreeze(config);
}

/**
 * Return a copy of the configuration with the run mode overridden
 */
export function withRunOnce(config: SyncConfig, runOnce: boolean): SyncConfig {
  return deepFreeze({ ...config, runOnce });
}
