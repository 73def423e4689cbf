/**
 * Error types for vaultwarden-ldap-sync
 *
 * Every failure the sync engine reports is a SyncError with a stable code,
 * so the cycle controller and the CLI can classify it without string matching.
 */

import type { ReconciliationAction } from './reconcilers/members/types.js';

/**
 * Stable error codes
 */
export type SyncErrorCode =
  | 'CONFIG_INVALID'
  | 'DIRECTORY_UNAVAILABLE'
  | 'VAULTWARDEN_UNAVAILABLE'
  | 'VAULTWARDEN_AUTH_FAILED'
  | 'ACTION_FAILED'
  | 'UNEXPECTED';

/**
 * Base error class for sync errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * A single configuration problem, keyed by environment variable
 */
export interface ConfigIssue {
  /** Environment variable name */
  variable: string;
  /** What is wrong with it */
  message: string;
}

/**
 * Thrown at startup when the environment does not describe a usable configuration
 */
export class ConfigurationError extends SyncError {
  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.variable}: ${i.message}`).join('; ')}`,
      'CONFIG_INVALID',
      'Check the environment variables listed above'
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Connect, bind or search against the LDAP directory failed
 */
export class DirectoryUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      'DIRECTORY_UNAVAILABLE',
      'Verify LDAP_HOST, LDAP_BIND_DN, LDAP_BIND_PASSWORD and LDAP_BASE_DN',
      options
    );
    this.name = 'DirectoryUnavailableError';
  }
}

/**
 * The VaultWarden API could not be reached or returned an unusable response
 */
export class VaultWardenUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VAULTWARDEN_UNAVAILABLE', 'Verify VW_URL and VW_ORG_ID', options);
    this.name = 'VaultWardenUnavailableError';
  }
}

/**
 * The VaultWarden API rejected the client credentials
 */
export class VaultWardenAuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      'VAULTWARDEN_AUTH_FAILED',
      'Verify VW_USER_CLIENT_ID and VW_USER_CLIENT_SECRET (Account Settings > Security > Keys > API Key)',
      options
    );
    this.name = 'VaultWardenAuthError';
  }
}

/**
 * One reconciliation action could not be applied
 */
export class ActionFailedError extends SyncError {
  constructor(
    public readonly action: ReconciliationAction,
    cause: unknown
  ) {
    super(
      `Failed to ${action.type} ${action.email}: ${describeError(cause)}`,
      'ACTION_FAILED',
      undefined,
      { cause }
    );
    this.name = 'ActionFailedError';
  }
}

/**
 * Render any thrown value as a message
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Coerce any thrown value into a SyncError, keeping typed errors as they are
 */
export function toSyncError(err: unknown): SyncError {
  if (err instanceof SyncError) {
    return err;
  }
  return new SyncError(describeError(err), 'UNEXPECTED', undefined, { cause: err });
}
