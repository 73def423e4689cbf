/**
 * API types for the VaultWarden client
 *
 * Only the organisation-membership and identity endpoints the sync engine
 * uses are modelled. VaultWarden serializes these in camelCase; older
 * releases used PascalCase, so raw payloads are validated field by field.
 */

import type { Dispatcher } from 'undici';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used by the client
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

// =============================================================================
// Transport
// =============================================================================

/**
 * Request options passed to the fetch implementation
 */
export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

/**
 * The part of a fetch Response the client reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/**
 * Fetch implementation; undici's fetch by default
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Client configuration
 */
export interface VaultWardenClientConfig {
  /** Base URL of the VaultWarden server */
  baseUrl: string;
  /** Personal API key client id (`user.<uuid>`) */
  clientId: string;
  clientSecret: string;
  /** Organisation to manage */
  orgId: string;
  /** Skip TLS certificate verification */
  ignoreCert?: boolean;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retry settings for transient failures */
  retry?: RetryConfig;
  /** Device identifier reported at token time */
  deviceIdentifier?: string;
  /** Replacement fetch, used by tests */
  fetch?: FetchLike;
}

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Organisation user status codes as sent on the wire
 */
export enum OrganizationUserStatusCode {
  Revoked = -1,
  Invited = 0,
  Accepted = 1,
  Confirmed = 2,
}

/**
 * Organisation user role codes as sent on the wire
 */
export enum OrganizationUserTypeCode {
  Owner = 0,
  Admin = 1,
  User = 2,
  Manager = 3,
}

/**
 * Organisation user as returned by GET /api/organizations/{org}/users
 */
export interface OrganizationUser {
  /** Organisation-user id, used by revoke/restore */
  id: string;
  /** Account id; absent for invitations not yet accepted */
  userId?: string;
  email: string;
  status: OrganizationUserStatusCode;
  type?: number;
  name?: string;
}

/**
 * Authenticated account profile (GET /api/accounts/profile)
 */
export interface Profile {
  id: string;
  email: string;
  name?: string;
}

/**
 * Response of POST /identity/connect/token
 */
export interface TokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
}

/**
 * Invite request body (POST /api/organizations/{org}/users/invite)
 */
export interface InviteRequest {
  emails: string[];
  type: OrganizationUserTypeCode;
  accessAll: boolean;
  collections: unknown[];
  groups: string[];
}
