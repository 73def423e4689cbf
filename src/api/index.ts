/**
 * VaultWarden API client module
 *
 * Provides:
 * - VaultWardenClient with members and accounts sub-clients
 * - Retry logic with exponential backoff
 * - Full type definitions for the entities the sync reads and writes
 */

// Main client
export {
  createClient,
  parseOrganizationUser,
  parseMemberPage,
  TOKEN_EXPIRY_MARGIN_MS,
} from './client.js';

export type { VaultWardenClient, MembersClient, AccountsClient, ClientDeps } from './client.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  classifyFailure,
  shouldRetry,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';

export type { FailureKind, RetryOptions } from './retry.js';

// Types
export { OrganizationUserStatusCode, OrganizationUserTypeCode } from './types.js';

export type {
  // Common
  HttpMethod,
  RetryConfig,
  RetryResult,

  // Transport
  FetchInit,
  FetchLike,
  FetchResponse,
  VaultWardenClientConfig,

  // Entities
  OrganizationUser,
  Profile,
  TokenResponse,
  InviteRequest,
} from './types.js';
