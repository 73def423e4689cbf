/**
 * VaultWarden API Client
 *
 * Provides a typed interface to the organisation-membership part of the
 * VaultWarden (Bitwarden-compatible) API with:
 * - OAuth client-credentials login with a cached bearer token
 * - One re-authentication on a 401
 * - Retry with exponential backoff for 429/5xx, and for network errors on
 *   requests that are safe to repeat
 * - Per-request timeout
 * - Request logging with secret redaction
 */

import { randomUUID } from 'node:crypto';
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';
import type {
  FetchLike,
  HttpMethod,
  InviteRequest,
  OrganizationUser,
  Profile,
  TokenResponse,
  VaultWardenClientConfig,
} from './types.js';
import { OrganizationUserStatusCode, OrganizationUserTypeCode } from './types.js';
import {
  withRetry,
  ApiRequestError,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
  type RetryOptions,
} from './retry.js';
import { HTTP_TIMEOUT_MS } from '../config/constants.js';
import { VaultWardenAuthError, VaultWardenUnavailableError } from '../errors.js';
import { logger, type Logger } from '../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

/** Refresh the token this long before the server says it expires */
export const TOKEN_EXPIRY_MARGIN_MS = 60_000;

/** Bitwarden device type reported for API-key logins (SDK) */
const DEVICE_TYPE = '21';
const DEVICE_NAME = 'vaultwarden-ldap-sync';

// =============================================================================
// Types
// =============================================================================

/**
 * Organisation members sub-client
 */
export interface MembersClient {
  /** All members of the organisation, following continuation tokens */
  list(): Promise<OrganizationUser[]>;
  /** Invite an email as a plain User */
  invite(email: string): Promise<void>;
  revoke(memberId: string): Promise<void>;
  restore(memberId: string): Promise<void>;
}

/**
 * Accounts sub-client
 */
export interface AccountsClient {
  /** Profile of the account the API key belongs to */
  profile(): Promise<Profile>;
}

/**
 * Main VaultWarden client interface
 */
export interface VaultWardenClient {
  readonly members: MembersClient;
  readonly accounts: AccountsClient;

  /** Obtain a bearer token now instead of on first use */
  authenticate(): Promise<void>;

  /** Get current configuration (without secrets) */
  getConfig(): { baseUrl: string; orgId: string; hasCredentials: boolean; ignoreCert: boolean };
}

/**
 * Extra wiring for tests
 */
export interface ClientDeps {
  logger?: Logger;
  /** Clock used for token expiry */
  now?: () => number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

// =============================================================================
// Response parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a field that may arrive in camelCase or PascalCase
 */
function field(record: Record<string, unknown>, name: string): unknown {
  if (name in record) {
    return record[name];
  }
  return record[name.charAt(0).toUpperCase() + name.slice(1)];
}

function malformed(what: string): VaultWardenUnavailableError {
  return new VaultWardenUnavailableError(`Malformed VaultWarden response: ${what}`);
}

function parseStatus(value: unknown): OrganizationUserStatusCode {
  switch (value) {
    case OrganizationUserStatusCode.Revoked:
      return OrganizationUserStatusCode.Revoked;
    case OrganizationUserStatusCode.Invited:
      return OrganizationUserStatusCode.Invited;
    case OrganizationUserStatusCode.Accepted:
      return OrganizationUserStatusCode.Accepted;
    case OrganizationUserStatusCode.Confirmed:
      return OrganizationUserStatusCode.Confirmed;
    default:
      throw malformed(`unknown member status ${JSON.stringify(value)}`);
  }
}

/**
 * Validate one entry of the organisation users list
 */
export function parseOrganizationUser(raw: unknown): OrganizationUser {
  if (!isRecord(raw)) {
    throw malformed('member entry is not an object');
  }

  const id = field(raw, 'id');
  const email = field(raw, 'email');
  if (typeof id !== 'string' || id.length === 0) {
    throw malformed('member without id');
  }
  if (typeof email !== 'string' || email.length === 0) {
    throw malformed(`member ${id} without email`);
  }

  const userId = field(raw, 'userId');
  const type = field(raw, 'type');
  const name = field(raw, 'name');

  return {
    id,
    email,
    status: parseStatus(field(raw, 'status')),
    userId: typeof userId === 'string' && userId.length > 0 ? userId : undefined,
    type: typeof type === 'number' ? type : undefined,
    name: typeof name === 'string' ? name : undefined,
  };
}

/**
 * Validate a page of the organisation users list
 */
export function parseMemberPage(raw: unknown): { members: OrganizationUser[]; continuationToken?: string } {
  if (!isRecord(raw)) {
    throw malformed('member list is not an object');
  }
  const data = field(raw, 'data');
  if (!Array.isArray(data)) {
    throw malformed('member list has no data array');
  }
  const token = field(raw, 'continuationToken');
  return {
    members: data.map(parseOrganizationUser),
    continuationToken: typeof token === 'string' && token.length > 0 ? token : undefined,
  };
}

function parseProfile(raw: unknown): Profile {
  if (!isRecord(raw)) {
    throw malformed('profile is not an object');
  }
  const id = field(raw, 'id');
  const email = field(raw, 'email');
  const name = field(raw, 'name');
  if (typeof id !== 'string' || typeof email !== 'string') {
    throw malformed('profile without id or email');
  }
  return { id, email, name: typeof name === 'string' ? name : undefined };
}

function parseToken(raw: unknown): TokenResponse {
  if (!isRecord(raw) || typeof raw.access_token !== 'string' || raw.access_token.length === 0) {
    throw new VaultWardenAuthError('Token response did not contain an access token');
  }
  return {
    access_token: raw.access_token,
    expires_in: typeof raw.expires_in === 'number' ? raw.expires_in : 3600,
    token_type: typeof raw.token_type === 'string' ? raw.token_type : 'Bearer',
  };
}

function parseBody(text: string, url: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new VaultWardenUnavailableError(`Response from ${url} is not JSON`, { cause: err });
  }
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Create a new VaultWarden API client
 *
 * @example
 * ```ts
 * const client = createClient({
 *   baseUrl: 'https://vault.example.com',
 *   clientId: 'user.0000',
 *   clientSecret: 'test-secret',
 *   orgId: '1111',
 * });
 * const members = await client.members.list();
 * ```
 */
export function createClient(config: VaultWardenClientConfig, deps: ClientDeps = {}): VaultWardenClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const orgId = config.orgId;
  const timeout = config.timeout ?? HTTP_TIMEOUT_MS;
  const deviceIdentifier = config.deviceIdentifier ?? randomUUID();
  const log = (deps.logger ?? logger).child({ component: 'vaultwarden' });
  const now = deps.now ?? Date.now;

  const dispatcher: Dispatcher | undefined = config.ignoreCert
    ? new Agent({ connect: { rejectUnauthorized: false } })
    : undefined;
  const doFetch: FetchLike = config.fetch ?? undiciFetch;

  let token: CachedToken | undefined;

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': 'vaultwarden-ldap-sync',
  };

  /**
   * Send one HTTP request and return its body text. The body is read before
   * the timer is cleared, so a response that stalls after its headers times
   * out like one that never answers. A non-2xx status becomes ApiRequestError.
   */
  async function send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string
  ): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const startTime = Date.now();
      const response = await doFetch(url, {
        method,
        headers,
        body,
        signal: controller.signal,
        dispatcher,
      });
      const text = await response.text();

      log.response(response.status, url, Date.now() - startTime);

      if (!response.ok) {
        let errorMessage = `VaultWarden API error (${response.status})`;
        let errorDetails: Record<string, unknown> | undefined;

        if (text) {
          try {
            const parsed: unknown = JSON.parse(text);
            if (isRecord(parsed)) {
              errorDetails = parsed;
              const detail = field(parsed, 'message') ?? parsed.error_description ?? parsed.error;
              if (typeof detail === 'string' && detail) {
                errorMessage = `${errorMessage}: ${detail}`;
              }
            }
          } catch {
            errorMessage = `${errorMessage}: ${text.substring(0, 200)}`;
          }
        }

        throw new ApiRequestError(errorMessage, response.status, {
          details: errorDetails,
          retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
        });
      }

      return text;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function retrying<T>(path: string, fn: () => Promise<T>, idempotent = true): Promise<T> {
    const retryOptions: RetryOptions = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
      maxDelayMs: config.retry?.maxDelayMs,
      jitterFactor: config.retry?.jitterFactor,
      retryableStatuses: config.retry?.retryableStatuses,
      idempotent,
      logger: log,
      onRetry: (attempt, error, delayMs) => {
        log.debug(`Retrying request to ${path}`, { attempt, error: error.message, delayMs });
      },
    };

    const result = await withRetry(fn, retryOptions);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  // ---------------------------------------------------------------------------
  // Authentication
  // ---------------------------------------------------------------------------

  async function login(): Promise<CachedToken> {
    const url = `${baseUrl}/identity/connect/token`;
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      scope: 'api',
      client_id: config.clientId,
      client_secret: config.clientSecret,
      device_type: DEVICE_TYPE,
      device_identifier: deviceIdentifier,
      device_name: DEVICE_NAME,
    });
    const headers = { ...defaultHeaders, 'Content-Type': 'application/x-www-form-urlencoded' };

    log.request('POST', url, headers);

    let body: unknown;
    try {
      body = await retrying('/identity/connect/token', async () =>
        parseBody(await send('POST', url, headers, form.toString()), url)
      );
    } catch (err) {
      // The identity endpoint answers bad credentials with 400 invalid_grant
      if (err instanceof ApiRequestError && err.status >= 400 && err.status < 500 && !err.isRateLimited()) {
        throw new VaultWardenAuthError(`VaultWarden rejected the API key: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const parsed = parseToken(body);
    log.debug('Obtained VaultWarden access token', { expiresIn: parsed.expires_in });
    return {
      value: parsed.access_token,
      expiresAt: now() + parsed.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
  }

  async function accessToken(): Promise<string> {
    if (!token || now() >= token.expiresAt) {
      token = await login();
    }
    return token.value;
  }

  /**
   * Authenticated API request with retry and one re-login on 401.
   * Pass `idempotent: false` for requests that create something.
   */
  async function request(
    method: HttpMethod,
    path: string,
    payload?: unknown,
    { idempotent = true }: { idempotent?: boolean } = {}
  ): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    const body = payload === undefined ? undefined : JSON.stringify(payload);

    const attempt = async (): Promise<unknown> => {
      const headers: Record<string, string> = {
        ...defaultHeaders,
        Authorization: `Bearer ${await accessToken()}`,
      };
      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
      }
      log.request(method, url, headers);

      return retrying(path, async () => parseBody(await send(method, url, headers, body), url), idempotent);
    };

    try {
      return await attempt();
    } catch (err) {
      if (err instanceof ApiRequestError && err.status === 401) {
        log.debug('Access token rejected, logging in again', { path });
        token = undefined;
        return attempt();
      }
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Members Client
  // ---------------------------------------------------------------------------

  const membersPath = `/api/organizations/${encodeURIComponent(orgId)}/users`;

  const members: MembersClient = {
    async list(): Promise<OrganizationUser[]> {
      const all: OrganizationUser[] = [];
      const seenTokens = new Set<string>();
      let continuation: string | undefined;

      do {
        const path = continuation
          ? `${membersPath}?continuationToken=${encodeURIComponent(continuation)}`
          : membersPath;
        const page = parseMemberPage(await request('GET', path));
        all.push(...page.members);

        continuation = page.continuationToken;
        if (continuation !== undefined) {
          if (seenTokens.has(continuation)) {
            throw malformed('member list repeats a continuation token');
          }
          seenTokens.add(continuation);
        }
      } while (continuation !== undefined);

      return all;
    },

    async invite(email: string): Promise<void> {
      const invite: InviteRequest = {
        emails: [email],
        type: OrganizationUserTypeCode.User,
        accessAll: false,
        collections: [],
        groups: [],
      };
      await request('POST', `${membersPath}/invite`, invite, { idempotent: false });
    },

    async revoke(memberId: string): Promise<void> {
      await request('PUT', `${membersPath}/${encodeURIComponent(memberId)}/revoke`);
    },

    async restore(memberId: string): Promise<void> {
      await request('PUT', `${membersPath}/${encodeURIComponent(memberId)}/restore`);
    },
  };

  // ---------------------------------------------------------------------------
  // Accounts Client
  // ---------------------------------------------------------------------------

  const accounts: AccountsClient = {
    async profile(): Promise<Profile> {
      return parseProfile(await request('GET', '/api/accounts/profile'));
    },
  };

  // ---------------------------------------------------------------------------
  // Return Client
  // ---------------------------------------------------------------------------

  return {
    members,
    accounts,

    async authenticate(): Promise<void> {
      await accessToken();
    },

    getConfig() {
      return {
        baseUrl,
        orgId,
        hasCredentials: config.clientId.length > 0 && config.clientSecret.length > 0,
        ignoreCert: config.ignoreCert ?? false,
      };
    },
  };
}
