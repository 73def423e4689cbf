/**
 * vaultwarden-ldap-sync library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the building blocks for
 * embedding the sync in another process.
 */

export * from './errors.js';
export * from './config/index.js';
export * from './directory/index.js';
export * from './reconcilers/members/index.js';
export * from './cycle/index.js';
export { createClient, ApiRequestError, withRetry } from './api/index.js';
export type { VaultWardenClient, VaultWardenClientConfig, OrganizationUser } from './api/index.js';
export { normalizeEmail } from './utils/email.js';
export { Logger, logger, createLogger, type LogLevel, type LoggerConfig, type LogSink } from './utils/logger.js';
