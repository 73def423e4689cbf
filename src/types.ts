/**
 * Shared types and interfaces for the vaultwarden-ldap-sync CLI
 */

import type { SyncConfig } from './config/env.js';
import type { Logger } from './utils/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging (same as DEBUG=true) */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Configuration loaded from the environment */
  config: SyncConfig;
  logger: Logger;
}
