/**
 * Configuration module exports
 */

export {
  loadConfig,
  withRunOnce,
  parseBoolean,
  parseList,
  normalizeOrgId,
  type Env,
  type SyncConfig,
  type LdapSettings,
  type VaultWardenSettings,
} from './env.js';

export * from './constants.js';
