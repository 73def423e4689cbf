/**
 * Production wiring of a cycle: ldapts for the directory, the VaultWarden
 * client for the organisation.
 */

import { createClient, type VaultWardenClient } from '../api/client.js';
import type { SyncConfig } from '../config/env.js';
import { LDAP_TIMEOUT_MS } from '../config/constants.js';
import { fetchDirectoryUsers, type DirectoryReaderDeps } from '../directory/reader.js';
import type { DirectoryReadOptions } from '../directory/types.js';
import { applyMemberActions, readMembership } from '../reconcilers/members/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { SyncGateway } from './types.js';

export interface GatewayDeps {
  logger?: Logger;
  /** Prebuilt client, otherwise one is created from the configuration */
  client?: VaultWardenClient;
  directory?: DirectoryReaderDeps;
}

/**
 * Directory reader options from the LDAP settings
 */
export function directoryReadOptions(config: SyncConfig): DirectoryReadOptions {
  const { ldap } = config;
  return {
    url: ldap.host,
    bindDn: ldap.bindDn,
    bindPassword: ldap.bindPassword,
    baseDn: ldap.baseDn,
    filter: {
      objectType: ldap.objectType,
      groups: ldap.userGroups,
      additionalFilter: ldap.filter,
      groupAttribute: ldap.groupAttribute,
    },
    mailAttribute: ldap.mailField,
    groupAttribute: ldap.groupAttribute,
    disabledAttribute: ldap.disabledAttribute,
    disabledValues: ldap.disabledValues,
    missingIsDisabled: ldap.missingIsDisabled,
    ignoreCert: ldap.ignoreCert,
    caFile: ldap.caFile,
    timeoutMs: LDAP_TIMEOUT_MS,
  };
}

/**
 * VaultWarden client from the configuration
 */
export function createVaultWardenClient(config: SyncConfig, logger?: Logger): VaultWardenClient {
  const { vaultwarden } = config;
  return createClient(
    {
      baseUrl: vaultwarden.url,
      clientId: vaultwarden.clientId,
      clientSecret: vaultwarden.clientSecret,
      orgId: vaultwarden.orgId,
      ignoreCert: vaultwarden.ignoreCert,
    },
    { logger }
  );
}

/**
 * Gateway backed by the real directory and VaultWarden server
 */
export function createGateway(config: SyncConfig, deps: GatewayDeps = {}): SyncGateway {
  const log = deps.logger ?? defaultLogger;
  const client = deps.client ?? createVaultWardenClient(config, log);
  const readOptions = directoryReadOptions(config);

  return {
    fetchDirectoryUsers() {
      return fetchDirectoryUsers(readOptions, { logger: log, ...deps.directory });
    },

    readMembership() {
      return readMembership(client, { clientId: config.vaultwarden.clientId, logger: log });
    },

    applyActions(actions, members) {
      return applyMemberActions(client.members, actions, members, { logger: log });
    },
  };
}
