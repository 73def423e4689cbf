/**
 * check command - Verify that the directory and VaultWarden are reachable
 * with the configured credentials
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { VaultWardenClient } from '../api/client.js';
import { createVaultWardenClient, directoryReadOptions } from '../cycle/gateway.js';
import { fetchDirectoryUsers, type DirectoryReaderDeps } from '../directory/reader.js';
import { readMembership } from '../reconcilers/members/index.js';
import { toSyncError } from '../errors.js';
import { header, printChecks, type CheckOutcome } from '../utils/output.js';

export interface CheckDeps {
  client?: VaultWardenClient;
  directory?: DirectoryReaderDeps;
}

async function check(name: string, probe: () => Promise<string>): Promise<CheckOutcome> {
  try {
    return { name, ok: true, detail: await probe() };
  } catch (err) {
    return { name, ok: false, detail: toSyncError(err).message };
  }
}

/**
 * Execute the check command
 */
export async function checkCommand(
  ctx: CommandContext,
  deps: CheckDeps = {}
): Promise<CommandResult<CheckOutcome[]>> {
  const { config, logger } = ctx;
  const client = deps.client ?? createVaultWardenClient(config, logger);

  const checks: CheckOutcome[] = [];

  checks.push(
    await check('LDAP', async () => {
      const users = await fetchDirectoryUsers(directoryReadOptions(config), {
        logger,
        ...deps.directory,
      });
      const disabled = users.filter((user) => user.disabled).length;
      return `${users.length} candidate user(s) under ${config.ldap.baseDn}, ${disabled} disabled`;
    })
  );

  checks.push(
    await check('VaultWarden login', async () => {
      await client.authenticate();
      return `authenticated at ${config.vaultwarden.url}`;
    })
  );

  checks.push(
    await check('Organisation', async () => {
      const { members, profile, self } = await readMembership(client, {
        clientId: config.vaultwarden.clientId,
        logger,
      });
      const selfNote = self ? `sync account is ${self.email} (${self.status})` : `sync account ${profile.email} is not a member`;
      return `${members.length} member(s) in ${config.vaultwarden.orgId}; ${selfNote}`;
    })
  );

  if (ctx.outputFormat === 'human') {
    header('Connectivity');
    printChecks(checks);
  }

  const failed = checks.filter((c) => !c.ok);
  return {
    success: failed.length === 0,
    message: failed.length === 0 ? 'All checks passed' : `${failed.length} of ${checks.length} checks failed`,
    data: checks,
    errors: failed.length > 0 ? failed.map((c) => `${c.name}: ${c.detail}`) : undefined,
  };
}
