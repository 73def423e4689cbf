#!/usr/bin/env node
/**
 * vaultwarden-ldap-sync CLI - Keep a VaultWarden organisation in line with LDAP
 *
 * Commands:
 * - run: reconcile on an interval, or once with --once / RUN_ONCE (default)
 * - plan: show what the next cycle would change
 * - check: verify LDAP and VaultWarden connectivity
 *
 * All connection settings come from the environment (see src/config/env.ts).
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { runCommand, planCommand, checkCommand } from './commands/index.js';
import { loadConfig } from './config/env.js';
import { ConfigurationError, toSyncError } from './errors.js';
import { logger, createLogger, stderrSink, type LogSink } from './utils/logger.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options and the environment
 *
 * @throws ConfigurationError when the environment is incomplete
 */
function createContext(options: GlobalOptions, sink?: LogSink): CommandContext {
  const config = loadConfig();
  const loggerConfig = {
    level: config.debug || options.verbose ? 'debug' : 'info',
    json: options.json,
  } as const;

  let log = logger;
  if (sink) {
    log = createLogger(loggerConfig, sink);
  } else {
    logger.setConfig(loggerConfig);
  }

  verboseLog(`Organisation: ${config.vaultwarden.orgId} at ${config.vaultwarden.url}`, options.verbose);
  verboseLog(`Directory: ${config.ldap.host} (${config.ldap.baseDn})`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    config,
    logger: log,
  };
}

/**
 * Run a command handler and exit with its status
 */
async function execute<T>(
  name: string,
  sink: LogSink | undefined,
  handler: (ctx: CommandContext) => Promise<CommandResult<T>>,
  exitCode: (result: CommandResult<T>) => number = (result) => (result.success ? 0 : 1)
): Promise<never> {
  const globalOpts = program.opts<GlobalOptions>();

  try {
    const ctx = createContext(globalOpts, sink);
    const result = await handler(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(exitCode(result));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      if (globalOpts.json) {
        const errors = err.issues.map((i) => `${i.variable} ${i.message}`);
        printResult({ success: false, message: 'Invalid configuration', errors }, 'json');
      } else {
        error('Invalid configuration:');
        for (const issue of err.issues) {
          error(`  ${issue.variable} ${issue.message}`);
        }
      }
      process.exit(1);
    }
    error(`${name} failed: ${toSyncError(err).toUserMessage()}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('vaultwarden-ldap-sync')
  .description('Reconcile VaultWarden organisation membership against an LDAP directory')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

/**
 * run command - the reconciliation loop
 */
program
  .command('run', { isDefault: true })
  .description('Reconcile membership every SYNC_INTERVAL seconds')
  .addOption(new Option('--once', 'Run a single cycle and exit (same as RUN_ONCE=true)').default(false))
  .action(async (cmdOpts: { once: boolean }) => {
    await execute(
      'Run',
      undefined,
      (ctx) => runCommand(ctx, { once: cmdOpts.once }),
      (result) => result.data?.exitCode ?? 1
    );
  });

/**
 * plan command - dry run of one cycle
 */
program
  .command('plan')
  .description('Show the invites, restores and revokes the next cycle would apply')
  .action(async () => {
    await execute('Plan', stderrSink, (ctx) => planCommand(ctx));
  });

/**
 * check command - connectivity check
 */
program
  .command('check')
  .description('Verify LDAP and VaultWarden connectivity and credentials')
  .action(async () => {
    await execute('Check', stderrSink, (ctx) => checkCommand(ctx));
  });

// Parse and execute
await program.parseAsync();
