/**
 * run command - Reconcile the organisation against the directory,
 * once or on an interval
 */

import type { CommandContext, CommandResult } from '../types.js';
import { withRunOnce } from '../config/env.js';
import {
  SyncController,
  controllerOptionsFromConfig,
  createGateway,
  type ExitCode,
  type SleepFn,
  type SyncGateway,
} from '../cycle/index.js';

export interface RunOptions {
  /** Run a single cycle regardless of RUN_ONCE */
  once?: boolean;
}

export interface RunDeps {
  gateway?: SyncGateway;
  sleep?: SleepFn;
  /** Where SIGINT/SIGTERM are received */
  signals?: NodeJS.EventEmitter;
}

export interface RunSummary {
  exitCode: ExitCode;
  cycles: number;
  consecutiveFailures: number;
}

const STOP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Execute the run command
 */
export async function runCommand(
  ctx: CommandContext,
  options: RunOptions = {},
  deps: RunDeps = {}
): Promise<CommandResult<RunSummary>> {
  const config = options.once ? withRunOnce(ctx.config, true) : ctx.config;
  const log = ctx.logger;

  log.debug('Effective configuration', { config });

  const gateway = deps.gateway ?? createGateway(config, { logger: log });
  let cycles = 0;
  const controller = new SyncController(gateway, {
    ...controllerOptionsFromConfig(config),
    logger: log,
    sleep: deps.sleep,
    onCycle: () => {
      cycles++;
    },
  });

  const signals = deps.signals ?? process;
  const onSignal = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}`);
    controller.stop();
  };
  for (const signal of STOP_SIGNALS) {
    signals.on(signal, onSignal);
  }

  let exitCode: ExitCode;
  try {
    exitCode = await controller.run();
  } finally {
    for (const signal of STOP_SIGNALS) {
      signals.removeListener(signal, onSignal);
    }
  }

  const data: RunSummary = {
    exitCode,
    cycles,
    consecutiveFailures: controller.consecutiveFailures,
  };

  if (exitCode === 0) {
    return { success: true, message: `Sync finished after ${cycles} cycle(s)`, data };
  }

  return {
    success: false,
    message: config.runOnce
      ? 'Reconciliation cycle failed'
      : `Stopped after ${controller.consecutiveFailures} consecutive failed cycles`,
    data,
  };
}
