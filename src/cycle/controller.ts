/**
 * Sync controller
 *
 * Drives reconciliation cycles and owns the consecutive-failure counter.
 *
 * Exit policy:
 * - run-once: exactly one cycle, exit 0 on success and 1 on failure
 * - loop: sleep the sync interval between cycles; exit 1 as soon as the
 *   counter reaches the configured maximum
 * - stop(): a sleeping controller wakes at once, a running cycle finishes
 *   first; exit 0 unless that cycle reached the maximum
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { SyncConfig } from '../config/env.js';
import type { ReconcileOptions } from '../reconcilers/members/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { reportCycle } from './report.js';
import { runCycle } from './run-cycle.js';
import type { CycleResult, CycleState, SyncGateway } from './types.js';

export type ExitCode = 0 | 1;

/**
 * Sleep that resolves early when the signal aborts
 */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ControllerOptions {
  runOnce: boolean;
  intervalSeconds: number;
  maxConsecutiveFailures: number;
  reconcile: ReconcileOptions;
  logger?: Logger;
  sleep?: SleepFn;
  /** Called after each cycle has been reported */
  onCycle?: (result: CycleResult) => void;
}

/**
 * What the controller does after a cycle
 */
export type NextStep = { next: 'sleep' } | { next: 'exit'; exitCode: ExitCode };

/**
 * Counter value after a cycle
 */
export function nextFailureCount(current: number, success: boolean): number {
  return success ? 0 : current + 1;
}

/**
 * Decide what follows a cycle, given the already updated counter
 */
export function nextStep(
  success: boolean,
  consecutiveFailures: number,
  options: Pick<ControllerOptions, 'runOnce' | 'maxConsecutiveFailures'>
): NextStep {
  if (options.runOnce) {
    return { next: 'exit', exitCode: success ? 0 : 1 };
  }
  if (consecutiveFailures >= options.maxConsecutiveFailures) {
    return { next: 'exit', exitCode: 1 };
  }
  return { next: 'sleep' };
}

/**
 * Controller settings from the runtime configuration
 */
export function controllerOptionsFromConfig(config: SyncConfig): ControllerOptions {
  return {
    runOnce: config.runOnce,
    intervalSeconds: config.syncIntervalSeconds,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    reconcile: {
      usersOnly: config.ldap.usersOnly,
      preventSelfLock: config.preventSelfLock,
    },
  };
}

const abortableSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) {
      throw err;
    }
  }
};

export class SyncController {
  private readonly log: Logger;
  private readonly sleep: SleepFn;
  private readonly wake = new AbortController();
  private failures = 0;
  private cycles = 0;
  private stopRequested = false;
  private current: CycleState = 'idle';

  constructor(
    private readonly gateway: SyncGateway,
    private readonly options: ControllerOptions
  ) {
    this.log = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): CycleState {
    return this.current;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Ask the controller to finish after the running cycle
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.log.info('Stop requested, shutting down after the current cycle');
    this.wake.abort();
  }

  /**
   * Run cycles until the exit policy says otherwise
   *
   * @returns Process exit code
   */
  async run(): Promise<ExitCode> {
    const { options } = this;
    this.log.info(
      options.runOnce
        ? 'Running a single reconciliation cycle'
        : `Reconciling every ${options.intervalSeconds}s`,
      { maxConsecutiveFailures: options.maxConsecutiveFailures }
    );

    while (!this.stopRequested) {
      const result = await runCycle(this.gateway, {
        cycleId: ++this.cycles,
        reconcile: options.reconcile,
        logger: this.log,
        onState: (state) => {
          this.current = state;
        },
      });

      this.current = 'reporting';
      reportCycle(result, this.log);
      this.failures = nextFailureCount(this.failures, result.success);
      if (!result.success) {
        this.log.warn(`Consecutive failures: ${this.failures}/${options.maxConsecutiveFailures}`);
      }
      options.onCycle?.(result);

      const step = nextStep(result.success, this.failures, options);
      if (step.next === 'exit') {
        if (!options.runOnce) {
          this.log.error(`Giving up after ${this.failures} consecutive failed cycles`);
        }
        return this.terminate(step.exitCode);
      }

      if (this.stopRequested) break;

      this.current = 'sleeping';
      this.log.debug(`Sleeping ${options.intervalSeconds}s until the next cycle`);
      await this.sleep(options.intervalSeconds * 1000, this.wake.signal);
      this.current = 'idle';
    }

    return this.terminate(0);
  }

  private terminate(exitCode: ExitCode): ExitCode {
    this.current = 'terminated';
    this.log.info(`Sync stopped with exit code ${exitCode}`);
    return exitCode;
  }
}
