/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ReconcilePlan, ReconciliationAction } from '../reconcilers/members/index.js';

/**
 * Outcome of one connectivity check
 */
export interface CheckOutcome {
  name: string;
  ok: boolean;
  detail: string;
}

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a membership plan in a human-readable format
 */
export function printPlan(plan: ReconcilePlan): void {
  if (plan.actions.length === 0) {
    console.log(chalk.gray('Organisation is in sync with the directory'));
  } else {
    console.log(chalk.bold(`\n${plan.actions.length} change(s) planned:\n`));
    for (const action of plan.actions) {
      console.log(actionColor(action.type)(`  ${actionIcon(action.type)} ${describeAction(action)}`));
    }
  }

  if (plan.protected.length > 0) {
    console.log(chalk.bold('\nProtected from revocation (sync account):\n'));
    for (const member of plan.protected) {
      console.log(chalk.yellow(`  ! ${member.email}`), chalk.gray(`(${member.reason})`));
    }
  }

  const { summary } = plan;
  console.log(
    chalk.gray(
      `\ninvite ${summary.toInvite}, restore ${summary.toRestore}, revoke ${summary.toRevoke}, unchanged ${summary.unchanged}`
    )
  );
}

/**
 * Print connectivity check outcomes
 */
export function printChecks(checks: CheckOutcome[]): void {
  for (const check of checks) {
    const icon = check.ok ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${icon} ${chalk.bold(check.name)}: ${check.detail}`);
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // stderr keeps --json output parseable
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// Helper functions

function describeAction(action: ReconciliationAction): string {
  const line = `${action.type} ${action.email}`;
  return action.type === 'revoke' ? `${line} ${chalk.gray(`(${action.reason})`)}` : line;
}

function actionIcon(type: ReconciliationAction['type']): string {
  switch (type) {
    case 'invite':
      return '+';
    case 'restore':
      return '~';
    case 'revoke':
      return '-';
  }
}

function actionColor(type: ReconciliationAction['type']): typeof chalk.green {
  switch (type) {
    case 'invite':
      return chalk.green;
    case 'restore':
      return chalk.yellow;
    case 'revoke':
      return chalk.red;
  }
}
