/**
 * plan command - Show what the next cycle would change, without changing it
 */

import type { CommandContext, CommandResult } from '../types.js';
import { createGateway, controllerOptionsFromConfig, type SyncGateway } from '../cycle/index.js';
import { planMembership, type ReconcilePlan } from '../reconcilers/members/index.js';
import { toSyncError } from '../errors.js';
import { header, printPlan } from '../utils/output.js';

export interface PlanDeps {
  gateway?: SyncGateway;
}

/**
 * Execute the plan command
 */
export async function planCommand(
  ctx: CommandContext,
  deps: PlanDeps = {}
): Promise<CommandResult<ReconcilePlan>> {
  const gateway = deps.gateway ?? createGateway(ctx.config, { logger: ctx.logger });
  const { reconcile } = controllerOptionsFromConfig(ctx.config);

  let plan: ReconcilePlan;
  try {
    const users = await gateway.fetchDirectoryUsers();
    const { members } = await gateway.readMembership();
    plan = planMembership(users, members, reconcile);
  } catch (err) {
    const syncError = toSyncError(err);
    return {
      success: false,
      message: 'Could not compute a plan',
      errors: [syncError.toUserMessage()],
    };
  }

  if (ctx.outputFormat === 'human') {
    header('Membership Plan');
    printPlan(plan);
  }

  return {
    success: true,
    message: plan.summary.total === 0 ? 'No changes needed' : `${plan.summary.total} change(s) planned`,
    data: plan,
  };
}
