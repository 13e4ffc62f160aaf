/**
 * Planning command router
 *
 * Pure routing of the commands accepted while a session waits in
 * planning_wait. Input is trimmed and case-insensitive; the slash forms
 * are aliases.
 */

import type { PlanningCommand, PlanningRoute, PlanningStatus } from './types.js';

const ALIASES: Record<string, PlanningCommand> = {
  'enter-planning': 'enter-planning',
  '/plan': 'enter-planning',
  'skip-planning': 'skip-planning',
  '/end_plan': 'skip-planning',
  'confirm-plan': 'confirm-plan',
  '/confirm_plan': 'confirm-plan',
};

export function parsePlanningCommand(input: string): PlanningCommand | null {
  const [word = ''] = input.trim().toLowerCase().split(/\s+/);
  return ALIASES[word] ?? null;
}

export function routePlanningCommand(
  currentStatus: PlanningStatus | null,
  input: string
): PlanningRoute {
  const command = parsePlanningCommand(input);

  switch (command) {
    case 'enter-planning':
      return {
        command,
        status: 'awaiting_confirmation',
        next: 'planning_wait',
        feedback: 'Planning mode started. Review the plan, then confirm it.',
      };
    case 'skip-planning':
      return {
        command,
        status: 'auto_approved',
        next: 'research_fan_out',
        feedback: 'Planning skipped. Proceeding to research.',
      };
    case 'confirm-plan':
      return {
        command,
        status: 'confirmed',
        next: 'research_fan_out',
        feedback: 'Plan confirmed. Proceeding to research.',
      };
    case null:
      return {
        command,
        status: currentStatus,
        next: 'planning_wait',
        feedback: `Unknown planning command "${input.trim()}". Use enter-planning, skip-planning or confirm-plan.`,
      };
  }
}
