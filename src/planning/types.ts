/**
 * Planning Module Types
 */

export type PlanStepStatus = 'pending' | 'in_progress' | 'done' | 'blocked';

export interface PlanStep {
  /** "step-<n>", 1-based, never reused */
  id: string;
  title: string;
  query: string;
  tool: 'web_search';
  status: PlanStepStatus;
}

export type PlanningStatus = 'awaiting_confirmation' | 'confirmed' | 'auto_approved';

export type PlanningCommand = 'enter-planning' | 'skip-planning' | 'confirm-plan';

export const PLANNING_COMMANDS: readonly PlanningCommand[] = [
  'enter-planning',
  'skip-planning',
  'confirm-plan',
];

export interface PlanningRoute {
  status: PlanningStatus | null;
  next: 'planning_wait' | 'research_fan_out';
  /** Command recognised in the input, null when unknown */
  command: PlanningCommand | null;
  feedback: string;
}

export interface ReflectionResult {
  isSufficient: boolean;
  knowledgeGap: string;
  followUpQueries: string[];
}
