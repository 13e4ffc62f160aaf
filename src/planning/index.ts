/**
 * Planning Module
 *
 * Query generation, reflection, the planning command router and plan
 * bookkeeping.
 */

export type {
  PlanStep,
  PlanStepStatus,
  PlanningStatus,
  PlanningCommand,
  PlanningRoute,
  ReflectionResult,
} from './types.js';
export { PLANNING_COMMANDS } from './types.js';
export { routePlanningCommand, parsePlanningCommand } from './router.js';
export {
  createSteps,
  appendSteps,
  markSteps,
  stepForQuery,
  nextStepNumber,
  formatPlan,
} from './plan.js';
export { generateQueries, normalizeQueries, QueryPlanSchema, type QueryGenerationOptions } from './queries.js';
export { reflect, ReflectionSchema, type ReflectOptions } from './reflect.js';
export { queryPlanPrompt, reflectionPrompt } from './prompts.js';
