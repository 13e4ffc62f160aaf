/**
 * Plan bookkeeping
 *
 * Steps are never removed; they only change status or get appended. Every
 * helper returns a new array.
 */

import type { PlanStep, PlanStepStatus } from './types.js';

function stepNumber(step: PlanStep): number {
  const match = /^step-(\d+)$/.exec(step.id);
  return match ? Number(match[1]) : 0;
}

export function nextStepNumber(plan: PlanStep[]): number {
  return plan.reduce((max, step) => Math.max(max, stepNumber(step)), 0) + 1;
}

export function createSteps(queries: string[], firstNumber = 1): PlanStep[] {
  return queries.map((query, i) => ({
    id: `step-${firstNumber + i}`,
    title: `Research: ${query}`,
    query,
    tool: 'web_search',
    status: 'pending',
  }));
}

export function appendSteps(plan: PlanStep[], queries: string[]): PlanStep[] {
  return [...plan, ...createSteps(queries, nextStepNumber(plan))];
}

/**
 * Set the status of the most recent step for each query. Steps for other
 * queries are untouched.
 */
export function markSteps(plan: PlanStep[], queries: string[], status: PlanStepStatus): PlanStep[] {
  const wanted = new Set(queries.map((q) => q.toLowerCase()));
  const latest = new Map<string, number>();
  plan.forEach((step, i) => {
    const key = step.query.toLowerCase();
    if (wanted.has(key)) {
      latest.set(key, i);
    }
  });
  const targets = new Set(latest.values());
  return plan.map((step, i) => (targets.has(i) ? { ...step, status } : step));
}

export function stepForQuery(plan: PlanStep[], query: string): PlanStep | undefined {
  const key = query.toLowerCase();
  return [...plan].reverse().find((step) => step.query.toLowerCase() === key);
}

export function formatPlan(plan: PlanStep[]): string {
  return plan.map((step) => `${step.id} [${step.status}] ${step.query}`).join('\n');
}
