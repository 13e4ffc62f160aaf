/**
 * Research output
 *
 * Turns engine events into terminal output:
 * - Interactive: one ora spinner, each finished stage persisted as a line
 * - JSON: NDJSON event stream, one event per line
 * - Text: plain lines for non-TTY output
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { PlanStep, PlanStepStatus } from '../planning/types.js';
import type { ResearchEvent, SessionOutcome, SessionStatus } from '../engine/types.js';
import type { CommandContext } from './types.js';

const STEP_MARKERS: Record<PlanStepStatus, string> = {
  pending: '○',
  in_progress: '◐',
  done: '●',
  blocked: '✗',
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One-line description of an event.
 */
export function describeEvent(event: ResearchEvent): string {
  switch (event.type) {
    case 'PlanningUpdated':
      return event.feedback ?? `Plan has ${plural(event.plan.length, 'step')}`;
    case 'SearchBatchCompleted': {
      const answered = event.queries.filter((q) => q.status === 'ok').length;
      return `Round ${event.round}: ${answered}/${event.queries.length} queries answered, ${plural(event.newSources.length, 'new source')}`;
    }
    case 'ValidationCompleted':
      return `Validation kept ${event.kept}, rejected ${event.rejected}`;
    case 'CompressionCompleted': {
      const parts = [`Compressed to ${plural(event.units, 'unit')} (~${event.tokens} tokens)`];
      if (event.duplicatesRemoved > 0) parts.push(`${plural(event.duplicatesRemoved, 'duplicate')} removed`);
      if (event.droppedForBudget > 0) parts.push(`${event.droppedForBudget} over budget`);
      return parts.join(', ');
    }
    case 'EvidenceIndexed': {
      const parts = [`Indexed ${plural(event.written, 'chunk')}`];
      if (event.pruned > 0) parts.push(`${event.pruned} pruned`);
      if (event.failures.length > 0) parts.push(plural(event.failures.length, 'write failure'));
      return parts.join(', ');
    }
    case 'ReflectionCompleted':
      return event.isSufficient
        ? `Round ${event.round}: evidence is sufficient`
        : `Round ${event.round}: ${plural(event.followUpQueries.length, 'follow-up query')} for "${event.knowledgeGap}"`;
    case 'Finalized':
      return event.outcome === 'answered' ? 'Answer ready' : 'No usable evidence found';
    case 'Failed':
      return `Research failed: ${event.reason}`;
    case 'Cancelled':
      return 'Research cancelled';
  }
}

export function formatPlan(plan: PlanStep[]): string[] {
  return plan.map((step) => {
    const marker = STEP_MARKERS[step.status];
    const colored = step.status === 'done' ? chalk.green(marker) : step.status === 'blocked' ? chalk.red(marker) : marker;
    return `  ${colored} ${chalk.dim(step.id)} ${step.query}`;
  });
}

function describeOutcome(outcome: SessionOutcome | null): string {
  if (!outcome) return 'none yet';
  switch (outcome.kind) {
    case 'answered':
      return `answered with ${plural(outcome.citations.length, 'citation')}`;
    case 'no_evidence':
      return 'no evidence';
    case 'failed':
      return `failed: ${outcome.reason}`;
    case 'cancelled':
      return 'cancelled';
  }
}

export function formatStatus(status: SessionStatus): string[] {
  const lines = [
    `${chalk.bold('Session:')}  ${status.sessionId}`,
    `${chalk.bold('Question:')} ${status.question}`,
    `${chalk.bold('State:')}    ${status.state}${status.planningStatus ? chalk.dim(` (${status.planningStatus})`) : ''}`,
    `${chalk.bold('Rounds:')}   ${status.researchLoopCount}`,
    `${chalk.bold('Evidence:')} ${plural(status.evidenceCount, 'unit')}`,
    `${chalk.bold('Outcome:')}  ${describeOutcome(status.outcome)}`,
  ];
  if (status.plan.length > 0) {
    lines.push('', chalk.bold('Plan:'), ...formatPlan(status.plan));
  }
  return lines;
}

/**
 * Renders events of one research run.
 */
export class EventRenderer {
  private spinner: Ora | null = null;

  constructor(
    private readonly ctx: CommandContext,
    private readonly interactive: boolean = Boolean(process.stdout.isTTY)
  ) {}

  /** Bound listener for engine.subscribe */
  readonly listener = (event: ResearchEvent): void => this.render(event);

  start(text: string): void {
    if (this.ctx.options.json) return;
    if (this.interactive) {
      this.spinner = ora(text).start();
    } else {
      this.ctx.log(text);
    }
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  render(event: ResearchEvent): void {
    if (this.ctx.options.json) {
      console.log(JSON.stringify(event));
      return;
    }

    const text = describeEvent(event);
    if (event.type === 'SearchBatchCompleted' && this.ctx.options.verbose) {
      for (const summary of event.queries) {
        this.ctx.debug(`${summary.query}: ${summary.status} via ${summary.provider ?? 'none'} (${summary.resultCount} results)`);
      }
    }

    const spinner = this.spinner;
    if (!spinner) {
      const symbol = event.type === 'Failed' ? chalk.red('✗') : chalk.green('✓');
      this.ctx.log(`${symbol} ${text}`);
      return;
    }

    switch (event.type) {
      case 'Failed':
        spinner.fail(text);
        this.spinner = null;
        return;
      case 'Cancelled':
      case 'Finalized':
        if (event.type === 'Finalized' && event.outcome === 'answered') {
          spinner.succeed(text);
        } else {
          spinner.warn(text);
        }
        this.spinner = null;
        return;
      default:
        spinner.succeed(text);
        if (!(event.type === 'PlanningUpdated' && event.planningStatus === 'awaiting_confirmation')) {
          spinner.start('Researching...');
        }
    }
  }
}
