/**
 * Research Command
 *
 * Runs a research session in the foreground:
 *   delve research "What is quantum computing?"
 *   delve research "..." --confirm       - Stop after planning for review
 *   delve research "..." --loops 3       - Allow up to three rounds
 *
 * Ctrl+C cancels the session; evidence already indexed stays.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ResearchConfig } from '../../engine/config.js';
import type { SessionStatus } from '../../engine/types.js';
import { openEngine } from '../runtime.js';
import { EventRenderer, formatPlan } from '../render.js';
import type { CommandContext } from '../types.js';
import {
  parseInput,
  ResearchArgsSchema,
  ResearchOptionsSchema,
  type ResearchOptionsInput,
} from '../validation.js';

/**
 * Session overrides from validated flags.
 *
 * @throws ValidationError for out-of-range or conflicting flags
 */
export function overridesFrom(options: ResearchOptionsInput): Partial<ResearchConfig> {
  const { loops, queries, confirm, auto } = parseInput(ResearchOptionsSchema, options);
  const overrides: Partial<ResearchConfig> = {};
  if (loops !== undefined) overrides.maxResearchLoops = loops;
  if (queries !== undefined) {
    overrides.initialQueryCount = queries;
    overrides.maxFollowUps = queries;
  }
  if (confirm) overrides.requirePlanningConfirmation = true;
  if (auto) overrides.requirePlanningConfirmation = false;
  return overrides;
}

/**
 * Print the end state of a run: the answer, the plan awaiting review, or
 * the reason it stopped.
 */
export function reportStatus(ctx: CommandContext, status: SessionStatus): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  const outcome = status.outcome;
  if (status.state === 'planning_wait') {
    ctx.log('');
    ctx.log(chalk.bold('Research plan:'));
    for (const line of formatPlan(status.plan)) {
      ctx.log(line);
    }
    ctx.log('');
    ctx.log(chalk.dim('Continue with:'));
    ctx.log(`  ${chalk.cyan(`delve resume ${status.sessionId} confirm-plan`)}`);
    return;
  }

  if (outcome && (outcome.kind === 'answered' || outcome.kind === 'no_evidence')) {
    ctx.log('');
    ctx.log(outcome.answer);
    return;
  }

  if (outcome?.kind === 'failed') {
    process.exitCode = 1;
  }
  ctx.log(chalk.dim(`Session ${status.sessionId} ended as ${status.state}`));
}

export function createResearchCommand(getContext: () => CommandContext): Command {
  return new Command('research')
    .description('Research a question on the web and answer with citations')
    .argument('<question>', 'Question to research')
    .option('-l, --loops <n>', 'Maximum research rounds')
    .option('-q, --queries <n>', 'Search queries per round')
    .option('--confirm', 'Stop after planning so the plan can be reviewed')
    .option('--auto', 'Search without waiting for plan confirmation')
    .action(async (rawQuestion: string, options: ResearchOptionsInput) => {
      const ctx = getContext();
      const { question } = parseInput(ResearchArgsSchema, { question: rawQuestion });
      const overrides = overridesFrom(options);

      const engine = await openEngine(ctx);
      const { sessionId, idle } = engine.start(question, overrides);
      ctx.debug(`Session ${sessionId}`);

      const renderer = new EventRenderer(ctx);
      const unsubscribe = engine.subscribe(sessionId, renderer.listener);
      renderer.start('Planning search queries...');

      const onInterrupt = (): void => {
        renderer.stop();
        ctx.warn('Cancelling research...');
        engine.cancel(sessionId).catch((error: unknown) => {
          ctx.debug(`cancel: ${error instanceof Error ? error.message : String(error)}`);
        });
      };
      process.once('SIGINT', onInterrupt);

      try {
        const status = await idle;
        reportStatus(ctx, status);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        unsubscribe();
        renderer.stop();
      }
    });
}
