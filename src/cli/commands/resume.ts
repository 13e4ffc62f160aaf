/**
 * Resume Command
 *
 * Sends a planning command to a session waiting for plan review:
 *   delve resume <session> confirm-plan
 *   delve resume <session> skip-planning
 *   delve resume <session> enter-planning
 *
 * When the command starts the research, it runs in the foreground like
 * `delve research`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { openEngine } from '../runtime.js';
import { EventRenderer } from '../render.js';
import type { CommandContext } from '../types.js';
import { reportStatus } from './research.js';

export function createResumeCommand(getContext: () => CommandContext): Command {
  return new Command('resume')
    .description('Send a planning command to a session waiting for plan review')
    .argument('<session>', 'Session id')
    .argument('<command...>', 'Planning command, e.g. confirm-plan')
    .action(async (sessionId: string, words: string[]) => {
      const ctx = getContext();
      const command = words.join(' ');

      const engine = await openEngine(ctx);
      const { route } = await engine.resume(sessionId, command);

      if (!ctx.options.json) {
        const symbol = route.command ? chalk.green('✓') : chalk.yellow('?');
        ctx.log(`${symbol} ${route.feedback}`);
      }

      if (route.next === 'research_fan_out') {
        // The stream replays what the run emitted before we got here and
        // ends with Finalized, Failed or Cancelled
        const renderer = new EventRenderer(ctx);
        renderer.start('Researching...');
        try {
          for await (const event of engine.events(sessionId)) {
            renderer.render(event);
          }
        } finally {
          renderer.stop();
        }
      }

      reportStatus(ctx, await engine.waitForIdle(sessionId));
    });
}
