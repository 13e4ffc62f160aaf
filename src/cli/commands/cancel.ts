/**
 * Cancel Command
 *
 * Cancels a stored session that has not finished, typically one left
 * waiting for plan review:
 *   delve cancel <session>
 *
 * A run in progress is cancelled with Ctrl+C in its own terminal.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { cancelStoredSession } from '../../engine/session-store.js';
import { openSessionStore } from '../runtime.js';
import type { CommandContext } from '../types.js';

export function createCancelCommand(getContext: () => CommandContext): Command {
  return new Command('cancel')
    .description('Cancel a session that has not finished')
    .argument('<session>', 'Session id')
    .action(async (sessionId: string) => {
      const ctx = getContext();
      const snapshot = await cancelStoredSession(openSessionStore(), sessionId);

      if (ctx.options.json) {
        console.log(JSON.stringify({ sessionId, state: snapshot.state }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Cancelled session ${chalk.cyan(sessionId)}`);
    });
}
