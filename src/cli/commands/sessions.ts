/**
 * Sessions Command
 *
 * Lists stored research sessions, most recently updated first:
 *   delve sessions
 *   delve sessions --limit 5
 *   delve sessions --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatTable, type Column } from '../../utils/table.js';
import { openSessionStore } from '../runtime.js';
import type { CommandContext } from '../types.js';
import { parseInput, SessionsOptionsSchema } from '../validation.js';

/**
 * Format a timestamp as relative time (e.g., "2 hours ago")
 */
export function formatRelativeTime(isoString: string, now: Date = new Date()): string {
  const date = new Date(isoString);
  const diffSec = Math.floor((now.getTime() - date.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'Just now';
  if (diffMin < 60) return `${diffMin} minute${diffMin === 1 ? '' : 's'} ago`;
  if (diffHour < 24) return `${diffHour} hour${diffHour === 1 ? '' : 's'} ago`;
  if (diffDay < 7) return `${diffDay} day${diffDay === 1 ? '' : 's'} ago`;

  return date.toLocaleDateString();
}

const COLUMNS: Column[] = [
  { header: 'Session', key: 'sessionId' },
  { header: 'Question', key: 'question', maxWidth: 48 },
  { header: 'State', key: 'state' },
  { header: 'Updated', key: 'updated', align: 'right' },
];

export function createSessionsCommand(getContext: () => CommandContext): Command {
  return new Command('sessions')
    .description('List research sessions')
    .option('-n, --limit <n>', 'Number of sessions to show')
    .action(async (options: { limit?: string }) => {
      const ctx = getContext();
      const { limit } = parseInput(SessionsOptionsSchema, options);
      const sessions = await openSessionStore().list(limit);
      ctx.debug(`Found ${sessions.length} session(s)`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: sessions.length, sessions }, null, 2));
        return;
      }

      if (sessions.length === 0) {
        ctx.log(chalk.yellow('No research sessions yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('delve research "What is quantum computing?"')}`);
        return;
      }

      const rows = sessions.map((session) => ({
        sessionId: session.sessionId,
        question: session.question,
        state: session.planningStatus === 'awaiting_confirmation' ? chalk.yellow(session.state) : session.state,
        updated: formatRelativeTime(session.updatedAt),
      }));
      ctx.log(formatTable(COLUMNS, rows));
    });
}
