/**
 * Status Command
 *
 * Displays storage statistics and provider setup, or one session:
 *   delve status             - Show system status
 *   delve status <session>   - Show a session's state, plan and answer
 *   delve status --json      - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { getConfigPath, getDbPath } from '../../config/paths.js';
import { hasApiKey, type KeyedService } from '../../config/env.js';
import { runMigrations } from '../../database/migrate.js';
import { getDatabase } from '../../database/operations.js';
import { fromSnapshot, sessionStatus } from '../../engine/snapshot.js';
import { SessionNotFoundError } from '../../errors/index.js';
import { openSessionStore } from '../runtime.js';
import { formatStatus } from '../render.js';
import type { CommandContext } from '../types.js';

const KEYED_SERVICES: KeyedService[] = ['openai', 'tavily', 'brave'];

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

async function showSession(ctx: CommandContext, sessionId: string): Promise<void> {
  const snapshot = await openSessionStore().load(sessionId);
  if (!snapshot) {
    throw new SessionNotFoundError(sessionId);
  }
  const status = sessionStatus(fromSnapshot(snapshot));

  if (ctx.options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  ctx.log(formatStatus(status).join('\n'));
  const outcome = status.outcome;
  if (outcome && (outcome.kind === 'answered' || outcome.kind === 'no_evidence')) {
    ctx.log('');
    ctx.log(outcome.answer);
  }
}

function showSystem(ctx: CommandContext): void {
  runMigrations();
  const stats = getDatabase().getStorageStats();
  const config = loadConfig();
  const keys = Object.fromEntries(KEYED_SERVICES.map((service) => [service, hasApiKey(service)]));
  const dbPath = getDbPath();
  const configPath = getConfigPath();

  ctx.debug(`Sessions: ${stats.sessionCount}, Chunks: ${stats.liveChunks}`);

  if (ctx.options.json) {
    console.log(
      JSON.stringify(
        {
          sessions: stats.sessionCount,
          evidence: { live: stats.liveChunks, pruned: stats.prunedChunks },
          database: { path: dbPath, size: stats.databaseSize, sizeFormatted: formatBytes(stats.databaseSize) },
          llm: { model: config.llm.model, embeddings: config.llm.embedding_provider },
          search: { providers: config.search.provider_priority },
          keys,
          config: { path: configPath },
        },
        null,
        2
      )
    );
    return;
  }

  const lines: string[] = [];
  lines.push(chalk.bold('Delve Status'));
  lines.push(chalk.dim('─'.repeat(35)));

  lines.push(`${chalk.cyan('Sessions:')}     ${stats.sessionCount.toLocaleString()}`);
  lines.push(
    `${chalk.cyan('Evidence:')}     ${stats.liveChunks.toLocaleString()} live, ${stats.prunedChunks.toLocaleString()} pruned`
  );
  lines.push(`${chalk.cyan('Database:')}     ${formatBytes(stats.databaseSize)} (${formatPath(dbPath)})`);

  lines.push('');
  lines.push(`${chalk.cyan('Model:')}        ${config.llm.model}`);
  lines.push(`${chalk.cyan('Embeddings:')}   ${config.llm.embedding_provider}`);
  lines.push(`${chalk.cyan('Search:')}       ${config.search.provider_priority.join(' → ')}`);
  lines.push(
    `${chalk.cyan('API keys:')}     ${KEYED_SERVICES.map((service) => `${service} ${keys[service] ? chalk.green('✓') : chalk.dim('✗')}`).join('  ')}`
  );
  lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

  if (stats.sessionCount === 0) {
    lines.push('');
    lines.push(chalk.yellow('No research sessions yet.'));
    lines.push(`Run ${chalk.cyan('delve research "<question>"')} to get started.`);
  }

  ctx.log(lines.join('\n'));
}

export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show storage statistics, or the state of one session')
    .argument('[session]', 'Session id')
    .action(async (sessionId: string | undefined) => {
      const ctx = getContext();
      if (sessionId) {
        await showSession(ctx, sessionId);
      } else {
        showSystem(ctx);
      }
    });
}
