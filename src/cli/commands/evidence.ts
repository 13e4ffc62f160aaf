/**
 * Evidence Command
 *
 * Inspects and maintains the evidence index shared by all sessions:
 *   delve evidence stats                      - Chunk counts per backend
 *   delve evidence query "qubit decoherence"  - Similar chunks
 *   delve evidence prune <id...>              - Remove chunks by id
 *   delve evidence prune --below 0.3          - Remove low-scored chunks
 *   delve evidence rebuild                    - Reload memory from SQLite
 *   delve evidence compact                    - Purge soft-pruned chunks
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ValidationError } from '../../errors/index.js';
import type { PruneTarget } from '../../evidence/types.js';
import { formatTable, type Column } from '../../utils/table.js';
import { openIndex } from '../runtime.js';
import type { CommandContext } from '../types.js';
import { EvidencePruneOptionsSchema, EvidenceQueryOptionsSchema, parseInput } from '../validation.js';

const HIT_COLUMNS: Column[] = [
  { header: 'Similarity', key: 'similarity', align: 'right' },
  { header: 'Subgoal', key: 'subgoal' },
  { header: 'Source', key: 'source', maxWidth: 40 },
  { header: 'Text', key: 'text', maxWidth: 60 },
];

function createStatsCommand(getContext: () => CommandContext): Command {
  return new Command('stats').description('Show chunk counts per backend').action(async () => {
    const ctx = getContext();
    const stats = (await openIndex(ctx)).stats();

    if (ctx.options.json) {
      console.log(JSON.stringify(stats, null, 2));
      return;
    }
    ctx.log(chalk.bold('Evidence index'));
    ctx.log(`  ${chalk.cyan('memory:')} ${stats.memory.live} live, ${stats.memory.pruned} pruned`);
    ctx.log(`  ${chalk.cyan('sqlite:')} ${stats.sqlite.live} live, ${stats.sqlite.pruned} pruned`);
    ctx.log(
      chalk.dim(
        `  reads from ${stats.readBackend}, dual write ${stats.dualWrite ? 'on' : 'off'}, ${stats.prunePolicy} prune`
      )
    );
  });
}

function createQueryCommand(getContext: () => CommandContext): Command {
  return new Command('query')
    .description('Find indexed chunks similar to a text')
    .argument('<text>', 'Text to search for')
    .option('-k, --top-k <n>', 'Number of chunks (default 5)')
    .option('--min-score <score>', 'Minimum cosine similarity (default 0)')
    .option('--subgoal <id>', 'Only chunks of this plan step')
    .action(async (text: string, options: { topK?: string; minScore?: string; subgoal?: string }) => {
      const ctx = getContext();
      const { topK, minScore, subgoal } = parseInput(EvidenceQueryOptionsSchema, options);
      const index = await openIndex(ctx, { withEmbedder: true });
      const hits = await index.queryText(text, { topK, minScore, subgoalId: subgoal });

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            hits.map((hit) => ({
              id: hit.chunk.id,
              similarity: hit.similarity,
              subgoalId: hit.chunk.subgoalId,
              sourceUrl: hit.chunk.sourceUrl,
              text: hit.chunk.text,
            })),
            null,
            2
          )
        );
        return;
      }
      if (hits.length === 0) {
        ctx.log(chalk.yellow('No matching evidence.'));
        return;
      }
      const rows = hits.map((hit) => ({
        similarity: hit.similarity.toFixed(3),
        subgoal: hit.chunk.subgoalId,
        source: hit.chunk.sourceUrl ?? '',
        text: hit.chunk.text.replace(/\s+/g, ' '),
      }));
      ctx.log(formatTable(HIT_COLUMNS, rows));
    });
}

function createPruneCommand(getContext: () => CommandContext): Command {
  return new Command('prune')
    .description('Remove chunks from retrieval by id, subgoal or score')
    .argument('[ids...]', 'Chunk ids')
    .option('--subgoal <id>', 'Prune every chunk of this plan step')
    .option('--below <score>', 'Prune chunks whose source score is below this')
    .action(async (ids: string[], options: { subgoal?: string; below?: string }) => {
      const ctx = getContext();
      const target = pruneTarget(ids, options);
      const index = await openIndex(ctx);
      const result = await index.prune(target);

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...result, policy: index.prunePolicy }, null, 2));
        return;
      }
      ctx.log(`${chalk.green('✓')} Pruned ${result.pruned.length} chunk(s) (${index.prunePolicy})`);
      if (result.alreadyPruned.length > 0) {
        ctx.log(chalk.dim(`  ${result.alreadyPruned.length} already pruned or unknown`));
      }
    });
}

/**
 * Ids as given, or a predicate from --subgoal and --below.
 *
 * @throws ValidationError when both or neither are given
 */
export function pruneTarget(ids: string[], options: { subgoal?: string; below?: string }): PruneTarget {
  const { subgoal, below } = parseInput(EvidencePruneOptionsSchema, { ...options, ids });
  const byFilter = subgoal !== undefined || below !== undefined;
  if ((ids.length > 0) === byFilter) {
    throw new ValidationError('Select chunks either by id or with --subgoal/--below', [
      'Pass chunk ids, or filter with --subgoal and/or --below',
    ]);
  }
  if (below !== undefined) {
    return (chunk) => chunk.score < below && (subgoal === undefined || chunk.subgoalId === subgoal);
  }
  if (subgoal !== undefined) {
    return (chunk) => chunk.subgoalId === subgoal;
  }
  return ids;
}

function createRebuildCommand(getContext: () => CommandContext): Command {
  return new Command('rebuild')
    .description('Reload the in-memory backend from SQLite')
    .action(async () => {
      const ctx = getContext();
      // Opening the index already rebuilds once; a second run reports the count
      const loaded = await (await openIndex(ctx)).rebuild();
      if (ctx.options.json) {
        console.log(JSON.stringify({ loaded }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Loaded ${loaded} live chunk(s) into memory`);
    });
}

function createCompactCommand(getContext: () => CommandContext): Command {
  return new Command('compact')
    .description('Delete soft-pruned chunks for good')
    .action(async () => {
      const ctx = getContext();
      const removed = await (await openIndex(ctx)).compact();
      if (ctx.options.json) {
        console.log(JSON.stringify({ removed }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Removed ${removed} pruned chunk(s)`);
    });
}

export function createEvidenceCommand(getContext: () => CommandContext): Command {
  return new Command('evidence')
    .description('Inspect and maintain the evidence index')
    .addCommand(createStatsCommand(getContext))
    .addCommand(createQueryCommand(getContext))
    .addCommand(createPruneCommand(getContext))
    .addCommand(createRebuildCommand(getContext))
    .addCommand(createCompactCommand(getContext));
}
