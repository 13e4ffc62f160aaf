/**
 * Stages Command
 *
 * Prints the engine's state machine:
 *   delve stages
 *   delve stages --json
 */

import { Command } from 'commander';
import { STAGE_REGISTRY } from '../../engine/stage-registry.js';
import { formatTable, type Column } from '../../utils/table.js';
import type { CommandContext } from '../types.js';

const COLUMNS: Column[] = [
  { header: 'State', key: 'state' },
  { header: 'Description', key: 'description', maxWidth: 56 },
  { header: 'Writes', key: 'writes', maxWidth: 40 },
  { header: 'Next', key: 'next' },
];

export function createStagesCommand(getContext: () => CommandContext): Command {
  return new Command('stages').description('Show the research state machine').action(() => {
    const ctx = getContext();

    if (ctx.options.json) {
      console.log(JSON.stringify(STAGE_REGISTRY, null, 2));
      return;
    }

    const rows = STAGE_REGISTRY.map((stage) => ({
      state: stage.state,
      description: stage.description,
      writes: stage.writes.join(', '),
      next: stage.next.join(' | '),
    }));
    ctx.log(formatTable(COLUMNS, rows));
  });
}
