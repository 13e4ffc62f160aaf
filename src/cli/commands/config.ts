/**
 * Config Command
 *
 * Reads and edits ~/.delve/config.toml:
 *   delve config list [section]      - Every key with its value and meaning
 *   delve config get <key>           - One value
 *   delve config set <key> <value>   - Change a value (lists take a,b,c)
 *   delve config path                - Config file location
 *   delve config reset --force       - Restore the default file
 *
 * Keys come from the config schema, so new settings show up here without
 * changes to this file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { describeConfigKeys, findConfigKey, type ConfigKeyInfo } from '../../config/keys.js';
import { getConfigValue, loadConfig, resetConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import type { CommandContext } from '../types.js';

const KEY_COLUMNS: Column[] = [
  { header: 'Key', key: 'key' },
  { header: 'Value', key: 'value', maxWidth: 40 },
  { header: 'Description', key: 'description', maxWidth: 56 },
];

/**
 * Value as typed on the command line: lists comma-separated.
 */
export function formatValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(',');
  if (typeof value === 'string') return value;
  return String(value);
}

function isDefault(info: ConfigKeyInfo, value: unknown): boolean {
  return formatValue(value) === formatValue(info.defaultValue);
}

function requireKey(key: string): ConfigKeyInfo {
  const info = findConfigKey(key);
  if (!info) {
    throw new ConfigError(`Unknown config key: '${key}'`, 'Run: delve config list  to see available keys');
  }
  return info;
}

function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List every key with its value and description')
    .argument('[section]', 'Only keys of this section, e.g. search')
    .action((section: string | undefined) => {
      const ctx = getContext();
      const config = loadConfig();
      const all = describeConfigKeys();
      const keys = section ? all.filter((info) => info.section === section) : all;

      if (keys.length === 0) {
        const sections = [...new Set(all.map((info) => info.section))].join(', ');
        throw new ConfigError(`Unknown config section: '${section ?? ''}'`, `Sections: ${sections}`);
      }

      const entries = keys.map((info) => ({ info, value: getConfigValue(info.key, config) }));

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            entries.map(({ info, value }) => ({
              key: info.key,
              value,
              default: info.defaultValue,
              description: info.description,
            })),
            null,
            2
          )
        );
        return;
      }

      const rows = entries.map(({ info, value }) => ({
        key: info.key,
        value: isDefault(info, value) ? formatValue(value) : `${formatValue(value)} *`,
        description: info.description,
      }));
      ctx.log(formatTable(KEY_COLUMNS, rows));
      if (entries.some(({ info, value }) => !isDefault(info, value))) {
        ctx.log(chalk.dim('* changed from the default'));
      }
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });
}

function createGetCommand(getContext: () => CommandContext): Command {
  return new Command('get')
    .description('Print one value (e.g. delve config get llm.model)')
    .argument('<key>', 'Dot-notation key')
    .action((key: string) => {
      const ctx = getContext();
      const info = requireKey(key);
      const value = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value, default: info.defaultValue }));
        return;
      }
      ctx.log(formatValue(value));
      ctx.debug(`${info.description} (default: ${formatValue(info.defaultValue)})`);
    });
}

function createSetCommand(getContext: () => CommandContext): Command {
  return new Command('set')
    .description('Change a value (e.g. delve config set research.max_research_loops 3)')
    .argument('<key>', 'Dot-notation key')
    .argument('<value>', 'New value; lists take comma-separated items')
    .action((key: string, value: string) => {
      const ctx = getContext();
      requireKey(key);
      const previous = getConfigValue(key);
      setConfigValue(key, value);
      const updated = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, previous, value: updated }));
        return;
      }
      ctx.log(
        `${chalk.green('✓')} ${chalk.cyan(key)}: ${formatValue(previous)} → ${chalk.yellow(formatValue(updated))}`
      );
    });
}

function createPathCommand(getContext: () => CommandContext): Command {
  return new Command('path').description('Show the config file location').action(() => {
    const ctx = getContext();
    if (ctx.options.json) {
      console.log(JSON.stringify({ path: getConfigPath() }));
      return;
    }
    ctx.log(getConfigPath());
  });
}

function createResetCommand(getContext: () => CommandContext): Command {
  return new Command('reset')
    .description('Restore the default config file')
    .option('-f, --force', 'Overwrite without asking')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.log(chalk.yellow(`This replaces ${getConfigPath()} with the defaults.`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      resetConfig();
      if (ctx.options.json) {
        console.log(JSON.stringify({ reset: true, path: getConfigPath() }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Restored the default configuration`);
    });
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  return new Command('config')
    .description('Read and change settings')
    .addCommand(createListCommand(getContext))
    .addCommand(createGetCommand(getContext))
    .addCommand(createSetCommand(getContext))
    .addCommand(createPathCommand(getContext))
    .addCommand(createResetCommand(getContext));
}
