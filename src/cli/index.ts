#!/usr/bin/env node
/**
 * Delve CLI Entry Point
 *
 * This is the main entry point for the `delve` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createResearchCommand } from './commands/research.js';
import { createResumeCommand } from './commands/resume.js';
import { createCancelCommand } from './commands/cancel.js';
import { createStatusCommand } from './commands/status.js';
import { createSessionsCommand } from './commands/sessions.js';
import { createEvidenceCommand } from './commands/evidence.js';
import { createStagesCommand } from './commands/stages.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  loadConfig,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

/**
 * Version from package.json, two levels up from both src/cli and dist/cli.
 */
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

// Create the root program
const program = new Command();

program
  .name('delve')
  .description('Research questions on the web and answer them with cited sources')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('delve research "What is quantum computing?"')}   Research a question
  ${chalk.cyan('delve research "..." --confirm')}                 Review the plan first
  ${chalk.cyan('delve resume <session> confirm-plan')}            Continue a reviewed plan
  ${chalk.cyan('delve sessions')}                                 List research sessions
  ${chalk.cyan('delve evidence query "qubits"')}                  Search stored evidence
  ${chalk.cyan('delve config set research.max_research_loops 3')} Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// RESEARCH
// ============================================================================

program.addCommand(createResearchCommand(getContext));
program.addCommand(createResumeCommand(getContext));
program.addCommand(createCancelCommand(getContext));

// ============================================================================
// INSPECTION & MAINTENANCE
// ============================================================================

program.addCommand(createStatusCommand(getContext));
program.addCommand(createSessionsCommand(getContext));
program.addCommand(createEvidenceCommand(getContext));
program.addCommand(createStagesCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: delve --help  to see available commands');
});

// Check API keys before commands that call providers
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  if (validationOptions.skipLLM && validationOptions.skipSearch) {
    return;
  }

  const result = validateStartupConfig(loadConfig(), validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every command's own handling
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
