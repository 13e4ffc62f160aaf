/**
 * Startup Configuration Validation
 *
 * Checks API keys against the configured LLM, embedding and search
 * providers before a command runs. This is a warning system: commands that
 * need no provider keep working.
 */

import chalk from 'chalk';
import { hasApiKey, getEnv, SETUP_INSTRUCTIONS } from './env.js';
import type { Config, SearchProviderName } from './schema.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether every required key is present */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Issues that will stop the command from working */
  errors: string[];
  /** Setup instructions for the errors */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip LLM and embedding checks */
  skipLLM?: boolean;
  /** Skip search provider checks */
  skipSearch?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Search providers that can run without a key.
 */
const KEYLESS_PROVIDERS: ReadonlySet<SearchProviderName> = new Set(['duckduckgo']);

function llmReachable(): boolean {
  return hasApiKey('openai') || Boolean(getEnv('OPENAI_BASE_URL'));
}

/**
 * Validate configuration at CLI startup.
 *
 * @example
 * const result = validateStartupConfig(loadConfig());
 * printStartupValidation(result);
 */
export function validateStartupConfig(
  config: Config,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipLLM = false, skipSearch = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  if (!skipLLM) {
    if (!llmReachable()) {
      errors.push('OpenAI API key not set (needed for planning, reflection and synthesis)');
      hints.push(SETUP_INSTRUCTIONS.openai);
    } else if (config.llm.embedding_provider === 'openai' && !hasApiKey('openai')) {
      warnings.push('Embeddings use the OpenAI-compatible endpoint without an API key');
    }
  }

  if (!skipSearch) {
    const usable = config.search.provider_priority.filter(
      (name) => KEYLESS_PROVIDERS.has(name) || (name !== 'duckduckgo' && hasApiKey(name))
    );

    for (const name of config.search.provider_priority) {
      if (!usable.includes(name) && name !== 'duckduckgo') {
        warnings.push(`Search provider "${name}" has no API key and will be skipped`);
      }
    }

    if (usable.length === 0) {
      errors.push('No configured search provider is usable');
      const first = config.search.provider_priority.find(
        (name): name is Exclude<SearchProviderName, 'duckduckgo'> => name !== 'duckduckgo'
      );
      if (first) hints.push(SETUP_INSTRUCTIONS[first]);
    }
  }

  return { valid: errors.length === 0, warnings, errors, hints };
}

/**
 * Print startup validation warnings/errors to the console.
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }
  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that talk to providers. Others run without any keys.
 */
export const COMMANDS_REQUIRING_PROVIDERS = ['research', 'resume'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  const needsProviders = COMMANDS_REQUIRING_PROVIDERS.includes(command);
  return { skipLLM: !needsProviders, skipSearch: !needsProviders };
}
