/**
 * Evidence compression
 *
 * Extractive tier: drop duplicates, then keep the highest-scoring units that
 * fit the token budget (original order preserved). Tiered mode adds an LLM
 * summary that keeps the [n] citation markers; if that call fails the
 * extractive result stands on its own.
 *
 * Units and summary share one budget: in tiered mode the units get what is
 * left after SUMMARY_SHARE is set aside, and the summary is cut to whatever
 * the kept units did not use.
 */

import type { LLMClient } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { CHARS_PER_TOKEN, estimateTokens, truncateToTokens } from '../utils/tokens.js';
import type { EvidenceUnit } from './types.js';

export type CompressionMode = 'extractive' | 'tiered';

export interface CompressOptions {
  mode: CompressionMode;
  tokenBudget: number;
  question: string;
  /** Required in tiered mode */
  llm?: LLMClient;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface CompressionResult {
  units: EvidenceUnit[];
  /** Abstractive summary (tiered mode only) */
  summary?: string;
  /** Estimated tokens of the kept units */
  tokens: number;
  duplicatesRemoved: number;
  droppedForBudget: number;
}

/** Units truncated below this many tokens are dropped instead */
const MIN_UNIT_TOKENS = 16;

/** Part of the budget held back for the tiered summary */
export const SUMMARY_SHARE = 0.25;

function unitPrefix(unit: EvidenceUnit): string {
  return `[${unit.citationIndex}] ${unit.title}: `;
}

export function unitTokens(unit: EvidenceUnit): number {
  return estimateTokens(unitPrefix(unit) + unit.snippet);
}

function normalizeSnippet(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Evidence rendered for prompts, one line per unit.
 */
export function formatEvidence(units: EvidenceUnit[]): string {
  return units.map((u) => unitPrefix(u) + u.snippet).join('\n');
}

export function dedupeEvidence(units: EvidenceUnit[]): EvidenceUnit[] {
  const seen = new Set<string>();
  return units.filter((unit) => {
    const key = `${unit.citationIndex}|${normalizeSnippet(unit.snippet)}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Keep the best units within budget, truncating the first one that does
 * not fit when enough room is left for it to stay useful.
 */
export function fitToBudget(units: EvidenceUnit[], tokenBudget: number): EvidenceUnit[] {
  const ranked = units
    .map((unit, position) => ({ unit, position }))
    .sort((a, b) => b.unit.score - a.unit.score || a.position - b.position);

  let remaining = tokenBudget;
  const kept: Array<{ unit: EvidenceUnit; position: number }> = [];
  for (const entry of ranked) {
    const cost = unitTokens(entry.unit);
    if (cost <= remaining) {
      kept.push(entry);
      remaining -= cost;
      continue;
    }
    const roomChars = remaining * CHARS_PER_TOKEN - unitPrefix(entry.unit).length;
    if (roomChars >= MIN_UNIT_TOKENS * CHARS_PER_TOKEN) {
      const snippet = truncateToTokens(entry.unit.snippet, Math.floor(roomChars / CHARS_PER_TOKEN));
      const truncated = { ...entry.unit, snippet };
      kept.push({ unit: truncated, position: entry.position });
      remaining -= unitTokens(truncated);
    }
  }

  return kept.sort((a, b) => a.position - b.position).map((entry) => entry.unit);
}

export function summaryPrompt(question: string, units: EvidenceUnit[]): string {
  return [
    'Compress the following research notes into a concise summary.',
    'You MUST keep every citation marker such as [1] next to the claim it supports.',
    'Do not drop factual claims and do not add new ones.',
    '',
    `Research question: ${question}`,
    '',
    'Notes:',
    formatEvidence(units),
  ].join('\n');
}

export async function compressEvidence(
  units: EvidenceUnit[],
  options: CompressOptions
): Promise<CompressionResult> {
  const logger = options.logger ?? silentLogger;
  const unique = dedupeEvidence(units);
  const summarize = options.mode === 'tiered' && options.llm !== undefined;
  const unitBudget = summarize
    ? options.tokenBudget - Math.floor(options.tokenBudget * SUMMARY_SHARE)
    : options.tokenBudget;
  const kept = fitToBudget(unique, unitBudget);
  const tokens = kept.reduce((sum, unit) => sum + unitTokens(unit), 0);

  const result: CompressionResult = {
    units: kept,
    tokens,
    duplicatesRemoved: units.length - unique.length,
    droppedForBudget: unique.length - kept.length,
  };

  if (summarize && options.llm && kept.length > 0) {
    try {
      const summary = await options.llm.generate(summaryPrompt(options.question, kept), {
        temperature: 0,
        signal: options.signal,
      });
      const trimmed = truncateToTokens(summary.trim(), options.tokenBudget - tokens);
      if (trimmed.length > 0) {
        result.summary = trimmed;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`compression: summary failed, keeping extractive evidence: ${message}`);
    }
  }

  return result;
}
