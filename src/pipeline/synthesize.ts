/**
 * Final answer synthesis
 *
 * Writes the cited answer from the compressed evidence. Without evidence an
 * answer is still attempted and carries a caveat.
 */

import type { LLMClient } from '../providers/types.js';
import { formatEvidence } from './compress.js';
import type { EvidenceUnit, SourceRef } from './types.js';

export interface SynthesisInput {
  question: string;
  units: EvidenceUnit[];
  summary?: string;
  /** All sources gathered in the session */
  sources: SourceRef[];
  llm: LLMClient;
  signal?: AbortSignal;
}

export interface SynthesizedAnswer {
  text: string;
  /** Sources cited in the answer, by id */
  citations: SourceRef[];
  outcome: 'answered' | 'no_evidence';
}

export const NO_EVIDENCE_CAVEAT =
  'Note: no supporting evidence was found, so this answer is not backed by sources.';

const CITATION_MARKER = /\[(\d+)\]/g;

export function citedIds(text: string): number[] {
  const ids = new Set<number>();
  for (const match of text.matchAll(CITATION_MARKER)) {
    ids.add(Number(match[1]));
  }
  return [...ids].sort((a, b) => a - b);
}

export function answerPrompt(question: string, units: EvidenceUnit[], summary?: string): string {
  if (units.length === 0) {
    return [
      `Answer the question as well as you can: ${question}`,
      'No research evidence is available. Say clearly where you are uncertain.',
    ].join('\n');
  }
  return [
    `Answer the research question using only the evidence below: ${question}`,
    'Cite sources inline with their markers, e.g. [1] or [2][3]. Do not invent markers.',
    '',
    ...(summary ? ['Summary of findings:', summary, ''] : []),
    'Evidence:',
    formatEvidence(units),
  ].join('\n');
}

export async function synthesizeAnswer(input: SynthesisInput): Promise<SynthesizedAnswer> {
  const raw = await input.llm.generate(answerPrompt(input.question, input.units, input.summary), {
    signal: input.signal,
  });
  const text = raw.trim();

  if (input.units.length === 0) {
    return { text: `${NO_EVIDENCE_CAVEAT}\n\n${text}`, citations: [], outcome: 'no_evidence' };
  }

  const byId = new Map(input.sources.map((source) => [source.id, source]));
  const cited = citedIds(text).flatMap((id) => {
    const source = byId.get(id);
    return source ? [source] : [];
  });
  // Uncited answers still list the evidence they were written from
  const citations =
    cited.length > 0
      ? cited
      : [...new Set(input.units.map((u) => u.citationIndex))].flatMap((id) => {
          const source = byId.get(id);
          return source ? [source] : [];
        });

  return { text, citations, outcome: 'answered' };
}

export function renderAnswer(answer: SynthesizedAnswer): string {
  if (answer.citations.length === 0) {
    return answer.text;
  }
  const sources = answer.citations.map((s) => `[${s.id}] ${s.title} - ${s.url}`);
  return `${answer.text}\n\nSources:\n${sources.join('\n')}`;
}
