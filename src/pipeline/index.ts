/**
 * Pipeline Module
 *
 * Per-round evidence processing: citation assignment, validation,
 * compression and final synthesis.
 */

export type { EvidenceUnit, SourceRef } from './types.js';
export { CitationRegistry, canonicalUrl } from './citations.js';
export {
  validateEvidence,
  keywordsOf,
  claimCheckPrompt,
  type ValidateOptions,
  type ValidationResult,
  type ValidationMode,
} from './validate.js';
export {
  compressEvidence,
  dedupeEvidence,
  fitToBudget,
  formatEvidence,
  unitTokens,
  type CompressOptions,
  type CompressionResult,
  type CompressionMode,
} from './compress.js';
export {
  synthesizeAnswer,
  renderAnswer,
  citedIds,
  answerPrompt,
  NO_EVIDENCE_CAVEAT,
  type SynthesisInput,
  type SynthesizedAnswer,
} from './synthesize.js';
