/**
 * Evidence flowing through a research round
 */

/**
 * One search result after citation assignment.
 */
export interface EvidenceUnit {
  sourceUrl: string;
  title: string;
  snippet: string;
  /** Provider score (0-1); 0 when the provider reports none */
  score: number;
  /** Citation id from the session's source registry */
  citationIndex: number;
  /** Query that produced this result */
  query: string;
}

export interface SourceRef {
  /** Stable 1-based citation id, rendered as [id] */
  id: number;
  url: string;
  title: string;
}
