import { RelevanceResult } from '../../index/interfaces/index.interface';

/**
 * Answer to a single-term query
 */
export interface QueryResult {
  /** Normalized (trimmed, lowercased) term */
  term: string;

  /** Number of indexed documents containing the term */
  count: number;

  /** Matching documents, best first */
  hits: RelevanceResult[];
}
