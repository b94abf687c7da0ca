/**
 * Term counts for one document, as produced by the map phase.
 */
export interface DocumentTerms {
  /** term -> occurrences in the document; every count is at least 1 */
  frequencies: Map<string, number>;

  /** Sum of all counts in `frequencies` */
  totalTerms: number;
}

