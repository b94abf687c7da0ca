/**
 * Index-level statistics needed for scoring
 */
export interface IndexStats {
  /**
   * Total number of documents in the index
   */
  readonly totalDocuments: number;

  /**
   * Number of documents containing a term
   */
  getDocumentFrequency(term: string): number;

  /**
   * Occurrences of a term in one document (0 when either is unknown)
   */
  getTermCount(term: string, docId: string): number;

  /**
   * Total number of terms in one document (0 when the document is unknown)
   */
  getTotalTerms(docId: string): number;
}

/**
 * Interface for scoring algorithms
 */
export interface Scorer {
  /**
   * Calculate a score for a document matching a term
   */
  score(term: string, docId: string): number;

  /**
   * Get the name of the scoring algorithm
   */
  getName(): string;
}
