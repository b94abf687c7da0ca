/**
 * One ranked document for a term query
 */
export interface RelevanceResult {
  /** Document identifier (the file path) */
  document: string;

  /** tf-idf score; may be negative for very common terms */
  score: number;
}
