/**
 * Set of documents containing one term. Membership only: a posting list
 * has no meaningful order and carries no per-document payload.
 */
export interface PostingList {
  /**
   * Add a document to the posting list. Adding a present document is a no-op.
   */
  addDocument(docId: string): void;

  /**
   * Check whether a document is in the posting list
   */
  hasDocument(docId: string): boolean;

  /**
   * Copy of the document IDs, in no particular order
   */
  getDocumentIds(): string[];

  /**
   * Number of documents in the posting list
   */
  size(): number;
}
