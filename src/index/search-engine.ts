import { Injectable, Logger } from '@nestjs/common';
import { RelevanceResult } from './interfaces/index.interface';
import { IndexStats } from './interfaces/scoring.interface';
import { TermDictionary } from './term-dictionary';
import { TfIdfScorer } from './tfidf-scorer';

/**
 * Ascending code-unit order, independent of locale.
 */
function compareDocumentIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * In-memory tf-idf index over a set of documents.
 *
 * The four structures below (posting lists, per-document counts, per-document
 * totals and the document set) are only written by addDocument, and
 * addDocument is only called by the indexing reducer. Nothing here is safe to
 * share between concurrent writers; the pipeline guarantees there is exactly
 * one. Once indexing completes the engine is only read.
 */
@Injectable()
export class SearchEngine implements IndexStats {
  private readonly logger = new Logger(SearchEngine.name);

  private readonly termDictionary = new TermDictionary();
  private readonly counts = new Map<string, Map<string, number>>();
  private readonly totals = new Map<string, number>();
  private readonly documents = new Set<string>();

  private readonly scorer = new TfIdfScorer(this);

  /**
   * Add or replace a document. The frequency map is owned by the engine from
   * here on. Replacing a document does not remove postings for terms it no
   * longer contains.
   */
  addDocument(docId: string, frequencies: Map<string, number>, totalTerms: number): void {
    this.documents.add(docId);
    this.counts.set(docId, frequencies);
    this.totals.set(docId, totalTerms);

    for (const term of frequencies.keys()) {
      this.termDictionary.addPosting(term, docId);
    }

    this.logger.verbose(`Indexed ${docId} (${frequencies.size} distinct terms)`);
  }

  /**
   * Documents containing `term`, as a fresh array in no particular order.
   */
  indexLookup(term: string): string[] {
    return this.termDictionary.getPostingList(term)?.getDocumentIds() ?? [];
  }

  termFrequency(term: string, docId: string): number {
    return this.scorer.termFrequency(term, docId);
  }

  inverseDocumentFrequency(term: string): number {
    return this.scorer.inverseDocumentFrequency(term);
  }

  tfIdf(term: string, docId: string): number {
    return this.scorer.score(term, docId);
  }

  /**
   * Every document containing `term` with its tf-idf score, highest score
   * first. Equal scores are ordered by document ID so the result never
   * depends on insertion or hash order.
   */
  relevanceLookup(term: string): RelevanceResult[] {
    return this.indexLookup(term)
      .map(document => ({ document, score: this.tfIdf(term, document) }))
      .sort((a, b) => {
        if (a.score === b.score) {
          return compareDocumentIds(a.document, b.document);
        }
        return b.score - a.score;
      });
  }

  get totalDocuments(): number {
    return this.documents.size;
  }

  getDocumentFrequency(term: string): number {
    return this.termDictionary.getPostingList(term)?.size() ?? 0;
  }

  getTermCount(term: string, docId: string): number {
    return this.counts.get(docId)?.get(term) ?? 0;
  }

  getTotalTerms(docId: string): number {
    return this.totals.get(docId) ?? 0;
  }

  hasDocument(docId: string): boolean {
    return this.documents.has(docId);
  }

  /**
   * All document IDs, sorted
   */
  getDocumentIds(): string[] {
    return Array.from(this.documents).sort(compareDocumentIds);
  }

  /**
   * All indexed terms, sorted
   */
  getTerms(): string[] {
    return this.termDictionary.getTerms();
  }

  /**
   * Copy of a document's term counts, or undefined for an unknown document
   */
  getDocumentTerms(docId: string): Map<string, number> | undefined {
    const frequencies = this.counts.get(docId);
    return frequencies ? new Map(frequencies) : undefined;
  }
}
