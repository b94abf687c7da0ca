import { IndexStats, Scorer } from './interfaces/scoring.interface';

/**
 * tf-idf scoring over live index statistics.
 *
 *   tf(t, d)  = count(t, d) / total(d)
 *   idf(t)    = ln(N / (n_t + 1))
 *   score     = tf * idf
 *
 * The +1 in the idf denominator is part of the ranking contract. It makes idf
 * negative once a term appears in more than (e - 1) / e of the documents, and
 * exactly 0 when n_t + 1 = N.
 */
export class TfIdfScorer implements Scorer {
  constructor(private readonly indexStats: IndexStats) {}

  termFrequency(term: string, docId: string): number {
    const total = this.indexStats.getTotalTerms(docId);
    if (total <= 0) {
      return 0;
    }
    return this.indexStats.getTermCount(term, docId) / total;
  }

  inverseDocumentFrequency(term: string): number {
    const N = this.indexStats.totalDocuments;
    if (N === 0) {
      return 0;
    }

    const nt = this.indexStats.getDocumentFrequency(term);
    if (nt === 0) {
      return 0;
    }

    return Math.log(N / (nt + 1));
  }

  score(term: string, docId: string): number {
    return this.termFrequency(term, docId) * this.inverseDocumentFrequency(term);
  }

  getName(): string {
    return 'tf-idf';
  }
}
