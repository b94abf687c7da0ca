import { Injectable } from '@nestjs/common';
import { lowercaseTerm } from '../analysis/filters/lowercase-filter';
import { SearchEngine } from '../index/search-engine';
import { QueryResult } from './interfaces/search.interface';

export const SCORE_DECIMALS = 6;

/**
 * Fixed six-decimal score. Negative zero keeps its sign.
 */
export function formatScore(score: number): string {
  const fixed = score.toFixed(SCORE_DECIMALS);
  return Object.is(score, -0) ? `-${fixed}` : fixed;
}

/**
 * Query side of the index. Read-only: call after indexing has finished.
 */
@Injectable()
export class SearchService {
  constructor(private readonly searchEngine: SearchEngine) {}

  /**
   * Trim and lowercase a raw query line. Blank lines yield null.
   * Queries are matched as whole terms and are not tokenized.
   */
  normalizeQuery(line: string): string | null {
    const term = lowercaseTerm(line.trim());
    return term.length > 0 ? term : null;
  }

  search(term: string): QueryResult {
    const hits = this.searchEngine.relevanceLookup(term);
    return { term, count: hits.length, hits };
  }

  /**
   * Header line followed by one `path,score` line per hit.
   */
  formatResult(result: QueryResult): string[] {
    return [
      `== ${result.term} (${result.count})`,
      ...result.hits.map(hit => `${hit.document},${formatScore(hit.score)}`),
    ];
  }
}
