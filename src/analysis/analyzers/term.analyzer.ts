import { Injectable } from '@nestjs/common';
import { Analyzer } from '../interfaces/analyzer.interface';
import { TokenFilter } from '../interfaces/token-filter.interface';
import { Tokenizer } from '../interfaces/tokenizer.interface';
import { StandardTokenizer } from '../tokenizers/standard-tokenizer';
import { LowercaseFilter } from '../filters/lowercase-filter';

/**
 * Analyzer used for document text: standard tokenization followed by
 * lowercasing. No stopword removal or stemming is applied, so every term a
 * reader can type is searchable.
 */
@Injectable()
export class TermAnalyzer implements Analyzer {
  private readonly filters: TokenFilter[];

  constructor(
    private readonly tokenizer: StandardTokenizer,
    lowercaseFilter: LowercaseFilter,
  ) {
    this.filters = [lowercaseFilter];
  }

  getName(): string {
    return 'term';
  }

  getTokenizer(): Tokenizer {
    return this.tokenizer;
  }

  getFilters(): TokenFilter[] {
    return [...this.filters];
  }

  analyze(text: string): string[] {
    if (!text || typeof text !== 'string') {
      return [];
    }
    const tokens = this.tokenizer.tokenize(text);
    return this.filters.reduce((current, filter) => filter.filter(current), tokens);
  }
}
