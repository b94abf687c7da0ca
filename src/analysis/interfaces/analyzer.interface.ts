import { Tokenizer } from './tokenizer.interface';
import { TokenFilter } from './token-filter.interface';

export interface Analyzer {
  /**
   * Analyze a line of text and return the terms to index
   */
  analyze(text: string): string[];

  /**
   * Get the name of the analyzer
   */
  getName(): string;

  /**
   * Get the tokenizer used by this analyzer
   */
  getTokenizer(): Tokenizer;

  /**
   * Get the filters used by this analyzer, in application order
   */
  getFilters(): TokenFilter[];
}
