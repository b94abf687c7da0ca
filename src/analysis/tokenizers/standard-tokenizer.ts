import { Injectable } from '@nestjs/common';
import { Tokenizer } from '../interfaces/tokenizer.interface';

/**
 * A term is a run of Unicode letters or numbers. Runs joined by a single
 * apostrophe (ASCII ' or typographic ’) stay together, so "o'er" and "o’er"
 * are one term each.
 */
export const TERM_PATTERN = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;

@Injectable()
export class StandardTokenizer implements Tokenizer {
  tokenize(text: string): string[] {
    if (!text || typeof text !== 'string') {
      return [];
    }

    // matchAll clones the regex, so the shared lastIndex is never touched
    return Array.from(text.matchAll(TERM_PATTERN), match => match[0]);
  }

  getName(): string {
    return 'standard';
  }
}
