import { Injectable } from '@nestjs/common';
import { TokenFilter } from '../interfaces/token-filter.interface';

const CAPITAL_I_WITH_DOT = 'İ';

/**
 * Lowercase one code point at a time, with no context rules: a final capital
 * sigma becomes σ, and İ becomes a plain i. Documents and queries both go
 * through here so their terms compare equal.
 */
export function lowercaseTerm(value: string): string {
  return Array.from(value, char => (char === CAPITAL_I_WITH_DOT ? 'i' : char.toLowerCase())).join('');
}

@Injectable()
export class LowercaseFilter implements TokenFilter {
  filter(tokens: readonly string[]): string[] {
    if (!tokens || !Array.isArray(tokens)) {
      return [];
    }

    return tokens.map(lowercaseTerm);
  }

  getName(): string {
    return 'lowercase';
  }
}
