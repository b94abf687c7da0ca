export interface Tokenizer {
  /**
   * Split a line of text into terms, preserving their original case
   * @param text The text to tokenize
   * @returns Terms in order of appearance
   */
  tokenize(text: string): string[];

  /**
   * Get the name of the tokenizer
   */
  getName(): string;
}
