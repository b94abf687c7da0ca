import { PostingList } from './posting.interface';

export interface TermDictionary {
  getPostingList(term: string): PostingList | undefined;
  addPosting(term: string, docId: string): void;
  hasTerm(term: string): boolean;
  getTerms(): string[];
  size(): number;
}
