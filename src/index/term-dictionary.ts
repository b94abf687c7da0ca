import { PostingList } from './interfaces/posting.interface';
import { TermDictionary as ITermDictionary } from './interfaces/term-dictionary.interface';
import { SimplePostingList } from './posting-list';

/**
 * Inverted index: term -> posting list. Terms are never removed; the index is
 * built once per process.
 */
export class TermDictionary implements ITermDictionary {
  private readonly postings = new Map<string, PostingList>();

  getPostingList(term: string): PostingList | undefined {
    return this.postings.get(term);
  }

  addPosting(term: string, docId: string): void {
    let postingList = this.postings.get(term);
    if (!postingList) {
      postingList = new SimplePostingList();
      this.postings.set(term, postingList);
    }
    postingList.addDocument(docId);
  }

  hasTerm(term: string): boolean {
    return this.postings.has(term);
  }

  getTerms(): string[] {
    return Array.from(this.postings.keys()).sort();
  }

  size(): number {
    return this.postings.size;
  }
}
