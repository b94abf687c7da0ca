import { PostingList } from './interfaces/posting.interface';

export class SimplePostingList implements PostingList {
  private readonly documents = new Set<string>();

  addDocument(docId: string): void {
    this.documents.add(docId);
  }

  hasDocument(docId: string): boolean {
    return this.documents.has(docId);
  }

  getDocumentIds(): string[] {
    return Array.from(this.documents);
  }

  size(): number {
    return this.documents.size;
  }
}
