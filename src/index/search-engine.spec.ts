import { Test, TestingModule } from '@nestjs/testing';
import { IndexModule } from './index.module';
import { SearchEngine } from './search-engine';

function terms(entries: Record<string, number>): Map<string, number> {
  return new Map(Object.entries(entries));
}

function total(entries: Record<string, number>): number {
  return Object.values(entries).reduce((sum, count) => sum + count, 0);
}

function addDocument(engine: SearchEngine, docId: string, entries: Record<string, number>): void {
  engine.addDocument(docId, terms(entries), total(entries));
}

describe('SearchEngine', () => {
  let engine: SearchEngine;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [IndexModule],
    }).compile();

    engine = module.get<SearchEngine>(SearchEngine);
  });

  it('should be defined and empty', () => {
    expect(engine).toBeDefined();
    expect(engine.totalDocuments).toBe(0);
    expect(engine.getTerms()).toEqual([]);
  });

  describe('addDocument', () => {
    it('should record the document, its counts and its postings', () => {
      addDocument(engine, 'doc1.txt', { the: 2, cat: 1 });

      expect(engine.totalDocuments).toBe(1);
      expect(engine.hasDocument('doc1.txt')).toBe(true);
      expect(engine.getTotalTerms('doc1.txt')).toBe(3);
      expect(engine.getTermCount('the', 'doc1.txt')).toBe(2);
      expect(engine.indexLookup('the')).toEqual(['doc1.txt']);
      expect(engine.indexLookup('cat')).toEqual(['doc1.txt']);
      expect(engine.getTerms()).toEqual(['cat', 'the']);
    });

    it('should index a document without terms', () => {
      addDocument(engine, 'empty.txt', {});

      expect(engine.totalDocuments).toBe(1);
      expect(engine.getTotalTerms('empty.txt')).toBe(0);
      expect(engine.getTerms()).toEqual([]);
    });

    it('should produce the same state when a document is inserted twice', () => {
      const once = new SearchEngine();
      const twice = new SearchEngine();
      const entries = { alpha: 3, beta: 1, gamma: 2 };

      addDocument(once, 'doc.txt', entries);
      addDocument(twice, 'doc.txt', entries);
      addDocument(twice, 'doc.txt', entries);

      expect(twice.totalDocuments).toBe(once.totalDocuments);
      expect(twice.getDocumentIds()).toEqual(once.getDocumentIds());
      expect(twice.getTerms()).toEqual(once.getTerms());
      expect(twice.getTotalTerms('doc.txt')).toBe(once.getTotalTerms('doc.txt'));
      expect(twice.getDocumentTerms('doc.txt')).toEqual(once.getDocumentTerms('doc.txt'));
      for (const term of once.getTerms()) {
        expect(twice.indexLookup(term)).toEqual(once.indexLookup(term));
      }
    });

    it('should replace counts on re-insertion but keep stale postings', () => {
      addDocument(engine, 'doc.txt', { old: 1 });
      addDocument(engine, 'doc.txt', { new: 2 });

      expect(engine.totalDocuments).toBe(1);
      expect(engine.getTotalTerms('doc.txt')).toBe(2);
      expect(engine.indexLookup('new')).toEqual(['doc.txt']);
      expect(engine.indexLookup('old')).toEqual(['doc.txt']);
      expect(engine.termFrequency('old', 'doc.txt')).toBe(0);
    });
  });

  describe('indexLookup', () => {
    it('should return an empty array for an unseen term', () => {
      expect(engine.indexLookup('missing')).toEqual([]);
    });

    it('should not expose the internal posting list', () => {
      addDocument(engine, 'doc1.txt', { cat: 1 });
      const documents = engine.indexLookup('cat');
      documents.push('intruder.txt');
      documents.shift();

      expect(engine.indexLookup('cat')).toEqual(['doc1.txt']);
      expect(engine.getDocumentFrequency('cat')).toBe(1);
    });
  });

  describe('termFrequency', () => {
    beforeEach(() => {
      addDocument(engine, 'doc1.txt', { the: 2, cat: 1, sat: 1 });
      addDocument(engine, 'empty.txt', {});
    });

    it('should be the share of the document made up by the term', () => {
      expect(engine.termFrequency('the', 'doc1.txt')).toBe(0.5);
      expect(engine.termFrequency('cat', 'doc1.txt')).toBe(0.25);
    });

    it('should be 0 for an absent term, empty document or unknown document', () => {
      expect(engine.termFrequency('dog', 'doc1.txt')).toBe(0);
      expect(engine.termFrequency('the', 'empty.txt')).toBe(0);
      expect(engine.termFrequency('the', 'unknown.txt')).toBe(0);
    });

    it('should stay within [0, 1] for every indexed term', () => {
      for (const term of engine.getTerms()) {
        for (const docId of engine.getDocumentIds()) {
          const tf = engine.termFrequency(term, docId);
          expect(tf).toBeGreaterThanOrEqual(0);
          expect(tf).toBeLessThanOrEqual(1);
        }
      }
    });
  });

  describe('inverseDocumentFrequency', () => {
    it('should be 0 for an empty index', () => {
      expect(engine.inverseDocumentFrequency('anything')).toBe(0);
    });

    it('should be 0 for an unseen term', () => {
      addDocument(engine, 'doc1.txt', { cat: 1 });
      expect(engine.inverseDocumentFrequency('dog')).toBe(0);
    });

    it('should smooth the denominator by one', () => {
      addDocument(engine, 'doc1.txt', { the: 1, cat: 1, sat: 1 });
      addDocument(engine, 'doc2.txt', { the: 1, dog: 1, sat: 1 });

      expect(engine.inverseDocumentFrequency('cat')).toBe(0);
      expect(engine.inverseDocumentFrequency('sat')).toBeCloseTo(Math.log(2 / 3), 12);
    });
  });

  describe('relevanceLookup', () => {
    it('should return nothing for an unknown term', () => {
      addDocument(engine, 'doc1.txt', { cat: 1 });
      expect(engine.relevanceLookup('nonexistent')).toEqual([]);
    });

    it('should score the two-document example', () => {
      addDocument(engine, 'doc1.txt', { the: 1, cat: 1, sat: 1 });
      addDocument(engine, 'doc2.txt', { the: 1, dog: 1, sat: 1 });

      expect(engine.relevanceLookup('cat')).toEqual([{ document: 'doc1.txt', score: 0 }]);

      const sat = engine.relevanceLookup('sat');
      expect(sat.map(result => result.document)).toEqual(['doc1.txt', 'doc2.txt']);
      expect(sat[0].score).toBeCloseTo(-0.135155, 6);
      expect(sat[1].score).toBe(sat[0].score);
    });

    it('should order by score and break ties by document ID', () => {
      // inserted out of order on purpose
      addDocument(engine, 'b.txt', { apple: 1, pear: 1 });
      addDocument(engine, 'c.txt', { apple: 1 });
      addDocument(engine, 'e.txt', { fig: 1 });
      addDocument(engine, 'a.txt', { apple: 1, pear: 1 });
      addDocument(engine, 'd.txt', { kiwi: 1, plum: 1 });

      const results = engine.relevanceLookup('apple');
      const idf = Math.log(5 / 4);

      expect(results.map(result => result.document)).toEqual(['c.txt', 'a.txt', 'b.txt']);
      expect(results[0].score).toBeCloseTo(idf, 12);
      expect(results[1].score).toBeCloseTo(idf / 2, 12);
      expect(results[2].score).toBe(results[1].score);
    });

    it('should order negative scores with the least negative first', () => {
      addDocument(engine, 'x.txt', { the: 1 });
      addDocument(engine, 'y.txt', { the: 1, cat: 1 });
      addDocument(engine, 'z.txt', { the: 1, cat: 1, sat: 2 });

      // idf(the) = ln(3 / 4) < 0, so the lowest tf ranks first
      expect(engine.relevanceLookup('the').map(result => result.document)).toEqual([
        'z.txt',
        'y.txt',
        'x.txt',
      ]);
    });

    it('should compare document IDs by code unit, not locale', () => {
      addDocument(engine, 'b.txt', { term: 1 });
      addDocument(engine, 'B.txt', { term: 1 });
      addDocument(engine, 'a.txt', { term: 1 });
      addDocument(engine, 'other.txt', { filler: 1 });
      addDocument(engine, 'more.txt', { filler: 1 });

      expect(engine.relevanceLookup('term').map(result => result.document)).toEqual([
        'B.txt',
        'a.txt',
        'b.txt',
      ]);
    });

    it('should be sorted descending for a larger index', () => {
      for (let i = 0; i < 20; i++) {
        const entries: Record<string, number> = { common: (i % 4) + 1, filler: 10 - (i % 7) };
        if (i % 3 === 0) entries.rare = i + 1;
        addDocument(engine, `doc-${String(i).padStart(2, '0')}.txt`, entries);
      }

      for (const term of ['common', 'rare', 'filler']) {
        const results = engine.relevanceLookup(term);
        expect(results).toHaveLength(engine.getDocumentFrequency(term));
        for (let i = 1; i < results.length; i++) {
          const previous = results[i - 1];
          const current = results[i];
          expect(previous.score).toBeGreaterThanOrEqual(current.score);
          if (previous.score === current.score) {
            expect(previous.document < current.document).toBe(true);
          }
        }
      }
    });
  });

  describe('getDocumentTerms', () => {
    it('should return a copy of the counts', () => {
      addDocument(engine, 'doc.txt', { cat: 2 });
      const copy = engine.getDocumentTerms('doc.txt');
      copy?.set('cat', 99);

      expect(engine.getTermCount('cat', 'doc.txt')).toBe(2);
    });

    it('should return undefined for an unknown document', () => {
      expect(engine.getDocumentTerms('missing.txt')).toBeUndefined();
    });
  });
});
