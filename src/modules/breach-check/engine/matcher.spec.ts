import { BreachRecord } from '../types/breach.types';
import { BreachCorpus } from './corpus';
import { digestOf } from './digest';
import { findMatches } from './matcher';

function scanMatches(query: string, corpus: BreachCorpus): BreachRecord[] {
  return corpus
    .records()
    .filter((record) =>
      record.leakedIdentifiers.some(
        (identifier) => digestOf(identifier) === query,
      ),
    );
}

function record(source: string, leakedIdentifiers: string[]): BreachRecord {
  return {
    source,
    date: null,
    riskLevel: 'medium',
    description: null,
    leakedIdentifiers,
  };
}

describe('findMatches', () => {
  const corpus = BreachCorpus.fromRecords([
    record('BankLeak2023', ['1234567890123456', '4000123412341234']),
    record('RetailSkim2022', ['5500000000000004', '4000123412341234']),
    record('RepeatDump', ['7777', '7777', '7777']),
  ]);

  it('finds the owner of every leaked identifier', () => {
    for (const owner of corpus.records()) {
      for (const identifier of owner.leakedIdentifiers) {
        expect(findMatches(digestOf(identifier), corpus)).toContain(owner);
      }
    }
  });

  it('returns nothing for a digest no identifier hashes to', () => {
    expect(findMatches(digestOf('9999999999999999'), corpus)).toEqual([]);
  });

  it('lists a record once even when several identifiers match', () => {
    const matches = findMatches(digestOf('7777'), corpus);

    expect(matches.map((r) => r.source)).toEqual(['RepeatDump']);
  });

  it('orders matches by corpus order', () => {
    const matches = findMatches(digestOf('4000123412341234'), corpus);

    expect(matches.map((r) => r.source)).toEqual([
      'BankLeak2023',
      'RetailSkim2022',
    ]);
  });

  it('agrees with a full scan of the corpus', () => {
    const queries = [
      ...corpus.records().flatMap((r) => r.leakedIdentifiers),
      'not-leaked',
    ].map(digestOf);

    for (const query of queries) {
      expect(findMatches(query, corpus)).toEqual(scanMatches(query, corpus));
    }
  });

  it('matches nothing in an empty corpus', () => {
    const query = digestOf('1234567890123456');

    expect(findMatches(query, BreachCorpus.empty())).toEqual([]);
  });
});
