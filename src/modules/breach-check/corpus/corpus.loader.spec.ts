import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { digestOf } from '../engine/digest';
import { findMatches } from '../engine/matcher';
import { CorpusLoader, normalizeRiskLevel } from './corpus.loader';

describe('normalizeRiskLevel', () => {
  it.each([
    ['high', 'high'],
    [' CRITICAL ', 'critical'],
    ['Low', 'low'],
    ['severe', 'unknown'],
    ['', 'unknown'],
    [null, 'unknown'],
    [undefined, 'unknown'],
  ])('maps %p to %p', (input, expected) => {
    expect(normalizeRiskLevel(input)).toBe(expected);
  });
});

describe('CorpusLoader', () => {
  const loader = new CorpusLoader();

  describe('parse', () => {
    it('builds records from the corpus schema, ordered by source', () => {
      const corpus = loader.parse({
        Zeta: {
          date: '2022-08-14',
          risk_level: 'Critical',
          description: 'Skimmer',
          leaked_details: ['5500000000000004'],
        },
        Alpha: { risk_level: 'severe', leaked_details: ['1'] },
      });

      expect(corpus.records()).toEqual([
        {
          source: 'Alpha',
          date: null,
          riskLevel: 'unknown',
          description: null,
          leakedIdentifiers: ['1'],
        },
        {
          source: 'Zeta',
          date: '2022-08-14',
          riskLevel: 'critical',
          description: 'Skimmer',
          leakedIdentifiers: ['5500000000000004'],
        },
      ]);
    });

    it('orders integer-like source names with the others', () => {
      const corpus = loader.parse(
        JSON.parse(
          '{"BankLeak":{"leaked_details":["42"]},"2023":{"leaked_details":["42"]},"Alpha10":{"leaked_details":["42"]},"Alpha9":{"leaked_details":["42"]}}',
        ),
      );

      expect(
        findMatches(digestOf('42'), corpus).map((r) => r.source),
      ).toEqual(['2023', 'Alpha10', 'Alpha9', 'BankLeak']);
    });

    it('drops leaked details that are not non-empty strings', () => {
      const corpus = loader.parse({
        Mixed: { leaked_details: ['a', '', 5, '   ', null, 'b'] },
      });

      expect(corpus.get('Mixed')?.leakedIdentifiers).toEqual(['a', 'b']);
    });

    it('treats a missing leaked_details list as empty', () => {
      const corpus = loader.parse({ Bare: { date: '2020-01-01' } });

      expect(corpus.get('Bare')?.leakedIdentifiers).toEqual([]);
    });

    it('skips entries that do not fit the schema and keeps the rest', () => {
      const corpus = loader.parse({
        Good: { leaked_details: ['1'] },
        NotAnObject: 'oops',
        BadList: { leaked_details: 'not-a-list' },
        BadDate: { date: 20200101, leaked_details: ['2'] },
      });

      expect(corpus.records().map((r) => r.source)).toEqual(['Good']);
    });

    it.each([
      ['an array', [{ leaked_details: ['1'] }]],
      ['null', null],
      ['a number', 42],
      ['a string', 'breaches'],
    ])('returns an empty corpus when the top level is %s', (_label, raw) => {
      expect(loader.parse(raw).size).toBe(0);
    });
  });

  describe('load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'breach-corpus-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('loads a corpus file', async () => {
      const path = join(dir, 'breaches.json');
      await writeFile(
        path,
        JSON.stringify({
          BankLeak2023: {
            date: '2023-01-01',
            risk_level: 'high',
            description: '...',
            leaked_details: ['1234567890123456'],
          },
        }),
      );

      const corpus = await loader.load(path);
      const matches = findMatches(digestOf('1234567890123456'), corpus);

      expect(matches.map((r) => r.source)).toEqual(['BankLeak2023']);
    });

    it('returns an empty corpus when the file is missing', async () => {
      const corpus = await loader.load(join(dir, 'missing.json'));

      expect(corpus.size).toBe(0);
    });

    it('returns an empty corpus when the file is not JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ "BankLeak2023": ');

      expect((await loader.load(path)).size).toBe(0);
    });

    it('returns an empty corpus when the path is a directory', async () => {
      expect((await loader.load(dir)).size).toBe(0);
    });

    it('reads the bundled sample corpus', async () => {
      const corpus = await loader.load(
        join(__dirname, '../../../../data/breaches.json'),
      );

      expect(corpus.records().map((r) => r.source)).toEqual([
        'BankLeak2023',
        'CreditUnionExport2021',
        'RetailCardSkim2022',
      ]);
      expect(
        findMatches(digestOf('4000123412341234'), corpus).map((r) => r.source),
      ).toEqual(['BankLeak2023', 'RetailCardSkim2022']);
    });
  });
});
