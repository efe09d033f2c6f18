import { BreachRecord, Digest } from '../types/breach.types';
import { digestOf } from './digest';

export class BreachCorpus {
  private readonly bySource: ReadonlyMap<string, BreachRecord>;
  private readonly ordered: readonly BreachRecord[];
  private readonly index: ReadonlyMap<Digest, readonly BreachRecord[]>;

  private constructor(records: readonly BreachRecord[]) {
    const bySource = new Map<string, BreachRecord>();
    for (const record of records) {
      if (bySource.has(record.source)) {
        throw new Error(`Duplicate breach source: ${record.source}`);
      }
      bySource.set(record.source, freezeRecord(record));
    }

    this.bySource = bySource;
    this.ordered = Object.freeze([...bySource.values()]);
    this.index = buildDigestIndex(this.ordered);
  }

  static fromRecords(records: readonly BreachRecord[]): BreachCorpus {
    return new BreachCorpus(records);
  }

  static empty(): BreachCorpus {
    return new BreachCorpus([]);
  }

  get size(): number {
    return this.ordered.length;
  }

  records(): readonly BreachRecord[] {
    return this.ordered;
  }

  get(source: string): BreachRecord | undefined {
    return this.bySource.get(source);
  }

  /** Records owning an identifier with this digest, in corpus order. */
  lookup(digest: Digest): readonly BreachRecord[] {
    return this.index.get(digest) ?? [];
  }
}

function freezeRecord(record: BreachRecord): BreachRecord {
  return Object.freeze({
    ...record,
    leakedIdentifiers: Object.freeze([...record.leakedIdentifiers]),
  });
}

function buildDigestIndex(
  records: readonly BreachRecord[],
): Map<Digest, BreachRecord[]> {
  const index = new Map<Digest, BreachRecord[]>();
  for (const record of records) {
    for (const identifier of record.leakedIdentifiers) {
      const digest = digestOf(identifier);
      const owners = index.get(digest);
      if (!owners) {
        index.set(digest, [record]);
      } else if (owners[owners.length - 1] !== record) {
        owners.push(record);
      }
    }
  }
  return index;
}
