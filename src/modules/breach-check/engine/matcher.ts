import { BreachRecord, Digest } from '../types/breach.types';
import { BreachCorpus } from './corpus';

export function findMatches(
  query: Digest,
  corpus: BreachCorpus,
): readonly BreachRecord[] {
  return corpus.lookup(query);
}
