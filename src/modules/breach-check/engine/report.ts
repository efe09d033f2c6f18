import { BreachMatch, BreachRecord, MatchResult } from '../types/breach.types';

/** Side effect fired once when a report contains matches. */
export interface ReportNotification<T> {
  target: T;
  notify(target: T, matches: BreachMatch[]): Promise<void> | void;
  onError(error: unknown): void;
}

export function toBreachMatch(record: BreachRecord): BreachMatch {
  return {
    source: record.source,
    date: record.date,
    riskLevel: record.riskLevel,
    description: record.description,
  };
}

export function buildReport<T>(
  records: readonly BreachRecord[],
  notification?: ReportNotification<T>,
): MatchResult {
  if (records.length === 0) {
    return { breached: false };
  }

  const matches = records.map(toBreachMatch);
  if (notification) {
    fireAndForget(notification, matches.map((match) => ({ ...match })));
  }
  return { breached: true, matches };
}

function fireAndForget<T>(
  notification: ReportNotification<T>,
  matches: BreachMatch[],
): void {
  try {
    const pending = notification.notify(notification.target, matches);
    if (pending) {
      void pending.catch((error: unknown) => notification.onError(error));
    }
  } catch (error) {
    notification.onError(error);
  }
}
