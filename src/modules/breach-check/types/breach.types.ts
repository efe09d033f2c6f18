/** 40-character lowercase hexadecimal SHA-1 digest. */
export type Digest = string;

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical', 'unknown'] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface BreachRecord {
  readonly source: string;
  readonly date: string | null;
  readonly riskLevel: RiskLevel;
  readonly description: string | null;
  readonly leakedIdentifiers: readonly string[];
}

/** Breach metadata returned to callers; never carries leaked identifiers. */
export interface BreachMatch {
  source: string;
  date: string | null;
  riskLevel: RiskLevel;
  description: string | null;
}

export type MatchResult =
  | { breached: false }
  | { breached: true; matches: BreachMatch[] };

/** Shape of one entry in the corpus file, keyed by breach source name. */
export interface RawBreachEntry {
  date?: string | null;
  risk_level?: string | null;
  description?: string | null;
  leaked_details?: unknown[];
}

/** Snake-case match as it travels over HTTP. */
export interface BreachMatchPayload {
  source: string;
  date: string | null;
  risk_level: string | null;
  description: string | null;
}

export type MatchResultPayload =
  | { breached: false }
  | { breached: true; matches: BreachMatchPayload[] };
