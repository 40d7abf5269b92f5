import type { Message } from '../bus/message';

/** Transcript variants of one utterance, highest confidence first. */
export type Utterances = string[];

export type MatchKind = 'Converse' | 'Statistical' | 'Keyword' | 'CommonQuery' | 'Fallback';

export type Match = {
  kind: MatchKind;
  intent: string | null;
  data: Record<string, unknown>;
  skillId: string | null;
};

/**
 * Per-utterance bag owned by one routing call. Transformers may add keys;
 * the router writes `lang` after resolution.
 */
export type RequestContext = Record<string, unknown>;

/** One attempt stage. Returning null means "declined". */
export interface Matcher {
  readonly name: string;
  attempt(utterances: Utterances, lang: string, message: Message): Promise<Match | null>;
}

/** Half-open priority interval `(start, stop]`. */
export type PriorityBand = { start: number; stop: number };

export const BANDS = {
  high: { start: 0, stop: 5 },
  medium: { start: 5, stop: 90 },
  low: { start: 90, stop: 101 },
} as const satisfies Record<string, PriorityBand>;

export const DEFAULT_FALLBACK_PRIORITY = 101;

export function inBand(priority: number, band: PriorityBand): boolean {
  return band.start < priority && priority <= band.stop;
}

export type RouteResult = {
  match: Match | null;
  context: RequestContext;
  lang: string;
  elapsedMs: number;
};
