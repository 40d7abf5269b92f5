// src/handlers/statistical_matcher.ts
import type { Match, Matcher, Utterances } from '../app/types';
import { describeError } from '../core/errors';
import { logError } from '../core/logger';

export type StatisticalIntent = {
  name: string;
  skillId: string | null;
  conf: number;
  data: Record<string, unknown>;
};

/** Scores utterances against trained intents; the best candidate or null. */
export interface StatisticalEngine {
  calcIntent(utterances: Utterances, lang: string): Promise<StatisticalIntent | null>;
}

export const STATISTICAL_TIERS = {
  high: 0.95,
  medium: 0.8,
  low: 0.5,
} as const;

/**
 * One instance per routing call. The three confidence tiers share a single
 * engine computation per (utterances, lang); a failed computation is logged
 * once and every tier then declines.
 */
export class StatisticalMatcher {
  private cache = new Map<string, Promise<StatisticalIntent | null>>();

  constructor(private readonly engine: StatisticalEngine) {}

  tier(minConf: number, name: string): Matcher {
    return {
      name,
      attempt: async (utterances, lang) => {
        const intent = await this.calc(utterances, lang);
        if (!intent || intent.conf <= minConf) return null;
        const match: Match = {
          kind: 'Statistical',
          intent: intent.name,
          data: { ...intent.data, conf: intent.conf },
          skillId: intent.skillId,
        };
        return match;
      },
    };
  }

  private calc(utterances: Utterances, lang: string): Promise<StatisticalIntent | null> {
    const key = JSON.stringify([lang, utterances]);
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.engine.calcIntent(utterances, lang).catch((e: unknown) => {
        logError('statistical.engine_failed', { lang, ...describeError(e) });
        return null;
      });
      this.cache.set(key, pending);
    }
    return pending;
  }
}
