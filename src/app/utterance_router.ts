// src/app/utterance_router.ts
import { Message, type MessageBus } from '../bus/message';
import type { RouterConfig } from '../core/config';
import { describeError } from '../core/errors';
import { logDebug, logError, logInfo } from '../core/logger';
import { Stopwatch } from '../core/timing';
import { getModuleFlags, isEnabled, type ModuleFlags, type ModuleName } from '../config/modules';
import type { FallbackBroadcaster } from '../handlers/fallback_broadcaster';
import {
  STATISTICAL_TIERS,
  StatisticalMatcher,
  type StatisticalEngine,
} from '../handlers/statistical_matcher';
import type { ActiveSkillsRepo } from '../repos/active_skills_repo';
import { resolveLang, validLangs } from './lang';
import { runTransformers, type UtteranceTransformer } from './transformers';
import {
  BANDS,
  type Match,
  type Matcher,
  type RequestContext,
  type RouteResult,
  type Utterances,
} from './types';

export const ROUTER_EVENTS = {
  utterance: 'recognizer.utterance',
  failure: 'intent.failure',
} as const;

export type RouterDeps = {
  bus: MessageBus;
  config: RouterConfig;
  activeSkills: ActiveSkillsRepo;
  broadcaster: FallbackBroadcaster;
  converse: Matcher;
  keyword: Matcher;
  commonQa: Matcher;
  statistical: StatisticalEngine;
  transformers?: UtteranceTransformer[];
  flags?: ModuleFlags;
};

export type IntentQueryResult = { match: Match; handler: string } | null;

/** A stage that never claims anything; stands in for an unconfigured engine. */
export function decliningMatcher(name: string): Matcher {
  return { name, attempt: async () => null };
}

export class UtteranceRouter {
  private readonly flags: ModuleFlags;
  private readonly langs: Set<string>;

  constructor(private readonly deps: RouterDeps) {
    this.flags = deps.flags ?? getModuleFlags();
    this.langs = validLangs(deps.config.lang, deps.config.secondary_langs);
  }

  /**
   * Attempt sequence, first match wins:
   *   converse > statistical >0.95 > keyword > common QA > fallback (0,5]
   *   > statistical >0.80 > fallback (5,90] > statistical >0.50 > fallback (90,101]
   * Built per utterance so the statistical tiers share one computation.
   */
  stages(): Matcher[] {
    const { converse, keyword, commonQa, broadcaster } = this.deps;
    const stat = new StatisticalMatcher(this.deps.statistical);
    const seq: [ModuleName, Matcher][] = [
      ['converse', converse],
      ['statistical', stat.tier(STATISTICAL_TIERS.high, 'statistical_high')],
      ['keyword', keyword],
      ['common_qa', commonQa],
      ['fallback', broadcaster.matcher(BANDS.high, 'fallback_high')],
      ['statistical', stat.tier(STATISTICAL_TIERS.medium, 'statistical_medium')],
      ['fallback', broadcaster.matcher(BANDS.medium, 'fallback_medium')],
      ['statistical', stat.tier(STATISTICAL_TIERS.low, 'statistical_low')],
      ['fallback', broadcaster.matcher(BANDS.low, 'fallback_low')],
    ];
    return seq.filter(([mod]) => isEnabled(this.flags, mod)).map(([, stage]) => stage);
  }

  /** `context` is mutated in place and handed back in the result. */
  route(utterances: Utterances, context: RequestContext = {}): Promise<RouteResult> {
    return this.routeMessage(new Message(ROUTER_EVENTS.utterance, { utterances }, context));
  }

  async routeMessage(message: Message): Promise<RouteResult> {
    const watch = new Stopwatch().start();
    let match: Match | null = null;
    let lang = this.deps.config.lang.toLowerCase();

    try {
      const original = toUtterances(message.data.utterances);
      const utterances = await runTransformers(this.deps.transformers ?? [], original, message.context);
      if (utterances !== original) message.data.utterances = utterances;

      lang = resolveLang(message.context, this.langs, this.deps.config.lang);
      message.context.lang = lang;

      if (utterances.length === 0) {
        logInfo('router.empty_utterance', {});
      } else {
        watch.start();
        match = await this.firstMatch(this.stages(), utterances, lang, message);
      }
      watch.stop();

      if (match) this.dispatch(match, message);
      else this.sendFailure(message);
    } catch (e) {
      watch.stop();
      logError('router.failed', describeError(e));
      match = null;
    }

    logInfo('router.routed', {
      kind: match?.kind ?? null,
      intent: match?.intent ?? null,
      skillId: match?.skillId ?? null,
      lang,
      elapsed_ms: Math.round(watch.elapsedMs),
    });
    return { match, context: message.context, lang, elapsedMs: watch.elapsedMs };
  }

  /**
   * Dry run over the statistical and keyword stages only: no converse,
   * no QA, no fallback, no activation, no dispatch.
   */
  async queryIntent(utterance: string, lang: string, message: Message): Promise<IntentQueryResult> {
    const stat = new StatisticalMatcher(this.deps.statistical);
    const seq: [ModuleName, Matcher][] = [
      ['statistical', stat.tier(STATISTICAL_TIERS.high, 'statistical_high')],
      ['keyword', this.deps.keyword],
      ['statistical', stat.tier(STATISTICAL_TIERS.medium, 'statistical_medium')],
      ['statistical', stat.tier(STATISTICAL_TIERS.low, 'statistical_low')],
    ];
    for (const [mod, stage] of seq) {
      if (!isEnabled(this.flags, mod)) continue;
      const match = await this.tryStage(stage, [utterance], lang, message);
      if (match) return { match, handler: stage.name };
    }
    return null;
  }

  /** Converse stage on its own, e.g. to tell active skills recognition failed. */
  async offerToActiveSkills(utterances: Utterances, lang: string, message: Message): Promise<Match | null> {
    if (!isEnabled(this.flags, 'converse')) return null;
    return this.tryStage(this.deps.converse, utterances, lang, message);
  }

  private async firstMatch(
    stages: Matcher[],
    utterances: Utterances,
    lang: string,
    message: Message
  ): Promise<Match | null> {
    for (const stage of stages) {
      const match = await this.tryStage(stage, utterances, lang, message);
      if (match) {
        logDebug('router.stage_matched', { stage: stage.name });
        return match;
      }
    }
    return null;
  }

  /** A throwing stage declines; the next one still runs. */
  private async tryStage(
    stage: Matcher,
    utterances: Utterances,
    lang: string,
    message: Message
  ): Promise<Match | null> {
    try {
      return await stage.attempt(utterances, lang, message);
    } catch (e) {
      logError('router.stage_failed', { stage: stage.name, ...describeError(e) });
      return null;
    }
  }

  private dispatch(match: Match, message: Message) {
    if (match.skillId) {
      // refreshes recency; only emits when the skill was not active yet
      this.deps.activeSkills.activate(match.skillId);
    }
    if (match.intent) {
      this.deps.bus.emit(message.reply(match.intent, { ...message.data, ...match.data }));
    }
  }

  private sendFailure(message: Message) {
    logInfo('router.no_match', {});
    this.deps.bus.emit(message.forward(ROUTER_EVENTS.failure));
  }
}

function toUtterances(v: unknown): Utterances {
  if (!Array.isArray(v)) return [];
  return v.filter((u): u is string => typeof u === 'string');
}
