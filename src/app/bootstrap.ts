// src/app/bootstrap.ts
// Builds the routing core on one bus. Engines default to decliners so the
// pipeline runs end to end even before remote matchers are configured.

import { InProcessBus } from '../bus/in_process_bus';
import type { MessageBus } from '../bus/message';
import type { RouterConfig } from '../core/config';
import type { ModuleFlags } from '../config/modules';
import { ConverseMatcher } from '../handlers/converse_handler';
import { FallbackBroadcaster } from '../handlers/fallback_broadcaster';
import { LegacyFallbackSingleton } from '../handlers/legacy_fallback';
import type { StatisticalEngine } from '../handlers/statistical_matcher';
import { ActiveSkillsRepo } from '../repos/active_skills_repo';
import { FallbackRegistry } from '../repos/fallback_registry';
import { IntentEventsService } from './events_service';
import type { UtteranceTransformer } from './transformers';
import type { Matcher } from './types';
import { decliningMatcher, UtteranceRouter } from './utterance_router';

export type CoreOverrides = {
  bus?: MessageBus;
  keyword?: Matcher;
  commonQa?: Matcher;
  statistical?: StatisticalEngine;
  transformers?: UtteranceTransformer[];
  flags?: ModuleFlags;
  now?: () => number;
};

export type RoutingCore = {
  bus: MessageBus;
  registry: FallbackRegistry;
  activeSkills: ActiveSkillsRepo;
  broadcaster: FallbackBroadcaster;
  legacy: LegacyFallbackSingleton;
  router: UtteranceRouter;
  events: IntentEventsService;
  stop(): void;
};

const NO_STATISTICAL_ENGINE: StatisticalEngine = { calcIntent: async () => null };

export function createRoutingCore(config: RouterConfig, o: CoreOverrides = {}): RoutingCore {
  const bus = o.bus ?? new InProcessBus();
  const registry = new FallbackRegistry({
    overrides: config.fallback_priorities,
    mode: config.fallback_mode,
    blacklist: config.fallback_blacklist,
    whitelist: config.fallback_whitelist,
  });
  const activeSkills = new ActiveSkillsRepo(
    { timeoutMinutes: config.active_skill_timeout, maxActive: config.max_active_skills, now: o.now },
    bus
  );
  const broadcaster = new FallbackBroadcaster(bus, registry, {
    discoveryTimeoutMs: config.discovery_timeout,
    pollIntervalMs: config.discovery_poll_interval,
    perHandlerTimeoutMs: config.per_handler_timeout,
    legacyTimeoutMs: config.legacy_timeout,
  });
  const legacy = new LegacyFallbackSingleton(bus);

  const router = new UtteranceRouter({
    bus,
    config,
    activeSkills,
    broadcaster,
    converse: new ConverseMatcher(bus, activeSkills, { timeoutMs: config.converse_timeout }),
    keyword: o.keyword ?? decliningMatcher('keyword'),
    commonQa: o.commonQa ?? decliningMatcher('common_qa'),
    statistical: o.statistical ?? NO_STATISTICAL_ENGINE,
    transformers: o.transformers,
    flags: o.flags,
  });
  const events = new IntentEventsService({
    bus,
    router,
    registry,
    activeSkills,
    defaultLang: config.lang,
  });
  events.start();

  return {
    bus,
    registry,
    activeSkills,
    broadcaster,
    legacy,
    router,
    events,
    stop() {
      events.stop();
      legacy.detach();
    },
  };
}
