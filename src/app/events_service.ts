// src/app/events_service.ts
// Bus-facing side of the router: validates every inbound payload and maps
// it onto the router, registry or active-skill table.

import { z } from 'zod';
import type { BusHandler, Message, MessageBus } from '../bus/message';
import { logInfo, logWarn } from '../core/logger';
import { FALLBACK_EVENTS } from '../handlers/fallback_broadcaster';
import type { ActiveSkillsRepo } from '../repos/active_skills_repo';
import type { FallbackRegistry } from '../repos/fallback_registry';
import { ROUTER_EVENTS, type UtteranceRouter } from './utterance_router';

export const INTENT_EVENTS = {
  activate: 'skills.activate',
  deactivate: 'skills.deactivate',
  skillLoaded: 'skills.loaded',
  recognitionUnknown: 'recognizer.unknown',
  getSkills: 'intent.service.skills.get',
  getActiveSkills: 'intent.service.active_skills.get',
  getIntent: 'intent.service.intent.get',
} as const;

const SkillId = z.string().min(1);

export const UtteranceEventSchema = z.object({
  utterances: z.array(z.string()).min(1),
  lang: z.string().min(1).optional(),
});

const RegisterSchema = z.object({
  skill_id: SkillId,
  priority: z.number().int().min(0).max(101).nullish(),
});
const SkillRefSchema = z.object({ skill_id: SkillId });
const SkillLoadedSchema = z.object({ id: SkillId, name: z.string().min(1) });
const IntentQuerySchema = z.object({ utterance: z.string().min(1), lang: z.string().optional() });

function parseOrWarn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, message: Message): T | null {
  const parsed = schema.safeParse(message.data);
  if (parsed.success) return parsed.data;
  logWarn('events.invalid_payload', { type: message.type, issues: parsed.error.issues });
  return null;
}

function callerOf(message: Message): string | undefined {
  const c = message.context.skill_id;
  return typeof c === 'string' && c ? c : undefined;
}

export type EventsServiceDeps = {
  bus: MessageBus;
  router: UtteranceRouter;
  registry: FallbackRegistry;
  activeSkills: ActiveSkillsRepo;
  defaultLang: string;
};

export class IntentEventsService {
  private readonly skillNames = new Map<string, string>();
  private readonly subscriptions: [string, BusHandler][];

  constructor(private readonly deps: EventsServiceDeps) {
    this.subscriptions = [
      [ROUTER_EVENTS.utterance, this.handleUtterance],
      [FALLBACK_EVENTS.register, this.handleRegisterFallback],
      [FALLBACK_EVENTS.deregister, this.handleDeregisterFallback],
      [INTENT_EVENTS.activate, this.handleActivate],
      [INTENT_EVENTS.deactivate, this.handleDeactivate],
      [INTENT_EVENTS.skillLoaded, this.handleSkillLoaded],
      [INTENT_EVENTS.recognitionUnknown, this.handleRecognitionUnknown],
      [INTENT_EVENTS.getSkills, this.handleGetSkills],
      [INTENT_EVENTS.getActiveSkills, this.handleGetActiveSkills],
      [INTENT_EVENTS.getIntent, this.handleGetIntent],
    ];
  }

  start() {
    for (const [type, handler] of this.subscriptions) this.deps.bus.on(type, handler);
  }

  stop() {
    for (const [type, handler] of this.subscriptions) this.deps.bus.remove(type, handler);
  }

  skillName(skillId: string): string {
    return this.skillNames.get(skillId) ?? skillId;
  }

  handleUtterance: BusHandler = async (message) => {
    const data = parseOrWarn(UtteranceEventSchema, message);
    if (!data) return;
    // a volunteered lang is a request tag; it still has to pass validation
    if (data.lang && !('request_lang' in message.context)) {
      message.context.request_lang = data.lang;
    }
    await this.deps.router.routeMessage(message);
  };

  handleRegisterFallback: BusHandler = (message) => {
    const data = parseOrWarn(RegisterSchema, message);
    if (!data) return;
    const priority = this.deps.registry.register(data.skill_id, data.priority);
    logInfo('fallback.registered', { skillId: data.skill_id, priority });
  };

  handleDeregisterFallback: BusHandler = (message) => {
    const data = parseOrWarn(SkillRefSchema, message);
    if (!data) return;
    if (this.deps.registry.deregister(data.skill_id)) {
      logInfo('fallback.deregistered', { skillId: data.skill_id });
    }
  };

  // only a skill may (de)activate itself; the caller comes from context
  handleActivate: BusHandler = (message) => {
    const data = parseOrWarn(SkillRefSchema, message);
    if (!data) return;
    const caller = callerOf(message);
    if (!caller) {
      logWarn('active_skills.unattributed_activation', { skillId: data.skill_id });
      return;
    }
    this.deps.activeSkills.activate(data.skill_id, caller);
  };

  handleDeactivate: BusHandler = (message) => {
    const data = parseOrWarn(SkillRefSchema, message);
    if (!data) return;
    this.deps.activeSkills.deactivate(data.skill_id, callerOf(message) ?? data.skill_id);
  };

  handleSkillLoaded: BusHandler = (message) => {
    const data = parseOrWarn(SkillLoadedSchema, message);
    if (!data) return;
    this.skillNames.set(data.id, data.name);
  };

  /** Lets active skills react to a failed recognition. */
  handleRecognitionUnknown: BusHandler = async (message) => {
    const lang = typeof message.data.lang === 'string' ? message.data.lang : this.deps.defaultLang;
    await this.deps.router.offerToActiveSkills([], lang, message);
  };

  handleGetSkills: BusHandler = (message) => {
    this.deps.bus.emit(
      message.reply('intent.service.skills.reply', { skills: Object.fromEntries(this.skillNames) })
    );
  };

  handleGetActiveSkills: BusHandler = (message) => {
    const skills = this.deps.activeSkills.list().map((s) => [s.skillId, s.activatedAt]);
    this.deps.bus.emit(message.reply('intent.service.active_skills.reply', { skills }));
  };

  handleGetIntent: BusHandler = async (message) => {
    const data = parseOrWarn(IntentQuerySchema, message);
    if (!data) return;
    const lang = data.lang ?? this.deps.defaultLang;
    const result = await this.deps.router.queryIntent(data.utterance, lang, message);
    const intent = result
      ? {
          ...result.match.data,
          intent_name: result.match.intent,
          intent_service: result.match.kind,
          skill_id: result.match.skillId,
          handler: result.handler,
        }
      : null;
    this.deps.bus.emit(message.reply('intent.service.intent.reply', { intent }));
  };
}
