// src/handlers/fallback_broadcaster.ts
/**
 * Fallback broadcaster
 *
 * Services one priority band per call:
 *   1) discovery: untargeted ping, collect pongs until every in-band handler
 *      answered or the discovery deadline passes
 *   2) ordered attempt: willing handlers, ascending priority, one direct
 *      request each with its own timeout
 *   3) legacy: one request to the single-handler protocol
 *
 * A band success is reported as a Fallback match with no skill attached;
 * which handler took it is not surfaced to the router.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Message, MessageBus } from '../bus/message';
import { HandlerReportedError } from '../core/errors';
import { logDebug, logError, logInfo } from '../core/logger';
import { sleep } from '../core/timing';
import { inBand, type Match, type Matcher, type PriorityBand, type Utterances } from '../app/types';
import type { FallbackRegistry } from '../repos/fallback_registry';

export const FALLBACK_EVENTS = {
  register: 'fallback.register',
  deregister: 'fallback.deregister',
  ping: 'fallback.ping',
  pong: 'fallback.pong',
  legacy: 'fallback.legacy',
  legacyResponse: 'fallback.legacy.response',
  request: (skillId: string) => `fallback.${skillId}.request`,
  response: (skillId: string) => `fallback.${skillId}.response`,
} as const;

export const PongSchema = z.object({
  skill_id: z.string().min(1),
  will_attempt: z.boolean().default(true),
});

export const AttemptReplySchema = z.object({
  handled: z.boolean().optional(),
  error: z.string().optional(),
});

export type BroadcasterOptions = {
  discoveryTimeoutMs: number;
  pollIntervalMs: number;
  perHandlerTimeoutMs: number;
  legacyTimeoutMs: number;
};

function fallbackMatch(): Match {
  return { kind: 'Fallback', intent: null, data: {}, skillId: null };
}

export class FallbackBroadcaster {
  constructor(
    private readonly bus: MessageBus,
    private readonly registry: FallbackRegistry,
    private readonly opts: BroadcasterOptions
  ) {}

  /** The band as a router stage. */
  matcher(band: PriorityBand, name: string): Matcher {
    return {
      name,
      attempt: (utterances, lang, message) => this.broadcast(utterances, lang, message, band),
    };
  }

  async broadcast(
    utterances: Utterances,
    lang: string,
    message: Message,
    band: PriorityBand
  ): Promise<Match | null> {
    const candidates = await this.collectCandidates(utterances, lang, message, band);
    for (const skillId of candidates) {
      if (await this.attempt(skillId, utterances, lang, message)) {
        logInfo('fallback.handled', { skillId, band: [band.start, band.stop] });
        return fallbackMatch();
      }
    }

    logDebug('fallback.legacy_check', { band: [band.start, band.stop] });
    if (await this.attemptLegacy(utterances, lang, message, band)) {
      return fallbackMatch();
    }
    return null;
  }

  /**
   * Handler ids in `band` that said they will attempt, sorted by ascending
   * priority. Equal priorities keep pong arrival order.
   */
  async collectCandidates(
    utterances: Utterances,
    lang: string,
    message: Message,
    band: PriorityBand
  ): Promise<string[]> {
    const expected = new Set(this.registry.inBand(band).map((r) => r.skillId));
    const answered = new Set<string>();
    const willing: string[] = [];

    const ping = message.forward(FALLBACK_EVENTS.ping, {
      utterances,
      lang,
      fallback_range: [band.start, band.stop],
    });
    const pingId = randomUUID();
    ping.context.correlation_id = pingId;

    const onPong = (m: Message) => {
      if (m.correlationId !== pingId) return;
      const parsed = PongSchema.safeParse(m.data);
      if (!parsed.success) {
        logError('fallback.pong_invalid', { issues: parsed.error.issues });
        return;
      }
      const { skill_id, will_attempt } = parsed.data;
      if (answered.has(skill_id)) return;
      answered.add(skill_id);
      if (will_attempt && expected.has(skill_id)) {
        willing.push(skill_id);
        logInfo('fallback.will_attempt', { skillId: skill_id });
      } else {
        logInfo('fallback.will_not_attempt', { skillId: skill_id });
      }
    };

    this.bus.on(FALLBACK_EVENTS.pong, onPong);
    try {
      this.bus.emit(ping);
      const started = Date.now();
      for (;;) {
        if ([...expected].every((id) => answered.has(id))) break;
        const remaining = this.opts.discoveryTimeoutMs - (Date.now() - started);
        if (remaining <= 0) break;
        await sleep(Math.min(this.opts.pollIntervalMs, remaining));
      }
    } finally {
      this.bus.remove(FALLBACK_EVENTS.pong, onPong);
    }

    // re-read priorities: a handler may have re-registered during discovery
    const ranked: { skillId: string; priority: number }[] = [];
    for (const skillId of willing) {
      const priority = this.registry.priorityOf(skillId);
      if (priority !== undefined && inBand(priority, band) && this.registry.isAllowed(skillId)) {
        ranked.push({ skillId, priority });
      }
    }
    ranked.sort((a, b) => a.priority - b.priority);
    return ranked.map((r) => r.skillId);
  }

  /** Direct request to one handler; anything but `handled=true` is a decline. */
  async attempt(
    skillId: string,
    utterances: Utterances,
    lang: string,
    message: Message
  ): Promise<boolean> {
    const req = message.reply(
      FALLBACK_EVENTS.request(skillId),
      { skill_id: skillId, utterances, utterance: utterances[0], lang },
      { correlation_id: randomUUID() }
    );
    const res = await this.bus.waitForResponse(req, {
      replyType: FALLBACK_EVENTS.response(skillId),
      timeoutMs: this.opts.perHandlerTimeoutMs,
    });
    if (!res) {
      logInfo('fallback.no_reply', { skillId, timeoutMs: this.opts.perHandlerTimeoutMs });
      return false;
    }
    const parsed = AttemptReplySchema.safeParse(res.data);
    if (!parsed.success) {
      logError('fallback.reply_invalid', { skillId, issues: parsed.error.issues });
      return false;
    }
    if (parsed.data.error !== undefined) {
      const err = new HandlerReportedError(skillId, parsed.data.error);
      logError('fallback.handler_error', { skillId, error: err.message });
      return false;
    }
    return parsed.data.handled === true;
  }

  async attemptLegacy(
    utterances: Utterances,
    lang: string,
    message: Message,
    band: PriorityBand
  ): Promise<boolean> {
    const req = message.reply(
      FALLBACK_EVENTS.legacy,
      { utterance: utterances[0], lang, fallback_range: [band.start, band.stop] },
      { correlation_id: randomUUID() }
    );
    const res = await this.bus.waitForResponse(req, {
      replyType: FALLBACK_EVENTS.legacyResponse,
      timeoutMs: this.opts.legacyTimeoutMs,
    });
    return res?.data.handled === true;
  }
}
