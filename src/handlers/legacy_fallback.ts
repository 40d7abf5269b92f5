// src/handlers/legacy_fallback.ts
// Single-handler fallback protocol kept for handlers that predate the
// ping/pong broadcast. The multiplexer subscribes to `fallback.legacy` once
// something registers with it, and answers only requests whose band holds
// one of its own entries; anything else is left to whichever legacy
// singleton lives elsewhere on the bus.

import { z } from 'zod';
import type { BusHandler, Message, MessageBus } from '../bus/message';
import { describeError } from '../core/errors';
import { logDebug, logError, logInfo, logWarn } from '../core/logger';
import { DEFAULT_FALLBACK_PRIORITY, inBand } from '../app/types';
import { FALLBACK_EVENTS } from './fallback_broadcaster';

export type LegacyFallbackHandler = (
  utterance: string,
  lang: string,
  message: Message
) => boolean | Promise<boolean>;

type Entry = { name: string; priority: number; handler: LegacyFallbackHandler };

const LegacyRequestSchema = z.object({
  utterance: z.string(),
  lang: z.string(),
  fallback_range: z.tuple([z.number(), z.number()]),
});

export class LegacyFallbackSingleton {
  private entries: Entry[] = [];
  private attached = false;

  constructor(private readonly bus: MessageBus) {}

  register(name: string, handler: LegacyFallbackHandler, priority = DEFAULT_FALLBACK_PRIORITY) {
    this.entries = [...this.entries.filter((e) => e.name !== name), { name, priority, handler }];
    this.attach();
  }

  deregister(name: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => e.name !== name);
    if (this.entries.length === 0) this.detach();
    return this.entries.length !== before;
  }

  get isAttached(): boolean {
    return this.attached;
  }

  attach() {
    if (this.attached) return;
    this.bus.on(FALLBACK_EVENTS.legacy, this.onRequest);
    this.attached = true;
  }

  detach() {
    this.bus.remove(FALLBACK_EVENTS.legacy, this.onRequest);
    this.attached = false;
  }

  private onRequest: BusHandler = async (message) => {
    const parsed = LegacyRequestSchema.safeParse(message.data);
    if (!parsed.success) {
      logWarn('legacy_fallback.request_invalid', { issues: parsed.error.issues });
      return;
    }
    const { utterance, lang, fallback_range } = parsed.data;
    const band = { start: fallback_range[0], stop: fallback_range[1] };
    const ordered = this.entries
      .filter((e) => inBand(e.priority, band))
      .sort((a, b) => a.priority - b.priority);
    if (ordered.length === 0) {
      logDebug('legacy_fallback.nothing_in_band', { band: fallback_range });
      return;
    }

    for (const entry of ordered) {
      try {
        if (await entry.handler(utterance, lang, message)) {
          logInfo('legacy_fallback.handled', { handler: entry.name });
          this.bus.emit(message.response({ handled: true, handler: entry.name }));
          return;
        }
      } catch (e) {
        logError('legacy_fallback.handler_failed', { handler: entry.name, ...describeError(e) });
      }
    }
    this.bus.emit(message.response({ handled: false }));
  };
}
