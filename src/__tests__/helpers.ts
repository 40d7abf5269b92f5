/**
 * Shared fixtures: short timeouts and fake bus-side handlers that speak the
 * fallback and converse protocols.
 */

import { Message, type MessageBus } from '../bus/message';
import { parseRouterConfig, type RouterConfig, type RouterConfigInput } from '../core/config';
import { CONVERSE_EVENTS } from '../handlers/converse_handler';
import { FALLBACK_EVENTS } from '../handlers/fallback_broadcaster';

export function testConfig(overrides: RouterConfigInput = {}): RouterConfig {
  return parseRouterConfig({
    discovery_timeout: 100,
    discovery_poll_interval: 5,
    per_handler_timeout: 100,
    legacy_timeout: 100,
    converse_timeout: 100,
    ...overrides,
  });
}

export type FakeFallback = {
  willAttempt?: boolean;
  handled?: boolean;
  error?: string;
  /** never answers the ping */
  silentPing?: boolean;
  /** never answers the direct request */
  silentRequest?: boolean;
};

/** Subscribes a fallback handler; every direct request it gets is appended to `calls`. */
export function installFallback(bus: MessageBus, skillId: string, opts: FakeFallback, calls: string[]) {
  bus.on(FALLBACK_EVENTS.ping, (m) => {
    if (opts.silentPing) return;
    bus.emit(m.reply(FALLBACK_EVENTS.pong, { skill_id: skillId, will_attempt: opts.willAttempt ?? true }));
  });
  bus.on(FALLBACK_EVENTS.request(skillId), (m) => {
    calls.push(skillId);
    if (opts.silentRequest) return;
    const data = opts.error !== undefined ? { error: opts.error } : { handled: opts.handled ?? false };
    bus.emit(m.reply(FALLBACK_EVENTS.response(skillId), data));
  });
}

export function registerFallback(bus: MessageBus, skillId: string, priority?: number) {
  bus.emit(new Message(FALLBACK_EVENTS.register, { skill_id: skillId, priority }));
}

/** A skill that answers converse requests addressed to it. */
export function installConverse(bus: MessageBus, skillId: string, result: boolean, calls: string[]) {
  bus.on(CONVERSE_EVENTS.request, (m) => {
    if (m.data.skill_id !== skillId) return;
    calls.push(skillId);
    bus.emit(m.reply(CONVERSE_EVENTS.response, { skill_id: skillId, result }));
  });
}

/** Records every message of the given types. */
export function capture(bus: MessageBus, ...types: string[]): Message[] {
  const seen: Message[] = [];
  for (const t of types) bus.on(t, (m) => void seen.push(m));
  return seen;
}
