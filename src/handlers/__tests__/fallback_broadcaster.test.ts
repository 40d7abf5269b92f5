import { InProcessBus } from '../../bus/in_process_bus';
import { Message } from '../../bus/message';
import { BANDS } from '../../app/types';
import { FallbackRegistry } from '../../repos/fallback_registry';
import { capture, installFallback } from '../../__tests__/helpers';
import { FALLBACK_EVENTS, FallbackBroadcaster, type BroadcasterOptions } from '../fallback_broadcaster';
import { LegacyFallbackSingleton } from '../legacy_fallback';

const OPTS: BroadcasterOptions = {
  discoveryTimeoutMs: 100,
  pollIntervalMs: 5,
  perHandlerTimeoutMs: 100,
  legacyTimeoutMs: 100,
};

const UTT = ['what is the weather'];

describe('FallbackBroadcaster', () => {
  let bus: InProcessBus;
  let registry: FallbackRegistry;
  let calls: string[];
  let legacy: LegacyFallbackSingleton;

  function broadcaster(opts: Partial<BroadcasterOptions> = {}) {
    return new FallbackBroadcaster(bus, registry, { ...OPTS, ...opts });
  }

  beforeEach(() => {
    bus = new InProcessBus();
    registry = new FallbackRegistry();
    calls = [];
    legacy = new LegacyFallbackSingleton(bus);
  });

  it('tries willing handlers in ascending priority and stops at the first that handles', async () => {
    registry.register('B', 4);
    registry.register('A', 2);
    installFallback(bus, 'B', { handled: true }, calls);
    installFallback(bus, 'A', { handled: false }, calls);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('recognizer.utterance'), BANDS.high);

    expect(match).toEqual({ kind: 'Fallback', intent: null, data: {}, skillId: null });
    expect(calls).toEqual(['A', 'B']);
  });

  it('never invites a handler outside the band', async () => {
    registry.register('near', 3);
    registry.register('far', 50);
    installFallback(bus, 'near', { handled: false }, calls);
    installFallback(bus, 'far', { handled: true }, calls);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.high);

    expect(match).toBeNull();
    expect(calls).toEqual(['near']);
  });

  it('excludes in-band handlers that answer will_attempt=false', async () => {
    registry.register('shy', 10);
    registry.register('eager', 20);
    installFallback(bus, 'shy', { willAttempt: false, handled: true }, calls);
    installFallback(bus, 'eager', { handled: true }, calls);

    const candidates = await broadcaster().collectCandidates(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(candidates).toEqual(['eager']);
  });

  it('keeps arrival order between equal priorities', async () => {
    registry.register('first', 30);
    registry.register('second', 30);
    installFallback(bus, 'second', {}, calls);
    installFallback(bus, 'first', {}, calls);

    const candidates = await broadcaster().collectCandidates(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(candidates).toEqual(['second', 'first']);
  });

  it('returns as soon as every in-band handler answered', async () => {
    registry.register('a', 10);
    registry.register('b', 20);
    installFallback(bus, 'a', {}, calls);
    installFallback(bus, 'b', {}, calls);

    const started = Date.now();
    await broadcaster({ discoveryTimeoutMs: 2000 }).collectCandidates(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(Date.now() - started).toBeLessThan(500);
  });

  it('bounds discovery by the deadline no matter how many handlers stay silent', async () => {
    for (let i = 0; i < 50; i++) {
      registry.register(`mute-${i}`, 10 + i);
      installFallback(bus, `mute-${i}`, { silentPing: true }, calls);
    }
    registry.register('talker', 5);
    installFallback(bus, 'talker', {}, calls);

    const started = Date.now();
    const candidates = await broadcaster().collectCandidates(UTT, 'en-us', new Message('u'), BANDS.medium);
    const elapsed = Date.now() - started;

    expect(candidates).toEqual([]);
    expect(elapsed).toBeGreaterThanOrEqual(90);
    expect(elapsed).toBeLessThan(250);
    expect(bus.listenerCount(FALLBACK_EVENTS.pong)).toBe(0);
  });

  it('treats an error reply as a decline and moves on', async () => {
    registry.register('broken', 10);
    registry.register('works', 20);
    installFallback(bus, 'broken', { error: 'index out of range' }, calls);
    installFallback(bus, 'works', { handled: true }, calls);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(match?.kind).toBe('Fallback');
    expect(calls).toEqual(['broken', 'works']);
  });

  it('treats a missing reply as a decline', async () => {
    registry.register('slow', 10);
    registry.register('works', 20);
    installFallback(bus, 'slow', { silentRequest: true }, calls);
    installFallback(bus, 'works', { handled: true }, calls);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(match?.kind).toBe('Fallback');
    expect(calls).toEqual(['slow', 'works']);
  });

  it('skips ids rejected by the access policy', async () => {
    registry = new FallbackRegistry({ mode: 'blacklist', blacklist: ['banned'] });
    registry.register('banned', 10);
    installFallback(bus, 'banned', { handled: true }, calls);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.medium);

    expect(match).toBeNull();
    expect(calls).toEqual([]);
  });

  it('sends the direct request with all transcripts and the language', async () => {
    registry.register('a', 10);
    installFallback(bus, 'a', { handled: true }, calls);
    const seen = capture(bus, FALLBACK_EVENTS.request('a'), FALLBACK_EVENTS.ping);

    await broadcaster().broadcast(['one', 'won'], 'pt-pt', new Message('u'), BANDS.medium);

    expect(seen.map((m) => m.type)).toEqual(['fallback.ping', 'fallback.a.request']);
    expect(seen[0].data).toEqual({ utterances: ['one', 'won'], lang: 'pt-pt', fallback_range: [5, 90] });
    expect(seen[1].data).toEqual({ skill_id: 'a', utterances: ['one', 'won'], utterance: 'one', lang: 'pt-pt' });
  });

  it('falls back to the legacy singleton when no broadcast handler takes it', async () => {
    const legacyCalls: string[] = [];
    legacy.register('old-unknown', (utterance) => {
      legacyCalls.push(utterance);
      return true;
    }, 100);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.low);

    expect(match).toEqual({ kind: 'Fallback', intent: null, data: {}, skillId: null });
    expect(legacyCalls).toEqual(['what is the weather']);
  });

  it('legacy handlers outside the band are not consulted', async () => {
    const legacyCalls: string[] = [];
    legacy.register('old-unknown', (utterance) => {
      legacyCalls.push(utterance);
      return true;
    }, 100);

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.high);

    expect(match).toBeNull();
    expect(legacyCalls).toEqual([]);
  });

  it('leaves the legacy request to another singleton when none of its own entries is in band', async () => {
    const local: string[] = [];
    const external: unknown[] = [];
    legacy.register('old-urgent', (utterance) => {
      local.push(utterance);
      return true;
    }, 3);
    bus.on(FALLBACK_EVENTS.legacy, (m) => {
      external.push(m.data.utterance);
      bus.emit(m.response({ handled: true }));
    });

    const match = await broadcaster().broadcast(UTT, 'en-us', new Message('u'), BANDS.low);

    expect(match).toEqual({ kind: 'Fallback', intent: null, data: {}, skillId: null });
    expect(external).toEqual(['what is the weather']);
    expect(local).toEqual([]);
  });

  it('subscribes the multiplexer only while it has entries', () => {
    expect(legacy.isAttached).toBe(false);
    legacy.register('old-unknown', () => false);
    expect(legacy.isAttached).toBe(true);
    expect(bus.listenerCount(FALLBACK_EVENTS.legacy)).toBe(1);

    expect(legacy.deregister('old-unknown')).toBe(true);
    expect(legacy.isAttached).toBe(false);
    expect(bus.listenerCount(FALLBACK_EVENTS.legacy)).toBe(0);
  });

  it('a legacy path with nobody listening gives up after its timeout', async () => {
    const started = Date.now();

    const match = await broadcaster({ legacyTimeoutMs: 60 }).broadcast(UTT, 'en-us', new Message('u'), BANDS.low);

    expect(match).toBeNull();
    expect(Date.now() - started).toBeGreaterThanOrEqual(55);
  });

  it('concurrent broadcasts do not see each other’s pongs', async () => {
    registry.register('hi', 3);
    registry.register('mid', 50);
    installFallback(bus, 'hi', { handled: true }, calls);
    installFallback(bus, 'mid', { handled: true }, calls);
    const b = broadcaster();

    const [high, medium] = await Promise.all([
      b.collectCandidates(UTT, 'en-us', new Message('u'), BANDS.high),
      b.collectCandidates(UTT, 'en-us', new Message('u'), BANDS.medium),
    ]);

    expect(high).toEqual(['hi']);
    expect(medium).toEqual(['mid']);
    expect(bus.listenerCount(FALLBACK_EVENTS.pong)).toBe(0);
  });
});
