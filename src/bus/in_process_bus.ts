// src/bus/in_process_bus.ts
// Default transport: every subscriber lives in this process. Delivery is
// synchronous, in subscription order.

import { EventEmitter } from "events";
import { BusTimeoutError, describeError } from "../core/errors";
import { logDebug, logError } from "../core/logger";
import type { BusHandler, Message, MessageBus, WaitOptions } from "./message";

type Listener = (message: Message) => void;

export class InProcessBus implements MessageBus {
  private emitter = new EventEmitter();
  // original handler -> wrapped listener, per message type
  private wrapped = new Map<string, Map<BusHandler, Listener[]>>();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  private wrap(type: string, handler: BusHandler): Listener {
    return (message: Message) => {
      try {
        const out = handler(message);
        if (out instanceof Promise) {
          out.catch((e: unknown) => logError("bus.handler_failed", { type, ...describeError(e) }));
        }
      } catch (e) {
        logError("bus.handler_failed", { type, ...describeError(e) });
      }
    };
  }

  private track(type: string, handler: BusHandler, listener: Listener) {
    let byHandler = this.wrapped.get(type);
    if (!byHandler) {
      byHandler = new Map();
      this.wrapped.set(type, byHandler);
    }
    byHandler.set(handler, [...(byHandler.get(handler) ?? []), listener]);
  }

  private untrack(type: string, handler: BusHandler, listener: Listener) {
    const byHandler = this.wrapped.get(type);
    const list = byHandler?.get(handler);
    if (!byHandler || !list) return;
    const rest = list.filter((l) => l !== listener);
    if (rest.length) byHandler.set(handler, rest);
    else byHandler.delete(handler);
    if (byHandler.size === 0) this.wrapped.delete(type);
  }

  on(type: string, handler: BusHandler): void {
    const listener = this.wrap(type, handler);
    this.track(type, handler, listener);
    this.emitter.on(type, listener);
  }

  once(type: string, handler: BusHandler): void {
    const inner = this.wrap(type, handler);
    const listener: Listener = (message) => {
      this.untrack(type, handler, listener);
      inner(message);
    };
    this.track(type, handler, listener);
    this.emitter.once(type, listener);
  }

  remove(type: string, handler: BusHandler): void {
    const list = this.wrapped.get(type)?.get(handler);
    if (!list) return;
    for (const listener of list) this.emitter.removeListener(type, listener);
    this.wrapped.get(type)?.delete(handler);
    if (this.wrapped.get(type)?.size === 0) this.wrapped.delete(type);
  }

  emit(message: Message): void {
    logDebug("bus.emit", { type: message.type });
    this.emitter.emit(message.type, message);
  }

  listenerCount(type: string): number {
    return this.emitter.listenerCount(type);
  }

  waitForMessage(
    type: string,
    timeoutMs: number,
    predicate: (m: Message) => boolean = () => true
  ): Promise<Message | null> {
    return this.waitFor(type, timeoutMs, predicate);
  }

  waitForResponse(message: Message, opts: WaitOptions): Promise<Message | null> {
    const id = message.ensureCorrelationId();
    const replyType = opts.replyType ?? `${message.type}.response`;
    return this.waitFor(
      replyType,
      opts.timeoutMs,
      (m) => m.correlationId === id,
      () => this.emit(message)
    );
  }

  private waitFor(
    type: string,
    timeoutMs: number,
    predicate: (m: Message) => boolean,
    afterSubscribe?: () => void
  ): Promise<Message | null> {
    return new Promise<Message | null>((resolve) => {
      let settled = false;
      const finish = (result: Message | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.remove(type, handler);
        resolve(result);
      };
      const handler: BusHandler = (m) => {
        if (predicate(m)) finish(m);
      };
      const timer = setTimeout(() => {
        const err = new BusTimeoutError(type, timeoutMs);
        logDebug("bus.wait_timeout", { type, timeoutMs, error: err.message });
        finish(null);
      }, timeoutMs);

      this.on(type, handler);
      if (afterSubscribe) {
        try {
          afterSubscribe();
        } catch (e) {
          logError("bus.request_failed", { type, ...describeError(e) });
          finish(null);
        }
      }
    });
  }
}
