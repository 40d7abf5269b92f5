// src/bus/message.ts
import { randomUUID } from "crypto";

export type MessageData = Record<string, unknown>;

/**
 * Routing metadata travelling with a message. Well-known keys:
 * `source` / `destination` (swapped on reply), `correlation_id` (pairs a
 * request with its reply), `skill_id` (attributed sender), and the
 * language tags `stt_lang`, `request_lang`, `detected_lang`.
 */
export type MessageContext = Record<string, unknown>;

export class Message {
  constructor(
    public readonly type: string,
    public data: MessageData = {},
    public context: MessageContext = {}
  ) {}

  /** New message addressed back to whoever sent this one. */
  reply(type: string, data: MessageData = {}, context: MessageContext = {}): Message {
    const ctx: MessageContext = { ...this.context, ...context };
    if ('source' in this.context) ctx.destination = this.context.source;
    if ('destination' in this.context) ctx.source = this.context.destination;
    return new Message(type, data, ctx);
  }

  /** Reply on the conventional `<type>.response` channel. */
  response(data: MessageData = {}): Message {
    return this.reply(`${this.type}.response`, data);
  }

  /** Same routing context, new type. */
  forward(type: string, data?: MessageData): Message {
    return new Message(type, data ?? { ...this.data }, { ...this.context });
  }

  get correlationId(): string | undefined {
    const id = this.context.correlation_id;
    return typeof id === "string" ? id : undefined;
  }

  /** Stamps a correlation id unless one is already present. */
  ensureCorrelationId(): string {
    const existing = this.correlationId;
    if (existing) return existing;
    const id = randomUUID();
    this.context.correlation_id = id;
    return id;
  }
}

export type BusHandler = (message: Message) => void | Promise<void>;

export type WaitOptions = {
  replyType?: string;
  timeoutMs: number;
};

/** Publish/subscribe plus a correlated request/response primitive. */
export interface MessageBus {
  on(type: string, handler: BusHandler): void;
  once(type: string, handler: BusHandler): void;
  remove(type: string, handler: BusHandler): void;
  emit(message: Message): void;
  /** Resolves with the first `type` message passing `predicate`, or null at the deadline. */
  waitForMessage(
    type: string,
    timeoutMs: number,
    predicate?: (m: Message) => boolean
  ): Promise<Message | null>;
  /** Emits `message` and resolves with its correlated reply, or null at the deadline. */
  waitForResponse(message: Message, opts: WaitOptions): Promise<Message | null>;
}
