// src/core/errors.ts
// Failure taxonomy of the routing core. Only ConfigError is ever allowed to
// escape to the process; everything else is logged and degraded to "no match".

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super("[config] invalid router config: " + issues.join("; "));
    this.name = "ConfigError";
  }
}

export class BusTimeoutError extends Error {
  constructor(public readonly messageType: string, public readonly timeoutMs: number) {
    super(`[bus] no reply to ${messageType} within ${timeoutMs}ms`);
    this.name = "BusTimeoutError";
  }
}

export class HandlerReportedError extends Error {
  constructor(public readonly handlerId: string, detail: string) {
    super(`[fallback] ${handlerId}: ${detail}`);
    this.name = "HandlerReportedError";
  }
}

export class MatcherError extends Error {
  constructor(public readonly matcher: string, detail: string, public readonly status?: number) {
    super(`[matcher.${matcher}] ${detail}`);
    this.name = "MatcherError";
  }
}

/** Normalizes anything thrown into log fields. */
export function describeError(e: unknown): { error: string; stack?: string } {
  if (e instanceof Error) return { error: e.message, stack: e.stack };
  return { error: String(e) };
}
