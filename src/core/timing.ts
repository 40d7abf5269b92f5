export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wall-clock duration of whatever runs between start() and stop(). */
export class Stopwatch {
  private startedAt = 0;
  private stoppedAt: number | null = null;

  start(): this {
    this.startedAt = performance.now();
    this.stoppedAt = null;
    return this;
  }

  stop(): number {
    this.stoppedAt = performance.now();
    return this.elapsedMs;
  }

  get elapsedMs(): number {
    return (this.stoppedAt ?? performance.now()) - this.startedAt;
  }
}
