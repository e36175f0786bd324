import type { Logger } from "./logger.js";

/** Observational hook for latency marks. Implementations must not throw into the caller. */
export interface TimingHook {
  mark(name: string): void;
}

export interface TimerClock {
  now(): number;
}

/**
 * Records named marks. The first `mark(name)` starts a span, the second
 * with the same name closes it and logs the elapsed time.
 */
export class ProcessTimer implements TimingHook {
  private readonly open = new Map<string, number>();
  private readonly completed: Array<{ name: string; elapsedMs: number }> = [];

  constructor(
    private readonly logger: Logger,
    private readonly clock: TimerClock = performance,
  ) {}

  mark(name: string): void {
    const now = this.clock.now();
    const startedAt = this.open.get(name);

    if (startedAt === undefined) {
      this.open.set(name, now);
      return;
    }

    this.open.delete(name);
    const elapsedMs = Math.round((now - startedAt) * 100) / 100;
    this.completed.push({ name, elapsedMs });
    this.logger.info({ mark: name, elapsedMs }, `${name} took ${String(elapsedMs)}ms`);
  }

  /** Spans closed so far, in completion order. */
  spans(): ReadonlyArray<{ name: string; elapsedMs: number }> {
    return this.completed;
  }
}
