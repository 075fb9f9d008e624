export interface Clock {
  /** Milliseconds since some fixed origin */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Accumulates running time across start/stop cycles.
 */
export class Stopwatch {
  private accumulatedMs: number;
  private startedAt: number | null = null;

  constructor(
    private readonly clock: Clock,
    priorMs = 0
  ) {
    this.accumulatedMs = Math.max(0, priorMs);
  }

  get running(): boolean {
    return this.startedAt !== null;
  }

  start(): void {
    if (this.startedAt === null) this.startedAt = this.clock.now();
  }

  stop(): void {
    if (this.startedAt === null) return;
    this.accumulatedMs += Math.max(0, this.clock.now() - this.startedAt);
    this.startedAt = null;
  }

  elapsedMs(): number {
    if (this.startedAt === null) return this.accumulatedMs;
    return this.accumulatedMs + Math.max(0, this.clock.now() - this.startedAt);
  }
}
