/**
 * Time source, injected so tests can control timestamps.
 */
export interface Clock {
  /** Milliseconds since epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
