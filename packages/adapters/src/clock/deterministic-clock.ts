import type { ClockPort } from '@fleetwatch/domain';

/**
 * Deterministic clock for tests and sweep replays.
 * Returns the same instant until advanced, or steps by `tickMs` per call.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * 60_000);
  }
}

/** Wall-clock implementation for live mode. */
export class SystemClock implements ClockPort {
  now(): Date {
    return wallClockNow();
  }
}

export function wallClockNow(): Date {
  return new Date();
}
