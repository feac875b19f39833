import type { Clock } from '../types.js';

export class MockClock implements Clock {
  private currentMs: number;

  constructor(startTimeMs = Date.UTC(2025, 0, 1)) {
    this.currentMs = startTimeMs;
  }

  now(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    if (ms < 0) return;
    this.currentMs += ms;
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1_000);
  }
}

export function createMockClock(startTimeMs?: number): MockClock {
  return new MockClock(startTimeMs);
}
