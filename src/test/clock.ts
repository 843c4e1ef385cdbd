import type { Clock } from '../lib/clock.js';

export class TestClock {
  private current: Date;

  constructor(start: string | Date = '2025-03-10T12:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceHours(hours: number): void {
    this.advance(hours * 60 * 60 * 1000);
  }

  set(at: string | Date): void {
    this.current = new Date(at);
  }
}

export const instantSleep = (): Promise<void> => Promise.resolve();
