import { asEpochMs, type EpochMs } from '../../src/domain/ids.js';
import type { TimeClockPort } from '../../src/ports/time-clock.port.js';

/**
 * Fake time clock for deterministic testing.
 * Time only moves when the test says so.
 */
export class FakeTimeClock implements TimeClockPort {
  private currentMs = 1_700_000_000_000;

  nowMs(): EpochMs {
    return asEpochMs(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  setTime(ms: number): void {
    this.currentMs = ms;
  }
}
