import { asEpochMs, type EpochMs } from '../domain/ids.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';

export class NodeTimeClock implements TimeClockPort {
  nowMs(): EpochMs {
    return asEpochMs(Date.now());
  }
}
