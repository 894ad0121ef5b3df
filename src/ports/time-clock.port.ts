import type { EpochMs } from '../domain/ids.js';

/**
 * Current time. Injected so run timestamps and token creation times are
 * deterministic under test.
 */
export interface TimeClockPort {
  nowMs(): EpochMs;
}
