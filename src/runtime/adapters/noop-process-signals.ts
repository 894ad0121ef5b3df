import type { ProcessSignals, ShutdownSignal } from '../ports/process-signals.js';

/**
 * Test mode: handlers are never installed.
 */
export class NoopProcessSignals implements ProcessSignals {
  onShutdown(_signal: ShutdownSignal, _handler: () => Promise<void>): void {
    // no-op
  }
}
