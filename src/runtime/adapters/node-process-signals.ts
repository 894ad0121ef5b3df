import type { ProcessSignals, ShutdownSignal } from '../ports/process-signals.js';
import type { Logger } from '../../core/logging/index.js';

/**
 * Node.js adapter: runs the handler once per signal, then exits.
 */
export class NodeProcessSignals implements ProcessSignals {
  constructor(private readonly logger: Logger) {}

  onShutdown(signal: ShutdownSignal, handler: () => Promise<void>): void {
    process.once(signal, () => {
      handler().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger.error({ err: error, signal }, 'Shutdown handler failed');
          process.exit(1);
        }
      );
    });
  }
}
