/**
 * Port for registering shutdown handlers.
 * Keeps `process.on` out of the HTTP server so tests can run it without touching the process.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface ProcessSignals {
  onShutdown(signal: ShutdownSignal, handler: () => Promise<void>): void;
}
