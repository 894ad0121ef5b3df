/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Register it in container.ts (factory or class)
 * 3. Resolve it by token; tests may register their own value first
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory (pino root + child per component) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (storage and platform)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    RunRepository: Symbol('Ports.RunRepository'),
    StudyCatalog: Symbol('Ports.StudyCatalog'),
    WorkerDirectory: Symbol('Ports.WorkerDirectory'),
    TimeClock: Symbol('Ports.TimeClock'),
    RandomEntropy: Symbol('Ports.RandomEntropy'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Cookie name/value codec */
    SessionTokenCodec: Symbol('Services.SessionTokenCodec'),
    /** Per-request token set reader/writer */
    SessionTokenStore: Symbol('Services.SessionTokenStore'),
    /** Run state machine */
    RunLifecycle: Symbol('Services.RunLifecycle'),
    /** Read-only run lookups */
    RunQueries: Symbol('Services.RunQueries'),
    /** Request flows bundled for the transport */
    UseCases: Symbol('Services.UseCases'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Signal handler installation */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
  },
} as const;
