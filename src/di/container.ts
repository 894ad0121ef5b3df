import 'reflect-metadata';
import { container, type DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { formatAppError } from '../errors/formatter.js';
import { createBootstrapLogger, type ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { RunRepositoryPort } from '../ports/run-repository.port.js';
import type { StudyCatalogPort } from '../ports/study-catalog.port.js';
import type { WorkerDirectoryPort } from '../ports/worker-directory.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import { InMemoryRunRepository } from '../infra/in-memory-run-repository.js';
import { InMemoryStudyCatalog } from '../infra/in-memory-study-catalog.js';
import { InMemoryWorkerDirectory } from '../infra/in-memory-worker-directory.js';
import { NodeTimeClock } from '../infra/node-time-clock.js';
import { NodeRandomEntropy } from '../infra/node-random-entropy.js';
import { EMPTY_CATALOG, loadCatalogFile, type Catalog } from '../infra/catalog-file.js';
import { SessionTokenCodec } from '../session-token/session-token-codec.js';
import { SessionTokenStore } from '../session-token/session-token-store.js';
import { RunLifecycle } from '../lifecycle/run-lifecycle.js';
import { RunQueries } from '../lifecycle/run-queries.js';
import { createUseCases, type StudyRunUseCases } from '../use-cases/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

/** Thrown by initializeContainer; carries the process-level error for the entrypoint to print. */
export class ContainerInitError extends Error {
  constructor(readonly appError: AppError) {
    super(formatAppError(appError));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Allow tests to inject config explicitly before container initialization.
  // This prevents the composition root from overwriting test-provided values.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) throw new ContainerInitError(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME + LOGGING REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, {
    useFactory: instanceCachingFactory((c: DependencyContainer): ProcessSignals => {
      switch (mode.kind) {
        case 'test':
          return new NoopProcessSignals();
        case 'production':
          return new NodeProcessSignals(c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ProcessSignals'));
        default:
          return assertNever(mode);
      }
    }),
  });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORT REGISTRATION (in-memory adapters; tests may pre-register fakes)
// ═══════════════════════════════════════════════════════════════════════════

async function loadCatalog(config: ValidatedConfig): Promise<Catalog> {
  if (config.catalogFile === null) return EMPTY_CATALOG;
  const loaded = await loadCatalogFile(config.catalogFile);
  if (loaded.isErr()) throw new ContainerInitError(loaded.error);
  return loaded.value;
}

async function registerPorts(): Promise<void> {
  const needsCatalog =
    !container.isRegistered(DI.Ports.StudyCatalog) || !container.isRegistered(DI.Ports.WorkerDirectory);

  if (needsCatalog) {
    const config = container.resolve<ValidatedConfig>(DI.Config.App);
    const catalog = await loadCatalog(config);

    if (!container.isRegistered(DI.Ports.StudyCatalog)) {
      container.register<StudyCatalogPort>(DI.Ports.StudyCatalog, {
        useValue: new InMemoryStudyCatalog(catalog.studies, catalog.batches),
      });
    }
    if (!container.isRegistered(DI.Ports.WorkerDirectory)) {
      container.register<WorkerDirectoryPort>(DI.Ports.WorkerDirectory, {
        useValue: new InMemoryWorkerDirectory(catalog.workers),
      });
    }
  }

  if (!container.isRegistered(DI.Ports.RunRepository)) {
    container.register<RunRepositoryPort>(DI.Ports.RunRepository, {
      useFactory: instanceCachingFactory(() => new InMemoryRunRepository()),
    });
  }
  if (!container.isRegistered(DI.Ports.TimeClock)) {
    container.register<TimeClockPort>(DI.Ports.TimeClock, {
      useFactory: instanceCachingFactory(() => new NodeTimeClock()),
    });
  }
  if (!container.isRegistered(DI.Ports.RandomEntropy)) {
    container.register<RandomEntropyPort>(DI.Ports.RandomEntropy, {
      useFactory: instanceCachingFactory(() => new NodeRandomEntropy()),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register(DI.Services.SessionTokenCodec, {
    useFactory: instanceCachingFactory((c) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new SessionTokenCodec(config.cookies.base);
    }),
  });

  container.register(DI.Services.SessionTokenStore, {
    useFactory: instanceCachingFactory((c) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new SessionTokenStore(
        c.resolve<SessionTokenCodec>(DI.Services.SessionTokenCodec),
        { path: config.cookies.path, maxAgeSeconds: config.cookies.maxAgeSeconds },
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('SessionTokenStore')
      );
    }),
  });

  container.register(DI.Services.RunLifecycle, {
    useFactory: instanceCachingFactory(
      (c) =>
        new RunLifecycle(
          c.resolve<RunRepositoryPort>(DI.Ports.RunRepository),
          c.resolve<TimeClockPort>(DI.Ports.TimeClock),
          c.resolve<RandomEntropyPort>(DI.Ports.RandomEntropy),
          c.resolve<ILoggerFactory>(DI.Logging.Factory).create('RunLifecycle')
        )
    ),
  });

  container.register(DI.Services.RunQueries, {
    useFactory: instanceCachingFactory((c) => new RunQueries(c.resolve<RunRepositoryPort>(DI.Ports.RunRepository))),
  });

  container.register<StudyRunUseCases>(DI.Services.UseCases, {
    useFactory: instanceCachingFactory((c) =>
      createUseCases({
        repo: c.resolve<RunRepositoryPort>(DI.Ports.RunRepository),
        catalog: c.resolve<StudyCatalogPort>(DI.Ports.StudyCatalog),
        workers: c.resolve<WorkerDirectoryPort>(DI.Ports.WorkerDirectory),
        clock: c.resolve<TimeClockPort>(DI.Ports.TimeClock),
        tokens: c.resolve<SessionTokenStore>(DI.Services.SessionTokenStore),
        lifecycle: c.resolve<RunLifecycle>(DI.Services.RunLifecycle),
        queries: c.resolve<RunQueries>(DI.Services.RunQueries),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('UseCases'),
      })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Order: runtime, config, logging, ports, services. Anything a test
 * registered beforehand is kept.
 *
 * Idempotent; concurrent callers share one initialization. A failure
 * (ContainerInitError) is not retried: the caller should exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return Promise.resolve();
  if (initializationPromise) return initializationPromise;

  initializationPromise = (async () => {
    registerRuntime(options);
    registerConfig();
    registerLogging();
    await registerPorts();
    registerServices();
    initialized = true;
    createBootstrapLogger('di').debug('Container initialized');
  })();
  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
