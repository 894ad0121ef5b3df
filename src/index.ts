// DI Container exports
export { initializeContainer, container, resetContainer, ContainerInitError } from './di/container.js';
export { DI } from './di/tokens.js';

// Domain
export * from './domain/index.js';

// Session tokens
export * from './session-token/index.js';

// Run lifecycle and queries
export * from './lifecycle/index.js';

// Authorization
export * from './authorization/index.js';

// Use cases
export * from './use-cases/index.js';

// Ports
export type { RunRepositoryPort, RunRepositoryError } from './ports/run-repository.port.js';
export type { StudyCatalogPort, StudyCatalogError } from './ports/study-catalog.port.js';
export type { WorkerDirectoryPort, WorkerDirectoryError } from './ports/worker-directory.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { RandomEntropyPort } from './ports/random-entropy.port.js';

// Adapters
export { InMemoryRunRepository } from './infra/in-memory-run-repository.js';
export { InMemoryStudyCatalog } from './infra/in-memory-study-catalog.js';
export { InMemoryWorkerDirectory } from './infra/in-memory-worker-directory.js';
export { NodeTimeClock } from './infra/node-time-clock.js';
export { NodeRandomEntropy } from './infra/node-random-entropy.js';
export { loadCatalogFile, parseCatalog, EMPTY_CATALOG, type Catalog } from './infra/catalog-file.js';

// HTTP
export * from './http/index.js';

// Config, logging, errors
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export * from './core/logging/index.js';
export * from './errors/index.js';
