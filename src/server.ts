#!/usr/bin/env node
/**
 * HTTP server entry point: loads .env, builds the container, listens.
 */

import 'reflect-metadata';
import 'dotenv/config';
import { ContainerInitError, container, initializeContainer } from './di/container.js';
import { StudyRunHttpServer } from './http/http-server.js';
import { getBootstrapLogger } from './core/logging/index.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';

const logger = getBootstrapLogger();

async function main(): Promise<void> {
  await initializeContainer({ runtimeMode: { kind: 'production' } });
  await container.resolve(StudyRunHttpServer).start();
}

main().catch((error: unknown) => {
  const appError =
    error instanceof ContainerInitError ? error.appError : Err.startupFailed('listen', 'Server failed to start', error);
  logger.fatal({ err: error }, formatAppError(appError));
  process.exit(1);
});
