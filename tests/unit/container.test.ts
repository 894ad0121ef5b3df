import { describe, it, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../../src/config/app-config.js';
import { ContainerInitError, container, initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import { DI } from '../../src/di/tokens.js';
import { asStudyId, asWorkerId } from '../../src/domain/ids.js';
import { InMemoryStudyCatalog } from '../../src/infra/in-memory-study-catalog.js';
import type { StudyCatalogPort } from '../../src/ports/study-catalog.port.js';
import { SessionTokenCodec } from '../../src/session-token/session-token-codec.js';
import { RequestContext } from '../../src/session-token/request-context.js';
import type { StudyRunUseCases } from '../../src/use-cases/index.js';
import { CapturingLoggerFactory } from '../helpers/capturing-logger.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { DEFAULT_BATCH, STUDY } from '../fakes/catalog.fixtures.js';

const EXAMPLE_CATALOG = fileURLToPath(new URL('../../catalog.example.json', import.meta.url));

function config(catalogFile?: string) {
  const env: Record<string, string> = { STUDY_RUNS_COOKIE_BASE: 'RUNS', STUDY_RUNS_LOG_LEVEL: 'silent' };
  if (catalogFile !== undefined) env['STUDY_RUNS_CATALOG_FILE'] = catalogFile;
  return expectOk(loadConfig({ env }), 'loading test config');
}

function register(cfg = config()): CapturingLoggerFactory {
  const loggers = new CapturingLoggerFactory();
  container.register(DI.Config.App, { useValue: cfg });
  container.register(DI.Logging.Factory, { useValue: loggers });
  return loggers;
}

describe('DI container', () => {
  afterEach(() => {
    resetContainer();
  });

  it('wires services from the registered config', async () => {
    register();
    await initializeContainer({ runtimeMode: { kind: 'test' } });

    expect(isInitialized()).toBe(true);
    const codec = container.resolve<SessionTokenCodec>(DI.Services.SessionTokenCodec);
    expect(codec.cookiePrefix).toBe('RUNS_');
    expect(container.resolve(DI.Services.UseCases)).toBe(container.resolve(DI.Services.UseCases));
  });

  it('starts with an empty catalog when no file is configured', async () => {
    register();
    await initializeContainer({ runtimeMode: { kind: 'test' } });

    const useCases = container.resolve<StudyRunUseCases>(DI.Services.UseCases);
    const error = expectErr(
      await useCases.startStudyRun(new RequestContext([]), {
        studyId: asStudyId(1),
        batchId: null,
        workerId: asWorkerId(2),
        assignmentId: null,
      }),
      'starting'
    );
    expect(error.code).toBe('STUDY_NOT_FOUND');
  });

  it('loads the configured catalog file', async () => {
    register(config(EXAMPLE_CATALOG));
    await initializeContainer({ runtimeMode: { kind: 'test' } });

    const useCases = container.resolve<StudyRunUseCases>(DI.Services.UseCases);
    const ctx = new RequestContext([]);
    const started = expectOk(
      await useCases.startStudyRun(ctx, { studyId: asStudyId(1), batchId: null, workerId: asWorkerId(2), assignmentId: null }),
      'starting'
    );
    expect(started.component.title).toBe('Consent');
    expect(ctx.pendingCookieMutations().map((m) => m.name)).toEqual(['RUNS_0']);
  });

  it('keeps ports registered before initialization', async () => {
    register();
    const catalog = new InMemoryStudyCatalog([STUDY], [DEFAULT_BATCH]);
    container.register<StudyCatalogPort>(DI.Ports.StudyCatalog, { useValue: catalog });

    await initializeContainer({ runtimeMode: { kind: 'test' } });

    expect(container.resolve(DI.Ports.StudyCatalog)).toBe(catalog);
  });

  it('fails with the startup error when the catalog file is missing', async () => {
    register(config('/nonexistent/catalog.json'));

    const failure = await initializeContainer({ runtimeMode: { kind: 'test' } }).then(
      () => null,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(ContainerInitError);
    expect(failure instanceof ContainerInitError && failure.appError._tag).toBe('StartupFailed');
    expect(isInitialized()).toBe(false);
  });
});
