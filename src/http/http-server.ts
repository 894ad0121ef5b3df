import express, { type Application, type Request, type Response } from 'express';
import type { AddressInfo } from 'node:net';
import { createServer, type Server } from 'node:http';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { StudyRunUseCases } from '../use-cases/index.js';
import { createStudyRunRouter } from './routes.js';

/**
 * Express application: request log, health check, study-run
 * routes, JSON 404. No listening socket; see StudyRunHttpServer.
 */
export function createApp(useCases: StudyRunUseCases, logger: Logger): Application {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'HTTP request'
      );
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ success: true, status: 'healthy', uptime: process.uptime() });
  });

  app.use(createStudyRunRouter(useCases, logger));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, code: 'NOT_FOUND', error: `No route for ${req.method} ${req.path}` });
  });

  return app;
}

@singleton()
export class StudyRunHttpServer {
  private readonly app: Application;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Services.UseCases) useCases: StudyRunUseCases,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Runtime.ProcessSignals) private readonly processSignals: ProcessSignals
  ) {
    this.logger = loggerFactory.create('HttpServer');
    this.app = createApp(useCases, this.logger);
  }

  /** Listens on the configured host and port; SIGINT / SIGTERM close the server. */
  async start(): Promise<AddressInfo> {
    if (this.server) throw new Error('HTTP server already started');

    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.http.port, this.config.http.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }

    this.processSignals.onShutdown('SIGINT', () => this.stop());
    this.processSignals.onShutdown('SIGTERM', () => this.stop());

    this.logger.info({ host: address.address, port: address.port }, 'Listening');
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info('HTTP server stopped');
  }
}
