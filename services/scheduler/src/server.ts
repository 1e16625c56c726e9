import type { Server } from 'node:http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { PublishScheduler } from './cron.js';
import { logger } from './logger.js';
import type { Repository } from './repository.js';
import { createChannelRoutes } from './routes/channels.js';
import { sendError } from './routes/errors.js';
import { createPostRoutes } from './routes/posts.js';
import type { Publisher } from './services/publisher.js';
import { isRecord } from './types.js';

export interface AppServerContext {
  repository: Repository;
  publisher: Pick<Publisher, 'publish'>;
  scheduler?: Pick<PublishScheduler, 'getStatus' | 'stop'>;
  allowedOrigins?: string[];
  now?: () => Date;
}

export class AppServer {
  private readonly app: express.Application;
  private server: Server | null = null;

  constructor(private readonly context: AppServerContext) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(
      cors({
        origin: this.context.allowedOrigins ?? ['http://localhost:3000'],
        credentials: true,
      })
    );
    const limiter = rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 300,
      message: { error: 'RATE_LIMITED', message: 'Too many requests from this IP, please try again later.' },
      standardHeaders: true,
      legacyHeaders: false,
    });
    this.app.use('/api', limiter);
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        scheduler: this.context.scheduler?.getStatus() ?? null,
      });
    });

    this.app.use(
      '/api/posts',
      createPostRoutes({ repository: this.context.repository, publisher: this.context.publisher, now: this.context.now })
    );
    this.app.use('/api/channels', createChannelRoutes({ repository: this.context.repository }));

    this.app.use((_req, res) => {
      res.status(404).json({ error: 'NOT_FOUND', message: 'Endpoint not found' });
    });

    this.app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (isRecord(error) && error.type === 'entity.parse.failed') {
        res.status(400).json({ error: 'VALIDATION', message: 'Malformed JSON body' });
        return;
      }
      sendError(res, error);
    });
  }

  getApp(): express.Application {
    return this.app;
  }

  start(port: number): Server {
    this.server = this.app.listen(port, () => {
      logger.info({ port }, 'VelvetQueue API listening');
    });
    return this.server;
  }

  async close(): Promise<void> {
    this.context.scheduler?.stop();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    this.context.repository.close();
  }
}
