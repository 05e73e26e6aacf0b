import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import { createRequestLogger, logger } from '@askbridge/shared';
import type { BridgeConfig } from '../config/settings.js';
import { requireApiKey, API_KEY_HEADER } from '../middleware/api-key.js';
import { createApiRouter } from '../routes/api.js';
import { createHealthRouter } from '../routes/health.js';
import type { AskPipeline } from './ask-pipeline.js';
import type { MessagingClient } from './slack-client.js';

export interface ApiServerDeps {
  pipeline: Pick<AskPipeline, 'handleAsk' | 'deliver'>;
  slack: MessagingClient;
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class ApiServer {
  private app: Express;
  private server: Server | null = null;
  private config: BridgeConfig;

  constructor(config: BridgeConfig, deps: ApiServerDeps) {
    this.config = config;
    this.app = express();

    // Middleware
    this.app.use(helmet());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(createRequestLogger('bridge'));

    // CORS
    const allowedOrigins = new Set(config.server.corsOrigins);
    this.app.use((req, res, next) => {
      const origin = req.get('Origin');
      if (origin && allowedOrigins.has(origin)) {
        res.setHeader('Access-Control-Allow-Origin', origin);
        res.setHeader('Vary', 'Origin');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', `Content-Type, ${API_KEY_HEADER}`);
      }
      if (req.method === 'OPTIONS') {
        res.sendStatus(204);
        return;
      }
      next();
    });

    // Routes
    this.app.use('/health', createHealthRouter(config));
    this.app.use(
      '/',
      requireApiKey(config.auth.localApiKey),
      createApiRouter({
        pipeline: deps.pipeline,
        slack: deps.slack,
        browse: config.browse,
      })
    );

    this.app.use((_req, res) => {
      res.status(404).json({ success: false, error: 'Not found' });
    });

    // Body parser failures (bad JSON, oversized payloads) arrive here with a status
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = statusOf(error) ?? 500;
      if (status >= 500) {
        logger.error('API server error:', error);
      }
      res.status(status).json({
        success: false,
        error: status >= 500 ? 'Internal server error' : error instanceof Error ? error.message : 'Bad request',
      });
    });
  }

  getApp(): Express {
    return this.app;
  }

  /**
   * Start listening; resolves with the bound port (useful when port is 0).
   */
  start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);

      server.once('listening', () => {
        const address = server.address();
        const boundPort = address && typeof address === 'object' ? address.port : port;
        logger.info(`🌐 Bridge API server running on http://${host}:${boundPort}`);
        resolve(boundPort);
      });

      server.once('error', (error: Error) => {
        logger.error('API server error:', error);
        reject(error);
      });

      this.server = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolve();
      });
      this.server = null;
    });
  }
}
