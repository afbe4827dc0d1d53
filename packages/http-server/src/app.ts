/**
 * Consent callback HTTP server
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Server } from 'node:http';
import { logger } from '@docdesk/observability';
import { setupHealthRoutes } from './routes/health-routes.js';
import { setupOAuthCallbackRoutes, type OAuthCallbackRoutesOptions } from './routes/oauth-callback-routes.js';

export interface CallbackAppOptions extends OAuthCallbackRoutesOptions {
  now?: () => Date;
}

export function createApp(options: CallbackAppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'none'"],
        styleSrc: ["'self'"],
      },
    },
  }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug('HTTP request', { method: req.method, path: req.path });
    next();
  });

  const router = express.Router();
  setupHealthRoutes(router, { now: options.now });
  setupOAuthCallbackRoutes(router, options);
  app.use(router);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Catch-all error handler; express recognises it by its four parameters
  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled HTTP error', { path: req.path, error: error.message });
    if (res.headersSent) {
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export interface CallbackServerOptions extends CallbackAppOptions {
  port: number;
  host: string;
}

export class CallbackServer {
  private readonly app: Express;
  private server?: Server;

  constructor(private readonly options: CallbackServerOptions) {
    this.app = createApp(options);
  }

  getApp(): Express {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host);

      server.once('error', (error: Error) => {
        logger.error('HTTP server error', { error: error.message });
        reject(error);
      });

      server.once('listening', () => {
        logger.info('OAuth callback server listening', {
          host: this.options.host,
          port: this.options.port,
        });
        resolve();
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      server.close((error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        this.server = undefined;
        logger.info('OAuth callback server stopped');
        resolve();
      });
    });
  }
}
