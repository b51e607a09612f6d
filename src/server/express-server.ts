/**
 * Express Server
 *
 * Read-only history API with middleware, routes, and error handling.
 */

import type {
  Request,
  Response,
  NextFunction,
} from 'express';
import express from 'express';
import type { Server } from 'node:http';
import cors from 'cors';
import helmet from 'helmet';
import type { ServerConfig, ServerDependencies } from './types.js';
import { createModuleLogger } from '../utils/logger.js';
import { errorHandler, notFoundHandler } from './middleware/http-errors.js';
import type { ErrorBody } from './middleware/http-errors.js';
import { requestIdOf, requestLogger } from './middleware/request-logger.js';
import { createHealthRouter } from './routes/health.js';
import { createHistoryRouter } from './routes/history.js';

/**
 * Express Server class
 */
export class ExpressServer {
  private app: express.Application;
  private server?: Server;
  private config: ServerConfig;
  private logger = createModuleLogger('server');

  constructor(config: ServerConfig, private readonly dependencies: ServerDependencies) {
    this.config = config;
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    const app = this.app;

    // Security headers
    if (this.config.enableHelmet !== false) {
      app.use(helmet({
        contentSecurityPolicy: false, // Disable for API-only
      }));
    }

    // CORS
    if (this.config.enableCors !== false) {
      app.use(cors({
        origin: this.config.corsOrigins || '*',
      }));
    }

    // Request logging
    if (this.config.enableRequestLogging !== false) {
      app.use(requestLogger);
    }

    const requestTimeout = this.config.requestTimeout;
    if (requestTimeout) {
      app.use((_req: Request, res: Response, next: NextFunction) => {
        res.setTimeout(requestTimeout, () => {
          if (!res.headersSent) {
            const body: ErrorBody = {
              error: 'Service Unavailable',
              message: `History query exceeded ${requestTimeout}ms`,
              code: 'REQUEST_TIMEOUT',
              requestId: requestIdOf(res),
            };
            res.status(503).json(body);
          }
        });
        next();
      });
    }
  }

  /**
   * Setup routes
   */
  private setupRoutes(): void {
    const app = this.app;

    app.use('/health', createHealthRouter(this.dependencies));
    app.use('/api/history', createHistoryRouter(this.dependencies));
  }

  /**
   * Setup error handlers
   */
  private setupErrorHandlers(): void {
    const app = this.app;

    app.use(notFoundHandler);
    app.use(errorHandler);
  }

  /**
   * Get the Express app instance
   */
  getApp(): express.Application {
    return this.app;
  }

  /**
   * Port the server is bound to, once started
   */
  get port(): number | undefined {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return undefined;
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const host = this.config.host || '0.0.0.0';

      this.server = this.app.listen(this.config.port, host, () => {
        this.logger.info(`Server listening on http://${host}:${this.port ?? this.config.port}`);
        resolve();
      });

      this.server.on('error', (err: Error) => {
        this.logger.error(err, 'Server error');
        reject(err);
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((err) => {
        if (err) {
          this.logger.error(err, 'Error closing server');
          reject(err);
        } else {
          this.logger.info('Server closed');
          resolve();
        }
      });
    });
  }
}
