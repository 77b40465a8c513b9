import express, { Express, Request, Response, NextFunction } from 'express';
import { IncomingMessage, Server, ServerResponse } from 'http';
import { Logger, errorMeta } from './utils/logger.js';

export interface HealthDependencies {
  logger: Logger;
  isWatching: () => boolean;
  checkConnectivity: () => Promise<boolean>;
  metricsHandler?: (req: IncomingMessage, res: ServerResponse) => void;
  info: {
    resource: string;
    namespace: string;
    environment: string;
    exposeErrors: boolean;
  };
}

export function createServer(deps: HealthDependencies): Express {
  const { logger } = deps;
  const app = express();

  // Middleware
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path}`, {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  // Health check endpoint (liveness probe)
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
    });
  });

  // Readiness probe endpoint
  app.get('/ready', (_req: Request, res: Response, next: NextFunction) => {
    if (!deps.isWatching()) {
      res.status(503).json({
        status: 'not ready',
        reason: 'Resource watch not started',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    deps
      .checkConnectivity()
      .then((connected) => {
        if (!connected) {
          res.status(503).json({
            status: 'not ready',
            reason: 'Cannot connect to Kubernetes API',
            timestamp: new Date().toISOString(),
          });
          return;
        }
        res.status(200).json({
          status: 'ready',
          timestamp: new Date().toISOString(),
          checks: {
            kubernetes: 'connected',
            watch: 'running',
          },
        });
      })
      .catch(next);
  });

  // Basic info endpoint
  app.get('/info', (_req: Request, res: Response) => {
    res.json({
      name: 'bundle-operator',
      version: process.env.npm_package_version || '0.1.0',
      environment: deps.info.environment,
      resource: deps.info.resource,
      namespace: deps.info.namespace,
    });
  });

  // Prometheus metrics
  const { metricsHandler } = deps;
  if (metricsHandler) {
    app.get('/metrics', (req: Request, res: Response) => {
      metricsHandler(req, res);
    });
  }

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in Express', errorMeta(err));
    res.status(500).json({
      error: 'Internal Server Error',
      message: deps.info.exposeErrors ? err.message : 'An error occurred',
    });
  });

  return app;
}

export function startServer(app: Express, port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Health server listening on port ${port}`, {
        endpoints: ['/health', '/ready', '/info', '/metrics'],
      });
      resolve(server);
    });

    server.on('error', (error) => {
      logger.error('Failed to start health server', errorMeta(error));
      reject(error);
    });
  });
}
