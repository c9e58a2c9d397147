// Express app factory: exported without listen() for Supertest compatibility
import express, { type Express } from 'express';

import { errorHandler } from './middleware/errorHandler';
import { createGatewayRouter, type GatewayDeps } from './routes/gateway';
import { createHealthRouter } from './routes/health';

export interface AppOptions extends GatewayDeps {
  healthPath?: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Relayed responses carry the backend's headers only
  app.disable('x-powered-by');
  app.disable('etag');

  // Body parsing: parsed bodies become the forwarded parameters
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check (before the gateway, which would otherwise try to route it)
  app.use(options.healthPath ?? '/_gateway/health', createHealthRouter(options.routes));

  // Everything else goes through the route table
  app.use(createGatewayRouter(options));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
