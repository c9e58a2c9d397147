// Gateway health check: reports whether a route table can be served
import { Router, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { RouteSource } from '../routing/routeSource';

export function createHealthRouter(routes: RouteSource): Router {
  const router = Router();

  // Security headers and CORS only on the gateway's own endpoint; relayed responses stay untouched
  router.use(helmet());
  router.use(cors());

  router.get('/', async (_req: Request, res: Response): Promise<void> => {
    try {
      const table = await routes.current();
      res.status(200).json({
        status: 'ok',
        routes: table.length,
      });
    } catch (err) {
      // The load error names the document path; it goes to the log only
      console.error(`Health check: ${err instanceof Error ? err.message : String(err)}`);
      res.status(503).json({
        status: 'degraded',
        message: 'Route table unavailable',
      });
    }
  });

  return router;
}
