// Gateway pipeline: match route → authenticate → forward → relay
import { Router, Request, Response } from 'express';
import { authenticate } from '../middleware/authGuard';
import { relayResponse, sendMessage } from '../middleware/responseRelay';
import { matchRoute } from '../routing/routeMatcher';
import type { RouteSource } from '../routing/routeSource';
import { forwardRequest, type InboundCall } from '../services/backendClient';
import type { TokenVerifier } from '../services/tokenVerifier';

export interface GatewayDeps {
  routes: RouteSource;
  verifier: TokenVerifier;
  backendTimeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

function toInboundCall(req: Request): InboundCall {
  return {
    method: req.method,
    path: req.path,
    query: req.query,
    body: req.body,
    headers: req.headers,
  };
}

export function createGatewayRouter(deps: GatewayDeps): Router {
  const router = Router();

  // Every request lands here; thrown errors (config, backend) go to the error handler
  router.use(async (req: Request, res: Response): Promise<void> => {
    const table = await deps.routes.current();

    const matched = matchRoute(table, req.method, req.path);
    if (!matched) {
      sendMessage(res, 404, 'Route is not available');
      return;
    }

    const decision = await authenticate(matched.route, req.headers, deps.verifier);
    if (decision.kind === 'reject') {
      sendMessage(res, 401, 'Missing token');
      return;
    }

    const result = await forwardRequest(matched.route, toInboundCall(req), {
      timeoutMs: deps.backendTimeoutMs,
      env: deps.env,
    });
    relayResponse(res, result);
  });

  return router;
}
