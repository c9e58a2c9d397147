// Turn anything thrown inside the pipeline into a definite `{ message }` response
import { Request, Response, NextFunction } from 'express';
import { BackendTimeoutError, BackendUnreachableError, ConfigLoadError, GatewayError } from '../errors';
import { sendMessage } from './responseRelay';

// Messages written to callers; the thrown error's own message only goes to the log
const CALLER_MESSAGES = {
  config: 'Route configuration is not available',
  unreachable: 'Service is not reachable',
  timeout: 'Service did not respond in time',
  badRequest: 'Malformed request body',
  tooLarge: 'Request body is too large',
  internal: 'Internal server error',
} as const;

// body-parser errors carry a 4xx `status` and a `type` such as 'entity.parse.failed'
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

// 400 is a parse failure; other body-parser statuses (415 charset or encoding) keep their own message
function bodyParserMessage(err: Error & { status: number }): string {
  if (err.status === 400) return CALLER_MESSAGES.badRequest;
  if (err.status === 413) return CALLER_MESSAGES.tooLarge;
  return err.message;
}

function callerMessage(err: GatewayError): string {
  if (err instanceof ConfigLoadError) return CALLER_MESSAGES.config;
  if (err instanceof BackendTimeoutError) return CALLER_MESSAGES.timeout;
  if (err instanceof BackendUnreachableError) return CALLER_MESSAGES.unreachable;
  return err.status >= 500 ? CALLER_MESSAGES.internal : err.message;
}

// Express 5 error handler: 4 params required
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (res.headersSent) {
    console.error(`${req.method} ${req.originalUrl} failed after the response started:`, err);
    res.end();
    return;
  }

  if (err instanceof GatewayError) {
    console.error(`${req.method} ${req.originalUrl} → ${err.status}: ${err.message}`);
    sendMessage(res, err.status, callerMessage(err));
    return;
  }

  if (isBodyParserError(err)) {
    sendMessage(res, err.status, bodyParserMessage(err));
    return;
  }

  console.error(`${req.method} ${req.originalUrl} → 500:`, err);
  sendMessage(res, 500, CALLER_MESSAGES.internal);
}
