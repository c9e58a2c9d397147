// Response relay: write the backend's answer back to the caller unchanged
import type { Response } from 'express';
import type { ForwardResult } from '../services/backendClient';

export interface ErrorMessage {
  message: string;
}

export function sendMessage(res: Response, status: number, message: string): void {
  res.status(status).json({ message } satisfies ErrorMessage);
}

export function relayResponse(res: Response, result: ForwardResult | null): void {
  if (result === null) {
    sendMessage(res, 405, 'Method is not supported');
    return;
  }

  // Node's setHeader/end, not Express's set/send: no charset, etag or content-type is added
  for (const [name, value] of Object.entries(result.headers)) {
    res.setHeader(name, value);
  }
  res.statusCode = result.status;
  res.end(result.body);
}
