// Backend forwarding: build the target address for a route and replay the request there with axios
import axios, { AxiosError, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { IncomingHttpHeaders } from 'http';
import { BackendTimeoutError, BackendUnreachableError } from '../errors';
import type { Route } from '../routing/routeTable';

export const FORWARD_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;
export type ForwardMethod = (typeof FORWARD_METHODS)[number];

export function isForwardMethod(method: string): method is ForwardMethod {
  return (FORWARD_METHODS as readonly string[]).includes(method);
}

// What the forwarder needs from the inbound request, independent of Express
export interface InboundCall {
  method: string;
  path: string;
  query: Record<string, unknown>;
  body: unknown;
  headers: IncomingHttpHeaders;
}

export interface ForwardResult {
  status: number;
  headers: Record<string, string | string[]>;
  body: Buffer;
}

export interface ForwardOptions {
  // 0 means no timeout
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_HOST = 'localhost';
const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

// `<host>:<port><path>`, host read from the environment variable the route names
export function buildTargetAddress(route: Route, path: string, env: NodeJS.ProcessEnv = process.env): string {
  const host = env[route.host] || DEFAULT_HOST;
  return `${host}:${route.port}${path}`;
}

// The address has no scheme; plain http unless the host variable already carried one
export function toRequestUrl(address: string): string {
  return SCHEME.test(address) ? address : `http://${address}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

// Query and body parameters merged, body keys winning; a non-object body is kept under `_json`
export function collectParams(call: Pick<InboundCall, 'query' | 'body'>): Record<string, unknown> {
  if (isPlainObject(call.body)) {
    // Spread, not Object.assign: a `__proto__` key in a JSON body stays an own key
    return { ...call.query, ...call.body };
  }
  const params: Record<string, unknown> = { ...call.query };
  if (call.body !== undefined && call.body !== null && !Buffer.isBuffer(call.body)) {
    params['_json'] = call.body;
  }
  return params;
}

function toOutgoingHeaders(headers: IncomingHttpHeaders): Record<string, string | string[]> {
  const outgoing: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) outgoing[name] = value;
  }
  return outgoing;
}

function toResultHeaders(headers: AxiosResponse['headers']): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string' || Array.isArray(value)) {
      result[name] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[name] = String(value);
    }
  }
  return result;
}

// A transport failure from axios; the flag check also covers errors built while axios is mocked
function isAxiosLikeError(err: unknown): err is AxiosError {
  return err instanceof AxiosError || (err instanceof Error && 'isAxiosError' in err && err.isAxiosError === true);
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function requestConfig(method: ForwardMethod, call: InboundCall, url: string): AxiosRequestConfig {
  const headers = toOutgoingHeaders(call.headers);
  const params = collectParams(call);
  switch (method) {
    case 'GET':
      return { method, url, headers, params };
    case 'POST':
    case 'PUT':
    case 'DELETE':
      // Original headers go out untouched, content-length included, even though the body is re-serialized
      return { method, url, headers, data: JSON.stringify(params) };
    default: {
      const unreachable: never = method;
      throw new Error(`Unhandled forward method: ${String(unreachable)}`);
    }
  }
}

/**
 * Replays the inbound call against the route's backend. Resolves to `null` when
 * the method cannot be forwarded; no backend call is made in that case.
 * Every backend status is a result. Transport failures become 502/504 errors.
 */
export async function forwardRequest(
  route: Route,
  call: InboundCall,
  options: ForwardOptions = {},
): Promise<ForwardResult | null> {
  if (!isForwardMethod(call.method)) return null;

  const address = buildTargetAddress(route, call.path, options.env);
  const config: AxiosRequestConfig = {
    ...requestConfig(call.method, call, toRequestUrl(address)),
    timeout: options.timeoutMs ?? 0,
    responseType: 'arraybuffer',
    decompress: false,
    maxRedirects: 0,
    validateStatus: () => true,
  };

  try {
    const response = await axios.request<Buffer>(config);
    return {
      status: response.status,
      headers: toResultHeaders(response.headers),
      body: Buffer.from(response.data),
    };
  } catch (err) {
    if (isAxiosLikeError(err)) {
      if (err.code !== undefined && TIMEOUT_CODES.has(err.code)) {
        throw new BackendTimeoutError(address, { cause: err });
      }
      throw new BackendUnreachableError(address, { cause: err });
    }
    throw err;
  }
}
