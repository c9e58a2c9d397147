// Auth guard: routes with auth enabled need a valid token in the `authorization` header
import type { IncomingHttpHeaders } from 'http';
import type { Route } from '../routing/routeTable';
import type { TokenVerifier } from '../services/tokenVerifier';

export type AuthDecision = { kind: 'forward' } | { kind: 'reject' };

const FORWARD: AuthDecision = { kind: 'forward' };
const REJECT: AuthDecision = { kind: 'reject' };

export function extractToken(headers: IncomingHttpHeaders): string | undefined {
  const value = headers['authorization'];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// Missing and invalid tokens get the same decision; callers cannot tell them apart
export async function authenticate(
  route: Route,
  headers: IncomingHttpHeaders,
  verifier: TokenVerifier,
): Promise<AuthDecision> {
  if (!route.auth) return FORWARD;

  const token = extractToken(headers);
  if (token === undefined) return REJECT;

  try {
    return (await verifier.isValid(token)) ? FORWARD : REJECT;
  } catch (err) {
    console.error(`Token verifier failed: ${err instanceof Error ? err.message : String(err)}`);
    return REJECT;
  }
}
