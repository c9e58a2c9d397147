// Bearer token validity oracle used by the auth guard
import jwt from 'jsonwebtoken';

export interface TokenVerifier {
  isValid(token: string): boolean | Promise<boolean>;
}

const BEARER_PREFIX = /^Bearer\s+/i;

// HS256 JWT signed with a shared secret. Claims are not read: a token is either valid or not.
export class JwtTokenVerifier implements TokenVerifier {
  constructor(private readonly secret: string) {}

  isValid(token: string): boolean {
    if (!this.secret) return false;
    try {
      jwt.verify(token.replace(BEARER_PREFIX, ''), this.secret, { algorithms: ['HS256'] });
      return true;
    } catch {
      return false;
    }
  }
}
