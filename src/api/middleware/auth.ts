/**
 * Authentication Middleware - validates bearer tokens before analysis
 */

import { createHash, timingSafeEqual } from 'crypto';
import { AuthResult } from '../../types/api';

/** Token validation function type */
export type TokenValidator = (token: string) => Promise<AuthResult>;

const BEARER_PREFIX = 'Bearer ';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Validator that accepts any of a fixed set of API tokens
 */
export function createStaticTokenValidator(tokens: readonly string[]): TokenValidator {
  const digests = tokens.map(digest);

  return async (token: string): Promise<AuthResult> => {
    const candidate = digest(token);
    const index = digests.findIndex(d => timingSafeEqual(d, candidate));
    if (index === -1) {
      return { authenticated: false, error: 'Invalid token' };
    }
    return { authenticated: true, clientId: `token_${index + 1}` };
  };
}

/**
 * Authentication middleware
 */
export class AuthMiddleware {
  private tokenValidator: TokenValidator;

  constructor(tokenValidator: TokenValidator) {
    this.tokenValidator = tokenValidator;
  }

  /**
   * Authenticate a request from its Authorization header
   */
  async authenticate(authHeader?: string): Promise<AuthResult> {
    if (!authHeader) {
      return { authenticated: false, error: 'Missing authorization header' };
    }

    if (!authHeader.startsWith(BEARER_PREFIX)) {
      return { authenticated: false, error: 'Invalid token format' };
    }

    const token = authHeader.slice(BEARER_PREFIX.length).trim();
    if (token.length === 0) {
      return { authenticated: false, error: 'Missing authentication token' };
    }

    return this.tokenValidator(token);
  }

  /**
   * Set custom token validator
   */
  setTokenValidator(validator: TokenValidator): void {
    this.tokenValidator = validator;
  }
}

/**
 * Create auth middleware accepting the given tokens
 */
export function createAuthMiddleware(tokens: readonly string[] = []): AuthMiddleware {
  return new AuthMiddleware(createStaticTokenValidator(tokens));
}
