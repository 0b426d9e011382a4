/**
 * Bearer Token Issuing and Validation
 *
 * Tokens are HMAC-signed JWTs carrying the account id as `sub` and an absolute
 * `exp`. Validation is purely computational and never touches the database.
 */

import jwt from 'jsonwebtoken';
import type { AppConfig } from './config.js';

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export type TokenError = 'expired' | 'invalid_signature' | 'malformed';

export type TokenValidationResult =
  | { isValid: true; subject: string; expiresAt: Date }
  | { isValid: false; error: TokenError };

export interface TokenService {
  issue(subjectId: string, now: Date): IssuedToken;
  verify(token: string, now: Date): TokenValidationResult;
}

type TokenConfig = Pick<AppConfig, 'jwtSecret' | 'jwtAlgorithm' | 'accessTokenTtlMinutes'>;

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export function createTokenService(config: TokenConfig): TokenService {
  const ttlSeconds = config.accessTokenTtlMinutes * 60;

  return {
    issue(subjectId, now) {
      const iat = toSeconds(now);
      const exp = iat + ttlSeconds;
      const token = jwt.sign({ sub: subjectId, iat, exp }, config.jwtSecret, {
        algorithm: config.jwtAlgorithm,
      });
      return { token, expiresAt: new Date(exp * 1000) };
    },

    verify(token, now) {
      try {
        const decoded = jwt.verify(token, config.jwtSecret, {
          algorithms: [config.jwtAlgorithm],
          clockTimestamp: toSeconds(now),
        });

        if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.exp !== 'number') {
          return { isValid: false, error: 'malformed' };
        }

        return { isValid: true, subject: decoded.sub, expiresAt: new Date(decoded.exp * 1000) };
      } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
          return { isValid: false, error: 'expired' };
        }
        if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
          return { isValid: false, error: 'invalid_signature' };
        }
        return { isValid: false, error: 'malformed' };
      }
    },
  };
}

/**
 * Extract token from the Authorization header (`Bearer <token>`)
 */
export function extractBearerToken(headers: Record<string, string | undefined>): string | null {
  const authHeader = headers.authorization ?? headers.Authorization;
  if (!authHeader) return null;

  const [scheme, token, ...rest] = authHeader.trim().split(/\s+/);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }
  return token;
}
