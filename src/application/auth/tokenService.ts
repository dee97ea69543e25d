import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';

const ALGORITHM = 'HS256';

export interface TokenServiceOptions {
  secret: string;
  /** Default lifetime of issued tokens. */
  ttlMinutes: number;
  clock?: Clock;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export type TokenInvalidReason = 'malformed' | 'bad_signature' | 'expired' | 'missing_subject';

export type TokenValidation =
  | { valid: true; subject: string; expiresAt: Date }
  | { valid: false; reason: TokenInvalidReason };

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and validates signed, time-limited access tokens (JWT, HS256).
 * The subject claim carries the username.
 */
export class TokenService {
  private readonly clock: Clock;

  constructor(private readonly options: TokenServiceOptions) {
    this.clock = options.clock ?? systemClock;
  }

  issue(subject: string, ttlMinutes: number = this.options.ttlMinutes): IssuedToken {
    const issuedAt = toSeconds(this.clock());
    const exp = issuedAt + ttlMinutes * 60;

    const token = jwt.sign({ sub: subject, iat: issuedAt, exp }, this.options.secret, {
      algorithm: ALGORITHM,
    });

    return { token, expiresAt: new Date(exp * 1000) };
  }

  /**
   * Never throws: every failure is reported as an invalid result.
   */
  validate(token: string): TokenValidation {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toSeconds(this.clock()),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return { valid: false, reason: 'expired' };
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        return { valid: false, reason: 'bad_signature' };
      }
      return { valid: false, reason: 'malformed' };
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number') {
      return { valid: false, reason: 'malformed' };
    }
    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      return { valid: false, reason: 'missing_subject' };
    }

    return { valid: true, subject: payload.sub, expiresAt: new Date(payload.exp * 1000) };
  }
}
