import type { User, UserRepository } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import type { TokenService } from './tokenService.js';

const BEARER_SCHEME = 'bearer';

/**
 * Resolves the user behind an Authorization header. Every failure (missing
 * header, wrong scheme, bad or expired token, user gone) throws the same
 * UnauthorizedError.
 */
export class AuthGate {
  constructor(
    private tokenService: TokenService,
    private userRepo: UserRepository
  ) {}

  async authenticate(authorizationHeader: string | undefined): Promise<User> {
    if (!authorizationHeader) {
      throw new UnauthorizedError();
    }

    // Scheme names are case-insensitive (RFC 7235)
    const match = /^(\S+)\s+(\S+)\s*$/.exec(authorizationHeader.trim());
    if (!match || match[1].toLowerCase() !== BEARER_SCHEME) {
      throw new UnauthorizedError();
    }

    const token = match[2];

    const result = this.tokenService.validate(token);
    if (!result.valid) {
      throw new UnauthorizedError();
    }

    const user = await this.userRepo.findByUsername(result.subject);
    if (!user) {
      throw new UnauthorizedError();
    }

    return user;
  }
}
