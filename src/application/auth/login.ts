import { PasswordHasher } from '../../domain/auth/password.js';
import { User, UserRepository } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import { TokenService } from './tokenService.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  access_token: string;
  token_type: 'bearer';
  expires_at: string;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private passwordHasher: PasswordHasher,
    private tokenService: TokenService
  ) {}

  /**
   * Returns null for an unknown username and for a wrong password alike.
   */
  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.userRepo.findByUsername(username);
    if (!user) {
      return null;
    }

    const isValid = await this.passwordHasher.verify(password, user.passwordHash);
    return isValid ? user : null;
  }

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.authenticate(command.username, command.password);
    if (!user) {
      throw new UnauthorizedError('Incorrect username or password');
    }

    const { token, expiresAt } = this.tokenService.issue(user.username);

    return {
      access_token: token,
      token_type: 'bearer',
      expires_at: expiresAt.toISOString(),
    };
  }
}
