import { PasswordHasher } from '../../domain/auth/password.js';
import { PublicUser, UserRepository, toPublicUser } from '../../domain/auth/user.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepository,
    private passwordHasher: PasswordHasher,
    private clock: Clock = systemClock
  ) {}

  async execute(command: RegisterCommand): Promise<PublicUser> {
    // The store's unique constraints still guard against concurrent registrations
    const existing = await this.userRepo.findByUsernameOrEmail(command.username, command.email);
    if (existing) {
      throw new ConflictError('Username or email already registered');
    }

    const passwordHash = await this.passwordHasher.hash(command.password);

    const user = await this.userRepo.create({
      username: command.username,
      email: command.email,
      passwordHash,
      createdAt: this.clock(),
    });

    return toPublicUser(user);
  }
}
