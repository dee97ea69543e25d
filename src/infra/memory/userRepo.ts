import { randomUUID } from 'crypto';
import { ConflictError } from '../../application/errors.js';
import { NewUser, User, UserRepository } from '../../domain/auth/user.js';

/**
 * Map-backed credential store for local runs (STORE=memory) and tests.
 * Enforces the same uniqueness rules as the users table.
 */
export class InMemoryUserRepo implements UserRepository {
  private users = new Map<string, User>();

  async findByUsername(username: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.username === username) {
        return user;
      }
    }
    return null;
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    return this.findTaken(username, email);
  }

  async create(newUser: NewUser): Promise<User> {
    // Plays the part of the unique constraints on the users table
    if (this.findTaken(newUser.username, newUser.email)) {
      throw new ConflictError('Username or email already registered');
    }

    const user: User = { id: randomUUID(), ...newUser };
    this.users.set(user.id, user);
    return user;
  }

  private findTaken(username: string, email: string): User | null {
    for (const user of this.users.values()) {
      if (user.username === username || user.email === email) {
        return user;
      }
    }
    return null;
  }
}
