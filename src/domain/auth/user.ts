/**
 * User domain entity.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

/**
 * What callers get to see of a user. The password hash never leaves the store.
 */
export interface PublicUser {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
}

/**
 * Credential store. Implementations must enforce username and email
 * uniqueness on insert and report a violation as a ConflictError.
 */
export interface UserRepository {
  findByUsername(username: string): Promise<User | null>;
  /** Single lookup matching either field. */
  findByUsernameOrEmail(username: string, email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
  };
}
