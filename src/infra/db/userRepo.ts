import { ConflictError } from '../../application/errors.js';
import { NewUser, User, UserRepository } from '../../domain/auth/user.js';
import { DbPool, isUniqueViolation } from './pool.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class PgUserRepo implements UserRepository {
  constructor(private pool: DbPool) {}

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1 OR email = $2 LIMIT 1`,
      [username, email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, created_at)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.email, user.passwordHash, user.createdAt]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Username or email already registered');
      }
      throw error;
    }
  }
}
