import dotenv from 'dotenv';
import { TokenService } from '../../application/auth/tokenService.js';
import { AppConfig, loadConfig } from '../../config.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { PgNoteRepo } from '../db/noteRepo.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { InMemoryNoteRepo } from '../memory/noteRepo.js';
import { InMemoryUserRepo } from '../memory/userRepo.js';
import { AppDependencies, createApp } from './app.js';

dotenv.config();

function buildDependencies(config: AppConfig): AppDependencies {
  const passwordHasher = new PasswordHasher(config.passwordHashing);
  const tokenService = new TokenService({
    secret: config.auth.jwtSecret,
    ttlMinutes: config.auth.accessTokenTtlMinutes,
  });

  if (config.store.kind === 'memory') {
    console.warn('Using the in-memory store; data is lost on restart');
    return {
      userRepo: new InMemoryUserRepo(),
      noteRepo: new InMemoryNoteRepo(),
      passwordHasher,
      tokenService,
      docs: true,
    };
  }

  const pool = createPool(config.store.databaseUrl);
  return {
    userRepo: new PgUserRepo(pool),
    noteRepo: new PgNoteRepo(pool),
    passwordHasher,
    tokenService,
    checkStore: async () => {
      await pool.query('SELECT 1');
    },
    docs: true,
  };
}

// Refuses to start on invalid configuration (ConfigError)
const config = loadConfig();
const app = createApp(buildDependencies(config));

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
});

export default app;
