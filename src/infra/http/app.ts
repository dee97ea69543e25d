import express from 'express';
import { AuthGate } from '../../application/auth/authGate.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { TokenService } from '../../application/auth/tokenService.js';
import type { Clock } from '../../application/clock.js';
import { systemClock } from '../../application/clock.js';
import { CreateNoteUseCase } from '../../application/notes/createNote.js';
import { DeleteNoteUseCase } from '../../application/notes/deleteNote.js';
import { NoteQueries } from '../../application/notes/queries.js';
import { UpdateNoteUseCase } from '../../application/notes/updateNote.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { UserRepository } from '../../domain/auth/user.js';
import { NoteRepository } from '../../domain/notes/note.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthRoutes } from './routes/auth.js';
import { createNoteRoutes } from './routes/notes.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';

export interface AppDependencies {
  userRepo: UserRepository;
  noteRepo: NoteRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  clock?: Clock;
  /** Resolves when the store answers; used by /healthz. */
  checkStore?: () => Promise<void>;
  /** Serve the Swagger UI under /docs. */
  docs?: boolean;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const clock = deps.clock ?? systemClock;
  const checkStore = deps.checkStore ?? (async () => undefined);

  const authGate = new AuthGate(deps.tokenService, deps.userRepo);

  const app = express();
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    withTimeout(checkStore(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        console.error('Health check failed:', error);
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  if (deps.docs) {
    app.use(createSwaggerRoutes());
  }

  app.use(
    '/api/auth',
    createAuthRoutes({
      registerUseCase: new RegisterUseCase(deps.userRepo, deps.passwordHasher, clock),
      loginUseCase: new LoginUseCase(deps.userRepo, deps.passwordHasher, deps.tokenService),
    })
  );

  app.use('/api/users', createUserRoutes(authGate));

  app.use(
    '/api/notes',
    createNoteRoutes({
      authGate,
      createNoteUseCase: new CreateNoteUseCase(deps.noteRepo, clock),
      updateNoteUseCase: new UpdateNoteUseCase(deps.noteRepo, clock),
      deleteNoteUseCase: new DeleteNoteUseCase(deps.noteRepo),
      queries: new NoteQueries(deps.noteRepo),
    })
  );

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
