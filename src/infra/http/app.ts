import express from 'express';
import type { UserStore } from '../../domain/auth/user.js';
import type { BoardStore } from '../../domain/board/board.js';
import { Argon2PasswordHasher, type PasswordHasher } from '../../domain/auth/password.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { CurrentUserQuery } from '../../application/auth/currentUser.js';
import type { TokenService } from '../../application/auth/tokens.js';
import { BoardService } from '../../application/board/boardService.js';
import type { SafeLogger } from '../logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createBoardRoutes } from './routes/boards.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRateLimiters, type RateLimitOptions } from './middleware/rateLimit.js';
import { requestId } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDeps {
  userStore: UserStore;
  boardStore: BoardStore;
  tokens: TokenService;
  logger: SafeLogger;
  rateLimit: RateLimitOptions;
  passwordHasher?: PasswordHasher;
  /** Backs GET /healthz; rejects when storage is unavailable. */
  healthCheck?: () => Promise<void>;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();
  const passwordHasher = deps.passwordHasher ?? new Argon2PasswordHasher();
  const limiters = createRateLimiters(deps.rateLimit);

  const registerUseCase = new RegisterUseCase(deps.userStore, passwordHasher, deps.tokens);
  const loginUseCase = new LoginUseCase(deps.userStore, passwordHasher, deps.tokens);
  const currentUserQuery = new CurrentUserQuery(deps.userStore);
  const boardService = new BoardService(deps.boardStore);

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(requestLogger(deps.logger));
  app.use(express.json());
  app.use(limiters.api);

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    const check = deps.healthCheck ?? (async () => {});
    withTimeout(check(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        deps.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/auth',
    createAuthRoutes({
      register: registerUseCase,
      login: loginUseCase,
      currentUser: currentUserQuery,
      tokens: deps.tokens,
      loginRateLimiter: limiters.login,
    })
  );

  app.use('/boards', authMiddleware(deps.tokens), createBoardRoutes(boardService));

  app.use((_req, res) => {
    res.status(404).json({ code: 'NOT_FOUND', message: 'route not found' });
  });

  // Error handler (must be last)
  app.use(errorHandler(deps.logger));

  return app;
}
