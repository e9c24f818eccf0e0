import express from 'express';
import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { UserQueries } from '../../application/users/queries.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { UserRepository } from '../../domain/auth/user.js';
import type { Logger } from '../logger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';

export interface AppDependencies {
  userRepo: UserRepository;
  hasher: PasswordHasher;
  logger: Logger;
  /** Resolves when the store answers; used by /healthz. */
  checkHealth: () => Promise<void>;
}

const HEALTH_TIMEOUT_MS = 2000;

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
  const { userRepo, hasher, logger, checkHealth } = deps;

  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));

  app.get('/healthz', (_req, res) => {
    void withTimeout(checkHealth(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        logger.warn('Health check failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(
    createAuthRoutes({
      registerUseCase: new RegisterUseCase(userRepo, hasher, logger),
      loginUseCase: new LoginUseCase(userRepo, hasher, logger),
    })
  );
  app.use('/users', createUserRoutes(new UserQueries(userRepo)));

  app.use((_req, res) => {
    res.status(404).json({ code: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
