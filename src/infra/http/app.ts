import express from 'express';
import { AppConfig } from '../../config.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { TokenCodec } from '../../application/auth/tokenCodec.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createSwaggerSpec } from './swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDependencies {
  config: AppConfig;
  userRepo: UserRepo;
  clock?: () => Date;
}

/**
 * Build the Express application. The signing secret, algorithm and token
 * lifetime are read from `config` once here and stay fixed for the life
 * of the app.
 */
export function createApp({ config, userRepo, clock }: AppDependencies): express.Application {
  const hasher = new PasswordHasher(config.hasher);
  const codec = new TokenCodec({
    secret: config.jwt.secret,
    algorithm: config.jwt.algorithm,
    defaultExpiresInSeconds: config.jwt.accessTokenExpiresInSeconds,
    clock,
  });

  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(createApiRateLimiter(config.rateLimit.apiPerMinute));

  const openApi = createSwaggerSpec({
    title: config.appName,
    version: config.appVersion,
    serverUrl: `http://localhost:${config.port}`,
  });
  app.use(createSwaggerRoutes(openApi, config.appName));
  app.use(
    createHealthRoutes({
      appName: config.appName,
      appVersion: config.appVersion,
      userRepo,
      clock,
    })
  );
  app.use(
    '/auth',
    createAuthRoutes({
      userRepo,
      hasher,
      codec,
      loginRateLimiter: createLoginRateLimiter(config.rateLimit.loginPerMinute),
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ code: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
