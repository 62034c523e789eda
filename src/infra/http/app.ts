import express from 'express';
import { AppConfig } from '../../config.js';
import { TokenService } from '../../application/auth/tokens.js';
import { UserRepository } from '../../application/users/userRepository.js';
import { createHomeRoutes } from './routes/home.js';
import { createHealthRoutes, DatabaseProbe } from './routes/health.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { requestLogger } from './middleware/requestLogger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

export interface AppDependencies {
  config: AppConfig;
  userRepo: UserRepository;
  probeDatabase: DatabaseProbe;
}

/**
 * Compose the Express app. Nothing here reaches for globals: the store
 * and configuration come in through `deps`.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const tokens = new TokenService(deps.config.jwtSecret, deps.config.jwtExpiresInSeconds);

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json());

  app.use(createHomeRoutes());
  app.use(createSwaggerRoutes());
  app.use('/api', createHealthRoutes(deps.probeDatabase));
  app.use('/api', createAuthRoutes(deps.userRepo, tokens));
  app.use('/api/users', createUserRoutes(deps.userRepo, tokens));

  // Error handler (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
