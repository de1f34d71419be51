import express from 'express';
import { CredentialIssuer } from '../../application/auth/credentialIssuer.js';
import { IdentityResolver } from '../../application/auth/identityResolver.js';
import { TaskRepository, UserRepository } from '../../application/repositories.js';
import { createAuthRoutes } from './routes/auth.js';
import { createTaskRoutes } from './routes/tasks.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDependencies {
  users: UserRepository;
  tasks: TaskRepository;
  issuer: CredentialIssuer;
  pageSize: number;
  loginRateLimit: number;
  apiRateLimit: number;
  healthCheck: () => Promise<void>;
  /** Serve Swagger UI at /docs. */
  docs?: boolean;
  logRequests?: boolean;
}

// Bounds the health probe so a hung database still yields a 500
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();
  const resolver = new IdentityResolver(deps.issuer, deps.users);

  // Middleware
  if (deps.logRequests ?? true) {
    app.use(requestLogger);
  }
  app.use(express.json());
  app.use(createApiRateLimiter(deps.apiRateLimit));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  if (deps.docs) {
    app.use(createSwaggerRoutes());
  }

  app.use(
    '/api/auth',
    createAuthRoutes({
      users: deps.users,
      issuer: deps.issuer,
      resolver,
      loginRateLimit: deps.loginRateLimit,
    })
  );

  // Task routes (protected)
  app.use('/api/tasks', createTaskRoutes({ tasks: deps.tasks, resolver, pageSize: deps.pageSize }));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
