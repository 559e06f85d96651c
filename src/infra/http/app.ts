import express from 'express';
import { NotFoundError } from '../../application/errors.js';
import type { TokenService } from '../../application/auth/tokenService.js';
import type { UserRepository } from '../../domain/auth/user.js';
import type { TodoRepository } from '../../domain/todo/todo.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createTodoRoutes } from './routes/todos.js';

export interface AppDeps {
  appName: string;
  users: UserRepository;
  todos: TodoRepository;
  tokens: TokenService;
  /** Resolves when the database answers; rejects otherwise. */
  healthCheck: () => Promise<void>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error('timeout'));
      }, ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Express {
  const { appName, users, todos, tokens } = deps;
  const app = express();

  app.use(express.json());
  // OAuth2 password flow posts the login form url-encoded
  app.use(express.urlencoded({ extended: false }));

  app.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${appName}`,
      version: '1.0.0',
      docs: '/docs',
    });
  });

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

  app.use(createSwaggerRoutes(appName));
  app.use('/auth', createAuthRoutes({ users, tokens }));
  app.use('/todos', createTodoRoutes({ users, todos, tokens }));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
