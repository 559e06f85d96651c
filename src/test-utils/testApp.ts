import type { Express } from 'express';
import { TokenService } from '../application/auth/tokenService.js';
import { createApp } from '../infra/http/app.js';
import { createInMemoryRepos, InMemoryTodoRepo, InMemoryUserRepo } from './inMemoryRepos.js';

export const TEST_JWT_SECRET = 'test-secret';

export interface TestApp {
  app: Express;
  users: InMemoryUserRepo;
  todos: InMemoryTodoRepo;
  tokens: TokenService;
}

export function createTestApp(
  healthCheck: () => Promise<void> = async () => {}
): TestApp {
  const { users, todos } = createInMemoryRepos();
  const tokens = new TokenService({
    secret: TEST_JWT_SECRET,
    algorithm: 'HS256',
    expiresInMinutes: 30,
  });
  const app = createApp({ appName: 'Todo API', users, todos, tokens, healthCheck });
  return { app, users, todos, tokens };
}
