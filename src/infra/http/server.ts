import dotenv from 'dotenv';
import { TokenService } from '../../application/auth/tokenService.js';
import { loadConfig, requireDatabaseUrl } from '../../config.js';
import { createPool } from '../db/pool.js';
import { TodoRepo } from '../db/todoRepo.js';
import { UserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();
const pool = createPool(requireDatabaseUrl(config));

const app = createApp({
  appName: config.appName,
  users: new UserRepo(pool),
  todos: new TodoRepo(pool),
  tokens: new TokenService({
    secret: config.auth.jwtSecret,
    algorithm: config.auth.jwtAlgorithm,
    expiresInMinutes: config.auth.accessTokenExpireMinutes,
  }),
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.port, () => {
  console.log(`${config.appName} running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error closing database pool:', error);
        process.exit(1);
      }
    );
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
