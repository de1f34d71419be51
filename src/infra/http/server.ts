import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { CredentialIssuer } from '../../application/auth/credentialIssuer.js';
import { TaskRepository, UserRepository } from '../../application/repositories.js';
import { PgUserRepo } from '../db/userRepo.js';
import { PgTaskRepo } from '../db/taskRepo.js';
import { checkDatabase } from '../db/pool.js';
import { InMemoryUserRepo } from '../memory/userRepo.js';
import { InMemoryTaskRepo } from '../memory/taskRepo.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();

let users: UserRepository;
let tasks: TaskRepository;
let healthCheck: () => Promise<void>;

if (config.storage === 'memory') {
  console.warn('STORAGE=memory: data is kept in process and lost on restart');
  users = new InMemoryUserRepo();
  tasks = new InMemoryTaskRepo();
  healthCheck = async () => {};
} else {
  users = new PgUserRepo();
  tasks = new PgTaskRepo();
  healthCheck = checkDatabase;
}

const issuer = new CredentialIssuer(users, {
  secret: config.jwtSecret,
  accessTtlSeconds: config.accessTokenTtlSeconds,
  refreshTtlSeconds: config.refreshTokenTtlSeconds,
});

const app = createApp({
  users,
  tasks,
  issuer,
  pageSize: config.pageSize,
  loginRateLimit: config.loginRateLimit,
  apiRateLimit: config.apiRateLimit,
  healthCheck,
  docs: true,
});

// Start server
app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
});

export default app;
