import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { MemoryUserRepo } from '../db/memoryUserRepo.js';
import { logger, setLogLevel } from '../logger.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();
setLogLevel(config.logLevel);

const pool = config.databaseUrl ? createPool(config.databaseUrl) : null;
let userRepo: UserRepo;
if (pool) {
  userRepo = new PgUserRepo(pool);
} else {
  logger.warn('DATABASE_URL is not set; users are kept in memory and lost on restart');
  userRepo = new MemoryUserRepo();
}

const app = createApp({ config, userRepo });

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
  logger.info(`Health check: http://localhost:${config.port}/health`);
  logger.info(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: error.message });
    }
    const closePool = pool ? pool.end() : Promise.resolve();
    void closePool
      .catch((poolError: unknown) => {
        logger.error('Error while closing database pool', {
          error: poolError instanceof Error ? poolError.message : String(poolError),
        });
      })
      .finally(() => process.exit(error ? 1 : 0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
