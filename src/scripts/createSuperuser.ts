import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { toRegistrationError, validateRegistration } from '../domain/auth/validation.js';
import { createPool } from '../infra/db/pool.js';
import { PgUserRepo } from '../infra/db/userRepo.js';
import { logger, setLogLevel } from '../infra/logger.js';

/**
 * Creates an active superuser directly in the database. Registration over
 * HTTP never grants the flag, so this is the only way to get the first one.
 *
 *   npm run create-superuser -- --email admin@example.com --username admin --password 'Secret123'
 */
export async function createSuperuser(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      email: { type: 'string' },
      username: { type: 'string' },
      password: { type: 'string' },
      'full-name': { type: 'string' },
    },
  });

  if (!values.email || !values.username || !values.password) {
    throw new Error('Usage: create-superuser --email <email> --username <name> --password <password>');
  }

  const validation = validateRegistration({
    email: values.email,
    username: values.username,
    fullName: values['full-name'] ?? null,
    password: values.password,
  });
  if (!validation.ok) {
    throw toRegistrationError(validation.kind, validation.message);
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createPool(config.databaseUrl);
  try {
    const repo = new PgUserRepo(pool);
    const hasher = new PasswordHasher(config.hasher);
    const user = await repo.create({
      email: validation.value.email,
      username: validation.value.username,
      fullName: validation.value.fullName,
      passwordHash: await hasher.hash(validation.value.password),
      isActive: true,
      isSuperuser: true,
    });
    logger.info('Superuser created', { userId: user.id, username: user.username });
    return user.id;
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (process.argv[1]?.endsWith('createSuperuser.ts') || process.argv[1]?.endsWith('createSuperuser.js')) {
  dotenv.config();
  createSuperuser(process.argv.slice(2))
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Could not create superuser', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
}
