import type { AppConfig } from '../config.js';
import { loadConfig } from '../config.js';
import type { HasherOptions } from '../domain/auth/password.js';

export const TEST_SECRET = 'test-secret-for-unit-tests';

// Smallest parameters argon2 accepts; keeps hashing fast in tests
export const FAST_HASHER_OPTIONS: HasherOptions = {
  memoryCost: 1024,
  timeCost: 2,
  parallelism: 1,
};

/** 2030-01-01T00:00:00.000Z */
export const START_TIME_MS = 1893456000 * 1000;

export interface FakeClock {
  now: () => Date;
  advanceSeconds: (seconds: number) => void;
}

export function fakeClock(startMs = START_TIME_MS): FakeClock {
  let current = startMs;
  return {
    now: () => new Date(current),
    advanceSeconds: (seconds) => {
      current += seconds * 1000;
    },
  };
}

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET: TEST_SECRET,
    ARGON2_MEMORY_COST: String(FAST_HASHER_OPTIONS.memoryCost),
    ARGON2_TIME_COST: String(FAST_HASHER_OPTIONS.timeCost),
    ARGON2_PARALLELISM: String(FAST_HASHER_OPTIONS.parallelism),
    ...overrides,
  });
}
