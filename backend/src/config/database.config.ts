import { registerAs } from '@nestjs/config';

export type DatabaseDriver = 'postgres' | 'better-sqlite3';

function resolveDriver(value: string | undefined): DatabaseDriver {
  return value === 'better-sqlite3' ? 'better-sqlite3' : 'postgres';
}

/**
 * Database Configuration
 *
 * PostgreSQL in deployed environments. The e2e suites run the same
 * entities against an in-memory better-sqlite3 database, so column
 * types stay portable between the two drivers.
 */
export const databaseConfig = registerAs('database', () => ({
  driver: resolveDriver(process.env.DATABASE_DRIVER),
  url: process.env.DATABASE_URL || 'postgres://localhost:5432/event_hub',

  /** Create/alter tables from entity metadata on boot */
  synchronize:
    process.env.DATABASE_SYNCHRONIZE === 'true' ||
    (process.env.DATABASE_SYNCHRONIZE === undefined && process.env.NODE_ENV !== 'production'),

  logging: process.env.DATABASE_LOGGING === 'true',
}));
