// src/db/pool.ts
// What: Postgres connection pool factory.
// How: Builds a pg Pool for the given connection string with a small pool size. The application context owns
//      the pool and ends it on shutdown.

import { Pool } from 'pg';

export function createPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}
