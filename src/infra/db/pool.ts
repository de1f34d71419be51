import pg from 'pg';
import dotenv from 'dotenv';

dotenv.config();

const { Pool } = pg;

/**
 * Shared connection pool for the PostgreSQL repositories. Connections open on
 * first query, so importing this module without DATABASE_URL is harmless.
 */
export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: Number(process.env.DB_POOL_MAX ?? 20),
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
  console.log('Database connection established');
});

pool.on('error', (err) => {
  console.error('Unexpected database error:', err);
});

/** Round-trip used by the health endpoint. */
export async function checkDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
