import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg, { type PoolConfig } from 'pg';
import * as schema from './schema.js';
import { logger } from '../logger.js';



export type Database = NodePgDatabase<typeof schema>;

export const IS_DEV = process.env.NODE_ENV !== 'production';
const defaultTimeout = IS_DEV ? 50000 : 5000;

export function poolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,
    max: 10,
    min: 0,
    connectionTimeoutMillis: IS_DEV ? 120000 : 5000,
    idleTimeoutMillis: defaultTimeout,

    statement_timeout: defaultTimeout,
    query_timeout: defaultTimeout,
  };
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool(poolConfig(connectionString));

  // An idle client losing its connection must not crash the process
  pool.on('error', (error) => {
    logger.error({ error }, 'Unexpected error on idle client');
  });
  return pool;
}

export function createDatabase(pool: pg.Pool): Database {
  return drizzle({ client: pool, schema });
}

/**
 * Creates the tables and enums when missing. Safe to run on every start.
 */
export async function ensureSchema(pool: pg.Pool): Promise<void> {
  try {
    await pool.query(`
      DO $$ BEGIN
        CREATE TYPE task_status AS ENUM ('pending', 'running', 'completed', 'failed', 'cancelled');
      EXCEPTION WHEN duplicate_object THEN NULL; END $$;

      DO $$ BEGIN
        CREATE TYPE task_error_kind AS ENUM ('stage', 'timeout', 'worker_lost', 'shutdown', 'internal');
      EXCEPTION WHEN duplicate_object THEN NULL; END $$;

      DO $$ BEGIN
        CREATE TYPE call_outcome AS ENUM ('success', 'error');
      EXCEPTION WHEN duplicate_object THEN NULL; END $$;

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        status task_status NOT NULL DEFAULT 'pending',
        input_ref TEXT NOT NULL,
        output_ref TEXT,
        progress REAL NOT NULL DEFAULT 0,
        params JSONB NOT NULL DEFAULT '{}'::jsonb,
        state JSONB NOT NULL DEFAULT '{}'::jsonb,
        error TEXT,
        error_kind task_error_kind,
        worker_id TEXT,
        run_count INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        started_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at);

      CREATE TABLE IF NOT EXISTS stage_units (
        task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        sequence INTEGER NOT NULL,
        description TEXT NOT NULL,
        narration TEXT NOT NULL DEFAULT '',
        scene_type TEXT,
        duration_hint REAL,
        audio_ref TEXT,
        audio_duration_sec REAL,
        image_ref TEXT,
        clip_ref TEXT,
        composed_ref TEXT,
        PRIMARY KEY (task_id, sequence)
      );

      CREATE TABLE IF NOT EXISTS supervised_calls (
        id UUID PRIMARY KEY,
        task_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        outcome call_outcome NOT NULL,
        latency_ms INTEGER NOT NULL,
        request JSONB,
        response JSONB,
        usage JSONB,
        error TEXT,
        error_kind TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      CREATE INDEX IF NOT EXISTS idx_supervised_calls_task ON supervised_calls(task_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_supervised_calls_operation ON supervised_calls(operation);
    `);
    logger.info('Database schema ready');
  } catch (error) {
    logger.error({ error }, 'Schema initialization failed');
    throw error;
  }
}

export { schema };
