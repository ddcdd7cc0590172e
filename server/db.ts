import pg from "pg";
import type { SqlQueryable } from "./ledger-storage";

export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}

export async function runMigration(pool: SqlQueryable, name: string, sql: string): Promise<void> {
  const { rows } = await pool.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await pool.query(sql);
  await pool.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(pool, '001_habits', `
    CREATE TABLE IF NOT EXISTS habits (
      id SERIAL PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      description TEXT,
      timezone TEXT NOT NULL DEFAULT 'UTC',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (user_id, name)
    );
  `);

  await runMigration(pool, '002_schedules', `
    CREATE TABLE IF NOT EXISTS schedules (
      id SERIAL PRIMARY KEY,
      habit_id INTEGER NOT NULL REFERENCES habits(id) ON DELETE CASCADE,
      time_of_day TEXT NOT NULL,
      timezone TEXT NOT NULL DEFAULT 'UTC',
      is_active BOOLEAN NOT NULL DEFAULT true,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_one_active_schedule_per_time
      ON schedules (habit_id, time_of_day) WHERE is_active;
    CREATE INDEX IF NOT EXISTS idx_schedules_active
      ON schedules (habit_id) WHERE is_active;
  `);

  await runMigration(pool, '003_firing_records', `
    CREATE TABLE IF NOT EXISTS firing_records (
      schedule_id INTEGER NOT NULL REFERENCES schedules(id) ON DELETE CASCADE,
      fire_date TEXT NOT NULL,
      fired_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (schedule_id, fire_date)
    );
    CREATE INDEX IF NOT EXISTS idx_firing_records_date ON firing_records (fire_date);
  `);

  await runMigration(pool, '004_completion_records', `
    CREATE TABLE IF NOT EXISTS completion_records (
      habit_id INTEGER NOT NULL REFERENCES habits(id) ON DELETE CASCADE,
      day TEXT NOT NULL,
      outcome TEXT NOT NULL CHECK (outcome IN ('completed', 'skipped')),
      recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (habit_id, day)
    );
  `);
}
