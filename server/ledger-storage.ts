import type { QueryResult, QueryResultRow } from "pg";
import { DuplicateScheduleError, isUniqueViolation, ValidationError } from "./errors";
import type {
  ClaimResult,
  CompletionRange,
  CompletionRecord,
  FiringRecord,
  Habit,
  HabitPatch,
  LedgerStore,
  NewHabit,
  NewSchedule,
  Schedule,
  ScheduledHabit,
} from "./types/ledger";
import { parseOutcome } from "./validation";

export interface SqlQueryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlQueryable {
  connect(): Promise<SqlQueryable & { release(err?: Error | boolean): void }>;
}

type HabitRow = {
  id: number;
  user_id: string;
  name: string;
  description: string | null;
  timezone: string;
  created_at: Date;
};

type ScheduleRow = {
  id: number;
  habit_id: number;
  time_of_day: string;
  timezone: string;
  is_active: boolean;
  created_at: Date;
};

type ScheduledHabitRow = ScheduleRow & {
  h_user_id: string;
  h_name: string;
  h_description: string | null;
  h_timezone: string;
  h_created_at: Date;
};

type FiringRow = {
  schedule_id: number;
  fire_date: string;
  fired_at: Date;
};

type CompletionRow = {
  habit_id: number;
  day: string;
  outcome: string;
  recorded_at: Date;
};

const HABIT_COLUMNS = `id, user_id, name, description, timezone, created_at`;
const SCHEDULE_COLUMNS = `id, habit_id, time_of_day, timezone, is_active, created_at`;

function toHabit(row: HabitRow): Habit {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    description: row.description,
    timezone: row.timezone,
    createdAt: row.created_at,
  };
}

function toSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    habitId: row.habit_id,
    timeOfDay: row.time_of_day,
    timezone: row.timezone,
    active: row.is_active,
    createdAt: row.created_at,
  };
}

function toCompletion(row: CompletionRow): CompletionRecord {
  const outcome = parseOutcome(row.outcome);
  if (!outcome) {
    throw new Error(`completion_records(${row.habit_id}, ${row.day}) has unknown outcome "${row.outcome}"`);
  }
  return { habitId: row.habit_id, day: row.day, outcome, recordedAt: row.recorded_at };
}

export function createPgLedgerStore(pool: SqlPool): LedgerStore {
  return {
    async ping() {
      await pool.query(`SELECT 1`);
    },

    async createHabit(input: NewHabit) {
      try {
        const { rows } = await pool.query<HabitRow>(
          `INSERT INTO habits (user_id, name, description, timezone, created_at)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${HABIT_COLUMNS}`,
          [input.userId, input.name, input.description ?? null, input.timezone, input.createdAt]
        );
        return toHabit(rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) throw new ValidationError([`name: habit "${input.name}" already exists`]);
        throw err;
      }
    },

    async getHabit(habitId: number) {
      const { rows } = await pool.query<HabitRow>(
        `SELECT ${HABIT_COLUMNS} FROM habits WHERE id = $1`,
        [habitId]
      );
      return rows.length > 0 ? toHabit(rows[0]) : null;
    },

    async listHabits(userId: string) {
      const { rows } = await pool.query<HabitRow>(
        `SELECT ${HABIT_COLUMNS} FROM habits WHERE user_id = $1 ORDER BY id`,
        [userId]
      );
      return rows.map(toHabit);
    },

    async updateHabit(habitId: number, patch: HabitPatch) {
      try {
        const { rows } = await pool.query<HabitRow>(
          `UPDATE habits SET
             name = COALESCE($2, name),
             description = CASE WHEN $3::boolean THEN $4 ELSE description END
           WHERE id = $1
           RETURNING ${HABIT_COLUMNS}`,
          [habitId, patch.name ?? null, patch.description !== undefined, patch.description ?? null]
        );
        return rows.length > 0 ? toHabit(rows[0]) : null;
      } catch (err) {
        if (isUniqueViolation(err)) throw new ValidationError([`name: habit "${patch.name ?? ""}" already exists`]);
        throw err;
      }
    },

    async deleteHabit(habitId: number) {
      const { rows } = await pool.query<{ id: number }>(
        `DELETE FROM habits WHERE id = $1 RETURNING id`,
        [habitId]
      );
      return rows.length > 0;
    },

    async createSchedule(input: NewSchedule) {
      try {
        const { rows } = await pool.query<ScheduleRow>(
          `INSERT INTO schedules (habit_id, time_of_day, timezone, created_at)
           VALUES ($1, $2, $3, $4)
           RETURNING ${SCHEDULE_COLUMNS}`,
          [input.habitId, input.timeOfDay, input.timezone, input.createdAt]
        );
        return toSchedule(rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) throw new DuplicateScheduleError(input.habitId, input.timeOfDay);
        throw err;
      }
    },

    async getSchedule(scheduleId: number) {
      const { rows } = await pool.query<ScheduleRow>(
        `SELECT ${SCHEDULE_COLUMNS} FROM schedules WHERE id = $1`,
        [scheduleId]
      );
      return rows.length > 0 ? toSchedule(rows[0]) : null;
    },

    async listSchedules(habitId: number) {
      const { rows } = await pool.query<ScheduleRow>(
        `SELECT ${SCHEDULE_COLUMNS} FROM schedules WHERE habit_id = $1 ORDER BY time_of_day, id`,
        [habitId]
      );
      return rows.map(toSchedule);
    },

    async setScheduleActive(scheduleId: number, active: boolean) {
      const { rows: current } = await pool.query<ScheduleRow>(
        `SELECT ${SCHEDULE_COLUMNS} FROM schedules WHERE id = $1`,
        [scheduleId]
      );
      if (current.length === 0) return null;
      try {
        const { rows } = await pool.query<ScheduleRow>(
          `UPDATE schedules SET is_active = $2 WHERE id = $1 RETURNING ${SCHEDULE_COLUMNS}`,
          [scheduleId, active]
        );
        return rows.length > 0 ? toSchedule(rows[0]) : null;
      } catch (err) {
        if (isUniqueViolation(err)) throw new DuplicateScheduleError(current[0].habit_id, current[0].time_of_day);
        throw err;
      }
    },

    async deleteSchedule(scheduleId: number) {
      const { rows } = await pool.query<{ id: number }>(
        `DELETE FROM schedules WHERE id = $1 RETURNING id`,
        [scheduleId]
      );
      return rows.length > 0;
    },

    async listActiveSchedules() {
      const { rows } = await pool.query<ScheduledHabitRow>(
        `SELECT s.id, s.habit_id, s.time_of_day, s.timezone, s.is_active, s.created_at,
                h.user_id AS h_user_id, h.name AS h_name, h.description AS h_description,
                h.timezone AS h_timezone, h.created_at AS h_created_at
         FROM schedules s
         JOIN habits h ON h.id = s.habit_id
         WHERE s.is_active
         ORDER BY s.habit_id, s.time_of_day, s.id`
      );
      return rows.map((row): ScheduledHabit => ({
        schedule: toSchedule(row),
        habit: {
          id: row.habit_id,
          userId: row.h_user_id,
          name: row.h_name,
          description: row.h_description,
          timezone: row.h_timezone,
          createdAt: row.h_created_at,
        },
      }));
    },

    async listFiringsSince(fromDate: string) {
      const { rows } = await pool.query<FiringRow>(
        `SELECT schedule_id, fire_date, fired_at FROM firing_records WHERE fire_date >= $1`,
        [fromDate]
      );
      return rows.map((row): FiringRecord => ({
        scheduleId: row.schedule_id,
        fireDate: row.fire_date,
        firedAt: row.fired_at,
      }));
    },

    async claimFiring(record: FiringRecord, deliver: () => Promise<boolean>): Promise<ClaimResult> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        // Blocks while another transaction holds an uncommitted row for the same pair.
        const inserted = await client.query<{ schedule_id: number }>(
          `INSERT INTO firing_records (schedule_id, fire_date, fired_at)
           VALUES ($1, $2, $3)
           ON CONFLICT (schedule_id, fire_date) DO NOTHING
           RETURNING schedule_id`,
          [record.scheduleId, record.fireDate, record.firedAt]
        );
        if (inserted.rows.length === 0) {
          await client.query("ROLLBACK");
          return "conflict";
        }
        const delivered = await deliver();
        await client.query(delivered ? "COMMIT" : "ROLLBACK");
        return delivered ? "fired" : "not_delivered";
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackErr) {
          console.error("[ledger] rollback failed:", rollbackErr);
        }
        throw err;
      } finally {
        client.release();
      }
    },

    async upsertCompletion(record: CompletionRecord) {
      const { rows } = await pool.query<CompletionRow>(
        `INSERT INTO completion_records (habit_id, day, outcome, recorded_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (habit_id, day) DO UPDATE SET
           outcome = EXCLUDED.outcome,
           recorded_at = EXCLUDED.recorded_at
         RETURNING habit_id, day, outcome, recorded_at`,
        [record.habitId, record.day, record.outcome, record.recordedAt]
      );
      return toCompletion(rows[0]);
    },

    async listCompletions(habitId: number, range: CompletionRange = {}) {
      const conditions = [`habit_id = $1`];
      const values: unknown[] = [habitId];
      if (range.from) {
        values.push(range.from);
        conditions.push(`day >= $${values.length}`);
      }
      if (range.to) {
        values.push(range.to);
        conditions.push(`day <= $${values.length}`);
      }
      const { rows } = await pool.query<CompletionRow>(
        `SELECT habit_id, day, outcome, recorded_at
         FROM completion_records
         WHERE ${conditions.join(" AND ")}
         ORDER BY day ASC`,
        values
      );
      return rows.map(toCompletion);
    },
  };
}
