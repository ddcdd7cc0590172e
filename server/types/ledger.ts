export type Outcome = "completed" | "skipped";

export const OUTCOMES: readonly Outcome[] = ["completed", "skipped"];

export interface Habit {
  id: number;
  userId: string;
  name: string;
  description: string | null;
  timezone: string;
  createdAt: Date;
}

export interface Schedule {
  id: number;
  habitId: number;
  timeOfDay: string;
  timezone: string;
  active: boolean;
  createdAt: Date;
}

export interface FiringRecord {
  scheduleId: number;
  fireDate: string;
  firedAt: Date;
}

export interface CompletionRecord {
  habitId: number;
  day: string;
  outcome: Outcome;
  recordedAt: Date;
}

export interface ScheduledHabit {
  habit: Habit;
  schedule: Schedule;
}

export interface NewHabit {
  userId: string;
  name: string;
  description?: string | null;
  timezone: string;
  createdAt: Date;
}

export interface HabitPatch {
  name?: string;
  description?: string | null;
}

export interface NewSchedule {
  habitId: number;
  timeOfDay: string;
  timezone: string;
  createdAt: Date;
}

export interface CompletionRange {
  from?: string;
  to?: string;
}

/**
 * Outcome of a firing claim.
 * - `fired`: the record was inserted and the delivery acknowledged, so it is committed.
 * - `conflict`: a record for the pair already exists; nothing was delivered.
 * - `not_delivered`: delivery failed and the claim was rolled back.
 */
export type ClaimResult = "fired" | "conflict" | "not_delivered";

/**
 * Persistence for the four ledger entities. Implementations enforce:
 * one active schedule per (habit, time of day), one firing per (schedule, date),
 * one completion per (habit, day).
 */
export interface LedgerStore {
  /** Rejects when the backing store cannot be reached. */
  ping(): Promise<void>;

  createHabit(input: NewHabit): Promise<Habit>;
  getHabit(habitId: number): Promise<Habit | null>;
  listHabits(userId: string): Promise<Habit[]>;
  updateHabit(habitId: number, patch: HabitPatch): Promise<Habit | null>;
  /** Cascades to schedules, firings and completions. */
  deleteHabit(habitId: number): Promise<boolean>;

  /** Throws DuplicateScheduleError when an active schedule already uses the time. */
  createSchedule(input: NewSchedule): Promise<Schedule>;
  getSchedule(scheduleId: number): Promise<Schedule | null>;
  listSchedules(habitId: number): Promise<Schedule[]>;
  setScheduleActive(scheduleId: number, active: boolean): Promise<Schedule | null>;
  deleteSchedule(scheduleId: number): Promise<boolean>;
  listActiveSchedules(): Promise<ScheduledHabit[]>;

  listFiringsSince(fromDate: string): Promise<FiringRecord[]>;
  /**
   * Conditionally inserts the firing record and holds it uncommitted while
   * `deliver` runs. Commits when `deliver` resolves true, rolls back otherwise.
   * A concurrent claim for the same pair waits for the holder to finish.
   */
  claimFiring(record: FiringRecord, deliver: () => Promise<boolean>): Promise<ClaimResult>;

  upsertCompletion(record: CompletionRecord): Promise<CompletionRecord>;
  listCompletions(habitId: number, range?: CompletionRange): Promise<CompletionRecord[]>;
}
