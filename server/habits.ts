import { NotFoundError, ValidationError } from "./errors";
import type { Habit, LedgerStore, Schedule } from "./types/ledger";
import { normalizeTimeOfDay, validateHabitInput, validateScheduleInput } from "./validation";

/** Loads a habit and checks it belongs to `userId`; other users' habits read as missing. */
export async function getOwnedHabit(store: LedgerStore, userId: string, habitId: number): Promise<Habit> {
  const habit = await store.getHabit(habitId);
  if (!habit || habit.userId !== userId) throw new NotFoundError("habit", habitId);
  return habit;
}

export async function getOwnedSchedule(
  store: LedgerStore,
  userId: string,
  scheduleId: number,
): Promise<{ habit: Habit; schedule: Schedule }> {
  const schedule = await store.getSchedule(scheduleId);
  if (!schedule) throw new NotFoundError("schedule", scheduleId);
  const habit = await store.getHabit(schedule.habitId);
  if (!habit || habit.userId !== userId) throw new NotFoundError("schedule", scheduleId);
  return { habit, schedule };
}

export async function createHabit(
  store: LedgerStore,
  userId: string,
  body: Record<string, unknown>,
  opts: { defaultTimezone: string; now: Date },
): Promise<Habit> {
  const v = validateHabitInput(body);
  if (!v.ok) throw new ValidationError(v.errors);
  return store.createHabit({
    userId,
    name: String(body.name).trim(),
    description: typeof body.description === "string" ? body.description : null,
    timezone: typeof body.timezone === "string" ? body.timezone : opts.defaultTimezone,
    createdAt: opts.now,
  });
}

/** Rename and/or describe. */
export async function updateHabit(
  store: LedgerStore,
  userId: string,
  habitId: number,
  body: Record<string, unknown>,
): Promise<Habit> {
  if (body.timezone !== undefined) throw new ValidationError(["timezone: cannot be changed after creation"]);
  const v = validateHabitInput(body, true);
  if (!v.ok) throw new ValidationError(v.errors);
  await getOwnedHabit(store, userId, habitId);
  const updated = await store.updateHabit(habitId, {
    name: typeof body.name === "string" ? body.name.trim() : undefined,
    description: body.description === null || typeof body.description === "string" ? body.description : undefined,
  });
  if (!updated) throw new NotFoundError("habit", habitId);
  return updated;
}

export async function deleteHabit(store: LedgerStore, userId: string, habitId: number): Promise<void> {
  await getOwnedHabit(store, userId, habitId);
  if (!(await store.deleteHabit(habitId))) throw new NotFoundError("habit", habitId);
}

export async function addSchedule(
  store: LedgerStore,
  userId: string,
  habitId: number,
  body: Record<string, unknown>,
  now: Date,
): Promise<Schedule> {
  const v = validateScheduleInput(body);
  const timeOfDay = normalizeTimeOfDay(body.time);
  if (!v.ok || timeOfDay == null) throw new ValidationError(v.errors);
  const habit = await getOwnedHabit(store, userId, habitId);
  return store.createSchedule({
    habitId,
    timeOfDay,
    timezone: typeof body.timezone === "string" ? body.timezone : habit.timezone,
    createdAt: now,
  });
}

export async function listSchedules(store: LedgerStore, userId: string, habitId: number): Promise<Schedule[]> {
  await getOwnedHabit(store, userId, habitId);
  return store.listSchedules(habitId);
}

export async function setScheduleActive(
  store: LedgerStore,
  userId: string,
  scheduleId: number,
  active: unknown,
): Promise<Schedule> {
  if (typeof active !== "boolean") throw new ValidationError(["active: must be a boolean"]);
  await getOwnedSchedule(store, userId, scheduleId);
  const updated = await store.setScheduleActive(scheduleId, active);
  if (!updated) throw new NotFoundError("schedule", scheduleId);
  return updated;
}

export async function deleteSchedule(store: LedgerStore, userId: string, scheduleId: number): Promise<void> {
  await getOwnedSchedule(store, userId, scheduleId);
  if (!(await store.deleteSchedule(scheduleId))) throw new NotFoundError("schedule", scheduleId);
}
