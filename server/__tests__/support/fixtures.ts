import type { Habit, LedgerStore, Schedule } from "../../types/ledger";

export async function seedHabit(
  store: LedgerStore,
  overrides: Partial<{ userId: string; name: string; timezone: string; createdAt: Date }> = {},
): Promise<Habit> {
  return store.createHabit({
    userId: overrides.userId ?? "user-1",
    name: overrides.name ?? "Study",
    description: null,
    timezone: overrides.timezone ?? "UTC",
    createdAt: overrides.createdAt ?? new Date("2026-03-01T00:00:00Z"),
  });
}

export async function seedSchedule(
  store: LedgerStore,
  habit: Habit,
  timeOfDay: string,
  overrides: Partial<{ timezone: string; createdAt: Date }> = {},
): Promise<Schedule> {
  return store.createSchedule({
    habitId: habit.id,
    timeOfDay,
    timezone: overrides.timezone ?? habit.timezone,
    createdAt: overrides.createdAt ?? habit.createdAt,
  });
}
