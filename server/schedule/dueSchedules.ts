import { addDays, minDate } from "../calendar";
import type { FiringRecord, Habit, LedgerStore, Schedule, ScheduledHabit } from "../types/ledger";
import { parseTimeOfDay, toLocalDateString, toLocalDateTime } from "../validation";

export interface DueSchedule {
  habit: Habit;
  schedule: Schedule;
  fireDate: string;
}

export interface DueScheduleOptions {
  /** Previous local dates to catch up on; 0 only ever reports today. */
  backfillDays?: number;
}

function firingKey(scheduleId: number, fireDate: string): string {
  return `${scheduleId}:${fireDate}`;
}

function compareDue(a: DueSchedule, b: DueSchedule): number {
  return (
    a.habit.id - b.habit.id ||
    a.schedule.timeOfDay.localeCompare(b.schedule.timeOfDay) ||
    a.fireDate.localeCompare(b.fireDate) ||
    a.schedule.id - b.schedule.id
  );
}

/** Earliest fire date any of the schedules could be due for at `now`. */
export function earliestFireDate(now: Date, schedules: ScheduledHabit[], options: DueScheduleOptions = {}): string | null {
  const backfill = options.backfillDays ?? 0;
  let earliest: string | null = null;
  for (const { schedule } of schedules) {
    const first = addDays(toLocalDateString(now, schedule.timezone), -backfill);
    earliest = earliest == null ? first : minDate(earliest, first);
  }
  return earliest;
}

export function computeDueSchedules(
  now: Date,
  schedules: ScheduledHabit[],
  firings: FiringRecord[],
  options: DueScheduleOptions = {},
): DueSchedule[] {
  const backfill = options.backfillDays ?? 0;
  const fired = new Set(firings.map(f => firingKey(f.scheduleId, f.fireDate)));
  const due: DueSchedule[] = [];

  for (const { habit, schedule } of schedules) {
    if (!schedule.active) continue;
    const scheduledAt = parseTimeOfDay(schedule.timeOfDay);
    if (scheduledAt == null) continue;

    const local = toLocalDateTime(now, schedule.timezone);
    const created = toLocalDateTime(schedule.createdAt, schedule.timezone);
    // A slot that had already passed when the schedule was created is not owed.
    const firstOwed = created.minutes > scheduledAt ? addDays(created.date, 1) : created.date;

    for (let back = backfill; back >= 1; back--) {
      const day = addDays(local.date, -back);
      if (day < firstOwed) continue;
      if (!fired.has(firingKey(schedule.id, day))) due.push({ habit, schedule, fireDate: day });
    }

    if (scheduledAt <= local.minutes && !fired.has(firingKey(schedule.id, local.date))) {
      due.push({ habit, schedule, fireDate: local.date });
    }
  }

  return due.sort(compareDue);
}

export async function dueSchedules(store: LedgerStore, now: Date, options: DueScheduleOptions = {}): Promise<DueSchedule[]> {
  const schedules = await store.listActiveSchedules();
  const since = earliestFireDate(now, schedules, options);
  if (since == null) return [];
  const firings = await store.listFiringsSince(since);
  return computeDueSchedules(now, schedules, firings, options);
}
