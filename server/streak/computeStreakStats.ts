import { diffDays, maxDate, minDate, monthBounds, spanDays } from "../calendar";
import { InvalidDateError, NotFoundError } from "../errors";
import type { CompletionRecord, Habit, LedgerStore } from "../types/ledger";
import { isValidDateString, parseYearMonth, toLocalDateString } from "../validation";

export interface MonthlyStats {
  month: string;
  completedDays: number;
  totalDaysElapsed: number;
  percentage: number;
}

export interface LifetimeStats {
  completedDays: number;
  skippedDays: number;
  totalDays: number;
  percentage: number;
  currentStreak: number;
  bestStreak: number;
  lastCompletedOn: string | null;
}

export interface HabitOverview {
  habit: Habit;
  lifetime: LifetimeStats;
  month: MonthlyStats;
}

interface LedgerScan {
  completedDays: number;
  skippedDays: number;
  bestStreak: number;
  /** Run of completed days ending exactly at the upper bound, else 0. */
  streakAtEnd: number;
  lastCompletedOn: string | null;
}

/** One pass over day-ordered records, restricted to [from, to]. */
function scanLedger(records: CompletionRecord[], from: string | null, to: string): LedgerScan {
  const scan: LedgerScan = { completedDays: 0, skippedDays: 0, bestStreak: 0, streakAtEnd: 0, lastCompletedOn: null };
  let run = 0;
  let prev: string | null = null;

  for (const r of records) {
    if (r.day > to) break;
    if (from != null && r.day < from) continue;
    if (r.outcome === "skipped") {
      scan.skippedDays++;
      run = 0;
      prev = null;
      continue;
    }
    scan.completedDays++;
    run = prev != null && diffDays(prev, r.day) === 1 ? run + 1 : 1;
    prev = r.day;
    scan.bestStreak = Math.max(scan.bestStreak, run);
    scan.lastCompletedOn = r.day;
  }

  scan.streakAtEnd = prev === to ? run : 0;
  return scan;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function habitCreatedOn(habit: Habit): string {
  return toLocalDateString(habit.createdAt, habit.timezone);
}

export function currentStreak(records: CompletionRecord[], asOf: string): number {
  return scanLedger(records, null, asOf).streakAtEnd;
}

export function monthlyStats(habit: Habit, records: CompletionRecord[], yearMonth: string, today: string): MonthlyStats {
  const ym = parseYearMonth(yearMonth);
  if (!ym) throw new InvalidDateError(`month: expected YYYY-MM, got "${yearMonth}"`);
  const { start, end } = monthBounds(ym.year, ym.month);
  const from = maxDate(start, habitCreatedOn(habit));
  const to = minDate(end, today);
  const totalDaysElapsed = spanDays(from, to);
  const completedDays = totalDaysElapsed > 0 ? scanLedger(records, from, to).completedDays : 0;
  return { month: yearMonth, completedDays, totalDaysElapsed, percentage: ratio(completedDays, totalDaysElapsed) };
}

export function lifetimeStats(habit: Habit, records: CompletionRecord[], today: string): LifetimeStats {
  const from = habitCreatedOn(habit);
  const totalDays = spanDays(from, today);
  const scan = scanLedger(records, from, today);
  return {
    completedDays: scan.completedDays,
    skippedDays: scan.skippedDays,
    totalDays,
    percentage: ratio(scan.completedDays, totalDays),
    currentStreak: scan.streakAtEnd,
    bestStreak: scan.bestStreak,
    lastCompletedOn: scan.lastCompletedOn,
  };
}

async function loadHabit(store: LedgerStore, habitId: number): Promise<Habit> {
  const habit = await store.getHabit(habitId);
  if (!habit) throw new NotFoundError("habit", habitId);
  return habit;
}

export async function getCurrentStreak(store: LedgerStore, habitId: number, now: Date, asOf?: string): Promise<number> {
  if (asOf !== undefined && !isValidDateString(asOf)) {
    throw new InvalidDateError(`asOf: expected YYYY-MM-DD, got "${asOf}"`);
  }
  const habit = await loadHabit(store, habitId);
  const day = asOf ?? toLocalDateString(now, habit.timezone);
  return currentStreak(await store.listCompletions(habitId, { from: habitCreatedOn(habit), to: day }), day);
}

export async function getMonthlyStats(store: LedgerStore, habitId: number, now: Date, yearMonth?: string): Promise<MonthlyStats> {
  const habit = await loadHabit(store, habitId);
  const today = toLocalDateString(now, habit.timezone);
  return monthlyStats(habit, await store.listCompletions(habitId), yearMonth ?? today.slice(0, 7), today);
}

export async function getLifetimeStats(store: LedgerStore, habitId: number, now: Date): Promise<LifetimeStats> {
  const habit = await loadHabit(store, habitId);
  return lifetimeStats(habit, await store.listCompletions(habitId), toLocalDateString(now, habit.timezone));
}

export async function getOverview(store: LedgerStore, userId: string, now: Date): Promise<HabitOverview[]> {
  const habits = await store.listHabits(userId);
  const overview: HabitOverview[] = [];
  for (const habit of habits) {
    const records = await store.listCompletions(habit.id);
    const today = toLocalDateString(now, habit.timezone);
    overview.push({
      habit,
      lifetime: lifetimeStats(habit, records, today),
      month: monthlyStats(habit, records, today.slice(0, 7), today),
    });
  }
  return overview.sort((a, b) => b.lifetime.completedDays - a.lifetime.completedDays || a.habit.id - b.habit.id);
}
