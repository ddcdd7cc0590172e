import { InvalidDateError, NotFoundError, ValidationError } from "../errors";
import type { CompletionRange, CompletionRecord, LedgerStore } from "../types/ledger";
import { habitCreatedOn } from "../streak/computeStreakStats";
import { isValidDateString, parseOutcome, toLocalDateString } from "../validation";

export interface RecordCompletionInput {
  habitId: number;
  day: unknown;
  outcome: unknown;
  now: Date;
}

/**
 * The only write path into the completion ledger. Later answers for the same
 * (habit, day) replace the earlier one.
 */
export async function recordCompletion(store: LedgerStore, input: RecordCompletionInput): Promise<CompletionRecord> {
  const outcome = parseOutcome(input.outcome);
  if (!outcome) {
    throw new ValidationError([`outcome: expected "completed" or "skipped", got "${String(input.outcome)}"`]);
  }
  if (!isValidDateString(input.day)) {
    throw new InvalidDateError(`day: expected YYYY-MM-DD, got "${String(input.day)}"`);
  }

  const habit = await store.getHabit(input.habitId);
  if (!habit) throw new NotFoundError("habit", input.habitId);

  const today = toLocalDateString(input.now, habit.timezone);
  if (input.day > today) {
    throw new InvalidDateError(`day ${input.day} is in the future (today is ${today} in ${habit.timezone})`);
  }
  const createdOn = habitCreatedOn(habit);
  if (input.day < createdOn) {
    throw new InvalidDateError(`day ${input.day} is before habit ${habit.id} was created (${createdOn})`);
  }

  return store.upsertCompletion({
    habitId: habit.id,
    day: input.day,
    outcome,
    recordedAt: input.now,
  });
}

export async function listCompletions(
  store: LedgerStore,
  habitId: number,
  range: CompletionRange = {},
): Promise<CompletionRecord[]> {
  for (const [key, value] of Object.entries(range)) {
    if (value !== undefined && !isValidDateString(value)) {
      throw new InvalidDateError(`${key}: expected YYYY-MM-DD, got "${String(value)}"`);
    }
  }
  const habit = await store.getHabit(habitId);
  if (!habit) throw new NotFoundError("habit", habitId);
  return store.listCompletions(habitId, range);
}
