export type LedgerErrorKind =
  | "not_found"
  | "duplicate_schedule"
  | "invalid_date"
  | "validation"
  | "store_unavailable";

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class NotFoundError extends LedgerError {
  constructor(entity: "habit" | "schedule", id: number | string) {
    super("not_found", `${entity} ${id} not found`);
  }
}

export class DuplicateScheduleError extends LedgerError {
  constructor(habitId: number, timeOfDay: string) {
    super("duplicate_schedule", `habit ${habitId} already has an active schedule at ${timeOfDay}`);
  }
}

export class InvalidDateError extends LedgerError {
  constructor(message: string) {
    super("invalid_date", message);
  }
}

export class ValidationError extends LedgerError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("validation", errors.join("; "));
    this.errors = errors;
  }
}

export class StoreUnavailableError extends LedgerError {
  constructor(cause: unknown) {
    super("store_unavailable", `ledger store unreachable: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "23505";
}
