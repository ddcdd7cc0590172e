import { OUTCOMES, type Outcome } from "./types/ledger";

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_REGEX = /^(\d{4})-(\d{2})$/;
const TIME_REGEX = /^(\d{1,2}):(\d{2})$/;
/** Upper bound of a Postgres SERIAL (int4) id. */
const MAX_SERIAL_ID = 2_147_483_647;

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export interface LocalDateTime {
  date: string;
  minutes: number;
}

export function isValidDateString(date: unknown): date is string {
  if (typeof date !== "string") return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + "T00:00:00Z");
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

export function parseYearMonth(value: unknown): { year: number; month: number } | null {
  if (typeof value !== "string") return null;
  const m = MONTH_REGEX.exec(value);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  if (month < 1 || month > 12) return null;
  return { year, month };
}

/** Minutes after midnight for "HH:MM" or "H:MM". */
export function parseTimeOfDay(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const m = TIME_REGEX.exec(value.trim());
  if (!m) return null;
  const h = Number(m[1]);
  const min = Number(m[2]);
  if (h > 23 || min > 59) return null;
  return h * 60 + min;
}

export function formatTimeOfDay(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

export function normalizeTimeOfDay(value: unknown): string | null {
  const minutes = parseTimeOfDay(value);
  return minutes == null ? null : formatTimeOfDay(minutes);
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timezone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-CA", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timezone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timezone: unknown): timezone is string {
  if (typeof timezone !== "string" || timezone === "") return false;
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

export function toLocalDateTime(instant: Date, timezone: string): LocalDateTime {
  const parts = formatterFor(timezone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? "00";
  return {
    date: `${get("year")}-${get("month")}-${get("day")}`,
    minutes: Number(get("hour")) * 60 + Number(get("minute")),
  };
}

export function toLocalDateString(instant: Date, timezone: string): string {
  return toLocalDateTime(instant, timezone).date;
}

export function parseOutcome(value: unknown): Outcome | null {
  return OUTCOMES.find(o => o === value) ?? null;
}

export function parseId(value: unknown): number | null {
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n > 0 && n <= MAX_SERIAL_ID ? n : null;
}

export function validateHabitInput(body: Record<string, unknown>, partial = false): ValidationResult {
  const errors: string[] = [];
  if (!partial || body.name !== undefined) {
    if (typeof body.name !== "string" || body.name.trim() === "") {
      errors.push("name: required non-empty string");
    } else if (body.name.length > 100) {
      errors.push("name: at most 100 characters");
    }
  }
  if (body.description != null && typeof body.description !== "string") {
    errors.push("description: must be a string");
  }
  if (body.timezone !== undefined && !isValidTimeZone(body.timezone)) {
    errors.push(`timezone: unknown time zone "${String(body.timezone)}"`);
  }
  return { ok: errors.length === 0, errors };
}

export function validateScheduleInput(body: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];
  if (parseTimeOfDay(body.time) == null) {
    errors.push(`time: expected HH:MM, got "${String(body.time)}"`);
  }
  if (body.timezone !== undefined && !isValidTimeZone(body.timezone)) {
    errors.push(`timezone: unknown time zone "${String(body.timezone)}"`);
  }
  return { ok: errors.length === 0, errors };
}
