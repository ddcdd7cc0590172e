const DAY_MS = 86_400_000;

function toUtcMs(date: string): number {
  return Date.parse(date + "T00:00:00Z");
}

export function addDays(date: string, n: number): string {
  return new Date(toUtcMs(date) + n * DAY_MS).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function diffDays(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

/** Inclusive day count of [from, to]; 0 when the range is empty. */
export function spanDays(from: string, to: string): number {
  return Math.max(0, diffDays(from, to) + 1);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthBounds(year: number, month: number): { start: string; end: string } {
  const mm = String(month).padStart(2, "0");
  const yyyy = String(year).padStart(4, "0");
  return {
    start: `${yyyy}-${mm}-01`,
    end: `${yyyy}-${mm}-${String(daysInMonth(year, month)).padStart(2, "0")}`,
  };
}

export function maxDate(a: string, b: string): string {
  return a > b ? a : b;
}

export function minDate(a: string, b: string): string {
  return a < b ? a : b;
}
