// Calendar-day arithmetic for cycle logs.
// - All dates are "YYYY-MM-DD" strings interpreted as UTC midnight.
// - Time-of-day never participates in interval math.

export type ISODateString = string;
export type ISODateTimeString = string;

export const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

// Returns the calendar day of an ISO date or date-time string, or null when it is not a real date.
export function toCalendarDate(value: string): ISODateString | null {
  const match = ISO_DATE_PREFIX.exec(value.trim());
  if (!match) return null;

  const [, y, m, d] = match;
  const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
  const date = new Date(ms);

  // Rejects rollovers such as 2025-02-30.
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return null;
  }

  return `${y}-${m}-${d}`;
}

export function dateToMs(date: ISODateString): number {
  const day = toCalendarDate(date);
  if (!day) throw new Error(`Invalid calendar date: ${date}`);
  return Date.parse(`${day}T00:00:00.000Z`);
}

export function formatISODate(date: Date): ISODateString {
  return date.toISOString().substring(0, 10);
}

export function addDays(date: ISODateString, days: number): ISODateString {
  return formatISODate(new Date(dateToMs(date) + days * DAY_MS));
}

// Whole days from `from` to `to` (negative when `to` is earlier).
export function daysBetween(from: ISODateString, to: ISODateString): number {
  return Math.round((dateToMs(to) - dateToMs(from)) / DAY_MS);
}

export function compareDates(a: ISODateString, b: ISODateString): number {
  return dateToMs(a) - dateToMs(b);
}
