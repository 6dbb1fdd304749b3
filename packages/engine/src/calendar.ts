// All dates are calendar days at UTC midnight.

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function toISODate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, '0');
  const day = date.getUTCDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parses "YYYY-MM-DD". Returns null for malformed strings and for days that
 * do not exist (2023-02-29).
 */
export function parseISODate(iso: string): Date | null {
  const match = ISO_DATE.exec(iso);
  if (!match) return null;
  const [y, m, d] = [match[1], match[2], match[3]].map((s) => parseInt(s, 10));
  const date = new Date(Date.UTC(y, m - 1, d));
  return toISODate(date) === iso ? date : null;
}

/** Drops any time of day. */
export const startOfDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

/**
 * Last day of the month after `date`'s month, whatever day `date` falls on.
 * December rolls over into January of the following year.
 */
export const lastDayOfNextMonth = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 2, 0));
