export const TOTAL_SLOTS = 14;

export const PARKING_SLOTS: readonly string[] = Array.from(
  { length: TOTAL_SLOTS },
  (_, i) => `SLOT-${String(i + 1).padStart(2, '0')}`
);

export const YEARS: readonly string[] = Array.from({ length: 11 }, (_, i) => String(2020 + i));

export const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTHS)[number];

/**
 * Rental period name for a date, e.g. `January`.
 */
export function monthNameOf(date: Date): MonthName {
  return MONTHS[date.getMonth()];
}

/**
 * 0-based calendar index of a month name, or -1 when it is not one.
 */
export function monthIndex(month: string): number {
  return MONTHS.findIndex((m) => m === month);
}
