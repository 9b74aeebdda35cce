export function toTimestamp(value: string): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Unable to parse time value: ${value}`);
  }

  return parsed;
}

/** Calendar month of an ISO timestamp in UTC, as `YYYY-MM`. */
export function toMonthKey(value: string): string {
  const date = new Date(toTimestamp(value));
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}

/** Shifts by calendar months in UTC; a day past the end of the target month becomes its last day. */
export function addMonths(date: Date, months: number): Date {
  const result = new Date(date);
  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() + months);
  const lastDay = new Date(Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0)).getUTCDate();
  result.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return result;
}

export function trailingWindowStart(now: Date, months: number): Date {
  if (months <= 0) {
    throw new Error('months must be greater than 0');
  }

  return addMonths(now, -months);
}

export function isoDay(value: string): string {
  return value.slice(0, 10);
}
