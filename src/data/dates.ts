import { addDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

/** Today's date as "YYYY-MM-DD" in local time */
export function today(): string {
  return format(new Date(), "yyyy-MM-dd");
}

export function isDateKey(value: string): boolean {
  if (!DATE_KEY.test(value)) return false;
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, "yyyy-MM-dd") === value;
}

/** Date key shifted by n days (negative goes back) */
export function shiftDate(date: string, n: number): string {
  return format(addDays(parseISO(date), n), "yyyy-MM-dd");
}

export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** All date keys from start to end, inclusive */
export function dateRange(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  for (let d = startDate; d <= endDate; d = shiftDate(d, 1)) {
    dates.push(d);
  }
  return dates;
}
