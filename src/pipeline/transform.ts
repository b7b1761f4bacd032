import { InvalidArgumentError, InvalidDateError } from "../errors";
import { daysInMonth, formatCaptureDate, type CaptureDate } from "../utils/date";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

export interface DateSubstitution {
  year: number;
  month?: number;
}

export function validateSubstitution(substitution: DateSubstitution): void {
  const { year, month } = substitution;
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new InvalidArgumentError(`Year must be between ${MIN_YEAR} and ${MAX_YEAR}, got ${year}`);
  }
  if (month !== undefined && (!Number.isInteger(month) || month < 1 || month > 12)) {
    throw new InvalidArgumentError(`Month must be between 1 and 12, got ${month}`);
  }
}

/**
 * Replace the year (and month, when given) keeping day and time of day.
 * A day that does not exist in the target month is rejected, never clamped.
 */
export function substituteDate(source: CaptureDate, substitution: DateSubstitution): CaptureDate {
  const year = substitution.year;
  const month = substitution.month ?? source.month;

  if (source.day > daysInMonth(year, month)) {
    throw new InvalidDateError(
      `Day ${source.day} does not exist in ${year}-${String(month).padStart(2, "0")} ` +
      `(source date ${formatCaptureDate(source)})`
    );
  }

  return { ...source, year, month };
}
