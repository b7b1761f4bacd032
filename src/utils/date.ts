/**
 * Calendar date-time with second precision, in local time.
 */
export interface CaptureDate {
  year: number;
  month: number;  // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const EXIF_DATETIME = /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCaptureDate(date: CaptureDate): boolean {
  return (
    date.month >= 1 && date.month <= 12 &&
    date.day >= 1 && date.day <= daysInMonth(date.year, date.month) &&
    date.hour >= 0 && date.hour <= 23 &&
    date.minute >= 0 && date.minute <= 59 &&
    date.second >= 0 && date.second <= 59
  );
}

/**
 * Parse EXIF datetime text ("2019:05:17 10:00:00"), or null if malformed.
 */
export function parseExifDateTime(text: string): CaptureDate | null {
  const match = text.trim().match(EXIF_DATETIME);
  if (!match) return null;

  const [, y, m, d, h, min, s] = match;
  const date: CaptureDate = {
    year: parseInt(y, 10),
    month: parseInt(m, 10),
    day: parseInt(d, 10),
    hour: parseInt(h, 10),
    minute: parseInt(min, 10),
    second: parseInt(s, 10),
  };
  return isValidCaptureDate(date) ? date : null;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

export function formatExifDateTime(date: CaptureDate): string {
  return (
    `${pad(date.year, 4)}:${pad(date.month)}:${pad(date.day)} ` +
    `${pad(date.hour)}:${pad(date.minute)}:${pad(date.second)}`
  );
}

/**
 * Human-readable form used in CLI output: "2019-05-17 10:00:00".
 */
export function formatCaptureDate(date: CaptureDate): string {
  return (
    `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)} ` +
    `${pad(date.hour)}:${pad(date.minute)}:${pad(date.second)}`
  );
}

export function fromLocalDate(date: Date): CaptureDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
}

export function toLocalDate(date: CaptureDate): Date {
  const result = new Date(date.year, date.month - 1, date.day, date.hour, date.minute, date.second);
  // Years 0-99 are mapped to 1900-1999 by the constructor
  result.setFullYear(date.year);
  return result;
}
