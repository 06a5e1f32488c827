/**
 * Field-level checks shared by the metadata schema, the scaffolder and the CLI.
 */
import { EVENT_FORMATS } from "../config/index.ts";

export interface UrlValidationOptions {
  allowProtocol?: readonly string[];
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * `YYYY-MM-DD` naming a day that exists (no 2026-02-30, no month 13).
 */
export function isValidCalendarDate(value: string): boolean {
  if (typeof value !== "string" || !EVENT_FORMATS.DATE_PATTERN.test(value)) {
    return false;
  }

  const [year, month, day] = value.split("-").map(Number);
  if (month < 1 || month > 12 || day < 1) return false;

  const maxDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= maxDay;
}

/**
 * `HH:MM`, 00:00 through 23:59.
 */
export function isValidClockTime(value: string): boolean {
  if (typeof value !== "string" || !EVENT_FORMATS.TIME_PATTERN.test(value)) {
    return false;
  }

  const [hours, minutes] = value.split(":").map(Number);
  return hours >= 0 && hours <= 23 && minutes >= 0 && minutes <= 59;
}

export function isValidUrl(
  url: string,
  options: UrlValidationOptions = {},
): boolean {
  if (!url || typeof url !== "string") return false;

  try {
    const urlObj = new URL(url);

    if (options.allowProtocol) {
      const protocol = urlObj.protocol.replace(":", "");
      if (!options.allowProtocol.includes(protocol)) {
        return false;
      }
    }

    return true;
  } catch {
    return false;
  }
}

/**
 * A filename that stays inside its folder: no separators, not `.` or `..`.
 */
export function isBareFilename(value: string): boolean {
  if (typeof value !== "string" || !value.trim()) return false;
  if (value === "." || value === "..") return false;
  return !/[\\/]/.test(value) && !value.includes("\0");
}
