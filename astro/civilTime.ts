import { InvalidDateError } from "./errors.js";

/**
 * Naive wall-clock time. The UTC offset travels separately as a number of
 * hours (east positive); there is no timezone database behind it.
 */
export interface CivilDateTime {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number; // 0-23
  minute: number; // 0-59
}

const MS_PER_MINUTE = 60_000;

export function daysInMonth(year: number, month: number): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month, 0);
  return d.getUTCDate();
}

function requireRange(
  field: string,
  value: number,
  min: number,
  max: number
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidDateError(field, value);
  }
}

/**
 * Throw InvalidDateError unless every calendar component is in range.
 */
export function assertValidCivilDateTime(civil: CivilDateTime): void {
  if (!Number.isInteger(civil.year)) {
    throw new InvalidDateError("year", civil.year);
  }
  requireRange("month", civil.month, 1, 12);
  requireRange("day", civil.day, 1, daysInMonth(civil.year, civil.month));
  requireRange("hour", civil.hour, 0, 23);
  requireRange("minute", civil.minute, 0, 59);
}

// Date is only used as a calendar calculator here; UTC methods avoid any
// local-time or DST adjustment.
function toEpochMinutes(civil: CivilDateTime): number {
  const d = new Date(0);
  d.setUTCFullYear(civil.year, civil.month - 1, civil.day);
  d.setUTCHours(civil.hour, civil.minute, 0, 0);
  return d.getTime() / MS_PER_MINUTE;
}

function fromEpochMinutes(minutes: number): CivilDateTime {
  const d = new Date(minutes * MS_PER_MINUTE);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
  };
}

export function addMinutes(civil: CivilDateTime, minutes: number): CivilDateTime {
  return fromEpochMinutes(toEpochMinutes(civil) + minutes);
}

/**
 * Negative when a is earlier than b, zero when equal, positive otherwise.
 */
export function compareCivil(a: CivilDateTime, b: CivilDateTime): number {
  return toEpochMinutes(a) - toEpochMinutes(b);
}

/**
 * Parse "YYYY-MM-DDTHH:mm" (or "YYYY-MM-DD HH:mm").
 */
export function parseCivilDateTime(value: string): CivilDateTime {
  const match = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid datetime format "${value}"; expected YYYY-MM-DDTHH:mm`);
  }
  const civil: CivilDateTime = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
  };
  assertValidCivilDateTime(civil);
  return civil;
}

export function formatCivil(civil: CivilDateTime): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${String(civil.year).padStart(4, "0")}-${pad(civil.month)}-${pad(civil.day)}T${pad(civil.hour)}:${pad(civil.minute)}`;
}
