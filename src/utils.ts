import { rename, rm, writeFile } from 'node:fs/promises';
import { differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

const CALENDAR_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|T)/;

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';
export const RUN_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

/**
 * Reduces a `Date`, a `yyyy-MM-dd` string or an ISO timestamp to its calendar date.
 * Returns null for anything that is not a real date (e.g. `2024-02-30`).
 */
export function toCalendarDate(value: unknown): string | null {
  if (value instanceof Date) return isValid(value) ? formatCalendarDate(value) : null;
  if (typeof value !== 'string') return null;
  const match = CALENDAR_DATE_PREFIX.exec(value.trim());
  if (!match) return null;
  const day = match[1];
  const parsed = parseISO(day);
  if (!isValid(parsed)) return null;
  return format(parsed, CALENDAR_DATE_FORMAT) === day ? day : null;
}

export function formatCalendarDate(date: Date): string {
  return format(date, CALENDAR_DATE_FORMAT);
}

export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function formatRunTimestamp(date: Date): string {
  return format(date, RUN_TIMESTAMP_FORMAT);
}

/** Banker's rounding: ties go to the even neighbour. */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  const epsilon = 1e-9;

  let rounded: number;
  if (Math.abs(fraction - 0.5) < epsilon) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }
  return rounded / factor;
}

/** Writes to a temporary sibling and renames it into place. */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
