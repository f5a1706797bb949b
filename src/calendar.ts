import { WEEKDAYS, type IsoDate, type TimeOfDay, type Weekday } from './types.js';

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

const TIME_OF_DAY_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface LocalParts {
  weekday: Weekday;
  date: IsoDate;
  minute_of_day: number;
}

/** Minutes since local midnight for a `HH:MM` string, or null when malformed. */
export function parse_time_of_day(value: TimeOfDay): number | null {
  const match = TIME_OF_DAY_RE.exec(value);
  if (!match) return null;
  return Number(match[1]) * 60 + Number(match[2]);
}

/** True for a real calendar date written as `YYYY-MM-DD`. */
export function is_iso_date(value: string): value is IsoDate {
  const match = ISO_DATE_RE.exec(value);
  if (!match) return false;
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  return new Date(ms).toISOString().slice(0, 10) === value;
}

/** Weekday, date and time of day of an instant at the given UTC offset. */
export function local_parts(instant: number, utc_offset_minutes: number): LocalParts {
  const shifted = new Date(instant + utc_offset_minutes * MINUTE_MS);
  return {
    weekday: WEEKDAYS[shifted.getUTCDay()],
    date: shifted.toISOString().slice(0, 10),
    minute_of_day: shifted.getUTCHours() * 60 + shifted.getUTCMinutes(),
  };
}

/** `[start, end)` instants of a local calendar date. */
export function local_day_bounds(date: IsoDate, utc_offset_minutes: number): [number, number] {
  const [year, month, day] = date.split('-').map(Number);
  const start = Date.UTC(year, month - 1, day) - utc_offset_minutes * MINUTE_MS;
  return [start, start + DAY_MS];
}

/** Parses `YYYY-MM-DD HH:MM` as local time at the given offset. */
export function parse_local_datetime(value: string, utc_offset_minutes: number): number | null {
  const match = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})$/.exec(value.trim());
  if (!match) return null;
  const [, date, time] = match;
  if (!is_iso_date(date)) return null;
  const minutes = parse_time_of_day(time);
  if (minutes === null) return null;
  const [day_start] = local_day_bounds(date, utc_offset_minutes);
  return day_start + minutes * MINUTE_MS;
}

/** Formats an instant as `YYYY-MM-DD HH:MM` at the given offset. */
export function format_local_datetime(instant: number, utc_offset_minutes: number): string {
  return new Date(instant + utc_offset_minutes * MINUTE_MS).toISOString().slice(0, 16).replace('T', ' ');
}
