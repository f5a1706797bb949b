import { config } from './config.js';
import {
  query_one,
  run,
  read_number,
  read_string,
  read_string_array,
  type Row,
} from './db.js';
import { authorize_self_interviewer } from './auth.js';
import { DAY_MS, MINUTE_MS, is_iso_date, local_day_bounds, local_parts, parse_time_of_day } from './calendar.js';
import { NotFoundError, ValidationError, fail, ok, type Result } from './errors.js';
import { list_booked_between, list_booked_overlapping } from './interviews.js';
import { read_duration, read_enum_value, read_instant, read_integer, read_required_text } from './validation.js';
import { WEEKDAYS, type Actor, type Availability, type IsoDate, type Weekday } from './types.js';

export interface AvailabilityInput {
  interviewer_id: string;
  weekdays: readonly string[];
  start_time: string;
  end_time: string;
  buffer_minutes: number;
  max_per_day: number;
  blackout_dates?: readonly string[];
  utc_offset_minutes?: number;
}

export type UnavailableReason = 'outside_window' | 'blackout' | 'daily_cap' | 'overlap';

export type AvailabilityVerdict =
  | { available: true }
  | { available: false; reason: UnavailableReason; conflicting_interview_id: number | null };

export interface AvailabilityCheckOptions {
  // The interview being moved by a reschedule does not block its own new slot
  exclude_interview_id?: number | null;
}

const MAX_BUFFER_MINUTES = 24 * 60;
const MAX_OFFSET_MINUTES = 14 * 60;

function parse_availability(row: Row): Availability {
  const weekdays = new Set<Weekday>();
  for (const day of read_string_array(row, 'weekdays')) {
    const match = WEEKDAYS.find(candidate => candidate === day);
    if (match) weekdays.add(match);
  }
  return {
    interviewer_id: read_string(row, 'interviewer_id'),
    weekdays,
    start_time: read_string(row, 'start_time'),
    end_time: read_string(row, 'end_time'),
    buffer_minutes: read_number(row, 'buffer_minutes'),
    max_per_day: read_number(row, 'max_per_day'),
    blackout_dates: new Set(read_string_array(row, 'blackout_dates')),
    utc_offset_minutes: read_number(row, 'utc_offset_minutes'),
    updated_at: read_number(row, 'updated_at'),
  };
}

export function find_availability(interviewer_id: string): Availability | null {
  const row = query_one('SELECT * FROM interviewer_availability WHERE interviewer_id = ?', [interviewer_id]);
  return row ? parse_availability(row) : null;
}

export function get_availability(interviewer_id: string): Result<Availability> {
  const availability = find_availability(interviewer_id);
  return availability ? ok(availability) : fail(new NotFoundError('availability', interviewer_id));
}

function validate_availability(input: AvailabilityInput): Omit<Availability, 'updated_at'> | ValidationError {
  const interviewer_id = read_required_text('interviewer_id', input.interviewer_id, 200);
  if (interviewer_id instanceof ValidationError) return interviewer_id;

  if (!Array.isArray(input.weekdays) || input.weekdays.length === 0) {
    return new ValidationError('weekdays', 'weekdays must list at least one day');
  }
  const weekdays = new Set<Weekday>();
  for (const raw of input.weekdays) {
    const day = read_enum_value('weekdays', typeof raw === 'string' ? raw.toLowerCase() : raw, WEEKDAYS);
    if (day instanceof ValidationError) return day;
    weekdays.add(day);
  }

  const start_minutes = parse_time_of_day(input.start_time);
  if (start_minutes === null) return new ValidationError('start_time', 'start_time must be HH:MM');
  const end_minutes = parse_time_of_day(input.end_time);
  if (end_minutes === null) return new ValidationError('end_time', 'end_time must be HH:MM');
  if (start_minutes >= end_minutes) {
    return new ValidationError('end_time', 'end_time must be later than start_time');
  }

  const buffer_minutes = read_integer('buffer_minutes', input.buffer_minutes, 0, MAX_BUFFER_MINUTES);
  if (buffer_minutes instanceof ValidationError) return buffer_minutes;
  const max_per_day = read_integer('max_per_day', input.max_per_day, 1, 100);
  if (max_per_day instanceof ValidationError) return max_per_day;
  const utc_offset_minutes = read_integer(
    'utc_offset_minutes',
    input.utc_offset_minutes ?? config.scheduling.default_utc_offset_minutes,
    -MAX_OFFSET_MINUTES,
    MAX_OFFSET_MINUTES,
  );
  if (utc_offset_minutes instanceof ValidationError) return utc_offset_minutes;

  const blackout_dates = new Set<IsoDate>();
  for (const date of input.blackout_dates ?? []) {
    if (typeof date !== 'string' || !is_iso_date(date)) {
      return new ValidationError('blackout_dates', `blackout date ${JSON.stringify(date)} must be YYYY-MM-DD`);
    }
    blackout_dates.add(date);
  }

  return {
    interviewer_id,
    weekdays,
    start_time: input.start_time,
    end_time: input.end_time,
    buffer_minutes,
    max_per_day,
    blackout_dates,
    utc_offset_minutes,
  };
}

/** Replaces the interviewer's single availability record. */
export function set_availability(actor: Actor, input: AvailabilityInput): Result<Availability> {
  const valid = validate_availability(input);
  if (valid instanceof ValidationError) return fail(valid);

  const denied = authorize_self_interviewer(actor, valid.interviewer_id, 'set availability');
  if (denied) return fail(denied);

  const now = Date.now();
  // Stored in week order so the record reads the same regardless of input order
  const weekdays = WEEKDAYS.filter(day => valid.weekdays.has(day));
  const blackout_dates = [...valid.blackout_dates].sort();
  run(
    `INSERT INTO interviewer_availability
       (interviewer_id, weekdays, start_time, end_time, buffer_minutes, max_per_day, blackout_dates, utc_offset_minutes, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(interviewer_id) DO UPDATE SET
       weekdays = excluded.weekdays,
       start_time = excluded.start_time,
       end_time = excluded.end_time,
       buffer_minutes = excluded.buffer_minutes,
       max_per_day = excluded.max_per_day,
       blackout_dates = excluded.blackout_dates,
       utc_offset_minutes = excluded.utc_offset_minutes,
       updated_at = excluded.updated_at`,
    [
      valid.interviewer_id,
      JSON.stringify(weekdays),
      valid.start_time,
      valid.end_time,
      valid.buffer_minutes,
      valid.max_per_day,
      JSON.stringify(blackout_dates),
      valid.utc_offset_minutes,
      now,
    ],
  );
  console.log(`[availability] Updated availability for interviewer ${valid.interviewer_id}`);
  return ok({ ...valid, weekdays: new Set(weekdays), blackout_dates: new Set(blackout_dates), updated_at: now });
}

/**
 * Evaluates the availability rules in order: weekly window, blackout dates,
 * daily cap, then buffered overlap with booked interviews. The verdict names
 * the first rule that failed.
 */
export function evaluate_availability(
  availability: Availability,
  start: number,
  duration_minutes: number,
  options: AvailabilityCheckOptions = {},
): AvailabilityVerdict {
  const exclude = options.exclude_interview_id ?? null;
  const end = start + duration_minutes * MINUTE_MS;
  const local = local_parts(start, availability.utc_offset_minutes);

  // parse_time_of_day cannot fail here: the values were validated on write
  const window_start = parse_time_of_day(availability.start_time) ?? 0;
  const window_end = parse_time_of_day(availability.end_time) ?? 0;
  if (
    !availability.weekdays.has(local.weekday) ||
    local.minute_of_day < window_start ||
    local.minute_of_day + duration_minutes > window_end
  ) {
    return { available: false, reason: 'outside_window', conflicting_interview_id: null };
  }

  if (availability.blackout_dates.has(local.date)) {
    return { available: false, reason: 'blackout', conflicting_interview_id: null };
  }

  const [day_start, day_end] = local_day_bounds(local.date, availability.utc_offset_minutes);
  const booked_that_day = list_booked_between(availability.interviewer_id, day_start, day_end, exclude);
  if (booked_that_day.length >= availability.max_per_day) {
    return { available: false, reason: 'daily_cap', conflicting_interview_id: null };
  }

  const buffer_ms = availability.buffer_minutes * MINUTE_MS;
  const [clash] = list_booked_overlapping(
    availability.interviewer_id,
    start - buffer_ms,
    end + buffer_ms,
    exclude,
  );
  if (clash) {
    return { available: false, reason: 'overlap', conflicting_interview_id: clash.id };
  }

  return { available: true };
}

export function check_availability(
  interviewer_id: string,
  start: number,
  duration_minutes: number,
  options: AvailabilityCheckOptions = {},
): Result<AvailabilityVerdict> {
  const availability = find_availability(interviewer_id);
  if (!availability) return fail(new NotFoundError('availability', interviewer_id));
  const instant = read_instant('start', start);
  if (instant instanceof ValidationError) return fail(instant);
  const duration = read_duration('duration_minutes', duration_minutes);
  if (duration instanceof ValidationError) return fail(duration);
  return ok(evaluate_availability(availability, instant, duration, options));
}

export function is_available(interviewer_id: string, start: number, duration_minutes: number): Result<boolean> {
  const verdict = check_availability(interviewer_id, start, duration_minutes);
  return verdict.ok ? ok(verdict.value.available) : verdict;
}

const MAX_SLOT_PROBES = 10_000;

/**
 * Start instants in `[from, to)` on a fixed step (aligned to the step in the
 * interviewer's local time) at which an interview of the given length could be
 * booked right now.
 */
export function find_available_slots(
  interviewer_id: string,
  from: number,
  to: number,
  duration_minutes: number,
  step_minutes = 30,
): Result<number[]> {
  const availability = find_availability(interviewer_id);
  if (!availability) return fail(new NotFoundError('availability', interviewer_id));
  const duration = read_duration('duration_minutes', duration_minutes);
  if (duration instanceof ValidationError) return fail(duration);
  const step = read_integer('step_minutes', step_minutes, 5, 24 * 60);
  if (step instanceof ValidationError) return fail(step);
  if (!(to > from)) return fail(new ValidationError('to', 'to must be later than from'));
  if (to - from > 62 * DAY_MS) return fail(new ValidationError('to', 'search range is limited to 62 days'));

  const step_ms = step * MINUTE_MS;
  const offset_ms = availability.utc_offset_minutes * MINUTE_MS;
  let cursor = Math.ceil((from + offset_ms) / step_ms) * step_ms - offset_ms;
  const slots: number[] = [];
  for (let probes = 0; cursor + duration * MINUTE_MS <= to && probes < MAX_SLOT_PROBES; probes += 1) {
    if (evaluate_availability(availability, cursor, duration).available) slots.push(cursor);
    cursor += step_ms;
  }
  return ok(slots);
}
