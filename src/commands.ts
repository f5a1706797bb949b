import { parse_local_datetime } from './calendar.js';
import { WEEKDAYS, type Weekday } from './types.js';
import type { AvailabilityInput } from './availability.js';
import type { ScheduleInterviewInput } from './scheduling.js';

// Argument parsers for the bot commands. Each returns null when the text does
// not match the command's usage; range and business checks stay in the core.

const DAY_ALIASES: Record<string, number> = {
  sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6,
};

const LOCAL_DATETIME = String.raw`\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}`;

function day_index(token: string): number | null {
  const key = token.trim().toLowerCase().slice(0, 3);
  return key in DAY_ALIASES ? DAY_ALIASES[key] : null;
}

/** `mon-fri`, `mon,wed,fri` or a mix of both. Ranges wrap past Saturday. */
export function parse_weekdays(token: string): Weekday[] | null {
  const days = new Set<number>();
  for (const part of token.split(',')) {
    const [from, to, ...rest] = part.split('-');
    if (rest.length > 0) return null;
    const start = day_index(from);
    if (start === null) return null;
    if (to === undefined) {
      days.add(start);
      continue;
    }
    const end = day_index(to);
    if (end === null) return null;
    for (let day = start; ; day = (day + 1) % 7) {
      days.add(day);
      if (day === end) break;
    }
  }
  return [...days].sort((a, b) => a - b).map(day => WEEKDAYS[day]);
}

function parse_int(value: string): number | null {
  return /^-?\d+$/.test(value) ? Number(value) : null;
}

export type AvailabilityArgs = Omit<AvailabilityInput, 'interviewer_id'>;

/**
 * `<days> <HH:MM-HH:MM> [buffer=15] [max=5] [offset=0] [blackout=YYYY-MM-DD,...]`
 */
export function parse_availability_args(text: string): AvailabilityArgs | null {
  const [days_token, window, ...options] = text.trim().split(/\s+/);
  if (!days_token || !window) return null;
  const weekdays = parse_weekdays(days_token);
  if (!weekdays) return null;
  const window_match = /^(\d{2}:\d{2})-(\d{2}:\d{2})$/.exec(window);
  if (!window_match) return null;

  const args: AvailabilityArgs = {
    weekdays,
    start_time: window_match[1],
    end_time: window_match[2],
    buffer_minutes: 15,
    max_per_day: 5,
  };
  for (const option of options) {
    const [key, value, ...rest] = option.split('=');
    if (value === undefined || rest.length > 0) return null;
    if (key === 'blackout') {
      args.blackout_dates = value.split(',').filter(Boolean);
      continue;
    }
    const number = parse_int(value);
    if (number === null) return null;
    if (key === 'buffer') args.buffer_minutes = number;
    else if (key === 'max') args.max_per_day = number;
    else if (key === 'offset') args.utc_offset_minutes = number;
    else return null;
  }
  return args;
}

export type ScheduleArgs = Omit<ScheduleInterviewInput, 'interviewer_id'>;

/** `<candidate> <YYYY-MM-DD> <HH:MM> <minutes> <type>`, time local to `utc_offset_minutes`. */
export function parse_schedule_args(text: string, utc_offset_minutes: number): ScheduleArgs | null {
  const tokens = text.trim().split(/\s+/);
  if (tokens.length !== 5) return null;
  const [candidate, date, time, minutes, interview_type] = tokens;
  const scheduled_time = parse_local_datetime(`${date} ${time}`, utc_offset_minutes);
  const duration_minutes = parse_int(minutes);
  if (scheduled_time === null || duration_minutes === null) return null;
  return {
    candidate_id: candidate.replace(/^@/, ''),
    scheduled_time,
    duration_minutes,
    interview_type: interview_type.toLowerCase(),
  };
}

export interface RescheduleArgs {
  interview_id: number;
  proposed_times: number[];
  reason: string;
}

const RESCHEDULE_PATTERN = new RegExp(
  String.raw`^(\d+)\s+(${LOCAL_DATETIME}(?:\s*,\s*${LOCAL_DATETIME})*)\s+(\S[\s\S]*)$`,
);

/** `<interview id> <time>[,<time>...] <reason>` */
export function parse_reschedule_args(text: string, utc_offset_minutes: number): RescheduleArgs | null {
  const match = RESCHEDULE_PATTERN.exec(text.trim());
  if (!match) return null;
  const proposed_times: number[] = [];
  for (const value of match[2].split(',')) {
    const instant = parse_local_datetime(value, utc_offset_minutes);
    if (instant === null) return null;
    proposed_times.push(instant);
  }
  return { interview_id: Number(match[1]), proposed_times, reason: match[3].trim() };
}

export interface ApproveArgs {
  request_id: number;
  chosen_time: number;
}

/** `<request id> <YYYY-MM-DD HH:MM>` */
export function parse_approve_args(text: string, utc_offset_minutes: number): ApproveArgs | null {
  const match = new RegExp(String.raw`^(\d+)\s+(${LOCAL_DATETIME})$`).exec(text.trim());
  if (!match) return null;
  const chosen_time = parse_local_datetime(match[2], utc_offset_minutes);
  return chosen_time === null ? null : { request_id: Number(match[1]), chosen_time };
}

/** `<id> [rest...]`, for commands that take a numeric id and optional free text. */
export function parse_id_args(text: string): { id: number; rest: string } | null {
  const match = /^(\d+)(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return { id: Number(match[1]), rest: (match[2] ?? '').trim() };
}
