import { randomBytes } from 'crypto';
import { config } from './config.js';
import { insert, is_json_object, transact } from './db.js';
import { authorize_self_interviewer } from './auth.js';
import { find_availability, find_available_slots, evaluate_availability, type UnavailableReason } from './availability.js';
import { ConflictError, NotFoundError, ValidationError, fail, ok, type CoreError, type Result } from './errors.js';
import { find_interview, room_id_taken } from './interviews.js';
import { emit } from './notifier.js';
import { format_local_datetime } from './calendar.js';
import {
  read_duration,
  read_enum_value,
  read_future_instant,
  read_instant,
  read_integer,
  read_optional_text,
  read_required_text,
} from './validation.js';
import {
  INTERVIEW_TYPES,
  type Actor,
  type Interview,
  type InterviewType,
  type JsonObject,
  type NotificationEvent,
} from './types.js';

export interface RoomConfig {
  recording_enabled?: boolean;
  code_editor_enabled?: boolean;
  whiteboard_enabled?: boolean;
  programming_languages?: readonly string[];
}

export interface ScheduleInterviewInput {
  candidate_id: string;
  interviewer_id: string;
  interview_type: string;
  scheduled_time: number;
  duration_minutes: number;
  room?: RoomConfig;
  round_number?: number;
  title?: string;
  position?: string;
  evaluation_criteria?: unknown;
}

export interface ScheduleOptions {
  generate_room_id?: () => string;
  // Set by the reschedule protocol for the interview being moved
  exclude_interview_id?: number | null;
  rescheduled_from_id?: number | null;
}

/** A validated booking, ready for the conflict check and insert. */
export interface BookingDraft {
  candidate_id: string;
  interviewer_id: string;
  created_by: string;
  title: string | null;
  position: string | null;
  interview_type: InterviewType;
  scheduled_time: number;
  duration_minutes: number;
  round_number: number;
  recording_enabled: boolean;
  code_editor_enabled: boolean;
  whiteboard_enabled: boolean;
  programming_languages: string[];
  evaluation_criteria: JsonObject | null;
}

const CONFLICT_MESSAGES: Record<UnavailableReason, string> = {
  outside_window: 'Requested time is outside the interviewer\'s weekly availability',
  blackout: 'Interviewer is unavailable on the requested date',
  daily_cap: 'Interviewer has reached the maximum number of interviews for that day',
  overlap: 'Requested time overlaps another interview (including buffer time)',
};

export function generate_room_id(): string {
  return `room_${randomBytes(6).toString('hex')}`;
}

export function validate_booking(
  actor: Actor,
  input: ScheduleInterviewInput,
  now: number,
): BookingDraft | ValidationError {
  const candidate_id = read_required_text('candidate_id', input.candidate_id, 200);
  if (candidate_id instanceof ValidationError) return candidate_id;
  const interviewer_id = read_required_text('interviewer_id', input.interviewer_id, 200);
  if (interviewer_id instanceof ValidationError) return interviewer_id;
  const interview_type = read_enum_value('interview_type', input.interview_type, INTERVIEW_TYPES);
  if (interview_type instanceof ValidationError) return interview_type;
  const duration_minutes = read_duration('duration_minutes', input.duration_minutes);
  if (duration_minutes instanceof ValidationError) return duration_minutes;
  const scheduled_time = read_future_instant('scheduled_time', input.scheduled_time, now);
  if (scheduled_time instanceof ValidationError) return scheduled_time;
  const round_number = read_integer('round_number', input.round_number ?? 1, 1, 100);
  if (round_number instanceof ValidationError) return round_number;
  const title = read_optional_text('title', input.title);
  if (title instanceof ValidationError) return title;
  const position = read_optional_text('position', input.position);
  if (position instanceof ValidationError) return position;

  let evaluation_criteria: JsonObject | null = null;
  if (input.evaluation_criteria !== undefined && input.evaluation_criteria !== null) {
    if (!is_json_object(input.evaluation_criteria)) {
      return new ValidationError('evaluation_criteria', 'evaluation_criteria must be a JSON object');
    }
    evaluation_criteria = input.evaluation_criteria;
  }

  const room = input.room ?? {};
  const programming_languages: string[] = [];
  for (const language of room.programming_languages ?? []) {
    const trimmed = typeof language === 'string' ? language.trim() : '';
    if (!trimmed) return new ValidationError('programming_languages', 'programming languages must be non-empty text');
    programming_languages.push(trimmed);
  }

  return {
    candidate_id,
    interviewer_id,
    created_by: actor.user_id,
    title,
    position,
    interview_type,
    scheduled_time,
    duration_minutes,
    round_number,
    recording_enabled: room.recording_enabled ?? true,
    code_editor_enabled: room.code_editor_enabled ?? false,
    whiteboard_enabled: room.whiteboard_enabled ?? false,
    programming_languages,
    evaluation_criteria,
  };
}

/**
 * Conflict check and insert for an already validated booking. Must run inside
 * `transact` so that no other booking for the same interviewer can be
 * committed between the check and the insert.
 */
export function commit_booking(draft: BookingDraft, options: ScheduleOptions = {}): Result<Interview> {
  const availability = find_availability(draft.interviewer_id);
  if (!availability) return fail(new NotFoundError('availability', draft.interviewer_id));

  const verdict = evaluate_availability(availability, draft.scheduled_time, draft.duration_minutes, {
    exclude_interview_id: options.exclude_interview_id ?? null,
  });
  if (!verdict.available) {
    return fail(new ConflictError(verdict.reason, CONFLICT_MESSAGES[verdict.reason], verdict.conflicting_interview_id));
  }

  const next_room_id = options.generate_room_id ?? generate_room_id;
  let room_id: string | null = null;
  for (let attempt = 0; attempt < config.scheduling.room_id_attempts && room_id === null; attempt += 1) {
    const candidate = next_room_id();
    if (!room_id_taken(candidate)) room_id = candidate;
  }
  if (room_id === null) {
    return fail(new ConflictError('duplicate_room', 'Could not allocate a unique room id'));
  }

  const now = Date.now();
  const id = insert(
    `INSERT INTO interviews (
       candidate_id, interviewer_id, created_by, title, position, interview_type, status,
       scheduled_time, duration_minutes, round_number, room_id, meeting_url,
       recording_enabled, code_editor_enabled, whiteboard_enabled, programming_languages,
       evaluation_criteria, rescheduled_from_id, created_at, updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, 'scheduled', ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      draft.candidate_id,
      draft.interviewer_id,
      draft.created_by,
      draft.title,
      draft.position,
      draft.interview_type,
      draft.scheduled_time,
      draft.duration_minutes,
      draft.round_number,
      room_id,
      `/interview/${room_id}`,
      draft.recording_enabled ? 1 : 0,
      draft.code_editor_enabled ? 1 : 0,
      draft.whiteboard_enabled ? 1 : 0,
      JSON.stringify(draft.programming_languages),
      draft.evaluation_criteria ? JSON.stringify(draft.evaluation_criteria) : null,
      options.rescheduled_from_id ?? null,
      now,
      now,
    ],
  );

  const interview = find_interview(id);
  if (!interview) throw new Error(`Interview ${id} vanished right after insert`);
  return ok(interview);
}

/** Start time in the interviewer's local offset, `YYYY-MM-DD HH:MM`. */
export function format_interview_time(interview: Interview): string {
  const offset = find_availability(interview.interviewer_id)?.utc_offset_minutes ?? config.scheduling.default_utc_offset_minutes;
  return format_local_datetime(interview.scheduled_time, offset);
}

export function scheduled_notifications(interview: Interview, type: 'interview_scheduled' | 'interview_rescheduled'): NotificationEvent[] {
  const when = format_interview_time(interview);
  const label = interview.position ?? interview.interview_type;
  const title = type === 'interview_scheduled' ? 'Interview Scheduled' : 'Interview Rescheduled';
  const data = {
    interview_id: interview.id,
    when,
    room_id: interview.room_id,
    meeting_url: interview.meeting_url,
    scheduled_time: interview.scheduled_time,
    duration_minutes: interview.duration_minutes,
  };
  return [
    {
      user_id: interview.candidate_id,
      type,
      title,
      message: `Your ${label} interview is scheduled for ${when} (${interview.duration_minutes} min)`,
      data,
    },
    {
      user_id: interview.interviewer_id,
      type,
      title,
      message: `You are interviewing candidate ${interview.candidate_id} (${label}) at ${when}`,
      data,
    },
  ];
}

/**
 * Books an interview if the interviewer is free. Returns a Conflict naming the
 * blocking interview instead of double-booking; never retries.
 */
export function schedule_interview(
  actor: Actor,
  input: ScheduleInterviewInput,
  options: ScheduleOptions = {},
): Result<Interview> {
  const draft = validate_booking(actor, input, Date.now());
  if (draft instanceof ValidationError) return fail(draft);

  const denied = authorize_self_interviewer(actor, draft.interviewer_id, 'schedule interviews');
  if (denied) return fail(denied);

  const result = transact(() => commit_booking(draft, options));
  if (!result.ok) {
    if (result.error instanceof ConflictError) {
      console.log(`[scheduling] Rejected booking for ${draft.interviewer_id}: ${result.error.reason}`);
    }
    return result;
  }

  const interview = result.value;
  console.log(
    `[scheduling] Scheduled interview ${interview.id} (${interview.room_id}) for ${interview.interviewer_id} with ${interview.candidate_id}`,
  );
  emit(...scheduled_notifications(interview, 'interview_scheduled'));
  return result;
}

export interface BulkCandidate {
  candidate_id: string;
  position?: string;
  title?: string;
}

export interface BulkScheduleInput {
  candidates: readonly BulkCandidate[];
  interviewer_ids: readonly string[];
  // Rotate through interviewer_ids; otherwise everyone goes to the first one
  auto_assign?: boolean;
  interview_type: string;
  duration_minutes: number;
  from: number;
  to: number;
  room?: RoomConfig;
  step_minutes?: number;
}

export interface BulkScheduleFailure {
  candidate_id: string;
  interviewer_id: string;
  error: CoreError;
}

export interface BulkScheduleReport {
  total: number;
  scheduled: Interview[];
  failed: BulkScheduleFailure[];
}

const MAX_BULK_CANDIDATES = 100;

/**
 * Books each candidate into the earliest free slot of their interviewer in
 * `[from, to)`. Every candidate gets its own transaction: a failure is
 * reported in the outcome and the rest of the batch goes ahead.
 */
export function schedule_bulk(
  actor: Actor,
  input: BulkScheduleInput,
  options: Pick<ScheduleOptions, 'generate_room_id'> = {},
): Result<BulkScheduleReport> {
  if (!Array.isArray(input.candidates) || input.candidates.length > MAX_BULK_CANDIDATES) {
    return fail(new ValidationError('candidates', `candidates must list at most ${MAX_BULK_CANDIDATES} entries`));
  }
  const interviewer_ids: string[] = [];
  for (const value of input.interviewer_ids) {
    const interviewer_id = read_required_text('interviewer_ids', value, 200);
    if (interviewer_id instanceof ValidationError) return fail(interviewer_id);
    const denied = authorize_self_interviewer(actor, interviewer_id, 'schedule interviews');
    if (denied) return fail(denied);
    interviewer_ids.push(interviewer_id);
  }
  if (interviewer_ids.length === 0) {
    return fail(new ValidationError('interviewer_ids', 'At least one interviewer is required'));
  }
  const interview_type = read_enum_value('interview_type', input.interview_type, INTERVIEW_TYPES);
  if (interview_type instanceof ValidationError) return fail(interview_type);
  const duration_minutes = read_duration('duration_minutes', input.duration_minutes);
  if (duration_minutes instanceof ValidationError) return fail(duration_minutes);
  const from = read_instant('from', input.from);
  if (from instanceof ValidationError) return fail(from);
  const to = read_instant('to', input.to);
  if (to instanceof ValidationError) return fail(to);
  if (to <= from) return fail(new ValidationError('to', 'to must be later than from'));

  const report: BulkScheduleReport = { total: input.candidates.length, scheduled: [], failed: [] };
  input.candidates.forEach((candidate, index) => {
    const interviewer_id = interviewer_ids[input.auto_assign ? index % interviewer_ids.length : 0];
    const now = Date.now();

    const result = transact((): Result<Interview> => {
      const slots = find_available_slots(
        interviewer_id,
        Math.max(from, now),
        to,
        duration_minutes,
        input.step_minutes,
      );
      if (!slots.ok) return slots;
      const [slot] = slots.value;
      if (slot === undefined) {
        return fail(new ConflictError('no_slot', `No free slot for interviewer ${interviewer_id} in the requested range`));
      }
      const draft = validate_booking(
        actor,
        {
          candidate_id: candidate.candidate_id,
          interviewer_id,
          interview_type,
          scheduled_time: slot,
          duration_minutes,
          room: input.room,
          title: candidate.title ?? (candidate.position ? `${candidate.position} Interview` : undefined),
          position: candidate.position,
        },
        now,
      );
      if (draft instanceof ValidationError) return fail(draft);
      return commit_booking(draft, options);
    });

    if (result.ok) {
      report.scheduled.push(result.value);
      emit(...scheduled_notifications(result.value, 'interview_scheduled'));
    } else {
      report.failed.push({ candidate_id: candidate.candidate_id, interviewer_id, error: result.error });
    }
  });

  console.log(
    `[scheduling] Bulk run by ${actor.user_id}: ${report.scheduled.length} of ${report.total} scheduled, ${report.failed.length} failed`,
  );
  return ok(report);
}
