import {
  query_all,
  query_one,
  run,
  transact,
  read_boolean,
  read_enum,
  read_json_object,
  read_number,
  read_optional_number,
  read_optional_string,
  read_string,
  read_string_array,
  type Row,
} from './db.js';
import { authorize_staff, is_privileged } from './auth.js';
import { ForbiddenError, NotFoundError, fail, ok, type Result } from './errors.js';
import {
  BOOKED_STATUSES,
  INTERVIEW_STATUSES,
  INTERVIEW_TYPES,
  type Actor,
  type Interview,
  type InterviewStatus,
} from './types.js';

export function parse_interview(row: Row): Interview {
  return {
    id: read_number(row, 'id'),
    candidate_id: read_string(row, 'candidate_id'),
    interviewer_id: read_string(row, 'interviewer_id'),
    created_by: read_string(row, 'created_by'),
    title: read_optional_string(row, 'title'),
    position: read_optional_string(row, 'position'),
    interview_type: read_enum(row, 'interview_type', INTERVIEW_TYPES),
    status: read_enum(row, 'status', INTERVIEW_STATUSES),
    scheduled_time: read_number(row, 'scheduled_time'),
    duration_minutes: read_number(row, 'duration_minutes'),
    round_number: read_number(row, 'round_number'),
    room_id: read_string(row, 'room_id'),
    meeting_url: read_string(row, 'meeting_url'),
    actual_start_time: read_optional_number(row, 'actual_start_time'),
    actual_end_time: read_optional_number(row, 'actual_end_time'),
    interviewer_joined_at: read_optional_number(row, 'interviewer_joined_at'),
    candidate_joined_at: read_optional_number(row, 'candidate_joined_at'),
    recording_enabled: read_boolean(row, 'recording_enabled'),
    code_editor_enabled: read_boolean(row, 'code_editor_enabled'),
    whiteboard_enabled: read_boolean(row, 'whiteboard_enabled'),
    programming_languages: read_string_array(row, 'programming_languages'),
    evaluation_criteria: read_json_object(row, 'evaluation_criteria'),
    recording_url: read_optional_string(row, 'recording_url'),
    cancellation_reason: read_optional_string(row, 'cancellation_reason'),
    rescheduled_from_id: read_optional_number(row, 'rescheduled_from_id'),
    created_at: read_number(row, 'created_at'),
    updated_at: read_number(row, 'updated_at'),
  };
}

export function find_interview(id: number): Interview | null {
  const row = query_one('SELECT * FROM interviews WHERE id = ?', [id]);
  return row ? parse_interview(row) : null;
}

export function get_interview(id: number): Result<Interview> {
  const interview = find_interview(id);
  return interview ? ok(interview) : fail(new NotFoundError('interview', id));
}

export function room_id_taken(room_id: string): boolean {
  return query_one('SELECT 1 AS taken FROM interviews WHERE room_id = ?', [room_id]) !== null;
}

/** Lookup for guests who arrive with a room link rather than an interview id. */
export function find_interview_by_room(room_id: string): Interview | null {
  const row = query_one('SELECT * FROM interviews WHERE room_id = ?', [room_id.trim()]);
  return row ? parse_interview(row) : null;
}

export function get_interview_by_room(room_id: string): Result<Interview> {
  const interview = find_interview_by_room(room_id);
  return interview ? ok(interview) : fail(new NotFoundError('interview', room_id));
}

export interface ListInterviewsFilter {
  from?: number;
  to?: number;
  statuses?: readonly InterviewStatus[];
}

function filter_clause(filter: ListInterviewsFilter): { sql: string; params: (string | number)[] } {
  const parts: string[] = [];
  const params: (string | number)[] = [];
  if (filter.from !== undefined) {
    parts.push('scheduled_time >= ?');
    params.push(filter.from);
  }
  if (filter.to !== undefined) {
    parts.push('scheduled_time < ?');
    params.push(filter.to);
  }
  if (filter.statuses && filter.statuses.length > 0) {
    parts.push(`status IN (${filter.statuses.map(() => '?').join(', ')})`);
    params.push(...filter.statuses);
  }
  return { sql: parts.map(part => ` AND ${part}`).join(''), params };
}

export function list_by_interviewer(
  actor: Actor,
  interviewer_id: string,
  filter: ListInterviewsFilter = {},
): Result<Interview[]> {
  const denied = authorize_staff(actor, 'list interviews');
  if (denied) return fail(denied);
  const clause = filter_clause(filter);
  const rows = query_all(
    `SELECT * FROM interviews WHERE interviewer_id = ?${clause.sql} ORDER BY scheduled_time ASC`,
    [interviewer_id, ...clause.params],
  );
  return ok(rows.map(parse_interview));
}

export function list_by_candidate(actor: Actor, candidate_id: string): Result<Interview[]> {
  if (!(actor.role === 'candidate' && actor.user_id === candidate_id)) {
    const denied = authorize_staff(actor, 'list candidate interviews');
    if (denied) return fail(denied);
  }
  const rows = query_all(
    'SELECT * FROM interviews WHERE candidate_id = ? ORDER BY scheduled_time ASC',
    [candidate_id],
  );
  return ok(rows.map(parse_interview));
}

const BOOKED_IN = BOOKED_STATUSES.map(() => '?').join(', ');

/** Interviews holding a slot on the interviewer's calendar that start in `[from, to)`. */
export function list_booked_between(
  interviewer_id: string,
  from: number,
  to: number,
  exclude_interview_id: number | null = null,
): Interview[] {
  const rows = query_all(
    `SELECT * FROM interviews
     WHERE interviewer_id = ?
     AND status IN (${BOOKED_IN})
     AND scheduled_time >= ? AND scheduled_time < ?
     AND id != ?
     ORDER BY scheduled_time ASC`,
    [interviewer_id, ...BOOKED_STATUSES, from, to, exclude_interview_id ?? -1],
  );
  return rows.map(parse_interview);
}

/**
 * Interviews holding a slot on the interviewer's calendar whose span
 * `[scheduled_time, scheduled_time + duration)` overlaps `[from, to)`.
 */
export function list_booked_overlapping(
  interviewer_id: string,
  from: number,
  to: number,
  exclude_interview_id: number | null = null,
): Interview[] {
  const rows = query_all(
    `SELECT * FROM interviews
     WHERE interviewer_id = ?
     AND status IN (${BOOKED_IN})
     AND scheduled_time < ? AND scheduled_time + duration_minutes * 60000 > ?
     AND id != ?
     ORDER BY scheduled_time ASC`,
    [interviewer_id, ...BOOKED_STATUSES, to, from, exclude_interview_id ?? -1],
  );
  return rows.map(parse_interview);
}

/** Interviews still waiting for anyone to join. Used by the background jobs. */
export function list_scheduled_between(from: number, to: number): Interview[] {
  const rows = query_all(
    `SELECT * FROM interviews
     WHERE status = 'scheduled' AND scheduled_time >= ? AND scheduled_time < ?
     ORDER BY scheduled_time ASC`,
    [from, to],
  );
  return rows.map(parse_interview);
}

/**
 * Removes every interview of a candidate together with everything the
 * interviews own. Called when the candidate record is deleted upstream.
 */
export function remove_candidate(actor: Actor, candidate_id: string): Result<number> {
  if (!is_privileged(actor)) {
    return fail(new ForbiddenError(`${actor.role} ${actor.user_id} may not remove candidate ${candidate_id}`));
  }
  return transact(() => {
    const row = query_one('SELECT COUNT(*) AS n FROM interviews WHERE candidate_id = ?', [candidate_id]);
    const count = row ? read_number(row, 'n') : 0;
    run('DELETE FROM interviews WHERE candidate_id = ?', [candidate_id]);
    if (count > 0) console.log(`[interviews] Removed ${count} interview(s) of candidate ${candidate_id}`);
    return ok(count);
  });
}
