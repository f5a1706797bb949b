import { config } from './config.js';
import {
  insert,
  query_all,
  query_one,
  run,
  transact,
  read_enum,
  read_number,
  read_number_array,
  read_optional_number,
  read_string,
  type Row,
} from './db.js';
import { authorize_interviewer, authorize_participant } from './auth.js';
import {
  AlreadyResolvedError,
  NotFoundError,
  ValidationError,
  fail,
  ok,
  type Result,
} from './errors.js';
import { find_interview } from './interviews.js';
import { can_transition, mark_rescheduled, transition_error } from './lifecycle.js';
import { emit } from './notifier.js';
import { commit_booking, scheduled_notifications, type BookingDraft, type ScheduleOptions } from './scheduling.js';
import { read_future_instant, read_required_text } from './validation.js';
import {
  RESCHEDULE_STATUSES,
  type Actor,
  type Interview,
  type NotificationEvent,
  type ProposedTimes,
  type RescheduleDecision,
  type RescheduleRequest,
} from './types.js';

const REASON_MIN_LENGTH = 10;
const REASON_MAX_LENGTH = 500;

export interface RescheduleOutcome {
  request: RescheduleRequest;
  // Present when the request was approved
  previous_interview: Interview | null;
  interview: Interview | null;
  // Other pending requests for the same interview, rejected by the approval
  superseded: RescheduleRequest[];
}

function to_proposed_times(values: number[]): ProposedTimes | null {
  const [first, ...rest] = values;
  return first === undefined ? null : [first, ...rest];
}

export function parse_reschedule_request(row: Row): RescheduleRequest {
  const id = read_number(row, 'id');
  const proposed_times = to_proposed_times(read_number_array(row, 'proposed_times'));
  if (!proposed_times) throw new Error(`Reschedule request ${id} has no proposed times`);
  const base = {
    id,
    interview_id: read_number(row, 'interview_id'),
    requested_by: read_string(row, 'requested_by'),
    reason: read_string(row, 'reason'),
    proposed_times,
    created_at: read_number(row, 'created_at'),
  };
  const status = read_enum(row, 'status', RESCHEDULE_STATUSES);
  const resolved_at = read_optional_number(row, 'resolved_at');
  if (status === 'pending') return { ...base, status, resolved_at: null };
  if (resolved_at === null) throw new Error(`Reschedule request ${id} is ${status} without a resolution time`);
  if (status === 'rejected') return { ...base, status, resolved_at };
  const chosen_time = read_optional_number(row, 'chosen_time');
  const new_interview_id = read_optional_number(row, 'new_interview_id');
  if (chosen_time === null || new_interview_id === null) {
    throw new Error(`Approved reschedule request ${id} is missing its outcome`);
  }
  return { ...base, status, resolved_at, chosen_time, new_interview_id };
}

function find_request(id: number): RescheduleRequest | null {
  const row = query_one('SELECT * FROM reschedule_requests WHERE id = ?', [id]);
  return row ? parse_reschedule_request(row) : null;
}

export function get_reschedule_request(id: number): Result<RescheduleRequest> {
  const request = find_request(id);
  return request ? ok(request) : fail(new NotFoundError('reschedule_request', id));
}

export function list_reschedule_requests(interview_id: number): RescheduleRequest[] {
  return query_all(
    'SELECT * FROM reschedule_requests WHERE interview_id = ? ORDER BY created_at ASC, id ASC',
    [interview_id],
  ).map(parse_reschedule_request);
}

function validate_proposed_times(values: readonly number[], now: number): ProposedTimes | ValidationError {
  if (!Array.isArray(values) || values.length === 0) {
    return new ValidationError('proposed_times', 'At least one proposed time is required');
  }
  if (values.length > config.scheduling.max_proposed_times) {
    return new ValidationError('proposed_times', `At most ${config.scheduling.max_proposed_times} proposed times are allowed`);
  }
  const seen = new Set<number>();
  const times: number[] = [];
  for (const value of values) {
    const instant = read_future_instant('proposed_times', value, now);
    if (instant instanceof ValidationError) return instant;
    if (seen.has(instant)) return new ValidationError('proposed_times', 'Proposed times must be distinct');
    seen.add(instant);
    times.push(instant);
  }
  return to_proposed_times(times) ?? new ValidationError('proposed_times', 'At least one proposed time is required');
}

/**
 * Opens a pending request to move an interview. The interview itself is left
 * untouched until the request is approved.
 */
export function request_reschedule(
  actor: Actor,
  interview_id: number,
  reason: string,
  proposed_times: readonly number[],
): Result<RescheduleRequest> {
  const now = Date.now();
  const text = read_required_text('reason', reason, REASON_MAX_LENGTH);
  if (text instanceof ValidationError) return fail(text);
  if (text.length < REASON_MIN_LENGTH) {
    return fail(new ValidationError('reason', `reason must be at least ${REASON_MIN_LENGTH} characters`));
  }
  const times = validate_proposed_times(proposed_times, now);
  if (times instanceof ValidationError) return fail(times);

  const result = transact((): Result<{ request: RescheduleRequest; interview: Interview }> => {
    const interview = find_interview(interview_id);
    if (!interview) return fail(new NotFoundError('interview', interview_id));
    const denied = authorize_participant(actor, interview, 'reschedule');
    if (denied) return fail(denied);
    if (!can_transition(interview.status, 'reschedule')) return fail(transition_error(interview, 'reschedule'));

    const id = insert(
      `INSERT INTO reschedule_requests (interview_id, requested_by, reason, proposed_times, status, created_at)
       VALUES (?, ?, ?, ?, 'pending', ?)`,
      [interview.id, actor.user_id, text, JSON.stringify(times), now],
    );
    const request = find_request(id);
    if (!request) throw new Error(`Reschedule request ${id} vanished right after insert`);
    return ok({ request, interview });
  });
  if (!result.ok) return result;

  const { request, interview } = result.value;
  console.log(`[reschedule] Request ${request.id} opened for interview ${interview.id} by ${actor.user_id}`);
  const recipients = [interview.interviewer_id, interview.candidate_id].filter(user_id => user_id !== actor.user_id);
  emit(
    ...recipients.map(user_id => ({
      user_id,
      type: 'reschedule_requested' as const,
      title: 'Reschedule Requested',
      message: `A new time was requested for interview ${interview.id}: ${text}`,
      data: { interview_id: interview.id, request_id: request.id, proposed_times: [...request.proposed_times] },
    })),
  );
  return ok(request);
}

function resolved_notification(request: RescheduleRequest): NotificationEvent {
  return {
    user_id: request.requested_by,
    type: 'reschedule_resolved',
    title: `Reschedule ${request.status === 'approved' ? 'Approved' : 'Rejected'}`,
    message: `Your reschedule request for interview ${request.interview_id} was ${request.status}.`,
    data: { request_id: request.id, interview_id: request.interview_id, status: request.status },
  };
}

function draft_from(interview: Interview, scheduled_time: number, actor: Actor): BookingDraft {
  return {
    candidate_id: interview.candidate_id,
    interviewer_id: interview.interviewer_id,
    created_by: actor.user_id,
    title: interview.title,
    position: interview.position,
    interview_type: interview.interview_type,
    scheduled_time,
    duration_minutes: interview.duration_minutes,
    round_number: interview.round_number,
    recording_enabled: interview.recording_enabled,
    code_editor_enabled: interview.code_editor_enabled,
    whiteboard_enabled: interview.whiteboard_enabled,
    programming_languages: interview.programming_languages,
    evaluation_criteria: interview.evaluation_criteria,
  };
}

/**
 * Approves or rejects a pending request. Approval re-runs the full conflict
 * check for the chosen time; on conflict nothing changes and the request
 * stays pending. The old interview is kept as a `rescheduled` record and a
 * new interview (same round) is booked at the chosen time. Any other pending
 * request for the old interview is rejected along with it.
 */
export function resolve_reschedule(
  actor: Actor,
  request_id: number,
  decision: RescheduleDecision,
  chosen_time?: number,
  options: Pick<ScheduleOptions, 'generate_room_id'> = {},
): Result<RescheduleOutcome> {
  if (decision !== 'approved' && decision !== 'rejected') {
    return fail(new ValidationError('decision', 'decision must be approved or rejected'));
  }
  const now = Date.now();

  const result = transact((): Result<RescheduleOutcome> => {
    const request = find_request(request_id);
    if (!request) return fail(new NotFoundError('reschedule_request', request_id));
    if (request.status !== 'pending') return fail(new AlreadyResolvedError(request.id, request.status));

    const interview = find_interview(request.interview_id);
    if (!interview) return fail(new NotFoundError('interview', request.interview_id));
    const denied = authorize_interviewer(actor, interview, 'resolve reschedule requests for');
    if (denied) return fail(denied);

    if (decision === 'rejected') {
      run("UPDATE reschedule_requests SET status = 'rejected', resolved_at = ? WHERE id = ?", [now, request.id]);
      const rejected: RescheduleRequest = { ...request, status: 'rejected', resolved_at: now };
      return ok({ request: rejected, previous_interview: null, interview: null, superseded: [] });
    }

    if (chosen_time === undefined || !request.proposed_times.includes(chosen_time)) {
      return fail(new ValidationError('chosen_time', 'chosen_time must be one of the proposed times'));
    }
    const start = read_future_instant('chosen_time', chosen_time, now);
    if (start instanceof ValidationError) return fail(start);
    if (!can_transition(interview.status, 'reschedule')) return fail(transition_error(interview, 'reschedule'));

    const booked = commit_booking(draft_from(interview, start, actor), {
      generate_room_id: options.generate_room_id,
      exclude_interview_id: interview.id,
      rescheduled_from_id: interview.id,
    });
    if (!booked.ok) return booked;

    const previous = mark_rescheduled(interview, now);
    if (!previous.ok) return previous;

    run(
      "UPDATE reschedule_requests SET status = 'approved', resolved_at = ?, chosen_time = ?, new_interview_id = ? WHERE id = ?",
      [now, start, booked.value.id, request.id],
    );
    const superseded = list_reschedule_requests(interview.id).flatMap((other): RescheduleRequest[] =>
      other.status === 'pending' ? [{ ...other, status: 'rejected', resolved_at: now }] : [],
    );
    run(
      "UPDATE reschedule_requests SET status = 'rejected', resolved_at = ? WHERE interview_id = ? AND status = 'pending'",
      [now, interview.id],
    );
    const approved: RescheduleRequest = {
      ...request,
      status: 'approved',
      resolved_at: now,
      chosen_time: start,
      new_interview_id: booked.value.id,
    };
    return ok({
      request: approved,
      previous_interview: previous.value,
      interview: booked.value,
      superseded,
    });
  });

  if (!result.ok) {
    console.log(`[reschedule] Could not resolve request ${request_id}: ${result.error.message}`);
    return result;
  }

  const outcome = result.value;
  console.log(`[reschedule] Request ${request_id} ${outcome.request.status}`);
  for (const other of outcome.superseded) {
    console.log(`[reschedule] Request ${other.id} rejected in favour of request ${request_id}`);
  }
  emit(...[outcome.request, ...outcome.superseded].map(resolved_notification));
  if (outcome.interview) emit(...scheduled_notifications(outcome.interview, 'interview_rescheduled'));
  return result;
}
