import { run, transact } from './db.js';
import { authorize_interviewer, is_candidate_of, is_interviewer_of, is_privileged } from './auth.js';
import {
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  fail,
  ok,
  type Result,
} from './errors.js';
import { find_interview, get_interview_by_room } from './interviews.js';
import { emit } from './notifier.js';
import { read_instant, read_required_text } from './validation.js';
import type { Actor, Interview, InterviewStatus, Party } from './types.js';

// Where each transition may start from. `rescheduled` is only reachable
// through the reschedule protocol.
const TRANSITIONS = {
  join: ['scheduled', 'in_progress'],
  complete: ['in_progress'],
  complete_offline: ['scheduled', 'in_progress'],
  cancel: ['scheduled', 'in_progress'],
  no_show: ['scheduled'],
  reschedule: ['scheduled', 'in_progress'],
} as const satisfies Record<string, readonly InterviewStatus[]>;

export type LifecycleAction = keyof typeof TRANSITIONS;

const TARGET_STATE: Record<LifecycleAction, InterviewStatus> = {
  join: 'in_progress',
  complete: 'completed',
  complete_offline: 'completed',
  cancel: 'cancelled',
  no_show: 'no_show',
  reschedule: 'rescheduled',
};

export function can_transition(status: InterviewStatus, action: LifecycleAction): boolean {
  const allowed: readonly InterviewStatus[] = TRANSITIONS[action];
  return allowed.includes(status);
}

export function transition_error(interview: Interview, action: LifecycleAction): InvalidTransitionError {
  return new InvalidTransitionError(interview.status, TARGET_STATE[action]);
}

export interface EventTimeOptions {
  // When the event source saw it happen; defaults to now
  at?: number;
}

function event_time(options: EventTimeOptions): number | ValidationError {
  return options.at === undefined ? Date.now() : read_instant('at', options.at);
}

/** Event time for outcomes that can only be recorded after the fact. */
function settled_event_time(options: EventTimeOptions): number | ValidationError {
  const at = event_time(options);
  if (at instanceof ValidationError) return at;
  if (at > Date.now()) return new ValidationError('at', 'at must not be in the future');
  return at;
}

/** Runs a single-interview mutation atomically, loading the row inside the transaction. */
function mutate(id: number, fn: (interview: Interview) => Result<Interview>): Result<Interview> {
  return transact((): Result<Interview> => {
    const interview = find_interview(id);
    if (!interview) return fail(new NotFoundError('interview', id));
    return fn(interview);
  });
}

function reload(id: number): Result<Interview> {
  const interview = find_interview(id);
  return interview ? ok(interview) : fail(new NotFoundError('interview', id));
}

/**
 * Records the first time a party enters the room. Repeated joins are no-ops.
 * The first join overall starts the interview; joins may arrive out of order,
 * so the start is always the earliest join seen.
 */
export function record_join(
  actor: Actor,
  interview_id: number,
  party: Party,
  options: EventTimeOptions = {},
): Result<Interview> {
  const at = event_time(options);
  if (at instanceof ValidationError) return fail(at);

  return mutate(interview_id, interview => {
    const allowed =
      is_privileged(actor) ||
      (party === 'interviewer' ? is_interviewer_of(actor, interview) : is_candidate_of(actor, interview));
    if (!allowed) {
      return fail(new ForbiddenError(`${actor.role} ${actor.user_id} may not join interview ${interview.id} as ${party}`));
    }

    const joined_at = party === 'interviewer' ? interview.interviewer_joined_at : interview.candidate_joined_at;
    if (joined_at !== null) return ok(interview);

    if (!can_transition(interview.status, 'join')) return fail(transition_error(interview, 'join'));

    const column = party === 'interviewer' ? 'interviewer_joined_at' : 'candidate_joined_at';
    const starting = interview.status === 'scheduled';
    run(
      `UPDATE interviews SET ${column} = ?, status = ?, actual_start_time = MIN(COALESCE(actual_start_time, ?), ?), updated_at = ?
       WHERE id = ?`,
      [at, 'in_progress', at, at, Date.now(), interview.id],
    );
    if (starting) console.log(`[lifecycle] Interview ${interview.id} started (${party} joined first)`);
    return reload(interview.id);
  });
}

/** `record_join` for a party arriving through the room link. */
export function record_join_by_room(
  actor: Actor,
  room_id: string,
  party: Party,
  options: EventTimeOptions = {},
): Result<Interview> {
  const interview = get_interview_by_room(room_id);
  return interview.ok ? record_join(actor, interview.value.id, party, options) : interview;
}

export interface CompleteOptions extends EventTimeOptions {
  // Asynchronous/offline interviews can be completed without anyone joining
  allow_offline?: boolean;
}

export function complete_interview(actor: Actor, interview_id: number, options: CompleteOptions = {}): Result<Interview> {
  const at = settled_event_time(options);
  if (at instanceof ValidationError) return fail(at);

  return mutate(interview_id, interview => {
    const denied = authorize_interviewer(actor, interview, 'complete');
    if (denied) return fail(denied);

    const action: LifecycleAction = options.allow_offline ? 'complete_offline' : 'complete';
    if (!can_transition(interview.status, action)) return fail(transition_error(interview, action));

    const latest = Math.max(
      interview.actual_start_time ?? -Infinity,
      interview.interviewer_joined_at ?? -Infinity,
      interview.candidate_joined_at ?? -Infinity,
    );
    if (at < latest) {
      return fail(new ValidationError('at', 'End time is earlier than the start or a join of the interview'));
    }

    run(
      "UPDATE interviews SET status = 'completed', actual_end_time = ?, updated_at = ? WHERE id = ?",
      [at, Date.now(), interview.id],
    );
    console.log(`[lifecycle] Interview ${interview.id} completed`);
    return reload(interview.id);
  });
}

export function cancel_interview(actor: Actor, interview_id: number, reason: string): Result<Interview> {
  const text = read_required_text('reason', reason, 500);
  if (text instanceof ValidationError) return fail(text);

  const result = mutate(interview_id, interview => {
    const denied = authorize_interviewer(actor, interview, 'cancel');
    if (denied) return fail(denied);
    if (!can_transition(interview.status, 'cancel')) return fail(transition_error(interview, 'cancel'));

    run(
      "UPDATE interviews SET status = 'cancelled', cancellation_reason = ?, updated_at = ? WHERE id = ?",
      [text, Date.now(), interview.id],
    );
    console.log(`[lifecycle] Interview ${interview.id} cancelled: ${text}`);
    return reload(interview.id);
  });

  if (result.ok) {
    const interview = result.value;
    const data = { interview_id: interview.id, reason: text };
    emit(
      {
        user_id: interview.candidate_id,
        type: 'interview_cancelled',
        title: 'Interview Cancelled',
        message: 'Your interview has been cancelled. We will reach out to reschedule.',
        data,
      },
      {
        user_id: interview.interviewer_id,
        type: 'interview_cancelled',
        title: 'Interview Cancelled',
        message: `The interview with candidate ${interview.candidate_id} has been cancelled.`,
        data,
      },
    );
  }
  return result;
}

/**
 * Legal only once the scheduled time has passed on the clock and neither
 * party ever joined. Driven by the no-show job or an operator.
 */
export function mark_no_show(actor: Actor, interview_id: number, options: EventTimeOptions = {}): Result<Interview> {
  const at = event_time(options);
  if (at instanceof ValidationError) return fail(at);

  const result = mutate(interview_id, interview => {
    const denied = authorize_interviewer(actor, interview, 'mark no-show on');
    if (denied) return fail(denied);
    const now = Date.now();
    if (
      !can_transition(interview.status, 'no_show') ||
      interview.interviewer_joined_at !== null ||
      interview.candidate_joined_at !== null ||
      now <= interview.scheduled_time ||
      at <= interview.scheduled_time
    ) {
      return fail(transition_error(interview, 'no_show'));
    }
    if (at > now) return fail(new ValidationError('at', 'at must not be in the future'));

    run("UPDATE interviews SET status = 'no_show', updated_at = ? WHERE id = ?", [Date.now(), interview.id]);
    console.log(`[lifecycle] Interview ${interview.id} marked as no-show`);
    return reload(interview.id);
  });

  if (result.ok) {
    const interview = result.value;
    emit({
      user_id: interview.interviewer_id,
      type: 'interview_no_show',
      title: 'Interview No-Show',
      message: `Nobody joined the interview with candidate ${interview.candidate_id}.`,
      data: { interview_id: interview.id },
    });
  }
  return result;
}

/**
 * Moves an interview to `rescheduled`. Only the reschedule protocol calls
 * this, inside its own transaction.
 */
export function mark_rescheduled(interview: Interview, now: number): Result<Interview> {
  if (!can_transition(interview.status, 'reschedule')) return fail(transition_error(interview, 'reschedule'));
  run("UPDATE interviews SET status = 'rescheduled', updated_at = ? WHERE id = ?", [now, interview.id]);
  return reload(interview.id);
}
