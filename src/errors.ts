import type { InterviewStatus, RecordingStatus, RescheduleStatus } from './types.js';

export abstract class CoreError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type EntityKind =
  | 'availability'
  | 'interview'
  | 'evaluation'
  | 'reschedule_request'
  | 'recording';

export class NotFoundError extends CoreError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: EntityKind,
    readonly entity_id: string | number,
  ) {
    super(`${entity} ${entity_id} not found`);
  }
}

export class ValidationError extends CoreError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
  }
}

export type ConflictReason =
  | 'overlap'
  | 'outside_window'
  | 'blackout'
  | 'daily_cap'
  | 'no_slot'
  | 'duplicate_room'
  | 'active_recording';

export class ConflictError extends CoreError {
  readonly code = 'CONFLICT';

  constructor(
    readonly reason: ConflictReason,
    message: string,
    readonly conflicting_id: number | null = null,
  ) {
    super(message);
  }
}

export class InvalidTransitionError extends CoreError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly current: InterviewStatus | RecordingStatus,
    readonly attempted: string,
  ) {
    super(`Cannot move from ${current} to ${attempted}`);
  }
}

export class AlreadyResolvedError extends CoreError {
  readonly code = 'ALREADY_RESOLVED';

  constructor(
    readonly request_id: number,
    readonly status: Exclude<RescheduleStatus, 'pending'>,
  ) {
    super(`Reschedule request ${request_id} is already ${status}`);
  }
}

export class ForbiddenError extends CoreError {
  readonly code = 'FORBIDDEN';
}

export type Result<T, E extends CoreError = CoreError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends CoreError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
