import { ForbiddenError } from './errors.js';
import type { Actor, Interview } from './types.js';

export const SYSTEM_ACTOR: Actor = { user_id: 'system', role: 'system' };

export function is_privileged(actor: Actor): boolean {
  return actor.role === 'admin' || actor.role === 'system';
}

export function is_interviewer_of(actor: Actor, interview: Interview): boolean {
  return actor.role === 'interviewer' && actor.user_id === interview.interviewer_id;
}

export function is_candidate_of(actor: Actor, interview: Interview): boolean {
  return actor.role === 'candidate' && actor.user_id === interview.candidate_id;
}

/** Admins, the system and the interview's own interviewer. */
export function authorize_interviewer(actor: Actor, interview: Interview, action: string): ForbiddenError | null {
  if (is_privileged(actor) || is_interviewer_of(actor, interview)) return null;
  return new ForbiddenError(`${actor.role} ${actor.user_id} may not ${action} interview ${interview.id}`);
}

/** Admins, the system and either participant of the interview. */
export function authorize_participant(actor: Actor, interview: Interview, action: string): ForbiddenError | null {
  if (is_privileged(actor) || is_interviewer_of(actor, interview) || is_candidate_of(actor, interview)) return null;
  return new ForbiddenError(`${actor.role} ${actor.user_id} may not ${action} interview ${interview.id}`);
}

/** Admins, the system and the interviewer acting on their own calendar. */
export function authorize_self_interviewer(actor: Actor, interviewer_id: string, action: string): ForbiddenError | null {
  if (is_privileged(actor)) return null;
  if (actor.role === 'interviewer' && actor.user_id === interviewer_id) return null;
  return new ForbiddenError(`${actor.role} ${actor.user_id} may not ${action} for interviewer ${interviewer_id}`);
}

/** Staff reads: admins, the system and any interviewer. */
export function authorize_staff(actor: Actor, action: string): ForbiddenError | null {
  if (is_privileged(actor) || actor.role === 'interviewer') return null;
  return new ForbiddenError(`${actor.role} ${actor.user_id} may not ${action}`);
}
