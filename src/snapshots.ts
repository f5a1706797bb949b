import {
  insert,
  query_all,
  query_one,
  transact,
  read_json_object,
  read_number,
  read_optional_string,
  read_string,
  is_json_object,
  type Row,
} from './db.js';
import { authorize_interviewer, authorize_participant } from './auth.js';
import { InvalidTransitionError, NotFoundError, ValidationError, fail, ok, type Result } from './errors.js';
import { find_interview } from './interviews.js';
import { read_optional_text, read_required_text } from './validation.js';
import type { Actor, CodeSnapshot, Interview, WhiteboardSnapshot } from './types.js';

const MAX_CODE_LENGTH = 200_000;

function parse_code_snapshot(row: Row): CodeSnapshot {
  return {
    id: read_number(row, 'id'),
    interview_id: read_number(row, 'interview_id'),
    language: read_string(row, 'language'),
    code: read_string(row, 'code'),
    author_id: read_string(row, 'author_id'),
    created_at: read_number(row, 'created_at'),
  };
}

function parse_whiteboard_snapshot(row: Row): WhiteboardSnapshot {
  const id = read_number(row, 'id');
  const data = read_json_object(row, 'data');
  if (!data) throw new Error(`Whiteboard snapshot ${id} has no data`);
  return {
    id,
    interview_id: read_number(row, 'interview_id'),
    data,
    image_url: read_optional_string(row, 'image_url'),
    created_at: read_number(row, 'created_at'),
  };
}

// Snapshots can only be captured while the room is live. Both parties write
// code; the whiteboard is saved by the interviewer.
function live_interview(actor: Actor, interview_id: number, feature: 'code_editor' | 'whiteboard'): Result<Interview> {
  const interview = find_interview(interview_id);
  if (!interview) return fail(new NotFoundError('interview', interview_id));
  const denied =
    feature === 'code_editor'
      ? authorize_participant(actor, interview, 'save code snapshots of')
      : authorize_interviewer(actor, interview, 'save whiteboard snapshots of');
  if (denied) return fail(denied);
  const enabled = feature === 'code_editor' ? interview.code_editor_enabled : interview.whiteboard_enabled;
  if (!enabled) {
    return fail(new ValidationError(`${feature}_enabled`, `The ${feature.replace('_', ' ')} is disabled for interview ${interview.id}`));
  }
  if (interview.status !== 'in_progress') return fail(new InvalidTransitionError(interview.status, 'snapshot'));
  return ok(interview);
}

export function save_code_snapshot(actor: Actor, interview_id: number, language: string, code: string): Result<CodeSnapshot> {
  const lang = read_required_text('language', language, 50);
  if (lang instanceof ValidationError) return fail(lang);
  if (typeof code !== 'string' || code.length > MAX_CODE_LENGTH) {
    return fail(new ValidationError('code', `code must be text of at most ${MAX_CODE_LENGTH} characters`));
  }

  return transact((): Result<CodeSnapshot> => {
    const interview = live_interview(actor, interview_id, 'code_editor');
    if (!interview.ok) return interview;
    const id = insert(
      'INSERT INTO code_snapshots (interview_id, language, code, author_id, created_at) VALUES (?, ?, ?, ?, ?)',
      [interview.value.id, lang, code, actor.user_id, Date.now()],
    );
    const row = query_one('SELECT * FROM code_snapshots WHERE id = ?', [id]);
    if (!row) throw new Error(`Code snapshot ${id} vanished right after insert`);
    return ok(parse_code_snapshot(row));
  });
}

export function save_whiteboard_snapshot(
  actor: Actor,
  interview_id: number,
  data: unknown,
  image_url?: string | null,
): Result<WhiteboardSnapshot> {
  if (!is_json_object(data)) return fail(new ValidationError('data', 'whiteboard data must be a JSON object'));
  const url = read_optional_text('image_url', image_url);
  if (url instanceof ValidationError) return fail(url);

  return transact((): Result<WhiteboardSnapshot> => {
    const interview = live_interview(actor, interview_id, 'whiteboard');
    if (!interview.ok) return interview;
    const id = insert(
      'INSERT INTO whiteboard_snapshots (interview_id, data, image_url, created_at) VALUES (?, ?, ?, ?)',
      [interview.value.id, JSON.stringify(data), url, Date.now()],
    );
    const row = query_one('SELECT * FROM whiteboard_snapshots WHERE id = ?', [id]);
    if (!row) throw new Error(`Whiteboard snapshot ${id} vanished right after insert`);
    return ok(parse_whiteboard_snapshot(row));
  });
}

export function list_code_snapshots(interview_id: number): CodeSnapshot[] {
  return query_all('SELECT * FROM code_snapshots WHERE interview_id = ? ORDER BY created_at ASC, id ASC', [interview_id]).map(
    parse_code_snapshot,
  );
}

export function list_whiteboard_snapshots(interview_id: number): WhiteboardSnapshot[] {
  return query_all('SELECT * FROM whiteboard_snapshots WHERE interview_id = ? ORDER BY created_at ASC, id ASC', [
    interview_id,
  ]).map(parse_whiteboard_snapshot);
}
