import {
  insert,
  query_all,
  query_one,
  run,
  transact,
  read_enum,
  read_number,
  read_optional_number,
  read_optional_string,
  type Row,
} from './db.js';
import { authorize_interviewer } from './auth.js';
import { ConflictError, InvalidTransitionError, NotFoundError, ValidationError, fail, ok, type Result } from './errors.js';
import { find_interview } from './interviews.js';
import { emit } from './notifier.js';
import { read_integer, read_required_text } from './validation.js';
import { RECORDING_STATUSES, type Actor, type Interview, type Recording, type RecordingStatus } from './types.js';

const ACTIVE_STATUSES: readonly RecordingStatus[] = ['recording', 'processing'];

function parse_recording(row: Row): Recording {
  return {
    id: read_number(row, 'id'),
    interview_id: read_number(row, 'interview_id'),
    status: read_enum(row, 'status', RECORDING_STATUSES),
    duration_seconds: read_optional_number(row, 'duration_seconds'),
    file_size_bytes: read_optional_number(row, 'file_size_bytes'),
    video_url: read_optional_string(row, 'video_url'),
    failure_reason: read_optional_string(row, 'failure_reason'),
    started_at: read_number(row, 'started_at'),
    ended_at: read_optional_number(row, 'ended_at'),
    created_at: read_number(row, 'created_at'),
  };
}

function find_recording(id: number): Recording | null {
  const row = query_one('SELECT * FROM interview_recordings WHERE id = ?', [id]);
  return row ? parse_recording(row) : null;
}

function find_active_recording(interview_id: number): Recording | null {
  const row = query_one(
    "SELECT * FROM interview_recordings WHERE interview_id = ? AND status IN ('recording', 'processing')",
    [interview_id],
  );
  return row ? parse_recording(row) : null;
}

export function get_recording(id: number): Result<Recording> {
  const recording = find_recording(id);
  return recording ? ok(recording) : fail(new NotFoundError('recording', id));
}

/** Every attempt for the interview, oldest first. Failed attempts stay in history. */
export function list_recordings(interview_id: number): Recording[] {
  return query_all('SELECT * FROM interview_recordings WHERE interview_id = ? ORDER BY started_at ASC, id ASC', [
    interview_id,
  ]).map(parse_recording);
}

function reload(id: number): Result<Recording> {
  const recording = find_recording(id);
  return recording ? ok(recording) : fail(new NotFoundError('recording', id));
}

/**
 * Loads a recording and its interview inside one transaction and applies a
 * state change if the recording is currently in one of `from`.
 */
function transition(
  actor: Actor,
  recording_id: number,
  from: readonly RecordingStatus[],
  to: RecordingStatus,
  apply: (recording: Recording, interview: Interview) => void,
): Result<{ recording: Recording; interview: Interview }> {
  return transact((): Result<{ recording: Recording; interview: Interview }> => {
    const recording = find_recording(recording_id);
    if (!recording) return fail(new NotFoundError('recording', recording_id));
    const interview = find_interview(recording.interview_id);
    if (!interview) return fail(new NotFoundError('interview', recording.interview_id));
    const denied = authorize_interviewer(actor, interview, 'manage recordings of');
    if (denied) return fail(denied);
    if (!from.includes(recording.status)) return fail(new InvalidTransitionError(recording.status, to));

    apply(recording, interview);
    const updated = reload(recording.id);
    return updated.ok ? ok({ recording: updated.value, interview }) : updated;
  });
}

export function start_recording(actor: Actor, interview_id: number): Result<Recording> {
  const result = transact((): Result<Recording> => {
    const interview = find_interview(interview_id);
    if (!interview) return fail(new NotFoundError('interview', interview_id));
    const denied = authorize_interviewer(actor, interview, 'record');
    if (denied) return fail(denied);
    if (!interview.recording_enabled) {
      return fail(new ValidationError('recording_enabled', `Recording is disabled for interview ${interview.id}`));
    }
    if (interview.status !== 'scheduled' && interview.status !== 'in_progress') {
      return fail(new InvalidTransitionError(interview.status, 'recording'));
    }
    const active = find_active_recording(interview.id);
    if (active) {
      return fail(
        new ConflictError('active_recording', `Recording ${active.id} is still ${active.status} for interview ${interview.id}`, active.id),
      );
    }

    const now = Date.now();
    const id = insert(
      "INSERT INTO interview_recordings (interview_id, status, started_at, created_at) VALUES (?, 'recording', ?, ?)",
      [interview.id, now, now],
    );
    return reload(id);
  });
  if (result.ok) console.log(`[recordings] Recording ${result.value.id} started for interview ${interview_id}`);
  return result;
}

export function stop_recording(actor: Actor, recording_id: number): Result<Recording> {
  const result = transition(actor, recording_id, ['recording'], 'processing', recording => {
    run("UPDATE interview_recordings SET status = 'processing', ended_at = ? WHERE id = ?", [Date.now(), recording.id]);
  });
  if (!result.ok) return result;
  console.log(`[recordings] Recording ${recording_id} stopped, processing`);
  return ok(result.value.recording);
}

export interface ProcessedRecording {
  video_url: string;
  duration_seconds: number;
  file_size_bytes: number;
}

export function finish_processing(actor: Actor, recording_id: number, processed: ProcessedRecording): Result<Recording> {
  const video_url = read_required_text('video_url', processed.video_url, 1000);
  if (video_url instanceof ValidationError) return fail(video_url);
  const duration_seconds = read_integer('duration_seconds', processed.duration_seconds, 0, Number.MAX_SAFE_INTEGER);
  if (duration_seconds instanceof ValidationError) return fail(duration_seconds);
  const file_size_bytes = read_integer('file_size_bytes', processed.file_size_bytes, 0, Number.MAX_SAFE_INTEGER);
  if (file_size_bytes instanceof ValidationError) return fail(file_size_bytes);

  const result = transition(actor, recording_id, ['processing'], 'completed', (recording, interview) => {
    run(
      "UPDATE interview_recordings SET status = 'completed', video_url = ?, duration_seconds = ?, file_size_bytes = ? WHERE id = ?",
      [video_url, duration_seconds, file_size_bytes, recording.id],
    );
    run('UPDATE interviews SET recording_url = ?, updated_at = ? WHERE id = ?', [video_url, Date.now(), interview.id]);
  });
  if (!result.ok) return result;

  const { recording, interview } = result.value;
  console.log(`[recordings] Recording ${recording.id} ready for interview ${interview.id}`);
  emit({
    user_id: interview.interviewer_id,
    type: 'recording_ready',
    title: 'Recording Ready',
    message: `The recording of interview ${interview.id} is ready.`,
    data: { interview_id: interview.id, recording_id: recording.id, video_url },
  });
  return ok(recording);
}

export function mark_recording_failed(actor: Actor, recording_id: number, reason: string): Result<Recording> {
  const text = read_required_text('reason', reason, 500);
  if (text instanceof ValidationError) return fail(text);

  const result = transition(actor, recording_id, ACTIVE_STATUSES, 'failed', recording => {
    run(
      "UPDATE interview_recordings SET status = 'failed', failure_reason = ?, ended_at = COALESCE(ended_at, ?) WHERE id = ?",
      [text, Date.now(), recording.id],
    );
  });
  if (!result.ok) return result;
  console.error(`[recordings] Recording ${recording_id} failed: ${text}`);
  return ok(result.value.recording);
}
