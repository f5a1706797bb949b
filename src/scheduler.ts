import cron from 'node-cron';
import { config } from './config.js';
import { query_one, run } from './db.js';
import { SYSTEM_ACTOR } from './auth.js';
import { MINUTE_MS } from './calendar.js';
import { list_scheduled_between } from './interviews.js';
import { mark_no_show } from './lifecycle.js';
import { emit } from './notifier.js';
import { format_interview_time } from './scheduling.js';
import type { Interview } from './types.js';

// Reminders go out for interviews starting within this many minutes of the lead time
const REMINDER_WINDOW_MINUTES = 5;

function reminder_sent(interview_id: number): boolean {
  return query_one('SELECT 1 AS sent FROM sent_reminders WHERE interview_id = ?', [interview_id]) !== null;
}

function send_reminder(interview: Interview, now: number): void {
  const mins = Math.round((interview.scheduled_time - now) / MINUTE_MS);
  const when = format_interview_time(interview);
  const data = { interview_id: interview.id, when, meeting_url: interview.meeting_url, scheduled_time: interview.scheduled_time, mins };
  emit(
    {
      user_id: interview.candidate_id,
      type: 'interview_reminder',
      title: 'Interview Reminder',
      message: `Your interview starts in about ${mins} minutes (${when}).`,
      data,
    },
    {
      user_id: interview.interviewer_id,
      type: 'interview_reminder',
      title: 'Interview Reminder',
      message: `Your interview with candidate ${interview.candidate_id} starts in about ${mins} minutes (${when}).`,
      data,
    },
  );
}

/**
 * Sends one reminder per interview that is still `scheduled` and starts
 * around `jobs.reminder_lead_minutes` from now. Returns how many were sent.
 */
export function run_reminders(now: number = Date.now()): number {
  const lead = config.jobs.reminder_lead_minutes;
  const from = now + (lead - REMINDER_WINDOW_MINUTES) * MINUTE_MS;
  const to = now + (lead + REMINDER_WINDOW_MINUTES) * MINUTE_MS;

  let sent = 0;
  for (const interview of list_scheduled_between(from, to)) {
    if (reminder_sent(interview.id)) continue;
    run('INSERT INTO sent_reminders (interview_id, sent_at) VALUES (?, ?)', [interview.id, now]);
    console.log(`[scheduler] Sending reminder for interview ${interview.id}`);
    send_reminder(interview, now);
    sent += 1;
  }
  return sent;
}

/**
 * Marks as no-show every interview nobody joined within
 * `jobs.no_show_after_minutes` of its scheduled start.
 */
export function run_no_show_sweep(): number {
  const now = Date.now();
  const cutoff = now - config.jobs.no_show_after_minutes * MINUTE_MS;
  let marked = 0;
  for (const interview of list_scheduled_between(0, cutoff)) {
    if (interview.interviewer_joined_at !== null || interview.candidate_joined_at !== null) continue;
    const result = mark_no_show(SYSTEM_ACTOR, interview.id, { at: now });
    if (result.ok) {
      marked += 1;
    } else {
      console.error(`[scheduler] Could not mark interview ${interview.id} as no-show: ${result.error.message}`);
    }
  }
  return marked;
}

function guarded(name: string, job: () => number): () => void {
  return () => {
    try {
      const count = job();
      if (count > 0) console.log(`[scheduler] ${name}: ${count}`);
    } catch (err) {
      console.error(`[scheduler] ${name} failed:`, err);
    }
  };
}

export function start_scheduler(): void {
  // Every minute: reminders for upcoming interviews
  cron.schedule('* * * * *', guarded('reminders', () => run_reminders()));

  // Every 5 minutes: no-show sweep
  cron.schedule('*/5 * * * *', guarded('no-show sweep', () => run_no_show_sweep()));

  console.log('[scheduler] Started: reminders every minute, no-show sweep every 5 minutes');
}
