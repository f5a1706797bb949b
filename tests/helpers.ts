import { vi } from 'vitest';
import { init_db } from '../src/db.js';
import { set_availability, type AvailabilityInput } from '../src/availability.js';
import { MINUTE_MS } from '../src/calendar.js';
import type { Result } from '../src/errors.js';
import { record_join } from '../src/lifecycle.js';
import { OutboxNotifier, set_notifier } from '../src/notifier.js';
import { schedule_interview, type ScheduleInterviewInput } from '../src/scheduling.js';
import type { Actor, Interview } from '../src/types.js';

export const ADMIN: Actor = { user_id: 'admin-1', role: 'admin' };
export const ALICE: Actor = { user_id: 'alice', role: 'interviewer' };
export const BOB: Actor = { user_id: 'bob', role: 'interviewer' };
export const CAROL: Actor = { user_id: 'carol', role: 'candidate' };
export const DAVE: Actor = { user_id: 'dave', role: 'candidate' };

/** Instant on a day of October 2026, UTC. 2026-10-19 is a Monday. */
export function oct(day: number, hour: number, minute = 0): number {
  return Date.UTC(2026, 9, day, hour, minute);
}

// Sunday 2026-10-18 12:00 UTC
export const NOW = oct(18, 12);

export function minutes(count: number): number {
  return count * MINUTE_MS;
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

/** Fresh in-memory database, frozen clock and an empty outbox. */
export async function setup(): Promise<OutboxNotifier> {
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(NOW);
  await init_db();
  const outbox = new OutboxNotifier();
  set_notifier(outbox);
  return outbox;
}

export function teardown(): void {
  vi.useRealTimers();
}

export function standard_week(overrides: Partial<AvailabilityInput> = {}): void {
  unwrap(
    set_availability(ALICE, {
      interviewer_id: 'alice',
      weekdays: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
      start_time: '09:00',
      end_time: '17:00',
      buffer_minutes: 15,
      max_per_day: 5,
      ...overrides,
    }),
  );
}

export function booking(scheduled_time: number, overrides: Partial<ScheduleInterviewInput> = {}): ScheduleInterviewInput {
  return {
    candidate_id: 'carol',
    interviewer_id: 'alice',
    interview_type: 'technical',
    scheduled_time,
    duration_minutes: 60,
    ...overrides,
  };
}

export function book(scheduled_time: number, overrides: Partial<ScheduleInterviewInput> = {}): Interview {
  return unwrap(schedule_interview(ALICE, booking(scheduled_time, overrides)));
}

/** Books an interview and has the interviewer join it at its start time. */
export function book_live(scheduled_time: number, overrides: Partial<ScheduleInterviewInput> = {}): Interview {
  const interview = book(scheduled_time, overrides);
  return unwrap(record_join(ALICE, interview.id, 'interviewer', { at: scheduled_time }));
}
