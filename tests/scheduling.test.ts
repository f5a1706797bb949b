import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/config.js', async () => {
  const { test_config, require_env } = await import('./test-config.js');
  return { config: test_config, require_env };
});

import { set_availability } from '../src/availability.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../src/errors.js';
import { list_by_interviewer } from '../src/interviews.js';
import type { OutboxNotifier } from '../src/notifier.js';
import { generate_room_id, schedule_bulk, schedule_interview, type BulkScheduleInput } from '../src/scheduling.js';
import { ADMIN, ALICE, BOB, CAROL, NOW, booking, minutes, oct, setup, standard_week, teardown, unwrap } from './helpers.js';

describe('schedule_interview', () => {
  let outbox: OutboxNotifier;

  beforeEach(async () => {
    outbox = await setup();
    standard_week();
  });
  afterEach(teardown);

  it('should book around the buffer of an existing interview', () => {
    const first = schedule_interview(ALICE, booking(oct(19, 10)));
    expect(first.ok).toBe(true);

    const too_close = schedule_interview(ALICE, booking(oct(19, 10, 50)));
    expect(too_close.ok).toBe(false);
    if (!too_close.ok && first.ok) {
      expect(too_close.error).toBeInstanceOf(ConflictError);
      expect(too_close.error).toMatchObject({ reason: 'overlap', conflicting_id: first.value.id });
    }

    const after_buffer = schedule_interview(ALICE, booking(oct(19, 11, 15)));
    expect(after_buffer.ok).toBe(true);
  });

  it('should fill in the room and defaults', () => {
    const interview = unwrap(schedule_interview(ALICE, booking(oct(19, 10), { position: 'Backend Engineer' })));
    expect(interview.status).toBe('scheduled');
    expect(interview.room_id).toMatch(/^room_[0-9a-f]{12}$/);
    expect(interview.meeting_url).toBe(`/interview/${interview.room_id}`);
    expect(interview.round_number).toBe(1);
    expect(interview.recording_enabled).toBe(true);
    expect(interview.code_editor_enabled).toBe(false);
    expect(interview.created_by).toBe('alice');
    expect(interview.position).toBe('Backend Engineer');
    expect(interview.created_at).toBe(NOW);
  });

  it('should keep the room configuration', () => {
    const interview = unwrap(
      schedule_interview(
        ALICE,
        booking(oct(19, 10), {
          room: { recording_enabled: false, code_editor_enabled: true, programming_languages: [' typescript ', 'go'] },
          evaluation_criteria: { focus: ['api design'] },
        }),
      ),
    );
    expect(interview.recording_enabled).toBe(false);
    expect(interview.code_editor_enabled).toBe(true);
    expect(interview.programming_languages).toEqual(['typescript', 'go']);
    expect(interview.evaluation_criteria).toEqual({ focus: ['api design'] });
  });

  it('should let exactly one of two simultaneous identical bookings through', async () => {
    const attempt = () => Promise.resolve().then(() => schedule_interview(ALICE, booking(oct(19, 10))));
    const results = await Promise.all([attempt(), attempt()]);

    expect(results.filter(result => result.ok)).toHaveLength(1);
    const failures = results.filter(result => !result.ok);
    expect(failures).toHaveLength(1);
    expect(!failures[0].ok && failures[0].error).toBeInstanceOf(ConflictError);
  });

  it('should not store a rejected booking', () => {
    unwrap(schedule_interview(ALICE, booking(oct(19, 10))));
    schedule_interview(ALICE, booking(oct(19, 10, 30)));
    expect(unwrap(list_by_interviewer(ALICE, 'alice'))).toHaveLength(1);
  });

  it('should reject past start times beyond the grace period', () => {
    unwrap(
      set_availability(ALICE, {
        interviewer_id: 'alice',
        weekdays: ['sunday', 'monday'],
        start_time: '00:00',
        end_time: '23:59',
        buffer_minutes: 0,
        max_per_day: 5,
      }),
    );
    const stale = schedule_interview(ALICE, booking(NOW - minutes(10)));
    expect(!stale.ok && stale.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'scheduled_time' });

    expect(schedule_interview(ALICE, booking(NOW - minutes(3))).ok).toBe(true);
  });

  it('should validate type and duration', () => {
    const bad_type = schedule_interview(ALICE, booking(oct(19, 10), { interview_type: 'lunch' }));
    expect(!bad_type.ok && bad_type.error).toMatchObject({ field: 'interview_type' });

    const zero = schedule_interview(ALICE, booking(oct(19, 10), { duration_minutes: 0 }));
    expect(!zero.ok && zero.error).toBeInstanceOf(ValidationError);

    const too_long = schedule_interview(ALICE, booking(oct(19, 10), { duration_minutes: 481 }));
    expect(!too_long.ok && too_long.error).toMatchObject({ field: 'duration_minutes' });
  });

  it('should only let interviewers book themselves', () => {
    const by_bob = schedule_interview(BOB, booking(oct(19, 10)));
    expect(!by_bob.ok && by_bob.error).toBeInstanceOf(ForbiddenError);

    const by_candidate = schedule_interview(CAROL, booking(oct(19, 10)));
    expect(!by_candidate.ok && by_candidate.error).toBeInstanceOf(ForbiddenError);

    const by_admin = unwrap(schedule_interview(ADMIN, booking(oct(19, 10))));
    expect(by_admin.created_by).toBe('admin-1');
  });

  it('should require an availability record', () => {
    const result = schedule_interview(BOB, booking(oct(19, 10), { interviewer_id: 'bob' }));
    expect(!result.ok && result.error).toBeInstanceOf(NotFoundError);
    expect(!result.ok && result.error).toMatchObject({ entity: 'availability', entity_id: 'bob' });
  });

  it('should give up when no unique room id can be drawn', () => {
    const fixed = { generate_room_id: () => 'room_fixed' };
    unwrap(schedule_interview(ALICE, booking(oct(19, 10)), fixed));
    const second = schedule_interview(ALICE, booking(oct(19, 14)), fixed);
    expect(!second.ok && second.error).toMatchObject({ code: 'CONFLICT', reason: 'duplicate_room' });
  });

  it('should notify both parties', () => {
    const interview = unwrap(schedule_interview(ALICE, booking(oct(19, 10))));
    expect(outbox.sent.map(event => [event.user_id, event.type])).toEqual([
      ['carol', 'interview_scheduled'],
      ['alice', 'interview_scheduled'],
    ]);
    expect(outbox.sent[0].data).toEqual({
      interview_id: interview.id,
      when: '2026-10-19 10:00',
      room_id: interview.room_id,
      meeting_url: interview.meeting_url,
      scheduled_time: oct(19, 10),
      duration_minutes: 60,
    });
  });

  it('should not notify on conflict', () => {
    unwrap(schedule_interview(ALICE, booking(oct(19, 10))));
    outbox.clear();
    schedule_interview(ALICE, booking(oct(19, 10, 30)));
    expect(outbox.sent).toEqual([]);
  });
});

describe('schedule_bulk', () => {
  let outbox: OutboxNotifier;

  function batch(candidate_ids: string[], overrides: Partial<BulkScheduleInput> = {}): BulkScheduleInput {
    return {
      candidates: candidate_ids.map(candidate_id => ({ candidate_id, position: 'Backend Engineer' })),
      interviewer_ids: ['alice', 'bob'],
      auto_assign: true,
      interview_type: 'technical',
      duration_minutes: 60,
      from: oct(19, 9),
      to: oct(19, 17),
      ...overrides,
    };
  }

  beforeEach(async () => {
    outbox = await setup();
    standard_week();
  });
  afterEach(teardown);

  function bob_week(): void {
    unwrap(
      set_availability(BOB, {
        interviewer_id: 'bob',
        weekdays: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
        start_time: '09:00',
        end_time: '17:00',
        buffer_minutes: 15,
        max_per_day: 5,
      }),
    );
  }

  it('should assign interviewers round-robin and take the earliest free slot', () => {
    bob_week();
    const report = unwrap(schedule_bulk(ADMIN, batch(['carol', 'dave', 'erin'])));

    expect(report.total).toBe(3);
    expect(report.failed).toEqual([]);
    expect(report.scheduled.map(interview => [interview.candidate_id, interview.interviewer_id, interview.scheduled_time])).toEqual([
      ['carol', 'alice', oct(19, 9)],
      ['dave', 'bob', oct(19, 9)],
      ['erin', 'alice', oct(19, 10, 30)],
    ]);
    expect(report.scheduled[0]).toMatchObject({ title: 'Backend Engineer Interview', position: 'Backend Engineer' });
    expect(outbox.sent.filter(event => event.type === 'interview_scheduled')).toHaveLength(6);
  });

  it('should not overlap interviews booked in the same batch', () => {
    const report = unwrap(
      schedule_bulk(ALICE, batch(['c1', 'c2', 'c3', 'c4'], { interviewer_ids: ['alice'], to: oct(19, 13) })),
    );

    expect(report.scheduled.map(interview => interview.scheduled_time)).toEqual([oct(19, 9), oct(19, 10, 30), oct(19, 12)]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]).toMatchObject({ candidate_id: 'c4', interviewer_id: 'alice' });
    expect(report.failed[0].error).toBeInstanceOf(ConflictError);
    expect(report.failed[0].error).toMatchObject({ reason: 'no_slot' });
  });

  it('should send everyone to the first interviewer without auto-assign', () => {
    const report = unwrap(schedule_bulk(ADMIN, batch(['carol', 'dave'], { auto_assign: false })));
    expect(report.scheduled.map(interview => interview.interviewer_id)).toEqual(['alice', 'alice']);
  });

  it('should carry on past a failed candidate', () => {
    // bob has no availability record
    const report = unwrap(schedule_bulk(ADMIN, batch(['carol', 'dave', '  ', 'frank', 'erin'])));

    expect(report.scheduled.map(interview => [interview.candidate_id, interview.scheduled_time])).toEqual([
      ['carol', oct(19, 9)],
      ['erin', oct(19, 10, 30)],
    ]);
    expect(report.failed.map(failure => [failure.candidate_id, failure.interviewer_id, failure.error.code])).toEqual([
      ['dave', 'bob', 'NOT_FOUND'],
      ['  ', 'alice', 'VALIDATION_ERROR'],
      ['frank', 'bob', 'NOT_FOUND'],
    ]);
    expect(unwrap(list_by_interviewer(ALICE, 'alice'))).toHaveLength(2);
  });

  it('should validate the batch before booking anything', () => {
    const no_interviewers = schedule_bulk(ADMIN, batch(['carol'], { interviewer_ids: [] }));
    expect(!no_interviewers.ok && no_interviewers.error).toMatchObject({ field: 'interviewer_ids' });

    const backwards = schedule_bulk(ADMIN, batch(['carol'], { from: oct(19, 17), to: oct(19, 9) }));
    expect(!backwards.ok && backwards.error).toMatchObject({ field: 'to' });

    const duration = schedule_bulk(ADMIN, batch(['carol'], { duration_minutes: 0 }));
    expect(!duration.ok && duration.error).toBeInstanceOf(ValidationError);

    expect(unwrap(list_by_interviewer(ADMIN, 'alice'))).toEqual([]);
  });

  it('should only let interviewers book themselves', () => {
    const result = schedule_bulk(ALICE, batch(['carol']));
    expect(!result.ok && result.error).toBeInstanceOf(ForbiddenError);
  });
});

describe('generate_room_id', () => {
  it('should draw distinct ids', () => {
    const ids = new Set(Array.from({ length: 20 }, () => generate_room_id()));
    expect(ids.size).toBe(20);
  });
});
