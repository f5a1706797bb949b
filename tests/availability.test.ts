import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/config.js', async () => {
  const { test_config, require_env } = await import('./test-config.js');
  return { config: test_config, require_env };
});

import {
  check_availability,
  find_available_slots,
  get_availability,
  is_available,
  set_availability,
} from '../src/availability.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../src/errors.js';
import { cancel_interview } from '../src/lifecycle.js';
import { ADMIN, ALICE, BOB, CAROL, book, oct, setup, standard_week, teardown, unwrap } from './helpers.js';
import { test_config } from './test-config.js';

describe('set_availability', () => {
  beforeEach(async () => {
    await setup();
  });
  afterEach(teardown);

  it('should store weekdays in week order and blackout dates sorted', () => {
    standard_week({
      weekdays: ['friday', 'monday', 'Wednesday'],
      blackout_dates: ['2026-10-23', '2026-10-20'],
    });

    const availability = unwrap(get_availability('alice'));
    expect([...availability.weekdays]).toEqual(['monday', 'wednesday', 'friday']);
    expect([...availability.blackout_dates]).toEqual(['2026-10-20', '2026-10-23']);
    expect(availability.start_time).toBe('09:00');
    expect(availability.end_time).toBe('17:00');
    expect(availability.utc_offset_minutes).toBe(0);
  });

  it('should replace the previous record', () => {
    standard_week();
    standard_week({ buffer_minutes: 30, max_per_day: 2 });

    const availability = unwrap(get_availability('alice'));
    expect(availability.buffer_minutes).toBe(30);
    expect(availability.max_per_day).toBe(2);
  });

  it('should reject a window that ends before it starts', () => {
    const result = set_availability(ALICE, {
      interviewer_id: 'alice',
      weekdays: ['monday'],
      start_time: '17:00',
      end_time: '09:00',
      buffer_minutes: 15,
      max_per_day: 5,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error).toMatchObject({ field: 'end_time' });
    }
  });

  it('should reject unknown weekdays and impossible dates', () => {
    const base = {
      interviewer_id: 'alice',
      start_time: '09:00',
      end_time: '17:00',
      buffer_minutes: 15,
      max_per_day: 5,
    };
    const bad_day = set_availability(ALICE, { ...base, weekdays: ['funday'] });
    expect(!bad_day.ok && bad_day.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'weekdays' });

    const bad_date = set_availability(ALICE, { ...base, weekdays: ['monday'], blackout_dates: ['2026-02-30'] });
    expect(!bad_date.ok && bad_date.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'blackout_dates' });

    const bad_time = set_availability(ALICE, { ...base, weekdays: ['monday'], start_time: '9am' });
    expect(!bad_time.ok && bad_time.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'start_time' });
  });

  it('should only let interviewers edit their own calendar', () => {
    const input = {
      interviewer_id: 'alice',
      weekdays: ['monday'],
      start_time: '09:00',
      end_time: '17:00',
      buffer_minutes: 15,
      max_per_day: 5,
    };
    const by_bob = set_availability(BOB, input);
    expect(!by_bob.ok && by_bob.error).toBeInstanceOf(ForbiddenError);

    const by_candidate = set_availability(CAROL, input);
    expect(!by_candidate.ok && by_candidate.error).toBeInstanceOf(ForbiddenError);

    expect(set_availability(ADMIN, input).ok).toBe(true);
  });
});

describe('check_availability', () => {
  beforeEach(async () => {
    await setup();
  });
  afterEach(teardown);

  it('should accept a slot inside the weekly window', () => {
    standard_week();
    expect(unwrap(check_availability('alice', oct(19, 10), 60))).toEqual({ available: true });
    // Ending exactly at the close of the window is fine
    expect(unwrap(check_availability('alice', oct(19, 16), 60))).toEqual({ available: true });
  });

  it('should reject slots outside the weekly window', () => {
    standard_week();
    const early = unwrap(check_availability('alice', oct(19, 8, 30), 60));
    expect(early).toEqual({ available: false, reason: 'outside_window', conflicting_interview_id: null });

    const late = unwrap(check_availability('alice', oct(19, 16, 30), 60));
    expect(late).toMatchObject({ available: false, reason: 'outside_window' });

    // 2026-10-25 is a Sunday
    const weekend = unwrap(check_availability('alice', oct(25, 10), 60));
    expect(weekend).toMatchObject({ available: false, reason: 'outside_window' });
  });

  it('should evaluate the window in the interviewer\'s offset', () => {
    // UTC+8: 09:00 local on Monday is 01:00 UTC
    standard_week({ utc_offset_minutes: 480 });
    expect(unwrap(check_availability('alice', oct(19, 1), 60))).toEqual({ available: true });
    expect(unwrap(check_availability('alice', oct(19, 10), 60))).toMatchObject({ reason: 'outside_window' });
  });

  it('should reject blackout dates', () => {
    standard_week({ blackout_dates: ['2026-10-20'] });
    const result = unwrap(check_availability('alice', oct(20, 10), 60));
    expect(result).toEqual({ available: false, reason: 'blackout', conflicting_interview_id: null });
  });

  it('should enforce the daily cap', () => {
    standard_week({ max_per_day: 2 });
    book(oct(19, 9));
    book(oct(19, 11));
    const result = unwrap(check_availability('alice', oct(19, 14), 60));
    expect(result).toEqual({ available: false, reason: 'daily_cap', conflicting_interview_id: null });
    // Another day is unaffected
    expect(unwrap(check_availability('alice', oct(20, 14), 60))).toEqual({ available: true });
  });

  it('should reject slots within the buffer of a booked interview', () => {
    standard_week();
    const existing = book(oct(19, 10));

    const result = unwrap(check_availability('alice', oct(19, 10, 50), 60));
    expect(result).toEqual({ available: false, reason: 'overlap', conflicting_interview_id: existing.id });

    // Ends 15 minutes before the booked start
    expect(unwrap(check_availability('alice', oct(19, 9), 45))).toEqual({ available: true });
    // Ends 10 minutes before it
    expect(unwrap(check_availability('alice', oct(19, 9), 50))).toMatchObject({ reason: 'overlap' });
  });

  it('should see long interviews booked before the duration limit was lowered', () => {
    standard_week();
    // 09:00 to 14:00
    const long = book(oct(19, 9), { duration_minutes: 300 });
    const limit = test_config.scheduling.max_duration_minutes;
    test_config.scheduling.max_duration_minutes = 60;
    try {
      const result = unwrap(check_availability('alice', oct(19, 13), 60));
      expect(result).toEqual({ available: false, reason: 'overlap', conflicting_interview_id: long.id });
    } finally {
      test_config.scheduling.max_duration_minutes = limit;
    }
  });

  it('should ignore cancelled interviews', () => {
    standard_week();
    const existing = book(oct(19, 10));
    unwrap(cancel_interview(ALICE, existing.id, 'Candidate withdrew'));
    expect(unwrap(check_availability('alice', oct(19, 10, 30), 60))).toEqual({ available: true });
  });

  it('should return NotFound without an availability record', () => {
    const result = check_availability('nobody', oct(19, 10), 60);
    expect(!result.ok && result.error).toBeInstanceOf(NotFoundError);
  });

  it('should reduce the verdict to a boolean', () => {
    standard_week();
    expect(unwrap(is_available('alice', oct(19, 10), 60))).toBe(true);
    expect(unwrap(is_available('alice', oct(19, 18), 60))).toBe(false);
  });
});

describe('find_available_slots', () => {
  beforeEach(async () => {
    await setup();
  });
  afterEach(teardown);

  it('should list the free starts of a day around a booking', () => {
    standard_week({ start_time: '09:00', end_time: '11:00' });
    book(oct(19, 9), { duration_minutes: 30 });

    const slots = unwrap(find_available_slots('alice', oct(19, 0), oct(20, 0), 30));
    expect(slots).toEqual([oct(19, 10), oct(19, 10, 30)]);
  });

  it('should reject an empty or oversized range', () => {
    standard_week();
    const empty = find_available_slots('alice', oct(19, 10), oct(19, 10), 30);
    expect(!empty.ok && empty.error).toMatchObject({ field: 'to' });

    const huge = find_available_slots('alice', oct(1, 0), Date.UTC(2027, 0, 1), 30);
    expect(!huge.ok && huge.error).toMatchObject({ field: 'to' });
  });
});
