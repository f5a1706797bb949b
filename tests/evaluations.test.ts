import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/config.js', async () => {
  const { test_config, require_env } = await import('./test-config.js');
  return { config: test_config, require_env };
});

import { ForbiddenError, InvalidTransitionError, NotFoundError } from '../src/errors.js';
import {
  list_evaluations,
  overall_signal,
  submit_evaluation,
  summarize,
  type EvaluationInput,
} from '../src/evaluations.js';
import { complete_interview } from '../src/lifecycle.js';
import type { OutboxNotifier } from '../src/notifier.js';
import type { Interview, Recommendation } from '../src/types.js';
import { ADMIN, ALICE, BOB, CAROL, book, book_live, oct, setup, standard_week, teardown, unwrap } from './helpers.js';

function evaluation(
  interview_id: number,
  evaluator_id: string,
  scores: [number, number, number, number, number],
  recommendation: Recommendation,
  extra: Partial<EvaluationInput> = {},
): EvaluationInput {
  const [technical_skills, problem_solving, communication, cultural_fit, overall_rating] = scores;
  return {
    interview_id,
    evaluator_id,
    ratings: { technical_skills, problem_solving, communication, cultural_fit, overall_rating },
    recommendation,
    ...extra,
  };
}

function no_votes(): Record<Recommendation, number> {
  return { strong_hire: 0, hire: 0, maybe: 0, no_hire: 0, strong_no_hire: 0 };
}

describe('evaluations', () => {
  let outbox: OutboxNotifier;
  let interview: Interview;

  beforeEach(async () => {
    outbox = await setup();
    standard_week();
    interview = book_live(oct(19, 10));
    vi.setSystemTime(oct(19, 11));
    unwrap(complete_interview(ALICE, interview.id, { at: oct(19, 11) }));
    outbox.clear();
  });
  afterEach(teardown);

  it('should average two evaluators and break the tie conservatively', () => {
    unwrap(submit_evaluation(ALICE, evaluation(interview.id, 'alice', [5, 4, 5, 5, 5], 'strong_hire')));
    unwrap(submit_evaluation(BOB, evaluation(interview.id, 'bob', [2, 3, 2, 2, 2], 'no_hire')));

    const summary = unwrap(summarize(ADMIN, interview.id));
    expect(summary.evaluation_count).toBe(2);
    expect(summary.means).toEqual({
      technical_skills: 3.5,
      problem_solving: 3.5,
      communication: 3.5,
      cultural_fit: 3.5,
      overall_rating: 3.5,
    });
    expect(summary.distribution).toEqual({ ...no_votes(), strong_hire: 1, no_hire: 1 });
    expect(summary.overall_signal).toBe('no_hire');
  });

  it('should update a resubmitted evaluation in place', () => {
    const first = unwrap(submit_evaluation(ALICE, evaluation(interview.id, 'alice', [5, 4, 5, 5, 5], 'strong_hire')));
    unwrap(submit_evaluation(BOB, evaluation(interview.id, 'bob', [2, 3, 2, 2, 2], 'no_hire')));
    const second = unwrap(
      submit_evaluation(ALICE, evaluation(interview.id, 'alice', [3, 3, 3, 3, 3], 'maybe', { notes: 'Revised' })),
    );

    expect(second.id).toBe(first.id);
    expect(second.notes).toBe('Revised');
    expect(list_evaluations(interview.id)).toHaveLength(2);

    const summary = unwrap(summarize(ALICE, interview.id));
    expect(summary.evaluation_count).toBe(2);
    expect(summary.means?.technical_skills).toBe(2.5);
    expect(summary.distribution).toEqual({ ...no_votes(), maybe: 1, no_hire: 1 });
    expect(summary.overall_signal).toBe('no_hire');
  });

  it('should round means to two decimals', () => {
    unwrap(submit_evaluation(ALICE, evaluation(interview.id, 'alice', [5, 5, 5, 5, 5], 'hire')));
    unwrap(submit_evaluation(BOB, evaluation(interview.id, 'bob', [4, 4, 4, 4, 4], 'hire')));
    unwrap(submit_evaluation(ADMIN, evaluation(interview.id, 'panel-lead', [4, 4, 4, 4, 4], 'hire')));

    const summary = unwrap(summarize(ADMIN, interview.id));
    expect(summary.means?.technical_skills).toBe(4.33);
    expect(summary.overall_signal).toBe('hire');
  });

  it('should average custom criteria separately', () => {
    unwrap(
      submit_evaluation(
        ALICE,
        evaluation(interview.id, 'alice', [4, 4, 4, 4, 4], 'hire', { custom_ratings: { 'system design': 4 } }),
      ),
    );
    unwrap(
      submit_evaluation(
        BOB,
        evaluation(interview.id, 'bob', [4, 4, 4, 4, 4], 'hire', { custom_ratings: { 'system design': 5, testing: 3 } }),
      ),
    );

    const summary = unwrap(summarize(ADMIN, interview.id));
    expect(summary.custom_means).toEqual({ 'system design': 4.5, testing: 3 });
  });

  it('should summarize an interview without evaluations', () => {
    expect(unwrap(summarize(ADMIN, interview.id))).toEqual({
      interview_id: interview.id,
      evaluation_count: 0,
      means: null,
      custom_means: {},
      distribution: no_votes(),
      overall_signal: null,
    });
  });

  it('should validate ratings and recommendation', () => {
    const high = submit_evaluation(ALICE, evaluation(interview.id, 'alice', [6, 4, 4, 4, 4], 'hire'));
    expect(!high.ok && high.error).toMatchObject({ code: 'VALIDATION_ERROR', field: 'technical_skills' });

    const fractional = submit_evaluation(ALICE, evaluation(interview.id, 'alice', [4, 4, 3.5, 4, 4], 'hire'));
    expect(!fractional.ok && fractional.error).toMatchObject({ field: 'communication' });

    const bad_rec = submit_evaluation(ALICE, { ...evaluation(interview.id, 'alice', [4, 4, 4, 4, 4], 'hire'), recommendation: 'yes' });
    expect(!bad_rec.ok && bad_rec.error).toMatchObject({ field: 'recommendation' });

    const bad_custom = submit_evaluation(
      ALICE,
      evaluation(interview.id, 'alice', [4, 4, 4, 4, 4], 'hire', { custom_ratings: { depth: 0 } }),
    );
    expect(!bad_custom.ok && bad_custom.error).toMatchObject({ field: 'custom_ratings.depth' });
  });

  it('should only accept evaluations written as the actor', () => {
    const impostor = submit_evaluation(ALICE, evaluation(interview.id, 'bob', [4, 4, 4, 4, 4], 'hire'));
    expect(!impostor.ok && impostor.error).toBeInstanceOf(ForbiddenError);

    const candidate = submit_evaluation(CAROL, evaluation(interview.id, 'carol', [5, 5, 5, 5, 5], 'strong_hire'));
    expect(!candidate.ok && candidate.error).toBeInstanceOf(ForbiddenError);
  });

  it('should refuse evaluations before the interview has started', () => {
    const upcoming = book(oct(20, 10));
    const result = submit_evaluation(ALICE, evaluation(upcoming.id, 'alice', [4, 4, 4, 4, 4], 'hire'));
    expect(!result.ok && result.error).toBeInstanceOf(InvalidTransitionError);
    expect(!result.ok && result.error).toMatchObject({ current: 'scheduled' });
  });

  it('should notify the interviewer about other evaluators only', () => {
    unwrap(submit_evaluation(ALICE, evaluation(interview.id, 'alice', [4, 4, 4, 4, 4], 'hire')));
    expect(outbox.sent).toEqual([]);

    const by_bob = unwrap(submit_evaluation(BOB, evaluation(interview.id, 'bob', [4, 4, 4, 4, 4], 'hire')));
    expect(outbox.sent).toEqual([
      {
        user_id: 'alice',
        type: 'evaluation_submitted',
        title: 'Evaluation Submitted',
        message: `bob submitted an evaluation for interview ${interview.id}.`,
        data: { interview_id: interview.id, evaluation_id: by_bob.id },
      },
    ]);
  });

  it('should restrict summaries to staff', () => {
    const candidate = summarize(CAROL, interview.id);
    expect(!candidate.ok && candidate.error).toBeInstanceOf(ForbiddenError);

    const missing = summarize(ADMIN, 9999);
    expect(!missing.ok && missing.error).toBeInstanceOf(NotFoundError);
  });
});

describe('overall_signal', () => {
  it('should pick the majority', () => {
    expect(overall_signal({ ...no_votes(), hire: 2, strong_no_hire: 1 })).toBe('hire');
  });

  it('should prefer the strong variant on a positive tie', () => {
    expect(overall_signal({ ...no_votes(), strong_hire: 1, hire: 1 })).toBe('strong_hire');
  });

  it('should prefer maybe over any positive on a tie', () => {
    expect(overall_signal({ ...no_votes(), maybe: 2, strong_hire: 2 })).toBe('maybe');
  });

  it('should be null without votes', () => {
    expect(overall_signal(no_votes())).toBeNull();
  });
});
