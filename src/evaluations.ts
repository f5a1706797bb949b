import {
  query_all,
  query_one,
  run,
  transact,
  read_enum,
  read_number,
  read_number_record,
  read_optional_string,
  read_string,
  type Row,
} from './db.js';
import { authorize_staff, is_privileged } from './auth.js';
import { ForbiddenError, InvalidTransitionError, NotFoundError, ValidationError, fail, ok, type Result } from './errors.js';
import { find_interview } from './interviews.js';
import { emit } from './notifier.js';
import { read_enum_value, read_integer, read_optional_text, read_required_text } from './validation.js';
import {
  RATING_DIMENSIONS,
  RECOMMENDATIONS,
  type Actor,
  type Evaluation,
  type EvaluationSummary,
  type InterviewStatus,
  type RatingDimension,
  type Ratings,
  type Recommendation,
} from './types.js';

export interface EvaluationInput {
  interview_id: number;
  evaluator_id: string;
  ratings: Partial<Record<RatingDimension, unknown>>;
  recommendation: string;
  strengths?: string | null;
  weaknesses?: string | null;
  detailed_feedback?: string | null;
  notes?: string | null;
  custom_ratings?: Record<string, unknown> | null;
}

const EVALUABLE_STATUSES: readonly InterviewStatus[] = ['in_progress', 'completed'];

/**
 * Tie-break order for the overall signal, most conservative first. When two
 * recommendations have the same number of votes, the one listed earlier wins:
 * any negative outranks `maybe`, which outranks any positive, and on the same
 * side the strong variant outranks the plain one.
 */
export const CONSERVATIVE_ORDER: readonly Recommendation[] = ['strong_no_hire', 'no_hire', 'maybe', 'strong_hire', 'hire'];

const MIN_RATING = 1;
const MAX_RATING = 5;

function parse_evaluation(row: Row): Evaluation {
  const ratings: Ratings = {
    technical_skills: read_number(row, 'technical_skills'),
    problem_solving: read_number(row, 'problem_solving'),
    communication: read_number(row, 'communication'),
    cultural_fit: read_number(row, 'cultural_fit'),
    overall_rating: read_number(row, 'overall_rating'),
  };
  return {
    id: read_number(row, 'id'),
    interview_id: read_number(row, 'interview_id'),
    evaluator_id: read_string(row, 'evaluator_id'),
    ratings,
    recommendation: read_enum(row, 'recommendation', RECOMMENDATIONS),
    strengths: read_optional_string(row, 'strengths'),
    weaknesses: read_optional_string(row, 'weaknesses'),
    detailed_feedback: read_optional_string(row, 'detailed_feedback'),
    notes: read_optional_string(row, 'notes'),
    custom_ratings: read_number_record(row, 'custom_ratings'),
    submitted_at: read_number(row, 'submitted_at'),
    updated_at: read_number(row, 'updated_at'),
  };
}

function read_ratings(input: EvaluationInput['ratings']): Ratings | ValidationError {
  if (typeof input !== 'object' || input === null) {
    return new ValidationError('ratings', 'ratings are required');
  }
  const out: Partial<Ratings> = {};
  for (const dimension of RATING_DIMENSIONS) {
    const value = read_integer(dimension, input[dimension], MIN_RATING, MAX_RATING);
    if (value instanceof ValidationError) return value;
    out[dimension] = value;
  }
  const { technical_skills, problem_solving, communication, cultural_fit, overall_rating } = out;
  if (
    technical_skills === undefined ||
    problem_solving === undefined ||
    communication === undefined ||
    cultural_fit === undefined ||
    overall_rating === undefined
  ) {
    return new ValidationError('ratings', 'all rating dimensions are required');
  }
  return { technical_skills, problem_solving, communication, cultural_fit, overall_rating };
}

function read_custom_ratings(input: EvaluationInput['custom_ratings']): Record<string, number> | null | ValidationError {
  if (input === undefined || input === null) return null;
  if (typeof input !== 'object' || Array.isArray(input)) {
    return new ValidationError('custom_ratings', 'custom_ratings must be an object');
  }
  const out: Record<string, number> = {};
  for (const [criterion, raw] of Object.entries(input)) {
    if (!criterion.trim()) return new ValidationError('custom_ratings', 'custom rating names must be non-empty');
    const value = read_integer(`custom_ratings.${criterion}`, raw, MIN_RATING, MAX_RATING);
    if (value instanceof ValidationError) return value;
    out[criterion] = value;
  }
  return out;
}

function find_evaluation(interview_id: number, evaluator_id: string): Evaluation | null {
  const row = query_one('SELECT * FROM evaluations WHERE interview_id = ? AND evaluator_id = ?', [interview_id, evaluator_id]);
  return row ? parse_evaluation(row) : null;
}

/**
 * Creates or replaces the evaluator's assessment of an interview. There is
 * only ever one row per (interview, evaluator).
 */
export function submit_evaluation(actor: Actor, input: EvaluationInput): Result<Evaluation> {
  const evaluator_id = read_required_text('evaluator_id', input.evaluator_id, 200);
  if (evaluator_id instanceof ValidationError) return fail(evaluator_id);
  if (!is_privileged(actor) && !(actor.role === 'interviewer' && actor.user_id === evaluator_id)) {
    return fail(new ForbiddenError(`${actor.role} ${actor.user_id} may not submit evaluations as ${evaluator_id}`));
  }

  const ratings = read_ratings(input.ratings);
  if (ratings instanceof ValidationError) return fail(ratings);
  const recommendation = read_enum_value('recommendation', input.recommendation, RECOMMENDATIONS);
  if (recommendation instanceof ValidationError) return fail(recommendation);
  const custom_ratings = read_custom_ratings(input.custom_ratings);
  if (custom_ratings instanceof ValidationError) return fail(custom_ratings);

  const texts: Record<'strengths' | 'weaknesses' | 'detailed_feedback' | 'notes', string | null> = {
    strengths: null,
    weaknesses: null,
    detailed_feedback: null,
    notes: null,
  };
  for (const field of ['strengths', 'weaknesses', 'detailed_feedback', 'notes'] as const) {
    const value = read_optional_text(field, input[field]);
    if (value instanceof ValidationError) return fail(value);
    texts[field] = value;
  }

  const result = transact((): Result<{ evaluation: Evaluation; interviewer_id: string; created: boolean }> => {
    const interview = find_interview(input.interview_id);
    if (!interview) return fail(new NotFoundError('interview', input.interview_id));
    if (!EVALUABLE_STATUSES.includes(interview.status)) {
      return fail(new InvalidTransitionError(interview.status, 'evaluated'));
    }

    const created = find_evaluation(interview.id, evaluator_id) === null;
    const now = Date.now();
    run(
      `INSERT INTO evaluations (
         interview_id, evaluator_id, technical_skills, problem_solving, communication, cultural_fit, overall_rating,
         recommendation, strengths, weaknesses, detailed_feedback, notes, custom_ratings, submitted_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(interview_id, evaluator_id) DO UPDATE SET
         technical_skills = excluded.technical_skills,
         problem_solving = excluded.problem_solving,
         communication = excluded.communication,
         cultural_fit = excluded.cultural_fit,
         overall_rating = excluded.overall_rating,
         recommendation = excluded.recommendation,
         strengths = excluded.strengths,
         weaknesses = excluded.weaknesses,
         detailed_feedback = excluded.detailed_feedback,
         notes = excluded.notes,
         custom_ratings = excluded.custom_ratings,
         updated_at = excluded.updated_at`,
      [
        interview.id,
        evaluator_id,
        ratings.technical_skills,
        ratings.problem_solving,
        ratings.communication,
        ratings.cultural_fit,
        ratings.overall_rating,
        recommendation,
        texts.strengths,
        texts.weaknesses,
        texts.detailed_feedback,
        texts.notes,
        custom_ratings ? JSON.stringify(custom_ratings) : null,
        now,
        now,
      ],
    );
    const evaluation = find_evaluation(interview.id, evaluator_id);
    if (!evaluation) throw new Error(`Evaluation of interview ${interview.id} by ${evaluator_id} vanished after upsert`);
    return ok({ evaluation, interviewer_id: interview.interviewer_id, created });
  });
  if (!result.ok) return result;

  const { evaluation, interviewer_id, created } = result.value;
  console.log(
    `[evaluations] ${created ? 'Submitted' : 'Updated'} evaluation of interview ${evaluation.interview_id} by ${evaluator_id}`,
  );
  if (interviewer_id !== evaluator_id) {
    emit({
      user_id: interviewer_id,
      type: 'evaluation_submitted',
      title: 'Evaluation Submitted',
      message: `${evaluator_id} submitted an evaluation for interview ${evaluation.interview_id}.`,
      data: { interview_id: evaluation.interview_id, evaluation_id: evaluation.id },
    });
  }
  return ok(evaluation);
}

export function list_evaluations(interview_id: number): Evaluation[] {
  return query_all('SELECT * FROM evaluations WHERE interview_id = ? ORDER BY submitted_at ASC, id ASC', [interview_id]).map(
    parse_evaluation,
  );
}

function mean(values: number[]): number {
  const total = values.reduce((sum, value) => sum + value, 0);
  return Math.round((total / values.length) * 100) / 100;
}

/** Majority recommendation; ties go to the earliest entry of CONSERVATIVE_ORDER. */
export function overall_signal(distribution: Record<Recommendation, number>): Recommendation | null {
  let best: Recommendation | null = null;
  for (const recommendation of CONSERVATIVE_ORDER) {
    const votes = distribution[recommendation];
    if (votes > 0 && (best === null || votes > distribution[best])) best = recommendation;
  }
  return best;
}

export function summarize_evaluations(interview_id: number, evaluations: readonly Evaluation[]): EvaluationSummary {
  const distribution: Record<Recommendation, number> = {
    strong_hire: 0,
    hire: 0,
    maybe: 0,
    no_hire: 0,
    strong_no_hire: 0,
  };
  for (const evaluation of evaluations) distribution[evaluation.recommendation] += 1;

  let means: Record<RatingDimension, number> | null = null;
  if (evaluations.length > 0) {
    means = {
      technical_skills: mean(evaluations.map(e => e.ratings.technical_skills)),
      problem_solving: mean(evaluations.map(e => e.ratings.problem_solving)),
      communication: mean(evaluations.map(e => e.ratings.communication)),
      cultural_fit: mean(evaluations.map(e => e.ratings.cultural_fit)),
      overall_rating: mean(evaluations.map(e => e.ratings.overall_rating)),
    };
  }

  const custom_values = new Map<string, number[]>();
  for (const evaluation of evaluations) {
    for (const [criterion, value] of Object.entries(evaluation.custom_ratings ?? {})) {
      const bucket = custom_values.get(criterion) ?? [];
      bucket.push(value);
      custom_values.set(criterion, bucket);
    }
  }
  const custom_means: Record<string, number> = {};
  for (const [criterion, values] of [...custom_values.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    custom_means[criterion] = mean(values);
  }

  return {
    interview_id,
    evaluation_count: evaluations.length,
    means,
    custom_means,
    distribution,
    overall_signal: overall_signal(distribution),
  };
}

export function summarize(actor: Actor, interview_id: number): Result<EvaluationSummary> {
  const denied = authorize_staff(actor, 'read evaluation summaries');
  if (denied) return fail(denied);
  if (!find_interview(interview_id)) return fail(new NotFoundError('interview', interview_id));
  return ok(summarize_evaluations(interview_id, list_evaluations(interview_id)));
}
