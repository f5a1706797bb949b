// Closed enumerations. The arrays double as the runtime allow-lists used to
// validate input at the boundary.

export const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const INTERVIEW_TYPES = [
  'phone_screen',
  'technical',
  'system_design',
  'behavioral',
  'hr',
  'final',
  'mixed',
] as const;
export type InterviewType = (typeof INTERVIEW_TYPES)[number];

export const INTERVIEW_STATUSES = [
  'scheduled',
  'in_progress',
  'completed',
  'cancelled',
  'no_show',
  'rescheduled',
] as const;
export type InterviewStatus = (typeof INTERVIEW_STATUSES)[number];

// Statuses that occupy a slot on the interviewer's calendar
export const BOOKED_STATUSES: readonly InterviewStatus[] = ['scheduled', 'in_progress', 'completed'];

export type Party = 'interviewer' | 'candidate';

export const RECOMMENDATIONS = ['strong_hire', 'hire', 'maybe', 'no_hire', 'strong_no_hire'] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const RATING_DIMENSIONS = [
  'technical_skills',
  'problem_solving',
  'communication',
  'cultural_fit',
  'overall_rating',
] as const;
export type RatingDimension = (typeof RATING_DIMENSIONS)[number];

export const RESCHEDULE_STATUSES = ['pending', 'approved', 'rejected'] as const;
export type RescheduleStatus = (typeof RESCHEDULE_STATUSES)[number];
export type RescheduleDecision = Exclude<RescheduleStatus, 'pending'>;

export const RECORDING_STATUSES = ['recording', 'processing', 'completed', 'failed'] as const;
export type RecordingStatus = (typeof RECORDING_STATUSES)[number];

export const ROLES = ['admin', 'interviewer', 'candidate', 'system'] as const;
export type Role = (typeof ROLES)[number];

/** Identity context supplied by the caller for every mutating operation. */
export interface Actor {
  user_id: string;
  role: Role;
}

/** Calendar date in the interviewer's local offset, `YYYY-MM-DD`. */
export type IsoDate = string;

/** Time of day, `HH:MM` (24h). */
export type TimeOfDay = string;

export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface Availability {
  interviewer_id: string;
  weekdays: ReadonlySet<Weekday>;
  start_time: TimeOfDay;
  end_time: TimeOfDay;
  buffer_minutes: number;
  max_per_day: number;
  blackout_dates: ReadonlySet<IsoDate>;
  utc_offset_minutes: number;
  updated_at: number;
}

export interface Interview {
  id: number;
  candidate_id: string;
  interviewer_id: string;
  created_by: string;
  title: string | null;
  position: string | null;
  interview_type: InterviewType;
  status: InterviewStatus;
  scheduled_time: number;
  duration_minutes: number;
  round_number: number;
  room_id: string;
  meeting_url: string;
  actual_start_time: number | null;
  actual_end_time: number | null;
  interviewer_joined_at: number | null;
  candidate_joined_at: number | null;
  recording_enabled: boolean;
  code_editor_enabled: boolean;
  whiteboard_enabled: boolean;
  programming_languages: string[];
  evaluation_criteria: JsonObject | null;
  recording_url: string | null;
  cancellation_reason: string | null;
  rescheduled_from_id: number | null;
  created_at: number;
  updated_at: number;
}

export type Ratings = Record<RatingDimension, number>;

export interface Evaluation {
  id: number;
  interview_id: number;
  evaluator_id: string;
  ratings: Ratings;
  recommendation: Recommendation;
  strengths: string | null;
  weaknesses: string | null;
  detailed_feedback: string | null;
  notes: string | null;
  custom_ratings: Record<string, number> | null;
  submitted_at: number;
  updated_at: number;
}

export interface EvaluationSummary {
  interview_id: number;
  evaluation_count: number;
  means: Record<RatingDimension, number> | null;
  custom_means: Record<string, number>;
  distribution: Record<Recommendation, number>;
  overall_signal: Recommendation | null;
}

/** Non-empty, ordered sequence of proposed start instants. */
export type ProposedTimes = readonly [number, ...number[]];

export type RescheduleRequest =
  | {
      id: number;
      interview_id: number;
      requested_by: string;
      reason: string;
      proposed_times: ProposedTimes;
      status: 'pending';
      created_at: number;
      resolved_at: null;
    }
  | {
      id: number;
      interview_id: number;
      requested_by: string;
      reason: string;
      proposed_times: ProposedTimes;
      status: 'approved';
      chosen_time: number;
      new_interview_id: number;
      created_at: number;
      resolved_at: number;
    }
  | {
      id: number;
      interview_id: number;
      requested_by: string;
      reason: string;
      proposed_times: ProposedTimes;
      status: 'rejected';
      created_at: number;
      resolved_at: number;
    };

export interface Recording {
  id: number;
  interview_id: number;
  status: RecordingStatus;
  duration_seconds: number | null;
  file_size_bytes: number | null;
  video_url: string | null;
  failure_reason: string | null;
  started_at: number;
  ended_at: number | null;
  created_at: number;
}

export interface CodeSnapshot {
  id: number;
  interview_id: number;
  language: string;
  code: string;
  author_id: string;
  created_at: number;
}

export interface WhiteboardSnapshot {
  id: number;
  interview_id: number;
  data: JsonObject;
  image_url: string | null;
  created_at: number;
}

export type NotificationType =
  | 'interview_scheduled'
  | 'interview_rescheduled'
  | 'interview_cancelled'
  | 'interview_reminder'
  | 'interview_no_show'
  | 'reschedule_requested'
  | 'reschedule_resolved'
  | 'evaluation_submitted'
  | 'recording_ready';

export interface NotificationEvent {
  user_id: string;
  type: NotificationType;
  title: string;
  message: string;
  data: JsonObject;
}
