import Anthropic from '@anthropic-ai/sdk';
import { config, require_env } from './config.js';
import { format_local_datetime, parse_local_datetime } from './calendar.js';
import { INTERVIEW_TYPES, type InterviewType } from './types.js';

let _client: Anthropic | null = null;

function get_client(): Anthropic {
  if (!_client) {
    _client = new Anthropic({ apiKey: require_env(config.anthropic.api_key_env), baseURL: config.anthropic.base_url });
  }
  return _client;
}

const SYSTEM_PROMPT = `You are an interview scheduling assistant. Extract the booking from the user's message and reply with JSON only, no other text:
{
  "candidate_id": "candidate id or handle, null if unknown",
  "scheduled_time_local": "YYYY-MM-DD HH:MM in the user's local time, null if unknown",
  "duration_minutes": integer duration in minutes, null if unknown,
  "interview_type": one of ${INTERVIEW_TYPES.map(type => `"${type}"`).join(', ')}, null if unknown
}`;

export interface ParsedSchedule {
  candidate_id?: string;
  scheduled_time?: number; // UTC ms
  duration_minutes?: number;
  interview_type?: InterviewType;
}

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parse_json(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Turns a free-text booking request into whichever fields could be read
 * reliably. Fields that fail validation are left out.
 */
export async function parse_schedule_request(
  text: string,
  utc_offset_minutes: number = config.scheduling.default_utc_offset_minutes,
): Promise<ParsedSchedule> {
  const now_local = format_local_datetime(Date.now(), utc_offset_minutes);

  const response = await get_client().messages.create({
    model: config.anthropic.model,
    max_tokens: 512,
    system: SYSTEM_PROMPT,
    messages: [{
      role: 'user',
      content: `Current local time: ${now_local}\n\nRequest: ${text}`,
    }],
  });

  const raw = (response.content ?? [])
    .filter((block): block is Anthropic.TextBlock => block.type === 'text')
    .map(block => block.text)
    .join('');

  const json_match = raw.match(/\{[\s\S]*\}/);
  if (!json_match) return {};

  const parsed = parse_json(json_match[0]);
  if (!is_record(parsed)) return {};

  const result: ParsedSchedule = {};

  if (typeof parsed.candidate_id === 'string' && parsed.candidate_id.trim()) {
    result.candidate_id = parsed.candidate_id.trim().replace(/^@/, '');
  }

  if (typeof parsed.scheduled_time_local === 'string') {
    const instant = parse_local_datetime(parsed.scheduled_time_local, utc_offset_minutes);
    if (instant !== null && instant > Date.now()) result.scheduled_time = instant;
  }

  if (typeof parsed.duration_minutes === 'number' && Number.isFinite(parsed.duration_minutes)) {
    const minutes = Math.round(parsed.duration_minutes);
    if (minutes >= 1 && minutes <= config.scheduling.max_duration_minutes) result.duration_minutes = minutes;
  }

  const interview_type = INTERVIEW_TYPES.find(type => type === parsed.interview_type);
  if (interview_type) result.interview_type = interview_type;

  return result;
}
