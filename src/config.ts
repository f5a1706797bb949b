import dotenv from 'dotenv';
// Load .env first (defaults/comments), then .env.local overrides with real secrets
dotenv.config();
dotenv.config({ path: '.env.local', override: true });

export function require_env(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required environment variable: ${key}`);
  return val;
}

function list_env(key: string): string[] {
  return (process.env[key] ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function int_env(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  return parsed;
}

// Secrets are resolved by the bot and parser when they start, so the core
// can run (and be tested) without them.
export const config = {
  telegram: {
    bot_token_env: 'TELEGRAM_BOT_TOKEN',
    // Telegram user ids that act as admin; everyone else acts as interviewer
    admin_ids: list_env('ADMIN_TELEGRAM_IDS'),
  },
  anthropic: {
    api_key_env: 'ANTHROPIC_API_KEY',
    base_url: process.env.ANTHROPIC_BASE_URL || undefined,
    model: process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest',
  },
  db: {
    path: process.env.DB_PATH ?? './interviews.db',
  },
  default_locale: process.env.DEFAULT_LOCALE ?? 'en-US',
  scheduling: {
    // How far in the past a requested start may lie and still be accepted
    grace_minutes: int_env('SCHEDULING_GRACE_MINUTES', 5),
    max_duration_minutes: int_env('MAX_DURATION_MINUTES', 480),
    default_utc_offset_minutes: int_env('DEFAULT_UTC_OFFSET_MINUTES', 0),
    max_proposed_times: 5,
    room_id_attempts: 5,
  },
  jobs: {
    no_show_after_minutes: int_env('NO_SHOW_AFTER_MINUTES', 15),
    reminder_lead_minutes: int_env('REMINDER_LEAD_MINUTES', 15),
  },
} as const;
