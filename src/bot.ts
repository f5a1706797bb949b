import { Bot, InlineKeyboard, type Context } from 'grammy';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { config, require_env } from './config.js';
import { init_db, get_user_lang, set_user_lang } from './db.js';
import { find_availability, set_availability } from './availability.js';
import { format_local_datetime } from './calendar.js';
import {
  parse_approve_args,
  parse_availability_args,
  parse_id_args,
  parse_reschedule_args,
  parse_schedule_args,
} from './commands.js';
import type { CoreError } from './errors.js';
import { summarize } from './evaluations.js';
import { list_by_interviewer } from './interviews.js';
import { cancel_interview, record_join_by_room } from './lifecycle.js';
import { set_notifier } from './notifier.js';
import { parse_schedule_request, type ParsedSchedule } from './parser.js';
import { request_reschedule, resolve_reschedule } from './reschedule.js';
import { start_scheduler } from './scheduler.js';
import { schedule_interview } from './scheduling.js';
import { TelegramNotifier } from './telegram-notifier.js';
import { t, is_supported_lang, resolve_lang, SUPPORTED_LANGS } from './i18n/index.js';
import { RATING_DIMENSIONS, RECOMMENDATIONS, type Actor, type Interview } from './types.js';

// grammy fetches through node-fetch; hand it an agent for the system proxy
const proxy_url = process.env.HTTPS_PROXY ?? process.env.HTTP_PROXY;
const proxy_agent = proxy_url ? new HttpsProxyAgent(proxy_url) : undefined;
if (proxy_url) console.log(`[bot] Proxy configured: ${proxy_url}`);

const bot = new Bot(require_env(config.telegram.bot_token_env), {
  client: { baseFetchConfig: { agent: proxy_agent, compress: true } },
});

// ─── Context helpers ──────────────────────────────────────────────────────────

function get_actor(ctx: Context): Actor | null {
  if (!ctx.from) return null;
  const user_id = String(ctx.from.id);
  return { user_id, role: config.telegram.admin_ids.includes(user_id) ? 'admin' : 'interviewer' };
}

/** Resolve display locale for the Telegram context sender. */
function get_lang(ctx: Context): string {
  const stored = ctx.from ? get_user_lang(String(ctx.from.id)) : null;
  if (stored) return resolve_lang(stored);
  // Fall back on Telegram UI language
  const tg = ctx.from?.language_code;
  return tg?.startsWith('zh') ? 'zh-CN' : resolve_lang(null);
}

function local_offset(actor: Actor): number {
  return find_availability(actor.user_id)?.utc_offset_minutes ?? config.scheduling.default_utc_offset_minutes;
}

function fmt_time(ts: number, actor: Actor): string {
  return format_local_datetime(ts, local_offset(actor));
}

function error_text(error: CoreError, lng: string): string {
  return t(`errors.${error.code}`, lng, { message: error.message });
}

function status_label(status: string, lng: string): string {
  const key = `status_labels.${status}`;
  const label = t(key, lng);
  return label !== key ? label : status;
}

function interview_line(interview: Interview, actor: Actor, lng: string): string {
  return t('status.item', lng, {
    id: interview.id,
    candidate: interview.candidate_id,
    type: interview.interview_type,
    time: fmt_time(interview.scheduled_time, actor),
    duration: interview.duration_minutes,
    status_label: status_label(interview.status, lng),
  });
}

// ─── Commands ─────────────────────────────────────────────────────────────────

bot.command('start', async (ctx) => {
  await ctx.reply(t('start.welcome', get_lang(ctx)));
});

bot.command('help', async (ctx) => {
  await ctx.reply(t('help.text', get_lang(ctx)));
});

bot.command('lang', async (ctx) => {
  const lng = get_lang(ctx);
  const keyboard = new InlineKeyboard()
    .text('🇺🇸 English', 'set_lang:en-US')
    .text('🇨🇳 中文', 'set_lang:zh-CN');
  await ctx.reply(t('lang.choose', lng), { reply_markup: keyboard });
});

bot.command('availability', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const text = ctx.match.trim();

  if (!text) {
    const current = find_availability(actor.user_id);
    if (!current) {
      await ctx.reply(t('availability.none', lng));
      return;
    }
    await ctx.reply(
      t('availability.current', lng, {
        days: [...current.weekdays].join(', '),
        start: current.start_time,
        end: current.end_time,
        buffer: current.buffer_minutes,
        max: current.max_per_day,
        offset: current.utc_offset_minutes,
        blackout: [...current.blackout_dates].join(', ') || '-',
      }),
    );
    return;
  }

  const args = parse_availability_args(text);
  if (!args) {
    await ctx.reply(t('availability.usage', lng));
    return;
  }
  const result = set_availability(actor, { interviewer_id: actor.user_id, ...args });
  await ctx.reply(result.ok ? t('availability.saved', lng) : error_text(result.error, lng));
});

function missing_fields(parsed: ParsedSchedule): string[] {
  const missing: string[] = [];
  if (!parsed.candidate_id) missing.push('candidate');
  if (parsed.scheduled_time === undefined) missing.push('time');
  if (parsed.duration_minutes === undefined) missing.push('duration');
  if (!parsed.interview_type) missing.push('type');
  return missing;
}

bot.command('schedule', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const text = ctx.match.trim();
  if (!text) {
    await ctx.reply(t('schedule.usage', lng));
    return;
  }

  const offset = local_offset(actor);
  const args = parse_schedule_args(text, offset);
  if (args) {
    const result = schedule_interview(actor, { interviewer_id: actor.user_id, ...args });
    await ctx.reply(
      result.ok
        ? t('schedule.booked', lng, {
            id: result.value.id,
            candidate: result.value.candidate_id,
            time: fmt_time(result.value.scheduled_time, actor),
            duration: result.value.duration_minutes,
            url: result.value.meeting_url,
          })
        : error_text(result.error, lng),
    );
    return;
  }

  // Free text: parse it and hand back the structured command to confirm
  let parsed: ParsedSchedule;
  try {
    await ctx.replyWithChatAction('typing');
    parsed = await parse_schedule_request(text, offset);
  } catch (err) {
    console.error('[bot] NL parse error:', err);
    await ctx.reply(t('schedule.parse_error', lng));
    return;
  }

  const missing = missing_fields(parsed);
  if (missing.length > 0 || parsed.scheduled_time === undefined) {
    await ctx.reply(t('schedule.incomplete', lng, { missing: missing.join(', ') }));
    return;
  }
  await ctx.reply(
    t('schedule.confirm', lng, {
      command: `/schedule ${parsed.candidate_id} ${fmt_time(parsed.scheduled_time, actor)} ${parsed.duration_minutes} ${parsed.interview_type}`,
    }),
  );
});

bot.command('status', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const result = list_by_interviewer(actor, actor.user_id, { statuses: ['scheduled', 'in_progress'] });
  if (!result.ok) {
    await ctx.reply(error_text(result.error, lng));
    return;
  }
  if (result.value.length === 0) {
    await ctx.reply(t('status.empty', lng));
    return;
  }
  const lines = [t('status.header', lng, { count: result.value.length })];
  for (const interview of result.value) lines.push(interview_line(interview, actor, lng));
  await ctx.reply(lines.join('\n'));
});

bot.command('join', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const room_id = ctx.match.trim();
  if (!room_id) {
    await ctx.reply(t('join.usage', lng));
    return;
  }
  const result = record_join_by_room(actor, room_id, 'interviewer');
  await ctx.reply(
    result.ok ? t('join.success', lng, { id: result.value.id, room: result.value.room_id }) : error_text(result.error, lng),
  );
});

bot.command('cancel', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const args = parse_id_args(ctx.match);
  if (!args || !args.rest) {
    await ctx.reply(t('cancel.usage', lng));
    return;
  }
  const result = cancel_interview(actor, args.id, args.rest);
  await ctx.reply(result.ok ? t('cancel.success', lng, { id: result.value.id }) : error_text(result.error, lng));
});

bot.command('reschedule', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const args = parse_reschedule_args(ctx.match, local_offset(actor));
  if (!args) {
    await ctx.reply(t('reschedule.usage', lng));
    return;
  }
  const result = request_reschedule(actor, args.interview_id, args.reason, args.proposed_times);
  await ctx.reply(
    result.ok
      ? t('reschedule.requested', lng, { request_id: result.value.id, id: result.value.interview_id })
      : error_text(result.error, lng),
  );
});

bot.command('approve', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const args = parse_approve_args(ctx.match, local_offset(actor));
  if (!args) {
    await ctx.reply(t('approve.usage', lng));
    return;
  }
  const result = resolve_reschedule(actor, args.request_id, 'approved', args.chosen_time);
  if (!result.ok) {
    await ctx.reply(error_text(result.error, lng));
    return;
  }
  const { interview } = result.value;
  await ctx.reply(
    interview
      ? t('approve.success', lng, { id: interview.id, time: fmt_time(interview.scheduled_time, actor), url: interview.meeting_url })
      : t('approve.success_no_interview', lng),
  );
});

bot.command('reject', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const args = parse_id_args(ctx.match);
  if (!args) {
    await ctx.reply(t('reject.usage', lng));
    return;
  }
  const result = resolve_reschedule(actor, args.id, 'rejected');
  await ctx.reply(result.ok ? t('reject.success', lng, { request_id: args.id }) : error_text(result.error, lng));
});

bot.command('summary', async (ctx) => {
  const actor = get_actor(ctx);
  if (!actor) return;
  const lng = get_lang(ctx);
  const args = parse_id_args(ctx.match);
  if (!args) {
    await ctx.reply(t('summary.usage', lng));
    return;
  }
  const result = summarize(actor, args.id);
  if (!result.ok) {
    await ctx.reply(error_text(result.error, lng));
    return;
  }
  const summary = result.value;
  if (summary.evaluation_count === 0 || !summary.means) {
    await ctx.reply(t('summary.empty', lng, { id: summary.interview_id }));
    return;
  }
  const means = summary.means;
  const lines = [
    t('summary.header', lng, { id: summary.interview_id, count: summary.evaluation_count }),
    ...RATING_DIMENSIONS.map(dimension =>
      t('summary.mean_item', lng, { label: t(`summary.dimension_labels.${dimension}`, lng), value: means[dimension] }),
    ),
    ...Object.entries(summary.custom_means).map(([label, value]) => t('summary.mean_item', lng, { label, value })),
    t('summary.distribution', lng, {
      votes: RECOMMENDATIONS.map(rec => `${t(`summary.rec_labels.${rec}`, lng)} ${summary.distribution[rec]}`).join(' · '),
    }),
    t('summary.signal', lng, {
      signal: summary.overall_signal ? t(`summary.rec_labels.${summary.overall_signal}`, lng) : '-',
    }),
  ];
  await ctx.reply(lines.join('\n'));
});

// ─── Callback queries (language picker) ───────────────────────────────────────

bot.on('callback_query:data', async (ctx) => {
  const data = ctx.callbackQuery.data;
  if (!data.startsWith('set_lang:')) {
    await ctx.answerCallbackQuery();
    return;
  }

  const requested = data.replace('set_lang:', '');
  const lang = is_supported_lang(requested) ? requested : SUPPORTED_LANGS[0];
  set_user_lang(String(ctx.from.id), lang);

  await ctx.answerCallbackQuery({ text: t('lang.changed', lang) });
  await ctx.editMessageReplyMarkup(); // remove the inline keyboard
});

bot.on('message:text', async (ctx) => {
  if (ctx.message.text.startsWith('/')) return;
  await ctx.reply(t('default_reply', get_lang(ctx)));
});

// ─── Boot ─────────────────────────────────────────────────────────────────────

bot.catch((err) => {
  console.error('[bot] Unhandled error:', err);
});

async function main() {
  await init_db();
  set_notifier(new TelegramNotifier(bot.api));
  start_scheduler();
  await bot.start({
    onStart: (info) => {
      console.log(`[bot] Started as @${info.username}`);
    },
  });
}

main().catch(console.error);
