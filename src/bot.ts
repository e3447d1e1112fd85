import Anthropic from '@anthropic-ai/sdk';
import { Bot, type Context } from 'grammy';
import { config } from './config.js';
import { SUPPORTED_LANGS, t } from './i18n/index.js';
import { AnthropicOracle } from './oracle.js';
import { InterviewOrchestrator } from './orchestrator.js';
import { parse_interview_command } from './parser.js';
import { load_policy, read_policy_file } from './policy.js';
import { format_report_message } from './report.js';
import { InterviewSessions } from './sessions.js';
import type { TurnResult } from './types.js';

const base_policy = config.interview.policy_path
  ? read_policy_file(config.interview.policy_path)
  : load_policy();

// Session caps from the environment win over the policy file
const policy = load_policy({
  ...base_policy,
  session: {
    ...base_policy.session,
    max_minutes: config.interview.max_minutes,
    max_questions: config.interview.max_questions,
  },
});

const client = new Anthropic({ apiKey: config.anthropic.api_key, baseURL: config.anthropic.base_url });
const oracle = new AnthropicOracle(client, {
  model: config.anthropic.model,
  max_tokens: config.anthropic.max_tokens,
});

const sessions = new InterviewSessions(
  (intake, locale) => new InterviewOrchestrator(intake, oracle, { policy, locale }),
  { max_minutes: policy.session.max_minutes, max_questions: policy.session.max_questions },
);

const bot = new Bot(config.telegram.bot_token);

/** Interview locale for the chat: Telegram UI language when supported, else the configured default. */
function get_lang(ctx: Context): string {
  const tg = ctx.from?.language_code?.split('-')[0];
  if (!tg) return config.locale;
  return SUPPORTED_LANGS.find(lang => lang.split('-')[0] === tg) ?? config.locale;
}

function chat_id_of(ctx: Context): string | null {
  return ctx.chat ? String(ctx.chat.id) : null;
}

async function finish(chat_id: string): Promise<void> {
  const exported = sessions.close(chat_id);
  if (!exported) return;

  const report = exported.report;
  await bot.api.sendMessage(config.telegram.admin_chat_id, format_report_message(report, config.locale));
  console.log(`[bot] Report for ${report.candidate_name} sent: ${report.final_recommendation.decision}`);
}

async function reply_turn(ctx: Context, chat_id: string, turn: TurnResult, ended: boolean, lng: string): Promise<void> {
  // Once the phase machine has finished the next question already is the closing line
  if (ended && turn.phase !== 'finished') {
    const name = sessions.get(chat_id)?.profiler.name ?? '';
    await ctx.reply(t('closing', lng, { name }));
    return;
  }
  await ctx.reply(turn.next_question);
}

// ─── Commands ─────────────────────────────────────────────────────────────────

bot.command('start', async (ctx) => {
  await ctx.reply(t('bot.welcome', get_lang(ctx)));
});

bot.command('help', async (ctx) => {
  await ctx.reply(t('bot.help', get_lang(ctx)));
});

bot.command('interview', async (ctx) => {
  const lng = get_lang(ctx);
  const chat_id = chat_id_of(ctx);
  if (!chat_id) return;

  const intake = parse_interview_command(ctx.match ?? '');
  if (!intake) {
    await ctx.reply(t('bot.usage', lng));
    return;
  }

  try {
    await ctx.replyWithChatAction('typing');
    const outcome = await sessions.open(chat_id, intake, lng);
    if (outcome.kind === 'already_active') {
      await ctx.reply(t('bot.already_active', lng));
      return;
    }
    await ctx.reply(outcome.turn.next_question);
  } catch (err) {
    console.error(`[bot] Error starting interview in chat ${chat_id}:`, err);
    await ctx.reply(t('bot.error', lng));
  }
});

bot.command('status', async (ctx) => {
  const lng = get_lang(ctx);
  const chat_id = chat_id_of(ctx);
  const orchestrator = chat_id ? sessions.get(chat_id) : null;
  if (!orchestrator) {
    await ctx.reply(t('bot.no_session', lng));
    return;
  }

  const status = orchestrator.status();
  await ctx.reply(t('bot.status', lng, {
    phase: status.phase,
    questions: status.total_questions,
    remaining: Math.floor(status.remaining_minutes),
  }));
});

bot.command('stop', async (ctx) => {
  const lng = get_lang(ctx);
  const chat_id = chat_id_of(ctx);
  if (!chat_id || !sessions.has(chat_id)) {
    await ctx.reply(t('bot.no_session', lng));
    return;
  }

  await ctx.reply(t('bot.stopped', lng));
  await finish(chat_id);
});

// ─── Answers ──────────────────────────────────────────────────────────────────

bot.on('message:text', async (ctx) => {
  const lng = get_lang(ctx);
  const chat_id = chat_id_of(ctx);
  const text = ctx.message.text;

  if (!chat_id || text.startsWith('/')) return;

  try {
    await ctx.replyWithChatAction('typing');
    const outcome = await sessions.answer(chat_id, text);

    switch (outcome.kind) {
      case 'no_session':
        await ctx.reply(t('bot.no_session', lng));
        return;
      case 'busy':
        await ctx.reply(t('bot.busy', lng));
        return;
      case 'turn':
        await reply_turn(ctx, chat_id, outcome.turn, outcome.ended, lng);
        if (outcome.ended) await finish(chat_id);
        return;
    }
  } catch (err) {
    console.error(`[bot] Error handling answer in chat ${chat_id}:`, err);
    await ctx.reply(t('bot.error', lng));
  }
});

// ─── Boot ─────────────────────────────────────────────────────────────────────

bot.catch((err) => {
  console.error('[bot] Unhandled error:', err);
});

async function main() {
  await bot.start({
    onStart: (info) => {
      console.log(`[bot] Started as @${info.username}`);
    },
  });
}

main().catch(console.error);
