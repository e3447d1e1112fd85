import dotenv from 'dotenv';
// Load .env first (defaults/comments), then .env.local overrides with real secrets
dotenv.config();
dotenv.config({ path: '.env.local', override: true });

function require_env(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required environment variable: ${key}`);
  return val;
}

function int_env(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseInt(raw, 10);
  if (isNaN(val) || val <= 0) throw new Error(`Environment variable ${key} must be a positive integer, got "${raw}"`);
  return val;
}

export const config = {
  telegram: {
    bot_token: require_env('TELEGRAM_BOT_TOKEN'),
    // Finished interview reports go here
    admin_chat_id: require_env('TELEGRAM_ADMIN_CHAT_ID'),
  },
  anthropic: {
    api_key: require_env('ANTHROPIC_API_KEY'),
    base_url: process.env.ANTHROPIC_BASE_URL,
    model: process.env.ANTHROPIC_MODEL ?? 'claude-sonnet-4-5',
    max_tokens: 1500,
  },
  locale: process.env.INTERVIEW_LOCALE ?? 'en-US',
  interview: {
    max_minutes: int_env('INTERVIEW_MAX_MINUTES', 25),
    max_questions: int_env('INTERVIEW_MAX_QUESTIONS', 12),
    // Optional JSON file with policy overrides
    policy_path: process.env.INTERVIEW_POLICY_PATH,
  },
} as const;
