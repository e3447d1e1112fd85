import Anthropic from '@anthropic-ai/sdk';
import { parse_oracle_response } from './parser.js';
import { build_system_prompt, build_user_prompt } from './prompts.js';
import type { ProfileSummary } from './profile.js';
import type { CoverageSummary } from './repetition.js';
import type {
  Difficulty,
  InterviewPhase,
  OracleDecision,
  Strategy,
  TacticBundle,
  TimeStatus,
  TimeStrategyHint,
  TopicArea,
} from './types.js';

export interface OracleContext {
  locale: string;
  candidate: ProfileSummary;
  priority_concerns: string[];
  phase: InterviewPhase;
  questions_in_phase: number;
  total_questions: number;
  elapsed_minutes: number;
  remaining_minutes: number;
  time_status: TimeStatus;
  time_strategy: TimeStrategyHint;
  difficulty: Difficulty;
  strategy: Strategy;
  tactics: TacticBundle;
  interview_plan: TopicArea[];
  covered_areas: TopicArea[];
  coverage: CoverageSummary;
  suggested_topics: TopicArea[];
  recent_exchanges: Array<{ question: string; answer: string; topic: TopicArea }>;
  // Both null on the opening turn
  last_question: string | null;
  last_answer: string | null;
}

export type OracleErrorKind = 'call_failed' | 'malformed';

export class OracleError extends Error {
  constructor(readonly kind: OracleErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OracleError';
  }
}

export type OracleResult =
  | { ok: true; decision: OracleDecision }
  | { ok: false; error: OracleError };

/** Maps an interview context to the next structured decision. */
export interface Oracle {
  decide(context: OracleContext): Promise<OracleResult>;
}

export interface AnthropicOracleOptions {
  model: string;
  max_tokens: number;
}

export class AnthropicOracle implements Oracle {
  constructor(
    private readonly client: Anthropic,
    private readonly options: AnthropicOracleOptions,
  ) {}

  async decide(context: OracleContext): Promise<OracleResult> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.options.model,
        max_tokens: this.options.max_tokens,
        system: build_system_prompt(context),
        messages: [{ role: 'user', content: build_user_prompt(context) }],
      });
    } catch (err) {
      return { ok: false, error: new OracleError('call_failed', 'Oracle request failed', { cause: err }) };
    }

    const raw = (response.content ?? [])
      .filter((b): b is Anthropic.TextBlock => b.type === 'text')
      .map(b => b.text)
      .join('');

    const decision = parse_oracle_response(raw);
    if (!decision) {
      return {
        ok: false,
        error: new OracleError('malformed', `Unparseable oracle response: ${raw.slice(0, 300)}`),
      };
    }
    return { ok: true, decision };
  }
}
