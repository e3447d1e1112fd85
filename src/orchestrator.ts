import { t } from './i18n/index.js';
import { create_interview_plan } from './plan.js';
import { assert_policy } from './policy.js';
import type { InterviewPolicy } from './policy.js';
import { CandidateProfiler, round1 } from './profile.js';
import { truncate_answer } from './prompts.js';
import { RepetitionGuard } from './repetition.js';
import { synthesize_report } from './report.js';
import type { InterviewReport, PhaseBreakdown } from './report.js';
import { DifficultyAdaptor, StrategyAdaptor } from './strategy.js';
import { PhaseMachine } from './phase_machine.js';
import type { PhaseSignals } from './phase_machine.js';
import { TimeBudget, monotonic_clock } from './time_budget.js';
import type { Clock } from './time_budget.js';
import { PHASES, TOPIC_AREAS } from './types.js';
import type {
  CandidateIntake,
  Difficulty,
  InterviewPhase,
  OracleDecision,
  PhaseTransition,
  QaPair,
  QuestionRecord,
  StrategyTransition,
  TimeStatus,
  TopicArea,
  TurnResult,
} from './types.js';
import { OracleError } from './oracle.js';
import type { Oracle, OracleContext, OracleResult } from './oracle.js';

const MS_PER_MINUTE = 60_000;
const SUGGESTED_TOPICS = 3;

export interface OrchestratorOptions {
  policy: InterviewPolicy;
  locale: string;
  // Monotonic source for budgets and phase durations
  now?: Clock;
  // Timestamps on records and exports
  wall_clock?: () => number;
}

export interface InterviewStatus {
  phase: InterviewPhase;
  total_questions: number;
  elapsed_minutes: number;
  remaining_minutes: number;
  time_status: TimeStatus;
}

export interface InterviewExport {
  readonly report: InterviewReport;
  readonly transcript: readonly QaPair[];
  readonly questions: readonly QuestionRecord[];
  readonly exported_at: number;
}

/**
 * Drives one interview session: feeds every answered question to the oracle,
 * folds the decision into the profile and adaptors, advances the phase machine
 * and emits the next question.
 *
 * Not reentrant: callers must await `process_answer` before the next call.
 */
export class InterviewOrchestrator {
  readonly profiler: CandidateProfiler;
  readonly time: TimeBudget;
  readonly guard: RepetitionGuard;
  readonly strategy: StrategyAdaptor;
  readonly difficulty: DifficultyAdaptor;
  readonly phases: PhaseMachine;

  private readonly policy: InterviewPolicy;
  private readonly locale: string;
  private readonly wall_clock: () => number;

  private plan: TopicArea[];
  private readonly covered = new Set<TopicArea>();
  private readonly qa_history: QaPair[] = [];
  private total_questions = 0;
  private last_decision: OracleDecision | null = null;
  private red_flag_deferred_at: number | null = null;
  private started = false;

  constructor(
    intake: CandidateIntake,
    private readonly oracle: Oracle,
    options: OrchestratorOptions,
  ) {
    assert_policy(options.policy);
    this.policy = options.policy;
    this.locale = options.locale;
    this.wall_clock = options.wall_clock ?? Date.now;
    const now = options.now ?? monotonic_clock;

    this.profiler = new CandidateProfiler(intake, this.policy);
    this.time = new TimeBudget(this.policy, now);
    this.guard = new RepetitionGuard(this.policy.repetition, this.wall_clock);
    this.strategy = new StrategyAdaptor(this.policy.adaptation);
    this.difficulty = new DifficultyAdaptor(this.policy.adaptation);
    this.phases = new PhaseMachine(this.policy.phases, now);

    this.plan = create_interview_plan(
      intake.vacancy_title,
      intake.industry,
      intake.hr_analysis?.critical_concerns ?? [],
      this.policy.plan,
    );
  }

  get interview_plan(): readonly TopicArea[] {
    return this.plan;
  }

  get covered_areas(): TopicArea[] {
    return [...this.covered];
  }

  get transcript(): readonly QaPair[] {
    return this.qa_history;
  }

  get questions_answered(): number {
    return this.total_questions;
  }

  status(): InterviewStatus {
    return {
      phase: this.phases.current,
      total_questions: this.total_questions,
      elapsed_minutes: this.time.elapsed_minutes(),
      remaining_minutes: this.time.remaining_minutes(),
      time_status: this.time.status(),
    };
  }

  /** Asks the oracle for the opening question; falls back to the canned one. */
  async start(): Promise<TurnResult> {
    if (this.started) throw new Error('Interview already started');
    this.started = true;
    console.log(`[orchestrator] Starting interview with ${this.profiler.name}, plan: ${this.plan.join(', ')}`);

    const result = await this.consult(this.build_context(null, null));
    if (!result.ok) {
      console.warn(`[orchestrator] Oracle ${result.error.kind} on opening question: ${result.error.message}`);
      return this.emit_fallback(null);
    }

    const decision = result.decision;
    this.note_decision(decision);
    this.last_decision = decision;
    this.adopt_plan(decision);
    return this.emit_question(decision, null, null);
  }

  async process_answer(question: string, answer: string): Promise<TurnResult> {
    if (this.phases.is_finished) throw new Error('Interview is already finished');

    const asked = this.guard.questions.at(-1);
    const topic: TopicArea = asked?.topic ?? this.last_decision?.question_area ?? 'general';
    const asked_difficulty: Difficulty = asked?.difficulty ?? this.difficulty.current;

    const qa: QaPair = {
      question,
      answer,
      topic,
      phase: this.phases.current,
      analysis: null,
      timestamp: this.wall_clock(),
    };
    const context = this.build_context(question, answer);
    this.qa_history.push(qa);
    this.total_questions += 1;

    const result = await this.consult(context);
    if (!result.ok) {
      console.warn(`[orchestrator] Oracle ${result.error.kind}, using fallback question: ${result.error.message}`);
      this.phases.record_question(asked_difficulty, null);
      const transition = this.phases.evaluate(this.signals({
        adaptation_needed: 'none',
        interview_status: this.phases.current === 'wrap_up' ? 'finished' : 'continuing',
        time_management: 'continue',
      }));
      return this.emit_fallback(transition);
    }

    const decision = result.decision;
    this.note_decision(decision);
    const analysis = decision.previous_answer_analysis;
    qa.analysis = analysis;

    const was_failed = this.profiler.failed_topics.has(topic);
    this.profiler.record_answer(topic, analysis);

    let strategy_transition: StrategyTransition | null = null;
    const score = analysis?.technical_score ?? 0;
    if (score > 0) {
      strategy_transition = this.strategy.observe(topic, score);
      this.difficulty.observe(score, this.profiler.avg_technical);
    }

    if (!was_failed && this.profiler.failed_topics.has(topic)) {
      console.log(`[orchestrator] Topic ${topic} failed, switching away`);
      this.guard.mark_failed(topic);
      strategy_transition = this.strategy.switch_topic() ?? strategy_transition;
    }

    this.adopt_plan(decision);
    if (decision.current_area) this.covered.add(decision.current_area);

    this.phases.record_question(asked_difficulty, score > 0 ? score : null);
    this.last_decision = decision;
    const phase_transition = this.phases.evaluate(this.signals(decision));

    return this.emit_question(decision, phase_transition, strategy_transition);
  }

  /**
   * True once the interview should stop. A critical red-flag count is held for
   * exactly one turn while the oracle still wants to follow up.
   */
  should_end(max_minutes: number, max_questions: number): boolean {
    if (this.phases.is_finished) return true;
    if (this.time.elapsed_minutes() > max_minutes) return true;
    if (this.total_questions >= max_questions) return true;

    if (this.profiler.red_flags.length < this.policy.session.critical_red_flags) return false;

    if (this.red_flag_deferred_at === null &&
        this.last_decision !== null &&
        this.last_decision.adaptation_needed !== 'none') {
      this.red_flag_deferred_at = this.total_questions;
      console.log(`[orchestrator] Critical red flags reached, deferring end by one turn`);
      return false;
    }
    return this.red_flag_deferred_at !== this.total_questions;
  }

  final_report(): InterviewReport {
    const phase_breakdown: Partial<Record<InterviewPhase, PhaseBreakdown>> = {};
    for (const phase of PHASES) {
      const stats = this.phases.stats(phase);
      if (stats.questions_asked === 0) continue;
      phase_breakdown[phase] = {
        questions_asked: stats.questions_asked,
        avg_score: round1(stats.avg_score),
        difficulties_used: stats.difficulties_used,
        duration_minutes: round1(this.phases.duration_ms(phase) / MS_PER_MINUTE),
      };
    }

    return synthesize_report(
      {
        profile: this.profiler.summary(),
        phase_breakdown,
        phase_history: this.phases.history,
        insights: {
          final_difficulty: this.difficulty.current,
          final_strategy: this.strategy.current,
          phase_transitions: this.phases.history.length,
          hr_concerns_addressed: this.profiler.priority_concerns().length === 0,
          total_interview_minutes: round1(this.time.elapsed_minutes()),
        },
      },
      this.policy.report,
      this.locale,
    );
  }

  /** Read-only snapshot for an external persistence collaborator. */
  export_report(): InterviewExport {
    return Object.freeze({
      report: this.final_report(),
      transcript: Object.freeze(this.qa_history.map(qa => Object.freeze({ ...qa }))),
      questions: Object.freeze([...this.guard.questions]),
      exported_at: this.wall_clock(),
    });
  }

  // A throwing oracle is treated like a failed call
  private async consult(context: OracleContext): Promise<OracleResult> {
    try {
      return await this.oracle.decide(context);
    } catch (err) {
      return { ok: false, error: new OracleError('call_failed', 'Oracle request failed', { cause: err }) };
    }
  }

  private note_decision(decision: OracleDecision): void {
    if (decision.current_phase !== null && decision.current_phase !== this.phases.current) {
      console.log(`[orchestrator] Oracle reports phase ${decision.current_phase}, machine is in ${this.phases.current}`);
    }
    if (decision.interviewer_notes) {
      console.log(`[orchestrator] Interviewer notes: ${decision.interviewer_notes}`);
    }
  }

  private signals(decision: PhaseSignals['decision']): PhaseSignals {
    return {
      time_status: this.time.status(),
      technical_level: this.profiler.technical_level,
      avg_technical: this.profiler.avg_technical,
      decision,
    };
  }

  private adopt_plan(decision: OracleDecision): void {
    const proposed = decision.interview_plan;
    if (proposed.length === 0) return;
    if (proposed.length === this.plan.length && proposed.every((area, i) => area === this.plan[i])) return;
    this.plan = [...proposed];
  }

  private build_context(last_question: string | null, last_answer: string | null): OracleContext {
    const { recent_exchanges, answer_char_cap } = this.policy.context;
    const current_topic = this.guard.questions.at(-1)?.topic ?? 'general';

    return {
      locale: this.locale,
      candidate: this.profiler.summary(),
      priority_concerns: this.profiler.priority_concerns(),
      phase: this.phases.current,
      questions_in_phase: this.phases.questions_in_current(),
      total_questions: this.total_questions,
      elapsed_minutes: this.time.elapsed_minutes(),
      remaining_minutes: this.time.remaining_minutes(),
      time_status: this.time.status(),
      time_strategy: this.time.phase_strategy(this.phases.current, this.phases.history),
      difficulty: this.difficulty.current,
      strategy: this.strategy.current,
      tactics: this.strategy.tactics(),
      interview_plan: [...this.plan],
      covered_areas: this.covered_areas,
      coverage: this.guard.coverage(),
      suggested_topics: this.guard
        .alternatives(current_topic, [...this.plan, ...TOPIC_AREAS])
        .slice(0, SUGGESTED_TOPICS),
      recent_exchanges: this.qa_history.slice(-recent_exchanges).map(qa => ({
        question: qa.question,
        answer: truncate_answer(qa.answer, answer_char_cap),
        topic: qa.topic,
      })),
      last_question,
      last_answer: last_answer === null ? null : truncate_answer(last_answer, answer_char_cap),
    };
  }

  private emit_question(
    decision: OracleDecision,
    phase_transition: PhaseTransition | null,
    strategy_transition: StrategyTransition | null,
  ): TurnResult {
    const phase = this.phases.current;
    const difficulty = decision.question_difficulty ?? this.difficulty.current;

    if (this.phases.is_finished) {
      return this.turn(this.closing_line(), decision.question_area, difficulty, phase_transition, strategy_transition, false, null);
    }

    let question = decision.next_question;
    let area = decision.question_area;
    let redirected_from: TopicArea | null = null;

    if (this.guard.is_repetitive(question, area)) {
      const [alternative] = this.guard.alternatives(area, [...this.plan, ...TOPIC_AREAS]);
      if (alternative) {
        console.log(`[orchestrator] Repetitive question on ${area}, redirecting to ${alternative}`);
        redirected_from = area;
        area = alternative;
        question = t(`topic_questions.${alternative}`, this.locale);
        strategy_transition = this.strategy.switch_topic() ?? strategy_transition;
      }
    }

    this.guard.record(question, area, phase, difficulty);
    return this.turn(question, area, difficulty, phase_transition, strategy_transition, false, redirected_from);
  }

  private emit_fallback(phase_transition: PhaseTransition | null): TurnResult {
    const phase = this.phases.current;
    const difficulty = this.difficulty.current;
    const area = this.guard.questions.at(-1)?.topic ?? 'general';

    if (this.phases.is_finished) {
      return this.turn(this.closing_line(), area, difficulty, phase_transition, null, true, null);
    }

    const question = t(`fallback.${phase}`, this.locale, {
      industry: this.profiler.industry || t('fallback.default_industry', this.locale),
      name: this.profiler.name,
    });
    this.guard.record(question, area, phase, difficulty);
    return this.turn(question, area, difficulty, phase_transition, null, true, null);
  }

  private closing_line(): string {
    return t('closing', this.locale, { name: this.profiler.name });
  }

  private turn(
    next_question: string,
    question_area: TopicArea,
    question_difficulty: Difficulty,
    phase_transition: PhaseTransition | null,
    strategy_transition: StrategyTransition | null,
    used_fallback: boolean,
    redirected_from: TopicArea | null,
  ): TurnResult {
    return {
      next_question,
      question_area,
      question_difficulty,
      phase: this.phases.current,
      phase_transition,
      strategy_transition,
      time_status: this.time.status(),
      time_strategy: this.time.phase_strategy(this.phases.current, this.phases.history),
      used_fallback,
      redirected_from,
    };
  }
}
