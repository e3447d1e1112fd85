import { PHASES } from './types.js';
import type {
  Difficulty,
  InterviewPhase,
  OracleDecision,
  PhaseSnapshot,
  PhaseTransition,
  TechnicalLevel,
  TimeStatus,
} from './types.js';
import type { InterviewPolicy } from './policy.js';
import { RunningMean } from './profile.js';
import type { Clock } from './time_budget.js';

export interface PhaseStats {
  questions_asked: number;
  avg_score: number;
  difficulties_used: Difficulty[];
  started_at: number | null;
}

export interface ProfileSignals {
  technical_level: TechnicalLevel;
  avg_technical: number;
}

export interface PhaseSignals extends ProfileSignals {
  time_status: TimeStatus;
  decision: Pick<OracleDecision, 'adaptation_needed' | 'interview_status' | 'time_management'>;
}

interface PhaseState {
  questions_asked: number;
  score: RunningMean;
  difficulties_used: Difficulty[];
  started_at: number | null;
}

/**
 * Where the profile and the question count say the interview should be.
 * Advisory: the machine weighs it against time and oracle signals.
 */
export function recommend_phase(
  phase: InterviewPhase,
  questions_in_phase: number,
  profile: ProfileSignals,
  rules: InterviewPolicy['phases'],
): InterviewPhase {
  switch (phase) {
    case 'exploration': {
      const rule = rules.exploration_to_validation;
      if ((questions_in_phase >= rule.min_questions && profile.technical_level !== 'unknown') ||
          questions_in_phase >= rule.fallback_after_questions) {
        return 'validation';
      }
      return phase;
    }
    case 'validation': {
      const stress = rules.validation_to_stress_test;
      if (profile.avg_technical >= stress.min_avg_score && questions_in_phase >= stress.min_questions) {
        return 'stress_test';
      }
      if (questions_in_phase >= rules.validation_to_soft_skills.min_questions) return 'soft_skills';
      return phase;
    }
    case 'stress_test':
      return questions_in_phase >= rules.stress_test_to_soft_skills.min_questions ? 'soft_skills' : phase;
    case 'soft_skills':
      return questions_in_phase >= rules.soft_skills_to_wrap_up.min_questions ? 'wrap_up' : phase;
    case 'wrap_up':
      return 'finished';
    case 'finished':
      return phase;
    default: {
      const unreachable: never = phase;
      throw new Error(`Unknown phase: ${String(unreachable)}`);
    }
  }
}

export class PhaseMachine {
  private phase: InterviewPhase = 'exploration';
  private readonly states = new Map<InterviewPhase, PhaseState>();
  private readonly snapshots: PhaseSnapshot[] = [];

  constructor(
    private readonly rules: InterviewPolicy['phases'],
    private readonly now: Clock,
  ) {
    for (const phase of PHASES) {
      this.states.set(phase, { questions_asked: 0, score: new RunningMean(), difficulties_used: [], started_at: null });
    }
    this.state_of(this.phase).started_at = now();
  }

  get current(): InterviewPhase {
    return this.phase;
  }

  get history(): readonly PhaseSnapshot[] {
    return this.snapshots;
  }

  get is_finished(): boolean {
    return this.phase === 'finished';
  }

  questions_in_current(): number {
    return this.state_of(this.phase).questions_asked;
  }

  /** Counts an answered question toward the active phase. `technical_score` is null when unscored. */
  record_question(difficulty: Difficulty, technical_score: number | null): void {
    const state = this.state_of(this.phase);
    state.questions_asked += 1;
    if (technical_score !== null) state.score.push(technical_score);
    if (!state.difficulties_used.includes(difficulty)) state.difficulties_used.push(difficulty);
  }

  recommended(profile: ProfileSignals): InterviewPhase {
    return recommend_phase(this.phase, this.questions_in_current(), profile, this.rules);
  }

  /** Applies the first transition rule that fires, in precedence order. */
  evaluate(signals: PhaseSignals): PhaseTransition | null {
    if (this.phase === 'finished') return null;

    const late = this.phase === 'wrap_up';

    if (signals.time_status === 'critical' && !late) {
      return this.transition_to('wrap_up', 'time_critical');
    }

    const recommended = this.recommended(signals);
    if (recommended !== this.phase) {
      return this.transition_to(recommended, 'recommended');
    }

    // The oracle wants another turn here (e.g. a clarifying follow-up)
    if (signals.decision.adaptation_needed !== 'none') return null;

    const { interview_status, time_management } = signals.decision;
    if (interview_status === 'finished' || time_management === 'finish') {
      return this.transition_to('finished', 'oracle_finished');
    }
    if ((time_management === 'wrap_up' || time_management === 'critical') && !late) {
      return this.transition_to('wrap_up', 'oracle_time');
    }
    return null;
  }

  transition_to(to: InterviewPhase, reason: PhaseTransition['reason']): PhaseTransition {
    const from = this.phase;
    const state = this.state_of(from);
    const now = this.now();

    this.snapshots.push(Object.freeze({
      phase: from,
      duration_ms: state.started_at === null ? 0 : now - state.started_at,
      questions_asked: state.questions_asked,
    }));

    this.phase = to;
    this.state_of(to).started_at = now;
    console.log(`[phase] ${from} → ${to} (${reason})`);
    return { from, to, reason };
  }

  stats(phase: InterviewPhase): PhaseStats {
    const state = this.state_of(phase);
    return {
      questions_asked: state.questions_asked,
      avg_score: state.score.value,
      difficulties_used: [...state.difficulties_used],
      started_at: state.started_at,
    };
  }

  /** Time spent in a phase: from history once left, live while current. */
  duration_ms(phase: InterviewPhase): number {
    const snapshot = this.snapshots.find(s => s.phase === phase);
    if (snapshot) return snapshot.duration_ms;
    const started_at = this.state_of(phase).started_at;
    if (phase === this.phase && started_at !== null) return this.now() - started_at;
    return 0;
  }

  private state_of(phase: InterviewPhase): PhaseState {
    const state = this.states.get(phase);
    if (!state) throw new Error(`No stats for phase ${phase}`);
    return state;
  }
}
