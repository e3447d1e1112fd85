export const PHASES = [
  'exploration',
  'validation',
  'stress_test',
  'soft_skills',
  'wrap_up',
  'finished',
] as const;

export type InterviewPhase = (typeof PHASES)[number];

export const TOPIC_AREAS = [
  'general',
  'general_background',
  'technical_basics',
  'practical_experience',
  'problem_solving',
  'algorithms',
  'system_design',
  'soft_skills',
] as const;

export type TopicArea = (typeof TOPIC_AREAS)[number];

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const LEARNING_INDICATORS = ['curious', 'adaptive', 'systematic', 'growth_mindset'] as const;
export type LearningIndicator = (typeof LEARNING_INDICATORS)[number];

export type TechnicalLevel = 'unknown' | 'junior' | 'middle' | 'senior';

export type CommunicationStyle =
  | 'unknown'
  | 'confident'
  | 'uncertain'
  | 'concise'
  | 'developing';

export type TimeStatus =
  | 'on_track'
  | 'needs_acceleration'
  | 'needs_wrap_up'
  | 'critical';

export type TimeStrategyBand =
  | 'critical_shortage'
  | 'accelerate'
  | 'on_track'
  | 'ample_time';

export type Strategy =
  | 'standard'
  | 'simplify'
  | 'alternative_angle'
  | 'deepen'
  | 'switch_topic';

export type AdaptationNeeded = 'none' | 'clarify' | 'simplify' | 'deepen' | 'switch_topic';

export type TimeManagement = 'continue' | 'accelerate' | 'wrap_up' | 'critical' | 'finish';

export type Recommendation =
  | 'strong_hire'
  | 'hire'
  | 'conditional_hire'
  | 'no_hire';

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export function is_phase(value: unknown): value is InterviewPhase {
  return typeof value === 'string' && PHASES.some(phase => phase === value);
}

export function is_topic_area(value: unknown): value is TopicArea {
  return typeof value === 'string' && TOPIC_AREAS.some(area => area === value);
}

export function is_difficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && DIFFICULTIES.some(level => level === value);
}

// Prior recruiter analysis the session starts from
export interface HrAnalysis {
  key_strengths: string[];
  critical_concerns: string[];
  overall_score: number | null;
}

export interface CandidateIntake {
  candidate_name: string;
  vacancy_title: string;
  industry: string;
  hr_analysis: HrAnalysis | null;
}

export interface AnswerAnalysis {
  technical_score: number;
  communication_score: number;
  confidence_score: number;
  depth_score: number;
  practical_experience: number;
  red_flags: string[];
  strengths_shown: string[];
  weaknesses_shown: string[];
  analysis_notes: string;
}

export interface OracleDecision {
  interview_status: 'continuing' | 'finished';
  // null when the oracle named no phase or an unknown one
  current_phase: InterviewPhase | null;
  next_question: string;
  question_area: TopicArea;
  question_difficulty: Difficulty | null;
  previous_answer_analysis: AnswerAnalysis | null;
  adaptation_needed: AdaptationNeeded;
  time_management: TimeManagement;
  interview_plan: TopicArea[];
  current_area: TopicArea | null;
  interviewer_notes: string;
}

export interface QuestionRecord {
  readonly text: string;
  readonly topic: TopicArea;
  readonly keywords: ReadonlySet<string>;
  readonly phase: InterviewPhase;
  readonly difficulty: Difficulty;
  readonly asked_at: number;
}

export interface QaPair {
  question: string;
  answer: string;
  topic: TopicArea;
  phase: InterviewPhase;
  analysis: AnswerAnalysis | null;
  timestamp: number;
}

export interface PhaseSnapshot {
  readonly phase: InterviewPhase;
  readonly duration_ms: number;
  readonly questions_asked: number;
}

export interface PhaseTransition {
  from: InterviewPhase;
  to: InterviewPhase;
  reason: 'time_critical' | 'recommended' | 'oracle_finished' | 'oracle_time';
}

export interface StrategyTransition {
  from: Strategy;
  to: Strategy;
}

export interface TacticBundle {
  target_difficulty: Difficulty;
  approach: string;
  question_style: string;
}

export interface TimeStrategyHint {
  ratio: number;
  band: TimeStrategyBand;
}

export interface TurnResult {
  next_question: string;
  question_area: TopicArea;
  question_difficulty: Difficulty;
  phase: InterviewPhase;
  phase_transition: PhaseTransition | null;
  strategy_transition: StrategyTransition | null;
  time_status: TimeStatus;
  time_strategy: TimeStrategyHint;
  used_fallback: boolean;
  // Set when the proposed question was swapped for a less-covered topic
  redirected_from: TopicArea | null;
}

export function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
