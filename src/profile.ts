import { createRequire } from 'module';
import type { InterviewPolicy } from './policy.js';
import { LEARNING_INDICATORS } from './types.js';
import type {
  AnswerAnalysis,
  CandidateIntake,
  CommunicationStyle,
  LearningIndicator,
  TechnicalLevel,
  TopicArea,
} from './types.js';

const _require = createRequire(import.meta.url);
const learning_keywords: Record<LearningIndicator, string[]> = _require('./data/learning_indicators.json');

/** Incremental arithmetic mean kept as (sum, count). */
export class RunningMean {
  private sum = 0;
  private n = 0;

  push(x: number): void {
    this.sum += x;
    this.n += 1;
  }

  get count(): number {
    return this.n;
  }

  get value(): number {
    return this.n === 0 ? 0 : this.sum / this.n;
  }
}

export function round1(x: number): number {
  return Math.round(x * 10) / 10;
}

export interface ProfileSummary {
  name: string;
  vacancy_title: string;
  industry: string;
  technical_level: TechnicalLevel;
  hr_level_hint: TechnicalLevel;
  communication_style: CommunicationStyle;
  total_answers: number;
  averages: {
    technical: number;
    communication: number;
    confidence: number;
  };
  strengths: string[];
  weaknesses: string[];
  red_flags: string[];
  learning_indicators: LearningIndicator[];
  failed_topics: TopicArea[];
  strong_topics: TopicArea[];
  area_performance: Partial<Record<TopicArea, number>>;
  topic_question_counts: Partial<Record<TopicArea, number>>;
  priority_concerns: string[];
  hr_validation: {
    strengths_validated: string[];
    concerns_confirmed: string[];
  };
}

function level_from_hr_score(score: number | null): TechnicalLevel {
  if (score === null) return 'unknown';
  if (score >= 85) return 'senior';
  if (score >= 70) return 'middle';
  if (score >= 50) return 'junior';
  return 'unknown';
}

function push_unique(list: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!list.includes(item)) list.push(item);
  }
}

// Case-insensitive "needle is mentioned inside any of haystack"
function echoed_in(needle: string, haystack: readonly string[]): boolean {
  const lowered = needle.toLowerCase();
  return haystack.some(entry => entry.toLowerCase().includes(lowered));
}

export class CandidateProfiler {
  name: string;
  readonly vacancy_title: string;
  readonly industry: string;

  technical_level: TechnicalLevel = 'unknown';
  communication_style: CommunicationStyle = 'unknown';
  readonly hr_level_hint: TechnicalLevel;

  readonly hr_strengths: readonly string[];
  readonly hr_concerns: readonly string[];

  readonly confirmed_strengths: string[] = [];
  readonly confirmed_weaknesses: string[] = [];
  readonly red_flags: string[] = [];
  readonly learning_indicators: LearningIndicator[] = [];

  readonly area_scores = new Map<TopicArea, number[]>();
  readonly failed_topics = new Set<TopicArea>();
  readonly strong_topics = new Set<TopicArea>();
  readonly topic_question_counts = new Map<TopicArea, number>();

  private readonly technical = new RunningMean();
  private readonly communication = new RunningMean();
  private readonly confidence = new RunningMean();
  private readonly failure_streaks = new Map<TopicArea, number>();

  constructor(intake: CandidateIntake, private readonly policy: InterviewPolicy) {
    this.name = intake.candidate_name;
    this.vacancy_title = intake.vacancy_title;
    this.industry = intake.industry;
    this.hr_strengths = intake.hr_analysis?.key_strengths ?? [];
    this.hr_concerns = intake.hr_analysis?.critical_concerns ?? [];
    this.hr_level_hint = level_from_hr_score(intake.hr_analysis?.overall_score ?? null);
    // Answers overwrite the recruiter's estimate once there are enough of them
    this.technical_level = this.hr_level_hint;
  }

  get total_answers(): number {
    return this.technical.count;
  }

  get avg_technical(): number {
    return this.technical.value;
  }

  get avg_communication(): number {
    return this.communication.value;
  }

  get avg_confidence(): number {
    return this.confidence.value;
  }

  record_answer(topic: TopicArea, analysis: AnswerAnalysis | null | undefined): void {
    if (!analysis) return;

    this.technical.push(analysis.technical_score);
    this.communication.push(analysis.communication_score);
    this.confidence.push(analysis.confidence_score);

    this.update_area(topic, analysis.technical_score);
    this.update_technical_level();
    this.update_communication_style(analysis);

    push_unique(this.confirmed_strengths, analysis.strengths_shown);
    push_unique(this.confirmed_weaknesses, analysis.weaknesses_shown);
    push_unique(this.red_flags, analysis.red_flags);
    this.update_learning_indicators(analysis.analysis_notes);

    const tech = analysis.technical_score;
    if (tech > 0 && tech <= this.policy.adaptation.weak_answer_threshold - 1) {
      push_unique(this.confirmed_weaknesses, [`weak knowledge of ${topic} (score ${tech}/10)`]);
    }

    this.topic_question_counts.set(topic, (this.topic_question_counts.get(topic) ?? 0) + 1);
  }

  // A technical score of 0 means "not scored": it counts toward the overall
  // average but stays out of per-topic history and failure tracking.
  private update_area(topic: TopicArea, score: number): void {
    if (score <= 0) return;

    const history = this.area_scores.get(topic) ?? [];
    history.push(score);
    this.area_scores.set(topic, history);

    const { failure_threshold, success_threshold, failures_to_fail_topic } = this.policy.profile;
    const streak = this.failure_streaks.get(topic) ?? 0;

    if (score <= failure_threshold) {
      const next = streak + 1;
      this.failure_streaks.set(topic, next);
      if (next >= failures_to_fail_topic) this.failed_topics.add(topic);
    } else if (score >= success_threshold) {
      this.failure_streaks.set(topic, 0);
      this.strong_topics.add(topic);
    } else {
      this.failure_streaks.set(topic, Math.max(0, streak - 1));
    }
  }

  private update_technical_level(): void {
    const { min_answers_for_level, senior_min_score, middle_min_score } = this.policy.profile;
    if (this.total_answers < min_answers_for_level) return;

    const avg = this.avg_technical;
    if (avg >= senior_min_score) this.technical_level = 'senior';
    else if (avg >= middle_min_score) this.technical_level = 'middle';
    else this.technical_level = 'junior';
  }

  private update_communication_style(analysis: AnswerAnalysis): void {
    const comm = analysis.communication_score;
    const conf = analysis.confidence_score;

    if (conf >= 8 && comm >= 7) this.communication_style = 'confident';
    else if (conf <= 4) this.communication_style = 'uncertain';
    else if (comm >= 8) this.communication_style = 'concise';
    else this.communication_style = 'developing';
  }

  private update_learning_indicators(notes: string): void {
    const lowered = notes.toLowerCase();
    if (!lowered) return;
    for (const indicator of LEARNING_INDICATORS) {
      if (this.learning_indicators.includes(indicator)) continue;
      if (learning_keywords[indicator].some(keyword => lowered.includes(keyword))) {
        this.learning_indicators.push(indicator);
      }
    }
  }

  /** HR concerns not yet answered by a confirmed strength. */
  priority_concerns(): string[] {
    return this.hr_concerns
      .filter(concern => !echoed_in(concern, this.confirmed_strengths))
      .slice(0, this.policy.profile.max_priority_concerns);
  }

  summary(): ProfileSummary {
    const area_performance: Partial<Record<TopicArea, number>> = {};
    for (const [area, scores] of this.area_scores) {
      if (scores.length > 0) {
        area_performance[area] = round1(scores.reduce((a, b) => a + b, 0) / scores.length);
      }
    }
    const topic_question_counts: Partial<Record<TopicArea, number>> = {};
    for (const [area, count] of this.topic_question_counts) topic_question_counts[area] = count;

    return {
      name: this.name,
      vacancy_title: this.vacancy_title,
      industry: this.industry,
      technical_level: this.technical_level,
      hr_level_hint: this.hr_level_hint,
      communication_style: this.communication_style,
      total_answers: this.total_answers,
      averages: {
        technical: this.avg_technical,
        communication: this.avg_communication,
        confidence: this.avg_confidence,
      },
      strengths: [...this.confirmed_strengths],
      weaknesses: [...this.confirmed_weaknesses],
      red_flags: [...this.red_flags],
      learning_indicators: [...this.learning_indicators],
      failed_topics: [...this.failed_topics],
      strong_topics: [...this.strong_topics],
      area_performance,
      topic_question_counts,
      priority_concerns: this.priority_concerns(),
      hr_validation: {
        strengths_validated: this.hr_strengths.filter(s => echoed_in(s, this.confirmed_strengths)),
        concerns_confirmed: this.hr_concerns.filter(c => echoed_in(c, this.confirmed_weaknesses)),
      },
    };
  }
}
