import { t } from './i18n/index.js';
import { round1 } from './profile.js';
import { PHASES, is_topic_area } from './types.js';
import type { ProfileSummary } from './profile.js';
import type { InterviewPolicy } from './policy.js';
import type {
  ConfidenceLevel,
  Difficulty,
  InterviewPhase,
  LearningIndicator,
  PhaseSnapshot,
  Recommendation,
  Strategy,
  TopicArea,
} from './types.js';

export interface PhaseBreakdown {
  questions_asked: number;
  avg_score: number;
  difficulties_used: Difficulty[];
  duration_minutes: number;
}

export interface AdaptiveInsights {
  final_difficulty: Difficulty;
  final_strategy: Strategy;
  phase_transitions: number;
  hr_concerns_addressed: boolean;
  total_interview_minutes: number;
}

export interface InterviewReport {
  candidate_name: string;
  vacancy_title: string;
  final_level: ProfileSummary['technical_level'];
  communication_style: ProfileSummary['communication_style'];
  final_scores: {
    technical_avg: number;
    communication_avg: number;
    confidence_avg: number;
    overall_score: number;
  };
  strengths_confirmed: string[];
  weaknesses_identified: string[];
  red_flags: string[];
  learning_potential: LearningIndicator[];
  hr_validation: ProfileSummary['hr_validation'];
  interview_stats: {
    total_questions: number;
    areas_covered: TopicArea[];
    performance_by_area: Partial<Record<TopicArea, number>>;
  };
  phase_breakdown: Partial<Record<InterviewPhase, PhaseBreakdown>>;
  interview_flow: PhaseSnapshot[];
  adaptive_insights: AdaptiveInsights;
  final_recommendation: {
    decision: Recommendation;
    decision_text: string;
    confidence_level: ConfidenceLevel;
  };
}

export interface ReportInput {
  profile: ProfileSummary;
  phase_breakdown: Partial<Record<InterviewPhase, PhaseBreakdown>>;
  phase_history: readonly PhaseSnapshot[];
  insights: AdaptiveInsights;
}

/** Average of technical and communication, rescaled from 0-10 to 0-100. */
export function overall_score(avg_technical: number, avg_communication: number): number {
  return Math.round(((avg_technical + avg_communication) / 2) * 10);
}

// Ordered: the first tier whose score bar and red-flag cap both hold wins
export function recommend(
  score: number,
  red_flag_count: number,
  thresholds: InterviewPolicy['report'],
): Recommendation {
  if (score >= thresholds.strong_hire && red_flag_count === 0) return 'strong_hire';
  if (score >= thresholds.hire && red_flag_count <= 1) return 'hire';
  if (score >= thresholds.conditional_hire && red_flag_count <= 2) return 'conditional_hire';
  return 'no_hire';
}

export function confidence_for(red_flag_count: number): ConfidenceLevel {
  if (red_flag_count === 0) return 'high';
  if (red_flag_count <= 2) return 'medium';
  return 'low';
}

export function synthesize_report(
  input: ReportInput,
  thresholds: InterviewPolicy['report'],
  lng: string,
): InterviewReport {
  const { profile } = input;
  const score = overall_score(profile.averages.technical, profile.averages.communication);
  const red_flag_count = profile.red_flags.length;
  const decision = recommend(score, red_flag_count, thresholds);

  return {
    candidate_name: profile.name,
    vacancy_title: profile.vacancy_title,
    final_level: profile.technical_level,
    communication_style: profile.communication_style,
    final_scores: {
      technical_avg: round1(profile.averages.technical),
      communication_avg: round1(profile.averages.communication),
      confidence_avg: round1(profile.averages.confidence),
      overall_score: score,
    },
    strengths_confirmed: profile.strengths,
    weaknesses_identified: profile.weaknesses,
    red_flags: profile.red_flags,
    learning_potential: profile.learning_indicators,
    hr_validation: profile.hr_validation,
    interview_stats: {
      total_questions: profile.total_answers,
      areas_covered: Object.keys(profile.area_performance).filter(is_topic_area),
      performance_by_area: profile.area_performance,
    },
    phase_breakdown: input.phase_breakdown,
    interview_flow: [...input.phase_history],
    adaptive_insights: input.insights,
    final_recommendation: {
      decision,
      decision_text: t(`report.decision.${decision}`, lng),
      confidence_level: confidence_for(red_flag_count),
    },
  };
}

function bullets(items: readonly string[], lng: string): string {
  if (items.length === 0) return t('report.none', lng);
  return items.map(text => t('report.bullet', lng, { text })).join('\n');
}

/** Plain-text rendering for the admin chat. */
export function format_report_message(report: InterviewReport, lng: string): string {
  const scores = report.final_scores;

  const phase_lines: string[] = [];
  for (const phase of PHASES) {
    const entry = report.phase_breakdown[phase];
    if (!entry) continue;
    phase_lines.push(t('report.phase_item', lng, {
      phase,
      questions: entry.questions_asked,
      avg: entry.avg_score,
      minutes: entry.duration_minutes,
    }));
  }

  return [
    t('report.header', lng),
    '',
    t('report.candidate', lng, { name: report.candidate_name, vacancy: report.vacancy_title }),
    t('report.decision_line', lng, {
      decision: report.final_recommendation.decision_text,
      confidence: t(`report.confidence.${report.final_recommendation.confidence_level}`, lng),
    }),
    t('report.score_line', lng, { score: scores.overall_score }),
    t('report.averages_line', lng, {
      technical: scores.technical_avg,
      communication: scores.communication_avg,
      confidence: scores.confidence_avg,
    }),
    t('report.level_line', lng, { level: report.final_level }),
    '',
    t('report.phases_header', lng),
    phase_lines.length > 0 ? phase_lines.join('\n') : t('report.none', lng),
    '',
    t('report.strengths_header', lng),
    bullets(report.strengths_confirmed, lng),
    '',
    t('report.weaknesses_header', lng),
    bullets(report.weaknesses_identified, lng),
    '',
    t('report.red_flags_header', lng),
    bullets(report.red_flags, lng),
    '',
    t('report.learning_header', lng),
    bullets(report.learning_potential.map(indicator => t(`report.learning.${indicator}`, lng)), lng),
  ].join('\n');
}
