import { describe, it, expect } from 'vitest';
import { confidence_for, format_report_message, overall_score, recommend, synthesize_report } from '../src/report.js';
import type { ReportInput } from '../src/report.js';
import type { ProfileSummary } from '../src/profile.js';
import { DEFAULT_POLICY } from '../src/policy.js';

const thresholds = DEFAULT_POLICY.report;

function makeSummary(overrides: Partial<ProfileSummary> = {}): ProfileSummary {
  return {
    name: 'Ada',
    vacancy_title: 'Backend Developer',
    industry: 'fintech',
    technical_level: 'senior',
    hr_level_hint: 'unknown',
    communication_style: 'confident',
    total_answers: 4,
    averages: { technical: 8.4, communication: 8, confidence: 7 },
    strengths: ['clear reasoning'],
    weaknesses: [],
    red_flags: [],
    learning_indicators: [],
    failed_topics: [],
    strong_topics: ['system_design'],
    area_performance: { system_design: 8.5, technical_basics: 8.3 },
    topic_question_counts: { system_design: 2, technical_basics: 2 },
    priority_concerns: [],
    hr_validation: { strengths_validated: [], concerns_confirmed: [] },
    ...overrides,
  };
}

function makeInput(overrides: Partial<ProfileSummary> = {}): ReportInput {
  return {
    profile: makeSummary(overrides),
    phase_breakdown: {
      exploration: { questions_asked: 2, avg_score: 8.5, difficulties_used: ['medium'], duration_minutes: 5 },
    },
    phase_history: [{ phase: 'exploration', duration_ms: 300_000, questions_asked: 2 }],
    insights: {
      final_difficulty: 'hard',
      final_strategy: 'deepen',
      phase_transitions: 1,
      hr_concerns_addressed: true,
      total_interview_minutes: 12.5,
    },
  };
}

describe('overall_score', () => {
  it('should rescale the mean of technical and communication to 0-100', () => {
    expect(overall_score(8.4, 8)).toBe(82);
    expect(overall_score(6, 7)).toBe(65);
    expect(overall_score(0, 0)).toBe(0);
  });
});

describe('recommend', () => {
  it('should strongly recommend 82 without red flags', () => {
    expect(recommend(82, 0, thresholds)).toBe('strong_hire');
    expect(confidence_for(0)).toBe('high');
  });

  it('should not recommend 82 with three red flags', () => {
    expect(recommend(82, 3, thresholds)).toBe('no_hire');
    expect(confidence_for(3)).toBe('low');
  });

  it('should walk down the tiers by score and red flags', () => {
    expect(recommend(80, 1, thresholds)).toBe('hire');
    expect(recommend(65, 1, thresholds)).toBe('hire');
    expect(recommend(70, 2, thresholds)).toBe('conditional_hire');
    expect(recommend(50, 0, thresholds)).toBe('conditional_hire');
    expect(recommend(49, 0, thresholds)).toBe('no_hire');
    expect(confidence_for(2)).toBe('medium');
  });
});

describe('synthesize_report', () => {
  it('should assemble scores, recommendation and history', () => {
    const report = synthesize_report(makeInput(), thresholds, 'en-US');

    expect(report.final_scores).toEqual({
      technical_avg: 8.4,
      communication_avg: 8,
      confidence_avg: 7,
      overall_score: 82,
    });
    expect(report.final_recommendation).toEqual({
      decision: 'strong_hire',
      decision_text: 'Strongly recommend hiring',
      confidence_level: 'high',
    });
    expect(report.interview_stats.areas_covered).toEqual(['system_design', 'technical_basics']);
    expect(report.interview_flow).toEqual([{ phase: 'exploration', duration_ms: 300_000, questions_asked: 2 }]);
    expect(report.adaptive_insights.final_strategy).toBe('deepen');
  });

  it('should localise the decision text', () => {
    const report = synthesize_report(makeInput({ red_flags: ['a', 'b', 'c'] }), thresholds, 'zh-CN');
    expect(report.final_recommendation.decision).toBe('no_hire');
    expect(report.final_recommendation.decision_text).toBe('不推荐录用');
  });
});

describe('format_report_message', () => {
  it('should render the report for the admin chat', () => {
    const report = synthesize_report(makeInput({ red_flags: ['contradictory claims'] }), thresholds, 'en-US');
    const lines = format_report_message(report, 'en-US').split('\n');

    expect(lines[0]).toBe('📋 Interview report');
    expect(lines).toContain('Candidate: Ada (Backend Developer)');
    expect(lines).toContain('Decision: Recommend hiring (confidence: medium)');
    expect(lines).toContain('Overall score: 82/100');
    expect(lines).toContain('Technical 8.4 · Communication 8 · Confidence 7');
    expect(lines).toContain('• exploration: 2 questions, avg 8.5, 5 min');
    expect(lines).toContain('• clear reasoning');
    expect(lines).toContain('• contradictory claims');

    const weaknesses = lines.indexOf('Weaknesses:');
    expect(lines[weaknesses + 1]).toBe('—');
    expect(lines.slice(-2)).toEqual(['Learning potential:', '—']);
  });

  it('should carry the learning potential into the report', () => {
    const report = synthesize_report(makeInput({ learning_indicators: ['curious', 'growth_mindset'] }), thresholds, 'zh-CN');
    expect(report.learning_potential).toEqual(['curious', 'growth_mindset']);

    const lines = format_report_message(report, 'zh-CN').split('\n');
    expect(lines.slice(-3)).toEqual(['学习潜力：', '• 求知欲强', '• 成长型思维']);
  });
});
