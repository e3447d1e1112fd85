import { describe, it, expect } from 'vitest';
import { build_system_prompt, build_user_prompt, truncate_answer } from '../src/prompts.js';
import type { OracleContext } from '../src/oracle.js';
import { CandidateProfiler } from '../src/profile.js';
import { DEFAULT_POLICY } from '../src/policy.js';
import { tactics_for } from '../src/strategy.js';

function makeContext(overrides: Partial<OracleContext> = {}): OracleContext {
  const profiler = new CandidateProfiler(
    {
      candidate_name: 'Ada',
      vacancy_title: 'Backend Developer',
      industry: 'fintech',
      hr_analysis: { key_strengths: [], critical_concerns: ['testing'], overall_score: 90 },
    },
    DEFAULT_POLICY,
  );
  return {
    locale: 'en-US',
    candidate: profiler.summary(),
    priority_concerns: profiler.priority_concerns(),
    phase: 'validation',
    questions_in_phase: 1,
    total_questions: 3,
    elapsed_minutes: 9.6,
    remaining_minutes: 15.4,
    time_status: 'on_track',
    time_strategy: { ratio: 0.77, band: 'accelerate' },
    difficulty: 'hard',
    strategy: 'deepen',
    tactics: tactics_for('deepen'),
    interview_plan: ['system_design', 'algorithms'],
    covered_areas: ['system_design'],
    coverage: { total_questions: 3, topic_counts: { system_design: 3 }, failed_topics: ['algorithms'], recent_topics: [] },
    suggested_topics: ['soft_skills'],
    recent_exchanges: [],
    last_question: null,
    last_answer: null,
    ...overrides,
  };
}

describe('truncate_answer', () => {
  it('should keep short answers as they are', () => {
    expect(truncate_answer('short', 10)).toBe('short');
    expect(truncate_answer('0123456789', 10)).toBe('0123456789');
  });

  it('should cut long answers and mark the cut', () => {
    expect(truncate_answer('0123456789abc', 10)).toBe('0123456789...');
  });
});

describe('build_system_prompt', () => {
  it('should name the vacancy and the interview language', () => {
    const prompt = build_system_prompt(makeContext({ locale: 'zh-CN' }));
    expect(prompt).toContain('for the position "Backend Developer"');
    expect(prompt).toContain('Conduct the interview in Simplified Chinese');
  });

  it('should default to English for unknown locales', () => {
    expect(build_system_prompt(makeContext({ locale: 'xx-XX' }))).toContain('Conduct the interview in English');
  });
});

describe('build_user_prompt', () => {
  it('should describe the interview state', () => {
    const lines = build_user_prompt(makeContext()).split('\n');

    expect(lines).toContain('Candidate: Ada');
    expect(lines).toContain('Vacancy: Backend Developer (fintech)');
    expect(lines).toContain('Estimated level: senior (recruiter estimate: senior)');
    expect(lines).toContain('Learning indicators: none yet');
    expect(lines).toContain('Recruiter concerns still to check: testing');
    expect(lines).toContain('Time: 9 min elapsed, 15 min left, status on_track, pace accelerate');
    expect(lines).toContain('Topics to avoid: algorithms');
    expect(lines).toContain('Requested difficulty: hard');
    expect(lines.at(-1)).toBe('This is the start of the interview. Draft the plan and ask the first question.');
  });

  it('should list the learning indicators seen so far', () => {
    const context = makeContext();
    const prompt = build_user_prompt({
      ...context,
      candidate: { ...context.candidate, learning_indicators: ['curious', 'systematic'] },
    });
    expect(prompt.split('\n')).toContain('Learning indicators: curious, systematic');
  });

  it('should include the recent exchanges and the last answer', () => {
    const prompt = build_user_prompt(makeContext({
      recent_exchanges: [{ question: 'What is a shard?', answer: 'A partition.', topic: 'system_design' }],
      last_question: 'How do you rebalance shards?',
      last_answer: 'Consistent hashing.',
    }));
    const lines = prompt.split('\n');

    expect(lines).toContain('1. [system_design] Q: What is a shard?');
    expect(lines).toContain('   A: A partition.');
    expect(lines).toContain('Last question: How do you rebalance shards?');
    expect(lines).toContain("Candidate's answer: Consistent hashing.");
    expect(lines.at(-1)).toBe('Analyse the last answer and choose the next question.');
  });
});
