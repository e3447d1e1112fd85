import { describe, it, expect } from 'vitest';
import { RepetitionGuard, extract_keywords } from '../src/repetition.js';
import { DEFAULT_POLICY } from '../src/policy.js';

const policy = DEFAULT_POLICY.repetition;

describe('extract_keywords', () => {
  it('should drop short words and stop words', () => {
    expect(extract_keywords('How would you design a scalable caching layer?', policy))
      .toEqual(new Set(['design', 'scalable', 'caching', 'layer']));
  });

  it('should lowercase and ignore digits and punctuation', () => {
    expect(extract_keywords('PostgreSQL 16: VACUUM, indexes & WAL', policy))
      .toEqual(new Set(['postgresql', 'vacuum', 'indexes']));
  });

  it('should read the configured script', () => {
    const cyrillic = { ...policy, keyword_script: 'Cyrillic' };
    expect(extract_keywords('Расскажите о вашем опыте с базами данных', cyrillic))
      .toEqual(new Set(['опыте', 'базами', 'данных']));
  });

  it('should find no keywords in text of another script', () => {
    expect(extract_keywords('请介绍一下你设计过的缓存系统', policy).size).toBe(0);
  });
});

describe('RepetitionGuard', () => {
  it('should record immutable questions with timestamps', () => {
    const guard = new RepetitionGuard(policy, () => 42);
    const record = guard.record('Explain database indexing', 'technical_basics', 'exploration', 'medium');

    expect(record.asked_at).toBe(42);
    expect(record.keywords).toEqual(new Set(['database', 'indexing']));
    expect(Object.isFrozen(record)).toBe(true);
    expect(guard.times_asked('technical_basics')).toBe(1);
  });

  it('should flag a topic asked three times regardless of wording', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('First question', 'algorithms', 'exploration', 'easy');
    guard.record('Second question', 'algorithms', 'exploration', 'easy');
    expect(guard.is_repetitive('Something entirely new', 'algorithms')).toBe(false);

    guard.record('Third question', 'algorithms', 'validation', 'medium');
    expect(guard.is_repetitive('Something entirely new', 'algorithms')).toBe(true);
  });

  it('should flag a question that mostly overlaps a recent one', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('Explain database indexing strategies for large tables', 'technical_basics', 'exploration', 'medium');

    expect(guard.is_repetitive('What database indexing strategies do you prefer?', 'system_design')).toBe(true);
  });

  it('should not flag partial overlap', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('Explain database indexing strategies for large tables', 'technical_basics', 'exploration', 'medium');

    // 1 shared keyword
    expect(guard.is_repetitive('How do you handle database migrations safely?', 'system_design')).toBe(false);
    // 2 shared keywords out of 5
    expect(guard.is_repetitive('Which database indexing tools and metrics matter?', 'system_design')).toBe(false);
  });

  it('should only compare against the recent window', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('Explain database indexing strategies for large tables', 'technical_basics', 'exploration', 'medium');
    guard.record('Tell me about your team', 'soft_skills', 'exploration', 'easy');
    guard.record('Design a rate limiter', 'system_design', 'validation', 'medium');
    guard.record('Sort a linked list', 'algorithms', 'validation', 'medium');

    expect(guard.is_repetitive('What database indexing strategies do you prefer?', 'general')).toBe(false);
  });

  it('should not flag a question without keywords', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('Why?', 'general', 'exploration', 'easy');
    expect(guard.is_repetitive('Why?', 'general')).toBe(false);
  });

  describe('alternatives', () => {
    it('should order eligible topics by how often they were asked', () => {
      const guard = new RepetitionGuard(policy);
      guard.record('q1', 'algorithms', 'exploration', 'easy');
      guard.record('q2', 'algorithms', 'exploration', 'easy');
      guard.record('q3', 'system_design', 'exploration', 'easy');

      const candidates = ['algorithms', 'system_design', 'soft_skills', 'technical_basics', 'soft_skills'] as const;
      expect(guard.alternatives('technical_basics', candidates)).toEqual(['soft_skills', 'system_design']);
    });

    it('should keep candidate order on ties', () => {
      const guard = new RepetitionGuard(policy);
      expect(guard.alternatives('general', ['problem_solving', 'algorithms', 'soft_skills']))
        .toEqual(['problem_solving', 'algorithms', 'soft_skills']);
    });

    it('should exclude failed topics', () => {
      const guard = new RepetitionGuard(policy);
      guard.mark_failed('algorithms');
      expect(guard.alternatives('general', ['algorithms', 'soft_skills'])).toEqual(['soft_skills']);
    });
  });

  it('should summarise coverage', () => {
    const guard = new RepetitionGuard(policy);
    guard.record('q1', 'algorithms', 'exploration', 'easy');
    guard.record('q2', 'soft_skills', 'exploration', 'easy');
    guard.record('q3', 'algorithms', 'validation', 'medium');
    guard.record('q4', 'system_design', 'validation', 'hard');
    guard.mark_failed('algorithms');

    expect(guard.coverage()).toEqual({
      total_questions: 4,
      topic_counts: { algorithms: 2, soft_skills: 1, system_design: 1 },
      failed_topics: ['algorithms'],
      recent_topics: ['soft_skills', 'algorithms', 'system_design'],
    });
  });
});
