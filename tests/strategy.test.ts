import { describe, it, expect } from 'vitest';
import { DifficultyAdaptor, StrategyAdaptor, difficulty_from_average, tactics_for } from '../src/strategy.js';
import { DEFAULT_POLICY } from '../src/policy.js';

const policy = DEFAULT_POLICY.adaptation;

describe('StrategyAdaptor', () => {
  it('should simplify after a very weak answer', () => {
    const adaptor = new StrategyAdaptor(policy);
    expect(adaptor.observe('algorithms', 2)).toEqual({ from: 'standard', to: 'simplify' });
    expect(adaptor.failed_strategies.has('standard')).toBe(true);
    expect(adaptor.tactics().target_difficulty).toBe('easy');
  });

  it('should try another angle after a weak answer', () => {
    const adaptor = new StrategyAdaptor(policy);
    expect(adaptor.observe('algorithms', 4)).toEqual({ from: 'standard', to: 'alternative_angle' });
  });

  it('should deepen after a strong answer and remember the topic', () => {
    const adaptor = new StrategyAdaptor(policy);
    expect(adaptor.observe('system_design', 9)).toEqual({ from: 'standard', to: 'deepen' });
    expect(adaptor.successful_strategies.has('standard')).toBe(true);
    expect(adaptor.successful_topics.has('system_design')).toBe(true);
  });

  it('should report no transition when the target is already current', () => {
    const adaptor = new StrategyAdaptor(policy);
    adaptor.observe('system_design', 9);
    expect(adaptor.observe('system_design', 8)).toBeNull();
    expect(adaptor.successful_strategies.has('deepen')).toBe(true);
    expect(adaptor.current).toBe('deepen');
  });

  it('should leave the strategy alone on a middling answer', () => {
    const adaptor = new StrategyAdaptor(policy);
    expect(adaptor.observe('general', 6)).toBeNull();
    expect(adaptor.current).toBe('standard');
  });

  it('should switch topic on demand, once', () => {
    const adaptor = new StrategyAdaptor(policy);
    expect(adaptor.switch_topic()).toEqual({ from: 'standard', to: 'switch_topic' });
    expect(adaptor.switch_topic()).toBeNull();
  });
});

describe('tactics_for', () => {
  it('should target hard questions when deepening', () => {
    expect(tactics_for('deepen').target_difficulty).toBe('hard');
    expect(tactics_for('standard').target_difficulty).toBe('medium');
  });
});

describe('difficulty_from_average', () => {
  it.each([
    [3.9, 'easy'],
    [4, 'medium'],
    [8, 'medium'],
    [8.1, 'hard'],
  ] as const)('average %d should give %s', (avg, expected) => {
    expect(difficulty_from_average(avg, policy)).toBe(expected);
  });
});

describe('DifficultyAdaptor', () => {
  it('should start at medium', () => {
    expect(new DifficultyAdaptor(policy).current).toBe('medium');
  });

  it('should drop to easy after two weak answers even with a decent average', () => {
    const adaptor = new DifficultyAdaptor(policy);
    expect(adaptor.observe(4, 6)).toBe('medium');
    expect(adaptor.observe(3, 5)).toBe('easy');
    expect(adaptor.weak_streak).toBe(2);
  });

  it('should rise to hard after two strong answers', () => {
    const adaptor = new DifficultyAdaptor(policy);
    adaptor.observe(8, 8);
    expect(adaptor.observe(9, 8)).toBe('hard');
  });

  it('should reset both streaks on a neutral answer', () => {
    const adaptor = new DifficultyAdaptor(policy);
    adaptor.observe(3, 3);
    adaptor.observe(6, 4.5);
    expect(adaptor.weak_streak).toBe(0);
    expect(adaptor.strong_streak).toBe(0);
    expect(adaptor.current).toBe('medium');
  });

  it('should reset the weak streak on a strong answer', () => {
    const adaptor = new DifficultyAdaptor(policy);
    adaptor.observe(2, 2);
    adaptor.observe(9, 5.5);
    expect(adaptor.weak_streak).toBe(0);
    expect(adaptor.strong_streak).toBe(1);
    expect(adaptor.observe(3, 4.7)).toBe('medium');
  });
});
