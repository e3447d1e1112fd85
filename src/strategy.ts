import type { InterviewPolicy } from './policy.js';
import type { Difficulty, Strategy, StrategyTransition, TacticBundle, TopicArea } from './types.js';

const TACTICS: Record<Strategy, TacticBundle> = {
  standard: {
    target_difficulty: 'medium',
    approach: 'Follow the interview plan at a steady pace.',
    question_style: 'Open question about the current topic, one concept at a time.',
  },
  simplify: {
    target_difficulty: 'easy',
    approach: 'Step back to fundamentals and rebuild confidence.',
    question_style: 'Short, concrete question with a single expected idea.',
  },
  alternative_angle: {
    target_difficulty: 'medium',
    approach: 'Revisit the same ground from a practical angle.',
    question_style: 'Ask about a real situation the candidate has handled instead of theory.',
  },
  deepen: {
    target_difficulty: 'hard',
    approach: 'Push past the first correct answer into trade-offs and edge cases.',
    question_style: 'Follow-up that challenges the previous answer under new constraints.',
  },
  switch_topic: {
    target_difficulty: 'medium',
    approach: 'Leave the current topic and open a less covered area of the plan.',
    question_style: 'Short transition, then a fresh opening question on the new topic.',
  },
};

export function tactics_for(strategy: Strategy): TacticBundle {
  return TACTICS[strategy];
}

/** Picks the questioning approach from how the last answer landed. */
export class StrategyAdaptor {
  current: Strategy = 'standard';
  readonly failed_strategies = new Set<Strategy>();
  readonly successful_strategies = new Set<Strategy>();
  readonly successful_topics = new Set<TopicArea>();

  constructor(private readonly policy: InterviewPolicy['adaptation']) {}

  observe(topic: TopicArea, score: number): StrategyTransition | null {
    const { weak_answer_threshold, strong_answer_threshold, very_weak_threshold } = this.policy;

    if (score <= weak_answer_threshold) {
      this.failed_strategies.add(this.current);
      return this.switch_to(score <= very_weak_threshold ? 'simplify' : 'alternative_angle');
    }
    if (score >= strong_answer_threshold) {
      this.successful_strategies.add(this.current);
      this.successful_topics.add(topic);
      return this.switch_to('deepen');
    }
    return null;
  }

  switch_topic(): StrategyTransition | null {
    return this.switch_to('switch_topic');
  }

  tactics(): TacticBundle {
    return tactics_for(this.current);
  }

  private switch_to(target: Strategy): StrategyTransition | null {
    if (target === this.current) return null;
    const transition = { from: this.current, to: target };
    this.current = target;
    return transition;
  }
}

/** Difficulty implied by the running technical average alone. */
export function difficulty_from_average(avg: number, policy: InterviewPolicy['adaptation']): Difficulty {
  if (avg < policy.weak_answer_threshold) return 'easy';
  if (avg > policy.strong_answer_threshold) return 'hard';
  return 'medium';
}

export class DifficultyAdaptor {
  current: Difficulty = 'medium';
  private consecutive_weak = 0;
  private consecutive_strong = 0;

  constructor(private readonly policy: InterviewPolicy['adaptation']) {}

  get weak_streak(): number {
    return this.consecutive_weak;
  }

  get strong_streak(): number {
    return this.consecutive_strong;
  }

  // Streak rules win over the average-based recommendation
  observe(score: number, avg_technical: number): Difficulty {
    const p = this.policy;

    if (score <= p.weak_answer_threshold) {
      this.consecutive_weak += 1;
      this.consecutive_strong = 0;
    } else if (score >= p.strong_answer_threshold) {
      this.consecutive_strong += 1;
      this.consecutive_weak = 0;
    } else {
      this.consecutive_weak = 0;
      this.consecutive_strong = 0;
    }

    if (this.consecutive_weak >= p.consecutive_weak_threshold) this.current = 'easy';
    else if (this.consecutive_strong >= p.consecutive_strong_threshold) this.current = 'hard';
    else this.current = difficulty_from_average(avg_technical, p);

    return this.current;
  }
}
