import { createRequire } from 'module';
import type { InterviewPolicy } from './policy.js';
import type { Difficulty, InterviewPhase, QuestionRecord, TopicArea } from './types.js';

const _require = createRequire(import.meta.url);
const stopword_lists: Record<string, string[] | undefined> = _require('./data/stopwords.json');

export interface CoverageSummary {
  total_questions: number;
  topic_counts: Partial<Record<TopicArea, number>>;
  failed_topics: TopicArea[];
  recent_topics: TopicArea[];
}

/**
 * Lowercased letter-only tokens of a single Unicode script, minus short words
 * and stop words.
 */
export function extract_keywords(text: string, policy: InterviewPolicy['repetition']): Set<string> {
  const pattern = new RegExp(`\\p{Script=${policy.keyword_script}}+`, 'gu');
  const stopwords = new Set(stopword_lists[policy.keyword_script] ?? []);
  const keywords = new Set<string>();

  for (const token of text.toLowerCase().match(pattern) ?? []) {
    if (token.length < policy.min_keyword_length) continue;
    if (stopwords.has(token)) continue;
    keywords.add(token);
  }
  return keywords;
}

export class RepetitionGuard {
  private readonly log: QuestionRecord[] = [];
  private readonly frequency = new Map<TopicArea, number>();
  private readonly failed = new Set<TopicArea>();

  constructor(
    private readonly policy: InterviewPolicy['repetition'],
    private readonly now: () => number = Date.now,
  ) {}

  get questions(): readonly QuestionRecord[] {
    return this.log;
  }

  times_asked(topic: TopicArea): number {
    return this.frequency.get(topic) ?? 0;
  }

  record(text: string, topic: TopicArea, phase: InterviewPhase, difficulty: Difficulty): QuestionRecord {
    const record: QuestionRecord = Object.freeze({
      text,
      topic,
      keywords: extract_keywords(text, this.policy),
      phase,
      difficulty,
      asked_at: this.now(),
    });
    this.log.push(record);
    this.frequency.set(topic, this.times_asked(topic) + 1);
    return record;
  }

  mark_failed(topic: TopicArea): void {
    this.failed.add(topic);
  }

  is_repetitive(text: string, topic: TopicArea): boolean {
    if (this.times_asked(topic) >= this.policy.max_topic_frequency) return true;

    const proposed = extract_keywords(text, this.policy);
    if (proposed.size === 0) return false;

    const recent = this.log.slice(-this.policy.recent_window);
    return recent.some(record => {
      let shared = 0;
      for (const word of proposed) {
        if (record.keywords.has(word)) shared += 1;
      }
      return shared >= this.policy.min_shared_keywords && shared / proposed.size > this.policy.overlap_ratio;
    });
  }

  /** Candidate topics worth switching to, least-asked first. */
  alternatives(current: TopicArea, candidates: readonly TopicArea[]): TopicArea[] {
    const seen = new Set<TopicArea>();
    const eligible: TopicArea[] = [];

    for (const topic of candidates) {
      if (topic === current || seen.has(topic)) continue;
      seen.add(topic);
      if (this.failed.has(topic)) continue;
      if (this.times_asked(topic) >= this.policy.alternative_frequency_ceiling) continue;
      eligible.push(topic);
    }
    // Array.prototype.sort is stable, so ties keep candidate order
    return eligible.sort((a, b) => this.times_asked(a) - this.times_asked(b));
  }

  coverage(): CoverageSummary {
    const topic_counts: Partial<Record<TopicArea, number>> = {};
    for (const [topic, count] of this.frequency) topic_counts[topic] = count;

    return {
      total_questions: this.log.length,
      topic_counts,
      failed_topics: [...this.failed],
      recent_topics: this.log.slice(-this.policy.recent_window).map(r => r.topic),
    };
  }
}
