import { readFileSync } from 'fs';
import { is_record } from './types.js';

// Every threshold the engine consults. Deployments override parts of it with a
// JSON file; the merged result is validated before any session starts.
export interface InterviewPolicy {
  session: {
    max_minutes: number;
    max_questions: number;
    critical_red_flags: number;
  };
  time: {
    critical_minutes: number;
    wrap_up_minutes: number;
    acceleration_minutes: number;
    phase_target_minutes: {
      exploration: number;
      validation: number;
      stress_test: number;
      soft_skills: number;
      wrap_up: number;
    };
    // Upper bounds of remaining / planned time for each band
    ratio_bands: {
      critical_shortage: number;
      accelerate: number;
      on_track: number;
    };
  };
  profile: {
    min_answers_for_level: number;
    senior_min_score: number;
    middle_min_score: number;
    failure_threshold: number;
    success_threshold: number;
    failures_to_fail_topic: number;
    max_priority_concerns: number;
  };
  adaptation: {
    weak_answer_threshold: number;
    strong_answer_threshold: number;
    very_weak_threshold: number;
    consecutive_weak_threshold: number;
    consecutive_strong_threshold: number;
  };
  phases: {
    exploration_to_validation: { min_questions: number; fallback_after_questions: number };
    validation_to_stress_test: { min_avg_score: number; min_questions: number };
    validation_to_soft_skills: { min_questions: number };
    stress_test_to_soft_skills: { min_questions: number };
    soft_skills_to_wrap_up: { min_questions: number };
  };
  repetition: {
    max_topic_frequency: number;
    alternative_frequency_ceiling: number;
    recent_window: number;
    min_shared_keywords: number;
    overlap_ratio: number;
    min_keyword_length: number;
    // Unicode script name, e.g. "Latin" or "Cyrillic". One script per deployment:
    // text in any other script yields no keywords, so only the topic frequency
    // rule detects repeats there. Scripts written without spaces (Han) are not
    // tokenised into words.
    keyword_script: string;
  };
  context: {
    recent_exchanges: number;
    answer_char_cap: number;
  };
  plan: {
    max_areas: number;
    max_concerns: number;
  };
  report: {
    strong_hire: number;
    hire: number;
    conditional_hire: number;
  };
}

export const DEFAULT_POLICY: InterviewPolicy = {
  session: {
    max_minutes: 25,
    max_questions: 12,
    critical_red_flags: 8,
  },
  time: {
    critical_minutes: 3,
    wrap_up_minutes: 7,
    acceleration_minutes: 12,
    phase_target_minutes: {
      exploration: 5,
      validation: 8,
      stress_test: 6,
      soft_skills: 5,
      wrap_up: 1,
    },
    ratio_bands: {
      critical_shortage: 0.5,
      accelerate: 0.8,
      on_track: 1.5,
    },
  },
  profile: {
    min_answers_for_level: 3,
    senior_min_score: 7.0,
    middle_min_score: 4.0,
    failure_threshold: 3,
    success_threshold: 8,
    failures_to_fail_topic: 2,
    max_priority_concerns: 3,
  },
  adaptation: {
    weak_answer_threshold: 4.0,
    strong_answer_threshold: 8.0,
    very_weak_threshold: 2.0,
    consecutive_weak_threshold: 2,
    consecutive_strong_threshold: 2,
  },
  phases: {
    exploration_to_validation: { min_questions: 2, fallback_after_questions: 4 },
    validation_to_stress_test: { min_avg_score: 6.0, min_questions: 2 },
    validation_to_soft_skills: { min_questions: 3 },
    stress_test_to_soft_skills: { min_questions: 1 },
    soft_skills_to_wrap_up: { min_questions: 2 },
  },
  repetition: {
    max_topic_frequency: 3,
    alternative_frequency_ceiling: 2,
    recent_window: 3,
    min_shared_keywords: 2,
    overlap_ratio: 0.6,
    min_keyword_length: 4,
    keyword_script: 'Latin',
  },
  context: {
    recent_exchanges: 3,
    answer_char_cap: 500,
  },
  plan: {
    max_areas: 4,
    max_concerns: 3,
  },
  report: {
    strong_hire: 80,
    hire: 65,
    conditional_hire: 50,
  },
};

function merge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!is_record(base) || !is_record(override)) return override;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = merge(base[key], value);
  }
  return merged;
}

/** Walk `candidate` against the shape of `reference` and list every mismatch. */
function collect_problems(reference: unknown, candidate: unknown, path: string, problems: string[]): void {
  if (is_record(reference)) {
    if (!is_record(candidate)) {
      problems.push(`${path || '<root>'}: expected an object`);
      return;
    }
    for (const key of Object.keys(reference)) {
      const child = path ? `${path}.${key}` : key;
      if (!(key in candidate)) {
        problems.push(`${child}: missing`);
        continue;
      }
      collect_problems(reference[key], candidate[key], child, problems);
    }
    for (const key of Object.keys(candidate)) {
      if (!(key in reference)) problems.push(`${path ? `${path}.${key}` : key}: unknown key`);
    }
    return;
  }

  if (typeof reference === 'number') {
    if (typeof candidate !== 'number' || !Number.isFinite(candidate)) {
      problems.push(`${path}: expected a finite number`);
    }
    return;
  }

  if (typeof reference === 'string' && (typeof candidate !== 'string' || candidate.length === 0)) {
    problems.push(`${path}: expected a non-empty string`);
  }
}

function supports_script(script: string): boolean {
  try {
    new RegExp(`\\p{Script=${script}}`, 'u');
    return true;
  } catch {
    return false;
  }
}

function ordering_problems(policy: InterviewPolicy): string[] {
  const problems: string[] = [];
  const { time, adaptation, report, profile } = policy;

  if (!(time.critical_minutes < time.wrap_up_minutes && time.wrap_up_minutes < time.acceleration_minutes)) {
    problems.push('time: expected critical_minutes < wrap_up_minutes < acceleration_minutes');
  }
  const bands = time.ratio_bands;
  if (!(bands.critical_shortage < bands.accelerate && bands.accelerate < bands.on_track)) {
    problems.push('time.ratio_bands: expected critical_shortage < accelerate < on_track');
  }
  if (!(adaptation.very_weak_threshold <= adaptation.weak_answer_threshold &&
        adaptation.weak_answer_threshold < adaptation.strong_answer_threshold)) {
    problems.push('adaptation: expected very_weak <= weak < strong');
  }
  if (!(profile.middle_min_score <= profile.senior_min_score)) {
    problems.push('profile: expected middle_min_score <= senior_min_score');
  }
  if (!(profile.failure_threshold < profile.success_threshold)) {
    problems.push('profile: expected failure_threshold < success_threshold');
  }
  if (!(report.conditional_hire <= report.hire && report.hire <= report.strong_hire)) {
    problems.push('report: expected conditional_hire <= hire <= strong_hire');
  }
  if (!supports_script(policy.repetition.keyword_script)) {
    problems.push(`repetition.keyword_script: unknown Unicode script "${policy.repetition.keyword_script}"`);
  }
  return problems;
}

function has_policy_shape(candidate: unknown, problems: string[]): candidate is InterviewPolicy {
  collect_problems(DEFAULT_POLICY, candidate, '', problems);
  return problems.length === 0;
}

/** Throws when the policy is incomplete or inconsistent. */
export function assert_policy(candidate: unknown): asserts candidate is InterviewPolicy {
  const problems: string[] = [];
  if (has_policy_shape(candidate, problems)) {
    problems.push(...ordering_problems(candidate));
  }
  if (problems.length > 0) {
    throw new Error(`Invalid interview policy:\n- ${problems.join('\n- ')}`);
  }
}

/** Merge partial overrides over the defaults and validate the result. */
export function load_policy(overrides?: unknown): InterviewPolicy {
  const merged = merge(DEFAULT_POLICY, overrides);
  assert_policy(merged);
  return merged;
}

export function read_policy_file(path: string): InterviewPolicy {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new Error(`Cannot read interview policy from ${path}`, { cause: err });
  }
  return load_policy(parsed);
}
