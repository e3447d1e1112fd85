import { is_difficulty, is_phase, is_record, is_topic_area } from './types.js';
import type {
  AdaptationNeeded,
  AnswerAnalysis,
  CandidateIntake,
  OracleDecision,
  TimeManagement,
  TopicArea,
} from './types.js';

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;

const ADAPTATIONS: readonly AdaptationNeeded[] = ['none', 'clarify', 'simplify', 'deepen', 'switch_topic'];
const TIME_MANAGEMENT: readonly TimeManagement[] = ['continue', 'accelerate', 'wrap_up', 'critical', 'finish'];

/**
 * Pulls a JSON object out of free text: a fenced block first, then the span
 * from the first `{` to the last `}`. Returns null when neither decodes.
 */
export function extract_json_payload(text: string): Record<string, unknown> | null {
  const fenced = text.match(FENCED_JSON);
  if (fenced) {
    const parsed = try_parse(fenced[1]);
    if (parsed) return parsed;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return try_parse(text.slice(start, end + 1));
}

function try_parse(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return is_record(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function score(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) return 0;
  return Math.min(10, Math.max(0, n));
}

function string_list(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function parse_analysis(value: unknown): AnswerAnalysis | null {
  if (!is_record(value) || Object.keys(value).length === 0) return null;

  return {
    technical_score: score(value.technical_score),
    communication_score: score(value.communication_score),
    confidence_score: score(value.confidence_score),
    depth_score: score(value.depth_score),
    practical_experience: score(value.practical_experience),
    red_flags: string_list(value.red_flags),
    strengths_shown: string_list(value.strengths_shown),
    weaknesses_shown: string_list(value.weaknesses_shown),
    analysis_notes: text(value.analysis_notes),
  };
}

function adaptation(value: unknown): AdaptationNeeded {
  if (value === undefined || value === null || value === false || value === '') return 'none';
  const known = ADAPTATIONS.find(a => a === value);
  if (known) return known;
  // Any other truthy signal still asks to hold the phase
  return 'clarify';
}

function time_management(value: unknown): TimeManagement {
  return TIME_MANAGEMENT.find(t => t === value) ?? 'continue';
}

function topic_list(value: unknown): TopicArea[] {
  return string_list(value).filter(is_topic_area);
}

/** Normalises a decoded oracle document; null when it carries no next question. */
export function normalize_decision(raw: Record<string, unknown>): OracleDecision | null {
  const next_question = text(raw.next_question);
  if (!next_question) return null;

  const status = raw.interview_status;

  return {
    interview_status: status === 'finished' || status === 'completed' ? 'finished' : 'continuing',
    current_phase: is_phase(raw.current_phase) ? raw.current_phase : null,
    next_question,
    question_area: is_topic_area(raw.question_area) ? raw.question_area : 'general',
    question_difficulty: is_difficulty(raw.question_difficulty) ? raw.question_difficulty : null,
    previous_answer_analysis: parse_analysis(raw.previous_answer_analysis),
    adaptation_needed: adaptation(raw.adaptation_needed),
    time_management: time_management(raw.time_management),
    interview_plan: topic_list(raw.interview_plan),
    current_area: is_topic_area(raw.current_area) ? raw.current_area : null,
    interviewer_notes: text(raw.interviewer_notes),
  };
}

export function parse_oracle_response(response: string): OracleDecision | null {
  const payload = extract_json_payload(response);
  return payload ? normalize_decision(payload) : null;
}

/**
 * Parses the `/interview` command argument: `Name; Vacancy; Industry`.
 * Industry may be omitted; name and vacancy may not.
 */
export function parse_interview_command(argument: string): CandidateIntake | null {
  const [name = '', vacancy = '', ...rest] = argument.split(';').map(part => part.trim());
  if (!name || !vacancy) return null;

  return {
    candidate_name: name,
    vacancy_title: vacancy,
    industry: rest.join('; ').trim(),
    hr_analysis: null,
  };
}
