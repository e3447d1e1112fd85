import { round1 } from './profile.js';
import type { OracleContext } from './oracle.js';
import type { InterviewPhase } from './types.js';

const LANGUAGE_NAMES: Record<string, string> = {
  'en-US': 'English',
  'zh-CN': 'Simplified Chinese',
};

const PHASE_GOALS: Record<InterviewPhase, string> = {
  exploration: 'Map the candidate\'s background and estimate their level with broad, open questions.',
  validation: 'Verify the claimed experience with concrete, project-specific questions.',
  stress_test: 'Probe the limits of their knowledge with hard, constraint-driven scenarios.',
  soft_skills: 'Assess teamwork, communication and conflict handling through real situations.',
  wrap_up: 'Close politely and invite the candidate\'s own questions about the role.',
  finished: 'The interview is over; thank the candidate.',
};

const RESPONSE_SCHEMA = `{
  "interview_status": "continuing | finished",
  "current_phase": "exploration | validation | stress_test | soft_skills | wrap_up | finished",
  "previous_answer_analysis": {
    "technical_score": 0-10,
    "communication_score": 0-10,
    "confidence_score": 0-10,
    "depth_score": 0-10,
    "practical_experience": 0-10,
    "red_flags": ["..."],
    "strengths_shown": ["..."],
    "weaknesses_shown": ["..."],
    "analysis_notes": "..."
  },
  "adaptation_needed": "none | clarify | simplify | deepen | switch_topic",
  "time_management": "continue | accelerate | wrap_up | critical | finish",
  "interview_plan": ["topic", "..."],
  "current_area": "topic",
  "next_question": "...",
  "question_area": "general | general_background | technical_basics | practical_experience | problem_solving | algorithms | system_design | soft_skills",
  "question_difficulty": "easy | medium | hard",
  "interviewer_notes": "..."
}`;

export function truncate_answer(answer: string, cap: number): string {
  return answer.length > cap ? `${answer.slice(0, cap)}...` : answer;
}

function list_or(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.join(', ') : empty;
}

export function build_system_prompt(context: OracleContext): string {
  const language = LANGUAGE_NAMES[context.locale] ?? 'English';

  return `You are an experienced technical interviewer running a structured, time-boxed interview for the position "${context.candidate.vacancy_title}".

Guidelines:
1. Ask exactly one question at a time; keep it short enough to answer aloud.
2. Score the previous answer honestly on a 0-10 scale; leave previous_answer_analysis empty when there is no previous answer.
3. Respect the requested difficulty and tactics; never repeat a question already asked.
4. Set adaptation_needed to something other than "none" only when you need one more turn in this phase (for example a clarifying follow-up).
5. Conduct the interview in ${language}; keep field names and enum values in English.

Reply with a single JSON object, no other text:
${RESPONSE_SCHEMA}`;
}

export function build_user_prompt(context: OracleContext): string {
  const { candidate, tactics } = context;

  const exchanges = context.recent_exchanges.length > 0
    ? context.recent_exchanges
      .map((e, i) => `${i + 1}. [${e.topic}] Q: ${e.question}\n   A: ${e.answer}`)
      .join('\n')
    : 'None yet';

  const lines = [
    `Candidate: ${candidate.name}`,
    `Vacancy: ${candidate.vacancy_title}${candidate.industry ? ` (${candidate.industry})` : ''}`,
    `Estimated level: ${candidate.technical_level}` +
      (candidate.hr_level_hint !== 'unknown' ? ` (recruiter estimate: ${candidate.hr_level_hint})` : ''),
    `Communication style: ${candidate.communication_style}`,
    `Average scores: technical ${round1(candidate.averages.technical)}, communication ${round1(candidate.averages.communication)}, confidence ${round1(candidate.averages.confidence)}`,
    `Confirmed strengths: ${list_or(candidate.strengths, 'none yet')}`,
    `Confirmed weaknesses: ${list_or(candidate.weaknesses, 'none yet')}`,
    `Red flags: ${list_or(candidate.red_flags, 'none')}`,
    `Learning indicators: ${list_or(candidate.learning_indicators, 'none yet')}`,
    `Recruiter concerns still to check: ${list_or(context.priority_concerns, 'none')}`,
    '',
    `Phase: ${context.phase} (${context.questions_in_phase} questions so far). Goal: ${PHASE_GOALS[context.phase]}`,
    `Time: ${Math.floor(context.elapsed_minutes)} min elapsed, ${Math.floor(context.remaining_minutes)} min left, status ${context.time_status}, pace ${context.time_strategy.band}`,
    `Questions answered: ${context.total_questions}`,
    `Interview plan: ${list_or(context.interview_plan, 'open')}`,
    `Covered areas: ${list_or(context.covered_areas, 'none yet')}`,
    `Topics to avoid: ${list_or(context.coverage.failed_topics, 'none')}`,
    `Least covered topics: ${list_or(context.suggested_topics, 'any')}`,
    '',
    `Requested difficulty: ${context.difficulty}`,
    `Tactics (${context.strategy}): ${tactics.approach} ${tactics.question_style}`,
    '',
    'Recent exchanges:',
    exchanges,
  ];

  if (context.last_question !== null && context.last_answer !== null) {
    lines.push('', `Last question: ${context.last_question}`, `Candidate's answer: ${context.last_answer}`);
    lines.push('', 'Analyse the last answer and choose the next question.');
  } else {
    lines.push('', 'This is the start of the interview. Draft the plan and ask the first question.');
  }

  return lines.join('\n');
}
