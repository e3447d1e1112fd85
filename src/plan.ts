import { createRequire } from 'module';
import { is_topic_area } from './types.js';
import type { TopicArea } from './types.js';
import type { InterviewPolicy } from './policy.js';

interface VacancyTable {
  default_type: string;
  type_keywords: Record<string, string[]>;
  focus_areas: Record<string, string[]>;
  concern_keywords: Record<string, string[]>;
}

const _require = createRequire(import.meta.url);
const vacancies: VacancyTable = _require('./data/vacancies.json');

function topics_of(names: readonly string[] | undefined): TopicArea[] {
  return (names ?? []).filter(is_topic_area);
}

export function determine_vacancy_type(vacancy_title: string, industry: string): string {
  const text = `${vacancy_title} ${industry}`.toLowerCase();
  for (const [type, keywords] of Object.entries(vacancies.type_keywords)) {
    if (keywords.some(keyword => text.includes(keyword))) return type;
  }
  return vacancies.default_type;
}

export function focus_areas_for(vacancy_type: string): TopicArea[] {
  return topics_of(vacancies.focus_areas[vacancy_type] ?? vacancies.focus_areas[vacancies.default_type]);
}

/** Topic a recruiter concern points at, if any keyword matches. */
export function area_for_concern(concern: string): TopicArea | null {
  const lowered = concern.toLowerCase();
  for (const [area, keywords] of Object.entries(vacancies.concern_keywords)) {
    if (is_topic_area(area) && keywords.some(keyword => lowered.includes(keyword))) return area;
  }
  return null;
}

/**
 * Initial topic plan: areas behind the top HR concerns first, then the
 * vacancy's focus areas, deduplicated and capped.
 */
export function create_interview_plan(
  vacancy_title: string,
  industry: string,
  hr_concerns: readonly string[],
  policy: InterviewPolicy['plan'],
): TopicArea[] {
  const priority: TopicArea[] = [];
  for (const concern of hr_concerns.slice(0, policy.max_concerns)) {
    const area = area_for_concern(concern);
    if (area) priority.push(area);
  }

  const plan: TopicArea[] = [];
  for (const area of [...priority, ...focus_areas_for(determine_vacancy_type(vacancy_title, industry))]) {
    if (!plan.includes(area)) plan.push(area);
  }
  return plan.slice(0, policy.max_areas);
}
