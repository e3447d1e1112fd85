import type { InterviewExport, InterviewOrchestrator } from './orchestrator.js';
import type { CandidateIntake, TurnResult } from './types.js';

export type OrchestratorFactory = (intake: CandidateIntake, locale: string) => InterviewOrchestrator;

export interface SessionLimits {
  max_minutes: number;
  max_questions: number;
}

interface ChatSession {
  orchestrator: InterviewOrchestrator;
  // Question the candidate is currently answering
  pending_question: string | null;
  busy: boolean;
}

export type OpenOutcome =
  | { kind: 'started'; turn: TurnResult }
  | { kind: 'already_active' };

export type AnswerOutcome =
  | { kind: 'turn'; turn: TurnResult; ended: boolean }
  | { kind: 'busy' }
  | { kind: 'no_session' };

/**
 * One interview per chat. A chat is single-flight: an answer arriving while the
 * previous one is still with the oracle is rejected as busy.
 */
export class InterviewSessions {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(
    private readonly factory: OrchestratorFactory,
    private readonly limits: SessionLimits,
  ) {}

  has(chat_id: string): boolean {
    return this.sessions.has(chat_id);
  }

  get(chat_id: string): InterviewOrchestrator | null {
    return this.sessions.get(chat_id)?.orchestrator ?? null;
  }

  get size(): number {
    return this.sessions.size;
  }

  async open(chat_id: string, intake: CandidateIntake, locale: string): Promise<OpenOutcome> {
    if (this.sessions.has(chat_id)) return { kind: 'already_active' };

    const session: ChatSession = {
      orchestrator: this.factory(intake, locale),
      pending_question: null,
      busy: true,
    };
    this.sessions.set(chat_id, session);
    console.log(`[sessions] Opened interview in chat ${chat_id} for ${intake.candidate_name}`);

    try {
      const turn = await session.orchestrator.start();
      session.pending_question = turn.next_question;
      return { kind: 'started', turn };
    } catch (err) {
      this.sessions.delete(chat_id);
      throw err;
    } finally {
      session.busy = false;
    }
  }

  async answer(chat_id: string, text: string): Promise<AnswerOutcome> {
    const session = this.sessions.get(chat_id);
    if (!session) return { kind: 'no_session' };
    if (session.busy) return { kind: 'busy' };

    session.busy = true;
    try {
      const turn = await session.orchestrator.process_answer(session.pending_question ?? '', text);
      session.pending_question = turn.next_question;
      const ended = session.orchestrator.should_end(this.limits.max_minutes, this.limits.max_questions);
      return { kind: 'turn', turn, ended };
    } finally {
      session.busy = false;
    }
  }

  /** Removes the chat's session and returns its export, or null when none was open. */
  close(chat_id: string): InterviewExport | null {
    const session = this.sessions.get(chat_id);
    if (!session) return null;
    this.sessions.delete(chat_id);
    console.log(`[sessions] Closed interview in chat ${chat_id}`);
    return session.orchestrator.export_report();
  }
}
