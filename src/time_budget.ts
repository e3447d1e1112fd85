import { PHASES } from './types.js';
import type { InterviewPhase, PhaseSnapshot, TimeStatus, TimeStrategyHint } from './types.js';
import type { InterviewPolicy } from './policy.js';

export type Clock = () => number;

// Monotonic milliseconds; wall-clock jumps must not shorten the interview
export const monotonic_clock: Clock = () => performance.now();

const MS_PER_MINUTE = 60_000;

export class TimeBudget {
  private readonly started_at: number;

  constructor(
    private readonly policy: InterviewPolicy,
    private readonly now: Clock = monotonic_clock,
  ) {
    this.started_at = now();
  }

  get max_minutes(): number {
    return this.policy.session.max_minutes;
  }

  elapsed_ms(): number {
    return this.now() - this.started_at;
  }

  remaining_ms(): number {
    return Math.max(0, this.max_minutes * MS_PER_MINUTE - this.elapsed_ms());
  }

  elapsed_minutes(): number {
    return this.elapsed_ms() / MS_PER_MINUTE;
  }

  remaining_minutes(): number {
    return this.remaining_ms() / MS_PER_MINUTE;
  }

  status(): TimeStatus {
    const remaining = this.remaining_minutes();
    const { critical_minutes, wrap_up_minutes, acceleration_minutes } = this.policy.time;

    if (remaining < critical_minutes) return 'critical';
    if (remaining < wrap_up_minutes) return 'needs_wrap_up';
    if (remaining < acceleration_minutes) return 'needs_acceleration';
    return 'on_track';
  }

  /**
   * Compares the time left against the planned duration of the current phase
   * and every later phase not yet completed. Advisory: it steers question depth
   * within a phase but never forces a transition.
   */
  phase_strategy(phase: InterviewPhase, completed: readonly PhaseSnapshot[]): TimeStrategyHint {
    const done = new Set(completed.map(s => s.phase));
    const targets = this.policy.time.phase_target_minutes;

    let planned = 0;
    for (const p of PHASES.slice(PHASES.indexOf(phase))) {
      if (p === 'finished' || done.has(p)) continue;
      planned += targets[p];
    }

    if (planned <= 0) return { ratio: Infinity, band: 'ample_time' };

    const ratio = this.remaining_minutes() / planned;
    const bands = this.policy.time.ratio_bands;

    if (ratio < bands.critical_shortage) return { ratio, band: 'critical_shortage' };
    if (ratio < bands.accelerate) return { ratio, band: 'accelerate' };
    if (ratio < bands.on_track) return { ratio, band: 'on_track' };
    return { ratio, band: 'ample_time' };
  }
}
