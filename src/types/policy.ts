/**
 * Scheduling policy types
 */

/**
 * How the per-day cap picks agendas
 * - spread: collect every feasible agenda, keep the earliest and the latest, fill in start order
 * - first-found: find the earliest and latest, fill in discovery order and stop at the cap
 */
export type SelectionStrategy = 'spread' | 'first-found';

/**
 * Which instants are probed as first-leg starts
 * - block-starts: instants where some availability block begins
 * - every-quantum: every grid tick inside any availability interval
 */
export type CandidateStartMode = 'block-starts' | 'every-quantum';

/**
 * A local time-of-day window (HH:mm, reference timezone)
 */
export interface TimeOfDayWindow {
  start: string;
  end: string;
}

/**
 * Full scheduling policy for one call
 */
export interface SchedulingPolicy {
  /** Reference IANA timezone used for day boundaries and local windows */
  timezone: string;
  /** Grid granularity in minutes */
  gridQuantumMinutes: number;
  /** Largest idle time allowed between consecutive legs (0 = strict back-to-back) */
  allowedGapMinutes: number;
  /** Result cap per day */
  maxAgendasPerDay: number;
  /** Whether agendas may not straddle the lunch window */
  lunchAvoidance: boolean;
  lunchWindow: TimeOfDayWindow;
  selectionStrategy: SelectionStrategy;
  candidateStarts: CandidateStartMode;
  /** When set, agendas must lie within these hours */
  workingHours?: TimeOfDayWindow;
}

/**
 * Caller-supplied policy overrides
 */
export type SchedulingPolicyOverrides = Partial<SchedulingPolicy>;

/**
 * Bounds on the factorial search
 */
export interface SearchLimits {
  /** Hard cap on panel size */
  maxInterviewers: number;
  /** Panel size above which a warning is logged */
  warnInterviewers: number;
  /** Wall-clock budget per call in milliseconds (0 disables) */
  timeoutMs: number;
}
