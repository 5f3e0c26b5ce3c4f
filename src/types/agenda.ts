/**
 * Agenda data types
 * Outputs of the agenda search
 */

import type { DateTime } from 'luxon';
import type { PersonId } from './availability.js';

/**
 * One interviewer's segment within an agenda
 */
export interface AgendaLeg {
  person: PersonId;
  start: DateTime;
  end: DateTime;
}

/**
 * An ordered sequence of legs on one day
 */
export interface Agenda {
  /** ISO date in the reference timezone */
  day: string;
  legs: AgendaLeg[];
}

/**
 * Why an agenda survived the per-day cap
 */
export type SelectionReason = 'earliest' | 'latest' | 'filler' | 'first-found';

export interface SelectedAgenda extends Agenda {
  reason: SelectionReason;
}

/**
 * Predicate over a finished agenda
 */
export type AgendaFilter = (agenda: Agenda) => boolean;

/**
 * Results for one calendar day
 */
export interface DayAgendas {
  day: string;
  agendas: SelectedAgenda[];
  /** Distinct agendas the search produced before filtering */
  feasibleCount: number;
  /** Agendas removed by policy filters */
  filteredCount: number;
  /** False when first-found stopped before walking every ordering and start */
  exhaustive: boolean;
}

/**
 * Results across all days, in day order
 */
export interface AgendaSearchResult {
  days: DayAgendas[];
  agendas: SelectedAgenda[];
}

/**
 * Kinds of problems a proposed agenda can have
 */
export type AgendaViolationType =
  | 'NOT_COVERED'
  | 'GAP_TOO_LARGE'
  | 'OVERLAP'
  | 'DAY_SPAN'
  | 'LUNCH'
  | 'WORKING_HOURS'
  | 'DURATION_MISMATCH'
  | 'DUPLICATE_PERSON';

export interface AgendaViolation {
  type: AgendaViolationType;
  /** Index of the offending leg, when the problem is tied to one */
  legIndex?: number;
  message: string;
}

export interface AgendaValidationResult {
  valid: boolean;
  violations: AgendaViolation[];
}
