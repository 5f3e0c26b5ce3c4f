/**
 * Policy Filters
 * Pure predicates over finished agendas, applied before the per-day cap
 */

import type { DateTime } from 'luxon';
import type { Agenda, AgendaFilter, SchedulingPolicy, TimeOfDayWindow } from '../types/index.js';
import { windowOnDay } from '../utils/datetime.js';

/**
 * First start and last end of an agenda
 */
export function agendaSpan(agenda: Agenda): { start: DateTime; end: DateTime } | null {
  const first = agenda.legs[0];
  const last = agenda.legs[agenda.legs.length - 1];
  if (!first || !last) return null;
  return { start: first.start, end: last.end };
}

/**
 * True iff the agenda ends by the window start or begins at or after the window end
 */
export function respectsLunchAvoidance(
  agenda: Agenda,
  lunchWindow: TimeOfDayWindow,
  timezone: string
): boolean {
  const span = agendaSpan(agenda);
  if (!span) return true;

  const lunch = windowOnDay(span.start, lunchWindow, timezone);
  return span.end <= lunch.start || span.start >= lunch.end;
}

/**
 * True iff the whole agenda lies within the working hours of its day
 */
export function withinWorkingHours(
  agenda: Agenda,
  workingHours: TimeOfDayWindow,
  timezone: string
): boolean {
  const span = agendaSpan(agenda);
  if (!span) return true;

  const hours = windowOnDay(span.start, workingHours, timezone);
  return span.start >= hours.start && span.end <= hours.end;
}

/**
 * All filters must pass
 */
export function composeFilters(filters: readonly AgendaFilter[]): AgendaFilter {
  return agenda => filters.every(filter => filter(agenda));
}

/**
 * Filters implied by a policy
 */
export function buildPolicyFilters(policy: SchedulingPolicy): AgendaFilter[] {
  const filters: AgendaFilter[] = [];

  if (policy.lunchAvoidance) {
    filters.push(agenda => respectsLunchAvoidance(agenda, policy.lunchWindow, policy.timezone));
  }

  const workingHours = policy.workingHours;
  if (workingHours) {
    filters.push(agenda => withinWorkingHours(agenda, workingHours, policy.timezone));
  }

  return filters;
}
