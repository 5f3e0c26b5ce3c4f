// Shared fixtures for the scheduler tests
import { DateTime } from 'luxon';
import type {
  Agenda,
  AgendaLeg,
  AvailabilityBlock,
  SchedulingPolicy,
  SchedulingPolicyOverrides,
} from '../src/types/index.js';

export const DAY = '2025-03-04';

/**
 * Local instant on DAY (or another day) in the given zone
 */
export function at(time: string, day: string = DAY, zone: string = 'UTC'): DateTime {
  return DateTime.fromISO(`${day}T${time}`, { zone });
}

export function block(
  person: string,
  start: string,
  end: string,
  day: string = DAY,
  zone: string = 'UTC'
): AvailabilityBlock {
  return { person, start: at(start, day, zone), end: at(end, day, zone) };
}

export function leg(person: string, start: string, end: string, day: string = DAY): AgendaLeg {
  return { person, start: at(start, day), end: at(end, day) };
}

export function agenda(...legs: AgendaLeg[]): Agenda {
  return { day: DAY, legs };
}

export function makePolicy(overrides: SchedulingPolicyOverrides = {}): SchedulingPolicy {
  return {
    timezone: 'UTC',
    gridQuantumMinutes: 15,
    allowedGapMinutes: 0,
    maxAgendasPerDay: 10,
    lunchAvoidance: false,
    lunchWindow: { start: '12:00', end: '12:30' },
    selectionStrategy: 'spread',
    candidateStarts: 'block-starts',
    ...overrides,
  };
}

/**
 * "person HH:mm-HH:mm" per leg, in UTC, for compact assertions
 */
export function describeLegs(value: Agenda): string[] {
  return value.legs.map(
    l => `${l.person} ${l.start.toUTC().toFormat('HH:mm')}-${l.end.toUTC().toFormat('HH:mm')}`
  );
}
