/**
 * Agenda Search Engine
 * Tries every interviewer ordering from every candidate start and greedily
 * assembles sequential agendas for a single day
 */

import type { DateTime } from 'luxon';
import type {
  Agenda,
  AgendaFilter,
  AgendaLeg,
  AvailabilityBlock,
  DayAgendas,
  DurationMap,
  PersonId,
  SchedulingPolicy,
  SelectedAgenda,
} from '../types/index.js';
import { SlotGridIndex } from './availability-index.js';
import {
  agendaSignature,
  compareAgendas,
  lastEndMillis,
  pickLatest,
  selectFirstFound,
  selectSpread,
} from './agenda-selection.js';
import { searchAbortedError } from '../utils/error.js';

/**
 * Cooperative cancellation hook, checked before every walk.
 * A day's search runs synchronously, so an abort signal raised by another
 * event (a client's cancel message) is only seen once the day finishes and
 * the partitioner yields to the event loop; the timeout trips mid-day.
 */
export interface SearchGuard {
  /** Throws a SEARCH_ABORTED error once the search must stop */
  check(): void;
}

export const unboundedGuard: SearchGuard = {
  check: () => undefined,
};

/**
 * Guard that trips on an abort signal or after a wall-clock budget
 */
export function createSearchGuard(options: {
  signal?: AbortSignal;
  timeoutMs?: number;
  now?: () => number;
}): SearchGuard {
  const now = options.now ?? Date.now;
  const deadline =
    options.timeoutMs && options.timeoutMs > 0 ? now() + options.timeoutMs : null;

  return {
    check: () => {
      if (options.signal?.aborted) {
        throw searchAbortedError('cancelled');
      }
      if (deadline !== null && now() > deadline) {
        throw searchAbortedError('timeout', { timeoutMs: options.timeoutMs });
      }
    },
  };
}

/**
 * Every ordering of the items, in lexicographic order of their positions
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
  if (items.length <= 1) {
    yield [...items];
    return;
  }
  for (let i = 0; i < items.length; i++) {
    const head = items[i];
    if (head === undefined) continue;
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) {
      yield [head, ...tail];
    }
  }
}

/**
 * Number of orderings the search will walk
 */
export function orderingCount(people: number): number {
  let count = 1;
  for (let n = 2; n <= people; n++) count *= n;
  return count;
}

/**
 * State shared by the walks of one day's search
 */
interface SearchRun {
  day: string;
  index: SlotGridIndex;
  people: PersonId[];
  durations: DurationMap;
  filter?: AgendaFilter;
  /** Signatures of every distinct agenda walked, filtered or not */
  seen: Set<string>;
  filteredCount: number;
}

/**
 * Agenda search over one day's availability
 */
export class AgendaSearchEngine {
  constructor(
    private readonly policy: SchedulingPolicy,
    private readonly guard: SearchGuard = unboundedGuard
  ) {}

  /**
   * Find, filter, deduplicate and cap the agendas for one day
   */
  search(
    day: string,
    blocks: readonly AvailabilityBlock[],
    durations: DurationMap,
    filter?: AgendaFilter
  ): DayAgendas {
    const empty: DayAgendas = { day, agendas: [], feasibleCount: 0, filteredCount: 0, exhaustive: true };
    const people = [...durations.keys()].sort();
    if (people.length === 0) return empty;

    const index = SlotGridIndex.build(blocks, {
      gridQuantumMinutes: this.policy.gridQuantumMinutes,
      candidateStarts: this.policy.candidateStarts,
      people,
    });

    // A day where someone has no availability can never host the full panel
    if (!people.every(person => index.hasAvailability(person))) {
      return empty;
    }

    const run: SearchRun = { day, index, people, durations, filter, seen: new Set(), filteredCount: 0 };
    const { agendas, exhaustive } =
      this.policy.selectionStrategy === 'first-found' ? this.searchFirstFound(run) : this.searchSpread(run);

    return {
      day,
      agendas,
      feasibleCount: run.seen.size,
      filteredCount: run.filteredCount,
      exhaustive,
    };
  }

  /**
   * Walk every ordering from every start, then pick
   */
  private searchSpread(run: SearchRun): { agendas: SelectedAgenda[]; exhaustive: boolean } {
    const accepted = new Map<string, Agenda>();
    for (const order of permutations(run.people)) {
      for (const start of run.index.candidateStarts()) {
        const agenda = this.tryWalk(run, order, start);
        if (agenda) accepted.set(agendaSignature(agenda), agenda);
      }
    }
    return { agendas: selectSpread([...accepted.values()], this.policy.maxAgendasPerDay), exhaustive: true };
  }

  /**
   * Find the earliest and latest agendas by scanning starts from each end,
   * then fill the cap in enumeration order and stop
   */
  private searchFirstFound(run: SearchRun): { agendas: SelectedAgenda[]; exhaustive: boolean } {
    const cap = this.policy.maxAgendasPerDay;
    const earliest = this.findEarliest(run);
    if (!earliest) return { agendas: [], exhaustive: true };

    const latest = cap >= 2 ? this.findLatest(run) : null;
    const reserved = new Set([agendaSignature(earliest)]);
    if (latest) reserved.add(agendaSignature(latest));

    const found = new Map<string, Agenda>();
    let exhaustive = true;
    filling: for (const order of permutations(run.people)) {
      for (const start of run.index.candidateStarts()) {
        if (found.size + reserved.size >= cap) {
          exhaustive = false;
          break filling;
        }
        const agenda = this.tryWalk(run, order, start);
        if (!agenda) continue;
        const signature = agendaSignature(agenda);
        if (!reserved.has(signature)) found.set(signature, agenda);
      }
    }

    return { agendas: selectFirstFound(earliest, latest, [...found.values()], cap), exhaustive };
  }

  /**
   * Canonically first agenda: every leg walk starts at its candidate start,
   * so the first start that yields anything holds it
   */
  private findEarliest(run: SearchRun): Agenda | null {
    for (const start of run.index.candidateStarts()) {
      const found: Agenda[] = [];
      for (const order of permutations(run.people)) {
        const agenda = this.tryWalk(run, order, start);
        if (agenda) found.push(agenda);
      }
      if (found.length > 0) {
        return [...found].sort(compareAgendas)[0] ?? null;
      }
    }
    return null;
  }

  /**
   * Agenda ending latest. Starts are scanned from the last one down until no
   * earlier start can reach the best end found so far.
   */
  private findLatest(run: SearchRun): Agenda | null {
    const { allowedGapMinutes } = this.policy;
    let spanMinutes = allowedGapMinutes * (run.people.length - 1);
    for (const minutes of run.durations.values()) spanMinutes += minutes;

    const found: Agenda[] = [];
    let bestEnd = Number.NEGATIVE_INFINITY;
    for (const start of [...run.index.candidateStarts()].reverse()) {
      if (start.plus({ minutes: spanMinutes }).toMillis() <= bestEnd) break;
      for (const order of permutations(run.people)) {
        const agenda = this.tryWalk(run, order, start);
        if (!agenda) continue;
        found.push(agenda);
        bestEnd = Math.max(bestEnd, lastEndMillis(agenda));
      }
    }
    return pickLatest(found);
  }

  /**
   * One walk, recorded in the run's tallies; null when it fails or is filtered out
   */
  private tryWalk(run: SearchRun, order: readonly PersonId[], start: DateTime): Agenda | null {
    this.guard.check();

    const legs = this.walk(run.index, order, start, run.durations);
    if (!legs) return null;

    const agenda: Agenda = { day: run.day, legs };
    const signature = agendaSignature(agenda);
    const isNew = !run.seen.has(signature);
    run.seen.add(signature);

    if (run.filter && !run.filter(agenda)) {
      if (isNew) run.filteredCount++;
      return null;
    }
    return agenda;
  }

  /**
   * Greedy walk of one ordering from one start; null when some leg cannot be placed
   */
  private walk(
    index: SlotGridIndex,
    order: readonly PersonId[],
    start: DateTime,
    durations: DurationMap
  ): AgendaLeg[] | null {
    const legs: AgendaLeg[] = [];
    let cursor: DateTime | null = null;

    for (const person of order) {
      const minutes = durations.get(person);
      if (minutes === undefined) return null;

      const legStart: DateTime | null =
        cursor === null
          ? index.coversContiguous(person, start, minutes) ? start : null
          : this.earliestCoveringStart(index, person, cursor, minutes);
      if (!legStart) return null;

      const legEnd = legStart.plus({ minutes });
      legs.push({ person, start: legStart, end: legEnd });
      cursor = legEnd;
    }

    return legs;
  }

  /**
   * Earliest grid instant in [previousEnd, previousEnd + gap] where the person is covered
   */
  private earliestCoveringStart(
    index: SlotGridIndex,
    person: PersonId,
    previousEnd: DateTime,
    minutes: number
  ): DateTime | null {
    const { allowedGapMinutes, gridQuantumMinutes } = this.policy;

    for (let offset = 0; offset <= allowedGapMinutes; offset += gridQuantumMinutes) {
      const candidate = previousEnd.plus({ minutes: offset });
      if (index.coversContiguous(person, candidate, minutes)) {
        return candidate;
      }
    }
    return null;
  }
}
