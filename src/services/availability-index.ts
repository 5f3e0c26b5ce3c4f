/**
 * Availability Index
 * Merges raw blocks into maximal intervals and answers coverage queries for one day
 */

import type { DateTime } from 'luxon';
import type {
  AvailabilityBlock,
  AvailabilityInterval,
  CandidateStartMode,
  PersonId,
} from '../types/index.js';

/**
 * Merge blocks into sorted, maximal, non-overlapping intervals.
 * Blocks merge when the next one starts no later than `toleranceMinutes` after the current end.
 */
export function normalizeAvailability(
  blocks: readonly AvailabilityInterval[],
  toleranceMinutes: number = 0
): AvailabilityInterval[] {
  if (blocks.length === 0) return [];

  const sorted = [...blocks].sort(
    (a, b) => a.start.toMillis() - b.start.toMillis() || a.end.toMillis() - b.end.toMillis()
  );

  const toleranceMs = toleranceMinutes * 60_000;
  const merged: AvailabilityInterval[] = [];
  let current: AvailabilityInterval | null = null;

  for (const block of sorted) {
    if (current && block.start.toMillis() <= current.end.toMillis() + toleranceMs) {
      if (block.end > current.end) {
        current = { start: current.start, end: block.end };
      }
      continue;
    }
    if (current) merged.push(current);
    current = { start: block.start, end: block.end };
  }
  if (current) merged.push(current);

  return merged;
}

/**
 * Group blocks by person and normalize each person's set
 */
export function buildAvailabilityIndex(
  blocks: readonly AvailabilityBlock[],
  toleranceMinutes: number = 0
): Map<PersonId, AvailabilityInterval[]> {
  const byPerson = new Map<PersonId, AvailabilityBlock[]>();
  for (const block of blocks) {
    const existing = byPerson.get(block.person) ?? [];
    existing.push(block);
    byPerson.set(block.person, existing);
  }

  const index = new Map<PersonId, AvailabilityInterval[]>();
  for (const [person, personBlocks] of byPerson) {
    index.set(person, normalizeAvailability(personBlocks, toleranceMinutes));
  }
  return index;
}

/**
 * Options for building a slot grid
 */
export interface SlotGridOptions {
  gridQuantumMinutes: number;
  candidateStarts: CandidateStartMode;
  /** Only these people contribute intervals and candidate starts */
  people?: readonly PersonId[];
}

/**
 * Per-day coverage structure over every person's merged intervals
 */
export class SlotGridIndex {
  private constructor(
    private readonly intervals: ReadonlyMap<PersonId, readonly AvailabilityInterval[]>,
    private readonly starts: readonly DateTime[]
  ) {}

  /**
   * Build the index for one day's blocks
   */
  static build(blocks: readonly AvailabilityBlock[], options: SlotGridOptions): SlotGridIndex {
    const wanted = options.people ? new Set(options.people) : null;
    const relevant = wanted ? blocks.filter(block => wanted.has(block.person)) : [...blocks];

    const intervals = buildAvailabilityIndex(relevant);
    const startsByMillis = new Map<number, DateTime>();

    for (const block of relevant) {
      startsByMillis.set(block.start.toMillis(), block.start);
    }

    if (options.candidateStarts === 'every-quantum') {
      const step = { minutes: options.gridQuantumMinutes };
      for (const personIntervals of intervals.values()) {
        for (const interval of personIntervals) {
          for (let tick = interval.start; tick.plus(step) <= interval.end; tick = tick.plus(step)) {
            startsByMillis.set(tick.toMillis(), tick);
          }
        }
      }
    }

    const starts = [...startsByMillis.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, start]) => start);

    return new SlotGridIndex(intervals, starts);
  }

  /**
   * Whether the person has at least one interval that day
   */
  hasAvailability(person: PersonId): boolean {
    return (this.intervals.get(person)?.length ?? 0) > 0;
  }

  /**
   * The person's merged intervals, sorted by start
   */
  intervalsFor(person: PersonId): readonly AvailabilityInterval[] {
    return this.intervals.get(person) ?? [];
  }

  /**
   * True iff a single interval covers [start, start + minutes)
   */
  coversContiguous(person: PersonId, start: DateTime, minutes: number): boolean {
    const startMs = start.toMillis();
    const endMs = startMs + minutes * 60_000;

    for (const interval of this.intervalsFor(person)) {
      if (interval.start.toMillis() > startMs) break;
      if (endMs <= interval.end.toMillis()) return true;
    }
    return false;
  }

  /**
   * Ordered distinct instants worth probing as a first-leg start
   */
  candidateStarts(): readonly DateTime[] {
    return this.starts;
  }
}
