/**
 * Day Partitioner
 * Groups availability by calendar day and runs the search once per day
 */

import type {
  AgendaFilter,
  AgendaSearchResult,
  AvailabilityBlock,
  DayAgendas,
  DurationMap,
} from '../types/index.js';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { AgendaSearchEngine } from './agenda-search.js';
import { startOfNextDay, toDayKey } from '../utils/datetime.js';

/**
 * Split blocks at local midnight and group the pieces by ISO day, in day order
 */
export function partitionByDay(
  blocks: readonly AvailabilityBlock[],
  timezone: string
): Map<string, AvailabilityBlock[]> {
  const byDay = new Map<string, AvailabilityBlock[]>();

  const add = (piece: AvailabilityBlock) => {
    const day = toDayKey(piece.start, timezone);
    const existing = byDay.get(day) ?? [];
    existing.push(piece);
    byDay.set(day, existing);
  };

  for (const block of blocks) {
    let start = block.start;
    while (start < block.end) {
      const boundary = startOfNextDay(start, timezone);
      const end = block.end < boundary ? block.end : boundary;
      add({ person: block.person, start, end });
      start = end;
    }
  }

  return new Map([...byDay.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Run the engine independently for each day and concatenate the results.
 * Yields to the event loop between days so a pending cancellation can land.
 */
export async function searchByDay(
  engine: AgendaSearchEngine,
  blocks: readonly AvailabilityBlock[],
  durations: DurationMap,
  timezone: string,
  filter?: AgendaFilter
): Promise<AgendaSearchResult> {
  const days: DayAgendas[] = [];

  let first = true;
  for (const [day, dayBlocks] of partitionByDay(blocks, timezone)) {
    if (!first) await yieldToEventLoop();
    first = false;
    days.push(engine.search(day, dayBlocks, durations, filter));
  }

  return {
    days,
    agendas: days.flatMap(day => day.agendas),
  };
}
