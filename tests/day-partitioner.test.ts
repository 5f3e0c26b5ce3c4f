// Unit tests for per-day partitioning (day-partitioner.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AgendaSearchEngine, createSearchGuard, partitionByDay, searchByDay } from '../src/services/index.js';
import { agendaSignature } from '../src/services/agenda-selection.js';
import type { AvailabilityBlock } from '../src/types/index.js';
import { toISOString } from '../src/utils/datetime.js';
import { SchedulerError } from '../src/utils/error.js';
import { at, block, describeLegs, makePolicy } from './helpers.js';

function pieces(byDay: Map<string, AvailabilityBlock[]>): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [day, blocks] of byDay) {
    out[day] = blocks.map(b => `${b.person} ${toISOString(b.start)} ${toISOString(b.end)}`);
  }
  return out;
}

describe('partitionByDay', () => {
  it('should group blocks by day in day order', () => {
    const byDay = partitionByDay(
      [
        block('a', '09:00', '10:00', '2025-03-05'),
        block('a', '09:00', '10:00', '2025-03-04'),
        block('b', '13:00', '14:00', '2025-03-04'),
      ],
      'UTC'
    );
    assert.deepStrictEqual([...byDay.keys()], ['2025-03-04', '2025-03-05']);
    assert.strictEqual(byDay.get('2025-03-04')?.length, 2);
  });

  it('should split a block at local midnight', () => {
    const overnight = { person: 'a', start: at('22:00'), end: at('02:00', '2025-03-05') };
    assert.deepStrictEqual(pieces(partitionByDay([overnight], 'UTC')), {
      '2025-03-04': ['a 2025-03-04T22:00:00.000Z 2025-03-05T00:00:00.000Z'],
      '2025-03-05': ['a 2025-03-05T00:00:00.000Z 2025-03-05T02:00:00.000Z'],
    });
  });

  it('should use the reference timezone for day boundaries', () => {
    // 03:00-05:00 UTC on the 5th is 22:00-00:00 on the 4th in New York
    const byDay = partitionByDay([block('a', '03:00', '05:00', '2025-03-05')], 'America/New_York');
    assert.deepStrictEqual([...byDay.keys()], ['2025-03-04']);
  });
});

describe('searchByDay', () => {
  const required = new Map([['a', 30], ['b', 30]]);

  it('should search each day on its own and concatenate in day order', async () => {
    const engine = new AgendaSearchEngine(makePolicy({ maxAgendasPerDay: 1 }));
    const result = await searchByDay(
      engine,
      [
        block('a', '14:00', '15:00', '2025-03-05'),
        block('b', '14:00', '15:00', '2025-03-05'),
        block('a', '09:00', '09:30', '2025-03-04'),
        block('b', '09:30', '10:00', '2025-03-04'),
      ],
      required,
      'UTC'
    );

    assert.deepStrictEqual(result.days.map(d => d.day), ['2025-03-04', '2025-03-05']);
    assert.deepStrictEqual(result.agendas.map(describeLegs), [
      ['a 09:00-09:30', 'b 09:30-10:00'],
      ['a 14:00-14:30', 'b 14:30-15:00'],
    ]);
  });

  it('should not let another day change a day\'s results', async () => {
    const engine = new AgendaSearchEngine(makePolicy());
    const monday = [block('a', '09:00', '10:00'), block('b', '09:00', '10:00')];
    const tuesday = [
      block('a', '08:00', '12:00', '2025-03-05'),
      block('b', '08:00', '12:00', '2025-03-05'),
    ];

    const alone = await searchByDay(engine, monday, required, 'UTC');
    const together = await searchByDay(engine, [...tuesday, ...monday], required, 'UTC');

    assert.deepStrictEqual(
      together.days[0]?.agendas.map(agendaSignature),
      alone.days[0]?.agendas.map(agendaSignature)
    );
  });

  it('should never produce an agenda across midnight', async () => {
    const engine = new AgendaSearchEngine(makePolicy());
    const overnight = { person: 'a', start: at('23:30'), end: at('00:30', '2025-03-05') };
    const result = await searchByDay(engine, [overnight], new Map([['a', 60]]), 'UTC');

    assert.strictEqual(result.days.length, 2);
    assert.deepStrictEqual(result.agendas, []);
  });

  it('should see a cancellation raised while an earlier day was searched', async () => {
    const controller = new AbortController();
    const engine = new AgendaSearchEngine(makePolicy(), createSearchGuard({ signal: controller.signal }));
    const blocks = [
      block('a', '09:00', '10:00'),
      block('b', '09:00', '10:00'),
      block('a', '09:00', '10:00', '2025-03-05'),
      block('b', '09:00', '10:00', '2025-03-05'),
    ];

    // Fires only once the event loop turns, after the first day has run
    setImmediate(() => controller.abort());
    await assert.rejects(
      searchByDay(engine, blocks, required, 'UTC'),
      (error: unknown) => error instanceof SchedulerError && error.code === 'SEARCH_ABORTED'
    );
  });
});
