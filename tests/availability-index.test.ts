// Unit tests for the availability index (availability-index.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildAvailabilityIndex,
  normalizeAvailability,
  SlotGridIndex,
} from '../src/services/index.js';
import type { AvailabilityInterval } from '../src/types/index.js';
import { at, block } from './helpers.js';

function ranges(intervals: readonly AvailabilityInterval[]): string[] {
  return intervals.map(i => `${i.start.toFormat('HH:mm')}-${i.end.toFormat('HH:mm')}`);
}

describe('normalizeAvailability', () => {
  it('should merge overlapping and touching blocks', () => {
    const merged = normalizeAvailability([
      block('a', '10:00', '11:00'),
      block('a', '09:00', '09:30'),
      block('a', '09:30', '10:15'),
      block('a', '13:00', '14:00'),
    ]);
    assert.deepStrictEqual(ranges(merged), ['09:00-11:00', '13:00-14:00']);
  });

  it('should keep contained blocks inside the larger interval', () => {
    const merged = normalizeAvailability([
      block('a', '09:00', '12:00'),
      block('a', '10:00', '10:30'),
    ]);
    assert.deepStrictEqual(ranges(merged), ['09:00-12:00']);
  });

  it('should bridge gaps only up to the tolerance', () => {
    const blocks = [block('a', '09:00', '09:30'), block('a', '09:45', '10:00')];
    assert.deepStrictEqual(ranges(normalizeAvailability(blocks)), ['09:00-09:30', '09:45-10:00']);
    assert.deepStrictEqual(ranges(normalizeAvailability(blocks, 15)), ['09:00-10:00']);
  });

  it('should be idempotent', () => {
    const once = normalizeAvailability([
      block('a', '09:00', '10:00'),
      block('a', '09:30', '11:00'),
    ]);
    assert.deepStrictEqual(ranges(normalizeAvailability(once)), ranges(once));
  });

  it('should return an empty list for no blocks', () => {
    assert.deepStrictEqual(normalizeAvailability([]), []);
  });
});

describe('buildAvailabilityIndex', () => {
  it('should group by person', () => {
    const index = buildAvailabilityIndex([
      block('a', '09:00', '10:00'),
      block('b', '11:00', '12:00'),
      block('a', '10:00', '10:30'),
    ]);
    assert.deepStrictEqual([...index.keys()], ['a', 'b']);
    assert.deepStrictEqual(ranges(index.get('a') ?? []), ['09:00-10:30']);
    assert.deepStrictEqual(ranges(index.get('b') ?? []), ['11:00-12:00']);
  });
});

describe('SlotGridIndex', () => {
  const options = { gridQuantumMinutes: 15, candidateStarts: 'block-starts' as const };

  it('should answer contiguous coverage against merged intervals', () => {
    const index = SlotGridIndex.build(
      [block('a', '09:00', '09:30'), block('a', '09:30', '10:00'), block('a', '11:00', '12:00')],
      options
    );
    assert.strictEqual(index.coversContiguous('a', at('09:15'), 45), true);
    assert.strictEqual(index.coversContiguous('a', at('09:30'), 45), false);
    assert.strictEqual(index.coversContiguous('a', at('11:00'), 60), true);
    assert.strictEqual(index.coversContiguous('a', at('08:45'), 30), false);
    assert.strictEqual(index.coversContiguous('b', at('09:00'), 15), false);
  });

  it('should use distinct block starts as candidate starts', () => {
    const index = SlotGridIndex.build(
      [block('b', '10:00', '11:00'), block('a', '09:00', '10:00'), block('b', '09:00', '09:30')],
      options
    );
    assert.deepStrictEqual(
      index.candidateStarts().map(s => s.toFormat('HH:mm')),
      ['09:00', '10:00']
    );
  });

  it('should add every grid tick in every-quantum mode', () => {
    const index = SlotGridIndex.build([block('a', '09:00', '10:00')], {
      gridQuantumMinutes: 15,
      candidateStarts: 'every-quantum',
    });
    assert.deepStrictEqual(
      index.candidateStarts().map(s => s.toFormat('HH:mm')),
      ['09:00', '09:15', '09:30', '09:45']
    );
  });

  it('should only index the requested people', () => {
    const index = SlotGridIndex.build(
      [block('a', '09:00', '10:00'), block('z', '07:00', '08:00')],
      { ...options, people: ['a'] }
    );
    assert.strictEqual(index.hasAvailability('a'), true);
    assert.strictEqual(index.hasAvailability('z'), false);
    assert.deepStrictEqual(
      index.candidateStarts().map(s => s.toFormat('HH:mm')),
      ['09:00']
    );
  });
});
