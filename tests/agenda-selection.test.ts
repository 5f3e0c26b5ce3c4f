// Unit tests for signatures, canonical order and capping (agenda-selection.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  agendaSignature,
  compareAgendas,
  selectFirstFound,
  selectSpread,
} from '../src/services/index.js';
import { agenda, at, describeLegs, leg } from './helpers.js';

describe('agendaSignature', () => {
  it('should encode each leg as person@start-end in order', () => {
    const value = agenda(leg('a', '09:00', '09:30'), leg('b', '09:30', '10:00'));
    const expected = [
      `a@${at('09:00').toMillis()}-${at('09:30').toMillis()}`,
      `b@${at('09:30').toMillis()}-${at('10:00').toMillis()}`,
    ].join('|');
    assert.strictEqual(agendaSignature(value), expected);
  });

  it('should distinguish the same slots assigned to different people', () => {
    const ab = agenda(leg('a', '09:00', '09:30'), leg('b', '09:30', '10:00'));
    const ba = agenda(leg('b', '09:00', '09:30'), leg('a', '09:30', '10:00'));
    assert.notStrictEqual(agendaSignature(ab), agendaSignature(ba));
  });
});

describe('compareAgendas', () => {
  it('should order by first start, then last end, then interviewer order', () => {
    const late = agenda(leg('a', '10:00', '10:30'));
    const early = agenda(leg('b', '09:00', '09:30'));
    const earlyLonger = agenda(leg('a', '09:00', '09:30'), leg('b', '09:30', '10:00'));
    const earlyLongerSwapped = agenda(leg('b', '09:00', '09:30'), leg('a', '09:30', '10:00'));

    const sorted = [late, earlyLongerSwapped, earlyLonger, early].sort(compareAgendas);
    assert.deepStrictEqual(sorted.map(describeLegs), [
      ['b 09:00-09:30'],
      ['a 09:00-09:30', 'b 09:30-10:00'],
      ['b 09:00-09:30', 'a 09:30-10:00'],
      ['a 10:00-10:30'],
    ]);
  });
});

describe('selectSpread', () => {
  const candidates = [
    agenda(leg('a', '11:00', '11:30')),
    agenda(leg('a', '09:00', '09:30')),
    agenda(leg('a', '15:00', '15:30')),
    agenda(leg('a', '10:00', '10:30')),
  ];

  it('should return nothing for no candidates or a zero cap', () => {
    assert.deepStrictEqual(selectSpread([], 3), []);
    assert.deepStrictEqual(selectSpread(candidates, 0), []);
  });

  it('should include both the earliest and latest agenda when the cap allows', () => {
    const selected = selectSpread(candidates, 2);
    assert.deepStrictEqual(selected.map(describeLegs), [['a 09:00-09:30'], ['a 15:00-15:30']]);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest', 'latest']);
  });

  it('should return everything in canonical order when under the cap', () => {
    const selected = selectSpread(candidates, 10);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest', 'filler', 'filler', 'latest']);
  });

  it('should give the latest slot to the canonically later agenda on equal end times', () => {
    const ab = agenda(leg('a', '09:00', '09:30'), leg('b', '09:30', '10:00'));
    const ba = agenda(leg('b', '09:00', '09:30'), leg('a', '09:30', '10:00'));
    const selected = selectSpread([ba, ab], 2);
    assert.deepStrictEqual(selected.map(describeLegs), [
      ['a 09:00-09:30', 'b 09:30-10:00'],
      ['b 09:00-09:30', 'a 09:30-10:00'],
    ]);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest', 'latest']);
  });
});

describe('selectFirstFound', () => {
  const earliest = agenda(leg('a', '09:00', '09:30'));
  const latest = agenda(leg('a', '15:00', '15:30'));

  it('should keep the earliest and latest, then fill in discovery order', () => {
    const found = [
      agenda(leg('a', '11:00', '11:30')),
      agenda(leg('a', '09:00', '09:30')),
      agenda(leg('a', '10:00', '10:30')),
    ];

    const selected = selectFirstFound(earliest, latest, found, 3);
    assert.deepStrictEqual(selected.map(describeLegs), [
      ['a 09:00-09:30'],
      ['a 11:00-11:30'],
      ['a 15:00-15:30'],
    ]);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest', 'first-found', 'latest']);
  });

  it('should drop the latest agenda at a cap of one', () => {
    const selected = selectFirstFound(earliest, latest, [], 1);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest']);
  });

  it('should not repeat the earliest agenda as the latest', () => {
    const selected = selectFirstFound(earliest, agenda(leg('a', '09:00', '09:30')), [], 2);
    assert.deepStrictEqual(selected.map(s => s.reason), ['earliest']);
  });
});
