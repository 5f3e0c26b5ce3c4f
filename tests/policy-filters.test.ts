// Unit tests for lunch and working-hours filters (policy-filters.ts)
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  agendaSpan,
  buildPolicyFilters,
  composeFilters,
  respectsLunchAvoidance,
  withinWorkingHours,
} from '../src/services/index.js';
import { agenda, leg, makePolicy } from './helpers.js';

const lunch = { start: '12:00', end: '12:30' };

describe('respectsLunchAvoidance', () => {
  it('should reject an agenda that overlaps the lunch window', () => {
    assert.strictEqual(respectsLunchAvoidance(agenda(leg('a', '12:15', '12:45')), lunch, 'UTC'), false);
  });

  it('should accept an agenda ending exactly at the window start', () => {
    assert.strictEqual(respectsLunchAvoidance(agenda(leg('a', '11:30', '12:00')), lunch, 'UTC'), true);
  });

  it('should accept an agenda starting exactly at the window end', () => {
    assert.strictEqual(respectsLunchAvoidance(agenda(leg('a', '12:30', '13:00')), lunch, 'UTC'), true);
  });

  it('should reject an agenda that spans the whole window', () => {
    const value = agenda(leg('a', '11:30', '12:00'), leg('b', '12:00', '13:00'));
    assert.strictEqual(respectsLunchAvoidance(value, lunch, 'UTC'), false);
  });

  it('should read the window in the reference timezone', () => {
    // 17:00-17:30 UTC is 12:00-12:30 in New York on this date
    const value = agenda(leg('a', '17:00', '17:30'));
    assert.strictEqual(respectsLunchAvoidance(value, lunch, 'UTC'), true);
    assert.strictEqual(respectsLunchAvoidance(value, lunch, 'America/New_York'), false);
  });
});

describe('withinWorkingHours', () => {
  const hours = { start: '09:00', end: '17:00' };

  it('should accept agendas inside the working day, edges included', () => {
    assert.strictEqual(withinWorkingHours(agenda(leg('a', '09:00', '17:00')), hours, 'UTC'), true);
  });

  it('should reject agendas that start early or end late', () => {
    assert.strictEqual(withinWorkingHours(agenda(leg('a', '08:45', '09:15')), hours, 'UTC'), false);
    assert.strictEqual(withinWorkingHours(agenda(leg('a', '16:45', '17:15')), hours, 'UTC'), false);
  });
});

describe('policy filter composition', () => {
  it('should report the span of an agenda', () => {
    const span = agendaSpan(agenda(leg('a', '09:00', '09:30'), leg('b', '09:45', '10:15')));
    assert.strictEqual(span?.start.toFormat('HH:mm'), '09:00');
    assert.strictEqual(span?.end.toFormat('HH:mm'), '10:15');
    assert.strictEqual(agendaSpan(agenda()), null);
  });

  it('should build one filter per enabled rule', () => {
    assert.strictEqual(buildPolicyFilters(makePolicy()).length, 0);
    assert.strictEqual(buildPolicyFilters(makePolicy({ lunchAvoidance: true })).length, 1);
    assert.strictEqual(
      buildPolicyFilters(
        makePolicy({ lunchAvoidance: true, workingHours: { start: '09:00', end: '17:00' } })
      ).length,
      2
    );
  });

  it('should require every filter to pass', () => {
    const filter = composeFilters(
      buildPolicyFilters(
        makePolicy({ lunchAvoidance: true, workingHours: { start: '09:00', end: '17:00' } })
      )
    );
    assert.strictEqual(filter(agenda(leg('a', '10:00', '10:30'))), true);
    assert.strictEqual(filter(agenda(leg('a', '12:00', '12:30'))), false);
    assert.strictEqual(filter(agenda(leg('a', '17:00', '17:30'))), false);
  });

  it('should pass everything when there are no filters', () => {
    assert.strictEqual(composeFilters([])(agenda(leg('a', '12:00', '12:30'))), true);
  });
});
