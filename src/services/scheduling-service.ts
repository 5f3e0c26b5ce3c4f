/**
 * Scheduling Service
 * Validates durations and policy, then drives the per-day agenda search
 */

import type {
  Agenda,
  AgendaLeg,
  AgendaSearchResult,
  AgendaValidationResult,
  AgendaViolation,
  AvailabilityBlock,
  DurationMap,
  PersonId,
  SchedulingPolicy,
  SchedulingPolicyOverrides,
  SearchLimits,
} from '../types/index.js';
import { AgendaSearchEngine, createSearchGuard, orderingCount } from './agenda-search.js';
import { SlotGridIndex } from './availability-index.js';
import { partitionByDay, searchByDay } from './day-partitioner.js';
import {
  buildPolicyFilters,
  composeFilters,
  respectsLunchAvoidance,
  withinWorkingHours,
} from './policy-filters.js';
import { configurationError, invalidDateRangeError, invalidInputError } from '../utils/error.js';
import { durationMinutes, isGridAligned, parseTimeOfDay, toDayKey, toISOString } from '../utils/datetime.js';
import {
  normalizePersonId,
  validateMultipleOf,
  validateNonNegativeInteger,
  validatePositiveInteger,
  validateTimeOfDay,
  validateTimezone,
} from '../utils/validation.js';
import { getConfig } from '../utils/config.js';
import { createLogger, type Logger } from '../utils/logger.js';

const MINUTES_PER_DAY = 24 * 60;

/**
 * Parameters for an agenda search
 */
export interface FindAgendasRequest {
  blocks: readonly AvailabilityBlock[];
  /** Required minutes per interviewer; keys are normalized */
  durations: DurationMap | Readonly<Record<string, number>>;
  policy: SchedulingPolicy;
  /** Aborts the search between probes */
  signal?: AbortSignal;
}

/**
 * Parameters for checking a proposed agenda
 */
export interface ValidateAgendaRequest {
  blocks: readonly AvailabilityBlock[];
  legs: readonly AgendaLeg[];
  /** When given, each leg must last exactly this long */
  durations?: DurationMap | Readonly<Record<string, number>>;
  policy: SchedulingPolicy;
}

function isDurationMap(
  durations: DurationMap | Readonly<Record<string, number>>
): durations is DurationMap {
  return durations instanceof Map;
}

/**
 * Build a normalized duration map, rejecting ids that collide after normalization
 */
export function toDurationMap(
  durations: DurationMap | Readonly<Record<string, number>>
): Map<PersonId, number> {
  const entries: Iterable<[string, number]> = isDurationMap(durations)
    ? durations.entries()
    : Object.entries(durations);

  const map = new Map<PersonId, number>();
  for (const [rawId, minutes] of entries) {
    const id = normalizePersonId(rawId);
    if (!id) {
      throw configurationError('Interviewer ids in durations must be non-empty');
    }
    const existing = map.get(id);
    if (existing !== undefined && existing !== minutes) {
      throw configurationError(`Conflicting durations for interviewer "${id}"`, {
        interviewer: id,
        durations: [existing, minutes],
      });
    }
    map.set(id, minutes);
  }
  return map;
}

function timeOfDayMinutes(value: string): number {
  const parsed = parseTimeOfDay(value);
  return parsed ? parsed.hour * 60 + parsed.minute : 0;
}

/**
 * Check a policy; every problem is a configuration error
 */
export function validatePolicy(policy: SchedulingPolicy): void {
  validateTimezone(policy.timezone, 'timezone', configurationError);

  validatePositiveInteger(policy.gridQuantumMinutes, 'gridQuantumMinutes', configurationError);
  if (MINUTES_PER_DAY % policy.gridQuantumMinutes !== 0) {
    throw configurationError(
      `gridQuantumMinutes must divide a day evenly. Got: ${policy.gridQuantumMinutes}`
    );
  }

  validateNonNegativeInteger(policy.allowedGapMinutes, 'allowedGapMinutes', configurationError);
  validateMultipleOf(
    policy.allowedGapMinutes,
    policy.gridQuantumMinutes,
    'allowedGapMinutes',
    configurationError
  );

  validatePositiveInteger(policy.maxAgendasPerDay, 'maxAgendasPerDay', configurationError);

  validateTimeOfDay(policy.lunchWindow.start, 'lunchWindow.start', configurationError);
  validateTimeOfDay(policy.lunchWindow.end, 'lunchWindow.end', configurationError);
  if (timeOfDayMinutes(policy.lunchWindow.start) > timeOfDayMinutes(policy.lunchWindow.end)) {
    throw configurationError('lunchWindow.start must not be after lunchWindow.end', {
      lunchWindow: policy.lunchWindow,
    });
  }

  if (policy.workingHours) {
    validateTimeOfDay(policy.workingHours.start, 'workingHours.start', configurationError);
    validateTimeOfDay(policy.workingHours.end, 'workingHours.end', configurationError);
    if (timeOfDayMinutes(policy.workingHours.start) >= timeOfDayMinutes(policy.workingHours.end)) {
      throw configurationError('workingHours.start must be before workingHours.end', {
        workingHours: policy.workingHours,
      });
    }
  }
}

/**
 * Scheduling Service
 */
export class SchedulingService {
  constructor(
    private readonly defaults: SchedulingPolicy,
    private readonly limits: SearchLimits,
    private readonly logger: Logger = createLogger('scheduler')
  ) {}

  /**
   * Defaults merged with per-call overrides, validated
   */
  resolvePolicy(overrides: SchedulingPolicyOverrides = {}): SchedulingPolicy {
    const defaults = this.defaults;
    const policy: SchedulingPolicy = {
      timezone: overrides.timezone ?? defaults.timezone,
      gridQuantumMinutes: overrides.gridQuantumMinutes ?? defaults.gridQuantumMinutes,
      allowedGapMinutes: overrides.allowedGapMinutes ?? defaults.allowedGapMinutes,
      maxAgendasPerDay: overrides.maxAgendasPerDay ?? defaults.maxAgendasPerDay,
      lunchAvoidance: overrides.lunchAvoidance ?? defaults.lunchAvoidance,
      lunchWindow: overrides.lunchWindow ?? defaults.lunchWindow,
      selectionStrategy: overrides.selectionStrategy ?? defaults.selectionStrategy,
      candidateStarts: overrides.candidateStarts ?? defaults.candidateStarts,
      workingHours: overrides.workingHours ?? defaults.workingHours,
    };
    validatePolicy(policy);
    return policy;
  }

  /**
   * Search limits in effect
   */
  getLimits(): SearchLimits {
    return { ...this.limits };
  }

  /**
   * Check every duration against the grid and the panel-size limits
   */
  validateDurations(
    durations: DurationMap | Readonly<Record<string, number>>,
    policy: SchedulingPolicy
  ): Map<PersonId, number> {
    const map = toDurationMap(durations);

    if (map.size === 0) {
      throw configurationError('At least one interviewer duration is required');
    }

    for (const [person, minutes] of map) {
      validatePositiveInteger(minutes, `Duration for ${person}`, configurationError);
      validateMultipleOf(minutes, policy.gridQuantumMinutes, `Duration for ${person}`, configurationError);
    }

    if (map.size > this.limits.maxInterviewers) {
      throw configurationError(
        `Panels are limited to ${this.limits.maxInterviewers} interviewers. Got: ${map.size}`,
        { interviewers: map.size, maxInterviewers: this.limits.maxInterviewers }
      );
    }
    if (map.size > this.limits.warnInterviewers) {
      this.logger.warn(
        `Large panel: ${map.size} interviewers means ${orderingCount(map.size)} orderings per candidate start`
      );
    }

    return map;
  }

  /**
   * Find capped, deduplicated agendas for every day in the availability
   */
  async findAgendas(request: FindAgendasRequest): Promise<AgendaSearchResult> {
    const { policy } = request;
    validatePolicy(policy);
    const durations = this.validateDurations(request.durations, policy);
    const blocks = this.prepareBlocks(request.blocks, policy);

    const guard = createSearchGuard({
      signal: request.signal,
      timeoutMs: this.limits.timeoutMs,
    });
    const engine = new AgendaSearchEngine(policy, guard);
    const filter = composeFilters(buildPolicyFilters(policy));

    const result = await searchByDay(engine, blocks, durations, policy.timezone, filter);

    this.logger.debug(
      `Searched ${result.days.length} day(s) for ${durations.size} interviewer(s); ` +
        `${result.agendas.length} agenda(s) selected`
    );
    return result;
  }

  /**
   * Check a proposed agenda against availability and policy
   */
  validateAgenda(request: ValidateAgendaRequest): AgendaValidationResult {
    const { policy } = request;
    validatePolicy(policy);

    if (request.legs.length === 0) {
      throw invalidInputError('An agenda needs at least one leg');
    }

    const durations = request.durations ? toDurationMap(request.durations) : null;
    const legs: AgendaLeg[] = request.legs.map((leg, i) => {
      if (leg.end <= leg.start) {
        throw invalidDateRangeError(`Leg ${i + 1} must end after it starts`, {
          start: toISOString(leg.start),
          end: toISOString(leg.end),
        });
      }
      return { ...leg, person: normalizePersonId(leg.person) };
    });

    const firstLeg = legs[0];
    if (!firstLeg) {
      throw invalidInputError('An agenda needs at least one leg');
    }
    const day = toDayKey(firstLeg.start, policy.timezone);
    const dayBlocks = partitionByDay(this.prepareBlocks(request.blocks, policy), policy.timezone).get(day) ?? [];
    const index = SlotGridIndex.build(dayBlocks, {
      gridQuantumMinutes: policy.gridQuantumMinutes,
      candidateStarts: policy.candidateStarts,
    });

    const violations: AgendaViolation[] = [];
    const seenPeople = new Set<PersonId>();
    let previous: AgendaLeg | null = null;

    legs.forEach((leg, legIndex) => {
      const minutes = durationMinutes(leg.start, leg.end);

      if (seenPeople.has(leg.person)) {
        violations.push({
          type: 'DUPLICATE_PERSON',
          legIndex,
          message: `${leg.person} appears more than once`,
        });
      }
      seenPeople.add(leg.person);

      const lastInstant = leg.end.minus({ milliseconds: 1 });
      if (
        toDayKey(leg.start, policy.timezone) !== day ||
        toDayKey(lastInstant, policy.timezone) !== day
      ) {
        violations.push({
          type: 'DAY_SPAN',
          legIndex,
          message: `Leg for ${leg.person} is not on ${day}`,
        });
      }

      if (durations) {
        const required = durations.get(leg.person);
        if (required !== minutes) {
          violations.push({
            type: 'DURATION_MISMATCH',
            legIndex,
            message:
              required === undefined
                ? `No duration is configured for ${leg.person}`
                : `${leg.person} needs ${required} minutes, leg lasts ${minutes}`,
          });
        }
      }

      if (!index.coversContiguous(leg.person, leg.start, minutes)) {
        violations.push({
          type: 'NOT_COVERED',
          legIndex,
          message: `${leg.person} is not available for the whole leg`,
        });
      }

      if (previous) {
        const gap = durationMinutes(previous.end, leg.start);
        if (gap < 0) {
          violations.push({
            type: 'OVERLAP',
            legIndex,
            message: `Leg for ${leg.person} starts before the previous leg ends`,
          });
        } else if (gap > policy.allowedGapMinutes) {
          violations.push({
            type: 'GAP_TOO_LARGE',
            legIndex,
            message: `${gap} minute gap before ${leg.person} exceeds the allowed ${policy.allowedGapMinutes}`,
          });
        }
      }
      previous = leg;
    });

    const agenda: Agenda = { day, legs };
    if (policy.lunchAvoidance && !respectsLunchAvoidance(agenda, policy.lunchWindow, policy.timezone)) {
      violations.push({
        type: 'LUNCH',
        message: `Agenda straddles the lunch window ${policy.lunchWindow.start}-${policy.lunchWindow.end}`,
      });
    }
    if (policy.workingHours && !withinWorkingHours(agenda, policy.workingHours, policy.timezone)) {
      violations.push({
        type: 'WORKING_HOURS',
        message: `Agenda falls outside working hours ${policy.workingHours.start}-${policy.workingHours.end}`,
      });
    }

    return { valid: violations.length === 0, violations };
  }

  /**
   * Normalize ids and reject blocks that are empty or off the grid
   */
  private prepareBlocks(
    blocks: readonly AvailabilityBlock[],
    policy: SchedulingPolicy
  ): AvailabilityBlock[] {
    return blocks.map((block, i) => {
      if (block.end <= block.start) {
        throw invalidDateRangeError(`Availability block ${i + 1} must end after it starts`, {
          person: block.person,
        });
      }
      if (
        !isGridAligned(block.start, policy.gridQuantumMinutes, policy.timezone) ||
        !isGridAligned(block.end, policy.gridQuantumMinutes, policy.timezone)
      ) {
        throw invalidInputError(
          `Availability block ${i + 1} is not aligned to the ${policy.gridQuantumMinutes}-minute grid`,
          { person: block.person, start: toISOString(block.start), end: toISOString(block.end) }
        );
      }
      return { ...block, person: normalizePersonId(block.person) };
    });
  }
}

/**
 * Singleton service instance
 */
let serviceInstance: SchedulingService | null = null;

/**
 * Get or create the scheduling service from configuration
 */
export function getSchedulingService(): SchedulingService {
  if (!serviceInstance) {
    const config = getConfig();
    serviceInstance = new SchedulingService(config.policy, config.limits);
  }
  return serviceInstance;
}

/**
 * Reset the service (for testing)
 */
export function resetSchedulingService(): void {
  serviceInstance = null;
}
