/**
 * Shared availability loading for tools that accept csv or blocks
 */

import type {
  AvailabilityRowInput,
  IngestedAvailability,
  SchedulingPolicy,
} from '../types/index.js';
import { parseAvailabilityCsv, toAvailabilityBlocks } from '../services/ingestion-service.js';
import { invalidInputError, missingFieldError } from '../utils/error.js';

export interface AvailabilitySourceInput {
  csv?: string;
  blocks?: AvailabilityRowInput[];
}

/**
 * Ingest availability from exactly one of csv or blocks
 */
export function loadAvailability(
  input: AvailabilitySourceInput,
  policy: SchedulingPolicy
): IngestedAvailability {
  const options = {
    timezone: policy.timezone,
    gridQuantumMinutes: policy.gridQuantumMinutes,
  };

  if (input.csv !== undefined && input.blocks !== undefined) {
    throw invalidInputError('Provide availability as csv or blocks, not both');
  }
  if (input.csv !== undefined) {
    return parseAvailabilityCsv(input.csv, options);
  }
  if (input.blocks !== undefined) {
    return toAvailabilityBlocks(input.blocks, options);
  }
  throw missingFieldError('csv or blocks');
}
