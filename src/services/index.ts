/**
 * Service exports
 */

export {
  normalizeAvailability,
  buildAvailabilityIndex,
  SlotGridIndex,
  type SlotGridOptions,
} from './availability-index.js';
export {
  AgendaSearchEngine,
  createSearchGuard,
  unboundedGuard,
  permutations,
  orderingCount,
  type SearchGuard,
} from './agenda-search.js';
export {
  agendaSignature,
  compareAgendas,
  selectSpread,
  selectFirstFound,
} from './agenda-selection.js';
export { partitionByDay, searchByDay } from './day-partitioner.js';
export {
  agendaSpan,
  respectsLunchAvoidance,
  withinWorkingHours,
  composeFilters,
  buildPolicyFilters,
} from './policy-filters.js';
export {
  CSV_COLUMNS,
  interviewerLabel,
  parseAvailabilityCsv,
  toAvailabilityBlocks,
  type IngestionOptions,
} from './ingestion-service.js';
export {
  SchedulingService,
  getSchedulingService,
  resetSchedulingService,
  toDurationMap,
  validatePolicy,
  type FindAgendasRequest,
  type ValidateAgendaRequest,
} from './scheduling-service.js';
