/**
 * Type exports for the interview agenda server
 */

// Availability types
export type {
  PersonId,
  AvailabilityBlock,
  AvailabilityInterval,
  AvailabilityRowInput,
  InterviewerProfile,
  IngestedAvailability,
  DurationMap,
} from './availability.js';

// Policy types
export type {
  SelectionStrategy,
  CandidateStartMode,
  TimeOfDayWindow,
  SchedulingPolicy,
  SchedulingPolicyOverrides,
  SearchLimits,
} from './policy.js';

// Agenda types
export type {
  AgendaLeg,
  Agenda,
  SelectionReason,
  SelectedAgenda,
  AgendaFilter,
  DayAgendas,
  AgendaSearchResult,
  AgendaViolationType,
  AgendaViolation,
  AgendaValidationResult,
} from './agenda.js';
