/**
 * Availability data types
 * Inputs to the agenda search, produced by the ingestion layer
 */

import type { DateTime } from 'luxon';

/**
 * Normalized interviewer identifier (trimmed, single-spaced, lowercase)
 */
export type PersonId = string;

/**
 * One observed free window for one person
 */
export interface AvailabilityBlock {
  person: PersonId;
  start: DateTime;
  end: DateTime;
}

/**
 * A maximal contiguous interval after merging blocks
 */
export interface AvailabilityInterval {
  start: DateTime;
  end: DateTime;
}

/**
 * Raw availability row as received over the wire
 */
export interface AvailabilityRowInput {
  /** Interviewer identifier (email or name) */
  interviewer: string;
  /** Start time (ISO 8601; naive values are read in the reference timezone) */
  start: string;
  /** End time (ISO 8601) */
  end: string;
  /** Display name */
  name?: string;
  /** Job title */
  title?: string;
}

/**
 * Display information about an interviewer
 */
export interface InterviewerProfile {
  id: PersonId;
  /** First spelling of the id as given, trimmed */
  displayId: string;
  name?: string;
  title?: string;
  /** "Name — Title", "Name", or the id as given */
  label: string;
}

/**
 * Result of ingesting availability
 */
export interface IngestedAvailability {
  blocks: AvailabilityBlock[];
  interviewers: InterviewerProfile[];
  /** Rows dropped for a missing interviewer, unparseable times or a malformed CSV line */
  skippedRows: number;
  /** CSV parser complaints, one line each */
  parseErrors: string[];
}

/**
 * Required duration per person, in minutes
 */
export type DurationMap = ReadonlyMap<PersonId, number>;
