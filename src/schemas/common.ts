/**
 * Common Zod schemas shared across tool definitions
 */

import { z } from 'zod';

/**
 * Selection strategy enum
 */
export const SelectionStrategySchema = z.enum(['spread', 'first-found']);

/**
 * Candidate start mode enum
 */
export const CandidateStartModeSchema = z.enum(['block-starts', 'every-quantum']);

/**
 * Local time of day
 */
export const TimeOfDaySchema = z.string().regex(/^\d{2}:\d{2}$/, 'Must be in HH:mm format');

/**
 * Local time-of-day window
 */
export const TimeOfDayWindowSchema = z.object({
  start: TimeOfDaySchema,
  end: TimeOfDaySchema,
});

/**
 * ISO datetime string (basic validation)
 */
export const ISODateTimeSchema = z.string().refine(
  (val) => !isNaN(Date.parse(val)),
  { message: 'Must be a valid ISO 8601 datetime string' }
);

/**
 * Interviewer identifier (email or name)
 */
export const InterviewerIdSchema = z.string().trim().min(1).max(320);

/**
 * One availability row
 */
export const AvailabilityRowSchema = z.object({
  interviewer: InterviewerIdSchema.describe('Interviewer email or name'),
  start: z.string().min(1).describe('Start of the free window (ISO 8601, or "yyyy-MM-dd HH:mm")'),
  end: z.string().min(1).describe('End of the free window'),
  name: z.string().max(200).optional().describe('Display name'),
  title: z.string().max(200).optional().describe('Job title'),
});

/**
 * Minutes per interviewer
 */
export const DurationsSchema = z.record(InterviewerIdSchema, z.number().int().positive().max(480));

/**
 * Per-call policy overrides
 */
export const PolicyOverridesSchema = z.object({
  timezone: z.string().optional()
    .describe('Reference timezone (IANA) for day boundaries, lunch and display'),
  gridQuantumMinutes: z.number().int().positive().max(240).optional()
    .describe('Grid granularity in minutes'),
  allowedGapMinutes: z.number().int().min(0).max(240).optional()
    .describe('Largest idle time between consecutive interviews (0 = strictly back-to-back)'),
  maxAgendasPerDay: z.number().int().positive().max(50).optional()
    .describe('Maximum agenda options per day'),
  lunchAvoidance: z.boolean().optional()
    .describe('Reject agendas that straddle the lunch window'),
  lunchWindow: TimeOfDayWindowSchema.optional()
    .describe('Lunch window (HH:mm, reference timezone)'),
  selectionStrategy: SelectionStrategySchema.optional()
    .describe('"spread" keeps the earliest and latest options; "first-found" keeps them too but stops probing at the cap'),
  candidateStarts: CandidateStartModeSchema.optional()
    .describe('"block-starts" probes where availability begins; "every-quantum" probes every grid tick'),
  workingHours: TimeOfDayWindowSchema.optional()
    .describe('Agendas must lie within these hours'),
});

/**
 * One leg of a proposed agenda
 */
export const AgendaLegInputSchema = z.object({
  interviewer: InterviewerIdSchema.describe('Interviewer email or name'),
  start: ISODateTimeSchema.describe('Leg start (ISO 8601)'),
  end: ISODateTimeSchema.describe('Leg end (ISO 8601)'),
});
