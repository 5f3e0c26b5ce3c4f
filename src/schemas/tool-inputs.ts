/**
 * Zod schemas for MCP tool inputs
 */

import { z } from 'zod';
import {
  AgendaLegInputSchema,
  AvailabilityRowSchema,
  DurationsSchema,
  InterviewerIdSchema,
  PolicyOverridesSchema,
} from './common.js';

// ─────────────────────────────────────────────────────────────────────────────
// parse_availability
// ─────────────────────────────────────────────────────────────────────────────

export const ParseAvailabilityInputSchema = z.object({
  csv: z.string().min(1).max(1_000_000)
    .describe('CSV text with columns Interviewer, Name, Title, StartTime, EndTime'),
  timezone: z.string().optional()
    .describe('Timezone for naive timestamps (IANA, default: server timezone)'),
  gridQuantumMinutes: z.number().int().positive().max(240).optional()
    .describe('Grid granularity in minutes (default: server setting)'),
});

export type ParseAvailabilityInput = z.infer<typeof ParseAvailabilityInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// find_interview_agendas
// ─────────────────────────────────────────────────────────────────────────────

export const FindInterviewAgendasInputSchema = z.object({
  csv: z.string().min(1).max(1_000_000).optional()
    .describe('Availability CSV (Interviewer, Name, Title, StartTime, EndTime)'),
  blocks: z.array(AvailabilityRowSchema).max(10_000).optional()
    .describe('Availability rows, as an alternative to csv'),
  interviewers: z.array(InterviewerIdSchema).optional()
    .describe('Panel to schedule (default: everyone in the availability)'),
  durations: DurationsSchema.optional()
    .describe('Interview minutes per interviewer'),
  defaultDurationMinutes: z.number().int().positive().max(480).optional().default(30)
    .describe('Minutes for interviewers without an explicit duration'),
  policy: PolicyOverridesSchema.optional()
    .describe('Overrides for the server scheduling policy'),
  candidateName: z.string().max(200).optional()
    .describe('Candidate name for the agenda heading'),
  jobTitle: z.string().max(200).optional()
    .describe('Job title for the agenda heading'),
});

export type FindInterviewAgendasInput = z.infer<typeof FindInterviewAgendasInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// validate_agenda
// ─────────────────────────────────────────────────────────────────────────────

export const ValidateAgendaInputSchema = z.object({
  csv: z.string().min(1).max(1_000_000).optional()
    .describe('Availability CSV (Interviewer, Name, Title, StartTime, EndTime)'),
  blocks: z.array(AvailabilityRowSchema).max(10_000).optional()
    .describe('Availability rows, as an alternative to csv'),
  legs: z.array(AgendaLegInputSchema).min(1).max(20)
    .describe('Proposed agenda legs in order'),
  durations: DurationsSchema.optional()
    .describe('When given, each leg must last exactly this long'),
  policy: PolicyOverridesSchema.optional()
    .describe('Overrides for the server scheduling policy'),
});

export type ValidateAgendaInput = z.infer<typeof ValidateAgendaInputSchema>;
