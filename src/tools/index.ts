/**
 * MCP Tool Registry
 * Exports all tool implementations and the handler factory
 */

// Tool implementations
export * from './parse-availability.js';
export * from './find-interview-agendas.js';
export * from './validate-agenda.js';

// Re-export schemas for convenience
export {
  ParseAvailabilityInputSchema,
  FindInterviewAgendasInputSchema,
  ValidateAgendaInputSchema,
} from '../schemas/tool-inputs.js';

import type { SchedulingService } from '../services/scheduling-service.js';
import { zodToJsonSchema } from 'zod-to-json-schema';

import {
  ParseAvailabilityInputSchema,
  FindInterviewAgendasInputSchema,
  ValidateAgendaInputSchema,
} from '../schemas/tool-inputs.js';

import {
  executeParseAvailability,
  formatParseAvailabilityResult,
} from './parse-availability.js';
import {
  executeFindInterviewAgendas,
  formatFindInterviewAgendasResult,
} from './find-interview-agendas.js';
import {
  executeValidateAgenda,
  formatValidateAgendaResult,
} from './validate-agenda.js';

export const TOOL_DESCRIPTIONS = {
  parse_availability:
    'Read an interviewer availability CSV (columns Interviewer, Name, Title, StartTime, EndTime) and summarize each interviewer\'s free windows per day.',
  find_interview_agendas:
    'Find back-to-back interview agendas in which every interviewer meets the candidate in turn. Tries every interviewer order, removes duplicates, applies lunch and working-hours rules, and returns up to the per-day limit including the earliest and latest options.',
  validate_agenda:
    'Check a proposed interview agenda: every leg must be inside the interviewer\'s availability, legs must follow each other within the allowed gap, and the agenda must respect the lunch and working-hours rules.',
} as const;

/**
 * Tool definitions for MCP registration
 */
export const toolDefinitions = [
  {
    name: 'parse_availability',
    description: TOOL_DESCRIPTIONS.parse_availability,
    inputSchema: zodToJsonSchema(ParseAvailabilityInputSchema),
  },
  {
    name: 'find_interview_agendas',
    description: TOOL_DESCRIPTIONS.find_interview_agendas,
    inputSchema: zodToJsonSchema(FindInterviewAgendasInputSchema),
  },
  {
    name: 'validate_agenda',
    description: TOOL_DESCRIPTIONS.validate_agenda,
    inputSchema: zodToJsonSchema(ValidateAgendaInputSchema),
  },
];

/**
 * Per-call context handed to tool handlers
 */
export interface ToolContext {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
}

/**
 * Tool handler function type
 */
export type ToolHandler = (
  args: unknown,
  context?: ToolContext
) => Promise<{ content: Array<{ type: 'text'; text: string }> }>;

/**
 * Create tool handlers with injected services
 */
export function createToolHandlers(
  schedulingService: SchedulingService
): Record<string, ToolHandler> {
  return {
    parse_availability: async (args) => {
      const input = ParseAvailabilityInputSchema.parse(args);
      const result = await executeParseAvailability(input, schedulingService);
      return { content: [{ type: 'text', text: formatParseAvailabilityResult(result) }] };
    },

    find_interview_agendas: async (args, context) => {
      const input = FindInterviewAgendasInputSchema.parse(args);
      const result = await executeFindInterviewAgendas(input, schedulingService, {
        signal: context?.signal,
      });
      return { content: [{ type: 'text', text: formatFindInterviewAgendasResult(result) }] };
    },

    validate_agenda: async (args) => {
      const input = ValidateAgendaInputSchema.parse(args);
      const result = await executeValidateAgenda(input, schedulingService);
      return { content: [{ type: 'text', text: formatValidateAgendaResult(result) }] };
    },
  };
}
