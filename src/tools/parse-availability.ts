/**
 * parse_availability Tool
 * Reads an availability CSV and summarizes interviewers and days
 */

import type { IngestedAvailability, SchedulingPolicy } from '../types/index.js';
import type { SchedulingService } from '../services/scheduling-service.js';
import type { ParseAvailabilityInput } from '../schemas/tool-inputs.js';
import { parseAvailabilityCsv } from '../services/ingestion-service.js';
import { partitionByDay } from '../services/day-partitioner.js';
import { buildAvailabilityIndex } from '../services/availability-index.js';
import { formatDayHeading, formatTimeRange } from '../utils/datetime.js';

export interface ParseAvailabilityResult {
  availability: IngestedAvailability;
  policy: SchedulingPolicy;
}

/**
 * Execute parse_availability tool
 */
export async function executeParseAvailability(
  input: ParseAvailabilityInput,
  schedulingService: SchedulingService
): Promise<ParseAvailabilityResult> {
  const policy = schedulingService.resolvePolicy({
    timezone: input.timezone,
    gridQuantumMinutes: input.gridQuantumMinutes,
  });

  const availability = parseAvailabilityCsv(input.csv, {
    timezone: policy.timezone,
    gridQuantumMinutes: policy.gridQuantumMinutes,
  });

  return { availability, policy };
}

/**
 * Format result for MCP response
 */
export function formatParseAvailabilityResult(result: ParseAvailabilityResult): string {
  const { availability, policy } = result;
  const lines: string[] = [];

  lines.push('**Availability Summary**');
  lines.push(`(Times shown in ${policy.timezone}, ${policy.gridQuantumMinutes}-minute grid)`);
  lines.push('');

  if (availability.interviewers.length === 0) {
    lines.push('No interviewers found in the CSV.');
  } else {
    lines.push(`**Interviewers (${availability.interviewers.length}):**`);
    for (const interviewer of availability.interviewers) {
      const suffix = interviewer.name ? ` <${interviewer.displayId}>` : '';
      lines.push(`   - ${interviewer.label}${suffix}`);
    }
    lines.push('');
  }

  const labels = new Map(availability.interviewers.map(i => [i.id, i.label]));
  for (const [day, blocks] of partitionByDay(availability.blocks, policy.timezone)) {
    lines.push(`**${formatDayHeading(day, policy.timezone)}:**`);
    for (const [person, intervals] of buildAvailabilityIndex(blocks)) {
      const ranges = intervals
        .map(interval => formatTimeRange(interval.start, interval.end, policy.timezone))
        .join(', ');
      lines.push(`   ${labels.get(person) ?? person}: ${ranges}`);
    }
  }

  if (availability.skippedRows > 0) {
    lines.push('');
    lines.push(`⚠️ Skipped ${availability.skippedRows} unreadable row(s).`);
  }
  if (availability.parseErrors.length > 0) {
    lines.push('');
    lines.push(`**CSV Problems (${availability.parseErrors.length}):**`);
    for (const problem of availability.parseErrors) {
      lines.push(`   - ${problem}`);
    }
  }

  return lines.join('\n');
}
