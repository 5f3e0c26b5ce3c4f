/**
 * validate_agenda Tool
 * Checks a proposed agenda against availability and the scheduling policy
 */

import type { AgendaLeg, AgendaValidationResult, SchedulingPolicy } from '../types/index.js';
import type { SchedulingService } from '../services/scheduling-service.js';
import type { ValidateAgendaInput } from '../schemas/tool-inputs.js';
import { loadAvailability } from './availability-source.js';
import { formatTimeRange, parseDateTime } from '../utils/datetime.js';

export interface ValidateAgendaToolResult {
  policy: SchedulingPolicy;
  legs: AgendaLeg[];
  validation: AgendaValidationResult;
}

/**
 * Execute validate_agenda tool
 */
export async function executeValidateAgenda(
  input: ValidateAgendaInput,
  schedulingService: SchedulingService
): Promise<ValidateAgendaToolResult> {
  const policy = schedulingService.resolvePolicy(input.policy);
  const availability = loadAvailability(input, policy);

  const legs: AgendaLeg[] = input.legs.map(leg => ({
    person: leg.interviewer,
    start: parseDateTime(leg.start, policy.timezone),
    end: parseDateTime(leg.end, policy.timezone),
  }));

  const validation = schedulingService.validateAgenda({
    blocks: availability.blocks,
    legs,
    durations: input.durations,
    policy,
  });

  return { policy, legs, validation };
}

/**
 * Format result for MCP response
 */
export function formatValidateAgendaResult(result: ValidateAgendaToolResult): string {
  const { policy, validation } = result;
  const lines: string[] = [];

  lines.push(validation.valid ? '✅ **Agenda is feasible**' : '❌ **Agenda has problems**');
  lines.push(`(Times shown in ${policy.timezone})`);
  lines.push('');

  result.legs.forEach((leg, i) => {
    lines.push(`   ${i + 1}. ${formatTimeRange(leg.start, leg.end, policy.timezone)}  ${leg.person}`);
  });

  if (validation.violations.length > 0) {
    lines.push('');
    lines.push(`**Violations (${validation.violations.length}):**`);
    for (const violation of validation.violations) {
      const where = violation.legIndex !== undefined ? ` [leg ${violation.legIndex + 1}]` : '';
      lines.push(`   - ${violation.type}${where}: ${violation.message}`);
    }
  }

  return lines.join('\n');
}
