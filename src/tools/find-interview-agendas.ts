/**
 * find_interview_agendas Tool
 * Builds back-to-back interview agendas from interviewer availability
 */

import type {
  AgendaSearchResult,
  InterviewerProfile,
  PersonId,
  SchedulingPolicy,
  SelectionReason,
} from '../types/index.js';
import type { SchedulingService } from '../services/scheduling-service.js';
import type { FindInterviewAgendasInput } from '../schemas/tool-inputs.js';
import { interviewerLabel } from '../services/ingestion-service.js';
import { loadAvailability } from './availability-source.js';
import { formatDayHeading, formatDuration, formatTimeRange } from '../utils/datetime.js';
import { normalizePersonId } from '../utils/validation.js';

export interface FindInterviewAgendasResult {
  policy: SchedulingPolicy;
  interviewers: InterviewerProfile[];
  durations: Map<PersonId, number>;
  search: AgendaSearchResult;
  skippedRows: number;
  parseErrors: string[];
  candidateName?: string;
  jobTitle?: string;
}

const REASON_LABELS: Record<SelectionReason, string> = {
  earliest: 'earliest',
  latest: 'latest',
  filler: 'alternative',
  'first-found': 'first found',
};

/**
 * Execute find_interview_agendas tool
 */
export async function executeFindInterviewAgendas(
  input: FindInterviewAgendasInput,
  schedulingService: SchedulingService,
  options: { signal?: AbortSignal } = {}
): Promise<FindInterviewAgendasResult> {
  const policy = schedulingService.resolvePolicy(input.policy);
  const availability = loadAvailability(input, policy);

  const explicit = new Map<PersonId, number>();
  const spellings = new Map<PersonId, string>();
  for (const [id, minutes] of Object.entries(input.durations ?? {})) {
    const person = normalizePersonId(id);
    explicit.set(person, minutes);
    if (!spellings.has(person)) spellings.set(person, id.trim());
  }
  for (const id of input.interviewers ?? []) {
    const person = normalizePersonId(id);
    if (!spellings.has(person)) spellings.set(person, id.trim());
  }

  const panel = input.interviewers
    ? input.interviewers.map(normalizePersonId)
    : [...new Set([...availability.interviewers.map(i => i.id), ...explicit.keys()])];

  const durations = new Map<PersonId, number>();
  for (const person of panel) {
    durations.set(person, explicit.get(person) ?? input.defaultDurationMinutes);
  }

  const search = await schedulingService.findAgendas({
    blocks: availability.blocks,
    durations,
    policy,
    signal: options.signal,
  });

  const known = new Map(availability.interviewers.map(i => [i.id, i]));
  const interviewers = [...durations.keys()].map(id => {
    const displayId = spellings.get(id) ?? id;
    return known.get(id) ?? { id, displayId, label: interviewerLabel(displayId) };
  });

  return {
    policy,
    interviewers,
    durations,
    search,
    skippedRows: availability.skippedRows,
    parseErrors: availability.parseErrors,
    candidateName: input.candidateName,
    jobTitle: input.jobTitle,
  };
}

/**
 * Format result for MCP response
 */
export function formatFindInterviewAgendasResult(result: FindInterviewAgendasResult): string {
  const { policy, search } = result;
  const lines: string[] = [];
  const labels = new Map(result.interviewers.map(i => [i.id, i.label]));

  if (result.candidateName || result.jobTitle) {
    const parts = [result.candidateName, result.jobTitle].filter(Boolean);
    lines.push(`**Interview: ${parts.join(' - ')}**`);
  }

  if (search.agendas.length === 0) {
    let message = 'No valid sequential agendas found.';
    if (policy.lunchAvoidance) {
      message += ' Try turning off the lunch filter or adjust durations.';
    }
    lines.push(message);
  } else {
    lines.push(`✅ Found ${search.agendas.length} possible agenda(s).`);
  }
  lines.push(`(Times shown in ${policy.timezone})`);
  lines.push('');

  let option = 0;
  for (const day of search.days) {
    for (const agenda of day.agendas) {
      option++;
      lines.push(
        `### Option ${option} — ${formatDayHeading(agenda.day, policy.timezone)} (${REASON_LABELS[agenda.reason]})`
      );
      for (const leg of agenda.legs) {
        const minutes = result.durations.get(leg.person) ?? 0;
        lines.push(
          `   ${formatTimeRange(leg.start, leg.end, policy.timezone)}  ${labels.get(leg.person) ?? leg.person} (${formatDuration(minutes)})`
        );
      }
      lines.push('');
    }
  }

  const searchedDays = search.days.filter(day => day.feasibleCount > 0);
  if (searchedDays.length > 0) {
    lines.push('**Per-Day Details:**');
    for (const day of searchedDays) {
      const filtered = day.filteredCount > 0 ? `, ${day.filteredCount} removed by policy` : '';
      lines.push(
        `   ${formatDayHeading(day.day, policy.timezone)}: ${day.exhaustive ? '' : 'at least '}${day.feasibleCount} feasible${filtered}, ${day.agendas.length} shown`
      );
    }
    lines.push('');
  }

  if (result.skippedRows > 0) {
    lines.push(`⚠️ Skipped ${result.skippedRows} unreadable availability row(s).`);
  }
  for (const problem of result.parseErrors) {
    lines.push(`⚠️ CSV: ${problem}`);
  }

  return lines.join('\n').trimEnd();
}
