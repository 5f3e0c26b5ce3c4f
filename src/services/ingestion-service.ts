/**
 * Availability Ingestion
 * Turns the availability CSV (or JSON rows) into grid-aligned blocks
 */

import Papa from 'papaparse';
import type {
  AvailabilityBlock,
  AvailabilityRowInput,
  IngestedAvailability,
  InterviewerProfile,
  PersonId,
} from '../types/index.js';
import { invalidInputError } from '../utils/error.js';
import { floorToGrid, parseTimestamp } from '../utils/datetime.js';
import { normalizePersonId, sanitizeString } from '../utils/validation.js';

/**
 * Columns of the availability CSV
 */
export const CSV_COLUMNS = {
  interviewer: 'Interviewer',
  name: 'Name',
  title: 'Title',
  start: 'StartTime',
  end: 'EndTime',
} as const;

const REQUIRED_COLUMNS = [CSV_COLUMNS.interviewer, CSV_COLUMNS.start, CSV_COLUMNS.end];

export interface IngestionOptions {
  /** Zone used for naive timestamps and for grid alignment */
  timezone: string;
  gridQuantumMinutes: number;
}

type CsvRow = Record<string, string | undefined>;

/**
 * Display label: "Name — Title", "Name", or the id
 */
export function interviewerLabel(id: string, name?: string, title?: string): string {
  if (name && title) return `${name} — ${title}`;
  if (name) return name;
  return id;
}

/**
 * Accumulates blocks and interviewer profiles row by row
 */
class AvailabilityCollector {
  private readonly blocks: AvailabilityBlock[] = [];
  private readonly profiles = new Map<PersonId, { displayId: string; name?: string; title?: string }>();
  private readonly parseErrors: string[] = [];
  private skipped = 0;

  constructor(private readonly options: IngestionOptions) {}

  add(row: AvailabilityRowInput): void {
    const person = normalizePersonId(row.interviewer);
    const { timezone, gridQuantumMinutes } = this.options;
    const rawStart = parseTimestamp(row.start, timezone);
    const rawEnd = parseTimestamp(row.end, timezone);

    if (!person || !rawStart || !rawEnd) {
      this.skipped++;
      return;
    }

    const start = floorToGrid(rawStart, gridQuantumMinutes, timezone);
    let end = floorToGrid(rawEnd, gridQuantumMinutes, timezone);
    if (end <= start) {
      end = start.plus({ minutes: gridQuantumMinutes });
    }
    this.blocks.push({ person, start, end });

    const profile = this.profiles.get(person) ?? { displayId: sanitizeString(row.interviewer, 200) };
    const name = row.name ? sanitizeString(row.name, 200) : '';
    const title = row.title ? sanitizeString(row.title, 200) : '';
    if (!profile.name && name) profile.name = name;
    if (!profile.title && title) profile.title = title;
    this.profiles.set(person, profile);
  }

  /**
   * Drop a row the CSV parser could not split cleanly
   */
  reject(message: string): void {
    this.skipped++;
    this.parseErrors.push(message);
  }

  /**
   * Record a parser complaint that is not tied to a kept row
   */
  note(message: string): void {
    this.parseErrors.push(message);
  }

  result(): IngestedAvailability {
    const interviewers: InterviewerProfile[] = [...this.profiles.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([id, profile]) => ({
        id,
        displayId: profile.displayId,
        name: profile.name,
        title: profile.title,
        label: interviewerLabel(profile.displayId, profile.name, profile.title),
      }));

    return {
      blocks: this.blocks,
      interviewers,
      skippedRows: this.skipped,
      parseErrors: this.parseErrors,
    };
  }
}

/**
 * Parse the availability CSV (Interviewer, Name, Title, StartTime, EndTime)
 */
export function parseAvailabilityCsv(text: string, options: IngestionOptions): IngestedAvailability {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter(column => !fields.includes(column));
  if (missing.length > 0) {
    throw invalidInputError(
      `CSV must include at least: ${REQUIRED_COLUMNS.join(', ')}. Missing: ${missing.join(', ')}`,
      { columns: fields }
    );
  }

  const collector = new AvailabilityCollector(options);

  // Field-count errors carry the index of the row in parsed.data
  const mismatched = new Map<number, string>();
  for (const error of parsed.errors) {
    const where = error.row !== undefined ? `Row ${error.row + 1}: ` : '';
    if (error.type === 'FieldMismatch' && error.row !== undefined) {
      mismatched.set(error.row, `${where}${error.message}`);
    } else {
      collector.note(`${where}${error.message}`);
    }
  }

  for (const [i, row] of parsed.data.entries()) {
    const mismatch = mismatched.get(i);
    if (mismatch !== undefined) {
      collector.reject(mismatch);
      continue;
    }
    collector.add({
      interviewer: row[CSV_COLUMNS.interviewer] ?? '',
      start: row[CSV_COLUMNS.start] ?? '',
      end: row[CSV_COLUMNS.end] ?? '',
      name: row[CSV_COLUMNS.name],
      title: row[CSV_COLUMNS.title],
    });
  }
  return collector.result();
}

/**
 * Normalize JSON availability rows the same way as CSV rows
 */
export function toAvailabilityBlocks(
  rows: readonly AvailabilityRowInput[],
  options: IngestionOptions
): IngestedAvailability {
  const collector = new AvailabilityCollector(options);
  for (const row of rows) {
    collector.add(row);
  }
  return collector.result();
}
