/**
 * Data File Parsers
 *
 * Turns the reference CSV and the city file into records. Lines that do
 * not fit the expected shape, including CSV rows with broken quoting, are
 * skipped and reported as LoadIssue entries.
 *
 * @module core/parsers
 */

import { parse } from 'csv-parse/sync';
import { normalizeCityName, parsePrefix } from './normalize.js';
import type { CityRecord, CountyRecord, LoadIssue } from './types.js';

export interface ParseResult<T> {
  readonly records: readonly T[];
  readonly issues: readonly LoadIssue[];
}

/**
 * csv-parse row with `info: true`
 */
interface CsvRow {
  readonly record: readonly string[];
  readonly info: { readonly lines: number };
}

function isCsvRow(value: unknown): value is CsvRow {
  if (typeof value !== 'object' || value === null) return false;
  if (!('record' in value) || !('info' in value)) return false;
  const { record, info } = value;
  return (
    Array.isArray(record) &&
    record.every((field) => typeof field === 'string') &&
    typeof info === 'object' &&
    info !== null &&
    'lines' in info &&
    typeof info.lines === 'number'
  );
}

// ============================================================================
// County Reference Data
// ============================================================================

/**
 * Parse the county reference CSV: `prefix,county,county seat` per row.
 *
 * A first row whose prefix field is not a number is taken as a header.
 * Duplicate prefixes keep the first row.
 */
export function parseCountyCsv(content: string): ParseResult<CountyRecord> {
  const records: CountyRecord[] = [];
  const issues: LoadIssue[] = [];
  const seen = new Set<number>();
  const sourceLines = content.split(/\r?\n/);

  const rows: unknown = parse(content, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    skip_records_with_error: true,
    info: true,
    on_skip: (error) => {
      if (!error) return;
      const line = 'lines' in error && typeof error.lines === 'number' ? error.lines : 0;
      issues.push({
        file: 'counties',
        line,
        reason: error.message,
        content: sourceLines[line - 1] ?? '',
      });
    },
  });

  if (!Array.isArray(rows)) {
    return { records, issues };
  }

  rows.forEach((row: unknown, index) => {
    if (!isCsvRow(row)) return;

    const line = row.info.lines;
    const text = row.record.join(',');
    const report = (reason: string): void => {
      issues.push({ file: 'counties', line, reason, content: text });
    };

    const [prefixField = '', countyName = '', countySeat = ''] = row.record;
    const prefix = parsePrefix(prefixField);

    if (prefix === null) {
      if (index === 0) return; // header
      report(`invalid prefix "${prefixField}"`);
      return;
    }
    if (row.record.length !== 3) {
      report(`expected 3 fields, found ${row.record.length}`);
      return;
    }
    if (!countyName || !countySeat) {
      report('county name and county seat must not be empty');
      return;
    }
    if (seen.has(prefix)) {
      report(`duplicate prefix ${prefix}`);
      return;
    }

    seen.add(prefix);
    records.push(Object.freeze({ prefix, countyName, countySeat }));
  });

  return { records, issues };
}

// ============================================================================
// City Mappings
// ============================================================================

/**
 * Parse the city file: `city_name,prefix` per line. Blank lines are ignored.
 */
export function parseCityLines(content: string): ParseResult<CityRecord> {
  const records: CityRecord[] = [];
  const issues: LoadIssue[] = [];

  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const line = raw.trim();
    if (!line) continue;

    const report = (reason: string): void => {
      issues.push({ file: 'cities', line: i + 1, reason, content: raw });
    };

    const fields = line.split(',');
    if (fields.length !== 2) {
      report(`expected 2 fields, found ${fields.length}`);
      continue;
    }

    const [cityField = '', prefixField = ''] = fields;
    const cityName = cityField.trim();
    const prefix = parsePrefix(prefixField);

    if (!normalizeCityName(cityName)) {
      report('city name must not be empty');
      continue;
    }
    if (prefix === null) {
      report(`invalid prefix "${prefixField.trim()}"`);
      continue;
    }

    records.push(Object.freeze({ cityName, prefix, source: 'user' as const }));
  }

  return { records, issues };
}

/**
 * Serialize one city mapping as a city file line (with trailing newline)
 */
export function formatCityLine(cityName: string, prefix: number): string {
  return `${cityName},${prefix}\n`;
}
