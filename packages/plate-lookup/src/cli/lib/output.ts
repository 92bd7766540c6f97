/**
 * Output Formatting for CLI Commands
 *
 * Consistent formatting of lookup results and county listings.
 * Supports: table, json, csv formats
 *
 * @module cli/lib/output
 */

import type { CityLookupResult, CountyRecord, PrefixLookupResult } from '../../core/types.js';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  /** Right-align numeric columns */
  readonly alignRight?: boolean;
}

/**
 * Format data as a table
 */
export function formatTable<T extends object>(data: readonly T[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cellValue(row, col.key).length))
  );

  const renderRow = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => {
        const width = widths[i] ?? 0;
        return columns[i]?.alignRight ? cell.padStart(width) : cell.padEnd(width);
      })
      .join(' | ');

  const headerRow = renderRow(columns.map((col) => col.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) => renderRow(columns.map((col) => cellValue(row, col.key))));

  return [headerRow, separator, ...dataRows].join('\n');
}

function cellValue(row: object, key: string): string {
  const value: unknown = Object.entries(row).find(([k]) => k === key)?.[1];
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as CSV
 */
export function formatCsv<T extends object>(data: readonly T[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(cellValue(row, col.key))).join(',')
  );
  return [headerRow, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput<T extends object>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

// ============================================================================
// Lookup Results
// ============================================================================

export const COUNTY_COLUMNS: readonly TableColumn[] = [
  { key: 'prefix', header: 'Prefix', alignRight: true },
  { key: 'countyName', header: 'County' },
  { key: 'countySeat', header: 'County Seat' },
];

/**
 * Reference data as it appears in the shipped CSV
 */
export function formatCounties(counties: readonly CountyRecord[], format: OutputFormat): string {
  if (format === 'csv') {
    return formatCsv(counties, [
      { key: 'prefix', header: 'License Plate Prefix' },
      { key: 'countyName', header: 'County' },
      { key: 'countySeat', header: 'County Seat' },
    ]);
  }
  return formatOutput(counties, format, COUNTY_COLUMNS);
}

export function formatPrefixResult(result: PrefixLookupResult): string[] {
  if (!result.found) {
    return ['Unknown license plate prefix.'];
  }
  return [`County: ${result.county.countyName}`, `County Seat: ${result.county.countySeat}`];
}

export function formatCityResult(result: CityLookupResult): string[] {
  if (result.found) {
    return [`County: ${result.county.countyName}`, `License Prefix: ${result.prefix}`];
  }
  if (result.reason === 'unknown-prefix') {
    return [`City is mapped to unknown prefix ${result.prefix}.`];
  }
  return ['City not found.'];
}

// ============================================================================
// Console Helpers
// ============================================================================

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}
