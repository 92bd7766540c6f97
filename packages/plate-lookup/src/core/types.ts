/**
 * Plate Lookup Core Types
 *
 * Records held by the lookup store and the outcomes its queries return.
 * Query outcomes are discriminated unions: a miss is a normal result,
 * never an exception.
 *
 * @module core/types
 */

// ============================================================================
// Records
// ============================================================================

/**
 * One county, keyed by its license-plate prefix.
 * Loaded from the reference file and never written back.
 */
export interface CountyRecord {
  readonly prefix: number;
  readonly countyName: string;
  readonly countySeat: string;
}

/**
 * Where a city mapping came from
 *
 * - user: a line in the city file
 * - county-seat: derived from the reference data at load time, not persisted
 */
export type CitySource = 'user' | 'county-seat';

/**
 * One known city and the prefix it maps to
 */
export interface CityRecord {
  /** Name as supplied (trimmed) */
  readonly cityName: string;
  readonly prefix: number;
  readonly source: CitySource;
}

/**
 * Which data file a load issue belongs to
 */
export type DataFileKind = 'counties' | 'cities';

/**
 * A line skipped while loading
 */
export interface LoadIssue {
  readonly file: DataFileKind;
  /** 1-based line number */
  readonly line: number;
  readonly reason: string;
  readonly content: string;
}

// ============================================================================
// Query Outcomes
// ============================================================================

export type PrefixLookupResult =
  | { readonly found: true; readonly county: CountyRecord }
  | { readonly found: false; readonly prefix: number };

export type CityLookupResult =
  | {
      readonly found: true;
      readonly city: CityRecord;
      readonly prefix: number;
      readonly county: CountyRecord;
    }
  | { readonly found: false; readonly reason: 'unknown-city'; readonly city: string }
  | {
      readonly found: false;
      readonly reason: 'unknown-prefix';
      readonly city: CityRecord;
      readonly prefix: number;
    };

// ============================================================================
// Store Options
// ============================================================================

/**
 * Minimal logging surface the store writes to.
 * Satisfied by CLILogger.
 */
export interface StoreLogger {
  debug(message: string, metadata?: Readonly<Record<string, unknown>>): void;
  warn(message: string, metadata?: Readonly<Record<string, unknown>>): void;
  error(message: string, metadata?: Readonly<Record<string, unknown>>): void;
}

export interface LoadOptions {
  /** Reference CSV (prefix, county, county seat) */
  readonly countiesPath: string;
  /** Append-only city mapping file (city_name,prefix) */
  readonly citiesPath: string;
  readonly logger?: StoreLogger;
}
