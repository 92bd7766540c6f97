/**
 * Plate Lookup core: data loading, queries and city persistence
 *
 * @module core
 */

export { LookupStore } from './lookup-store.js';
export {
  ReferenceDataError,
  InvalidInputError,
  DuplicateCityError,
  CityPersistenceError,
  errorCode,
} from './errors.js';
export { normalizeCityName, parsePrefix, parseInteger, isValidPrefix } from './normalize.js';
export { parseCountyCsv, parseCityLines, formatCityLine, type ParseResult } from './parsers.js';
export type {
  CountyRecord,
  CityRecord,
  CitySource,
  DataFileKind,
  LoadIssue,
  PrefixLookupResult,
  CityLookupResult,
  StoreLogger,
  LoadOptions,
} from './types.js';
