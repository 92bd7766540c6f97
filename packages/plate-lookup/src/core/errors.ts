/**
 * Plate Lookup Error Types
 *
 * Failures the store reports by throwing. Malformed data lines and
 * lookup misses are not errors: they surface as LoadIssue entries and
 * not-found outcomes.
 *
 * @module core/errors
 */

/**
 * Reference county file is missing or unreadable.
 * Nothing can be looked up without it, so callers treat it as fatal.
 */
export class ReferenceDataError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read county reference data at ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'ReferenceDataError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReferenceDataError);
    }
  }
}

/**
 * Input to a store operation is malformed (distinct from not-found)
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly field: 'prefix' | 'cityName'
  ) {
    super(message);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * City is already known to the store
 */
export class DuplicateCityError extends Error {
  constructor(public readonly cityName: string) {
    super(`City already known: ${cityName}`);
    this.name = 'DuplicateCityError';
    Object.setPrototypeOf(this, DuplicateCityError.prototype);
  }
}

/**
 * Appending to the city file failed. Memory was not updated.
 */
export class CityPersistenceError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Could not save city mapping to ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'CityPersistenceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CityPersistenceError);
    }
  }
}

/**
 * Node fs errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
