/**
 * Normalization helpers shared by the store and the CLI
 *
 * @module core/normalize
 */

const PREFIX_PATTERN = /^\d+$/;
const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Lookup key for a city name: trimmed, single-spaced, lower-case.
 */
export function normalizeCityName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Parse user input as a license-plate prefix.
 *
 * @returns The prefix, or null when the input is not a run of decimal digits
 */
export function parsePrefix(input: string): number | null {
  const trimmed = input.trim();
  if (!PREFIX_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parse user input as a signed decimal integer. Menu prompts take any
 * integer and treat out-of-range values as unknown prefixes.
 */
export function parseInteger(input: string): number | null {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Whether a value can be stored as a prefix
 */
export function isValidPrefix(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
