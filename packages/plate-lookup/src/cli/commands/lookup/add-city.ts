/**
 * Add City Command
 *
 * Persist a new city mapping after checking the prefix against the
 * reference data.
 *
 * Usage:
 *   plate-lookup add-city <name> <prefix>
 *
 * @module cli/commands/lookup/add-city
 */

import {
  CityPersistenceError,
  DuplicateCityError,
  InvalidInputError,
} from '../../../core/errors.js';
import type { LookupStore } from '../../../core/lookup-store.js';
import { parsePrefix } from '../../../core/normalize.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import { printError, printSuccess } from '../../lib/output.js';

export async function addCityCommand(
  store: LookupStore,
  name: string,
  prefixInput: string
): Promise<ExitCode> {
  const prefix = parsePrefix(prefixInput);
  if (prefix === null) {
    printError(`Prefix must be a number, got "${prefixInput}"`);
    return EXIT_CODES.INVALID_INPUT;
  }

  if (!store.hasPrefix(prefix)) {
    printError('That license prefix does not exist.');
    return EXIT_CODES.INVALID_INPUT;
  }

  try {
    const city = await store.addCity(name, prefix);
    printSuccess(`${city.cityName} added with prefix ${city.prefix}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CityPersistenceError) {
      printError(`Could not save new city: ${error.message}`);
      return EXIT_CODES.PERSISTENCE_ERROR;
    }
    if (error instanceof InvalidInputError || error instanceof DuplicateCityError) {
      printError(error.message);
      return EXIT_CODES.INVALID_INPUT;
    }
    throw error;
  }
}
