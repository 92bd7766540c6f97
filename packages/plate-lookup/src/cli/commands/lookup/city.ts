/**
 * City Command
 *
 * Look up the county and prefix for one city. Unlike the menu it never
 * offers to add the city; use add-city for that.
 *
 * Usage:
 *   plate-lookup city <name> [--json]
 *
 * @module cli/commands/lookup/city
 */

import type { LookupStore } from '../../../core/lookup-store.js';
import { normalizeCityName } from '../../../core/normalize.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import { formatCityResult, formatJson, printError, printOutput } from '../../lib/output.js';

export interface CityOptions {
  json?: boolean;
}

export function cityCommand(store: LookupStore, name: string, options: CityOptions = {}): ExitCode {
  if (!normalizeCityName(name)) {
    printError('City name cannot be empty.');
    return EXIT_CODES.INVALID_INPUT;
  }

  const result = store.findCountyByCity(name);

  if (options.json) {
    printOutput(formatJson(result));
  } else {
    printOutput(formatCityResult(result).join('\n'));
  }

  return result.found ? EXIT_CODES.SUCCESS : EXIT_CODES.NOT_FOUND;
}
