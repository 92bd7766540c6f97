/**
 * Prefix Command
 *
 * Look up the county for one license-plate prefix.
 *
 * Usage:
 *   plate-lookup prefix <prefix> [--json]
 *
 * @module cli/commands/lookup/prefix
 */

import type { LookupStore } from '../../../core/lookup-store.js';
import { parsePrefix } from '../../../core/normalize.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import { formatJson, formatPrefixResult, printError, printOutput } from '../../lib/output.js';

export interface PrefixOptions {
  json?: boolean;
}

export function prefixCommand(
  store: LookupStore,
  input: string,
  options: PrefixOptions = {}
): ExitCode {
  const prefix = parsePrefix(input);
  if (prefix === null) {
    printError(`Prefix must be a number, got "${input}"`);
    return EXIT_CODES.INVALID_INPUT;
  }

  const result = store.findCountyByPrefix(prefix);

  if (options.json) {
    printOutput(formatJson(result));
  } else {
    printOutput(formatPrefixResult(result).join('\n'));
  }

  return result.found ? EXIT_CODES.SUCCESS : EXIT_CODES.NOT_FOUND;
}
