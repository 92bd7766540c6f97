/**
 * Counties Command
 *
 * List the reference data ordered by prefix.
 *
 * Usage:
 *   plate-lookup counties [--format table|json|csv]
 *
 * @module cli/commands/lookup/counties
 */

import type { LookupStore } from '../../../core/lookup-store.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import {
  OUTPUT_FORMATS,
  formatCounties,
  isOutputFormat,
  printError,
  printOutput,
} from '../../lib/output.js';

export interface CountiesOptions {
  format?: string;
}

export function countiesCommand(store: LookupStore, options: CountiesOptions = {}): ExitCode {
  const format = options.format ?? 'table';
  if (!isOutputFormat(format)) {
    printError(`Unknown format "${format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
    return EXIT_CODES.INVALID_INPUT;
  }

  printOutput(formatCounties(store.listCounties(), format));
  return EXIT_CODES.SUCCESS;
}
