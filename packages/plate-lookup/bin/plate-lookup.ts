#!/usr/bin/env tsx
/**
 * Plate Lookup CLI Entry Point
 *
 * Look up Montana counties by license plate prefix, or prefixes by city.
 * With no subcommand, runs the interactive menu.
 *
 * @module plate-lookup-cli
 */

import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { createProgram, StartupError } from '../src/cli/program.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof StartupError) {
      console.error(error.message);
      process.exit(error.exitCode);
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.UNEXPECTED_ERROR);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.UNEXPECTED_ERROR);
});
