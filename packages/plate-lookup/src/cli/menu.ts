/**
 * Interactive Menu
 *
 * The menu loop: 1 looks up a prefix, 2 looks up a city (offering to add
 * unknown ones), 3 quits. Every failure prints a message and returns to
 * the prompt; only quitting or end of input leaves the loop.
 *
 * @module cli/menu
 */

import {
  CityPersistenceError,
  DuplicateCityError,
  InvalidInputError,
} from '../core/errors.js';
import type { LookupStore } from '../core/lookup-store.js';
import { isValidPrefix, parseInteger } from '../core/normalize.js';
import type { PrefixLookupResult } from '../core/types.js';
import type { CLILogger } from './lib/logger.js';
import { formatCityResult, formatPrefixResult } from './lib/output.js';
import type { Prompter } from './prompter.js';

export interface MenuOptions {
  readonly prompter: Prompter;
  /** Line sink for results (default: console.log) */
  readonly write?: (line: string) => void;
  readonly logger?: CLILogger;
}

/** What a sub-loop asks the menu to do next */
type Next = 'menu' | 'quit';

const MENU_LINES = [
  '',
  'Select an option:',
  '1 - Lookup by license plate prefix',
  '2 - Lookup by city',
  '3 - Quit',
];

export async function runMenu(store: LookupStore, options: MenuOptions): Promise<void> {
  const { prompter, logger } = options;
  const write = options.write ?? ((line: string) => console.log(line));

  while (true) {
    MENU_LINES.forEach((line) => write(line));

    const choice = await prompter.ask('Enter choice: ');
    if (choice === null) return;

    let next: Next = 'menu';
    switch (choice.trim()) {
      case '1':
        logger?.commandStart('menu:prefix');
        next = await prefixLoop(store, prompter, write);
        logger?.commandEnd(true);
        break;
      case '2':
        logger?.commandStart('menu:city');
        next = await cityLoop(store, prompter, write, logger);
        logger?.commandEnd(true);
        break;
      case '3':
        write('Thanks for playing. Goodbye!');
        return;
      default:
        write('Invalid choice.');
    }

    if (next === 'quit') return;
  }
}

function isReturn(answer: string): boolean {
  return answer.trim().toLowerCase() === 'q';
}

async function prefixLoop(
  store: LookupStore,
  prompter: Prompter,
  write: (line: string) => void
): Promise<Next> {
  while (true) {
    const answer = await prompter.ask("Enter license plate prefix (or 'q' to return): ");
    if (answer === null) return 'quit';
    if (isReturn(answer)) return 'menu';

    const prefix = parseInteger(answer);
    if (prefix === null) {
      write('Please enter a valid number.');
      continue;
    }

    const result: PrefixLookupResult = isValidPrefix(prefix)
      ? store.findCountyByPrefix(prefix)
      : { found: false, prefix };
    formatPrefixResult(result).forEach((line) => write(line));
  }
}

async function cityLoop(
  store: LookupStore,
  prompter: Prompter,
  write: (line: string) => void,
  logger: CLILogger | undefined
): Promise<Next> {
  while (true) {
    const answer = await prompter.ask("Enter city name (or 'q' to return): ");
    if (answer === null) return 'quit';
    if (isReturn(answer)) return 'menu';

    const city = answer.trim();
    if (!city) {
      write('City name cannot be empty.');
      continue;
    }

    const result = store.findCountyByCity(city);
    formatCityResult(result).forEach((line) => write(line));
    if (result.found || result.reason === 'unknown-prefix') {
      continue;
    }

    const prefixAnswer = await prompter.ask(
      'Enter license prefix for this city (or -1 to cancel): '
    );
    if (prefixAnswer === null) return 'quit';

    const prefix = parseInteger(prefixAnswer);
    if (prefix === null) {
      write('Invalid prefix.');
      continue;
    }
    if (prefix === -1) continue;

    // The store accepts any prefix; only known ones are offered here
    if (!isValidPrefix(prefix) || !store.hasPrefix(prefix)) {
      write('That license prefix does not exist.');
      continue;
    }

    try {
      await store.addCity(city, prefix);
      logger?.debug('City added', { city, prefix });
      write('City added for future lookups.');
    } catch (error) {
      if (error instanceof CityPersistenceError) {
        write(`Could not save new city: ${error.message}`);
      } else if (error instanceof InvalidInputError || error instanceof DuplicateCityError) {
        write(error.message);
      } else {
        throw error;
      }
    }
  }
}
