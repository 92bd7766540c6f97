/**
 * Plate Lookup CLI Program
 *
 * Commander wiring: global options, context initialization, and the
 * menu plus single-shot lookup commands.
 *
 * @module cli/program
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { ReferenceDataError } from '../core/errors.js';
import { LookupStore } from '../core/lookup-store.js';
import { addCityCommand } from './commands/lookup/add-city.js';
import { cityCommand } from './commands/lookup/city.js';
import { countiesCommand } from './commands/lookup/counties.js';
import { prefixCommand } from './commands/lookup/prefix.js';
import { loadConfig, validateConfig, type CLIConfig } from './lib/config.js';
import { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
import { createCLILogger, type CLILogger } from './lib/logger.js';
import { runMenu } from './menu.js';
import { createReadlinePrompter, type Prompter } from './prompter.js';

// ============================================================================
// Context
// ============================================================================

export interface CLIContext {
  config: CLIConfig;
  logger: CLILogger;
  store: LookupStore;
  startTime: number;
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  counties?: string;
  cities?: string;
}

export interface ProgramOptions {
  /** Prompter for the menu (default: readline over stdin/stdout) */
  createPrompter?: () => Prompter;
  /** Working directory for config search and relative paths */
  cwd?: string;
}

/**
 * Thrown from the preAction hook when the CLI cannot start
 */
export class StartupError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'StartupError';
  }
}

function getVersion(): string {
  const packageJsonPath = new URL('../../package.json', import.meta.url);
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function initializeContext(options: GlobalOptions, cwd: string | undefined): Promise<CLIContext> {
  const startTime = Date.now();

  let config: CLIConfig;
  try {
    config = await loadConfig({
      configPath: options.config,
      cwd,
      overrides: {
        counties: options.counties,
        cities: options.cities,
        verbose: options.verbose,
        json: options.json,
      },
    });
    validateConfig(config);
  } catch (error) {
    throw new StartupError(
      `Configuration error: ${error instanceof Error ? error.message : String(error)}`,
      EXIT_CODES.CONFIG_ERROR
    );
  }

  const logger = createCLILogger({ verbose: config.verbose, json: config.json });

  logger.debug('Configuration loaded', {
    configPath: config.configPath,
    counties: config.paths.counties,
    cities: config.paths.cities,
  });

  try {
    const store = await LookupStore.load({
      countiesPath: config.paths.counties,
      citiesPath: config.paths.cities,
      logger,
    });
    return { config, logger, store, startTime };
  } catch (error) {
    if (error instanceof ReferenceDataError) {
      throw new StartupError(error.message, EXIT_CODES.CONFIG_ERROR);
    }
    throw error;
  }
}

// ============================================================================
// CLI Setup
// ============================================================================

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const program = new Command();
  let context: CLIContext | null = null;

  const getContext = (): CLIContext => {
    if (!context) {
      throw new Error('Context not initialized. The preAction hook did not run.');
    }
    return context;
  };

  /**
   * Run a single-shot command with start/end logging and set the exit code.
   * A lookup miss still counts as a completed command.
   */
  const runCommand = async (
    name: string,
    fn: (ctx: CLIContext) => ExitCode | Promise<ExitCode>
  ): Promise<void> => {
    const ctx = getContext();
    ctx.logger.commandStart(name);
    const exitCode = await fn(ctx);
    ctx.logger.commandEnd(exitCode <= EXIT_CODES.NOT_FOUND, { exitCode });
    process.exitCode = exitCode;
  };

  const menuAction = async (): Promise<void> => {
    const { store, logger } = getContext();
    const prompter = programOptions.createPrompter?.() ?? createReadlinePrompter();
    try {
      await runMenu(store, { prompter, logger });
    } finally {
      prompter.close();
    }
  };

  program
    .name('plate-lookup')
    .description('Look up Montana counties by license plate prefix or city')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .plate-lookuprc)')
    .option('--counties <path>', 'County reference CSV')
    .option('--cities <path>', 'City mappings file')
    .hook('preAction', async (thisCommand) => {
      context = await initializeContext(thisCommand.opts<GlobalOptions>(), programOptions.cwd);
    })
    .action(menuAction);

  program.command('menu').description('Interactive lookup menu (default)').action(menuAction);

  program
    .command('prefix <prefix>')
    .description('Look up the county for a license plate prefix')
    .action((prefix: string) =>
      runCommand('prefix', ({ store, config }) => prefixCommand(store, prefix, { json: config.json }))
    );

  program
    .command('city <name>')
    .description('Look up the county and prefix for a city')
    .action((name: string) =>
      runCommand('city', ({ store, config }) => cityCommand(store, name, { json: config.json }))
    );

  program
    .command('add-city <name> <prefix>')
    .description('Remember a city and its license plate prefix')
    .action((name: string, prefix: string) =>
      runCommand('add-city', ({ store }) => addCityCommand(store, name, prefix))
    );

  program
    .command('counties')
    .description('List all counties')
    .option('--format <fmt>', 'Output format: table|json|csv', 'table')
    .action((options: { format: string }) =>
      runCommand('counties', ({ store, config }) =>
        countiesCommand(store, { format: config.json ? 'json' : options.format })
      )
    );

  return program;
}
