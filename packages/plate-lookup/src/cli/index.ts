/**
 * Plate Lookup CLI
 *
 * @module cli
 */

export { createProgram, StartupError, type CLIContext, type ProgramOptions } from './program.js';
export { runMenu, type MenuOptions } from './menu.js';
export { createReadlinePrompter, type Prompter } from './prompter.js';
export * from './commands/index.js';
export { loadConfig, validateConfig, findConfigFile, type CLIConfig, type LoadConfigOptions } from './lib/config.js';
export { CLILogger, createCLILogger, type LogLevel } from './lib/logger.js';
export { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
