/**
 * CLI Diagnostics Logger
 *
 * Load warnings, persistence failures and command timing. With --json each
 * entry is one JSON object per line; otherwise a short tagged line. Lookup
 * results never go through here (see output.ts).
 *
 * @module cli/lib/logger
 */

import type { StoreLogger } from '../../core/types.js';

export type LogLevel = 'debug' | 'warn' | 'error';

export type LogFields = Readonly<Record<string, unknown>>;

export interface CLILoggerOptions {
  /** Emit debug entries (--verbose) */
  readonly verbose: boolean;
  /** One JSON object per entry (--json) */
  readonly json: boolean;
}

const SERVICE = 'plate-lookup';

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: '\x1b[90mdebug\x1b[0m',
  warn: '\x1b[33mwarn\x1b[0m',
  error: '\x1b[31merror\x1b[0m',
};

export class CLILogger implements StoreLogger {
  private command: string | undefined;
  private commandStartedAt = Date.now();

  constructor(private readonly options: CLILoggerOptions) {}

  debug(message: string, fields?: LogFields): void {
    if (this.options.verbose) {
      this.emit('debug', message, fields);
    }
  }

  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit('error', message, fields);
  }

  /**
   * Tag later entries with a command (a subcommand, or a menu loop such as
   * `menu:city`) and restart the duration clock.
   */
  commandStart(command: string): void {
    this.command = command;
    this.commandStartedAt = Date.now();
    this.debug(`Starting ${command}`);
  }

  commandEnd(success: boolean, fields: LogFields = {}): void {
    const timing = { duration_ms: Date.now() - this.commandStartedAt, ...fields };
    if (success) {
      this.debug('Command completed', timing);
    } else {
      this.error('Command failed', timing);
    }
  }

  private emit(level: LogLevel, message: string, fields: LogFields = {}): void {
    const line = this.options.json
      ? this.toJson(level, message, fields)
      : this.toText(level, message, fields);

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.debug(line);
    }
  }

  private toJson(level: LogLevel, message: string, fields: LogFields): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      service: SERVICE,
      ...(this.command === undefined ? {} : { command: this.command }),
      ...fields,
    });
  }

  private toText(level: LogLevel, message: string, fields: LogFields): string {
    const parts = [LEVEL_TAGS[level]];
    if (this.command !== undefined) {
      parts.push(`[${this.command}]`);
    }
    parts.push(message);

    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      parts.push(`${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    }

    return parts.join(' ');
  }
}

export function createCLILogger(options: Partial<CLILoggerOptions> = {}): CLILogger {
  return new CLILogger({
    verbose: options.verbose ?? false,
    json: options.json ?? false,
  });
}
