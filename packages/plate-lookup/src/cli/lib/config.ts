/**
 * Plate Lookup CLI Configuration Management
 *
 * Loads configuration from .plate-lookuprc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PLATE_LOOKUP_*)
 * 3. Config file (.plate-lookuprc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Data file locations
 */
export interface PathsConfig {
  /** County reference CSV */
  readonly counties: string;
  /** Persisted city mappings */
  readonly cities: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  /** Absolute data file paths */
  readonly paths: PathsConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
interface ConfigFileSchema {
  version?: number;
  paths?: {
    counties?: string;
    cities?: string;
  };
  verbose?: boolean;
  json?: boolean;
}

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * County data shipped with the package
 */
export const BUNDLED_COUNTIES_PATH = fileURLToPath(
  new URL('../../../data/MontanaCounties.csv', import.meta.url)
);

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    counties: BUNDLED_COUNTIES_PATH,
    cities: './cities.txt',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.plate-lookuprc',
  '.plate-lookuprc.yaml',
  '.plate-lookuprc.yml',
  '.plate-lookuprc.json',
];

/**
 * Find config file in current directory or parent directories
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    if (dir === root) {
      return null;
    }
    dir = resolve(dir, '..');
  }
}

/**
 * Parse config file content
 */
function parseConfigFile(filePath: string): ConfigFileSchema {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, so one parser covers every file name
  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }

  const schema: ConfigFileSchema = {};
  if ('version' in parsed && typeof parsed.version === 'number') {
    schema.version = parsed.version;
  }
  if ('verbose' in parsed && typeof parsed.verbose === 'boolean') {
    schema.verbose = parsed.verbose;
  }
  if ('json' in parsed && typeof parsed.json === 'boolean') {
    schema.json = parsed.json;
  }
  if ('paths' in parsed && typeof parsed.paths === 'object' && parsed.paths !== null) {
    const paths = parsed.paths;
    schema.paths = {
      counties:
        'counties' in paths && typeof paths.counties === 'string' ? paths.counties : undefined,
      cities: 'cities' in paths && typeof paths.cities === 'string' ? paths.cities : undefined,
    };
  }
  return schema;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  return process.env[`PLATE_LOOKUP_${name}`];
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    counties?: string;
    cities?: string;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Paths from flags and environment resolve against the working directory,
 * paths from a config file against the file's directory.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());

  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const fileBase = configPath ? resolve(configPath, '..') : cwd;

  // Blank values count as unset and fall through to the next source
  const pickPath = (
    override: string | undefined,
    envName: string,
    fromFile: string | undefined,
    fallback: string
  ): string => {
    const fromEnv = getEnvVar(envName);
    if (isSet(override)) return resolve(cwd, override);
    if (isSet(fromEnv)) return resolve(cwd, fromEnv);
    if (isSet(fromFile)) return resolve(fileBase, fromFile);
    return resolve(cwd, fallback);
  };

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      counties: pickPath(
        options.overrides?.counties,
        'COUNTIES',
        fileConfig.paths?.counties,
        DEFAULT_CONFIG.paths.counties
      ),
      cities: pickPath(
        options.overrides?.cities,
        'CITIES',
        fileConfig.paths?.cities,
        DEFAULT_CONFIG.paths.cities
      ),
    },

    // Runtime flags
    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? fileConfig.verbose ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? fileConfig.json ?? false,
    configPath,
  };

  return config;
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!isSet(config.paths.counties) || !isSet(config.paths.cities)) {
    throw new Error('paths.counties and paths.cities must not be empty');
  }

  if (config.paths.counties === config.paths.cities) {
    throw new Error('paths.counties and paths.cities must name different files');
  }
}
