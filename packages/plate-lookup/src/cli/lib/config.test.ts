import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BUNDLED_COUNTIES_PATH, loadConfig, validateConfig, type CLIConfig } from './config.js';

const ENV_KEYS = [
  'PLATE_LOOKUP_CONFIG',
  'PLATE_LOOKUP_COUNTIES',
  'PLATE_LOOKUP_CITIES',
  'PLATE_LOOKUP_VERBOSE',
  'PLATE_LOOKUP_JSON',
] as const;

describe('loadConfig', () => {
  let dir: string;
  const savedEnv = new Map<string, string | undefined>();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plate-lookup-config-'));
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to the bundled counties and ./cities.txt', async () => {
    const config = await loadConfig({ cwd: dir });

    expect(config).toEqual({
      version: 1,
      paths: { counties: BUNDLED_COUNTIES_PATH, cities: join(dir, 'cities.txt') },
      verbose: false,
      json: false,
      configPath: null,
    });
  });

  it('reads a YAML rc file found in a parent directory', async () => {
    await writeFile(
      join(dir, '.plate-lookuprc'),
      'version: 1\npaths:\n  counties: data/counties.csv\n  cities: data/cities.txt\nverbose: true\n'
    );
    const nested = join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested });

    expect(config.configPath).toBe(join(dir, '.plate-lookuprc'));
    expect(config.paths).toEqual({
      counties: join(dir, 'data', 'counties.csv'),
      cities: join(dir, 'data', 'cities.txt'),
    });
    expect(config.verbose).toBe(true);
  });

  it('reads a JSON rc file', async () => {
    await writeFile(join(dir, '.plate-lookuprc.json'), JSON.stringify({ json: true }));

    const config = await loadConfig({ cwd: dir });

    expect(config.configPath).toBe(join(dir, '.plate-lookuprc.json'));
    expect(config.json).toBe(true);
  });

  it('prefers flags over environment over the rc file', async () => {
    await writeFile(join(dir, '.plate-lookuprc'), 'paths:\n  cities: file-cities.txt\nverbose: false\n');
    process.env.PLATE_LOOKUP_CITIES = 'env-cities.txt';
    process.env.PLATE_LOOKUP_VERBOSE = '1';

    const fromEnv = await loadConfig({ cwd: dir });
    expect(fromEnv.paths.cities).toBe(join(dir, 'env-cities.txt'));
    expect(fromEnv.verbose).toBe(true);

    const fromFlags = await loadConfig({
      cwd: dir,
      overrides: { cities: 'flag-cities.txt', verbose: false },
    });
    expect(fromFlags.paths.cities).toBe(join(dir, 'flag-cities.txt'));
    expect(fromFlags.verbose).toBe(false);
  });

  it('treats a blank path in the rc file as unset', async () => {
    await writeFile(join(dir, '.plate-lookuprc'), 'paths:\n  counties: "  "\n  cities: ""\n');

    const config = await loadConfig({ cwd: dir });

    expect(config.paths).toEqual({ counties: BUNDLED_COUNTIES_PATH, cities: join(dir, 'cities.txt') });
    expect(() => validateConfig(config)).not.toThrow();
  });

  it('uses an explicit config path', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'paths:\n  counties: ref.csv\n');

    const config = await loadConfig({ cwd: dir, configPath: 'custom.yaml' });

    expect(config.paths.counties).toBe(join(dir, 'ref.csv'));
  });

  it('rejects a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'nope.yaml' })).rejects.toThrow(
      `Config file not found: ${join(dir, 'nope.yaml')}`
    );
  });

  it('rejects a config file that is not a mapping', async () => {
    await writeFile(join(dir, '.plate-lookuprc'), '- one\n- two\n');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow('Config file must contain a mapping');
  });
});

describe('validateConfig', () => {
  const base: CLIConfig = {
    version: 1,
    paths: { counties: '/data/counties.csv', cities: '/data/cities.txt' },
    verbose: false,
    json: false,
    configPath: null,
  };

  it('accepts a valid configuration', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('rejects an unsupported version', () => {
    expect(() => validateConfig({ ...base, version: 2 })).toThrow(
      'Unsupported config version: 2. Expected 1.'
    );
  });

  it('rejects an empty path', () => {
    expect(() =>
      validateConfig({ ...base, paths: { counties: '/data/counties.csv', cities: '  ' } })
    ).toThrow('paths.counties and paths.cities must not be empty');
  });

  it('rejects one file used for both datasets', () => {
    expect(() =>
      validateConfig({ ...base, paths: { counties: '/data/x', cities: '/data/x' } })
    ).toThrow('paths.counties and paths.cities must name different files');
  });
});
