/**
 * Test fixtures: temporary data directories with small county and city files
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LookupStore } from '../../core/lookup-store.js';
import type { StoreLogger } from '../../core/types.js';

export const COUNTY_HEADER = 'License Plate Prefix,County,County Seat';

export const COUNTY_ROWS = [
  '1,Silver Bow,Butte',
  '6,Madison,Virginia City',
  '16,Gallatin,Bozeman',
  '49,Park,Livingston',
] as const;

export const COUNTY_CSV = [COUNTY_HEADER, ...COUNTY_ROWS].join('\n') + '\n';

export interface DataDir {
  readonly dir: string;
  readonly countiesPath: string;
  readonly citiesPath: string;
  cleanup(): Promise<void>;
}

export async function createDataDir(
  options: { counties?: string; cities?: string } = {}
): Promise<DataDir> {
  const dir = await mkdtemp(join(tmpdir(), 'plate-lookup-'));
  const countiesPath = join(dir, 'counties.csv');
  const citiesPath = join(dir, 'cities.txt');

  await writeFile(countiesPath, options.counties ?? COUNTY_CSV, 'utf-8');
  if (options.cities !== undefined) {
    await writeFile(citiesPath, options.cities, 'utf-8');
  }

  return {
    dir,
    countiesPath,
    citiesPath,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export function loadStore(data: DataDir, logger?: StoreLogger): Promise<LookupStore> {
  return LookupStore.load({
    countiesPath: data.countiesPath,
    citiesPath: data.citiesPath,
    logger,
  });
}

/**
 * Logger that records calls instead of printing
 */
export interface RecordingLogger extends StoreLogger {
  readonly entries: Array<{ level: 'debug' | 'warn' | 'error'; message: string; metadata?: Readonly<Record<string, unknown>> }>;
}

export function createRecordingLogger(): RecordingLogger {
  const entries: RecordingLogger['entries'] = [];
  return {
    entries,
    debug: (message, metadata) => entries.push({ level: 'debug', message, metadata }),
    warn: (message, metadata) => entries.push({ level: 'warn', message, metadata }),
    error: (message, metadata) => entries.push({ level: 'error', message, metadata }),
  };
}
