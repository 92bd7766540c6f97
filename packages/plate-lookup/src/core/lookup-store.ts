/**
 * Lookup Store
 *
 * Owns the two lookup tables: prefix -> county (read-only reference data)
 * and city -> prefix (user mappings plus county seats). New city mappings
 * are appended to the city file before they enter memory, so a failed
 * write leaves both unchanged.
 *
 * @module core/lookup-store
 */

import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  CityPersistenceError,
  DuplicateCityError,
  InvalidInputError,
  ReferenceDataError,
  errorCode,
} from './errors.js';
import { isValidPrefix, normalizeCityName } from './normalize.js';
import { formatCityLine, parseCityLines, parseCountyCsv } from './parsers.js';
import type {
  CityLookupResult,
  CityRecord,
  CountyRecord,
  LoadIssue,
  LoadOptions,
  PrefixLookupResult,
  StoreLogger,
} from './types.js';

const NEWLINE = 0x0a;

export class LookupStore {
  private readonly counties = new Map<number, CountyRecord>();
  private readonly cities = new Map<string, CityRecord>();
  private readonly loadIssues: LoadIssue[] = [];

  private constructor(
    private readonly citiesPath: string,
    private readonly logger: StoreLogger | undefined
  ) {}

  /**
   * Read both data files and build the lookup tables.
   *
   * @throws ReferenceDataError when the county file cannot be read
   */
  static async load(options: LoadOptions): Promise<LookupStore> {
    const store = new LookupStore(options.citiesPath, options.logger);

    let countyContent: string;
    try {
      countyContent = await readFile(options.countiesPath, 'utf-8');
    } catch (error) {
      throw new ReferenceDataError(options.countiesPath, error);
    }

    const counties = parseCountyCsv(countyContent);
    for (const county of counties.records) {
      store.counties.set(county.prefix, county);
    }
    store.recordIssues(counties.issues);

    const cityContent = await store.readCityFile();
    const cities = parseCityLines(cityContent);
    for (const city of cities.records) {
      store.cities.set(normalizeCityName(city.cityName), city);
    }
    store.recordIssues(cities.issues);

    const userCityCount = store.cities.size;
    store.registerCountySeats();

    options.logger?.debug('Lookup data loaded', {
      counties: store.counties.size,
      userCities: userCityCount,
      countySeats: store.cities.size - userCityCount,
      skippedLines: store.loadIssues.length,
    });

    return store;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * @throws InvalidInputError when prefix is not a non-negative integer
   */
  findCountyByPrefix(prefix: number): PrefixLookupResult {
    assertPrefix(prefix);
    const county = this.counties.get(prefix);
    return county ? { found: true, county } : { found: false, prefix };
  }

  /**
   * Case- and whitespace-insensitive city lookup.
   *
   * @throws InvalidInputError when the name is blank
   */
  findCountyByCity(cityName: string): CityLookupResult {
    const key = normalizeCityName(cityName);
    if (!key) {
      throw new InvalidInputError('City name must not be empty', 'cityName');
    }

    const city = this.cities.get(key);
    if (!city) {
      return { found: false, reason: 'unknown-city', city: cityName.trim() };
    }

    const county = this.counties.get(city.prefix);
    if (!county) {
      return { found: false, reason: 'unknown-prefix', city, prefix: city.prefix };
    }

    return { found: true, city, prefix: city.prefix, county };
  }

  hasCity(cityName: string): boolean {
    return this.cities.has(normalizeCityName(cityName));
  }

  hasPrefix(prefix: number): boolean {
    return this.counties.has(prefix);
  }

  listCounties(): CountyRecord[] {
    return [...this.counties.values()].sort((a, b) => a.prefix - b.prefix);
  }

  listCities(): CityRecord[] {
    return [...this.cities.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, city]) => city);
  }

  get countyCount(): number {
    return this.counties.size;
  }

  get cityCount(): number {
    return this.cities.size;
  }

  get issues(): readonly LoadIssue[] {
    return this.loadIssues;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Persist a new city mapping, then make it queryable.
   *
   * The prefix is stored as given; checking it against the reference
   * data is up to the caller.
   *
   * @throws InvalidInputError for a blank name, a name containing a comma
   *   or line break, or a prefix that is not a non-negative integer
   * @throws DuplicateCityError when the city is already known
   * @throws CityPersistenceError when the city file cannot be appended to
   */
  async addCity(cityName: string, prefix: number): Promise<CityRecord> {
    const name = cityName.trim().replace(/\s+/g, ' ');
    if (!name) {
      throw new InvalidInputError('City name must not be empty', 'cityName');
    }
    if (/[,\r\n]/.test(cityName)) {
      throw new InvalidInputError(
        'City name must not contain commas or line breaks',
        'cityName'
      );
    }
    assertPrefix(prefix);

    const key = normalizeCityName(name);
    if (this.cities.has(key)) {
      throw new DuplicateCityError(name);
    }

    try {
      await this.appendCityLine(formatCityLine(name, prefix));
    } catch (error) {
      this.logger?.error('Failed to persist city mapping', {
        city: name,
        prefix,
        path: this.citiesPath,
        code: errorCode(error),
      });
      throw new CityPersistenceError(this.citiesPath, error);
    }

    const record: CityRecord = Object.freeze({ cityName: name, prefix, source: 'user' as const });
    this.cities.set(key, record);
    return record;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * County seats resolve as cities without being persisted.
   * Entries from the city file take precedence.
   */
  private registerCountySeats(): void {
    for (const county of this.counties.values()) {
      const key = normalizeCityName(county.countySeat);
      if (!this.cities.has(key)) {
        this.cities.set(
          key,
          Object.freeze({
            cityName: county.countySeat,
            prefix: county.prefix,
            source: 'county-seat' as const,
          })
        );
      }
    }
  }

  private async readCityFile(): Promise<string> {
    try {
      return await readFile(this.citiesPath, 'utf-8');
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'ENOENT') {
        this.logger?.warn('City file unreadable, starting without city mappings', {
          path: this.citiesPath,
          code,
        });
      }
      return '';
    }
  }

  /**
   * Append one line, first adding a line break if the file lacks a trailing one.
   */
  private async appendCityLine(line: string): Promise<void> {
    await mkdir(dirname(this.citiesPath), { recursive: true });
    const handle = await open(this.citiesPath, 'a+');
    try {
      const { size } = await handle.stat();
      let text = line;
      if (size > 0) {
        const last = Buffer.alloc(1);
        await handle.read(last, 0, 1, size - 1);
        if (last[0] !== NEWLINE) {
          text = `\n${line}`;
        }
      }
      await handle.appendFile(text, 'utf-8');
    } finally {
      await handle.close();
    }
  }

  private recordIssues(issues: readonly LoadIssue[]): void {
    for (const issue of issues) {
      this.loadIssues.push(issue);
      this.logger?.warn('Skipped malformed line', {
        file: issue.file,
        line: issue.line,
        reason: issue.reason,
      });
    }
  }
}

function assertPrefix(prefix: number): void {
  if (!isValidPrefix(prefix)) {
    throw new InvalidInputError(
      `Prefix must be a non-negative integer, got ${prefix}`,
      'prefix'
    );
  }
}
