import { describe, it, expect } from 'vitest';
import type { CountyRecord } from '../../core/types.js';
import {
  COUNTY_COLUMNS,
  formatCityResult,
  formatCounties,
  formatCsv,
  formatPrefixResult,
  formatTable,
  isOutputFormat,
} from './output.js';

const PARK: CountyRecord = { prefix: 49, countyName: 'Park', countySeat: 'Livingston' };

const COUNTIES: CountyRecord[] = [{ prefix: 1, countyName: 'Silver Bow', countySeat: 'Butte' }, PARK];

describe('formatTable', () => {
  it('pads columns to the widest value', () => {
    expect(formatTable(COUNTIES, COUNTY_COLUMNS).split('\n')).toEqual([
      'Prefix | County     | County Seat',
      '-------+------------+------------',
      '     1 | Silver Bow | Butte      ',
      '    49 | Park       | Livingston ',
    ]);
  });

  it('says so when there is nothing to show', () => {
    expect(formatTable([], COUNTY_COLUMNS)).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('quotes values containing commas or quotes', () => {
    const rows = [{ name: 'Madison, Upper', note: 'say "hi"' }];
    const columns = [
      { key: 'name', header: 'Name' },
      { key: 'note', header: 'Note' },
    ];

    expect(formatCsv(rows, columns)).toBe('Name,Note\n"Madison, Upper","say ""hi"""');
  });
});

describe('formatCounties', () => {
  it('writes CSV in the reference file layout', () => {
    expect(formatCounties(COUNTIES, 'csv')).toBe(
      'License Plate Prefix,County,County Seat\n1,Silver Bow,Butte\n49,Park,Livingston'
    );
  });

  it('writes JSON as a pretty array', () => {
    expect(JSON.parse(formatCounties(COUNTIES, 'json'))).toEqual(COUNTIES);
  });
});

describe('lookup result lines', () => {
  it('formats prefix lookups', () => {
    expect(formatPrefixResult({ found: true, county: PARK })).toEqual([
      'County: Park',
      'County Seat: Livingston',
    ]);
    expect(formatPrefixResult({ found: false, prefix: 999 })).toEqual([
      'Unknown license plate prefix.',
    ]);
  });

  it('formats city lookups', () => {
    const city = { cityName: 'Gardiner', prefix: 49, source: 'user' as const };
    expect(
      formatCityResult({ found: true, city, prefix: 49, county: PARK })
    ).toEqual(['County: Park', 'License Prefix: 49']);
    expect(formatCityResult({ found: false, reason: 'unknown-city', city: 'Ennis' })).toEqual([
      'City not found.',
    ]);
    expect(
      formatCityResult({ found: false, reason: 'unknown-prefix', city, prefix: 49 })
    ).toEqual(['City is mapped to unknown prefix 49.']);
  });
});

describe('isOutputFormat', () => {
  it('accepts known formats only', () => {
    expect(isOutputFormat('csv')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });
});
