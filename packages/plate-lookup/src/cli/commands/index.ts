/**
 * Plate Lookup commands
 *
 * @module cli/commands
 */

export { prefixCommand, type PrefixOptions } from './lookup/prefix.js';
export { cityCommand, type CityOptions } from './lookup/city.js';
export { addCityCommand } from './lookup/add-city.js';
export { countiesCommand, type CountiesOptions } from './lookup/counties.js';
