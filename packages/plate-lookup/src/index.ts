/**
 * Plate Lookup
 *
 * Montana license-plate prefix and city lookups with persisted user-added
 * city mappings.
 *
 * @packageDocumentation
 */

export * from './core/index.js';
export * from './cli/index.js';
