/**
 * @tinct/icons - icon flavors
 */

export * from './builtin.js';
export * from './icon.js';
export * from './icon-loader.js';
export * from './lookup.js';
export * from './materialize.js';
export * from './schema.js';
