/**
 * @tinct/loader - flavor documents, inheritance and discovery
 */

export * from './document.js';
export * from './flavor-loader.js';
export * from './names.js';
export * from './resolver.js';
