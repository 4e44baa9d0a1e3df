/**
 * @tinct/theme - colors, styles and the theme flavor family
 */

export * from './builtin.js';
export * from './style.js';
export * from './theme.js';
export * from './theme-loader.js';
