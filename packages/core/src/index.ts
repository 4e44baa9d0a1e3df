/**
 * @tinct/core - shared types and utilities for tinct
 *
 * Dependency direction: core → loader → theme → icons → cli
 */

export * from './errors.js';
export * from './logger.js';
export * from './merge.js';
export * from './paths.js';
export * from './result.js';
export * from './toml-value.js';
