/**
 * Error types for tinct
 */

export const ErrorCode = {
  E_FLAVOR_NOT_FOUND: 'E_FLAVOR_NOT_FOUND',
  E_FLAVOR_PARSE: 'E_FLAVOR_PARSE',
  E_FLAVOR_SCHEMA: 'E_FLAVOR_SCHEMA',
  E_FLAVOR_CYCLE: 'E_FLAVOR_CYCLE',
  E_FLAVOR_CONVERSION: 'E_FLAVOR_CONVERSION',
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',
  E_CONFIG_PARSE: 'E_CONFIG_PARSE',
  E_INTERNAL: 'E_INTERNAL'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type TinctErrorOptions = {
  cause?: unknown;
  data?: unknown;
};

/**
 * Base error class for tinct
 */
export class TinctError extends Error {
  public readonly code: ErrorCodeType;
  public readonly data?: unknown;

  constructor(code: ErrorCodeType, message: string, options: TinctErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TinctError';
    this.code = code;
    this.data = options.data;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Failure kinds raised while resolving or converting a flavor document
 */
export type FlavorErrorKind = 'not_found' | 'parse' | 'schema' | 'cycle' | 'conversion';

const FLAVOR_ERROR_CODES: Record<FlavorErrorKind, ErrorCodeType> = {
  not_found: ErrorCode.E_FLAVOR_NOT_FOUND,
  parse: ErrorCode.E_FLAVOR_PARSE,
  schema: ErrorCode.E_FLAVOR_SCHEMA,
  cycle: ErrorCode.E_FLAVOR_CYCLE,
  conversion: ErrorCode.E_FLAVOR_CONVERSION
};

export class FlavorError extends TinctError {
  public readonly kind: FlavorErrorKind;
  public readonly flavor: string;

  constructor(kind: FlavorErrorKind, flavor: string, message: string, options: TinctErrorOptions = {}) {
    super(FLAVOR_ERROR_CODES[kind], message, options);
    this.name = 'FlavorError';
    this.kind = kind;
    this.flavor = flavor;
  }
}

export class ConfigError extends TinctError {
  public readonly path: string;

  constructor(
    code: typeof ErrorCode.E_CONFIG_INVALID | typeof ErrorCode.E_CONFIG_PARSE,
    path: string,
    message: string,
    options: TinctErrorOptions = {}
  ) {
    super(code, message, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function isFlavorError(error: unknown, kind?: FlavorErrorKind): error is FlavorError {
  return error instanceof FlavorError && (kind === undefined || error.kind === kind);
}

/**
 * Error helper functions
 */
export const FlavorErrors = {
  notFound: (flavor: string, path: string, cause?: unknown) =>
    new FlavorError('not_found', flavor, `Flavor "${flavor}" not found at ${path}`, {
      cause,
      data: { path }
    }),

  parse: (flavor: string, path: string, cause: unknown) =>
    new FlavorError(
      'parse',
      flavor,
      `Failed to parse flavor "${flavor}" (${path}): ${errorMessage(cause)}`,
      { cause, data: { path } }
    ),

  inheritsNotString: (flavor: string, value: unknown) =>
    new FlavorError(
      'schema',
      flavor,
      `Flavor "${flavor}": expected 'inherits' to be a string, got ${typeof value === 'bigint' ? value.toString() : JSON.stringify(value)}`,
      { data: { inherits: value } }
    ),

  cycle: (flavor: string, chain: string[]) =>
    new FlavorError(
      'cycle',
      flavor,
      `Circular inheritance detected for flavor "${flavor}": ${chain.join(' -> ')}`,
      { data: { chain } }
    ),

  conversion: (flavor: string, cause: unknown) =>
    new FlavorError(
      'conversion',
      flavor,
      `Flavor "${flavor}" does not match the expected shape: ${errorMessage(cause)}`,
      { cause }
    )
};

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}
