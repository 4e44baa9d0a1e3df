/**
 * Logger interface for tinct
 *
 * Library code receives a Logger through its options and never writes to
 * stdout on its own. The CLI decides where records go.
 */

export const LOG_LEVEL_NAMES = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  level: LogLevel;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child?(prefix: string): Logger;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (message: string) => void;
  now?: () => Date;
};

const noOutput: (message: string) => void = () => {
  // Callers that want output pass their own sink
};

function formatLogMessage(
  time: Date,
  level: LogLevel,
  obj: unknown,
  msg?: string,
  prefix?: string,
  json?: boolean
): string {
  const timestamp = time.toISOString();

  if (json) {
    const record: LogData = {
      time: timestamp,
      level,
      prefix: prefix || undefined,
      msg: msg ?? (typeof obj === 'string' ? obj : undefined),
      data: msg !== undefined ? obj : typeof obj === 'string' ? undefined : obj
    };
    for (const key of Object.keys(record)) {
      if (record[key] === undefined) {
        delete record[key];
      }
    }
    return JSON.stringify(record, errorReplacer);
  }

  const prefixStr = prefix ? ` ${prefix}` : '';
  const messageStr = msg ?? (typeof obj === 'string' ? obj : JSON.stringify(obj, errorReplacer));
  const dataStr =
    msg !== undefined && obj !== undefined && typeof obj !== 'string'
      ? ` ${JSON.stringify(obj, errorReplacer)}`
      : '';

  return `[${timestamp}] [${level.toUpperCase()}]${prefixStr} ${messageStr}${dataStr}`;
}

// Error instances serialize to {} by default; bigint does not serialize at all
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const json = options.json ?? false;
  const output = options.output ?? noOutput;
  const now = options.now ?? (() => new Date());

  const log = (logLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, logLevel)) {
      return;
    }
    output(formatLogMessage(now(), logLevel, obj, msg, prefix, json));
  };

  return {
    level,
    error: (obj: unknown, msg?: string) => log('error', obj, msg),
    warn: (obj: unknown, msg?: string) => log('warn', obj, msg),
    info: (obj: unknown, msg?: string) => log('info', obj, msg),
    debug: (obj: unknown, msg?: string) => log('debug', obj, msg),
    trace: (obj: unknown, msg?: string) => log('trace', obj, msg),
    child: (childPrefix: string) =>
      createLogger({
        ...options,
        prefix: prefix ? `${prefix}[${childPrefix}]` : `[${childPrefix}]`
      })
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Build logger options from TINCT_LOG_LEVEL and TINCT_LOG
 *
 * An explicit level wins over the environment; unknown values fall back to info.
 */
export function loggerOptionsFromEnv(
  env: Record<string, string | undefined>,
  level?: LogLevel
): Pick<LoggerOptions, 'level' | 'json'> {
  const envLevel = env.TINCT_LOG_LEVEL;
  return {
    level: level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
    json: env.TINCT_LOG === 'json'
  };
}
