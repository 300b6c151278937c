/**
 * Structured JSON logging
 *
 * One JSON object per line on stdout/stderr. Level threshold comes from LOG_LEVEL.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_ORDER;
}

function resolveThreshold(): LogThreshold {
  const level = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return isThreshold(level) ? level : 'info';
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Create a logger tagged with a component name
 */
export function createLogger(component: string, threshold: LogThreshold = resolveThreshold()): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
    };
    for (const [key, value] of Object.entries(fields ?? {})) {
      entry[key] = serializeError(value);
    }

    const line = JSON.stringify(entry);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
