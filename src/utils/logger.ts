/* eslint-disable no-console */
// Define allowed primitive types for log data values
type LogDataValue = string | number | boolean | null | undefined | Error | unknown;

// Define recursive type for nested objects
export type LogDataObject = {
  [key: string]: LogDataValue | LogDataObject | Array<LogDataValue | LogDataObject>;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, data?: LogDataObject): void;
  info(message: string, data?: LogDataObject): void;
  warn(message: string, data?: LogDataObject): void;
  error(message: string, data?: LogDataObject): void;
  child(bindings: LogDataObject): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

const envLevel = process.env.LOG_LEVEL ?? '';

// Shared across every child so setLogLevel applies to loggers created earlier
const state: { minLevel: LogLevel } = {
  minLevel: isLogLevel(envLevel) ? envLevel : 'info',
};

export function setLogLevel(level: LogLevel): void {
  state.minLevel = level;
}

// Helper function to safely serialize error objects and unknown values
function serializeLogData(data: unknown) {
  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: data.stack,
      ...Object.fromEntries(Object.entries(data)),
    };
  }
  if (data instanceof Set) {
    return [...data];
  }
  if (data instanceof Map) {
    return Object.fromEntries(data);
  }
  return data;
}

function formatLog(
  level: string,
  service: string,
  message: string,
  data?: LogDataObject
): string {
  let dataString = '';
  if (data && Object.keys(data).length > 0) {
    try {
      const cache = new Set<unknown>();
      dataString = JSON.stringify(data, (_key, value: unknown) => {
        if (typeof value === 'object' && value !== null) {
          if (cache.has(value)) {
            return '[Circular Reference]';
          }
          cache.add(value);
        }
        return serializeLogData(value);
      });
    } catch (error) {
      dataString = JSON.stringify({
        error: 'Error stringifying log data',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return `[${level}] [${service}] ${message}${dataString ? ` ${dataString}` : ''}`;
}

export function createLogger(service: string, bindings: LogDataObject = {}): Logger {
  const write = (level: LogLevel, message: string, data?: LogDataObject) => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[state.minLevel]) return;
    const line = formatLog(level.toUpperCase(), service, message, { ...bindings, ...data });
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childBindings) => createLogger(service, { ...bindings, ...childBindings }),
  };
}

export const logger = createLogger('review-relay');

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
