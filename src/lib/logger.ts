export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields): void;
}

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  name?: string;
  customFields?: () => LogFields;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured JSON logger writing through the console methods.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { enabled = true, level = 'info', name = 'request-governor', customFields } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (recordLevel: LogLevel, message: string, data?: LogFields) => {
    if (!enabled || LEVEL_ORDER[recordLevel] < threshold) return;

    const logData = {
      timestamp: new Date().toISOString(),
      level: recordLevel,
      logger: name,
      message,
      ...(customFields ? customFields() : {}),
      ...serializeFields(data),
    };
    const line = JSON.stringify(logData);

    switch (recordLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      default:
        console.debug(line);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

// Error instances serialize to {} through JSON.stringify
function serializeFields(data: LogFields | undefined): LogFields {
  if (!data) return {};
  const out: LogFields = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}
