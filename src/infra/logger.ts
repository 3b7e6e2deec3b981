export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function serializeError(err: unknown): LogFields {
  if (!(err instanceof Error)) return { error: String(err) };
  return {
    error_name: err.name,
    error_message: err.message,
    error_stack: err.stack,
  };
}

/**
 * JSON-lines logger. One object per line on stdout (stderr for errors).
 */
export class Logger {
  constructor(
    private readonly minLevel: LogThreshold = 'info',
    private readonly baseFields: LogFields = {}
  ) {}

  child(fields: LogFields): Logger {
    return new Logger(this.minLevel, { ...this.baseFields, ...fields });
  }

  private emit(level: LogLevel, message: string, fields?: LogFields, err?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const payload: LogFields = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...this.baseFields,
      ...(fields ?? {}),
      ...(err !== undefined ? serializeError(err) : {}),
    };
    const line = JSON.stringify(payload);
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  warn(message: string, fields?: LogFields, err?: unknown): void {
    this.emit('warn', message, fields, err);
  }

  error(message: string, fields?: LogFields, err?: unknown): void {
    this.emit('error', message, fields, err);
  }
}

export function createLogger(minLevel: LogThreshold = 'info', baseFields: LogFields = {}): Logger {
  return new Logger(minLevel, baseFields);
}

/**
 * Logger that drops everything.
 */
export const silentLogger = new Logger('silent');
