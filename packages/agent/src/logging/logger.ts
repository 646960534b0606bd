// Structured logging: one JSON object per line.

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogData = Readonly<Record<string, unknown>>;

export type Logger = {
  readonly debug: (message: string, data?: LogData) => void;
  readonly info: (message: string, data?: LogData) => void;
  readonly warn: (message: string, data?: LogData) => void;
  readonly error: (message: string, data?: LogData) => void;
  /** Logger that adds `context` to every entry. */
  readonly child: (context: LogData) => Logger;
};

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly level: LogLevel = 'info',
    private readonly context: LogData = {},
    private readonly sink: LogSink = consoleSink,
  ) {
    this.minLevel = LEVEL_ORDER[level];
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.log('error', message, data);
  }

  child(context: LogData): Logger {
    return new ConsoleLogger(this.level, { ...this.context, ...context }, this.sink);
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_ORDER[level] < this.minLevel) return;

    const entry: Record<string, unknown> = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
    };
    for (const [key, value] of Object.entries(data ?? {})) {
      entry[key] = serializeValue(value);
    }

    this.sink(level, JSON.stringify(entry));
  }
}

export function createSilentLogger(): Logger {
  const silent: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silent,
  };
  return silent;
}
