import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line)
};

// JSON.stringify(new Error()) is {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { ...value, name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Console logger; everything at or above the configured level is written.
 */
export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) {
      return;
    }
    let line = `${new Date().toISOString()} ${PREFIXES[level]} ${message}`;
    if (meta && typeof meta === 'object') {
      line += `\n${JSON.stringify(meta, errorReplacer, 2)}`;
    } else if (meta !== undefined) {
      line += ` ${String(meta)}`;
    }
    WRITERS[level](line);
  }
}

/**
 * Map a user-supplied level name to a LogLevel; unknown names yield undefined.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

export const logger = new ConsoleLogger(process.env[ENV_VARS.VERBOSE] === '1' ? LogLevel.DEBUG : LogLevel.ERROR);
