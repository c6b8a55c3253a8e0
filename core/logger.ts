export type LogLevel = 'debug' | 'info' | 'warning' | 'problem';

export interface Logger {
  log(message: string, level: LogLevel): void;
  child(scope: string): Logger;
}

export interface LogEntry {
  scope: string;
  level: LogLevel;
  message: string;
  timestamp: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  problem: 3,
};

const MAX_LOG_ENTRIES = 500;

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function writeToConsole(scope: string, level: LogLevel, message: string) {
  const line = `[${scope}] ${message}`;
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warning':
      console.warn(line);
      break;
    case 'problem':
      console.error(line);
      break;
  }
}

export function createConsoleLogger(scope: string, minLevel: LogLevel = 'info'): Logger {
  return {
    log(message, level) {
      if (!shouldLog(level, minLevel)) return;
      writeToConsole(scope, level, message);
    },
    child(childScope) {
      return createConsoleLogger(`${scope}:${childScope}`, minLevel);
    },
  };
}

export interface BufferedLogger extends Logger {
  entries(): LogEntry[];
  messages(level?: LogLevel): string[];
  clear(): void;
}

/**
 * Keeps the most recent entries in memory, optionally forwarding each one to
 * another logger. Children share the parent's buffer.
 */
export function createBufferedLogger(scope = 'app', forward?: Logger): BufferedLogger {
  const buffer: LogEntry[] = [];

  const make = (currentScope: string, target?: Logger): BufferedLogger => ({
    log(message, level) {
      buffer.push({ scope: currentScope, level, message, timestamp: Date.now() });
      if (buffer.length > MAX_LOG_ENTRIES) {
        buffer.splice(0, buffer.length - MAX_LOG_ENTRIES);
      }
      target?.log(message, level);
    },
    child(childScope) {
      return make(`${currentScope}:${childScope}`, target?.child(childScope));
    },
    entries: () => [...buffer],
    messages: (level) =>
      buffer.filter((entry) => !level || entry.level === level).map((entry) => entry.message),
    clear: () => {
      buffer.length = 0;
    },
  });

  return make(scope, forward);
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'unknown error';
}
