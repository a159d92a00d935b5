/**
 * Module-scoped console logger.
 * Format: [timestamp] [LEVEL] [module] message
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

let minLevel: LogLevel = isLogLevel(process.env.SYNAPTIC_LOG_LEVEL)
  ? process.env.SYNAPTIC_LOG_LEVEL
  : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg);
  }
  return String(arg);
}

export function formatLogLine(module: string, level: LogLevel, args: unknown[], now = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${module}] ${args.map(formatArg).join(' ')}`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(module: string): Logger {
  const emit = (level: LogLevel, args: unknown[]) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    const line = formatLogLine(module, level, args);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (...args) => emit('debug', args),
    info: (...args) => emit('info', args),
    warn: (...args) => emit('warn', args),
    error: (...args) => emit('error', args),
  };
}
