/**
 * Console logger with a component tag and a process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
let stderrOnly = false;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Send every level to stderr. Required while stdout carries a protocol stream.
 */
export function setStderrOnly(enabled: boolean): void {
  stderrOnly = enabled;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Create a logger that prefixes every line with `[tag]`
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    switch (level) {
      case 'error':
        console.error(`${prefix} ${message}`, ...details);
        break;
      case 'warn':
        console.warn(`${prefix} ${message}`, ...details);
        break;
      default:
        if (stderrOnly) {
          console.error(`${prefix} ${message}`, ...details);
          break;
        }
        console.log(`${prefix} ${message}`, ...details);
    }
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}
