/**
 * hoststate — Logger
 *
 * Scoped logger that prefixes output with the component name.
 * Everything goes to stderr: stdout carries the MCP stdio transport.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(scope: string): Logger;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const prefix = `[hoststate:${scope}]`;

  function emit(at: Exclude<LogLevel, 'silent'>, message: string, data?: LogData): void {
    if (RANK[at] < RANK[level]) return;
    const line = `${new Date().toISOString()} ${at.toUpperCase()} ${prefix} ${message}`;
    if (data) console.error(line, JSON.stringify(data));
    else console.error(line);
  }

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (child) => createLogger(`${scope}:${child}`, level),
  };
}

/** Logger that drops everything; used by tests and embedders. */
export const silentLogger: Logger = createLogger('silent', 'silent');
