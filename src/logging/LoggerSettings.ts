export const LogLevelOrder = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
};

/**
 * Log level names (silly - fatal)
 */
export type LogLevel = keyof typeof LogLevelOrder;

export interface LoggerSettings {
  minLevel: LogLevel;
}

export function lvlToOrder(logLevel: LogLevel): number {
  return LogLevelOrder[logLevel];
}
