import pino from 'pino';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
  /** Log file; stderr when absent. stdout carries the JSON-RPC stream. */
  file?: string;
}

export function createLogger(options: LoggerOptions): pino.Logger {
  const destination = options.file
    ? pino.destination({ dest: options.file, mkdir: true, sync: false })
    : pino.destination(2);
  return pino(
    {
      name: 'godot-dap-mcp',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
