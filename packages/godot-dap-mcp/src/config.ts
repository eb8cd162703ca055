import yargs from 'yargs/yargs';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_DAP_HOST,
  DEFAULT_DAP_PORT,
} from 'dap-session-client';
import { LOG_LEVELS, LogLevel } from './logger';

export const LOG_FILE_ENV = 'GODOT_DAP_BRIDGE_LOG_FILE';
export const LOG_LEVEL_ENV = 'GODOT_DAP_BRIDGE_LOG_LEVEL';

export interface ServerConfig {
  /** Defaults for godot_connect. */
  host: string;
  port: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  logLevel: LogLevel;
  logFile?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Flags win over the environment, which wins over the built-in defaults.
 * Invalid flags throw instead of exiting; `--help` and `--version` print and exit.
 */
export function parseConfig(
  argv: string[],
  env: NodeJS.ProcessEnv,
  version: string,
): ServerConfig {
  const envLevel = env[LOG_LEVEL_ENV];
  const defaultLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
  const parsed = yargs(argv)
    .option('host', {
      type: 'string',
      description: 'Host of the Godot editor debug adapter.',
      default: DEFAULT_DAP_HOST,
    })
    .option('port', {
      alias: 'p',
      type: 'number',
      description: 'Port of the Godot editor debug adapter.',
      default: DEFAULT_DAP_PORT,
    })
    .option('connect-timeout', {
      type: 'number',
      description: 'Deadline for opening the connection, in milliseconds.',
      default: DEFAULT_CONNECT_TIMEOUT_MS,
    })
    .option('command-timeout', {
      type: 'number',
      description: 'Deadline for each debugger command, in milliseconds.',
      default: DEFAULT_COMMAND_TIMEOUT_MS,
    })
    .option('log-file', {
      type: 'string',
      description: `Write logs to this file instead of stderr (env: ${LOG_FILE_ENV}).`,
      default: env[LOG_FILE_ENV],
    })
    .option('log-level', {
      choices: LOG_LEVELS,
      description: `Minimum log level (env: ${LOG_LEVEL_ENV}).`,
      default: defaultLevel,
    })
    .check((args) => {
      if (!Number.isInteger(args.port) || args.port < 1 || args.port > 65535) {
        throw new Error(`Invalid port: ${args.port}`);
      }
      if (!(args['connect-timeout'] > 0) || !(args['command-timeout'] > 0)) {
        throw new Error('Timeouts must be positive numbers of milliseconds.');
      }
      return true;
    })
    .usage('Usage: $0 [options]')
    .strict()
    .fail((message, error) => {
      throw error instanceof Error ? error : new Error(message);
    })
    .help()
    .alias('help', 'h')
    .version(version)
    .alias('version', 'v')
    .parseSync();

  return {
    host: parsed.host,
    port: parsed.port,
    connectTimeoutMs: parsed.connectTimeout,
    commandTimeoutMs: parsed.commandTimeout,
    logLevel: parsed.logLevel,
    logFile: parsed.logFile || undefined,
  };
}
