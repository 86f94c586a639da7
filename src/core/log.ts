/**
 * Scoped stderr logger.
 *
 * Everything goes to stderr: when running as an MCP stdio server, stdout
 * carries protocol messages and must never see a log line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let overrideLevel: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  if (overrideLevel) return overrideLevel;
  if (process.env.DEBUG) return 'debug';
  const fromEnv = process.env.CRELIST_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Force a level for the whole process (CLI `--verbose`, tests). Pass null to go back to the env. */
export function setLogLevel(level: LogLevel | null): void {
  overrideLevel = level;
}

function formatDetail(detail: unknown): unknown {
  return detail instanceof Error ? `${detail.name}: ${detail.message}` : detail;
}

export function createLogger(scope: string): Logger {
  const prefix = `[crelist:${scope}]`;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;
    console.error(prefix, level.toUpperCase(), message, ...details.map(formatDetail));
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}
