import { inspect } from 'util';
import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const TAGS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info ',
  [LogLevel.WARN]: 'warn ',
  [LogLevel.ERROR]: 'error'
};

/**
 * Diagnostic log on stderr. User-facing progress goes through OutputPort;
 * this is for `--log-level debug` and for failures worth a trace.
 */
class StderrLogger implements Logger {
  constructor(private level: LogLevel) {}

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;
    const time = new Date().toISOString().slice(11, 23);
    let line = `${time} ${TAGS[level]} ${message}`;
    if (meta !== undefined) {
      // inspect keeps Error stacks and nested causes, JSON.stringify drops them
      line += typeof meta === 'object' && meta !== null
        ? `\n${inspect(meta, { depth: 4, breakLength: 100 })}`
        : ` ${String(meta)}`;
    }
    process.stderr.write(`${line}\n`);
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

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Case-insensitive level name, or undefined when unrecognized. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === wanted);
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') return LogLevel.DEBUG;
  return parseLogLevel(env[ENV_VARS.LOG_LEVEL]) ?? LogLevel.WARN;
}

export const logger = new StderrLogger(levelFromEnv(process.env));
