import fs from 'fs';
import path from 'path';
import util from 'util';
import type { LoggingConfig } from './configLoader';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line),
};

interface LoggerState {
  consoleLevel: LogLevel;
  fileLevel: LogLevel;
  quiet: boolean;    // Console shows warnings and errors only
  file: string | null;
}

const state: LoggerState = {
  consoleLevel: LogLevel.INFO,
  fileLevel: LogLevel.INFO,
  quiet: false,
  file: null,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

function atLeast(level: LogLevel, threshold: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[threshold];
}

// Failures of the log file itself go straight to stderr; routing them
// through log() would try the same file again.
function reportLoggerFailure(what: string, err: unknown): void {
  console.error(`[${new Date().toLocaleString()}] [${LogLevel.ERROR}] ${what}: ${util.format(err)}`);
}

/**
 * Console-only setup used until the vault configuration has been read.
 * `LOG_LEVEL` from the environment (or .env) sets the console threshold.
 */
export function bootstrapLogger(): void {
  const fromEnv = process.env.LOG_LEVEL?.toUpperCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    state.consoleLevel = fromEnv;
  }
  log(LogLevel.DEBUG, `Logger bootstrapped at console level ${state.consoleLevel}`);
}

/**
 * Switches to the validated `logging` section. A relative `logFile` is
 * resolved against the working directory; an empty one turns the file off.
 */
export function applyLoggerConfig(config: LoggingConfig): void {
  state.consoleLevel = config.consoleLogLevel;
  state.fileLevel = config.fileLogLevel;
  state.quiet = config.consoleQuietMode;
  state.file = config.logFile ? path.resolve(process.cwd(), config.logFile) : null;

  if (state.file) {
    const dir = path.dirname(state.file);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      reportLoggerFailure(`Cannot create log directory ${dir}, file logging disabled`, err);
      state.file = null;
    }
  }
  log(LogLevel.DEBUG, `Logger configured: console ${state.consoleLevel}${state.quiet ? ' (quiet)' : ''}, file ${state.file ? `${state.fileLevel} → ${state.file}` : 'off'}`);
}

/**
 * Writes one timestamped line to the console and, when configured, appends
 * it to the log file. `message` may hold `util.format` placeholders.
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const line = `[${new Date().toLocaleString()}] [${level}] ${util.format(message, ...args)}`;

  const quietened = state.quiet && !atLeast(level, LogLevel.WARN);
  if (atLeast(level, state.consoleLevel) && !quietened) {
    consoleWriters[level](line);
  }

  if (state.file && atLeast(level, state.fileLevel)) {
    try {
      fs.appendFileSync(state.file, `${line}\n`, 'utf8');
    } catch (err) {
      reportLoggerFailure(`Cannot append to log file ${state.file}`, err);
    }
  }
}
