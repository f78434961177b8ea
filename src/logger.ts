/**
 * Structured, level-based logging with context.
 *
 * Entries go to stderr as one JSON object per line; stdout is left to the
 * CLI's own output (plan YAML, key sets). Embedding operators can route
 * entries elsewhere with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Least to most severe. */
const SEVERITY: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const writeToStderr: LogHandler = ({ level, timestamp, message, context }) => {
  process.stderr.write(`${JSON.stringify({ level, ts: timestamp, msg: message, ...context })}\n`);
};

let handler: LogHandler = writeToStderr;
let minLevel: LogLevel = LogLevel.Info;

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

export function resetLogHandler(): void {
  handler = writeToStderr;
}

/** Entries below this level are dropped before reaching the handler. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function parseLogLevel(value: string): LogLevel {
  const match = SEVERITY.find(level => level === value.toLowerCase());
  if (!match) {
    throw new Error(`Unknown log level "${value}". Expected one of: ${SEVERITY.join(', ')}`);
  }
  return match;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY.indexOf(level) < SEVERITY.indexOf(minLevel)) {
    return;
  }
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Create a logger whose entries always carry baseContext. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...baseContext, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: context => createLogger({ ...baseContext, ...context }),
  };
}

export const logger = createLogger({ component: 'cluster-bootstrap' });
