/**
 * Migration logging utilities
 * Console logging with a level threshold, mirrored to the errors file for WARN and above
 */

import { ErrorFileLogger, LogEntry } from './file-logger';
import { LogLevel, formatLogLevel, getLogConfig, getTimestamp, shouldLog } from './log-config';

type LogContext = Record<string, unknown>;

let errorLog: ErrorFileLogger | null = null;

/**
 * Open the errors file for this run (appends to any previous content)
 */
export async function openErrorLog(filePath: string): Promise<ErrorFileLogger> {
  if (errorLog) {
    await errorLog.shutdown();
  }
  const fileLogger = new ErrorFileLogger(filePath);
  await fileLogger.initialize();
  errorLog = fileLogger;
  return fileLogger;
}

export async function closeErrorLog(): Promise<void> {
  const current = errorLog;
  errorLog = null;
  if (current) {
    await current.shutdown();
  }
}

/**
 * Render an unknown thrown value for log context
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Write one entry. `consoleThreshold` lets a subsystem apply its own console level.
 */
export function emitLog(
  level: LogLevel,
  message: string,
  context?: LogContext,
  consoleThreshold?: LogLevel
): void {
  const entry: LogEntry = {
    timestamp: getTimestamp(),
    level,
    message,
    ...context,
  };

  errorLog?.write(entry);

  const config = getLogConfig();
  if (!config.consoleEnabled || !shouldLog(level, consoleThreshold ?? config.level)) {
    return;
  }

  const line = `[${entry.timestamp}] [${formatLogLevel(level)}] ${message}`;
  const data = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';

  switch (level) {
    case 'ERROR':
      console.error(line + data);
      break;
    case 'WARN':
      console.warn(line + data);
      break;
    case 'DEBUG':
      console.debug(line + data);
      break;
    default:
      console.info(line + data);
  }
}

/**
 * Simple logger object for consistent logging interface
 */
export const logger = {
  debug: (message: string, context?: LogContext) => emitLog('DEBUG', message, context),
  info: (message: string, context?: LogContext) => emitLog('INFO', message, context),
  warn: (message: string, context?: LogContext) => emitLog('WARN', message, context),
  error: (message: string, context?: LogContext) => emitLog('ERROR', message, context),
};

/**
 * Log an event tied to one source publication
 */
export function logRecordEvent(
  level: LogLevel,
  message: string,
  sourceId: number,
  context?: LogContext
): void {
  emitLog(level, message, { ...context, sourceId });
}
