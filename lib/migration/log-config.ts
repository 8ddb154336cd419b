/**
 * Log Configuration for the migration CLI
 *
 * Holds the process-wide log threshold and the location of the
 * errors file that accumulates warnings and errors across runs.
 */

import path from 'path';
import { promises as fs } from 'fs';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface LogConfig {
  /** Console threshold */
  level: LogLevel;
  /** Threshold for entries copied to the errors file */
  errorsFileLevel: LogLevel;
  /** Maximum errors file size before rotation (bytes) */
  maxFileSize: number;
  /** Whether to log to the console */
  consoleEnabled: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/**
 * Default log configuration
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: process.env.LOG_LEVEL === 'DEBUG' ? 'DEBUG' : 'WARN',
  errorsFileLevel: 'WARN',
  maxFileSize: 50 * 1024 * 1024, // 50MB
  consoleEnabled: process.env.NODE_ENV !== 'test',
};

let activeConfig: LogConfig = { ...DEFAULT_LOG_CONFIG };

export function configureLogging(overrides: Partial<LogConfig>): LogConfig {
  activeConfig = { ...activeConfig, ...overrides };
  return activeConfig;
}

export function getLogConfig(): LogConfig {
  return activeConfig;
}

export function resetLogConfig(): void {
  activeConfig = { ...DEFAULT_LOG_CONFIG };
}

/**
 * Parse a level name case-insensitively ("warning" is accepted for WARN)
 */
export function parseLogLevel(value: string): LogLevel {
  const upper = value.trim().toUpperCase();
  const normalized = upper === 'WARNING' ? 'WARN' : upper;
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Unknown log level "${value}". Expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

/**
 * Ensure log directory exists
 */
export async function ensureLogDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a log level passes a threshold
 */
export function shouldLog(level: LogLevel, threshold: LogLevel = activeConfig.level): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[threshold];
}

export function formatLogLevel(level: LogLevel): string {
  return level.padEnd(5, ' ');
}

export function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Check if a file needs rotation based on size
 */
export async function needsRotation(filePath: string, maxSize: number): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size >= maxSize;
  } catch {
    // File doesn't exist yet
    return false;
  }
}

/**
 * Rotate a log file (rename with timestamp)
 */
export async function rotateLogFile(filePath: string): Promise<string> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const rotatedPath = `${filePath}.${timestamp}`;
  await fs.rename(filePath, rotatedPath);
  return rotatedPath;
}

export function resolveLogPath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}
