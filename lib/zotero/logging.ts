/**
 * Structured logging utilities for Zotero API operations
 */

import { emitLog } from '../migration/logging';
import { LogLevel } from '../migration/log-config';

interface LogContext {
  [key: string]: unknown;
}

let httpLogLevel: LogLevel = 'WARN';

/**
 * Console threshold for HTTP-level logging (independent of the migration logger)
 */
export function setZoteroLogLevel(level: LogLevel): void {
  httpLogLevel = level;
}

export function zoteroLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  const sanitized = context ? redactSensitiveData(context) : undefined;
  emitLog(level, message, { service: 'zotero', ...sanitized }, httpLogLevel);
}

/**
 * Redact sensitive data from log entries
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const sensitiveKeys = [
    'apikey',
    'api_key',
    'zotero-api-key',
    'access_token',
    'refresh_token',
    'client_secret',
    'authorization',
  ];

  const redacted = { ...data };

  for (const key of Object.keys(redacted)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some(sensitive => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
      continue;
    }

    const value = redacted[key];
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      redacted[key] = redactSensitiveData({ ...value });
    }
  }

  return redacted;
}

/**
 * Generate correlation ID for request tracking
 */
export function generateCorrelationId(): string {
  return `zotero_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

export function logApiRequest(method: string, url: string, correlationId: string): void {
  zoteroLog('DEBUG', 'API request', { correlationId, method, url });
}

export function logApiResponse(
  method: string,
  url: string,
  statusCode: number,
  correlationId: string,
  durationMs: number
): void {
  zoteroLog('DEBUG', 'API response', { correlationId, method, url, statusCode, durationMs });
}

export function logApiError(
  method: string,
  url: string,
  error: unknown,
  correlationId: string
): void {
  zoteroLog('ERROR', 'API error', {
    correlationId,
    method,
    url,
    error: error instanceof Error ? error.message : String(error),
  });
}

export function logBackoff(seconds: number, source: 'backoff' | 'retry-after'): void {
  zoteroLog('WARN', 'Server requested backoff', { seconds, source });
}
