/**
 * Errors file logger
 *
 * Appends warning and error entries as JSON lines to a single file that
 * survives across runs, so failed records can be diagnosed after the fact.
 */

import path from 'path';
import { createWriteStream, WriteStream } from 'fs';
import {
  LogConfig,
  LogLevel,
  ensureLogDirectory,
  getLogConfig,
  needsRotation,
  resolveLogPath,
  rotateLogFile,
  shouldLog,
} from './log-config';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export class ErrorFileLogger {
  private readonly filePath: string;
  private readonly config: LogConfig;
  private stream: WriteStream | null = null;
  private queue: string[] = [];

  constructor(filePath: string, config: LogConfig = getLogConfig()) {
    this.filePath = resolveLogPath(filePath);
    this.config = config;
  }

  async initialize(): Promise<void> {
    await ensureLogDirectory(path.dirname(this.filePath));

    if (await needsRotation(this.filePath, this.config.maxFileSize)) {
      await rotateLogFile(this.filePath);
    }

    const stream = createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
    stream.on('error', (error) => {
      console.error(`Error writing to errors log ${this.filePath}:`, error);
    });
    this.stream = stream;
  }

  /**
   * Queue an entry. Entries below the errors-file threshold are dropped.
   */
  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.config.errorsFileLevel)) {
      return;
    }
    this.queue.push(JSON.stringify(entry) + '\n');

    if (entry.level === 'ERROR') {
      this.flush();
    }
  }

  flush(): void {
    if (!this.stream || this.queue.length === 0) {
      return;
    }
    const data = this.queue.join('');
    this.queue = [];
    this.stream.write(data);
  }

  /**
   * Flush remaining entries and close the stream
   */
  async shutdown(): Promise<void> {
    this.flush();
    const stream = this.stream;
    this.stream = null;
    if (!stream) {
      return;
    }
    await new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }

  getFilePath(): string {
    return this.filePath;
  }
}
