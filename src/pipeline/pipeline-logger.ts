/**
 * Pipeline Logger
 * Records every stage of a packaging run; can persist the session as markdown
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { redactSecrets } from './redact.js';
import type { PipelineState } from './types.js';

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  state: PipelineState;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface PipelineLoggerOptions {
  /** Receives every entry as it is recorded */
  sink?: LogSink;
  /** Values that must never appear in a recorded message */
  secrets?: ReadonlyArray<string | undefined>;
  /** Drop debug entries */
  quiet?: boolean;
}

function redactData(data: Record<string, unknown>, secrets: ReadonlyArray<string | undefined>): Record<string, unknown> {
  return JSON.parse(redactSecrets(JSON.stringify(data), secrets));
}

/**
 * In-memory logger for a single pipeline run
 */
export class PipelineLogger {
  private readonly entries: LogEntry[] = [];
  private readonly sink?: LogSink;
  private readonly secrets: string[];
  private readonly quiet: boolean;

  constructor(options: PipelineLoggerOptions = {}) {
    this.sink = options.sink;
    this.secrets = [];
    for (const secret of options.secrets ?? []) {
      this.addSecret(secret);
    }
    this.quiet = options.quiet ?? false;
  }

  /**
   * Register a value to redact from every later entry
   */
  addSecret(secret: string | undefined): void {
    if (secret && !this.secrets.includes(secret)) {
      this.secrets.push(secret);
    }
  }

  log(level: LogLevel, state: PipelineState, message: string, data?: Record<string, unknown>): void {
    if (level === 'debug' && this.quiet) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      state,
      message: redactSecrets(message, this.secrets),
      data: data ? redactData(data, this.secrets) : undefined,
    };

    this.entries.push(entry);
    this.sink?.(entry);
  }

  info(state: PipelineState, message: string, data?: Record<string, unknown>): void {
    this.log('info', state, message, data);
  }

  warn(state: PipelineState, message: string, data?: Record<string, unknown>): void {
    this.log('warn', state, message, data);
  }

  error(state: PipelineState, message: string, data?: Record<string, unknown>): void {
    this.log('error', state, message, data);
  }

  success(state: PipelineState, message: string, data?: Record<string, unknown>): void {
    this.log('success', state, message, data);
  }

  debug(state: PipelineState, message: string, data?: Record<string, unknown>): void {
    this.log('debug', state, message, data);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  /**
   * Format log entries as markdown
   */
  formatMarkdown(): string {
    const lines: string[] = ['# Packaging Log', ''];

    for (const entry of this.entries) {
      const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
      lines.push(`### [${time}] ${getLevelIcon(entry.level)} **${entry.state}** - ${entry.message}`);

      if (entry.data && Object.keys(entry.data).length > 0) {
        lines.push('');
        lines.push('```json');
        lines.push(JSON.stringify(entry.data, null, 2));
        lines.push('```');
      }
      lines.push('');
    }

    lines.push('---');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.getErrors().length}`);
    lines.push(`- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`);
    lines.push('');

    return lines.join('\n');
  }

  /**
   * Write the markdown log to a file outside the workspace
   */
  async persist(logFile: string): Promise<void> {
    await fs.mkdir(path.dirname(logFile), { recursive: true });
    await fs.writeFile(logFile, this.formatMarkdown(), 'utf-8');
  }
}

/**
 * Get icon for log level
 */
export function getLevelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}
