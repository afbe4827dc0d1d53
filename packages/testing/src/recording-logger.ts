/**
 * Logger double that keeps every call for assertions
 */

export type RecordedLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecordedLogEntry {
  level: RecordedLevel;
  message: string;
  data?: unknown;
}

export class RecordingLogger {
  readonly entries: RecordedLogEntry[] = [];

  debug(message: string, data?: unknown): void {
    this.entries.push({ level: 'debug', message, data });
  }

  info(message: string, data?: unknown): void {
    this.entries.push({ level: 'info', message, data });
  }

  warn(message: string, data?: unknown): void {
    this.entries.push({ level: 'warn', message, data });
  }

  error(message: string, data?: unknown): void {
    this.entries.push({ level: 'error', message, data });
  }

  messages(level?: RecordedLevel): string[] {
    return this.entries
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
