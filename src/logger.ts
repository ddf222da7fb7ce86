import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface LogFileOptions {
  path: string;
  maxBytes?: number;
  backups?: number;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function renderMeta(meta: unknown): string {
  if (meta instanceof Error) return meta.message;
  if (typeof meta === 'string') return meta;
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

export function formatLogLine(level: LogLevel, message: string, meta: unknown[], date: Date): string {
  const rendered = meta.length > 0 ? `${message} ${meta.map(renderMeta).join(' ')}` : message;
  return `${formatTimestamp(date)} - ${level.toUpperCase()} - ${rendered}`;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Console + rotating file logger.
 * Console output goes to stderr so stdout stays free for command output.
 */
export class Logger {
  private level: LogLevel;
  private file: Required<LogFileOptions> | null = null;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Start mirroring log lines into a file, rotated once it grows past maxBytes.
   * Returns false and keeps logging to stderr only when the file cannot be used.
   */
  attachFile(options: LogFileOptions): boolean {
    try {
      const dir = dirname(options.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    } catch (error) {
      this.file = null;
      console.error(`Failed to open log file ${options.path}: ${renderMeta(error)}`);
      return false;
    }
    this.file = {
      path: options.path,
      maxBytes: options.maxBytes ?? 5 * 1024 * 1024,
      backups: options.backups ?? 3
    };
    return true;
  }

  detachFile(): void {
    this.file = null;
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = formatLogLine(level, message, meta, new Date());
    console.error(line);

    if (this.file) {
      try {
        this.rotateIfNeeded(this.file);
        appendFileSync(this.file.path, `${line}\n`);
      } catch (error) {
        // Losing the file sink must not take the run down with it
        console.error(`Failed to write log file ${this.file.path}: ${renderMeta(error)}`);
      }
    }
  }

  private rotateIfNeeded(file: Required<LogFileOptions>): void {
    if (!existsSync(file.path) || statSync(file.path).size < file.maxBytes) return;

    const oldest = `${file.path}.${file.backups}`;
    if (existsSync(oldest)) {
      rmSync(oldest);
    }
    for (let index = file.backups - 1; index >= 1; index--) {
      const source = `${file.path}.${index}`;
      if (existsSync(source)) {
        renameSync(source, `${file.path}.${index + 1}`);
      }
    }
    renameSync(file.path, `${file.path}.1`);
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

/**
 * Tracks how long each step of a run takes
 */
export class StepTimer {
  private startedAt = 0;
  private lastStepAt = 0;

  constructor(private readonly now: () => number = Date.now) {}

  start(processName: string): void {
    this.startedAt = this.now();
    this.lastStepAt = this.startedAt;
    logger.info(`⏱️  Started ${processName}`);
  }

  step(stepName: string): number {
    const current = this.now();
    const elapsed = current - this.lastStepAt;
    this.lastStepAt = current;
    logger.info(`⏱️  ${stepName} took ${(elapsed / 1000).toFixed(2)}s`);
    return elapsed;
  }

  finish(processName: string): number {
    const total = this.now() - this.startedAt;
    logger.info(`⏱️  ${processName} finished in ${(total / 1000).toFixed(2)}s`);
    return total;
  }
}
