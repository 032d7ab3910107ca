import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error';

export const LOG_THRESHOLDS = ['info', 'warn', 'error', 'silent'] as const;
export type LogThreshold = (typeof LOG_THRESHOLDS)[number];

export interface LogContext {
  reviewId: string;
  repository?: string;
  pullNumber?: number;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  reviewId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  repository?: string;
  pullNumber?: number;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function resolveMinLevel(value: string | undefined): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'warn' || normalized === 'error' || normalized === 'silent') {
    return normalized;
  }
  return 'info';
}

export class Logger {
  private context: LogContext | null = null;
  // Unset until configured; falls back to LOG_LEVEL as it is when the entry is written.
  private minLevel: LogThreshold | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(level: LogThreshold): void {
    this.minLevel = level;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    const minLevel = this.minLevel ?? resolveMinLevel(process.env.LOG_LEVEL);
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      reviewId: this.context?.reviewId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.repository) entry.repository = this.context.repository;
    if (this.context?.pullNumber) entry.pullNumber = this.context.pullNumber;

    const line = JSON.stringify(entry);
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateReviewId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
