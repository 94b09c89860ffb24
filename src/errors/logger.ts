import { randomUUID } from 'crypto';
import { CondSpecError } from './condspec-error';
import { ErrorContext } from './types';

export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'warn' | 'error';

export interface ErrorLoggerOptions {
  /** Minimum level written to the sink (default: CONDSPEC_LOG_LEVEL, else "warn") */
  level?: LogLevel;
}

const DEFAULT_SINK: LogSink = console;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  warn: 0,
  error: 1,
};

export function parseLogLevel(level?: string): LogLevel | null {
  if (!level) {
    return null;
  }
  const normalized = level.trim().toLowerCase();
  if (normalized === 'warn' || normalized === 'warning') {
    return 'warn';
  }
  if (normalized === 'error') {
    return 'error';
  }
  return null;
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function generateCorrelationId(): string {
  try {
    return randomUUID();
  } catch {
    const rand = Math.random().toString(36).slice(2, 10);
    return `cid-${Date.now().toString(36)}-${rand}`;
  }
}

interface LogPayload {
  level: LogLevel;
  timestamp: string;
  correlationId: string;
  message: string;
  code?: string;
  [key: string]: unknown;
}

/**
 * Writes one JSON line per event. Falls back to a plain text line when the
 * payload cannot be serialised.
 */
export class ErrorLogger {
  private readonly level: LogLevel;

  constructor(
    private readonly sink: LogSink = DEFAULT_SINK,
    options: ErrorLoggerOptions = {}
  ) {
    this.level = options.level ?? parseLogLevel(process.env.CONDSPEC_LOG_LEVEL) ?? 'warn';
  }

  /**
   * Ensures a correlation identifier exists and returns it.
   */
  ensureCorrelationId(context?: ErrorContext): string {
    if (context?.correlationId && typeof context.correlationId === 'string') {
      return context.correlationId;
    }
    return generateCorrelationId();
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  /**
   * Emit a structured entry for a library error. The merged context,
   * including the correlation id, is written back onto the error.
   */
  logError(error: CondSpecError, contextOverride?: ErrorContext): string {
    const correlationId = this.ensureCorrelationId(contextOverride ?? error.context);
    error.context = {
      ...error.context,
      ...contextOverride,
      correlationId,
    };

    this.emit({
      ...error.toJSON(),
      level: 'error',
      timestamp: new Date().toISOString(),
      correlationId,
    });

    return correlationId;
  }

  logWarning(message: string, context: ErrorContext = {}): string {
    const correlationId = this.ensureCorrelationId(context);
    this.emit({
      level: 'warn',
      timestamp: new Date().toISOString(),
      correlationId,
      message,
      context,
    });
    return correlationId;
  }

  private emit(payload: LogPayload): void {
    if (!this.isEnabled(payload.level)) {
      return;
    }

    const write =
      payload.level === 'warn' ? this.sink.warn.bind(this.sink) : this.sink.error.bind(this.sink);

    const line = safeStringify(payload);
    if (line) {
      write(line);
      return;
    }

    const code = payload.code ? ` [${payload.code}]` : '';
    write(
      `[${payload.timestamp}] [${payload.level.toUpperCase()}]${code} ${payload.message} (correlationId=${payload.correlationId})`
    );
  }
}
