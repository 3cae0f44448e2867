import type { PipelineLogEvent, PipelineLogger } from '@splat-pipeline/contracts';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export type LogEvent = {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

export type Logger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  /** Adapter handed to the pipeline; its events are recorded alongside CLI messages. */
  pipeline: PipelineLogger;
  events: () => LogEvent[];
  flush: (final?: Record<string, unknown>) => void;
};

type LoggerOptions = {
  json?: boolean;
  verbose?: boolean;
};

function formatMessage(level: LogLevel, message: string): string {
  const icon =
    level === 'info'
      ? 'ℹ️'
      : level === 'warn'
        ? '⚠️'
        : level === 'error'
          ? '❌'
          : level === 'success'
            ? '✅'
            : '•';
  return `${icon} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { json = false, verbose = false } = options;
  const events: LogEvent[] = [];

  const push = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    const event: LogEvent = {
      level,
      message,
      details,
      timestamp: new Date().toISOString(),
    };
    events.push(event);
    if (json || (level === 'debug' && !verbose)) return;
    if (details && Object.keys(details).length > 0) {
      console.log(formatMessage(level, message), details);
    } else {
      console.log(formatMessage(level, message));
    }
  };

  const pipeline: PipelineLogger = {
    log: (event: PipelineLogEvent) => {
      const details: Record<string, unknown> = { ...(event.detail ?? {}) };
      if (event.runId) details.runId = event.runId;
      push(event.level, event.message, details);
    },
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    success: (message, details) => push('success', message, details),
    pipeline,
    events: () => events,
    flush: final => {
      if (json) {
        const payload = { events, result: final ?? null };
        console.log(JSON.stringify(payload, null, 2));
      }
    },
  };
}
