// packages/worker/src/infrastructure/logger.ts

// Pino JSON logger behind a small typed wrapper.
// Pretty printing in development only; child loggers carry jobId/runId.
// The root logger is built on first use so .env files loaded at startup reach it.

import pino from 'pino';

import type { PipelineLogEvent, PipelineLogger } from '@splat-pipeline/contracts';

export interface LogFields {
  jobId?: string;
  runId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

let root: Logger | undefined;

export function getRootLogger(): Logger {
  root ??= createRootLogger();
  return root;
}

export const logger: Logger = {
  info: (msg, fields) => getRootLogger().info(msg, fields),
  warn: (msg, fields) => getRootLogger().warn(msg, fields),
  error: (msg, fields) => getRootLogger().error(msg, fields),
  debug: (msg, fields) => getRootLogger().debug(msg, fields),
  child: (bindings) => getRootLogger().child(bindings),
};

function createRootLogger(): Logger {
  const base = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });

  return wrap(base);
}

function wrap(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    },
  };
}

export function createJobLogger(jobId: string, runId?: string): Logger {
  return logger.child({ jobId, runId });
}

/** Route pipeline events into pino, keeping runId/stage as fields. */
export function toPipelineLogger(target: Logger): PipelineLogger {
  return {
    log(event: PipelineLogEvent) {
      const fields: LogFields = { ...(event.detail ?? {}), runId: event.runId, stage: event.stage };
      switch (event.level) {
        case 'debug':
          target.debug(event.message, fields);
          return;
        case 'warn':
          target.warn(event.message, fields);
          return;
        case 'error':
          target.error(event.message, fields);
          return;
        default:
          target.info(event.message, fields);
      }
    },
  };
}
