import { type ChildProcess, spawn } from 'node:child_process';

import {
  CommandFailure,
  LaunchFailure,
  noopLogger,
  type PipelineLogger,
} from '@splat-pipeline/contracts';

const STDERR_EXCERPT_LIMIT = 2000;

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Name used in log records and error messages; defaults to the executable. */
  label?: string;
  logger?: PipelineLogger;
  runId?: string;
  stage?: string;
  /** Aborting terminates the child with SIGTERM and fails the call. */
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

function excerpt(output: string): string {
  const trimmed = output.trim();
  return trimmed.length > STDERR_EXCERPT_LIMIT ? trimmed.slice(-STDERR_EXCERPT_LIMIT) : trimmed;
}

/** Run an executable to completion; rejects on launch failure or non-zero exit. No retries. */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const label = options.label ?? command;
  const logger = options.logger ?? noopLogger;
  const commandLine = formatCommandLine(command, args);
  const { signal, runId, stage } = options;

  logger.log({
    level: 'info',
    message: 'command.run',
    runId,
    stage,
    detail: { label, command: commandLine, cwd: options.cwd },
  });

  if (signal?.aborted) {
    throw new CommandFailure(
      `${label} not started: job aborted`,
      { command: commandLine, exitCode: null, signal: null, stderrExcerpt: '' },
      { cause: signal.reason },
    );
  }

  const result = await new Promise<CommandResult>((resolvePromise, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error: unknown) {
      reject(
        new LaunchFailure(commandLine, `${label} could not be started: ${String(error)}`, {
          cause: error,
        }),
      );
      return;
    }

    let stdout = '';
    let stderr = '';
    let spawned = false;
    let settled = false;
    let runtimeError: Error | undefined;

    const onAbort = () => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      fn();
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('spawn', () => {
      spawned = true;
    });

    child.on('error', (error: Error) => {
      if (spawned) {
        // e.g. kill() failing; the close event still decides the outcome
        runtimeError = error;
        return;
      }
      settle(() =>
        reject(
          new LaunchFailure(commandLine, `${label} could not be started: ${error.message}`, {
            cause: error,
          }),
        ),
      );
    });

    child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
      settle(() => {
        if (code === 0) {
          resolvePromise({ stdout, stderr });
          return;
        }
        const stderrExcerpt = excerpt(stderr);
        const reason =
          code !== null
            ? `${label} exited with code ${code}`
            : `${label} terminated by ${exitSignal ?? 'unknown signal'}`;
        const parts = [signal?.aborted ? `${reason} (job aborted)` : reason];
        if (stderrExcerpt) parts.push(`stderr:\n${stderrExcerpt}`);
        reject(
          new CommandFailure(
            parts.join('\n\n'),
            { command: commandLine, exitCode: code, signal: exitSignal, stderrExcerpt },
            runtimeError ? { cause: runtimeError } : undefined,
          ),
        );
      });
    });
  });

  logger.log({
    level: 'debug',
    message: 'command.output',
    runId,
    stage,
    detail: { label, stdout: result.stdout.trim(), stderr: result.stderr.trim() },
  });

  return result;
};
