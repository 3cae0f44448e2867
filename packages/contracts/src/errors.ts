export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** The executable could not be started at all (missing binary, permission denied). */
export class LaunchFailure extends PipelineError {
    readonly command: string;

    constructor(command: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.command = command;
    }
}

export interface CommandFailureDetails {
    command: string;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stderrExcerpt: string;
}

/** The external tool ran but exited non-zero or was terminated. */
export class CommandFailure extends PipelineError {
    readonly command: string;
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;
    readonly stderrExcerpt: string;

    constructor(message: string, details: CommandFailureDetails, options?: ErrorOptions) {
        super(message, options);
        this.command = details.command;
        this.exitCode = details.exitCode;
        this.signal = details.signal;
        this.stderrExcerpt = details.stderrExcerpt;
    }
}

export class FetchFailure extends PipelineError {
    readonly url: string;
    readonly status?: number;

    constructor(url: string, message: string, status?: number, options?: ErrorOptions) {
        super(message, options);
        this.url = url;
        this.status = status;
    }
}

export class InsufficientInputError extends PipelineError {
    readonly frameCount: number;
    readonly minimum: number;

    constructor(frameCount: number, minimum: number) {
        super(`Not enough frames extracted (${frameCount}). Need at least ${minimum}.`);
        this.frameCount = frameCount;
        this.minimum = minimum;
    }
}

export class ReconstructionFailure extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class PublishFailure extends PipelineError {
    readonly sink?: string;
    readonly status?: number;

    constructor(message: string, details: { sink?: string; status?: number } = {}, options?: ErrorOptions) {
        super(message, options);
        this.sink = details.sink;
        this.status = details.status;
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return typeof error === 'string' ? error : String(error);
}
