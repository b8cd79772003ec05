import path from 'node:path';

export class StructuredError extends Error {
    code: string;
    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = new.target.name;
    }
}

/** The worker process could not be created. Fatal for the task, never retried. */
export class SpawnError extends StructuredError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SPAWN_FAILED', message, options);
    }
}

/** A task is already in flight against the handshake directory or the runner is at capacity. */
export class TaskBusyError extends StructuredError {
    constructor(message: string) {
        super('TASK_BUSY', message);
    }
}

export class TaskNotFoundError extends StructuredError {
    constructor(taskId: string) {
        super('TASK_NOT_FOUND', `Task ${taskId} not found.`);
    }
}

export class InvalidTransitionError extends StructuredError {
    constructor(taskId: string, from: string, to: string) {
        super('INVALID_TRANSITION', `Task ${taskId} cannot move from ${from} to ${to}.`);
    }
}

export function serializeErrorForClient(error: unknown) {
    if (error instanceof StructuredError) {
        return { code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { message: error.message };
    }
    try {
        return { message: String(error) };
    } catch {
        return { message: 'Unknown error' };
    }
}

export function formatError(error: unknown) {
    return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/** Absolute form of a file or directory path, relative ones taken from the cwd. */
export function resolvePath(input: string) {
    return path.isAbsolute(input) ? path.normalize(input) : path.resolve(process.cwd(), input);
}

export function tailText(text: string, maxChars: number) {
    return text.length > maxChars ? text.slice(text.length - maxChars) : text;
}
