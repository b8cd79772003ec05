import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { DEFAULT_DECODE_GRACE_MS } from '../core/config.js';
import { logger } from '../core/logger.js';
import { InvalidTransitionError, SpawnError, TaskBusyError, TaskNotFoundError, formatError } from '../core/utils.js';
import { ProcessWorkerLauncher, type ProcessHandle, type WorkerLauncher } from '../worker/launcher.js';
import type { WorkerEntryPoint } from '../worker/spawnHelpers.js';
import { HandshakeDirectory } from './handshake.js';
import { decodeResult } from './resultDecoder.js';
import { isTerminal, type PollOutcome, type SubmitOptions, type TaskHandle, type TaskOutcome, type TaskRecord, type TaskState } from './types.js';

const STDERR_IN_MESSAGE_CHARS = 500;

export interface TaskSupervisorOptions {
    /** Handshake directory this supervisor owns exclusively. */
    baseDir: string;
    entryPoint: WorkerEntryPoint;
    /** Working directory for the worker process. Defaults to the host's cwd. */
    cwd?: string;
    launcher?: WorkerLauncher;
    /** How long a present-but-undecodable result file is retried before it counts as malformed. */
    decodeGraceMs?: number;
    now?: () => number;
}

interface ActiveTask {
    record: TaskRecord;
    process: ProcessHandle;
    firstUndecodableAt?: number;
    cleaning: boolean;
}

/**
 * Drives one task at a time through `running -> {succeeded, failed, timed_out, cancelled}`.
 * Nothing here waits on the worker: `submit` returns once the process is spawned and
 * `poll` only probes the handshake directory and the recorded exit state.
 */
export class TaskSupervisor {
    readonly handshake: HandshakeDirectory;
    private readonly entryPoint: WorkerEntryPoint;
    private readonly cwd: string;
    private readonly launcher: WorkerLauncher;
    private readonly decodeGraceMs: number;
    private readonly now: () => number;
    private readonly emitter = new EventEmitter();
    private task: ActiveTask | undefined;
    private submitting = false;

    constructor(options: TaskSupervisorOptions) {
        this.handshake = new HandshakeDirectory(options.baseDir);
        this.entryPoint = options.entryPoint;
        this.cwd = options.cwd ?? process.cwd();
        this.launcher = options.launcher ?? new ProcessWorkerLauncher();
        this.decodeGraceMs = options.decodeGraceMs ?? DEFAULT_DECODE_GRACE_MS;
        this.now = options.now ?? Date.now;
    }

    /** Subscribe to state transitions. Returns an unsubscribe function. */
    onUpdate(listener: (record: TaskRecord) => void) {
        this.emitter.on('update', listener);
        return () => {
            this.emitter.off('update', listener);
        };
    }

    isIdle() {
        return !this.task && !this.submitting;
    }

    getTask(handle: TaskHandle): TaskRecord | undefined {
        const task = this.find(handle);
        return task ? { ...task.record } : undefined;
    }

    async submit(payload: unknown, options: SubmitOptions = {}): Promise<TaskHandle> {
        if (!this.isIdle()) {
            throw new TaskBusyError(`A task is already in flight in ${this.handshake.baseDir}.`);
        }
        this.submitting = true;
        try {
            const id = options.taskId ?? randomUUID();
            await this.handshake.prepare();
            await this.handshake.writeRequest(payload);
            let child: ProcessHandle;
            try {
                child = this.launcher.spawn({
                    entryPoint: this.entryPoint,
                    requestFile: this.handshake.requestFile,
                    resultFile: this.handshake.resultFile,
                    cwd: this.cwd,
                    env: { OFFLOAD_TASK_ID: id }
                });
            } catch (error) {
                await this.handshake.removeFiles();
                const spawnError = error instanceof SpawnError ? error : new SpawnError(formatError(error), { cause: error });
                logger.error(`task ${id}: spawn failed`, spawnError.message);
                throw spawnError;
            }
            const submittedAt = this.now();
            const timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined;
            const record: TaskRecord = {
                id,
                payload,
                state: 'running',
                submittedAt,
                updatedAt: submittedAt,
                timeoutMs,
                requestFile: this.handshake.requestFile,
                resultFile: this.handshake.resultFile,
                pid: child.pid
            };
            this.task = { record, process: child, cleaning: false };
            logger.info(`task ${id}: running`, { pid: child.pid, timeoutMs });
            this.emitter.emit('update', { ...record });
            return { id };
        } finally {
            this.submitting = false;
        }
    }

    async poll(handle: TaskHandle): Promise<PollOutcome> {
        const task = this.require(handle);
        const before = settledOutcome(task);
        if (before) {
            return { done: true, outcome: before };
        }
        // Sampled before the file probe: a worker that wrote its result and then
        // exited during the probe must not be reported as exiting without one.
        const wasAlive = task.process.isAlive();

        let hasResult = false;
        let text: string | undefined;
        let readError: string | undefined;
        try {
            hasResult = await this.handshake.resultExists();
            text = hasResult && !settledOutcome(task) ? await this.handshake.readResult() : undefined;
        } catch (error) {
            readError = formatError(error);
        }
        // A cancel may have landed while the probe was pending.
        const meanwhile = settledOutcome(task);
        if (meanwhile) {
            return { done: true, outcome: meanwhile };
        }
        if (readError !== undefined) {
            const settled = this.settleUndecodable(task, `Result file could not be read: ${readError}`, wasAlive);
            if (settled) {
                return { done: true, outcome: settled };
            }
        } else if (text !== undefined) {
            const settled = this.settleFromResult(task, text, wasAlive);
            if (settled) {
                return { done: true, outcome: settled };
            }
        } else if (!hasResult && !wasAlive) {
            return { done: true, outcome: this.failExited(task) };
        }

        const { timeoutMs, submittedAt } = task.record;
        if (timeoutMs !== undefined && this.now() - submittedAt > timeoutMs) {
            task.process.terminate();
            logger.warn(`task ${task.record.id}: timed out after ${timeoutMs}ms`);
            return { done: true, outcome: this.finish(task, 'timed_out', { kind: 'timeout', timeoutMs }) };
        }
        return { done: false };
    }

    /** Returns the cancelled outcome, or undefined when the task is unknown or already terminal. */
    async cancel(handle: TaskHandle): Promise<TaskOutcome | undefined> {
        const task = this.find(handle);
        if (!task || isTerminal(task.record.state)) {
            return undefined;
        }
        task.process.terminate();
        const outcome = this.finish(task, 'cancelled', { kind: 'cancelled' });
        // Termination can leave a half-written result; it is discarded, never decoded.
        try {
            await this.handshake.removeFiles();
        } catch (error) {
            logger.warn(`task ${task.record.id}: could not remove handshake files`, formatError(error));
        }
        return outcome;
    }

    /** Releases everything the task holds. Safe to call more than once. */
    async cleanup(handle: TaskHandle) {
        const task = this.find(handle);
        if (!task || task.cleaning) {
            return;
        }
        task.cleaning = true;
        if (!isTerminal(task.record.state)) {
            await this.cancel(handle);
        }
        try {
            await this.handshake.removeFiles();
        } catch (error) {
            logger.warn(`task ${task.record.id}: could not remove handshake files`, formatError(error));
        }
        // A worker can settle the task (malformed or error envelope) and keep running.
        if (task.process.isAlive()) {
            task.process.terminate();
        }
        task.process.release();
        this.task = undefined;
        logger.debug(`task ${task.record.id}: cleaned up`);
    }

    private settleFromResult(task: ActiveTask, text: string, wasAlive: boolean): TaskOutcome | undefined {
        const decoded = decodeResult(text);
        switch (decoded.kind) {
            case 'ok':
                return this.finish(task, 'succeeded', { kind: 'success', value: decoded.value });
            case 'worker-error':
                return this.finish(task, 'failed', {
                    kind: 'failure',
                    reason: 'worker-error',
                    message: decoded.message,
                    ...(decoded.details === undefined ? {} : { details: decoded.details })
                });
            case 'invalid':
                return this.finish(task, 'failed', { kind: 'failure', reason: 'malformed-result', message: decoded.reason });
            case 'incomplete':
                return this.settleUndecodable(task, decoded.reason, wasAlive);
        }
    }

    /**
     * A result that is present but cannot be decoded (or read) yet. Retried until
     * the grace window runs out; once the worker has exited it never will be.
     */
    private settleUndecodable(task: ActiveTask, reason: string, wasAlive: boolean): TaskOutcome | undefined {
        const now = this.now();
        task.firstUndecodableAt = task.firstUndecodableAt ?? now;
        const waited = now - task.firstUndecodableAt;
        if (!wasAlive || waited >= this.decodeGraceMs) {
            const message = wasAlive
                ? `Result file still undecodable after ${waited}ms: ${reason}`
                : `Worker exited leaving an undecodable result file: ${reason}`;
            return this.finish(task, 'failed', { kind: 'failure', reason: 'malformed-result', message });
        }
        logger.debug(`task ${task.record.id}: result not decodable yet`, reason);
        return undefined;
    }

    private failExited(task: ActiveTask) {
        const status = task.process.exitStatus();
        const stderr = task.process.stderrTail().trim();
        const parts = [
            status?.error
                ? `Worker failed: ${status.error}.`
                : `Worker exited with ${status?.signal ? `signal ${status.signal}` : `code ${status?.code ?? 'unknown'}`} without writing a result.`
        ];
        if (stderr.length > 0) {
            parts.push(stderr.slice(-STDERR_IN_MESSAGE_CHARS));
        }
        return this.finish(task, 'failed', {
            kind: 'failure',
            reason: 'worker-exited-without-result',
            message: parts.join(' '),
            exitCode: status?.code ?? null,
            signal: status?.signal ?? null
        });
    }

    private finish(task: ActiveTask, state: TaskState, outcome: TaskOutcome) {
        const record = task.record;
        if (isTerminal(record.state)) {
            throw new InvalidTransitionError(record.id, record.state, state);
        }
        const now = this.now();
        const status = task.process.exitStatus();
        record.state = state;
        record.outcome = outcome;
        record.completedAt = now;
        record.updatedAt = now;
        if (status) {
            record.exitCode = status.code;
            record.signal = status.signal;
        }
        const log = state === 'succeeded' || state === 'cancelled' ? logger.info : logger.warn;
        log(`task ${record.id}: ${state}`, outcome.kind === 'failure' ? { reason: outcome.reason, message: outcome.message } : undefined);
        this.emitter.emit('update', { ...record });
        return outcome;
    }

    private find(handle: TaskHandle) {
        return this.task && this.task.record.id === handle.id ? this.task : undefined;
    }

    private require(handle: TaskHandle) {
        const task = this.find(handle);
        if (!task) {
            throw new TaskNotFoundError(handle.id);
        }
        return task;
    }
}

function settledOutcome(task: ActiveTask): TaskOutcome | undefined {
    return task.record.outcome;
}
