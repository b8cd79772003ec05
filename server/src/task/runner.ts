import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import path from 'node:path';
import { DEFAULT_DECODE_GRACE_MS, DEFAULT_POLL_INTERVAL_MS } from '../core/config.js';
import { logger } from '../core/logger.js';
import { SpawnError, TaskBusyError, TaskNotFoundError, formatError } from '../core/utils.js';
import type { WorkerLauncher } from '../worker/launcher.js';
import type { WorkerEntryPoint } from '../worker/spawnHelpers.js';
import { HandshakeDirectory } from './handshake.js';
import { createTimerHostLoop, type HostLoop } from './hostLoop.js';
import { TaskPoller, type PollSource } from './poller.js';
import { TaskSupervisor } from './supervisor.js';
import { isTerminal, type PollOutcome, type TaskHandle, type TaskOutcome, type TaskRecord } from './types.js';

const HISTORY_LIMIT = 200;

export interface TaskRunnerOptions {
    /** Each task gets its own handshake subdirectory `<baseDir>/<taskId>`. */
    baseDir: string;
    entryPoint: WorkerEntryPoint;
    cwd?: string;
    hostLoop?: HostLoop;
    pollIntervalMs?: number;
    /** Applied when `submit` gets no timeout. 0 means no deadline. */
    defaultTimeoutMs?: number;
    decodeGraceMs?: number;
    maxConcurrent?: number;
    launcher?: WorkerLauncher;
    now?: () => number;
}

export type CompletionCallback = (outcome: TaskOutcome, handle: TaskHandle) => void;

export interface RunnerSubmitOptions {
    timeoutMs?: number;
    onDone?: CompletionCallback;
}

export interface TaskSummary {
    id: string;
    state: TaskRecord['state'];
    submittedAt: number;
    updatedAt: number;
    completedAt?: number;
    timeoutMs?: number;
    pid?: number;
    exitCode?: number | null;
    signal?: string | null;
    outcome?: TaskOutcome;
}

interface InFlight {
    handle: TaskHandle;
    supervisor: TaskSupervisor;
    onDone?: CompletionCallback;
    unsubscribe: () => void;
}

/**
 * Caller-facing API: submit work, cancel it, and receive exactly one outcome
 * per task on the host loop. Tasks run side by side in per-task handshake
 * subdirectories, up to `maxConcurrent` at once.
 */
export class TaskRunner implements PollSource {
    private readonly options: TaskRunnerOptions;
    private readonly hostLoop: HostLoop;
    private readonly poller: TaskPoller;
    private readonly pollIntervalMs: number;
    private readonly maxConcurrent: number;
    private readonly inFlight = new Map<string, InFlight>();
    private readonly history = new Map<string, TaskSummary>();
    private readonly emitter = new EventEmitter();
    private submitting = 0;

    constructor(options: TaskRunnerOptions) {
        this.options = options;
        this.hostLoop = options.hostLoop ?? createTimerHostLoop();
        this.poller = new TaskPoller(this.hostLoop, this);
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 1);
    }

    on(event: 'update', listener: (summary: TaskSummary) => void): () => void;
    on(event: 'outcome', listener: (outcome: TaskOutcome, handle: TaskHandle) => void): () => void;
    on(
        event: 'update' | 'outcome',
        listener: ((summary: TaskSummary) => void) | ((outcome: TaskOutcome, handle: TaskHandle) => void)
    ) {
        this.emitter.on(event, listener);
        return () => {
            this.emitter.off(event, listener);
        };
    }

    runningCount() {
        return this.inFlight.size;
    }

    status(taskId: string): TaskSummary | undefined {
        const summary = this.history.get(taskId);
        return summary ? { ...summary } : undefined;
    }

    list(limit = 50): TaskSummary[] {
        return Array.from(this.history.values())
            .sort((a, b) => b.submittedAt - a.submittedAt)
            .slice(0, limit)
            .map((summary) => ({ ...summary }));
    }

    async submit(payload: unknown, options: RunnerSubmitOptions = {}): Promise<TaskHandle> {
        if (this.inFlight.size + this.submitting >= this.maxConcurrent) {
            throw new TaskBusyError(`Runner is at capacity (${this.maxConcurrent} task(s) in flight).`);
        }
        this.submitting += 1;
        const id = randomUUID();
        const supervisor = new TaskSupervisor({
            baseDir: path.join(this.options.baseDir, id),
            entryPoint: this.options.entryPoint,
            cwd: this.options.cwd,
            launcher: this.options.launcher,
            decodeGraceMs: this.options.decodeGraceMs ?? DEFAULT_DECODE_GRACE_MS,
            now: this.options.now
        });
        const unsubscribe = supervisor.onUpdate((record) => this.record(record));
        const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
        try {
            const handle = await supervisor.submit(payload, { taskId: id, timeoutMs });
            this.inFlight.set(id, { handle, supervisor, onDone: options.onDone, unsubscribe });
            this.poller.startPolling(handle, this.pollIntervalMs, (outcome) => {
                void this.complete(handle, outcome);
            });
            return handle;
        } catch (error) {
            unsubscribe();
            await this.removeTaskDirectory(supervisor.handshake);
            if (!(error instanceof SpawnError)) {
                throw error;
            }
            const handle: TaskHandle = { id };
            const outcome: TaskOutcome = { kind: 'failure', reason: 'spawn-error', message: error.message };
            const now = (this.options.now ?? Date.now)();
            this.remember({ id, state: 'failed', submittedAt: now, updatedAt: now, completedAt: now, outcome });
            this.hostLoop.scheduleAfter(0, () => this.deliver(handle, outcome, options.onDone));
            return handle;
        } finally {
            this.submitting -= 1;
        }
    }

    /** Returns true when the task was running and is now cancelled. */
    async cancel(handle: TaskHandle) {
        const entry = this.inFlight.get(handle.id);
        if (!entry) {
            return false;
        }
        this.inFlight.delete(handle.id);
        this.poller.stopPolling(handle);
        const cancelled = await entry.supervisor.cancel(handle);
        // A poll can settle the task just before the cancel lands; that outcome still gets delivered.
        const outcome = cancelled ?? entry.supervisor.getTask(handle)?.outcome;
        await this.release(entry);
        if (outcome) {
            this.hostLoop.scheduleAfter(0, () => this.deliver(handle, outcome, entry.onDone));
        }
        return cancelled !== undefined;
    }

    async shutdown() {
        const handles = Array.from(this.inFlight.values()).map((entry) => entry.handle);
        await Promise.all(handles.map((handle) => this.cancel(handle)));
    }

    poll(handle: TaskHandle): Promise<PollOutcome> {
        const entry = this.inFlight.get(handle.id);
        if (!entry) {
            return Promise.reject(new TaskNotFoundError(handle.id));
        }
        return entry.supervisor.poll(handle);
    }

    private async complete(handle: TaskHandle, outcome: TaskOutcome) {
        const entry = this.inFlight.get(handle.id);
        if (!entry) {
            return;
        }
        // Free the slot first so a completion callback can submit the next task.
        this.inFlight.delete(handle.id);
        this.deliver(handle, outcome, entry.onDone);
        await this.release(entry);
    }

    private deliver(handle: TaskHandle, outcome: TaskOutcome, onDone: CompletionCallback | undefined) {
        try {
            onDone?.(outcome, handle);
        } catch (error) {
            logger.error(`task ${handle.id}: completion callback threw`, formatError(error));
        }
        this.emitter.emit('outcome', outcome, handle);
    }

    private async release(entry: InFlight) {
        try {
            await entry.supervisor.cleanup(entry.handle);
        } catch (error) {
            logger.error(`task ${entry.handle.id}: cleanup failed`, formatError(error));
        }
        entry.unsubscribe();
        await this.removeTaskDirectory(entry.supervisor.handshake);
    }

    private async removeTaskDirectory(handshake: HandshakeDirectory) {
        try {
            await handshake.removeDirectory();
        } catch (error) {
            logger.warn('runner: could not remove task directory', { dir: handshake.baseDir, error: formatError(error) });
        }
    }

    private record(record: TaskRecord) {
        this.remember({
            id: record.id,
            state: record.state,
            submittedAt: record.submittedAt,
            updatedAt: record.updatedAt,
            completedAt: record.completedAt,
            timeoutMs: record.timeoutMs,
            pid: record.pid,
            exitCode: record.exitCode,
            signal: record.signal,
            outcome: record.outcome
        });
    }

    private remember(summary: TaskSummary) {
        this.history.delete(summary.id);
        this.history.set(summary.id, summary);
        if (this.history.size > HISTORY_LIMIT) {
            for (const [id, old] of this.history) {
                if (this.history.size <= HISTORY_LIMIT) {
                    break;
                }
                if (isTerminal(old.state)) {
                    this.history.delete(id);
                }
            }
        }
        this.emitter.emit('update', { ...summary });
    }
}
