import { spawn, type ChildProcess } from 'node:child_process';
import fsSync from 'node:fs';
import { logger } from '../core/logger.js';
import { SpawnError, formatError, tailText } from '../core/utils.js';
import { terminateProcessTree } from './processUtils.js';
import { buildWorkerCommand, type WorkerEntryPoint } from './spawnHelpers.js';

const STDERR_TAIL_CHARS = 8 * 1024;

export interface ExitStatus {
    code: number | null;
    signal: string | null;
    /** Set when the process never started or the OS reported a failure. */
    error?: string;
}

export interface ProcessHandle {
    readonly pid: number | undefined;
    isAlive(): boolean;
    exitStatus(): ExitStatus | undefined;
    /** Last few KiB the worker wrote to stderr. */
    stderrTail(): string;
    terminate(): void;
    release(): void;
}

export interface SpawnRequest {
    entryPoint: WorkerEntryPoint;
    requestFile: string;
    resultFile: string;
    cwd: string;
    env?: Record<string, string>;
}

export interface WorkerLauncher {
    spawn(request: SpawnRequest): ProcessHandle;
}

export class ChildProcessHandle implements ProcessHandle {
    private status: ExitStatus | undefined;
    private stderr = '';
    private released = false;

    constructor(
        private readonly child: ChildProcess,
        private readonly label: string
    ) {
        child.once('exit', (code, signal) => {
            this.status = { code, signal };
            logger.debug(`worker ${label}: exited`, { pid: child.pid, code, signal });
        });
        child.on('error', (error) => {
            if (child.pid === undefined && !this.status) {
                this.status = { code: null, signal: null, error: formatError(error) };
            }
            logger.warn(`worker ${label}: process error`, formatError(error));
        });
        child.stdout?.on('data', (chunk: Buffer) => {
            logger.debug(`worker ${label}: stdout`, chunk.toString().trimEnd());
        });
        child.stderr?.on('data', (chunk: Buffer) => {
            const text = chunk.toString();
            this.stderr = tailText(this.stderr + text, STDERR_TAIL_CHARS);
            logger.debug(`worker ${label}: stderr`, text.trimEnd());
        });
    }

    get pid() {
        return this.child.pid;
    }

    isAlive() {
        return this.status === undefined;
    }

    exitStatus() {
        return this.status;
    }

    stderrTail() {
        return this.stderr;
    }

    terminate() {
        if (!this.isAlive()) {
            return;
        }
        logger.info(`worker ${this.label}: terminating`, { pid: this.child.pid });
        terminateProcessTree(this.child, () => this.isAlive());
    }

    release() {
        if (this.released) {
            return;
        }
        this.released = true;
        this.child.stdout?.removeAllListeners('data');
        this.child.stderr?.removeAllListeners('data');
        this.child.stdout?.destroy();
        this.child.stderr?.destroy();
    }
}

/** Spawns each worker as its own OS process so it never shares the host's runtime. */
export class ProcessWorkerLauncher implements WorkerLauncher {
    spawn(request: SpawnRequest): ProcessHandle {
        const { entryPoint, requestFile, resultFile, cwd } = request;
        if (!isDirectory(cwd)) {
            throw new SpawnError(`Worker working directory '${cwd}' does not exist.`);
        }
        const { command, args } = buildWorkerCommand(entryPoint, requestFile, resultFile, cwd);
        let child: ChildProcess;
        try {
            child = spawn(command, args, {
                cwd,
                env: { ...process.env, ...request.env },
                stdio: ['ignore', 'pipe', 'pipe'],
                // Group leader on POSIX so termination reaches grandchildren.
                detached: process.platform !== 'win32',
                windowsHide: true
            });
        } catch (error) {
            throw new SpawnError(`Worker process could not be created: ${formatError(error)}`, { cause: error });
        }
        if (child.pid === undefined) {
            // The matching 'error' event arrives on a later tick; keep it from going unhandled.
            child.once('error', (error) => {
                logger.debug('worker: spawn rejected', formatError(error));
            });
            throw new SpawnError(`Worker process could not be created for '${command}'.`);
        }
        const label = request.env?.OFFLOAD_TASK_ID?.slice(0, 8) ?? String(child.pid);
        logger.info(`worker ${label}: spawned`, { pid: child.pid, command, script: entryPoint.script });
        return new ChildProcessHandle(child, label);
    }
}

function isDirectory(target: string) {
    try {
        return fsSync.statSync(target).isDirectory();
    } catch {
        return false;
    }
}
