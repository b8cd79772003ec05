import fs from 'node:fs/promises';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';
import { writeFileAtomic } from '../task/handshake.js';
import { encodeResult } from '../task/resultDecoder.js';

export type WorkerHandler<Request = unknown> = (
    request: Request
) => Promise<Record<string, unknown>> | Record<string, unknown>;

export interface RunWorkerOptions {
    /** Arguments after the script path; defaults to `process.argv.slice(2)`. */
    argv?: string[];
    /** Assign the result to `process.exitCode`. Defaults to true. */
    setExitCode?: boolean;
}

/**
 * Worker-side half of the handshake: read the request, run the handler, and
 * write the result file as the very last step. A failing handler still leaves
 * an error envelope behind so the host can report why.
 *
 * Resolves with the process exit code the worker should use.
 */
export async function runWorker<Request = unknown>(handler: WorkerHandler<Request>, options: RunWorkerOptions = {}) {
    const [requestFile, resultFile] = options.argv ?? process.argv.slice(2);
    const exit = (code: number) => {
        if (options.setExitCode ?? true) {
            process.exitCode = code;
        }
        return code;
    };
    if (!requestFile || !resultFile) {
        logger.error('worker: expected <requestFile> <resultFile> arguments');
        return exit(2);
    }
    try {
        const request: Request = JSON.parse(await fs.readFile(requestFile, 'utf8'));
        const value = await handler(request);
        await writeFileAtomic(resultFile, encodeResult({ ...value, status: 'ok' }));
        return exit(0);
    } catch (error) {
        logger.error('worker: task failed', formatError(error));
        await writeFileAtomic(resultFile, encodeResult({ status: 'error', error: formatError(error) }));
        return exit(1);
    }
}
