import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { isErrnoException } from '../core/utils.js';

export const REQUEST_FILE_NAME = 'request.json';
export const RESULT_FILE_NAME = 'result.json';

/**
 * One handshake directory, owned exclusively by a single supervisor.
 * Only the supervisor writes the request file; only the worker writes the result file.
 */
export class HandshakeDirectory {
    readonly requestFile: string;
    readonly resultFile: string;

    constructor(readonly baseDir: string) {
        this.requestFile = path.join(baseDir, REQUEST_FILE_NAME);
        this.resultFile = path.join(baseDir, RESULT_FILE_NAME);
    }

    async prepare() {
        await fs.mkdir(this.baseDir, { recursive: true });
        // A result left behind by an earlier task would read as an instant completion.
        await removeIfPresent(this.resultFile);
    }

    async writeRequest(payload: unknown) {
        await writeFileAtomic(this.requestFile, JSON.stringify(payload ?? null));
    }

    async resultExists() {
        try {
            await fs.access(this.resultFile);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }

    /** Returns undefined when the file vanished between the probe and the read. */
    async readResult() {
        try {
            return await fs.readFile(this.resultFile, 'utf8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }
    }

    async removeFiles() {
        await removeIfPresent(this.requestFile);
        await removeIfPresent(this.resultFile);
    }

    async removeDirectory() {
        await fs.rm(this.baseDir, { recursive: true, force: true });
    }
}

export async function removeIfPresent(file: string) {
    await fs.rm(file, { force: true });
}

/** Writes beside the target and renames into place so readers never see a half-created file. */
export async function writeFileAtomic(target: string, contents: string) {
    const temp = `${target}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
    try {
        await fs.writeFile(temp, contents, 'utf8');
        await fs.rename(temp, target);
    } catch (error) {
        await fs.rm(temp, { force: true });
        throw error;
    }
}
