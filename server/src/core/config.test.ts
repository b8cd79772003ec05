import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_DECODE_GRACE_MS, DEFAULT_POLL_INTERVAL_MS, loadConfig, readNumberEnv } from './config.js';

describe('loadConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            handshakeDir: path.join(os.tmpdir(), 'offload-runner'),
            workerScript: undefined,
            workerRuntime: process.execPath,
            workerArgs: [],
            pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
            timeoutMs: 0,
            decodeGraceMs: DEFAULT_DECODE_GRACE_MS,
            maxConcurrent: 1
        });
    });

    it('reads every OFFLOAD_ variable', () => {
        const config = loadConfig({
            OFFLOAD_HANDSHAKE_DIR: '/var/run/offload',
            OFFLOAD_WORKER_SCRIPT: '/opt/models/worker.py',
            OFFLOAD_WORKER_RUNTIME: 'python3',
            OFFLOAD_WORKER_ARGS: ' -u   -X utf8 ',
            OFFLOAD_POLL_INTERVAL_MS: '250',
            OFFLOAD_TIMEOUT_MS: '60000',
            OFFLOAD_DECODE_GRACE_MS: '500',
            OFFLOAD_MAX_CONCURRENT: '4'
        });

        expect(config).toEqual({
            handshakeDir: path.resolve('/var/run/offload'),
            workerScript: path.resolve('/opt/models/worker.py'),
            workerRuntime: 'python3',
            workerArgs: ['-u', '-X', 'utf8'],
            pollIntervalMs: 250,
            timeoutMs: 60_000,
            decodeGraceMs: 500,
            maxConcurrent: 4
        });
    });

    it('resolves relative paths against the working directory', () => {
        const config = loadConfig({ OFFLOAD_HANDSHAKE_DIR: 'tmp/handshake', OFFLOAD_WORKER_SCRIPT: 'worker.mjs' });

        expect(config.handshakeDir).toBe(path.resolve(process.cwd(), 'tmp/handshake'));
        expect(config.workerScript).toBe(path.resolve(process.cwd(), 'worker.mjs'));
    });

    it('ignores a zero poll interval and a zero concurrency limit', () => {
        const config = loadConfig({ OFFLOAD_POLL_INTERVAL_MS: '0', OFFLOAD_MAX_CONCURRENT: '0' });

        expect(config.pollIntervalMs).toBe(DEFAULT_POLL_INTERVAL_MS);
        expect(config.maxConcurrent).toBe(1);
    });
});

describe('readNumberEnv', () => {
    it('parses and truncates numbers', () => {
        expect(readNumberEnv({ N: '12.9' }, 'N', 5)).toBe(12);
    });

    it('returns the fallback for blank, invalid or too small values', () => {
        expect(readNumberEnv({}, 'N', 5)).toBe(5);
        expect(readNumberEnv({ N: '  ' }, 'N', 5)).toBe(5);
        expect(readNumberEnv({ N: 'soon' }, 'N', 5)).toBe(5);
        expect(readNumberEnv({ N: '-1' }, 'N', 5)).toBe(5);
        expect(readNumberEnv({ N: '2' }, 'N', 5, 3)).toBe(5);
    });
});
