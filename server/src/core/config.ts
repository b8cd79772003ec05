import os from 'node:os';
import path from 'node:path';
import { resolvePath } from './utils.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_DECODE_GRACE_MS = 2000;

export interface OffloadConfig {
    handshakeDir: string;
    workerScript: string | undefined;
    workerRuntime: string;
    workerArgs: string[];
    pollIntervalMs: number;
    /** 0 disables the deadline. */
    timeoutMs: number;
    decodeGraceMs: number;
    maxConcurrent: number;
}

type Env = Record<string, string | undefined>;

export function readNumberEnv(env: Env, name: string, fallback: number, min = 0) {
    const raw = env[name];
    if (!raw || raw.trim().length === 0) {
        return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min) {
        return fallback;
    }
    return Math.trunc(parsed);
}

function readStringEnv(env: Env, name: string) {
    const raw = (env[name] ?? '').trim();
    return raw.length > 0 ? raw : undefined;
}

export function loadConfig(env: Env = process.env): OffloadConfig {
    const handshakeDir = readStringEnv(env, 'OFFLOAD_HANDSHAKE_DIR');
    const workerScript = readStringEnv(env, 'OFFLOAD_WORKER_SCRIPT');
    const workerArgs = readStringEnv(env, 'OFFLOAD_WORKER_ARGS');
    return {
        handshakeDir: handshakeDir ? resolvePath(handshakeDir) : path.join(os.tmpdir(), 'offload-runner'),
        workerScript: workerScript ? resolvePath(workerScript) : undefined,
        workerRuntime: readStringEnv(env, 'OFFLOAD_WORKER_RUNTIME') ?? process.execPath,
        workerArgs: workerArgs ? workerArgs.split(/\s+/) : [],
        pollIntervalMs: readNumberEnv(env, 'OFFLOAD_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS, 1),
        timeoutMs: readNumberEnv(env, 'OFFLOAD_TIMEOUT_MS', 0),
        decodeGraceMs: readNumberEnv(env, 'OFFLOAD_DECODE_GRACE_MS', DEFAULT_DECODE_GRACE_MS),
        maxConcurrent: readNumberEnv(env, 'OFFLOAD_MAX_CONCURRENT', 1, 1)
    };
}
