import fsSync from 'node:fs';
import path from 'node:path';
import { SpawnError } from '../core/utils.js';

export interface WorkerEntryPoint {
    /** Script handed to the runtime; resolved against the launch cwd when relative. */
    script: string;
    /** Interpreter or runtime executable. Defaults to the current Node binary. */
    runtime?: string;
    /** Runtime flags placed before the script path. */
    args?: string[];
}

export interface SpawnCommand {
    command: string;
    args: string[];
}

type Env = Record<string, string | undefined>;

function isExecutableFile(candidate: string) {
    try {
        const stat = fsSync.statSync(candidate);
        if (!stat.isFile()) {
            return false;
        }
        if (process.platform !== 'win32') {
            fsSync.accessSync(candidate, fsSync.constants.X_OK);
        }
        return true;
    } catch {
        return false;
    }
}

function executableExtensions(env: Env) {
    if (process.platform !== 'win32') {
        return [''];
    }
    const pathExt = (env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD').split(';').filter((ext) => ext.length > 0);
    return ['', ...pathExt.map((ext) => ext.toLowerCase())];
}

/**
 * Resolve a runtime name or path to an executable on disk, the way the shell
 * would: explicit paths are checked directly, bare names are looked up on PATH.
 */
export function resolveRuntime(raw: string, env: Env = process.env): string | undefined {
    const extensions = executableExtensions(env);
    const hasSeparator = raw.includes('/') || raw.includes(path.sep);
    if (hasSeparator || path.isAbsolute(raw)) {
        const base = path.resolve(raw);
        return extensions.map((ext) => base + ext).find(isExecutableFile);
    }
    const searchDirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter((dir) => dir.trim().length > 0);
    for (const dir of searchDirs) {
        for (const ext of extensions) {
            const candidate = path.join(dir, raw + ext);
            if (isExecutableFile(candidate)) {
                return candidate;
            }
        }
    }
    return undefined;
}

export function buildWorkerCommand(
    entryPoint: WorkerEntryPoint,
    requestFile: string,
    resultFile: string,
    cwd: string,
    env: Env = process.env
): SpawnCommand {
    const requested = entryPoint.runtime ?? process.execPath;
    const runtime = resolveRuntime(requested, env);
    if (!runtime) {
        throw new SpawnError(`Worker runtime '${requested}' could not be located.`);
    }
    const script = path.resolve(cwd, entryPoint.script);
    if (!fsSync.existsSync(script)) {
        throw new SpawnError(`Worker entry point '${script}' does not exist.`);
    }
    const args = [...(entryPoint.args ?? []), script, requestFile, resultFile];
    if (process.platform === 'win32') {
        const ext = path.extname(runtime).toLowerCase();
        if (ext === '.cmd' || ext === '.bat') {
            return { command: env.ComSpec || 'C:\\Windows\\System32\\cmd.exe', args: ['/d', '/c', runtime, ...args] };
        }
    }
    return { command: runtime, args };
}
