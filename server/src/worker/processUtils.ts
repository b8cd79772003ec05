import { spawnSync, type ChildProcess } from 'node:child_process';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';

export const KILL_ESCALATION_DELAY_MS = 250;

function tryKill(label: string, kill: () => void) {
    try {
        kill();
    } catch (error) {
        // ESRCH: the process (or group) is already gone.
        logger.debug(`process: ${label} failed`, formatError(error));
    }
}

/**
 * Kills the worker and everything it started. POSIX workers are spawned as
 * process-group leaders, so the negative pid reaches the whole group.
 */
export function terminateProcessTree(child: ChildProcess, isAlive: () => boolean = () => child.exitCode === null) {
    const pid = child.pid;
    if (!pid) {
        tryKill('kill', () => child.kill());
        return;
    }
    if (process.platform === 'win32') {
        // spawnSync so taskkill has finished before we report the worker as terminated.
        const result = spawnSync('taskkill', ['/pid', pid.toString(), '/t', '/f'], {
            stdio: 'ignore',
            windowsHide: true
        });
        if (result.error || result.status !== 0) {
            tryKill('kill', () => child.kill());
        }
        return;
    }
    tryKill('group SIGTERM', () => process.kill(-pid, 'SIGTERM'));
    tryKill('SIGTERM', () => child.kill('SIGTERM'));
    const escalation = setTimeout(() => {
        if (!isAlive()) {
            return;
        }
        tryKill('group SIGKILL', () => process.kill(-pid, 'SIGKILL'));
        tryKill('SIGKILL', () => child.kill('SIGKILL'));
    }, KILL_ESCALATION_DELAY_MS);
    escalation.unref();
}
