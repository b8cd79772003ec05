import { logger } from '../core/logger.js';
import { StructuredError, TaskNotFoundError, formatError } from '../core/utils.js';
import type { HostLoop, ScheduledCallback } from './hostLoop.js';
import type { PollOutcome, TaskHandle, TaskOutcome } from './types.js';

export interface PollSource {
    poll(handle: TaskHandle): Promise<PollOutcome>;
}

interface PollEntry {
    handle: TaskHandle;
    intervalMs: number;
    onDone: (outcome: TaskOutcome) => void;
    scheduled?: ScheduledCallback;
    stopped: boolean;
}

/**
 * Re-arms a one-shot host-loop callback after every pending poll. The next
 * tick is scheduled only once the previous poll has resolved, so polls for
 * one task never overlap, and nothing ever sleeps on the host's thread.
 */
export class TaskPoller {
    private readonly entries = new Map<string, PollEntry>();

    constructor(
        private readonly hostLoop: HostLoop,
        private readonly source: PollSource
    ) {}

    startPolling(handle: TaskHandle, intervalMs: number, onDone: (outcome: TaskOutcome) => void) {
        if (this.entries.has(handle.id)) {
            throw new StructuredError('ALREADY_POLLING', `Task ${handle.id} is already being polled.`);
        }
        const entry: PollEntry = { handle, intervalMs: Math.max(1, intervalMs), onDone, stopped: false };
        this.entries.set(handle.id, entry);
        this.schedule(entry);
    }

    /** Returns false when the task was not being polled. */
    stopPolling(handle: TaskHandle) {
        const entry = this.entries.get(handle.id);
        if (!entry) {
            return false;
        }
        entry.stopped = true;
        entry.scheduled?.cancel();
        entry.scheduled = undefined;
        this.entries.delete(handle.id);
        return true;
    }

    isPolling(handle: TaskHandle) {
        return this.entries.has(handle.id);
    }

    activeCount() {
        return this.entries.size;
    }

    private schedule(entry: PollEntry) {
        entry.scheduled = this.hostLoop.scheduleAfter(entry.intervalMs, () => {
            entry.scheduled = undefined;
            void this.tick(entry);
        });
    }

    private async tick(entry: PollEntry) {
        if (entry.stopped) {
            return;
        }
        let result: PollOutcome;
        try {
            result = await this.source.poll(entry.handle);
        } catch (error) {
            if (entry.stopped) {
                return;
            }
            if (error instanceof TaskNotFoundError) {
                logger.warn('poller: task disappeared, polling stopped', { taskId: entry.handle.id });
                this.stopPolling(entry.handle);
                return;
            }
            logger.error('poller: poll failed, retrying next tick', { taskId: entry.handle.id, error: formatError(error) });
            this.schedule(entry);
            return;
        }
        if (entry.stopped) {
            return;
        }
        if (!result.done) {
            this.schedule(entry);
            return;
        }
        this.stopPolling(entry.handle);
        try {
            entry.onDone(result.outcome);
        } catch (error) {
            logger.error('poller: completion callback threw', { taskId: entry.handle.id, error: formatError(error) });
        }
        this.hostLoop.requestRedraw?.();
    }
}
