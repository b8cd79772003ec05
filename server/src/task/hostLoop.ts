export interface ScheduledCallback {
    cancel(): void;
}

/**
 * What the core needs from the foreground loop: a one-shot "run this after at
 * least N ms on your own thread of control", plus an optional redraw trigger.
 */
export interface HostLoop {
    scheduleAfter(delayMs: number, callback: () => void): ScheduledCallback;
    requestRedraw?(): void;
}

/** Host loop backed by Node timers, for hosts that are themselves driven by the Node event loop. */
export function createTimerHostLoop(requestRedraw?: () => void): HostLoop {
    return {
        scheduleAfter(delayMs, callback) {
            const timer = setTimeout(callback, Math.max(0, delayMs));
            return {
                cancel() {
                    clearTimeout(timer);
                }
            };
        },
        requestRedraw
    };
}
