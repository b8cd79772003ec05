export type TaskState = 'running' | 'succeeded' | 'failed' | 'timed_out' | 'cancelled';

export const TERMINAL_STATES: readonly TaskState[] = ['succeeded', 'failed', 'timed_out', 'cancelled'];

export type FailureReason = 'spawn-error' | 'malformed-result' | 'worker-error' | 'worker-exited-without-result';

export type TaskOutcome =
    | { kind: 'success'; value: Record<string, unknown> }
    | {
          kind: 'failure';
          reason: FailureReason;
          message: string;
          exitCode?: number | null;
          signal?: string | null;
          details?: unknown;
      }
    | { kind: 'timeout'; timeoutMs: number }
    | { kind: 'cancelled' };

export type PollOutcome = { done: false } | { done: true; outcome: TaskOutcome };

export interface TaskHandle {
    readonly id: string;
}

export interface SubmitOptions {
    /** Omit or pass 0 for no deadline. */
    timeoutMs?: number;
    /** Defaults to a random UUID. */
    taskId?: string;
}

export interface TaskRecord {
    id: string;
    payload: unknown;
    state: TaskState;
    submittedAt: number;
    updatedAt: number;
    completedAt?: number;
    timeoutMs?: number;
    requestFile: string;
    resultFile: string;
    pid?: number;
    exitCode?: number | null;
    signal?: string | null;
    outcome?: TaskOutcome;
}

export function isTerminal(state: TaskState) {
    return TERMINAL_STATES.includes(state);
}

export function describeOutcome(outcome: TaskOutcome) {
    switch (outcome.kind) {
        case 'success':
            return 'Task succeeded.';
        case 'failure':
            return `Task failed (${outcome.reason}): ${outcome.message}`;
        case 'timeout':
            return `Task timed out after ${outcome.timeoutMs}ms.`;
        case 'cancelled':
            return 'Task was cancelled.';
    }
}
