export { loadConfig, type OffloadConfig } from './core/config.js';
export { logger, type LogLevel } from './core/logger.js';
export { SpawnError, StructuredError, TaskBusyError, TaskNotFoundError, InvalidTransitionError } from './core/utils.js';
export { HandshakeDirectory, REQUEST_FILE_NAME, RESULT_FILE_NAME, writeFileAtomic } from './task/handshake.js';
export { createTimerHostLoop, type HostLoop, type ScheduledCallback } from './task/hostLoop.js';
export { TaskPoller, type PollSource } from './task/poller.js';
export { decodeResult, encodeResult, type DecodeResult, type ResultEnvelope } from './task/resultDecoder.js';
export { TaskRunner, type CompletionCallback, type RunnerSubmitOptions, type TaskRunnerOptions, type TaskSummary } from './task/runner.js';
export { TaskSupervisor, type TaskSupervisorOptions } from './task/supervisor.js';
export * from './task/types.js';
export { runWorker, type RunWorkerOptions, type WorkerHandler } from './worker/entry.js';
export { ProcessWorkerLauncher, type ExitStatus, type ProcessHandle, type SpawnRequest, type WorkerLauncher } from './worker/launcher.js';
export type { WorkerEntryPoint } from './worker/spawnHelpers.js';
