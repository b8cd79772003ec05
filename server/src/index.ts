#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './core/config.js';
import { logger } from './core/logger.js';
import { formatError } from './core/utils.js';
import { createOffloadServer } from './server/tools.js';
import { TaskRunner } from './task/runner.js';

const config = loadConfig();
if (!config.workerScript) {
    logger.error('server: OFFLOAD_WORKER_SCRIPT must be defined before startup');
    process.exit(1);
}

const runner = new TaskRunner({
    baseDir: config.handshakeDir,
    entryPoint: { script: config.workerScript, runtime: config.workerRuntime, args: config.workerArgs },
    pollIntervalMs: config.pollIntervalMs,
    defaultTimeoutMs: config.timeoutMs,
    decodeGraceMs: config.decodeGraceMs,
    maxConcurrent: config.maxConcurrent
});
runner.on('outcome', (outcome, handle) => {
    logger.info(`server: task ${handle.id} finished`, { kind: outcome.kind });
});

const server = createOffloadServer(runner);
let shuttingDown = false;

async function handleShutdown(reason: string) {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`server: shutting down (${reason})`, { running: runner.runningCount() });
    try {
        await runner.shutdown();
        await server.close();
    } catch (error) {
        logger.error('server: shutdown failed', formatError(error));
    }
}

function registerShutdownHandlers() {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
        process.once(signal, () => {
            void handleShutdown(signal).finally(() => process.exit(0));
        });
    }
}

async function start() {
    logger.info('server: starting', {
        handshakeDir: config.handshakeDir,
        workerScript: config.workerScript,
        pollIntervalMs: config.pollIntervalMs,
        maxConcurrent: config.maxConcurrent
    });
    const transport = new StdioServerTransport();
    await server.connect(transport);
}

registerShutdownHandlers();

start().catch((error) => {
    logger.error('server: failed to start', formatError(error));
    process.exit(1);
});
