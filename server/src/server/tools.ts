import { z } from 'zod';
import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { serializeErrorForClient } from '../core/utils.js';
import type { TaskRunner, TaskSummary } from '../task/runner.js';
import { describeOutcome } from '../task/types.js';

export const submitSchema = z.object({
    payload: z.unknown(),
    timeoutMs: z.number().int().positive().optional()
});

const taskIdSchema = z.object({ taskId: z.string().min(1) });

const listTasksSchema = z.object({
    limit: z.number().int().positive().max(200).default(50)
});

export function createOffloadServer(runner: TaskRunner, version = '0.1.0') {
    const server = new McpServer({ name: 'offload-runner', version });

    server.registerTool(
        'offload.task.submit',
        {
            title: 'Submit offloaded task',
            description: 'Write the payload to a fresh handshake directory and start a worker process for it.',
            inputSchema: submitSchema.shape
        },
        async ({ payload, timeoutMs }) => {
            try {
                const handle = await runner.submit(payload ?? null, { timeoutMs });
                return textResponse(describeTask(runner.status(handle.id)) ?? { taskId: handle.id });
            } catch (error) {
                return textResponse({ error: serializeErrorForClient(error) });
            }
        }
    );

    server.registerTool(
        'offload.task.status',
        {
            title: 'Check offloaded task',
            description: 'Return the state and, once finished, the outcome of a task.',
            inputSchema: taskIdSchema.shape
        },
        async ({ taskId }) => {
            const summary = describeTask(runner.status(taskId));
            return textResponse(summary ?? { error: { code: 'TASK_NOT_FOUND', message: `Task ${taskId} not found.` } });
        }
    );

    server.registerTool(
        'offload.task.cancel',
        {
            title: 'Cancel offloaded task',
            description: 'Terminate the worker of a running task and discard its handshake files.',
            inputSchema: taskIdSchema.shape
        },
        async ({ taskId }) => {
            try {
                const cancelled = await runner.cancel({ id: taskId });
                return textResponse({ taskId, cancelled });
            } catch (error) {
                return textResponse({ error: serializeErrorForClient(error) });
            }
        }
    );

    server.registerTool(
        'offload.task.list',
        {
            title: 'List offloaded tasks',
            description: 'Enumerate recent tasks, newest first.',
            inputSchema: listTasksSchema.shape
        },
        async ({ limit }) => {
            const tasks = runner.list(limit ?? 50).map((summary) => describeTask(summary));
            return textResponse({ running: runner.runningCount(), tasks });
        }
    );

    const summaryTemplate = new ResourceTemplate('tasks://{id}/summary', {
        list: async () => ({
            resources: runner.list(200).map((summary) => ({
                uri: `tasks://${summary.id}/summary`,
                name: `Task ${summary.id} summary`,
                mimeType: 'application/json'
            }))
        })
    });

    server.registerResource(
        'task-summary',
        summaryTemplate,
        {
            title: 'Offloaded task summary',
            description: 'State, timestamps and outcome of an offloaded task.',
            mimeType: 'application/json'
        },
        async (uri, variables) => {
            const id = Array.isArray(variables.id) ? variables.id[0] : variables.id;
            const summary = id ? describeTask(runner.status(id)) : undefined;
            return {
                contents: [
                    {
                        uri: uri.href,
                        mimeType: 'application/json',
                        text: JSON.stringify(summary ?? { error: `Task ${id ?? '?'} not found.` }, null, 2)
                    }
                ]
            };
        }
    );

    return server;
}

function describeTask(summary: TaskSummary | undefined) {
    if (!summary) {
        return undefined;
    }
    return {
        taskId: summary.id,
        state: summary.state,
        submittedAt: summary.submittedAt,
        completedAt: summary.completedAt,
        timeoutMs: summary.timeoutMs,
        pid: summary.pid,
        exitCode: summary.exitCode,
        outcome: summary.outcome,
        message: summary.outcome ? describeOutcome(summary.outcome) : undefined
    };
}

function textResponse(payload: unknown) {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
    return { content: [{ type: 'text' as const, text }] };
}
