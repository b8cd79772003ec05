import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FakeLauncher, ManualHostLoop } from '../testing/fakes.js';
import { TaskRunner } from '../task/runner.js';
import { createOffloadServer } from './tools.js';

const textResultSchema = z.object({
    content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1)
});

const resourceResultSchema = z.object({
    contents: z.array(z.object({ uri: z.string(), text: z.string() })).min(1)
});

let baseDir: string;
let runner: TaskRunner;
let launcher: FakeLauncher;
let client: Client;

async function callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = textResultSchema.parse(await client.callTool({ name, arguments: args }));
    return JSON.parse(result.content[0]?.text ?? 'null');
}

beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'offload-tools-'));
    launcher = new FakeLauncher();
    const hostLoop = new ManualHostLoop();
    runner = new TaskRunner({
        baseDir,
        entryPoint: { script: 'worker.mjs' },
        launcher,
        hostLoop,
        now: () => hostLoop.now
    });
    const server = createOffloadServer(runner, '9.9.9');
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'offload-tools-test', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
    await client.close();
    await runner.shutdown();
    await fs.rm(baseDir, { recursive: true, force: true });
});

describe('offload MCP tools', () => {
    it('lists the task tools', async () => {
        const { tools } = await client.listTools();

        expect(tools.map((tool) => tool.name).sort()).toEqual([
            'offload.task.cancel',
            'offload.task.list',
            'offload.task.status',
            'offload.task.submit'
        ]);
    });

    it('submits a payload and reports the running task', async () => {
        const submitted = await callTool('offload.task.submit', { payload: { query: 'hello' }, timeoutMs: 5000 });

        expect(submitted).toEqual({
            taskId: expect.any(String),
            state: 'running',
            submittedAt: 0,
            timeoutMs: 5000,
            pid: 4242
        });
        expect(launcher.requests).toHaveLength(1);
        const written = await fs.readFile(launcher.requests[0]?.requestFile ?? '', 'utf8');
        expect(JSON.parse(written)).toEqual({ query: 'hello' });
    });

    it('returns a structured error when the runner is busy', async () => {
        await callTool('offload.task.submit', { payload: 1 });

        expect(await callTool('offload.task.submit', { payload: 2 })).toEqual({
            error: { code: 'TASK_BUSY', message: 'Runner is at capacity (1 task(s) in flight).' }
        });
    });

    it('cancels a task and shows the outcome through status', async () => {
        const submitted = z.object({ taskId: z.string() }).parse(await callTool('offload.task.submit', { payload: {} }));

        expect(await callTool('offload.task.cancel', { taskId: submitted.taskId })).toEqual({
            taskId: submitted.taskId,
            cancelled: true
        });
        expect(await callTool('offload.task.status', { taskId: submitted.taskId })).toMatchObject({
            taskId: submitted.taskId,
            state: 'cancelled',
            outcome: { kind: 'cancelled' },
            message: 'Task was cancelled.'
        });
    });

    it('reports unknown task ids', async () => {
        expect(await callTool('offload.task.status', { taskId: 'missing' })).toEqual({
            error: { code: 'TASK_NOT_FOUND', message: 'Task missing not found.' }
        });
        expect(await callTool('offload.task.cancel', { taskId: 'missing' })).toEqual({ taskId: 'missing', cancelled: false });
    });

    it('lists recent tasks and exposes each summary as a resource', async () => {
        const submitted = z.object({ taskId: z.string() }).parse(await callTool('offload.task.submit', { payload: {} }));

        expect(await callTool('offload.task.list', {})).toEqual({
            running: 1,
            tasks: [{ taskId: submitted.taskId, state: 'running', submittedAt: 0, pid: 4242 }]
        });

        const uri = `tasks://${submitted.taskId}/summary`;
        const resource = resourceResultSchema.parse(await client.readResource({ uri }));
        expect(resource.contents[0]?.uri).toBe(uri);
        expect(JSON.parse(resource.contents[0]?.text ?? 'null')).toMatchObject({ taskId: submitted.taskId, state: 'running' });
    });
});
