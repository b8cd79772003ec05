import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HandshakeDirectory, writeFileAtomic } from './handshake.js';

let tmpDir: string;

beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'offload-handshake-'));
});

afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('HandshakeDirectory', () => {
    it('lays out request.json and result.json under its base', () => {
        const handshake = new HandshakeDirectory(path.join(tmpDir, 'a'));

        expect(handshake.requestFile).toBe(path.join(tmpDir, 'a', 'request.json'));
        expect(handshake.resultFile).toBe(path.join(tmpDir, 'a', 'result.json'));
    });

    it('creates the directory and writes the request as JSON', async () => {
        const handshake = new HandshakeDirectory(path.join(tmpDir, 'nested', 'dir'));
        await handshake.prepare();
        await handshake.writeRequest({ query: 'hello' });

        expect(await fs.readFile(handshake.requestFile, 'utf8')).toBe('{"query":"hello"}');
        expect(await fs.readdir(handshake.baseDir)).toEqual(['request.json']);
    });

    it('writes null for an absent payload', async () => {
        const handshake = new HandshakeDirectory(tmpDir);
        await handshake.writeRequest(undefined);

        expect(await fs.readFile(handshake.requestFile, 'utf8')).toBe('null');
    });

    it('probes and reads the result file', async () => {
        const handshake = new HandshakeDirectory(tmpDir);
        expect(await handshake.resultExists()).toBe(false);
        expect(await handshake.readResult()).toBeUndefined();

        await fs.writeFile(handshake.resultFile, '{"status":"ok"}', 'utf8');

        expect(await handshake.resultExists()).toBe(true);
        expect(await handshake.readResult()).toBe('{"status":"ok"}');
    });

    it('removes both files and tolerates them being gone', async () => {
        const handshake = new HandshakeDirectory(tmpDir);
        await handshake.writeRequest({});
        await fs.writeFile(handshake.resultFile, '{}', 'utf8');

        await handshake.removeFiles();
        await handshake.removeFiles();

        expect(await fs.readdir(tmpDir)).toEqual([]);
    });

    it('drops a stale result when preparing', async () => {
        const handshake = new HandshakeDirectory(tmpDir);
        await fs.writeFile(handshake.resultFile, '{"status":"ok"}', 'utf8');

        await handshake.prepare();

        expect(await handshake.resultExists()).toBe(false);
    });
});

describe('writeFileAtomic', () => {
    it('replaces the target and leaves no temp file', async () => {
        const target = path.join(tmpDir, 'result.json');
        await fs.writeFile(target, 'old', 'utf8');

        await writeFileAtomic(target, 'new');

        expect(await fs.readFile(target, 'utf8')).toBe('new');
        expect(await fs.readdir(tmpDir)).toEqual(['result.json']);
    });

    it('cleans up the temp file when the rename fails', async () => {
        const target = path.join(tmpDir, 'occupied');
        await fs.mkdir(path.join(target, 'child'), { recursive: true });

        await expect(writeFileAtomic(target, 'data')).rejects.toThrow();
        expect(await fs.readdir(tmpDir)).toEqual(['occupied']);
    });
});
