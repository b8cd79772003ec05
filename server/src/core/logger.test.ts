import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { logger, parseLevel } from './logger.js';

let lines: string[];

beforeEach(() => {
    lines = [];
    logger._setSinkForTests((line) => lines.push(line));
    logger.setLevel('info');
});

afterEach(() => {
    logger._setSinkForTests(undefined);
    logger.setLevel('info');
});

describe('logger', () => {
    it('prefixes lines and appends details as JSON', () => {
        logger.info('task t1: running', { pid: 4242 });
        logger.warn('task t1: timed out after 200ms');

        expect(lines).toEqual(['[offload] [info] task t1: running {"pid":4242}', '[offload] [warn] task t1: timed out after 200ms']);
    });

    it('drops lines below the threshold', () => {
        logger.debug('hidden');
        logger.setLevel('error');
        logger.warn('also hidden');
        logger.error('shown');

        expect(lines).toEqual(['[offload] [error] shown']);
    });

    it('renders errors by name and message', () => {
        logger.error('spawn failed', new TypeError('bad runtime'));

        expect(lines).toEqual(['[offload] [error] spawn failed TypeError: bad runtime']);
    });
});

describe('parseLevel', () => {
    it('accepts known levels in any case', () => {
        expect(parseLevel(' DEBUG ')).toBe('debug');
        expect(parseLevel('warn')).toBe('warn');
    });

    it('rejects anything else', () => {
        expect(parseLevel(undefined)).toBeUndefined();
        expect(parseLevel('verbose')).toBeUndefined();
    });
});
