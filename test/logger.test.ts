import { test, describe } from 'node:test';
import assert from 'node:assert';
import { LogEntry, Logger, parseLogLevel, shortId } from '../src/core/logger';

describe('Logger', () => {
    test('writes tagged lines and drops those under the level', () => {
        const lines: string[] = [];
        const logger = new Logger('info', 10, (line) => lines.push(line));
        logger.debug('TCP', 'hidden');
        logger.info('NEW PEER', 'Bob');
        logger.warn('SEND', 'slow');

        assert.deepStrictEqual(lines, [
            '\x1b[36m[NEW PEER]\x1b[0m Bob',
            '\x1b[33m[SEND]\x1b[0m slow',
        ]);
    });

    test('some tags keep their own colour', () => {
        const lines: string[] = [];
        const logger = new Logger('debug', 10, (line) => lines.push(line));
        logger.info('SECURE', 'tunnel up');
        logger.error('CRYPTO', 'bad tag');
        assert.deepStrictEqual(lines, ['\x1b[32m[SECURE]\x1b[0m tunnel up', '\x1b[35m[CRYPTO]\x1b[0m bad tag']);
    });

    test('keeps a bounded history and emits every entry', () => {
        const logger = new Logger('debug', 2, () => undefined);
        const emitted: LogEntry[] = [];
        logger.on('entry', (entry: LogEntry) => emitted.push(entry));

        logger.info('A', 'one');
        logger.info('B', 'two');
        logger.info('C', 'three');

        assert.deepStrictEqual(logger.recent().map((e) => e.message), ['two', 'three']);
        assert.deepStrictEqual(emitted.map((e) => `${e.level}:${e.tag}`), ['info:A', 'info:B', 'info:C']);
    });

    test('silent writes nothing', () => {
        const lines: string[] = [];
        const logger = new Logger('silent', 10, (line) => lines.push(line));
        logger.error('ERROR', 'nobody hears this');
        assert.deepStrictEqual(lines, []);
        assert.deepStrictEqual(logger.recent(), []);
    });

    test('setLevel takes effect at once', () => {
        const lines: string[] = [];
        const logger = new Logger('warn', 10, (line) => lines.push(line));
        logger.info('X', 'before');
        logger.setLevel('debug');
        logger.debug('X', 'after');
        assert.deepStrictEqual(lines, ['\x1b[90m[X]\x1b[0m after']);
    });
});

describe('helpers', () => {
    test('parseLogLevel accepts known levels in any case', () => {
        assert.strictEqual(parseLogLevel('DEBUG'), 'debug');
        assert.strictEqual(parseLogLevel('silent'), 'silent');
        assert.strictEqual(parseLogLevel('chatty'), 'info');
    });

    test('shortId keeps eight characters', () => {
        assert.strictEqual(shortId('0123456789abcdef'), '01234567');
    });
});
