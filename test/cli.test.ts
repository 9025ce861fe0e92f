import { test, describe, after } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CLI, USAGE, formatBytes, formatTimestamp, parseArgs, parseEndpoint, renderInbound } from '../src/cli/commands';
import { CONFIG } from '../src/core/config';
import { ConnectionError } from '../src/core/errors';
import { ChatNode } from '../src/core/node';
import { InboundMessage } from '../src/core/types';
import { captureLogger } from './helpers/memory';

describe('parseArgs', () => {
    test('takes a name and falls back to the default port', () => {
        assert.deepStrictEqual(parseArgs(['Alice']), {
            name: 'Alice',
            port: CONFIG.NETWORK.DEFAULT_TCP_PORT,
            host: undefined,
            connect: [],
            web: false,
        });
    });

    test('reads --port and --web in any position', () => {
        assert.deepStrictEqual(parseArgs(['--web', 'Bob', '--port', '6001']), { name: 'Bob', port: 6001, host: undefined, connect: [], web: true });
    });

    test('reads the bind host and any number of peers to dial', () => {
        const args = parseArgs(['Carol', '--host', '192.168.1.20', '--connect', '192.168.1.21:50000', '--connect', '[fe80::2]:6001']);
        assert.strictEqual(args.host, '192.168.1.20');
        assert.deepStrictEqual(args.connect, [
            { host: '192.168.1.21', port: 50000 },
            { host: 'fe80::2', port: 6001 },
        ]);
    });

    test('rejects a missing host and a malformed peer address', () => {
        assert.throws(() => parseArgs(['Alice', '--host']), { message: `Missing value for --host\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', '--connect']), { message: `Missing value for --connect\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', '--connect', '10.0.0.2']), { message: 'Invalid address: 10.0.0.2 (expected host:port)' });
    });

    test('rejects missing names, bad ports and unknown options', () => {
        assert.throws(() => parseArgs([]), { message: USAGE });
        assert.throws(() => parseArgs(['Alice', '--port', 'x']), { message: `Invalid port: x\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', '--port']), { message: `Invalid port: (missing)\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', '--port', '70000']), { message: `Invalid port: 70000\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', '--verbose']), { message: `Unknown option: --verbose\n${USAGE}` });
        assert.throws(() => parseArgs(['Alice', 'Bob']), { message: `Unexpected argument: Bob\n${USAGE}` });
    });
});

describe('parseEndpoint', () => {
    test('splits host and port', () => {
        assert.deepStrictEqual(parseEndpoint('peer.local:6000'), { host: 'peer.local', port: 6000 });
        assert.deepStrictEqual(parseEndpoint(' [::1]:50000 '), { host: '::1', port: 50000 });
    });

    test('refuses ports outside 1-65535 and missing parts', () => {
        for (const text of ['10.0.0.2:0', '10.0.0.2:65536', ':6000', '10.0.0.2:', 'fe80::1:6000']) {
            assert.throws(() => parseEndpoint(text), { message: `Invalid address: ${text} (expected host:port)` });
        }
    });
});

describe('formatting', () => {
    test('timestamps are local YYYY-MM-DD HH:MM:SS', () => {
        assert.strictEqual(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5)), '2024-01-02 03:04:05');
        assert.strictEqual(formatTimestamp(new Date(2023, 11, 31, 23, 59, 9)), '2023-12-31 23:59:09');
    });

    test('byte sizes', () => {
        assert.strictEqual(formatBytes(500), '500 B');
        assert.strictEqual(formatBytes(1536), '1.5 KiB');
        assert.strictEqual(formatBytes(5 * 1024 * 1024), '5.0 MiB');
    });

    const message = (kind: 'text' | 'image', payload: Buffer): InboundMessage => {
        const peer = { displayName: 'Alice', address: '10.0.0.1', instanceId: 'a'.repeat(32) };
        return {
            peer,
            envelope: { sender: peer, kind, payload, payloadLength: payload.length },
            receivedAt: new Date(2024, 0, 2, 3, 4, 5).getTime(),
        };
    };

    test('text shows timestamp, coloured sender and content', () => {
        assert.strictEqual(renderInbound(message('text', Buffer.from('hello'))), '[2024-01-02 03:04:05] \x1b[92mAlice\x1b[0m: hello');
    });

    test('escape sequences from peers are stripped', () => {
        assert.strictEqual(
            renderInbound(message('text', Buffer.from('hi\x1b[2Jthere'))),
            '[2024-01-02 03:04:05] \x1b[92mAlice\x1b[0m: hi[2Jthere',
        );
    });

    test('media shows kind and size', () => {
        assert.strictEqual(
            renderInbound(message('image', Buffer.alloc(2048))),
            '[2024-01-02 03:04:05] \x1b[92mAlice\x1b[0m sent an image (2.0 KiB)',
        );
    });
});

describe('CLI.handleLine', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'lanchat-cli-'));
    after(() => fs.rmSync(tmp, { recursive: true, force: true }));

    const setup = () => {
        const { logger, lines } = captureLogger();
        const printed: string[] = [];
        const node = new ChatNode({
            displayName: 'Alice',
            listenPort: 0,
            address: '10.0.0.1',
            logger,
            maxPayloadBytes: 16,
            dialer: async (address, port) => {
                throw new ConnectionError(`Connect to ${address}:${port} failed: refused`);
            },
        });
        const cli = new CLI(node, logger, (line) => printed.push(line));
        return { cli, lines, printed };
    };

    test('quits on /quit and exit', async () => {
        const { cli } = setup();
        assert.strictEqual(await cli.handleLine('/quit'), 'quit');
        assert.strictEqual(await cli.handleLine('  exit  '), 'quit');
        assert.strictEqual(await cli.handleLine(''), 'continue');
    });

    test('lists connected peers', async () => {
        const { cli, printed } = setup();
        await cli.handleLine('/peers');
        assert.deepStrictEqual(printed, ['\n\x1b[36m=== Connected Peers (0) ===\x1b[0m', '']);
    });

    test('warns when nobody is connected', async () => {
        const { cli, lines } = setup();
        await cli.handleLine('hello');
        assert.deepStrictEqual(lines, ['\x1b[33m[SEND]\x1b[0m No connected peers, message not delivered']);
    });

    test('reports a message too large to send', async () => {
        const { cli, lines } = setup();
        await cli.handleLine('x'.repeat(17));
        assert.deepStrictEqual(lines, ['\x1b[31m[ERROR]\x1b[0m Message not sent: Payload of 17 bytes exceeds the 16 byte limit']);
    });

    test('checks a media file size before reading it', async () => {
        const file = path.join(tmp, 'big.png');
        fs.writeFileSync(file, Buffer.alloc(32));
        const { cli, lines } = setup();
        await cli.handleLine(`/image ${file}`);
        assert.deepStrictEqual(lines, [`\x1b[31m[ERROR]\x1b[0m Cannot send image: ${file} is 32 B, limit is 16 B`]);
    });

    test('explains media commands without a path and unknown commands', async () => {
        const { cli, lines } = setup();
        await cli.handleLine('/video');
        await cli.handleLine('/dance now');
        assert.deepStrictEqual(lines, [
            '\x1b[31m[ERROR]\x1b[0m Usage: /video <path>',
            "\x1b[31m[ERROR]\x1b[0m Unknown command '/dance'",
        ]);
    });

    test('reports a peer that cannot be dialled', async () => {
        const { cli, lines } = setup();
        await cli.handleLine('/connect 10.0.0.2 50000');
        assert.deepStrictEqual(lines, [
            '\x1b[36m[TCP]\x1b[0m Connecting to 10.0.0.2:50000',
            '\x1b[31m[ERROR]\x1b[0m Cannot connect to 10.0.0.2:50000: Connect to 10.0.0.2:50000 failed: refused',
        ]);
    });

    test('explains /connect without a usable address', async () => {
        const { cli, lines } = setup();
        await cli.handleLine('/connect');
        await cli.handleLine('/connect 10.0.0.2');
        await cli.handleLine('/connect 10.0.0.2 50000 extra');
        assert.deepStrictEqual(lines, [
            '\x1b[31m[ERROR]\x1b[0m Usage: /connect <host> <port>',
            '\x1b[31m[ERROR]\x1b[0m Usage: /connect <host> <port>',
            '\x1b[31m[ERROR]\x1b[0m Usage: /connect <host> <port>',
        ]);
    });
});
