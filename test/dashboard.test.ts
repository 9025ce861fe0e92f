import { test, describe, before, after } from 'node:test';
import assert from 'node:assert';
import WebSocket from 'ws';
import { CONFIG } from '../src/core/config';
import { ConnectionError } from '../src/core/errors';
import { ChatNode } from '../src/core/node';
import { WebDashboard, parseConnect, parseOutgoing } from '../src/web/server';
import { captureLogger } from './helpers/memory';

interface DashboardFrame {
    type: string;
    displayName?: string;
    payload?: unknown;
    events?: unknown[];
}

const nextFrame = (ws: WebSocket): Promise<DashboardFrame> => new Promise((resolve, reject) => {
    ws.once('message', (data) => resolve(JSON.parse(data.toString())));
    ws.once('error', reject);
});

describe('parseOutgoing', () => {
    test('accepts text and base64 media', () => {
        assert.deepStrictEqual(parseOutgoing({ kind: 'text', content: 'hi' }), { kind: 'text', payload: Buffer.from('hi') });
        assert.deepStrictEqual(parseOutgoing({ kind: 'image', data: 'AAEC' }), { kind: 'image', payload: Buffer.from([0, 1, 2]) });
    });

    test('rejects everything else', () => {
        assert.throws(() => parseOutgoing(null), { message: 'Body must be a JSON object' });
        assert.throws(() => parseOutgoing({ kind: 'text', content: '' }), { message: 'Text messages need a non-empty "content" string' });
        assert.throws(() => parseOutgoing({ kind: 'video', data: 'not base64!' }), { message: 'video messages need base64 "data"' });
        assert.throws(() => parseOutgoing({ kind: 'control', content: 'x' }), { message: '"kind" must be one of text, image, video' });
    });
});

describe('parseConnect', () => {
    test('takes an ip and an optional port', () => {
        assert.deepStrictEqual(parseConnect({ ip: ' 10.0.0.2 ', port: 6001 }), { ip: '10.0.0.2', port: 6001 });
        assert.deepStrictEqual(parseConnect({ ip: '10.0.0.2', port: '6002' }), { ip: '10.0.0.2', port: 6002 });
        assert.deepStrictEqual(parseConnect({ ip: '10.0.0.2' }), { ip: '10.0.0.2', port: CONFIG.NETWORK.DEFAULT_TCP_PORT });
    });

    test('rejects a missing ip and a bad port', () => {
        assert.throws(() => parseConnect(null), { message: 'Body must be a JSON object' });
        assert.throws(() => parseConnect({}), { message: '"ip" is required' });
        assert.throws(() => parseConnect({ ip: '' }), { message: '"ip" is required' });
        assert.throws(() => parseConnect({ ip: '10.0.0.2', port: 0 }), { message: '"port" must be between 1 and 65535' });
        assert.throws(() => parseConnect({ ip: '10.0.0.2', port: 'http' }), { message: '"port" must be between 1 and 65535' });
    });
});

describe('WebDashboard', () => {
    const { logger } = captureLogger('info');
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
    const dashboard = new WebDashboard(node);
    let base = '';
    let port = 0;

    before(async () => {
        port = await dashboard.start(0, '127.0.0.1');
        base = `http://127.0.0.1:${port}`;
    });

    after(async () => {
        await dashboard.stop();
    });

    test('GET /api/info describes the local node', async () => {
        const res = await fetch(`${base}/api/info`);
        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(await res.json(), {
            instanceId: node.identity.instanceId,
            displayName: 'Alice',
            address: '10.0.0.1',
            port: 0,
            connectedPeers: 0,
            networkSize: 1,
        });
    });

    test('GET /api/peers lists the registry', async () => {
        node.registry.onSighting({
            identity: { displayName: 'Bob', address: '10.0.0.2', instanceId: 'b'.repeat(32) },
            address: '10.0.0.2',
            port: 50001,
            seenAt: 1_000,
        });

        const res = await fetch(`${base}/api/peers`);
        assert.deepStrictEqual(await res.json(), [{
            instanceId: 'b'.repeat(32),
            displayName: 'Bob',
            address: '10.0.0.2',
            port: 50001,
            status: 'discovered',
            lastSeen: 1_000,
        }]);
    });

    test('POST /api/messages returns per-peer outcomes', async () => {
        const res = await fetch(`${base}/api/messages`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify({ kind: 'text', content: 'hello' }),
        });
        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(await res.json(), { outcomes: [] });
    });

    test('POST /api/messages rejects bad bodies and oversized payloads', async () => {
        const post = (body: unknown) => fetch(`${base}/api/messages`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify(body),
        });

        const bad = await post({ kind: 'audio' });
        assert.strictEqual(bad.status, 400);
        assert.deepStrictEqual(await bad.json(), { error: '"kind" must be one of text, image, video' });

        const big = await post({ kind: 'image', data: Buffer.alloc(32).toString('base64') });
        assert.strictEqual(big.status, 413);
        assert.deepStrictEqual(await big.json(), { error: 'Payload of 32 bytes exceeds the 16 byte limit' });
    });

    test('POST /api/connect validates the target and reports a failed dial', async () => {
        const post = (body: unknown) => fetch(`${base}/api/connect`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify(body),
        });

        const bad = await post({ port: 6001 });
        assert.strictEqual(bad.status, 400);
        assert.deepStrictEqual(await bad.json(), { error: '"ip" is required' });

        const unreachable = await post({ ip: '10.0.0.2', port: 50001 });
        assert.strictEqual(unreachable.status, 502);
        assert.deepStrictEqual(await unreachable.json(), { error: 'Connect to 10.0.0.2:50001 failed: refused' });
    });

    test('the WebSocket feed starts with INIT and then streams events', async () => {
        const ws = new WebSocket(`ws://127.0.0.1:${port}`);
        const init = await nextFrame(ws);
        assert.strictEqual(init.type, 'INIT');
        assert.strictEqual(init.displayName, 'Alice');
        assert.ok(Array.isArray(init.events));

        const next = nextFrame(ws);
        logger.info('TEST', 'ping');
        const frame = await next;
        assert.strictEqual(frame.type, 'LOG');
        assert.strictEqual(frame.payload, '[TEST] ping');

        ws.close();
    });

    test('history holds at most the last 100 events', () => {
        for (let i = 0; i < 150; i++) logger.info('FILL', `entry ${i}`);
        const history = dashboard.history();
        assert.strictEqual(history.length, 100);
        assert.strictEqual(history[99].payload, '[FILL] entry 149');
    });
});
