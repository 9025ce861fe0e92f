import { test, describe } from 'node:test';
import assert from 'node:assert';
import { generateInstanceId, loadConfig } from '../src/core/config';

describe('loadConfig', () => {
    test('falls back to the built-in defaults', () => {
        const config = loadConfig({});
        assert.strictEqual(config.NETWORK.MULTICAST_IP, '239.255.42.99');
        assert.strictEqual(config.NETWORK.DISCOVERY_PORT, 6000);
        assert.strictEqual(config.NETWORK.DEFAULT_TCP_PORT, 50000);
        assert.strictEqual(config.NETWORK.PEER_STALE_MS, 15000);
        assert.strictEqual(config.MESSAGING.MAX_PAYLOAD_BYTES, 50 * 1024 * 1024);
        assert.strictEqual(config.MESSAGING.OUTBOUND_QUEUE_SIZE, 32);
        assert.strictEqual(config.LOG.LEVEL, 'info');
    });

    test('reads LANCHAT_* overrides', () => {
        const config = loadConfig({
            LANCHAT_MULTICAST_IP: ' 239.1.2.3 ',
            LANCHAT_TCP_PORT: '41000',
            LANCHAT_MAX_PAYLOAD_MB: '2',
            LANCHAT_LOG_LEVEL: 'debug',
        });
        assert.strictEqual(config.NETWORK.MULTICAST_IP, '239.1.2.3');
        assert.strictEqual(config.NETWORK.DEFAULT_TCP_PORT, 41000);
        assert.strictEqual(config.MESSAGING.MAX_PAYLOAD_BYTES, 2 * 1024 * 1024);
        assert.strictEqual(config.LOG.LEVEL, 'debug');
    });

    test('ignores values that are not usable numbers', () => {
        const config = loadConfig({ LANCHAT_TCP_PORT: 'lots', LANCHAT_SEND_TIMEOUT_MS: '-5', LANCHAT_DISCOVERY_PORT: '' });
        assert.strictEqual(config.NETWORK.DEFAULT_TCP_PORT, 50000);
        assert.strictEqual(config.MESSAGING.SEND_TIMEOUT_MS, 5000);
        assert.strictEqual(config.NETWORK.DISCOVERY_PORT, 6000);
    });
});

describe('generateInstanceId', () => {
    test('is 128 random bits in hex, fresh every call', () => {
        const a = generateInstanceId();
        const b = generateInstanceId();
        assert.match(a, /^[0-9a-f]{32}$/);
        assert.notStrictEqual(a, b);
    });
});
