import { test, describe } from 'node:test';
import assert from 'node:assert';
import { PeerRegistry } from '../src/core/registry';
import { PeerIdentity, PeerRecord, PeerSighting } from '../src/core/types';

const LOCAL_ID = '00'.repeat(16);
const BOB: PeerIdentity = { displayName: 'Bob', address: '10.0.0.2', instanceId: 'b0'.repeat(16) };

const sighting = (identity: PeerIdentity, seenAt: number, port = 50000): PeerSighting => ({
    identity,
    address: identity.address,
    port,
    seenAt,
});

const makeRegistry = () => {
    let clock = 1_000;
    const registry = new PeerRegistry(LOCAL_ID, { staleAfterMs: 15_000, evictAfterMs: 30_000, now: () => clock });
    const events: string[] = [];
    for (const name of ['peer:discovered', 'peer:connecting', 'peer:connected', 'peer:lost', 'peer:evicted']) {
        registry.on(name, (record: PeerRecord) => events.push(`${name} ${record.identity.displayName}`));
    }
    return {
        registry,
        events,
        advance: (ms: number) => {
            clock += ms;
            return clock;
        },
        now: () => clock,
    };
};

describe('PeerRegistry', () => {
    test('ignores our own announcements', () => {
        const { registry, events } = makeRegistry();
        const self: PeerIdentity = { displayName: 'Me', address: '10.0.0.1', instanceId: LOCAL_ID };
        assert.strictEqual(registry.onSighting(sighting(self, 1_000)), undefined);
        assert.deepStrictEqual(registry.list(), []);
        assert.deepStrictEqual(events, []);
    });

    test('repeated sightings keep a single record', () => {
        const { registry, events } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        registry.onSighting(sighting(BOB, 2_000));
        const record = registry.onSighting(sighting(BOB, 1_500));

        assert.strictEqual(registry.list().length, 1);
        assert.strictEqual(record?.status, 'discovered');
        assert.strictEqual(record?.lastSeen, 2_000);
        assert.deepStrictEqual(events, ['peer:discovered Bob']);
    });

    test('a moved peer updates its address while idle', () => {
        const { registry } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        registry.onSighting(sighting({ ...BOB, address: '10.0.0.9' }, 2_000, 50001));
        const record = registry.get(BOB.instanceId);
        assert.strictEqual(record?.identity.address, '10.0.0.9');
        assert.strictEqual(record?.port, 50001);
    });

    test('walks discovered, connecting, connected, lost, evicted', () => {
        const { registry, events, advance } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));

        assert.strictEqual(registry.tryBeginConnect(BOB.instanceId), true);
        assert.strictEqual(registry.tryBeginConnect(BOB.instanceId), false);
        assert.strictEqual(registry.markConnected(BOB.instanceId), true);
        assert.deepStrictEqual(registry.listConnected().map((p) => p.displayName), ['Bob']);

        // silent for longer than the staleness window
        registry.sweep(advance(15_001));
        assert.strictEqual(registry.statusOf(BOB.instanceId), 'lost');
        assert.deepStrictEqual(registry.listConnected(), []);

        registry.sweep(advance(30_000));
        assert.strictEqual(registry.statusOf(BOB.instanceId), 'lost');
        registry.sweep(advance(1));
        assert.strictEqual(registry.get(BOB.instanceId), undefined);

        assert.deepStrictEqual(events, [
            'peer:discovered Bob',
            'peer:connecting Bob',
            'peer:connected Bob',
            'peer:lost Bob',
            'peer:evicted Bob',
        ]);
    });

    test('traffic keeps a connected peer fresh', () => {
        const { registry, advance } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        registry.tryBeginConnect(BOB.instanceId);
        registry.markConnected(BOB.instanceId);

        advance(10_000);
        registry.touch(BOB.instanceId);
        registry.sweep(advance(10_000));
        assert.strictEqual(registry.statusOf(BOB.instanceId), 'connected');
    });

    test('lost is reported once per teardown', () => {
        const { registry, events } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        assert.strictEqual(registry.markLost(BOB.instanceId), true);
        assert.strictEqual(registry.markLost(BOB.instanceId), false);
        assert.strictEqual(events.filter((e) => e.startsWith('peer:lost')).length, 1);
    });

    test('a lost peer seen again is rediscovered', () => {
        const { registry, now } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        registry.markLost(BOB.instanceId);

        const record = registry.onSighting(sighting(BOB, now() + 5));
        assert.strictEqual(record?.status, 'discovered');
        assert.strictEqual(record?.lostAt, undefined);
        assert.strictEqual(record?.discoveredAt, now() + 5);
    });

    test('a failed attempt returns the peer to discovered', () => {
        const { registry } = makeRegistry();
        registry.onSighting(sighting(BOB, 1_000));
        registry.tryBeginConnect(BOB.instanceId);
        assert.strictEqual(registry.abortConnect(BOB.instanceId), true);
        assert.strictEqual(registry.statusOf(BOB.instanceId), 'discovered');
        assert.strictEqual(registry.markConnected(BOB.instanceId), false);
    });

    test('admits an inbound peer it has never sighted', () => {
        const { registry } = makeRegistry();
        assert.strictEqual(registry.beginAttempt(BOB, 50002), true);
        assert.strictEqual(registry.statusOf(BOB.instanceId), 'connecting');
        assert.strictEqual(registry.beginAttempt(BOB, 50002), false);
        assert.strictEqual(registry.beginAttempt({ ...BOB, instanceId: LOCAL_ID }, 1), false);
    });

    test('snapshots cannot be mutated', () => {
        const { registry } = makeRegistry();
        const record = registry.onSighting(sighting(BOB, 1_000));
        assert.ok(record);
        assert.strictEqual(Object.isFrozen(record), true);
    });
});
