import { EventEmitter } from 'events';
import { CONFIG } from './config';
import { PeerIdentity, PeerRecord, PeerSighting, PeerStatus } from './types';

interface MutableRecord {
    identity: PeerIdentity;
    port: number;
    status: PeerStatus;
    lastSeen: number;
    discoveredAt: number;
    lostAt?: number;
}

export interface RegistryOptions {
    staleAfterMs?: number;
    evictAfterMs?: number;
    sweepIntervalMs?: number;
    now?: () => number;
}

/**
 * Peer lifecycle table, keyed by instance id.
 *
 *   discovered -> connecting -> connected -> lost -> (evicted)
 *        ^                                    |
 *        +------------- re-sighted -----------+
 *
 * Every transition is a synchronous method call, so transitions are atomic
 * with respect to the event loop. Callers only ever see frozen snapshots.
 *
 * Events: `peer:discovered`, `peer:connecting`, `peer:connected`,
 * `peer:lost`, `peer:evicted`, each with a `PeerRecord` snapshot.
 */
export class PeerRegistry extends EventEmitter {
    private records: Map<string, MutableRecord> = new Map();
    private sweepInterval?: NodeJS.Timeout;
    private readonly staleAfterMs: number;
    private readonly evictAfterMs: number;
    private readonly sweepIntervalMs: number;
    private readonly now: () => number;

    constructor(private localId: string, options: RegistryOptions = {}) {
        super();
        this.staleAfterMs = options.staleAfterMs ?? CONFIG.NETWORK.PEER_STALE_MS;
        this.evictAfterMs = options.evictAfterMs ?? CONFIG.NETWORK.PEER_EVICT_MS;
        this.sweepIntervalMs = options.sweepIntervalMs ?? Math.max(250, Math.floor(this.staleAfterMs / 3));
        this.now = options.now ?? Date.now;
    }

    public start(): void {
        if (this.sweepInterval) return;
        this.sweepInterval = setInterval(() => this.sweep(), this.sweepIntervalMs);
        this.sweepInterval.unref();
    }

    public stop(): void {
        if (this.sweepInterval) clearInterval(this.sweepInterval);
        this.sweepInterval = undefined;
    }

    /** Idempotent. Returns the resulting record, or undefined for our own announcements. */
    public onSighting(sighting: PeerSighting): PeerRecord | undefined {
        const id = sighting.identity.instanceId;
        if (id === this.localId) return undefined;

        const existing = this.records.get(id);
        if (!existing) {
            const record: MutableRecord = {
                identity: sighting.identity,
                port: sighting.port,
                status: 'discovered',
                lastSeen: sighting.seenAt,
                discoveredAt: sighting.seenAt,
            };
            this.records.set(id, record);
            this.emit('peer:discovered', snapshot(record));
            return snapshot(record);
        }

        switch (existing.status) {
            case 'lost':
                existing.identity = sighting.identity;
                existing.port = sighting.port;
                existing.status = 'discovered';
                existing.discoveredAt = sighting.seenAt;
                existing.lastSeen = sighting.seenAt;
                existing.lostAt = undefined;
                this.emit('peer:discovered', snapshot(existing));
                break;
            case 'discovered':
                existing.identity = sighting.identity;
                existing.port = sighting.port;
                existing.lastSeen = Math.max(existing.lastSeen, sighting.seenAt);
                break;
            default:
                // connecting/connected keep their address; only freshness moves
                existing.lastSeen = Math.max(existing.lastSeen, sighting.seenAt);
        }
        return snapshot(existing);
    }

    /** discovered -> connecting. False when an attempt or a connection already exists. */
    public tryBeginConnect(instanceId: string): boolean {
        const record = this.records.get(instanceId);
        if (!record || record.status !== 'discovered') return false;
        record.status = 'connecting';
        this.emit('peer:connecting', snapshot(record));
        return true;
    }

    /**
     * Admits an attempt (inbound, or a dial by address) with a peer that may
     * not have been sighted yet. False when the peer is already connecting or
     * connected.
     */
    public beginAttempt(identity: PeerIdentity, port: number): boolean {
        if (identity.instanceId === this.localId) return false;

        const now = this.now();
        const record = this.records.get(identity.instanceId);
        if (!record) {
            const created: MutableRecord = {
                identity,
                port,
                status: 'connecting',
                lastSeen: now,
                discoveredAt: now,
            };
            this.records.set(identity.instanceId, created);
            this.emit('peer:connecting', snapshot(created));
            return true;
        }

        if (record.status === 'connecting' || record.status === 'connected') return false;

        record.identity = identity;
        record.port = port || record.port;
        record.status = 'connecting';
        record.lastSeen = now;
        record.lostAt = undefined;
        this.emit('peer:connecting', snapshot(record));
        return true;
    }

    /** connecting -> discovered, after an attempt failed before establishment. */
    public abortConnect(instanceId: string): boolean {
        const record = this.records.get(instanceId);
        if (!record || record.status !== 'connecting') return false;
        record.status = 'discovered';
        return true;
    }

    public markConnected(instanceId: string, identity?: PeerIdentity): boolean {
        const record = this.records.get(instanceId);
        if (!record || record.status !== 'connecting') return false;
        if (identity) record.identity = identity;
        record.status = 'connected';
        record.lastSeen = this.now();
        this.emit('peer:connected', snapshot(record));
        return true;
    }

    /** Exactly once per teardown: a second call for the same peer is a no-op. */
    public markLost(instanceId: string): boolean {
        const record = this.records.get(instanceId);
        if (!record || record.status === 'lost') return false;
        record.status = 'lost';
        record.lostAt = this.now();
        this.emit('peer:lost', snapshot(record));
        return true;
    }

    public touch(instanceId: string): void {
        const record = this.records.get(instanceId);
        if (record && record.status !== 'lost') record.lastSeen = this.now();
    }

    public get(instanceId: string): PeerRecord | undefined {
        const record = this.records.get(instanceId);
        return record ? snapshot(record) : undefined;
    }

    public statusOf(instanceId: string): PeerStatus | undefined {
        return this.records.get(instanceId)?.status;
    }

    public list(): PeerRecord[] {
        return Array.from(this.records.values()).map(snapshot);
    }

    public listConnected(): PeerIdentity[] {
        return Array.from(this.records.values())
            .filter((r) => r.status === 'connected')
            .map((r) => r.identity);
    }

    public sweep(now: number = this.now()): void {
        for (const [id, record] of this.records.entries()) {
            if (record.status === 'lost') {
                if (now - (record.lostAt ?? now) > this.evictAfterMs) {
                    this.records.delete(id);
                    this.emit('peer:evicted', snapshot(record));
                }
            } else if (now - record.lastSeen > this.staleAfterMs) {
                record.status = 'lost';
                record.lostAt = now;
                this.emit('peer:lost', snapshot(record));
            }
        }
    }
}

const snapshot = (record: MutableRecord): PeerRecord => Object.freeze({ ...record });
