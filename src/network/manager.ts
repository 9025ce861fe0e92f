import { EventEmitter } from 'events';
import { Duplex } from 'stream';
import { CONFIG } from '../core/config';
import { ChatError, ConnectionError, HandshakeError, describeError, toConnectionError } from '../core/errors';
import { Logger, shortId } from '../core/logger';
import { PeerRegistry } from '../core/registry';
import { PeerIdentity, PeerRecord } from '../core/types';
import { FrameDecoder, FrameReader, maxFrameLength } from '../crypto/frame';
import { HandshakeHello, HandshakeResult, MAX_HANDSHAKE_FRAME, runHandshake } from '../crypto/handshake';
import { Role } from '../crypto/session';
import { Dialer, dialTCP } from './client';
import { Connection } from './connection';
import { ListenerFactory, StreamListener, TCPListener } from './tcp';

export interface ConnectionManagerOptions {
    local: PeerIdentity;
    registry: PeerRegistry;
    logger: Logger;
    dialer?: Dialer;
    listenerFactory?: ListenerFactory;
    handshakeTimeoutMs?: number;
    connectDeferMs?: number;
    retryBaseMs?: number;
    retryMaxMs?: number;
    maxPayloadBytes?: number;
    queueSize?: number;
    sendTimeoutMs?: number;
    now?: () => number;
}

interface PendingAttempt {
    role: Role;
    socket?: Duplex;
    abandoned: boolean;
}

interface Backoff {
    failures: number;
    nextAttemptAt: number;
}

/**
 * Deterministic tie-break for a pair of peers: the smaller instance id is the
 * sole initiator. Both ends compute the same answer.
 */
export const isDesignatedInitiator = (localId: string, remoteId: string): boolean => localId < remoteId;

/**
 * Turns discovered peers into established connections and accepts inbound
 * ones. Holds at most one connection, and at most one pending attempt, per
 * instance id.
 *
 * Events: `connection` (Connection, before its loops start),
 * `disconnect` (Connection, reason), `attempt:failed` (instance id, error).
 */
export class ConnectionManager extends EventEmitter {
    private connections: Map<string, Connection> = new Map();
    private pending: Map<string, PendingAttempt> = new Map();
    private backoff: Map<string, Backoff> = new Map();
    private listener?: StreamListener;
    private advertisedPort = 0;
    private closing = false;

    private readonly local: PeerIdentity;
    private readonly registry: PeerRegistry;
    private readonly logger: Logger;
    private readonly dialer: Dialer;
    private readonly listenerFactory: ListenerFactory;
    private readonly handshakeTimeoutMs: number;
    private readonly connectDeferMs: number;
    private readonly retryBaseMs: number;
    private readonly retryMaxMs: number;
    private readonly maxPayloadBytes: number;
    private readonly queueSize: number;
    private readonly sendTimeoutMs: number;
    private readonly now: () => number;

    constructor(options: ConnectionManagerOptions) {
        super();
        this.local = options.local;
        this.registry = options.registry;
        this.logger = options.logger;
        this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? CONFIG.NETWORK.HANDSHAKE_TIMEOUT_MS;
        this.dialer = options.dialer ?? dialTCP(this.handshakeTimeoutMs);
        this.listenerFactory = options.listenerFactory ?? ((onSocket) => new TCPListener(onSocket));
        this.connectDeferMs = options.connectDeferMs ?? CONFIG.NETWORK.CONNECT_DEFER_MS;
        this.retryBaseMs = options.retryBaseMs ?? CONFIG.NETWORK.RETRY_BASE_MS;
        this.retryMaxMs = options.retryMaxMs ?? CONFIG.NETWORK.RETRY_MAX_MS;
        this.maxPayloadBytes = options.maxPayloadBytes ?? CONFIG.MESSAGING.MAX_PAYLOAD_BYTES;
        this.queueSize = options.queueSize ?? CONFIG.MESSAGING.OUTBOUND_QUEUE_SIZE;
        this.sendTimeoutMs = options.sendTimeoutMs ?? CONFIG.MESSAGING.SEND_TIMEOUT_MS;
        this.now = options.now ?? Date.now;

        // Staleness, a goodbye or a departure announcement all end up here.
        this.registry.on('peer:lost', (record: PeerRecord) => {
            const id = record.identity.instanceId;
            this.connections.get(id)?.close(new ConnectionError(`Peer ${shortId(id)} was marked lost`));
            this.abandon(id);
        });
        this.registry.on('peer:evicted', (record: PeerRecord) => this.backoff.delete(record.identity.instanceId));
    }

    /** Starts the accept loop. Resolves with the bound port; rejects if it cannot bind. */
    public async listen(port: number, host?: string): Promise<number> {
        this.listener = this.listenerFactory((socket, remoteAddress) => {
            this.accept(socket, remoteAddress).catch((err: unknown) => {
                this.logger.error('TCP', `Inbound connection from ${remoteAddress} failed: ${describeError(err)}`);
            });
        });
        this.advertisedPort = await this.listener.start(port, host);
        return this.advertisedPort;
    }

    public openConnections(): Connection[] {
        return Array.from(this.connections.values()).filter((c) => c.isOpen);
    }

    public getConnection(instanceId: string): Connection | undefined {
        return this.connections.get(instanceId);
    }

    public hasPendingAttempt(instanceId: string): boolean {
        return this.pending.has(instanceId);
    }

    /**
     * Whether a sighting of this record should lead to an outbound attempt
     * right now: the peer is idle, off backoff, and either we are its
     * designated initiator or it has had `connectDeferMs` to dial us itself.
     */
    public shouldDial(record: PeerRecord): boolean {
        if (this.closing || record.status !== 'discovered') return false;
        const id = record.identity.instanceId;
        if (this.pending.has(id) || this.connections.has(id)) return false;

        const now = this.now();
        const backoff = this.backoff.get(id);
        if (backoff && now < backoff.nextAttemptAt) return false;

        if (isDesignatedInitiator(this.local.instanceId, id)) return true;
        return now - record.discoveredAt >= this.connectDeferMs;
    }

    /** Outbound attempt, guarded by the registry. Resolves undefined when it did not produce a connection. */
    public async connectTo(record: PeerRecord): Promise<Connection | undefined> {
        const id = record.identity.instanceId;
        if (this.closing || !this.registry.tryBeginConnect(id)) return undefined;

        const attempt: PendingAttempt = { role: 'initiator', abandoned: false };
        this.pending.set(id, attempt);

        try {
            const socket = await this.dialer(record.identity.address, record.port);
            attempt.socket = socket;
            socket.on('error', (err) => this.logger.debug('TCP', `Outbound socket to ${shortId(id)}: ${err.message}`));
            if (attempt.abandoned) throw new ConnectionError('Outbound attempt abandoned');

            const reader = new FrameReader(socket, new FrameDecoder(MAX_HANDSHAKE_FRAME));
            const result = await runHandshake(socket, reader, this.handshakeParams('initiator'));
            if (result.peer.instanceId !== id) {
                throw new HandshakeError(`Expected node ${shortId(id)}, reached ${shortId(result.peer.instanceId)}`);
            }
            if (attempt.abandoned) throw new ConnectionError('Outbound attempt abandoned');

            return this.register(result, record.identity.address, socket, reader, attempt);
        } catch (err) {
            attempt.socket?.destroy();
            this.failAttempt(id, attempt, err);
            return undefined;
        }
    }

    /**
     * Dials an address directly, without a prior sighting. The peer's id is
     * learnt from its hello, then the same registry guard and
     * simultaneous-connect rule as for inbound streams apply. Rejects when no
     * connection results.
     */
    public async connectToAddress(address: string, port: number): Promise<Connection> {
        if (this.closing) throw new ConnectionError('Shutting down');
        const attempt: PendingAttempt = { role: 'initiator', abandoned: false };
        let admittedId: string | undefined;

        try {
            const socket = await this.dialer(address, port);
            attempt.socket = socket;
            socket.on('error', (err) => this.logger.debug('TCP', `Outbound socket to ${address}:${port}: ${err.message}`));

            const reader = new FrameReader(socket, new FrameDecoder(MAX_HANDSHAKE_FRAME));
            const result = await runHandshake(socket, reader, {
                ...this.handshakeParams('initiator'),
                admit: (hello) => {
                    admittedId = this.admit(hello, address, attempt);
                },
            });
            if (attempt.abandoned) throw new ConnectionError('Outbound attempt abandoned');

            return this.register(result, address, socket, reader, attempt);
        } catch (err) {
            attempt.socket?.destroy();
            if (admittedId) this.failAttempt(admittedId, attempt, err);
            throw toConnectionError(err, `Cannot reach ${address}:${port}`);
        }
    }

    /** Responder side for one inbound stream. */
    public async accept(socket: Duplex, remoteAddress: string): Promise<Connection | undefined> {
        const attempt: PendingAttempt = { role: 'responder', abandoned: false, socket };
        let admittedId: string | undefined;
        socket.on('error', (err) => this.logger.debug('TCP', `Inbound socket from ${remoteAddress}: ${err.message}`));
        this.logger.debug('TCP', `Incoming connection from ${remoteAddress}`);

        try {
            if (this.closing) throw new ConnectionError('Shutting down');
            const reader = new FrameReader(socket, new FrameDecoder(MAX_HANDSHAKE_FRAME));
            const result = await runHandshake(socket, reader, {
                ...this.handshakeParams('responder'),
                admit: (hello) => {
                    admittedId = this.admit(hello, remoteAddress, attempt);
                },
            });
            if (attempt.abandoned) throw new ConnectionError('Inbound attempt abandoned');

            return this.register(result, remoteAddress, socket, reader, attempt);
        } catch (err) {
            socket.destroy();
            if (admittedId) this.failAttempt(admittedId, attempt, err);
            else this.logger.debug('TCP', `Refused connection from ${remoteAddress}: ${describeError(err)}`);
            return undefined;
        }
    }

    /** Sends nothing; closes every connection, pending attempt and the listener. */
    public async closeAll(): Promise<void> {
        this.closing = true;
        for (const id of Array.from(this.pending.keys())) this.abandon(id);
        for (const connection of Array.from(this.connections.values())) {
            connection.close(new ConnectionError('Local shutdown'));
        }
        await this.listener?.close();
    }

    /**
     * Applies the simultaneous-connect rule to the peer's hello, for an
     * inbound stream or a dial by address. Returns the admitted instance id,
     * or throws to refuse the stream.
     *
     * When an attempt of the opposite direction is already pending, the one
     * initiated by the designated initiator survives; both ends reach the
     * same verdict.
     */
    private admit(hello: HandshakeHello, address: string, attempt: PendingAttempt): string {
        const id = hello.instanceId;
        if (this.closing) throw new ConnectionError('Shutting down');
        if (id === this.local.instanceId) throw new HandshakeError('Refusing a connection to ourselves');
        if (this.connections.has(id)) throw new HandshakeError(`Already connected to node ${shortId(id)}`);

        const existing = this.pending.get(id);
        if (existing) {
            if (existing.role === attempt.role) throw new HandshakeError(`Duplicate ${attempt.role} attempt with node ${shortId(id)}`);
            const weInitiate = isDesignatedInitiator(this.local.instanceId, id);
            if ((attempt.role === 'initiator') !== weInitiate) {
                throw new HandshakeError(`Simultaneous connect with node ${shortId(id)}: keeping the designated initiator's attempt`);
            }
            this.logger.debug('TCP', `Simultaneous connect with node ${shortId(id)}: dropping our ${existing.role} attempt`);
            existing.abandoned = true;
            existing.socket?.destroy();
            this.pending.set(id, attempt);
            return id;
        }

        const identity: PeerIdentity = { displayName: hello.displayName, address, instanceId: id };
        if (!this.registry.beginAttempt(identity, hello.port)) {
            throw new HandshakeError(`Node ${shortId(id)} is already connecting or connected`);
        }
        this.pending.set(id, attempt);
        return id;
    }

    private register(result: HandshakeResult, address: string, socket: Duplex, reader: FrameReader, attempt: PendingAttempt): Connection {
        const id = result.peer.instanceId;
        if (this.pending.get(id) !== attempt) throw new ConnectionError('Attempt was superseded');
        if (this.connections.has(id)) throw new ConnectionError(`Already connected to node ${shortId(id)}`);
        this.pending.delete(id);

        reader.setMaxLength(maxFrameLength(this.maxPayloadBytes));
        const identity: PeerIdentity = { displayName: result.peer.displayName, address, instanceId: id };
        const connection = new Connection(identity, attempt.role, socket, reader, result.session, {
            queueSize: this.queueSize,
            sendTimeoutMs: this.sendTimeoutMs,
        });

        this.connections.set(id, connection);
        this.backoff.delete(id);
        this.registry.markConnected(id, identity);
        connection.once('close', (reason?: ChatError) => this.onClosed(connection, reason));

        this.logger.info('SECURE', `Secure channel established with ${identity.displayName} (${shortId(id)}) as ${attempt.role}`);
        this.emit('connection', connection);
        connection.start();
        return connection;
    }

    private onClosed(connection: Connection, reason?: ChatError): void {
        const id = connection.peer.instanceId;
        if (this.connections.get(id) !== connection) return;
        this.connections.delete(id);
        this.registry.markLost(id);

        const why = reason ? `: ${reason.message}` : '';
        this.logger.info('DISCONNECT', `Connection to ${connection.peer.displayName} (${shortId(id)}) torn down${why}`);
        this.emit('disconnect', connection, reason);
    }

    private failAttempt(id: string, attempt: PendingAttempt, err: unknown): void {
        if (this.pending.get(id) !== attempt) {
            // Superseded by the peer's own attempt, or abandoned on shutdown.
            this.logger.debug('TCP', `Dropped ${attempt.role} attempt for node ${shortId(id)}: ${describeError(err)}`);
            return;
        }
        this.pending.delete(id);
        this.registry.abortConnect(id);
        this.scheduleRetry(id);

        this.logger.warn('TCP', `Connection attempt with node ${shortId(id)} failed: ${describeError(err)}`);
        this.emit('attempt:failed', id, err);
    }

    private abandon(id: string): void {
        const attempt = this.pending.get(id);
        if (!attempt) return;
        attempt.abandoned = true;
        attempt.socket?.destroy();
        this.pending.delete(id);
    }

    private scheduleRetry(id: string): void {
        const failures = (this.backoff.get(id)?.failures ?? 0) + 1;
        const delay = Math.min(this.retryBaseMs * 2 ** (failures - 1), this.retryMaxMs);
        this.backoff.set(id, { failures, nextAttemptAt: this.now() + delay });
    }

    private handshakeParams(role: Role) {
        return {
            role,
            instanceId: this.local.instanceId,
            displayName: this.local.displayName,
            port: this.advertisedPort,
            timeoutMs: this.handshakeTimeoutMs,
        };
    }
}
