import { EventEmitter } from 'events';
import { AsyncChannel } from '../core/channel';
import { CONFIG } from '../core/config';
import { ConnectionError, ProtocolError, describeError } from '../core/errors';
import { Logger, shortId } from '../core/logger';
import { PeerRegistry } from '../core/registry';
import { InboundMessage, MessageEnvelope, MessageKind, PeerIdentity, SendOutcome } from '../core/types';
import { Connection } from '../network/connection';
import { ConnectionManager } from '../network/manager';
import { ControlMessage, decodeControl, decodeEnvelope, encodeEnvelope } from './envelope';

export interface BroadcasterOptions {
    local: PeerIdentity;
    manager: ConnectionManager;
    registry: PeerRegistry;
    logger: Logger;
    maxPayloadBytes?: number;
}

/**
 * Application-level fan-out and fan-in. Outbound: one envelope, encoded once,
 * queued on every open connection concurrently. Inbound: every connection's
 * frames decoded and merged into the subscribers' streams.
 *
 * Events: `message` (InboundMessage).
 */
export class MessageBroadcaster extends EventEmitter {
    private subscribers: Set<AsyncChannel<InboundMessage>> = new Set();
    private closed = false;

    private readonly local: PeerIdentity;
    private readonly manager: ConnectionManager;
    private readonly registry: PeerRegistry;
    private readonly logger: Logger;
    private readonly maxPayloadBytes: number;

    constructor(options: BroadcasterOptions) {
        super();
        this.local = options.local;
        this.manager = options.manager;
        this.registry = options.registry;
        this.logger = options.logger;
        this.maxPayloadBytes = options.maxPayloadBytes ?? CONFIG.MESSAGING.MAX_PAYLOAD_BYTES;

        this.manager.on('connection', (connection: Connection) => this.attach(connection));
    }

    public get maxPayload(): number {
        return this.maxPayloadBytes;
    }

    /**
     * Throws only when the envelope cannot be built (unknown kind, oversized
     * payload). Delivery problems come back as per-peer failed outcomes.
     */
    public async send(kind: MessageKind, payload: Buffer): Promise<SendOutcome[]> {
        const bytes = encodeEnvelope({ sender: this.local, kind, payload }, this.maxPayloadBytes);
        const targets = this.manager.openConnections();

        const results = await Promise.allSettled(targets.map((connection) => connection.deliver(bytes)));
        return results.map((result, i): SendOutcome => {
            const peer = targets[i].peer;
            if (result.status === 'fulfilled') return { peer, ok: true };
            const error = result.reason instanceof Error ? result.reason : new ConnectionError(describeError(result.reason));
            this.logger.debug('SEND', `Delivery to ${peer.displayName} (${shortId(peer.instanceId)}) failed: ${error.message}`);
            return { peer, ok: false, error };
        });
    }

    /**
     * A fresh, unbounded stream of inbound messages from every peer. Order is
     * preserved per peer; there is no ordering across peers. Ends on close().
     */
    public inbound(): AsyncIterable<InboundMessage> {
        const channel = new AsyncChannel<InboundMessage>();
        if (this.closed) channel.close();
        else this.subscribers.add(channel);
        return channel;
    }

    public close(): void {
        this.closed = true;
        for (const channel of this.subscribers) channel.close();
        this.subscribers.clear();
    }

    private attach(connection: Connection): void {
        connection.on('data', (plaintext: Buffer) => this.handleFrame(connection, plaintext));
    }

    private handleFrame(connection: Connection, plaintext: Buffer): void {
        const peer = connection.peer;

        let envelope: MessageEnvelope;
        try {
            envelope = decodeEnvelope(plaintext, this.maxPayloadBytes);
        } catch (err) {
            connection.close(err instanceof ProtocolError ? err : new ProtocolError(describeError(err), { cause: err }));
            return;
        }
        if (envelope.sender.instanceId !== peer.instanceId) {
            connection.close(new ProtocolError(`Envelope claims sender ${shortId(envelope.sender.instanceId)} on the channel of ${shortId(peer.instanceId)}`));
            return;
        }

        this.registry.touch(peer.instanceId);

        if (envelope.kind === 'control') {
            this.handleControl(connection, envelope.payload);
            return;
        }

        const message: InboundMessage = {
            peer,
            envelope: { ...envelope, sender: peer },
            receivedAt: Date.now(),
        };
        for (const channel of this.subscribers) {
            if (!channel.push(message)) this.subscribers.delete(channel);
        }
        this.emit('message', message);
    }

    private handleControl(connection: Connection, payload: Buffer): void {
        let control: ControlMessage;
        try {
            control = decodeControl(payload);
        } catch (err) {
            connection.close(err instanceof ProtocolError ? err : new ProtocolError(describeError(err), { cause: err }));
            return;
        }
        if (control.op === 'bye') {
            this.logger.info('DISCONNECT', `${connection.peer.displayName} (${shortId(connection.peer.instanceId)}) said goodbye`);
            connection.close(new ConnectionError('Peer left the chat'));
        }
    }
}
