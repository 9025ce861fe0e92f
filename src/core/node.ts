import { EventEmitter } from 'events';
import { createLocalIdentity } from '../crypto/identity';
import { encodeControl } from '../messaging/envelope';
import { MessageBroadcaster } from '../messaging/broadcaster';
import { Dialer } from '../network/client';
import { DatagramSocket, DiscoveryService } from '../network/discovery';
import { ConnectionManager } from '../network/manager';
import { ListenerFactory } from '../network/tcp';
import { describeError } from './errors';
import { Logger, shortId } from './logger';
import { PeerRegistry } from './registry';
import { InboundMessage, MessageKind, PeerIdentity, PeerRecord, PeerSighting, SendOutcome } from './types';

export interface ChatOptions {
    displayName: string;
    listenPort: number;
    /** Address advertised as ours; defaults to the first non-internal IPv4 address. */
    address?: string;
    /** Interface the TCP listener binds to; all interfaces when unset. */
    listenHost?: string;
    logger?: Logger;
    maxPayloadBytes?: number;
    outboundQueueSize?: number;
    sendTimeoutMs?: number;
    handshakeTimeoutMs?: number;
    connectDeferMs?: number;
    staleAfterMs?: number;
    evictAfterMs?: number;
    announceIntervalMs?: number;
    multicastIp?: string;
    discoveryPort?: number;
    socketFactory?: () => DatagramSocket;
    interfaces?: () => string[];
    dialer?: Dialer;
    listenerFactory?: ListenerFactory;
}

/**
 * The handle the UI works with. Owns one instance of each component, wired
 * together explicitly:
 *
 *   discovery -> registry -> connection manager -> secure channels -> broadcaster
 *
 * Events: `peer:connected`, `peer:lost` (PeerRecord), `message` (InboundMessage).
 */
export class ChatNode extends EventEmitter {
    public readonly identity: PeerIdentity;
    public readonly registry: PeerRegistry;
    public readonly manager: ConnectionManager;
    public readonly broadcaster: MessageBroadcaster;
    public readonly discovery: DiscoveryService;
    public readonly logger: Logger;
    private listenPort: number;
    private started = false;
    private shuttingDown?: Promise<void>;

    constructor(private options: ChatOptions) {
        super();
        this.logger = options.logger ?? new Logger();
        this.identity = createLocalIdentity(options.displayName, options.address);
        this.listenPort = options.listenPort;

        this.registry = new PeerRegistry(this.identity.instanceId, {
            staleAfterMs: options.staleAfterMs,
            evictAfterMs: options.evictAfterMs,
        });
        this.manager = new ConnectionManager({
            local: this.identity,
            registry: this.registry,
            logger: this.logger,
            dialer: options.dialer,
            listenerFactory: options.listenerFactory,
            handshakeTimeoutMs: options.handshakeTimeoutMs,
            connectDeferMs: options.connectDeferMs,
            maxPayloadBytes: options.maxPayloadBytes,
            queueSize: options.outboundQueueSize,
            sendTimeoutMs: options.sendTimeoutMs,
        });
        this.broadcaster = new MessageBroadcaster({
            local: this.identity,
            manager: this.manager,
            registry: this.registry,
            logger: this.logger,
            maxPayloadBytes: options.maxPayloadBytes,
        });
        this.discovery = new DiscoveryService(this.identity.instanceId, {
            logger: this.logger,
            multicastIp: options.multicastIp,
            discoveryPort: options.discoveryPort,
            announceIntervalMs: options.announceIntervalMs,
            socketFactory: options.socketFactory,
            interfaces: options.interfaces,
        });

        this.registry.on('peer:discovered', (record: PeerRecord) => {
            this.logger.info('NEW PEER', `${record.identity.displayName} (${shortId(record.identity.instanceId)}) at ${record.identity.address}:${record.port}`);
        });
        this.registry.on('peer:connected', (record: PeerRecord) => this.emit('peer:connected', record));
        this.registry.on('peer:lost', (record: PeerRecord) => {
            this.logger.info('LOST PEER', `${record.identity.displayName} (${shortId(record.identity.instanceId)})`);
            this.emit('peer:lost', record);
        });
        this.broadcaster.on('message', (message: InboundMessage) => this.emit('message', message));
        this.discovery.on('departure', (instanceId: string) => this.registry.markLost(instanceId));
    }

    public get port(): number {
        return this.listenPort;
    }

    /** Binds the listener, opens discovery and starts advertising. Either failure is fatal. */
    public async start(): Promise<void> {
        if (this.started) return;
        this.listenPort = await this.manager.listen(this.options.listenPort, this.options.listenHost);

        try {
            await this.discovery.start();
        } catch (err) {
            await this.manager.closeAll();
            throw err;
        }

        this.started = true;
        this.registry.start();
        this.discovery.advertise(this.identity, this.listenPort);
        this.consumeSightings(this.discovery.browse()).catch((err: unknown) => {
            this.logger.error('DISCOVERY', `Sighting loop stopped: ${describeError(err)}`);
        });

        this.logger.info('SYSTEM', `Node ${this.identity.displayName} (${shortId(this.identity.instanceId)}) listening on TCP/${this.listenPort}`);
    }

    /** Feeds one sighting through the registry and, when appropriate, dials the peer. */
    public handleSighting(sighting: PeerSighting): void {
        const record = this.registry.onSighting(sighting);
        if (!record || !this.manager.shouldDial(record)) return;

        this.manager.connectTo(record).catch((err: unknown) => {
            this.logger.error('TCP', `Connect to ${shortId(record.identity.instanceId)} failed: ${describeError(err)}`);
        });
    }

    /**
     * Connects to a peer by address, for networks where multicast does not
     * reach. Resolves with the peer's identity as learnt from its hello.
     */
    public async connect(address: string, port: number): Promise<PeerIdentity> {
        this.logger.info('TCP', `Connecting to ${address}:${port}`);
        const connection = await this.manager.connectToAddress(address, port);
        return connection.peer;
    }

    public send(kind: MessageKind, payload: Buffer): Promise<SendOutcome[]> {
        return this.broadcaster.send(kind, payload);
    }

    public connectedPeers(): PeerIdentity[] {
        return this.registry.listConnected();
    }

    public peers(): PeerRecord[] {
        return this.registry.list();
    }

    public inbound(): AsyncIterable<InboundMessage> {
        return this.broadcaster.inbound();
    }

    /** Says goodbye to every peer, then releases every socket. Safe to call twice. */
    public shutdown(): Promise<void> {
        if (!this.shuttingDown) this.shuttingDown = this.doShutdown();
        return this.shuttingDown;
    }

    private async doShutdown(): Promise<void> {
        const outcomes = await this.broadcaster.send('control', encodeControl({ op: 'bye' }));
        for (const outcome of outcomes) {
            if (!outcome.ok) this.logger.debug('SYSTEM', `Goodbye to ${shortId(outcome.peer.instanceId)} not delivered: ${outcome.error.message}`);
        }

        await this.manager.closeAll();
        await this.discovery.stop();
        this.registry.stop();
        this.broadcaster.close();
        this.logger.info('SYSTEM', 'Node stopped');
    }

    private async consumeSightings(sightings: AsyncIterable<PeerSighting>): Promise<void> {
        for await (const sighting of sightings) {
            this.handleSighting(sighting);
        }
    }
}

export const startChat = async (options: ChatOptions): Promise<ChatNode> => {
    const node = new ChatNode(options);
    await node.start();
    return node;
};
