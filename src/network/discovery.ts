import { createSocket, RemoteInfo } from 'dgram';
import { EventEmitter } from 'events';
import { AsyncChannel } from '../core/channel';
import { CONFIG } from '../core/config';
import { DiscoveryError, describeError } from '../core/errors';
import { Logger, shortId } from '../core/logger';
import { PeerIdentity, PeerSighting } from '../core/types';
import { listIPv4Interfaces } from './interfaces';

/** The slice of `dgram.Socket` the discovery service relies on. */
export interface DatagramSocket {
    bind(port: number, callback: () => void): unknown;
    setMulticastLoopback(flag: boolean): unknown;
    setMulticastInterface(multicastInterface: string): void;
    addMembership(multicastAddress: string, multicastInterface?: string): void;
    send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
    close(callback?: () => void): unknown;
    on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    once(event: 'error', listener: (err: Error) => void): unknown;
    removeListener(event: 'error', listener: (err: Error) => void): unknown;
}

export type AnnouncementType = 'HELLO' | 'BYE';

export interface Announcement {
    type: AnnouncementType;
    id: string;
    name: string;
    port: number;
}

export interface DiscoveryOptions {
    logger: Logger;
    multicastIp?: string;
    discoveryPort?: number;
    announceIntervalMs?: number;
    socketFactory?: () => DatagramSocket;
    interfaces?: () => string[];
}

const INSTANCE_ID = /^[0-9a-f]{16,64}$/;

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export const encodeAnnouncement = (announcement: Announcement): Buffer => {
    return Buffer.from(JSON.stringify({
        type: announcement.type,
        app: CONFIG.APP.NAME,
        v: CONFIG.APP.PROTOCOL_VERSION,
        id: announcement.id,
        name: announcement.name,
        port: announcement.port,
    }));
};

/** Returns null for anything that is not a well-formed announcement of ours. */
export const parseAnnouncement = (msg: Buffer): Announcement | null => {
    let data: unknown;
    try {
        data = JSON.parse(msg.toString('utf8'));
    } catch {
        return null;
    }
    if (!isRecord(data)) return null;

    const { type, app, v, id, name, port } = data;
    if (app !== CONFIG.APP.NAME || v !== CONFIG.APP.PROTOCOL_VERSION) return null;
    if (type !== 'HELLO' && type !== 'BYE') return null;
    if (typeof id !== 'string' || !INSTANCE_ID.test(id)) return null;
    if (typeof name !== 'string' || name.length === 0 || Buffer.byteLength(name) > 64) return null;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) return null;

    return { type, id, name, port };
};

/**
 * Multicast presence. Announces `{ type, app, v, id, name, port }` on every
 * IPv4 interface and turns every announcement heard into a sighting. Nothing
 * here implies trust; sightings are not de-duplicated.
 *
 * Events: `sighting` (PeerSighting), `departure` (instance id),
 * `diagnostic` (DiscoveryError, transient and already retried).
 */
export class DiscoveryService extends EventEmitter {
    private socket?: DatagramSocket;
    private announceInterval?: NodeJS.Timeout;
    private subscribers: Set<AsyncChannel<PeerSighting>> = new Set();
    private advertised?: Announcement;
    private running = false;

    private readonly logger: Logger;
    private readonly multicastIp: string;
    private readonly discoveryPort: number;
    private readonly announceIntervalMs: number;
    private readonly socketFactory: () => DatagramSocket;
    private readonly interfaces: () => string[];

    constructor(private localId: string, options: DiscoveryOptions) {
        super();
        this.logger = options.logger;
        this.multicastIp = options.multicastIp ?? CONFIG.NETWORK.MULTICAST_IP;
        this.discoveryPort = options.discoveryPort ?? CONFIG.NETWORK.DISCOVERY_PORT;
        this.announceIntervalMs = options.announceIntervalMs ?? CONFIG.NETWORK.ANNOUNCE_INTERVAL_MS;
        this.socketFactory = options.socketFactory ?? (() => createSocket({ type: 'udp4', reuseAddr: true }));
        this.interfaces = options.interfaces ?? (() => listIPv4Interfaces().map((i) => i.address));
    }

    /** Opens the multicast socket. Rejects with DiscoveryError when that is impossible. */
    public async start(): Promise<void> {
        if (this.running) return;
        const socket = this.socketFactory();
        this.socket = socket;

        await new Promise<void>((resolve, reject) => {
            const onError = (err: Error) => {
                reject(new DiscoveryError(`Could not open discovery socket on UDP/${this.discoveryPort}: ${err.message}`, { cause: err }));
            };
            socket.once('error', onError);
            socket.bind(this.discoveryPort, () => {
                socket.removeListener('error', onError);
                try {
                    socket.setMulticastLoopback(true);
                    this.joinGroup(socket);
                    resolve();
                } catch (err) {
                    reject(err instanceof DiscoveryError ? err : new DiscoveryError(describeError(err), { cause: err }));
                }
            });
        }).catch((err: unknown) => {
            socket.close();
            this.socket = undefined;
            throw err;
        });

        socket.on('message', (msg, rinfo) => this.handleMessage(msg, rinfo));
        socket.on('error', (err) => this.diagnostic(new DiscoveryError(`Discovery socket error: ${err.message}`, { cause: err })));
        this.running = true;
    }

    /** Announces immediately, then on every interval until stopped. */
    public advertise(identity: PeerIdentity, listenPort: number): void {
        this.advertised = { type: 'HELLO', id: identity.instanceId, name: identity.displayName, port: listenPort };
        if (this.announceInterval) clearInterval(this.announceInterval);

        this.announce(this.advertised);
        this.announceInterval = setInterval(() => {
            if (this.advertised) this.announce(this.advertised);
        }, this.announceIntervalMs);
        this.announceInterval.unref();
    }

    /**
     * A fresh, unbounded stream of sightings. Each call starts a new stream;
     * every stream ends when the service stops.
     */
    public browse(): AsyncIterable<PeerSighting> {
        const channel = new AsyncChannel<PeerSighting>();
        if (this.running) this.subscribers.add(channel);
        else channel.close();
        return channel;
    }

    public async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        if (this.announceInterval) clearInterval(this.announceInterval);
        this.announceInterval = undefined;

        if (this.advertised) {
            await this.sendAll(encodeAnnouncement({ ...this.advertised, type: 'BYE' }));
        }

        for (const channel of this.subscribers) channel.close();
        this.subscribers.clear();

        const socket = this.socket;
        this.socket = undefined;
        await new Promise<void>((resolve) => {
            if (socket) socket.close(() => resolve());
            else resolve();
        });
    }

    private joinGroup(socket: DatagramSocket): void {
        let joined = 0;
        for (const address of this.interfaces()) {
            try {
                socket.addMembership(this.multicastIp, address);
                joined++;
            } catch (err) {
                this.logger.debug('DISCOVERY', `Could not join ${this.multicastIp} on ${address}: ${describeError(err)}`);
            }
        }
        if (joined > 0) return;

        try {
            socket.addMembership(this.multicastIp);
        } catch (err) {
            throw new DiscoveryError(`Could not join multicast group ${this.multicastIp}: ${describeError(err)}`, { cause: err });
        }
    }

    private announce(announcement: Announcement): void {
        this.sendAll(encodeAnnouncement(announcement)).catch((err: unknown) => {
            this.diagnostic(new DiscoveryError(`Announcement failed: ${describeError(err)}`, { cause: err }));
        });
    }

    /** One datagram per interface; per-datagram failures become diagnostics. */
    private async sendAll(message: Buffer): Promise<void> {
        const socket = this.socket;
        if (!socket) return;

        const targets: Array<string | undefined> = this.interfaces();
        if (targets.length === 0) targets.push(undefined);

        await Promise.all(targets.map((iface) => new Promise<void>((resolve) => {
            try {
                if (iface) socket.setMulticastInterface(iface);
                socket.send(message, this.discoveryPort, this.multicastIp, (err) => {
                    if (err) this.diagnostic(new DiscoveryError(`Announcement via ${iface ?? 'default'} failed: ${err.message}`, { cause: err }));
                    resolve();
                });
            } catch (err) {
                this.diagnostic(new DiscoveryError(`Announcement via ${iface ?? 'default'} failed: ${describeError(err)}`, { cause: err }));
                resolve();
            }
        })));
    }

    private handleMessage(msg: Buffer, rinfo: RemoteInfo): void {
        const announcement = parseAnnouncement(msg);
        if (!announcement || announcement.id === this.localId) return;

        if (announcement.type === 'BYE') {
            this.logger.debug('DISCOVERY', `Node ${shortId(announcement.id)} left the network`);
            this.emit('departure', announcement.id);
            return;
        }

        const sighting: PeerSighting = {
            identity: { displayName: announcement.name, address: rinfo.address, instanceId: announcement.id },
            address: rinfo.address,
            port: announcement.port,
            seenAt: Date.now(),
        };

        for (const channel of this.subscribers) {
            if (!channel.push(sighting)) this.subscribers.delete(channel);
        }
        this.emit('sighting', sighting);
    }

    private diagnostic(err: DiscoveryError): void {
        this.logger.debug('DISCOVERY', err.message);
        this.emit('diagnostic', err);
    }
}
