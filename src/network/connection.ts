import { EventEmitter } from 'events';
import { Duplex } from 'stream';
import { AsyncChannel } from '../core/channel';
import { ChatError, ConnectionError, ResourceError, toConnectionError } from '../core/errors';
import { PeerIdentity } from '../core/types';
import { FrameReader } from '../crypto/frame';
import { writeFrame } from '../crypto/handshake';
import { Role, SecureSession } from '../crypto/session';

export interface ConnectionOptions {
    queueSize: number;
    sendTimeoutMs: number;
}

interface OutboundItem {
    plaintext: Buffer;
    resolve: () => void;
    reject: (err: Error) => void;
}

/**
 * One established, authenticated connection to a peer.
 *
 * Runs a read loop (frames -> `data` events, in order) and a write loop
 * (bounded queue -> sealed frames). The read loop alone advances the receive
 * counter and the write loop alone advances the send counter.
 *
 * Events: `data` (Buffer plaintext), `close` (reason: ChatError | undefined).
 */
export class Connection extends EventEmitter {
    public readonly establishedAt = Date.now();
    private outbound: AsyncChannel<OutboundItem>;
    private closed = false;

    constructor(
        public readonly peer: PeerIdentity,
        public readonly role: Role,
        private socket: Duplex,
        private reader: FrameReader,
        private session: SecureSession,
        private options: ConnectionOptions,
    ) {
        super();
        this.outbound = new AsyncChannel<OutboundItem>(options.queueSize);
        this.socket.on('error', (err) => this.close(toConnectionError(err, 'Socket error')));
    }

    public get isOpen(): boolean {
        return !this.closed;
    }

    public get framesSent(): bigint {
        return this.session.framesSent;
    }

    public start(): void {
        this.readLoop().catch((err: unknown) => this.close(toConnectionError(err, 'Read failed')));
        this.writeLoop().catch((err: unknown) => this.close(toConnectionError(err, 'Write failed')));
    }

    /**
     * Queues one plaintext message. Resolves once the sealed frame has been
     * handed to the socket; rejects when the connection drops first or the
     * queue stays full past the send timeout.
     */
    public deliver(plaintext: Buffer): Promise<void> {
        if (this.closed) return Promise.reject(new ConnectionError('Connection is closed'));

        return new Promise<void>((resolve, reject) => {
            this.outbound.send({ plaintext, resolve, reject }, this.options.sendTimeoutMs).catch((err: unknown) => {
                if (err instanceof ResourceError && !this.closed) {
                    reject(new ResourceError(`Peer unreachable: ${err.message}`, { cause: err }));
                } else {
                    reject(new ConnectionError('Connection closed before the message was queued', { cause: err }));
                }
            });
        });
    }

    /** Idempotent. Stops both loops, fails queued sends and releases the socket. */
    public close(reason?: ChatError): void {
        if (this.closed) return;
        this.closed = true;

        this.outbound.close();
        for (const item of this.outbound.drain()) {
            item.reject(new ConnectionError('Connection closed before the message was sent', { cause: reason }));
        }
        this.socket.destroy();
        this.emit('close', reason);
    }

    private async readLoop(): Promise<void> {
        while (!this.closed) {
            const body = await this.reader.next();
            if (body === null) {
                this.close(new ConnectionError('Connection closed by peer'));
                return;
            }
            const plaintext = this.session.open(body);
            if (!this.closed) this.emit('data', plaintext);
        }
    }

    private async writeLoop(): Promise<void> {
        for await (const item of this.outbound) {
            if (this.closed) {
                item.reject(new ConnectionError('Connection closed before the message was sent'));
                continue;
            }
            try {
                await writeFrame(this.socket, this.session.seal(item.plaintext));
                item.resolve();
            } catch (err) {
                const error = toConnectionError(err, 'Write failed');
                item.reject(error);
                this.close(error);
            }
        }
    }
}
