import { AddressInfo, createServer, Server } from 'net';
import { Duplex } from 'stream';
import { ConnectionError } from '../core/errors';
import { normalizeAddress } from './interfaces';

export type SocketHandler = (socket: Duplex, remoteAddress: string) => void;

export interface StreamListener {
    start(port: number, host?: string): Promise<number>;
    close(): Promise<void>;
}

export type ListenerFactory = (onSocket: SocketHandler) => StreamListener;

/** Accept loop for inbound stream connections; every socket is handed to `onSocket`. */
export class TCPListener implements StreamListener {
    private server: Server;

    constructor(private onSocket: SocketHandler) {
        this.server = createServer((socket) => {
            socket.setNoDelay(true);
            this.onSocket(socket, normalizeAddress(socket.remoteAddress));
        });
    }

    /** Resolves with the bound port. A bind failure is fatal to startup. */
    public async start(port: number, host?: string): Promise<number> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => {
                reject(new ConnectionError(`Unable to listen on TCP/${port}: ${err.message}`, { cause: err }));
            };
            this.server.once('error', onError);
            this.server.listen(port, host, () => {
                this.server.removeListener('error', onError);
                const address = this.server.address();
                resolve(isAddressInfo(address) ? address.port : port);
            });
        });
    }

    public close(): Promise<void> {
        return new Promise((resolve) => {
            if (!this.server.listening) return resolve();
            this.server.close(() => resolve());
        });
    }
}

const isAddressInfo = (address: string | AddressInfo | null): address is AddressInfo => {
    return typeof address === 'object' && address !== null;
};
