import { Socket } from 'net';
import { Duplex } from 'stream';
import { ConnectionError } from '../core/errors';

export type Dialer = (address: string, port: number) => Promise<Duplex>;

/** Opens an outbound stream connection, failing after `timeoutMs` without an answer. */
export const dialTCP = (timeoutMs: number): Dialer => (address, port) => {
    return new Promise((resolve, reject) => {
        const socket = new Socket();

        const fail = (err: Error) => {
            socket.destroy();
            reject(new ConnectionError(`Connect to ${address}:${port} failed: ${err.message}`, { cause: err }));
        };

        socket.setTimeout(timeoutMs, () => fail(new Error('timed out')));
        socket.once('error', fail);
        socket.connect(port, address, () => {
            socket.setTimeout(0);
            socket.removeListener('error', fail);
            socket.setNoDelay(true);
            resolve(socket);
        });
    });
};

/** A TCP port from user input (1-65535), or undefined. */
export const parsePort = (raw: unknown): number | undefined => {
    const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 65535) return undefined;
    return value;
};
