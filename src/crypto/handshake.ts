import _sodium from 'libsodium-wrappers';
import { randomBytes } from 'crypto';
import { Duplex } from 'stream';
import { ChatError, ConnectionError, HandshakeError, describeError } from '../core/errors';
import { FrameReader, SALT_BYTES, encodeFrame } from './frame';
import { Role, SESSION_KEY_BYTES, SecureSession } from './session';

export const HELLO_MAGIC = Buffer.from('LCH1', 'ascii');
export const HELLO_TYPE = 0x01;
export const PUBLIC_KEY_BYTES = 32;
export const MAX_HANDSHAKE_FRAME = 256;

const KDF_CONTEXT = Buffer.from('lanchat/session-key/v1', 'ascii');
const CONFIRMATION: Record<Role, Buffer> = {
    initiator: Buffer.from('lanchat/confirm/initiator', 'ascii'),
    responder: Buffer.from('lanchat/confirm/responder', 'ascii'),
};

export interface HandshakeHello {
    instanceId: string;
    displayName: string;
    port: number;
    publicKey: Uint8Array;
    salt: Buffer;
}

export interface EphemeralKeys {
    publicKey: Uint8Array;
    privateKey: Uint8Array;
    salt: Buffer;
}

export interface HandshakeParams {
    role: Role;
    instanceId: string;
    displayName: string;
    port: number;
    timeoutMs: number;
    /**
     * Inspects the peer's hello before any key material is derived; throws to
     * refuse it. The responder calls it before replying with its own hello.
     */
    admit?: (hello: HandshakeHello) => void;
}

export interface HandshakeResult {
    peer: HandshakeHello;
    session: SecureSession;
}

// HELLO: [ Magic (4) | Type (1) | Salt (4) | EphemeralPubKey (32) | Port (2) | IdLen (1) | Id | NameLen (1) | Name ]
export const encodeHello = (hello: HandshakeHello): Buffer => {
    const id = Buffer.from(hello.instanceId, 'utf8');
    const name = Buffer.from(hello.displayName, 'utf8');
    if (id.length === 0 || id.length > 255) throw new HandshakeError('Instance id must be 1-255 bytes');
    if (name.length > 255) throw new HandshakeError('Display name must be at most 255 bytes');

    const portBuf = Buffer.alloc(2);
    portBuf.writeUInt16BE(hello.port, 0);

    return Buffer.concat([
        HELLO_MAGIC,
        Buffer.from([HELLO_TYPE]),
        hello.salt,
        Buffer.from(hello.publicKey),
        portBuf,
        Buffer.from([id.length]),
        id,
        Buffer.from([name.length]),
        name,
    ]);
};

export const decodeHello = (body: Buffer): HandshakeHello => {
    const fixed = HELLO_MAGIC.length + 1 + SALT_BYTES + PUBLIC_KEY_BYTES + 2 + 1;
    if (body.length < fixed) throw new HandshakeError('Invalid HELLO packet length');
    if (!body.subarray(0, HELLO_MAGIC.length).equals(HELLO_MAGIC)) throw new HandshakeError('Invalid HELLO magic');

    let offset = HELLO_MAGIC.length;
    if (body[offset] !== HELLO_TYPE) throw new HandshakeError(`Unexpected handshake message type ${body[offset]}`);
    offset += 1;

    const salt = Buffer.from(body.subarray(offset, offset + SALT_BYTES));
    offset += SALT_BYTES;
    const publicKey = new Uint8Array(body.subarray(offset, offset + PUBLIC_KEY_BYTES));
    offset += PUBLIC_KEY_BYTES;
    const port = body.readUInt16BE(offset);
    offset += 2;

    const idLength = body[offset];
    offset += 1;
    if (idLength === 0 || body.length < offset + idLength + 1) throw new HandshakeError('Truncated HELLO instance id');
    const instanceId = body.toString('utf8', offset, offset + idLength);
    offset += idLength;

    const nameLength = body[offset];
    offset += 1;
    if (body.length !== offset + nameLength) throw new HandshakeError('Malformed HELLO display name');
    const displayName = body.toString('utf8', offset, offset + nameLength);

    return { instanceId, displayName, port, publicKey, salt };
};

export const createEphemeralKeys = async (role: Role): Promise<EphemeralKeys> => {
    await _sodium.ready;
    const sodium = _sodium;

    // X25519 ephemeral pair
    const keyPair = sodium.crypto_kx_keypair();
    const salt = randomBytes(SALT_BYTES);
    salt[0] = role === 'initiator' ? salt[0] & 0x7f : salt[0] | 0x80;

    return { publicKey: keyPair.publicKey, privateKey: keyPair.privateKey, salt };
};

/**
 * X25519 shared secret, then BLAKE2b-256 keyed with a fixed context over
 * [ Shared | LowerShare | HigherShare ]. Shares are sorted, so both ends
 * derive the same key whatever their role.
 */
export const deriveSessionKey = async (mine: EphemeralKeys, peerPublicKey: Uint8Array): Promise<Buffer> => {
    await _sodium.ready;
    const sodium = _sodium;

    if (peerPublicKey.length !== PUBLIC_KEY_BYTES) throw new HandshakeError('Malformed ephemeral public share');

    let shared: Uint8Array;
    try {
        shared = sodium.crypto_scalarmult(mine.privateKey, peerPublicKey);
    } catch (e) {
        throw new HandshakeError('Key agreement rejected the peer share', { cause: e });
    }
    if (sodium.is_zero(shared)) throw new HandshakeError('Key agreement produced a degenerate secret');

    const [lower, higher] = [Buffer.from(mine.publicKey), Buffer.from(peerPublicKey)].sort(Buffer.compare);
    const key = sodium.crypto_generichash(SESSION_KEY_BYTES, Buffer.concat([Buffer.from(shared), lower, higher]), KDF_CONTEXT);
    sodium.memzero(shared);

    return Buffer.from(key);
};

export const confirmationFor = (role: Role): Buffer => CONFIRMATION[role];

const otherRole = (role: Role): Role => (role === 'initiator' ? 'responder' : 'initiator');

/**
 * Runs one side of the handshake over an open stream:
 *
 *   initiator                         responder
 *   HELLO ------------------------->  admit()
 *         <-------------------------  HELLO
 *   CONFIRM (counter 0) <---------->  CONFIRM (counter 0)
 *
 * Any failure destroys nothing itself; the caller owns the socket.
 */
export const runHandshake = async (socket: Duplex, reader: FrameReader, params: HandshakeParams): Promise<HandshakeResult> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new HandshakeError(`Handshake did not complete within ${params.timeoutMs} ms`));
        }, params.timeoutMs);
    });

    try {
        return await Promise.race([exchange(socket, reader, params), timeout]);
    } finally {
        clearTimeout(timer);
    }
};

const exchange = async (socket: Duplex, reader: FrameReader, params: HandshakeParams): Promise<HandshakeResult> => {
    const keys = await createEphemeralKeys(params.role);
    const myHello: HandshakeHello = {
        instanceId: params.instanceId,
        displayName: params.displayName,
        port: params.port,
        publicKey: keys.publicKey,
        salt: keys.salt,
    };

    let peer: HandshakeHello;
    if (params.role === 'initiator') {
        await writeFrame(socket, encodeFrame(encodeHello(myHello)));
        peer = decodeHello(await readHandshakeFrame(reader));
        params.admit?.(peer);
    } else {
        peer = decodeHello(await readHandshakeFrame(reader));
        params.admit?.(peer);
        await writeFrame(socket, encodeFrame(encodeHello(myHello)));
    }

    if (peer.instanceId === params.instanceId) throw new HandshakeError('Peer presented our own instance id');
    if ((peer.salt[0] & 0x80) === (keys.salt[0] & 0x80)) throw new HandshakeError('Both sides claim the same role');

    const key = await deriveSessionKey(keys, peer.publicKey);
    const session = new SecureSession(key, keys.salt, peer.salt);

    await writeFrame(socket, session.seal(confirmationFor(params.role)));

    let confirmation: Buffer;
    try {
        confirmation = session.open(await readHandshakeFrame(reader));
    } catch (e) {
        if (e instanceof ConnectionError || e instanceof HandshakeError) throw e;
        throw new HandshakeError('Confirmation frame failed to verify', { cause: e });
    }
    if (!confirmation.equals(confirmationFor(otherRole(params.role)))) {
        throw new HandshakeError('Confirmation frame carries the wrong message');
    }

    return { peer, session };
};

const readHandshakeFrame = async (reader: FrameReader): Promise<Buffer> => {
    let body: Buffer | null;
    try {
        body = await reader.next();
    } catch (e) {
        if (e instanceof ChatError) throw new HandshakeError(e.message, { cause: e });
        throw new ConnectionError(`Stream failed during handshake: ${describeError(e)}`, { cause: e });
    }
    if (body === null) throw new ConnectionError('Peer closed the stream during the handshake');
    return body;
};

export const writeFrame = (socket: Duplex, frame: Buffer): Promise<void> => {
    return new Promise((resolve, reject) => {
        socket.write(frame, (err) => {
            if (err) reject(new ConnectionError(`Write failed: ${err.message}`, { cause: err }));
            else resolve();
        });
    });
};
