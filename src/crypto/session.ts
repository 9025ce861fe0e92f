import * as crypto from 'crypto';
import { CryptoError, ProtocolError } from '../core/errors';
import { NONCE_BYTES, SALT_BYTES, TAG_BYTES, lengthPrefix } from './frame';

export type Role = 'initiator' | 'responder';

export const SESSION_KEY_BYTES = 32;
const MAX_COUNTER = 0xffff_ffff_ffff_ffffn;

/**
 * AES-256-GCM framing under one per-connection key.
 *
 * Frame: [ Length (4) | Salt (4) | Counter (8) | Ciphertext | Tag (16) ]
 *
 * The nonce is the sender's salt followed by its frame counter. Salts carry
 * the sender's role in their top bit, so the two directions never share a
 * nonce. Length prefix and nonce are authenticated as associated data.
 * `seal` is only ever called from the connection's write loop and `open`
 * from its read loop.
 */
export class SecureSession {
    private sendCounter = 0n;
    private recvCounter = 0n;

    constructor(private key: Buffer, private sendSalt: Buffer, private recvSalt: Buffer) {
        if (key.length !== SESSION_KEY_BYTES) throw new CryptoError('Session key must be 256 bits');
        if (sendSalt.length !== SALT_BYTES || recvSalt.length !== SALT_BYTES) {
            throw new CryptoError(`Nonce salts must be ${SALT_BYTES} bytes`);
        }
    }

    public get framesSent(): bigint {
        return this.sendCounter;
    }

    public get framesReceived(): bigint {
        return this.recvCounter;
    }

    /** Returns a complete frame, length prefix included. */
    public seal(plaintext: Buffer): Buffer {
        if (this.sendCounter > MAX_COUNTER) throw new CryptoError('Send nonce space exhausted');

        const nonce = buildNonce(this.sendSalt, this.sendCounter);
        this.sendCounter += 1n;

        const prefix = lengthPrefix(NONCE_BYTES + plaintext.length + TAG_BYTES);
        const cipher = crypto.createCipheriv('aes-256-gcm', this.key, nonce);
        cipher.setAAD(Buffer.concat([prefix, nonce]));

        const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
        const tag = cipher.getAuthTag();

        return Buffer.concat([prefix, nonce, ciphertext, tag]);
    }

    /** Takes a frame body (everything after the length prefix). */
    public open(body: Buffer): Buffer {
        if (body.length < NONCE_BYTES + TAG_BYTES) {
            throw new ProtocolError('Encrypted frame is too short');
        }

        const nonce = body.subarray(0, NONCE_BYTES);
        const salt = nonce.subarray(0, SALT_BYTES);
        const counter = nonce.readBigUInt64BE(SALT_BYTES);

        if (!salt.equals(this.recvSalt)) throw new CryptoError('Frame nonce salt does not match the session');
        if (counter !== this.recvCounter) {
            throw new CryptoError(`Unexpected frame counter ${counter}, expected ${this.recvCounter}`);
        }

        const ciphertext = body.subarray(NONCE_BYTES, body.length - TAG_BYTES);
        const tag = body.subarray(body.length - TAG_BYTES);

        const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, nonce);
        decipher.setAAD(Buffer.concat([lengthPrefix(body.length), nonce]));
        decipher.setAuthTag(tag);

        let plaintext: Buffer;
        try {
            plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
        } catch (e) {
            throw new CryptoError('AES-GCM decryption failed (integrity check failed)', { cause: e });
        }

        this.recvCounter += 1n;
        return plaintext;
    }
}

export const buildNonce = (salt: Buffer, counter: bigint): Buffer => {
    const nonce = Buffer.alloc(NONCE_BYTES);
    salt.copy(nonce, 0, 0, SALT_BYTES);
    nonce.writeBigUInt64BE(counter, SALT_BYTES);
    return nonce;
};
