import { Readable } from 'stream';
import { ProtocolError } from '../core/errors';

export const LENGTH_PREFIX_BYTES = 4;
export const SALT_BYTES = 4;
export const COUNTER_BYTES = 8;
export const NONCE_BYTES = SALT_BYTES + COUNTER_BYTES;
export const TAG_BYTES = 16;

// Headroom above the payload limit for the envelope header, nonce and tag.
export const FRAME_OVERHEAD_LIMIT = 64 * 1024;

export const maxFrameLength = (maxPayloadBytes: number): number => maxPayloadBytes + FRAME_OVERHEAD_LIMIT;

export const lengthPrefix = (bodyLength: number): Buffer => {
    const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
    prefix.writeUInt32BE(bodyLength, 0);
    return prefix;
};

export const encodeFrame = (body: Buffer): Buffer => Buffer.concat([lengthPrefix(body.length), body]);

/**
 * Incremental length-prefix decoder: `[ Length (4, BE) | Body (Length) ]`.
 *
 * The declared length is checked against the limit as soon as the prefix is
 * complete, before any body bytes are buffered for it. After a rejected
 * prefix the decoder stays failed; the connection is expected to be dropped.
 */
export class FrameDecoder {
    private chunks: Buffer[] = [];
    private buffered = 0;
    private expected: number | null = null;
    private failure: ProtocolError | null = null;

    constructor(private maxLength: number) { }

    public get bufferedBytes(): number {
        return this.buffered;
    }

    public setMaxLength(maxLength: number): void {
        this.maxLength = maxLength;
    }

    public *push(chunk: Buffer): Generator<Buffer> {
        if (this.failure) throw this.failure;
        if (chunk.length > 0) {
            this.chunks.push(chunk);
            this.buffered += chunk.length;
        }

        while (true) {
            if (this.expected === null) {
                if (this.buffered < LENGTH_PREFIX_BYTES) return;
                const declared = this.consume(LENGTH_PREFIX_BYTES).readUInt32BE(0);
                if (declared > this.maxLength) {
                    this.failure = new ProtocolError(`Frame declares ${declared} bytes, limit is ${this.maxLength}`);
                    this.chunks = [];
                    this.buffered = 0;
                    throw this.failure;
                }
                this.expected = declared;
            }

            if (this.buffered < this.expected) return;
            const body = this.consume(this.expected);
            this.expected = null;
            yield body;
        }
    }

    private consume(length: number): Buffer {
        const parts: Buffer[] = [];
        let needed = length;
        while (needed > 0) {
            const head = this.chunks[0];
            if (head.length <= needed) {
                parts.push(head);
                this.chunks.shift();
                needed -= head.length;
            } else {
                parts.push(head.subarray(0, needed));
                this.chunks[0] = head.subarray(needed);
                needed = 0;
            }
        }
        this.buffered -= length;
        return parts.length === 1 ? parts[0] : Buffer.concat(parts, length);
    }
}

/**
 * Pull-style frame reader over a byte stream. `next()` resolves with the next
 * frame body, or null once the stream has ended. Frames are parsed one per
 * call, so a limit raised between calls applies to every frame not yet
 * handed out, even one that arrived in the same chunk as the previous frame.
 */
export class FrameReader {
    private iterator: AsyncIterator<unknown>;
    private frames: Iterator<Buffer> | null = null;
    private failure: unknown = null;
    private ended = false;

    constructor(stream: Readable, private decoder: FrameDecoder) {
        this.iterator = stream[Symbol.asyncIterator]();
    }

    public setMaxLength(maxLength: number): void {
        this.decoder.setMaxLength(maxLength);
    }

    public async next(): Promise<Buffer | null> {
        while (true) {
            if (this.failure) throw this.failure;

            if (this.frames) {
                let step: IteratorResult<Buffer>;
                try {
                    step = this.frames.next();
                } catch (err) {
                    this.frames = null;
                    this.failure = err;
                    throw err;
                }
                if (!step.done) return step.value;
                this.frames = null;
            }

            if (this.ended) return null;
            const { done, value } = await this.iterator.next();
            if (done) {
                this.ended = true;
                continue;
            }

            const chunk = Buffer.isBuffer(value) ? value : Buffer.from(String(value));
            this.frames = this.decoder.push(chunk);
        }
    }
}
