import { ProtocolError } from '../core/errors';
import { MessageEnvelope, MessageKind, PeerIdentity } from '../core/types';

// Wire code is the position in this list, starting at 1.
const KINDS: readonly MessageKind[] = ['text', 'image', 'video', 'control'];

export const isMessageKind = (value: unknown): value is MessageKind => KINDS.some((kind) => kind === value);

const kindCode = (kind: MessageKind): number => KINDS.indexOf(kind) + 1;

const kindFromCode = (code: number): MessageKind | undefined => {
    return code >= 1 && code <= KINDS.length ? KINDS[code - 1] : undefined;
};

export interface OutgoingEnvelope {
    sender: PeerIdentity;
    kind: MessageKind;
    payload: Buffer;
}

// [ Kind (1) | NameLen (1) | Name | IdLen (1) | Id | PayloadLen (4, BE) | Payload ]
export const encodeEnvelope = (envelope: OutgoingEnvelope, maxPayloadBytes: number): Buffer => {
    if (!isMessageKind(envelope.kind)) throw new ProtocolError(`Unknown message kind: ${String(envelope.kind)}`);
    if (envelope.payload.length > maxPayloadBytes) {
        throw new ProtocolError(`Payload of ${envelope.payload.length} bytes exceeds the ${maxPayloadBytes} byte limit`);
    }

    const name = Buffer.from(envelope.sender.displayName, 'utf8');
    const id = Buffer.from(envelope.sender.instanceId, 'utf8');
    if (name.length > 255 || id.length > 255) throw new ProtocolError('Sender identity does not fit in an envelope');

    const header = Buffer.alloc(1 + 1 + name.length + 1 + id.length + 4);
    let offset = header.writeUInt8(kindCode(envelope.kind), 0);
    offset = header.writeUInt8(name.length, offset);
    offset += name.copy(header, offset);
    offset = header.writeUInt8(id.length, offset);
    offset += id.copy(header, offset);
    header.writeUInt32BE(envelope.payload.length, offset);

    return Buffer.concat([header, envelope.payload]);
};

/**
 * Inverse of `encodeEnvelope`. The sender's address is not on the wire; the
 * caller fills it in from the connection the bytes arrived on.
 */
export const decodeEnvelope = (bytes: Buffer, maxPayloadBytes: number): MessageEnvelope => {
    let offset = 0;
    const need = (count: number, what: string) => {
        if (bytes.length < offset + count) throw new ProtocolError(`Truncated envelope: missing ${what}`);
    };

    need(1, 'kind');
    const kind = kindFromCode(bytes.readUInt8(offset));
    if (!kind) throw new ProtocolError(`Unknown message kind code ${bytes.readUInt8(offset)}`);
    offset += 1;

    need(1, 'name length');
    const nameLength = bytes.readUInt8(offset);
    offset += 1;
    need(nameLength, 'name');
    const displayName = bytes.toString('utf8', offset, offset + nameLength);
    offset += nameLength;

    need(1, 'id length');
    const idLength = bytes.readUInt8(offset);
    offset += 1;
    need(idLength, 'instance id');
    const instanceId = bytes.toString('utf8', offset, offset + idLength);
    offset += idLength;

    need(4, 'payload length');
    const payloadLength = bytes.readUInt32BE(offset);
    offset += 4;
    if (payloadLength > maxPayloadBytes) {
        throw new ProtocolError(`Envelope declares ${payloadLength} payload bytes, limit is ${maxPayloadBytes}`);
    }
    if (bytes.length !== offset + payloadLength) throw new ProtocolError('Envelope length does not match its payload length');

    return {
        sender: { displayName, address: '', instanceId },
        kind,
        payload: bytes.subarray(offset),
        payloadLength,
    };
};

export type ControlMessage = { op: 'bye' };

export const encodeControl = (message: ControlMessage): Buffer => Buffer.from(JSON.stringify(message), 'utf8');

export const decodeControl = (payload: Buffer): ControlMessage => {
    let data: unknown;
    try {
        data = JSON.parse(payload.toString('utf8'));
    } catch (e) {
        throw new ProtocolError('Control payload is not JSON', { cause: e });
    }
    if (typeof data === 'object' && data !== null && 'op' in data && data.op === 'bye') return { op: 'bye' };
    throw new ProtocolError('Unknown control operation');
};
