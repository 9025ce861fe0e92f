export interface PeerIdentity {
    readonly displayName: string;
    readonly address: string;
    readonly instanceId: string;
}

export interface PeerSighting {
    identity: PeerIdentity;
    address: string;
    port: number;
    seenAt: number;
}

export type PeerStatus = 'discovered' | 'connecting' | 'connected' | 'lost';

export interface PeerRecord {
    readonly identity: PeerIdentity;
    readonly port: number;
    readonly status: PeerStatus;
    readonly lastSeen: number;
    readonly discoveredAt: number;
    readonly lostAt?: number;
}

export type MessageKind = 'text' | 'image' | 'video' | 'control';

export interface MessageEnvelope {
    sender: PeerIdentity;
    kind: MessageKind;
    payload: Buffer;
    payloadLength: number;
}

export interface InboundMessage {
    peer: PeerIdentity;
    envelope: MessageEnvelope;
    receivedAt: number;
}

export type SendOutcome =
    | { peer: PeerIdentity; ok: true }
    | { peer: PeerIdentity; ok: false; error: Error };
