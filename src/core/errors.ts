export type ChatErrorCode =
    | 'DISCOVERY'
    | 'CONNECTION'
    | 'HANDSHAKE'
    | 'CRYPTO'
    | 'PROTOCOL'
    | 'RESOURCE';

export class ChatError extends Error {
    constructor(public readonly code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Multicast interface could not be opened, or an announcement failed. */
export class DiscoveryError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DISCOVERY', message, options);
    }
}

/** Refused, reset, timed out or abandoned stream connection. */
export class ConnectionError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONNECTION', message, options);
    }
}

export class HandshakeError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('HANDSHAKE', message, options);
    }
}

export class CryptoError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CRYPTO', message, options);
    }
}

export class ProtocolError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('PROTOCOL', message, options);
    }
}

/** Outbound queue full past its timeout. */
export class ResourceError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('RESOURCE', message, options);
    }
}

export const describeError = (err: unknown): string => {
    if (err instanceof Error) return err.message;
    return String(err);
};

export const toConnectionError = (err: unknown, context: string): ChatError => {
    if (err instanceof ChatError) return err;
    return new ConnectionError(`${context}: ${describeError(err)}`, { cause: err });
};
