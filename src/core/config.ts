import { randomBytes } from 'crypto';

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) && value >= 0 ? value : fallback;
};

const readString = (env: Env, name: string, fallback: string): string => {
    const raw = env[name];
    return raw && raw.trim() !== '' ? raw.trim() : fallback;
};

/** Built-in defaults, overridden by LANCHAT_* variables. */
export const loadConfig = (env: Env = process.env) => ({
    APP: {
        NAME: 'lanchat',
        PROTOCOL_VERSION: 1,
    },
    NETWORK: {
        MULTICAST_IP: readString(env, 'LANCHAT_MULTICAST_IP', '239.255.42.99'),
        DISCOVERY_PORT: readNumber(env, 'LANCHAT_DISCOVERY_PORT', 6000),
        DEFAULT_TCP_PORT: readNumber(env, 'LANCHAT_TCP_PORT', 50000),
        ANNOUNCE_INTERVAL_MS: readNumber(env, 'LANCHAT_ANNOUNCE_INTERVAL_MS', 5000),
        PEER_STALE_MS: readNumber(env, 'LANCHAT_PEER_STALE_MS', 15000), // 3 missed announcements
        PEER_EVICT_MS: readNumber(env, 'LANCHAT_PEER_EVICT_MS', 30000),
        HANDSHAKE_TIMEOUT_MS: readNumber(env, 'LANCHAT_HANDSHAKE_TIMEOUT_MS', 10000),
        CONNECT_DEFER_MS: readNumber(env, 'LANCHAT_CONNECT_DEFER_MS', 7500),
        RETRY_BASE_MS: 1000,
        RETRY_MAX_MS: 30000,
    },
    MESSAGING: {
        MAX_PAYLOAD_BYTES: readNumber(env, 'LANCHAT_MAX_PAYLOAD_MB', 50) * 1024 * 1024,
        OUTBOUND_QUEUE_SIZE: readNumber(env, 'LANCHAT_OUTBOUND_QUEUE_SIZE', 32),
        SEND_TIMEOUT_MS: readNumber(env, 'LANCHAT_SEND_TIMEOUT_MS', 5000),
    },
    LOG: {
        LEVEL: readString(env, 'LANCHAT_LOG_LEVEL', 'info'),
        HISTORY: 200,
    },
});

export type Config = ReturnType<typeof loadConfig>;

export const CONFIG: Config = loadConfig();

export const generateInstanceId = (): string => {
    return randomBytes(16).toString('hex');
};
