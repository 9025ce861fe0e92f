import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG } from '../core/config';
import { describeError } from '../core/errors';
import { Logger, shortId } from '../core/logger';
import { ChatNode } from '../core/node';
import { InboundMessage, MessageKind, SendOutcome } from '../core/types';
import { parsePort } from '../network/client';
import { listIPv4Interfaces } from '../network/interfaces';

export const USAGE = 'Usage: lanchat <name> [--port N] [--host ADDR] [--connect HOST:PORT]... [--web]';

export interface Endpoint {
    host: string;
    port: number;
}

export interface CliArgs {
    name: string;
    port: number;
    /** Interface to bind; all of them when undefined. */
    host: string | undefined;
    connect: Endpoint[];
    web: boolean;
}

/** `host:port`, with IPv6 hosts in brackets (`[fe80::1]:50000`). */
export const parseEndpoint = (text: string): Endpoint => {
    const match = /^(?:\[([^\]]+)\]|([^:\s]+)):(\d+)$/.exec(text.trim());
    const port = match ? parsePort(match[3]) : undefined;
    const host = match ? match[1] ?? match[2] : undefined;
    if (!host || port === undefined) throw new Error(`Invalid address: ${text} (expected host:port)`);
    return { host, port };
};

export const parseArgs = (argv: string[]): CliArgs => {
    let name: string | undefined;
    let port: number = CONFIG.NETWORK.DEFAULT_TCP_PORT;
    let host: string | undefined;
    const connect: Endpoint[] = [];
    let web = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--web') {
            web = true;
        } else if (arg === '--port') {
            const raw = argv[++i];
            const value = Number(raw);
            if (raw === undefined || !Number.isInteger(value) || value < 0 || value > 65535) {
                throw new Error(`Invalid port: ${raw ?? '(missing)'}\n${USAGE}`);
            }
            port = value;
        } else if (arg === '--host') {
            const raw = argv[++i];
            if (raw === undefined || raw.trim() === '') throw new Error(`Missing value for --host\n${USAGE}`);
            host = raw.trim();
        } else if (arg === '--connect') {
            const raw = argv[++i];
            if (raw === undefined) throw new Error(`Missing value for --connect\n${USAGE}`);
            connect.push(parseEndpoint(raw));
        } else if (arg.startsWith('--')) {
            throw new Error(`Unknown option: ${arg}\n${USAGE}`);
        } else if (name === undefined) {
            name = arg;
        } else {
            throw new Error(`Unexpected argument: ${arg}\n${USAGE}`);
        }
    }

    if (name === undefined) throw new Error(USAGE);
    return { name, port, host, connect, web };
};

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatTimestamp = (date: Date): string => {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
};

export const formatBytes = (bytes: number): string => {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
    return `${(bytes / 1024 / 1024).toFixed(1)} MiB`;
};

const NAME_COLORS = ['\x1b[33m', '\x1b[34m', '\x1b[35m', '\x1b[36m', '\x1b[91m', '\x1b[92m'];

const colorFor = (instanceId: string): string => {
    let sum = 0;
    for (const ch of instanceId) sum = (sum + ch.charCodeAt(0)) % 997;
    return NAME_COLORS[sum % NAME_COLORS.length];
};

// Everything below 0x20 except tab and newline, plus DEL and the C1 block.
const UNPRINTABLE = /[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g;

export const renderInbound = (message: InboundMessage): string => {
    const { envelope, peer } = message;
    const stamp = formatTimestamp(new Date(message.receivedAt));
    const sender = `${colorFor(peer.instanceId)}${peer.displayName}\x1b[0m`;

    if (envelope.kind === 'text') {
        const text = envelope.payload.toString('utf8').replace(UNPRINTABLE, '');
        return `[${stamp}] ${sender}: ${text}`;
    }
    return `[${stamp}] ${sender} sent ${envelope.kind === 'image' ? 'an image' : 'a video'} (${formatBytes(envelope.payloadLength)})`;
};

export type LineResult = 'continue' | 'quit';

export class CLI {
    constructor(
        private node: ChatNode,
        private logger: Logger = node.logger,
        private print: (line: string) => void = (line) => console.log(line),
    ) {}

    public banner(): void {
        this.print(`\n\x1b[36m=== ${CONFIG.APP.NAME} ===\x1b[0m`);
        this.print(`You are \x1b[1m${this.node.identity.displayName}\x1b[0m (${shortId(this.node.identity.instanceId)}), TCP/${this.node.port}`);
        for (const iface of listIPv4Interfaces()) {
            this.print(`  -> ${iface.name}: ${iface.address}`);
        }
        this.print(`Type a message and press enter. Commands: /peers, /connect <host> <port>, /image <path>, /video <path>, /quit${os.EOL}`);
    }

    public async handleLine(line: string): Promise<LineResult> {
        const input = line.trim();
        if (input === '') return 'continue';
        if (input === '/quit' || input === 'exit') return 'quit';

        if (input === '/peers') {
            this.showPeers();
            return 'continue';
        }

        const connect = /^\/connect(?:\s+(.*))?$/.exec(input);
        if (connect) {
            await this.connectTo(connect[1]?.trim() ?? '');
            return 'continue';
        }

        const media = /^\/(image|video)(?:\s+(.*))?$/.exec(input);
        if (media) {
            const kind: MessageKind = media[1] === 'image' ? 'image' : 'video';
            const filePath = media[2]?.trim();
            if (!filePath) {
                this.logger.error('ERROR', `Usage: /${kind} <path>`);
                return 'continue';
            }
            await this.sendFile(kind, filePath);
            return 'continue';
        }

        if (input.startsWith('/')) {
            this.logger.error('ERROR', `Unknown command '${input.split(/\s+/)[0]}'`);
            return 'continue';
        }

        await this.sendText(input);
        return 'continue';
    }

    public showPeers(): void {
        const peers = this.node.connectedPeers();
        this.print(`\n\x1b[36m=== Connected Peers (${peers.length}) ===\x1b[0m`);
        for (const peer of peers) {
            this.print(`- ${peer.displayName} \x1b[33m${shortId(peer.instanceId)}\x1b[0m (${peer.address})`);
        }
        this.print('');
    }

    /** Accepts `host port` or `host:port`. */
    public async connectTo(target: string): Promise<void> {
        let endpoint: Endpoint;
        try {
            const [host, port, ...rest] = target.split(/\s+/);
            if (port === undefined) endpoint = parseEndpoint(host);
            else if (rest.length > 0) throw new Error('too many arguments');
            else endpoint = parseEndpoint(host.includes(':') && !host.startsWith('[') ? `[${host}]:${port}` : `${host}:${port}`);
        } catch {
            this.logger.error('ERROR', 'Usage: /connect <host> <port>');
            return;
        }
        await this.connectEndpoint(endpoint);
    }

    public async connectEndpoint(endpoint: Endpoint): Promise<void> {
        try {
            const peer = await this.node.connect(endpoint.host, endpoint.port);
            this.logger.info('CONNECT', `Connected to ${peer.displayName} (${shortId(peer.instanceId)})`);
        } catch (err) {
            this.logger.error('ERROR', `Cannot connect to ${endpoint.host}:${endpoint.port}: ${describeError(err)}`);
        }
    }

    public showInbound(message: InboundMessage): void {
        this.print(renderInbound(message));
    }

    public async sendText(text: string): Promise<void> {
        await this.deliver('text', Buffer.from(text, 'utf8'));
    }

    public async sendFile(kind: 'image' | 'video', filePath: string): Promise<void> {
        const resolved = path.resolve(filePath);
        let payload: Buffer;
        try {
            const stat = await fs.stat(resolved);
            if (!stat.isFile()) throw new Error(`${filePath} is not a file`);
            const limit = this.node.broadcaster.maxPayload;
            if (stat.size > limit) throw new Error(`${filePath} is ${formatBytes(stat.size)}, limit is ${formatBytes(limit)}`);
            payload = await fs.readFile(resolved);
        } catch (err) {
            this.logger.error('ERROR', `Cannot send ${kind}: ${describeError(err)}`);
            return;
        }
        await this.deliver(kind, payload);
    }

    private async deliver(kind: MessageKind, payload: Buffer): Promise<void> {
        let outcomes: SendOutcome[];
        try {
            outcomes = await this.node.send(kind, payload);
        } catch (err) {
            this.logger.error('ERROR', `Message not sent: ${describeError(err)}`);
            return;
        }

        if (outcomes.length === 0) {
            this.logger.warn('SEND', 'No connected peers, message not delivered');
            return;
        }
        for (const outcome of outcomes) {
            if (!outcome.ok) {
                this.logger.warn('SEND', `Not delivered to ${outcome.peer.displayName} (${shortId(outcome.peer.instanceId)}): ${outcome.error.message}`);
            }
        }
    }
}
