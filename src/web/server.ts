import express, { Request, Response } from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import * as http from 'http';
import { CONFIG } from '../core/config';
import { describeError, ProtocolError } from '../core/errors';
import { LogEntry } from '../core/logger';
import { ChatNode } from '../core/node';
import { InboundMessage, MessageKind, PeerIdentity, PeerRecord, SendOutcome } from '../core/types';
import { parsePort } from '../network/client';

export type DashboardEventType = 'MESSAGE' | 'PEER_CONNECTED' | 'PEER_LOST' | 'LOG';

export interface DashboardEvent {
    type: DashboardEventType;
    payload: unknown;
    timestamp: number;
}

export const DASHBOARD_HISTORY = 100;

const peerView = (record: PeerRecord) => ({
    instanceId: record.identity.instanceId,
    displayName: record.identity.displayName,
    address: record.identity.address,
    port: record.port,
    status: record.status,
    lastSeen: record.lastSeen,
});

const identityView = (peer: PeerIdentity) => ({
    instanceId: peer.instanceId,
    displayName: peer.displayName,
    address: peer.address,
});

const messageView = (message: InboundMessage) => ({
    from: identityView(message.peer),
    kind: message.envelope.kind,
    size: message.envelope.payloadLength,
    content: message.envelope.kind === 'text' ? message.envelope.payload.toString('utf8') : undefined,
    receivedAt: message.receivedAt,
});

const outcomeView = (outcome: SendOutcome) => ({
    peer: identityView(outcome.peer),
    ok: outcome.ok,
    error: outcome.ok ? undefined : outcome.error.message,
});

interface OutgoingRequest {
    kind: MessageKind;
    payload: Buffer;
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Validates a POST /api/messages body into something the node can send. */
export const parseOutgoing = (body: unknown): OutgoingRequest => {
    if (!isRecord(body)) throw new ProtocolError('Body must be a JSON object');
    const { kind } = body;

    if (kind === 'text') {
        if (typeof body.content !== 'string' || body.content.length === 0) {
            throw new ProtocolError('Text messages need a non-empty "content" string');
        }
        return { kind, payload: Buffer.from(body.content, 'utf8') };
    }
    if (kind === 'image' || kind === 'video') {
        if (typeof body.data !== 'string' || body.data.length === 0 || !BASE64.test(body.data)) {
            throw new ProtocolError(`${kind} messages need base64 "data"`);
        }
        return { kind, payload: Buffer.from(body.data, 'base64') };
    }
    throw new ProtocolError('"kind" must be one of text, image, video');
};

interface ConnectRequest {
    ip: string;
    port: number;
}

/** Validates a POST /api/connect body; the port defaults to the standard one. */
export const parseConnect = (body: unknown): ConnectRequest => {
    if (!isRecord(body)) throw new ProtocolError('Body must be a JSON object');
    const { ip } = body;
    if (typeof ip !== 'string' || ip.trim() === '') throw new ProtocolError('"ip" is required');

    if (body.port === undefined) return { ip: ip.trim(), port: CONFIG.NETWORK.DEFAULT_TCP_PORT };
    const port = parsePort(body.port);
    if (port === undefined) throw new ProtocolError('"port" must be between 1 and 65535');
    return { ip: ip.trim(), port };
};

/**
 * Browser view of a running node: REST for state and sending, a WebSocket
 * feed for live events. Listens on the node's TCP port + 1000 by default.
 */
export class WebDashboard {
    private app = express();
    private server: http.Server;
    private wss: WebSocketServer;
    private clients: Set<WebSocket> = new Set();
    private events: DashboardEvent[] = [];

    constructor(private node: ChatNode) {
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupExpress();
        this.setupWebSocket();
        this.hookNodeEvents();
    }

    /** Resolves with the bound port; pass 0 for an ephemeral one. */
    public start(port: number = this.node.port + 1000, host?: string): Promise<number> {
        return new Promise<number>((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.server.once('error', onError);
            this.server.listen(port, host, () => {
                this.server.off('error', onError);
                const bound = this.boundPort();
                this.node.logger.info('WEB UI', `Dashboard running at \x1b[4mhttp://localhost:${bound}\x1b[0m`);
                resolve(bound);
            });
        });
    }

    public stop(): Promise<void> {
        for (const client of this.clients) client.terminate();
        this.clients.clear();
        return new Promise<void>((resolve, reject) => {
            this.wss.close();
            if (!this.server.listening) return resolve();
            this.server.close((err) => (err ? reject(err) : resolve()));
        });
    }

    public history(): DashboardEvent[] {
        return [...this.events];
    }

    private boundPort(): number {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address.port : 0;
    }

    private setupExpress() {
        this.app.use(cors());
        // base64 grows media by a third; the rest is room for the JSON around it
        this.app.use(express.json({ limit: Math.ceil((this.node.broadcaster.maxPayload * 4) / 3) + 64 * 1024 }));

        this.app.get('/api/info', (_req: Request, res: Response) => {
            const connected = this.node.connectedPeers().length;
            res.json({
                instanceId: this.node.identity.instanceId,
                displayName: this.node.identity.displayName,
                address: this.node.identity.address,
                port: this.node.port,
                connectedPeers: connected,
                networkSize: connected + 1,
            });
        });

        this.app.get('/api/peers', (_req: Request, res: Response) => {
            res.json(this.node.peers().map(peerView));
        });

        this.app.post('/api/messages', async (req: Request, res: Response) => {
            let outgoing: OutgoingRequest;
            try {
                outgoing = parseOutgoing(req.body);
            } catch (err) {
                res.status(400).json({ error: describeError(err) });
                return;
            }

            try {
                const outcomes = await this.node.send(outgoing.kind, outgoing.payload);
                res.json({ outcomes: outcomes.map(outcomeView) });
            } catch (err) {
                res.status(err instanceof ProtocolError ? 413 : 500).json({ error: describeError(err) });
            }
        });

        this.app.post('/api/connect', async (req: Request, res: Response) => {
            let target: ConnectRequest;
            try {
                target = parseConnect(req.body);
            } catch (err) {
                res.status(400).json({ error: describeError(err) });
                return;
            }

            try {
                const peer = await this.node.connect(target.ip, target.port);
                res.json({ peer: identityView(peer) });
            } catch (err) {
                res.status(502).json({ error: describeError(err) });
            }
        });
    }

    private setupWebSocket() {
        this.wss.on('connection', (ws) => {
            this.clients.add(ws);

            ws.send(JSON.stringify({
                type: 'INIT',
                instanceId: this.node.identity.instanceId,
                displayName: this.node.identity.displayName,
                peers: this.node.peers().map(peerView),
                events: this.events,
            }));

            ws.on('close', () => this.clients.delete(ws));
        });
    }

    private broadcast(type: DashboardEventType, payload: unknown) {
        const event: DashboardEvent = { type, payload, timestamp: Date.now() };
        this.events.push(event);
        if (this.events.length > DASHBOARD_HISTORY) this.events.shift();

        const frame = JSON.stringify(event);
        for (const client of this.clients) {
            if (client.readyState === WebSocket.OPEN) client.send(frame);
        }
    }

    private hookNodeEvents() {
        this.node.on('peer:connected', (record: PeerRecord) => this.broadcast('PEER_CONNECTED', peerView(record)));
        this.node.on('peer:lost', (record: PeerRecord) => this.broadcast('PEER_LOST', peerView(record)));
        this.node.on('message', (message: InboundMessage) => this.broadcast('MESSAGE', messageView(message)));
        this.node.logger.on('entry', (entry: LogEntry) => this.broadcast('LOG', `[${entry.tag}] ${entry.message}`));
    }
}
