// edge-twin-allocator/src/network/CycleFeedServer.ts

import { EventEmitter } from 'events';
import WebSocket, { WebSocketServer } from 'ws';
import { z } from 'zod';
import { CycleDriver } from '../core/CycleDriver';
import { TwinStore } from '../core/TwinStore';
import { Logger } from '../utils/Logger';
import { CycleReport, FeedMessage } from '../types';
import config from '../config';

const inboundMessageSchema = z.object({
    type: z.string(),
    timestamp: z.string().optional()
});

/**
 * Publishes cycle reports to connected dashboards and answers snapshot
 * requests from the twin store.
 */
export class CycleFeedServer extends EventEmitter {
    private logger: Logger;
    private wss: WebSocketServer | null = null;
    private clients: Set<WebSocket> = new Set();
    private messagesSent: number = 0;

    constructor(
        private readonly twinStore: TwinStore,
        private readonly port: number = config.feed.port
    ) {
        super();
        this.logger = Logger.getInstance().child('CycleFeedServer');
    }

    /** Resolves with the bound port once the server is listening. */
    public async start(): Promise<number> {
        const wss = new WebSocketServer({ port: this.port });

        await new Promise<void>((resolve, reject) => {
            wss.once('listening', () => resolve());
            wss.once('error', reject);
        });

        wss.on('connection', (ws: WebSocket) => {
            this.handleNewConnection(ws);
        });

        wss.on('error', (error: Error) => {
            this.logger.error('WebSocket server error', error);
        });

        this.wss = wss;
        const address = wss.address();
        const port = address && typeof address === 'object' ? address.port : this.port;
        this.logger.info(`Cycle feed listening on port ${port}`);
        return port;
    }

    public attach(driver: CycleDriver): void {
        driver.on('cycle_completed', (report: CycleReport) => {
            this.broadcast({
                type: 'cycle_report',
                report,
                timestamp: new Date().toISOString()
            });
        });
    }

    /** Returns the number of clients the message was sent to. */
    public broadcast(message: FeedMessage): number {
        let delivered = 0;
        for (const ws of this.clients) {
            if (this.send(ws, message)) {
                delivered++;
            }
        }
        return delivered;
    }

    public get connectionCount(): number {
        return this.clients.size;
    }

    public get sentCount(): number {
        return this.messagesSent;
    }

    private handleNewConnection(ws: WebSocket): void {
        this.clients.add(ws);
        this.emit('client_connected', this.clients.size);

        ws.on('message', (data: WebSocket.RawData) => {
            this.handleMessage(ws, data);
        });

        ws.on('close', () => {
            this.clients.delete(ws);
        });

        ws.on('error', (error) => {
            this.logger.error('WebSocket connection error', error);
        });
    }

    private handleMessage(ws: WebSocket, data: WebSocket.RawData): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(data.toString());
        } catch (error) {
            this.logger.warn('Discarded malformed feed message', { reason: (error as Error).message });
            this.sendError(ws, 'Malformed message');
            return;
        }

        const message = inboundMessageSchema.safeParse(parsed);
        if (!message.success) {
            this.sendError(ws, 'Message must carry a type');
            return;
        }

        switch (message.data.type) {
            case 'status_request':
                this.send(ws, {
                    type: 'twin_snapshot',
                    snapshot: this.twinStore.snapshot(),
                    stats: this.twinStore.stats(),
                    timestamp: new Date().toISOString()
                });
                break;
            default:
                this.logger.warn(`Unknown message type: ${message.data.type}`);
        }
    }

    private sendError(ws: WebSocket, reason: string): void {
        this.send(ws, { type: 'error', reason, timestamp: new Date().toISOString() });
    }

    private send(ws: WebSocket, message: FeedMessage): boolean {
        if (ws.readyState !== WebSocket.OPEN) {
            return false;
        }
        try {
            ws.send(JSON.stringify(message));
            this.messagesSent++;
            return true;
        } catch (error) {
            this.logger.error('Failed to send message', error as Error);
            return false;
        }
    }

    public async stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) return;

        for (const ws of this.clients) {
            ws.terminate();
        }
        this.clients.clear();

        await new Promise<void>((resolve, reject) => {
            wss.close(error => (error ? reject(error) : resolve()));
        });
        this.wss = null;
        this.logger.info('Cycle feed stopped');
    }
}
