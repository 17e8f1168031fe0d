import WebSocket from 'ws';
import type { Event, Filter } from 'nostr-tools';
import { ClientError } from './errors.js';
import { createLogger, describeError } from './logger.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// RelayPool – WebSocket relay client (NIP-01 REQ / EVENT / EOSE / OK / CLOSE)
// The core only sees the RelayTransport interface; tests swap in an in-process relay
// ——————————————————————————————————————————————————————————————————————————————————————————

export type NostrEvent = Event;
export type NostrFilter = Filter;

type NostrEventCallback = (event: NostrEvent) => void;

export interface PublishResult {
    eventId: string;
    accepted: string[];
    rejected: Array<{ relay: string; reason: string }>;
}

export interface RelayTransport {
    publish(event: NostrEvent): Promise<PublishResult>;
    subscribe(filter: NostrFilter, onEvent: NostrEventCallback, onEose?: () => void): string;
    unsubscribe(subId: string): void;
    fetchEvents(filter: NostrFilter, timeoutMs?: number): Promise<NostrEvent[]>;
}

interface Subscription {
    filter: NostrFilter;
    onEvent: NostrEventCallback;
    onEose?: () => void;
    eosed: Set<string>;
}

interface PendingPublish {
    waiting: Set<string>;
    result: PublishResult;
    timer: NodeJS.Timeout;
    resolve: (result: PublishResult) => void;
}

const log = createLogger('Relay');

export class RelayPool implements RelayTransport {
    private relays: Map<string, WebSocket> = new Map();
    private subscriptions: Map<string, Subscription> = new Map();
    private pendingPublishes: Map<string, PendingPublish> = new Map();
    private reconnectTimers: Map<string, NodeJS.Timeout> = new Map();
    private relayRetryCount: Map<string, number> = new Map();
    private disposed = false;

    private static readonly MAX_RELAY_RETRIES = 20;
    private static readonly RECONNECT_DELAY_MS = 5000;
    private static readonly CONNECT_TIMEOUT_MS = 10000;
    private static readonly PUBLISH_TIMEOUT_MS = 5000;
    private static readonly FETCH_TIMEOUT_MS = 15000;

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // RELAY CONNECTION
    // ——————————————————————————————————————————————————————————————————————————————————————————

    /** Resolves once every relay has either opened or failed its first attempt */
    async connect(relayUrls: string[]): Promise<number> {
        const attempts = relayUrls
            .filter((url) => !this.relays.has(url))
            .map((url) => this.connectRelay(url));
        await Promise.all(attempts);
        return this.relays.size;
    }

    private connectRelay(url: string): Promise<void> {
        return new Promise((resolve) => {
            let settled = false;
            const done = () => {
                if (settled) { return; }
                settled = true;
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(done, RelayPool.CONNECT_TIMEOUT_MS);

            let ws: WebSocket;
            try {
                ws = new WebSocket(url);
            } catch (err) {
                log.error(`Failed to connect to ${url}:`, describeError(err));
                done();
                return;
            }

            ws.on('open', () => {
                log.info(`Connected to ${url}`);
                this.relayRetryCount.delete(url);
                this.relays.set(url, ws);
                this.resubscribeAll(url, ws);
                done();
            });

            ws.on('message', (data: WebSocket.RawData) => {
                this.handleMessage(url, data.toString());
            });

            ws.on('close', () => {
                done();
                if (this.relays.get(url) === ws) {
                    this.relays.delete(url);
                    log.info(`Disconnected from ${url}`);
                }
                this.settleRelayGone(url);
                if (this.disposed) { return; }
                // Reconnect after 5s (bounded retries)
                const retries = (this.relayRetryCount.get(url) ?? 0) + 1;
                this.relayRetryCount.set(url, retries);
                if (retries > RelayPool.MAX_RELAY_RETRIES) {
                    log.warn(`Relay ${url} exceeded ${RelayPool.MAX_RELAY_RETRIES} retries, giving up`);
                    return;
                }
                const reconnect = setTimeout(() => {
                    this.reconnectTimers.delete(url);
                    this.connectRelay(url).catch((err: unknown) => log.error(`Reconnect to ${url} failed:`, describeError(err)));
                }, RelayPool.RECONNECT_DELAY_MS);
                this.reconnectTimers.set(url, reconnect);
            });

            ws.on('error', (err) => {
                log.error(`Relay error ${url}:`, err.message);
            });
        });
    }

    private handleMessage(url: string, raw: string): void {
        let msg: unknown;
        try {
            msg = JSON.parse(raw);
        } catch {
            log.debug(`Ignoring non-JSON frame from ${url}`);
            return;
        }
        if (!Array.isArray(msg) || typeof msg[0] !== 'string') { return; }

        switch (msg[0]) {
            case 'EVENT': {
                const sub = typeof msg[1] === 'string' ? this.subscriptions.get(msg[1]) : undefined;
                if (!sub || !isEventShape(msg[2])) { return; }
                sub.onEvent(msg[2]);
                return;
            }
            case 'EOSE': {
                if (typeof msg[1] !== 'string') { return; }
                const sub = this.subscriptions.get(msg[1]);
                if (!sub) { return; }
                sub.eosed.add(url);
                if (sub.onEose && this.allEosed(sub)) { sub.onEose(); }
                return;
            }
            case 'OK': {
                if (typeof msg[1] !== 'string') { return; }
                this.settlePublish(msg[1], url, msg[2] === true, typeof msg[3] === 'string' ? msg[3] : '');
                return;
            }
            case 'CLOSED':
            case 'NOTICE':
                log.debug(`${msg[0]} from ${url}:`, String(msg[msg.length - 1]));
                return;
            default:
                return;
        }
    }

    private allEosed(sub: Subscription): boolean {
        for (const url of this.relays.keys()) {
            if (!sub.eosed.has(url)) { return false; }
        }
        return true;
    }

    private sendToRelay(ws: WebSocket, data: string): boolean {
        if (ws.readyState === WebSocket.OPEN) {
            ws.send(data);
            return true;
        }
        return false;
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // SUBSCRIBE
    // ——————————————————————————————————————————————————————————————————————————————————————————

    subscribe(filter: NostrFilter, onEvent: NostrEventCallback, onEose?: () => void): string {
        const subId = 'sub_' + Math.random().toString(36).slice(2, 10);
        this.subscriptions.set(subId, { filter, onEvent, onEose, eosed: new Set() });
        const frame = JSON.stringify(['REQ', subId, filter]);
        for (const ws of this.relays.values()) {
            this.sendToRelay(ws, frame);
        }
        return subId;
    }

    unsubscribe(subId: string): void {
        if (!this.subscriptions.delete(subId)) { return; }
        const frame = JSON.stringify(['CLOSE', subId]);
        for (const ws of this.relays.values()) {
            this.sendToRelay(ws, frame);
        }
    }

    private resubscribeAll(url: string, ws: WebSocket): void {
        for (const [subId, sub] of this.subscriptions) {
            sub.eosed.delete(url);
            this.sendToRelay(ws, JSON.stringify(['REQ', subId, sub.filter]));
        }
    }

    /** One-shot query: collects stored events until every relay sends EOSE or the timer fires */
    fetchEvents(filter: NostrFilter, timeoutMs: number = RelayPool.FETCH_TIMEOUT_MS): Promise<NostrEvent[]> {
        if (this.relays.size === 0) {
            return Promise.reject(new ClientError('TRANSPORT', 'No relay connected'));
        }
        return new Promise((resolve) => {
            const collected: Map<string, NostrEvent> = new Map();
            let settled = false;
            let subId = '';

            const done = () => {
                if (settled) { return; }
                settled = true;
                clearTimeout(timer);
                if (subId) { this.unsubscribe(subId); }
                resolve(Array.from(collected.values()));
            };
            const timer = setTimeout(() => {
                log.debug(`Fetch timed out after ${timeoutMs}ms with ${collected.size} events`);
                done();
            }, timeoutMs);

            subId = this.subscribe(filter, (event) => {
                if (!collected.has(event.id)) { collected.set(event.id, event); }
            }, done);
        });
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // PUBLISH
    // ——————————————————————————————————————————————————————————————————————————————————————————

    publish(event: NostrEvent): Promise<PublishResult> {
        const result: PublishResult = { eventId: event.id, accepted: [], rejected: [] };
        const frame = JSON.stringify(['EVENT', event]);
        const waiting: Set<string> = new Set();
        for (const [url, ws] of this.relays) {
            if (this.sendToRelay(ws, frame)) { waiting.add(url); }
        }
        if (waiting.size === 0) {
            return Promise.reject(new ClientError('TRANSPORT', 'No relay connected; event was not published'));
        }

        return new Promise((resolve, reject) => {
            const finish = (final: PublishResult) => {
                if (final.accepted.length === 0) {
                    const reasons = final.rejected.map((r) => `${r.relay}: ${r.reason}`).join('; ');
                    reject(new ClientError('TRANSPORT', `No relay accepted event ${event.id}${reasons ? ` (${reasons})` : ''}`, { rejected: final.rejected }));
                    return;
                }
                resolve(final);
            };
            const timer = setTimeout(() => {
                const pending = this.pendingPublishes.get(event.id);
                if (!pending) { return; }
                this.pendingPublishes.delete(event.id);
                for (const url of pending.waiting) {
                    pending.result.rejected.push({ relay: url, reason: 'timeout' });
                }
                finish(pending.result);
            }, RelayPool.PUBLISH_TIMEOUT_MS);
            this.pendingPublishes.set(event.id, { waiting, result, timer, resolve: finish });
        });
    }

    private settlePublish(eventId: string, url: string, accepted: boolean, reason: string): void {
        const pending = this.pendingPublishes.get(eventId);
        if (!pending || !pending.waiting.delete(url)) { return; }
        if (accepted) {
            pending.result.accepted.push(url);
        } else {
            pending.result.rejected.push({ relay: url, reason: reason || 'rejected' });
        }
        if (pending.waiting.size === 0) {
            clearTimeout(pending.timer);
            this.pendingPublishes.delete(eventId);
            pending.resolve(pending.result);
        }
    }

    private settleRelayGone(url: string): void {
        for (const eventId of Array.from(this.pendingPublishes.keys())) {
            this.settlePublish(eventId, url, false, 'disconnected');
        }
        for (const sub of this.subscriptions.values()) {
            sub.eosed.delete(url);
            if (sub.onEose && this.relays.size > 0 && this.allEosed(sub)) { sub.onEose(); }
        }
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // CLEANUP
    // ——————————————————————————————————————————————————————————————————————————————————————————

    dispose(): void {
        this.disposed = true;
        for (const timer of this.reconnectTimers.values()) {
            clearTimeout(timer);
        }
        this.reconnectTimers.clear();
        for (const ws of this.relays.values()) {
            ws.close();
        }
        this.relays.clear();
        this.subscriptions.clear();
    }

    get connected(): boolean {
        return this.relays.size > 0;
    }

    getConnectedRelays(): string[] {
        return Array.from(this.relays.keys());
    }
}

function isEventShape(value: unknown): value is NostrEvent {
    if (typeof value !== 'object' || value === null) { return false; }
    return 'id' in value && typeof value.id === 'string'
        && 'pubkey' in value && typeof value.pubkey === 'string'
        && 'created_at' in value && typeof value.created_at === 'number'
        && 'kind' in value && typeof value.kind === 'number'
        && 'tags' in value && Array.isArray(value.tags)
        && 'content' in value && typeof value.content === 'string'
        && 'sig' in value && typeof value.sig === 'string';
}
