import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import WebSocket, { WebSocketServer } from 'ws';
import { finalizeEvent, generateSecretKey, matchFilter } from 'nostr-tools';
import { RelayPool, type NostrEvent, type NostrFilter } from '../src/relayPool.js';
import { rejectionOf } from './support/helpers.js';

/** Minimal NIP-01 relay on a local port */
class MiniRelay {
    readonly events: NostrEvent[] = [];
    private readonly subs: Map<WebSocket, Map<string, NostrFilter>> = new Map();

    private constructor(private readonly server: WebSocketServer) {
        server.on('connection', (socket) => {
            this.subs.set(socket, new Map());
            socket.on('message', (data) => this.handle(socket, data.toString()));
            socket.on('close', () => this.subs.delete(socket));
        });
    }

    static start(): Promise<MiniRelay> {
        return new Promise((resolve) => {
            const server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
            server.on('listening', () => resolve(new MiniRelay(server)));
        });
    }

    get url(): string {
        const address = this.server.address();
        return typeof address === 'string' ? address : `ws://127.0.0.1:${address.port}`;
    }

    private handle(socket: WebSocket, raw: string): void {
        const msg: unknown = JSON.parse(raw);
        if (!Array.isArray(msg)) { return; }
        const [type, first, second] = msg;
        if (type === 'EVENT' && typeof first === 'object' && first !== null) {
            const event: NostrEvent = first;
            if (event.content === 'reject-me') {
                socket.send(JSON.stringify(['OK', event.id, false, 'blocked: test']));
                return;
            }
            this.events.push(event);
            socket.send(JSON.stringify(['OK', event.id, true, '']));
            for (const [client, filters] of this.subs) {
                for (const [subId, filter] of filters) {
                    if (matchFilter(filter, event)) { client.send(JSON.stringify(['EVENT', subId, event])); }
                }
            }
        } else if (type === 'REQ' && typeof first === 'string') {
            const filter: NostrFilter = second;
            this.subs.get(socket)?.set(first, filter);
            for (const event of this.events.filter((e) => matchFilter(filter, e))) {
                socket.send(JSON.stringify(['EVENT', first, event]));
            }
            socket.send(JSON.stringify(['EOSE', first]));
        } else if (type === 'CLOSE' && typeof first === 'string') {
            this.subs.get(socket)?.delete(first);
        }
    }

    stop(): Promise<void> {
        for (const client of this.server.clients) { client.terminate(); }
        return new Promise((resolve) => this.server.close(() => resolve()));
    }
}

function note(content: string): NostrEvent {
    return finalizeEvent({ kind: 1, created_at: 1700000000, tags: [['t', 'relay-test']], content }, generateSecretKey());
}

describe('RelayPool', () => {
    let relay: MiniRelay;
    let pool: RelayPool;

    beforeEach(async () => {
        relay = await MiniRelay.start();
        pool = new RelayPool();
    });

    afterEach(async () => {
        pool.dispose();
        await relay.stop();
    });

    it('connects and reports the relay', async () => {
        expect(await pool.connect([relay.url])).toBe(1);
        expect(pool.connected).toBe(true);
        expect(pool.getConnectedRelays()).toEqual([relay.url]);
    });

    it('publishes and reads back stored events', async () => {
        await pool.connect([relay.url]);
        const event = note('hello relay');
        expect(await pool.publish(event)).toEqual({ eventId: event.id, accepted: [relay.url], rejected: [] });

        const fetched = await pool.fetchEvents({ kinds: [1], '#t': ['relay-test'] }, 2000);
        expect(fetched.map((e) => e.id)).toEqual([event.id]);
    });

    it('fails a publish no relay accepts', async () => {
        await pool.connect([relay.url]);
        const err = await rejectionOf(pool.publish(note('reject-me')));
        expect(err.code).toBe('TRANSPORT');
        expect(err.message).toContain(`${relay.url}: blocked: test`);
    });

    it('delivers live events to a subscription', async () => {
        await pool.connect([relay.url]);
        const other = new RelayPool();
        await other.connect([relay.url]);

        let deliver: (event: NostrEvent) => void = () => undefined;
        const received = new Promise<NostrEvent>((resolve) => { deliver = resolve; });
        await new Promise<void>((ready) => {
            pool.subscribe({ kinds: [1], '#t': ['relay-test'] }, (event) => deliver(event), ready);
        });
        await other.publish(note('live'));
        expect((await received).content).toBe('live');
        other.dispose();
    });

    it('refuses to work without a relay', async () => {
        expect((await rejectionOf(pool.fetchEvents({ kinds: [1] }))).code).toBe('TRANSPORT');
        expect((await rejectionOf(pool.publish(note('nowhere')))).code).toBe('TRANSPORT');
    });

    it('gives up on an unreachable relay without throwing', async () => {
        const dead = await MiniRelay.start();
        const url = dead.url;
        await dead.stop();
        expect(await pool.connect([url])).toBe(0);
        expect(pool.connected).toBe(false);
    });
});
