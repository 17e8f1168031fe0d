import { EventEmitter } from 'node:events';
import { nowSeconds } from './envelope.js';
import { createLogger, describeError } from './logger.js';
import { ORDER_EVENT_KIND } from './protocol.js';
import type { NostrEvent, RelayTransport } from './relayPool.js';
import { PeriodicTask } from './scheduler.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Order book – public kind 38383 listings published by the exchange daemon
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('OrderBook');

export const ORDER_BOOK_INTERVAL_MS = 10000;
const LISTING_WINDOW_SECONDS = 7 * 24 * 60 * 60;
const LISTING_LIMIT = 50;

export interface OrderListing {
    id: string;
    kind: 'buy' | 'sell';
    status: string;
    fiatCode: string;
    amount: number;
    fiatAmount: number;
    minAmount: number | null;
    maxAmount: number | null;
    paymentMethod: string;
    premium: number;
    createdAt: number;
    expiresAt: number | null;
}

export interface DisputeListing {
    id: string;
    status: string;
    initiator: string | null;
    createdAt: number;
}

export interface OrderBookSnapshot {
    orders: OrderListing[];
    disputes: DisputeListing[];
}

function tagValues(event: NostrEvent, name: string): string[] {
    const tag = event.tags.find((t) => t[0] === name);
    return tag ? tag.slice(1) : [];
}

function tagValue(event: NostrEvent, name: string): string | null {
    return tagValues(event, name)[0] ?? null;
}

function toInt(value: string | null): number | null {
    if (value === null || !/^-?\d+$/.test(value.trim())) { return null; }
    return Number(value.trim());
}

function toNumber(value: string | null): number | null {
    if (value === null || value.trim() === '') { return null; }
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
}

/** Reads an order listing from its tags; null when a required tag is missing */
export function parseOrderEvent(event: NostrEvent): OrderListing | null {
    if (event.kind !== ORDER_EVENT_KIND || tagValue(event, 'z') !== 'order') { return null; }
    const id = tagValue(event, 'd');
    const kind = tagValue(event, 'k');
    const fiatCode = tagValue(event, 'f');
    if (!id || (kind !== 'buy' && kind !== 'sell') || !fiatCode) { return null; }

    const fiat = tagValues(event, 'fa').map((v) => toNumber(v));
    let fiatAmount = 0;
    let minAmount: number | null = null;
    let maxAmount: number | null = null;
    if (fiat.length >= 2) {
        minAmount = fiat[0] ?? null;
        maxAmount = fiat[1] ?? null;
    } else {
        fiatAmount = fiat[0] ?? 0;
    }

    return {
        id,
        kind,
        status: tagValue(event, 's') ?? 'pending',
        fiatCode: fiatCode.toUpperCase(),
        amount: toInt(tagValue(event, 'amt')) ?? 0,
        fiatAmount,
        minAmount,
        maxAmount,
        paymentMethod: tagValues(event, 'pm').join(','),
        premium: toNumber(tagValue(event, 'premium')) ?? 0,
        createdAt: event.created_at,
        expiresAt: toInt(tagValue(event, 'expires_at')) ?? toInt(tagValue(event, 'expiration'))
    };
}

export function parseDisputeEvent(event: NostrEvent): DisputeListing | null {
    if (event.kind !== ORDER_EVENT_KIND || tagValue(event, 'z') !== 'dispute') { return null; }
    const id = tagValue(event, 'd');
    if (!id) { return null; }
    return {
        id,
        status: tagValue(event, 's') ?? 'initiated',
        initiator: tagValue(event, 'initiator'),
        createdAt: event.created_at
    };
}

/** Replaceable events: keeps the newest version of every id */
export function latestById<T extends { id: string; createdAt: number }>(items: readonly T[]): T[] {
    const latest: Map<string, T> = new Map();
    for (const item of items) {
        const existing = latest.get(item.id);
        if (!existing || item.createdAt > existing.createdAt) {
            latest.set(item.id, item);
        }
    }
    return Array.from(latest.values()).sort((a, b) => b.createdAt - a.createdAt);
}

export interface OrderBookOptions {
    currencies?: string[];
    includeDisputes?: boolean;
    intervalMs?: number;
    timeoutMs?: number;
    now?: () => number;
}

export class OrderBook {
    private readonly task: PeriodicTask<OrderBookSnapshot>;
    private readonly events = new EventEmitter();
    private snapshot: OrderBookSnapshot = { orders: [], disputes: [] };

    constructor(
        private readonly transport: RelayTransport,
        private readonly mostroPubkey: string,
        private readonly options: OrderBookOptions = {}
    ) {
        this.task = new PeriodicTask('order-book', options.intervalMs ?? ORDER_BOOK_INTERVAL_MS, () => this.refresh());
        this.task.onResult((snapshot) => {
            this.snapshot = snapshot;
            this.events.emit('update', snapshot);
        });
        this.task.onError((err) => log.warn('Order book refresh failed:', describeError(err)));
    }

    get orders(): OrderListing[] {
        return this.snapshot.orders;
    }

    get disputes(): DisputeListing[] {
        return this.snapshot.disputes;
    }

    onUpdate(listener: (snapshot: OrderBookSnapshot) => void): () => void {
        this.events.on('update', listener);
        return () => { this.events.off('update', listener); };
    }

    start(): void {
        this.task.start(true);
    }

    stop(): void {
        this.task.stop();
    }

    async refresh(): Promise<OrderBookSnapshot> {
        const [orders, disputes] = await Promise.all([
            this.fetchOrders(),
            this.options.includeDisputes ? this.fetchDisputes() : Promise.resolve([])
        ]);
        return { orders, disputes };
    }

    /** Pending orders in the configured currencies, newest first */
    async fetchOrders(): Promise<OrderListing[]> {
        const events = await this.query('order');
        const currencies = (this.options.currencies ?? []).map((c) => c.toUpperCase());
        const parsed = events.flatMap((event) => {
            const listing = parseOrderEvent(event);
            return listing ? [listing] : [];
        });
        return latestById(parsed)
            .filter((o) => o.status === 'pending')
            .filter((o) => currencies.length === 0 || currencies.includes(o.fiatCode));
    }

    async fetchDisputes(): Promise<DisputeListing[]> {
        const events = await this.query('dispute');
        const parsed = events.flatMap((event) => {
            const listing = parseDisputeEvent(event);
            return listing ? [listing] : [];
        });
        return latestById(parsed);
    }

    private query(type: 'order' | 'dispute'): Promise<NostrEvent[]> {
        const now = (this.options.now ?? nowSeconds)();
        return this.transport.fetchEvents({
            kinds: [ORDER_EVENT_KIND],
            authors: [this.mostroPubkey],
            '#z': [type],
            since: now - LISTING_WINDOW_SECONDS,
            limit: LISTING_LIMIT
        }, this.options.timeoutMs);
    }
}
