import { EventEmitter } from 'node:events';
import { ClientError } from './errors.js';
import { decodeEnvelope, nowSeconds, TIMESTAMP_TWEAK_SECONDS, type DecodedEnvelope } from './envelope.js';
import type { KeyDeriver, KeyPair } from './keys.js';
import { createLogger, describeError } from './logger.js';
import {
    describeCantDo,
    GIFT_WRAP_KIND,
    isTradeStatus,
    notificationLabel,
    orderOf,
    type Action,
    type TradeStatus
} from './protocol.js';
import type { RelayTransport } from './relayPool.js';
import { PeriodicTask } from './scheduler.js';
import type { ActiveTrade, OrderRecord, OrderStore } from './store.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// RecoveryEngine – rebuilds trade state from relays at startup (no local message log)
// TradeListener – polls the same channels while the client runs
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Recovery');

export const RECOVERY_WINDOW_SECONDS = 7 * 24 * 60 * 60;
export const TRADE_POLL_INTERVAL_MS = 5000;

export interface TradeState {
    order: OrderRecord;
    lastAction: Action | null;
    lastMessageAt: number;
    invoice: string | null;
    cantDoReason: string | null;
}

export function initialTradeState(order: OrderRecord): TradeState {
    return { order, lastAction: null, lastMessageAt: 0, invoice: order.buyerInvoice, cantDoReason: null };
}

/** Status implied by an action; null keeps the current one */
export function statusForAction(action: Action): TradeStatus | null {
    switch (action) {
        case 'new-order':
            return 'pending';
        case 'pay-invoice':
        case 'waiting-seller-to-pay':
            return 'waiting-payment';
        case 'add-invoice':
        case 'waiting-buyer-invoice':
            return 'waiting-buyer-invoice';
        case 'buyer-took-order':
        case 'hold-invoice-payment-accepted':
        case 'buyer-invoice-accepted':
            return 'active';
        case 'fiat-sent':
        case 'fiat-sent-ok':
            return 'fiat-sent';
        case 'release':
        case 'released':
        case 'hold-invoice-payment-settled':
            return 'settled-hold-invoice';
        case 'purchase-completed':
        case 'rate':
        case 'rate-user':
        case 'rate-received':
            return 'success';
        case 'cancel':
        case 'canceled':
        case 'hold-invoice-payment-canceled':
            return 'canceled';
        case 'cooperative-cancel-accepted':
            return 'cooperatively-canceled';
        case 'dispute':
        case 'dispute-initiated-by-you':
        case 'dispute-initiated-by-peer':
            return 'dispute';
        case 'admin-cancel':
        case 'admin-canceled':
            return 'canceled-by-admin';
        case 'admin-settle':
        case 'admin-settled':
            return 'settled-by-admin';
        case 'take-sell':
        case 'take-buy':
        case 'cooperative-cancel-initiated-by-you':
        case 'cooperative-cancel-initiated-by-peer':
        case 'cant-do':
        case 'admin-add-solver':
        case 'admin-take-dispute':
        case 'admin-took-dispute':
        case 'payment-failed':
        case 'invoice-updated':
        case 'send-dm':
        case 'trade-pubkey':
        case 'restore-session':
        case 'last-trade-index':
            return null;
    }
}

/** Folds one decoded message into the trade state. Older messages than the last applied are ignored. */
export function reduceTradeState(state: TradeState, decoded: DecodedEnvelope): TradeState {
    if (decoded.timestamp < state.lastMessageAt) { return state; }
    const { kind } = decoded.message;
    const next: TradeState = {
        ...state,
        order: { ...state.order },
        lastAction: kind.action,
        lastMessageAt: decoded.timestamp,
        cantDoReason: null
    };

    if (kind.action === 'cant-do') {
        next.cantDoReason = kind.payload?.type === 'cant-do' ? kind.payload.reason : null;
        return next;
    }

    const embedded = orderOf(kind.payload);
    const payloadStatus = embedded?.status && isTradeStatus(embedded.status) ? embedded.status : null;
    next.order.status = payloadStatus ?? statusForAction(kind.action) ?? state.order.status;

    if (embedded) {
        next.order.amount = embedded.amount;
        next.order.fiatAmount = embedded.fiat_amount;
        next.order.fiatCode = embedded.fiat_code;
        next.order.premium = embedded.premium;
        next.order.paymentMethod = embedded.payment_method;
        if (embedded.min_amount !== undefined) { next.order.minAmount = embedded.min_amount; }
        if (embedded.max_amount !== undefined) { next.order.maxAmount = embedded.max_amount; }
        if (embedded.kind) { next.order.kind = embedded.kind; }
        if (embedded.expires_at) { next.order.expiresAt = embedded.expires_at; }
        const ours = state.order.tradePubkey;
        if (ours && embedded.buyer_trade_pubkey === ours && embedded.seller_trade_pubkey) {
            next.order.counterpartyPubkey = embedded.seller_trade_pubkey;
        } else if (ours && embedded.seller_trade_pubkey === ours && embedded.buyer_trade_pubkey) {
            next.order.counterpartyPubkey = embedded.buyer_trade_pubkey;
        }
        if (embedded.buyer_invoice) { next.order.buyerInvoice = embedded.buyer_invoice; }
    }

    const payload = kind.payload;
    if (payload?.type === 'payment-request') {
        next.invoice = payload.invoice;
    } else if (payload?.type === 'peer') {
        next.order.counterpartyPubkey = payload.pubkey;
    }
    return next;
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// RELAY QUERY
// ——————————————————————————————————————————————————————————————————————————————————————————

export interface TradeMessages {
    fetched: number;
    messages: DecodedEnvelope[]; // oldest first
}

/** Decodable messages from the exchange daemon addressed to a trade key */
export async function fetchTradeMessages(
    transport: RelayTransport,
    tradeKey: KeyPair,
    mostroPubkey: string,
    options: { since?: number; limit?: number; timeoutMs?: number } = {}
): Promise<TradeMessages> {
    const events = await transport.fetchEvents({
        kinds: [GIFT_WRAP_KIND],
        '#p': [tradeKey.publicKey],
        since: options.since,
        limit: options.limit
    }, options.timeoutMs);

    const messages: DecodedEnvelope[] = [];
    const seen: Set<string> = new Set();
    for (const event of events) {
        if (seen.has(event.id)) { continue; }
        seen.add(event.id);
        const decoded = decodeEnvelope(event, tradeKey.secretKey);
        if (!decoded.ok) {
            log.debug(`Skipping ${event.id}: ${decoded.error.message}`);
            continue;
        }
        if (decoded.value.sender !== mostroPubkey) {
            log.debug(`Skipping ${event.id}: not sent by the exchange`);
            continue;
        }
        messages.push(decoded.value);
    }
    messages.sort((a, b) => a.timestamp - b.timestamp);
    return { fetched: seen.size, messages };
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// STARTUP RECOVERY
// ——————————————————————————————————————————————————————————————————————————————————————————

export type RecoveryOutcome =
    | { tradeId: string; tradeIndex: number; status: 'recovered'; state: TradeState; applied: number }
    | { tradeId: string; tradeIndex: number; status: 'unchanged'; state: TradeState }
    | { tradeId: string; tradeIndex: number; status: 'failed'; error: ClientError }
    | { tradeId: string; tradeIndex: number; status: 'rejected'; error: ClientError };

export interface RecoveryOptions {
    windowSeconds?: number;
    timeoutMs?: number;
    limit?: number;
    now?: () => number;
}

export class RecoveryEngine {
    constructor(
        private readonly store: OrderStore,
        private readonly keys: KeyDeriver,
        private readonly transport: RelayTransport,
        private readonly mostroPubkey: string,
        private readonly options: RecoveryOptions = {}
    ) {}

    /** Trades that share an index with another record; none of them can be trusted */
    static findDuplicateIndices(trades: readonly ActiveTrade[]): Map<number, string[]> {
        const byIndex: Map<number, string[]> = new Map();
        for (const trade of trades) {
            const ids = byIndex.get(trade.tradeIndex) ?? [];
            ids.push(trade.tradeId);
            byIndex.set(trade.tradeIndex, ids);
        }
        for (const [index, ids] of byIndex) {
            if (ids.length < 2) { byIndex.delete(index); }
        }
        return byIndex;
    }

    async recoverAll(): Promise<RecoveryOutcome[]> {
        const trades = this.store.getActiveTrades();
        const duplicates = RecoveryEngine.findDuplicateIndices(trades);
        for (const [index, ids] of duplicates) {
            log.error(`Trade index ${index} is referenced by ${ids.length} orders (${ids.join(', ')}); refusing to recover them`);
        }

        const settled = await Promise.allSettled(trades.map(async (trade): Promise<RecoveryOutcome> => {
            const shared = duplicates.get(trade.tradeIndex);
            if (shared) {
                return {
                    ...trade,
                    status: 'rejected',
                    error: new ClientError('INTEGRITY', `Trade index ${trade.tradeIndex} is shared by orders ${shared.join(', ')}`, {
                        tradeIndex: trade.tradeIndex,
                        orders: shared
                    })
                };
            }
            return this.recoverOne(trade);
        }));

        const outcomes = settled.map((result, i): RecoveryOutcome => {
            const trade = trades[i];
            if (result.status === 'fulfilled') { return result.value; }
            const error = result.reason instanceof ClientError
                ? result.reason
                : new ClientError('TRANSPORT', describeError(result.reason), undefined, { cause: result.reason });
            log.warn(`Recovery of order ${trade?.tradeId ?? '?'} failed:`, error.message);
            return { tradeId: trade?.tradeId ?? '', tradeIndex: trade?.tradeIndex ?? 0, status: 'failed', error };
        });

        const recovered = outcomes.filter((o) => o.status === 'recovered').length;
        log.info(`Recovered ${recovered} of ${trades.length} active trades`);
        return outcomes;
    }

    private async recoverOne(trade: ActiveTrade): Promise<RecoveryOutcome> {
        const order = this.store.getOrder(trade.tradeId);
        if (!order) {
            return { ...trade, status: 'failed', error: new ClientError('INTEGRITY', `Order ${trade.tradeId} disappeared during recovery`) };
        }
        const tradeKey = this.keys.tradeKey(trade.tradeIndex);
        const now = (this.options.now ?? nowSeconds)();
        const window = this.options.windowSeconds ?? RECOVERY_WINDOW_SECONDS;

        const { fetched, messages } = await fetchTradeMessages(this.transport, tradeKey, this.mostroPubkey, {
            since: now - window - TIMESTAMP_TWEAK_SECONDS,
            limit: this.options.limit ?? 20,
            timeoutMs: this.options.timeoutMs
        });

        const initial = initialTradeState({ ...order, tradePubkey: order.tradePubkey ?? tradeKey.publicKey });
        if (fetched === 0) {
            return { ...trade, status: 'unchanged', state: initial };
        }
        if (messages.length === 0) {
            return { ...trade, status: 'failed', error: new ClientError('DECODE', `None of the ${fetched} events for order ${trade.tradeId} could be decoded`) };
        }

        const state = messages.reduce(reduceTradeState, initial);
        this.store.saveOrder(state.order);
        log.info(`Order ${trade.tradeId} (index ${trade.tradeIndex}) recovered as ${state.order.status ?? 'unknown'} from ${messages.length} messages`);
        return { ...trade, status: 'recovered', state, applied: messages.length };
    }
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// LIVE LISTENER
// ——————————————————————————————————————————————————————————————————————————————————————————

export interface TradeNotification {
    tradeId: string;
    tradeIndex: number;
    action: Action;
    label: string;
    timestamp: number;
    description: string | null; // cant-do text
    invoice: string | null;
    amount: number | null;
}

export class TradeListener {
    private readonly task: PeriodicTask<TradeNotification[]>;
    private readonly events = new EventEmitter();
    private readonly lastSeen: Map<string, number> = new Map();

    constructor(
        private readonly store: OrderStore,
        private readonly keys: KeyDeriver,
        private readonly transport: RelayTransport,
        private readonly mostroPubkey: string,
        options: { intervalMs?: number; timeoutMs?: number } = {}
    ) {
        const timeoutMs = options.timeoutMs;
        this.task = new PeriodicTask('trade-listener', options.intervalMs ?? TRADE_POLL_INTERVAL_MS, () => this.poll(timeoutMs));
        this.task.onResult((notifications) => {
            for (const notification of notifications) {
                this.events.emit('notification', notification);
            }
        });
        this.task.onError((err) => log.warn('Trade poll failed:', describeError(err)));
    }

    /** Seeds the last-seen times so recovered messages are not announced again */
    seed(outcomes: readonly RecoveryOutcome[]): void {
        for (const outcome of outcomes) {
            if (outcome.status === 'recovered' || outcome.status === 'unchanged') {
                this.lastSeen.set(outcome.tradeId, outcome.state.lastMessageAt);
            }
        }
    }

    onNotification(listener: (notification: TradeNotification) => void): () => void {
        this.events.on('notification', listener);
        return () => { this.events.off('notification', listener); };
    }

    start(): void {
        this.task.start();
    }

    stop(): void {
        this.task.stop();
    }

    async poll(timeoutMs?: number): Promise<TradeNotification[]> {
        const trades = this.store.getActiveTrades();
        const results = await Promise.allSettled(trades.map((trade) => this.pollTrade(trade, timeoutMs)));
        const notifications: TradeNotification[] = [];
        results.forEach((result, i) => {
            if (result.status === 'fulfilled') {
                if (result.value) { notifications.push(result.value); }
                return;
            }
            log.warn(`Polling order ${trades[i]?.tradeId ?? '?'} failed:`, describeError(result.reason));
        });
        return notifications;
    }

    private async pollTrade(trade: ActiveTrade, timeoutMs?: number): Promise<TradeNotification | null> {
        const tradeKey = this.keys.tradeKey(trade.tradeIndex);
        const { messages } = await fetchTradeMessages(this.transport, tradeKey, this.mostroPubkey, { limit: 5, timeoutMs });
        const latest = messages[messages.length - 1];
        if (!latest) { return null; }

        const previous = this.lastSeen.get(trade.tradeId) ?? 0;
        if (latest.timestamp <= previous) { return null; }
        this.lastSeen.set(trade.tradeId, latest.timestamp);

        const order = this.store.getOrder(trade.tradeId);
        if (order) {
            const state = reduceTradeState({ ...initialTradeState(order), lastMessageAt: previous }, latest);
            this.store.saveOrder(state.order);
        }

        const { kind } = latest.message;
        const embedded = orderOf(kind.payload);
        return {
            tradeId: trade.tradeId,
            tradeIndex: trade.tradeIndex,
            action: kind.action,
            label: notificationLabel(kind.action),
            timestamp: latest.timestamp,
            description: kind.payload?.type === 'cant-do' ? describeCantDo(kind.payload.reason) : null,
            invoice: kind.payload?.type === 'payment-request' ? kind.payload.invoice : null,
            amount: kind.action === 'add-invoice' && embedded ? embedded.amount : null
        };
    }
}
