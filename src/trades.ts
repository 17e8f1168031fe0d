import { expectResponse, type RequestCorrelator } from './correlator.js';
import type { DecodedEnvelope, EnvelopeKeys, PrivacyMode } from './envelope.js';
import { ClientError } from './errors.js';
import type { KeyDeriver } from './keys.js';
import { createLogger } from './logger.js';
import type { OrderListing } from './orderBook.js';
import {
    createMessage,
    generateRequestId,
    isTradeStatus,
    orderOf,
    type Action,
    type Payload,
    type SmallOrder
} from './protocol.js';
import { statusForAction } from './recovery.js';
import type { OrderRecord, OrderStore, TradeIndexStore } from './store.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Trade actions – every request goes out under its own trade key and waits for the reply
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Trades');

export type TradeStore = TradeIndexStore & OrderStore;

/**
 * Owns the trade key counter. The next index is one past the highest of the
 * stored counter and every index an order already uses, and it is written
 * before the request that needs it goes out.
 */
export class TradeIndexCounter {
    constructor(private readonly store: TradeIndexStore) {}

    current(): number {
        return Math.max(this.store.getTradeIndex(), this.store.getHighestOrderIndex());
    }

    next(): number {
        const index = this.current() + 1;
        this.store.setTradeIndex(index);
        return index;
    }
}

export interface NewOrderParams {
    kind: 'buy' | 'sell';
    fiatCode: string;
    /** Ignored for range orders */
    fiatAmount?: number;
    minAmount?: number;
    maxAmount?: number;
    /** Sats; 0 means priced at market with the premium applied */
    amount?: number;
    paymentMethod: string;
    premium?: number;
    buyerInvoice?: string;
    expiresAt?: number;
}

export interface TakeOrderParams {
    /** Fiat amount to take from a range order */
    amount?: number;
    /** Lightning invoice or address, taking a sell order only */
    invoice?: string;
}

export interface TradeResult {
    order: OrderRecord;
    action: Action;
    /** Invoice to pay or the one the exchange accepted, when the reply carries one */
    invoice: string | null;
}

/** Actions taken on an existing trade with no extra input */
export type OrderAction = 'fiat-sent' | 'release' | 'cancel' | 'dispute';

const TAKE_RESPONSES: readonly Action[] = ['add-invoice', 'pay-invoice', 'waiting-seller-to-pay', 'waiting-buyer-invoice'];

const ORDER_ACTION_RESPONSES: Record<OrderAction, readonly Action[]> = {
    'fiat-sent': ['fiat-sent-ok', 'waiting-seller-to-pay'],
    'release': ['purchase-completed', 'rate', 'released', 'hold-invoice-payment-settled'],
    'cancel': ['canceled', 'cooperative-cancel-initiated-by-you', 'cooperative-cancel-accepted'],
    'dispute': ['dispute-initiated-by-you']
};

export function validateNewOrder(params: NewOrderParams): void {
    if (!/^[A-Za-z]{3}$/.test(params.fiatCode)) {
        throw new ClientError('INVALID_INPUT', `Fiat code must be three letters, got "${params.fiatCode}"`);
    }
    if (params.paymentMethod.trim().length === 0) {
        throw new ClientError('INVALID_INPUT', 'Payment method is required');
    }
    const amount = params.amount ?? 0;
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new ClientError('INVALID_INPUT', `Amount must be a non-negative integer of sats, got ${amount}`);
    }
    if (amount > 0 && (params.premium ?? 0) !== 0) {
        throw new ClientError('INVALID_INPUT', 'A fixed sats amount cannot carry a premium');
    }
    const isRange = params.minAmount !== undefined || params.maxAmount !== undefined;
    if (isRange) {
        if (params.minAmount === undefined || params.maxAmount === undefined) {
            throw new ClientError('INVALID_INPUT', 'A range order needs both a minimum and a maximum');
        }
        if (params.minAmount <= 0 || params.minAmount >= params.maxAmount) {
            throw new ClientError('INVALID_INPUT', `Range must satisfy 0 < min < max, got ${params.minAmount}-${params.maxAmount}`);
        }
        if (amount > 0) {
            throw new ClientError('INVALID_INPUT', 'A range order is always priced at market');
        }
    } else if (params.fiatAmount === undefined || params.fiatAmount <= 0) {
        throw new ClientError('INVALID_INPUT', 'Fiat amount must be positive');
    }
}

/** Merges an order carried by a reply into the local record */
export function applySmallOrder(record: OrderRecord, order: SmallOrder): OrderRecord {
    const next: OrderRecord = {
        ...record,
        id: order.id ?? record.id,
        kind: order.kind ?? record.kind,
        status: order.status && isTradeStatus(order.status) ? order.status : record.status,
        amount: order.amount,
        fiatCode: order.fiat_code,
        fiatAmount: order.fiat_amount,
        minAmount: order.min_amount ?? record.minAmount,
        maxAmount: order.max_amount ?? record.maxAmount,
        paymentMethod: order.payment_method,
        premium: order.premium,
        buyerInvoice: order.buyer_invoice ?? record.buyerInvoice,
        createdAt: order.created_at ?? record.createdAt,
        expiresAt: order.expires_at ?? record.expiresAt
    };
    const ours = record.tradePubkey;
    if (ours && order.buyer_trade_pubkey === ours && order.seller_trade_pubkey) {
        next.counterpartyPubkey = order.seller_trade_pubkey;
    } else if (ours && order.seller_trade_pubkey === ours && order.buyer_trade_pubkey) {
        next.counterpartyPubkey = order.buyer_trade_pubkey;
    }
    return next;
}

function invoiceOf(payload: Payload | null): string | null {
    return payload?.type === 'payment-request' ? payload.invoice : null;
}

export class TradeService {
    private readonly counter: TradeIndexCounter;

    constructor(
        private readonly store: TradeStore,
        private readonly keys: KeyDeriver,
        private readonly correlator: RequestCorrelator,
        private readonly mostroPubkey: string,
        private readonly mode: PrivacyMode = 'reputation'
    ) {
        this.counter = new TradeIndexCounter(store);
    }

    private envelopeKeys(tradeIndex: number): EnvelopeKeys {
        return {
            trade: this.keys.tradeKey(tradeIndex),
            identity: this.mode === 'reputation' ? this.keys.identityKey() : undefined
        };
    }

    private async send(
        tradeIndex: number,
        action: Action,
        fields: { id?: string; requestId: number; tradeIndex?: number; payload?: Payload },
        expected: readonly Action[]
    ): Promise<DecodedEnvelope> {
        const message = createMessage('order', action, fields);
        const outcome = await this.correlator.request({
            message,
            keys: this.envelopeKeys(tradeIndex),
            recipient: this.mostroPubkey,
            mode: this.mode,
            expectedAction: expected[0]
        });
        return expectResponse(outcome, expected);
    }

    private requireTrade(orderId: string): OrderRecord & { tradeIndex: number } {
        const order = this.store.getOrder(orderId);
        if (!order) {
            throw new ClientError('INVALID_INPUT', `Unknown order ${orderId}`);
        }
        const { tradeIndex } = order;
        if (tradeIndex === null) {
            throw new ClientError('INVALID_INPUT', `Order ${orderId} has no trade key; it was not created or taken here`);
        }
        return { ...order, tradeIndex };
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // NEW ORDER
    // ——————————————————————————————————————————————————————————————————————————————————————————

    async createOrder(params: NewOrderParams): Promise<TradeResult> {
        validateNewOrder(params);
        const tradeIndex = this.counter.next();
        const tradeKey = this.keys.tradeKey(tradeIndex);
        const requestId = generateRequestId();
        const isRange = params.minAmount !== undefined && params.maxAmount !== undefined;

        const small: SmallOrder = {
            kind: params.kind,
            status: 'pending',
            amount: params.amount ?? 0,
            fiat_code: params.fiatCode.toUpperCase(),
            min_amount: isRange ? params.minAmount : null,
            max_amount: isRange ? params.maxAmount : null,
            fiat_amount: isRange ? 0 : params.fiatAmount ?? 0,
            payment_method: params.paymentMethod.trim(),
            premium: params.premium ?? 0,
            buyer_invoice: params.buyerInvoice ?? null,
            expires_at: params.expiresAt ?? null
        };

        log.info(`Sending new ${params.kind} order with trade index ${tradeIndex}`);
        const response = await this.send(tradeIndex, 'new-order', {
            requestId,
            tradeIndex,
            payload: { type: 'order', order: small }
        }, ['new-order']);

        const confirmed = orderOf(response.message.kind.payload);
        const id = confirmed?.id ?? response.message.kind.id;
        if (!confirmed || !id) {
            throw new ClientError('UNEXPECTED_ACTION', 'New order reply carries no order id');
        }

        const base: OrderRecord = {
            id,
            kind: params.kind,
            status: 'pending',
            amount: small.amount,
            fiatCode: small.fiat_code,
            minAmount: small.min_amount ?? null,
            maxAmount: small.max_amount ?? null,
            fiatAmount: small.fiat_amount,
            paymentMethod: small.payment_method,
            premium: small.premium,
            tradeIndex,
            tradePubkey: tradeKey.publicKey,
            counterpartyPubkey: null,
            isMine: true,
            buyerInvoice: params.buyerInvoice ?? null,
            requestId,
            createdAt: response.timestamp,
            expiresAt: params.expiresAt ?? null
        };
        const order = applySmallOrder(base, { ...confirmed, id });
        this.store.saveOrder(order);
        log.info(`Order ${order.id} published`);
        return { order, action: response.message.kind.action, invoice: null };
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // TAKE ORDER
    // ——————————————————————————————————————————————————————————————————————————————————————————

    async takeOrder(listing: OrderListing, params: TakeOrderParams = {}): Promise<TradeResult> {
        const isRange = listing.minAmount !== null && listing.maxAmount !== null;
        if (params.amount !== undefined) {
            if (!isRange) {
                throw new ClientError('INVALID_INPUT', `Order ${listing.id} is not a range order; it takes no amount`);
            }
            if (params.amount < (listing.minAmount ?? 0) || params.amount > (listing.maxAmount ?? 0)) {
                throw new ClientError('INVALID_INPUT', `Amount must be between ${listing.minAmount ?? 0} and ${listing.maxAmount ?? 0}`);
            }
        } else if (isRange) {
            throw new ClientError('INVALID_INPUT', `Order ${listing.id} is a range order; pick an amount`);
        }
        if (params.invoice !== undefined && listing.kind !== 'sell') {
            throw new ClientError('INVALID_INPUT', 'Only a buyer taking a sell order sends an invoice');
        }

        // Taking a sell order makes us the buyer and the other way round
        const action: Action = listing.kind === 'sell' ? 'take-sell' : 'take-buy';
        let payload: Payload | undefined;
        if (params.invoice) {
            payload = { type: 'payment-request', order: null, invoice: params.invoice, amount: params.amount ?? null };
        } else if (params.amount !== undefined) {
            payload = { type: 'amount', amount: params.amount };
        }

        const tradeIndex = this.counter.next();
        const tradeKey = this.keys.tradeKey(tradeIndex);
        const requestId = generateRequestId();
        log.info(`Taking ${listing.kind} order ${listing.id} with trade index ${tradeIndex}`);
        const response = await this.send(tradeIndex, action, {
            id: listing.id,
            requestId,
            tradeIndex,
            payload
        }, TAKE_RESPONSES);

        const { kind } = response.message;
        const base: OrderRecord = {
            id: listing.id,
            kind: listing.kind,
            status: statusForAction(kind.action),
            amount: listing.amount,
            fiatCode: listing.fiatCode,
            minAmount: listing.minAmount,
            maxAmount: listing.maxAmount,
            fiatAmount: params.amount ?? listing.fiatAmount,
            paymentMethod: listing.paymentMethod,
            premium: listing.premium,
            tradeIndex,
            tradePubkey: tradeKey.publicKey,
            counterpartyPubkey: null,
            isMine: false,
            buyerInvoice: params.invoice ?? null,
            requestId,
            createdAt: listing.createdAt,
            expiresAt: listing.expiresAt
        };
        const embedded = orderOf(kind.payload);
        const order = embedded ? applySmallOrder(base, { ...embedded, id: listing.id }) : base;
        this.store.saveOrder(order);
        return { order, action: kind.action, invoice: invoiceOf(kind.payload) };
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // IN-TRADE ACTIONS
    // ——————————————————————————————————————————————————————————————————————————————————————————

    async addInvoice(orderId: string, invoice: string, amount?: number): Promise<TradeResult> {
        const trimmed = invoice.trim();
        if (!/^(lnbc|lntb|lntbs|lnbcrt)[0-9a-z]+$/i.test(trimmed) && !/^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(trimmed)) {
            throw new ClientError('INVALID_INPUT', 'Not a lightning invoice or lightning address');
        }
        const order = this.requireTrade(orderId);
        const response = await this.send(order.tradeIndex, 'add-invoice', {
            id: orderId,
            requestId: generateRequestId(),
            payload: { type: 'payment-request', order: null, invoice: trimmed, amount: amount ?? null }
        }, ['waiting-seller-to-pay', 'buyer-invoice-accepted', 'invoice-updated']);

        const updated: OrderRecord = {
            ...order,
            buyerInvoice: trimmed,
            status: statusForAction(response.message.kind.action) ?? order.status
        };
        this.store.saveOrder(updated);
        return { order: updated, action: response.message.kind.action, invoice: trimmed };
    }

    /**
     * Sends fiat-sent, release, cancel or dispute for a trade. Closing part of
     * a range order hands the exchange a fresh trade key for what is left.
     */
    async sendOrderAction(orderId: string, action: OrderAction): Promise<TradeResult> {
        const order = this.requireTrade(orderId);
        const payload = this.nextTradePayload(order, action);
        const response = await this.send(order.tradeIndex, action, {
            id: orderId,
            requestId: generateRequestId(),
            payload
        }, ORDER_ACTION_RESPONSES[action]);

        const { kind } = response.message;
        const embedded = orderOf(kind.payload);
        let updated: OrderRecord = { ...order, status: statusForAction(kind.action) ?? order.status };
        if (embedded) { updated = applySmallOrder(updated, { ...embedded, id: orderId }); }
        this.store.saveOrder(updated);
        log.info(`Order ${orderId}: ${action} answered with ${kind.action}`);
        return { order: updated, action: kind.action, invoice: invoiceOf(kind.payload) };
    }

    /** Rates the counterparty of a finished trade, 1 to 5 */
    async rateCounterparty(orderId: string, rating: number): Promise<TradeResult> {
        if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
            throw new ClientError('INVALID_INPUT', `Rating must be an integer from 1 to 5, got ${rating}`);
        }
        const order = this.requireTrade(orderId);
        const response = await this.send(order.tradeIndex, 'rate-user', {
            id: orderId,
            requestId: generateRequestId(),
            payload: { type: 'rating-user', rating }
        }, ['rate-received']);
        return { order, action: response.message.kind.action, invoice: null };
    }

    private nextTradePayload(order: OrderRecord, action: OrderAction): Payload | undefined {
        if (action !== 'fiat-sent' && action !== 'release') { return undefined; }
        if (order.minAmount === null || order.maxAmount === null) { return undefined; }
        if (order.maxAmount - order.fiatAmount < order.minAmount) { return undefined; }
        const index = this.counter.next();
        log.info(`Range order ${order.id} continues under trade index ${index}`);
        return { type: 'next-trade', pubkey: this.keys.tradeKey(index).publicKey, index };
    }
}
