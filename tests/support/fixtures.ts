import type { DecodedEnvelope } from '../../src/envelope.js';
import type { ProtocolMessage, SmallOrder } from '../../src/protocol.js';
import type { AdminDisputeRecord, OrderRecord } from '../../src/store.js';

export function makeOrder(overrides: Partial<OrderRecord> = {}): OrderRecord {
    return {
        id: 'order-1',
        kind: 'sell',
        status: 'pending',
        amount: 0,
        fiatCode: 'EUR',
        minAmount: null,
        maxAmount: null,
        fiatAmount: 50,
        paymentMethod: 'sepa',
        premium: 0,
        tradeIndex: 1,
        tradePubkey: null,
        counterpartyPubkey: null,
        isMine: true,
        buyerInvoice: null,
        requestId: null,
        createdAt: 1700000000,
        expiresAt: null,
        ...overrides
    };
}

export function makeSmallOrder(overrides: Partial<SmallOrder> = {}): SmallOrder {
    return {
        id: 'order-1',
        kind: 'sell',
        amount: 5000,
        fiat_code: 'EUR',
        fiat_amount: 50,
        payment_method: 'sepa',
        premium: 0,
        ...overrides
    };
}

export function makeDispute(overrides: Partial<AdminDisputeRecord> = {}): AdminDisputeRecord {
    return {
        id: 'dispute-1',
        orderId: 'order-1',
        kind: 'sell',
        status: 'in-progress',
        initiatorPubkey: 'aa'.repeat(32),
        buyerPubkey: null,
        sellerPubkey: null,
        amount: 5000,
        fiatAmount: 50,
        fiatCode: 'EUR',
        premium: 0,
        paymentMethod: 'sepa',
        fee: 0,
        buyerSharedKey: null,
        sellerSharedKey: null,
        buyerChatLastSeen: null,
        sellerChatLastSeen: null,
        takenAt: 1700000000,
        createdAt: 1699990000,
        ...overrides
    };
}

/** A decoded exchange message as the reducer sees it */
export function decoded(message: ProtocolMessage, timestamp: number, sender = 'ee'.repeat(32)): DecodedEnvelope {
    return { message, signed: false, sender, tradePubkey: sender, timestamp, wrapId: `wrap-${timestamp}` };
}
