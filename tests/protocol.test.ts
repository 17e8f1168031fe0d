import { describe, expect, it } from 'vitest';
import { KeyDeriver } from '../src/keys.js';
import {
    createMessage,
    decodeContent,
    describeCantDo,
    encodeContent,
    generateRequestId,
    isFinalDisputeStatus,
    notificationLabel,
    orderOf,
    parseMessage,
    signMessage,
    toWireMessage
} from '../src/protocol.js';
import { TEST_SEED } from './support/helpers.js';

describe('wire messages', () => {
    it('serializes a message under its category', () => {
        const message = createMessage('order', 'new-order', { requestId: 42, tradeIndex: 3, payload: { type: 'amount', amount: 1000 } });
        expect(toWireMessage(message)).toEqual({
            order: { version: 1, request_id: 42, trade_index: 3, id: null, action: 'new-order', payload: { amount: 1000 } }
        });
    });

    it('reads back what it writes', () => {
        const message = createMessage('dispute', 'admin-take-dispute', { id: 'dispute-1', requestId: 7 });
        const parsed = parseMessage(toWireMessage(message));
        expect(parsed).toEqual({ ok: true, value: message });
    });

    it('parses a payment request with and without an amount', () => {
        const withAmount = parseMessage({
            order: { version: 1, id: 'abc', action: 'pay-invoice', payload: { payment_request: [null, 'lnbc1xyz', 500] } }
        });
        expect(withAmount.ok && withAmount.value.kind.payload).toEqual({ type: 'payment-request', order: null, invoice: 'lnbc1xyz', amount: 500 });

        const bare = parseMessage({
            order: { version: 1, id: 'abc', action: 'add-invoice', payload: { payment_request: [null, 'lnbc1xyz'] } }
        });
        expect(bare.ok && bare.value.kind.payload).toEqual({ type: 'payment-request', order: null, invoice: 'lnbc1xyz', amount: null });
    });

    it('parses dispute and next-trade payloads', () => {
        const dispute = parseMessage({
            dispute: { version: 1, action: 'admin-took-dispute', payload: { dispute: ['d-1', null] } }
        });
        expect(dispute.ok && dispute.value.kind.payload).toEqual({ type: 'dispute', disputeId: 'd-1', info: null });

        const next = parseMessage({
            order: { version: 1, action: 'fiat-sent', payload: { next_trade: ['ab'.repeat(32), 9] } }
        });
        expect(next.ok && next.value.kind.payload).toEqual({ type: 'next-trade', pubkey: 'ab'.repeat(32), index: 9 });
    });

    it('keeps unknown payloads as raw values', () => {
        const parsed = parseMessage({ order: { version: 1, action: 'send-dm', payload: { something_new: true } } });
        expect(parsed.ok && parsed.value.kind.payload).toEqual({ type: 'other', raw: { something_new: true } });
    });

    it('rejects unknown actions and empty messages', () => {
        const unknown = parseMessage({ order: { version: 1, action: 'fly-away' } });
        expect(unknown.ok).toBe(false);
        expect(!unknown.ok && unknown.error.reason).toBe('malformed-message');

        const empty = parseMessage({});
        expect(!empty.ok && empty.error.message).toBe('Message has no known category');
    });
});

describe('content tuple', () => {
    const trade = new KeyDeriver(TEST_SEED).tradeKey(1);
    const other = new KeyDeriver(TEST_SEED).tradeKey(2);
    const message = createMessage('order', 'fiat-sent', { id: 'order-1', requestId: 11 });

    it('carries a verifiable signature when signed', () => {
        const decoded = decodeContent(encodeContent(message, trade.secretKey), trade.publicKey);
        expect(decoded.ok).toBe(true);
        expect(decoded.ok && decoded.value.signature).toMatch(/^[0-9a-f]{128}$/);
        expect(decoded.ok && decoded.value.message).toEqual(message);
    });

    it('verifies the message text as the sender wrote it', () => {
        const tricky = createMessage('order', 'fiat-sent', { id: 'order "1", part ]', requestId: 11 });
        const written = JSON.stringify(toWireMessage(tricky), null, 2);
        const content = `[ ${written} ,\n "${signMessage(written, trade.secretKey)}" ]`;

        const decoded = decodeContent(content, trade.publicKey);
        expect(decoded.ok).toBe(true);
        expect(decoded.ok && decoded.value.message).toEqual(tricky);
    });

    it('writes null in the signature slot when unsigned', () => {
        const content = encodeContent(message);
        expect(JSON.parse(content)[1]).toBeNull();
        const decoded = decodeContent(content, trade.publicKey);
        expect(decoded.ok && decoded.value.signature).toBeNull();
    });

    it('rejects a signature by another key', () => {
        const decoded = decodeContent(encodeContent(message, trade.secretKey), other.publicKey);
        expect(!decoded.ok && decoded.error.reason).toBe('bad-message-signature');
    });

    it('rejects content that is not JSON', () => {
        const decoded = decodeContent('{oops', trade.publicKey);
        expect(!decoded.ok && decoded.error.reason).toBe('malformed-message');
    });
});

describe('helpers', () => {
    it('keeps request ids within safe integers', () => {
        for (let i = 0; i < 200; i++) {
            const id = generateRequestId();
            expect(Number.isSafeInteger(id)).toBe(true);
            expect(id).toBeGreaterThanOrEqual(0);
        }
    });

    it('describes cant-do reasons', () => {
        expect(describeCantDo('invalid_signature')).toBe('Invalid signature - authentication failed');
        expect(describeCantDo('brand_new_reason')).toBe('Request rejected by the exchange (brand_new_reason)');
        expect(describeCantDo(null)).toBe('Request rejected by the exchange');
    });

    it('labels notifications', () => {
        expect(notificationLabel('add-invoice')).toBe('Invoice Request');
        expect(notificationLabel('fiat-sent-ok')).toBe('Fiat Received');
        expect(notificationLabel('new-order')).toBe('New Message');
    });

    it('finds the order in order and payment-request payloads', () => {
        const order = { amount: 1, fiat_code: 'EUR', fiat_amount: 10, payment_method: 'sepa', premium: 0 };
        expect(orderOf({ type: 'order', order })).toBe(order);
        expect(orderOf({ type: 'payment-request', order, invoice: 'lnbc1', amount: null })).toBe(order);
        expect(orderOf({ type: 'amount', amount: 5 })).toBeNull();
        expect(orderOf(null)).toBeNull();
    });

    it('knows which dispute statuses are final', () => {
        expect(isFinalDisputeStatus('settled')).toBe(true);
        expect(isFinalDisputeStatus('seller-refunded')).toBe(true);
        expect(isFinalDisputeStatus('released')).toBe(true);
        expect(isFinalDisputeStatus('in-progress')).toBe(false);
    });
});
