import { describe, expect, it } from 'vitest';
import { generateSecretKey } from 'nostr-tools';
import {
    decodeChatWrap,
    decodeEnvelope,
    encodeChatWrap,
    encodeEnvelope,
    TIMESTAMP_TWEAK_SECONDS
} from '../src/envelope.js';
import { deriveSharedKey, KeyDeriver, keyPairFromSecret } from '../src/keys.js';
import { createMessage, GIFT_WRAP_KIND } from '../src/protocol.js';
import { overTheWire } from './support/fakeRelay.js';
import { catchClientError, TEST_SEED } from './support/helpers.js';

const keys = new KeyDeriver(TEST_SEED);
const identity = keys.identityKey();
const trade = keys.tradeKey(1);
const exchange = keyPairFromSecret(generateSecretKey());
const NOW = 1700000000;

const message = createMessage('order', 'take-sell', { id: 'order-1', requestId: 99, tradeIndex: 1, payload: { type: 'amount', amount: 25 } });

describe('encodeEnvelope / decodeEnvelope', () => {
    it('round-trips in reputation mode with a signed tuple', () => {
        const wrap = encodeEnvelope(message, { trade, identity }, exchange.publicKey, 'reputation', { now: NOW });
        const decoded = decodeEnvelope(overTheWire(wrap), exchange.secretKey);
        expect(decoded.ok).toBe(true);
        if (!decoded.ok) { return; }
        expect(decoded.value.message).toEqual(message);
        expect(decoded.value.signed).toBe(true);
        expect(decoded.value.sender).toBe(identity.publicKey);
        expect(decoded.value.tradePubkey).toBe(trade.publicKey);
        expect(decoded.value.timestamp).toBe(NOW);
        expect(decoded.value.wrapId).toBe(wrap.id);
    });

    it('round-trips in full-privacy mode with no signature', () => {
        const wrap = encodeEnvelope(message, { trade }, exchange.publicKey, 'full-privacy', { now: NOW });
        const decoded = decodeEnvelope(overTheWire(wrap), exchange.secretKey);
        expect(decoded.ok && decoded.value.signed).toBe(false);
        expect(decoded.ok && decoded.value.sender).toBe(trade.publicKey);
        expect(decoded.ok && decoded.value.tradePubkey).toBe(trade.publicKey);
    });

    it('signs the wrap with a fresh key and tags the recipient', () => {
        const first = encodeEnvelope(message, { trade }, exchange.publicKey, 'full-privacy', { now: NOW, expiration: NOW + 3600 });
        const second = encodeEnvelope(message, { trade }, exchange.publicKey, 'full-privacy', { now: NOW });
        expect(first.kind).toBe(GIFT_WRAP_KIND);
        expect(first.pubkey).not.toBe(trade.publicKey);
        expect(first.pubkey).not.toBe(second.pubkey);
        expect(first.tags).toEqual([['p', exchange.publicKey], ['expiration', String(NOW + 3600)]]);
        expect(second.tags).toEqual([['p', exchange.publicKey]]);
    });

    it('pushes the wrap timestamp into the past by at most two days', () => {
        for (let i = 0; i < 20; i++) {
            const wrap = encodeEnvelope(message, { trade }, exchange.publicKey, 'full-privacy', { now: NOW });
            expect(wrap.created_at).toBeLessThanOrEqual(NOW);
            expect(wrap.created_at).toBeGreaterThan(NOW - TIMESTAMP_TWEAK_SECONDS);
        }
    });

    it('needs the identity key in reputation mode', () => {
        const err = catchClientError(() => encodeEnvelope(message, { trade }, exchange.publicKey, 'reputation'));
        expect(err.code).toBe('INVALID_INPUT');
    });

    it('refuses an invalid recipient', () => {
        const err = catchClientError(() => encodeEnvelope(message, { trade }, 'nope', 'full-privacy'));
        expect(err.code).toBe('INVALID_PUBKEY');
    });

    it('reports which layer failed', () => {
        const wrap = overTheWire(encodeEnvelope(message, { trade, identity }, exchange.publicKey, 'reputation', { now: NOW }));

        const tampered = { ...wrap, content: wrap.content.slice(0, -4) + 'AAAA' };
        const badSig = decodeEnvelope(tampered, exchange.secretKey);
        expect(!badSig.ok && badSig.error.reason).toBe('bad-wrap-signature');

        const wrongKey = decodeEnvelope(wrap, trade.secretKey);
        expect(!wrongKey.ok && wrongKey.error.reason).toBe('wrap-decrypt');

        const wrongKind = decodeEnvelope({ ...wrap, kind: 4 }, exchange.secretKey);
        expect(!wrongKind.ok && wrongKind.error.reason).toBe('wrong-kind');
        expect(!wrongKind.ok && wrongKind.error.code).toBe('DECODE');
    });

    it('does not read a chat wrap as an exchange message', () => {
        const { wrap } = encodeChatWrap(trade, exchange.publicKey, 'hello', { now: NOW });
        const decoded = decodeEnvelope(overTheWire(wrap), exchange.secretKey);
        expect(!decoded.ok && decoded.error.reason).toBe('malformed-seal');
    });
});

describe('dispute chat wraps', () => {
    const admin = keyPairFromSecret(generateSecretKey());
    const buyer = keys.tradeKey(2);
    const shared = deriveSharedKey(admin.secretKey, buyer.publicKey);

    it('is readable by both ends of the shared key', () => {
        const { wrap, inner } = encodeChatWrap(admin, shared.publicKey, 'please upload the receipt', { now: NOW });
        expect(wrap.tags).toEqual([['p', shared.publicKey]]);

        const buyerSide = deriveSharedKey(buyer.secretKey, admin.publicKey);
        const decoded = decodeChatWrap(overTheWire(wrap), buyerSide.secretKey);
        expect(decoded).toEqual({
            ok: true,
            value: { id: inner.id, author: admin.publicKey, content: 'please upload the receipt', timestamp: NOW, wrapId: wrap.id }
        });
    });

    it('cannot be read with another key', () => {
        const { wrap } = encodeChatWrap(admin, shared.publicKey, 'secret', { now: NOW });
        const decoded = decodeChatWrap(overTheWire(wrap), trade.secretKey);
        expect(!decoded.ok && decoded.error.reason).toBe('wrap-decrypt');
    });
});
