import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateSecretKey } from 'nostr-tools';
import { AdminService, disputeFromInfo } from '../src/admin.js';
import { RequestCorrelator } from '../src/correlator.js';
import { DisputeChatSync } from '../src/disputeChat.js';
import { deriveSharedKey, keyPairFromSecret, npubOf, type KeyPair } from '../src/keys.js';
import type { SolverDisputeInfo } from '../src/protocol.js';
import { SqliteStore } from '../src/store.js';
import { TranscriptStore } from '../src/transcript.js';
import { FakeExchange, replyTo } from './support/fakeExchange.js';
import { FakeRelay } from './support/fakeRelay.js';
import { makeDispute } from './support/fixtures.js';
import { rejectionOf, tempDir } from './support/helpers.js';

describe('disputeFromInfo', () => {
    it('keys the record by dispute id and keeps the order id', () => {
        const record = disputeFromInfo('dispute-9', { id: 'order-9', fiat_code: 'USD', amount: 2100, taken_at: 1700000500 }, 1700000000);
        expect(record).toMatchObject({
            id: 'dispute-9',
            orderId: 'order-9',
            status: 'in-progress',
            fiatCode: 'USD',
            amount: 2100,
            takenAt: 1700000500,
            createdAt: 1700000000,
            initiatorPubkey: ''
        });
    });
});

describe('AdminService', () => {
    let relay: FakeRelay;
    let exchange: FakeExchange;
    let store: SqliteStore;
    let admin: KeyPair;
    let buyer: KeyPair;
    let seller: KeyPair;
    let chat: DisputeChatSync;
    let service: AdminService;

    function solverInfo(): SolverDisputeInfo {
        return {
            id: 'order-1',
            kind: 'sell',
            status: 'dispute',
            amount: 5000,
            fiat_amount: 50,
            fiat_code: 'EUR',
            premium: 0,
            payment_method: 'sepa',
            fee: 10,
            initiator_pubkey: buyer.publicKey,
            buyer_pubkey: buyer.publicKey,
            seller_pubkey: seller.publicKey,
            created_at: 1699990000,
            taken_at: 1700000000
        };
    }

    beforeEach(() => {
        relay = new FakeRelay();
        exchange = new FakeExchange(relay);
        store = new SqliteStore(':memory:');
        admin = keyPairFromSecret(generateSecretKey());
        buyer = keyPairFromSecret(generateSecretKey());
        seller = keyPairFromSecret(generateSecretKey());
        chat = new DisputeChatSync(store, relay, new TranscriptStore(join(tempDir(), 'chats')), admin);
        const correlator = new RequestCorrelator(relay, { timeoutMs: 300 });
        service = new AdminService(store, admin, correlator, exchange.pubkey, chat);
    });

    afterEach(() => {
        store.close();
    });

    describe('takeDispute', () => {
        it('stores the dispute and opens both chat channels', async () => {
            exchange.answer((req) => [replyTo(req, 'admin-took-dispute', { type: 'dispute', disputeId: 'dispute-1', info: solverInfo() })]);
            const { dispute, channels } = await service.takeDispute('dispute-1');

            const [request] = exchange.received;
            expect(request?.message.category).toBe('dispute');
            expect(request?.message.kind.action).toBe('admin-take-dispute');
            expect(request?.message.kind.id).toBe('dispute-1');
            expect(request?.signed).toBe(false);
            expect(request?.tradePubkey).toBe(admin.publicKey);

            expect(dispute).toMatchObject({ id: 'dispute-1', orderId: 'order-1', status: 'in-progress', fee: 10 });
            expect(store.getDispute('dispute-1')?.buyerPubkey).toBe(buyer.publicKey);
            expect(channels.buyer?.sharedKey.publicKey).toBe(deriveSharedKey(buyer.secretKey, admin.publicKey).publicKey);
            expect(channels.seller?.sharedKey.publicKey).toBe(deriveSharedKey(seller.secretKey, admin.publicKey).publicKey);
            expect(store.getSharedKey('dispute-1', 'seller')).not.toBeNull();
        });

        it('refuses a reply about another dispute', async () => {
            exchange.answer((req) => [replyTo(req, 'admin-took-dispute', { type: 'dispute', disputeId: 'dispute-2', info: solverInfo() })]);
            const err = await rejectionOf(service.takeDispute('dispute-1'));
            expect(err.code).toBe('MISMATCH');
            expect(store.getDispute('dispute-1')).toBeNull();
        });

        it('refuses a reply without solver info', async () => {
            exchange.answer((req) => [replyTo(req, 'admin-took-dispute', { type: 'dispute', disputeId: 'dispute-1', info: null })]);
            expect((await rejectionOf(service.takeDispute('dispute-1'))).code).toBe('UNEXPECTED_ACTION');
        });

        it('does not act on a reply that did not come from the exchange', async () => {
            const impostor = new FakeExchange(new FakeRelay());
            exchange.answer((req) => {
                relay.inject(impostor.wrapFor(admin.publicKey, replyTo(req, 'admin-took-dispute', {
                    type: 'dispute', disputeId: 'dispute-1', info: solverInfo()
                })));
                return [];
            });
            expect((await rejectionOf(service.takeDispute('dispute-1'))).code).toBe('TIMEOUT');
            expect(store.getDispute('dispute-1')).toBeNull();
        });

        it('passes on a refusal from the exchange', async () => {
            exchange.answer((req) => [replyTo(req, 'cant-do', { type: 'cant-do', reason: 'dispute_not_found' })]);
            expect((await rejectionOf(service.takeDispute('dispute-1'))).code).toBe('CANT_DO');
        });
    });

    describe('settle and cancel', () => {
        beforeEach(() => {
            store.saveDispute(makeDispute());
        });

        it('settles and marks the dispute final', async () => {
            exchange.answer((req) => [replyTo(req, 'admin-settled')]);
            const resolved = await service.settle('dispute-1');
            expect(resolved.status).toBe('settled');
            expect(store.getDispute('dispute-1')?.status).toBe('settled');
            expect(exchange.received[0]?.message.kind).toMatchObject({ action: 'admin-settle', id: 'dispute-1' });
        });

        it('refunds the seller on cancel', async () => {
            exchange.answer((req) => [replyTo(req, 'admin-canceled')]);
            expect((await service.cancel('dispute-1')).status).toBe('seller-refunded');
            expect(exchange.received[0]?.message.kind.action).toBe('admin-cancel');
        });

        it('does nothing to a dispute that is already closed', async () => {
            store.setDisputeStatus('dispute-1', 'seller-refunded');
            expect((await rejectionOf(service.settle('dispute-1'))).code).toBe('FINALIZED');
            expect(exchange.received).toEqual([]);
        });

        it('keeps the status when the exchange refuses', async () => {
            exchange.answer((req) => [replyTo(req, 'cant-do', { type: 'cant-do', reason: 'not_allowed_by_status' })]);
            expect((await rejectionOf(service.settle('dispute-1'))).code).toBe('CANT_DO');
            expect(store.getDispute('dispute-1')?.status).toBe('in-progress');
        });

        it('needs a known dispute', async () => {
            expect((await rejectionOf(service.cancel('unknown'))).code).toBe('INVALID_INPUT');
        });
    });

    describe('addSolver', () => {
        it('sends the npub without waiting for a reply', async () => {
            const solver = keyPairFromSecret(generateSecretKey());
            const npub = await service.addSolver(solver.publicKey);
            expect(npub).toBe(npubOf(solver.publicKey));

            const [request] = exchange.received;
            expect(request?.message.kind.action).toBe('admin-add-solver');
            expect(request?.message.kind.payload).toEqual({ type: 'text-message', text: npub });
            expect(request?.message.kind.id).toMatch(/^[0-9a-f-]{36}$/);
            expect(relay.subscriptionCount).toBe(0);
        });

        it('accepts an npub and rejects garbage', async () => {
            const solver = keyPairFromSecret(generateSecretKey());
            expect(await service.addSolver(npubOf(solver.publicKey))).toBe(npubOf(solver.publicKey));
            expect((await rejectionOf(service.addSolver('not-a-key'))).code).toBe('INVALID_PUBKEY');
        });
    });
});
