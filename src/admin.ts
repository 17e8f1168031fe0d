import { randomUUID } from 'node:crypto';
import { expectResponse, type RequestCorrelator } from './correlator.js';
import type { DecodedEnvelope } from './envelope.js';
import { ClientError } from './errors.js';
import { npubOf, parsePublicKey, type KeyPair } from './keys.js';
import { createLogger } from './logger.js';
import {
    createMessage,
    generateRequestId,
    isFinalDisputeStatus,
    type Action,
    type DisputeStatus,
    type Payload,
    type SolverDisputeInfo
} from './protocol.js';
import type { ChatChannel, DisputeChatSync } from './disputeChat.js';
import type { AdminDisputeRecord, ChatParty } from './store.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Admin / solver actions – full-privacy messages signed by the configured admin key
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Admin');

export interface AdminDisputeStore {
    getDispute(id: string): AdminDisputeRecord | null;
    saveDispute(dispute: AdminDisputeRecord): void;
    setDisputeStatus(id: string, status: DisputeStatus): number;
}

export type DisputeResolution = 'settle' | 'cancel';

const RESOLUTIONS: Record<DisputeResolution, { action: Action; status: DisputeStatus; replies: readonly Action[] }> = {
    settle: { action: 'admin-settle', status: 'settled', replies: ['admin-settled', 'admin-settle'] },
    cancel: { action: 'admin-cancel', status: 'seller-refunded', replies: ['admin-canceled', 'admin-cancel'] }
};

/** Dispute record built from the solver info the exchange returns when a dispute is taken */
export function disputeFromInfo(disputeId: string, info: SolverDisputeInfo, takenAt: number): AdminDisputeRecord {
    return {
        id: disputeId,
        orderId: info.id,
        kind: info.kind ?? null,
        status: 'in-progress',
        initiatorPubkey: info.initiator_pubkey ?? '',
        buyerPubkey: info.buyer_pubkey ?? null,
        sellerPubkey: info.seller_pubkey ?? null,
        amount: info.amount ?? 0,
        fiatAmount: info.fiat_amount ?? 0,
        fiatCode: info.fiat_code ?? null,
        premium: info.premium ?? 0,
        paymentMethod: info.payment_method ?? '',
        fee: info.fee ?? 0,
        buyerSharedKey: null,
        sellerSharedKey: null,
        buyerChatLastSeen: null,
        sellerChatLastSeen: null,
        takenAt: info.taken_at ?? takenAt,
        createdAt: info.created_at ?? takenAt
    };
}

export class AdminService {
    constructor(
        private readonly store: AdminDisputeStore,
        private readonly admin: KeyPair,
        private readonly correlator: RequestCorrelator,
        private readonly mostroPubkey: string,
        private readonly chat: DisputeChatSync | null = null
    ) {}

    private request(action: Action, id: string, expected: readonly Action[], payload?: Payload): Promise<DecodedEnvelope> {
        const message = createMessage('dispute', action, { id, requestId: generateRequestId(), payload });
        return this.correlator.request({
            message,
            keys: { trade: this.admin },
            recipient: this.mostroPubkey,
            mode: 'full-privacy',
            expectedAction: expected[0]
        }).then((outcome) => expectResponse(outcome, expected));
    }

    /**
     * Claims a dispute. The reply must carry the same dispute id with its
     * solver info; both chat keys are derived at once.
     */
    async takeDispute(disputeId: string): Promise<{ dispute: AdminDisputeRecord; channels: Partial<Record<ChatParty, ChatChannel>> }> {
        const response = await this.request('admin-take-dispute', disputeId, ['admin-took-dispute']);
        const payload = response.message.kind.payload;
        if (payload?.type !== 'dispute' || !payload.info) {
            throw new ClientError('UNEXPECTED_ACTION', 'admin-took-dispute reply carries no dispute info');
        }
        if (payload.disputeId !== disputeId) {
            throw new ClientError('MISMATCH', `Reply is for dispute ${payload.disputeId}, expected ${disputeId}`, {
                expected: disputeId,
                received: payload.disputeId
            });
        }

        const dispute = disputeFromInfo(disputeId, payload.info, response.timestamp);
        this.store.saveDispute(dispute);
        this.store.setDisputeStatus(disputeId, 'in-progress');
        log.info(`Dispute ${disputeId} taken (order ${dispute.orderId ?? '?'})`);
        const channels = this.chat ? this.chat.ensureSharedKeys(dispute) : {};
        return { dispute, channels };
    }

    settle(disputeId: string): Promise<AdminDisputeRecord> {
        return this.resolve(disputeId, 'settle');
    }

    cancel(disputeId: string): Promise<AdminDisputeRecord> {
        return this.resolve(disputeId, 'cancel');
    }

    private async resolve(disputeId: string, resolution: DisputeResolution): Promise<AdminDisputeRecord> {
        const dispute = this.store.getDispute(disputeId);
        if (!dispute) {
            throw new ClientError('INVALID_INPUT', `Unknown dispute ${disputeId}`);
        }
        if (isFinalDisputeStatus(dispute.status)) {
            throw new ClientError('FINALIZED', `Dispute ${disputeId} is already ${dispute.status}`);
        }
        const { action, status, replies } = RESOLUTIONS[resolution];
        await this.request(action, disputeId, replies);
        this.store.setDisputeStatus(disputeId, status);
        log.info(`Dispute ${disputeId} ${status}`);
        return { ...dispute, status };
    }

    /** Fire and forget: the exchange does not answer this one */
    async addSolver(pubkey: string): Promise<string> {
        const npub = npubOf(parsePublicKey(pubkey));
        const message = createMessage('dispute', 'admin-add-solver', {
            id: randomUUID(),
            payload: { type: 'text-message', text: npub }
        });
        await this.correlator.publishOnly({
            message,
            keys: { trade: this.admin },
            recipient: this.mostroPubkey,
            mode: 'full-privacy'
        });
        log.info(`Solver ${npub} added`);
        return npub;
    }
}
