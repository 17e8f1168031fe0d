import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { schnorr } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, randomBytes, utf8ToBytes } from '@noble/hashes/utils';
import { DecodeError, type DecodeResult } from './errors.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Exchange protocol – wire messages carried inside gift-wrapped rumors
// Rumor content is the JSON tuple [message, signature | null]
// ——————————————————————————————————————————————————————————————————————————————————————————

export const PROTOCOL_VERSION = 1;
export const RUMOR_KIND = 1; // text note
export const SEAL_KIND = 13; // NIP-59 seal
export const GIFT_WRAP_KIND = 1059; // NIP-59 gift wrap
export const ORDER_EVENT_KIND = 38383; // NIP-69 order / dispute listing

export const MESSAGE_CATEGORIES = ['order', 'dispute', 'cant-do', 'rate', 'dm', 'restore'] as const;
export type MessageCategory = typeof MESSAGE_CATEGORIES[number];

export const ACTIONS = [
    'new-order',
    'take-sell',
    'take-buy',
    'pay-invoice',
    'fiat-sent',
    'fiat-sent-ok',
    'release',
    'released',
    'cancel',
    'canceled',
    'cooperative-cancel-initiated-by-you',
    'cooperative-cancel-initiated-by-peer',
    'cooperative-cancel-accepted',
    'dispute-initiated-by-you',
    'dispute-initiated-by-peer',
    'buyer-invoice-accepted',
    'purchase-completed',
    'hold-invoice-payment-accepted',
    'hold-invoice-payment-settled',
    'hold-invoice-payment-canceled',
    'waiting-seller-to-pay',
    'waiting-buyer-invoice',
    'add-invoice',
    'buyer-took-order',
    'rate',
    'rate-user',
    'rate-received',
    'cant-do',
    'dispute',
    'admin-cancel',
    'admin-canceled',
    'admin-settle',
    'admin-settled',
    'admin-add-solver',
    'admin-take-dispute',
    'admin-took-dispute',
    'payment-failed',
    'invoice-updated',
    'send-dm',
    'trade-pubkey',
    'restore-session',
    'last-trade-index'
] as const;
export type Action = typeof ACTIONS[number];

export const TRADE_STATUSES = [
    'pending',
    'waiting-buyer-invoice',
    'waiting-payment',
    'active',
    'fiat-sent',
    'settled-hold-invoice',
    'success',
    'canceled',
    'cooperatively-canceled',
    'canceled-by-admin',
    'settled-by-admin',
    'completed-by-admin',
    'dispute',
    'expired',
    'in-progress'
] as const;
export type TradeStatus = typeof TRADE_STATUSES[number];

export function isTradeStatus(value: string): value is TradeStatus {
    return (TRADE_STATUSES as readonly string[]).includes(value);
}

export const DISPUTE_STATUSES = ['initiated', 'in-progress', 'settled', 'seller-refunded', 'released'] as const;
export type DisputeStatus = typeof DISPUTE_STATUSES[number];

const FINAL_DISPUTE_STATUSES: ReadonlySet<DisputeStatus> = new Set<DisputeStatus>(['settled', 'seller-refunded', 'released']);

export function isDisputeStatus(value: string): value is DisputeStatus {
    return (DISPUTE_STATUSES as readonly string[]).includes(value);
}

export function isFinalDisputeStatus(status: DisputeStatus): boolean {
    return FINAL_DISPUTE_STATUSES.has(status);
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// PAYLOADS
// ——————————————————————————————————————————————————————————————————————————————————————————

export const smallOrderSchema = z.object({
    id: z.string().nullish(),
    kind: z.enum(['buy', 'sell']).nullish(),
    status: z.string().nullish(),
    amount: z.number().int(),
    fiat_code: z.string(),
    min_amount: z.number().nullish(),
    max_amount: z.number().nullish(),
    fiat_amount: z.number(),
    payment_method: z.string(),
    premium: z.number(),
    buyer_trade_pubkey: z.string().nullish(),
    seller_trade_pubkey: z.string().nullish(),
    buyer_invoice: z.string().nullish(),
    created_at: z.number().int().nullish(),
    expires_at: z.number().int().nullish()
});
export type SmallOrder = z.infer<typeof smallOrderSchema>;

export const solverDisputeInfoSchema = z.object({
    id: z.string(),
    kind: z.string().nullish(),
    status: z.string().nullish(),
    amount: z.number().nullish(),
    fiat_amount: z.number().nullish(),
    fiat_code: z.string().nullish(),
    premium: z.number().nullish(),
    payment_method: z.string().nullish(),
    fee: z.number().nullish(),
    initiator_pubkey: z.string().nullish(),
    buyer_pubkey: z.string().nullish(),
    seller_pubkey: z.string().nullish(),
    created_at: z.number().int().nullish(),
    taken_at: z.number().int().nullish()
});
export type SolverDisputeInfo = z.infer<typeof solverDisputeInfoSchema>;

export type Payload =
    | { type: 'order'; order: SmallOrder }
    | { type: 'payment-request'; order: SmallOrder | null; invoice: string; amount: number | null }
    | { type: 'text-message'; text: string }
    | { type: 'peer'; pubkey: string }
    | { type: 'rating-user'; rating: number }
    | { type: 'amount'; amount: number }
    | { type: 'dispute'; disputeId: string; info: SolverDisputeInfo | null }
    | { type: 'cant-do'; reason: string | null }
    | { type: 'next-trade'; pubkey: string; index: number }
    | { type: 'other'; raw: unknown };

const payloadSchema = z.union([
    z.object({ order: smallOrderSchema })
        .transform((p): Payload => ({ type: 'order', order: p.order })),
    z.object({ payment_request: z.tuple([smallOrderSchema.nullable(), z.string()]).rest(z.number().nullable()) })
        .transform((p): Payload => ({
            type: 'payment-request',
            order: p.payment_request[0],
            invoice: p.payment_request[1],
            amount: p.payment_request[2] ?? null
        })),
    z.object({ text_message: z.string() })
        .transform((p): Payload => ({ type: 'text-message', text: p.text_message })),
    z.object({ peer: z.object({ pubkey: z.string() }) })
        .transform((p): Payload => ({ type: 'peer', pubkey: p.peer.pubkey })),
    z.object({ rating_user: z.number().int() })
        .transform((p): Payload => ({ type: 'rating-user', rating: p.rating_user })),
    z.object({ amount: z.number().int() })
        .transform((p): Payload => ({ type: 'amount', amount: p.amount })),
    z.object({ dispute: z.tuple([z.string(), solverDisputeInfoSchema.nullish()]) })
        .transform((p): Payload => ({ type: 'dispute', disputeId: p.dispute[0], info: p.dispute[1] ?? null })),
    z.object({ cant_do: z.string().nullable() })
        .transform((p): Payload => ({ type: 'cant-do', reason: p.cant_do })),
    z.object({ next_trade: z.tuple([z.string(), z.number().int()]) })
        .transform((p): Payload => ({ type: 'next-trade', pubkey: p.next_trade[0], index: p.next_trade[1] }))
]);

function parsePayload(raw: unknown): Payload | null {
    if (raw === null || raw === undefined) { return null; }
    const parsed = payloadSchema.safeParse(raw);
    return parsed.success ? parsed.data : { type: 'other', raw };
}

function payloadToWire(payload: Payload): unknown {
    switch (payload.type) {
        case 'order': return { order: payload.order };
        case 'payment-request': return { payment_request: [payload.order, payload.invoice, payload.amount] };
        case 'text-message': return { text_message: payload.text };
        case 'peer': return { peer: { pubkey: payload.pubkey, reputation: null } };
        case 'rating-user': return { rating_user: payload.rating };
        case 'amount': return { amount: payload.amount };
        case 'dispute': return { dispute: [payload.disputeId, payload.info] };
        case 'cant-do': return { cant_do: payload.reason };
        case 'next-trade': return { next_trade: [payload.pubkey, payload.index] };
        case 'other': return payload.raw;
    }
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// MESSAGES
// ——————————————————————————————————————————————————————————————————————————————————————————

export interface MessageKind {
    version: number;
    requestId: number | null;
    tradeIndex: number | null;
    id: string | null;
    action: Action;
    payload: Payload | null;
}

export interface ProtocolMessage {
    category: MessageCategory;
    kind: MessageKind;
}

const wireKindSchema = z.object({
    version: z.number().int(),
    request_id: z.number().int().nonnegative().nullish(),
    trade_index: z.number().int().nullish(),
    id: z.string().nullish(),
    action: z.enum(ACTIONS),
    payload: z.unknown().optional()
});

const wireMessageSchema = z.object({
    'order': wireKindSchema.optional(),
    'dispute': wireKindSchema.optional(),
    'cant-do': wireKindSchema.optional(),
    'rate': wireKindSchema.optional(),
    'dm': wireKindSchema.optional(),
    'restore': wireKindSchema.optional()
});

export function createMessage(
    category: MessageCategory,
    action: Action,
    fields: { id?: string; requestId?: number; tradeIndex?: number; payload?: Payload } = {}
): ProtocolMessage {
    return {
        category,
        kind: {
            version: PROTOCOL_VERSION,
            requestId: fields.requestId ?? null,
            tradeIndex: fields.tradeIndex ?? null,
            id: fields.id ?? null,
            action,
            payload: fields.payload ?? null
        }
    };
}

export function toWireMessage(message: ProtocolMessage): Record<string, unknown> {
    const { kind } = message;
    return {
        [message.category]: {
            version: kind.version,
            request_id: kind.requestId,
            trade_index: kind.tradeIndex,
            id: kind.id,
            action: kind.action,
            payload: kind.payload ? payloadToWire(kind.payload) : null
        }
    };
}

export function parseMessage(raw: unknown): DecodeResult<ProtocolMessage> {
    const parsed = wireMessageSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: new DecodeError('malformed-message', `Malformed message: ${parsed.error.issues[0]?.message ?? 'invalid'}`) };
    }
    for (const category of MESSAGE_CATEGORIES) {
        const kind = parsed.data[category];
        if (!kind) { continue; }
        return {
            ok: true,
            value: {
                category,
                kind: {
                    version: kind.version,
                    requestId: kind.request_id ?? null,
                    tradeIndex: kind.trade_index ?? null,
                    id: kind.id ?? null,
                    action: kind.action,
                    payload: parsePayload(kind.payload)
                }
            }
        };
    }
    return { ok: false, error: new DecodeError('malformed-message', 'Message has no known category') };
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// CONTENT TUPLE + MESSAGE SIGNATURES
// ——————————————————————————————————————————————————————————————————————————————————————————

/** Schnorr signature over SHA-256 of the serialized message */
export function signMessage(serialized: string, secretKey: Uint8Array): string {
    return bytesToHex(schnorr.sign(sha256(utf8ToBytes(serialized)), secretKey));
}

export function verifyMessageSignature(serialized: string, signature: string, publicKey: string): boolean {
    try {
        return schnorr.verify(signature, sha256(utf8ToBytes(serialized)), publicKey);
    } catch {
        return false;
    }
}

/** Rumor content; signs with the trade key when one is given */
export function encodeContent(message: ProtocolMessage, signer?: Uint8Array): string {
    const wire = toWireMessage(message);
    const signature = signer ? signMessage(JSON.stringify(wire), signer) : null;
    return JSON.stringify([wire, signature]);
}

export interface DecodedContent {
    message: ProtocolMessage;
    signature: string | null;
}

/** Source text of the first element of a JSON array, as written by the sender */
function firstElementSource(json: string): string | null {
    let i = json.indexOf('[') + 1;
    if (i === 0) { return null; }
    while (i < json.length && /\s/.test(json.charAt(i))) { i++; }
    const start = i;
    let depth = 0;
    let inString = false;
    for (; i < json.length; i++) {
        const ch = json.charAt(i);
        if (inString) {
            if (ch === '\\') {
                i++;
            } else if (ch === '"') {
                inString = false;
            }
            continue;
        }
        if (ch === '"') {
            inString = true;
        } else if (ch === '{' || ch === '[') {
            depth++;
        } else if (ch === '}' || ch === ']') {
            if (depth === 0) { return json.slice(start, i).trimEnd(); }
            depth--;
        } else if (ch === ',' && depth === 0) {
            return json.slice(start, i).trimEnd();
        }
    }
    return null;
}

/**
 * Reads a rumor's content. The signature covers the message bytes exactly as
 * they appear in the tuple, whatever key order or spacing the sender used.
 */
export function decodeContent(content: string, authorPubkey: string): DecodeResult<DecodedContent> {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (err) {
        return { ok: false, error: new DecodeError('malformed-message', 'Rumor content is not JSON', { cause: err }) };
    }

    let wire: unknown = raw;
    let signature: string | null = null;
    if (Array.isArray(raw)) {
        wire = raw[0];
        const candidate: unknown = raw[1];
        if (typeof candidate === 'string') {
            signature = candidate;
        } else if (candidate !== null && candidate !== undefined) {
            return { ok: false, error: new DecodeError('malformed-message', 'Signature slot is neither a string nor null') };
        }
    }

    if (signature !== null) {
        const signed = firstElementSource(content) ?? JSON.stringify(wire);
        if (!verifyMessageSignature(signed, signature, authorPubkey)) {
            return { ok: false, error: new DecodeError('bad-message-signature', 'Message signature does not match the trade key') };
        }
    }

    const parsed = parseMessage(wire);
    if (!parsed.ok) { return parsed; }
    return { ok: true, value: { message: parsed.value, signature } };
}

/** Random correlation id kept under 2^53 so it survives JSON number handling */
export function generateRequestId(): number {
    const bytes = randomBytes(8);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return (view.getUint32(0) & 0x1fffff) * 0x100000000 + view.getUint32(4);
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// USER-FACING TEXT
// ——————————————————————————————————————————————————————————————————————————————————————————

let cantDoDescriptions: Record<string, string> | null = null;

function loadCantDoDescriptions(): Record<string, string> {
    if (!cantDoDescriptions) {
        const text = readFileSync(new URL('../data/cant-do-reasons.json', import.meta.url), 'utf8');
        cantDoDescriptions = z.record(z.string()).parse(JSON.parse(text));
    }
    return cantDoDescriptions;
}

export function describeCantDo(reason: string | null): string {
    if (!reason) { return 'Request rejected by the exchange'; }
    return loadCantDoDescriptions()[reason] ?? `Request rejected by the exchange (${reason})`;
}

export function notificationLabel(action: Action): string {
    switch (action) {
        case 'add-invoice': return 'Invoice Request';
        case 'pay-invoice': return 'Payment Request';
        case 'take-sell': return 'Sell Order Taken';
        case 'take-buy': return 'Buy Order Taken';
        case 'fiat-sent': return 'Fiat Sent';
        case 'fiat-sent-ok': return 'Fiat Received';
        case 'release':
        case 'released': return 'Funds Released';
        case 'dispute':
        case 'dispute-initiated-by-you':
        case 'dispute-initiated-by-peer': return 'Dispute';
        case 'waiting-seller-to-pay': return 'Waiting For Seller';
        case 'waiting-buyer-invoice': return 'Waiting For Buyer';
        case 'rate': return 'Rate Counterparty';
        case 'rate-received': return 'Rating Received';
        case 'cant-do': return 'Request Rejected';
        default: return 'New Message';
    }
}

/** Order carried by an order or payment-request payload */
export function orderOf(payload: Payload | null): SmallOrder | null {
    if (!payload) { return null; }
    if (payload.type === 'order') { return payload.order; }
    if (payload.type === 'payment-request') { return payload.order; }
    return null;
}
