import { finalizeEvent, generateSecretKey, getEventHash, getPublicKey, nip13, nip44, verifyEvent } from 'nostr-tools';
import type { EventTemplate, UnsignedEvent } from 'nostr-tools';
import { z } from 'zod';
import { ClientError, DecodeError, type DecodeFailure, type DecodeResult } from './errors.js';
import { isValidPublicKey, type KeyPair } from './keys.js';
import { decodeContent, encodeContent, GIFT_WRAP_KIND, RUMOR_KIND, SEAL_KIND, type ProtocolMessage } from './protocol.js';
import type { NostrEvent } from './relayPool.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// EnvelopeCodec – NIP-59 style gift wrap: OuterWrap (1059) / Seal (13) / Rumor (1)
// Reputation mode: seal signed by the identity key, rumor by the trade key
// Full-privacy mode: seal and rumor both by the trade key
// ——————————————————————————————————————————————————————————————————————————————————————————

export type PrivacyMode = 'reputation' | 'full-privacy';

/** Seal and wrap timestamps are pushed up to this far into the past */
export const TIMESTAMP_TWEAK_SECONDS = 2 * 24 * 60 * 60;

export interface EnvelopeKeys {
    trade: KeyPair;
    identity?: KeyPair;
}

export interface EncodeOptions {
    pow?: number;        // NIP-13 difficulty, 0 = none
    expiration?: number; // NIP-40 unix seconds
    now?: number;
}

export interface DecodedEnvelope {
    message: ProtocolMessage;
    signed: boolean;
    sender: string;       // seal author: identity key in reputation mode, trade key otherwise
    tradePubkey: string;  // rumor author
    timestamp: number;    // rumor created_at
    wrapId: string;
}

export interface ChatEnvelope {
    id: string;
    author: string;
    content: string;
    timestamp: number;
    wrapId: string;
}

interface Rumor extends UnsignedEvent {
    id: string;
}

const signedEventSchema = z.object({
    id: z.string(),
    pubkey: z.string(),
    created_at: z.number().int(),
    kind: z.number().int(),
    tags: z.array(z.array(z.string())),
    content: z.string(),
    sig: z.string()
});

const rumorSchema = signedEventSchema.omit({ sig: true });

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

function randomPastTimestamp(now: number): number {
    return now - Math.floor(Math.random() * TIMESTAMP_TWEAK_SECONDS);
}

function fail<T>(reason: DecodeFailure, message: string, cause?: unknown): DecodeResult<T> {
    return { ok: false, error: new DecodeError(reason, message, cause === undefined ? undefined : { cause }) };
}

function parseJson<T>(schema: z.ZodType<T>, text: string): T | null {
    try {
        const parsed = schema.safeParse(JSON.parse(text));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

function requireRecipient(pubkey: string): void {
    if (!isValidPublicKey(pubkey)) {
        throw new ClientError('INVALID_PUBKEY', `Recipient is not a valid public key: ${pubkey.slice(0, 16)}…`);
    }
}

function buildRumor(content: string, pubkey: string, createdAt: number, pow: number): Rumor {
    const unsigned: UnsignedEvent = { kind: RUMOR_KIND, pubkey, created_at: createdAt, tags: [], content };
    if (pow > 0) {
        const mined = nip13.minePow(unsigned, pow);
        return { kind: mined.kind, pubkey: mined.pubkey, created_at: mined.created_at, tags: mined.tags, content: mined.content, id: mined.id };
    }
    return { ...unsigned, id: getEventHash(unsigned) };
}

function signWrap(template: EventTemplate, ephemeral: Uint8Array, pow: number): NostrEvent {
    if (pow > 0) {
        const mined = nip13.minePow({ ...template, pubkey: getPublicKey(ephemeral) }, pow);
        return finalizeEvent({ kind: mined.kind, created_at: mined.created_at, tags: mined.tags, content: mined.content }, ephemeral);
    }
    return finalizeEvent(template, ephemeral);
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// EXCHANGE MESSAGES
// ——————————————————————————————————————————————————————————————————————————————————————————

export function encodeEnvelope(
    message: ProtocolMessage,
    keys: EnvelopeKeys,
    recipient: string,
    mode: PrivacyMode,
    options: EncodeOptions = {}
): NostrEvent {
    requireRecipient(recipient);
    const now = options.now ?? nowSeconds();

    let sealSigner: KeyPair = keys.trade;
    if (mode === 'reputation') {
        if (!keys.identity) {
            throw new ClientError('INVALID_INPUT', 'Reputation mode needs the identity key');
        }
        sealSigner = keys.identity;
    }

    const content = encodeContent(message, mode === 'reputation' ? keys.trade.secretKey : undefined);
    const rumor = buildRumor(content, keys.trade.publicKey, now, options.pow ?? 0);

    const seal = finalizeEvent({
        kind: SEAL_KIND,
        created_at: randomPastTimestamp(now),
        tags: [],
        content: nip44.encrypt(JSON.stringify(rumor), nip44.getConversationKey(sealSigner.secretKey, recipient))
    }, sealSigner.secretKey);

    const ephemeral = generateSecretKey();
    const tags: string[][] = [['p', recipient]];
    if (options.expiration !== undefined) {
        tags.push(['expiration', String(options.expiration)]);
    }
    return finalizeEvent({
        kind: GIFT_WRAP_KIND,
        created_at: randomPastTimestamp(now),
        tags,
        content: nip44.encrypt(JSON.stringify(seal), nip44.getConversationKey(ephemeral, recipient))
    }, ephemeral);
}

export function decodeEnvelope(event: NostrEvent, recipientSecret: Uint8Array): DecodeResult<DecodedEnvelope> {
    if (event.kind !== GIFT_WRAP_KIND) {
        return fail('wrong-kind', `Expected kind ${GIFT_WRAP_KIND}, got ${event.kind}`);
    }
    if (!verifyEvent(event)) {
        return fail('bad-wrap-signature', `Wrap ${event.id} has an invalid signature`);
    }

    let sealText: string;
    try {
        sealText = nip44.decrypt(event.content, nip44.getConversationKey(recipientSecret, event.pubkey));
    } catch (err) {
        return fail('wrap-decrypt', `Wrap ${event.id} is not addressed to this key`, err);
    }
    const seal = parseJson(signedEventSchema, sealText);
    if (!seal || seal.kind !== SEAL_KIND) {
        return fail('malformed-seal', `Wrap ${event.id} does not contain a seal`);
    }
    if (!verifyEvent(seal)) {
        return fail('bad-seal-signature', `Seal inside ${event.id} has an invalid signature`);
    }

    let rumorText: string;
    try {
        rumorText = nip44.decrypt(seal.content, nip44.getConversationKey(recipientSecret, seal.pubkey));
    } catch (err) {
        return fail('seal-decrypt', `Seal inside ${event.id} could not be decrypted`, err);
    }
    const rumor = parseJson(rumorSchema, rumorText);
    if (!rumor || rumor.kind !== RUMOR_KIND) {
        return fail('malformed-rumor', `Wrap ${event.id} does not contain a text-note rumor`);
    }

    const content = decodeContent(rumor.content, rumor.pubkey);
    if (!content.ok) { return content; }

    return {
        ok: true,
        value: {
            message: content.value.message,
            signed: content.value.signature !== null,
            sender: seal.pubkey,
            tradePubkey: rumor.pubkey,
            timestamp: rumor.created_at,
            wrapId: event.id
        }
    };
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// DISPUTE CHAT (wrap addressed to a shared key, signed text note inside)
// ——————————————————————————————————————————————————————————————————————————————————————————

export function encodeChatWrap(
    sender: KeyPair,
    sharedPublicKey: string,
    text: string,
    options: { pow?: number; now?: number } = {}
): { wrap: NostrEvent; inner: NostrEvent } {
    requireRecipient(sharedPublicKey);
    const now = options.now ?? nowSeconds();
    const inner = finalizeEvent({ kind: RUMOR_KIND, created_at: now, tags: [], content: text }, sender.secretKey);
    const ephemeral = generateSecretKey();
    const wrap = signWrap({
        kind: GIFT_WRAP_KIND,
        created_at: randomPastTimestamp(now),
        tags: [['p', sharedPublicKey]],
        content: nip44.encrypt(JSON.stringify(inner), nip44.getConversationKey(ephemeral, sharedPublicKey))
    }, ephemeral, options.pow ?? 0);
    return { wrap, inner };
}

export function decodeChatWrap(event: NostrEvent, sharedSecret: Uint8Array): DecodeResult<ChatEnvelope> {
    if (event.kind !== GIFT_WRAP_KIND) {
        return fail('wrong-kind', `Expected kind ${GIFT_WRAP_KIND}, got ${event.kind}`);
    }
    let innerText: string;
    try {
        innerText = nip44.decrypt(event.content, nip44.getConversationKey(sharedSecret, event.pubkey));
    } catch (err) {
        return fail('wrap-decrypt', `Chat wrap ${event.id} could not be decrypted`, err);
    }
    const inner = parseJson(signedEventSchema, innerText);
    if (!inner) {
        return fail('malformed-rumor', `Chat wrap ${event.id} does not contain an event`);
    }
    if (!verifyEvent(inner)) {
        return fail('bad-message-signature', `Inner chat event ${inner.id} has an invalid signature`);
    }
    return {
        ok: true,
        value: { id: inner.id, author: inner.pubkey, content: inner.content, timestamp: inner.created_at, wrapId: event.id }
    };
}
