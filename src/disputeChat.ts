import { EventEmitter } from 'node:events';
import { hexToBytes } from '@noble/hashes/utils';
import { attachmentPlaceholder, parseAttachment, type Attachment } from './attachments.js';
import { decodeChatWrap, encodeChatWrap, nowSeconds, TIMESTAMP_TWEAK_SECONDS } from './envelope.js';
import { ClientError } from './errors.js';
import { deriveSharedKey, keyPairFromSecret, secretToHex, type KeyPair } from './keys.js';
import { createLogger, describeError } from './logger.js';
import { GIFT_WRAP_KIND, isFinalDisputeStatus, type DisputeStatus } from './protocol.js';
import type { NostrEvent, NostrFilter, RelayTransport } from './relayPool.js';
import { SingleFlight } from './scheduler.js';
import { CHAT_PARTIES, type AdminDisputeRecord, type ChatParty, type ChatStore } from './store.js';
import { lastSeenByParty, type TranscriptAuthor, type TranscriptEntry, type TranscriptStore } from './transcript.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// DisputeChatSync – admin ↔ buyer / admin ↔ seller channels addressed to ECDH shared keys
// Cursor per (dispute, party) only moves after a fetched batch is fully written
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Chat');

export const CHAT_WINDOW_SECONDS = 7 * 24 * 60 * 60;
export const CHAT_POLL_INTERVAL_MS = 5000;
const CHAT_FETCH_LIMIT = 50;

export interface DisputeChatStore extends ChatStore {
    getDispute(id: string): AdminDisputeRecord | null;
    listDisputes(status?: DisputeStatus): AdminDisputeRecord[];
}

export interface ChatChannel {
    disputeId: string;
    party: ChatParty;
    counterpartyPubkey: string;
    sharedKey: KeyPair;
}

export interface ChatMessage {
    id: string | null; // inner event id; null for lines restored from a transcript
    disputeId: string;
    party: ChatParty | null;
    author: TranscriptAuthor;
    content: string;
    attachment: Attachment | null;
    timestamp: number;
}

export interface ChatUpdate {
    disputeId: string;
    party: ChatParty;
    messages: ChatMessage[];
}

export type FetchResult =
    | { skipped: true }
    | { skipped: false; applied: number; failedChannels: number };

export interface RestoreSummary {
    disputeId: string;
    entries: number;
    seeded: ChatParty[];
    diverged: ChatParty[];
}

export interface DisputeChatOptions {
    pow?: number;
    timeoutMs?: number;
    windowSeconds?: number;
    now?: () => number;
}

function channelKey(disputeId: string, party: ChatParty): string {
    return `${disputeId}:${party}`;
}

function dedupeKey(party: ChatParty | null, author: TranscriptAuthor, timestamp: number, content: string): string {
    return `${party ?? '-'}|${author}|${timestamp}|${content}`;
}

function counterpartyOf(dispute: AdminDisputeRecord, party: ChatParty): string | null {
    return party === 'buyer' ? dispute.buyerPubkey : dispute.sellerPubkey;
}

export class DisputeChatSync {
    private readonly channels: Map<string, ChatChannel> = new Map();
    private readonly transcripts: Map<string, ChatMessage[]> = new Map();
    private readonly seen: Map<string, Set<string>> = new Map();
    private readonly flight = new SingleFlight();
    private readonly events = new EventEmitter();
    private readonly now: () => number;

    constructor(
        private readonly store: DisputeChatStore,
        private readonly transport: RelayTransport,
        private readonly files: TranscriptStore,
        private readonly admin: KeyPair,
        private readonly options: DisputeChatOptions = {}
    ) {
        this.now = options.now ?? nowSeconds;
    }

    get fetching(): boolean {
        return this.flight.inFlight;
    }

    onUpdate(listener: (update: ChatUpdate) => void): () => void {
        this.events.on('update', listener);
        return () => { this.events.off('update', listener); };
    }

    onIntegrityFault(listener: (error: ClientError) => void): () => void {
        this.events.on('integrity', listener);
        return () => { this.events.off('integrity', listener); };
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // SHARED KEYS
    // ——————————————————————————————————————————————————————————————————————————————————————————

    /** Loads persisted shared keys or derives and persists them, then registers the channels */
    ensureSharedKeys(dispute: AdminDisputeRecord): Partial<Record<ChatParty, ChatChannel>> {
        const result: Partial<Record<ChatParty, ChatChannel>> = {};
        for (const party of CHAT_PARTIES) {
            const counterparty = counterpartyOf(dispute, party);
            if (!counterparty) { continue; }

            const existing = this.channels.get(channelKey(dispute.id, party));
            if (existing && existing.counterpartyPubkey === counterparty) {
                result[party] = existing;
                continue;
            }

            const channel: ChatChannel = {
                disputeId: dispute.id,
                party,
                counterpartyPubkey: counterparty,
                sharedKey: this.loadOrDeriveKey(dispute.id, party, counterparty)
            };
            this.channels.set(channelKey(dispute.id, party), channel);
            this.checkCollisions(channel);
            result[party] = channel;
        }
        return result;
    }

    /** A stored key is trusted: the store drops it whenever the party's pubkey changes */
    private loadOrDeriveKey(disputeId: string, party: ChatParty, counterparty: string): KeyPair {
        const stored = this.store.getSharedKey(disputeId, party);
        if (stored && /^[0-9a-f]{64}$/.test(stored)) {
            return keyPairFromSecret(hexToBytes(stored));
        }
        if (stored) {
            log.warn(`Stored ${party} shared key for dispute ${disputeId} is malformed; deriving again`);
        }
        const derived = deriveSharedKey(this.admin.secretKey, counterparty);
        this.store.setSharedKey(disputeId, party, secretToHex(derived.secretKey));
        return derived;
    }

    private checkCollisions(channel: ChatChannel): void {
        for (const other of this.channels.values()) {
            if (other === channel) { continue; }
            if (other.sharedKey.publicKey !== channel.sharedKey.publicKey) { continue; }
            if (other.counterpartyPubkey === channel.counterpartyPubkey) { continue; }
            const error = new ClientError('INTEGRITY',
                `Shared key collision: ${channel.disputeId}/${channel.party} and ${other.disputeId}/${other.party} `
                + 'resolve to the same key from different counterparties', {
                    channels: [channelKey(channel.disputeId, channel.party), channelKey(other.disputeId, other.party)]
                });
            log.error(error.message);
            this.events.emit('integrity', error);
        }
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // INCREMENTAL FETCH
    // ——————————————————————————————————————————————————————————————————————————————————————————

    /** One sync cycle over every open dispute; a call made while one is running returns skipped */
    async fetchUpdates(): Promise<FetchResult> {
        const outcome = await this.flight.run(() => this.syncAll());
        return outcome.skipped ? { skipped: true } : outcome.value;
    }

    private async syncAll(): Promise<FetchResult> {
        const channels: ChatChannel[] = [];
        for (const dispute of this.store.listDisputes('in-progress')) {
            try {
                const registered = this.ensureSharedKeys(dispute);
                for (const party of CHAT_PARTIES) {
                    const channel = registered[party];
                    if (channel) { channels.push(channel); }
                }
            } catch (err) {
                log.warn(`Skipping dispute ${dispute.id}:`, describeError(err));
            }
        }

        const results = await Promise.allSettled(channels.map((channel) => this.syncChannel(channel)));
        let applied = 0;
        let failedChannels = 0;
        results.forEach((result, i) => {
            if (result.status === 'fulfilled') {
                applied += result.value;
                return;
            }
            failedChannels++;
            const channel = channels[i];
            log.warn(`Chat sync for ${channel ? channelKey(channel.disputeId, channel.party) : '?'} failed:`, describeError(result.reason));
        });
        return { skipped: false, applied, failedChannels };
    }

    private async syncChannel(channel: ChatChannel): Promise<number> {
        const cursor = this.store.getChatCursor(channel.disputeId, channel.party);
        const floor = this.now() - (this.options.windowSeconds ?? CHAT_WINDOW_SECONDS);
        const since = Math.max(cursor ?? 0, floor) - TIMESTAMP_TWEAK_SECONDS;

        const events = await this.fetchWindow(channel, since);

        const seen = this.seenFor(channel.disputeId);
        const batchKeys: Set<string> = new Set();
        const fresh: ChatMessage[] = [];
        for (const event of events) {
            const decoded = decodeChatWrap(event, channel.sharedKey.secretKey);
            if (!decoded.ok) {
                log.debug(`Skipping chat event ${event.id}: ${decoded.error.message}`);
                continue;
            }
            const inner = decoded.value;
            if (cursor !== null && inner.timestamp <= cursor) { continue; }

            let author: TranscriptAuthor;
            if (inner.author === channel.counterpartyPubkey) {
                author = channel.party;
            } else if (inner.author === this.admin.publicKey) {
                author = 'admin';
            } else {
                log.debug(`Skipping chat event ${event.id} from an unknown author`);
                continue;
            }

            const attachment = parseAttachment(inner.content);
            const content = attachment ? attachmentPlaceholder(attachment) : inner.content;
            const key = dedupeKey(channel.party, author, inner.timestamp, content);
            if (seen.has(key) || batchKeys.has(key)) { continue; }
            batchKeys.add(key);
            fresh.push({ id: inner.id, disputeId: channel.disputeId, party: channel.party, author, content, attachment, timestamp: inner.timestamp });
        }

        if (fresh.length === 0) { return 0; }
        fresh.sort((a, b) => a.timestamp - b.timestamp);

        // Transcript first: a failed write leaves both memory and cursor untouched
        this.files.append(channel.disputeId, fresh.map(toEntry));
        this.messagesFor(channel.disputeId).push(...fresh);
        for (const key of batchKeys) { seen.add(key); }

        const newest = fresh[fresh.length - 1]?.timestamp ?? 0;
        this.store.setChatCursor(channel.disputeId, channel.party, newest);

        log.info(`${fresh.length} new message(s) in dispute ${channel.disputeId} (${channel.party})`);
        this.events.emit('update', { disputeId: channel.disputeId, party: channel.party, messages: fresh });
        return fresh.length;
    }

    /**
     * Reads every wrap since `since`. Relays cap a page by outer timestamp and
     * those are randomized, so a full page is followed by another that ends at
     * the oldest wrap seen; the cursor may only move once the window is read.
     */
    private async fetchWindow(channel: ChatChannel, since: number): Promise<NostrEvent[]> {
        const byId: Map<string, NostrEvent> = new Map();
        let until: number | undefined;
        for (;;) {
            const filter: NostrFilter = {
                kinds: [GIFT_WRAP_KIND],
                '#p': [channel.sharedKey.publicKey],
                since,
                limit: CHAT_FETCH_LIMIT
            };
            if (until !== undefined) { filter.until = until; }
            const page = await this.transport.fetchEvents(filter, this.options.timeoutMs);

            let added = 0;
            for (const event of page) {
                if (byId.has(event.id)) { continue; }
                byId.set(event.id, event);
                added++;
            }
            // Short page, or a full page of wraps already seen sharing one timestamp
            if (page.length < CHAT_FETCH_LIMIT || added === 0) { break; }
            until = Math.min(...page.map((event) => event.created_at));
        }
        return Array.from(byId.values());
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // SEND
    // ——————————————————————————————————————————————————————————————————————————————————————————

    async sendMessage(disputeId: string, party: ChatParty, text: string): Promise<ChatMessage> {
        if (text.trim().length === 0) {
            throw new ClientError('INVALID_INPUT', 'Message is empty');
        }
        const dispute = this.store.getDispute(disputeId);
        if (!dispute) {
            throw new ClientError('INVALID_INPUT', `Unknown dispute ${disputeId}`);
        }
        if (isFinalDisputeStatus(dispute.status)) {
            throw new ClientError('FINALIZED', `Dispute ${disputeId} is already ${dispute.status}`);
        }
        const channel = this.ensureSharedKeys(dispute)[party];
        if (!channel) {
            throw new ClientError('INVALID_INPUT', `Dispute ${disputeId} has no ${party} pubkey`);
        }

        const { wrap, inner } = encodeChatWrap(this.admin, channel.sharedKey.publicKey, text, {
            pow: this.options.pow,
            now: this.now()
        });
        await this.transport.publish(wrap);

        const attachment = parseAttachment(text);
        const content = attachment ? attachmentPlaceholder(attachment) : text;
        const message: ChatMessage = { id: inner.id, disputeId, party, author: 'admin', content, attachment, timestamp: inner.created_at };
        this.files.append(disputeId, [toEntry(message)]);
        this.messagesFor(disputeId).push(message);
        this.seenFor(disputeId).add(dedupeKey(party, 'admin', message.timestamp, content));
        return message;
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // RESTORE
    // ——————————————————————————————————————————————————————————————————————————————————————————

    /** Replays transcripts into memory and reconciles file-derived cursors with the database */
    restore(disputes: readonly AdminDisputeRecord[]): RestoreSummary[] {
        const summaries: RestoreSummary[] = [];
        for (const dispute of disputes) {
            let entries: TranscriptEntry[];
            try {
                entries = this.files.load(dispute.id);
            } catch (err) {
                log.warn(`Could not replay transcript for ${dispute.id}:`, describeError(err));
                continue;
            }

            const messages: ChatMessage[] = entries.map((entry) => ({
                id: null,
                disputeId: dispute.id,
                party: entry.party,
                author: entry.author,
                content: entry.content,
                attachment: null,
                timestamp: entry.timestamp
            }));
            this.transcripts.set(dispute.id, messages);
            const seen = this.seenFor(dispute.id);
            for (const entry of entries) {
                seen.add(dedupeKey(entry.party, entry.author, entry.timestamp, entry.content));
            }

            const summary: RestoreSummary = { disputeId: dispute.id, entries: entries.length, seeded: [], diverged: [] };
            const fromFile = lastSeenByParty(entries);
            for (const party of CHAT_PARTIES) {
                const fileCursor = fromFile[party];
                if (fileCursor === null) { continue; }
                const dbCursor = this.store.getChatCursor(dispute.id, party);
                if (dbCursor === null) {
                    this.store.setChatCursor(dispute.id, party, fileCursor);
                    summary.seeded.push(party);
                } else if (dbCursor !== fileCursor) {
                    log.warn(`Dispute ${dispute.id} ${party} cursor: database ${dbCursor}, transcript ${fileCursor}; using the database value`);
                    summary.diverged.push(party);
                }
            }
            summaries.push(summary);
        }
        return summaries;
    }

    getMessages(disputeId: string, party?: ChatParty): ChatMessage[] {
        const all = this.transcripts.get(disputeId) ?? [];
        return party ? all.filter((m) => m.party === party) : [...all];
    }

    getChannel(disputeId: string, party: ChatParty): ChatChannel | null {
        return this.channels.get(channelKey(disputeId, party)) ?? null;
    }

    private messagesFor(disputeId: string): ChatMessage[] {
        let list = this.transcripts.get(disputeId);
        if (!list) {
            list = [];
            this.transcripts.set(disputeId, list);
        }
        return list;
    }

    private seenFor(disputeId: string): Set<string> {
        let set = this.seen.get(disputeId);
        if (!set) {
            set = new Set();
            this.seen.set(disputeId, set);
        }
        return set;
    }
}

function toEntry(message: ChatMessage): TranscriptEntry {
    return { author: message.author, party: message.party, timestamp: message.timestamp, content: message.content };
}
