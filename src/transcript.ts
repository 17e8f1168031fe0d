import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ClientError } from './errors.js';
import type { ChatParty } from './store.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Chat transcripts – one append-only text file per dispute under chats/
//
//   Buyer - 05-03-2024 - 14:07:09
//   message text
//   <blank line>
// ——————————————————————————————————————————————————————————————————————————————————————————

export type TranscriptAuthor = 'buyer' | 'seller' | 'admin';

export interface TranscriptEntry {
    author: TranscriptAuthor;
    /** Channel the entry belongs to; null only for an admin line of unknown direction */
    party: ChatParty | null;
    timestamp: number;
    content: string;
}

const HEADER_RE = /^(Buyer|Seller|Admin to Buyer|Admin to Seller|Admin) - (\d{2})-(\d{2})-(\d{4}) - (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

function senderLabel(entry: TranscriptEntry): string {
    switch (entry.author) {
        case 'buyer': return 'Buyer';
        case 'seller': return 'Seller';
        case 'admin':
            if (entry.party === 'buyer') { return 'Admin to Buyer'; }
            if (entry.party === 'seller') { return 'Admin to Seller'; }
            return 'Admin';
    }
}

function parseLabel(label: string): { author: TranscriptAuthor; party: ChatParty | null } {
    switch (label) {
        case 'Buyer': return { author: 'buyer', party: 'buyer' };
        case 'Seller': return { author: 'seller', party: 'seller' };
        case 'Admin to Buyer': return { author: 'admin', party: 'buyer' };
        case 'Admin to Seller': return { author: 'admin', party: 'seller' };
        default: return { author: 'admin', party: null };
    }
}

/** dd-mm-YYYY - HH:MM:SS in UTC */
export function formatTimestamp(timestamp: number): string {
    const d = new Date(timestamp * 1000);
    return `${pad(d.getUTCDate())}-${pad(d.getUTCMonth() + 1)}-${d.getUTCFullYear()}`
        + ` - ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

export function formatEntry(entry: TranscriptEntry): string {
    return `${senderLabel(entry)} - ${formatTimestamp(entry.timestamp)}\n${entry.content}\n\n`;
}

export function parseTranscript(text: string): TranscriptEntry[] {
    const entries: TranscriptEntry[] = [];
    let current: { head: Omit<TranscriptEntry, 'content'>; lines: string[] } | null = null;

    const flush = () => {
        if (!current) { return; }
        const lines = current.lines;
        while (lines.length > 0 && lines[lines.length - 1] === '') { lines.pop(); }
        entries.push({ ...current.head, content: lines.join('\n') });
        current = null;
    };

    for (const line of text.split('\n')) {
        const match = HEADER_RE.exec(line);
        if (match) {
            flush();
            const [, label, day, month, year, hours, minutes, seconds] = match;
            const timestamp = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds)) / 1000;
            current = { head: { ...parseLabel(label ?? ''), timestamp }, lines: [] };
            continue;
        }
        if (current) { current.lines.push(line); }
    }
    flush();
    return entries;
}

/** Latest entry written by each counterparty; admin lines do not count */
export function lastSeenByParty(entries: readonly TranscriptEntry[]): Record<ChatParty, number | null> {
    const seen: Record<ChatParty, number | null> = { buyer: null, seller: null };
    for (const entry of entries) {
        if (entry.author === 'admin') { continue; }
        const previous = seen[entry.author];
        if (previous === null || entry.timestamp > previous) {
            seen[entry.author] = entry.timestamp;
        }
    }
    return seen;
}

export class TranscriptStore {
    constructor(private readonly dir: string) {}

    pathFor(disputeId: string): string {
        return join(this.dir, `${disputeId.replace(/[^A-Za-z0-9-]/g, '_')}.txt`);
    }

    append(disputeId: string, entries: readonly TranscriptEntry[]): void {
        if (entries.length === 0) { return; }
        try {
            mkdirSync(this.dir, { recursive: true });
            appendFileSync(this.pathFor(disputeId), entries.map(formatEntry).join(''), 'utf8');
        } catch (err) {
            throw new ClientError('PERSISTENCE', `Could not write the transcript for dispute ${disputeId}`, undefined, { cause: err });
        }
    }

    load(disputeId: string): TranscriptEntry[] {
        const file = this.pathFor(disputeId);
        if (!existsSync(file)) { return []; }
        try {
            return parseTranscript(readFileSync(file, 'utf8'));
        } catch (err) {
            throw new ClientError('PERSISTENCE', `Could not read the transcript for dispute ${disputeId}`, undefined, { cause: err });
        }
    }
}
