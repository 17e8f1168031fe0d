import * as https from 'node:https';
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { z } from 'zod';
import { chacha20poly1305 } from '@noble/ciphers/chacha';
import { hexToBytes, randomBytes } from '@noble/hashes/utils';
import { ClientError } from './errors.js';
import { deriveSharedSecret, isValidPublicKey } from './keys.js';
import { createLogger } from './logger.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// AttachmentCodec – encrypted files shared in dispute chat
// Blob layout: nonce (12) || ciphertext || Poly1305 tag (16), ChaCha20-Poly1305
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Attachments');

export const MAX_BLOB_BYTES = 25 * 1024 * 1024;
export const BLOB_FETCH_TIMEOUT_MS = 30000;

const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;

export interface Attachment {
    kind: 'image' | 'file';
    blobUrl: string;
    nonce: string | null;
    decryptionKey: string | null;
    filename: string;
    mimeType: string;
    size: number | null;
}

const attachmentSchema = z.object({
    type: z.enum(['image_encrypted', 'file_encrypted']),
    blossom_url: z.string().min(1),
    filename: z.string().default(''),
    mime_type: z.string().default('application/octet-stream'),
    nonce: z.string().nullish(),
    decryption_key: z.string().nullish(),
    size: z.number().int().nonnegative().nullish()
});

/** Chat content that describes an attachment, or null for ordinary text */
export function parseAttachment(content: string): Attachment | null {
    const trimmed = content.trim();
    if (!trimmed.startsWith('{')) { return null; }
    let raw: unknown;
    try {
        raw = JSON.parse(trimmed);
    } catch {
        return null;
    }
    const parsed = attachmentSchema.safeParse(raw);
    if (!parsed.success) { return null; }
    const data = parsed.data;
    return {
        kind: data.type === 'image_encrypted' ? 'image' : 'file',
        blobUrl: data.blossom_url,
        nonce: data.nonce ?? null,
        decryptionKey: data.decryption_key ?? null,
        filename: data.filename,
        mimeType: data.mime_type,
        size: data.size ?? null
    };
}

export function encodeAttachment(attachment: Attachment): string {
    return JSON.stringify({
        type: attachment.kind === 'image' ? 'image_encrypted' : 'file_encrypted',
        blossom_url: attachment.blobUrl,
        filename: attachment.filename,
        mime_type: attachment.mimeType,
        nonce: attachment.nonce,
        decryption_key: attachment.decryptionKey,
        size: attachment.size
    });
}

/** What a transcript stores in place of the file */
export function attachmentPlaceholder(attachment: Attachment): string {
    return `[attachment] ${attachment.filename || 'attachment'} (${attachment.mimeType}) ${attachment.blobUrl}`;
}

export function resolveBlobUrl(reference: string): string {
    const url = reference.trim();
    if (url.startsWith('blossom://')) {
        return 'https://' + url.slice('blossom://'.length);
    }
    if (url.startsWith('https://')) {
        return url;
    }
    throw new ClientError('INVALID_INPUT', `Attachment URL must start with blossom:// or https://, got: ${url}`);
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// TRANSFER
// ——————————————————————————————————————————————————————————————————————————————————————————

export interface BlobResponse {
    status: number;
    contentLength: number | null;
    body: AsyncIterable<Uint8Array>;
}

export type BlobFetcher = (url: string, signal: AbortSignal) => Promise<BlobResponse>;

export const httpsFetcher: BlobFetcher = (url, signal) => {
    return new Promise((resolve, reject) => {
        const req = https.get(url, { signal }, (res) => {
            const header = res.headers['content-length'];
            const length = header === undefined ? NaN : Number(header);
            resolve({
                status: res.statusCode ?? 0,
                contentLength: Number.isFinite(length) ? length : null,
                body: res
            });
        });
        req.on('error', reject);
    });
};

export interface FetchOptions {
    maxBytes?: number;
    timeoutMs?: number;
    fetcher?: BlobFetcher;
}

export async function fetchBlob(url: string, options: FetchOptions = {}): Promise<Uint8Array> {
    const maxBytes = options.maxBytes ?? MAX_BLOB_BYTES;
    const timeoutMs = options.timeoutMs ?? BLOB_FETCH_TIMEOUT_MS;
    const fetcher = options.fetcher ?? httpsFetcher;
    const controller = new AbortController();

    const download = async (): Promise<Uint8Array> => {
        const res = await fetcher(url, controller.signal);
        if (res.status < 200 || res.status >= 300) {
            throw new ClientError('TRANSPORT', `Attachment download returned HTTP ${res.status}`);
        }
        if (res.contentLength !== null && res.contentLength > maxBytes) {
            throw new ClientError('RESOURCE_LIMIT', `Attachment too large: ${res.contentLength} bytes (max ${maxBytes})`);
        }
        const chunks: Uint8Array[] = [];
        let received = 0;
        for await (const chunk of res.body) {
            received += chunk.length;
            if (received > maxBytes) {
                throw new ClientError('RESOURCE_LIMIT', `Attachment too large while streaming: ${received} bytes (max ${maxBytes})`);
            }
            chunks.push(chunk);
        }
        return Buffer.concat(chunks);
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ClientError('TIMEOUT', `Attachment download timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([download(), timeout]);
    } catch (err) {
        if (err instanceof ClientError) { throw err; }
        throw new ClientError('TRANSPORT', `Attachment download failed: ${err instanceof Error ? err.message : String(err)}`, undefined, { cause: err });
    } finally {
        clearTimeout(timer);
        controller.abort();
    }
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// CIPHER
// ——————————————————————————————————————————————————————————————————————————————————————————

export function decryptBlob(blob: Uint8Array, key: Uint8Array): Uint8Array {
    if (key.length !== KEY_BYTES) {
        throw new ClientError('DECRYPT', `Decryption key must be ${KEY_BYTES} bytes, got ${key.length}`);
    }
    if (blob.length < NONCE_BYTES + TAG_BYTES) {
        throw new ClientError('DECRYPT', `Blob too short for nonce and tag (need at least ${NONCE_BYTES + TAG_BYTES} bytes, got ${blob.length})`);
    }
    const nonce = blob.subarray(0, NONCE_BYTES);
    try {
        return chacha20poly1305(key, nonce).decrypt(blob.subarray(NONCE_BYTES));
    } catch (err) {
        throw new ClientError('DECRYPT', 'Attachment failed authentication; wrong key or corrupted blob', undefined, { cause: err });
    }
}

export function encryptBlob(plaintext: Uint8Array, key: Uint8Array, nonce: Uint8Array = randomBytes(NONCE_BYTES)): Uint8Array {
    if (key.length !== KEY_BYTES) {
        throw new ClientError('INVALID_INPUT', `Encryption key must be ${KEY_BYTES} bytes, got ${key.length}`);
    }
    if (nonce.length !== NONCE_BYTES) {
        throw new ClientError('INVALID_INPUT', `Nonce must be ${NONCE_BYTES} bytes, got ${nonce.length}`);
    }
    const sealed = chacha20poly1305(key, nonce).encrypt(plaintext);
    const blob = new Uint8Array(NONCE_BYTES + sealed.length);
    blob.set(nonce, 0);
    blob.set(sealed, NONCE_BYTES);
    return blob;
}

/**
 * Embedded key when the message carries a usable one, otherwise ECDH between
 * the admin secret and the sender's key. Null when neither is available.
 */
export function attachmentKey(attachment: Attachment, adminSecret: Uint8Array | null, senderPubkey: string | null): Uint8Array | null {
    if (attachment.decryptionKey && /^[0-9a-fA-F]{64}$/.test(attachment.decryptionKey)) {
        return hexToBytes(attachment.decryptionKey.toLowerCase());
    }
    if (attachment.decryptionKey) {
        log.warn(`Ignoring malformed embedded key for ${attachment.filename}`);
    }
    if (!adminSecret || !senderPubkey || !isValidPublicKey(senderPubkey)) {
        return null;
    }
    return deriveSharedSecret(adminSecret, senderPubkey);
}

export function sanitizeFilename(name: string): string {
    const cleaned = name.replace(/[^A-Za-z0-9._-]/g, '_');
    return cleaned.length > 0 ? cleaned : 'attachment';
}

export interface SaveAttachmentOptions extends FetchOptions {
    attachment: Attachment;
    disputeId: string;
    downloadsDir: string;
    key: Uint8Array | null;
}

export interface SavedAttachment {
    path: string;
    decrypted: boolean;
    bytes: number;
}

/** Downloads, decrypts when a key is known, and writes under the downloads directory */
export async function saveAttachment(options: SaveAttachmentOptions): Promise<SavedAttachment> {
    const { attachment, disputeId, downloadsDir, key } = options;
    const url = resolveBlobUrl(attachment.blobUrl);
    const blob = await fetchBlob(url, options);

    const base = `${sanitizeFilename(disputeId)}_${sanitizeFilename(attachment.filename)}`;
    const contents = key ? decryptBlob(blob, key) : blob;
    const path = join(downloadsDir, key ? base : `${base}.enc`);

    try {
        mkdirSync(downloadsDir, { recursive: true });
        writeFileSync(path, contents);
    } catch (err) {
        throw new ClientError('PERSISTENCE', `Could not write ${path}`, undefined, { cause: err });
    }
    log.info(`Saved ${attachment.filename || 'attachment'} to ${path}`);
    return { path, decrypted: key !== null, bytes: contents.length };
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// OBSERVER – read-only view of an encrypted chat file, for someone holding its shared key
// ——————————————————————————————————————————————————————————————————————————————————————————

/**
 * Decrypts a chat file someone else downloaded, with the shared key they
 * handed over. Relative paths are taken from the downloads directory.
 * Returns the text lines without trailing blank ones.
 */
export function openObservedChat(filePath: string, sharedKeyHex: string, downloadsDir: string): string[] {
    const rawPath = filePath.trim();
    const keyHex = sharedKeyHex.trim();
    if (!rawPath || !keyHex) {
        throw new ClientError('INVALID_INPUT', 'Both file path and shared key are required');
    }
    if (!/^[0-9a-fA-F]{64}$/.test(keyHex)) {
        throw new ClientError('INVALID_INPUT', 'Shared key must be a valid 64-char hex secret (32 bytes)');
    }

    const path = isAbsolute(rawPath) ? rawPath : join(downloadsDir, rawPath);
    let blob: Uint8Array;
    try {
        blob = readFileSync(path);
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            throw new ClientError('INVALID_INPUT', `Observer file not found: ${path}`, undefined, { cause: err });
        }
        throw new ClientError('PERSISTENCE', `Failed to read file ${path}`, undefined, { cause: err });
    }

    const text = new TextDecoder().decode(decryptBlob(blob, hexToBytes(keyHex.toLowerCase())));
    const lines = text.split('\n').map((line) => line.trimEnd());
    while (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    log.info(`Decrypted ${lines.length} line(s) from ${path}`);
    return lines;
}
