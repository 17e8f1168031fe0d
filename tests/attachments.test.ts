import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { generateSecretKey } from 'nostr-tools';
import {
    attachmentKey,
    attachmentPlaceholder,
    decryptBlob,
    encodeAttachment,
    encryptBlob,
    fetchBlob,
    openObservedChat,
    parseAttachment,
    resolveBlobUrl,
    sanitizeFilename,
    saveAttachment,
    type Attachment,
    type BlobFetcher
} from '../src/attachments.js';
import { deriveSharedSecret, keyPairFromSecret, secretToHex } from '../src/keys.js';
import { catchClientError, rejectionOf, tempDir } from './support/helpers.js';

const KEY = new Uint8Array(32).fill(7);
const NONCE = new Uint8Array(12).fill(1);

function serve(body: Uint8Array, options: { status?: number; contentLength?: number | null; chunk?: number } = {}): BlobFetcher {
    return async () => ({
        status: options.status ?? 200,
        contentLength: options.contentLength === undefined ? body.length : options.contentLength,
        body: (async function* () {
            const size = options.chunk ?? body.length;
            for (let i = 0; i < body.length; i += size) {
                yield body.subarray(i, i + size);
            }
        })()
    });
}

const receipt: Attachment = {
    kind: 'file',
    blobUrl: 'blossom://blobs.example/abc123',
    nonce: null,
    decryptionKey: null,
    filename: 'receipt.pdf',
    mimeType: 'application/pdf',
    size: 3
};

describe('attachment messages', () => {
    it('reads what it writes', () => {
        expect(parseAttachment(encodeAttachment(receipt))).toEqual(receipt);
    });

    it('fills defaults for missing filename and type', () => {
        expect(parseAttachment('{"type":"image_encrypted","blossom_url":"https://x.example/1"}')).toEqual({
            kind: 'image',
            blobUrl: 'https://x.example/1',
            nonce: null,
            decryptionKey: null,
            filename: '',
            mimeType: 'application/octet-stream',
            size: null
        });
    });

    it('treats ordinary text and other JSON as text', () => {
        expect(parseAttachment('hello')).toBeNull();
        expect(parseAttachment('{not json')).toBeNull();
        expect(parseAttachment('{"type":"sticker"}')).toBeNull();
    });

    it('describes an attachment in one line', () => {
        expect(attachmentPlaceholder(receipt)).toBe('[attachment] receipt.pdf (application/pdf) blossom://blobs.example/abc123');
        expect(attachmentPlaceholder({ ...receipt, filename: '' })).toBe('[attachment] attachment (application/pdf) blossom://blobs.example/abc123');
    });

    it('maps blossom references to https', () => {
        expect(resolveBlobUrl('blossom://blobs.example/abc')).toBe('https://blobs.example/abc');
        expect(resolveBlobUrl(' https://blobs.example/abc ')).toBe('https://blobs.example/abc');
        expect(() => resolveBlobUrl('http://blobs.example/abc')).toThrow('Attachment URL must start with blossom:// or https://');
    });

    it('sanitizes file names', () => {
        expect(sanitizeFilename('../my receipt.pdf')).toBe('.._my_receipt.pdf');
        expect(sanitizeFilename('')).toBe('attachment');
    });
});

describe('blob cipher', () => {
    it('prefixes the nonce and decrypts back', () => {
        const blob = encryptBlob(new TextEncoder().encode('abc'), KEY, NONCE);
        expect(blob.length).toBe(12 + 3 + 16);
        expect(Array.from(blob.subarray(0, 12))).toEqual(Array.from(NONCE));
        expect(new TextDecoder().decode(decryptBlob(blob, KEY))).toBe('abc');
    });

    it('fails authentication on a wrong key or a flipped byte', () => {
        const blob = encryptBlob(new TextEncoder().encode('abc'), KEY, NONCE);
        expect(() => decryptBlob(blob, new Uint8Array(32).fill(8))).toThrow('Attachment failed authentication');
        const flipped = Uint8Array.from(blob);
        flipped[14] = (flipped[14] ?? 0) ^ 0xff;
        expect(() => decryptBlob(flipped, KEY)).toThrow('Attachment failed authentication');
    });

    it('rejects short blobs and bad key sizes', () => {
        expect(() => decryptBlob(new Uint8Array(27), KEY)).toThrow('Blob too short for nonce and tag (need at least 28 bytes, got 27)');
        expect(() => decryptBlob(new Uint8Array(40), new Uint8Array(16))).toThrow('Decryption key must be 32 bytes, got 16');
    });
});

describe('attachmentKey', () => {
    const admin = keyPairFromSecret(generateSecretKey());
    const sender = keyPairFromSecret(generateSecretKey());

    it('prefers a well-formed embedded key', () => {
        const key = attachmentKey({ ...receipt, decryptionKey: 'AB'.repeat(32) }, admin.secretKey, sender.publicKey);
        expect(key && secretToHex(key)).toBe('ab'.repeat(32));
    });

    it('falls back to the shared secret with the sender', () => {
        const key = attachmentKey({ ...receipt, decryptionKey: 'short' }, admin.secretKey, sender.publicKey);
        expect(key && secretToHex(key)).toBe(secretToHex(deriveSharedSecret(admin.secretKey, sender.publicKey)));
    });

    it('gives up without a secret or sender', () => {
        expect(attachmentKey(receipt, null, sender.publicKey)).toBeNull();
        expect(attachmentKey(receipt, admin.secretKey, null)).toBeNull();
    });
});

describe('fetchBlob', () => {
    it('collects a chunked body', async () => {
        const body = new Uint8Array([1, 2, 3, 4, 5]);
        const blob = await fetchBlob('https://blobs.example/a', { fetcher: serve(body, { chunk: 2 }) });
        expect(Array.from(blob)).toEqual([1, 2, 3, 4, 5]);
    });

    it('refuses a declared length over the limit', async () => {
        const err = await rejectionOf(fetchBlob('https://blobs.example/a', { fetcher: serve(new Uint8Array(10)), maxBytes: 5 }));
        expect(err.code).toBe('RESOURCE_LIMIT');
        expect(err.message).toBe('Attachment too large: 10 bytes (max 5)');
    });

    it('stops streaming once the limit is passed', async () => {
        const fetcher = serve(new Uint8Array(10), { contentLength: null, chunk: 4 });
        const err = await rejectionOf(fetchBlob('https://blobs.example/a', { fetcher, maxBytes: 5 }));
        expect(err.message).toBe('Attachment too large while streaming: 8 bytes (max 5)');
    });

    it('reports HTTP errors as transport failures', async () => {
        const err = await rejectionOf(fetchBlob('https://blobs.example/a', { fetcher: serve(new Uint8Array(0), { status: 404 }) }));
        expect(err.code).toBe('TRANSPORT');
        expect(err.message).toBe('Attachment download returned HTTP 404');
    });

    it('times out a stalled download', async () => {
        const stalled: BlobFetcher = () => new Promise(() => undefined);
        const err = await rejectionOf(fetchBlob('https://blobs.example/a', { fetcher: stalled, timeoutMs: 20 }));
        expect(err.code).toBe('TIMEOUT');
    });
});

describe('saveAttachment', () => {
    it('writes the decrypted file when the key is known', async () => {
        const dir = tempDir();
        const blob = encryptBlob(new TextEncoder().encode('pdf bytes'), KEY, NONCE);
        const saved = await saveAttachment({ attachment: receipt, disputeId: 'd-1', downloadsDir: dir, key: KEY, fetcher: serve(blob) });
        expect(saved).toEqual({ path: join(dir, 'd-1_receipt.pdf'), decrypted: true, bytes: 9 });
        expect(readFileSync(saved.path, 'utf8')).toBe('pdf bytes');
    });

    it('keeps the encrypted blob when no key is available', async () => {
        const dir = tempDir();
        const blob = encryptBlob(new TextEncoder().encode('pdf bytes'), KEY, NONCE);
        const saved = await saveAttachment({ attachment: receipt, disputeId: 'd-1', downloadsDir: dir, key: null, fetcher: serve(blob) });
        expect(saved).toEqual({ path: join(dir, 'd-1_receipt.pdf.enc'), decrypted: false, bytes: blob.length });
    });

    it('writes nothing when decryption fails', async () => {
        const dir = tempDir();
        const blob = encryptBlob(new TextEncoder().encode('pdf bytes'), KEY, NONCE);
        const err = await rejectionOf(saveAttachment({
            attachment: receipt, disputeId: 'd-1', downloadsDir: dir, key: new Uint8Array(32), fetcher: serve(blob)
        }));
        expect(err.code).toBe('DECRYPT');
    });
});

describe('openObservedChat', () => {
    const transcript = 'Buyer - 14-11-2023 - 22:13:20\nI paid\r\n\nAdmin to Buyer - 14-11-2023 - 22:14:00\nthanks\n\n';

    function encryptedFile(dir: string, name: string): string {
        const path = join(dir, name);
        writeFileSync(path, encryptBlob(new TextEncoder().encode(transcript), KEY, NONCE));
        return path;
    }

    it('decrypts a file from the downloads directory', () => {
        const dir = tempDir();
        encryptedFile(dir, 'chat.enc');
        expect(openObservedChat('chat.enc', secretToHex(KEY), dir)).toEqual([
            'Buyer - 14-11-2023 - 22:13:20',
            'I paid',
            '',
            'Admin to Buyer - 14-11-2023 - 22:14:00',
            'thanks'
        ]);
    });

    it('takes an absolute path as given', () => {
        const path = encryptedFile(tempDir(), 'chat.enc');
        expect(openObservedChat(path, secretToHex(KEY).toUpperCase(), '/nowhere')).toHaveLength(5);
    });

    it('asks for both inputs and a hex key', () => {
        const dir = tempDir();
        expect(catchClientError(() => openObservedChat('', secretToHex(KEY), dir)).message).toBe('Both file path and shared key are required');
        expect(catchClientError(() => openObservedChat('chat.enc', 'abc', dir)).message)
            .toBe('Shared key must be a valid 64-char hex secret (32 bytes)');
    });

    it('reports a missing file and a wrong key', () => {
        const dir = tempDir();
        const missing = catchClientError(() => openObservedChat('gone.enc', secretToHex(KEY), dir));
        expect(missing.code).toBe('INVALID_INPUT');
        expect(missing.message).toBe(`Observer file not found: ${join(dir, 'gone.enc')}`);

        encryptedFile(dir, 'chat.enc');
        expect(catchClientError(() => openObservedChat('chat.enc', '00'.repeat(32), dir)).code).toBe('DECRYPT');
    });
});
