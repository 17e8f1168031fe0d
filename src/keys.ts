import { generateMnemonic, mnemonicToSeedSync, validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { HDKey } from '@scure/bip32';
import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { getPublicKey, nip19 } from 'nostr-tools';
import { ClientError } from './errors.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// KeyDeriver – seed phrase → identity key, per-trade keys, per-dispute shared keys
// Secret material stays in memory; only the phrase and an index counter are persisted
// ——————————————————————————————————————————————————————————————————————————————————————————

export const NOSTR_COIN_TYPE = 1237; // NIP-06
export const TRADE_ACCOUNT = 38383; // same number as the order event kind

const HEX_PUBKEY_RE = /^[0-9a-f]{64}$/;

export interface KeyPair {
    secretKey: Uint8Array;
    publicKey: string; // x-only hex
}

export function generateSeedPhrase(): string {
    return generateMnemonic(wordlist, 128);
}

export function validateSeedPhrase(phrase: string): boolean {
    return validateMnemonic(normalizePhrase(phrase), wordlist);
}

function normalizePhrase(phrase: string): string {
    return phrase.trim().toLowerCase().split(/\s+/).join(' ');
}

export function keyPairFromSecret(secretKey: Uint8Array): KeyPair {
    return { secretKey, publicKey: getPublicKey(secretKey) };
}

export class KeyDeriver {
    private readonly master: HDKey;
    private readonly account: number;
    private readonly cache: Map<number, KeyPair> = new Map();
    private static readonly MAX_CACHED = 256;

    constructor(seedPhrase: string, options: { account?: number } = {}) {
        const phrase = normalizePhrase(seedPhrase);
        if (!validateMnemonic(phrase, wordlist)) {
            throw new ClientError('FATAL_SEED', 'Stored seed phrase is malformed; refusing to derive keys');
        }
        this.account = options.account ?? TRADE_ACCOUNT;
        this.master = HDKey.fromMasterSeed(mnemonicToSeedSync(phrase));
    }

    identityKey(): KeyPair {
        return this.derive(0);
    }

    tradeKey(index: number): KeyPair {
        if (!Number.isSafeInteger(index) || index < 1) {
            throw new ClientError('INVALID_INPUT', `Trade key index must be an integer >= 1, got ${index}`);
        }
        return this.derive(index);
    }

    private derive(index: number): KeyPair {
        const cached = this.cache.get(index);
        if (cached) { return cached; }
        const node = this.master.derive(`m/44'/${NOSTR_COIN_TYPE}'/${this.account}'/0/${index}`);
        if (!node.privateKey) {
            throw new ClientError('FATAL_SEED', `Derivation produced no private key at index ${index}`);
        }
        const pair = keyPairFromSecret(node.privateKey);
        if (this.cache.size >= KeyDeriver.MAX_CACHED) {
            const oldest = this.cache.keys().next().value;
            if (oldest !== undefined) { this.cache.delete(oldest); }
        }
        this.cache.set(index, pair);
        return pair;
    }
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// KEY AGREEMENT
// ——————————————————————————————————————————————————————————————————————————————————————————

export function isValidPublicKey(pubkey: string): boolean {
    if (!HEX_PUBKEY_RE.test(pubkey)) { return false; }
    try {
        secp256k1.ProjectivePoint.fromHex('02' + pubkey);
        return true;
    } catch {
        return false;
    }
}

/**
 * ECDH between a local secret and a remote x-only pubkey. Returns the 32-byte
 * x-coordinate of the shared point, which does not depend on the parity of
 * either key, so both sides arrive at the same bytes.
 */
export function deriveSharedSecret(localSecret: Uint8Array, remotePublic: string): Uint8Array {
    if (!isValidPublicKey(remotePublic)) {
        throw new ClientError('INVALID_PUBKEY', `Not a valid public key: ${remotePublic.slice(0, 16)}…`);
    }
    const point = secp256k1.getSharedSecret(localSecret, '02' + remotePublic, true);
    return point.slice(1, 33);
}

/** Shared secret turned into a keypair: the pubkey addresses the channel, the secret decrypts it */
export function deriveSharedKey(localSecret: Uint8Array, remotePublic: string): KeyPair {
    const secret = deriveSharedSecret(localSecret, remotePublic);
    if (!secp256k1.utils.isValidPrivateKey(secret)) {
        throw new ClientError('INTEGRITY', 'Shared secret is not a usable private key');
    }
    return keyPairFromSecret(secret);
}

/** Accepts a 64-char hex secret or an nsec string */
export function parseSecretKey(value: string): Uint8Array {
    const trimmed = value.trim();
    if (trimmed.startsWith('nsec1')) {
        try {
            const decoded = nip19.decode(trimmed);
            if (decoded.type === 'nsec') { return decoded.data; }
        } catch (err) {
            throw new ClientError('CONFIG', 'Secret key is not a valid nsec', undefined, { cause: err });
        }
        throw new ClientError('CONFIG', 'Secret key is not a valid nsec');
    }
    if (!/^[0-9a-fA-F]{64}$/.test(trimmed)) {
        throw new ClientError('CONFIG', 'Secret key must be 64 hex characters or an nsec');
    }
    const bytes = hexToBytes(trimmed.toLowerCase());
    if (!secp256k1.utils.isValidPrivateKey(bytes)) {
        throw new ClientError('CONFIG', 'Secret key is out of range');
    }
    return bytes;
}

export function secretToHex(secretKey: Uint8Array): string {
    return bytesToHex(secretKey);
}

export function npubOf(publicKey: string): string {
    return nip19.npubEncode(publicKey);
}

/** Accepts hex or npub and returns hex */
export function parsePublicKey(value: string): string {
    const trimmed = value.trim();
    if (trimmed.startsWith('npub1')) {
        try {
            const decoded = nip19.decode(trimmed);
            if (decoded.type === 'npub') { return decoded.data; }
        } catch (err) {
            throw new ClientError('INVALID_PUBKEY', 'Not a valid npub', undefined, { cause: err });
        }
        throw new ClientError('INVALID_PUBKEY', 'Not a valid npub');
    }
    const lower = trimmed.toLowerCase();
    if (!isValidPublicKey(lower)) {
        throw new ClientError('INVALID_PUBKEY', `Not a valid public key: ${trimmed.slice(0, 16)}…`);
    }
    return lower;
}
