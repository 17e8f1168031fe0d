/**
 * Error types shared by every component.
 *
 * Foreground operations reject with a ClientError whose message can be shown
 * to the operator as-is. Background loops log them and carry on.
 */

export type ClientErrorCode =
    | 'FATAL_SEED'
    | 'CONFIG'
    | 'INVALID_INPUT'
    | 'INVALID_PUBKEY'
    | 'DECODE'
    | 'TIMEOUT'
    | 'MISMATCH'
    | 'UNEXPECTED_ACTION'
    | 'CANT_DO'
    | 'TRANSPORT'
    | 'PERSISTENCE'
    | 'RESOURCE_LIMIT'
    | 'DECRYPT'
    | 'INTEGRITY'
    | 'FINALIZED';

const RETRYABLE_CODES: ReadonlySet<ClientErrorCode> = new Set<ClientErrorCode>([
    'TIMEOUT',
    'TRANSPORT',
    'PERSISTENCE'
]);

export class ClientError extends Error {
    public readonly code: ClientErrorCode;
    public readonly retryable: boolean;
    public readonly details: Record<string, unknown> | undefined;

    constructor(code: ClientErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ClientError';
        this.code = code;
        this.retryable = RETRYABLE_CODES.has(code);
        this.details = details;
    }

    isCode(code: ClientErrorCode): boolean {
        return this.code === code;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            retryable: this.retryable,
            details: this.details
        };
    }
}

/** Which layer of an incoming event could not be read */
export type DecodeFailure =
    | 'wrong-kind'
    | 'bad-wrap-signature'
    | 'wrap-decrypt'
    | 'malformed-seal'
    | 'bad-seal-signature'
    | 'seal-decrypt'
    | 'malformed-rumor'
    | 'malformed-message'
    | 'bad-message-signature';

export class DecodeError extends ClientError {
    public readonly reason: DecodeFailure;

    constructor(reason: DecodeFailure, message: string, options?: { cause?: unknown }) {
        super('DECODE', message, { reason }, options);
        this.name = 'DecodeError';
        this.reason = reason;
    }
}

export type DecodeResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: DecodeError };

export function isClientError(err: unknown, code?: ClientErrorCode): err is ClientError {
    return err instanceof ClientError && (code === undefined || err.code === code);
}
