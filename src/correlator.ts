import { ClientError } from './errors.js';
import { createLogger, describeError } from './logger.js';
import { decodeEnvelope, encodeEnvelope, type DecodedEnvelope, type EnvelopeKeys, type PrivacyMode } from './envelope.js';
import { describeCantDo, GIFT_WRAP_KIND, type Action, type ProtocolMessage } from './protocol.js';
import type { PublishResult, RelayTransport } from './relayPool.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// RequestCorrelator – Sent → Matched | Mismatched | TimedOut, one outcome per request
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Correlator');

export const DEFAULT_RESPONSE_TIMEOUT_MS = 15000;

export interface CorrelatedRequest {
    message: ProtocolMessage;
    keys: EnvelopeKeys;
    recipient: string;
    mode: PrivacyMode;
    expectedAction?: Action;
    timeoutMs?: number;
}

export type CorrelationOutcome =
    | { status: 'matched'; requestId: number | null; response: DecodedEnvelope }
    | { status: 'mismatched'; expected: number; received: number; response: DecodedEnvelope }
    | { status: 'timed-out'; requestId: number | null; waitedMs: number };

interface PendingRequest {
    requestId: number | null;
    issuedAt: number;
    expectedAction: Action | null;
}

export class RequestCorrelator {
    private readonly pending: Map<string, PendingRequest> = new Map();
    private readonly timeoutMs: number;
    private readonly pow: number;

    constructor(
        private readonly transport: RelayTransport,
        options: { timeoutMs?: number; pow?: number } = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
        this.pow = options.pow ?? 0;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    /** Sends a message the exchange does not answer */
    publishOnly(req: Omit<CorrelatedRequest, 'expectedAction' | 'timeoutMs'>): Promise<PublishResult> {
        const event = encodeEnvelope(req.message, req.keys, req.recipient, req.mode, { pow: this.pow });
        return this.transport.publish(event);
    }

    /**
     * Subscribes for replies to the trade key, then publishes. Rejects only if
     * the publish itself fails; everything else is an outcome.
     */
    request(req: CorrelatedRequest): Promise<CorrelationOutcome> {
        const requestId = req.message.kind.requestId;
        const timeoutMs = req.timeoutMs ?? this.timeoutMs;
        const event = encodeEnvelope(req.message, req.keys, req.recipient, req.mode, { pow: this.pow });
        const token = event.id;

        return new Promise((resolve, reject) => {
            let settled = false;
            let subId = '';

            const finish = (outcome: CorrelationOutcome | Error) => {
                if (settled) { return; }
                settled = true;
                clearTimeout(timer);
                if (subId) { this.transport.unsubscribe(subId); }
                this.pending.delete(token);
                if (outcome instanceof Error) {
                    reject(outcome);
                } else {
                    resolve(outcome);
                }
            };

            const timer = setTimeout(() => {
                log.warn(`No response to ${req.message.kind.action} within ${timeoutMs}ms`);
                finish({ status: 'timed-out', requestId, waitedMs: timeoutMs });
            }, timeoutMs);

            this.pending.set(token, {
                requestId,
                issuedAt: Date.now(),
                expectedAction: req.expectedAction ?? null
            });

            subId = this.transport.subscribe(
                { kinds: [GIFT_WRAP_KIND], '#p': [req.keys.trade.publicKey], limit: 0 },
                (incoming) => {
                    if (settled) { return; }
                    const decoded = decodeEnvelope(incoming, req.keys.trade.secretKey);
                    if (!decoded.ok) {
                        log.debug(`Skipping event ${incoming.id}: ${decoded.error.message}`);
                        return;
                    }
                    if (decoded.value.sender !== req.recipient) {
                        log.debug(`Ignoring ${decoded.value.message.kind.action} from ${decoded.value.sender.slice(0, 16)}…, not the exchange`);
                        return;
                    }
                    const received = decoded.value.message.kind.requestId;
                    if (requestId === null || received === requestId) {
                        const action = decoded.value.message.kind.action;
                        const expected = this.pending.get(token)?.expectedAction ?? null;
                        if (expected && action !== expected && action !== 'cant-do') {
                            log.warn(`Matched ${action} while expecting ${expected}`);
                        }
                        finish({ status: 'matched', requestId, response: decoded.value });
                        return;
                    }
                    if (received === null) {
                        log.debug(`Ignoring ${decoded.value.message.kind.action} without request id while ${requestId} is pending`);
                        return;
                    }
                    log.warn(`Response carries request id ${received}, expected ${requestId}`);
                    finish({ status: 'mismatched', expected: requestId, received, response: decoded.value });
                }
            );

            this.transport.publish(event).catch((err: unknown) => {
                log.error(`Publishing ${req.message.kind.action} failed:`, describeError(err));
                finish(err instanceof Error ? err : new ClientError('TRANSPORT', describeError(err)));
            });
        });
    }
}

/**
 * Turns an outcome into the reply message, or throws the error an operator
 * should see. A cant-do reply is always an error.
 */
export function expectResponse(outcome: CorrelationOutcome, expectedActions: readonly Action[]): DecodedEnvelope {
    switch (outcome.status) {
        case 'timed-out':
            throw new ClientError('TIMEOUT', `No response from the exchange within ${Math.round(outcome.waitedMs / 1000)}s`, {
                requestId: outcome.requestId
            });
        case 'mismatched':
            throw new ClientError('MISMATCH', `Response request id ${outcome.received} does not match ${outcome.expected}`, {
                expected: outcome.expected,
                received: outcome.received
            });
        case 'matched': {
            const { kind } = outcome.response.message;
            if (kind.action === 'cant-do') {
                const reason = kind.payload?.type === 'cant-do' ? kind.payload.reason : null;
                throw new ClientError('CANT_DO', describeCantDo(reason), { reason });
            }
            if (expectedActions.length > 0 && !expectedActions.includes(kind.action)) {
                throw new ClientError('UNEXPECTED_ACTION', `Unexpected response action ${kind.action}`, {
                    action: kind.action,
                    expected: expectedActions
                });
            }
            return outcome.response;
        }
    }
}
