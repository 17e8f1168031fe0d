import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ClientError } from '../../src/errors.js';

export const TEST_SEED = 'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about';

/** Runs fn and returns the ClientError it throws; fails the test otherwise */
export function catchClientError(fn: () => unknown): ClientError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ClientError) { return err; }
        throw err;
    }
    throw new Error('Expected a ClientError to be thrown');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<ClientError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof ClientError) { return err; }
        throw err;
    }
    throw new Error('Expected the promise to reject with a ClientError');
}

export function tempDir(prefix = 'relaydesk-test-'): string {
    return mkdtempSync(join(tmpdir(), prefix));
}
