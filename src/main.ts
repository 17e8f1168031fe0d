#!/usr/bin/env node
import { RelayDeskClient } from './client.js';
import { isClientError } from './errors.js';
import { createLogger, describeError } from './logger.js';
import { resolveDataPaths } from './settings.js';

const log = createLogger('Main');

function homeFromArgs(argv: readonly string[]): string | undefined {
    const i = argv.indexOf('--home');
    return i >= 0 ? argv[i + 1] : undefined;
}

async function main(): Promise<void> {
    const home = homeFromArgs(process.argv.slice(2));
    const client = new RelayDeskClient({ paths: home ? resolveDataPaths(home) : undefined });

    const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down`);
        client.dispose();
        process.exit(0);
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await client.start();

    client.tradeListener.onNotification((n) => {
        log.info(`${n.label}: order ${n.tradeId}${n.description ? ` (${n.description})` : ''}${n.invoice ? `\n${n.invoice}` : ''}`);
    });
    client.orderBook.onUpdate((snapshot) => {
        log.debug(`${snapshot.orders.length} pending order(s), ${snapshot.disputes.length} dispute(s)`);
    });
    if (client.settings.adminPrivkey) {
        client.chat.onUpdate((update) => {
            for (const message of update.messages) {
                log.info(`[${update.disputeId} ${update.party}] ${message.author}: ${message.content}`);
            }
        });
    }
}

main().catch((err: unknown) => {
    if (isClientError(err)) {
        log.error(`${err.code}: ${err.message}`);
    } else {
        log.error('Fatal:', describeError(err));
    }
    process.exit(1);
});
