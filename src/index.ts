export * from './admin.js';
export * from './attachments.js';
export * from './client.js';
export * from './correlator.js';
export * from './disputeChat.js';
export * from './envelope.js';
export * from './errors.js';
export * from './keys.js';
export * from './logger.js';
export * from './orderBook.js';
export * from './protocol.js';
export * from './recovery.js';
export * from './relayPool.js';
export * from './scheduler.js';
export * from './settings.js';
export * from './store.js';
export * from './trades.js';
export * from './transcript.js';
