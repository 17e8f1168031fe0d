import { AdminService } from './admin.js';
import { attachmentKey, openObservedChat, saveAttachment, type SavedAttachment } from './attachments.js';
import { RequestCorrelator } from './correlator.js';
import { CHAT_POLL_INTERVAL_MS, DisputeChatSync, type ChatMessage, type FetchResult } from './disputeChat.js';
import { nowSeconds } from './envelope.js';
import { ClientError } from './errors.js';
import { generateSeedPhrase, KeyDeriver, keyPairFromSecret, parsePublicKey, parseSecretKey, type KeyPair } from './keys.js';
import { createLogger, describeError, setLogLevel } from './logger.js';
import { OrderBook } from './orderBook.js';
import { RecoveryEngine, TradeListener, type RecoveryOutcome } from './recovery.js';
import { RelayPool, type RelayTransport } from './relayPool.js';
import { PeriodicTask } from './scheduler.js';
import { loadSettings, resolveDataPaths, type DataPaths, type Settings } from './settings.js';
import { SqliteStore } from './store.js';
import { TradeService } from './trades.js';
import { TranscriptStore } from './transcript.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// RelayDeskClient – startup order: settings, store, seed, relays, recovery, background loops
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Client');

export interface ClientOptions {
    paths?: DataPaths;
    /** Relay connection to use instead of opening the configured relays */
    transport?: RelayTransport;
    /** Overrides for intervals and timeouts, mostly for tests */
    intervals?: { orderBookMs?: number; tradesMs?: number; chatMs?: number };
    responseTimeoutMs?: number;
}

interface AdminSession {
    keys: KeyPair;
    chat: DisputeChatSync;
    service: AdminService;
    task: PeriodicTask<FetchResult>;
}

interface Session {
    settings: Settings;
    store: SqliteStore;
    keys: KeyDeriver;
    transport: RelayTransport;
    pool: RelayPool | null;
    trades: TradeService;
    orderBook: OrderBook;
    listener: TradeListener;
    recovery: RecoveryOutcome[];
    admin: AdminSession | null;
}

export class RelayDeskClient {
    private session: Session | null = null;
    readonly paths: DataPaths;

    constructor(private readonly options: ClientOptions = {}) {
        this.paths = options.paths ?? resolveDataPaths();
    }

    get started(): boolean {
        return this.session !== null;
    }

    private require(): Session {
        if (!this.session) {
            throw new ClientError('INVALID_INPUT', 'Client is not started');
        }
        return this.session;
    }

    get settings(): Settings { return this.require().settings; }
    get store(): SqliteStore { return this.require().store; }
    get keys(): KeyDeriver { return this.require().keys; }
    get trades(): TradeService { return this.require().trades; }
    get orderBook(): OrderBook { return this.require().orderBook; }
    get tradeListener(): TradeListener { return this.require().listener; }
    get recoveryOutcomes(): RecoveryOutcome[] { return this.require().recovery; }

    get admin(): AdminService {
        const admin = this.require().admin;
        if (!admin) {
            throw new ClientError('CONFIG', 'No admin key configured; set adminPrivkey in settings.json');
        }
        return admin.service;
    }

    get chat(): DisputeChatSync {
        const admin = this.require().admin;
        if (!admin) {
            throw new ClientError('CONFIG', 'No admin key configured; set adminPrivkey in settings.json');
        }
        return admin.chat;
    }

    async start(): Promise<void> {
        if (this.session) { return; }

        const settings = loadSettings(this.paths);
        setLogLevel(settings.logLevel);
        if (!settings.mostroPubkey) {
            throw new ClientError('CONFIG', `mostroPubkey is not set in ${this.paths.settingsFile}`);
        }
        let mostroPubkey: string;
        try {
            mostroPubkey = parsePublicKey(settings.mostroPubkey);
        } catch (err) {
            throw new ClientError('CONFIG', `mostroPubkey is not a valid key: ${describeError(err)}`, undefined, { cause: err });
        }

        const store = new SqliteStore(this.paths.database);
        let pool: RelayPool | null = null;
        try {
            const keys = openKeys(store);

            let transport: RelayTransport;
            if (this.options.transport) {
                transport = this.options.transport;
            } else {
                pool = new RelayPool();
                const connected = await pool.connect(settings.relays);
                if (connected === 0) {
                    log.warn('No relay reachable yet; retrying in the background');
                }
                transport = pool;
            }

            const correlator = new RequestCorrelator(transport, { pow: settings.pow, timeoutMs: this.options.responseTimeoutMs });
            const trades = new TradeService(store, keys, correlator, mostroPubkey, settings.privacyMode);

            const recovery = await new RecoveryEngine(store, keys, transport, mostroPubkey).recoverAll();
            const listener = new TradeListener(store, keys, transport, mostroPubkey, { intervalMs: this.options.intervals?.tradesMs });
            listener.seed(recovery);

            const orderBook = new OrderBook(transport, mostroPubkey, {
                currencies: settings.currencies,
                includeDisputes: settings.adminPrivkey !== '',
                intervalMs: this.options.intervals?.orderBookMs
            });

            const admin = settings.adminPrivkey
                ? this.startAdmin(settings, store, transport, correlator, mostroPubkey)
                : null;

            this.session = { settings, store, keys, transport, pool, trades, orderBook, listener, recovery, admin };
            listener.start();
            orderBook.start();
            admin?.task.start(true);
            log.info(`Started as ${keys.identityKey().publicKey.slice(0, 16)}… (${recovery.length} active trades)`);
        } catch (err) {
            pool?.dispose();
            store.close();
            throw err;
        }
    }

    private startAdmin(
        settings: Settings,
        store: SqliteStore,
        transport: RelayTransport,
        correlator: RequestCorrelator,
        mostroPubkey: string
    ): AdminSession {
        const keys = keyPairFromSecret(parseSecretKey(settings.adminPrivkey));
        const chat = new DisputeChatSync(store, transport, new TranscriptStore(this.paths.chatsDir), keys, { pow: settings.pow });
        const restored = chat.restore(store.listDisputes());
        for (const dispute of store.listDisputes('in-progress')) {
            chat.ensureSharedKeys(dispute);
        }
        log.info(`Restored chat for ${restored.length} dispute(s)`);

        const task = new PeriodicTask('dispute-chat', this.options.intervals?.chatMs ?? CHAT_POLL_INTERVAL_MS, () => chat.fetchUpdates());
        task.onError((err) => log.warn('Chat sync failed:', describeError(err)));
        const service = new AdminService(store, keys, correlator, mostroPubkey, chat);
        return { keys, chat, service, task };
    }

    /** Downloads the attachment of a chat message into the downloads directory */
    async downloadAttachment(message: ChatMessage): Promise<SavedAttachment> {
        const session = this.require();
        if (!message.attachment) {
            throw new ClientError('INVALID_INPUT', 'Message has no attachment');
        }
        const admin = session.admin;
        let sender: string | null = null;
        if (admin && message.party && message.author !== 'admin') {
            sender = admin.chat.getChannel(message.disputeId, message.party)?.counterpartyPubkey ?? null;
        }
        const key = attachmentKey(message.attachment, admin?.keys.secretKey ?? null, sender);
        return saveAttachment({
            attachment: message.attachment,
            disputeId: message.disputeId,
            downloadsDir: this.paths.downloadsDir,
            key
        });
    }

    /** Observer mode: reads an encrypted chat file with a shared key; needs no session */
    observeChatFile(filePath: string, sharedKeyHex: string): string[] {
        return openObservedChat(filePath, sharedKeyHex, this.paths.downloadsDir);
    }

    dispose(): void {
        const session = this.session;
        if (!session) { return; }
        this.session = null;
        session.listener.stop();
        session.orderBook.stop();
        session.admin?.task.stop();
        session.pool?.dispose();
        session.store.close();
        log.info('Stopped');
    }
}

/** Loads the seed, or creates it on first run, and checks it still yields the stored identity */
function openKeys(store: SqliteStore): KeyDeriver {
    const user = store.getUser();
    if (!user) {
        const mnemonic = generateSeedPhrase();
        const keys = new KeyDeriver(mnemonic);
        store.createUser(keys.identityKey().publicKey, mnemonic, nowSeconds());
        log.info('Generated a new seed phrase');
        return keys;
    }
    const keys = new KeyDeriver(user.mnemonic);
    if (keys.identityKey().publicKey !== user.identityPubkey) {
        throw new ClientError('FATAL_SEED', 'Stored seed phrase does not derive the stored identity key');
    }
    return keys;
}
