import Database from 'better-sqlite3';
import { ClientError } from './errors.js';
import { createLogger, describeError } from './logger.js';
import { isDisputeStatus, isTradeStatus, type DisputeStatus, type TradeStatus } from './protocol.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// SqliteStore – users / orders / admin_disputes in one better-sqlite3 database
// Components depend on the narrow interfaces below, never on the database handle
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Store');

export type ChatParty = 'buyer' | 'seller';
export const CHAT_PARTIES: readonly ChatParty[] = ['buyer', 'seller'];

export interface ActiveTrade {
    tradeId: string;
    tradeIndex: number;
}

export interface TradeIndexStore {
    getTradeIndex(): number;
    setTradeIndex(index: number): void;
    /** Highest trade index referenced by any stored order, 0 when there are none */
    getHighestOrderIndex(): number;
    getActiveTrades(): ActiveTrade[];
}

export interface OrderStore {
    getActiveTrades(): ActiveTrade[];
    getOrder(id: string): OrderRecord | null;
    saveOrder(order: OrderRecord): void;
}

export interface ChatStore {
    getChatCursor(disputeId: string, party: ChatParty): number | null;
    /** Moves the cursor forward only; returns the number of rows changed */
    setChatCursor(disputeId: string, party: ChatParty, timestamp: number): number;
    getSharedKey(disputeId: string, party: ChatParty): string | null;
    setSharedKey(disputeId: string, party: ChatParty, secretHex: string): number;
}

export interface UserRecord {
    identityPubkey: string;
    mnemonic: string;
    lastTradeIndex: number;
    createdAt: number;
}

export interface OrderRecord {
    id: string;
    kind: 'buy' | 'sell' | null;
    status: TradeStatus | null;
    amount: number;
    fiatCode: string;
    minAmount: number | null;
    maxAmount: number | null;
    fiatAmount: number;
    paymentMethod: string;
    premium: number;
    tradeIndex: number | null;
    tradePubkey: string | null;
    counterpartyPubkey: string | null;
    isMine: boolean;
    buyerInvoice: string | null;
    requestId: number | null;
    createdAt: number | null;
    expiresAt: number | null;
}

export interface AdminDisputeRecord {
    id: string;
    orderId: string | null;
    kind: string | null;
    status: DisputeStatus;
    initiatorPubkey: string;
    buyerPubkey: string | null;
    sellerPubkey: string | null;
    amount: number;
    fiatAmount: number;
    fiatCode: string | null;
    premium: number;
    paymentMethod: string;
    fee: number;
    buyerSharedKey: string | null;
    sellerSharedKey: string | null;
    buyerChatLastSeen: number | null;
    sellerChatLastSeen: number | null;
    takenAt: number;
    createdAt: number;
}

/** Statuses after which a trade no longer needs recovery or polling */
const CLOSED_TRADE_STATUSES: readonly TradeStatus[] = [
    'success',
    'canceled',
    'cooperatively-canceled',
    'canceled-by-admin',
    'settled-by-admin',
    'completed-by-admin',
    'expired'
];

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS users (
        i0_pubkey CHAR(64) PRIMARY KEY,
        mnemonic TEXT NOT NULL,
        last_trade_index INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS orders (
        id TEXT PRIMARY KEY,
        kind TEXT,
        status TEXT,
        amount INTEGER NOT NULL,
        fiat_code TEXT NOT NULL,
        min_amount INTEGER,
        max_amount INTEGER,
        fiat_amount INTEGER NOT NULL,
        payment_method TEXT NOT NULL,
        premium INTEGER NOT NULL,
        trade_index INTEGER,
        trade_pubkey TEXT,
        counterparty_pubkey TEXT,
        is_mine INTEGER NOT NULL,
        buyer_invoice TEXT,
        request_id INTEGER,
        created_at INTEGER,
        expires_at INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_orders_trade_index ON orders(trade_index);
    CREATE TABLE IF NOT EXISTS admin_disputes (
        id TEXT PRIMARY KEY,
        order_id TEXT,
        kind TEXT,
        status TEXT NOT NULL,
        initiator_pubkey TEXT NOT NULL,
        buyer_pubkey TEXT,
        seller_pubkey TEXT,
        amount INTEGER NOT NULL,
        fiat_amount INTEGER NOT NULL,
        fiat_code TEXT,
        premium INTEGER NOT NULL,
        payment_method TEXT NOT NULL,
        fee INTEGER NOT NULL,
        buyer_shared_key TEXT,
        seller_shared_key TEXT,
        buyer_chat_last_seen INTEGER,
        seller_chat_last_seen INTEGER,
        taken_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
    );
`;

interface UserRow {
    i0_pubkey: string;
    mnemonic: string;
    last_trade_index: number;
    created_at: number;
}

interface OrderRow {
    id: string;
    kind: string | null;
    status: string | null;
    amount: number;
    fiat_code: string;
    min_amount: number | null;
    max_amount: number | null;
    fiat_amount: number;
    payment_method: string;
    premium: number;
    trade_index: number | null;
    trade_pubkey: string | null;
    counterparty_pubkey: string | null;
    is_mine: number;
    buyer_invoice: string | null;
    request_id: number | null;
    created_at: number | null;
    expires_at: number | null;
}

interface DisputeRow {
    id: string;
    order_id: string | null;
    kind: string | null;
    status: string;
    initiator_pubkey: string;
    buyer_pubkey: string | null;
    seller_pubkey: string | null;
    amount: number;
    fiat_amount: number;
    fiat_code: string | null;
    premium: number;
    payment_method: string;
    fee: number;
    buyer_shared_key: string | null;
    seller_shared_key: string | null;
    buyer_chat_last_seen: number | null;
    seller_chat_last_seen: number | null;
    taken_at: number;
    created_at: number;
}

// Column names are picked from these maps only, never from input
const CURSOR_COLUMN: Record<ChatParty, string> = {
    buyer: 'buyer_chat_last_seen',
    seller: 'seller_chat_last_seen'
};
const SHARED_KEY_COLUMN: Record<ChatParty, string> = {
    buyer: 'buyer_shared_key',
    seller: 'seller_shared_key'
};

export class SqliteStore implements TradeIndexStore, OrderStore, ChatStore {
    private readonly db: Database.Database;

    constructor(filename: string) {
        this.db = openDatabase(filename);
    }

    close(): void {
        if (this.db.open) { this.db.close(); }
    }

    private guard<T>(what: string, work: () => T): T {
        try {
            return work();
        } catch (err) {
            if (err instanceof ClientError) { throw err; }
            log.error(`${what} failed:`, describeError(err));
            throw new ClientError('PERSISTENCE', `Database error while trying to ${what}`, undefined, { cause: err });
        }
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // USER + TRADE INDEX
    // ——————————————————————————————————————————————————————————————————————————————————————————

    getUser(): UserRecord | null {
        return this.guard('read the user', () => {
            const row = this.db.prepare<[], UserRow>('SELECT * FROM users LIMIT 1').get();
            if (!row) { return null; }
            return {
                identityPubkey: row.i0_pubkey,
                mnemonic: row.mnemonic,
                lastTradeIndex: row.last_trade_index,
                createdAt: row.created_at
            };
        });
    }

    createUser(identityPubkey: string, mnemonic: string, createdAt: number): UserRecord {
        return this.guard('create the user', () => {
            this.db.prepare<[string, string, number]>(
                'INSERT INTO users (i0_pubkey, mnemonic, last_trade_index, created_at) VALUES (?, ?, 0, ?)'
            ).run(identityPubkey, mnemonic, createdAt);
            return { identityPubkey, mnemonic, lastTradeIndex: 0, createdAt };
        });
    }

    getTradeIndex(): number {
        return this.guard('read the trade index', () => {
            const row = this.db.prepare<[], { last_trade_index: number }>('SELECT last_trade_index FROM users LIMIT 1').get();
            return row?.last_trade_index ?? 0;
        });
    }

    setTradeIndex(index: number): void {
        this.guard('save the trade index', () => {
            const result = this.db.prepare<[number]>(
                'UPDATE users SET last_trade_index = ? WHERE i0_pubkey = (SELECT i0_pubkey FROM users LIMIT 1)'
            ).run(index);
            if (result.changes === 0) {
                throw new ClientError('PERSISTENCE', 'No user record to hold the trade index');
            }
        });
    }

    getHighestOrderIndex(): number {
        return this.guard('read order indices', () => {
            const row = this.db.prepare<[], { highest: number | null }>('SELECT MAX(trade_index) AS highest FROM orders').get();
            return row?.highest ?? 0;
        });
    }

    getActiveTrades(): ActiveTrade[] {
        return this.guard('list active trades', () => {
            const placeholders = CLOSED_TRADE_STATUSES.map(() => '?').join(', ');
            const rows = this.db.prepare<string[], { id: string; trade_index: number }>(
                `SELECT id, trade_index FROM orders
                 WHERE trade_index IS NOT NULL AND (status IS NULL OR status NOT IN (${placeholders}))
                 ORDER BY trade_index`
            ).all(...CLOSED_TRADE_STATUSES);
            return rows.map((row) => ({ tradeId: row.id, tradeIndex: row.trade_index }));
        });
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // ORDERS
    // ——————————————————————————————————————————————————————————————————————————————————————————

    saveOrder(order: OrderRecord): void {
        this.guard(`save order ${order.id}`, () => {
            this.db.prepare<OrderRow>(`
                INSERT INTO orders (id, kind, status, amount, fiat_code, min_amount, max_amount, fiat_amount,
                    payment_method, premium, trade_index, trade_pubkey, counterparty_pubkey, is_mine,
                    buyer_invoice, request_id, created_at, expires_at)
                VALUES (@id, @kind, @status, @amount, @fiat_code, @min_amount, @max_amount, @fiat_amount,
                    @payment_method, @premium, @trade_index, @trade_pubkey, @counterparty_pubkey, @is_mine,
                    @buyer_invoice, @request_id, @created_at, @expires_at)
                ON CONFLICT(id) DO UPDATE SET
                    kind=excluded.kind, status=excluded.status, amount=excluded.amount,
                    fiat_code=excluded.fiat_code, min_amount=excluded.min_amount, max_amount=excluded.max_amount,
                    fiat_amount=excluded.fiat_amount, payment_method=excluded.payment_method,
                    premium=excluded.premium, trade_index=excluded.trade_index, trade_pubkey=excluded.trade_pubkey,
                    counterparty_pubkey=excluded.counterparty_pubkey, is_mine=excluded.is_mine,
                    buyer_invoice=excluded.buyer_invoice, request_id=excluded.request_id,
                    created_at=excluded.created_at, expires_at=excluded.expires_at
            `).run(orderToRow(order));
        });
    }

    getOrder(id: string): OrderRecord | null {
        return this.guard(`read order ${id}`, () => {
            const row = this.db.prepare<[string], OrderRow>('SELECT * FROM orders WHERE id = ?').get(id);
            return row ? rowToOrder(row) : null;
        });
    }

    listOrders(): OrderRecord[] {
        return this.guard('list orders', () => {
            return this.db.prepare<[], OrderRow>('SELECT * FROM orders ORDER BY created_at DESC').all().map(rowToOrder);
        });
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // ADMIN DISPUTES
    // ——————————————————————————————————————————————————————————————————————————————————————————

    saveDispute(dispute: AdminDisputeRecord): void {
        this.guard(`save dispute ${dispute.id}`, () => {
            this.db.prepare<DisputeRow>(`
                INSERT INTO admin_disputes (id, order_id, kind, status, initiator_pubkey, buyer_pubkey, seller_pubkey,
                    amount, fiat_amount, fiat_code, premium, payment_method, fee, buyer_shared_key, seller_shared_key,
                    buyer_chat_last_seen, seller_chat_last_seen, taken_at, created_at)
                VALUES (@id, @order_id, @kind, @status, @initiator_pubkey, @buyer_pubkey, @seller_pubkey,
                    @amount, @fiat_amount, @fiat_code, @premium, @payment_method, @fee, @buyer_shared_key, @seller_shared_key,
                    @buyer_chat_last_seen, @seller_chat_last_seen, @taken_at, @created_at)
                ON CONFLICT(id) DO UPDATE SET
                    order_id=excluded.order_id, kind=excluded.kind, status=excluded.status,
                    initiator_pubkey=excluded.initiator_pubkey, buyer_pubkey=excluded.buyer_pubkey,
                    seller_pubkey=excluded.seller_pubkey, amount=excluded.amount, fiat_amount=excluded.fiat_amount,
                    fiat_code=excluded.fiat_code, premium=excluded.premium, payment_method=excluded.payment_method,
                    fee=excluded.fee, taken_at=excluded.taken_at,
                    buyer_shared_key=CASE WHEN admin_disputes.buyer_pubkey IS excluded.buyer_pubkey
                        THEN COALESCE(admin_disputes.buyer_shared_key, excluded.buyer_shared_key)
                        ELSE excluded.buyer_shared_key END,
                    seller_shared_key=CASE WHEN admin_disputes.seller_pubkey IS excluded.seller_pubkey
                        THEN COALESCE(admin_disputes.seller_shared_key, excluded.seller_shared_key)
                        ELSE excluded.seller_shared_key END
            `).run(disputeToRow(dispute));
        });
    }

    getDispute(id: string): AdminDisputeRecord | null {
        return this.guard(`read dispute ${id}`, () => {
            const row = this.db.prepare<[string], DisputeRow>('SELECT * FROM admin_disputes WHERE id = ? LIMIT 1').get(id);
            return row ? rowToDispute(row) : null;
        });
    }

    listDisputes(status?: DisputeStatus): AdminDisputeRecord[] {
        return this.guard('list disputes', () => {
            const rows = status
                ? this.db.prepare<[string], DisputeRow>('SELECT * FROM admin_disputes WHERE status = ? ORDER BY taken_at DESC').all(status)
                : this.db.prepare<[], DisputeRow>('SELECT * FROM admin_disputes ORDER BY taken_at DESC').all();
            return rows.flatMap((row) => {
                const dispute = rowToDispute(row);
                return dispute ? [dispute] : [];
            });
        });
    }

    setDisputeStatus(id: string, status: DisputeStatus): number {
        return this.guard(`update dispute ${id}`, () => {
            return this.db.prepare<[string, string]>('UPDATE admin_disputes SET status = ? WHERE id = ?').run(status, id).changes;
        });
    }

    // ——————————————————————————————————————————————————————————————————————————————————————————
    // CHAT CURSORS + SHARED KEYS
    // ——————————————————————————————————————————————————————————————————————————————————————————

    getChatCursor(disputeId: string, party: ChatParty): number | null {
        return this.guard(`read ${party} chat cursor`, () => {
            const row = this.db.prepare<[string], { cursor: number | null }>(
                `SELECT ${CURSOR_COLUMN[party]} AS cursor FROM admin_disputes WHERE id = ?`
            ).get(disputeId);
            return row?.cursor ?? null;
        });
    }

    setChatCursor(disputeId: string, party: ChatParty, timestamp: number): number {
        const column = CURSOR_COLUMN[party];
        return this.guard(`save ${party} chat cursor`, () => {
            return this.db.prepare<[number, string, number]>(
                `UPDATE admin_disputes SET ${column} = ? WHERE id = ? AND (${column} IS NULL OR ${column} < ?)`
            ).run(timestamp, disputeId, timestamp).changes;
        });
    }

    getSharedKey(disputeId: string, party: ChatParty): string | null {
        return this.guard(`read ${party} shared key`, () => {
            const row = this.db.prepare<[string], { secret: string | null }>(
                `SELECT ${SHARED_KEY_COLUMN[party]} AS secret FROM admin_disputes WHERE id = ?`
            ).get(disputeId);
            return row?.secret ?? null;
        });
    }

    setSharedKey(disputeId: string, party: ChatParty, secretHex: string): number {
        return this.guard(`save ${party} shared key`, () => {
            return this.db.prepare<[string, string]>(
                `UPDATE admin_disputes SET ${SHARED_KEY_COLUMN[party]} = ? WHERE id = ?`
            ).run(secretHex, disputeId).changes;
        });
    }
}

function openDatabase(filename: string): Database.Database {
    try {
        const db = new Database(filename);
        if (filename !== ':memory:') {
            db.pragma('journal_mode = WAL');
        }
        db.exec(SCHEMA);
        return db;
    } catch (err) {
        throw new ClientError('PERSISTENCE', `Could not open database ${filename}`, undefined, { cause: err });
    }
}

// ——————————————————————————————————————————————————————————————————————————————————————————
// ROW MAPPING
// ——————————————————————————————————————————————————————————————————————————————————————————

function orderToRow(order: OrderRecord): OrderRow {
    return {
        id: order.id,
        kind: order.kind,
        status: order.status,
        amount: order.amount,
        fiat_code: order.fiatCode,
        min_amount: order.minAmount,
        max_amount: order.maxAmount,
        fiat_amount: order.fiatAmount,
        payment_method: order.paymentMethod,
        premium: order.premium,
        trade_index: order.tradeIndex,
        trade_pubkey: order.tradePubkey,
        counterparty_pubkey: order.counterpartyPubkey,
        is_mine: order.isMine ? 1 : 0,
        buyer_invoice: order.buyerInvoice,
        request_id: order.requestId,
        created_at: order.createdAt,
        expires_at: order.expiresAt
    };
}

function rowToOrder(row: OrderRow): OrderRecord {
    return {
        id: row.id,
        kind: row.kind === 'buy' || row.kind === 'sell' ? row.kind : null,
        status: row.status !== null && isTradeStatus(row.status) ? row.status : null,
        amount: row.amount,
        fiatCode: row.fiat_code,
        minAmount: row.min_amount,
        maxAmount: row.max_amount,
        fiatAmount: row.fiat_amount,
        paymentMethod: row.payment_method,
        premium: row.premium,
        tradeIndex: row.trade_index,
        tradePubkey: row.trade_pubkey,
        counterpartyPubkey: row.counterparty_pubkey,
        isMine: row.is_mine === 1,
        buyerInvoice: row.buyer_invoice,
        requestId: row.request_id,
        createdAt: row.created_at,
        expiresAt: row.expires_at
    };
}

function disputeToRow(dispute: AdminDisputeRecord): DisputeRow {
    return {
        id: dispute.id,
        order_id: dispute.orderId,
        kind: dispute.kind,
        status: dispute.status,
        initiator_pubkey: dispute.initiatorPubkey,
        buyer_pubkey: dispute.buyerPubkey,
        seller_pubkey: dispute.sellerPubkey,
        amount: dispute.amount,
        fiat_amount: dispute.fiatAmount,
        fiat_code: dispute.fiatCode,
        premium: dispute.premium,
        payment_method: dispute.paymentMethod,
        fee: dispute.fee,
        buyer_shared_key: dispute.buyerSharedKey,
        seller_shared_key: dispute.sellerSharedKey,
        buyer_chat_last_seen: dispute.buyerChatLastSeen,
        seller_chat_last_seen: dispute.sellerChatLastSeen,
        taken_at: dispute.takenAt,
        created_at: dispute.createdAt
    };
}

function rowToDispute(row: DisputeRow): AdminDisputeRecord | null {
    if (!isDisputeStatus(row.status)) {
        log.warn(`Dispute ${row.id} has unknown status ${row.status}; skipping`);
        return null;
    }
    return {
        id: row.id,
        orderId: row.order_id,
        kind: row.kind,
        status: row.status,
        initiatorPubkey: row.initiator_pubkey,
        buyerPubkey: row.buyer_pubkey,
        sellerPubkey: row.seller_pubkey,
        amount: row.amount,
        fiatAmount: row.fiat_amount,
        fiatCode: row.fiat_code,
        premium: row.premium,
        paymentMethod: row.payment_method,
        fee: row.fee,
        buyerSharedKey: row.buyer_shared_key,
        sellerSharedKey: row.seller_shared_key,
        buyerChatLastSeen: row.buyer_chat_last_seen,
        sellerChatLastSeen: row.seller_chat_last_seen,
        takenAt: row.taken_at,
        createdAt: row.created_at
    };
}
