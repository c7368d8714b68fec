import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { Address, Hex } from 'viem';
import type {
  ClaimRecord,
  DistributionEvent,
  DistributionEventType,
  DistributionRecord,
  UserProof,
} from '../types';
import { isCategory } from '../types';
import logger from '../utils/logger';

export type DB = Database.Database;

// Row shapes (column names match the SQLite schema)
type DistributionRow = {
  day: number;
  category: number;
  sub_batch: number;
  merkle_root: string;
  user_count: number;
  total_reward: string; // uint256 as decimal text
  tree_depth: number;
  finalized: number; // SQLite stores booleans as 0/1
  submitter: string;
  created_at: number;
};

type ClaimRow = {
  day: number;
  category: number;
  sub_batch: number;
  user: string;
  amount: string;
  claimed_at: number;
};

type EventRow = {
  seq: number;
  type: string;
  day: number;
  category: number;
  sub_batch: number;
  payload: string;
  created_at: number;
};

type ProofRow = {
  user: string;
  points: string;
  amount: string;
  leaf_index: number;
  leaf: string;
  proof: string;
};

/**
 * Open (or create) a database and make sure every table exists.
 * Use ':memory:' for tests.
 */
export function createDatabase(dbPath: string): DB {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  initDatabase(db);

  logger.debug(`Database ready at ${dbPath}`);
  return db;
}

// Initialize the database with necessary tables
export function initDatabase(db: DB): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS distributions (
      day INTEGER NOT NULL,
      category INTEGER NOT NULL CHECK(category BETWEEN 0 AND 5),
      sub_batch INTEGER NOT NULL,
      merkle_root TEXT NOT NULL,
      user_count INTEGER NOT NULL,
      total_reward TEXT NOT NULL,
      tree_depth INTEGER NOT NULL,
      finalized INTEGER NOT NULL CHECK(finalized IN (0, 1)),
      submitter TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      PRIMARY KEY (day, category, sub_batch)
    );

    CREATE TABLE IF NOT EXISTS claims (
      day INTEGER NOT NULL,
      category INTEGER NOT NULL,
      sub_batch INTEGER NOT NULL,
      user TEXT NOT NULL,
      amount TEXT NOT NULL,
      claimed_at INTEGER NOT NULL,
      PRIMARY KEY (day, category, sub_batch, user),
      FOREIGN KEY (day, category, sub_batch) REFERENCES distributions(day, category, sub_batch)
    );

    CREATE TABLE IF NOT EXISTS nonces (
      nonce TEXT PRIMARY KEY,
      signer TEXT NOT NULL,
      consumed_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      type TEXT NOT NULL CHECK(type IN ('DistributionFinalized', 'RewardClaimed')),
      day INTEGER NOT NULL,
      category INTEGER NOT NULL,
      sub_batch INTEGER NOT NULL,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS daily_caps (
      category INTEGER PRIMARY KEY,
      cap TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS relayers (
      address TEXT PRIMARY KEY,
      granted_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS escrow (
      id INTEGER PRIMARY KEY CHECK(id = 1),
      balance TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS payouts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipient TEXT NOT NULL,
      amount TEXT NOT NULL,
      paid_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS batch_proofs (
      day INTEGER NOT NULL,
      category INTEGER NOT NULL,
      sub_batch INTEGER NOT NULL,
      user TEXT NOT NULL,
      points TEXT NOT NULL,
      amount TEXT NOT NULL,
      leaf_index INTEGER NOT NULL,
      leaf TEXT NOT NULL,
      proof TEXT NOT NULL,
      PRIMARY KEY (day, category, sub_batch, user)
    );
  `);

  // Create indexes for common query patterns
  db.prepare('CREATE INDEX IF NOT EXISTS idx_claims_user ON claims(user)').run();
  db.prepare('CREATE INDEX IF NOT EXISTS idx_events_slot ON events(day, category, sub_batch)').run();
  db.prepare('CREATE INDEX IF NOT EXISTS idx_batch_proofs_user ON batch_proofs(user, day, category)').run();
}

function toCategory(value: number) {
  if (!isCategory(value)) {
    throw new Error(`Corrupt row: unknown category ${value}`);
  }
  return value;
}

// Row values are written by this module only, so hex/address columns round-trip as written
function toHex(value: string): Hex {
  if (!value.startsWith('0x')) {
    throw new Error(`Corrupt row: expected hex, got ${value}`);
  }
  return `0x${value.slice(2)}`;
}

function toAddress(value: string): Address {
  return toHex(value);
}

export function rowToDistribution(row: DistributionRow): DistributionRecord {
  return {
    day: row.day,
    category: toCategory(row.category),
    subBatch: row.sub_batch,
    root: toHex(row.merkle_root),
    userCount: row.user_count,
    totalReward: BigInt(row.total_reward),
    treeDepth: row.tree_depth,
    finalized: Boolean(row.finalized),
    submitter: toAddress(row.submitter),
    createdAt: row.created_at,
  };
}

export function rowToClaim(row: ClaimRow): ClaimRecord {
  return {
    day: row.day,
    category: toCategory(row.category),
    subBatch: row.sub_batch,
    user: toAddress(row.user),
    amount: BigInt(row.amount),
    claimedAt: row.claimed_at,
  };
}

function parsePayload(raw: string): Record<string, string | number> {
  const parsed: unknown = JSON.parse(raw);
  const payload: Record<string, string | number> = {};
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string' || typeof value === 'number') {
        payload[key] = value;
      }
    }
  }
  return payload;
}

function toEventType(value: string): DistributionEventType {
  if (value === 'DistributionFinalized' || value === 'RewardClaimed') return value;
  throw new Error(`Corrupt row: unknown event type ${value}`);
}

export function rowToEvent(row: EventRow): DistributionEvent {
  return {
    seq: row.seq,
    type: toEventType(row.type),
    day: row.day,
    category: toCategory(row.category),
    subBatch: row.sub_batch,
    payload: parsePayload(row.payload),
    createdAt: row.created_at,
  };
}

export function rowToProof(row: ProofRow): UserProof {
  const proof: unknown = JSON.parse(row.proof);
  if (!Array.isArray(proof)) {
    throw new Error('Corrupt row: proof is not an array');
  }
  return {
    user: toAddress(row.user),
    points: BigInt(row.points),
    amount: BigInt(row.amount),
    index: row.leaf_index,
    leaf: toHex(row.leaf),
    proof: proof.map((node) => toHex(String(node))),
  };
}

// ── Distributions ──────────────────────────────────────────────────

export function getDistribution(
  db: DB,
  day: number,
  category: number,
  subBatch: number
): DistributionRecord | undefined {
  const row = db.prepare(`
    SELECT day, category, sub_batch, merkle_root, user_count, total_reward,
      tree_depth, finalized, submitter, created_at
    FROM distributions
    WHERE day = ? AND category = ? AND sub_batch = ?
  `).get(day, category, subBatch) as DistributionRow | undefined;

  if (!row) return undefined;

  return rowToDistribution(row);
}

export function getDistributionsByDay(db: DB, day: number): DistributionRecord[] {
  const rows = db.prepare(`
    SELECT day, category, sub_batch, merkle_root, user_count, total_reward,
      tree_depth, finalized, submitter, created_at
    FROM distributions
    WHERE day = ?
    ORDER BY category ASC, sub_batch ASC
  `).all(day) as DistributionRow[];

  return rows.map(row => rowToDistribution(row));
}

export function getCategoryTotal(db: DB, day: number, category: number): bigint {
  const rows = db.prepare(`
    SELECT total_reward FROM distributions WHERE day = ? AND category = ?
  `).all(day, category) as Array<{ total_reward: string }>;

  // Summed in JS: totals can exceed SQLite's 64-bit integers
  return rows.reduce((sum, row) => sum + BigInt(row.total_reward), 0n);
}

// Plain INSERT: a second write for the same slot violates the primary key
export function insertDistribution(db: DB, record: DistributionRecord): void {
  db.prepare(`
    INSERT INTO distributions (
      day, category, sub_batch, merkle_root, user_count, total_reward,
      tree_depth, finalized, submitter, created_at
    ) VALUES (
      @day, @category, @subBatch, @root, @userCount, @totalReward,
      @treeDepth, @finalized, @submitter, @createdAt
    )
  `).run({
    day: record.day,
    category: record.category,
    subBatch: record.subBatch,
    root: record.root,
    userCount: record.userCount,
    totalReward: record.totalReward.toString(),
    treeDepth: record.treeDepth,
    finalized: record.finalized ? 1 : 0,
    submitter: record.submitter,
    createdAt: record.createdAt,
  });
}

// ── Nonces ─────────────────────────────────────────────────────────

export function isNonceConsumed(db: DB, nonce: bigint): boolean {
  const row = db.prepare('SELECT 1 AS found FROM nonces WHERE nonce = ?').get(nonce.toString());
  return row !== undefined;
}

export function consumeNonce(db: DB, nonce: bigint, signer: Address, consumedAt: number): void {
  db.prepare('INSERT INTO nonces (nonce, signer, consumed_at) VALUES (?, ?, ?)')
    .run(nonce.toString(), signer, consumedAt);
}

// ── Claims ─────────────────────────────────────────────────────────

export function getClaim(
  db: DB,
  day: number,
  category: number,
  subBatch: number,
  user: Address
): ClaimRecord | undefined {
  const row = db.prepare(`
    SELECT day, category, sub_batch, user, amount, claimed_at
    FROM claims
    WHERE day = ? AND category = ? AND sub_batch = ? AND user = ?
  `).get(day, category, subBatch, user) as ClaimRow | undefined;

  if (!row) return undefined;

  return rowToClaim(row);
}

export function getClaimsByUser(db: DB, user: Address): ClaimRecord[] {
  const rows = db.prepare(`
    SELECT day, category, sub_batch, user, amount, claimed_at
    FROM claims
    WHERE user = ?
    ORDER BY day DESC, category ASC, sub_batch ASC
  `).all(user) as ClaimRow[];

  return rows.map(row => rowToClaim(row));
}

export function insertClaim(db: DB, claim: ClaimRecord): void {
  db.prepare(`
    INSERT INTO claims (day, category, sub_batch, user, amount, claimed_at)
    VALUES (@day, @category, @subBatch, @user, @amount, @claimedAt)
  `).run({
    day: claim.day,
    category: claim.category,
    subBatch: claim.subBatch,
    user: claim.user,
    amount: claim.amount.toString(),
    claimedAt: claim.claimedAt,
  });
}

export function getClaimedTotal(db: DB, day: number, category: number, subBatch: number): bigint {
  const rows = db.prepare(`
    SELECT amount FROM claims WHERE day = ? AND category = ? AND sub_batch = ?
  `).all(day, category, subBatch) as Array<{ amount: string }>;

  return rows.reduce((sum, row) => sum + BigInt(row.amount), 0n);
}

// ── Events ─────────────────────────────────────────────────────────

export function appendEvent(
  db: DB,
  event: Omit<DistributionEvent, 'seq'>
): DistributionEvent {
  const result = db.prepare(`
    INSERT INTO events (type, day, category, sub_batch, payload, created_at)
    VALUES (@type, @day, @category, @subBatch, @payload, @createdAt)
  `).run({
    type: event.type,
    day: event.day,
    category: event.category,
    subBatch: event.subBatch,
    payload: JSON.stringify(event.payload),
    createdAt: event.createdAt,
  });

  return { ...event, seq: Number(result.lastInsertRowid) };
}

export function getEvents(db: DB, fromSeq: number = 0): DistributionEvent[] {
  const rows = db.prepare(`
    SELECT seq, type, day, category, sub_batch, payload, created_at
    FROM events
    WHERE seq >= ?
    ORDER BY seq ASC
  `).all(fromSeq) as EventRow[];

  return rows.map(row => rowToEvent(row));
}

// ── Daily caps ─────────────────────────────────────────────────────

export function getDailyCap(db: DB, category: number): bigint | undefined {
  const row = db.prepare('SELECT cap FROM daily_caps WHERE category = ?')
    .get(category) as { cap: string } | undefined;
  return row ? BigInt(row.cap) : undefined;
}

export function setDailyCap(db: DB, category: number, cap: bigint): void {
  db.prepare(`
    INSERT INTO daily_caps (category, cap) VALUES (?, ?)
    ON CONFLICT(category) DO UPDATE SET cap = excluded.cap
  `).run(category, cap.toString());
}

// ── Relayers ───────────────────────────────────────────────────────

export function hasRelayer(db: DB, address: Address): boolean {
  return db.prepare('SELECT 1 AS found FROM relayers WHERE address = ?').get(address) !== undefined;
}

export function addRelayer(db: DB, address: Address, grantedAt: number): void {
  db.prepare('INSERT OR IGNORE INTO relayers (address, granted_at) VALUES (?, ?)')
    .run(address, grantedAt);
}

export function removeRelayer(db: DB, address: Address): void {
  db.prepare('DELETE FROM relayers WHERE address = ?').run(address);
}

// ── Escrow ─────────────────────────────────────────────────────────

export function getEscrowBalance(db: DB): bigint {
  const row = db.prepare('SELECT balance FROM escrow WHERE id = 1').get() as
    { balance: string } | undefined;
  return row ? BigInt(row.balance) : 0n;
}

export function setEscrowBalance(db: DB, balance: bigint): void {
  db.prepare(`
    INSERT INTO escrow (id, balance) VALUES (1, ?)
    ON CONFLICT(id) DO UPDATE SET balance = excluded.balance
  `).run(balance.toString());
}

export function recordPayout(db: DB, recipient: Address, amount: bigint, paidAt: number): void {
  db.prepare('INSERT INTO payouts (recipient, amount, paid_at) VALUES (?, ?, ?)')
    .run(recipient, amount.toString(), paidAt);
}

export function getPayoutTotal(db: DB, recipient: Address): bigint {
  const rows = db.prepare('SELECT amount FROM payouts WHERE recipient = ?')
    .all(recipient) as Array<{ amount: string }>;
  return rows.reduce((sum, row) => sum + BigInt(row.amount), 0n);
}

// ── Batch proofs (off-chain) ───────────────────────────────────────

export function insertBatchProofs(
  db: DB,
  day: number,
  category: number,
  subBatch: number,
  proofs: readonly UserProof[]
): void {
  const stmt = db.prepare(`
    INSERT OR REPLACE INTO batch_proofs (
      day, category, sub_batch, user, points, amount, leaf_index, leaf, proof
    ) VALUES (
      @day, @category, @subBatch, @user, @points, @amount, @index, @leaf, @proof
    )
  `);

  // Start a transaction for better performance
  const insertAll = db.transaction((items: readonly UserProof[]) => {
    for (const item of items) {
      stmt.run({
        day,
        category,
        subBatch,
        user: item.user,
        points: item.points.toString(),
        amount: item.amount.toString(),
        index: item.index,
        leaf: item.leaf,
        proof: JSON.stringify(item.proof),
      });
    }
  });

  insertAll(proofs);
}

export function getBatchProof(
  db: DB,
  day: number,
  category: number,
  user: Address
): (UserProof & { subBatch: number }) | undefined {
  const row = db.prepare(`
    SELECT sub_batch, user, points, amount, leaf_index, leaf, proof
    FROM batch_proofs
    WHERE day = ? AND category = ? AND user = ?
    ORDER BY sub_batch ASC
    LIMIT 1
  `).get(day, category, user) as (ProofRow & { sub_batch: number }) | undefined;

  if (!row) return undefined;

  return { ...rowToProof(row), subBatch: row.sub_batch };
}
