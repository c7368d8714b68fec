import { getAddress, type Address } from 'viem';
import * as db from '../db';
import type { DB } from '../db';
import type {
  Category,
  CategoryStatus,
  ClaimRecord,
  Clock,
  DayStatus,
  DistributionEvent,
  DistributionRecord,
} from '../types';
import { ALL_CATEGORIES, isCategory } from '../types';
import { CATEGORY_NAMES, DEFAULT_DAILY_CAPS, SECONDS_PER_DAY } from '../utils/constants';
import { DistributionError } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const logger = componentLogger('ledger');

export type EventListener = (event: DistributionEvent) => void;

export interface DistributionLedgerOptions {
  // Only this address may change caps
  admin: Address;
  dailyCaps?: Record<Category, bigint>;
  clock?: Clock;
}

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Append-only store of finalized (day, category, subBatch) distributions.
 *
 * Holds roots and totals only. Leaves and proofs live with whoever built the
 * batch and can be rebuilt from it; the ledger assumes that material stays available.
 */
export class DistributionLedger {
  readonly admin: Address;
  private readonly defaultCaps: Record<Category, bigint>;
  private readonly clock: Clock;
  private readonly listeners = new Set<EventListener>();

  constructor(private readonly database: DB, options: DistributionLedgerOptions) {
    this.admin = getAddress(options.admin);
    this.defaultCaps = { ...(options.dailyCaps ?? DEFAULT_DAILY_CAPS) };
    this.clock = options.clock ?? systemClock;
  }

  get db(): DB {
    return this.database;
  }

  now(): number {
    return this.clock();
  }

  currentDay(): number {
    return Math.floor(this.clock() / SECONDS_PER_DAY);
  }

  get(day: number, category: number, subBatch: number = 0): DistributionRecord | undefined {
    return db.getDistribution(this.database, day, category, subBatch);
  }

  list(day: number): DistributionRecord[] {
    return db.getDistributionsByDay(this.database, day);
  }

  // Sum of every finalized sub-batch for the category on that day
  totalForCategory(day: number, category: number): bigint {
    return db.getCategoryTotal(this.database, day, category);
  }

  /**
   * Per-category summary of what has been finalized for a day (today by default).
   * Every category is listed, submitted or not.
   */
  status(day: number = this.currentDay()): DayStatus {
    const records = this.list(day);
    const categories = ALL_CATEGORIES.map((category): CategoryStatus => {
      const own = records.filter((record) => record.category === category);
      return {
        category,
        name: CATEGORY_NAMES[category],
        submitted: own.length > 0,
        subBatches: own.length,
        userCount: own.reduce((sum, record) => sum + record.userCount, 0),
        totalReward: own.reduce((sum, record) => sum + record.totalReward, 0n),
        roots: own.map((record) => record.root),
      };
    });
    return { day, categories };
  }

  dailyCap(category: Category): bigint {
    return db.getDailyCap(this.database, category) ?? this.defaultCaps[category];
  }

  setDailyCap(caller: Address, category: number, cap: bigint): void {
    if (getAddress(caller) !== this.admin) {
      throw new DistributionError('Unauthorized', `${caller} cannot change daily caps`);
    }
    if (!isCategory(category)) {
      throw new DistributionError('InvalidCategory', `category ${category}`);
    }
    if (cap < 0n) {
      throw new RangeError('Daily cap cannot be negative');
    }

    db.setDailyCap(this.database, category, cap);
    logger.info(`Daily cap for ${CATEGORY_NAMES[category]} set to ${cap}`);
  }

  hasClaimed(day: number, category: number, user: Address, subBatch: number = 0): boolean {
    return db.getClaim(this.database, day, category, subBatch, getAddress(user)) !== undefined;
  }

  // Newest day first
  claimsFor(user: Address): ClaimRecord[] {
    return db.getClaimsByUser(this.database, getAddress(user));
  }

  claimedTotal(day: number, category: number, subBatch: number = 0): bigint {
    return db.getClaimedTotal(this.database, day, category, subBatch);
  }

  events(fromSeq: number = 0): DistributionEvent[] {
    return db.getEvents(this.database, fromSeq);
  }

  /**
   * Register a listener called after each committed event.
   * Returns an unsubscribe function.
   */
  onEvent(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Write a finalized record and its event.
   * Must run inside the caller's transaction; the primary key rejects a second write.
   */
  appendFinalized(record: DistributionRecord): DistributionEvent {
    db.insertDistribution(this.database, record);
    return db.appendEvent(this.database, {
      type: 'DistributionFinalized',
      day: record.day,
      category: record.category,
      subBatch: record.subBatch,
      payload: {
        root: record.root,
        userCount: record.userCount,
        totalReward: record.totalReward.toString(),
        treeDepth: record.treeDepth,
        submitter: record.submitter,
      },
      createdAt: record.createdAt,
    });
  }

  // Deliver committed events; a failing listener does not affect the others
  publish(event: DistributionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`Event listener failed for ${event.type} #${event.seq}: ${String(error)}`);
      }
    }
  }
}
