import { hexToBigInt, keccak256, toBytes, type Hex } from 'viem';
import type { PrivateKeyAccount } from 'viem/accounts';
import type { BuiltBatch, Category, Clock, DistributionRecord, Eip712Domain, RewardEntry } from '../types';
import { ALL_CATEGORIES } from '../types';
import { buildBatch, normalizeEntries, splitIntoSubBatches } from '../merkle/batchBuilder';
import { signTreeSubmission } from '../signers/signTreeSubmission';
import { systemClock } from '../ledger/distributionLedger';
import type { SubmissionInput } from '../ledger/submissionValidator';
import { CATEGORY_NAMES, DEFAULT_SUBMISSION_TTL_SECONDS, SECONDS_PER_DAY } from '../utils/constants';
import { isDistributionError, type DistributionErrorCode } from '../utils/errors';
import { componentLogger } from '../utils/logger';
import type { ProofStore } from './proofStore';

const logger = componentLogger('scheduler');

const DEFAULT_PUBLISH_INTERVAL_MS = 60 * 60 * 1000;

// Anything that admits signed batches; SubmissionValidator in-process
export interface SubmissionTarget {
  submit(input: SubmissionInput, signature: Hex): Promise<DistributionRecord>;
}

// 'discarded': never submitted because an earlier sub-batch lost the race
export type PublishStatus = 'finalized' | 'alreadySubmitted' | 'discarded';

export interface PublishResult {
  day: number;
  category: number;
  subBatch: number;
  status: PublishStatus;
  root: Hex;
  userCount: number;
  totalReward: bigint;
}

export type CategoryOutcome = 'published' | 'noEntries' | 'failed';

export interface CategoryReport {
  category: Category;
  name: string;
  outcome: CategoryOutcome;
  results: PublishResult[];
  error?: string;
  code?: DistributionErrorCode;
}

// Scored entries for a day, keyed by category
export type EntriesByCategory = Partial<Record<Category, readonly RewardEntry[]>>;
export type EntrySource = (day: number) => Promise<EntriesByCategory>;

export interface BatchSchedulerOptions {
  target: SubmissionTarget;
  relayer: PrivateKeyAccount;
  domain: Eip712Domain;
  maxBatchSize: number;
  proofStore: ProofStore;
  // Must match the validator's depth; compact trees when omitted
  treeDepth?: number;
  submissionTtlSeconds?: number;
  clock?: Clock;
  nonceSource?: () => bigint;
  // Feeds tick() and start()
  entrySource?: EntrySource;
}

export function randomNonce(): bigint {
  return hexToBigInt(keccak256(toBytes(Date.now().toString() + Math.random().toString())));
}

/**
 * Builds, signs and submits a day's batches.
 *
 * Publishing is single-flighted per (day, category): a second call made while
 * one is running gets the same promise instead of racing it. A process that
 * still loses the race to another scheduler sees AlreadySubmitted, drops the
 * rest of its batch and does not retry.
 */
export class BatchScheduler {
  private readonly inFlightPublishes = new Map<string, Promise<PublishResult[]>>();
  private readonly ttl: number;
  private readonly clock: Clock;
  private readonly nextNonce: () => bigint;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: BatchSchedulerOptions) {
    this.ttl = options.submissionTtlSeconds ?? DEFAULT_SUBMISSION_TTL_SECONDS;
    this.clock = options.clock ?? systemClock;
    this.nextNonce = options.nonceSource ?? randomNonce;
  }

  inFlight(day: number, category: number): boolean {
    return this.inFlightPublishes.has(`${day}:${category}`);
  }

  publish(day: number, category: number, entries: readonly RewardEntry[]): Promise<PublishResult[]> {
    const key = `${day}:${category}`;
    const existing = this.inFlightPublishes.get(key);
    if (existing) {
      logger.debug(`Publish for ${key} already in flight, joining it`);
      return existing;
    }

    const attempt = this.publishAll(day, category, entries).finally(() => {
      this.inFlightPublishes.delete(key);
    });
    this.inFlightPublishes.set(key, attempt);
    return attempt;
  }

  /**
   * Publish every category of a day. A category that fails is reported and
   * does not stop the others.
   */
  async publishDay(day: number, entriesByCategory: EntriesByCategory): Promise<CategoryReport[]> {
    const reports: CategoryReport[] = [];

    for (const category of ALL_CATEGORIES) {
      const name = CATEGORY_NAMES[category];
      const entries = entriesByCategory[category] ?? [];
      if (entries.length === 0) {
        reports.push({ category, name, outcome: 'noEntries', results: [] });
        continue;
      }

      try {
        const results = await this.publish(day, category, entries);
        reports.push({ category, name, outcome: 'published', results });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Publishing ${name} for day ${day} failed: ${message}`);
        reports.push({
          category,
          name,
          outcome: 'failed',
          results: [],
          error: message,
          code: isDistributionError(error) ? error.code : undefined,
        });
      }
    }

    const published = reports.filter((r) => r.outcome === 'published').length;
    const failed = reports.filter((r) => r.outcome === 'failed').length;
    logger.info(`Day ${day}: ${published} categories published, ${failed} failed`);
    return reports;
  }

  /**
   * Collect today's entries from the entry source and publish them.
   */
  async tick(): Promise<CategoryReport[]> {
    const source = this.options.entrySource;
    if (!source) {
      throw new Error('No entry source configured for scheduled publishing');
    }
    const day = Math.floor(this.clock() / SECONDS_PER_DAY);
    return this.publishDay(day, await source(day));
  }

  start(intervalMs: number = DEFAULT_PUBLISH_INTERVAL_MS): void {
    if (this.timer) return;

    const run = () => {
      this.tick().catch((error: unknown) => {
        logger.error(`Scheduled publish failed: ${String(error)}`);
      });
    };
    this.timer = setInterval(run, intervalMs);
    run();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async publishAll(
    day: number,
    category: number,
    entries: readonly RewardEntry[]
  ): Promise<PublishResult[]> {
    // Checked over the whole list: a user split across sub-batches could claim twice
    const normalized = normalizeEntries(entries);
    const batches = splitIntoSubBatches(normalized, this.options.maxBatchSize)
      .map((batchEntries) => buildBatch(batchEntries, this.options.treeDepth));

    logger.info(
      `Publishing ${entries.length} entries for day ${day} category ${category} ` +
      `in ${batches.length} sub-batch(es)`
    );

    const results: PublishResult[] = [];
    let lostRace = false;
    for (const [subBatch, batch] of batches.entries()) {
      if (lostRace) {
        results.push(this.summarize(day, category, subBatch, batch, 'discarded'));
        continue;
      }
      const result = await this.publishSubBatch(day, category, subBatch, batch);
      lostRace = result.status === 'alreadySubmitted';
      results.push(result);
    }
    return results;
  }

  private async publishSubBatch(
    day: number,
    category: number,
    subBatch: number,
    batch: BuiltBatch
  ): Promise<PublishResult> {
    const submission = {
      day,
      category,
      subBatch,
      merkleRoot: batch.root,
      users: batch.proofs.map((p) => p.user),
      points: batch.proofs.map((p) => p.points),
      amounts: batch.proofs.map((p) => p.amount),
      nonce: this.nextNonce(),
      deadline: BigInt(this.clock() + this.ttl),
    };

    const { signature } = await signTreeSubmission(this.options.relayer, this.options.domain, submission);

    try {
      await this.options.target.submit(submission, signature);
    } catch (error: unknown) {
      if (isDistributionError(error, 'AlreadySubmitted')) {
        logger.warn(
          `Lost race for day ${day} category ${category} subBatch ${subBatch}, ` +
          'discarding this and later sub-batches'
        );
        return this.summarize(day, category, subBatch, batch, 'alreadySubmitted');
      }
      throw error;
    }

    this.options.proofStore.save(day, category, subBatch, batch.proofs);
    return this.summarize(day, category, subBatch, batch, 'finalized');
  }

  private summarize(
    day: number,
    category: number,
    subBatch: number,
    batch: BuiltBatch,
    status: PublishStatus
  ): PublishResult {
    return {
      day,
      category,
      subBatch,
      status,
      root: batch.root,
      userCount: batch.proofs.length,
      totalReward: batch.totalReward,
    };
  }
}
