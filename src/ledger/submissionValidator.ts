import { getAddress, type Address, type Hex } from 'viem';
import * as db from '../db';
import type { DistributionRecord, Eip712Domain, RewardEntry, RootPolicy, TreeSubmission } from '../types';
import { isCategory } from '../types';
import { computeBatchRoot } from '../merkle/batchBuilder';
import { depthForCount } from '../merkle/hashing';
import { recoverSubmissionSigner } from '../signers/signTreeSubmission';
import { MAX_TREE_DEPTH } from '../utils/constants';
import { DistributionError, isDistributionError } from '../utils/errors';
import { componentLogger } from '../utils/logger';
import type { DistributionLedger } from './distributionLedger';
import type { RelayerAuthorization } from './relayerAuthorization';

const logger = componentLogger('submissions');

// subBatch may be left out for single-batch slots
export type SubmissionInput = Omit<TreeSubmission, 'subBatch'> & { subBatch?: number };

export interface SubmissionValidatorOptions {
  ledger: DistributionLedger;
  authorization: RelayerAuthorization;
  domain: Eip712Domain;
  maxBatchSize: number;
  // 'rederive' rebuilds the root from the arrays; 'trust-signed' accepts the signed root
  rootPolicy?: RootPolicy;
  /**
   * Depth every batch tree is built at. Relayers must build at the same depth:
   * claims are checked against it, and under 'trust-signed' nothing else catches
   * a root built at another depth. Omit for the smallest depth that fits each batch.
   */
  treeDepth?: number;
}

/**
 * Admits at most one finalized batch per (day, category, subBatch) slot.
 */
export class SubmissionValidator {
  private readonly ledger: DistributionLedger;
  private readonly authorization: RelayerAuthorization;
  private readonly domain: Eip712Domain;
  readonly maxBatchSize: number;
  readonly rootPolicy: RootPolicy;
  readonly treeDepth: number | undefined;

  constructor(options: SubmissionValidatorOptions) {
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer (got ${options.maxBatchSize})`);
    }
    this.ledger = options.ledger;
    this.authorization = options.authorization;
    this.domain = options.domain;
    this.maxBatchSize = options.maxBatchSize;
    this.rootPolicy = options.rootPolicy ?? 'rederive';
    this.treeDepth = options.treeDepth;
    if (this.treeDepth !== undefined) {
      if (!Number.isInteger(this.treeDepth) || this.treeDepth < 0 || this.treeDepth > MAX_TREE_DEPTH) {
        throw new RangeError(`treeDepth must be an integer between 0 and ${MAX_TREE_DEPTH}`);
      }
      if (this.maxBatchSize > 2 ** this.treeDepth) {
        throw new RangeError(`maxBatchSize ${this.maxBatchSize} exceeds the capacity of depth ${this.treeDepth}`);
      }
    }
  }

  /**
   * Validate a signed batch and finalize its distribution record.
   *
   * Checks run in a fixed order and the first failure wins:
   * category, slot, batch shape, cap, deadline, signer, nonce, root.
   * Nothing is written unless every check passes.
   *
   * @param input - the fields the relayer signed
   * @param signature - relayer signature over the typed-data digest
   * @returns the finalized record
   */
  async submit(input: SubmissionInput, signature: Hex): Promise<DistributionRecord> {
    const submission: TreeSubmission = { ...input, subBatch: input.subBatch ?? 0 };
    const slot = `day=${submission.day} category=${submission.category} subBatch=${submission.subBatch}`;

    try {
      // Signature recovery and the role lookup are the only async steps;
      // their results are applied in order inside the transaction below.
      const signer = await recoverSubmissionSigner(this.domain, submission, signature);
      const isRelayer = signer !== null && (await this.authorization.hasRelayerRole(signer));

      const { record, event } = this.ledger.db.transaction(() => {
        const record = this.admit(submission, signer, isRelayer);
        const event = this.ledger.appendFinalized(record);
        return { record, event };
      })();

      logger.info(
        `Finalized distribution ${slot} root=${record.root} users=${record.userCount} ` +
        `total=${record.totalReward} submitter=${record.submitter}`
      );
      this.ledger.publish(event);
      return record;
    } catch (error: unknown) {
      if (isDistributionError(error)) {
        logger.warn(`Rejected submission ${slot}: ${error.message}`);
      } else {
        logger.error(`Submission ${slot} failed: ${String(error)}`);
      }
      throw error;
    }
  }

  // Runs inside the submit transaction; writes only the nonce
  private admit(submission: TreeSubmission, signer: Address | null, isRelayer: boolean): DistributionRecord {
    const { day, subBatch, users, points, amounts, nonce, merkleRoot } = submission;
    const category = submission.category;

    if (!isCategory(category)) {
      throw new DistributionError('InvalidCategory', `category ${category} is out of range`);
    }

    if (this.ledger.get(day, category, subBatch) !== undefined) {
      throw new DistributionError('AlreadySubmitted', `day ${day} category ${category} subBatch ${subBatch}`);
    }

    if (users.length !== amounts.length || users.length !== points.length) {
      throw new DistributionError(
        'LengthMismatch',
        `${users.length} users, ${points.length} points, ${amounts.length} amounts`
      );
    }
    if (users.length === 0) {
      throw new DistributionError('EmptyBatch', 'submission has no users');
    }
    if (users.length > this.maxBatchSize) {
      throw new DistributionError('BatchTooLarge', `${users.length} users exceeds ${this.maxBatchSize}`);
    }
    const seen = new Set<string>();
    for (const user of users) {
      const key = user.toLowerCase();
      if (seen.has(key)) {
        throw new DistributionError('DuplicateUser', `${user} appears more than once`);
      }
      seen.add(key);
    }

    const totalReward = amounts.reduce((sum, amount) => sum + amount, 0n);
    const alreadyFinalized = this.ledger.totalForCategory(day, category);
    const cap = this.ledger.dailyCap(category);
    if (alreadyFinalized + totalReward > cap) {
      throw new DistributionError(
        'CapExceeded',
        `${alreadyFinalized} finalized + ${totalReward} submitted exceeds cap ${cap}`
      );
    }

    const now = this.ledger.now();
    if (BigInt(now) > submission.deadline) {
      throw new DistributionError('DeadlineExpired', `deadline ${submission.deadline} passed at ${now}`);
    }

    if (signer === null || !isRelayer) {
      throw new DistributionError(
        'InvalidSignature',
        signer === null ? 'signer could not be recovered' : `${signer} does not hold the relayer role`
      );
    }
    if (db.isNonceConsumed(this.ledger.db, nonce)) {
      throw new DistributionError('NonceReplay', `nonce ${nonce} already used`);
    }

    if (this.rootPolicy === 'rederive') {
      const entries: RewardEntry[] = users.map((user, i) => ({ user, points: points[i], amount: amounts[i] }));
      const derived = computeBatchRoot(entries, this.treeDepth);
      if (derived.toLowerCase() !== merkleRoot.toLowerCase()) {
        throw new DistributionError('RootMismatch', `signed ${merkleRoot}, derived ${derived}`);
      }
    }

    db.consumeNonce(this.ledger.db, nonce, signer, now);

    return {
      day,
      category,
      subBatch,
      root: merkleRoot,
      userCount: users.length,
      totalReward,
      treeDepth: this.treeDepth ?? depthForCount(users.length),
      finalized: true,
      submitter: getAddress(signer),
      createdAt: now,
    };
  }
}
