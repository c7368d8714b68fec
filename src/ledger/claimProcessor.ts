import { getAddress, isAddress, isHex, size, type Address } from 'viem';
import * as db from '../db';
import type { ClaimRecord, ClaimRequest } from '../types';
import { hashLeaf, verifyProof } from '../merkle/hashing';
import { DistributionError, isDistributionError } from '../utils/errors';
import { componentLogger } from '../utils/logger';
import type { DistributionLedger } from './distributionLedger';
import type { ValueTransfer } from './escrowVault';

const logger = componentLogger('claims');

/**
 * Redeems a user's leaf against a finalized distribution, at most once per slot.
 */
export class ClaimProcessor {
  constructor(
    private readonly ledger: DistributionLedger,
    private readonly transfer: ValueTransfer
  ) {}

  /**
   * Verify the caller's proof and release the reward encoded in their leaf.
   *
   * The claim row is written before the transfer runs, and both share one
   * transaction: a transfer that throws undoes the claim, and a transfer that
   * calls back into claim() sees the slot as already claimed.
   */
  claim(request: ClaimRequest, caller: Address): ClaimRecord {
    const subBatch = request.subBatch ?? 0;
    const slot = `day=${request.day} category=${request.category} subBatch=${subBatch}`;

    try {
      if (!isAddress(caller, { strict: false })) {
        throw new DistributionError('Unauthorized', `caller ${caller} is not an address`);
      }
      const user = getAddress(caller);

      const { claim, event } = this.ledger.db.transaction(() => {
        const record = this.ledger.get(request.day, request.category, subBatch);
        if (!record || !record.finalized) {
          throw new DistributionError('NoDistribution', slot);
        }

        if (db.getClaim(this.ledger.db, record.day, record.category, subBatch, user)) {
          throw new DistributionError('AlreadyClaimed', `${user} already claimed ${slot}`);
        }

        const { index, proof, points, rewardAmount } = request;
        if (
          proof.length !== record.treeDepth ||
          !Number.isInteger(index) || index < 0 || index >= record.userCount ||
          points < 0n || rewardAmount < 0n ||
          !proof.every((node) => isHex(node) && size(node) === 32)
        ) {
          throw new DistributionError('ProofInvalid', `malformed proof for ${user} in ${slot}`);
        }

        const leaf = hashLeaf(user, points, rewardAmount);
        if (!verifyProof(record.root, leaf, index, proof)) {
          throw new DistributionError('ProofInvalid', `proof does not match root for ${user} in ${slot}`);
        }

        const claim: ClaimRecord = {
          day: record.day,
          category: record.category,
          subBatch,
          user,
          amount: rewardAmount,
          claimedAt: this.ledger.now(),
        };
        db.insertClaim(this.ledger.db, claim);
        const event = db.appendEvent(this.ledger.db, {
          type: 'RewardClaimed',
          day: claim.day,
          category: claim.category,
          subBatch,
          payload: { user, amount: rewardAmount.toString(), index },
          createdAt: claim.claimedAt,
        });

        this.transfer.transfer(user, rewardAmount);

        return { claim, event };
      })();

      logger.info(`Claimed ${claim.amount} for ${user} in ${slot}`);
      this.ledger.publish(event);
      return claim;
    } catch (error: unknown) {
      if (isDistributionError(error)) {
        logger.warn(`Rejected claim by ${caller} in ${slot}: ${error.message}`);
      } else {
        logger.error(`Claim by ${caller} in ${slot} failed: ${String(error)}`);
      }
      throw error;
    }
  }
}
