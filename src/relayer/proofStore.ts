import { getAddress, type Address } from 'viem';
import * as db from '../db';
import type { DB } from '../db';
import type { ClaimRequest, UserProof } from '../types';

export type StoredProof = UserProof & { subBatch: number };

/**
 * Off-chain home of every user's leaf index and proof, written once a
 * sub-batch is finalized. The ledger keeps roots only.
 */
export class ProofStore {
  constructor(private readonly database: DB) {}

  save(day: number, category: number, subBatch: number, proofs: readonly UserProof[]): void {
    db.insertBatchProofs(this.database, day, category, subBatch, proofs);
  }

  getProof(day: number, category: number, user: Address): StoredProof | undefined {
    return db.getBatchProof(this.database, day, category, getAddress(user));
  }

  // Everything the user passes to ClaimProcessor.claim
  claimRequestFor(day: number, category: number, user: Address): ClaimRequest | undefined {
    const stored = this.getProof(day, category, user);
    if (!stored) return undefined;

    return {
      day,
      category,
      subBatch: stored.subBatch,
      points: stored.points,
      rewardAmount: stored.amount,
      index: stored.index,
      proof: stored.proof,
    };
  }
}
