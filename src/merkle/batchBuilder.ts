import { getAddress, type Hex } from 'viem';
import type { BuiltBatch, RewardEntry, UserProof } from '../types';
import { DistributionError } from '../utils/errors';
import { MAX_TREE_DEPTH } from '../utils/constants';
import { depthForCount, hashLeaf, hashPair, zeroHashAt } from './hashing';

/**
 * Static tree over an ordered list of leaves.
 * Short layers are padded with the empty-subtree hash of their height,
 * which gives the same root as an accumulator of the same depth fed the same leaves.
 */
export class StaticMerkleTree {
  readonly depth: number;
  private readonly layers: Hex[][];

  constructor(leaves: readonly Hex[], depth: number = depthForCount(leaves.length)) {
    if (leaves.length === 0) {
      throw new DistributionError('EmptyBatch', 'cannot build a tree with no leaves');
    }
    if (!Number.isInteger(depth) || depth < 0 || depth > MAX_TREE_DEPTH) {
      throw new RangeError(`Tree depth must be an integer between 0 and ${MAX_TREE_DEPTH}`);
    }
    if (leaves.length > 2 ** depth) {
      throw new DistributionError('TreeFull', `${leaves.length} leaves do not fit depth ${depth}`);
    }

    this.depth = depth;
    this.layers = this.buildLayers([...leaves]);
  }

  /**
   * Build all layers of the tree from leaves to root
   */
  private buildLayers(leaves: Hex[]): Hex[][] {
    const layers: Hex[][] = [leaves];

    for (let level = 0; level < this.depth; level++) {
      const currentLayer = layers[level];
      const nextLayer: Hex[] = [];

      for (let i = 0; i < currentLayer.length; i += 2) {
        const right = i + 1 < currentLayer.length ? currentLayer[i + 1] : zeroHashAt(level);
        nextLayer.push(hashPair(currentLayer[i], right));
      }

      layers.push(nextLayer);
    }

    return layers;
  }

  getRoot(): Hex {
    return this.layers[this.depth][0];
  }

  get leafCount(): number {
    return this.layers[0].length;
  }

  /**
   * Generate proof for a leaf at given index, ordered leaf to root
   */
  getProof(index: number): Hex[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.leafCount) {
      throw new RangeError(`Invalid leaf index: ${index}`);
    }

    const proof: Hex[] = [];
    let position = index;

    for (let level = 0; level < this.depth; level++) {
      const layer = this.layers[level];
      const siblingIndex = position % 2 === 1 ? position - 1 : position + 1;
      proof.push(siblingIndex < layer.length ? layer[siblingIndex] : zeroHashAt(level));
      position = Math.floor(position / 2);
    }

    return proof;
  }
}

/**
 * Checksum every user and reject repeated users or negative values.
 */
export function normalizeEntries(entries: readonly RewardEntry[]): RewardEntry[] {
  const seen = new Set<string>();
  return entries.map((entry) => {
    const user = getAddress(entry.user);
    if (seen.has(user)) {
      throw new DistributionError('DuplicateUser', `${user} appears more than once`);
    }
    seen.add(user);
    if (entry.points < 0n || entry.amount < 0n) {
      throw new RangeError(`Negative points or amount for ${user}`);
    }
    return { user, points: entry.points, amount: entry.amount };
  });
}

function leavesFor(entries: readonly RewardEntry[]): { normalized: RewardEntry[]; leaves: Hex[] } {
  if (entries.length === 0) {
    throw new DistributionError('EmptyBatch', 'no reward entries provided');
  }
  const normalized = normalizeEntries(entries);
  const leaves = normalized.map((entry) => hashLeaf(entry.user, entry.points, entry.amount));
  return { normalized, leaves };
}

/**
 * Build the tree and every user's proof for one (day, category, subBatch) slot.
 *
 * Deterministic: the same ordered entries always give the same root, which
 * lets the submission validator re-derive a relayer's root independently.
 * Entries are not reordered; callers own the ordering.
 *
 * @param depth - fixed tree depth; the smallest depth that fits when omitted
 */
export function buildBatch(entries: readonly RewardEntry[], depth?: number): BuiltBatch {
  const { normalized, leaves } = leavesFor(entries);
  const tree = new StaticMerkleTree(leaves, depth);

  const proofs: UserProof[] = normalized.map((entry, index) => ({
    user: entry.user,
    points: entry.points,
    amount: entry.amount,
    index,
    leaf: leaves[index],
    proof: tree.getProof(index),
  }));

  return {
    root: tree.getRoot(),
    depth: tree.depth,
    totalReward: normalized.reduce((sum, entry) => sum + entry.amount, 0n),
    leaves,
    proofs,
  };
}

/**
 * Root only; same result and same checks as buildBatch(...).root without materialising proofs.
 */
export function computeBatchRoot(entries: readonly RewardEntry[], depth?: number): Hex {
  return new StaticMerkleTree(leavesFor(entries).leaves, depth).getRoot();
}

/**
 * Split a day's entries for one category into consecutive sub-batches
 * of at most `maxBatchSize` entries. Order is preserved.
 */
export function splitIntoSubBatches<T>(entries: readonly T[], maxBatchSize: number): T[][] {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
    throw new RangeError(`maxBatchSize must be a positive integer (got ${maxBatchSize})`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < entries.length; i += maxBatchSize) {
    batches.push(entries.slice(i, i + maxBatchSize));
  }
  return batches;
}
