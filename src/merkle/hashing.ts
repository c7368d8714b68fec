import { concat, encodePacked, getAddress, keccak256, type Address, type Hex } from 'viem';
import { EMPTY_LEAF, MAX_TREE_DEPTH } from '../utils/constants';

/**
 * Leaf hash for one reward entry.
 *
 * leaf = keccak256(abi.encodePacked(user, points, rewardAmount))
 *
 * MUST match the on-chain claim verifier exactly.
 */
export function hashLeaf(user: Address, points: bigint, rewardAmount: bigint): Hex {
  return keccak256(
    encodePacked(
      ['address', 'uint256', 'uint256'],
      [getAddress(user), points, rewardAmount]
    )
  );
}

/**
 * Parent of two nodes. Order is positional, not sorted,
 * so a proof's leaf index decides which side each sibling goes on.
 */
export function hashPair(left: Hex, right: Hex): Hex {
  return keccak256(concat([left, right]));
}

/**
 * zeroHashes[i] is the root of an empty subtree of height i.
 */
function computeZeroHashes(levels: number): Hex[] {
  const zeros: Hex[] = [EMPTY_LEAF];
  for (let i = 1; i <= levels; i++) {
    zeros.push(hashPair(zeros[i - 1], zeros[i - 1]));
  }
  return zeros;
}

export const ZERO_HASHES: readonly Hex[] = computeZeroHashes(MAX_TREE_DEPTH);

export function zeroHashAt(level: number): Hex {
  if (!Number.isInteger(level) || level < 0 || level > MAX_TREE_DEPTH) {
    throw new RangeError(`No empty-subtree hash for level ${level}`);
  }
  return ZERO_HASHES[level];
}

/**
 * Smallest depth whose capacity fits `count` leaves (1 leaf -> depth 0).
 */
export function depthForCount(count: number): number {
  let depth = 0;
  while (2 ** depth < count) depth++;
  return depth;
}

/**
 * Recompute a root from a leaf, its index and the leaf-to-root sibling list.
 * Bit i of `index` says whether the running node is a right child at level i.
 */
export function computeRootFromProof(leaf: Hex, index: number, proof: readonly Hex[]): Hex {
  let current = leaf;
  let position = index;

  for (const sibling of proof) {
    current = position % 2 === 1
      ? hashPair(sibling, current)
      : hashPair(current, sibling);
    position = Math.floor(position / 2);
  }

  return current;
}

/**
 * Verify a proof against a root.
 * Rejects indexes that do not fit in a tree of `proof.length` levels.
 */
export function verifyProof(root: Hex, leaf: Hex, index: number, proof: readonly Hex[]): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= 2 ** proof.length) {
    return false;
  }
  return computeRootFromProof(leaf, index, proof).toLowerCase() === root.toLowerCase();
}
