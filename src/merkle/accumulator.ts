import type { Hex } from 'viem';
import { DistributionError } from '../utils/errors';
import { MAX_TREE_DEPTH } from '../utils/constants';
import { hashPair, verifyProof, zeroHashAt } from './hashing';

/**
 * Append-only Merkle tree of fixed depth.
 *
 * Each insert walks one path to the root, so n inserts cost O(n * depth).
 * `filledSubtrees[level]` holds the last left-hand node written at that level;
 * a right-hand child pairs with it, a left-hand child pairs with the empty
 * subtree of that height until its sibling arrives.
 *
 * Proofs returned by `generateProof` are valid against the current root only.
 * Issue user-facing proofs from a closed batch (see batchBuilder) rather than
 * from a tree that is still growing.
 */
export class MerkleAccumulator {
  readonly depth: number;
  readonly capacity: number;

  private nextIndex = 0;
  private currentRoot: Hex;
  private readonly filledSubtrees: Hex[];
  // levels[0] are leaves, levels[depth] is the root; only written positions are stored
  private readonly levels: Map<number, Hex>[];

  constructor(depth: number) {
    if (!Number.isInteger(depth) || depth < 0 || depth > MAX_TREE_DEPTH) {
      throw new RangeError(`Tree depth must be an integer between 0 and ${MAX_TREE_DEPTH}`);
    }

    this.depth = depth;
    this.capacity = 2 ** depth;
    this.filledSubtrees = Array.from({ length: depth }, (_, level) => zeroHashAt(level));
    this.levels = Array.from({ length: depth + 1 }, () => new Map<number, Hex>());
    this.currentRoot = zeroHashAt(depth);
  }

  get size(): number {
    return this.nextIndex;
  }

  /**
   * Append a leaf and return its zero-based index.
   */
  insert(leaf: Hex): number {
    if (this.nextIndex >= this.capacity) {
      throw new DistributionError('TreeFull', `capacity ${this.capacity} reached`);
    }

    const index = this.nextIndex;
    let position = index;
    let node = leaf;
    this.levels[0].set(position, node);

    for (let level = 0; level < this.depth; level++) {
      if (position % 2 === 0) {
        // Left child: remember it, pair with an empty right sibling for now
        this.filledSubtrees[level] = node;
        node = hashPair(node, zeroHashAt(level));
      } else {
        node = hashPair(this.filledSubtrees[level], node);
      }
      position = Math.floor(position / 2);
      this.levels[level + 1].set(position, node);
    }

    this.currentRoot = node;
    this.nextIndex++;
    return index;
  }

  root(): Hex {
    return this.currentRoot;
  }

  leaf(index: number): Hex | undefined {
    return this.levels[0].get(index);
  }

  /**
   * Sibling hashes from leaf to root for a leaf already inserted.
   */
  generateProof(index: number): Hex[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.nextIndex) {
      throw new RangeError(`Invalid leaf index: ${index}`);
    }

    const proof: Hex[] = [];
    let position = index;

    for (let level = 0; level < this.depth; level++) {
      const siblingPosition = position % 2 === 1 ? position - 1 : position + 1;
      proof.push(this.levels[level].get(siblingPosition) ?? zeroHashAt(level));
      position = Math.floor(position / 2);
    }

    return proof;
  }

  verifyProof(root: Hex, leaf: Hex, index: number, proof: readonly Hex[]): boolean {
    return verifyProof(root, leaf, index, proof);
  }
}
