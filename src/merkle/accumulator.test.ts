import { describe, it, expect } from 'vitest';
import { getAddress, type Hex } from 'viem';
import { MerkleAccumulator } from './accumulator';
import { StaticMerkleTree } from './batchBuilder';
import { hashLeaf, hashPair, zeroHashAt } from './hashing';
import { isDistributionError } from '../utils/errors';

function makeLeaves(count: number): Hex[] {
  return Array.from({ length: count }, (_, i) =>
    hashLeaf(getAddress(`0x${(i + 1).toString(16).padStart(40, '0')}`), BigInt(i), BigInt(i * 1000))
  );
}

describe('MerkleAccumulator', () => {
  it('starts at the empty-tree root', () => {
    const tree = new MerkleAccumulator(4);
    expect(tree.root()).toBe(zeroHashAt(4));
    expect(tree.size).toBe(0);
    expect(tree.capacity).toBe(16);
  });

  it('returns sequential indexes', () => {
    const tree = new MerkleAccumulator(3);
    const leaves = makeLeaves(3);
    expect(leaves.map((leaf) => tree.insert(leaf))).toEqual([0, 1, 2]);
    expect(tree.leaf(1)).toBe(leaves[1]);
    expect(tree.leaf(3)).toBeUndefined();
  });

  it('computes a two-leaf root by hand', () => {
    const [a, b] = makeLeaves(2);
    const tree = new MerkleAccumulator(2);
    tree.insert(a);
    expect(tree.root()).toBe(hashPair(hashPair(a, zeroHashAt(0)), zeroHashAt(1)));
    tree.insert(b);
    expect(tree.root()).toBe(hashPair(hashPair(a, b), zeroHashAt(1)));
  });

  it.each([1, 2, 3, 5, 8, 13, 16])('matches the static tree root after %i inserts', (count) => {
    const depth = 4;
    const leaves = makeLeaves(count);
    const tree = new MerkleAccumulator(depth);
    const roots: Hex[] = [];

    for (const leaf of leaves) {
      tree.insert(leaf);
      roots.push(tree.root());
    }

    expect(tree.root()).toBe(new StaticMerkleTree(leaves, depth).getRoot());
    // every intermediate root matches too
    roots.forEach((root, i) => {
      expect(root).toBe(new StaticMerkleTree(leaves.slice(0, i + 1), depth).getRoot());
    });
  });

  it('produces a verifying proof for every inserted leaf', () => {
    const leaves = makeLeaves(11);
    const tree = new MerkleAccumulator(4);
    leaves.forEach((leaf) => tree.insert(leaf));

    leaves.forEach((leaf, i) => {
      const proof = tree.generateProof(i);
      expect(proof).toHaveLength(4);
      expect(tree.verifyProof(tree.root(), leaf, i, proof)).toBe(true);
      expect(proof).toEqual(new StaticMerkleTree(leaves, 4).getProof(i));
    });
  });

  it('rejects a leaf at the wrong index', () => {
    const leaves = makeLeaves(6);
    const tree = new MerkleAccumulator(3);
    leaves.forEach((leaf) => tree.insert(leaf));

    const proof = tree.generateProof(2);
    expect(tree.verifyProof(tree.root(), leaves[2], 3, proof)).toBe(false);
    expect(tree.verifyProof(tree.root(), leaves[3], 2, proof)).toBe(false);
  });

  it('rejects truncated and corrupted proofs', () => {
    const leaves = makeLeaves(6);
    const tree = new MerkleAccumulator(3);
    leaves.forEach((leaf) => tree.insert(leaf));

    const proof = tree.generateProof(4);
    expect(tree.verifyProof(tree.root(), leaves[4], 4, proof.slice(0, 2))).toBe(false);

    const corrupted = [...proof];
    corrupted[1] = leaves[0];
    expect(tree.verifyProof(tree.root(), leaves[4], 4, corrupted)).toBe(false);
  });

  it('refuses proofs for positions not yet written', () => {
    const tree = new MerkleAccumulator(3);
    tree.insert(makeLeaves(1)[0]);
    expect(() => tree.generateProof(1)).toThrow(RangeError);
  });

  it('throws TreeFull once capacity is reached', () => {
    const tree = new MerkleAccumulator(2);
    makeLeaves(4).forEach((leaf) => tree.insert(leaf));
    const rootBefore = tree.root();

    let caught: unknown;
    try {
      tree.insert(makeLeaves(5)[4]);
    } catch (error) {
      caught = error;
    }

    expect(isDistributionError(caught, 'TreeFull')).toBe(true);
    expect(tree.size).toBe(4);
    expect(tree.root()).toBe(rootBefore);
  });

  it('rejects invalid depths', () => {
    expect(() => new MerkleAccumulator(-1)).toThrow(RangeError);
    expect(() => new MerkleAccumulator(33)).toThrow(RangeError);
  });
});
