import { describe, it, expect } from 'vitest';
import { getAddress, parseEther } from 'viem';
import type { RewardEntry } from '../types';
import { DistributionError } from '../utils/errors';
import { buildBatch, computeBatchRoot, normalizeEntries, splitIntoSubBatches, StaticMerkleTree } from './batchBuilder';
import { hashLeaf, hashPair, verifyProof, zeroHashAt } from './hashing';

function entry(n: number, amount: bigint = parseEther('0.01')): RewardEntry {
  return {
    user: `0x${n.toString(16).padStart(40, '0')}`,
    points: BigInt(n * 10),
    amount,
  };
}

describe('buildBatch', () => {
  it('yields the same root for the same ordered input', () => {
    const entries = [entry(1), entry(2), entry(3), entry(4), entry(5)];
    expect(buildBatch(entries).root).toBe(buildBatch([...entries]).root);
    expect(computeBatchRoot(entries)).toBe(buildBatch(entries).root);
  });

  it('depends on input order', () => {
    expect(buildBatch([entry(1), entry(2)]).root).not.toBe(buildBatch([entry(2), entry(1)]).root);
  });

  it('uses the leaf itself as the root of a one-user batch', () => {
    const batch = buildBatch([{ user: '0x000000000000000000000000000000000000000a', points: 7n, amount: 500000000000000000n }]);
    const leaf = hashLeaf('0x000000000000000000000000000000000000000a', 7n, 500000000000000000n);

    expect(batch.root).toBe(leaf);
    expect(batch.depth).toBe(0);
    expect(batch.proofs[0].proof).toEqual([]);
    expect(batch.proofs[0].index).toBe(0);
  });

  it('pads odd layers with empty subtrees', () => {
    const entries = [entry(1), entry(2), entry(3)];
    const [a, b, c] = entries.map((e) => hashLeaf(e.user, e.points, e.amount));
    const batch = buildBatch(entries);

    expect(batch.depth).toBe(2);
    expect(batch.root).toBe(hashPair(hashPair(a, b), hashPair(c, zeroHashAt(0))));
    expect(batch.proofs[2].proof).toEqual([zeroHashAt(0), hashPair(a, b)]);
  });

  it('returns a verifying proof for every user', () => {
    const entries = Array.from({ length: 37 }, (_, i) => entry(i + 1));
    const batch = buildBatch(entries);

    expect(batch.depth).toBe(6);
    for (const item of batch.proofs) {
      expect(verifyProof(batch.root, item.leaf, item.index, item.proof)).toBe(true);
    }
  });

  it('sums rewards and checksums users', () => {
    const batch = buildBatch([entry(10, 3n), entry(11, 4n)]);
    expect(batch.totalReward).toBe(7n);
    expect(batch.proofs[0].user).toBe(getAddress('0x000000000000000000000000000000000000000a'));
  });

  it('builds at an explicit depth', () => {
    const entries = [entry(1), entry(2)];
    const batch = buildBatch(entries, 4);
    expect(batch.depth).toBe(4);
    expect(batch.proofs[1].proof).toHaveLength(4);
    expect(batch.root).not.toBe(buildBatch(entries).root);
  });

  it('rejects duplicate users regardless of case', () => {
    const upper = { ...entry(10), user: getAddress('0x000000000000000000000000000000000000000a') };
    expect(() => buildBatch([entry(10), upper])).toThrow(DistributionError);
    expect(() => buildBatch([entry(10), upper])).toThrow(/DuplicateUser/);
  });

  it('rejects empty batches and negative values', () => {
    expect(() => buildBatch([])).toThrow(/EmptyBatch/);
    expect(() => buildBatch([entry(1, -1n)])).toThrow(RangeError);
  });

  it('rejects more leaves than the depth holds', () => {
    const entries = [entry(1), entry(2), entry(3)];
    expect(() => buildBatch(entries, 1)).toThrow(/TreeFull/);
  });
});

describe('computeBatchRoot', () => {
  it('refuses what buildBatch refuses', () => {
    const upper = { ...entry(10), user: getAddress('0x000000000000000000000000000000000000000a') };
    expect(() => computeBatchRoot([entry(10), upper])).toThrow(/DuplicateUser/);
    expect(() => computeBatchRoot([entry(1), entry(2, -1n)])).toThrow(RangeError);
    expect(() => computeBatchRoot([])).toThrow(/EmptyBatch/);
  });

  it('matches buildBatch at a fixed depth', () => {
    const entries = [entry(1), entry(2), entry(3)];
    expect(computeBatchRoot(entries, 5)).toBe(buildBatch(entries, 5).root);
  });
});

describe('normalizeEntries', () => {
  it('checksums users and keeps order', () => {
    const normalized = normalizeEntries([entry(11), entry(2)]);
    expect(normalized.map((e) => e.user)).toEqual([
      getAddress('0x000000000000000000000000000000000000000b'),
      getAddress('0x0000000000000000000000000000000000000002'),
    ]);
    expect(normalized[0].points).toBe(110n);
  });

  it('accepts an empty list', () => {
    expect(normalizeEntries([])).toEqual([]);
  });

  it('rejects negative points', () => {
    expect(() => normalizeEntries([{ ...entry(1), points: -5n }])).toThrow(RangeError);
  });
});

describe('StaticMerkleTree', () => {
  it('rejects out-of-range proof indexes', () => {
    const tree = new StaticMerkleTree([hashLeaf('0x000000000000000000000000000000000000000a', 1n, 1n)]);
    expect(() => tree.getProof(1)).toThrow(RangeError);
  });
});

describe('splitIntoSubBatches', () => {
  it('splits in order with a short tail', () => {
    expect(splitIntoSubBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('keeps a batch that fits whole', () => {
    expect(splitIntoSubBatches([1, 2, 3], 3)).toEqual([[1, 2, 3]]);
    expect(splitIntoSubBatches([], 3)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => splitIntoSubBatches([1], 0)).toThrow(RangeError);
  });
});
