import { describe, it, expect } from 'vitest';
import { hashTypedData, type Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import type { Eip712Domain, TreeSubmission } from '../types';
import { TREE_SUBMISSION_TYPES } from '../utils/constants';
import {
  createTreeSubmissionDigest,
  hashUintArray,
  hashUsers,
  recoverSubmissionSigner,
  signTreeSubmission,
} from './signTreeSubmission';

// Default Anvil key
const RELAYER_KEY: Hex = '0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80';
const RELAYER_ADDRESS = '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266';

const domain: Eip712Domain = {
  name: 'RewardTreeProcessor',
  version: '1',
  chainId: 31337,
  verifyingContract: '0x5FbDB2315678afecb367f032d93F642f64180aa3',
};

const submission: TreeSubmission = {
  day: 100,
  category: 0,
  subBatch: 0,
  merkleRoot: '0x1111111111111111111111111111111111111111111111111111111111111111',
  users: ['0x000000000000000000000000000000000000000a', '0x000000000000000000000000000000000000000b'],
  points: [10n, 20n],
  amounts: [100n, 200n],
  nonce: 1n,
  deadline: 1700600500n,
};

describe('signTreeSubmission', () => {
  it('computes the same digest as a typed-data encoder', () => {
    const expected = hashTypedData({
      domain,
      types: TREE_SUBMISSION_TYPES,
      primaryType: 'TreeSubmission',
      message: {
        day: 100n,
        category: 0,
        subBatch: 0,
        merkleRoot: submission.merkleRoot,
        usersHash: hashUsers(submission.users),
        pointsHash: hashUintArray(submission.points),
        amountsHash: hashUintArray(submission.amounts),
        nonce: 1n,
        deadline: 1700600500n,
      },
    });

    expect(createTreeSubmissionDigest(domain, submission)).toBe(expected);
  });

  it('should sign and recover the relayer address', async () => {
    const result = await signTreeSubmission(RELAYER_KEY, domain, submission);

    expect(result.signer).toBe(RELAYER_ADDRESS);
    expect(result.digestHash).toBe(createTreeSubmissionDigest(domain, submission));
    expect(result.signature.startsWith('0x')).toBe(true);
    expect(result.signature).toHaveLength(132);

    await expect(recoverSubmissionSigner(domain, submission, result.signature)).resolves.toBe(RELAYER_ADDRESS);
  });

  it('accepts an account as well as a raw key', async () => {
    const fromKey = await signTreeSubmission(RELAYER_KEY, domain, submission);
    const fromAccount = await signTreeSubmission(privateKeyToAccount(RELAYER_KEY), domain, submission);
    expect(fromAccount.signature).toBe(fromKey.signature);
  });

  it('recovers a different signer when any signed field changes', async () => {
    const { signature } = await signTreeSubmission(RELAYER_KEY, domain, submission);

    const changed: TreeSubmission[] = [
      { ...submission, amounts: [100n, 201n] },
      { ...submission, points: [10n, 21n] },
      { ...submission, subBatch: 1 },
      { ...submission, nonce: 2n },
    ];
    for (const tampered of changed) {
      await expect(recoverSubmissionSigner(domain, tampered, signature)).resolves.not.toBe(RELAYER_ADDRESS);
    }
    await expect(
      recoverSubmissionSigner({ ...domain, chainId: 1 }, submission, signature)
    ).resolves.not.toBe(RELAYER_ADDRESS);
  });

  it('returns null for a malformed signature', async () => {
    await expect(recoverSubmissionSigner(domain, submission, '0x1234')).resolves.toBeNull();
  });

  it('hashes users independent of address case', () => {
    expect(hashUsers(['0x000000000000000000000000000000000000000A'])).toBe(
      hashUsers(['0x000000000000000000000000000000000000000a'])
    );
  });
});
