import { getAddress, type Address, type Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { createDatabase, type DB } from '../db';
import { ClaimProcessor } from '../ledger/claimProcessor';
import { DistributionLedger } from '../ledger/distributionLedger';
import { EscrowVault, type ValueTransfer } from '../ledger/escrowVault';
import { StaticRelayerRegistry } from '../ledger/relayerAuthorization';
import { SubmissionValidator, type SubmissionInput } from '../ledger/submissionValidator';
import { buildBatch } from '../merkle/batchBuilder';
import { signTreeSubmission } from '../signers/signTreeSubmission';
import type { BuiltBatch, Eip712Domain, RewardEntry, RootPolicy } from '../types';
import { SECONDS_PER_DAY } from '../utils/constants';

// Default Anvil keys, test use only
export const RELAYER_KEY: Hex = '0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80';
export const OUTSIDER_KEY: Hex = '0x59c6995e998f97a5a0044966f0945389dc9e86dae88c7a8412f4603b6b78690d';
export const relayer = privateKeyToAccount(RELAYER_KEY);
export const outsider = privateKeyToAccount(OUTSIDER_KEY);

export const ADMIN: Address = '0x00000000000000000000000000000000000000ad';
export const USER_A: Address = '0x000000000000000000000000000000000000000a';
export const USER_B: Address = '0x000000000000000000000000000000000000000b';

export const DOMAIN: Eip712Domain = {
  name: 'RewardTreeProcessor',
  version: '1',
  chainId: 31337,
  verifyingContract: '0x5FbDB2315678afecb367f032d93F642f64180aa3',
};

export const DAY = 100;
// Noon on DAY
export const START_TIME = DAY * SECONDS_PER_DAY + 43200;

export function user(n: number): Address {
  return getAddress(`0x${n.toString(16).padStart(40, '0')}`);
}

export function entriesFor(count: number, amount: bigint, offset: number = 1): RewardEntry[] {
  return Array.from({ length: count }, (_, i) => ({
    user: user(offset + i),
    points: BigInt((offset + i) * 10),
    amount,
  }));
}

export interface TestContext {
  db: DB;
  time: { now: number };
  ledger: DistributionLedger;
  registry: StaticRelayerRegistry;
  escrow: EscrowVault;
  validator: SubmissionValidator;
  claims: ClaimProcessor;
}

export interface TestContextOptions {
  rootPolicy?: RootPolicy;
  maxBatchSize?: number;
  transfer?: ValueTransfer;
  escrowFunding?: bigint;
  treeDepth?: number;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const db = createDatabase(':memory:');
  const time = { now: START_TIME };
  const clock = () => time.now;

  const ledger = new DistributionLedger(db, { admin: ADMIN, clock });
  const registry = new StaticRelayerRegistry(db, ADMIN, clock);
  registry.grant(ADMIN, relayer.address);

  const escrow = new EscrowVault(db, ADMIN, clock);
  escrow.fund(ADMIN, options.escrowFunding ?? 100n * 10n ** 18n);

  const validator = new SubmissionValidator({
    ledger,
    authorization: registry,
    domain: DOMAIN,
    maxBatchSize: options.maxBatchSize ?? 512,
    rootPolicy: options.rootPolicy,
    treeDepth: options.treeDepth,
  });
  const claims = new ClaimProcessor(ledger, options.transfer ?? escrow);

  return { db, time, ledger, registry, escrow, validator, claims };
}

export interface PreparedSubmission {
  batch: BuiltBatch;
  input: SubmissionInput;
  signature: Hex;
}

/**
 * Build and sign a batch; `overrides` are applied before signing.
 */
export async function prepareSubmission(
  entries: RewardEntry[],
  overrides: Partial<SubmissionInput> = {},
  signerKey: Hex = RELAYER_KEY
): Promise<PreparedSubmission> {
  const batch = buildBatch(entries);
  const input: SubmissionInput = {
    day: DAY,
    category: 0,
    subBatch: 0,
    merkleRoot: batch.root,
    users: entries.map((e) => e.user),
    points: entries.map((e) => e.points),
    amounts: entries.map((e) => e.amount),
    nonce: 1n,
    deadline: BigInt(START_TIME + 3600),
    ...overrides,
  };
  const { signature } = await signTreeSubmission(signerKey, DOMAIN, { ...input, subBatch: input.subBatch ?? 0 });
  return { batch, input, signature };
}
