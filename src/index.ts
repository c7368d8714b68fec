import { getAddress, type Address } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { createDatabase, type DB } from './db';
import { ClaimProcessor } from './ledger/claimProcessor';
import { DistributionLedger } from './ledger/distributionLedger';
import { EscrowVault, type ValueTransfer } from './ledger/escrowVault';
import {
  OnChainRelayerRegistry,
  StaticRelayerRegistry,
  type RelayerAuthorization,
} from './ledger/relayerAuthorization';
import { SubmissionValidator } from './ledger/submissionValidator';
import { BatchScheduler, type EntrySource } from './relayer/batchScheduler';
import { ProofStore } from './relayer/proofStore';
import type { Clock } from './types';
import { createHttpAccessControlReader } from './utils/clients';
import type { DistributorConfig } from './utils/config';
import logger from './utils/logger';

export * from './types';
export * from './merkle/hashing';
export { MerkleAccumulator } from './merkle/accumulator';
export {
  StaticMerkleTree,
  buildBatch,
  computeBatchRoot,
  normalizeEntries,
  splitIntoSubBatches,
} from './merkle/batchBuilder';
export * from './signers/signTreeSubmission';
export { DistributionLedger, systemClock, type EventListener } from './ledger/distributionLedger';
export {
  OnChainRelayerRegistry,
  StaticRelayerRegistry,
  type RelayerAuthorization,
} from './ledger/relayerAuthorization';
export { EscrowVault, type ValueTransfer } from './ledger/escrowVault';
export { SubmissionValidator, type SubmissionInput } from './ledger/submissionValidator';
export { ClaimProcessor } from './ledger/claimProcessor';
export { ProofStore, type StoredProof } from './relayer/proofStore';
export {
  BatchScheduler,
  randomNonce,
  type CategoryOutcome,
  type CategoryReport,
  type EntriesByCategory,
  type EntrySource,
  type PublishResult,
  type PublishStatus,
  type SubmissionTarget,
} from './relayer/batchScheduler';
export { DistributionError, isDistributionError, type DistributionErrorCode } from './utils/errors';
export { loadConfig, type DistributorConfig } from './utils/config';
export { createAccessControlReader, createHttpAccessControlReader } from './utils/clients';

export interface DistributorOptions {
  admin: Address;
  clock?: Clock;
  // Overrides the role source picked from config
  authorization?: RelayerAuthorization;
  // Overrides the escrow as the value mover
  transfer?: ValueTransfer;
  // Feeds the scheduler's periodic run
  entrySource?: EntrySource;
}

export interface Distributor {
  db: DB;
  ledger: DistributionLedger;
  authorization: RelayerAuthorization;
  escrow: EscrowVault;
  validator: SubmissionValidator;
  claims: ClaimProcessor;
  proofStore: ProofStore;
  // Present when a relayer key is configured
  scheduler: BatchScheduler | undefined;
  relayer: PrivateKeyAccount | undefined;
}

/**
 * Wire the ledger, admission, claims and relayer pipeline over one database.
 */
export function createDistributor(config: DistributorConfig, options: DistributorOptions): Distributor {
  const db = createDatabase(config.databasePath);
  const admin = getAddress(options.admin);

  const ledger = new DistributionLedger(db, {
    admin,
    dailyCaps: config.dailyCaps,
    clock: options.clock,
  });

  let authorization: RelayerAuthorization;
  if (options.authorization) {
    authorization = options.authorization;
  } else if (config.rpcUrl && config.accessControlAddress) {
    authorization = new OnChainRelayerRegistry(
      createHttpAccessControlReader(config.rpcUrl, config.accessControlAddress)
    );
    logger.info(`Relayer roles read from ${config.accessControlAddress}`);
  } else {
    authorization = new StaticRelayerRegistry(db, admin, options.clock);
  }

  const escrow = new EscrowVault(db, admin, options.clock);
  const validator = new SubmissionValidator({
    ledger,
    authorization,
    domain: config.domain,
    maxBatchSize: config.maxBatchSize,
    rootPolicy: config.rootPolicy,
    treeDepth: config.treeDepth,
  });
  const claims = new ClaimProcessor(ledger, options.transfer ?? escrow);
  const proofStore = new ProofStore(db);

  const relayer = config.relayerPrivateKey ? privateKeyToAccount(config.relayerPrivateKey) : undefined;
  const scheduler = relayer
    ? new BatchScheduler({
        target: validator,
        relayer,
        domain: config.domain,
        maxBatchSize: config.maxBatchSize,
        proofStore,
        treeDepth: config.treeDepth,
        submissionTtlSeconds: config.submissionTtlSeconds,
        clock: options.clock,
        entrySource: options.entrySource,
      })
    : undefined;

  logger.info(
    `Distributor ready: db=${config.databasePath} maxBatchSize=${config.maxBatchSize} ` +
    `rootPolicy=${config.rootPolicy} treeDepth=${config.treeDepth ?? 'compact'}`
  );

  return { db, ledger, authorization, escrow, validator, claims, proofStore, scheduler, relayer };
}
