import { config as loadEnv } from 'dotenv';
import { isAddress, isHex, getAddress, parseEther, type Address, type Hex } from 'viem';
import type { Category, RootPolicy } from '../types';
import { ALL_CATEGORIES, CATEGORY_COUNT } from '../types';
import {
  DEFAULT_CHAIN_ID,
  DEFAULT_DAILY_CAPS,
  DEFAULT_DOMAIN_NAME,
  DEFAULT_DOMAIN_VERSION,
  DEFAULT_SUBMISSION_TTL_SECONDS,
  DEFAULT_TREE_DEPTH,
  MAX_TREE_DEPTH,
} from './constants';

export interface DistributorConfig {
  databasePath: string;
  // Fixed depth for every batch tree; compact trees when undefined
  treeDepth: number | undefined;
  maxBatchSize: number;
  rootPolicy: RootPolicy;
  submissionTtlSeconds: number;
  dailyCaps: Record<Category, bigint>;
  domain: {
    name: string;
    version: string;
    chainId: number;
    verifyingContract: Address;
  };
  rpcUrl: string | undefined;
  accessControlAddress: Address | undefined;
  relayerPrivateKey: Hex | undefined;
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, key: string, fallback: number, problems: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    problems.push(`${key} must be a non-negative integer (got "${raw}")`);
    return fallback;
  }
  return value;
}

function parseOptionalAddress(env: Env, key: string, problems: string[]): Address | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  if (!isAddress(raw, { strict: false })) {
    problems.push(`${key} is not a valid address`);
    return undefined;
  }
  return getAddress(raw);
}

function parseDailyCaps(raw: string | undefined, problems: string[]): Record<Category, bigint> {
  if (!raw) return { ...DEFAULT_DAILY_CAPS };

  const parts = raw.split(',').map((part) => part.trim());
  if (parts.length !== CATEGORY_COUNT) {
    problems.push(`DAILY_CAPS must list ${CATEGORY_COUNT} values (got ${parts.length})`);
    return { ...DEFAULT_DAILY_CAPS };
  }

  const caps: Record<Category, bigint> = { ...DEFAULT_DAILY_CAPS };
  for (const category of ALL_CATEGORIES) {
    const part = parts[category];
    if (!/^\d+(\.\d+)?$/.test(part)) {
      problems.push(`DAILY_CAPS entry ${category} is not a decimal amount ("${part}")`);
      continue;
    }
    caps[category] = parseEther(part);
  }
  return caps;
}

/**
 * Build the distributor configuration from environment variables.
 * Throws listing every missing or malformed key.
 */
export function loadConfig(env: Env = process.env): DistributorConfig {
  if (env === process.env) {
    loadEnv();
  }

  const problems: string[] = [];

  const verifyingContract = parseOptionalAddress(env, 'VERIFYING_CONTRACT', problems);
  if (!env.VERIFYING_CONTRACT) {
    problems.push('VERIFYING_CONTRACT is required');
  }

  // Unset: each batch gets the smallest depth that fits it
  let treeDepth: number | undefined;
  if (env.TREE_DEPTH) {
    treeDepth = parseInteger(env, 'TREE_DEPTH', DEFAULT_TREE_DEPTH, problems);
    if (treeDepth < 1 || treeDepth > MAX_TREE_DEPTH) {
      problems.push(`TREE_DEPTH must be between 1 and ${MAX_TREE_DEPTH}`);
    }
  }
  const capacity = 2 ** Math.min(Math.max(treeDepth ?? DEFAULT_TREE_DEPTH, 1), MAX_TREE_DEPTH);

  const maxBatchSize = parseInteger(env, 'MAX_BATCH_SIZE', capacity, problems);
  if (maxBatchSize < 1 || maxBatchSize > capacity) {
    problems.push(`MAX_BATCH_SIZE must be between 1 and the tree capacity (${capacity})`);
  }

  const rootPolicy = env.ROOT_POLICY || 'rederive';
  if (rootPolicy !== 'rederive' && rootPolicy !== 'trust-signed') {
    problems.push(`ROOT_POLICY must be "rederive" or "trust-signed" (got "${rootPolicy}")`);
  }

  const rawKey = env.RELAYER_PRIVATE_KEY;
  let relayerPrivateKey: Hex | undefined;
  if (rawKey) {
    if (isHex(rawKey, { strict: true }) && rawKey.length === 66) {
      relayerPrivateKey = rawKey;
    } else {
      problems.push('RELAYER_PRIVATE_KEY must be a 0x-prefixed 32-byte hex string');
    }
  }

  const config: DistributorConfig = {
    databasePath: env.DATABASE_PATH
      || (env.NODE_ENV === 'test' ? ':memory:' : 'data/distribution.db'),
    treeDepth,
    maxBatchSize,
    rootPolicy: rootPolicy === 'trust-signed' ? 'trust-signed' : 'rederive',
    submissionTtlSeconds: parseInteger(
      env,
      'SUBMISSION_TTL_SECONDS',
      DEFAULT_SUBMISSION_TTL_SECONDS,
      problems
    ),
    dailyCaps: parseDailyCaps(env.DAILY_CAPS, problems),
    domain: {
      name: env.DOMAIN_NAME || DEFAULT_DOMAIN_NAME,
      version: env.DOMAIN_VERSION || DEFAULT_DOMAIN_VERSION,
      chainId: parseInteger(env, 'CHAIN_ID', DEFAULT_CHAIN_ID, problems),
      verifyingContract: verifyingContract ?? '0x0000000000000000000000000000000000000000',
    },
    rpcUrl: env.RPC_URL || undefined,
    accessControlAddress: parseOptionalAddress(env, 'ACCESS_CONTROL_ADDRESS', problems),
    relayerPrivateKey,
  };

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  return config;
}
