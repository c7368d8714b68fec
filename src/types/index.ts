import type { Address, Hex } from 'viem';

// Interaction categories, one distribution tree per category per day
export enum Category {
  CREATE = 0,
  LIKES = 1,
  COMMENTS = 2,
  TIPPING = 3,
  CRYPTO = 4,
  REFERRALS = 5,
}

export const ALL_CATEGORIES: readonly Category[] = [
  Category.CREATE,
  Category.LIKES,
  Category.COMMENTS,
  Category.TIPPING,
  Category.CRYPTO,
  Category.REFERRALS,
];

export const CATEGORY_COUNT = ALL_CATEGORIES.length;

export function isCategory(value: number): value is Category {
  return Number.isInteger(value) && value >= 0 && value < CATEGORY_COUNT;
}

export type RootPolicy = 'rederive' | 'trust-signed';

// One user's entry in a batch, as produced by the interaction scorer
export interface RewardEntry {
  user: Address;
  points: bigint;
  amount: bigint;
}

export interface UserProof {
  user: Address;
  points: bigint;
  amount: bigint;
  index: number;
  leaf: Hex;
  proof: Hex[];
}

export interface BuiltBatch {
  root: Hex;
  depth: number;
  totalReward: bigint;
  leaves: Hex[];
  proofs: UserProof[];
}

// Fields covered by the relayer's typed-data signature
export interface TreeSubmission {
  day: number;
  category: number;
  subBatch: number;
  merkleRoot: Hex;
  users: Address[];
  points: bigint[];
  amounts: bigint[];
  nonce: bigint;
  deadline: bigint;
}

export interface DistributionRecord {
  day: number;
  category: Category;
  subBatch: number;
  root: Hex;
  userCount: number;
  totalReward: bigint;
  treeDepth: number;
  finalized: boolean;
  submitter: Address;
  createdAt: number;
}

export interface ClaimRecord {
  day: number;
  category: Category;
  subBatch: number;
  user: Address;
  amount: bigint;
  claimedAt: number;
}

export interface ClaimRequest {
  day: number;
  category: number;
  subBatch?: number;
  points: bigint;
  rewardAmount: bigint;
  index: number;
  proof: Hex[];
}

export type DistributionEventType = 'DistributionFinalized' | 'RewardClaimed';

export interface DistributionEvent {
  seq: number;
  type: DistributionEventType;
  day: number;
  category: Category;
  subBatch: number;
  payload: Record<string, string | number>;
  createdAt: number;
}

export interface Eip712Domain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

// Source of "now" in unix seconds
export type Clock = () => number;

// One category's finalized sub-batches for a day
export interface CategoryStatus {
  category: Category;
  name: string;
  submitted: boolean;
  subBatches: number;
  userCount: number;
  totalReward: bigint;
  roots: Hex[];
}

export interface DayStatus {
  day: number;
  categories: CategoryStatus[];
}
