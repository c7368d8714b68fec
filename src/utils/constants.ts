import { keccak256, toBytes, parseEther, zeroHash } from 'viem';
import { Category } from '../types';

export const SECONDS_PER_DAY = 86400;

export const DEFAULT_TREE_DEPTH = 9; // 512 leaves, room for the 500-user batches the relayer produces
export const MAX_TREE_DEPTH = 32;

export const DEFAULT_SUBMISSION_TTL_SECONDS = 3600;

export const DEFAULT_DOMAIN_NAME = 'RewardTreeProcessor';
export const DEFAULT_DOMAIN_VERSION = '1';
export const DEFAULT_CHAIN_ID = 31337; // local anvil/hardhat

// Value of an unset leaf
export const EMPTY_LEAF = zeroHash;

export const CATEGORY_NAMES: Record<Category, string> = {
  [Category.CREATE]: 'CREATE',
  [Category.LIKES]: 'LIKES',
  [Category.COMMENTS]: 'COMMENTS',
  [Category.TIPPING]: 'TIPPING',
  [Category.CRYPTO]: 'CRYPTO',
  [Category.REFERRALS]: 'REFERRALS',
};

// Daily reward caps per category, 18 decimals
export const DEFAULT_DAILY_CAPS: Record<Category, bigint> = {
  [Category.CREATE]: parseEther('1.49'),
  [Category.LIKES]: parseEther('0.05'),
  [Category.COMMENTS]: parseEther('0.6'),
  [Category.TIPPING]: parseEther('7.96'),
  [Category.CRYPTO]: parseEther('9.95'),
  [Category.REFERRALS]: parseEther('11.95'),
};

// bytes32 public constant RELAYER_ROLE = keccak256("RELAYER_ROLE");
export const RELAYER_ROLE = keccak256(toBytes('RELAYER_ROLE'));

export const EIP712_DOMAIN_TYPEHASH = keccak256(
  toBytes('EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)')
);

export const TREE_SUBMISSION_TYPE =
  'TreeSubmission(uint256 day,uint8 category,uint32 subBatch,bytes32 merkleRoot,bytes32 usersHash,bytes32 pointsHash,bytes32 amountsHash,uint256 nonce,uint256 deadline)';

export const TREE_SUBMISSION_TYPEHASH = keccak256(toBytes(TREE_SUBMISSION_TYPE));

// Same struct in the shape viem's typed-data helpers take
export const TREE_SUBMISSION_TYPES = {
  TreeSubmission: [
    { name: 'day', type: 'uint256' },
    { name: 'category', type: 'uint8' },
    { name: 'subBatch', type: 'uint32' },
    { name: 'merkleRoot', type: 'bytes32' },
    { name: 'usersHash', type: 'bytes32' },
    { name: 'pointsHash', type: 'bytes32' },
    { name: 'amountsHash', type: 'bytes32' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint256' },
  ],
} as const;
