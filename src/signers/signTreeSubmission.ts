import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import {
  concat,
  encodeAbiParameters,
  getAddress,
  keccak256,
  recoverAddress,
  toBytes,
  type Address,
  type Hex,
} from 'viem';
import type { Eip712Domain, TreeSubmission } from '../types';
import { EIP712_DOMAIN_TYPEHASH, TREE_SUBMISSION_TYPEHASH } from '../utils/constants';
import logger from '../utils/logger';

export interface SignTreeSubmissionResult {
  signature: Hex;
  digestHash: Hex;
  signer: Address;
}

// keccak256(abi.encode(users))
export function hashUsers(users: readonly Address[]): Hex {
  return keccak256(encodeAbiParameters([{ type: 'address[]' }], [users.map((u) => getAddress(u))]));
}

// keccak256(abi.encode(values)), used for both points and amounts
export function hashUintArray(values: readonly bigint[]): Hex {
  return keccak256(encodeAbiParameters([{ type: 'uint256[]' }], [[...values]]));
}

/**
 * Domain separator, same as the verifying contract:
 *
 * keccak256(abi.encode(
 *     EIP712_DOMAIN_TYPEHASH,
 *     keccak256(bytes(name)),
 *     keccak256(bytes(version)),
 *     chainId,
 *     verifyingContract
 * ));
 */
export function domainSeparator(domain: Eip712Domain): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { name: 'typeHash', type: 'bytes32' },
        { name: 'name', type: 'bytes32' },
        { name: 'version', type: 'bytes32' },
        { name: 'chainId', type: 'uint256' },
        { name: 'verifyingContract', type: 'address' }
      ],
      [
        EIP712_DOMAIN_TYPEHASH,
        keccak256(toBytes(domain.name)),
        keccak256(toBytes(domain.version)),
        BigInt(domain.chainId),
        domain.verifyingContract
      ]
    )
  );
}

export function treeSubmissionStructHash(submission: TreeSubmission): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { name: 'typeHash', type: 'bytes32' },
        { name: 'day', type: 'uint256' },
        { name: 'category', type: 'uint8' },
        { name: 'subBatch', type: 'uint32' },
        { name: 'merkleRoot', type: 'bytes32' },
        { name: 'usersHash', type: 'bytes32' },
        { name: 'pointsHash', type: 'bytes32' },
        { name: 'amountsHash', type: 'bytes32' },
        { name: 'nonce', type: 'uint256' },
        { name: 'deadline', type: 'uint256' }
      ],
      [
        TREE_SUBMISSION_TYPEHASH,
        BigInt(submission.day),
        submission.category,
        submission.subBatch,
        submission.merkleRoot,
        hashUsers(submission.users),
        hashUintArray(submission.points),
        hashUintArray(submission.amounts),
        submission.nonce,
        submission.deadline
      ]
    )
  );
}

/**
 * EIP-712 digest the relayer signs: keccak256(0x1901 || domainSeparator || structHash)
 */
export function createTreeSubmissionDigest(domain: Eip712Domain, submission: TreeSubmission): Hex {
  return keccak256(
    concat([
      '0x1901',
      domainSeparator(domain),
      treeSubmissionStructHash(submission)
    ])
  );
}

/**
 * Sign a tree submission with the relayer key.
 *
 * Signs the digest directly with sign() rather than signMessage(), which would
 * add an EIP-191 prefix the verifier does not expect.
 */
export async function signTreeSubmission(
  relayer: Hex | PrivateKeyAccount,
  domain: Eip712Domain,
  submission: TreeSubmission
): Promise<SignTreeSubmissionResult> {
  const account = typeof relayer === 'string' ? privateKeyToAccount(relayer) : relayer;
  const digestHash = createTreeSubmissionDigest(domain, submission);

  logger.debug(
    `Signing tree submission day=${submission.day} category=${submission.category} ` +
    `subBatch=${submission.subBatch} root=${submission.merkleRoot} digest=${digestHash}`
  );

  const signature = await account.sign({ hash: digestHash });

  return {
    signature,
    digestHash,
    signer: account.address,
  };
}

/**
 * Recover the address that signed a submission.
 * Returns null when the submission cannot be hashed (malformed address)
 * or the signature cannot be recovered.
 */
export async function recoverSubmissionSigner(
  domain: Eip712Domain,
  submission: TreeSubmission,
  signature: Hex
): Promise<Address | null> {
  try {
    const hash = createTreeSubmissionDigest(domain, submission);
    return await recoverAddress({ hash, signature });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not recover submission signer: ${message}`);
    return null;
  }
}
