import { createPublicClient, http, type Address, type Hex, type Transport } from 'viem';

export const ACCESS_CONTROL_ABI = [
  {
    name: 'hasRole',
    type: 'function',
    stateMutability: 'view',
    inputs: [
      { name: 'role', type: 'bytes32' },
      { name: 'account', type: 'address' }
    ],
    outputs: [{ name: '', type: 'bool' }]
  }
] as const;

export type RoleReader = (role: Hex, account: Address) => Promise<boolean>;

/**
 * Reads roles from an OpenZeppelin-style AccessControl contract.
 * Pass http(rpcUrl) in production; tests pass a custom() transport.
 */
export function createAccessControlReader(
  transport: Transport,
  accessControlAddress: Address
): RoleReader {
  const client = createPublicClient({ transport });

  return (role, account) =>
    client.readContract({
      address: accessControlAddress,
      abi: ACCESS_CONTROL_ABI,
      functionName: 'hasRole',
      args: [role, account]
    });
}

export function createHttpAccessControlReader(rpcUrl: string, accessControlAddress: Address): RoleReader {
  return createAccessControlReader(http(rpcUrl), accessControlAddress);
}
