import { getAddress, type Address } from 'viem';
import * as db from '../db';
import type { DB } from '../db';
import type { Clock } from '../types';
import { RELAYER_ROLE } from '../utils/constants';
import type { RoleReader } from '../utils/clients';
import { DistributionError } from '../utils/errors';
import logger from '../utils/logger';
import { systemClock } from './distributionLedger';

// Answers "does this address hold the relayer role"
export interface RelayerAuthorization {
  hasRelayerRole(address: Address): Promise<boolean>;
}

/**
 * Relayer role table kept next to the ledger, managed by a single admin.
 */
export class StaticRelayerRegistry implements RelayerAuthorization {
  readonly admin: Address;

  constructor(
    private readonly database: DB,
    admin: Address,
    private readonly clock: Clock = systemClock
  ) {
    this.admin = getAddress(admin);
  }

  async hasRelayerRole(address: Address): Promise<boolean> {
    return db.hasRelayer(this.database, getAddress(address));
  }

  grant(caller: Address, relayer: Address): void {
    this.requireAdmin(caller);
    db.addRelayer(this.database, getAddress(relayer), this.clock());
    logger.info(`Relayer role granted to ${getAddress(relayer)}`);
  }

  revoke(caller: Address, relayer: Address): void {
    this.requireAdmin(caller);
    db.removeRelayer(this.database, getAddress(relayer));
    logger.info(`Relayer role revoked from ${getAddress(relayer)}`);
  }

  private requireAdmin(caller: Address): void {
    if (getAddress(caller) !== this.admin) {
      throw new DistributionError('Unauthorized', `${caller} is not the registry admin`);
    }
  }
}

/**
 * Relayer role held in an AccessControl contract:
 * hasRole(keccak256("RELAYER_ROLE"), address)
 */
export class OnChainRelayerRegistry implements RelayerAuthorization {
  constructor(private readonly readRole: RoleReader) {}

  async hasRelayerRole(address: Address): Promise<boolean> {
    return this.readRole(RELAYER_ROLE, getAddress(address));
  }
}
