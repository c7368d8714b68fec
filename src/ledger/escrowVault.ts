import { getAddress, type Address } from 'viem';
import * as db from '../db';
import type { DB } from '../db';
import type { Clock } from '../types';
import { DistributionError } from '../utils/errors';
import logger from '../utils/logger';
import { systemClock } from './distributionLedger';

/**
 * Moves value to a claimant. Runs inside the claim transaction,
 * so throwing rolls the whole claim back.
 */
export interface ValueTransfer {
  transfer(to: Address, amount: bigint): void;
}

/**
 * Custodian balance holding rewards until they are claimed.
 * Unclaimed rewards stay here; there is no sweep.
 */
export class EscrowVault implements ValueTransfer {
  readonly admin: Address;

  constructor(
    private readonly database: DB,
    admin: Address,
    private readonly clock: Clock = systemClock
  ) {
    this.admin = getAddress(admin);
  }

  balance(): bigint {
    return db.getEscrowBalance(this.database);
  }

  paidTo(recipient: Address): bigint {
    return db.getPayoutTotal(this.database, getAddress(recipient));
  }

  fund(caller: Address, amount: bigint): bigint {
    if (getAddress(caller) !== this.admin) {
      throw new DistributionError('Unauthorized', `${caller} cannot fund the escrow`);
    }
    if (amount <= 0n) {
      throw new RangeError('Funding amount must be positive');
    }

    const balance = this.balance() + amount;
    db.setEscrowBalance(this.database, balance);
    logger.info(`Escrow funded with ${amount}, balance ${balance}`);
    return balance;
  }

  transfer(to: Address, amount: bigint): void {
    const balance = this.balance();
    if (amount > balance) {
      throw new Error(`Escrow balance ${balance} is insufficient for payout of ${amount}`);
    }

    db.setEscrowBalance(this.database, balance - amount);
    db.recordPayout(this.database, getAddress(to), amount, this.clock());
  }
}
