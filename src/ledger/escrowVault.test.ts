import { describe, it, expect, beforeEach } from 'vitest';
import { createDatabase } from '../db';
import { EscrowVault } from './escrowVault';
import { ADMIN, USER_A, USER_B, outsider } from '../__tests__/fixtures';

describe('EscrowVault', () => {
  let vault: EscrowVault;

  beforeEach(() => {
    vault = new EscrowVault(createDatabase(':memory:'), ADMIN, () => 1700000000);
  });

  it('starts empty and accumulates funding', () => {
    expect(vault.balance()).toBe(0n);
    expect(vault.fund(ADMIN, 100n)).toBe(100n);
    expect(vault.fund(ADMIN, 50n)).toBe(150n);
    expect(vault.balance()).toBe(150n);
  });

  it('only accepts positive funding from the admin', () => {
    expect(() => vault.fund(outsider.address, 100n)).toThrow(/Unauthorized/);
    expect(() => vault.fund(ADMIN, 0n)).toThrow(RangeError);
    expect(vault.balance()).toBe(0n);
  });

  it('pays out and logs each transfer', () => {
    vault.fund(ADMIN, 100n);
    vault.transfer(USER_A, 30n);
    vault.transfer(USER_A, 20n);
    vault.transfer(USER_B, 5n);

    expect(vault.balance()).toBe(45n);
    expect(vault.paidTo(USER_A)).toBe(50n);
    expect(vault.paidTo(USER_B)).toBe(5n);
  });

  it('refuses to pay more than it holds', () => {
    vault.fund(ADMIN, 10n);
    expect(() => vault.transfer(USER_A, 11n)).toThrow('Escrow balance 10 is insufficient for payout of 11');
    expect(vault.balance()).toBe(10n);
    expect(vault.paidTo(USER_A)).toBe(0n);
  });
});
