/**
 * InMemoryTokenLedger and ManualBlockClock Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryTokenLedger } from '../adapters/ledger/InMemoryTokenLedger';
import { ManualBlockClock } from '../utils/BlockClock';
import { account, expectRejection } from './helpers/fixtures';

describe('InMemoryTokenLedger', () => {
  let ledger: InMemoryTokenLedger;

  beforeEach(() => {
    ledger = new InMemoryTokenLedger([
      { account: 'pool:regenerator', amount: 1_000n, locked: true },
      { account: account(1), amount: 50n, locked: false },
    ]);
  });

  it('should track supply and locked supply from the allocations', () => {
    expect(ledger.totalSupply()).toBe(1_050n);
    expect(ledger.totalLocked()).toBe(1_000n);
    expect(ledger.totalCertified()).toBe(0n);
  });

  it('should move tokens', () => {
    ledger.transfer(account(1), account(2), 20n);

    expect(ledger.balanceOf(account(1))).toBe(30n);
    expect(ledger.balanceOf(account(2))).toBe(20n);
    expectRejection(() => ledger.transfer(account(2), account(1), 21n), 'INSUFFICIENT_BALANCE');
  });

  it('should burn into the certified supply', () => {
    ledger.burnFrom(account(1), 50n);

    expect(ledger.totalSupply()).toBe(1_000n);
    expect(ledger.totalCertified()).toBe(50n);
    expectRejection(() => ledger.burnFrom(account(1), 0n), 'INVALID_AMOUNT');
  });

  it('should not release more than the locked supply', () => {
    ledger.decreaseLocked(400n);

    expect(ledger.totalLocked()).toBe(600n);
    expectRejection(() => ledger.decreaseLocked(601n), 'COUNTER_UNDERFLOW');
  });
});

describe('ManualBlockClock', () => {
  it('should only move forward', () => {
    const clock = new ManualBlockClock(10);

    expect(clock.advance(5)).toBe(15);
    expect(clock.setBlock(15)).toBe(15);
    expectRejection(() => clock.setBlock(14), 'CLOCK_REWIND');
    expectRejection(() => clock.advance(-1), 'INVALID_AMOUNT');
    expect(clock.currentBlock()).toBe(15);
  });
});
