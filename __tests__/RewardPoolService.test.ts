/**
 * RewardPoolService Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RewardPoolService } from '../RewardPoolService';
import { TimeBucketingService } from '../TimeBucketingService';
import { InvariantChecker } from '../InvariantChecker';
import { InMemoryTokenLedger } from '../adapters/ledger/InMemoryTokenLedger';
import { ManualBlockClock } from '../utils/BlockClock';
import { ConsistencyViolation } from '../errors';
import { account, expectRejection, testLogger } from './helpers/fixtures';

const POOL = 'pool:regenerator';

describe('RewardPoolService', () => {
  let clock: ManualBlockClock;
  let ledger: InMemoryTokenLedger;
  let pool: RewardPoolService;

  const alice = account(1);
  const bob = account(2);
  const carol = account(3);

  beforeEach(() => {
    const logger = testLogger();
    clock = new ManualBlockClock(0);
    ledger = new InMemoryTokenLedger([{ account: POOL, amount: 750_000_000n, locked: true }]);
    pool = new RewardPoolService(
      logger,
      {
        timeBucketing: new TimeBucketingService({ deployBlock: 0, blocksPerEra: 1_000, halving: 12, precision: 100_000 }),
        ledger,
        clock,
        invariants: new InvariantChecker(logger),
      },
      { poolType: 'regenerator', poolAddress: POOL, totalTokens: 750_000_000n }
    );
  });

  describe('budget', () => {
    it('should halve per epoch and split the epoch across its eras', () => {
      expect(pool.tokensPerEpoch(1)).toBe(375_000_000n);
      expect(pool.tokensPerEpoch(2)).toBe(187_500_000n);
      expect(pool.tokensPerEra(1)).toBe(31_250_000n);
      expect(pool.tokensPerEra(1, 10)).toBe(37_500_000n);
    });
  });

  describe('grantLevel', () => {
    it('should credit an event once', () => {
      expect(pool.grantLevel(alice, 5, 1, 'inspection:1:regenerator')).toBe(true);
      expect(pool.grantLevel(alice, 5, 1, 'inspection:1:regenerator')).toBe(false);

      expect(pool.levelsOf(alice, 1)).toBe(5);
      expect(pool.getEra(1).totalLevels).toBe(5);
      expect(pool.totalActiveLevels()).toBe(5);
    });

    it('should reject non-positive amounts', () => {
      expectRejection(() => pool.grantLevel(alice, 0, 1, 'zero'), 'INVALID_AMOUNT');
    });
  });

  describe('withdraw', () => {
    it('should pay a proportional share of the era budget', () => {
      pool.grantLevel(alice, 60, 1, 'a');
      pool.grantLevel(bob, 49_940, 1, 'b');
      clock.setBlock(1_000);

      const result = pool.withdraw(alice, 1);

      expect(result).toEqual({ status: 'paid', account: alice, era: 1, amount: 37_500n, nextEra: 2 });
      expect(ledger.balanceOf(alice)).toBe(37_500n);
      expect(ledger.totalLocked()).toBe(749_962_500n);
      expect(pool.getEra(1)).toEqual({ era: 1, claimsCount: 1, tokensClaimed: 37_500n, totalLevels: 50_000 });
    });

    it('should not pay for the running era', () => {
      pool.grantLevel(alice, 10, 1, 'a');

      const result = pool.withdraw(alice, 1);

      expect(result.status).toBe('not-ready');
      expect(result.nextEra).toBe(1);
      expect(ledger.balanceOf(alice)).toBe(0n);
    });

    it('should pay each era at most once', () => {
      pool.grantLevel(alice, 60, 1, 'a');
      pool.grantLevel(bob, 49_940, 1, 'b');
      clock.setBlock(1_000);
      pool.withdraw(alice, 1);

      const repeat = pool.withdraw(alice, 1);

      expect(repeat.status).toBe('already-claimed');
      expect(repeat.amount).toBe(0n);
      expect(ledger.balanceOf(alice)).toBe(37_500n);
      expect(pool.getEra(1).claimsCount).toBe(1);
      expect(pool.getEra(1).tokensClaimed).toBe(37_500n);
    });

    it('should skip eras without levels and point at the next claimable era', () => {
      clock.setBlock(2_000);
      pool.grantLevel(carol, 10, 3, 'c');
      clock.setBlock(4_000);

      const skipped = pool.withdraw(carol, 1);
      expect(skipped).toEqual({ status: 'skipped', account: carol, era: 1, amount: 0n, nextEra: 3 });

      const paid = pool.withdraw(carol, 3);
      expect(paid.status).toBe('paid');
      expect(paid.amount).toBe(31_250_000n);
      expect(paid.nextEra).toBe(5);
    });

    it('should move the pointer to the current era when nothing is left to claim', () => {
      clock.setBlock(3_500);

      expect(pool.withdraw(carol, 1).nextEra).toBe(4);
    });
  });

  describe('removeLevel', () => {
    it('should refuse to remove more than the account holds', () => {
      pool.grantLevel(alice, 3, 1, 'a');

      const error = expectRejection(() => pool.removeLevel(alice, 1, 4), 'LEVEL_UNDERFLOW');
      expect(error).toBeInstanceOf(ConsistencyViolation);
      expect(pool.levelsOf(alice, 1)).toBe(3);
    });

    it('should lower the running era total', () => {
      pool.grantLevel(alice, 3, 1, 'a');
      pool.grantLevel(bob, 2, 1, 'b');

      expect(pool.removeLevel(alice, 1, 1)).toBe(1);
      expect(pool.levelsOf(alice, 1)).toBe(2);
      expect(pool.getEra(1).totalLevels).toBe(4);
      expect(pool.totalLevelsOf(alice)).toBe(2);
    });

    it('should strip every era of a denied account and keep closed era totals', () => {
      pool.grantLevel(alice, 5, 1, 'a1');
      clock.setBlock(1_000);
      pool.grantLevel(alice, 7, 2, 'a2');

      expect(pool.removeLevel(alice, 0, 0, true)).toBe(12);

      expect(pool.levelsOf(alice, 1)).toBe(0);
      expect(pool.levelsOf(alice, 2)).toBe(0);
      expect(pool.totalLevelsOf(alice)).toBe(0);
      expect(pool.totalActiveLevels()).toBe(0);
      expect(pool.getEra(1).totalLevels).toBe(5);
      expect(pool.getEra(2).totalLevels).toBe(0);
    });
  });
});
