/**
 * Reward Pool Service
 *
 * One instance per pool type. Holds the type's token budget and the
 * per-era level bookkeeping that turns levels into a proportional claim.
 *
 * Emission halves every epoch:
 * - tokensPerEpoch(e) = totalTokens / 2^e
 * - tokensPerEra(e)   = tokensPerEpoch(e) / halving
 *
 * A claim for an era pays levels(account, era) * tokensPerEra / totalLevels(era),
 * in integer division. The remainder stays locked in the pool.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { ITokenLedger } from './interfaces/ITokenLedger';
import { TimeBucketingService } from './TimeBucketingService';
import { InvariantChecker } from './InvariantChecker';
import { EraSummary, PoolType, WithdrawalResult } from './types';
import { ConsistencyViolation, PreconditionViolation } from './errors';

export interface RewardPoolConfig {
  poolType: PoolType;
  /** Ledger account that holds the pool's locked budget */
  poolAddress: string;
  totalTokens: bigint;
}

export interface RewardPoolDependencies {
  timeBucketing: TimeBucketingService;
  ledger: ITokenLedger;
  clock: IBlockClock;
  invariants: InvariantChecker;
}

interface EraAggregate {
  claimsCount: number;
  tokensClaimed: bigint;
  totalLevels: number;
}

export class RewardPoolService {
  readonly poolType: PoolType;
  readonly poolAddress: string;
  readonly totalTokens: bigint;

  private logger: ILogger;
  private timeBucketing: TimeBucketingService;
  private ledger: ITokenLedger;
  private clock: IBlockClock;
  private invariants: InvariantChecker;

  private eras: Map<number, EraAggregate> = new Map();
  /** account -> era -> levels */
  private eraLevels: Map<string, Map<number, number>> = new Map();
  /** account -> eras already paid */
  private withdrawn: Map<string, Set<number>> = new Map();
  private accountTotals: Map<string, number> = new Map();
  private appliedEvents: Set<string> = new Set();
  private activeLevels = 0;

  constructor(logger: ILogger, dependencies: RewardPoolDependencies, config: RewardPoolConfig) {
    if (config.totalTokens < 0n) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Pool ${config.poolType} cannot hold a negative budget`);
    }
    this.logger = logger;
    this.timeBucketing = dependencies.timeBucketing;
    this.ledger = dependencies.ledger;
    this.clock = dependencies.clock;
    this.invariants = dependencies.invariants;
    this.poolType = config.poolType;
    this.poolAddress = config.poolAddress;
    this.totalTokens = config.totalTokens;
  }

  tokensPerEpoch(epoch: number): bigint {
    return this.totalTokens / 2n ** BigInt(epoch);
  }

  tokensPerEra(epoch: number, halving: number = this.timeBucketing.halving): bigint {
    return this.tokensPerEpoch(epoch) / BigInt(halving);
  }

  currentEra(): number {
    return this.timeBucketing.currentEra(this.clock.currentBlock());
  }

  /**
   * Add levels for an account in an era. Returns false when `eventId`
   * was already applied, so the same event never credits twice.
   */
  grantLevel(account: string, amount: number, era: number, eventId: string): boolean {
    this.assertLevelAmount(amount);
    this.assertEra(era);

    if (this.appliedEvents.has(eventId)) {
      this.logger.debug('Level event already applied', { poolType: this.poolType, account, eventId });
      return false;
    }

    this.appliedEvents.add(eventId);
    const levels = this.levelMapOf(account);
    levels.set(era, (levels.get(era) ?? 0) + amount);
    this.eraAggregate(era).totalLevels += amount;
    this.accountTotals.set(account, this.totalLevelsOf(account) + amount);
    this.activeLevels += amount;

    this.logger.info('Level granted', { poolType: this.poolType, account, amount, era, eventId });
    return true;
  }

  /**
   * Remove levels from an account. With `denied`, every level the account
   * holds in every era is removed and `era`/`amount` are ignored.
   *
   * A closed era keeps its totalLevels: claims already paid against it
   * stay within its budget.
   */
  removeLevel(account: string, era: number, amount: number, denied: boolean = false): number {
    if (denied) {
      let removed = 0;
      for (const [recordedEra, levels] of this.levelMapOf(account)) {
        if (levels > 0) {
          this.subtract(account, recordedEra, levels);
          removed += levels;
        }
      }
      this.logger.info('All levels removed from denied account', { poolType: this.poolType, account, removed });
      return removed;
    }

    this.assertLevelAmount(amount);
    this.assertEra(era);
    const held = this.levelsOf(account, era);
    if (amount > held) {
      throw new ConsistencyViolation('LEVEL_UNDERFLOW', `Cannot remove ${amount} levels from ${held} held`, {
        poolType: this.poolType,
        account,
        era,
      });
    }

    this.subtract(account, era, amount);
    this.logger.info('Level removed', { poolType: this.poolType, account, amount, era });
    return amount;
  }

  /**
   * Claim the account's share of `recordedEra`.
   *
   * An era with no levels for the account is skipped without a payout and
   * the returned pointer moves past it, so the account is never stuck on it.
   */
  withdraw(account: string, recordedEra: number): WithdrawalResult {
    this.assertEra(recordedEra);
    const currentEra = this.currentEra();

    if (recordedEra >= currentEra) {
      return { status: 'not-ready', account, era: recordedEra, amount: 0n, nextEra: recordedEra };
    }

    if (this.hasWithdrawn(account, recordedEra)) {
      return {
        status: 'already-claimed',
        account,
        era: recordedEra,
        amount: 0n,
        nextEra: this.nextClaimableEra(account, recordedEra, currentEra),
      };
    }

    const tokensPerEra = this.tokensPerEra(this.timeBucketing.epochOf(recordedEra));
    const levels = this.levelsOf(account, recordedEra);

    if (levels === 0) {
      const nextEra = this.nextClaimableEra(account, recordedEra, currentEra);
      this.logger.debug('No levels in era, skipping', { poolType: this.poolType, account, recordedEra, nextEra });
      return { status: 'skipped', account, era: recordedEra, amount: 0n, nextEra };
    }

    const aggregate = this.eraAggregate(recordedEra);
    const payout = (BigInt(levels) * tokensPerEra) / BigInt(aggregate.totalLevels);
    this.invariants.checkEraConservation(
      `RewardPool(${this.poolType}).withdraw`,
      recordedEra,
      aggregate.tokensClaimed + payout,
      tokensPerEra
    );

    this.ledger.decreaseLocked(payout);
    this.ledger.transfer(this.poolAddress, account, payout);

    this.withdrawnSetOf(account).add(recordedEra);
    aggregate.claimsCount += 1;
    aggregate.tokensClaimed += payout;

    this.logger.info('Era claimed', {
      poolType: this.poolType,
      account,
      era: recordedEra,
      levels,
      totalLevels: aggregate.totalLevels,
      payout: payout.toString(),
    });

    return {
      status: 'paid',
      account,
      era: recordedEra,
      amount: payout,
      nextEra: this.nextClaimableEra(account, recordedEra, currentEra),
    };
  }

  getEra(era: number): EraSummary {
    const aggregate = this.eras.get(era);
    return {
      era,
      claimsCount: aggregate?.claimsCount ?? 0,
      tokensClaimed: aggregate?.tokensClaimed ?? 0n,
      totalLevels: aggregate?.totalLevels ?? 0,
    };
  }

  levelsOf(account: string, era: number): number {
    return this.eraLevels.get(account)?.get(era) ?? 0;
  }

  totalLevelsOf(account: string): number {
    return this.accountTotals.get(account) ?? 0;
  }

  /**
   * Eras in which the account has ever been granted levels, ascending
   */
  erasOf(account: string): number[] {
    return [...this.levelMapOf(account).keys()].sort((a, b) => a - b);
  }

  hasWithdrawn(account: string, era: number): boolean {
    return this.withdrawn.get(account)?.has(era) ?? false;
  }

  /**
   * Sum of every account's levels currently held in this pool
   */
  totalActiveLevels(): number {
    return this.activeLevels;
  }

  /**
   * First era after `afterEra` that still holds unclaimed levels for the
   * account, or the current era when there is none.
   */
  private nextClaimableEra(account: string, afterEra: number, currentEra: number): number {
    const pending = this.erasOf(account).find(
      (era) => era > afterEra && era < currentEra && this.levelsOf(account, era) > 0 && !this.hasWithdrawn(account, era)
    );
    return pending ?? currentEra;
  }

  private subtract(account: string, era: number, amount: number): void {
    const levels = this.levelMapOf(account);
    levels.set(era, (levels.get(era) ?? 0) - amount);
    this.accountTotals.set(account, this.totalLevelsOf(account) - amount);
    this.activeLevels -= amount;

    if (era >= this.currentEra()) {
      const aggregate = this.eraAggregate(era);
      if (aggregate.totalLevels < amount) {
        throw new ConsistencyViolation('LEVEL_UNDERFLOW', 'Era total would become negative', {
          poolType: this.poolType,
          era,
          totalLevels: aggregate.totalLevels,
          amount,
        });
      }
      aggregate.totalLevels -= amount;
    }

    let eraSum = 0;
    for (const value of levels.values()) {
      eraSum += value;
    }
    this.invariants.checkLevelSum(`RewardPool(${this.poolType}).removeLevel`, account, eraSum, this.totalLevelsOf(account));
  }

  private eraAggregate(era: number): EraAggregate {
    let aggregate = this.eras.get(era);
    if (!aggregate) {
      aggregate = { claimsCount: 0, tokensClaimed: 0n, totalLevels: 0 };
      this.eras.set(era, aggregate);
    }
    return aggregate;
  }

  private levelMapOf(account: string): Map<number, number> {
    let levels = this.eraLevels.get(account);
    if (!levels) {
      levels = new Map();
      this.eraLevels.set(account, levels);
    }
    return levels;
  }

  private withdrawnSetOf(account: string): Set<number> {
    let eras = this.withdrawn.get(account);
    if (!eras) {
      eras = new Set();
      this.withdrawn.set(account, eras);
    }
    return eras;
  }

  private assertLevelAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Level amount must be a positive integer, got ${amount}`);
    }
  }

  private assertEra(era: number): void {
    if (!Number.isSafeInteger(era) || era < 1) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Era must be a positive integer, got ${era}`);
    }
  }
}
