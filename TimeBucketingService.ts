/**
 * Time Bucketing Service
 *
 * Pure block → era → epoch arithmetic. Eras are 1-indexed; every
 * `halving` eras form an epoch, and emission halves per epoch.
 */

import { ConfigurationError, PreconditionViolation } from './errors';

export interface TimeBucketingConfig {
  deployBlock: number;
  blocksPerEra: number;
  halving: number;
  /** Fixed-point scale for elapsedErasSince (e.g. 100000) */
  precision: number;
}

export class TimeBucketingService {
  readonly deployBlock: number;
  readonly blocksPerEra: number;
  readonly halving: number;
  readonly precision: number;

  constructor(config: TimeBucketingConfig) {
    if (!Number.isSafeInteger(config.blocksPerEra) || config.blocksPerEra <= 0) {
      throw new ConfigurationError(`blocksPerEra must be a positive integer, got ${config.blocksPerEra}`);
    }
    if (!Number.isSafeInteger(config.halving) || config.halving <= 0) {
      throw new ConfigurationError(`halving must be a positive integer, got ${config.halving}`);
    }
    if (!Number.isSafeInteger(config.deployBlock) || config.deployBlock < 0) {
      throw new ConfigurationError(`deployBlock must be a non-negative integer, got ${config.deployBlock}`);
    }
    if (!Number.isSafeInteger(config.precision) || config.precision <= 0) {
      throw new ConfigurationError(`precision must be a positive integer, got ${config.precision}`);
    }

    this.deployBlock = config.deployBlock;
    this.blocksPerEra = config.blocksPerEra;
    this.halving = config.halving;
    this.precision = config.precision;
  }

  currentEra(blockNumber: number): number {
    this.assertDeployed(blockNumber);
    return Math.floor((blockNumber - this.deployBlock) / this.blocksPerEra) + 1;
  }

  epochOf(era: number): number {
    if (!Number.isSafeInteger(era) || era < 1) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Era must be a positive integer, got ${era}`);
    }
    return Math.floor((era - 1) / this.halving) + 1;
  }

  /**
   * First block of `era`
   */
  eraStartBlock(era: number): number {
    return this.deployBlock + (era - 1) * this.blocksPerEra;
  }

  /**
   * Positive while `targetEra` is running, zero on the first block after it,
   * negative once it has fully elapsed.
   */
  blocksUntilEraEnd(targetEra: number, blockNumber: number): number {
    return this.deployBlock + targetEra * this.blocksPerEra - blockNumber;
  }

  nextEraStartBlock(blockNumber: number): number {
    return this.eraStartBlock(this.currentEra(blockNumber) + 1);
  }

  /**
   * Era-lengths elapsed since `userEra` ended, scaled by `precision`.
   * Zero while `userEra` has not ended.
   */
  elapsedErasSince(userEra: number, blockNumber: number): number {
    this.assertDeployed(blockNumber);
    const remaining = this.blocksUntilEraEnd(userEra, blockNumber);
    if (remaining >= 0) {
      return 0;
    }
    return Math.floor((-remaining * this.precision) / this.blocksPerEra);
  }

  /**
   * Whether `blockNumber` falls in the last `safeguardBlocks` blocks of its era
   */
  isInSafeguardWindow(blockNumber: number, safeguardBlocks: number): boolean {
    const era = this.currentEra(blockNumber);
    return this.blocksUntilEraEnd(era, blockNumber) <= safeguardBlocks;
  }

  private assertDeployed(blockNumber: number): void {
    if (!Number.isSafeInteger(blockNumber) || blockNumber < this.deployBlock) {
      throw new PreconditionViolation(
        'BLOCK_BEFORE_DEPLOYMENT',
        `Block ${blockNumber} precedes deployment at block ${this.deployBlock}`
      );
    }
  }
}
