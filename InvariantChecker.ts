/**
 * Runtime Invariant Checker
 *
 * Checks accounting invariants after mutations. A violation is logged,
 * handed to the registered handlers and then raised as ConsistencyViolation.
 */

import { ILogger } from './utils/ILogger';
import { ConsistencyViolation } from './errors';

export interface InvariantViolation {
  invariant: string;
  location: string;
  expected: string;
  actual: Record<string, unknown>;
}

export type InvariantViolationHandler = (violation: InvariantViolation) => void;

export class InvariantChecker {
  private logger: ILogger;
  private violations: InvariantViolation[] = [];
  private handlers: InvariantViolationHandler[] = [];

  constructor(logger: ILogger) {
    this.logger = logger;
  }

  /**
   * Add a violation handler, called before the violation is raised
   */
  addHandler(handler: InvariantViolationHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Check an invariant
   */
  check(
    invariant: string,
    location: string,
    condition: boolean,
    expected: string,
    actual: Record<string, unknown>
  ): void {
    if (condition) {
      return;
    }

    const violation: InvariantViolation = { invariant, location, expected, actual };
    this.violations.push(violation);

    this.logger.error('Invariant violation detected', { ...violation });

    for (const handler of this.handlers) {
      handler(violation);
    }

    throw new ConsistencyViolation(
      'INVARIANT_VIOLATION',
      `${invariant} violated at ${location}: expected ${expected}`,
      actual
    );
  }

  /**
   * Tokens paid for an era never exceed that era's budget
   */
  checkEraConservation(location: string, era: number, tokensClaimed: bigint, tokensPerEra: bigint): void {
    this.check(
      'Era Share Conservation',
      location,
      tokensClaimed <= tokensPerEra,
      `claimed (${tokensClaimed}) <= tokensPerEra (${tokensPerEra})`,
      { era, tokensClaimed: tokensClaimed.toString(), tokensPerEra: tokensPerEra.toString() }
    );
  }

  /**
   * An account's per-era levels add up to its running total
   */
  checkLevelSum(location: string, account: string, eraSum: number, total: number): void {
    this.check(
      'Account Level Sum',
      location,
      eraSum === total,
      `sum of era levels (${eraSum}) = account total (${total})`,
      { account, eraSum, total }
    );
  }

  getViolations(): InvariantViolation[] {
    return [...this.violations];
  }
}
