/**
 * Rules Engine
 *
 * Generic per-participant-type engine. It owns every participant's profile
 * and pool state and is the only place either is mutated; type-specific
 * rules (regenerators, inspectors, ...) compose one and decide when levels
 * are earned.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { RewardPoolService } from './RewardPoolService';
import { TimeBucketingService } from './TimeBucketingService';
import { PoolState, PoolType, WithdrawalResult } from './types';
import { PreconditionViolation } from './errors';

export interface ParticipantPolicy {
  poolType: PoolType;
  /** Whether a new participant may claim from the pool straight away */
  entersPoolOnEnroll: boolean;
}

export interface Participant<TProfile> {
  account: string;
  enrolledAt: number;
  denied: boolean;
  pool: PoolState;
  profile: TProfile;
}

export interface RulesEngineDependencies {
  pool: RewardPoolService;
  timeBucketing: TimeBucketingService;
  clock: IBlockClock;
}

export class RulesEngine<TProfile extends object> {
  readonly policy: ParticipantPolicy;

  private logger: ILogger;
  private pool: RewardPoolService;
  private timeBucketing: TimeBucketingService;
  private clock: IBlockClock;
  private participants: Map<string, Participant<TProfile>> = new Map();

  constructor(logger: ILogger, dependencies: RulesEngineDependencies, policy: ParticipantPolicy) {
    this.logger = logger;
    this.pool = dependencies.pool;
    this.timeBucketing = dependencies.timeBucketing;
    this.clock = dependencies.clock;
    this.policy = policy;
  }

  enroll(account: string, profile: TProfile): Participant<TProfile> {
    if (this.participants.has(account)) {
      throw new PreconditionViolation('ALREADY_REGISTERED', `${account} is already a ${this.policy.poolType}`);
    }

    const block = this.clock.currentBlock();
    const participant: Participant<TProfile> = {
      account,
      enrolledAt: block,
      denied: false,
      pool: {
        currentEra: this.timeBucketing.currentEra(block),
        level: 0,
        onContractPool: this.policy.entersPoolOnEnroll,
      },
      profile,
    };
    this.participants.set(account, participant);

    this.logger.info('Participant enrolled', { poolType: this.policy.poolType, account, era: participant.pool.currentEra });
    return participant;
  }

  isEnrolled(account: string): boolean {
    return this.participants.has(account);
  }

  getParticipant(account: string): Participant<TProfile> | null {
    return this.participants.get(account) ?? null;
  }

  requireParticipant(account: string): Participant<TProfile> {
    const participant = this.participants.get(account);
    if (!participant) {
      throw new PreconditionViolation('NOT_REGISTERED', `${account} is not a ${this.policy.poolType}`);
    }
    return participant;
  }

  updateProfile(account: string, patch: Partial<TProfile>): TProfile {
    const participant = this.requireParticipant(account);
    participant.profile = { ...participant.profile, ...patch };
    return participant.profile;
  }

  setOnContractPool(account: string, onContractPool: boolean): void {
    this.requireParticipant(account).pool.onContractPool = onContractPool;
  }

  /**
   * Post levels for the current era. Denied participants are never credited.
   */
  addLevel(account: string, amount: number, eventId: string): boolean {
    const participant = this.requireParticipant(account);
    if (participant.denied) {
      this.logger.warn('Level grant to denied participant ignored', { account, amount, eventId });
      return false;
    }
    const era = this.pool.currentEra();
    const applied = this.pool.grantLevel(account, amount, era, eventId);
    if (applied) {
      participant.pool.level += amount;
    }
    return applied;
  }

  /**
   * A denied participant has nothing left to remove
   */
  removeLevels(account: string, amount: number, era: number): void {
    const participant = this.requireParticipant(account);
    if (participant.denied) {
      return;
    }
    this.pool.removeLevel(account, era, amount);
    participant.pool.level -= amount;
  }

  /**
   * Strip every level the participant holds and block further claims
   */
  removeAllLevels(account: string): number {
    const participant = this.requireParticipant(account);
    const removed = this.pool.removeLevel(account, participant.pool.currentEra, 0, true);
    participant.pool.level -= removed;
    participant.denied = true;
    return removed;
  }

  canWithdraw(account: string): boolean {
    const participant = this.participants.get(account);
    if (!participant || participant.denied || !participant.pool.onContractPool) {
      return false;
    }
    return participant.pool.currentEra < this.pool.currentEra();
  }

  /**
   * Claim the era the participant's pointer is on and advance the pointer
   */
  withdraw(account: string): WithdrawalResult {
    const participant = this.requireParticipant(account);
    if (participant.denied) {
      throw new PreconditionViolation('USER_DENIED', `${account} has been denied`);
    }
    if (!participant.pool.onContractPool) {
      throw new PreconditionViolation('NOT_ON_CONTRACT_POOL', `${account} has not entered the ${this.policy.poolType} pool`);
    }

    const result = this.pool.withdraw(account, participant.pool.currentEra);
    participant.pool.currentEra = result.nextEra;
    return result;
  }

  levelOf(account: string): number {
    return this.participants.get(account)?.pool.level ?? 0;
  }

  participantCount(): number {
    return this.participants.size;
  }

  get rewardPool(): RewardPoolService {
    return this.pool;
  }
}
