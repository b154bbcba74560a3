/**
 * Governance Service
 *
 * Era-bounded validation. Voters of the governance types challenge
 * resources and users created in the current era; once the era closes
 * whatever was not invalidated is final. Tallies are kept per era.
 *
 * Voting pays in the validator pool: one validation point per vote,
 * convertible into levels, and one level to the hunter of every
 * successful user challenge.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { TimeBucketingService } from './TimeBucketingService';
import { CommunityRegistryService } from './CommunityRegistryService';
import { RulesEngine } from './RulesEngine';
import { IResourceHandler } from './interfaces/IResourceHandler';
import { GovernanceConfig, TextLimits } from './ProtocolConfig';
import {
  ResourceType,
  UserChallenge,
  VOTER_USER_TYPES,
  ValidatorProfile,
  VoteOutcome,
  WithdrawalResult,
  isVoterType,
} from './types';
import { PreconditionViolation, TemporalGate } from './errors';

export interface GovernanceServiceDependencies {
  clock: IBlockClock;
  timeBucketing: TimeBucketingService;
  registry: CommunityRegistryService;
  validators: RulesEngine<ValidatorProfile>;
}

export class GovernanceService {
  private logger: ILogger;
  private clock: IBlockClock;
  private timeBucketing: TimeBucketingService;
  private registry: CommunityRegistryService;
  private validators: RulesEngine<ValidatorProfile>;
  private config: GovernanceConfig;
  private text: TextLimits;

  private handlers: Map<ResourceType, IResourceHandler> = new Map();
  /** `${resourceType}:${id}:${era}` -> voters */
  private resourceVotes: Map<string, Set<string>> = new Map();
  /** `${era}:${target}` -> challenge */
  private userChallenges: Map<string, UserChallenge> = new Map();
  /** `${resourceType}:${creator}` -> penalties */
  private penalties: Map<string, number> = new Map();

  constructor(
    logger: ILogger,
    dependencies: GovernanceServiceDependencies,
    config: { governance: GovernanceConfig; text: TextLimits }
  ) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.timeBucketing = dependencies.timeBucketing;
    this.registry = dependencies.registry;
    this.validators = dependencies.validators;
    this.config = config.governance;
    this.text = config.text;
  }

  registerHandler(handler: IResourceHandler): void {
    this.handlers.set(handler.resourceType, handler);
    this.logger.debug('Resource handler registered', { resourceType: handler.resourceType });
  }

  /**
   * Governance type, not denied, and above its type's average level
   */
  canVote(address: string): boolean {
    const account = normalizeAddress(address);
    return isVoterType(this.registry.userTypeOf(account)) && this.registry.isEligibleInviter(account);
  }

  voterPopulation(): number {
    return VOTER_USER_TYPES.reduce((sum, type) => sum + this.registry.userCount(type), 0);
  }

  votesToInvalidate(): number {
    return Math.floor(this.voterPopulation() / this.config.invalidationVoteDivisor) + 1;
  }

  isSafeguardWindow(): boolean {
    return this.timeBucketing.isInSafeguardWindow(this.clock.currentBlock(), this.config.safeguardBlocks);
  }

  voteResource(voterAddress: string, resourceType: ResourceType, id: number, justification: string): VoteOutcome {
    const voter = normalizeAddress(voterAddress);
    const block = this.clock.currentBlock();
    this.assertVoter(voter, block);

    const handler = this.handlers.get(resourceType);
    if (!handler) {
      throw new PreconditionViolation('UNKNOWN_RESOURCE_TYPE', `No resources of type ${resourceType}`);
    }
    const resource = handler.describe(id);
    if (!resource) {
      throw new PreconditionViolation('RESOURCE_NOT_FOUND', `${resourceType} ${id} cannot be challenged`);
    }
    if (!resource.valid) {
      throw new PreconditionViolation('RESOURCE_ALREADY_INVALID', `${resourceType} ${id} is already invalid`);
    }
    if (resource.era !== this.timeBucketing.currentEra(block)) {
      throw new PreconditionViolation('RESOURCE_FINALIZED', `${resourceType} ${id} belongs to era ${resource.era}`);
    }
    if (resource.creator === voter) {
      throw new PreconditionViolation('SELF_VOTE', 'Creators cannot vote on their own resources');
    }
    const key = this.resourceVoteKey(resourceType, id, resource.era);
    const voters = this.resourceVotes.get(key) ?? new Set<string>();
    if (voters.has(voter)) {
      throw new PreconditionViolation('ALREADY_VOTED', `${voter} already voted on ${resourceType} ${id} in era ${resource.era}`);
    }
    assertText('justification', justification, this.text.maxJustificationLength);

    voters.add(voter);
    this.resourceVotes.set(key, voters);
    const tally = handler.recordChallenge(id);
    this.creditVote(voter, block);

    const threshold = this.votesToInvalidate();
    this.logger.info('Resource vote cast', { voter, resourceType, id, tally, threshold });
    if (tally < threshold) {
      return { tally, threshold, invalidated: false, denied: null };
    }

    handler.invalidate(id);
    const denied = this.penalizeCreator(resourceType, resource.creator) ? resource.creator : null;
    return { tally, threshold, invalidated: true, denied };
  }

  voteUser(voterAddress: string, targetAddress: string, justification: string): VoteOutcome {
    const voter = normalizeAddress(voterAddress);
    const target = normalizeAddress(targetAddress);
    const block = this.clock.currentBlock();
    this.assertVoter(voter, block);

    this.registry.requireActive(target);
    if (target === voter) {
      throw new PreconditionViolation('SELF_VOTE', 'Voters cannot challenge themselves');
    }
    const era = this.timeBucketing.currentEra(block);
    const key = `${era}:${target}`;
    const existing = this.userChallenges.get(key);
    if (existing && existing.voters.includes(voter)) {
      throw new PreconditionViolation('ALREADY_VOTED', `${voter} already challenged ${target} in era ${era}`);
    }
    assertText('justification', justification, this.text.maxJustificationLength);

    const challenge: UserChallenge = existing ?? { target, era, hunter: voter, voters: [], succeeded: false };
    challenge.voters.push(voter);
    this.userChallenges.set(key, challenge);
    this.creditVote(voter, block);

    const tally = challenge.voters.length;
    const threshold = this.votesToInvalidate();
    this.logger.info('User vote cast', { voter, target, era, tally, threshold, hunter: challenge.hunter });
    if (tally < threshold) {
      return { tally, threshold, invalidated: false, denied: null };
    }

    challenge.succeeded = true;
    this.registry.setToDenied(target);
    this.rewardHunter(challenge);
    return { tally, threshold, invalidated: true, denied: target };
  }

  /**
   * Spend `pointsPerLevel` validation points for one validator level
   */
  convertPointsToLevel(address: string): number {
    const voter = normalizeAddress(address);
    this.registry.requireActive(voter);
    const { profile } = this.validators.requireParticipant(voter);
    if (profile.points < this.config.pointsPerLevel) {
      throw new PreconditionViolation(
        'INSUFFICIENT_POINTS',
        `${voter} holds ${profile.points} of the ${this.config.pointsPerLevel} points a level costs`
      );
    }

    const convertedLevels = profile.convertedLevels + 1;
    this.validators.updateProfile(voter, {
      points: profile.points - this.config.pointsPerLevel,
      convertedLevels,
    });
    this.validators.addLevel(voter, 1, `points:${voter}:${convertedLevels}`);
    this.logger.info('Validation points converted', { voter, convertedLevels });
    return this.validators.levelOf(voter);
  }

  withdrawValidator(address: string): WithdrawalResult {
    const voter = normalizeAddress(address);
    this.registry.requireActive(voter);
    return this.validators.withdraw(voter);
  }

  validatorProfile(address: string): ValidatorProfile | null {
    return this.validators.getParticipant(normalizeAddress(address))?.profile ?? null;
  }

  penaltiesOf(resourceType: ResourceType, address: string): number {
    return this.penalties.get(`${resourceType}:${normalizeAddress(address)}`) ?? 0;
  }

  getUserChallenge(address: string, era: number): UserChallenge | null {
    const challenge = this.userChallenges.get(`${era}:${normalizeAddress(address)}`);
    return challenge ? { ...challenge, voters: [...challenge.voters] } : null;
  }

  /**
   * Whether the address voted on the resource in the era it currently belongs to
   */
  hasVotedOnResource(address: string, resourceType: ResourceType, id: number): boolean {
    const resource = this.handlers.get(resourceType)?.describe(id) ?? null;
    if (!resource) {
      return false;
    }
    const voters = this.resourceVotes.get(this.resourceVoteKey(resourceType, id, resource.era));
    return voters?.has(normalizeAddress(address)) ?? false;
  }

  private resourceVoteKey(resourceType: ResourceType, id: number, era: number): string {
    return `${resourceType}:${id}:${era}`;
  }

  private assertVoter(voter: string, block: number): void {
    this.registry.requireActive(voter);
    if (!this.canVote(voter)) {
      throw new PreconditionViolation('CANNOT_VOTE', `${voter} is not eligible to vote`);
    }
    const lastVoteAt = this.validators.getParticipant(voter)?.profile.lastVoteAt ?? null;
    if (lastVoteAt !== null && block < lastVoteAt + this.config.voteIntervalBlocks) {
      const availableAt = lastVoteAt + this.config.voteIntervalBlocks;
      throw new TemporalGate('VOTE_COOLDOWN', `Next vote possible at block ${availableAt}`, availableAt);
    }
  }

  private creditVote(voter: string, block: number): void {
    if (!this.validators.isEnrolled(voter)) {
      this.validators.enroll(voter, { points: 0, convertedLevels: 0, votesCast: 0, huntsWon: 0, lastVoteAt: null });
    }
    const { profile } = this.validators.requireParticipant(voter);
    this.validators.updateProfile(voter, {
      points: profile.points + 1,
      votesCast: profile.votesCast + 1,
      lastVoteAt: block,
    });
  }

  /**
   * Returns true when the penalty denied the creator
   */
  private penalizeCreator(resourceType: ResourceType, creator: string): boolean {
    const key = `${resourceType}:${creator}`;
    const penalties = (this.penalties.get(key) ?? 0) + 1;
    this.penalties.set(key, penalties);
    this.logger.warn('Creator penalized', { resourceType, creator, penalties });

    if (penalties < this.config.maxPenalties || this.registry.isDenied(creator)) {
      return false;
    }
    this.registry.setToDenied(creator);
    return true;
  }

  private rewardHunter(challenge: UserChallenge): void {
    const { hunter, target, era } = challenge;
    if (this.registry.isDenied(hunter)) {
      return;
    }
    const applied = this.validators.addLevel(hunter, 1, `hunter:${target}:${era}`);
    if (applied) {
      const { profile } = this.validators.requireParticipant(hunter);
      this.validators.updateProfile(hunter, { huntsWon: profile.huntsWon + 1 });
      this.logger.info('Hunter rewarded', { hunter, target, era });
    }
  }
}
