/**
 * Contribution Service
 *
 * Submissions by the governance types: reports by developers, research by
 * researchers, contributions by contributors. One instance per resource
 * type; each accepted submission earns its creator one level.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { TimeBucketingService } from './TimeBucketingService';
import { DomainEventBus } from './DomainEventBus';
import { CommunityRegistryService } from './CommunityRegistryService';
import { RulesEngine, Participant } from './RulesEngine';
import { IResourceHandler } from './interfaces/IResourceHandler';
import { TextLimits } from './ProtocolConfig';
import {
  CONTRIBUTION_CREATOR,
  ContributionResourceType,
  ContributorProfile,
  EarningUserType,
  Resource,
  ResourceSnapshot,
  ResourceSubmission,
  WithdrawalResult,
} from './types';
import { PreconditionViolation, TemporalGate } from './errors';

export interface ContributionServiceDependencies {
  clock: IBlockClock;
  timeBucketing: TimeBucketingService;
  events: DomainEventBus;
  registry: CommunityRegistryService;
  engine: RulesEngine<ContributorProfile>;
}

export interface ContributionServiceConfig {
  resourceType: ContributionResourceType;
  submissionDelayBlocks: number;
  safeguardBlocks: number;
  text: TextLimits;
}

export class ContributionService implements IResourceHandler {
  readonly resourceType: ContributionResourceType;
  readonly creatorType: EarningUserType;

  private logger: ILogger;
  private clock: IBlockClock;
  private timeBucketing: TimeBucketingService;
  private events: DomainEventBus;
  private registry: CommunityRegistryService;
  private engine: RulesEngine<ContributorProfile>;
  private config: ContributionServiceConfig;

  private resources: Map<number, Resource> = new Map();
  private nextId = 1;

  constructor(logger: ILogger, dependencies: ContributionServiceDependencies, config: ContributionServiceConfig) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.timeBucketing = dependencies.timeBucketing;
    this.events = dependencies.events;
    this.registry = dependencies.registry;
    this.engine = dependencies.engine;
    this.config = config;
    this.resourceType = config.resourceType;
    this.creatorType = CONTRIBUTION_CREATOR[config.resourceType];
  }

  register(address: string, name: string): Participant<ContributorProfile> {
    const account = normalizeAddress(address);
    assertText('name', name, this.config.text.maxNameLength);

    this.registry.addUser(account, this.creatorType);
    return this.engine.enroll(account, { name, submissions: 0, lastSubmissionAt: null });
  }

  submit(creatorAddress: string, submission: ResourceSubmission): Resource {
    const creator = normalizeAddress(creatorAddress);
    this.registry.requireActive(creator, this.creatorType);
    const { profile } = this.engine.requireParticipant(creator);
    const block = this.clock.currentBlock();

    if (this.timeBucketing.isInSafeguardWindow(block, this.config.safeguardBlocks)) {
      const availableAt = this.timeBucketing.nextEraStartBlock(block);
      throw new TemporalGate('SAFEGUARD_WINDOW', `Submissions reopen at block ${availableAt}`, availableAt);
    }
    if (profile.lastSubmissionAt !== null) {
      const availableAt = profile.lastSubmissionAt + this.config.submissionDelayBlocks;
      if (block < availableAt) {
        throw new TemporalGate('SUBMISSION_COOLDOWN', `Next ${this.resourceType} possible at block ${availableAt}`, availableAt);
      }
    }

    const { text } = this.config;
    assertText('title', submission.title, text.maxTitleLength);
    assertText('description', submission.description, text.maxDescriptionLength);
    assertText('proofHash', submission.proofHash, text.maxHashLength);

    const resource: Resource = {
      resourceType: this.resourceType,
      id: this.nextId++,
      creator,
      era: this.timeBucketing.currentEra(block),
      valid: true,
      validationCount: 0,
      title: submission.title,
      description: submission.description,
      proofHash: submission.proofHash,
      createdAt: block,
      invalidatedAt: null,
    };
    this.resources.set(resource.id, resource);
    this.engine.updateProfile(creator, { submissions: profile.submissions + 1, lastSubmissionAt: block });
    this.engine.addLevel(creator, 1, `${this.resourceType}:${resource.id}`);

    this.logger.info('Resource submitted', { resourceType: this.resourceType, id: resource.id, creator, era: resource.era });
    return { ...resource };
  }

  describe(id: number): ResourceSnapshot | null {
    const resource = this.resources.get(id);
    if (!resource) {
      return null;
    }
    const { resourceType, creator, era, valid, validationCount } = resource;
    return { resourceType, id, creator, era, valid, validationCount };
  }

  recordChallenge(id: number): number {
    const resource = this.requireResource(id);
    resource.validationCount += 1;
    return resource.validationCount;
  }

  invalidate(id: number): void {
    const resource = this.requireResource(id);
    if (!resource.valid) {
      throw new PreconditionViolation('RESOURCE_ALREADY_INVALID', `${this.resourceType} ${id} is already invalid`);
    }

    const block = this.clock.currentBlock();
    resource.valid = false;
    resource.invalidatedAt = block;
    this.engine.removeLevels(resource.creator, 1, resource.era);

    this.logger.warn('Resource invalidated', { resourceType: this.resourceType, id, creator: resource.creator });
    this.events.publish(
      'ResourceInvalidated',
      { resourceType: this.resourceType, id, creator: resource.creator, era: resource.era },
      block
    );
  }

  withdraw(address: string): WithdrawalResult {
    const account = normalizeAddress(address);
    this.registry.requireActive(account, this.creatorType);
    return this.engine.withdraw(account);
  }

  getResource(id: number): Resource | null {
    const resource = this.resources.get(id);
    return resource ? { ...resource } : null;
  }

  resourcesOf(address: string): Resource[] {
    const creator = normalizeAddress(address);
    return [...this.resources.values()]
      .filter((resource) => resource.creator === creator)
      .map((resource) => ({ ...resource }));
  }

  getParticipant(address: string): Participant<ContributorProfile> | null {
    return this.engine.getParticipant(normalizeAddress(address));
  }

  private requireResource(id: number): Resource {
    const resource = this.resources.get(id);
    if (!resource) {
      throw new PreconditionViolation('RESOURCE_NOT_FOUND', `${this.resourceType} ${id} does not exist`);
    }
    return resource;
  }
}
