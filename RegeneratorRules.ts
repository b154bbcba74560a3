/**
 * Regenerator Rules
 *
 * Regenerators earn levels from realized inspections, but only once they
 * are established: the first inspections accumulate score off-pool, the
 * inspection that reaches `minInspectionsToEnterPool` posts the whole
 * accumulated score at once, and every later one posts its own score.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { RulesEngine, Participant } from './RulesEngine';
import { CommunityRegistryService } from './CommunityRegistryService';
import { DomainEventMap } from './DomainEventBus';
import { InspectionConfig, TextLimits } from './ProtocolConfig';
import { RegeneratorProfile, WithdrawalResult } from './types';
import { ConsistencyViolation, PreconditionViolation, TemporalGate } from './errors';

export interface RegeneratorRegistration {
  name: string;
  totalArea: number;
  proofPhotoHash: string;
}

export interface RegeneratorRulesDependencies {
  engine: RulesEngine<RegeneratorProfile>;
  registry: CommunityRegistryService;
  clock: IBlockClock;
}

export class RegeneratorRules {
  private logger: ILogger;
  private engine: RulesEngine<RegeneratorProfile>;
  private registry: CommunityRegistryService;
  private clock: IBlockClock;
  private config: InspectionConfig;
  private text: TextLimits;

  constructor(
    logger: ILogger,
    dependencies: RegeneratorRulesDependencies,
    config: { inspection: InspectionConfig; text: TextLimits }
  ) {
    this.logger = logger;
    this.engine = dependencies.engine;
    this.registry = dependencies.registry;
    this.clock = dependencies.clock;
    this.config = config.inspection;
    this.text = config.text;
  }

  register(address: string, registration: RegeneratorRegistration): Participant<RegeneratorProfile> {
    const account = normalizeAddress(address);
    assertText('name', registration.name, this.text.maxNameLength);
    assertText('proofPhotoHash', registration.proofPhotoHash, this.text.maxHashLength);

    const { totalArea } = registration;
    if (!Number.isSafeInteger(totalArea) || totalArea < this.config.minArea || totalArea > this.config.maxArea) {
      throw new PreconditionViolation(
        'AREA_OUT_OF_BOUNDS',
        `Area must be between ${this.config.minArea} and ${this.config.maxArea} m², got ${totalArea}`
      );
    }

    this.registry.addUser(account, 'regenerator');
    return this.engine.enroll(account, {
      name: registration.name,
      totalArea,
      proofPhotoHash: registration.proofPhotoHash,
      pendingInspection: false,
      totalInspections: 0,
      lastRequestAt: null,
      regenerationScore: 0,
    });
  }

  /**
   * Throws unless the regenerator may open a new inspection request.
   * `pendingResolvable` tells it the pending inspection is about to expire.
   */
  assertCanRequest(account: string, pendingResolvable: boolean = false): void {
    const { profile } = this.engine.requireParticipant(account);
    const block = this.clock.currentBlock();

    if (profile.pendingInspection && !pendingResolvable) {
      throw new PreconditionViolation('INSPECTION_PENDING', `${account} already has an inspection in progress`);
    }
    if (profile.totalInspections >= this.config.maxInspections) {
      throw new PreconditionViolation(
        'INSPECTION_LIMIT_REACHED',
        `${account} has used all ${this.config.maxInspections} inspections`
      );
    }
    if (profile.lastRequestAt !== null) {
      const availableAt = profile.lastRequestAt + this.config.requestCooldownBlocks;
      if (block < availableAt) {
        throw new TemporalGate('REQUEST_COOLDOWN', `Next request possible at block ${availableAt}`, availableAt);
      }
    }
  }

  markInspectionRequested(account: string): void {
    this.engine.updateProfile(account, {
      pendingInspection: true,
      lastRequestAt: this.clock.currentBlock(),
    });
  }

  clearPendingInspection(account: string): void {
    this.engine.updateProfile(account, { pendingInspection: false });
  }

  onInspectionRealized(event: DomainEventMap['InspectionRealized']): void {
    const { regenerator, inspectionId, score } = event;
    const { profile, denied } = this.engine.requireParticipant(regenerator);
    if (denied) {
      this.logger.warn('Inspection realized for denied regenerator ignored', { regenerator, inspectionId });
      return;
    }
    const totalInspections = profile.totalInspections + 1;
    const regenerationScore = profile.regenerationScore + score;

    this.engine.updateProfile(regenerator, {
      totalInspections,
      regenerationScore,
      pendingInspection: false,
    });

    const threshold = this.config.minInspectionsToEnterPool;
    if (totalInspections < threshold) {
      this.logger.info('Score accumulated before pool entry', { regenerator, totalInspections, regenerationScore });
      return;
    }

    const amount = totalInspections === threshold ? regenerationScore : score;
    if (totalInspections === threshold) {
      this.engine.setOnContractPool(regenerator, true);
      this.logger.info('Regenerator entered the pool', { regenerator, regenerationScore });
    }
    if (amount > 0) {
      this.engine.addLevel(regenerator, amount, `inspection:${inspectionId}:regenerator`);
    }
  }

  onInspectionInvalidated(event: DomainEventMap['InspectionInvalidated']): void {
    const { regenerator, previousStatus, score, era } = event;
    if (previousStatus === 'inspected') {
      const clawback = this.decrementInspections(regenerator, score);
      this.removeInspectionLevels(regenerator, clawback, era);
    } else if (this.engine.isEnrolled(regenerator)) {
      this.clearPendingInspection(regenerator);
    }
  }

  /**
   * Roll back one realized inspection. Returns the pool levels that no
   * longer correspond to the regenerator's record.
   */
  decrementInspections(address: string, score: number): number {
    const account = normalizeAddress(address);
    const { profile } = this.engine.requireParticipant(account);
    const postedBefore = this.postedLevel(profile.totalInspections, profile.regenerationScore);

    const totalInspections = profile.totalInspections - 1;
    const regenerationScore = profile.regenerationScore - score;
    if (totalInspections < 0 || regenerationScore < 0) {
      throw new ConsistencyViolation('COUNTER_UNDERFLOW', `${account} has no realized inspection worth ${score}`, {
        totalInspections: profile.totalInspections,
        regenerationScore: profile.regenerationScore,
      });
    }
    this.engine.updateProfile(account, { totalInspections, regenerationScore });

    const postedAfter = this.postedLevel(totalInspections, regenerationScore);
    if (totalInspections < this.config.minInspectionsToEnterPool) {
      this.engine.setOnContractPool(account, false);
    }
    return postedBefore - postedAfter;
  }

  removeInspectionLevels(address: string, amount: number, era: number): void {
    if (amount <= 0) {
      return;
    }
    const account = normalizeAddress(address);
    this.engine.removeLevels(account, amount, era);
    this.logger.info('Inspection levels clawed back', { regenerator: account, amount, era });
  }

  withdraw(address: string): WithdrawalResult {
    const account = normalizeAddress(address);
    this.registry.requireActive(account, 'regenerator');
    return this.engine.withdraw(account);
  }

  getParticipant(address: string): Participant<RegeneratorProfile> | null {
    return this.engine.getParticipant(normalizeAddress(address));
  }

  requireParticipant(address: string): Participant<RegeneratorProfile> {
    return this.engine.requireParticipant(normalizeAddress(address));
  }

  private postedLevel(totalInspections: number, regenerationScore: number): number {
    return totalInspections >= this.config.minInspectionsToEnterPool ? regenerationScore : 0;
  }
}
