/**
 * Inspector Rules
 *
 * Inspectors earn one level per realized inspection. Letting an accepted
 * inspection run past its deadline is a give-up; reaching `maxGiveUps`
 * denies the inspector.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { RulesEngine, Participant } from './RulesEngine';
import { CommunityRegistryService } from './CommunityRegistryService';
import { DomainEventMap } from './DomainEventBus';
import { InspectionConfig, TextLimits } from './ProtocolConfig';
import { InspectorProfile, WithdrawalResult } from './types';
import { ConsistencyViolation, PreconditionViolation, TemporalGate } from './errors';

export interface InspectorRegistration {
  name: string;
  proofPhotoHash: string;
}

export interface InspectorRulesDependencies {
  engine: RulesEngine<InspectorProfile>;
  registry: CommunityRegistryService;
  clock: IBlockClock;
}

export class InspectorRules {
  private logger: ILogger;
  private engine: RulesEngine<InspectorProfile>;
  private registry: CommunityRegistryService;
  private clock: IBlockClock;
  private config: InspectionConfig;
  private text: TextLimits;

  constructor(
    logger: ILogger,
    dependencies: InspectorRulesDependencies,
    config: { inspection: InspectionConfig; text: TextLimits }
  ) {
    this.logger = logger;
    this.engine = dependencies.engine;
    this.registry = dependencies.registry;
    this.clock = dependencies.clock;
    this.config = config.inspection;
    this.text = config.text;
  }

  register(address: string, registration: InspectorRegistration): Participant<InspectorProfile> {
    const account = normalizeAddress(address);
    assertText('name', registration.name, this.text.maxNameLength);
    assertText('proofPhotoHash', registration.proofPhotoHash, this.text.maxHashLength);

    this.registry.addUser(account, 'inspector');
    return this.engine.enroll(account, {
      name: registration.name,
      proofPhotoHash: registration.proofPhotoHash,
      totalInspections: 0,
      giveUps: 0,
      penalties: 0,
      lastAcceptedAt: null,
      lastRealizedAt: null,
      activeInspectionId: null,
      inspectedRegenerators: [],
    });
  }

  /**
   * Throws unless the inspector may take an inspection of `regenerator`.
   * `activeResolvable` tells it the active inspection is about to expire.
   */
  assertCanAccept(account: string, regenerator: string, activeResolvable: boolean = false): void {
    const { profile } = this.engine.requireParticipant(account);
    const block = this.clock.currentBlock();

    if (profile.activeInspectionId !== null && !activeResolvable) {
      throw new PreconditionViolation(
        'INSPECTOR_BUSY',
        `${account} is already on inspection ${profile.activeInspectionId}`
      );
    }
    if (profile.lastAcceptedAt !== null) {
      const availableAt = profile.lastAcceptedAt + this.config.interInspectionDelayBlocks;
      if (block < availableAt) {
        throw new TemporalGate('INSPECTOR_COOLDOWN', `Next acceptance possible at block ${availableAt}`, availableAt);
      }
    }
    if (profile.inspectedRegenerators.includes(regenerator)) {
      throw new PreconditionViolation(
        'REGENERATOR_ALREADY_INSPECTED',
        `${account} has already inspected ${regenerator}`
      );
    }
  }

  /**
   * Whether one more give-up would deny the inspector
   */
  isLastGiveUp(account: string): boolean {
    return this.engine.requireParticipant(account).profile.giveUps + 1 >= this.config.maxGiveUps;
  }

  markAccepted(account: string, inspectionId: number, regenerator: string): void {
    const { profile } = this.engine.requireParticipant(account);
    this.engine.updateProfile(account, {
      activeInspectionId: inspectionId,
      lastAcceptedAt: this.clock.currentBlock(),
      inspectedRegenerators: [...profile.inspectedRegenerators, regenerator],
    });
  }

  onInspectionRealized(event: DomainEventMap['InspectionRealized']): void {
    const { inspector, inspectionId } = event;
    const { profile } = this.engine.requireParticipant(inspector);
    this.engine.updateProfile(inspector, {
      totalInspections: profile.totalInspections + 1,
      lastRealizedAt: this.clock.currentBlock(),
      activeInspectionId: null,
    });
    this.engine.addLevel(inspector, 1, `inspection:${inspectionId}:inspector`);
  }

  onInspectionExpired(event: DomainEventMap['InspectionExpired']): void {
    const { inspector, inspectionId } = event;
    const { profile } = this.engine.requireParticipant(inspector);
    const giveUps = profile.giveUps + 1;

    this.engine.updateProfile(inspector, {
      giveUps,
      penalties: profile.penalties + 1,
      activeInspectionId: null,
    });
    this.logger.warn('Inspector gave up an inspection', { inspector, inspectionId, giveUps });

    if (giveUps >= this.config.maxGiveUps && !this.registry.isDenied(inspector)) {
      this.registry.setToDenied(inspector);
    }
  }

  onInspectionInvalidated(event: DomainEventMap['InspectionInvalidated']): void {
    const { inspector, previousStatus, era } = event;
    if (inspector === null) {
      return;
    }
    const { profile } = this.engine.requireParticipant(inspector);

    if (previousStatus !== 'inspected') {
      this.engine.updateProfile(inspector, { activeInspectionId: null });
      return;
    }

    if (profile.totalInspections <= 0) {
      throw new ConsistencyViolation('COUNTER_UNDERFLOW', `${inspector} has no realized inspection to roll back`);
    }
    this.engine.updateProfile(inspector, { totalInspections: profile.totalInspections - 1 });
    this.engine.removeLevels(inspector, 1, era);
  }

  withdraw(address: string): WithdrawalResult {
    const account = normalizeAddress(address);
    this.registry.requireActive(account, 'inspector');
    return this.engine.withdraw(account);
  }

  getParticipant(address: string): Participant<InspectorProfile> | null {
    return this.engine.getParticipant(normalizeAddress(address));
  }

  requireParticipant(address: string): Participant<InspectorProfile> {
    return this.engine.requireParticipant(normalizeAddress(address));
  }
}
