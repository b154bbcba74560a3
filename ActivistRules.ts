/**
 * Activist Rules
 *
 * Activists grow the network. An activist earns one level when a
 * regenerator or inspector it invited completes enough realized
 * inspections to enter its own pool.
 */

import { ILogger } from './utils/ILogger';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { RulesEngine, Participant } from './RulesEngine';
import { CommunityRegistryService } from './CommunityRegistryService';
import { RegeneratorRules } from './RegeneratorRules';
import { InspectorRules } from './InspectorRules';
import { DomainEventMap } from './DomainEventBus';
import { InspectionConfig, TextLimits } from './ProtocolConfig';
import { WithdrawalResult } from './types';

export interface ActivistProfile {
  name: string;
  proofPhotoHash: string;
  /** Invitees that reached their qualifying inspection */
  approvedInvites: string[];
}

export interface ActivistRegistration {
  name: string;
  proofPhotoHash: string;
}

export interface ActivistRulesDependencies {
  engine: RulesEngine<ActivistProfile>;
  registry: CommunityRegistryService;
  regenerators: RegeneratorRules;
  inspectors: InspectorRules;
}

export class ActivistRules {
  private logger: ILogger;
  private engine: RulesEngine<ActivistProfile>;
  private registry: CommunityRegistryService;
  private regenerators: RegeneratorRules;
  private inspectors: InspectorRules;
  private config: InspectionConfig;
  private text: TextLimits;

  constructor(
    logger: ILogger,
    dependencies: ActivistRulesDependencies,
    config: { inspection: InspectionConfig; text: TextLimits }
  ) {
    this.logger = logger;
    this.engine = dependencies.engine;
    this.registry = dependencies.registry;
    this.regenerators = dependencies.regenerators;
    this.inspectors = dependencies.inspectors;
    this.config = config.inspection;
    this.text = config.text;
  }

  register(address: string, registration: ActivistRegistration): Participant<ActivistProfile> {
    const account = normalizeAddress(address);
    assertText('name', registration.name, this.text.maxNameLength);
    assertText('proofPhotoHash', registration.proofPhotoHash, this.text.maxHashLength);

    this.registry.addUser(account, 'activist');
    return this.engine.enroll(account, {
      name: registration.name,
      proofPhotoHash: registration.proofPhotoHash,
      approvedInvites: [],
    });
  }

  /**
   * Runs after the regenerator and inspector handlers, so both profiles
   * already count this inspection.
   */
  onInspectionRealized(event: DomainEventMap['InspectionRealized']): void {
    const regenerator = this.regenerators.requireParticipant(event.regenerator);
    if (regenerator.profile.totalInspections === this.config.minInspectionsToEnterPool) {
      this.rewardInviterOf(event.regenerator);
    }

    const inspector = this.inspectors.requireParticipant(event.inspector);
    if (inspector.profile.totalInspections === this.config.minInspectionsToEnterPool) {
      this.rewardInviterOf(event.inspector);
    }
  }

  withdraw(address: string): WithdrawalResult {
    const account = normalizeAddress(address);
    this.registry.requireActive(account, 'activist');
    return this.engine.withdraw(account);
  }

  getParticipant(address: string): Participant<ActivistProfile> | null {
    return this.engine.getParticipant(normalizeAddress(address));
  }

  private rewardInviterOf(invitee: string): void {
    const inviter = this.registry.inviterOf(invitee);
    if (!inviter || this.registry.userTypeOf(inviter) !== 'activist' || !this.engine.isEnrolled(inviter)) {
      return;
    }

    const applied = this.engine.addLevel(inviter, 1, `activist:${invitee}`);
    if (applied) {
      const { profile } = this.engine.requireParticipant(inviter);
      this.engine.updateProfile(inviter, { approvedInvites: [...profile.approvedInvites, invitee] });
      this.logger.info('Activist rewarded for invitee', { activist: inviter, invitee });
    }
  }
}
