/**
 * Inspection Service
 *
 * Inspection lifecycle: Open -> Accepted -> Inspected, with Expired when an
 * accepted inspection misses its deadline and Invalidated through governance
 * or the denial of either party.
 *
 * Deadlines are evaluated lazily: an overdue inspection is expired by
 * `expireInspection` or by the next request or acceptance that runs into it.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { TimeBucketingService } from './TimeBucketingService';
import { DomainEventBus, DomainEventMap } from './DomainEventBus';
import { CommunityRegistryService } from './CommunityRegistryService';
import { RegeneratorRules } from './RegeneratorRules';
import { InspectorRules } from './InspectorRules';
import { ScoringTable } from './ScoringTable';
import { IResourceHandler } from './interfaces/IResourceHandler';
import { InspectionConfig, TextLimits } from './ProtocolConfig';
import { EraImpact, Inspection, InspectionResult, ResourceSnapshot } from './types';
import { PreconditionViolation, TemporalGate } from './errors';

export interface InspectionServiceDependencies {
  clock: IBlockClock;
  timeBucketing: TimeBucketingService;
  events: DomainEventBus;
  registry: CommunityRegistryService;
  regenerators: RegeneratorRules;
  inspectors: InspectorRules;
  scoring: ScoringTable;
}

export interface InspectionServiceConfig {
  inspection: InspectionConfig;
  text: TextLimits;
  safeguardBlocks: number;
}

export class InspectionService implements IResourceHandler {
  readonly resourceType = 'inspection' as const;

  private logger: ILogger;
  private clock: IBlockClock;
  private timeBucketing: TimeBucketingService;
  private events: DomainEventBus;
  private registry: CommunityRegistryService;
  private regenerators: RegeneratorRules;
  private inspectors: InspectorRules;
  private scoring: ScoringTable;
  private config: InspectionConfig;
  private text: TextLimits;
  private safeguardBlocks: number;

  private inspections: Map<number, Inspection> = new Map();
  /** regenerator -> its open or accepted inspection */
  private pendingByRegenerator: Map<string, number> = new Map();
  private impacts: Map<number, EraImpact> = new Map();
  private nextId = 1;

  constructor(logger: ILogger, dependencies: InspectionServiceDependencies, config: InspectionServiceConfig) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.timeBucketing = dependencies.timeBucketing;
    this.events = dependencies.events;
    this.registry = dependencies.registry;
    this.regenerators = dependencies.regenerators;
    this.inspectors = dependencies.inspectors;
    this.scoring = dependencies.scoring;
    this.config = config.inspection;
    this.text = config.text;
    this.safeguardBlocks = config.safeguardBlocks;
  }

  requestInspection(regeneratorAddress: string): Inspection {
    const regenerator = normalizeAddress(regeneratorAddress);
    this.registry.requireActive(regenerator, 'regenerator');
    const block = this.clock.currentBlock();

    const pending = this.pendingOf(regenerator);
    const stale = pending !== null && this.isOverdue(pending, block) ? pending : null;
    this.regenerators.assertCanRequest(regenerator, stale !== null);

    if (stale) {
      this.expire(stale, block);
    }

    const inspection: Inspection = {
      id: this.nextId++,
      status: 'open',
      regenerator,
      inspector: null,
      treesResult: 0,
      biodiversityResult: 0,
      regenerationScore: 0,
      evidenceHash: '',
      justificationHash: '',
      createdAt: block,
      createdAtEra: this.timeBucketing.currentEra(block),
      acceptedAt: null,
      acceptedAtEra: null,
      inspectedAt: null,
      inspectedAtEra: null,
      expiredAt: null,
      invalidatedAt: null,
      validationCount: 0,
    };
    this.inspections.set(inspection.id, inspection);
    this.pendingByRegenerator.set(regenerator, inspection.id);
    this.regenerators.markInspectionRequested(regenerator);

    this.logger.info('Inspection requested', { inspectionId: inspection.id, regenerator });
    return { ...inspection };
  }

  acceptInspection(inspectorAddress: string, inspectionId: number): Inspection {
    const inspector = normalizeAddress(inspectorAddress);
    this.registry.requireActive(inspector, 'inspector');
    const inspection = this.requireInspection(inspectionId);
    const block = this.clock.currentBlock();

    this.assertStatus(inspection, 'open');
    if (this.timeBucketing.isInSafeguardWindow(block, this.safeguardBlocks)) {
      const availableAt = this.timeBucketing.nextEraStartBlock(block);
      throw new TemporalGate('SAFEGUARD_WINDOW', `Inspections can be accepted again from block ${availableAt}`, availableAt);
    }

    const { profile } = this.inspectors.requireParticipant(inspector);
    const active = profile.activeInspectionId === null ? null : this.inspections.get(profile.activeInspectionId) ?? null;
    const stale = active !== null && this.isOverdue(active, block) ? active : null;
    if (stale && this.inspectors.isLastGiveUp(inspector)) {
      throw new PreconditionViolation(
        'INSPECTION_EXPIRED',
        `Inspection ${stale.id} is overdue; expire it before accepting another`
      );
    }
    this.inspectors.assertCanAccept(inspector, inspection.regenerator, stale !== null);

    if (stale) {
      this.expire(stale, block);
    }

    inspection.status = 'accepted';
    inspection.inspector = inspector;
    inspection.acceptedAt = block;
    inspection.acceptedAtEra = this.timeBucketing.currentEra(block);
    this.inspectors.markAccepted(inspector, inspection.id, inspection.regenerator);

    this.logger.info('Inspection accepted', { inspectionId: inspection.id, inspector, regenerator: inspection.regenerator });
    return { ...inspection };
  }

  realizeInspection(inspectorAddress: string, inspectionId: number, result: InspectionResult): Inspection {
    const inspector = normalizeAddress(inspectorAddress);
    this.registry.requireActive(inspector, 'inspector');
    const inspection = this.requireInspection(inspectionId);
    const block = this.clock.currentBlock();

    this.assertStatus(inspection, 'accepted');
    if (inspection.inspector !== inspector) {
      throw new PreconditionViolation('NOT_INSPECTION_OWNER', `Inspection ${inspectionId} belongs to another inspector`);
    }
    if (this.isOverdue(inspection, block)) {
      throw new PreconditionViolation('INSPECTION_EXPIRED', `Inspection ${inspectionId} passed its deadline`);
    }
    this.assertResult('treesResult', result.treesResult, this.config.maxTreesResult);
    this.assertResult('biodiversityResult', result.biodiversityResult, this.config.maxBiodiversityResult);
    assertText('evidenceHash', result.evidenceHash, this.text.maxHashLength);
    assertText('justificationHash', result.justificationHash, this.text.maxJustificationLength);

    const era = this.timeBucketing.currentEra(block);
    const score = this.scoring.score(result.treesResult, result.biodiversityResult);

    inspection.status = 'inspected';
    inspection.treesResult = result.treesResult;
    inspection.biodiversityResult = result.biodiversityResult;
    inspection.regenerationScore = score;
    inspection.evidenceHash = result.evidenceHash;
    inspection.justificationHash = result.justificationHash;
    inspection.inspectedAt = block;
    inspection.inspectedAtEra = era;
    // votes cast while accepted belonged to the acceptance era
    inspection.validationCount = 0;
    this.releasePending(inspection);

    const impact = this.impactOf(era);
    impact.trees += result.treesResult;
    impact.biodiversity += result.biodiversityResult;
    impact.realizedInspections += 1;

    this.logger.info('Inspection realized', { inspectionId, inspector, regenerator: inspection.regenerator, score, era });
    this.events.publish(
      'InspectionRealized',
      { inspectionId, regenerator: inspection.regenerator, inspector, score, era },
      block
    );
    return { ...inspection };
  }

  /**
   * Close an accepted inspection that missed its deadline. Anyone may call it.
   */
  expireInspection(inspectionId: number): Inspection {
    const inspection = this.requireInspection(inspectionId);
    const block = this.clock.currentBlock();

    this.assertStatus(inspection, 'accepted');
    if (!this.isOverdue(inspection, block)) {
      throw new PreconditionViolation(
        'INSPECTION_NOT_EXPIRED',
        `Inspection ${inspectionId} is within its deadline until block ${this.deadlineOf(inspection)}`
      );
    }

    this.expire(inspection, block);
    return { ...inspection };
  }

  describe(id: number): ResourceSnapshot | null {
    const inspection = this.inspections.get(id);
    if (!inspection || inspection.inspector === null) {
      return null;
    }
    const era = inspection.inspectedAtEra ?? inspection.acceptedAtEra;
    if (era === null || inspection.status === 'expired') {
      return null;
    }
    return {
      resourceType: 'inspection',
      id,
      creator: inspection.inspector,
      era,
      valid: inspection.status !== 'invalidated',
      validationCount: inspection.validationCount,
    };
  }

  recordChallenge(id: number): number {
    const inspection = this.requireInspection(id);
    inspection.validationCount += 1;
    return inspection.validationCount;
  }

  /**
   * Governance invalidation of an accepted or inspected inspection
   */
  invalidate(id: number): void {
    const inspection = this.requireInspection(id);
    if (inspection.status === 'invalidated') {
      throw new PreconditionViolation('RESOURCE_ALREADY_INVALID', `Inspection ${id} is already invalid`);
    }
    if (inspection.status !== 'accepted' && inspection.status !== 'inspected') {
      throw new PreconditionViolation('INVALID_INSPECTION_STATUS', `Inspection ${id} is ${inspection.status}`);
    }
    this.invalidateInspection(inspection, this.clock.currentBlock());
  }

  /**
   * A denied regenerator or inspector leaves no inspection in progress
   */
  onUserDenied(event: DomainEventMap['UserDenied'], block: number): void {
    const { account, userType } = event;
    let inspection: Inspection | null = null;

    if (userType === 'regenerator') {
      inspection = this.pendingOf(account);
    } else if (userType === 'inspector') {
      const participant = this.inspectors.getParticipant(account);
      const activeId = participant?.profile.activeInspectionId ?? null;
      inspection = activeId === null ? null : this.inspections.get(activeId) ?? null;
    }

    if (inspection && (inspection.status === 'open' || inspection.status === 'accepted')) {
      this.logger.info('Cancelling inspection of denied user', { inspectionId: inspection.id, account, userType });
      this.invalidateInspection(inspection, block);
    }
  }

  getInspection(id: number): Inspection | null {
    const inspection = this.inspections.get(id);
    return inspection ? { ...inspection } : null;
  }

  /**
   * Inspections the account took part in, as regenerator or inspector, by id
   */
  inspectionsOf(address: string): Inspection[] {
    const account = normalizeAddress(address);
    return [...this.inspections.values()]
      .filter((inspection) => inspection.regenerator === account || inspection.inspector === account)
      .map((inspection) => ({ ...inspection }));
  }

  eraImpact(era: number): EraImpact {
    const impact = this.impacts.get(era);
    return impact ? { ...impact } : { era, trees: 0, biodiversity: 0, realizedInspections: 0 };
  }

  totalInspections(): number {
    return this.inspections.size;
  }

  private expire(inspection: Inspection, block: number): void {
    const inspector = inspection.inspector;
    if (inspector === null) {
      throw new PreconditionViolation('INVALID_INSPECTION_STATUS', `Inspection ${inspection.id} was never accepted`);
    }

    inspection.status = 'expired';
    inspection.expiredAt = block;
    if (this.releasePending(inspection)) {
      this.regenerators.clearPendingInspection(inspection.regenerator);
    }

    this.logger.warn('Inspection expired', { inspectionId: inspection.id, inspector, regenerator: inspection.regenerator });
    this.events.publish(
      'InspectionExpired',
      { inspectionId: inspection.id, regenerator: inspection.regenerator, inspector },
      block
    );
  }

  private invalidateInspection(inspection: Inspection, block: number): void {
    const previousStatus = inspection.status;
    const era = inspection.inspectedAtEra ?? inspection.acceptedAtEra ?? inspection.createdAtEra;

    inspection.status = 'invalidated';
    inspection.invalidatedAt = block;
    this.releasePending(inspection);

    if (previousStatus === 'inspected') {
      const impact = this.impactOf(era);
      impact.trees -= inspection.treesResult;
      impact.biodiversity -= inspection.biodiversityResult;
      impact.realizedInspections -= 1;
    }

    this.logger.warn('Inspection invalidated', { inspectionId: inspection.id, previousStatus, era });
    this.events.publish(
      'InspectionInvalidated',
      {
        inspectionId: inspection.id,
        regenerator: inspection.regenerator,
        inspector: inspection.inspector,
        previousStatus,
        score: inspection.regenerationScore,
        era,
      },
      block
    );
  }

  /**
   * Drop the regenerator's pending entry if it still points at this inspection
   */
  private releasePending(inspection: Inspection): boolean {
    if (this.pendingByRegenerator.get(inspection.regenerator) !== inspection.id) {
      return false;
    }
    this.pendingByRegenerator.delete(inspection.regenerator);
    return true;
  }

  private pendingOf(regenerator: string): Inspection | null {
    const id = this.pendingByRegenerator.get(regenerator);
    return id === undefined ? null : this.inspections.get(id) ?? null;
  }

  private isOverdue(inspection: Inspection, block: number): boolean {
    return inspection.status === 'accepted' && block > this.deadlineOf(inspection);
  }

  private deadlineOf(inspection: Inspection): number {
    return (inspection.acceptedAt ?? inspection.createdAt) + this.config.inspectionDeadlineBlocks;
  }

  private requireInspection(id: number): Inspection {
    const inspection = this.inspections.get(id);
    if (!inspection) {
      throw new PreconditionViolation('INSPECTION_NOT_FOUND', `Inspection ${id} does not exist`);
    }
    return inspection;
  }

  private assertStatus(inspection: Inspection, expected: Inspection['status']): void {
    if (inspection.status !== expected) {
      throw new PreconditionViolation(
        'INVALID_INSPECTION_STATUS',
        `Inspection ${inspection.id} is ${inspection.status}, expected ${expected}`
      );
    }
  }

  private assertResult(field: string, value: number, max: number): void {
    if (!Number.isSafeInteger(value) || value < 0 || value > max) {
      throw new PreconditionViolation('RESULT_OUT_OF_RANGE', `${field} must be an integer between 0 and ${max}`);
    }
  }

  private impactOf(era: number): EraImpact {
    let impact = this.impacts.get(era);
    if (!impact) {
      impact = { era, trees: 0, biodiversity: 0, realizedInspections: 0 };
      this.impacts.set(era, impact);
    }
    return impact;
  }
}
