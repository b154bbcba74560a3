/**
 * InspectionService Tests
 *
 * Lifecycle, exclusivity, deadlines and invalidation of inspections, and
 * the levels they post for both parties
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RegenerationProtocol } from '../factory/ProtocolBuilder';
import { ManualBlockClock } from '../utils/BlockClock';
import {
  SCORE_16,
  SCORE_20,
  account,
  buildTestProtocol,
  expectRejection,
  registerInspector,
  registerRegenerator,
  runInspection,
} from './helpers/fixtures';

describe('InspectionService', () => {
  let clock: ManualBlockClock;
  let protocol: RegenerationProtocol;

  const regenerator = account(1);
  const inspectors = [11, 12, 13, 14].map(account);

  beforeEach(() => {
    ({ clock, protocol } = buildTestProtocol());
    registerRegenerator(protocol, regenerator);
    for (const inspector of inspectors) {
      registerInspector(protocol, inspector);
    }
  });

  /**
   * Three inspections scoring 16 at blocks 0, 10 and 20, then one scoring 20 at block 30
   */
  function runFourInspections(): number[] {
    const ids: number[] = [];
    [SCORE_16, SCORE_16, SCORE_16, SCORE_20].forEach((result, i) => {
      clock.setBlock(i * 10);
      ids.push(runInspection(protocol, regenerator, inspectors[i], result));
    });
    return ids;
  }

  describe('regenerator levels', () => {
    it('should hold score off-pool until the qualifying inspection', () => {
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(10);
      runInspection(protocol, regenerator, inspectors[1]);

      const participant = protocol.regenerators.requireParticipant(regenerator);
      expect(participant.profile.totalInspections).toBe(2);
      expect(participant.profile.regenerationScore).toBe(32);
      expect(participant.pool).toEqual({ currentEra: 1, level: 0, onContractPool: false });
    });

    it('should post the accumulated score at entry and each later score on its own', () => {
      clock.setBlock(0);
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(10);
      runInspection(protocol, regenerator, inspectors[1]);
      clock.setBlock(20);
      runInspection(protocol, regenerator, inspectors[2]);

      expect(protocol.regenerators.requireParticipant(regenerator).pool).toEqual({
        currentEra: 1,
        level: 48,
        onContractPool: true,
      });

      clock.setBlock(30);
      runInspection(protocol, regenerator, inspectors[3], SCORE_20);

      expect(protocol.regenerators.requireParticipant(regenerator).pool.level).toBe(68);
      expect(protocol.pools.regenerator.getEra(1).totalLevels).toBe(68);
    });

    it('should pay the whole era budget to the only regenerator in the pool', () => {
      runFourInspections();
      clock.setBlock(1_000);

      const result = protocol.regenerators.withdraw(regenerator);

      expect(result).toEqual({ status: 'paid', account: regenerator, era: 1, amount: 31_250_000n, nextEra: 2 });
      expect(protocol.ledger.balanceOf(regenerator)).toBe(31_250_000n);
    });

    it('should give each inspector one level', () => {
      runFourInspections();

      for (const inspector of inspectors) {
        const participant = protocol.inspectors.requireParticipant(inspector);
        expect(participant.pool.level).toBe(1);
        expect(participant.profile.totalInspections).toBe(1);
        expect(participant.profile.activeInspectionId).toBeNull();
      }
      expect(protocol.pools.inspector.getEra(1).totalLevels).toBe(4);
    });

    it('should record the era impact', () => {
      runFourInspections();

      expect(protocol.inspections.eraImpact(1)).toEqual({
        era: 1,
        trees: 110_000,
        biodiversity: 210,
        realizedInspections: 4,
      });
      expect(protocol.inspections.eraImpact(2)).toEqual({ era: 2, trees: 0, biodiversity: 0, realizedInspections: 0 });
    });
  });

  describe('requestInspection', () => {
    it('should open an inspection', () => {
      const inspection = protocol.inspections.requestInspection(regenerator);

      expect(inspection).toMatchObject({ id: 1, status: 'open', regenerator, inspector: null, createdAtEra: 1 });
      expect(protocol.regenerators.requireParticipant(regenerator).profile.pendingInspection).toBe(true);
      expect(protocol.inspections.describe(1)).toBeNull();
    });

    it('should allow one pending inspection at a time', () => {
      protocol.inspections.requestInspection(regenerator);
      clock.setBlock(50);

      expectRejection(() => protocol.inspections.requestInspection(regenerator), 'INSPECTION_PENDING');
    });

    it('should enforce the request cool-down', () => {
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(5);

      const error = expectRejection(() => protocol.inspections.requestInspection(regenerator), 'REQUEST_COOLDOWN');
      expect(error).toMatchObject({ availableAtBlock: 10 });
    });

    it('should only serve regenerators', () => {
      expectRejection(() => protocol.inspections.requestInspection(inspectors[0]), 'WRONG_USER_TYPE');
    });

    it('should expire an overdue accepted inspection before opening a new one', () => {
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);
      clock.setBlock(201);

      const next = protocol.inspections.requestInspection(regenerator);

      expect(next.id).toBe(2);
      expect(protocol.inspections.getInspection(1)).toMatchObject({ status: 'expired', expiredAt: 201 });
      expect(protocol.inspectors.requireParticipant(inspectors[0]).profile.giveUps).toBe(1);
    });
  });

  describe('acceptInspection', () => {
    it('should assign the inspector', () => {
      protocol.inspections.requestInspection(regenerator);

      const inspection = protocol.inspections.acceptInspection(inspectors[0], 1);

      expect(inspection).toMatchObject({ status: 'accepted', inspector: inspectors[0], acceptedAt: 0, acceptedAtEra: 1 });
      expect(protocol.inspectors.requireParticipant(inspectors[0]).profile.activeInspectionId).toBe(1);
      expect(protocol.inspections.describe(1)).toEqual({
        resourceType: 'inspection',
        id: 1,
        creator: inspectors[0],
        era: 1,
        valid: true,
        validationCount: 0,
      });
    });

    it('should not let an inspector inspect the same regenerator twice', () => {
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(10);
      protocol.inspections.requestInspection(regenerator);

      expectRejection(() => protocol.inspections.acceptInspection(inspectors[0], 2), 'REGENERATOR_ALREADY_INSPECTED');
      expect(protocol.inspections.acceptInspection(inspectors[1], 2).status).toBe('accepted');
    });

    it('should keep an inspector on one inspection at a time', () => {
      registerRegenerator(protocol, account(2));
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.requestInspection(account(2));
      protocol.inspections.acceptInspection(inspectors[0], 1);
      clock.setBlock(10);

      expectRejection(() => protocol.inspections.acceptInspection(inspectors[0], 2), 'INSPECTOR_BUSY');
    });

    it('should enforce the delay between acceptances', () => {
      registerRegenerator(protocol, account(2));
      protocol.inspections.requestInspection(account(2));
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(5);

      const error = expectRejection(() => protocol.inspections.acceptInspection(inspectors[0], 1), 'INSPECTOR_COOLDOWN');
      expect(error).toMatchObject({ availableAtBlock: 10 });
    });

    it('should close during the safeguard window', () => {
      clock.setBlock(900);
      protocol.inspections.requestInspection(regenerator);

      const error = expectRejection(() => protocol.inspections.acceptInspection(inspectors[0], 1), 'SAFEGUARD_WINDOW');
      expect(error).toMatchObject({ availableAtBlock: 1_000 });

      clock.setBlock(1_000);
      expect(protocol.inspections.acceptInspection(inspectors[0], 1).acceptedAtEra).toBe(2);
    });

    it('should expire the inspector\'s overdue inspection before taking a new one', () => {
      registerRegenerator(protocol, account(2));
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);
      clock.setBlock(201);
      protocol.inspections.requestInspection(account(2));

      protocol.inspections.acceptInspection(inspectors[0], 2);

      expect(protocol.inspections.getInspection(1)?.status).toBe('expired');
      expect(protocol.inspectors.requireParticipant(inspectors[0]).profile).toMatchObject({
        giveUps: 1,
        activeInspectionId: 2,
      });
      expect(protocol.regenerators.requireParticipant(regenerator).profile.pendingInspection).toBe(false);
    });

    it('should reject a second status change', () => {
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);

      expectRejection(() => protocol.inspections.acceptInspection(inspectors[1], 1), 'INVALID_INSPECTION_STATUS');
      expectRejection(() => protocol.inspections.acceptInspection(inspectors[1], 9), 'INSPECTION_NOT_FOUND');
    });
  });

  describe('realizeInspection', () => {
    beforeEach(() => {
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);
    });

    it('should score the result', () => {
      const inspection = protocol.inspections.realizeInspection(inspectors[0], 1, SCORE_20);

      expect(inspection).toMatchObject({
        status: 'inspected',
        treesResult: 50_000,
        biodiversityResult: 30,
        regenerationScore: 20,
        inspectedAt: 0,
        inspectedAtEra: 1,
      });
      expect(protocol.events.getEvents('InspectionRealized').map((event) => event.payload)).toEqual([
        { inspectionId: 1, regenerator, inspector: inspectors[0], score: 20, era: 1 },
      ]);
    });

    it('should only accept the assigned inspector', () => {
      expectRejection(() => protocol.inspections.realizeInspection(inspectors[1], 1, SCORE_16), 'NOT_INSPECTION_OWNER');
    });

    it('should reject results out of range', () => {
      expectRejection(
        () => protocol.inspections.realizeInspection(inspectors[0], 1, { ...SCORE_16, treesResult: 10_000_001 }),
        'RESULT_OUT_OF_RANGE'
      );
      expectRejection(
        () => protocol.inspections.realizeInspection(inspectors[0], 1, { ...SCORE_16, biodiversityResult: -1 }),
        'RESULT_OUT_OF_RANGE'
      );
      expect(protocol.inspections.getInspection(1)?.status).toBe('accepted');
    });

    it('should reject an overdue realization', () => {
      clock.setBlock(201);

      expectRejection(() => protocol.inspections.realizeInspection(inspectors[0], 1, SCORE_16), 'INSPECTION_EXPIRED');
    });
  });

  describe('expireInspection', () => {
    beforeEach(() => {
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);
    });

    it('should wait for the deadline to pass', () => {
      clock.setBlock(200);

      expectRejection(() => protocol.inspections.expireInspection(1), 'INSPECTION_NOT_EXPIRED');
    });

    it('should count a give-up against the inspector and free the regenerator', () => {
      clock.setBlock(201);

      const inspection = protocol.inspections.expireInspection(1);

      expect(inspection.status).toBe('expired');
      expect(protocol.inspectors.requireParticipant(inspectors[0]).profile).toMatchObject({
        giveUps: 1,
        penalties: 1,
        activeInspectionId: null,
      });
      expect(protocol.regenerators.requireParticipant(regenerator).profile.pendingInspection).toBe(false);
      expect(protocol.inspections.describe(1)).toBeNull();
    });
  });

  describe('give-ups', () => {
    const regenerators = [1, 2, 3, 4, 5].map(account);

    beforeEach(() => {
      ({ clock, protocol } = buildTestProtocol());
      for (const r of regenerators) {
        registerRegenerator(protocol, r);
      }
      registerInspector(protocol, inspectors[0]);
    });

    /**
     * Accept and let expire one inspection of each of the first `count` regenerators
     */
    function giveUp(count: number): number {
      let block = 10;
      for (const r of regenerators.slice(0, count)) {
        clock.setBlock(block);
        const { id } = protocol.inspections.requestInspection(r);
        protocol.inspections.acceptInspection(inspectors[0], id);
        clock.setBlock(block + 201);
        protocol.inspections.expireInspection(id);
        block += 211;
      }
      return block;
    }

    it('should deny the inspector at the last allowed give-up and strip its levels in every era', () => {
      const lateRegenerator = account(6);
      registerRegenerator(protocol, lateRegenerator);
      runInspection(protocol, regenerators[4], inspectors[0]);
      giveUp(3);
      clock.setBlock(1_000);
      runInspection(protocol, lateRegenerator, inspectors[0]);

      const pool = protocol.pools.inspector;
      expect(pool.levelsOf(inspectors[0], 1)).toBe(1);
      expect(pool.levelsOf(inspectors[0], 2)).toBe(1);
      expect(protocol.inspectors.requireParticipant(inspectors[0]).pool.level).toBe(2);

      clock.setBlock(1_010);
      const { id } = protocol.inspections.requestInspection(regenerators[3]);
      protocol.inspections.acceptInspection(inspectors[0], id);
      clock.setBlock(1_211);
      protocol.inspections.expireInspection(id);

      expect(protocol.registry.isDenied(inspectors[0])).toBe(true);
      const participant = protocol.inspectors.requireParticipant(inspectors[0]);
      expect(participant.profile.giveUps).toBe(4);
      expect(participant.denied).toBe(true);
      expect(participant.pool.level).toBe(0);
      expect(pool.levelsOf(inspectors[0], 1)).toBe(0);
      expect(pool.levelsOf(inspectors[0], 2)).toBe(0);
      expect(pool.totalLevelsOf(inspectors[0])).toBe(0);
      expect(pool.getEra(2).totalLevels).toBe(0);
    });

    it('should refuse to silently expire the inspection that would deny the inspector', () => {
      const block = giveUp(3);
      clock.setBlock(block);
      protocol.inspections.requestInspection(regenerators[3]);
      protocol.inspections.requestInspection(regenerators[4]);
      protocol.inspections.acceptInspection(inspectors[0], 4);
      clock.setBlock(block + 201);

      expectRejection(() => protocol.inspections.acceptInspection(inspectors[0], 5), 'INSPECTION_EXPIRED');
      expect(protocol.inspections.getInspection(4)?.status).toBe('accepted');
      expect(protocol.registry.isDenied(inspectors[0])).toBe(false);
    });
  });

  describe('invalidation', () => {
    it('should claw back the levels of an invalidated inspection', () => {
      const ids = runFourInspections();

      protocol.inspections.invalidate(ids[3]);

      expect(protocol.regenerators.requireParticipant(regenerator).pool.level).toBe(48);
      expect(protocol.inspectors.requireParticipant(inspectors[3]).pool.level).toBe(0);
      expect(protocol.inspectors.requireParticipant(inspectors[3]).profile.totalInspections).toBe(0);
      expect(protocol.inspections.eraImpact(1)).toEqual({
        era: 1,
        trees: 60_000,
        biodiversity: 180,
        realizedInspections: 3,
      });
    });

    it('should take the regenerator back out of the pool below the entry count', () => {
      const ids = runFourInspections();
      protocol.inspections.invalidate(ids[3]);

      protocol.inspections.invalidate(ids[0]);

      const participant = protocol.regenerators.requireParticipant(regenerator);
      expect(participant.profile).toMatchObject({ totalInspections: 2, regenerationScore: 32 });
      expect(participant.pool).toEqual({ currentEra: 1, level: 0, onContractPool: false });
      expect(protocol.pools.regenerator.getEra(1).totalLevels).toBe(0);
    });

    it('should reject inspections that are not in progress or realized', () => {
      protocol.inspections.requestInspection(regenerator);

      expectRejection(() => protocol.inspections.invalidate(1), 'INVALID_INSPECTION_STATUS');
      protocol.inspections.acceptInspection(inspectors[0], 1);
      protocol.inspections.invalidate(1);
      expectRejection(() => protocol.inspections.invalidate(1), 'RESOURCE_ALREADY_INVALID');
    });

    it('should cancel the inspection of a denied inspector', () => {
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[0], 1);

      protocol.registry.setToDenied(inspectors[0]);

      expect(protocol.inspections.getInspection(1)?.status).toBe('invalidated');
      expect(protocol.regenerators.requireParticipant(regenerator).profile.pendingInspection).toBe(false);
      clock.setBlock(10);
      expect(protocol.inspections.requestInspection(regenerator).id).toBe(2);
    });

    it('should cancel the open request of a denied regenerator', () => {
      protocol.inspections.requestInspection(regenerator);

      protocol.registry.setToDenied(regenerator);

      expect(protocol.inspections.getInspection(1)?.status).toBe('invalidated');
      expect(protocol.events.getEvents('InspectionInvalidated').map((event) => event.payload)).toEqual([
        { inspectionId: 1, regenerator, inspector: null, previousStatus: 'open', score: 0, era: 1 },
      ]);
    });

    it('should keep tracking a pending request when an earlier inspection is invalidated', () => {
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(20);
      protocol.inspections.requestInspection(regenerator);

      protocol.inspections.invalidate(1);
      protocol.registry.setToDenied(regenerator);

      expect(protocol.inspections.getInspection(2)?.status).toBe('invalidated');
      expectRejection(() => protocol.inspections.acceptInspection(inspectors[1], 2), 'INVALID_INSPECTION_STATUS');
      expect(protocol.inspectors.requireParticipant(inspectors[1]).pool.level).toBe(0);
    });

    it('should still expire an overdue pending inspection after an earlier one is invalidated', () => {
      runInspection(protocol, regenerator, inspectors[0]);
      clock.setBlock(20);
      protocol.inspections.requestInspection(regenerator);
      protocol.inspections.acceptInspection(inspectors[1], 2);

      protocol.inspections.invalidate(1);
      clock.setBlock(300);
      const next = protocol.inspections.requestInspection(regenerator);

      expect(next.id).toBe(3);
      expect(protocol.inspections.getInspection(2)?.status).toBe('expired');
      expect(protocol.inspectors.requireParticipant(inspectors[1]).profile.giveUps).toBe(1);
      expect(protocol.regenerators.requireParticipant(regenerator).profile.pendingInspection).toBe(true);
    });

    it('should not credit a realization to a denied regenerator', () => {
      protocol.registry.setToDenied(regenerator);

      protocol.regenerators.onInspectionRealized({
        inspectionId: 7,
        regenerator,
        inspector: inspectors[0],
        score: 16,
        era: 1,
      });

      const participant = protocol.regenerators.requireParticipant(regenerator);
      expect(participant.profile).toMatchObject({ totalInspections: 0, regenerationScore: 0 });
      expect(participant.pool.level).toBe(0);
      expect(protocol.pools.regenerator.levelsOf(regenerator, 1)).toBe(0);
    });
  });
});
