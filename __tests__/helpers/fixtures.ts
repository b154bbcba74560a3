/**
 * Shared test fixtures
 */

import { expect } from '@jest/globals';
import { ConsoleLogger, ILogger } from '../../utils/ILogger';
import { ManualBlockClock } from '../../utils/BlockClock';
import { ProtocolBuilder, RegenerationProtocol } from '../../factory/ProtocolBuilder';
import { ProtocolConfigOverrides } from '../../ProtocolConfig';
import { InspectionResult } from '../../types';
import { ProtocolError, ProtocolErrorCode, isProtocolError } from '../../errors';

/**
 * Digit-only addresses are their own checksum form
 */
export function account(n: number): string {
  return '0x' + String(n).padStart(40, '0');
}

export function testLogger(): ILogger {
  return new ConsoleLogger('Test', 'error');
}

/**
 * Short eras and delays so scenarios fit in a few hundred blocks.
 * Era 1 spans blocks 0-999; its safeguard window starts at block 900.
 */
export const TEST_OVERRIDES: ProtocolConfigOverrides = {
  blocksPerEra: 1_000,
  inspection: {
    interInspectionDelayBlocks: 10,
    inspectionDeadlineBlocks: 200,
    requestCooldownBlocks: 10,
  },
  governance: {
    safeguardBlocks: 100,
    voteIntervalBlocks: 5,
  },
  contributions: {
    submissionDelayBlocks: { report: 10, research: 10, contribution: 10 },
  },
};

export interface TestProtocol {
  clock: ManualBlockClock;
  protocol: RegenerationProtocol;
}

export function buildTestProtocol(overrides: ProtocolConfigOverrides = {}, startBlock: number = 0): TestProtocol {
  const clock = new ManualBlockClock(startBlock);
  const protocol = new ProtocolBuilder()
    .withClock(clock)
    .withLogger(testLogger())
    .withConfig(TEST_OVERRIDES)
    .withConfig(overrides)
    .build();
  return { clock, protocol };
}

/**
 * 20 000 trees and 60 species: 8 + 8 points
 */
export const SCORE_16: InspectionResult = {
  treesResult: 20_000,
  biodiversityResult: 60,
  evidenceHash: 'evidence-hash',
  justificationHash: 'justification-hash',
};

/**
 * 50 000 trees and 30 species: 16 + 4 points
 */
export const SCORE_20: InspectionResult = {
  treesResult: 50_000,
  biodiversityResult: 30,
  evidenceHash: 'evidence-hash',
  justificationHash: 'justification-hash',
};

export function registerRegenerator(protocol: RegenerationProtocol, address: string): void {
  protocol.regenerators.register(address, { name: 'Regenerator', totalArea: 5_000, proofPhotoHash: 'photo-hash' });
}

export function registerInspector(protocol: RegenerationProtocol, address: string): void {
  protocol.inspectors.register(address, { name: 'Inspector', proofPhotoHash: 'photo-hash' });
}

/**
 * Request, accept and realize one inspection at the current block
 */
export function runInspection(
  protocol: RegenerationProtocol,
  regenerator: string,
  inspector: string,
  result: InspectionResult = SCORE_16
): number {
  const { id } = protocol.inspections.requestInspection(regenerator);
  protocol.inspections.acceptInspection(inspector, id);
  protocol.inspections.realizeInspection(inspector, id, result);
  return id;
}

/**
 * Run `fn`, assert it throws a protocol error with `code` and return it
 */
export function expectRejection(fn: () => unknown, code: ProtocolErrorCode): ProtocolError {
  let caught: unknown = null;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!isProtocolError(caught)) {
    throw new Error(`Expected protocol error ${code}, got ${String(caught)}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}
