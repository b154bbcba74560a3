/**
 * Regeneration Credit Protocol
 *
 * Deterministic accounting core: era bucketing, halving reward pools,
 * the community registry, the inspection lifecycle and era-bounded
 * governance. Time comes from an injected block clock and tokens move
 * through an injected ledger.
 */

// Core Interfaces
export * from './interfaces';

// Types
export * from './types';
export * from './errors';

// Utilities
export * from './utils/ILogger';
export * from './utils/BlockClock';
export * from './utils/address';

// Adapters
export * from './adapters';

// Configuration
export * from './ProtocolConfig';
export * from './ConfigValidator';

// Services
export * from './TimeBucketingService';
export * from './RewardPoolService';
export * from './RulesEngine';
export * from './InvariantChecker';
export * from './DomainEventBus';
export * from './ParticipantDirectory';
export * from './InvitationGuard';
export * from './CommunityRegistryService';
export * from './ScoringTable';
export * from './RegeneratorRules';
export * from './InspectorRules';
export * from './ActivistRules';
export * from './InspectionService';
export * from './ContributionService';
export * from './GovernanceService';
export * from './DelationService';
export * from './SupporterService';

// Factory
export * from './factory/ProtocolBuilder';

import { ProtocolBuilder, RegenerationProtocol } from './factory/ProtocolBuilder';
import { ProtocolConfigOverrides } from './ProtocolConfig';
import { IBlockClock } from './utils/BlockClock';

/**
 * Build a protocol with the in-memory ledger
 *
 * @example
 * const clock = new ManualBlockClock();
 * const protocol = createProtocol(clock, { blocksPerEra: 1_000 });
 */
export function createProtocol(clock: IBlockClock, overrides: ProtocolConfigOverrides = {}): RegenerationProtocol {
    return new ProtocolBuilder().withClock(clock).withConfig(overrides).build();
}
