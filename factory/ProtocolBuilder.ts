/**
 * Protocol Builder
 *
 * One-time wiring of the protocol: resolves and validates the config,
 * creates one reward pool and rules engine per pool type, and registers
 * the domain event handlers in their fixed order. The first build locks
 * the builder; later builds return the same instance.
 */

import { ILogger, ConsoleLogger, childLogger } from '../utils/ILogger';
import { IBlockClock } from '../utils/BlockClock';
import { ITokenLedger } from '../interfaces/ITokenLedger';
import { InMemoryTokenLedger } from '../adapters/ledger/InMemoryTokenLedger';
import {
  DEFAULT_PROTOCOL_CONFIG,
  ProtocolConfig,
  ProtocolConfigOverrides,
  loadProtocolConfig,
  resolveProtocolConfig,
} from '../ProtocolConfig';
import { ConfigValidator } from '../ConfigValidator';
import { TimeBucketingService } from '../TimeBucketingService';
import { InvariantChecker } from '../InvariantChecker';
import { DomainEventBus } from '../DomainEventBus';
import { RewardPoolService } from '../RewardPoolService';
import { RulesEngine } from '../RulesEngine';
import { ParticipantDirectory } from '../ParticipantDirectory';
import { InvitationGuard } from '../InvitationGuard';
import { CommunityRegistryService } from '../CommunityRegistryService';
import { ScoringTable } from '../ScoringTable';
import { RegeneratorRules } from '../RegeneratorRules';
import { InspectorRules } from '../InspectorRules';
import { ActivistProfile, ActivistRules } from '../ActivistRules';
import { InspectionService } from '../InspectionService';
import { ContributionService } from '../ContributionService';
import { GovernanceService } from '../GovernanceService';
import { DelationService } from '../DelationService';
import { SupporterService } from '../SupporterService';
import {
  ContributionResourceType,
  ContributorProfile,
  InspectorProfile,
  POOL_TYPES,
  PoolType,
  RegeneratorProfile,
  ValidatorProfile,
} from '../types';
import { ConfigurationError } from '../errors';

export interface RegenerationProtocol {
  readonly config: ProtocolConfig;
  readonly clock: IBlockClock;
  readonly ledger: ITokenLedger;
  readonly events: DomainEventBus;
  readonly invariants: InvariantChecker;
  readonly timeBucketing: TimeBucketingService;
  readonly pools: Record<PoolType, RewardPoolService>;
  readonly directory: ParticipantDirectory;
  readonly registry: CommunityRegistryService;
  readonly regenerators: RegeneratorRules;
  readonly inspectors: InspectorRules;
  readonly activists: ActivistRules;
  readonly inspections: InspectionService;
  readonly contributions: Record<ContributionResourceType, ContributionService>;
  readonly governance: GovernanceService;
  readonly delations: DelationService;
  readonly supporters: SupporterService;
}

/**
 * Ledger account holding a pool's locked budget
 */
export function poolAddress(poolType: PoolType): string {
  return `pool:${poolType}`;
}

/**
 * Pools whose members can claim as soon as they register. Regenerators
 * wait for their qualifying inspection.
 */
const ENTERS_POOL_ON_ENROLL: Record<PoolType, boolean> = {
  regenerator: false,
  inspector: true,
  researcher: true,
  developer: true,
  contributor: true,
  activist: true,
  validator: true,
};

export class ProtocolBuilder {
  private config: ProtocolConfig = DEFAULT_PROTOCOL_CONFIG;
  private ledger: ITokenLedger | null = null;
  private clock: IBlockClock | null = null;
  private logger: ILogger | null = null;
  private built: RegenerationProtocol | null = null;

  withConfig(overrides: ProtocolConfigOverrides): this {
    this.assertUnlocked();
    this.config = resolveProtocolConfig(overrides, this.config);
    return this;
  }

  withConfigFile(filePath: string): this {
    this.assertUnlocked();
    this.config = loadProtocolConfig(filePath);
    return this;
  }

  withLedger(ledger: ITokenLedger): this {
    this.assertUnlocked();
    this.ledger = ledger;
    return this;
  }

  withClock(clock: IBlockClock): this {
    this.assertUnlocked();
    this.clock = clock;
    return this;
  }

  withLogger(logger: ILogger): this {
    this.assertUnlocked();
    this.logger = logger;
    return this;
  }

  isLocked(): boolean {
    return this.built !== null;
  }

  build(): RegenerationProtocol {
    if (this.built) {
      return this.built;
    }
    if (!this.clock) {
      throw new ConfigurationError('A block clock is required', 'MISSING_DEPENDENCY');
    }

    const config = this.config;
    const logger = this.logger ?? new ConsoleLogger('RegenerationProtocol', config.logLevel);

    const validation = new ConfigValidator(childLogger(logger, 'ConfigValidator')).validate(config);
    if (!validation.valid) {
      throw new ConfigurationError('Invalid protocol configuration', 'INVALID_CONFIG', validation.errors);
    }
    for (const warning of validation.warnings) {
      logger.warn('Protocol config warning', { warning });
    }

    const clock = this.clock;
    const ledger = this.ledger ?? new InMemoryTokenLedger(
      POOL_TYPES.map((poolType) => ({
        account: poolAddress(poolType),
        amount: BigInt(config.pools[poolType].totalTokens),
        locked: true,
      }))
    );

    const timeBucketing = new TimeBucketingService({
      deployBlock: config.deployBlock,
      blocksPerEra: config.blocksPerEra,
      halving: config.halving,
      precision: config.eraFractionPrecision,
    });
    const invariants = new InvariantChecker(childLogger(logger, 'InvariantChecker'));
    const events = new DomainEventBus(childLogger(logger, 'DomainEventBus'));
    const directory = new ParticipantDirectory();

    const createEngine = <TProfile extends object>(poolType: PoolType): RulesEngine<TProfile> => {
      const pool = new RewardPoolService(
        childLogger(logger, `RewardPool:${poolType}`),
        { timeBucketing, ledger, clock, invariants },
        {
          poolType,
          poolAddress: poolAddress(poolType),
          totalTokens: BigInt(config.pools[poolType].totalTokens),
        }
      );
      const engine = new RulesEngine<TProfile>(
        childLogger(logger, `RulesEngine:${poolType}`),
        { pool, timeBucketing, clock },
        { poolType, entersPoolOnEnroll: ENTERS_POOL_ON_ENROLL[poolType] }
      );
      directory.register(engine);
      return engine;
    };

    const regeneratorEngine = createEngine<RegeneratorProfile>('regenerator');
    const inspectorEngine = createEngine<InspectorProfile>('inspector');
    const researcherEngine = createEngine<ContributorProfile>('researcher');
    const developerEngine = createEngine<ContributorProfile>('developer');
    const contributorEngine = createEngine<ContributorProfile>('contributor');
    const activistEngine = createEngine<ActivistProfile>('activist');
    const validatorEngine = createEngine<ValidatorProfile>('validator');
    const pools: Record<PoolType, RewardPoolService> = {
      regenerator: regeneratorEngine.rewardPool,
      inspector: inspectorEngine.rewardPool,
      researcher: researcherEngine.rewardPool,
      developer: developerEngine.rewardPool,
      contributor: contributorEngine.rewardPool,
      activist: activistEngine.rewardPool,
      validator: validatorEngine.rewardPool,
    };

    const registry = new CommunityRegistryService(
      childLogger(logger, 'CommunityRegistry'),
      { clock, events, levels: directory, guard: new InvitationGuard(config.community.bootstrapThreshold) },
      config.community
    );

    const rulesConfig = { inspection: config.inspection, text: config.text };
    const regenerators = new RegeneratorRules(
      childLogger(logger, 'RegeneratorRules'),
      { engine: regeneratorEngine, registry, clock },
      rulesConfig
    );
    const inspectors = new InspectorRules(
      childLogger(logger, 'InspectorRules'),
      { engine: inspectorEngine, registry, clock },
      rulesConfig
    );
    const activists = new ActivistRules(
      childLogger(logger, 'ActivistRules'),
      { engine: activistEngine, registry, regenerators, inspectors },
      rulesConfig
    );

    const inspections = new InspectionService(
      childLogger(logger, 'InspectionService'),
      {
        clock,
        timeBucketing,
        events,
        registry,
        regenerators,
        inspectors,
        scoring: new ScoringTable(config.inspection.treeThresholds, config.inspection.biodiversityThresholds),
      },
      { ...rulesConfig, safeguardBlocks: config.governance.safeguardBlocks }
    );

    const createContributions = (
      resourceType: ContributionResourceType,
      engine: RulesEngine<ContributorProfile>
    ): ContributionService =>
      new ContributionService(
        childLogger(logger, `ContributionService:${resourceType}`),
        { clock, timeBucketing, events, registry, engine },
        {
          resourceType,
          submissionDelayBlocks: config.contributions.submissionDelayBlocks[resourceType],
          safeguardBlocks: config.governance.safeguardBlocks,
          text: config.text,
        }
      );
    const contributions: Record<ContributionResourceType, ContributionService> = {
      report: createContributions('report', developerEngine),
      research: createContributions('research', researcherEngine),
      contribution: createContributions('contribution', contributorEngine),
    };

    const governance = new GovernanceService(
      childLogger(logger, 'GovernanceService'),
      { clock, timeBucketing, registry, validators: validatorEngine },
      { governance: config.governance, text: config.text }
    );
    governance.registerHandler(inspections);
    governance.registerHandler(contributions.report);
    governance.registerHandler(contributions.research);
    governance.registerHandler(contributions.contribution);

    events.subscribe('InspectionRealized', 'RegeneratorRules', (event) => regenerators.onInspectionRealized(event));
    events.subscribe('InspectionRealized', 'InspectorRules', (event) => inspectors.onInspectionRealized(event));
    events.subscribe('InspectionRealized', 'ActivistRules', (event) => activists.onInspectionRealized(event));
    events.subscribe('InspectionExpired', 'InspectorRules', (event) => inspectors.onInspectionExpired(event));
    events.subscribe('InspectionInvalidated', 'RegeneratorRules', (event) => regenerators.onInspectionInvalidated(event));
    events.subscribe('InspectionInvalidated', 'InspectorRules', (event) => inspectors.onInspectionInvalidated(event));
    events.subscribe('UserDenied', 'ParticipantDirectory', (event) => {
      directory.stripAll(event.account);
    });
    events.subscribe('UserDenied', 'InspectionService', (event, block) => inspections.onUserDenied(event, block));

    this.built = {
      config,
      clock,
      ledger,
      events,
      invariants,
      timeBucketing,
      pools,
      directory,
      registry,
      regenerators,
      inspectors,
      activists,
      inspections,
      contributions,
      governance,
      delations: new DelationService(childLogger(logger, 'DelationService'), { clock, registry }, config.text),
      supporters: new SupporterService(
        childLogger(logger, 'SupporterService'),
        { clock, timeBucketing, registry, ledger },
        config.text
      ),
    };

    logger.info('Protocol built', {
      deployBlock: config.deployBlock,
      blocksPerEra: config.blocksPerEra,
      halving: config.halving,
    });
    return this.built;
  }

  private assertUnlocked(): void {
    if (this.built) {
      throw new ConfigurationError('The protocol is already built; its configuration is locked', 'BUILDER_LOCKED');
    }
  }
}
