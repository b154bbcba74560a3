/**
 * Protocol Configuration
 *
 * Set once at build time, immutable afterwards.
 * Token budgets are decimal strings so the config survives JSON round trips.
 */

import * as fs from 'fs';
import { LogLevel } from './utils/ILogger';
import {
  ContributionResourceType,
  PoolType,
  PopulationPolicy,
  RegistrableUserType,
} from './types';
import { ConfigurationError } from './errors';

export interface PoolConfig {
  /** Total token units this pool distributes over its lifetime */
  totalTokens: string;
}

export interface UserTypeConfig {
  population: PopulationPolicy;
  requiresInvitation: boolean;
  /** Blocks an inviter of this type waits between two invitations */
  invitationDelayBlocks: number;
  /** Inviter types allowed to invite this type */
  invitableBy: RegistrableUserType[];
}

export interface CommunityConfig {
  /** Populations at or below this size skip invitation and eligibility gates */
  bootstrapThreshold: number;
  maxInviterPenalties: number;
  /** 0 keeps invitations valid until used or revoked */
  invitationTtlBlocks: number;
  types: Record<RegistrableUserType, UserTypeConfig>;
}

export interface InspectionConfig {
  interInspectionDelayBlocks: number;
  inspectionDeadlineBlocks: number;
  requestCooldownBlocks: number;
  maxGiveUps: number;
  minArea: number;
  maxArea: number;
  maxInspections: number;
  minInspectionsToEnterPool: number;
  maxTreesResult: number;
  maxBiodiversityResult: number;
  /** Seven ascending lower bounds, one per tier of {0,1,2,4,8,16,32} */
  treeThresholds: number[];
  biodiversityThresholds: number[];
}

export interface GovernanceConfig {
  safeguardBlocks: number;
  voteIntervalBlocks: number;
  pointsPerLevel: number;
  maxPenalties: number;
  invalidationVoteDivisor: number;
}

export interface ContributionConfig {
  submissionDelayBlocks: Record<ContributionResourceType, number>;
}

export interface TextLimits {
  maxNameLength: number;
  maxHashLength: number;
  maxTitleLength: number;
  maxDescriptionLength: number;
  maxJustificationLength: number;
}

export interface ProtocolConfig {
  deployBlock: number;
  blocksPerEra: number;
  /** Eras per epoch; emission halves every epoch */
  halving: number;
  /** Fixed-point scale of elapsedErasSince */
  eraFractionPrecision: number;
  logLevel: LogLevel;
  pools: Record<PoolType, PoolConfig>;
  community: CommunityConfig;
  inspection: InspectionConfig;
  governance: GovernanceConfig;
  contributions: ContributionConfig;
  text: TextLimits;
}

export interface ProtocolConfigOverrides {
  deployBlock?: number;
  blocksPerEra?: number;
  halving?: number;
  eraFractionPrecision?: number;
  logLevel?: LogLevel;
  pools?: Partial<Record<PoolType, PoolConfig>>;
  community?: Partial<Omit<CommunityConfig, 'types'>> & {
    types?: Partial<Record<RegistrableUserType, UserTypeConfig>>;
  };
  inspection?: Partial<InspectionConfig>;
  governance?: Partial<GovernanceConfig>;
  contributions?: {
    submissionDelayBlocks?: Partial<Record<ContributionResourceType, number>>;
  };
  text?: Partial<TextLimits>;
}

const GOVERNANCE_POPULATION: PopulationPolicy = {
  kind: 'proportional',
  ratio: 10,
  direction: 'inverse',
};

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
  deployBlock: 0,
  blocksPerEra: 12_500,
  halving: 12,
  eraFractionPrecision: 100_000,
  logLevel: 'info',
  pools: {
    regenerator: { totalTokens: '750000000' },
    inspector: { totalTokens: '240000000' },
    researcher: { totalTokens: '120000000' },
    developer: { totalTokens: '120000000' },
    contributor: { totalTokens: '120000000' },
    activist: { totalTokens: '40000000' },
    validator: { totalTokens: '40000000' },
  },
  community: {
    bootstrapThreshold: 5,
    maxInviterPenalties: 5,
    invitationTtlBlocks: 0,
    types: {
      regenerator: {
        population: { kind: 'unlimited' },
        requiresInvitation: true,
        invitationDelayBlocks: 0,
        invitableBy: ['activist', 'regenerator'],
      },
      inspector: {
        population: { kind: 'proportional', ratio: 20, direction: 'direct' },
        requiresInvitation: true,
        invitationDelayBlocks: 6_000,
        invitableBy: ['activist', 'inspector'],
      },
      researcher: {
        population: GOVERNANCE_POPULATION,
        requiresInvitation: true,
        invitationDelayBlocks: 12_500,
        invitableBy: ['researcher'],
      },
      developer: {
        population: GOVERNANCE_POPULATION,
        requiresInvitation: true,
        invitationDelayBlocks: 12_500,
        invitableBy: ['developer'],
      },
      contributor: {
        population: GOVERNANCE_POPULATION,
        requiresInvitation: true,
        invitationDelayBlocks: 12_500,
        invitableBy: ['contributor'],
      },
      activist: {
        population: GOVERNANCE_POPULATION,
        requiresInvitation: true,
        invitationDelayBlocks: 12_500,
        invitableBy: ['activist'],
      },
      supporter: {
        population: { kind: 'unlimited' },
        requiresInvitation: false,
        invitationDelayBlocks: 0,
        invitableBy: [],
      },
    },
  },
  inspection: {
    interInspectionDelayBlocks: 6_000,
    inspectionDeadlineBlocks: 50_000,
    requestCooldownBlocks: 6_000,
    maxGiveUps: 4,
    minArea: 2_500,
    maxArea: 1_000_000,
    maxInspections: 6,
    minInspectionsToEnterPool: 3,
    maxTreesResult: 10_000_000,
    maxBiodiversityResult: 10_000,
    treeThresholds: [0, 500, 2_500, 10_000, 20_000, 50_000, 100_000],
    biodiversityThresholds: [0, 5, 10, 25, 50, 80, 120],
  },
  governance: {
    safeguardBlocks: 1_000,
    voteIntervalBlocks: 100,
    pointsPerLevel: 50,
    maxPenalties: 3,
    invalidationVoteDivisor: 2,
  },
  contributions: {
    submissionDelayBlocks: {
      report: 3_000,
      research: 3_000,
      contribution: 3_000,
    },
  },
  text: {
    maxNameLength: 100,
    maxHashLength: 150,
    maxTitleLength: 100,
    maxDescriptionLength: 1_000,
    maxJustificationLength: 300,
  },
};

/**
 * Merge overrides onto the defaults, section by section
 */
export function resolveProtocolConfig(
  overrides: ProtocolConfigOverrides = {},
  base: ProtocolConfig = DEFAULT_PROTOCOL_CONFIG
): ProtocolConfig {
  const { types: typeOverrides, ...communityOverrides } = overrides.community ?? {};

  return {
    deployBlock: overrides.deployBlock ?? base.deployBlock,
    blocksPerEra: overrides.blocksPerEra ?? base.blocksPerEra,
    halving: overrides.halving ?? base.halving,
    eraFractionPrecision: overrides.eraFractionPrecision ?? base.eraFractionPrecision,
    logLevel: overrides.logLevel ?? base.logLevel,
    pools: { ...base.pools, ...overrides.pools },
    community: {
      ...base.community,
      ...communityOverrides,
      types: { ...base.community.types, ...typeOverrides },
    },
    inspection: { ...base.inspection, ...overrides.inspection },
    governance: { ...base.governance, ...overrides.governance },
    contributions: {
      submissionDelayBlocks: {
        ...base.contributions.submissionDelayBlocks,
        ...overrides.contributions?.submissionDelayBlocks,
      },
    },
    text: { ...base.text, ...overrides.text },
  };
}

/**
 * Read overrides from a JSON file and merge them onto the defaults
 */
export function loadProtocolConfig(filePath: string): ProtocolConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read protocol config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Protocol config at ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isOverrides(parsed)) {
    throw new ConfigurationError(`Protocol config at ${filePath} must be a JSON object`);
  }

  // Shape is checked field by field once merged, by ConfigValidator
  return resolveProtocolConfig(parsed);
}

function isOverrides(value: unknown): value is ProtocolConfigOverrides {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
