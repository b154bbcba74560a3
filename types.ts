/**
 * Regeneration Credit Protocol - Core Types
 *
 * Participants earn levels for verified work; levels convert into a
 * proportional share of a halving, fixed-supply token budget per era.
 */

export type UserType =
  | 'undefined'
  | 'regenerator'
  | 'inspector'
  | 'researcher'
  | 'developer'
  | 'contributor'
  | 'activist'
  | 'supporter'
  | 'denied';

/**
 * Types an account can register as
 */
export type RegistrableUserType = Exclude<UserType, 'undefined' | 'denied'>;

export const REGISTRABLE_USER_TYPES: readonly RegistrableUserType[] = [
  'regenerator',
  'inspector',
  'researcher',
  'developer',
  'contributor',
  'activist',
  'supporter',
] as const;

/**
 * Types that own a reward pool. Validators are not a user type:
 * the validator pool rewards voters of the governance types.
 */
export type EarningUserType = Exclude<RegistrableUserType, 'supporter'>;

export type PoolType = EarningUserType | 'validator';

export const POOL_TYPES: readonly PoolType[] = [
  'regenerator',
  'inspector',
  'researcher',
  'developer',
  'contributor',
  'activist',
  'validator',
] as const;

export type VoterUserType = 'developer' | 'researcher' | 'contributor' | 'activist';

export const VOTER_USER_TYPES: readonly VoterUserType[] = [
  'developer',
  'researcher',
  'contributor',
  'activist',
] as const;

export function isVoterType(type: UserType): type is VoterUserType {
  return VOTER_USER_TYPES.some((voterType) => voterType === type);
}

export function isRegistrableType(type: string): type is RegistrableUserType {
  return REGISTRABLE_USER_TYPES.some((registrable) => registrable === type);
}

// ---------------------------------------------------------------------------
// Pools
// ---------------------------------------------------------------------------

/**
 * Per-participant pool bookkeeping, owned by the participant's rules engine
 */
export interface PoolState {
  /** Next era the participant may claim */
  currentEra: number;
  /** Levels posted to the pool over the participant's lifetime, net of removals */
  level: number;
  onContractPool: boolean;
}

export interface EraSummary {
  era: number;
  claimsCount: number;
  tokensClaimed: bigint;
  /** Denominator of the era's distribution */
  totalLevels: number;
}

export type WithdrawalStatus = 'not-ready' | 'already-claimed' | 'skipped' | 'paid';

export interface WithdrawalResult {
  status: WithdrawalStatus;
  account: string;
  era: number;
  amount: bigint;
  /** Era pointer the account should hold after this call */
  nextEra: number;
}

// ---------------------------------------------------------------------------
// Community
// ---------------------------------------------------------------------------

export interface UserRecord {
  account: string;
  userType: UserType;
  /** Type held before denial, kept so counters and pools can be unwound */
  registeredAs: RegistrableUserType;
  registeredAt: number;
  deniedAt: number | null;
  inviter: string | null;
}

export interface Invitation {
  invited: string;
  inviter: string;
  userType: RegistrableUserType;
  createdAt: number;
  revoked: boolean;
}

export type ProportionDirection = 'direct' | 'inverse';

export type PopulationPolicy =
  | { kind: 'unlimited' }
  | { kind: 'fixed'; max: number }
  | { kind: 'proportional'; ratio: number; direction: ProportionDirection };

// ---------------------------------------------------------------------------
// Inspections
// ---------------------------------------------------------------------------

export type InspectionStatus = 'open' | 'accepted' | 'inspected' | 'expired' | 'invalidated';

export interface Inspection {
  id: number;
  status: InspectionStatus;
  regenerator: string;
  inspector: string | null;
  treesResult: number;
  biodiversityResult: number;
  regenerationScore: number;
  evidenceHash: string;
  justificationHash: string;
  createdAt: number;
  createdAtEra: number;
  acceptedAt: number | null;
  acceptedAtEra: number | null;
  inspectedAt: number | null;
  inspectedAtEra: number | null;
  expiredAt: number | null;
  invalidatedAt: number | null;
  validationCount: number;
}

export interface InspectionResult {
  treesResult: number;
  biodiversityResult: number;
  evidenceHash: string;
  justificationHash: string;
}

export interface RegeneratorProfile {
  totalArea: number;
  name: string;
  proofPhotoHash: string;
  pendingInspection: boolean;
  totalInspections: number;
  lastRequestAt: number | null;
  regenerationScore: number;
}

export interface InspectorProfile {
  name: string;
  proofPhotoHash: string;
  totalInspections: number;
  giveUps: number;
  penalties: number;
  lastAcceptedAt: number | null;
  lastRealizedAt: number | null;
  activeInspectionId: number | null;
  /** Regenerators this inspector has taken; append-only */
  inspectedRegenerators: string[];
}

export interface EraImpact {
  era: number;
  trees: number;
  biodiversity: number;
  realizedInspections: number;
}

// ---------------------------------------------------------------------------
// Governance
// ---------------------------------------------------------------------------

export type ContributionResourceType = 'report' | 'research' | 'contribution';

export type ResourceType = ContributionResourceType | 'inspection';

export const CONTRIBUTION_CREATOR: Record<ContributionResourceType, EarningUserType> = {
  report: 'developer',
  research: 'researcher',
  contribution: 'contributor',
};

/**
 * The view of any challengeable resource that governance works with
 */
export interface ResourceSnapshot {
  resourceType: ResourceType;
  id: number;
  creator: string;
  era: number;
  valid: boolean;
  /** Invalidation votes received */
  validationCount: number;
}

export interface Resource extends ResourceSnapshot {
  resourceType: ContributionResourceType;
  title: string;
  description: string;
  proofHash: string;
  createdAt: number;
  invalidatedAt: number | null;
}

export interface ResourceSubmission {
  title: string;
  description: string;
  proofHash: string;
}

export interface ContributorProfile {
  name: string;
  submissions: number;
  lastSubmissionAt: number | null;
}

export interface ValidatorProfile {
  /** Validation points not yet converted */
  points: number;
  convertedLevels: number;
  votesCast: number;
  huntsWon: number;
  lastVoteAt: number | null;
}

export interface UserChallenge {
  target: string;
  era: number;
  hunter: string;
  voters: string[];
  succeeded: boolean;
}

export interface VoteOutcome {
  tally: number;
  threshold: number;
  invalidated: boolean;
  /** Account denied as a consequence of this vote, if any */
  denied: string | null;
}

export interface Delation {
  id: number;
  informer: string;
  reported: string;
  title: string;
  testimony: string;
  proofHash: string;
  thumbsUp: number;
  thumbsDown: number;
  createdAt: number;
}

export interface SupporterProfile {
  name: string;
  offsetsCount: number;
  totalOffset: bigint;
}

export interface OffsetCertificate {
  id: number;
  supporter: string;
  amount: bigint;
  createdAt: number;
  era: number;
}
