/**
 * Community Registry Service
 *
 * Identity, user types, population caps and the invitation graph.
 * Denial is terminal and cascades: the account's invitations are revoked,
 * its inviter is penalized and a UserDenied event strips its levels.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { CommunityConfig } from './ProtocolConfig';
import { DomainEventBus } from './DomainEventBus';
import { InvitationGuard } from './InvitationGuard';
import { ILevelSource, isPoolType } from './ParticipantDirectory';
import {
  Invitation,
  RegistrableUserType,
  UserRecord,
  UserType,
} from './types';
import { ConsistencyViolation, PreconditionViolation, TemporalGate } from './errors';

export interface CommunityRegistryDependencies {
  clock: IBlockClock;
  events: DomainEventBus;
  levels: ILevelSource;
  guard: InvitationGuard;
}

export class CommunityRegistryService {
  private logger: ILogger;
  private clock: IBlockClock;
  private events: DomainEventBus;
  private levels: ILevelSource;
  private guard: InvitationGuard;
  private config: CommunityConfig;

  private users: Map<string, UserRecord> = new Map();
  private counts: Map<RegistrableUserType, number> = new Map();
  /** invitee -> latest invitation addressed to it */
  private invitations: Map<string, Invitation> = new Map();
  private issued: Map<string, string[]> = new Map();
  private lastInvitationAt: Map<string, number> = new Map();
  private penalties: Map<string, number> = new Map();

  constructor(logger: ILogger, dependencies: CommunityRegistryDependencies, config: CommunityConfig) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.events = dependencies.events;
    this.levels = dependencies.levels;
    this.guard = dependencies.guard;
    this.config = config;
  }

  /**
   * Register an account as `userType`, consuming its invitation
   */
  addUser(address: string, userType: RegistrableUserType): UserRecord {
    const account = normalizeAddress(address);
    const block = this.clock.currentBlock();

    if (this.users.has(account)) {
      throw new PreconditionViolation('ALREADY_REGISTERED', `${account} is already registered`);
    }

    const count = this.userCount(userType);
    const cap = this.populationCap(userType);
    if (count >= cap) {
      throw new PreconditionViolation(
        'POPULATION_CAP_REACHED',
        `${userType} population is at its cap of ${cap}`
      );
    }

    const invitation = this.liveInvitation(account, block);
    const usableInvitation = invitation && invitation.userType === userType ? invitation : null;
    if (this.needsInvitation(userType) && !usableInvitation) {
      throw new PreconditionViolation('INVITATION_REQUIRED', `${account} needs a live ${userType} invitation`);
    }

    const record: UserRecord = {
      account,
      userType,
      registeredAs: userType,
      registeredAt: block,
      deniedAt: null,
      inviter: usableInvitation ? usableInvitation.inviter : null,
    };
    this.users.set(account, record);
    this.counts.set(userType, count + 1);
    if (usableInvitation) {
      this.invitations.delete(account);
    }

    this.logger.info('User registered', { account, userType, inviter: record.inviter });
    this.events.publish('UserRegistered', { account, userType, inviter: record.inviter }, block);
    return { ...record };
  }

  invite(inviterAddress: string, invitedAddress: string, userType: RegistrableUserType): Invitation {
    const inviter = normalizeAddress(inviterAddress);
    const invited = normalizeAddress(invitedAddress);
    const block = this.clock.currentBlock();

    const inviterRecord = this.requireActive(inviter);
    const inviterType = inviterRecord.registeredAs;

    if (inviter === invited || !this.config.types[userType].invitableBy.includes(inviterType)) {
      throw new PreconditionViolation('INVITER_NOT_ALLOWED', `A ${inviterType} cannot invite this ${userType}`);
    }
    if (this.inviterPenalties(inviter) >= this.config.maxInviterPenalties) {
      throw new PreconditionViolation('INVITER_PENALIZED', `${inviter} has lost invitation rights`);
    }
    if (this.users.has(invited)) {
      throw new PreconditionViolation('ALREADY_REGISTERED', `${invited} is already registered`);
    }
    if (this.liveInvitation(invited, block)) {
      throw new PreconditionViolation('INVITATION_EXISTS', `${invited} already holds a live invitation`);
    }

    const lastAt = this.lastInvitationAt.get(inviter);
    const delay = this.config.types[inviterType].invitationDelayBlocks;
    if (lastAt !== undefined && block < lastAt + delay) {
      throw new TemporalGate(
        'INVITATION_COOLDOWN',
        `${inviter} must wait until block ${lastAt + delay} to invite again`,
        lastAt + delay
      );
    }

    if (!this.isEligibleInviter(inviter)) {
      throw new PreconditionViolation('INVITE_NOT_ELIGIBLE', `${inviter} is not above the ${inviterType} average level`);
    }

    const invitation: Invitation = { invited, inviter, userType, createdAt: block, revoked: false };
    this.invitations.set(invited, invitation);
    this.issued.set(inviter, [...(this.issued.get(inviter) ?? []), invited]);
    this.lastInvitationAt.set(inviter, block);

    this.logger.info('Invitation issued', { inviter, invited, userType });
    return { ...invitation };
  }

  /**
   * Above-average gate on the account's own type, shared with governance
   */
  isEligibleInviter(address: string): boolean {
    const record = this.users.get(normalizeAddress(address));
    if (!record || record.userType === 'denied') {
      return false;
    }
    const type = record.registeredAs;
    if (!isPoolType(type)) {
      return false;
    }
    return this.guard.canInvite(
      this.levels.totalLevels(type),
      this.userCount(type),
      this.levels.levelOf(type, record.account)
    );
  }

  /**
   * Terminal exclusion of an account
   */
  setToDenied(address: string): void {
    const account = normalizeAddress(address);
    const record = this.requireActive(account);
    const block = this.clock.currentBlock();

    const count = this.userCount(record.registeredAs);
    if (count <= 0) {
      throw new ConsistencyViolation('COUNTER_UNDERFLOW', `${record.registeredAs} population would become negative`, {
        account,
      });
    }

    this.counts.set(record.registeredAs, count - 1);
    record.userType = 'denied';
    record.deniedAt = block;
    const revoked = this.revokeInvitationsOf(account);

    this.logger.warn('User denied', { account, userType: record.registeredAs, revokedInvitations: revoked });

    if (record.inviter && this.users.has(record.inviter)) {
      this.addInviterPenalty(record.inviter);
    }

    this.events.publish('UserDenied', { account, userType: record.registeredAs }, block);
  }

  addInviterPenalty(address: string): number {
    const inviter = normalizeAddress(address);
    const penalties = this.inviterPenalties(inviter) + 1;
    this.penalties.set(inviter, penalties);

    if (penalties >= this.config.maxInviterPenalties) {
      const revoked = this.revokeInvitationsOf(inviter);
      this.logger.warn('Inviter lost invitation rights', { inviter, penalties, revokedInvitations: revoked });
    } else {
      this.logger.info('Inviter penalized', { inviter, penalties });
    }
    return penalties;
  }

  populationCap(userType: RegistrableUserType): number {
    const policy = this.config.types[userType].population;
    if (policy.kind === 'unlimited') {
      return Number.POSITIVE_INFINITY;
    }

    let cap = policy.kind === 'fixed' ? policy.max : 0;
    if (policy.kind === 'proportional') {
      const regenerators = this.userCount('regenerator');
      cap = policy.direction === 'direct'
        ? Math.floor(regenerators * policy.ratio)
        : Math.floor(regenerators / policy.ratio);
    }
    // Cold start: the first members of a type are not held back by the ratio
    return Math.max(cap, this.config.bootstrapThreshold);
  }

  needsInvitation(userType: RegistrableUserType): boolean {
    return this.config.types[userType].requiresInvitation
      && this.userCount(userType) >= this.config.bootstrapThreshold;
  }

  userCount(userType: RegistrableUserType): number {
    return this.counts.get(userType) ?? 0;
  }

  populationSummary(): Record<RegistrableUserType, number> {
    return {
      regenerator: this.userCount('regenerator'),
      inspector: this.userCount('inspector'),
      researcher: this.userCount('researcher'),
      developer: this.userCount('developer'),
      contributor: this.userCount('contributor'),
      activist: this.userCount('activist'),
      supporter: this.userCount('supporter'),
    };
  }

  getUser(address: string): UserRecord | null {
    const record = this.users.get(normalizeAddress(address));
    return record ? { ...record } : null;
  }

  userTypeOf(address: string): UserType {
    return this.users.get(normalizeAddress(address))?.userType ?? 'undefined';
  }

  inviterOf(address: string): string | null {
    return this.users.get(normalizeAddress(address))?.inviter ?? null;
  }

  isDenied(address: string): boolean {
    return this.userTypeOf(address) === 'denied';
  }

  /**
   * Registered, not denied and, when given, of `userType`
   */
  requireActive(address: string, userType?: RegistrableUserType): UserRecord {
    const account = normalizeAddress(address);
    const record = this.users.get(account);
    if (!record) {
      throw new PreconditionViolation('NOT_REGISTERED', `${account} is not registered`);
    }
    if (record.userType === 'denied') {
      throw new PreconditionViolation('USER_DENIED', `${account} has been denied`);
    }
    if (userType && record.userType !== userType) {
      throw new PreconditionViolation('WRONG_USER_TYPE', `${account} is a ${record.userType}, not a ${userType}`);
    }
    return record;
  }

  getInvitation(address: string): Invitation | null {
    const invitation = this.invitations.get(normalizeAddress(address));
    return invitation ? { ...invitation } : null;
  }

  inviterPenalties(address: string): number {
    return this.penalties.get(normalizeAddress(address)) ?? 0;
  }

  private liveInvitation(invited: string, block: number): Invitation | null {
    const invitation = this.invitations.get(invited);
    if (!invitation || invitation.revoked) {
      return null;
    }
    const ttl = this.config.invitationTtlBlocks;
    if (ttl > 0 && block > invitation.createdAt + ttl) {
      return null;
    }
    return invitation;
  }

  private revokeInvitationsOf(inviter: string): number {
    let revoked = 0;
    for (const invited of this.issued.get(inviter) ?? []) {
      const invitation = this.invitations.get(invited);
      if (invitation && invitation.inviter === inviter && !invitation.revoked) {
        invitation.revoked = true;
        revoked += 1;
      }
    }
    return revoked;
  }
}
