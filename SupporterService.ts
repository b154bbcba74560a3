/**
 * Supporter Service
 *
 * Supporters burn tokens to offset their impact. Every burn is counted as
 * certified supply and recorded as a certificate.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { TimeBucketingService } from './TimeBucketingService';
import { CommunityRegistryService } from './CommunityRegistryService';
import { ITokenLedger } from './interfaces/ITokenLedger';
import { TextLimits } from './ProtocolConfig';
import { OffsetCertificate, SupporterProfile } from './types';
import { PreconditionViolation } from './errors';

export interface SupporterServiceDependencies {
  clock: IBlockClock;
  timeBucketing: TimeBucketingService;
  registry: CommunityRegistryService;
  ledger: ITokenLedger;
}

export class SupporterService {
  private logger: ILogger;
  private clock: IBlockClock;
  private timeBucketing: TimeBucketingService;
  private registry: CommunityRegistryService;
  private ledger: ITokenLedger;
  private text: TextLimits;

  private profiles: Map<string, SupporterProfile> = new Map();
  private certificates: OffsetCertificate[] = [];

  constructor(logger: ILogger, dependencies: SupporterServiceDependencies, text: TextLimits) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.timeBucketing = dependencies.timeBucketing;
    this.registry = dependencies.registry;
    this.ledger = dependencies.ledger;
    this.text = text;
  }

  register(address: string, name: string): SupporterProfile {
    const account = normalizeAddress(address);
    assertText('name', name, this.text.maxNameLength);

    this.registry.addUser(account, 'supporter');
    const profile: SupporterProfile = { name, offsetsCount: 0, totalOffset: 0n };
    this.profiles.set(account, profile);
    return { ...profile };
  }

  offset(address: string, amount: bigint): OffsetCertificate {
    const supporter = normalizeAddress(address);
    this.registry.requireActive(supporter, 'supporter');
    const profile = this.profiles.get(supporter);
    if (!profile) {
      throw new PreconditionViolation('NOT_REGISTERED', `${supporter} has no supporter profile`);
    }
    if (amount <= 0n) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Offset amount must be positive, got ${amount}`);
    }

    this.ledger.burnFrom(supporter, amount);

    const block = this.clock.currentBlock();
    const certificate: OffsetCertificate = {
      id: this.certificates.length + 1,
      supporter,
      amount,
      createdAt: block,
      era: this.timeBucketing.currentEra(block),
    };
    this.certificates.push(certificate);
    profile.offsetsCount += 1;
    profile.totalOffset += amount;

    this.logger.info('Tokens burned for offset', { supporter, amount: amount.toString(), certificate: certificate.id });
    return { ...certificate };
  }

  getProfile(address: string): SupporterProfile | null {
    const profile = this.profiles.get(normalizeAddress(address));
    return profile ? { ...profile } : null;
  }

  certificatesOf(address: string): OffsetCertificate[] {
    const supporter = normalizeAddress(address);
    return this.certificates.filter((certificate) => certificate.supporter === supporter).map((c) => ({ ...c }));
  }

  totalCertified(): bigint {
    return this.ledger.totalCertified();
  }
}
