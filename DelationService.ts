/**
 * Delation Service
 *
 * Public reports against a user, rated with thumbs up or down. A social
 * signal only: delations never change levels or user state.
 */

import { ILogger } from './utils/ILogger';
import { IBlockClock } from './utils/BlockClock';
import { normalizeAddress } from './utils/address';
import { assertText } from './utils/text';
import { CommunityRegistryService } from './CommunityRegistryService';
import { TextLimits } from './ProtocolConfig';
import { Delation } from './types';
import { PreconditionViolation } from './errors';

export interface DelationInput {
  title: string;
  testimony: string;
  proofHash: string;
}

export class DelationService {
  private logger: ILogger;
  private clock: IBlockClock;
  private registry: CommunityRegistryService;
  private text: TextLimits;

  private delations: Map<number, Delation> = new Map();
  /** delation id -> accounts that rated it */
  private ratings: Map<number, Set<string>> = new Map();
  private nextId = 1;

  constructor(
    logger: ILogger,
    dependencies: { clock: IBlockClock; registry: CommunityRegistryService },
    text: TextLimits
  ) {
    this.logger = logger;
    this.clock = dependencies.clock;
    this.registry = dependencies.registry;
    this.text = text;
  }

  addDelation(informerAddress: string, reportedAddress: string, input: DelationInput): Delation {
    const informer = normalizeAddress(informerAddress);
    const reported = normalizeAddress(reportedAddress);

    this.registry.requireActive(informer);
    if (!this.registry.getUser(reported)) {
      throw new PreconditionViolation('NOT_REGISTERED', `${reported} is not registered`);
    }
    if (informer === reported) {
      throw new PreconditionViolation('SELF_VOTE', 'Users cannot report themselves');
    }
    assertText('title', input.title, this.text.maxTitleLength);
    assertText('testimony', input.testimony, this.text.maxDescriptionLength);
    assertText('proofHash', input.proofHash, this.text.maxHashLength, false);

    const delation: Delation = {
      id: this.nextId++,
      informer,
      reported,
      title: input.title,
      testimony: input.testimony,
      proofHash: input.proofHash,
      thumbsUp: 0,
      thumbsDown: 0,
      createdAt: this.clock.currentBlock(),
    };
    this.delations.set(delation.id, delation);

    this.logger.info('Delation added', { id: delation.id, informer, reported });
    return { ...delation };
  }

  voteDelation(voterAddress: string, id: number, support: boolean): Delation {
    const voter = normalizeAddress(voterAddress);
    this.registry.requireActive(voter);

    const delation = this.delations.get(id);
    if (!delation) {
      throw new PreconditionViolation('DELATION_NOT_FOUND', `Delation ${id} does not exist`);
    }
    if (delation.informer === voter || delation.reported === voter) {
      throw new PreconditionViolation('SELF_VOTE', 'Parties of a delation cannot rate it');
    }
    const raters = this.ratings.get(id) ?? new Set<string>();
    if (raters.has(voter)) {
      throw new PreconditionViolation('ALREADY_VOTED', `${voter} already rated delation ${id}`);
    }

    raters.add(voter);
    this.ratings.set(id, raters);
    if (support) {
      delation.thumbsUp += 1;
    } else {
      delation.thumbsDown += 1;
    }

    this.logger.debug('Delation rated', { id, voter, support });
    return { ...delation };
  }

  getDelation(id: number): Delation | null {
    const delation = this.delations.get(id);
    return delation ? { ...delation } : null;
  }

  delationsAgainst(address: string): Delation[] {
    const reported = normalizeAddress(address);
    return [...this.delations.values()]
      .filter((delation) => delation.reported === reported)
      .map((delation) => ({ ...delation }));
  }
}
