/**
 * Participant Directory
 *
 * Read access to the rules engines of every pool type, used by the
 * eligibility gates of the registry and governance.
 */

import { RulesEngine } from './RulesEngine';
import { PoolType, UserType } from './types';

export interface ILevelSource {
  levelOf(poolType: PoolType, account: string): number;
  totalLevels(poolType: PoolType): number;
}

/**
 * The part of a rules engine the directory needs; independent of the profile type
 */
export type DirectoryEngine = Pick<
  RulesEngine<object>,
  'policy' | 'rewardPool' | 'isEnrolled' | 'levelOf' | 'removeAllLevels'
>;

export function isPoolType(type: UserType | PoolType): type is PoolType {
  return type !== 'undefined' && type !== 'denied' && type !== 'supporter';
}

export class ParticipantDirectory implements ILevelSource {
  private engines: Map<PoolType, DirectoryEngine> = new Map();

  register(engine: DirectoryEngine): void {
    this.engines.set(engine.policy.poolType, engine);
  }

  engineOf(poolType: PoolType): DirectoryEngine | null {
    return this.engines.get(poolType) ?? null;
  }

  levelOf(poolType: PoolType, account: string): number {
    return this.engines.get(poolType)?.levelOf(account) ?? 0;
  }

  totalLevels(poolType: PoolType): number {
    return this.engines.get(poolType)?.rewardPool.totalActiveLevels() ?? 0;
  }

  /**
   * Remove a denied account's levels from every pool it takes part in
   */
  stripAll(account: string): number {
    let removed = 0;
    for (const engine of this.engines.values()) {
      if (engine.isEnrolled(account)) {
        removed += engine.removeAllLevels(account);
      }
    }
    return removed;
  }
}
