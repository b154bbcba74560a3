/**
 * Scoring Table
 *
 * Regeneration score of an inspection: trees and biodiversity each map to
 * one of seven tiers worth {0, 1, 2, 4, 8, 16, 32} points, for at most 64.
 */

export const TIER_POINTS: readonly number[] = [0, 1, 2, 4, 8, 16, 32] as const;

export const MAX_REGENERATION_SCORE = TIER_POINTS[TIER_POINTS.length - 1] * 2;

export class ScoringTable {
  /**
   * @param treeThresholds lower bound of each tier, ascending, starting at 0
   * @param biodiversityThresholds lower bound of each tier, ascending, starting at 0
   */
  constructor(
    private readonly treeThresholds: readonly number[],
    private readonly biodiversityThresholds: readonly number[]
  ) { }

  static points(value: number, thresholds: readonly number[]): number {
    let tier = 0;
    for (let i = 0; i < thresholds.length && i < TIER_POINTS.length; i++) {
      if (value >= thresholds[i]) {
        tier = i;
      }
    }
    return TIER_POINTS[tier];
  }

  treesPoints(trees: number): number {
    return ScoringTable.points(trees, this.treeThresholds);
  }

  biodiversityPoints(species: number): number {
    return ScoringTable.points(species, this.biodiversityThresholds);
  }

  score(trees: number, species: number): number {
    return this.treesPoints(trees) + this.biodiversityPoints(species);
  }
}
