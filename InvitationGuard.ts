/**
 * Invitation Guard
 *
 * Anti-Sybil eligibility: once a type outgrows its bootstrap population,
 * only members whose level is above the type's integer average may
 * invite (or vote).
 */

export class InvitationGuard {
  constructor(private readonly bootstrapThreshold: number) { }

  canInvite(totalLevelsOfType: number, totalUsersOfType: number, inviterLevels: number): boolean {
    if (totalUsersOfType <= this.bootstrapThreshold) {
      return true;
    }
    return inviterLevels >= this.requiredLevel(totalLevelsOfType, totalUsersOfType);
  }

  /**
   * Smallest level that passes the gate: floor(average) + 1
   */
  requiredLevel(totalLevelsOfType: number, totalUsersOfType: number): number {
    if (totalUsersOfType <= 0) {
      return 0;
    }
    return Math.floor(totalLevelsOfType / totalUsersOfType) + 1;
  }
}
