/**
 * Token Ledger Interface
 *
 * The external balance ledger the reward pools pay out of.
 * Pools hold their budgets as locked supply under their own address.
 */

export interface ITokenLedger {
    /**
     * Balance of an account, in token units
     */
    balanceOf(account: string): bigint;

    /**
     * Move tokens between accounts
     */
    transfer(from: string, to: string, amount: bigint): void;

    /**
     * Burn tokens from an account and count them as certified
     */
    burnFrom(account: string, amount: bigint): void;

    /**
     * Release tokens from the locked supply ahead of a pool payout
     */
    decreaseLocked(amount: bigint): void;

    totalSupply(): bigint;

    totalLocked(): bigint;

    totalCertified(): bigint;
}
