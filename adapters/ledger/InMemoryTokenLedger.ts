/**
 * In-Memory Token Ledger
 *
 * Process-local implementation of ITokenLedger for embedding hosts and tests
 */

import { ITokenLedger } from '../../interfaces/ITokenLedger';
import { ConsistencyViolation, PreconditionViolation } from '../../errors';

export interface LedgerAllocation {
    account: string;
    amount: bigint;
    /** Counted in totalLocked until released by decreaseLocked */
    locked: boolean;
}

export class InMemoryTokenLedger implements ITokenLedger {
    private balances: Map<string, bigint> = new Map();
    private supply = 0n;
    private locked = 0n;
    private certified = 0n;

    constructor(allocations: LedgerAllocation[] = []) {
        for (const allocation of allocations) {
            this.assertAmount(allocation.amount, true);
            this.credit(allocation.account, allocation.amount);
            this.supply += allocation.amount;
            if (allocation.locked) {
                this.locked += allocation.amount;
            }
        }
    }

    balanceOf(account: string): bigint {
        return this.balances.get(account) ?? 0n;
    }

    transfer(from: string, to: string, amount: bigint): void {
        this.assertAmount(amount, true);
        this.debit(from, amount);
        this.credit(to, amount);
    }

    burnFrom(account: string, amount: bigint): void {
        this.assertAmount(amount, false);
        this.debit(account, amount);
        this.supply -= amount;
        this.certified += amount;
    }

    decreaseLocked(amount: bigint): void {
        this.assertAmount(amount, true);
        if (amount > this.locked) {
            throw new ConsistencyViolation('COUNTER_UNDERFLOW', 'Cannot release more than the locked supply', {
                amount: amount.toString(),
                locked: this.locked.toString(),
            });
        }
        this.locked -= amount;
    }

    totalSupply(): bigint {
        return this.supply;
    }

    totalLocked(): bigint {
        return this.locked;
    }

    totalCertified(): bigint {
        return this.certified;
    }

    private credit(account: string, amount: bigint): void {
        this.balances.set(account, this.balanceOf(account) + amount);
    }

    private debit(account: string, amount: bigint): void {
        const balance = this.balanceOf(account);
        if (balance < amount) {
            throw new PreconditionViolation(
                'INSUFFICIENT_BALANCE',
                `Balance of ${account} (${balance}) is below ${amount}`
            );
        }
        this.balances.set(account, balance - amount);
    }

    private assertAmount(amount: bigint, allowZero: boolean): void {
        if (amount < 0n || (!allowZero && amount === 0n)) {
            throw new PreconditionViolation('INVALID_AMOUNT', `Invalid token amount: ${amount}`);
        }
    }
}
