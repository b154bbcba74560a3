/**
 * Block Clock
 *
 * The only source of time for the protocol: a monotonically increasing
 * block height supplied from outside.
 */

import { PreconditionViolation } from '../errors';

export interface IBlockClock {
    currentBlock(): number;
}

/**
 * Manually driven clock for embedding hosts and tests
 */
export class ManualBlockClock implements IBlockClock {
    private block: number;

    constructor(startBlock: number = 0) {
        if (!Number.isSafeInteger(startBlock) || startBlock < 0) {
            throw new PreconditionViolation('INVALID_AMOUNT', `Invalid start block: ${startBlock}`);
        }
        this.block = startBlock;
    }

    currentBlock(): number {
        return this.block;
    }

    advance(blocks: number = 1): number {
        if (!Number.isSafeInteger(blocks) || blocks < 0) {
            throw new PreconditionViolation('INVALID_AMOUNT', `Cannot advance by ${blocks} blocks`);
        }
        this.block += blocks;
        return this.block;
    }

    setBlock(block: number): number {
        if (!Number.isSafeInteger(block) || block < this.block) {
            throw new PreconditionViolation(
                'CLOCK_REWIND',
                `Block height must not decrease (current ${this.block}, requested ${block})`
            );
        }
        this.block = block;
        return this.block;
    }
}
