import { ethers } from 'ethers';
import { PreconditionViolation } from '../errors';

/**
 * Checksummed form of an account address; every map in the protocol is keyed by it
 */
export function normalizeAddress(address: string): string {
    if (!address || !ethers.isAddress(address)) {
        throw new PreconditionViolation('INVALID_ADDRESS', `Invalid address: ${address}`);
    }
    return ethers.getAddress(address);
}
