/**
 * Resource Handler Interface
 *
 * What governance needs from a component whose resources can be challenged
 */

import { ResourceSnapshot, ResourceType } from '../types';

export interface IResourceHandler {
    readonly resourceType: ResourceType;

    /**
     * Current view of a resource, or null when it does not exist
     * or cannot be challenged
     */
    describe(id: number): ResourceSnapshot | null;

    /**
     * Count one invalidation vote against the resource and return the new tally
     */
    recordChallenge(id: number): number;

    /**
     * Mark the resource invalid and unwind the levels it produced
     */
    invalidate(id: number): void;
}
