/**
 * @module route-planner
 * @description
 * Orders a truck's load in place by greedy nearest neighbour, never letting a closer stop jump
 * ahead of a stop with an earlier deadline.
 *
 * Algorithm:
 * 1. For each position i, scan the unplaced suffix [i, n).
 * 2. A candidate replaces the current best only if it is strictly closer to the reference location
 *    AND either neither has a deadline or the candidate's deadline is set and not later.
 * 3. Swap the best into position i; its destination becomes the new reference.
 *
 * Complexity:
 * O(n^2) in the number of loaded packages, bounded by truck capacity.
 */

import type { Location, Package } from '../types/types';
import type { SimulationContext } from './context';

/** A stop with no deadline never ranks as "not later" than any other stop */
const keepsDeadlineOrder = (candidate: Package, best: Package): boolean => {
    const candidateDeadline = candidate.deliveryDeadline;
    const bestDeadline = best.deliveryDeadline;

    if (candidateDeadline === null || bestDeadline === null) {
        return candidateDeadline === null && bestDeadline === null;
    }

    return !candidateDeadline.isAfter(bestDeadline);
};

/** Round trip hub -> stops in the given order -> hub, in miles */
export const routeDistance = (packageIds: ReadonlyArray<number>, ctx: SimulationContext): number => {
    let totalDistance = 0;
    let current = ctx.hub;

    for (const packageId of packageIds) {
        const destination = ctx.packages.get(packageId).location;
        totalDistance += ctx.locations.distance(current, destination);
        current = destination;
    }

    return totalDistance + ctx.locations.distance(current, ctx.hub);
};

export const planRoute = (packageIds: number[], start: Location, ctx: SimulationContext): number[] => {
    ctx.logger.debug(`Starting delivery order: ${packageIds.join(', ')}`);
    ctx.logger.debug(`Total miles: ${routeDistance(packageIds, ctx).toFixed(1)}`);

    let current = start;

    for (let i = 0; i < packageIds.length; ++i) {
        let best = i;

        for (let j = i; j < packageIds.length; ++j) {
            const candidate = ctx.packages.get(packageIds[j]);
            const bestPackage = ctx.packages.get(packageIds[best]);

            const candidateDistance = ctx.locations.distance(current, candidate.location);
            const bestDistance = ctx.locations.distance(current, bestPackage.location);

            if (candidateDistance < bestDistance && keepsDeadlineOrder(candidate, bestPackage)) {
                best = j;
            }
        }

        [packageIds[i], packageIds[best]] = [packageIds[best], packageIds[i]];
        current = ctx.packages.get(packageIds[i]).location;
    }

    ctx.logger.debug(`Ending delivery order: ${packageIds.join(', ')}`);
    ctx.logger.debug(`Total miles: ${routeDistance(packageIds, ctx).toFixed(1)}`);

    return packageIds;
};
